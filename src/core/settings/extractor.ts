/**
 * Setting record extraction for one file's syntax tree.
 *
 * Candidates are field declarations typed `Setting<...>`. Each candidate is
 * resolved in a fixed fallback order:
 * - type: direct type argument, then the chain of nested type arguments
 * - arguments: factory call, then direct construction
 * - flags: long qualified form, then short form (per argument)
 */
import { select, selectFirst, type SyntaxNode } from '../tree/index.js';
import { logger } from '../../utils/logger.js';
import { serializeDefaultValue } from './default-value.js';
import { resolveProperties } from './properties.js';
import {
  ARGUMENT_QUERIES,
  DIRECT_TYPE_QUERY,
  NESTED_TYPE_QUERY,
  RAW_NAME_QUERY,
  candidateQuery,
} from './queries.js';
import {
  DEFAULT_PROPERTY_ANCHOR_NAME,
  DEFAULT_SETTING_TYPE_NAME,
  MIN_SETTING_ARGUMENTS,
  type ExtractOptions,
  type ExtractionDiagnostic,
  type FileExtraction,
  type SettingRecord,
} from './types.js';

const log = logger.child('extract');

const NESTED_TYPE_SEPARATOR = ' of ';

/**
 * Field declarations that construct a setting of the given base type.
 */
export function findCandidates(
  root: SyntaxNode,
  settingTypeName: string = DEFAULT_SETTING_TYPE_NAME
): SyntaxNode[] {
  return select(root, candidateQuery(settingTypeName));
}

/**
 * Variable name the setting is assigned to, or '' when there is none.
 */
export function resolveRawName(declaration: SyntaxNode): string {
  return selectFirst(declaration, RAW_NAME_QUERY)?.token ?? '';
}

/**
 * Value type of a setting declaration.
 * `Setting<Integer>` gives `Integer`; `Setting<List<String>>` gives `List of String`.
 */
export function resolveType(declaration: SyntaxNode): string {
  const direct = selectFirst(declaration, DIRECT_TYPE_QUERY);
  if (direct) return direct.token;

  return select(declaration, NESTED_TYPE_QUERY)
    .flatMap((typeArgument) => {
      const head = typeArgument.children[0];
      return head ? [head.token] : [];
    })
    .join(NESTED_TYPE_SEPARATOR);
}

/**
 * Arguments of the declaration's initializer; factory call arguments win
 * over constructor arguments.
 */
export function resolveArguments(declaration: SyntaxNode): SyntaxNode[] {
  for (const query of ARGUMENT_QUERIES) {
    const nodes = select(declaration, query);
    if (nodes.length > 0) return nodes;
  }
  return [];
}

/**
 * Extract every setting record from a file's tree.
 * Candidates with fewer than three arguments are skipped with a diagnostic.
 */
export function extractSettings(root: SyntaxNode, options: ExtractOptions): FileExtraction {
  const settingTypeName = options.settingTypeName ?? DEFAULT_SETTING_TYPE_NAME;
  const anchor = options.propertyAnchorName ?? DEFAULT_PROPERTY_ANCHOR_NAME;
  const records: SettingRecord[] = [];
  const diagnostics: ExtractionDiagnostic[] = [];

  for (const declaration of findCandidates(root, settingTypeName)) {
    const rawName = resolveRawName(declaration);
    const type = resolveType(declaration);
    const args = resolveArguments(declaration);
    const sourceLine = declaration.position?.line ?? 0;

    if (args.length < MIN_SETTING_ARGUMENTS) {
      const diagnostic: ExtractionDiagnostic = {
        code: 'INSUFFICIENT_ARGUMENTS',
        message: `Problem with ${rawName || '<unnamed>'}: expected at least ${MIN_SETTING_ARGUMENTS} arguments, found ${args.length}`,
        sourceFile: options.sourceFile,
        sourceLine,
        rawName,
        argumentCount: args.length,
      };
      log.warn(`${options.sourceFile}:${sourceLine} ${diagnostic.message}`);
      diagnostics.push(diagnostic);
      continue;
    }

    records.push(
      Object.freeze({
        name: args[0].token,
        rawName,
        type,
        properties: Object.freeze(resolveProperties(args, anchor)),
        defaultValue: serializeDefaultValue(args[1]),
        sourceLine,
        sourceFile: options.sourceFile,
      })
    );
  }

  log.debug(`${options.sourceFile}: ${records.length} settings, ${diagnostics.length} skipped`);
  return { records, diagnostics };
}
