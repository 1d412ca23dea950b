/**
 * Scan driver: acquires one tree per file, extracts its settings and
 * merges the per-file results in walk order.
 *
 * Files are processed one at a time. A file whose tree cannot be acquired
 * is recorded as a failure and the scan moves on, unless the policy is
 * `abort`, in which case the first failure is rethrown.
 */
import * as path from 'node:path';
import { extractSettings } from '../settings/extractor.js';
import type {
  ExtractionDiagnostic,
  MatchOptions,
  SettingRecord,
} from '../settings/types.js';
import type { TreeSource } from '../parser/types.js';
import type { SyntaxNode } from '../tree/types.js';
import type { ParseErrorPolicy } from '../config/schema.js';
import { ExtractorError, errorMessage, logger, toPosixRelative } from '../../utils/index.js';
import { discoverFiles } from './walker.js';

const log = logger.child('scan');

export interface ScanOptions {
  /** Directory the recorded `sourceFile` paths are relative to */
  root: string;
  source: TreeSource;
  /** Extension to discover when `files` is not given (default `.java`) */
  extension?: string;
  exclude?: string[];
  /** Explicit file list; skips discovery */
  files?: string[];
  match?: MatchOptions;
  onParseError?: ParseErrorPolicy;
}

export interface FileFailure {
  /** Path relative to the scan root */
  file: string;
  code: string;
  message: string;
}

export interface ScanResult {
  records: SettingRecord[];
  diagnostics: ExtractionDiagnostic[];
  failures: FileFailure[];
  filesScanned: number;
}

export async function runScan(options: ScanOptions): Promise<ScanResult> {
  const root = path.resolve(options.root);
  const files = options.files
    ? options.files.map((file) => path.resolve(file))
    : await discoverFiles(root, {
      extension: options.extension ?? '.java',
      exclude: options.exclude,
    });

  log.info(`Scanning ${files.length} file(s) under ${root} with ${options.source.name}`);

  const result: ScanResult = { records: [], diagnostics: [], failures: [], filesScanned: 0 };

  for (const file of files) {
    const relative = toPosixRelative(root, file);
    result.filesScanned++;

    let tree: SyntaxNode;
    try {
      tree = await options.source.parse(file);
    } catch (error) {
      if (options.onParseError === 'abort') {
        throw error;
      }
      const failure: FileFailure = {
        file: relative,
        code: error instanceof ExtractorError ? error.code : 'UNKNOWN',
        message: errorMessage(error),
      };
      log.error(`Skipping ${relative}: ${failure.message}`);
      result.failures.push(failure);
      continue;
    }

    const extraction = extractSettings(tree, { ...options.match, sourceFile: relative });
    result.records.push(...extraction.records);
    result.diagnostics.push(...extraction.diagnostics);
  }

  log.debug('Scan finished', {
    files: result.filesScanned,
    records: result.records.length,
    diagnostics: result.diagnostics.length,
    failures: result.failures.length,
  });

  return result;
}
