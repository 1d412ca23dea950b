/**
 * Wire schemas for syntax trees.
 *
 * Two JSON shapes are accepted and normalized to {@link SyntaxNode}:
 * - the native shape (`tag`, `token`, `role`, `attributes`, `children`, `position`)
 * - the parser service's UAST v1 shape (`InternalType`, `Token`, `Properties`,
 *   `Children`, `StartPosition`), where `Properties.internalRole` carries the role
 */
import { z } from 'zod';
import { SystemError, ErrorCodes, formatZodError } from '../../utils/index.js';
import type { Position, SyntaxNode } from './types.js';

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

interface NativeNodeInput {
  tag: string;
  token?: string | null;
  role?: string | null;
  attributes?: Record<string, string | number | boolean> | null;
  children?: NativeNodeInput[] | null;
  position?: { line: number; column: number; offset?: number | null } | null;
}

interface UastNodeInput {
  InternalType: string;
  Token?: string | null;
  Properties?: Record<string, string | number | boolean> | null;
  Children?: UastNodeInput[] | null;
  StartPosition?: { Offset?: number | null; Line?: number | null; Col?: number | null } | null;
}

export const NativeNodeSchema: z.ZodType<NativeNodeInput> = z.lazy(() =>
  z.object({
    tag: z.string().min(1),
    token: z.string().nullish(),
    role: z.string().nullish(),
    attributes: z.record(z.string(), AttributeValueSchema).nullish(),
    children: z.array(NativeNodeSchema).nullish(),
    position: z
      .object({
        line: z.number().int().min(0),
        column: z.number().int().min(0),
        offset: z.number().int().min(0).nullish(),
      })
      .nullish(),
  })
);

export const UastNodeSchema: z.ZodType<UastNodeInput> = z.lazy(() =>
  z.object({
    InternalType: z.string().min(1),
    Token: z.string().nullish(),
    Properties: z.record(z.string(), AttributeValueSchema).nullish(),
    Children: z.array(UastNodeSchema).nullish(),
    StartPosition: z
      .object({
        Offset: z.number().int().min(0).nullish(),
        Line: z.number().int().min(0).nullish(),
        Col: z.number().int().min(0).nullish(),
      })
      .nullish(),
  })
);

function stringifyAttributes(
  attributes: Record<string, string | number | boolean> | null | undefined,
  omit?: string
): Record<string, string> {
  const result: Record<string, string> = {};
  if (!attributes) return result;
  for (const [key, value] of Object.entries(attributes)) {
    if (key === omit) continue;
    result[key] = String(value);
  }
  return result;
}

function fromNative(input: NativeNodeInput): SyntaxNode {
  let position: Position | undefined;
  if (input.position) {
    position = { line: input.position.line, column: input.position.column };
    if (input.position.offset != null) position.offset = input.position.offset;
  }

  return {
    tag: input.tag,
    token: input.token ?? '',
    role: input.role ?? undefined,
    attributes: stringifyAttributes(input.attributes),
    children: (input.children ?? []).map(fromNative),
    position,
  };
}

function fromUast(input: UastNodeInput): SyntaxNode {
  const role = input.Properties?.internalRole;
  const start = input.StartPosition;
  let position: Position | undefined;
  if (start && start.Line != null) {
    position = { line: start.Line, column: start.Col ?? 0 };
    if (start.Offset != null) position.offset = start.Offset;
  }

  return {
    tag: input.InternalType,
    token: input.Token ?? '',
    role: role === undefined ? undefined : String(role),
    attributes: stringifyAttributes(input.Properties, 'internalRole'),
    children: (input.Children ?? []).map(fromUast),
    position,
  };
}

function isUastShape(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'InternalType' in raw;
}

/**
 * Validate a JSON tree in either accepted shape and convert it to a {@link SyntaxNode}.
 *
 * @throws SystemError (INVALID_TREE) when the value matches neither shape
 */
export function normalizeTree(raw: unknown, source?: string): SyntaxNode {
  if (isUastShape(raw)) {
    const result = UastNodeSchema.safeParse(raw);
    if (result.success) return fromUast(result.data);
    throw invalidTree(result.error, source);
  }

  const result = NativeNodeSchema.safeParse(raw);
  if (result.success) return fromNative(result.data);
  throw invalidTree(result.error, source);
}

function invalidTree(error: z.ZodError, source: string | undefined): SystemError {
  const where = source ? ` in ${source}` : '';
  return new SystemError(
    ErrorCodes.INVALID_TREE,
    `Invalid syntax tree${where}: ${formatZodError(error)}`,
    { source, issues: error.issues }
  );
}
