/**
 * Syntax tree shape consumed by the query engine and the extractor.
 * Trees are produced by an external parser and never mutated here.
 */

/**
 * Source location of a node's first character.
 */
export interface Position {
  /** 1-indexed line */
  line: number;
  /** 1-indexed column */
  column: number;
  /** 0-indexed character offset, when the parser reports one */
  offset?: number;
}

/**
 * One node of a per-file syntax tree.
 */
export interface SyntaxNode {
  /** Syntactic category, e.g. `FieldDeclaration` or `QualifiedName` */
  tag: string;
  /** Literal text associated with the node; empty when the parser gave none */
  token: string;
  /** Role relative to the parent, e.g. `typeArguments`, `arguments`, `name` */
  role?: string;
  /** Auxiliary metadata such as `booleanValue` or a numeric literal's `token` */
  attributes: Readonly<Record<string, string>>;
  /** Children in source order */
  children: readonly SyntaxNode[];
  position?: Position;
}

/**
 * Java node tags the setting extractor matches on.
 */
export const NodeTags = {
  FIELD_DECLARATION: 'FieldDeclaration',
  VARIABLE_DECLARATION_FRAGMENT: 'VariableDeclarationFragment',
  PARAMETERIZED_TYPE: 'ParameterizedType',
  SIMPLE_TYPE: 'SimpleType',
  SIMPLE_NAME: 'SimpleName',
  QUALIFIED_NAME: 'QualifiedName',
  METHOD_INVOCATION: 'MethodInvocation',
  CLASS_INSTANCE_CREATION: 'ClassInstanceCreation',
  NUMBER_LITERAL: 'NumberLiteral',
  BOOLEAN_LITERAL: 'BooleanLiteral',
  STRING_LITERAL: 'StringLiteral',
} as const;

/**
 * Internal roles the setting extractor matches on.
 */
export const NodeRoles = {
  TYPE_ARGUMENTS: 'typeArguments',
  ARGUMENTS: 'arguments',
  NAME: 'name',
} as const;

/**
 * Convenience constructor used by tests and fixtures.
 */
export function createNode(
  tag: string,
  init: Partial<Omit<SyntaxNode, 'tag'>> = {}
): SyntaxNode {
  return {
    tag,
    token: init.token ?? '',
    role: init.role,
    attributes: init.attributes ?? {},
    children: init.children ?? [],
    position: init.position,
  };
}
