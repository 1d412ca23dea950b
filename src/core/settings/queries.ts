/**
 * Path queries for setting declarations.
 *
 * Each resolution step lists its queries in preference order; callers take
 * the first one that matches anything.
 */
import {
  ANY,
  NodeRoles,
  NodeTags,
  child,
  descendant,
  hasRole,
  hasToken,
  parent,
  path,
  type PathExpression,
} from '../tree/index.js';

const T = NodeTags;

/**
 * Field declarations whose type is `<settingType><...>`.
 * `//FieldDeclaration/ParameterizedType/SimpleType/SimpleName[@token=<settingType>]/../../..`
 */
export function candidateQuery(settingTypeName: string): PathExpression {
  return path(
    descendant(T.FIELD_DECLARATION),
    child(T.PARAMETERIZED_TYPE),
    child(T.SIMPLE_TYPE),
    child(T.SIMPLE_NAME, hasToken(settingTypeName)),
    parent(),
    parent(),
    parent()
  );
}

/** `//FieldDeclaration/VariableDeclarationFragment/SimpleName` */
export const RAW_NAME_QUERY = path(
  descendant(T.FIELD_DECLARATION),
  child(T.VARIABLE_DECLARATION_FRAGMENT),
  child(T.SIMPLE_NAME)
);

/** `//FieldDeclaration/ParameterizedType/SimpleType[@internalRole='typeArguments']/SimpleName` */
export const DIRECT_TYPE_QUERY = path(
  descendant(T.FIELD_DECLARATION),
  child(T.PARAMETERIZED_TYPE),
  child(T.SIMPLE_TYPE, hasRole(NodeRoles.TYPE_ARGUMENTS)),
  child(T.SIMPLE_NAME)
);

/** `//FieldDeclaration/ParameterizedType/ParameterizedType[@internalRole='typeArguments']/*` */
export const NESTED_TYPE_QUERY = path(
  descendant(T.FIELD_DECLARATION),
  child(T.PARAMETERIZED_TYPE),
  child(T.PARAMETERIZED_TYPE, hasRole(NodeRoles.TYPE_ARGUMENTS)),
  child(ANY)
);

function argumentsOf(initializerTag: string): PathExpression {
  return path(
    descendant(T.FIELD_DECLARATION),
    child(T.VARIABLE_DECLARATION_FRAGMENT),
    child(initializerTag),
    child(ANY, hasRole(NodeRoles.ARGUMENTS))
  );
}

/** Factory idiom first (`Setting.intSetting(...)`), then `new Setting<>(...)`. */
export const ARGUMENT_QUERIES: readonly PathExpression[] = [
  argumentsOf(T.METHOD_INVOCATION),
  argumentsOf(T.CLASS_INSTANCE_CREATION),
];

/**
 * Long form first (`Setting.Property.Dynamic`), then short form (`Property.Dynamic`).
 */
export function propertyQueries(anchor: string): readonly PathExpression[] {
  return [
    path(
      descendant(T.QUALIFIED_NAME),
      child(T.QUALIFIED_NAME),
      child(T.SIMPLE_NAME, hasToken(anchor)),
      parent(),
      parent(),
      child(T.SIMPLE_NAME, hasRole(NodeRoles.NAME))
    ),
    path(
      descendant(T.QUALIFIED_NAME),
      child(T.SIMPLE_NAME, hasToken(anchor)),
      parent(),
      child(T.SIMPLE_NAME, hasRole(NodeRoles.NAME))
    ),
  ];
}
