/**
 * Canonical string form of a setting's default-value argument.
 *
 * The encoding is consumed downstream and must stay stable:
 * pieces of calls and constructions are joined with `->`, qualified
 * names with `.`, and numeric literals always use their literal token.
 */
import { NodeTags, type SyntaxNode } from '../tree/index.js';

const PIECE_SEPARATOR = '->';
const QUALIFIER_SEPARATOR = '.';

type Serializer = (node: SyntaxNode) => string;

/**
 * Literal text of a numeric literal. Parsers put it in the `token`
 * attribute; the node token is used when the attribute is missing.
 */
export function literalToken(node: SyntaxNode): string {
  return node.attributes.token ?? node.token;
}

function qualifiedName(node: SyntaxNode): string {
  return node.children.map((part) => part.token).join(QUALIFIER_SEPARATOR);
}

const serializers: Record<string, Serializer> = {
  [NodeTags.NUMBER_LITERAL]: literalToken,

  [NodeTags.BOOLEAN_LITERAL]: (node) => node.attributes.booleanValue ?? '',

  // TimeValue.timeValueSeconds(30) -> "TimeValue->timeValueSeconds->30"
  [NodeTags.METHOD_INVOCATION]: (node) =>
    node.children
      .map((part) => (part.tag === NodeTags.NUMBER_LITERAL ? literalToken(part) : part.token))
      .join(PIECE_SEPARATOR),

  // new ByteSizeValue(7, ByteSizeUnit.MB) -> "7->ByteSizeUnit.MB"
  [NodeTags.CLASS_INSTANCE_CREATION]: (node) => {
    const pieces: string[] = [];
    for (const part of node.children) {
      if (part.tag === NodeTags.NUMBER_LITERAL) {
        pieces.push(literalToken(part));
      } else if (part.tag === NodeTags.QUALIFIED_NAME) {
        pieces.push(qualifiedName(part));
      }
    }
    return pieces.join(PIECE_SEPARATOR);
  },
};

/**
 * Serialize a default-value node. Shapes without a rule (identifiers,
 * string literals, ...) emit their own token unchanged.
 */
export function serializeDefaultValue(node: SyntaxNode): string {
  const serialize = Object.hasOwn(serializers, node.tag) ? serializers[node.tag] : undefined;
  return serialize ? serialize(node) : node.token;
}
