/**
 * Property flag resolution.
 *
 * A flag constant shows up either fully qualified (`Setting.Property.Dynamic`)
 * or through an import of the anchor (`Property.Dynamic`). Both resolve to the
 * bare flag name (`Dynamic`).
 */
import { select, type SyntaxNode } from '../tree/index.js';
import { DEFAULT_PROPERTY_ANCHOR_NAME } from './types.js';
import { propertyQueries } from './queries.js';

/**
 * Flags referenced inside a single argument subtree.
 * The short form is only tried when the long form finds nothing, since it
 * would otherwise also match the `Setting.Property` qualifier itself.
 */
export function resolveArgumentProperties(
  argument: SyntaxNode,
  anchor: string = DEFAULT_PROPERTY_ANCHOR_NAME
): string[] {
  for (const query of propertyQueries(anchor)) {
    const matches = select(argument, query);
    if (matches.length > 0) {
      return matches.map((node) => node.token);
    }
  }
  return [];
}

/**
 * Flags referenced across all arguments, in encounter order, duplicates kept.
 */
export function resolveProperties(
  argumentNodes: readonly SyntaxNode[],
  anchor: string = DEFAULT_PROPERTY_ANCHOR_NAME
): string[] {
  return argumentNodes.flatMap((argument) => resolveArgumentProperties(argument, anchor));
}
