import type { SyntaxNode } from '../tree/types.js';

/**
 * Produces one syntax tree per source file.
 * Implementations reject with a TreeAcquisitionError when no tree can be produced.
 */
export interface TreeSource {
  readonly name: string;
  parse(filePath: string): Promise<SyntaxNode>;
}
