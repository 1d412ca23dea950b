import { normalizeTree, type SyntaxNode } from '../tree/index.js';
import {
  ErrorCodes,
  TreeAcquisitionError,
  errorMessage,
  readFile,
} from '../../utils/index.js';
import type { TreeSource } from './types.js';

/**
 * Reads trees that were parsed ahead of time and stored as JSON,
 * in either shape accepted by `normalizeTree`.
 */
export class JsonTreeSource implements TreeSource {
  readonly name = 'json-file';

  async parse(filePath: string): Promise<SyntaxNode> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath));
    } catch (error) {
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_FAILED,
        `Cannot read tree from ${filePath}: ${errorMessage(error)}`,
        { filePath }
      );
    }

    try {
      return normalizeTree(raw, filePath);
    } catch (error) {
      throw new TreeAcquisitionError(ErrorCodes.PARSE_FAILED, errorMessage(error), { filePath });
    }
  }
}
