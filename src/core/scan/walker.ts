import * as path from 'node:path';
import { globFiles } from '../../utils/file-system.js';

export interface DiscoverOptions {
  /** Extension including the dot, e.g. `.java` */
  extension: string;
  exclude?: string[];
}

/**
 * Order in which a depth-first walk that visits directory entries by name
 * would reach these paths: compare segment by segment.
 */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Files under `root` with the given extension, as absolute paths in
 * depth-first walk order.
 */
export async function discoverFiles(root: string, options: DiscoverOptions): Promise<string[]> {
  const absoluteRoot = path.resolve(root);
  const relative = await globFiles(`**/*${options.extension}`, {
    cwd: absoluteRoot,
    ignore: options.exclude,
    absolute: false,
  });

  return relative
    .filter((file) => path.extname(file) === options.extension)
    .sort(compareWalkOrder)
    .map((file) => path.join(absoluteRoot, file));
}
