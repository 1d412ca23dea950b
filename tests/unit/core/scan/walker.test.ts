import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { compareWalkOrder, discoverFiles } from '../../../../src/core/scan/walker.js';

describe('compareWalkOrder', () => {
  it('visits a directory before a sibling whose name extends it', () => {
    const files = ['a-b/X.java', 'a/Y.java', 'a/b/Z.java', 'B.java'];
    expect([...files].sort(compareWalkOrder)).toEqual(['B.java', 'a/Y.java', 'a/b/Z.java', 'a-b/X.java']);
  });

  it('orders equal prefixes by depth', () => {
    expect(compareWalkOrder('a', 'a/b')).toBeLessThan(0);
    expect(compareWalkOrder('a/b', 'a/b')).toBe(0);
  });
});

describe('discoverFiles', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `setting-extractor-walk-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    for (const dir of ['org/example', 'org/example-util', 'build/generated', 'docs']) {
      await mkdir(join(testDir, dir), { recursive: true });
    }
    for (const file of [
      'org/example/Settings.java',
      'org/example/Node.java',
      'org/example-util/Util.java',
      'org/Root.java',
      'build/generated/Gen.java',
      'docs/readme.md',
      'org/example/Settings.java.bak',
    ]) {
      await writeFile(join(testDir, file), '');
    }
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('returns matching files in depth-first walk order', async () => {
    const files = await discoverFiles(testDir, { extension: '.java', exclude: ['**/build/**'] });

    expect(files).toEqual([
      join(testDir, 'org/Root.java'),
      join(testDir, 'org/example/Node.java'),
      join(testDir, 'org/example/Settings.java'),
      join(testDir, 'org/example-util/Util.java'),
    ]);
  });

  it('includes excluded-by-default directories when no exclusions are given', async () => {
    const files = await discoverFiles(testDir, { extension: '.java', exclude: [] });
    expect(files).toContain(join(testDir, 'build/generated/Gen.java'));
  });

  it('selects files by the configured extension', async () => {
    const files = await discoverFiles(testDir, { extension: '.md' });
    expect(files).toEqual([join(testDir, 'docs/readme.md')]);
  });
});
