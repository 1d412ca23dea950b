/**
 * Tests for the scan driver.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import { runScan } from '../../../../src/core/scan/driver.js';
import type { TreeSource } from '../../../../src/core/parser/types.js';
import type { SyntaxNode } from '../../../../src/core/tree/types.js';
import { ErrorCodes, TreeAcquisitionError } from '../../../../src/utils/errors.js';
import {
  compilationUnit,
  fieldDeclaration,
  methodInvocation,
  numberLiteral,
  parameterizedType,
  qualifiedName,
  simpleType,
  stringLiteral,
} from '../../../helpers/java-trees.js';

vi.mock('../../../../src/utils/logger.js', () => {
  const log = { warn: vi.fn(), debug: vi.fn(), info: vi.fn(), error: vi.fn() };
  return { logger: { ...log, child: () => log } };
});

const ROOT = resolve('/repo');

function settingsTree(rawName: string, name: string, line: number): SyntaxNode {
  return compilationUnit('Settings', [
    fieldDeclaration(
      parameterizedType('Setting', [simpleType('Integer')]),
      rawName,
      methodInvocation('Setting', 'intSetting', [
        stringLiteral(name),
        numberLiteral('5'),
        qualifiedName('Property.Dynamic'),
      ]),
      line
    ),
  ]);
}

function brokenTree(line: number): SyntaxNode {
  return compilationUnit('Broken', [
    fieldDeclaration(
      parameterizedType('Setting', [simpleType('String')]),
      'BROKEN',
      methodInvocation('Setting', 'simpleString', [stringLiteral('broken')]),
      line
    ),
  ]);
}

/** In-memory source keyed by absolute path. */
class FakeSource implements TreeSource {
  readonly name = 'fake';
  readonly calls: string[] = [];

  constructor(private readonly trees: Record<string, SyntaxNode | Error>) {}

  async parse(filePath: string): Promise<SyntaxNode> {
    this.calls.push(filePath);
    const entry = this.trees[filePath];
    if (entry === undefined) {
      throw new Error(`no tree for ${filePath}`);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  }
}

describe('runScan', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('merges records from every file in the given order', async () => {
    const a = join(ROOT, 'a', 'A.java');
    const b = join(ROOT, 'b', 'B.java');
    const source = new FakeSource({
      [a]: settingsTree('FIRST', 'first.setting', 3),
      [b]: settingsTree('SECOND', 'second.setting', 7),
    });

    const result = await runScan({ root: ROOT, source, files: [a, b] });

    expect(source.calls).toEqual([a, b]);
    expect(result.filesScanned).toBe(2);
    expect(result.failures).toEqual([]);
    expect(result.records.map((r) => [r.rawName, r.sourceFile, r.sourceLine])).toEqual([
      ['FIRST', 'a/A.java', 3],
      ['SECOND', 'b/B.java', 7],
    ]);
    expect(result.records[0]).toEqual({
      name: 'first.setting',
      rawName: 'FIRST',
      type: 'Integer',
      properties: ['Dynamic'],
      defaultValue: '5',
      sourceLine: 3,
      sourceFile: 'a/A.java',
    });
  });

  it('collects diagnostics alongside records', async () => {
    const file = join(ROOT, 'Broken.java');
    const source = new FakeSource({ [file]: brokenTree(9) });

    const result = await runScan({ root: ROOT, source, files: [file] });

    expect(result.records).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        code: 'INSUFFICIENT_ARGUMENTS',
        message: 'Problem with BROKEN: expected at least 3 arguments, found 1',
        sourceFile: 'Broken.java',
        sourceLine: 9,
        rawName: 'BROKEN',
        argumentCount: 1,
      },
    ]);
  });

  it('records a failed file and continues by default', async () => {
    const bad = join(ROOT, 'Bad.java');
    const good = join(ROOT, 'Good.java');
    const source = new FakeSource({
      [bad]: new TreeAcquisitionError(ErrorCodes.PARSE_REJECTED, 'Parser could not process Bad.java (error): boom'),
      [good]: settingsTree('GOOD', 'good', 1),
    });

    const result = await runScan({ root: ROOT, source, files: [bad, good] });

    expect(result.failures).toEqual([
      {
        file: 'Bad.java',
        code: 'P003',
        message: 'Parser could not process Bad.java (error): boom',
      },
    ]);
    expect(result.records.map((r) => r.rawName)).toEqual(['GOOD']);
    expect(result.filesScanned).toBe(2);
  });

  it('marks errors from outside the project as UNKNOWN', async () => {
    const file = join(ROOT, 'Missing.java');
    const source = new FakeSource({});

    const result = await runScan({ root: ROOT, source, files: [file] });

    expect(result.failures).toEqual([
      { file: 'Missing.java', code: 'UNKNOWN', message: `no tree for ${file}` },
    ]);
  });

  it('rethrows the first failure when the policy is abort', async () => {
    const bad = join(ROOT, 'Bad.java');
    const good = join(ROOT, 'Good.java');
    const source = new FakeSource({
      [bad]: new TreeAcquisitionError(ErrorCodes.SERVICE_UNAVAILABLE, 'down'),
      [good]: settingsTree('GOOD', 'good', 1),
    });

    await expect(
      runScan({ root: ROOT, source, files: [bad, good], onParseError: 'abort' })
    ).rejects.toThrow('down');
    expect(source.calls).toEqual([bad]);
  });

  it('passes match options to extraction', async () => {
    const file = join(ROOT, 'Custom.java');
    const tree = compilationUnit('Custom', [
      fieldDeclaration(
        parameterizedType('Option', [simpleType('Boolean')]),
        'FLAG',
        methodInvocation('Option', 'boolOption', [
          stringLiteral('flag'),
          numberLiteral('1'),
          qualifiedName('Flag.Final'),
        ])
      ),
    ]);
    const source = new FakeSource({ [file]: tree });

    const result = await runScan({
      root: ROOT,
      source,
      files: [file],
      match: { settingTypeName: 'Option', propertyAnchorName: 'Flag' },
    });

    expect(result.records.map((r) => [r.rawName, r.type, r.properties])).toEqual([
      ['FLAG', 'Boolean', ['Final']],
    ]);
  });

  describe('with discovery', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `setting-extractor-driver-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(join(testDir, 'src', 'main'), { recursive: true });
      await writeFile(join(testDir, 'src', 'main', 'Z.java'), '');
      await writeFile(join(testDir, 'src', 'A.java'), '');
      await writeFile(join(testDir, 'README.md'), '');
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('walks the root when no files are given', async () => {
      const source = new FakeSource({
        [join(testDir, 'src', 'A.java')]: settingsTree('A', 'a', 1),
        [join(testDir, 'src', 'main', 'Z.java')]: settingsTree('Z', 'z', 2),
      });

      const result = await runScan({ root: testDir, source });

      expect(result.filesScanned).toBe(2);
      expect(result.records.map((r) => r.sourceFile)).toEqual(['src/A.java', 'src/main/Z.java']);
    });
  });
});
