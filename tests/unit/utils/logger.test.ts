/**
 * Tests for the CLI logger.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Logger } from '../../../src/utils/logger.js';

vi.mock('chalk', () => {
  const plain = (s: string) => s;
  return { default: { gray: plain, blue: plain, yellow: plain, red: plain, green: plain } };
});

describe('Logger', () => {
  let stderrSpy: MockInstance<typeof console.error>;
  let stdoutSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    stderrSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    stdoutSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    stdoutSpy.mockRestore();
  });

  const lines = () => stderrSpy.mock.calls.map((c) => String(c[0]));

  it('writes every level to stderr and nothing to stdout', () => {
    const log = new Logger();
    log.setLevel('debug');

    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    log.success('done');

    expect(lines()).toEqual(['[DEBUG] d', '[INFO] i', '[WARN] w', '[ERROR] e', '✓ done']);
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('prints attached data on a second line', () => {
    const log = new Logger();

    log.warn('Skipped', { file: 'A.java' });
    log.error('Failed', new Error('boom'));

    expect(lines()[1]).toBe('{\n  "file": "A.java"\n}');
    expect(lines()[3]).toContain('Error: boom');
  });

  describe('child', () => {
    it('prefixes lines with nested scopes', () => {
      const scan = new Logger().child('scan');

      scan.info('Scanning 2 file(s)');
      scan.child('parser').warn('retrying');

      expect(lines()).toEqual(['[INFO] [scan] Scanning 2 file(s)', '[WARN] [scan:parser] retrying']);
    });

    it('follows a level set on the root after the child was created', () => {
      const root = new Logger();
      const child = root.child('extract');

      child.debug('hidden');
      root.setLevel('debug');
      child.debug('visible');
      root.setLevel('error');
      child.warn('hidden too');

      expect(lines()).toEqual(['[DEBUG] [extract] visible']);
    });

    it('changes the shared level when set through a child', () => {
      const root = new Logger();

      root.child('scan').setLevel('silent');
      root.error('quiet');

      expect(root.getLevel()).toBe('silent');
      expect(stderrSpy).not.toHaveBeenCalled();
    });
  });
});
