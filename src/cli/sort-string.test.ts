/**
 * Tests for the sort-string example program
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { run, sortString } from './sort-string';
import type { SortStringIo } from './sort-string';
import { ExitCode } from '../types/exit-codes';
import { BufferLogger } from '../logging/buffer-logger';

describe('sortString', () => {
  const defaults = { invert: false, filter: [] };

  it('should sort characters in ascending order', () => {
    expect(sortString('banana', defaults)).toBe('aaabnn');
  });

  it('should sort in descending order when inverted', () => {
    expect(sortString('banana', { ...defaults, invert: true })).toBe('nnbaaa');
  });

  it('should drop filtered characters', () => {
    expect(sortString('banana', { ...defaults, filter: ['a', 'n'] })).toBe('b');
  });
});

describe('run', () => {
  let stdout: string[];
  let stderr: string[];
  let io: SortStringIo;

  beforeEach(() => {
    stdout = [];
    stderr = [];
    io = {
      stdout: { write: (text: string) => stdout.push(text) },
      stderr: { write: (text: string) => stderr.push(text) },
      logger: new BufferLogger(),
    };
  });

  it('should print the sorted string', () => {
    expect(run(['sort-string', 'banana', '-i', '-r', '2', '-f', 'n'], io)).toBe(ExitCode.SUCCESS);
    expect(stdout.join('')).toBe('baaabaaa\n');
    expect(stderr).toEqual([]);
  });

  it('should accept inline values', () => {
    expect(run(['sort-string', '--repeat=3', 'cab'], io)).toBe(ExitCode.SUCCESS);
    expect(stdout.join('')).toBe('abcabcabc\n');
  });

  it('should write the result once per repeat', () => {
    expect(run(['sort-string', 'cab', '-r', '3'], io)).toBe(ExitCode.SUCCESS);
    expect(stdout).toEqual(['abc', 'abc', 'abc', '\n']);
  });

  it('should print nothing for zero repeats', () => {
    expect(run(['sort-string', 'cab', '-r', '0'], io)).toBe(ExitCode.SUCCESS);
    expect(stdout).toEqual([]);
  });

  it('should handle a large repeat count without building the whole line', () => {
    let writes = 0;
    io.stdout = { write: () => writes++ };
    expect(run(['sort-string', 'ab', '-r', '200000'], io)).toBe(ExitCode.SUCCESS);
    expect(writes).toBe(200001);
  });

  it('should report a missing string', () => {
    expect(run(['sort-string'], io)).toBe(ExitCode.USAGE_ERROR);
    expect(stderr.join('')).toBe("sort-string: requires positional argument 'string'\n");
    expect(stdout).toEqual([]);
  });

  it('should report a filter longer than one character', () => {
    expect(run(['sort-string', 'abc', '-f', 'xy'], io)).toBe(ExitCode.USAGE_ERROR);
    expect(stderr.join('')).toBe("sort-string: 'filter' must be a single character\n");
  });

  it('should report a negative repeat count', () => {
    expect(run(['sort-string', 'abc', '-r', '-1'], io)).toBe(ExitCode.USAGE_ERROR);
    expect(stderr.join('')).toBe("sort-string: 'repeat' must be in range [0,4294967295]\n");
  });

  it('should print help and succeed', () => {
    expect(run(['sort-string', '--help'], io)).toBe(ExitCode.SUCCESS);
    const lines = stdout.join('').split('\n');
    expect(lines.slice(0, 3)).toEqual([
      'Usage: sort-string [options] <string>',
      '',
      'Sorts the characters of a string.',
    ]);
    expect(lines).toContain('  -r, --repeat REPEAT' + ' '.repeat(9) + 'times to print the result (default: 1)');
  });
});
