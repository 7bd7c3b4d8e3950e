/**
 * Tests for value retrieval from ParsedArguments
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError } from '../types/argument-errors';
import { ValueTypes } from '../coercion/value-types';
import { Arity } from '../registry/definitions';
import type { ArgumentParser } from './argument-parser';
import type { BufferLogger } from '../logging/buffer-logger';
import { createTestParser } from '../../tests/utils/test-parser';
import { expectOk, expectErr } from '../../tests/utils/assertions';

describe('ParsedArguments', () => {
  let parser: ArgumentParser;
  let logger: BufferLogger;

  beforeEach(() => {
    ({ parser, logger } = createTestParser());
    parser.addPositional('points');
    parser.addOptional('--filter', Arity.APPEND, '-f');
    parser.addOptional('--invert', Arity.FLAG, '-i');
    parser.addOptional('--repeat', Arity.SINGLE, '-r');
  });

  describe('reading one parse as several types', () => {
    it('should read the same raw value through different types', () => {
      const parsed = expectOk(parser.parse(['test-program', '77']));
      expect(expectOk(parsed.get('points', ValueTypes.u32))).toBe(77);
      expect(expectOk(parsed.get('points', ValueTypes.string))).toBe('77');
      expect(expectOk(parsed.get('points', ValueTypes.i64))).toBe(77n);
      expect(expectErr(parsed.get('points', ValueTypes.bool)).message).toBe(
        "test-program: 'points' must be either 'true' or 'false'"
      );
    });

    it('should reject a negative value for an unsigned type', () => {
      const parsed = expectOk(parser.parse(['test-program', '-5']));
      expect(expectOk(parsed.get('points', ValueTypes.i32))).toBe(-5);
      const error = expectErr(parsed.get('points', ValueTypes.u32));
      expect(error.message).toBe("test-program: 'points' must be in range [0,4294967295]");
      expect(error.code).toBe('OUT_OF_RANGE');
    });
  });

  describe('presence', () => {
    it('should count occurrences of an optional', () => {
      const parsed = expectOk(parser.parse(['test-program', '1', '-f', 'a', '--filter', 'b']));
      expect(parsed.has('filter')).toBe(true);
      expect(parsed.count('filter')).toBe(2);
      expect(parsed.has('invert')).toBe(false);
      expect(parsed.count('repeat')).toBe(0);
    });

    it('should refuse presence checks on a positional', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      expect(() => parsed.has('points')).toThrow(ConfigurationError);
      expect(() => parsed.count('points')).toThrow(
        "ArgumentParser: no optional argument by the name 'points'"
      );
    });

    it('should refuse an undeclared name', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      expect(() => parsed.get('nope', ValueTypes.string)).toThrow(
        "ArgumentParser: no argument by the name 'nope'"
      );
    });

    it('should return raw values without defaults', () => {
      parser = createTestParser().parser;
      parser.addOptional('--level').defaultValue(3);
      parser.addPositional('path');
      const parsed = expectOk(parser.parse(['test-program', 'dir']));
      expect(parsed.values('level')).toEqual([]);
      expect(parsed.values('path')).toEqual(['dir']);
    });
  });

  describe('absent optionals', () => {
    it('should fail when there is no value and no default', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      const error = expectErr(parsed.get('repeat', ValueTypes.i32));
      expect(error.message).toBe("test-program: no value given for 'repeat' and no default specified");
      expect(error.code).toBe('NO_VALUE');
    });

    it('should return the caller default as is', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      expect(expectOk(parsed.get('repeat', ValueTypes.i32, 3))).toBe(3);
    });

    it('should read an absent flag as false', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      expect(expectOk(parsed.get('invert', ValueTypes.bool))).toBe(false);
    });

    it('should read a present flag as true', () => {
      const parsed = expectOk(parser.parse(['test-program', '1', '-i']));
      expect(expectOk(parsed.get('invert', ValueTypes.bool))).toBe(true);
    });

    it('should yield an empty list for an absent append option', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      expect(expectOk(parsed.getAll('filter', ValueTypes.string))).toEqual([]);
    });
  });

  describe('declared defaults', () => {
    beforeEach(() => {
      ({ parser } = createTestParser());
      parser.addPositional('count').defaultValue(10);
      parser.addOptional('--repeat', Arity.SINGLE, '-r').defaultValue(5);
    });

    it('should coerce the declared default of an absent optional', () => {
      const parsed = expectOk(parser.parse(['test-program']));
      expect(expectOk(parsed.get('repeat', ValueTypes.u8))).toBe(5);
    });

    it('should prefer the caller default over the declared one', () => {
      const parsed = expectOk(parser.parse(['test-program']));
      expect(expectOk(parsed.get('repeat', ValueTypes.u8, 7))).toBe(7);
    });

    it('should prefer a given value over both defaults', () => {
      const parsed = expectOk(parser.parse(['test-program', '-r', '9']));
      expect(expectOk(parsed.get('repeat', ValueTypes.u8, 7))).toBe(9);
    });

    it('should use the declared default of an unbound positional', () => {
      const parsed = expectOk(parser.parse(['test-program']));
      expect(expectOk(parsed.get('count', ValueTypes.u8))).toBe(10);
    });

    it('should keep reading the default declared before parsing', () => {
      ({ parser } = createTestParser());
      const level = parser.addOptional('--level').defaultValue(5);
      const parsed = expectOk(parser.parse(['test-program']));
      expect(() => level.defaultValue(9)).toThrow(ConfigurationError);
      expect(expectOk(parsed.get('level', ValueTypes.u8))).toBe(5);
    });

    it('should coerce a declared default that does not fit the type', () => {
      const parsed = expectOk(parser.parse(['test-program']));
      expect(expectErr(parsed.get('count', ValueTypes.bool)).reason).toBe(
        "'count' must be either 'true' or 'false'"
      );
    });
  });

  describe('indexed access', () => {
    it('should read each occurrence by index', () => {
      const parsed = expectOk(parser.parse(['test-program', '1', '-f', 'a', '-f', 'b']));
      expect(expectOk(parsed.getAt('filter', 0, ValueTypes.string))).toBe('a');
      expect(expectOk(parsed.getAt('filter', 1, ValueTypes.string))).toBe('b');
    });

    it('should fail past the last occurrence', () => {
      const parsed = expectOk(parser.parse(['test-program', '1', '-f', 'a', '-f', 'b']));
      const error = expectErr(parsed.getAt('filter', 2, ValueTypes.string));
      expect(error.message).toBe("test-program: index 2 is out of range for 'filter'");
      expect(error.code).toBe('INDEX_OUT_OF_RANGE');
    });

    it('should fail for a positional index other than zero', () => {
      const parsed = expectOk(parser.parse(['test-program', '1']));
      expect(expectErr(parsed.getAt('points', 1, ValueTypes.string)).reason).toBe(
        "index 1 is out of range for 'points'"
      );
    });

    it('should read every occurrence in order', () => {
      const parsed = expectOk(parser.parse(['test-program', '1', '-f', '3', '-f', '4']));
      expect(expectOk(parsed.getAll('filter', ValueTypes.i32))).toEqual([3, 4]);
      expect(expectOk(parsed.getAll('points', ValueTypes.i32))).toEqual([1]);
    });

    it('should stop at the first value that fails to coerce', () => {
      const parsed = expectOk(parser.parse(['test-program', '1', '-f', '3', '-f', 'x']));
      expect(expectErr(parsed.getAll('filter', ValueTypes.i32)).message).toBe(
        "test-program: 'filter' must be of integral type"
      );
    });
  });

  describe('logging', () => {
    it('should record coercion outcomes', () => {
      const parsed = expectOk(parser.parse(['test-program', 'abc']));
      logger.clear();
      expectOk(parsed.get('points', ValueTypes.string));
      expectErr(parsed.get('points', ValueTypes.u8));

      const [coerced] = logger.getEventsByType('value_coerced');
      expect(coerced.message).toBe("Read 'points' as string");
      expect(coerced.metadata.program).toBe('test-program');

      const [failed] = logger.getEventsByType('coercion_failed');
      expect(failed.message).toBe("test-program: 'points' must be of integral type");
      expect(failed.metadata.tag).toBe('u8');
    });
  });
});
