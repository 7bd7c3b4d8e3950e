/**
 * Typed Value Coercion
 *
 * Parsed values are stored as strings and converted on retrieval, so the
 * same parse can be read back as different types. Each supported type is a
 * ValueType descriptor with one coerce function.
 */

import { createArgumentError } from '../types/argument-errors';
import type { ArgumentError } from '../types/argument-errors';
import { ok, err, map } from '../types/result';
import type { Result } from '../types/result';
import type { BooleanLiterals } from '../config/parser-config';

/**
 * What a coercion needs to know to report a failure
 */
export interface CoercionContext {
  programName: string;
  /** Argument name used in error text */
  argument: string;
  booleanLiterals: BooleanLiterals;
}

export type ValueTag =
  | 'bool'
  | 'char'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'f32'
  | 'f64'
  | 'string';

/**
 * Converts a raw argument string into a T
 */
export interface ValueType<T> {
  readonly tag: ValueTag;
  coerce(raw: string, context: CoercionContext): Result<T, ArgumentError>;
}

const TRUE_LITERALS: Record<BooleanLiterals, readonly string[]> = {
  strict: ['true'],
  extended: ['true', 'yes', 'on'],
};

const FALSE_LITERALS: Record<BooleanLiterals, readonly string[]> = {
  strict: ['false'],
  extended: ['false', 'no', 'off'],
};

// Optional sign and decimal digits; anything after the digits is ignored
const INTEGER_PREFIX = /^\s*([+-]?\d+)/;

function invalidValue(context: CoercionContext, requirement: string): ArgumentError {
  return createArgumentError(
    'INVALID_VALUE',
    context.programName,
    `'${context.argument}' ${requirement}`,
    context.argument
  );
}

function outOfRange(context: CoercionContext, min: string, max: string): ArgumentError {
  return createArgumentError(
    'OUT_OF_RANGE',
    context.programName,
    `'${context.argument}' must be in range [${min},${max}]`,
    context.argument
  );
}

const booleanType: ValueType<boolean> = {
  tag: 'bool',
  coerce(raw, context) {
    if (TRUE_LITERALS[context.booleanLiterals].includes(raw)) {
      return ok(true);
    }
    if (FALSE_LITERALS[context.booleanLiterals].includes(raw)) {
      return ok(false);
    }
    if (context.booleanLiterals === 'strict') {
      return err(invalidValue(context, "must be either 'true' or 'false'"));
    }
    return err(invalidValue(context, "must be one of 'true', 'false', 'yes', 'no', 'on', 'off'"));
  },
};

const charType: ValueType<string> = {
  tag: 'char',
  coerce(raw, context) {
    if ([...raw].length !== 1) {
      return err(invalidValue(context, 'must be a single character'));
    }
    return ok(raw);
  },
};

const stringType: ValueType<string> = {
  tag: 'string',
  coerce(raw) {
    return ok(raw);
  },
};

/**
 * Integer type read as a bigint and range-checked against [min, max].
 * A leading '-' is rejected for unsigned targets before conversion.
 */
function bigIntegerType(tag: ValueTag, min: bigint, max: bigint): ValueType<bigint> {
  const unsigned = min === 0n;
  return {
    tag,
    coerce(raw, context) {
      const match = INTEGER_PREFIX.exec(raw);
      if (!match) {
        return err(invalidValue(context, 'must be of integral type'));
      }
      const digits = match[1];
      if (unsigned && digits.startsWith('-')) {
        return err(outOfRange(context, String(min), String(max)));
      }
      const value = BigInt(digits);
      if (value < min || value > max) {
        return err(outOfRange(context, String(min), String(max)));
      }
      return ok(value);
    },
  };
}

/**
 * Integer type narrow enough to be returned as a number
 */
function integerType(tag: ValueTag, min: number, max: number): ValueType<number> {
  const wide = bigIntegerType(tag, BigInt(min), BigInt(max));
  return {
    tag,
    coerce(raw, context) {
      return map(wide.coerce(raw, context), Number);
    },
  };
}

// parseFloat only knows `Infinity`; `inf` and `nan` are accepted in any case
const NON_FINITE_PREFIX = /^\s*([+-]?)(inf(?:inity)?|nan)/i;

/**
 * Read the leading floating-point number of `raw`
 * `parsed` is false when `raw` does not start with a number
 */
function readFloat(raw: string): { value: number; parsed: boolean } {
  const special = NON_FINITE_PREFIX.exec(raw);
  if (special) {
    const sign = special[1] === '-' ? -1 : 1;
    return { value: special[2].toLowerCase() === 'nan' ? NaN : sign * Infinity, parsed: true };
  }
  const value = parseFloat(raw);
  return { value, parsed: !Number.isNaN(value) };
}

/**
 * Floating-point type; parses as a double, then checks the magnitude against the width
 */
function floatType(tag: ValueTag, max: number, narrow: (value: number) => number): ValueType<number> {
  return {
    tag,
    coerce(raw, context) {
      const { value, parsed } = readFloat(raw);
      if (!parsed) {
        return err(invalidValue(context, 'must be a floating-point number'));
      }
      if (Math.abs(value) > max) {
        return err(outOfRange(context, String(-max), String(max)));
      }
      return ok(narrow(value));
    },
  };
}

const FLOAT32_MAX = 3.4028234663852886e38;

/**
 * Built-in value types, keyed by tag
 */
export const ValueTypes = {
  bool: booleanType,
  char: charType,
  i8: integerType('i8', -128, 127),
  i16: integerType('i16', -32768, 32767),
  i32: integerType('i32', -2147483648, 2147483647),
  i64: bigIntegerType('i64', -(2n ** 63n), 2n ** 63n - 1n),
  u8: integerType('u8', 0, 255),
  u16: integerType('u16', 0, 65535),
  u32: integerType('u32', 0, 4294967295),
  u64: bigIntegerType('u64', 0n, 2n ** 64n - 1n),
  f32: floatType('f32', FLOAT32_MAX, Math.fround),
  f64: floatType('f64', Number.MAX_VALUE, (value) => value),
  string: stringType,
} satisfies Record<ValueTag, ValueType<unknown>>;
