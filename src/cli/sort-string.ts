#!/usr/bin/env node
/**
 * sort-string
 *
 * Example program built on the parser:
 *   sort-string <string> [-i|--invert] [-r|--repeat N] [-f|--filter C]...
 * Removes every filter character, sorts the rest and prints the result
 * `repeat` times on one line.
 */

import { ArgumentParser } from '../parser/argument-parser';
import type { ParsedArguments } from '../parser/parsed-arguments';
import { Arity } from '../registry/definitions';
import { ValueTypes } from '../coercion/value-types';
import { andThen, map } from '../types/result';
import type { Result } from '../types/result';
import type { ArgumentError } from '../types/argument-errors';
import { ExitCode } from '../types/exit-codes';
import type { Logger } from '../types/logger';
import type { OutputStream } from '../config/parser-config';

export interface SortStringOptions {
  invert: boolean;
  /** Characters removed before sorting */
  filter: string[];
}

export interface SortStringIo {
  stdout: OutputStream;
  stderr: OutputStream;
  logger?: Logger;
}

export function sortString(input: string, options: SortStringOptions): string {
  const removed = new Set(options.filter);
  const characters = [...input].filter((character) => !removed.has(character)).sort();
  if (options.invert) {
    characters.reverse();
  }
  return characters.join('');
}

function createParser(io: SortStringIo): ArgumentParser {
  const parser = new ArgumentParser({
    programName: 'sort-string',
    description: 'Sorts the characters of a string.',
    exitOnHelp: false,
    output: io.stdout,
    logger: io.logger,
  });
  parser.addPositional('string').help('the string to sort');
  parser.addOptional('--invert', Arity.FLAG, '-i').help('sort in descending order');
  parser.addOptional('--repeat', Arity.SINGLE, '-r').help('times to print the result').defaultValue(1);
  parser.addOptional('--filter', Arity.APPEND, '-f').help('character to remove before sorting');
  return parser;
}

function readInput(args: ParsedArguments): Result<{ input: string; repeat: number; options: SortStringOptions }, ArgumentError> {
  return andThen(args.get('string', ValueTypes.string), (input) =>
    andThen(args.get('invert', ValueTypes.bool), (invert) =>
      andThen(args.get('repeat', ValueTypes.u32), (repeat) =>
        map(args.getAll('filter', ValueTypes.char), (filter) => ({
          input,
          repeat,
          options: { invert, filter },
        }))
      )
    )
  );
}

/**
 * Run the program
 * @param argv token 0 is the program name
 * @returns the process exit code
 */
export function run(
  argv: readonly string[],
  io: SortStringIo = { stdout: process.stdout, stderr: process.stderr }
): ExitCode {
  const parsed = createParser(io).parse(argv);
  if (!parsed.ok) {
    io.stderr.write(`${parsed.error.message}\n`);
    return ExitCode.USAGE_ERROR;
  }
  if (parsed.value.helpRequested) {
    return ExitCode.SUCCESS;
  }

  const read = readInput(parsed.value);
  if (!read.ok) {
    io.stderr.write(`${read.error.message}\n`);
    return ExitCode.USAGE_ERROR;
  }

  const { input, repeat, options } = read.value;
  const sorted = sortString(input, options);
  // One write per repeat; the whole line can exceed the maximum string length
  for (let count = 0; count < repeat; count++) {
    io.stdout.write(sorted);
  }
  if (repeat > 0) {
    io.stdout.write('\n');
  }
  return ExitCode.SUCCESS;
}

if (typeof module !== 'undefined' && require.main === module) {
  try {
    process.exitCode = run(process.argv.slice(1));
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  }
}
