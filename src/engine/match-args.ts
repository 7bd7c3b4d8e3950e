/**
 * Matching Engine
 *
 * Two phases over the raw token list:
 * 1. classification: each token after the program name is an option
 *    reference (resolved through the registry, consuming its value when the
 *    arity needs one) or a positional candidate
 * 2. binding: positional candidates fill the declared positionals in order,
 *    the rest are handed back as leftovers
 *
 * Nothing is written to the registry and argv is never modified; a failed
 * match leaves no trace.
 */

import { createArgumentError } from '../types/argument-errors';
import type { ArgumentError } from '../types/argument-errors';
import { ok, err } from '../types/result';
import type { Result } from '../types/result';
import { Arity } from '../registry/definitions';
import type { OptionalDefinition } from '../registry/definitions';
import type { DefinitionRegistry } from '../registry/definition-registry';
import {
  looksLikeOption,
  parseFlagName,
  parseInlineOption,
  parseLongOptionName,
} from '../registry/names';

/** Reference name of the built-in help option */
export const HELP_OPTION = 'help';

/** Raw value stored for a FLAG occurrence */
export const FLAG_PRESENT = 'true';

export interface MatchOptions {
  /** Name used to prefix error messages */
  programName: string;
  /** Whether a resolved `help` reference short-circuits into the help outcome */
  helpEnabled: boolean;
}

export interface MatchedArguments {
  kind: 'matched';
  /** Bound positional values; positionals left to their default are absent */
  positionals: Map<string, string>;
  /** Values per optional reference name, in order of appearance */
  optionals: Map<string, string[]>;
  /** argv[0] followed by every unbound positional candidate, in input order */
  leftovers: string[];
}

export interface HelpRequested {
  kind: 'help';
}

export type MatchOutcome = MatchedArguments | HelpRequested;

interface OptionReference {
  definition: OptionalDefinition;
  /** Value given as `--name=value`, or null */
  inlineValue: string | null;
}

function invalidOption(token: string, programName: string): ArgumentError {
  return createArgumentError(
    'INVALID_OPTION',
    programName,
    `invalid option '${token}', pass --help to display possible options`,
    token
  );
}

/**
 * Resolve a token to the optional it references
 * @returns null when the token is a positional candidate
 */
function resolveOptionReference(
  registry: DefinitionRegistry,
  token: string,
  programName: string
): Result<OptionReference | null, ArgumentError> {
  const flag = parseFlagName(token);
  if (flag !== null) {
    const definition = registry.findByFlag(flag);
    return definition ? ok({ definition, inlineValue: null }) : err(invalidOption(token, programName));
  }

  const inline = parseInlineOption(token);
  if (inline !== null) {
    const definition = registry.findOptional(inline.name);
    return definition
      ? ok({ definition, inlineValue: inline.value })
      : err(invalidOption(token, programName));
  }

  const name = parseLongOptionName(token);
  if (name !== null) {
    const definition = registry.findOptional(name);
    return definition ? ok({ definition, inlineValue: null }) : err(invalidOption(token, programName));
  }

  return ok(null);
}

/**
 * Match argv against the registry
 * @param argv token 0 is the program name
 */
export function matchArgs(
  registry: DefinitionRegistry,
  argv: readonly string[],
  options: MatchOptions
): Result<MatchOutcome, ArgumentError> {
  const { programName } = options;
  const candidates: string[] = [];
  const optionals = new Map<string, string[]>();

  const repeated = (name: string): ArgumentError =>
    createArgumentError('REPEATED_OPTION', programName, `'${name}' specified more than once`, name);
  const missingValue = (name: string): ArgumentError =>
    createArgumentError('MISSING_VALUE', programName, `'${name}' requires a value`, name);

  for (let index = 1; index < argv.length; index++) {
    const token = argv[index];
    const resolved = resolveOptionReference(registry, token, programName);
    if (!resolved.ok) {
      return resolved;
    }
    if (resolved.value === null) {
      candidates.push(token);
      continue;
    }

    const { definition, inlineValue } = resolved.value;
    const { name } = definition;
    if (options.helpEnabled && name === HELP_OPTION) {
      const help: HelpRequested = { kind: 'help' };
      return ok(help);
    }

    const previous = optionals.get(name) ?? [];

    if (definition.arity === Arity.FLAG) {
      if (inlineValue !== null) {
        return err(
          createArgumentError('UNEXPECTED_VALUE', programName, `'${name}' does not take a value`, name)
        );
      }
      if (previous.length > 0) {
        return err(repeated(name));
      }
      optionals.set(name, [FLAG_PRESENT]);
      continue;
    }

    let value: string;
    if (inlineValue !== null) {
      if (inlineValue === '') {
        return err(missingValue(name));
      }
      value = inlineValue;
    } else {
      if (index + 1 >= argv.length || looksLikeOption(argv[index + 1])) {
        return err(missingValue(name));
      }
      index++;
      value = argv[index];
    }

    if (definition.arity === Arity.SINGLE && previous.length > 0) {
      return err(repeated(name));
    }
    optionals.set(name, [...previous, value]);
  }

  return bindPositionals(registry, argv[0], candidates, optionals, programName);
}

/**
 * Bind positional candidates to the declared positionals in declaration order
 */
function bindPositionals(
  registry: DefinitionRegistry,
  argv0: string,
  candidates: string[],
  optionals: Map<string, string[]>,
  programName: string
): Result<MatchedArguments, ArgumentError> {
  const declared = registry.getPositionals();
  const positionals = new Map<string, string>();

  for (const [index, definition] of declared.entries()) {
    if (index < candidates.length) {
      positionals.set(definition.name, candidates[index]);
    } else if (definition.defaultRaw === undefined) {
      return err(
        createArgumentError(
          'MISSING_POSITIONAL',
          programName,
          `requires positional argument '${definition.name}'`,
          definition.name
        )
      );
    }
  }

  const matched: MatchedArguments = {
    kind: 'matched',
    positionals,
    optionals,
    leftovers: [argv0, ...candidates.slice(declared.length)],
  };
  return ok(matched);
}
