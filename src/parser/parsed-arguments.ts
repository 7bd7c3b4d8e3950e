/**
 * Parsed Arguments
 *
 * The value store produced by a successful parse. Values stay raw strings
 * until they are read through a ValueType, so one parse can be read back
 * as several types.
 */

import { ConfigurationError, createArgumentError } from '../types/argument-errors';
import type { ArgumentError } from '../types/argument-errors';
import { ok, err, all, map } from '../types/result';
import type { Result } from '../types/result';
import type { Logger } from '../types/logger';
import type { BooleanLiterals } from '../config/parser-config';
import type { ValueType } from '../coercion/value-types';
import type { DefinitionRegistry } from '../registry/definition-registry';
import { Arity } from '../registry/definitions';
import type { OptionalDefinition, PositionalDefinition } from '../registry/definitions';

/** Raw value a FLAG reads as when it was not given */
const FLAG_ABSENT = 'false';

export interface ParsedArgumentsInit {
  registry: DefinitionRegistry;
  programName: string;
  booleanLiterals: BooleanLiterals;
  logger: Logger;
  positionals: Map<string, string>;
  optionals: Map<string, string[]>;
  leftovers: string[];
  helpRequested: boolean;
}

export class ParsedArguments {
  /** Name used in error messages */
  readonly programName: string;
  /** argv[0] followed by the tokens no positional claimed */
  readonly leftovers: readonly string[];
  /** True when --help was given and the exit handler returned */
  readonly helpRequested: boolean;

  private readonly registry: DefinitionRegistry;
  private readonly booleanLiterals: BooleanLiterals;
  private readonly logger: Logger;
  private readonly positionals: ReadonlyMap<string, string>;
  private readonly optionals: ReadonlyMap<string, readonly string[]>;

  constructor(init: ParsedArgumentsInit) {
    this.registry = init.registry;
    this.programName = init.programName;
    this.booleanLiterals = init.booleanLiterals;
    this.logger = init.logger;
    this.positionals = init.positionals;
    this.optionals = init.optionals;
    this.leftovers = init.leftovers;
    this.helpRequested = init.helpRequested;
  }

  /**
   * Whether the user gave the optional argument at least once
   * @throws ConfigurationError if no optional has that reference name
   */
  has(name: string): boolean {
    return this.count(name) > 0;
  }

  /**
   * Number of values given for an optional argument
   * @throws ConfigurationError if no optional has that reference name
   */
  count(name: string): number {
    this.lookupOptional(name);
    return this.optionals.get(name)?.length ?? 0;
  }

  /**
   * Raw values as typed by the user (defaults excluded)
   */
  values(name: string): string[] {
    const definition = this.lookup(name);
    if (definition.kind === 'optional') {
      return [...(this.optionals.get(name) ?? [])];
    }
    const value = this.positionals.get(name);
    return value === undefined ? [] : [value];
  }

  /**
   * Read the first value of an argument as the given type.
   *
   * When an optional argument was not given, `defaultValue` is returned as
   * is; failing that the declared default is coerced, and a FLAG reads as
   * false.
   */
  get<T>(name: string, type: ValueType<T>, defaultValue?: T): Result<T, ArgumentError> {
    return this.getAt(name, 0, type, defaultValue);
  }

  /**
   * Read the value at `index` of an argument as the given type
   * @throws ConfigurationError if no argument has that name
   */
  getAt<T>(name: string, index: number, type: ValueType<T>, defaultValue?: T): Result<T, ArgumentError> {
    const definition = this.lookup(name);
    if (definition.kind === 'optional') {
      return this.readOptional(definition, index, type, defaultValue);
    }
    return this.readPositional(definition, index, type);
  }

  /**
   * Read every value of an argument. An absent optional yields an empty list.
   */
  getAll<T>(name: string, type: ValueType<T>): Result<T[], ArgumentError> {
    const definition = this.lookup(name);
    if (definition.kind === 'positional') {
      return map(this.readPositional(definition, 0, type), (value) => [value]);
    }
    const values = this.optionals.get(name) ?? [];
    return all(values.map((raw) => this.coerce(name, raw, type)));
  }

  private readOptional<T>(
    definition: OptionalDefinition,
    index: number,
    type: ValueType<T>,
    defaultValue: T | undefined
  ): Result<T, ArgumentError> {
    const { name } = definition;
    const values = this.optionals.get(name) ?? [];

    if (values.length > 0) {
      if (!Number.isInteger(index) || index < 0 || index >= values.length) {
        return err(this.indexOutOfRange(name, index));
      }
      return this.coerce(name, values[index], type);
    }

    if (defaultValue !== undefined) {
      return ok(defaultValue);
    }
    if (definition.defaultRaw !== undefined) {
      return this.coerce(name, definition.defaultRaw, type);
    }
    if (definition.arity === Arity.FLAG) {
      return this.coerce(name, FLAG_ABSENT, type);
    }
    return err(
      createArgumentError(
        'NO_VALUE',
        this.programName,
        `no value given for '${name}' and no default specified`,
        name
      )
    );
  }

  private readPositional<T>(
    definition: PositionalDefinition,
    index: number,
    type: ValueType<T>
  ): Result<T, ArgumentError> {
    const { name } = definition;
    if (index !== 0) {
      return err(this.indexOutOfRange(name, index));
    }
    const raw = this.positionals.get(name) ?? definition.defaultRaw;
    if (raw === undefined) {
      // Only reachable when parsing stopped at --help
      return err(
        createArgumentError(
          'NO_VALUE',
          this.programName,
          `no value given for '${name}' and no default specified`,
          name
        )
      );
    }
    return this.coerce(name, raw, type);
  }

  private coerce<T>(name: string, raw: string, type: ValueType<T>): Result<T, ArgumentError> {
    const result = type.coerce(raw, {
      programName: this.programName,
      argument: name,
      booleanLiterals: this.booleanLiterals,
    });
    if (result.ok) {
      this.logger.event('value_coerced', `Read '${name}' as ${type.tag}`, { argument: name });
    } else {
      this.logger.event('coercion_failed', result.error.message, { argument: name, tag: type.tag });
    }
    return result;
  }

  private indexOutOfRange(name: string, index: number): ArgumentError {
    return createArgumentError(
      'INDEX_OUT_OF_RANGE',
      this.programName,
      `index ${index} is out of range for '${name}'`,
      name
    );
  }

  private lookup(name: string): PositionalDefinition | OptionalDefinition {
    const definition = this.registry.findOptional(name) ?? this.registry.findPositional(name);
    if (!definition) {
      throw new ConfigurationError('UNKNOWN_ARGUMENT', `no argument by the name '${name}'`);
    }
    return definition;
  }

  private lookupOptional(name: string): OptionalDefinition {
    const definition = this.registry.findOptional(name);
    if (!definition) {
      throw new ConfigurationError('UNKNOWN_ARGUMENT', `no optional argument by the name '${name}'`);
    }
    return definition;
  }
}
