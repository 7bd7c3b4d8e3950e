/**
 * Definition Registry
 *
 * Holds the declared positional and optional arguments. Positional names,
 * optional reference names and flag characters are three namespaces that
 * may never collide; every rule is checked when an argument is declared.
 */

import { ConfigurationError } from '../types/argument-errors';
import { Arity, OptionalDefinition, PositionalDefinition } from './definitions';
import { isValidPositionalName, parseFlagName, parseLongOptionName } from './names';

export class DefinitionRegistry {
  // Maps keep declaration order
  private readonly positionals = new Map<string, PositionalDefinition>();
  private readonly optionals = new Map<string, OptionalDefinition>();
  private readonly flags = new Map<string, OptionalDefinition>();
  private sealed = false;

  /**
   * Declare a positional argument
   * @throws ConfigurationError if the name is malformed, a duplicate, or an optional's reference name
   */
  addPositional(name: string): PositionalDefinition {
    this.assertOpen(name);
    if (!isValidPositionalName(name)) {
      throw new ConfigurationError('INVALID_NAME', `invalid positional argument name '${name}'`);
    }
    if (this.optionals.has(name)) {
      throw new ConfigurationError(
        'NAME_CONFLICT',
        `positional argument name conflicts with optional argument reference name '${name}'`
      );
    }
    if (this.positionals.has(name)) {
      throw new ConfigurationError('DUPLICATE_NAME', `duplicate positional argument name '${name}'`);
    }
    const definition = new PositionalDefinition(name);
    this.positionals.set(name, definition);
    return definition;
  }

  /**
   * Declare an optional argument. Its reference name is `longName` without the leading dashes.
   * @param longName `--name` or `-name`
   * @param flag     optional `-x` alias
   * @throws ConfigurationError if either name is malformed or already taken
   */
  addOptional(longName: string, arity: Arity = Arity.SINGLE, flag?: string): OptionalDefinition {
    this.assertOpen(longName);

    let flagChar: string | null = null;
    if (flag !== undefined) {
      flagChar = parseFlagName(flag);
      if (flagChar === null) {
        throw new ConfigurationError('INVALID_FLAG', `invalid flag name '${flag}'`);
      }
      if (this.flags.has(flagChar)) {
        throw new ConfigurationError('DUPLICATE_FLAG', `duplicate flag name '${flag}'`);
      }
    }

    const name = parseLongOptionName(longName);
    if (name === null) {
      throw new ConfigurationError('INVALID_NAME', `invalid optional argument name: ${longName}`);
    }
    if (this.positionals.has(name)) {
      throw new ConfigurationError(
        'NAME_CONFLICT',
        `optional argument reference name conflicts with positional argument name '${name}'`
      );
    }
    if (this.optionals.has(name)) {
      throw new ConfigurationError('DUPLICATE_NAME', `duplicate optional argument name '${name}'`);
    }

    const definition = new OptionalDefinition(name, arity, flagChar);
    this.optionals.set(name, definition);
    if (flagChar !== null) {
      this.flags.set(flagChar, definition);
    }
    return definition;
  }

  /**
   * Refuse further declarations. Called on the first parse.
   */
  seal(): void {
    this.sealed = true;
    for (const definition of [...this.positionals.values(), ...this.optionals.values()]) {
      definition.seal();
    }
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  getPositionals(): PositionalDefinition[] {
    return [...this.positionals.values()];
  }

  getOptionals(): OptionalDefinition[] {
    return [...this.optionals.values()];
  }

  findPositional(name: string): PositionalDefinition | undefined {
    return this.positionals.get(name);
  }

  findOptional(name: string): OptionalDefinition | undefined {
    return this.optionals.get(name);
  }

  /**
   * Look up an optional by its flag character (without the dash)
   */
  findByFlag(flagChar: string): OptionalDefinition | undefined {
    return this.flags.get(flagChar);
  }

  private assertOpen(name: string): void {
    if (this.sealed) {
      throw new ConfigurationError(
        'DECLARED_AFTER_PARSE',
        `cannot declare '${name}' after arguments have been parsed`
      );
    }
  }
}
