/**
 * Argument definitions
 *
 * Created by the registry, configured fluently afterwards:
 *   parser.addOptional('--repeat', Arity.SINGLE, '-r').help('repeat count').defaultValue(1);
 */

import { ConfigurationError } from '../types/argument-errors';

/**
 * Cardinality of an optional argument
 *
 * FLAG    no value; retrieving it yields true when present, false otherwise
 * SINGLE  one value; may be given at most once
 * APPEND  one value per occurrence, any number of occurrences
 */
export const Arity = {
  FLAG: 'flag',
  SINGLE: 'single',
  APPEND: 'append',
} as const;

export type Arity = (typeof Arity)[keyof typeof Arity];

/** Values accepted as a declared default; stored as their string form */
export type DefaultValue = string | number | bigint | boolean;

abstract class ArgumentDefinition {
  readonly name: string;
  private helpTextValue = '';
  private defaultRawValue: string | undefined;
  private sealed = false;

  protected constructor(name: string) {
    this.name = name;
  }

  get helpText(): string {
    return this.helpTextValue;
  }

  /** Declared default in raw form, coerced on retrieval like a user-supplied value */
  get defaultRaw(): string | undefined {
    return this.defaultRawValue;
  }

  /**
   * Set the text shown next to this argument in help output
   */
  help(text: string): this {
    this.assertOpen();
    this.helpTextValue = text;
    return this;
  }

  defaultValue(value: DefaultValue): this {
    this.assertOpen();
    this.defaultRawValue = String(value);
    return this;
  }

  /** Freeze help text and default; called by the registry on the first parse */
  seal(): void {
    this.sealed = true;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new ConfigurationError(
        'DECLARED_AFTER_PARSE',
        `cannot change '${this.name}' after arguments have been parsed`
      );
    }
  }
}

export class PositionalDefinition extends ArgumentDefinition {
  readonly kind = 'positional' as const;

  constructor(name: string) {
    super(name);
  }
}

export class OptionalDefinition extends ArgumentDefinition {
  readonly kind = 'optional' as const;
  readonly arity: Arity;
  /** Single-character alias, without the dash */
  readonly flag: string | null;

  constructor(name: string, arity: Arity, flag: string | null = null) {
    super(name);
    this.arity = arity;
    this.flag = flag;
  }

  get takesValue(): boolean {
    return this.arity !== Arity.FLAG;
  }

  /** Placeholder shown after the option in help output */
  get valuePlaceholder(): string {
    return this.name.toUpperCase();
  }
}
