/**
 * Argument Parser
 *
 * Public entry point: declare arguments, parse argv once, then read typed
 * values from the returned ParsedArguments.
 *
 * Declaration mistakes are programming errors and throw ConfigurationError.
 * Bad user input is returned as an ArgumentError inside a Result.
 */

import { ConfigurationError } from '../types/argument-errors';
import type { ArgumentError } from '../types/argument-errors';
import { ok } from '../types/result';
import type { Result } from '../types/result';
import { ExitCode } from '../types/exit-codes';
import type { Logger } from '../types/logger';
import { createConsoleLogger } from '../logging/console-logger';
import { resolveParserConfig } from '../config/parser-config';
import type { ExitHandler, OutputStream, ParserConfig, ParserOptions } from '../config/parser-config';
import { DefinitionRegistry } from '../registry/definition-registry';
import { Arity } from '../registry/definitions';
import type { OptionalDefinition, PositionalDefinition } from '../registry/definitions';
import { HELP_OPTION, matchArgs } from '../engine/match-args';
import { getHelpText, getUsageText } from '../help/help-text';
import { ParsedArguments } from './parsed-arguments';

export class ArgumentParser {
  private readonly registry = new DefinitionRegistry();
  private readonly config: ParserConfig;
  private readonly logger: Logger;
  private readonly output: OutputStream;
  private readonly exit: ExitHandler;
  /** argv[0] of the last parse, used for help printed outside parse() */
  private lastProgramName: string | null = null;

  /**
   * @throws ConfigurationError when an option fails validation
   */
  constructor(options: ParserOptions = {}) {
    this.config = resolveParserConfig(options);
    this.logger = options.logger ?? createConsoleLogger({ minLevel: this.config.logLevel });
    this.output = options.output ?? process.stdout;
    this.exit = options.exit ?? ((code) => process.exit(code));

    if (this.config.addHelp) {
      this.registry.addOptional(`--${HELP_OPTION}`, Arity.FLAG, '-h').help('display this help text');
    }

    this.logger.debug('Parser configured', { sources: this.config.sources });
  }

  /**
   * Declare a positional argument. Positionals bind in declaration order.
   * @throws ConfigurationError on an invalid or taken name, or after parse()
   */
  addPositional(name: string): PositionalDefinition {
    const definition = this.registry.addPositional(name);
    this.logger.event('argument_declared', `Declared positional '${name}'`, { argument: name });
    return definition;
  }

  /**
   * Declare an optional argument
   * @param longName `--name` or `-name`; the reference name drops the dashes
   * @param flag     single-character alias such as `-n`
   * @throws ConfigurationError on an invalid or taken name, or after parse()
   */
  addOptional(longName: string, arity: Arity = Arity.SINGLE, flag?: string): OptionalDefinition {
    const definition = this.registry.addOptional(longName, arity, flag);
    this.logger.event('argument_declared', `Declared optional '${definition.name}' (${arity})`, {
      argument: definition.name,
      flag: definition.flag,
    });
    return definition;
  }

  /**
   * Match argv against the declared arguments.
   *
   * When --help is given the help text is written and the exit handler is
   * called with 0; if the handler returns, the result carries
   * `helpRequested: true`.
   *
   * @param argv token 0 is the program name
   * @throws ConfigurationError if argv is empty
   */
  parse(argv: readonly string[] = process.argv.slice(1)): Result<ParsedArguments, ArgumentError> {
    if (argv.length === 0) {
      throw new ConfigurationError('EMPTY_ARGV', 'argv must contain at least the program name');
    }
    if (!this.registry.isSealed) {
      this.registry.seal();
      this.warnAboutUnusedDefaults();
    }

    const programName = this.config.programName ?? argv[0];
    this.lastProgramName = programName;
    const logger = this.logger.child({ program: programName });
    logger.event('parse_started', `Parsing ${argv.length - 1} token(s)`);

    const matched = matchArgs(this.registry, argv, {
      programName,
      helpEnabled: this.config.addHelp,
    });
    if (!matched.ok) {
      logger.event('parse_failed', matched.error.message, {
        argument: matched.error.argument,
        code: matched.error.code,
      });
      return matched;
    }

    const init = {
      registry: this.registry,
      programName,
      booleanLiterals: this.config.booleanLiterals,
      logger,
    };

    if (matched.value.kind === 'help') {
      this.output.write(`${this.getHelpText(programName)}\n`);
      logger.event('help_displayed', 'Help text written');
      if (this.config.exitOnHelp) {
        this.exit(ExitCode.SUCCESS);
      }
      return ok(
        new ParsedArguments({
          ...init,
          positionals: new Map(),
          optionals: new Map(),
          leftovers: [argv[0]],
          helpRequested: true,
        })
      );
    }

    const { positionals, optionals, leftovers } = matched.value;
    logger.event(
      'parse_completed',
      `Bound ${positionals.size} positional(s), ${optionals.size} option(s), ${leftovers.length - 1} leftover(s)`
    );
    return ok(new ParsedArguments({ ...init, positionals, optionals, leftovers, helpRequested: false }));
  }

  /** Get the usage line */
  getUsageText(programName: string = this.defaultProgramName()): string {
    return getUsageText(this.registry, programName);
  }

  /** Get the full help text, without a trailing newline */
  getHelpText(programName: string = this.defaultProgramName()): string {
    return getHelpText(this.registry, {
      programName,
      description: this.config.description,
      positionalColumnWidth: this.config.positionalColumnWidth,
      optionalColumnWidth: this.config.optionalColumnWidth,
    });
  }

  /** Write the help text to the configured output */
  printHelp(programName?: string): void {
    this.output.write(`${this.getHelpText(programName)}\n`);
  }

  private defaultProgramName(): string {
    return this.config.programName ?? this.lastProgramName ?? process.argv[1] ?? 'program';
  }

  /**
   * A positional default before a required positional can never apply:
   * the first token always goes to the earlier one.
   */
  private warnAboutUnusedDefaults(): void {
    const positionals = this.registry.getPositionals();
    for (const [index, definition] of positionals.entries()) {
      if (definition.defaultRaw === undefined) {
        continue;
      }
      const required = positionals.slice(index + 1).find((later) => later.defaultRaw === undefined);
      if (required) {
        this.logger.warn(
          `Default for positional '${definition.name}' is never used because '${required.name}' after it has none`,
          { argument: definition.name }
        );
      }
    }
  }
}
