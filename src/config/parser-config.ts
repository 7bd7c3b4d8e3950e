/**
 * Parser Configuration
 * Single-pass resolution with explicit precedence:
 * explicit options > environment > defaults
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/argument-errors';
import type { Logger, LogLevel } from '../types/logger';

/** Which literals boolean coercion accepts */
export type BooleanLiterals = 'strict' | 'extended';

/** Where a resolved setting came from */
export type ConfigSource = 'default' | 'env' | 'options';

/** Anything help text can be written to (process.stdout, a test buffer) */
export interface OutputStream {
  write(text: string): unknown;
}

/** Called with the exit code after help has been written */
export type ExitHandler = (code: number) => void;

/**
 * Options accepted by the ArgumentParser constructor
 */
export interface ParserOptions {
  /** Name used in usage text and error prefixes instead of argv[0] */
  programName?: string;
  /** Program description printed under the usage line */
  description?: string;
  /** Pre-register -h/--help (default: true) */
  addHelp?: boolean;
  /** Call the exit handler after printing help (default: true) */
  exitOnHelp?: boolean;
  /** Boolean literal set (default: strict, only 'true'/'false') */
  booleanLiterals?: BooleanLiterals;
  /** Minimum level for the default console logger (default: warn) */
  logLevel?: LogLevel;
  /** Column width of the positional block in help text (default: 20) */
  positionalColumnWidth?: number;
  /** Column width of the options block in help text (default: 30) */
  optionalColumnWidth?: number;
  logger?: Logger;
  output?: OutputStream;
  exit?: ExitHandler;
}

/**
 * Resolved, validated settings
 */
export interface ParserConfig {
  programName: string | null;
  description: string | null;
  addHelp: boolean;
  exitOnHelp: boolean;
  booleanLiterals: BooleanLiterals;
  logLevel: LogLevel;
  positionalColumnWidth: number;
  optionalColumnWidth: number;
  /** Source of each setting, for debugging */
  sources: Record<string, ConfigSource>;
}

/** Environment variables read during resolution */
export const ENV_LOG_LEVEL = 'ARGMATCH_LOG_LEVEL';
export const ENV_BOOLEAN_LITERALS = 'ARGMATCH_BOOLEAN_LITERALS';

export const DEFAULT_PARSER_CONFIG: Omit<ParserConfig, 'sources'> = {
  programName: null,
  description: null,
  addHelp: true,
  exitOnHelp: true,
  booleanLiterals: 'strict',
  logLevel: 'warn',
  positionalColumnWidth: 20,
  optionalColumnWidth: 30,
};

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const booleanLiteralsSchema = z.enum(['strict', 'extended']);
const columnWidthSchema = z.number().int().min(4).max(120);

// Injectables (logger, output, exit) are not data and are stripped here
const parserSettingsSchema = z.object({
  programName: z.string().min(1, 'Program name cannot be empty').optional(),
  description: z.string().optional(),
  addHelp: z.boolean().optional(),
  exitOnHelp: z.boolean().optional(),
  booleanLiterals: booleanLiteralsSchema.optional(),
  logLevel: logLevelSchema.optional(),
  positionalColumnWidth: columnWidthSchema.optional(),
  optionalColumnWidth: columnWidthSchema.optional(),
});

/**
 * Read a setting from the environment, ignoring values the schema rejects
 */
function readEnv<T>(
  env: Record<string, string | undefined>,
  key: string,
  schema: z.ZodType<T>
): T | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  const parsed = schema.safeParse(raw.trim());
  return parsed.success ? parsed.data : undefined;
}

/**
 * Resolve parser settings from all sources
 * @throws ConfigurationError when an explicit option is invalid
 */
export function resolveParserConfig(
  options: ParserOptions = {},
  env: Record<string, string | undefined> = process.env
): ParserConfig {
  const parsed = parserSettingsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError('INVALID_OPTIONS', `invalid parser options: ${issues.join('; ')}`);
  }
  const settings = parsed.data;
  const sources: Record<string, ConfigSource> = {};

  function pick<T>(key: string, fromOptions: T | undefined, fromEnv: T | undefined, fallback: T): T {
    if (fromOptions !== undefined) {
      sources[key] = 'options';
      return fromOptions;
    }
    if (fromEnv !== undefined) {
      sources[key] = 'env';
      return fromEnv;
    }
    sources[key] = 'default';
    return fallback;
  }

  const defaults = DEFAULT_PARSER_CONFIG;
  return {
    programName: pick('programName', settings.programName, undefined, defaults.programName),
    description: pick('description', settings.description, undefined, defaults.description),
    addHelp: pick('addHelp', settings.addHelp, undefined, defaults.addHelp),
    exitOnHelp: pick('exitOnHelp', settings.exitOnHelp, undefined, defaults.exitOnHelp),
    booleanLiterals: pick(
      'booleanLiterals',
      settings.booleanLiterals,
      readEnv(env, ENV_BOOLEAN_LITERALS, booleanLiteralsSchema),
      defaults.booleanLiterals
    ),
    logLevel: pick(
      'logLevel',
      settings.logLevel,
      readEnv(env, ENV_LOG_LEVEL, logLevelSchema),
      defaults.logLevel
    ),
    positionalColumnWidth: pick(
      'positionalColumnWidth',
      settings.positionalColumnWidth,
      undefined,
      defaults.positionalColumnWidth
    ),
    optionalColumnWidth: pick(
      'optionalColumnWidth',
      settings.optionalColumnWidth,
      undefined,
      defaults.optionalColumnWidth
    ),
    sources,
  };
}
