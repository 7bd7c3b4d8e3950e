/**
 * Error types for argument declaration and matching
 *
 * Two categories that never overlap:
 * - ConfigurationError is thrown for programmer mistakes (bad declarations,
 *   unknown names at retrieval). It is not meant to be recovered from.
 * - ArgumentError is returned inside a Result for anything the user typed
 *   on the command line. Its message is prefixed with the program name.
 */

/** Prefix for configuration error messages */
export const LIBRARY_MARKER = 'ArgumentParser';

/**
 * Codes for mistakes in how the program declares or reads its arguments
 */
export type ConfigurationErrorCode =
  | 'INVALID_NAME'
  | 'DUPLICATE_NAME'
  | 'NAME_CONFLICT'
  | 'INVALID_FLAG'
  | 'DUPLICATE_FLAG'
  | 'UNKNOWN_ARGUMENT'
  | 'DECLARED_AFTER_PARSE'
  | 'INVALID_OPTIONS'
  | 'EMPTY_ARGV';

export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, detail: string) {
    super(`${LIBRARY_MARKER}: ${detail}`);
    this.name = 'ConfigurationError';
    this.code = code;
  }
}

/**
 * Codes for problems with user-supplied tokens or values
 */
export type ArgumentErrorCode =
  | 'INVALID_OPTION'
  | 'REPEATED_OPTION'
  | 'MISSING_VALUE'
  | 'UNEXPECTED_VALUE'
  | 'MISSING_POSITIONAL'
  | 'INVALID_VALUE'
  | 'OUT_OF_RANGE'
  | 'NO_VALUE'
  | 'INDEX_OUT_OF_RANGE';

/**
 * User input error
 */
export interface ArgumentError {
  code: ArgumentErrorCode;
  /** Full text, `<program-name>: <reason>` */
  message: string;
  /** Reason without the program-name prefix */
  reason: string;
  /** Argument or token the error is about */
  argument?: string;
}

/**
 * Create a user input error whose message carries the program name
 */
export function createArgumentError(
  code: ArgumentErrorCode,
  programName: string,
  reason: string,
  argument?: string
): ArgumentError {
  return {
    code,
    message: `${programName}: ${reason}`,
    reason,
    ...(argument !== undefined ? { argument } : {}),
  };
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
