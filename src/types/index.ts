/**
 * Types module - shared interfaces and types
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr, unwrap, map, andThen, all } from './result';

// Error types
export type {
  ArgumentError,
  ArgumentErrorCode,
  ConfigurationErrorCode,
} from './argument-errors';
export {
  ConfigurationError,
  LIBRARY_MARKER,
  createArgumentError,
  isConfigurationError,
} from './argument-errors';

// Exit codes
export { ExitCode } from './exit-codes';

// Logger interface
export type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
} from './logger';
