/**
 * Logger interface
 * Structured logging with event types and metadata
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the declare/parse/retrieve lifecycle
 */
export type LogEventType =
  // Declarations
  | 'argument_declared'
  // Parse lifecycle
  | 'parse_started'
  | 'parse_completed'
  | 'parse_failed'
  | 'help_displayed'
  // Retrieval
  | 'value_coerced'
  | 'coercion_failed'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Program name the parser reports errors under */
  program?: string;
  /** Argument the event is about */
  argument?: string;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

/**
 * A structured log event
 */
export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  /** Human-readable message */
  message: string;
  metadata: LogMetadata;
}

/**
 * Options for configuring the logger
 */
export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output (for secrets passed as argument values) */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (program name, etc.) for all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  const order: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  return order[a] - order[b];
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at.
 * Parse failures are returned to the caller, so they only show up in debug output.
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
      return 'error';
    case 'warn':
      return 'warn';
    case 'info':
    case 'help_displayed':
      return 'info';
    default:
      return 'debug';
  }
}

/**
 * Secret-looking patterns to redact
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // key=value style secrets, e.g. --password=...
  /(?:password|secret|token|api[_-]?key)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      // Keep the first few characters for debugging, redact the rest
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
