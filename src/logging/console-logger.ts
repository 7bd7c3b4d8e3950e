/**
 * Console Logger implementation
 * Structured logging with event types and metadata
 */

import type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from '../types/logger';
import {
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

/** Events kept for getEvents(); older ones are dropped */
export const MAX_RETAINED_EVENTS = 100;

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private events: LogEvent[] = [];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'warn';
    this.options = {
      includeTimestamp: false,
      jsonOutput: false,
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger(this.options);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.events.push(event);
    if (this.events.length > MAX_RETAINED_EVENTS) {
      this.events.shift();
    }
    this.output(event);
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged = { ...this.context, ...metadata };
    // Argument values may carry secrets
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }

  private output(event: LogEvent): void {
    if (this.options.jsonOutput) {
      this.outputJson(event);
    } else {
      this.outputPretty(event);
    }
  }

  private outputJson(event: LogEvent): void {
    const line = JSON.stringify(event);
    // stdout belongs to the program being parsed for
    console.error(line);
  }

  private outputPretty(event: LogEvent): void {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(this.getLevelIndicator(event.level));

    if (!['debug', 'info', 'warn', 'error'].includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { program, argument } = event.metadata;
    const metaParts: string[] = [];
    if (program) metaParts.push(`program=${program}`);
    if (argument) metaParts.push(`argument=${argument}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    const line = parts.join(' ');

    if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  private getLevelIndicator(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return '[debug]';
      case 'info':
        return '[info]';
      case 'warn':
        return '[warn]';
      case 'error':
        return '[error]';
      default:
        return '•';
    }
  }
}

/**
 * Create a console logger with optional options
 */
export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
