/**
 * Logger Implementation
 *
 * Leveled, structured logger. Instances are created from configuration and
 * handed to the components that log; child loggers extend the source path and
 * bind extra context.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LoggerOptions,
  LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  LogFormat,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: LoggerOptions) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger. The source is appended to this logger's source
   * (`parent:child`) and `context` is merged into the bound context.
   */
  child(source: string, context?: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
      context: { ...this.config.context, ...context },
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevel.ERROR, message, context, errorOrContext);
      return;
    }
    if (isContext(errorOrContext)) {
      this.log(LogLevel.ERROR, message, errorOrContext);
      return;
    }
    this.log(LogLevel.ERROR, message, context, errorOrContext);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const merged = { ...this.config.context, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
      source: this.config.source,
      error: error === undefined ? undefined : formatError(error),
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          message: entry.message,
          source: entry.source,
          context: entry.context,
          error: entry.error,
        });
      case LogFormat.COMPACT:
        // HH:MM:SS and the level initial
        return `${entry.timestamp.toISOString().slice(11, 19)} ${LogLevelName[entry.level][0]} ${entry.message}`;
      case LogFormat.PRETTY:
        return this.config.colors ? this.formatLine(entry, true) : this.formatLine(entry, false);
      case LogFormat.TEXT:
      default:
        return this.formatLine(entry, false);
    }
  }

  private formatLine(entry: LogEntry, colored: boolean): string {
    const paint = (color: string, text: string): string =>
      colored ? `${color}${text}${LogColors.reset}` : text;

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(paint(LogColors.gray, `[${entry.timestamp.toISOString()}]`));
    }

    parts.push(paint(LogLevelColors[entry.level], LogLevelName[entry.level].padEnd(5)));

    if (entry.source) {
      parts.push(paint(LogColors.cyan, `[${entry.source}]`));
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(paint(LogColors.dim, JSON.stringify(entry.context)));
    }

    if (entry.error) {
      parts.push(paint(LogColors.red, `\n  Error: ${entry.error.name}: ${entry.error.message}`));
      if (entry.error.stack && this.config.level >= LogLevel.DEBUG) {
        parts.push(paint(LogColors.gray, `\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`));
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (level === LogLevel.ERROR) {
      console.error(formatted);
    } else if (level === LogLevel.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

function isContext(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a logger with a specific source
 */
export function createLogger(source: string, config?: LoggerOptions): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Logger that discards everything. Used as the default where a component is
 * constructed without one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ output: () => undefined });
}
