/**
 * Logging Types and Schemas
 *
 * Log levels, entry shape and logger configuration for the ingest tooling.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

const LEVEL_BY_NAME: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE,
};

// =============================================================================
// Log Entry
// =============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Bound context of the logger merged with per-call context */
  context?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
  /** Module path, e.g. `ingest:pipeline` */
  source?: string;
}

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line */
  JSON: 'json',
  /** Time, level initial and message only */
  COMPACT: 'compact',
  /** Text with ANSI colors */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  timestamps: z.boolean().default(true),

  /**
   * Only used by the `pretty` format
   */
  colors: z.boolean().default(true),

  source: z.string().optional(),

  /**
   * Context attached to every entry written by this logger
   */
  context: z.record(z.unknown()).default({}),

  /**
   * Receives each formatted line instead of the console
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerOptions = z.input<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(overrides?: LoggerOptions): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Colors
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Parse a level name (case-insensitive). Returns undefined for unknown names.
 */
export function parseLogLevel(level: string): LogLevel | undefined {
  return LEVEL_BY_NAME[level.trim().toLowerCase()];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

export function formatError(
  error: unknown
): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return error.stack === undefined
      ? { name: error.name, message: error.message }
      : { name: error.name, message: error.message, stack: error.stack };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
