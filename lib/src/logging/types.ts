/**
 * Logging Types and Schemas
 *
 * Type definitions for the gateway's structured logging: log levels,
 * output formats, entry shape and logger configuration.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  /** Nothing is written */
  SILENT: -1,
  /** Failures that need an operator's attention */
  ERROR: 0,
  /** Degraded behaviour the gateway recovered from */
  WARN: 1,
  /** Request lifecycle and startup messages */
  INFO: 2,
  /** Pipeline internals (cache hits, detected labels, retry attempts) */
  DEBUG: 3,
  /** Detailed trace information */
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Log level names for display
 */
export const LogLevelName = {
  [LogLevel.SILENT]: 'SILENT',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

/**
 * Zod schema for log level validation
 */
export const LogLevelSchema = z.union([
  z.literal(-1),
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

/**
 * A single log entry
 */
export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),

  /** Bound fields merged with per-call context */
  context: z.record(z.unknown()).optional(),

  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),

  /** Source identifier, e.g. `gateway:chat-service` */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Output format for log entries
 */
export const LogFormat = {
  /** Human-readable text format */
  TEXT: 'text',
  /** One JSON object per line, for log shippers */
  JSON: 'json',
  /** Compact format with minimal information */
  COMPACT: 'compact',
  /** Pretty format with colors (for terminal) */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

/**
 * Logger configuration options
 */
export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * Output format
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  /**
   * Whether to include timestamps
   * @default true
   */
  timestamps: z.boolean().default(true),

  /**
   * Whether to include colors in `pretty` output
   * @default true
   */
  colors: z.boolean().default(true),

  /**
   * Source identifier for all logs from this logger
   */
  source: z.string().optional(),

  /**
   * Fields attached to every entry (request id, origin, ...)
   */
  bindings: z.record(z.unknown()).default({}),

  /**
   * Whether to output to console
   * @default true
   */
  console: z.boolean().default(true),

  /**
   * Custom output handler (receives formatted log entries)
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

/**
 * Create a default logger configuration
 */
export function createDefaultLoggerConfig(
  overrides?: Partial<LoggerConfig>
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Log Formatting
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Color mapping for log levels
 */
export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.SILENT]: LogColors.dim,
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  SILENT: LogLevel.SILENT,
  NONE: LogLevel.SILENT,
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
  TRACE: LogLevel.TRACE,
};

/**
 * Parse a log level from string. Unknown names fall back to INFO.
 *
 * @example
 * parseLogLevel('debug'); // LogLevel.DEBUG
 * parseLogLevel('warning'); // LogLevel.WARN
 */
export function parseLogLevel(level: string): LogLevel {
  return LEVELS_BY_NAME[level.trim().toUpperCase()] ?? LogLevel.INFO;
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

/**
 * Check if a log level should be output given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging
 */
export function formatError(error: unknown): {
  name: string;
  message: string;
  stack?: string;
} {
  if (error instanceof Error) {
    return error.stack !== undefined
      ? { name: error.name, message: error.message, stack: error.stack }
      : { name: error.name, message: error.message };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
