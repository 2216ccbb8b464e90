/**
 * Logger Implementation
 *
 * A configurable structured logger. Loggers are constructed once at process
 * start and handed to services; `child()` and `with()` derive loggers for a
 * component or a single request without touching shared state.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

type LogContext = Record<string, unknown>;

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger class for structured logging
 *
 * @example
 * const logger = createLogger('gateway', { format: 'json' });
 * const requestLogger = logger.child('chat').with({ requestId: 'req-1' });
 * requestLogger.info('Query answered', { cached: false });
 */
export class Logger {
  private readonly config: LoggerConfig;
  private level: LogLevel;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
    this.level = this.config.level;
  }

  /**
   * Create a child logger with a nested source
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  /**
   * Create a logger that attaches `bindings` to every entry
   */
  with(bindings: LogContext): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  error(message: string, context?: LogContext): void;
  error(message: string, error: Error, context?: LogContext): void;
  error(
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext
  ): void {
    this.dispatch(LogLevelEnum.ERROR, message, errorOrContext, context);
  }

  warn(message: string, context?: LogContext): void;
  warn(message: string, error: Error, context?: LogContext): void;
  warn(
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext
  ): void {
    this.dispatch(LogLevelEnum.WARN, message, errorOrContext, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  private dispatch(
    level: LogLevel,
    message: string,
    errorOrContext: Error | LogContext | undefined,
    context: LogContext | undefined
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(level, message, context, errorOrContext);
    } else {
      this.log(level, message, errorOrContext);
    }
  }

  /**
   * Core logging method
   */
  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): void {
    if (!shouldLog(level, this.level)) {
      return;
    }

    const merged = { ...this.config.bindings, ...context };

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
      source: this.config.source,
      error: error ? formatError(error) : undefined,
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.COMPACT:
        return this.formatCompact(entry);
      case LogFormat.PRETTY:
        return this.formatPretty(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(LogLevelName[entry.level].padEnd(5));

    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      message: entry.message,
      source: entry.source,
      context: entry.context,
      error: entry.error,
    });
  }

  /**
   * Format as compact (one-liner)
   */
  private formatCompact(entry: LogEntry): string {
    const levelName = LogLevelName[entry.level].charAt(0);
    const time = entry.timestamp.toISOString().slice(11, 19); // HH:MM:SS
    return `${time} ${levelName} ${entry.message}`;
  }

  private formatPretty(entry: LogEntry): string {
    if (!this.config.colors) {
      return this.formatText(entry);
    }

    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(
        `${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`
      );
    }

    parts.push(
      `${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`
    );

    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(
        `${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`
      );
    }

    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack) {
        parts.push(
          `\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`
        );
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (this.config.console) {
      if (level === LogLevelEnum.ERROR) {
        console.error(formatted);
      } else if (level === LogLevelEnum.WARN) {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config, level: this.level };
  }
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a logger with a specific source
 */
export function createLogger(
  source: string,
  config?: Partial<LoggerConfig>
): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Create a logger that discards everything. Used as the default collaborator
 * when a service is constructed without one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false });
}
