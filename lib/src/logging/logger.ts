/**
 * Logger Implementation
 *
 * Leveled, structured logger with text/json/compact/pretty output,
 * child loggers and bound context.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LoggerConfigInput,
  LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  LogFormat,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  loggerConfigFromEnv,
} from './types.js';

export type LogContext = Record<string, unknown>;

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: LoggerConfig;

  constructor(config?: LoggerConfigInput) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger. The source is appended (`parent:child`) and the
   * given bindings are merged over the parent's.
   *
   * @example
   * ```typescript
   * const runLogger = logger.child('orchestrator', { runId: 'run-1' });
   * runLogger.info('route', { decision: 'USE_LOCAL_STORE' });
   * ```
   */
  child(source: string, bindings?: LogContext): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  error(message: string, context?: LogContext): void;
  error(message: string, error: unknown, context?: LogContext): void;
  error(message: string, errorOrContext?: unknown, context?: LogContext): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevel.ERROR, message, context, errorOrContext);
      return;
    }
    if (isLogContext(errorOrContext)) {
      this.log(LogLevel.ERROR, message, errorOrContext);
      return;
    }
    // non-Error throwables are still reported as errors
    this.log(LogLevel.ERROR, message, context, errorOrContext);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config = { ...this.config, level };
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const merged = { ...this.config.bindings, ...context };
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
        return this.formatJson(entry);
      case LogFormat.COMPACT:
        return this.formatCompact(entry);
      case LogFormat.PRETTY:
        return this.config.colors ? this.formatPretty(entry) : this.formatText(entry);
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

  private formatCompact(entry: LogEntry): string {
    const initial = LogLevelName[entry.level].charAt(0);
    const time = entry.timestamp.toISOString().slice(11, 19);
    return `${time} ${initial} ${entry.message}`;
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`);
    }
    parts.push(
      `${LogLevelColors[entry.level]}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`
    );
    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }
    parts.push(entry.message);
    if (entry.context) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }
    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack && this.config.level >= LogLevel.DEBUG) {
        parts.push(`\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`);
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
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

function isLogContext(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

/**
 * Process-wide logger configured from `LOG_LEVEL` / `LOG_FORMAT`.
 */
export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(loggerConfigFromEnv());
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Child of the global logger for one module.
 */
export function createLogger(source: string, bindings?: LogContext): Logger {
  return getGlobalLogger().child(source, bindings);
}

/**
 * Logger that discards everything; the default for library classes
 * constructed without one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false });
}
