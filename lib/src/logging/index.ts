/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogEntrySchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  type LoggerConfig,
  type LoggerConfigInput,
  createDefaultLoggerConfig,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  shouldLog,
  formatError,
  loggerConfigFromEnv,
} from './types.js';

export {
  Logger,
  type LogContext,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
  createSilentLogger,
} from './logger.js';
