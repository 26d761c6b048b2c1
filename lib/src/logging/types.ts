/**
 * Logging Types and Schemas
 *
 * Structured logging for the adaptive RAG workflow: levels, formats,
 * bound context and env-driven configuration.
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

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Per-call context merged over the logger's bindings */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Source identifier, e.g. `workflow:orchestrator` */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable text */
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

  colors: z.boolean().default(true),

  source: z.string().optional(),

  /**
   * Context attached to every entry written by this logger and its children,
   * e.g. a run id.
   */
  bindings: z.record(z.unknown()).default({}),

  console: z.boolean().default(true),

  /**
   * Custom sink; receives the formatted line instead of the console.
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: LoggerConfigInput
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

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
  TRACE: LogLevel.TRACE,
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LEVELS_BY_NAME;
}

/**
 * Parse a log level from its name. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.trim().toUpperCase();
  return isLogLevelName(normalized) ? LEVELS_BY_NAME[normalized] : LogLevel.INFO;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

export function formatError(
  error: unknown
): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Builds logger settings from `LOG_LEVEL` and `LOG_FORMAT`.
 */
export function loggerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): LoggerConfigInput {
  const format = LogFormatSchema.safeParse(env['LOG_FORMAT']?.trim().toLowerCase());

  return {
    level: env['LOG_LEVEL'] ? parseLogLevel(env['LOG_LEVEL']) : LogLevel.INFO,
    format: format.success ? format.data : LogFormat.PRETTY,
  };
}
