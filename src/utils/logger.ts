/**
 * Logger Utility
 *
 * Leveled, module-prefixed logging for the rate limiter.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Per-request tracing (resolved keys, rejected requests).
 *   - INFO  (1): Startup and state changes. Default level.
 *   - WARN  (2): Store failovers and recoverable faults.
 *   - ERROR (3): Failures that prevent an operation from completing.
 *
 * Set LOG_LEVEL=debug|info|warn|error to control verbosity, or call
 * setLogLevel() at runtime.
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] Message key=value key=value
 *
 *   [2024-01-15T10:30:45.123Z] WARN  [RATELIMIT] Redis store failed, using memory key=user:42
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('RATELIMIT');
 *   log.info('Store health changed', { from: 'healthy', to: 'degraded' });
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && envLevel in LOG_LEVEL_MAP) {
    return LOG_LEVEL_MAP[envLevel];
  }
  return LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Format context object as key=value pairs
 */
const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  const formatted = Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` ${colors.dim}${formatted}${colors.reset}`;
};

const write = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const timestamp = new Date().toISOString();

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset} ${message}${formatContext(context)}`
  );
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a module prefix (e.g. 'RATELIMIT', 'REDIS')
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message, context) => {
      write(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message, context) => {
      write(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message, context) => {
      write(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message, context) => {
      write(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

export const logger = createLogger('APP');

/**
 * Update log level at runtime. Unknown level names are ignored.
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const normalized = level.toLowerCase();
    if (normalized in LOG_LEVEL_MAP) {
      currentLogLevel = LOG_LEVEL_MAP[normalized];
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await redis.ping();
 * } catch (error) {
 *   log.warn('Probe failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  if (error instanceof Error) {
    return {
      error: error.message,
      ...(error.name !== 'Error' ? { errorName: error.name } : {}),
    };
  }
  if (typeof error === 'string') {
    return { error };
  }
  return { error: String(error) };
}

export default logger;
