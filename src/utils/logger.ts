/**
 * Logger Utility
 *
 * A configurable logging system with multiple verbosity levels.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Tracing information, e.g. catalog cache misses.
 *   - INFO  (1): Routine operational events. Default level.
 *   - WARN  (2): Recoverable problems, e.g. a corrupt catalog replaced by identity translation.
 *   - ERROR (3): Failures that stop an operation from completing.
 *
 * CONFIGURATION:
 *   Set LOG_LEVEL to debug, info, warn or error.
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('CATALOG');
 *   log.info('Catalog loaded', { locale: 'fr', entries: 42 });
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] [REQ_ID] Message key=value key=value
 *
 * REQUEST CONTEXT:
 *   Inside a request (see requestLogger) the request ID is added to every
 *   entry, and once the i18n middleware has bound the request its locale is
 *   added to the context as well.
 */

import { requestContext } from './requestContext';
import { i18nContext } from '../i18n/i18nContext';
import { safeError } from './errors';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export type LogContext = Record<string, unknown>;

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && LOG_LEVEL_MAP[envLevel] !== undefined
    ? LOG_LEVEL_MAP[envLevel]
    : LogLevel.INFO;
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

const log = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const timestamp = new Date().toISOString();

  const requestId = requestContext.get()?.requestId;
  const requestIdStr = requestId ? ` ${colors.dim}[${requestId}]${colors.reset}` : '';

  const locale = i18nContext.getLocale();
  const enrichedContext: LogContext = {
    ...context,
    ...(locale && context?.locale === undefined ? { locale } : {}),
  };
  const contextStr = formatContext(enrichedContext);

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset}${requestIdStr} ${message}${contextStr}`
  );
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'I18N', 'HTTP')
 *
 * @example
 * const log = createLogger('LOCALE_API');
 * log.warn('Unsupported locale requested', { locale: 'xx' });
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message, context) => {
      log(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message, context) => {
      log(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message, context) => {
      log(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message, context) => {
      log(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

export const logger = createLogger('APP');

/**
 * Update log level at runtime
 *
 * @example
 * setLogLevel('debug');
 * setLogLevel(LogLevel.WARN);
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Current log level as a string ('debug', 'info', 'warn' or 'error')
 */
export const getConfiguredLogLevel = (): string => {
  const current = Object.entries(LOG_LEVEL_MAP).find(([, v]) => v === currentLogLevel);
  return current ? current[0] : 'info';
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await readCatalog();
 * } catch (error) {
 *   log.warn('Catalog read failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  const safe = safeError(error);
  return {
    error: safe.message,
    ...(safe.name && safe.name !== 'Error' ? { errorName: safe.name } : {}),
  };
}

export interface Timer {
  /** Elapsed time in milliseconds */
  elapsed(): number;
  /** Elapsed time as "1.23s" or "456ms" */
  elapsedFormatted(): string;
}

export function createTimer(): Timer {
  const startTime = Date.now();

  const elapsed = (): number => Date.now() - startTime;

  const elapsedFormatted = (): string => {
    const ms = elapsed();
    return ms >= 1000 ? `${(ms / 1000).toFixed(2)}s` : `${ms}ms`;
  };

  return { elapsed, elapsedFormatted };
}

export default logger;
