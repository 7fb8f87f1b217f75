/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * Stack traces are only attached at debug level.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

let currentLevel: LogLevel = initialLevel();

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    reportType: reqContext?.reportType,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function serializeError(error: unknown): unknown {
  if (!(error instanceof Error)) {
    return error === undefined ? undefined : String(error);
  }
  return {
    message: error.message,
    name: error.name,
    ...(enabled('debug') ? { stack: error.stack } : {}),
  };
}

export const logger = {
  setLevel: (level: LogLevel) => {
    currentLevel = level;
  },

  info: (message: string, context?: LogContext) => {
    if (enabled('info')) {
      console.log(formatLog('INFO', message, context));
    }
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) {
      console.warn(formatLog('WARN', message, context));
    }
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error: serializeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
