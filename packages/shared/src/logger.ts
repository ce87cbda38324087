/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context
 */

import { getCorrelationId, getContext } from './context';
import { config, type LogLevel } from './config';

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[config.logLevel];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    filename: reqContext?.filename,
    model: reqContext?.model,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
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
    if (!enabled('error')) {
      return;
    }
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
