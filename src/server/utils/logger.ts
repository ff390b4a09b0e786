import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, job ID, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLogLevel(): LevelWithSilent {
  const configured = LOG_LEVELS.find((level) => level === process.env.LOG_LEVEL);
  if (configured) {
    return configured;
  }
  switch (process.env.NODE_ENV) {
    case 'test':
      return 'silent';
    case 'production':
      return 'info';
    default:
      return 'debug';
  }
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';
  const usePretty = isDevelopment && process.env.LOG_PRETTY !== 'false';

  return pino({
    level: resolveLogLevel(),
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'site-knowledge-explorer',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(usePretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context (component, jobId, ...)
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}
