import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, client IP, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'structured-extraction-api',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
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
 * Create a child logger carrying the current request context
 */
export function createChildLogger(additionalContext: Record<string, unknown> = {}): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}
