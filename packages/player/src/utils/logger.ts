/**
 * Structured Logger Utility
 * Uses Pino for structured logging
 */

import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Create a root logger. Pretty printing is disabled in production and test so
 * the output stays machine readable.
 */
export function createRootLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'spindle',
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test'
      ? {}
      : {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          },
        }),
  });
}

/**
 * Create child logger with additional context
 */
export function createLogger(context: Record<string, unknown>, parent: Logger): Logger {
  return parent.child(context);
}

/**
 * Log errors with context
 */
export function logError(
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  log.error(
    {
      type: 'error',
      error: error instanceof Error ? error.message : String(error),
      code: hasCode(error) ? error.code : undefined,
      stack: error instanceof Error ? error.stack : undefined,
      ...context,
    },
    message
  );
}

function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
