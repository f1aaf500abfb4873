/**
 * Logger Utility
 *
 * Thin wrapper around Pino. Structured logs go to stderr so they never mix with
 * the operator report on stdout.
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Create a Pino logger writing to stderr
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: 'kagent-setup',
      level: 'warn',
      ...options,
    },
    pino.destination(2),
  );
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Time one pipeline step
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;
      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;
      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
