/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with the redaction paths every invocation needs
 */

import pino from 'pino';
import { redactSecrets } from './redact';

export type { Logger } from 'pino';

/**
 * Fields that may carry credential material anywhere in a log object
 */
export const REDACT_PATHS = [
  'token',
  'authToken',
  'kubeConfig',
  'credentials',
  '*.token',
  '*.authToken',
  '*.kubeConfig',
  '*.credentials',
  'context.authToken',
  'context.kubeConfig',
];

/**
 * Create a Pino logger for the controller
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  // The CLI prints the envelope on stdout, so logs go to stderr there
  const toStderr = process.env.LOG_DESTINATION === 'stderr';

  return pino(
    {
      name: 'cluster-action-controller',
      level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
      ...options,
    },
    toStderr ? pino.destination(2) : undefined,
  );
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
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
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: redactSecrets(error instanceof Error ? error.message : String(error)),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
