/**
 * Logger Factory
 *
 * Component-scoped Pino child loggers and the shared log patterns.
 */

import type { Logger } from 'pino';
import { logger as baseLogger } from './logger.js';

export type ServiceLogger = Logger;

/**
 * Create a logger bound to a component name
 *
 * @param serviceName - e.g. 'RetryingCaller', 'ResumeParser'
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('RetryingCaller');
 * logger.warn({ attempt: 1 }, 'Rate limit hit');
 * // {"level":"warn","service":"RetryingCaller","attempt":1,"msg":"Rate limit hit"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns
 *
 * Keep method-level logs uniform across components.
 */
export const LogPatterns = {
  /**
   * Log method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'execute', { maxAttempts: 3 });
   * // {"level":"debug","service":"...","method":"execute","params":{"maxAttempts":3},"msg":"Entering execute"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log method exit (debug level). Keep `result` to a small summary.
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log method error (error level) with message, name and stack
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },
};

/**
 * Shorter alias for LogPatterns
 */
export const log = LogPatterns;
