/**
 * Base Logger Configuration
 *
 * Pino logger with environment-based level selection. Emits JSON lines with
 * ISO timestamps and label levels.
 *
 * Environment Variables (optional):
 * - LOG_LEVEL - explicit Pino level, wins over NODE_ENV
 * - NODE_ENV  - development (debug), production (info), test (silent)
 */

import pino from 'pino';

const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

function isKnownEnvironment(env: string): env is keyof typeof LOG_LEVELS {
  return Object.hasOwn(LOG_LEVELS, env);
}

const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL || (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : 'info');

const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Process-wide base logger
 *
 * Components should not log through it directly; use createServiceLogger()
 * from logger-factory.ts to get a child carrying the component name.
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
