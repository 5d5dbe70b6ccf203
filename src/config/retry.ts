/**
 * Retry Policy Configuration
 *
 * Builds the RetryPolicy used for LLM calls from the environment.
 *
 * Environment Variables (optional):
 * - LLM_RETRY_MAX_ATTEMPTS        - total attempts (default 3)
 * - LLM_RETRY_BASE_DELAY_SECONDS  - first backoff delay (default 1)
 * - LLM_RETRY_BACKOFF_MULTIPLIER  - growth per retry (default 2)
 *
 * Unset or blank variables fall back to DEFAULT_RETRY_POLICY.
 */

import {
  InvalidRetryPolicyError,
  createRetryPolicy,
  type RetryPolicy,
} from '../utils/retrying-caller/index.js';

export const RETRY_POLICY_ENV_VARS: Readonly<Record<keyof RetryPolicy, string>> = {
  maxAttempts: 'LLM_RETRY_MAX_ATTEMPTS',
  baseDelaySeconds: 'LLM_RETRY_BASE_DELAY_SECONDS',
  backoffMultiplier: 'LLM_RETRY_BACKOFF_MULTIPLIER',
};

function readNumber(
  env: NodeJS.ProcessEnv,
  field: keyof RetryPolicy
): number | undefined {
  const raw = env[RETRY_POLICY_ENV_VARS[field]]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidRetryPolicyError(field, raw, 'numeric');
  }
  return value;
}

/**
 * Get the retry policy configured in the environment
 *
 * @throws InvalidRetryPolicyError if a variable is not numeric or out of range
 */
export function getRetryPolicyFromEnv(env: NodeJS.ProcessEnv = process.env): RetryPolicy {
  return createRetryPolicy({
    maxAttempts: readNumber(env, 'maxAttempts'),
    baseDelaySeconds: readNumber(env, 'baseDelaySeconds'),
    backoffMultiplier: readNumber(env, 'backoffMultiplier'),
  });
}
