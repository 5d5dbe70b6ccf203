/**
 * Retry Policy
 *
 * Immutable backoff configuration for RetryingCaller, plus the pure delay
 * calculation. Nothing in this file waits or logs, so the backoff math can
 * be tested without timers.
 *
 * @example
 * ```typescript
 * const policy = createRetryPolicy({ maxAttempts: 5 });
 * delayFor(0, policy); // 1
 * delayFor(2, policy); // 4
 * ```
 */

import { MAX_TIMER_DELAY_MS } from './sleeper.js';

/**
 * Longest single backoff delay a policy may produce
 */
export const MAX_DELAY_SECONDS = MAX_TIMER_DELAY_MS / 1000;

export interface RetryPolicy {
  /**
   * Total attempts, the first call included
   * @default 3
   */
  readonly maxAttempts: number;

  /**
   * Delay before the first retry, in seconds
   * @default 1
   */
  readonly baseDelaySeconds: number;

  /**
   * Factor applied to the delay for each further retry.
   * A multiplier of 1 keeps the delay constant.
   * @default 2
   */
  readonly backoffMultiplier: number;
}

/**
 * 1s, 2s, 4s schedule across three attempts
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelaySeconds: 1,
  backoffMultiplier: 2,
});

/**
 * Error thrown when a retry policy field is out of range
 */
export class InvalidRetryPolicyError extends Error {
  constructor(
    public readonly field: keyof RetryPolicy,
    value: unknown,
    requirement: string
  ) {
    super(`Invalid retry policy: ${field} must be ${requirement} (got ${String(value)})`);
    this.name = 'InvalidRetryPolicyError';
  }
}

/**
 * Check every field of a policy
 *
 * @throws InvalidRetryPolicyError on the first field out of range
 */
export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidRetryPolicyError('maxAttempts', policy.maxAttempts, 'a positive integer');
  }

  if (!Number.isFinite(policy.baseDelaySeconds) || policy.baseDelaySeconds <= 0) {
    throw new InvalidRetryPolicyError(
      'baseDelaySeconds',
      policy.baseDelaySeconds,
      'a positive number'
    );
  }

  if (!Number.isFinite(policy.backoffMultiplier) || policy.backoffMultiplier < 1) {
    throw new InvalidRetryPolicyError(
      'backoffMultiplier',
      policy.backoffMultiplier,
      'a number >= 1'
    );
  }

  if (policy.maxAttempts > 1) {
    const longestDelay = delayFor(policy.maxAttempts - 2, policy);
    if (!(longestDelay <= MAX_DELAY_SECONDS)) {
      const field = policy.baseDelaySeconds > MAX_DELAY_SECONDS ? 'baseDelaySeconds' : 'maxAttempts';
      throw new InvalidRetryPolicyError(
        field,
        policy[field],
        `small enough to keep every delay within ${MAX_DELAY_SECONDS}s`
      );
    }
  }
}

/**
 * Build a frozen policy, taking defaults for missing fields
 *
 * @param overrides - Fields to override on DEFAULT_RETRY_POLICY
 * @throws InvalidRetryPolicyError if the resulting policy is invalid
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelaySeconds: overrides.baseDelaySeconds ?? DEFAULT_RETRY_POLICY.baseDelaySeconds,
    backoffMultiplier: overrides.backoffMultiplier ?? DEFAULT_RETRY_POLICY.backoffMultiplier,
  };

  validateRetryPolicy(policy);
  return Object.freeze(policy);
}

/**
 * Seconds to wait before retry `attemptIndex` (0 for the first retry)
 *
 * @throws RangeError if attemptIndex is not a non-negative integer
 */
export function delayFor(attemptIndex: number, policy: RetryPolicy): number {
  if (!Number.isInteger(attemptIndex) || attemptIndex < 0) {
    throw new RangeError(`attemptIndex must be a non-negative integer (got ${attemptIndex})`);
  }

  return policy.baseDelaySeconds * policy.backoffMultiplier ** attemptIndex;
}

/**
 * Every delay a policy can produce, in order
 */
export function retryDelaysFor(policy: RetryPolicy): number[] {
  return Array.from({ length: policy.maxAttempts - 1 }, (_, index) => delayFor(index, policy));
}
