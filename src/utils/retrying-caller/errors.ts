/**
 * Retrying Caller Errors
 *
 * RateLimitedError is thrown by operations; the others are raised by
 * RetryingCaller itself and carry the attempt log for diagnostics.
 */

import type { AttemptRecord } from './call-outcome.js';

/**
 * Error an operation throws when the remote service signals throttling
 * (HTTP 429 or an equivalent provider code)
 */
export class RateLimitedError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

export type TerminalFailureReason = 'attempts_exhausted' | 'budget_exhausted';

/**
 * Error thrown when the call is still rate limited and no retry is left
 */
export class TerminalFailureError extends Error {
  public readonly attemptLog: readonly AttemptRecord<unknown>[];

  constructor(
    public readonly attempts: number,
    public readonly lastMessage: string,
    attemptLog: readonly AttemptRecord<unknown>[],
    public readonly reason: TerminalFailureReason = 'attempts_exhausted',
    budgetSeconds?: number
  ) {
    super(
      reason === 'budget_exhausted'
        ? `Retry budget of ${budgetSeconds}s exhausted after ${attempts} attempt(s): ${lastMessage}`
        : `Rate limited after ${attempts} attempt(s): ${lastMessage}`
    );
    this.name = 'TerminalFailureError';
    this.attemptLog = [...attemptLog];
  }
}

/**
 * Error thrown when the caller aborts the call, e.g. during a backoff wait
 */
export class CancelledError extends Error {
  public readonly attemptLog: readonly AttemptRecord<unknown>[];

  constructor(
    public readonly attempts: number,
    attemptLog: readonly AttemptRecord<unknown>[],
    reason?: unknown
  ) {
    super(`Call cancelled after ${attempts} attempt(s)`, { cause: reason });
    this.name = 'CancelledError';
    this.attemptLog = [...attemptLog];
  }
}
