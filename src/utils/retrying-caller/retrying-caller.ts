/**
 * RetryingCaller
 *
 * Wraps a single remote call (typically an LLM completion request) and
 * retries it while the remote service reports rate limiting, using bounded
 * exponential backoff.
 *
 * Features:
 * - Only rate limiting is retried; any other failure is rethrown as is
 * - Fixed exponential delays, no jitter: base * multiplier^retryIndex
 * - Per-invocation attempt log for diagnostics and tests
 * - Interruptible waits through AbortSignal
 * - Optional overall wall-clock budget
 *
 * @example
 * ```typescript
 * const caller = new RetryingCaller();
 *
 * const parsed = await caller.execute(
 *   () => llm.chat.completions.create({ model, messages }),
 *   createRetryPolicy({ maxAttempts: 3 })
 * );
 * ```
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { failure, success } from './call-outcome.js';
import type { AttemptLog, AttemptRecord } from './call-outcome.js';
import { classifyFailure, errorMessage } from './classify-failure.js';
import type { FailureClassifier } from './classify-failure.js';
import { CancelledError, TerminalFailureError } from './errors.js';
import { DEFAULT_RETRY_POLICY, delayFor, validateRetryPolicy } from './retry-policy.js';
import type { RetryPolicy } from './retry-policy.js';
import { systemClock, systemSleeper } from './sleeper.js';
import type { Clock, Sleeper } from './sleeper.js';

/**
 * Passed to the operation on every attempt
 */
export interface AttemptContext {
  /** 1-based number of the attempt about to run */
  attemptNumber: number;
  /** Forwarded from ExecuteOptions so the operation can abort its own request */
  signal?: AbortSignal;
}

/**
 * One remote call attempt. Zero-argument functions are accepted.
 */
export type RemoteOperation<T> = (context: AttemptContext) => Promise<T>;

export interface ExecuteOptions<T = unknown> {
  /**
   * Aborting interrupts a pending wait and rejects with CancelledError
   */
  signal?: AbortSignal;

  /**
   * Array to record attempts into. Lets `execute` callers read the log
   * after the call settles, including after a rethrown OtherError.
   */
  attemptLog?: AttemptLog<T>;

  /**
   * Overall wall-clock budget in seconds. No wait is started that would
   * end past it.
   */
  maxElapsedSeconds?: number;

  /**
   * Operation name for logging
   * @default 'operation'
   */
  label?: string;
}

export interface ExecutionResult<T> {
  value: T;
  attempts: number;
  attemptLog: AttemptLog<T>;
}

export interface RetryingCallerDependencies {
  /**
   * Performs the backoff waits
   * @default systemSleeper
   */
  sleeper?: Sleeper;

  /**
   * Time source for the elapsed budget
   * @default systemClock
   */
  clock?: Clock;

  /**
   * Maps a thrown value to RateLimited or OtherError
   * @default classifyFailure
   */
  classify?: FailureClassifier;

  /**
   * Logger service name
   * @default 'RetryingCaller'
   */
  name?: string;
}

type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export class RetryingCaller {
  private readonly sleeper: Sleeper;
  private readonly clock: Clock;
  private readonly classify: FailureClassifier;
  private readonly logger: ServiceLogger;

  constructor(dependencies: RetryingCallerDependencies = {}) {
    this.sleeper = dependencies.sleeper ?? systemSleeper;
    this.clock = dependencies.clock ?? systemClock;
    this.classify = dependencies.classify ?? classifyFailure;
    this.logger = createServiceLogger(dependencies.name ?? 'RetryingCaller');
  }

  /**
   * Run `operation`, retrying while it is rate limited
   *
   * @returns The operation's value from the first successful attempt
   * @throws TerminalFailureError when still rate limited after the last attempt
   * @throws CancelledError when `options.signal` aborts the call
   * @throws InvalidRetryPolicyError before any attempt if the policy is invalid
   * @throws The operation's own error, unchanged, for any non rate-limit failure
   */
  async execute<T>(
    operation: RemoteOperation<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: ExecuteOptions<T> = {}
  ): Promise<T> {
    const { value } = await this.executeWithLog(operation, policy, options);
    return value;
  }

  /**
   * Same as `execute`, also resolving the attempt count and log
   */
  async executeWithLog<T>(
    operation: RemoteOperation<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: ExecuteOptions<T> = {}
  ): Promise<ExecutionResult<T>> {
    validateRetryPolicy(policy);

    const { signal, maxElapsedSeconds, label = 'operation' } = options;
    const attemptLog: AttemptLog<T> = options.attemptLog ?? [];
    const startedAt = this.clock.now();

    log.methodEntry(this.logger, 'execute', {
      label,
      maxAttempts: policy.maxAttempts,
      baseDelaySeconds: policy.baseDelaySeconds,
      backoffMultiplier: policy.backoffMultiplier,
      maxElapsedSeconds,
    });

    for (let attemptNumber = 1; ; attemptNumber++) {
      if (signal?.aborted) {
        throw this.cancelled(label, attemptNumber - 1, attemptLog, signal.reason);
      }

      const result = await this.attempt(operation, { attemptNumber, signal });

      if (result.ok) {
        attemptLog.push({ attemptNumber, outcome: success(result.value) });
        log.methodExit(this.logger, 'execute', { label, attempts: attemptNumber });
        return { value: result.value, attempts: attemptNumber, attemptLog };
      }

      const kind = this.classify(result.error);
      const message = errorMessage(result.error);
      const outcome = failure(kind, message);

      if (kind === 'OtherError') {
        attemptLog.push({ attemptNumber, outcome });
        log.methodError(
          this.logger,
          'execute',
          result.error instanceof Error ? result.error : new Error(message),
          { label, attempt: attemptNumber, retryable: false }
        );
        throw result.error;
      }

      // Rate limited: an abort wins over a retry
      if (signal?.aborted) {
        attemptLog.push({ attemptNumber, outcome });
        throw this.cancelled(label, attemptNumber, attemptLog, signal.reason);
      }

      if (attemptNumber >= policy.maxAttempts) {
        attemptLog.push({ attemptNumber, outcome });
        this.logger.error(
          { label, attempts: attemptNumber, maxAttempts: policy.maxAttempts, message },
          'All retry attempts exhausted while rate limited'
        );
        throw new TerminalFailureError(attemptNumber, message, attemptLog);
      }

      const delaySeconds = delayFor(attemptNumber - 1, policy);

      if (maxElapsedSeconds !== undefined) {
        const elapsedSeconds = (this.clock.now() - startedAt) / 1000;
        if (elapsedSeconds + delaySeconds > maxElapsedSeconds) {
          attemptLog.push({ attemptNumber, outcome });
          this.logger.error(
            { label, attempts: attemptNumber, elapsedSeconds, delaySeconds, maxElapsedSeconds },
            'Retry budget exhausted while rate limited'
          );
          throw new TerminalFailureError(
            attemptNumber,
            message,
            attemptLog,
            'budget_exhausted',
            maxElapsedSeconds
          );
        }
      }

      attemptLog.push({ attemptNumber, outcome, delayBeforeNextSeconds: delaySeconds });

      this.logger.warn(
        { label, attempt: attemptNumber, maxAttempts: policy.maxAttempts, delaySeconds, message },
        `Rate limit hit, retrying in ${delaySeconds}s (attempt ${attemptNumber}/${policy.maxAttempts})`
      );

      try {
        await this.sleeper.sleep(delaySeconds * 1000, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw this.cancelled(label, attemptNumber, attemptLog, signal.reason);
        }
        throw error;
      }
    }
  }

  private async attempt<T>(
    operation: RemoteOperation<T>,
    context: AttemptContext
  ): Promise<AttemptResult<T>> {
    try {
      return { ok: true, value: await operation(context) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private cancelled(
    label: string,
    attempts: number,
    attemptLog: readonly AttemptRecord<unknown>[],
    reason: unknown
  ): CancelledError {
    this.logger.warn({ label, attempts }, 'Call cancelled, not retrying');
    return new CancelledError(attempts, attemptLog, reason);
  }
}

const defaultCaller = new RetryingCaller();

/**
 * Run an operation through a shared default RetryingCaller
 *
 * @example
 * ```typescript
 * const analysis = await withRateLimitRetries(() => analyzeResume(job, resume));
 * ```
 */
export function withRateLimitRetries<T>(
  operation: RemoteOperation<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: ExecuteOptions<T> = {}
): Promise<T> {
  return defaultCaller.execute(operation, policy, options);
}
