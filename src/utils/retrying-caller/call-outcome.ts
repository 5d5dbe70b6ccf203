/**
 * Per-attempt outcomes and the attempt log RetryingCaller fills in.
 *
 * A log belongs to exactly one invocation and is dropped once the caller
 * has read the result.
 */

/**
 * How a failed attempt is treated: only RateLimited is retried
 */
export type FailureKind = 'RateLimited' | 'OtherError';

export interface SuccessOutcome<T> {
  readonly type: 'success';
  readonly value: T;
}

export interface FailureOutcome {
  readonly type: 'failure';
  readonly kind: FailureKind;
  readonly message: string;
}

export type CallOutcome<T> = SuccessOutcome<T> | FailureOutcome;

export interface AttemptRecord<T = unknown> {
  /** 1-based */
  readonly attemptNumber: number;
  readonly outcome: CallOutcome<T>;
  /** Set only when a wait followed this attempt */
  readonly delayBeforeNextSeconds?: number;
}

export type AttemptLog<T = unknown> = AttemptRecord<T>[];

export function success<T>(value: T): SuccessOutcome<T> {
  return { type: 'success', value };
}

export function failure(kind: FailureKind, message: string): FailureOutcome {
  return { type: 'failure', kind, message };
}

/**
 * Delays recorded in a log, in the order they were waited
 */
export function recordedDelays(attemptLog: readonly AttemptRecord<unknown>[]): number[] {
  const delays: number[] = [];
  for (const record of attemptLog) {
    if (record.delayBeforeNextSeconds !== undefined) {
      delays.push(record.delayBeforeNextSeconds);
    }
  }
  return delays;
}
