/**
 * Retrying Caller Module
 *
 * Rate-limit aware retry with bounded exponential backoff for remote
 * LLM API calls.
 */

export {
  RetryingCaller,
  withRateLimitRetries,
} from './retrying-caller.js';
export type {
  AttemptContext,
  RemoteOperation,
  ExecuteOptions,
  ExecutionResult,
  RetryingCallerDependencies,
} from './retrying-caller.js';

export {
  DEFAULT_RETRY_POLICY,
  MAX_DELAY_SECONDS,
  InvalidRetryPolicyError,
  createRetryPolicy,
  validateRetryPolicy,
  delayFor,
  retryDelaysFor,
} from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';

export { success, failure, recordedDelays } from './call-outcome.js';
export type {
  FailureKind,
  CallOutcome,
  SuccessOutcome,
  FailureOutcome,
  AttemptRecord,
  AttemptLog,
} from './call-outcome.js';

export { classifyFailure, classifyByMessage, errorMessage } from './classify-failure.js';
export type { FailureClassifier } from './classify-failure.js';

export {
  RateLimitedError,
  TerminalFailureError,
  CancelledError,
} from './errors.js';
export type { TerminalFailureReason } from './errors.js';

export { sleep, systemSleeper, systemClock, MAX_TIMER_DELAY_MS } from './sleeper.js';
export type { Sleeper, Clock } from './sleeper.js';
