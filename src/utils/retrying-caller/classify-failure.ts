import type { FailureKind } from './call-outcome.js';
import { RateLimitedError } from './errors.js';

/**
 * Decides whether a thrown value is retryable rate limiting
 */
export type FailureClassifier = (error: unknown) => FailureKind;

// OpenAI SDK class name
const RATE_LIMIT_ERROR_NAMES = new Set(['RateLimitedError', 'RateLimitError']);

// OpenAI error codes and the Gemini status for HTTP 429.
// Quota exhaustion is treated as throttling.
const RATE_LIMIT_CODES = new Set(['rate_limit_exceeded', 'insufficient_quota', 'RESOURCE_EXHAUSTED']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isRateLimitCode(value: unknown): boolean {
  return typeof value === 'string' && RATE_LIMIT_CODES.has(value);
}

/**
 * Default classifier
 *
 * Recognizes RateLimitedError, errors named `RateLimitError`, a `status` or
 * `statusCode` of 429, and the provider codes in RATE_LIMIT_CODES.
 * Anything else is OtherError, including errors that mention throttling
 * only in their message; use classifyByMessage for those.
 */
export const classifyFailure: FailureClassifier = (error) => {
  if (error instanceof RateLimitedError) return 'RateLimited';
  if (!isRecord(error)) return 'OtherError';

  if (typeof error.name === 'string' && RATE_LIMIT_ERROR_NAMES.has(error.name)) {
    return 'RateLimited';
  }

  if (error.status === 429 || error.statusCode === 429) return 'RateLimited';

  if (isRateLimitCode(error.code) || isRateLimitCode(error.status)) return 'RateLimited';

  return 'OtherError';
};

// Markers Gemini SDK errors carry only in their message text
const RATE_LIMIT_MESSAGE_PATTERN = /\b429\b|rate[_ ]?limit|quota|RESOURCE_EXHAUSTED/i;

/**
 * classifyFailure, falling back to the error message for SDKs that report
 * throttling only as text (e.g. "429 Resource has been exhausted")
 */
export const classifyByMessage: FailureClassifier = (error) => {
  if (classifyFailure(error) === 'RateLimited') return 'RateLimited';
  return RATE_LIMIT_MESSAGE_PATTERN.test(errorMessage(error)) ? 'RateLimited' : 'OtherError';
};

/**
 * Message recorded for a failed attempt
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return String(error);
}
