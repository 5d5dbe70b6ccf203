/**
 * Time seams for RetryingCaller
 *
 * The real implementations sit behind small interfaces so tests can swap in
 * a fake and assert exact delays without waiting.
 */

export interface Sleeper {
  /**
   * Wait `ms` milliseconds
   *
   * Must reject if `signal` is (or becomes) aborted before the wait ends.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
}

/**
 * Longest delay a Node timer honors; larger values fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Sleep for specified milliseconds, interruptible through an AbortSignal
 *
 * @returns Promise that resolves after the delay, or rejects with
 * `signal.reason` when aborted
 * @throws RangeError (as a rejection) if `ms` is negative, non-finite or
 * above MAX_TIMER_DELAY_MS
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!Number.isFinite(ms) || ms < 0 || ms > MAX_TIMER_DELAY_MS) {
      reject(new RangeError(`Sleep duration must be between 0 and ${MAX_TIMER_DELAY_MS}ms (got ${ms})`));
      return;
    }

    if (!signal) {
      setTimeout(() => resolve(), ms);
      return;
    }

    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemSleeper: Sleeper = { sleep };

export const systemClock: Clock = { now: () => Date.now() };
