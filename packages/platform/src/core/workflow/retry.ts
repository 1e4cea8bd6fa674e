/**
 * Retry on lost races.
 *
 * Re-runs a whole unit of work when it fails with
 * ConcurrentModificationError. Attempt n (1-based) waits n × delayMs
 * before running again. Any other error, or the last conflict, is thrown
 * as-is.
 */

import { ConcurrentModificationError } from "./errors.js";

export interface RetryOptions {
  /** Additional attempts after the first */
  maxRetries: number;
  delayMs: number;
  signal?: AbortSignal;
  /** Called before each re-attempt */
  onRetry?: (attempt: number, error: ConcurrentModificationError) => void;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timer);
      reject(signal?.reason);
    }

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withConflictRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof ConcurrentModificationError) || attempt > options.maxRetries) {
        throw error;
      }
      options.onRetry?.(attempt, error);
      await delay(options.delayMs * attempt, options.signal);
    }
  }
}
