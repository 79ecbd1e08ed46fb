import { createLogger } from '../utils/debug.js';

const debug = createLogger('bridge:retry');

export interface RetryOptions {
  retries: number;
  /**
   * Base delay; attempt n waits `retryDelayMs * 2^(n - 1)`.
   */
  retryDelayMs: number;
  signal?: AbortSignal;
}

/**
 * Resolves after `ms`, or rejects with the abort reason as soon as `signal` aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Rejects with `onTimeout()` when `promise` has not settled after `timeoutMs`.
 * A late rejection of the original promise is logged and dropped.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      reject(onTimeout());
    }, timeoutMs);

    promise.then(
      (value) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) {
          debug('late failure after timeout:', error);
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Calls `operation` until it resolves or `retries` extra attempts have failed, backing off
 * exponentially between attempts. The last error is rethrown.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    if (attempt > 0) {
      const delay = options.retryDelayMs * Math.pow(2, attempt - 1);
      debug(`retry ${attempt}/${options.retries} in ${delay}ms`);
      await sleep(delay, options.signal);
    }

    options.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      debug(`attempt ${attempt + 1} failed:`, error);
    }
  }

  throw lastError;
}
