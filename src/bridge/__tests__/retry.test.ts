import { afterEach, describe, expect, it, vi } from 'vitest';

import { withRetry, withTimeout } from '../retry.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 100, () => new Error('late'))).resolves.toBe(7);
  });

  it('passes through an early failure', async () => {
    await expect(withTimeout(Promise.reject(new Error('broken')), 100, () => new Error('late'))).rejects.toThrow(
      'broken',
    );
  });

  it('rejects with the timeout error when the promise is too slow', async () => {
    vi.useFakeTimers();
    const pending = new Promise<number>(() => undefined);

    const result = withTimeout(pending, 50, () => new Error('late'));
    const assertion = expect(result).rejects.toThrow('late');
    await vi.advanceTimersByTimeAsync(50);

    await assertion;
  });
});

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    const attempts: number[] = [];
    const operation = async (attempt: number) => {
      attempts.push(attempt);
      if (attempt < 2) {
        throw new Error(`attempt ${attempt} failed`);
      }
      return 'done';
    };

    await expect(withRetry(operation, { retries: 2, retryDelayMs: 0 })).resolves.toBe('done');
    expect(attempts).toEqual([0, 1, 2]);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const operation = vi.fn(async (attempt: number) => {
      throw new Error(`attempt ${attempt} failed`);
    });

    await expect(withRetry(operation, { retries: 1, retryDelayMs: 0 })).rejects.toThrow('attempt 1 failed');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('backs off exponentially between attempts', async () => {
    const startedAt = Date.now();
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 2) {
        throw new Error('busy');
      }
      return Date.now() - startedAt;
    });

    const elapsed = await withRetry(operation, { retries: 2, retryDelayMs: 10 });

    expect(elapsed).toBeGreaterThanOrEqual(29);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(withRetry(operation, { retries: 3, retryDelayMs: 0, signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it('stops waiting as soon as the signal aborts during a backoff', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      setTimeout(() => controller.abort(), 10);
      throw new Error('busy');
    });
    const startedAt = Date.now();

    await expect(
      withRetry(operation, { retries: 3, retryDelayMs: 10_000, signal: controller.signal }),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
