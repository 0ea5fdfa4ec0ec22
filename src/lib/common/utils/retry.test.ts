import { describe, expect, test, vi } from 'vitest';
import { TimeoutError } from '../../errors.ts';
import { backoffDelay, pollUntil, withRetry, withTimeout } from './retry.ts';

const fast = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 4, backoffFactor: 2 };

describe('backoffDelay', () => {
  test('grows geometrically up to the cap', () => {
    const policy = { maxAttempts: 10, initialDelayMs: 100, maxDelayMs: 500, backoffFactor: 2 };
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt))).toEqual([
      100, 200, 400, 500,
    ]);
  });
});

describe('withTimeout', () => {
  test('resolves when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'fast')).resolves.toBe('ok');
  });

  test('rejects with TimeoutError when the timer wins', async () => {
    const never = new Promise<string>(() => {});
    await expect(withTimeout(never, 5, 'slow op')).rejects.toThrow(TimeoutError);
    await expect(withTimeout(never, 5, 'slow op')).rejects.toThrow('slow op timed out after 5ms');
  });
});

describe('withRetry', () => {
  test('retries until success', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValueOnce('second');
    await expect(withRetry(fn, fast)).resolves.toBe('second');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(2);
  });

  test('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`attempt ${attempt}`);
    });
    await expect(withRetry(fn, fast)).rejects.toThrow('attempt 3');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('stops early when the error is not retryable', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });
    await expect(withRetry(fn, fast, () => false)).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('pollUntil', () => {
  test('reports the attempt that succeeded', async () => {
    let calls = 0;
    const outcome = await pollUntil(async () => ++calls === 3, fast, 1000);
    expect(outcome.ok).toBe(true);
    expect(outcome.attempts).toBe(3);
  });

  test('treats a throwing check as not ready', async () => {
    const outcome = await pollUntil(
      async () => {
        throw new Error('connection refused');
      },
      fast,
      1000,
    );
    expect(outcome).toMatchObject({ ok: false, attempts: 3 });
  });

  test('stops when the budget is spent', async () => {
    const policy = { maxAttempts: 100, initialDelayMs: 20, maxDelayMs: 20, backoffFactor: 1 };
    const outcome = await pollUntil(async () => false, policy, 30);
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBeLessThan(100);
  });
});
