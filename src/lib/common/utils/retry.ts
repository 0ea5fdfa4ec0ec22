import type { RetryPolicy } from '../../config.ts';
import { TimeoutError } from '../../errors.ts';

export type { RetryPolicy };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before attempt `attempt + 1` (attempts are 1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * policy.backoffFactor ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Races a promise against a timer. The timer is always cleared; the underlying
 * work is not cancelled, so callers must make it safe to finish late.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(`${label} timed out after ${ms}ms`, { timeout_ms: ms })),
      ms,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `fn` until it resolves or the policy's attempts are used up; rethrows the last error.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  shouldRetry: (err: unknown) => boolean = () => true,
): Promise<T> {
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || !shouldRetry(err)) throw err;
      await sleep(backoffDelay(policy, attempt));
    }
  }
}

export interface PollOutcome {
  ok: boolean;
  attempts: number;
  elapsedMs: number;
}

/**
 * Polls `check` with exponential backoff until it returns true, the attempts run out,
 * or `budgetMs` is spent. A check that throws counts as a negative answer.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  policy: RetryPolicy,
  budgetMs: number,
): Promise<PollOutcome> {
  const startedAt = Date.now();
  let attempts = 0;

  while (attempts < policy.maxAttempts) {
    attempts++;
    let ok = false;
    try {
      ok = await check();
    } catch {
      ok = false;
    }
    const elapsedMs = Date.now() - startedAt;
    if (ok) return { ok: true, attempts, elapsedMs };
    if (elapsedMs >= budgetMs || attempts >= policy.maxAttempts) break;
    await sleep(Math.min(backoffDelay(policy, attempts), budgetMs - elapsedMs));
  }

  return { ok: false, attempts, elapsedMs: Date.now() - startedAt };
}
