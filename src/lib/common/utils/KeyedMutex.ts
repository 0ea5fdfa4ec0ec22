import { withTimeout } from './retry.ts';

/**
 * Per-key exclusive sections for a single process. Holders run in arrival order;
 * a waiter that gives up keeps its place in the chain so ordering is preserved.
 * Keys with no holder and no waiters are dropped from the table.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, fn: () => Promise<T>, acquireTimeoutMs: number): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await withTimeout(previous, acquireTimeoutMs, `Waiting for lock on ${key}`);
    } catch (err) {
      release();
      this.forget(key, tail);
      throw err;
    }

    try {
      return await fn();
    } finally {
      release();
      this.forget(key, tail);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }

  private forget(key: string, tail: Promise<void>): void {
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
  }
}
