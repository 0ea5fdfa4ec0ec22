import { describe, expect, test } from 'vitest';
import { TimeoutError } from '../../errors.ts';
import { KeyedMutex } from './KeyedMutex.ts';
import { sleep } from './retry.ts';

describe('KeyedMutex', () => {
  test('serializes holders of the same key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const hold = (name: string, ms: number) =>
      mutex.runExclusive(
        'sandbox-1',
        async () => {
          events.push(`${name}:in`);
          await sleep(ms);
          events.push(`${name}:out`);
        },
        1000,
      );

    await Promise.all([hold('a', 10), hold('b', 1), hold('c', 1)]);
    expect(events).toEqual(['a:in', 'a:out', 'b:in', 'b:out', 'c:in', 'c:out']);
  });

  test('different keys do not wait for each other', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    await Promise.all([
      mutex.runExclusive(
        'a',
        async () => {
          await sleep(20);
          events.push('a');
        },
        1000,
      ),
      mutex.runExclusive(
        'b',
        async () => {
          events.push('b');
        },
        1000,
      ),
    ]);
    expect(events).toEqual(['b', 'a']);
  });

  test('releases the key when the holder throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive(
        'k',
        async () => {
          throw new Error('boom');
        },
        1000,
      ),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('k', async () => 'next', 1000)).resolves.toBe('next');
  });

  test('gives up waiting after the acquire timeout', async () => {
    const mutex = new KeyedMutex();
    const holder = mutex.runExclusive('k', () => sleep(50), 1000);
    await expect(mutex.runExclusive('k', async () => 'late', 5)).rejects.toThrow(TimeoutError);
    await holder;
  });

  test('drops keys nobody holds', async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive('k', async () => undefined, 1000);
    await sleep(0);
    expect(mutex.isLocked('k')).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
