import { beforeEach, describe, expect, test } from 'vitest';
import { type ShoalApp, createApp } from '../app.ts';
import { createMockOS, setOS } from '../common/os/index.ts';
import { parseConfig } from '../config.ts';
import { MockDriver } from '../driver/index.ts';
import { CapabilityNotSupportedError, NotFoundError, SessionNotReadyError } from '../errors.ts';
import { PersistenceBox } from '../persistence/index.ts';
import { MockRuntimeAdapter, RuntimeRegistry } from '../runtime/index.ts';

const T0 = new Date('2026-03-01T00:00:00.000Z');

function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

describe('CapabilityRouter', () => {
  let app: ShoalApp;
  let driver: MockDriver;
  let clock: Date;

  beforeEach(() => {
    setOS(createMockOS());
    clock = T0;
    driver = new MockDriver();
    app = createApp(
      parseConfig({
        driver: 'mock',
        databasePath: ':memory:',
        readiness: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2, backoffFactor: 2 },
        profiles: [{ id: 'python-default', idleTimeoutSeconds: 600 }],
      }),
      {
        persistence: new PersistenceBox(':memory:'),
        driver,
        runtimes: new RuntimeRegistry().register(
          'ship',
          (endpoint) => new MockRuntimeAdapter(endpoint, ['filesystem', 'python']),
        ),
        now: () => clock,
      },
    );
  });

  async function sandboxId(): Promise<string> {
    return (await app.orchestrator.create('alice', { profile: 'python-default' })).body.id;
  }

  test('starts compute on first use and returns the session', async () => {
    const id = await sandboxId();
    const session = await app.router.dispatch('alice', id, 'python');
    expect(session.sandboxId).toBe(id);
    expect(session.endpoint).toBe('mock://mock-1');
    expect(app.orchestrator.get('alice', id).status).toBe('ready');
  });

  test('fails fast on a capability the runtime lacks', async () => {
    const id = await sandboxId();
    const err = await app.router.dispatch('alice', id, 'browser').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CapabilityNotSupportedError);
    expect(err instanceof CapabilityNotSupportedError ? err.details : undefined).toEqual({
      capability: 'browser',
      available: ['filesystem', 'python'],
    });
  });

  test('answers session_not_ready during a slow cold start', async () => {
    const id = await sandboxId();
    driver.startDelayMs = 100;
    await expect(app.router.dispatch('alice', id, 'python', { waitMs: 5 })).rejects.toThrow(
      SessionNotReadyError,
    );
    await expect(app.router.dispatch('alice', id, 'python')).resolves.toMatchObject({
      sandboxId: id,
    });
    expect(driver.countCalls('start')).toBe(1);
  });

  test('each call counts as activity for the idle timeout', async () => {
    const id = await sandboxId();
    const first = await app.router.dispatch('alice', id, 'python');
    clock = at(500);
    const second = await app.router.dispatch('alice', id, 'python');
    clock = at(700);

    const results = await app.gc.runAll();

    expect(results.find((r) => r.task === 'idle-sessions')?.cleaned).toBe(0);
    expect(second.sessionId).toBe(first.sessionId);
    expect(app.orchestrator.get('alice', id).idleExpiresAt).toBe(at(1100).toISOString());
    expect(driver.countCalls('start')).toBe(1);
  });

  test('does not start sandboxes of other owners', async () => {
    const id = await sandboxId();
    await expect(app.router.dispatch('bob', id, 'python')).rejects.toThrow(NotFoundError);
    expect(driver.countCalls('start')).toBe(0);
  });
});
