import { beforeEach, describe, expect, test } from 'vitest';
import { createMockOS, setOS } from '../common/os/index.ts';
import { PersistenceBox, type SandboxRecord, type SessionRecord, type WorkspaceRecord } from './index.ts';

const T0 = new Date('2026-01-01T00:00:00.000Z');

function workspace(id: string, overrides: Partial<WorkspaceRecord> = {}): WorkspaceRecord {
  return {
    id,
    owner: 'alice',
    managed: true,
    managedBySandboxId: null,
    volumeRef: `vol-${id}`,
    sizeLimitMb: 1024,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

function sandbox(id: string, overrides: Partial<SandboxRecord> = {}): SandboxRecord {
  return {
    id,
    owner: 'alice',
    profileId: 'python-default',
    workspaceId: 'ws-1',
    expiresAt: null,
    deletedAt: null,
    createdAt: T0,
    ...overrides,
  };
}

function session(id: string, sandboxId: string, overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id,
    sandboxId,
    profileId: 'python-default',
    runtimeType: 'ship',
    desiredState: 'running',
    observedState: 'pending',
    instanceRef: null,
    endpoint: null,
    idleExpiresAt: null,
    createdAt: T0,
    lastActiveAt: T0,
    lastError: null,
    ...overrides,
  };
}

describe('Persistence Box', () => {
  let persistence: PersistenceBox;

  beforeEach(() => {
    setOS(createMockOS());
    persistence = new PersistenceBox(':memory:');
    persistence.workspaces.create(workspace('ws-1', { managedBySandboxId: 'sandbox-a' }));
  });

  test('should round-trip sandboxes with nullable timestamps', () => {
    const expiresAt = new Date(T0.getTime() + 600_000);
    persistence.sandboxes.create(sandbox('sandbox-a', { expiresAt }));

    const found = persistence.sandboxes.findById('sandbox-a');
    expect(found?.expiresAt?.getTime()).toBe(expiresAt.getTime());
    expect(found?.deletedAt).toBeNull();
    expect(found?.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });

  test('should page owner sandboxes by id and hide deleted ones', () => {
    persistence.sandboxes.create(sandbox('sandbox-a'));
    persistence.sandboxes.create(sandbox('sandbox-b'));
    persistence.sandboxes.create(sandbox('sandbox-c'));
    persistence.sandboxes.create(sandbox('sandbox-d', { owner: 'bob' }));
    persistence.sandboxes.softDelete('sandbox-b', T0);

    const first = persistence.sandboxes.listByOwner('alice', { limit: 1 });
    expect(first.map((s) => s.id)).toEqual(['sandbox-a']);

    const rest = persistence.sandboxes.listByOwner('alice', { cursor: 'sandbox-a', limit: 10 });
    expect(rest.map((s) => s.id)).toEqual(['sandbox-c']);
  });

  test('soft delete happens once', () => {
    persistence.sandboxes.create(sandbox('sandbox-a'));
    expect(persistence.sandboxes.softDelete('sandbox-a', T0)).toBe(true);
    expect(persistence.sandboxes.softDelete('sandbox-a', T0)).toBe(false);
    expect(persistence.sandboxes.findById('sandbox-a')?.deletedAt?.getTime()).toBe(T0.getTime());
  });

  test('should find expired sandboxes strictly before now', () => {
    persistence.sandboxes.create(sandbox('sandbox-a', { expiresAt: new Date(T0.getTime() - 1) }));
    persistence.sandboxes.create(sandbox('sandbox-b', { expiresAt: T0 }));
    persistence.sandboxes.create(sandbox('sandbox-c'));

    expect(persistence.sandboxes.findExpired(T0, 10).map((s) => s.id)).toEqual(['sandbox-a']);
  });

  test('should allow only one session row per sandbox', () => {
    persistence.sandboxes.create(sandbox('sandbox-a'));
    expect(persistence.sessions.insertIfAbsent(session('sess-1', 'sandbox-a'))).toBe(true);
    expect(persistence.sessions.insertIfAbsent(session('sess-2', 'sandbox-a'))).toBe(false);
    expect(persistence.sessions.findBySandboxId('sandbox-a')?.id).toBe('sess-1');
  });

  test('should walk a session through its states', () => {
    persistence.sandboxes.create(sandbox('sandbox-a'));
    persistence.sessions.insertIfAbsent(session('sess-1', 'sandbox-a'));
    persistence.sessions.markStarting('sess-1', 'inst-1', 'http://127.0.0.1:4000', T0);
    const idleAt = new Date(T0.getTime() + 1_800_000);
    persistence.sessions.markRunning('sess-1', idleAt, T0);

    const running = persistence.sessions.findById('sess-1');
    expect(running?.observedState).toBe('running');
    expect(running?.instanceRef).toBe('inst-1');
    expect(running?.endpoint).toBe('http://127.0.0.1:4000');
    expect(running?.idleExpiresAt?.getTime()).toBe(idleAt.getTime());
    expect(persistence.sessions.listLiveIds()).toEqual(new Set(['sess-1']));

    persistence.sessions.markFailed('sess-1', 'boom', null);
    const failed = persistence.sessions.findById('sess-1');
    expect(failed?.observedState).toBe('failed');
    expect(failed?.desiredState).toBe('stopped');
    expect(failed?.lastError).toBe('boom');
    expect(failed?.endpoint).toBeNull();
    expect(persistence.sessions.listLiveIds().size).toBe(0);
  });

  test('should find running sessions past their idle deadline', () => {
    persistence.workspaces.create(workspace('ws-2', { managedBySandboxId: 'sandbox-b' }));
    persistence.sandboxes.create(sandbox('sandbox-a'));
    persistence.sandboxes.create(sandbox('sandbox-b', { workspaceId: 'ws-2' }));
    persistence.sessions.insertIfAbsent(session('sess-1', 'sandbox-a'));
    persistence.sessions.insertIfAbsent(session('sess-2', 'sandbox-b'));
    persistence.sessions.markRunning('sess-1', new Date(T0.getTime() - 1000), T0);
    persistence.sessions.markRunning('sess-2', new Date(T0.getTime() + 1000), T0);

    expect(persistence.sessions.findIdleExpired(T0, 10).map((s) => s.id)).toEqual(['sess-1']);
  });

  test('should not touch a session marked for teardown', () => {
    persistence.sandboxes.create(sandbox('sandbox-a'));
    persistence.sessions.insertIfAbsent(session('sess-1', 'sandbox-a'));
    persistence.sessions.markRunning('sess-1', T0, T0);
    const later = new Date(T0.getTime() + 60_000);

    expect(persistence.sessions.touch('sess-1', later, T0)).toBe(true);
    persistence.sessions.markStopping('sess-1');
    expect(persistence.sessions.touch('sess-1', new Date(T0.getTime() + 120_000), T0)).toBe(false);
    expect(persistence.sessions.findById('sess-1')?.idleExpiresAt?.getTime()).toBe(later.getTime());
    expect(persistence.sessions.touch('sess-missing', later, T0)).toBe(false);
  });

  test('should find starts with no progress since the cutoff', () => {
    persistence.workspaces.create(workspace('ws-2', { managedBySandboxId: 'sandbox-b' }));
    persistence.workspaces.create(workspace('ws-3', { managedBySandboxId: 'sandbox-c' }));
    persistence.sandboxes.create(sandbox('sandbox-a'));
    persistence.sandboxes.create(sandbox('sandbox-b', { workspaceId: 'ws-2' }));
    persistence.sandboxes.create(sandbox('sandbox-c', { workspaceId: 'ws-3' }));
    persistence.sessions.insertIfAbsent(session('sess-1', 'sandbox-a'));
    persistence.sessions.insertIfAbsent(session('sess-2', 'sandbox-b'));
    persistence.sessions.insertIfAbsent(session('sess-3', 'sandbox-c'));
    const progressed = new Date(T0.getTime() + 5000);
    persistence.sessions.markStarting('sess-2', 'inst-2', 'http://127.0.0.1:4002', progressed);
    persistence.sessions.markRunning('sess-3', new Date(T0.getTime() + 1000), T0);

    const cutoff = new Date(T0.getTime() + 1000);
    expect(persistence.sessions.findStaleStarts(cutoff, 10).map((s) => s.id)).toEqual(['sess-1']);
  });

  test('should reject a live sandbox without a workspace', () => {
    expect(() => persistence.sandboxes.create(sandbox('sandbox-a', { workspaceId: null }))).toThrow();
  });

  test('should find managed workspaces whose sandbox is gone', () => {
    persistence.sandboxes.create(sandbox('sandbox-a'));
    persistence.workspaces.create(workspace('ws-2', { managedBySandboxId: 'sandbox-missing' }));
    persistence.workspaces.create(workspace('ws-3', { managed: false }));

    expect(persistence.workspaces.findOrphanedManaged(10).map((w) => w.id)).toEqual(['ws-2']);

    persistence.sandboxes.softDelete('sandbox-a', T0);
    expect(persistence.workspaces.findOrphanedManaged(10).map((w) => w.id)).toEqual([
      'ws-1',
      'ws-2',
    ]);
  });

  test('should count only live references to a workspace', () => {
    persistence.workspaces.create(workspace('ws-ext', { managed: false }));
    persistence.sandboxes.create(sandbox('sandbox-a', { workspaceId: 'ws-ext' }));
    persistence.sandboxes.create(sandbox('sandbox-b', { workspaceId: 'ws-ext' }));
    persistence.sandboxes.softDelete('sandbox-a', T0);

    expect(persistence.sandboxes.countLiveByWorkspace('ws-ext')).toBe(1);
    expect(persistence.workspaces.findUnreferencedExternal(10)).toEqual([]);

    persistence.sandboxes.softDelete('sandbox-b', T0);
    expect(persistence.workspaces.findUnreferencedExternal(10).map((w) => w.id)).toEqual(['ws-ext']);

    persistence.transaction(() => {
      persistence.sandboxes.detachWorkspace('ws-ext');
      persistence.workspaces.delete('ws-ext');
    });
    expect(persistence.workspaces.findById('ws-ext')).toBeUndefined();
    expect(persistence.sandboxes.findById('sandbox-a')?.workspaceId).toBeNull();
  });

  test('should keep the first idempotency record for a key', () => {
    const record = {
      owner: 'alice',
      key: 'key-1',
      fingerprint: 'f1',
      responseSnapshot: '{"ok":true}',
      statusCode: 201,
      createdAt: T0,
      expiresAt: new Date(T0.getTime() + 3_600_000),
    };
    expect(persistence.idempotency.insertIfAbsent(record)).toBe(true);
    expect(persistence.idempotency.insertIfAbsent({ ...record, fingerprint: 'f2' })).toBe(false);
    expect(persistence.idempotency.find('alice', 'key-1')?.fingerprint).toBe('f1');
    expect(persistence.idempotency.find('bob', 'key-1')).toBeUndefined();

    expect(persistence.idempotency.deleteExpired(new Date(T0.getTime() + 3_600_000))).toBe(1);
    expect(persistence.idempotency.find('alice', 'key-1')).toBeUndefined();
  });
});
