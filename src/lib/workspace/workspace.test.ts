import { beforeEach, describe, expect, test } from 'vitest';
import { createMockOS, setOS } from '../common/os/index.ts';
import { MockDriver } from '../driver/index.ts';
import { ConflictError, NotFoundError, ValidationError } from '../errors.ts';
import { PersistenceBox } from '../persistence/index.ts';
import { WorkspaceManager } from './index.ts';

const NOW = new Date('2026-02-01T00:00:00.000Z');

describe('WorkspaceManager', () => {
  let persistence: PersistenceBox;
  let driver: MockDriver;
  let workspaces: WorkspaceManager;

  beforeEach(() => {
    setOS(createMockOS());
    persistence = new PersistenceBox(':memory:');
    driver = new MockDriver();
    workspaces = new WorkspaceManager(persistence, driver, {
      labelPrefix: 'shoal',
      defaultSizeLimitMb: 512,
      driverTimeoutMs: 1000,
      lockTimeoutMs: 1000,
      now: () => NOW,
    });
  });

  test('creates an external workspace with a labelled volume', async () => {
    const view = await workspaces.createExternal('alice', 2048);

    expect(view.id).toMatch(/^ws-[0-9a-f]{12}$/);
    expect(view).toMatchObject({
      managed: false,
      sandboxId: null,
      sizeLimitMb: 2048,
      createdAt: '2026-02-01T00:00:00.000Z',
    });
    expect(driver.volumes.get(`shoal-${view.id}`)).toEqual({
      'shoal.managed': 'true',
      'shoal.owner': 'alice',
      'shoal.workspace_id': view.id,
      'shoal.workspace_kind': 'external',
    });
  });

  test('falls back to the default size and rejects bad sizes', async () => {
    expect((await workspaces.createExternal('alice')).sizeLimitMb).toBe(512);
    await expect(workspaces.createExternal('alice', 0)).rejects.toThrow(ValidationError);
    expect(driver.volumes.size).toBe(1);
  });

  test('provisions a managed volume without recording it', async () => {
    const record = await workspaces.provisionManaged('alice', 'sandbox-1');
    expect(record.managed).toBe(true);
    expect(record.managedBySandboxId).toBe('sandbox-1');
    expect(driver.volumes.has(record.volumeRef)).toBe(true);
    expect(persistence.workspaces.findById(record.id)).toBeUndefined();
  });

  test('lookups are scoped to the owner', async () => {
    const view = await workspaces.createExternal('alice');
    expect(workspaces.get('alice', view.id).id).toBe(view.id);
    expect(() => workspaces.get('bob', view.id)).toThrow(NotFoundError);
    expect(workspaces.list('alice').map((w) => w.id)).toEqual([view.id]);
    expect(workspaces.list('bob')).toEqual([]);
  });

  test('refuses to delete a workspace a live sandbox uses', async () => {
    const view = await workspaces.createExternal('alice');
    persistence.sandboxes.create({
      id: 'sandbox-1',
      owner: 'alice',
      profileId: 'python-default',
      workspaceId: view.id,
      expiresAt: null,
      deletedAt: null,
      createdAt: NOW,
    });

    await expect(workspaces.delete('alice', view.id)).rejects.toThrow(ConflictError);
    expect(driver.volumes.size).toBe(1);

    persistence.sandboxes.softDelete('sandbox-1', NOW);
    await workspaces.delete('alice', view.id);
    expect(driver.volumes.size).toBe(0);
    expect(persistence.workspaces.findById(view.id)).toBeUndefined();
    expect(persistence.sandboxes.findById('sandbox-1')?.workspaceId).toBeNull();
  });

  test('reclaim leaves a workspace that gained a live sandbox', async () => {
    const view = await workspaces.createExternal('alice');
    const record = persistence.workspaces.findById(view.id);
    if (!record) throw new Error('workspace not recorded');
    persistence.sandboxes.create({
      id: 'sandbox-1',
      owner: 'alice',
      profileId: 'python-default',
      workspaceId: view.id,
      expiresAt: null,
      deletedAt: null,
      createdAt: NOW,
    });

    await expect(workspaces.reclaim(record)).resolves.toBe(false);
    expect(driver.volumes.size).toBe(1);
    expect(persistence.workspaces.findById(view.id)?.id).toBe(view.id);
  });

  test('managed workspaces are not deleted directly', async () => {
    const record = await workspaces.provisionManaged('alice', 'sandbox-1');
    persistence.workspaces.create(record);
    await expect(workspaces.delete('alice', record.id)).rejects.toThrow(ConflictError);
  });

  test('keeps the record when the volume cannot be removed', async () => {
    const view = await workspaces.createExternal('alice');
    driver.failNext('deleteVolume');
    await expect(workspaces.delete('alice', view.id)).rejects.toThrow('mock deleteVolume failure');
    expect(persistence.workspaces.findById(view.id)?.id).toBe(view.id);
  });
});
