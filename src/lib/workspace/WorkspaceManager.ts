import { newId } from '../common/ids.ts';
import { KeyedMutex } from '../common/utils/KeyedMutex.ts';
import { type ComputeDriver, callDriver } from '../driver/index.ts';
import { ConflictError, NotFoundError, ValidationError } from '../errors.ts';
import { logger } from '../logger.ts';
import type { PersistenceBox, WorkspaceRecord } from '../persistence/index.ts';

export interface WorkspaceView {
  id: string;
  managed: boolean;
  sandboxId: string | null;
  sizeLimitMb: number;
  createdAt: string;
  updatedAt: string;
}

export interface WorkspaceManagerOptions {
  labelPrefix: string;
  defaultSizeLimitMb: number;
  driverTimeoutMs: number;
  /** Longest wait for another bind or delete of the same workspace. */
  lockTimeoutMs: number;
  now: () => Date;
}

export function toWorkspaceView(workspace: WorkspaceRecord): WorkspaceView {
  return {
    id: workspace.id,
    managed: workspace.managed,
    sandboxId: workspace.managedBySandboxId,
    sizeLimitMb: workspace.sizeLimitMb,
    createdAt: workspace.createdAt.toISOString(),
    updatedAt: workspace.updatedAt.toISOString(),
  };
}

/**
 * Workspaces are storage with a lifecycle independent of compute. Managed ones belong to exactly
 * one sandbox and go away with it; external ones are created here and may be shared.
 *
 * Binding a workspace to a new sandbox and deleting it hold the same per-workspace lock.
 */
export class WorkspaceManager {
  private locks = new KeyedMutex();

  constructor(
    private persistence: PersistenceBox,
    private driver: ComputeDriver,
    private options: WorkspaceManagerOptions,
  ) {}

  private async createVolume(workspaceId: string, owner: string, managed: boolean) {
    const prefix = this.options.labelPrefix;
    return callDriver('createVolume', this.options.driverTimeoutMs, () =>
      this.driver.createVolume(`${prefix}-${workspaceId}`, {
        [`${prefix}.managed`]: 'true',
        [`${prefix}.owner`]: owner,
        [`${prefix}.workspace_id`]: workspaceId,
        [`${prefix}.workspace_kind`]: managed ? 'managed' : 'external',
      }),
    );
  }

  /**
   * Creates the volume for a sandbox's managed workspace and returns the unsaved record;
   * the caller inserts it in the same transaction as the sandbox.
   */
  async provisionManaged(owner: string, sandboxId: string): Promise<WorkspaceRecord> {
    const id = newId('ws');
    const volumeRef = await this.createVolume(id, owner, true);
    const now = this.options.now();
    return {
      id,
      owner,
      managed: true,
      managedBySandboxId: sandboxId,
      volumeRef,
      sizeLimitMb: this.options.defaultSizeLimitMb,
      createdAt: now,
      updatedAt: now,
    };
  }

  async createExternal(owner: string, sizeLimitMb?: number): Promise<WorkspaceView> {
    if (sizeLimitMb !== undefined && (!Number.isInteger(sizeLimitMb) || sizeLimitMb <= 0)) {
      throw new ValidationError('sizeLimitMb must be a positive integer', {
        size_limit_mb: sizeLimitMb,
      });
    }
    const id = newId('ws');
    const volumeRef = await this.createVolume(id, owner, false);
    const now = this.options.now();
    const workspace: WorkspaceRecord = {
      id,
      owner,
      managed: false,
      managedBySandboxId: null,
      volumeRef,
      sizeLimitMb: sizeLimitMb ?? this.options.defaultSizeLimitMb,
      createdAt: now,
      updatedAt: now,
    };
    this.persistence.workspaces.create(workspace);
    logger.info(`[Workspaces] created external workspace ${id}`, { owner });
    return toWorkspaceView(workspace);
  }

  /** Other owners' workspaces resolve as not found. */
  get(owner: string, id: string): WorkspaceRecord {
    const workspace = this.persistence.workspaces.findById(id);
    if (!workspace || workspace.owner !== owner) {
      throw new NotFoundError(`Workspace not found: ${id}`, { workspace_id: id });
    }
    return workspace;
  }

  list(owner: string): WorkspaceView[] {
    return this.persistence.workspaces.listByOwner(owner).map(toWorkspaceView);
  }

  /**
   * Runs `bind` with the caller's external workspace while no delete of it can run.
   * `bind` records the sandbox that references the workspace.
   */
  async bindExternal<T>(
    owner: string,
    id: string,
    bind: (workspace: WorkspaceRecord) => T,
  ): Promise<T> {
    return this.locks.runExclusive(
      id,
      async () => {
        const workspace = this.get(owner, id);
        if (workspace.managed) {
          throw new ValidationError(`Workspace ${id} is managed by another sandbox`, {
            workspace_id: id,
          });
        }
        return bind(workspace);
      },
      this.options.lockTimeoutMs,
    );
  }

  /**
   * Deletes an external workspace. Managed workspaces go with their sandbox, and a workspace
   * still referenced by a live sandbox cannot be deleted.
   */
  async delete(owner: string, id: string): Promise<void> {
    await this.locks.runExclusive(
      id,
      async () => {
        const workspace = this.get(owner, id);
        if (workspace.managed) {
          throw new ConflictError(
            `Workspace ${id} is managed by sandbox ${workspace.managedBySandboxId}`,
            { workspace_id: id },
          );
        }
        const references = this.persistence.sandboxes.countLiveByWorkspace(id);
        if (references > 0) {
          throw new ConflictError(`Workspace ${id} is still used by ${references} sandbox(es)`, {
            workspace_id: id,
            references,
          });
        }
        await this.remove(workspace);
      },
      this.options.lockTimeoutMs,
    );
  }

  /**
   * Removes a workspace nothing live references. Returns false, and keeps it, when a live
   * sandbox references it by the time the lock is held.
   */
  async reclaim(workspace: WorkspaceRecord): Promise<boolean> {
    return this.locks.runExclusive(
      workspace.id,
      async () => {
        if (this.persistence.sandboxes.countLiveByWorkspace(workspace.id) > 0) return false;
        await this.remove(workspace);
        return true;
      },
      this.options.lockTimeoutMs,
    );
  }

  /**
   * Volume first, record second, so a failure leaves a record the GC can retry from.
   * Caller holds the workspace lock.
   */
  private async remove(workspace: WorkspaceRecord): Promise<void> {
    await callDriver('deleteVolume', this.options.driverTimeoutMs, () =>
      this.driver.deleteVolume(workspace.volumeRef),
    );
    this.persistence.transaction(() => {
      this.persistence.sandboxes.detachWorkspace(workspace.id);
      this.persistence.workspaces.delete(workspace.id);
    });
    logger.info(`[Workspaces] deleted workspace ${workspace.id}`, {
      managed: workspace.managed,
    });
  }
}
