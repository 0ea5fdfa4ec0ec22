import pLimit from 'p-limit';
import { withRetry } from '../common/utils/retry.ts';
import { type ShoalConfig, staleStartMs } from '../config.ts';
import { type ComputeDriver, callDriver, labelKeys } from '../driver/index.ts';
import type { IdempotencyLedger } from '../idempotency/index.ts';
import { errorMessage, logger } from '../logger.ts';
import type { Orchestrator } from '../orchestrator/index.ts';
import type { PersistenceBox } from '../persistence/index.ts';
import type { WorkspaceManager } from '../workspace/index.ts';
import type { GcResult, GcTask, GcTaskName } from './types.ts';

/** Items handled per task run; the rest wait for the next tick. */
export const GC_BATCH_SIZE = 100;

export interface GcContext {
  config: ShoalConfig;
  persistence: PersistenceBox;
  driver: ComputeDriver;
  orchestrator: Orchestrator;
  workspaces: WorkspaceManager;
  ledger: IdempotencyLedger;
  now?: () => Date;
}

/**
 * Applies `reclaim` to every item with bounded concurrency and a per-item retry policy.
 * Item failures are counted and logged; they never stop the batch.
 */
async function sweep<T>(
  ctx: GcContext,
  task: GcTaskName,
  items: T[],
  describe: (item: T) => string,
  reclaim: (item: T) => Promise<boolean>,
): Promise<Omit<GcResult, 'durationMs'>> {
  const limit = pLimit(ctx.config.gc.itemConcurrency);
  let cleaned = 0;
  let errors = 0;

  await Promise.all(
    items.map((item) =>
      limit(async () => {
        try {
          if (await withRetry(() => reclaim(item), ctx.config.gc.itemRetry)) cleaned++;
        } catch (err) {
          errors++;
          logger.error(`[GC] ${task}: ${describe(item)} failed: ${errorMessage(err)}`);
        }
      }),
    ),
  );
  return { task, cleaned, errors };
}

function defineTask(
  name: GcTaskName,
  intervalMs: number,
  body: () => Promise<Omit<GcResult, 'durationMs'>>,
): GcTask {
  return {
    name,
    intervalMs,
    async run() {
      const startedAt = Date.now();
      const result = await body();
      return { ...result, durationMs: Date.now() - startedAt };
    },
  };
}

export function expiredSandboxTask(ctx: GcContext): GcTask {
  const now = ctx.now ?? (() => new Date());
  return defineTask('expired-sandboxes', ctx.config.gc.expiredSandboxIntervalMs, () =>
    sweep(
      ctx,
      'expired-sandboxes',
      ctx.persistence.sandboxes.findExpired(now(), GC_BATCH_SIZE),
      (sandbox) => `sandbox ${sandbox.id}`,
      (sandbox) => ctx.orchestrator.reclaimSandbox(sandbox.id),
    ),
  );
}

export function idleSessionTask(ctx: GcContext): GcTask {
  const now = ctx.now ?? (() => new Date());
  return defineTask('idle-sessions', ctx.config.gc.idleSessionIntervalMs, () =>
    sweep(
      ctx,
      'idle-sessions',
      ctx.persistence.sessions.findIdleExpired(now(), GC_BATCH_SIZE),
      (session) => `session ${session.id}`,
      (session) => ctx.orchestrator.reclaimIdleSession(session.id),
    ),
  );
}

/** Sessions a dead process left in pending or starting; their instance is destroyed first. */
export function staleSessionTask(ctx: GcContext): GcTask {
  const now = ctx.now ?? (() => new Date());
  const thresholdMs = staleStartMs(ctx.config);
  return defineTask('stale-sessions', ctx.config.gc.staleSessionIntervalMs, () =>
    sweep(
      ctx,
      'stale-sessions',
      ctx.persistence.sessions.findStaleStarts(
        new Date(now().getTime() - thresholdMs),
        GC_BATCH_SIZE,
      ),
      (session) => `session ${session.id}`,
      (session) => ctx.orchestrator.reclaimStaleStart(session.id),
    ),
  );
}

export function orphanWorkspaceTask(ctx: GcContext): GcTask {
  return defineTask('orphan-workspaces', ctx.config.gc.orphanWorkspaceIntervalMs, () => {
    const orphans = ctx.persistence.workspaces.findOrphanedManaged(GC_BATCH_SIZE);
    if (ctx.config.gc.reclaimExternalWorkspaces) {
      orphans.push(...ctx.persistence.workspaces.findUnreferencedExternal(GC_BATCH_SIZE));
    }
    return sweep(
      ctx,
      'orphan-workspaces',
      orphans,
      (workspace) => `workspace ${workspace.id}`,
      (workspace) => ctx.workspaces.reclaim(workspace),
    );
  });
}

/**
 * Destroys instances in our label namespace whose session is gone or terminal.
 * Anything without the managed label is not ours and is never listed.
 */
export function orphanInstanceTask(ctx: GcContext): GcTask {
  const keys = labelKeys(ctx.config.labelPrefix);
  return defineTask('orphan-instances', ctx.config.gc.orphanInstanceIntervalMs, async () => {
    const instances = await callDriver('listInstances', ctx.config.driverTimeoutMs, () =>
      ctx.driver.listInstances({ [keys.managed]: 'true' }),
    );
    const live = ctx.persistence.sessions.listLiveIds();
    const orphans = instances.filter((instance) => {
      const sessionId = instance.labels[keys.sessionId];
      return sessionId === undefined || !live.has(sessionId);
    });
    return sweep(
      ctx,
      'orphan-instances',
      orphans,
      (instance) => `instance ${instance.instanceRef}`,
      async (instance) => {
        await callDriver('destroy', ctx.config.driverTimeoutMs, () =>
          ctx.driver.destroy(instance.instanceRef),
        );
        logger.info(`[GC] destroyed orphan instance ${instance.instanceRef}`, {
          session: instance.labels[keys.sessionId],
        });
        return true;
      },
    );
  });
}

export function expiredIdempotencyTask(ctx: GcContext): GcTask {
  return defineTask('expired-idempotency', ctx.config.gc.idempotencyIntervalMs, async () => ({
    task: 'expired-idempotency',
    cleaned: ctx.ledger.purgeExpired(),
    errors: 0,
  }));
}

export function createGcTasks(ctx: GcContext): GcTask[] {
  return [
    expiredSandboxTask(ctx),
    idleSessionTask(ctx),
    staleSessionTask(ctx),
    orphanWorkspaceTask(ctx),
    orphanInstanceTask(ctx),
    expiredIdempotencyTask(ctx),
  ];
}
