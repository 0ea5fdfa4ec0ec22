import { CapabilityRouter } from './capability/index.ts';
import type { ShoalConfig } from './config.ts';
import { type ComputeDriver, createDriver } from './driver/index.ts';
import { GcScheduler, createGcTasks } from './gc/index.ts';
import { IdempotencyLedger } from './idempotency/index.ts';
import { Orchestrator } from './orchestrator/index.ts';
import { PersistenceBox } from './persistence/index.ts';
import { type RuntimeRegistry, createDefaultRegistry, createMockRegistry } from './runtime/index.ts';
import { WorkspaceManager } from './workspace/index.ts';

export interface ShoalApp {
  config: ShoalConfig;
  persistence: PersistenceBox;
  driver: ComputeDriver;
  runtimes: RuntimeRegistry;
  ledger: IdempotencyLedger;
  workspaces: WorkspaceManager;
  orchestrator: Orchestrator;
  router: CapabilityRouter;
  gc: GcScheduler;
  close(): Promise<void>;
}

export interface AppOverrides {
  persistence?: PersistenceBox;
  driver?: ComputeDriver;
  runtimes?: RuntimeRegistry;
  now?: () => Date;
}

/**
 * Wires every component from one config. Nothing here is global: two apps never share
 * locks, adapters or database handles.
 */
export function createApp(config: ShoalConfig, overrides: AppOverrides = {}): ShoalApp {
  const now = overrides.now ?? (() => new Date());
  const persistence = overrides.persistence ?? new PersistenceBox(config.databasePath);
  const driver = overrides.driver ?? createDriver(config);
  const runtimes =
    overrides.runtimes ??
    (config.driver === 'mock'
      ? createMockRegistry([...new Set(config.profiles.map((p) => p.runtimeType))])
      : createDefaultRegistry());

  const ledger = new IdempotencyLedger(persistence.idempotency, {
    enabled: config.idempotency.enabled,
    ttlSeconds: config.idempotency.ttlSeconds,
    now,
  });
  const workspaces = new WorkspaceManager(persistence, driver, {
    labelPrefix: config.labelPrefix,
    defaultSizeLimitMb: config.workspaceSizeLimitMb,
    driverTimeoutMs: config.driverTimeoutMs,
    lockTimeoutMs: config.startTimeoutMs,
    now,
  });
  const orchestrator = new Orchestrator({
    config,
    persistence,
    driver,
    runtimes,
    workspaces,
    ledger,
    now,
  });
  const router = new CapabilityRouter(orchestrator, config.startTimeoutMs);
  const gc = new GcScheduler(
    createGcTasks({ config, persistence, driver, orchestrator, workspaces, ledger, now }),
  );

  return {
    config,
    persistence,
    driver,
    runtimes,
    ledger,
    workspaces,
    orchestrator,
    router,
    gc,
    async close() {
      await gc.stop();
      persistence.close();
    },
  };
}
