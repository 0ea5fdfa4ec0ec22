import type { ShoalConfig } from '../config.ts';
import type { ComputeDriver } from '../driver/index.ts';
import type { IdempotencyLedger } from '../idempotency/index.ts';
import type { SandboxStatus } from '../lifecycle/index.ts';
import type { PersistenceBox } from '../persistence/index.ts';
import type { RuntimeAdapter, RuntimeRegistry } from '../runtime/index.ts';
import type { WorkspaceManager } from '../workspace/index.ts';

/** What callers see of a sandbox. Timestamps are ISO strings so stored responses replay verbatim. */
export interface SandboxView {
  id: string;
  owner: string;
  profile: string;
  /** What the profile's runtime offers, e.g. `filesystem`, `shell`, `python`. */
  capabilities: string[];
  status: SandboxStatus;
  workspaceId: string | null;
  expiresAt: string | null;
  idleExpiresAt: string | null;
  createdAt: string;
}

export interface CreateSandboxOptions {
  profile: string;
  /** Binds an existing external workspace instead of creating a managed one. */
  workspaceId?: string;
  /** Seconds until hard expiry; 0, null or absent means never. */
  ttl?: number | null;
  idempotencyKey?: string;
}

export interface ListSandboxesOptions {
  status?: SandboxStatus;
  limit?: number;
  cursor?: string;
}

export interface ListResult<T> {
  items: T[];
  nextCursor: string | null;
}

export interface EnsureRunningOptions {
  /** How long this caller waits before getting session_not_ready. Defaults to the start timeout. */
  waitMs?: number;
}

export interface ExtendTtlOptions {
  idempotencyKey?: string;
}

export interface RunningSession {
  sandboxId: string;
  sessionId: string;
  endpoint: string;
  runtimeType: string;
  adapter: RuntimeAdapter;
}

export interface OrchestratorDeps {
  config: ShoalConfig;
  persistence: PersistenceBox;
  driver: ComputeDriver;
  runtimes: RuntimeRegistry;
  workspaces: WorkspaceManager;
  ledger: IdempotencyLedger;
  now?: () => Date;
}
