import { newId } from '../common/ids.ts';
import { KeyedMutex } from '../common/utils/KeyedMutex.ts';
import { pollUntil } from '../common/utils/retry.ts';
import { type Profile, type ShoalConfig, getProfile, staleStartMs } from '../config.ts';
import { type ComputeDriver, callDriver } from '../driver/index.ts';
import {
  ConflictError,
  NotFoundError,
  SandboxExpiredError,
  SandboxTtlInfiniteError,
  SessionNotReadyError,
  TimeoutError,
  ValidationError,
  asDriverError,
} from '../errors.ts';
import type { IdempotencyLedger, StoredResponse } from '../idempotency/index.ts';
import {
  assertTransition,
  deriveStatus,
  isIdleExpired,
  isSandboxExpired,
  isStaleStart,
  isTerminal,
} from '../lifecycle/index.ts';
import { errorMessage, logger } from '../logger.ts';
import type {
  PersistenceBox,
  SandboxRecord,
  SessionRecord,
  WorkspaceRecord,
} from '../persistence/index.ts';
import type { RuntimeAdapter, RuntimeRegistry } from '../runtime/index.ts';
import type { WorkspaceManager } from '../workspace/index.ts';
import type {
  CreateSandboxOptions,
  EnsureRunningOptions,
  ExtendTtlOptions,
  ListResult,
  ListSandboxesOptions,
  OrchestratorDeps,
  RunningSession,
  SandboxView,
} from './types.ts';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;

/**
 * Owns sandbox lifecycle: creation, lazy compute start, idle and TTL bookkeeping, teardown.
 *
 * Start, stop and delete of one sandbox are serialized by a per-sandbox lock. Concurrent
 * `ensureRunning` callers for the same sandbox share one in-flight start.
 */
export class Orchestrator {
  private config: ShoalConfig;
  private persistence: PersistenceBox;
  private driver: ComputeDriver;
  private runtimes: RuntimeRegistry;
  private workspaces: WorkspaceManager;
  private ledger: IdempotencyLedger;
  private now: () => Date;

  private locks = new KeyedMutex();
  private starts: Map<string, Promise<RunningSession>> = new Map();
  private adapters: Map<string, RuntimeAdapter> = new Map();

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.persistence = deps.persistence;
    this.driver = deps.driver;
    this.runtimes = deps.runtimes;
    this.workspaces = deps.workspaces;
    this.ledger = deps.ledger;
    this.now = deps.now ?? (() => new Date());
  }

  async create(owner: string, options: CreateSandboxOptions): Promise<StoredResponse<SandboxView>> {
    const ttl = options.ttl ?? 0;
    const request = {
      owner,
      key: options.idempotencyKey,
      method: 'POST',
      path: '/v1/sandboxes',
      body: JSON.stringify({
        profile: options.profile,
        workspace_id: options.workspaceId ?? null,
        ttl,
      }),
    };

    return this.ledger.execute(request, 201, async () => {
      const profile = getProfile(this.config, options.profile);
      if (!profile) {
        throw new ValidationError(`Unknown profile: ${options.profile}`, {
          profile: options.profile,
          available: this.config.profiles.map((p) => p.id),
        });
      }
      if (!Number.isInteger(ttl) || ttl < 0 || ttl > this.config.maxTtlSeconds) {
        throw new ValidationError(
          `ttl must be an integer between 0 and ${this.config.maxTtlSeconds} seconds`,
          { ttl },
        );
      }
      return this.createSandbox(owner, profile, ttl, options.workspaceId);
    });
  }

  private async createSandbox(
    owner: string,
    profile: Profile,
    ttl: number,
    workspaceId: string | undefined,
  ): Promise<SandboxView> {
    const id = newId('sandbox');
    const now = this.now();
    const sandbox: SandboxRecord = {
      id,
      owner,
      profileId: profile.id,
      workspaceId: null,
      expiresAt: ttl > 0 ? new Date(now.getTime() + ttl * 1000) : null,
      deletedAt: null,
      createdAt: now,
    };

    if (workspaceId !== undefined) {
      await this.workspaces.bindExternal(owner, workspaceId, (workspace) => {
        sandbox.workspaceId = workspace.id;
        this.persistence.sandboxes.create(sandbox);
      });
    } else {
      const workspace = await this.workspaces.provisionManaged(owner, id);
      sandbox.workspaceId = workspace.id;
      try {
        this.persistence.transaction(() => {
          this.persistence.workspaces.create(workspace);
          this.persistence.sandboxes.create(sandbox);
        });
      } catch (err) {
        logger.error(`[Orchestrator] failed to record sandbox ${id}: ${errorMessage(err)}`);
        await this.releaseVolume(workspace);
        throw err;
      }
    }

    logger.info(`[Orchestrator] created sandbox ${id}`, {
      owner,
      profile: profile.id,
      workspace: sandbox.workspaceId,
      ttl,
    });
    return this.toView(sandbox, undefined, now);
  }

  private async releaseVolume(workspace: WorkspaceRecord): Promise<void> {
    try {
      await callDriver('deleteVolume', this.config.driverTimeoutMs, () =>
        this.driver.deleteVolume(workspace.volumeRef),
      );
    } catch (err) {
      logger.warn(`[Orchestrator] could not release volume ${workspace.volumeRef}`, {
        error: errorMessage(err),
      });
    }
  }

  get(owner: string, id: string): SandboxView {
    const sandbox = this.requireSandbox(owner, id);
    return this.toView(sandbox, this.persistence.sessions.findBySandboxId(id), this.now());
  }

  list(owner: string, options: ListSandboxesOptions = {}): ListResult<SandboxView> {
    const limit = options.limit ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_PAGE_SIZE}`, {
        limit,
      });
    }

    const now = this.now();
    const items: SandboxView[] = [];
    let cursor = options.cursor;
    let exhausted = false;

    // A status filter can drop rows, so keep reading pages until the page is full.
    while (items.length < limit && !exhausted) {
      const rows = this.persistence.sandboxes.listByOwner(owner, {
        cursor,
        limit: limit - items.length,
      });
      if (rows.length < limit - items.length) exhausted = true;
      for (const sandbox of rows) {
        cursor = sandbox.id;
        const view = this.toView(
          sandbox,
          this.persistence.sessions.findBySandboxId(sandbox.id),
          now,
        );
        if (options.status === undefined || view.status === options.status) {
          items.push(view);
        }
      }
      if (rows.length === 0) exhausted = true;
    }

    return { items, nextCursor: exhausted ? null : (cursor ?? null) };
  }

  /**
   * Returns a ready session for the sandbox, starting compute if there is none.
   * Callers that give up before the start finishes get session_not_ready; the start carries on.
   */
  async ensureRunning(sandboxId: string, options: EnsureRunningOptions = {}): Promise<RunningSession> {
    const ready = this.readySession(sandboxId);
    if (ready) return ready;

    let flight = this.starts.get(sandboxId);
    if (!flight) {
      const tracked: Promise<RunningSession> = this.locks
        .runExclusive(sandboxId, () => this.startLocked(sandboxId), this.config.startTimeoutMs)
        .finally(() => {
          if (this.starts.get(sandboxId) === tracked) this.starts.delete(sandboxId);
        });
      void tracked.catch((err: unknown) => {
        logger.debug(`[Orchestrator] start of ${sandboxId} ended with ${errorMessage(err)}`);
      });
      this.starts.set(sandboxId, tracked);
      flight = tracked;
    } else {
      logger.debug(`[Orchestrator] joining in-flight start of ${sandboxId}`);
    }

    return this.awaitStart(sandboxId, flight, options.waitMs ?? this.config.startTimeoutMs);
  }

  private async awaitStart(
    sandboxId: string,
    flight: Promise<RunningSession>,
    waitMs: number,
  ): Promise<RunningSession> {
    let timer: NodeJS.Timeout | undefined;
    const budget = new Promise<'pending'>((resolve) => {
      timer = setTimeout(() => resolve('pending'), waitMs);
    });
    try {
      const outcome = await Promise.race([flight.then((session) => ({ session })), budget]);
      if (outcome === 'pending') {
        throw new SessionNotReadyError(sandboxId, this.config.retryAfterMs);
      }
      return outcome.session;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Fast path: no lock, no driver call. */
  private readySession(sandboxId: string): RunningSession | undefined {
    const sandbox = this.persistence.sandboxes.findById(sandboxId);
    if (!sandbox) return undefined;
    const session = this.persistence.sessions.findBySandboxId(sandboxId);
    if (!session || deriveStatus(sandbox, session, this.now()) !== 'ready') return undefined;
    return this.useSession(sandbox, session);
  }

  /** Handing out a ready session counts as activity and pushes back its idle deadline. */
  private useSession(sandbox: SandboxRecord, session: SessionRecord): RunningSession {
    const now = this.now();
    this.persistence.sessions.touch(session.id, this.idleDeadline(sandbox, now), now);
    return this.toRunning(session);
  }

  private idleDeadline(sandbox: SandboxRecord, now: Date): Date {
    const profile = this.requireProfile(sandbox);
    return new Date(now.getTime() + profile.idleTimeoutSeconds * 1000);
  }

  /** Resolves once no start of the sandbox is in flight in this process, whatever its outcome. */
  async settle(sandboxId: string): Promise<void> {
    const flight = this.starts.get(sandboxId);
    if (!flight) return;
    // The outcome is logged where the flight is created.
    await flight.then(
      () => undefined,
      () => undefined,
    );
  }

  private async startLocked(sandboxId: string): Promise<RunningSession> {
    const startedAt = Date.now();
    const sandbox = this.persistence.sandboxes.findById(sandboxId);
    if (!sandbox || sandbox.deletedAt !== null) {
      throw new NotFoundError(`Sandbox not found: ${sandboxId}`, { sandbox_id: sandboxId });
    }

    const existing = this.persistence.sessions.findBySandboxId(sandboxId);
    const status = deriveStatus(sandbox, existing, this.now());
    if (status === 'ready' && existing) return this.useSession(sandbox, existing);
    if (isTerminal(status)) assertTransition(sandbox, status, 'starting');

    // Whatever is left here is a failed marker, an idle-expired session, or a start
    // interrupted by a previous process. None of them is reused.
    if (existing) await this.teardown(existing);

    const profile = this.requireProfile(sandbox);
    const workspace = sandbox.workspaceId
      ? this.persistence.workspaces.findById(sandbox.workspaceId)
      : undefined;
    if (!workspace) {
      throw new ConflictError(`Sandbox ${sandboxId} has no workspace`, { sandbox_id: sandboxId });
    }

    const now = this.now();
    const session: SessionRecord = {
      id: newId('sess'),
      sandboxId,
      profileId: profile.id,
      runtimeType: profile.runtimeType,
      desiredState: 'running',
      observedState: 'pending',
      instanceRef: null,
      endpoint: null,
      idleExpiresAt: null,
      createdAt: now,
      lastActiveAt: now,
      lastError: null,
    };
    if (!this.persistence.sessions.insertIfAbsent(session)) {
      throw new ConflictError(`Sandbox ${sandboxId} already has a session`, {
        sandbox_id: sandboxId,
      });
    }
    logger.info(`[Orchestrator] starting sandbox ${sandboxId}`, {
      session: session.id,
      profile: profile.id,
    });

    let instanceRef: string | null = null;
    try {
      const started = await callDriver('start', this.config.driverTimeoutMs, () =>
        this.driver.start(profile, workspace, {
          owner: sandbox.owner,
          sandboxId,
          sessionId: session.id,
          workspaceId: workspace.id,
          profileId: profile.id,
        }),
      );
      instanceRef = started.instanceRef;
      this.persistence.sessions.markStarting(
        session.id,
        started.instanceRef,
        started.endpoint,
        this.now(),
      );

      const adapter = this.runtimes.create(profile.runtimeType, started.endpoint);
      const remainingMs = Math.max(0, this.config.startTimeoutMs - (Date.now() - startedAt));
      const health = await pollUntil(() => adapter.health(), this.config.readiness, remainingMs);
      if (!health.ok) {
        throw new TimeoutError(
          `Runtime for sandbox ${sandboxId} did not become healthy after ${health.attempts} checks`,
          { sandbox_id: sandboxId, attempts: health.attempts, elapsed_ms: health.elapsedMs },
        );
      }

      const readyAt = this.now();
      const idleExpiresAt = new Date(readyAt.getTime() + profile.idleTimeoutSeconds * 1000);
      this.persistence.sessions.markRunning(session.id, idleExpiresAt, readyAt);
      this.adapters.set(session.id, adapter);
      logger.success(`[Orchestrator] sandbox ${sandboxId} is ready`, {
        session: session.id,
        checks: health.attempts,
        ms: Date.now() - startedAt,
      });
      return {
        sandboxId,
        sessionId: session.id,
        endpoint: started.endpoint,
        runtimeType: profile.runtimeType,
        adapter,
      };
    } catch (err) {
      const failure = asDriverError(err, 'start');
      const started = instanceRef;
      let leftover = started;
      if (started !== null) {
        try {
          await callDriver('destroy', this.config.driverTimeoutMs, () =>
            this.driver.destroy(started),
          );
          leftover = null;
        } catch (destroyErr) {
          logger.warn(`[Orchestrator] could not destroy failed instance ${started}`, {
            error: errorMessage(destroyErr),
          });
        }
      }
      this.persistence.sessions.markFailed(session.id, failure.message, leftover);
      logger.error(`[Orchestrator] sandbox ${sandboxId} failed to start: ${failure.message}`, {
        session: session.id,
        code: failure.code,
      });
      throw failure;
    }
  }

  /**
   * Pushes back the idle deadline of a ready session. Never starts compute; without a ready
   * session it is a no-op.
   */
  keepalive(owner: string, id: string): SandboxView {
    const sandbox = this.requireSandbox(owner, id);
    const now = this.now();
    if (sandbox.expiresAt !== null && isSandboxExpired(sandbox, now)) {
      throw new SandboxExpiredError(id, sandbox.expiresAt);
    }

    const session = this.persistence.sessions.findBySandboxId(id);
    if (session && deriveStatus(sandbox, session, now) === 'ready') {
      const idleExpiresAt = this.idleDeadline(sandbox, now);
      if (this.persistence.sessions.touch(session.id, idleExpiresAt, now)) {
        logger.debug(`[Orchestrator] keepalive ${id}`, { until: idleExpiresAt.toISOString() });
      }
    }
    // Re-read: a teardown may have claimed the session meanwhile.
    return this.toView(sandbox, this.persistence.sessions.findBySandboxId(id), now);
  }

  /** Reclaims compute and keeps the sandbox and its workspace. Safe to repeat. */
  async stop(owner: string, id: string): Promise<SandboxView> {
    this.requireSandbox(owner, id);
    await this.locks.runExclusive(
      id,
      async () => {
        const session = this.persistence.sessions.findBySandboxId(id);
        if (session) await this.teardown(session);
      },
      this.config.startTimeoutMs,
    );
    logger.info(`[Orchestrator] stopped sandbox ${id}`);
    return this.get(owner, id);
  }

  async delete(owner: string, id: string): Promise<void> {
    this.requireSandbox(owner, id);
    await this.reclaimSandbox(id);
  }

  async extendTtl(
    owner: string,
    id: string,
    extendBy: number,
    options: ExtendTtlOptions = {},
  ): Promise<StoredResponse<SandboxView>> {
    if (!Number.isInteger(extendBy) || extendBy <= 0 || extendBy > this.config.maxExtendBySeconds) {
      throw new ValidationError(
        `extendBy must be an integer between 1 and ${this.config.maxExtendBySeconds} seconds`,
        { extend_by: extendBy },
      );
    }
    const request = {
      owner,
      key: options.idempotencyKey,
      method: 'POST',
      path: `/v1/sandboxes/${id}/extend_ttl`,
      body: JSON.stringify({ extend_by: extendBy }),
    };

    return this.ledger.execute(request, 200, async () => {
      const sandbox = this.requireSandbox(owner, id);
      const now = this.now();
      const old = sandbox.expiresAt;
      if (old === null) throw new SandboxTtlInfiniteError(id);
      if (old.getTime() < now.getTime()) throw new SandboxExpiredError(id, old);

      const expiresAt = new Date(Math.max(old.getTime(), now.getTime()) + extendBy * 1000);
      this.persistence.sandboxes.updateExpiresAt(id, expiresAt);
      logger.info(`[Orchestrator] extended ttl of ${id}`, {
        from: old.toISOString(),
        to: expiresAt.toISOString(),
      });
      return this.toView(
        { ...sandbox, expiresAt },
        this.persistence.sessions.findBySandboxId(id),
        now,
      );
    });
  }

  /**
   * Stop work, soft delete, then the managed workspace. Returns false when the sandbox was
   * already gone. A volume that cannot be removed is left for the orphan workspace sweep.
   */
  async reclaimSandbox(id: string): Promise<boolean> {
    return this.locks.runExclusive(
      id,
      async () => {
        const sandbox = this.persistence.sandboxes.findById(id);
        if (!sandbox || sandbox.deletedAt !== null) return false;

        const session = this.persistence.sessions.findBySandboxId(id);
        if (session) await this.teardown(session);
        this.persistence.sandboxes.softDelete(id, this.now());
        logger.info(`[Orchestrator] deleted sandbox ${id}`);

        const workspace = sandbox.workspaceId
          ? this.persistence.workspaces.findById(sandbox.workspaceId)
          : undefined;
        if (workspace?.managed && workspace.managedBySandboxId === id) {
          try {
            await this.workspaces.reclaim(workspace);
          } catch (err) {
            logger.warn(`[Orchestrator] workspace ${workspace.id} of ${id} left for GC`, {
              error: errorMessage(err),
            });
          }
        }
        return true;
      },
      this.config.startTimeoutMs,
    );
  }

  /** Tears down a session whose idle deadline passed, unless a keepalive got there first. */
  async reclaimIdleSession(sessionId: string): Promise<boolean> {
    const session = this.persistence.sessions.findById(sessionId);
    if (!session) return false;
    return this.locks.runExclusive(
      session.sandboxId,
      async () => {
        const current = this.persistence.sessions.findById(sessionId);
        if (!current || current.observedState !== 'running' || !isIdleExpired(current, this.now())) {
          return false;
        }
        await this.teardown(current);
        logger.info(`[Orchestrator] reclaimed idle session ${sessionId}`, {
          sandbox: current.sandboxId,
        });
        return true;
      },
      this.config.startTimeoutMs,
    );
  }

  /**
   * Tears down a session stuck in pending or starting for longer than any start of this process
   * can take. Such a row is what a process that died mid-start leaves behind.
   */
  async reclaimStaleStart(sessionId: string): Promise<boolean> {
    const session = this.persistence.sessions.findById(sessionId);
    if (!session) return false;
    return this.locks.runExclusive(
      session.sandboxId,
      async () => {
        const current = this.persistence.sessions.findById(sessionId);
        if (!current || !isStaleStart(current, this.now(), staleStartMs(this.config))) {
          return false;
        }
        await this.teardown(current);
        logger.warn(`[Orchestrator] reclaimed abandoned start ${sessionId}`, {
          sandbox: current.sandboxId,
          instance: current.instanceRef,
        });
        return true;
      },
      this.config.startTimeoutMs,
    );
  }

  /**
   * Instance first, then the row. The row is marked stopped before the driver call so
   * concurrent readers stop treating it as ready. Caller holds the sandbox lock.
   */
  private async teardown(session: SessionRecord): Promise<void> {
    this.persistence.sessions.markStopping(session.id);
    const instanceRef = session.instanceRef;
    if (instanceRef !== null) {
      await callDriver('destroy', this.config.driverTimeoutMs, () =>
        this.driver.destroy(instanceRef),
      );
    }
    this.persistence.sessions.delete(session.id);
    this.adapters.delete(session.id);
  }

  private requireSandbox(owner: string, id: string): SandboxRecord {
    const sandbox = this.persistence.sandboxes.findById(id);
    if (!sandbox || sandbox.deletedAt !== null || sandbox.owner !== owner) {
      throw new NotFoundError(`Sandbox not found: ${id}`, { sandbox_id: id });
    }
    return sandbox;
  }

  private requireProfile(sandbox: SandboxRecord): Profile {
    const profile = getProfile(this.config, sandbox.profileId);
    if (!profile) {
      throw new ValidationError(`Profile ${sandbox.profileId} is no longer configured`, {
        sandbox_id: sandbox.id,
        profile: sandbox.profileId,
      });
    }
    return profile;
  }

  private toRunning(session: SessionRecord): RunningSession {
    const endpoint = session.endpoint ?? '';
    let adapter = this.adapters.get(session.id);
    if (!adapter) {
      adapter = this.runtimes.create(session.runtimeType, endpoint);
      this.adapters.set(session.id, adapter);
    }
    return {
      sandboxId: session.sandboxId,
      sessionId: session.id,
      endpoint,
      runtimeType: session.runtimeType,
      adapter,
    };
  }

  private toView(
    sandbox: SandboxRecord,
    session: SessionRecord | undefined,
    now: Date,
  ): SandboxView {
    const status = deriveStatus(sandbox, session, now);
    return {
      id: sandbox.id,
      owner: sandbox.owner,
      profile: sandbox.profileId,
      capabilities: getProfile(this.config, sandbox.profileId)?.capabilities ?? [],
      status,
      workspaceId: sandbox.workspaceId,
      expiresAt: sandbox.expiresAt?.toISOString() ?? null,
      idleExpiresAt: status === 'ready' ? (session?.idleExpiresAt?.toISOString() ?? null) : null,
      createdAt: sandbox.createdAt.toISOString(),
    };
  }
}
