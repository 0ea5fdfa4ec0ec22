import path from 'node:path';
import BetterSqlite3, { type Database } from 'better-sqlite3';
import { getOS } from '../common/os/index.ts';
import { IdempotencyRepository } from './repositories/IdempotencyRepository.ts';
import { SandboxRepository } from './repositories/SandboxRepository.ts';
import { SessionRepository } from './repositories/SessionRepository.ts';
import { WorkspaceRepository } from './repositories/WorkspaceRepository.ts';

export class PersistenceBox {
  public readonly db: Database;
  public sandboxes: SandboxRepository;
  public sessions: SessionRepository;
  public workspaces: WorkspaceRepository;
  public idempotency: IdempotencyRepository;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const os = getOS();
      const dbDir = path.dirname(dbPath);
      if (!os.fs.exists(dbDir)) {
        os.fs.mkdir(dbDir, { recursive: true });
      }
    }

    this.db = new BetterSqlite3(dbPath);
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('journal_mode = WAL');

    this.initializeSchema();

    this.sandboxes = new SandboxRepository(this.db);
    this.sessions = new SessionRepository(this.db);
    this.workspaces = new WorkspaceRepository(this.db);
    this.idempotency = new IdempotencyRepository(this.db);
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS workspaces (
        id TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        managed INTEGER NOT NULL CHECK (managed IN (0, 1)),
        managed_by_sandbox_id TEXT,
        volume_ref TEXT NOT NULL,
        size_limit_mb INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS sandboxes (
        id TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        profile_id TEXT NOT NULL,
        workspace_id TEXT REFERENCES workspaces(id),
        expires_at INTEGER,
        deleted_at INTEGER,
        created_at INTEGER NOT NULL,
        CHECK (workspace_id IS NOT NULL OR deleted_at IS NOT NULL)
      );
      CREATE INDEX IF NOT EXISTS idx_sandboxes_owner ON sandboxes (owner, id);
      CREATE INDEX IF NOT EXISTS idx_sandboxes_expires ON sandboxes (expires_at);
      CREATE INDEX IF NOT EXISTS idx_sandboxes_workspace ON sandboxes (workspace_id);

      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        sandbox_id TEXT NOT NULL UNIQUE REFERENCES sandboxes(id),
        profile_id TEXT NOT NULL,
        runtime_type TEXT NOT NULL,
        desired_state TEXT NOT NULL CHECK (desired_state IN ('running', 'stopped')),
        observed_state TEXT NOT NULL CHECK (observed_state IN ('pending', 'starting', 'running', 'failed')),
        instance_ref TEXT,
        endpoint TEXT,
        idle_expires_at INTEGER,
        created_at INTEGER NOT NULL,
        last_active_at INTEGER NOT NULL,
        last_error TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_sessions_idle ON sessions (idle_expires_at);

      CREATE TABLE IF NOT EXISTS idempotency_keys (
        owner TEXT NOT NULL,
        key TEXT NOT NULL,
        fingerprint TEXT NOT NULL,
        response_snapshot TEXT NOT NULL,
        status_code INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL,
        PRIMARY KEY (owner, key)
      );
      CREATE INDEX IF NOT EXISTS idx_idempotency_expires ON idempotency_keys (expires_at);
    `);
  }

  /** Runs `fn` inside one SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

export * from './types.ts';
