import type { Database } from 'better-sqlite3';
import {
  type DesiredState,
  LIVE_SESSION_STATES,
  type SessionRecord,
  type SessionState,
  toDate,
  toMillis,
} from '../types.ts';

interface SessionRow {
  id: string;
  sandbox_id: string;
  profile_id: string;
  runtime_type: string;
  desired_state: DesiredState;
  observed_state: SessionState;
  instance_ref: string | null;
  endpoint: string | null;
  idle_expires_at: number | null;
  created_at: number;
  last_active_at: number;
  last_error: string | null;
}

export class SessionRepository {
  constructor(private db: Database) {}

  private mapRowToSession(row: SessionRow): SessionRecord {
    return {
      id: row.id,
      sandboxId: row.sandbox_id,
      profileId: row.profile_id,
      runtimeType: row.runtime_type,
      desiredState: row.desired_state,
      observedState: row.observed_state,
      instanceRef: row.instance_ref,
      endpoint: row.endpoint,
      idleExpiresAt: toDate(row.idle_expires_at),
      createdAt: toDate(row.created_at),
      lastActiveAt: toDate(row.last_active_at),
      lastError: row.last_error,
    };
  }

  /**
   * Atomic unique insert: at most one session row exists per sandbox.
   * Returns false when another row already holds the sandbox.
   */
  insertIfAbsent(session: SessionRecord): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO sessions (id, sandbox_id, profile_id, runtime_type, desired_state, observed_state,
           instance_ref, endpoint, idle_expires_at, created_at, last_active_at, last_error)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(sandbox_id) DO NOTHING`,
      )
      .run(
        session.id,
        session.sandboxId,
        session.profileId,
        session.runtimeType,
        session.desiredState,
        session.observedState,
        session.instanceRef,
        session.endpoint,
        toMillis(session.idleExpiresAt),
        toMillis(session.createdAt),
        toMillis(session.lastActiveAt),
        session.lastError,
      );
    return result.changes === 1;
  }

  findById(id: string): SessionRecord | undefined {
    const row = this.db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
    return row ? this.mapRowToSession(row) : undefined;
  }

  findBySandboxId(sandboxId: string): SessionRecord | undefined {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE sandbox_id = ?')
      .get(sandboxId);
    return row ? this.mapRowToSession(row) : undefined;
  }

  markStarting(id: string, instanceRef: string, endpoint: string, now: Date): void {
    this.db
      .prepare(
        `UPDATE sessions SET observed_state = 'starting', instance_ref = ?, endpoint = ?, last_active_at = ?
         WHERE id = ?`,
      )
      .run(instanceRef, endpoint, now.getTime(), id);
  }

  markRunning(id: string, idleExpiresAt: Date, now: Date): void {
    this.db
      .prepare(
        `UPDATE sessions SET observed_state = 'running', idle_expires_at = ?, last_active_at = ?, last_error = NULL
         WHERE id = ?`,
      )
      .run(idleExpiresAt.getTime(), now.getTime(), id);
  }

  /** `instanceRef` is what is left behind after cleanup; null once the instance is gone. */
  markFailed(id: string, error: string, instanceRef: string | null): void {
    this.db
      .prepare(
        `UPDATE sessions SET observed_state = 'failed', desired_state = 'stopped', instance_ref = ?,
           endpoint = NULL, idle_expires_at = NULL, last_error = ?
         WHERE id = ?`,
      )
      .run(instanceRef, error, id);
  }

  /** Returns false when the session is gone or already marked for teardown. */
  touch(id: string, idleExpiresAt: Date, now: Date): boolean {
    const result = this.db
      .prepare(
        `UPDATE sessions SET idle_expires_at = ?, last_active_at = ?
         WHERE id = ? AND desired_state = 'running'`,
      )
      .run(idleExpiresAt.getTime(), now.getTime(), id);
    return result.changes === 1;
  }

  markStopping(id: string): void {
    this.db.prepare(`UPDATE sessions SET desired_state = 'stopped' WHERE id = ?`).run(id);
  }

  delete(id: string): void {
    this.db.prepare('DELETE FROM sessions WHERE id = ?').run(id);
  }

  findIdleExpired(now: Date, limit: number): SessionRecord[] {
    const rows = this.db
      .prepare<[number, number], SessionRow>(
        `SELECT * FROM sessions
         WHERE observed_state = 'running' AND idle_expires_at IS NOT NULL AND idle_expires_at < ?
         ORDER BY idle_expires_at
         LIMIT ?`,
      )
      .all(now.getTime(), limit);
    return rows.map((row) => this.mapRowToSession(row));
  }

  /** Sessions still pending or starting whose last progress is older than `cutoff`. */
  findStaleStarts(cutoff: Date, limit: number): SessionRecord[] {
    const rows = this.db
      .prepare<[number, number], SessionRow>(
        `SELECT * FROM sessions
         WHERE observed_state IN ('pending', 'starting') AND last_active_at < ?
         ORDER BY last_active_at
         LIMIT ?`,
      )
      .all(cutoff.getTime(), limit);
    return rows.map((row) => this.mapRowToSession(row));
  }

  /** Ids of sessions in a non-terminal state. */
  listLiveIds(): Set<string> {
    const placeholders = LIVE_SESSION_STATES.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], { id: string }>(
        `SELECT id FROM sessions WHERE observed_state IN (${placeholders})`,
      )
      .all(...LIVE_SESSION_STATES);
    return new Set(rows.map((row) => row.id));
  }
}
