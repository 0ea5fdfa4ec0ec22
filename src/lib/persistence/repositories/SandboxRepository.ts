import type { Database } from 'better-sqlite3';
import { type SandboxRecord, toDate, toMillis } from '../types.ts';

interface SandboxRow {
  id: string;
  owner: string;
  profile_id: string;
  workspace_id: string | null;
  expires_at: number | null;
  deleted_at: number | null;
  created_at: number;
}

export interface ListPage {
  cursor?: string;
  limit: number;
}

export class SandboxRepository {
  constructor(private db: Database) {}

  private mapRowToSandbox(row: SandboxRow): SandboxRecord {
    return {
      id: row.id,
      owner: row.owner,
      profileId: row.profile_id,
      workspaceId: row.workspace_id,
      expiresAt: toDate(row.expires_at),
      deletedAt: toDate(row.deleted_at),
      createdAt: toDate(row.created_at),
    };
  }

  create(sandbox: SandboxRecord): void {
    this.db
      .prepare(
        `INSERT INTO sandboxes (id, owner, profile_id, workspace_id, expires_at, deleted_at, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        sandbox.id,
        sandbox.owner,
        sandbox.profileId,
        sandbox.workspaceId,
        toMillis(sandbox.expiresAt),
        toMillis(sandbox.deletedAt),
        toMillis(sandbox.createdAt),
      );
  }

  /** Includes soft-deleted rows. */
  findById(id: string): SandboxRecord | undefined {
    const row = this.db.prepare<[string], SandboxRow>('SELECT * FROM sandboxes WHERE id = ?').get(id);
    return row ? this.mapRowToSandbox(row) : undefined;
  }

  /** Non-deleted sandboxes of an owner, keyset-paginated by id. */
  listByOwner(owner: string, page: ListPage): SandboxRecord[] {
    const rows = this.db
      .prepare<[string, string, number], SandboxRow>(
        `SELECT * FROM sandboxes
         WHERE owner = ? AND deleted_at IS NULL AND id > ?
         ORDER BY id
         LIMIT ?`,
      )
      .all(owner, page.cursor ?? '', page.limit);
    return rows.map((row) => this.mapRowToSandbox(row));
  }

  findExpired(now: Date, limit: number): SandboxRecord[] {
    const rows = this.db
      .prepare<[number, number], SandboxRow>(
        `SELECT * FROM sandboxes
         WHERE deleted_at IS NULL AND expires_at IS NOT NULL AND expires_at < ?
         ORDER BY expires_at
         LIMIT ?`,
      )
      .all(now.getTime(), limit);
    return rows.map((row) => this.mapRowToSandbox(row));
  }

  updateExpiresAt(id: string, expiresAt: Date): void {
    this.db
      .prepare('UPDATE sandboxes SET expires_at = ? WHERE id = ? AND deleted_at IS NULL')
      .run(expiresAt.getTime(), id);
  }

  softDelete(id: string, now: Date): boolean {
    const result = this.db
      .prepare('UPDATE sandboxes SET deleted_at = ? WHERE id = ? AND deleted_at IS NULL')
      .run(now.getTime(), id);
    return result.changes === 1;
  }

  countLiveByWorkspace(workspaceId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>(
        'SELECT COUNT(*) AS n FROM sandboxes WHERE workspace_id = ? AND deleted_at IS NULL',
      )
      .get(workspaceId);
    return row?.n ?? 0;
  }

  /** Drops the workspace reference from soft-deleted sandboxes only. */
  detachWorkspace(workspaceId: string): void {
    this.db
      .prepare(
        'UPDATE sandboxes SET workspace_id = NULL WHERE workspace_id = ? AND deleted_at IS NOT NULL',
      )
      .run(workspaceId);
  }
}
