import type { Database } from 'better-sqlite3';
import { type WorkspaceRecord, toDate, toMillis } from '../types.ts';

interface WorkspaceRow {
  id: string;
  owner: string;
  managed: number;
  managed_by_sandbox_id: string | null;
  volume_ref: string;
  size_limit_mb: number;
  created_at: number;
  updated_at: number;
}

export class WorkspaceRepository {
  constructor(private db: Database) {}

  private mapRowToWorkspace(row: WorkspaceRow): WorkspaceRecord {
    return {
      id: row.id,
      owner: row.owner,
      managed: row.managed === 1,
      managedBySandboxId: row.managed_by_sandbox_id,
      volumeRef: row.volume_ref,
      sizeLimitMb: row.size_limit_mb,
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
    };
  }

  create(workspace: WorkspaceRecord): void {
    this.db
      .prepare(
        `INSERT INTO workspaces (id, owner, managed, managed_by_sandbox_id, volume_ref, size_limit_mb, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        workspace.id,
        workspace.owner,
        workspace.managed ? 1 : 0,
        workspace.managedBySandboxId,
        workspace.volumeRef,
        workspace.sizeLimitMb,
        toMillis(workspace.createdAt),
        toMillis(workspace.updatedAt),
      );
  }

  findById(id: string): WorkspaceRecord | undefined {
    const row = this.db
      .prepare<[string], WorkspaceRow>('SELECT * FROM workspaces WHERE id = ?')
      .get(id);
    return row ? this.mapRowToWorkspace(row) : undefined;
  }

  listByOwner(owner: string): WorkspaceRecord[] {
    const rows = this.db
      .prepare<[string], WorkspaceRow>('SELECT * FROM workspaces WHERE owner = ? ORDER BY id')
      .all(owner);
    return rows.map((row) => this.mapRowToWorkspace(row));
  }

  delete(id: string): void {
    this.db.prepare('DELETE FROM workspaces WHERE id = ?').run(id);
  }

  /** Managed workspaces whose owning sandbox is unset, missing, or soft-deleted. */
  findOrphanedManaged(limit: number): WorkspaceRecord[] {
    const rows = this.db
      .prepare<[number], WorkspaceRow>(
        `SELECT w.* FROM workspaces w
         WHERE w.managed = 1
           AND NOT EXISTS (
             SELECT 1 FROM sandboxes s
             WHERE s.id = w.managed_by_sandbox_id AND s.deleted_at IS NULL
           )
         ORDER BY w.id
         LIMIT ?`,
      )
      .all(limit);
    return rows.map((row) => this.mapRowToWorkspace(row));
  }

  /** External workspaces not referenced by any non-deleted sandbox. */
  findUnreferencedExternal(limit: number): WorkspaceRecord[] {
    const rows = this.db
      .prepare<[number], WorkspaceRow>(
        `SELECT w.* FROM workspaces w
         WHERE w.managed = 0
           AND NOT EXISTS (
             SELECT 1 FROM sandboxes s
             WHERE s.workspace_id = w.id AND s.deleted_at IS NULL
           )
         ORDER BY w.id
         LIMIT ?`,
      )
      .all(limit);
    return rows.map((row) => this.mapRowToWorkspace(row));
  }
}
