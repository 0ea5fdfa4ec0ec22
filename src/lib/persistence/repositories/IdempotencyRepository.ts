import type { Database } from 'better-sqlite3';
import { type IdempotencyRecord, toDate, toMillis } from '../types.ts';

interface IdempotencyRow {
  owner: string;
  key: string;
  fingerprint: string;
  response_snapshot: string;
  status_code: number;
  created_at: number;
  expires_at: number;
}

export class IdempotencyRepository {
  constructor(private db: Database) {}

  private mapRowToRecord(row: IdempotencyRow): IdempotencyRecord {
    return {
      owner: row.owner,
      key: row.key,
      fingerprint: row.fingerprint,
      responseSnapshot: row.response_snapshot,
      statusCode: row.status_code,
      createdAt: toDate(row.created_at),
      expiresAt: toDate(row.expires_at),
    };
  }

  find(owner: string, key: string): IdempotencyRecord | undefined {
    const row = this.db
      .prepare<[string, string], IdempotencyRow>(
        'SELECT * FROM idempotency_keys WHERE owner = ? AND key = ?',
      )
      .get(owner, key);
    return row ? this.mapRowToRecord(row) : undefined;
  }

  /** Returns false when a record for (owner, key) already exists. */
  insertIfAbsent(record: IdempotencyRecord): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO idempotency_keys (owner, key, fingerprint, response_snapshot, status_code, created_at, expires_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(owner, key) DO NOTHING`,
      )
      .run(
        record.owner,
        record.key,
        record.fingerprint,
        record.responseSnapshot,
        record.statusCode,
        toMillis(record.createdAt),
        toMillis(record.expiresAt),
      );
    return result.changes === 1;
  }

  delete(owner: string, key: string): void {
    this.db.prepare('DELETE FROM idempotency_keys WHERE owner = ? AND key = ?').run(owner, key);
  }

  deleteExpired(now: Date): number {
    const result = this.db
      .prepare('DELETE FROM idempotency_keys WHERE expires_at <= ?')
      .run(now.getTime());
    return result.changes;
  }
}
