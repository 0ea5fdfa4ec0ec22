import { createHash } from 'node:crypto';
import { ConflictError, ValidationError } from '../errors.ts';
import { logger } from '../logger.ts';
import type { IdempotencyRecord } from '../persistence/index.ts';
import type { IdempotencyRepository } from '../persistence/repositories/IdempotencyRepository.ts';

const KEY_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface IdempotentRequest {
  owner: string;
  /** Client-supplied key; absent means the request is not idempotent. */
  key?: string;
  method: string;
  path: string;
  /** Canonical serialized request body. */
  body: string;
}

export interface StoredResponse<T> {
  statusCode: number;
  body: T;
  /** Exact JSON text that was recorded; identical on every replay. */
  snapshot: string;
  replayed: boolean;
}

export interface LedgerOptions {
  enabled: boolean;
  ttlSeconds: number;
  now?: () => Date;
}

export function computeFingerprint(method: string, path: string, body: string): string {
  return createHash('sha256').update(`${method}:${path}:${body}`).digest('hex');
}

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/**
 * Replay-on-retry for mutating operations, keyed by (owner, key).
 *
 * The ledger replays a caller's own earlier result. It does not serialize two different
 * requests that race without sharing a key.
 */
export class IdempotencyLedger {
  private now: () => Date;

  constructor(
    private repo: IdempotencyRepository,
    private options: LedgerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Returns the stored response to replay, or undefined when the caller should execute
   * (and then call `save` exactly once).
   */
  check<T = unknown>(request: IdempotentRequest): StoredResponse<T> | undefined {
    const key = request.key;
    if (!this.enabled || key === undefined) return undefined;
    this.assertKey(key);

    const record = this.repo.find(request.owner, key);
    if (!record) return undefined;

    if (record.expiresAt.getTime() <= this.now().getTime()) {
      logger.debug('[Idempotency] expired key, deleting', { owner: request.owner, key });
      this.repo.delete(request.owner, key);
      return undefined;
    }

    return this.replay<T>(record, request);
  }

  /**
   * Records the response of a completed operation. If another request saved the same key first,
   * that record is authoritative and is returned instead.
   */
  save<T>(request: IdempotentRequest, response: T, statusCode: number): StoredResponse<T> {
    const snapshot = JSON.stringify(response);
    const fresh: StoredResponse<T> = {
      statusCode,
      body: parseSnapshot<T>(snapshot),
      snapshot,
      replayed: false,
    };
    const key = request.key;
    if (!this.enabled || key === undefined) return fresh;
    this.assertKey(key);

    const now = this.now();
    const record: IdempotencyRecord = {
      owner: request.owner,
      key,
      fingerprint: computeFingerprint(request.method, request.path, request.body),
      responseSnapshot: snapshot,
      statusCode,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.options.ttlSeconds * 1000),
    };

    if (this.repo.insertIfAbsent(record)) {
      logger.debug('[Idempotency] saved key', { owner: request.owner, key });
      return fresh;
    }

    const winner = this.repo.find(request.owner, key);
    if (!winner) {
      // Purged between our insert and this read.
      this.repo.insertIfAbsent(record);
      return fresh;
    }
    logger.warn('[Idempotency] lost save race, using stored result', {
      owner: request.owner,
      key,
    });
    return this.replay<T>(winner, request);
  }

  /**
   * check → operation → save. The operation runs only when there is nothing to replay.
   */
  async execute<T>(
    request: IdempotentRequest,
    statusCode: number,
    operation: () => Promise<T>,
  ): Promise<StoredResponse<T>> {
    const cached = this.check<T>(request);
    if (cached) return cached;
    const response = await operation();
    return this.save(request, response, statusCode);
  }

  purgeExpired(): number {
    return this.repo.deleteExpired(this.now());
  }

  private assertKey(key: string): void {
    if (!isValidKey(key)) {
      throw new ValidationError(
        'Invalid idempotency key: use 1-128 letters, digits, dashes or underscores',
        { key: key.slice(0, 128) },
      );
    }
  }

  private replay<T>(record: IdempotencyRecord, request: IdempotentRequest): StoredResponse<T> {
    const fingerprint = computeFingerprint(request.method, request.path, request.body);
    if (record.fingerprint !== fingerprint) {
      logger.warn('[Idempotency] key reused with a different request', {
        owner: request.owner,
        key: record.key,
      });
      throw new ConflictError('Idempotency key already used with different request parameters', {
        key: record.key,
      });
    }
    logger.info('[Idempotency] replaying stored response', {
      owner: request.owner,
      key: record.key,
    });
    return {
      statusCode: record.statusCode,
      body: parseSnapshot<T>(record.responseSnapshot),
      snapshot: record.responseSnapshot,
      replayed: true,
    };
  }
}

/** Snapshots are written only by `save` from a value of type T. */
function parseSnapshot<T>(snapshot: string): T {
  return JSON.parse(snapshot);
}
