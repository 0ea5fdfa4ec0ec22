import { InvalidTransitionError, NotFoundError, SandboxExpiredError } from '../errors.ts';
import type { SandboxRecord, SessionRecord } from '../persistence/index.ts';
import type { SandboxStatus } from './types.ts';

/**
 * Legal moves between derived sandbox statuses. `expired` and `deleted` are terminal:
 * nothing leads from them back to a live status.
 */
export const VALID_TRANSITIONS: Readonly<Record<SandboxStatus, readonly SandboxStatus[]>> = {
  idle: ['starting', 'expired', 'deleted'],
  starting: ['ready', 'failed', 'deleted'],
  ready: ['idle', 'expired', 'deleted'],
  failed: ['starting', 'deleted'],
  expired: ['deleted'],
  deleted: [],
};

export function canTransition(from: SandboxStatus, to: SandboxStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: SandboxStatus): boolean {
  return status === 'expired' || status === 'deleted';
}

export function isIdleExpired(session: SessionRecord, now: Date): boolean {
  return session.idleExpiresAt !== null && session.idleExpiresAt.getTime() < now.getTime();
}

/** Pending or starting with no progress for longer than `thresholdMs`. */
export function isStaleStart(session: SessionRecord, now: Date, thresholdMs: number): boolean {
  return (
    (session.observedState === 'pending' || session.observedState === 'starting') &&
    session.lastActiveAt.getTime() < now.getTime() - thresholdMs
  );
}

export function isSandboxExpired(sandbox: SandboxRecord, now: Date): boolean {
  return sandbox.expiresAt !== null && sandbox.expiresAt.getTime() < now.getTime();
}

/**
 * Computes the composite status of a sandbox from its record and its session row, if any.
 */
export function deriveStatus(
  sandbox: SandboxRecord,
  session: SessionRecord | undefined,
  now: Date,
): SandboxStatus {
  if (sandbox.deletedAt !== null) return 'deleted';
  if (isSandboxExpired(sandbox, now)) return 'expired';
  if (!session) return 'idle';

  switch (session.observedState) {
    case 'pending':
    case 'starting':
      return 'starting';
    case 'running':
      if (session.desiredState === 'stopped') return 'idle';
      return isIdleExpired(session, now) ? 'idle' : 'ready';
    case 'failed':
      return 'failed';
  }
}

/**
 * Throws the error a caller should see when `from → to` is not allowed.
 * Terminal states get their own codes rather than a generic transition error.
 */
export function assertTransition(
  sandbox: SandboxRecord,
  from: SandboxStatus,
  to: SandboxStatus,
): void {
  if (canTransition(from, to)) return;

  if (from === 'deleted') {
    throw new NotFoundError(`Sandbox not found: ${sandbox.id}`, { sandbox_id: sandbox.id });
  }
  if (from === 'expired' && sandbox.expiresAt !== null) {
    throw new SandboxExpiredError(sandbox.id, sandbox.expiresAt);
  }
  throw new InvalidTransitionError(`Sandbox ${sandbox.id} cannot go from ${from} to ${to}`, {
    sandbox_id: sandbox.id,
    from,
    to,
  });
}

export * from './types.ts';
