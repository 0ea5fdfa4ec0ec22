export interface SandboxRecord {
  id: string;
  owner: string;
  profileId: string;
  /** Null only once the sandbox is soft-deleted and its managed workspace is gone. */
  workspaceId: string | null;
  /** Null means the sandbox never expires. */
  expiresAt: Date | null;
  deletedAt: Date | null;
  createdAt: Date;
}

export type SessionState = 'pending' | 'starting' | 'running' | 'failed';
export type DesiredState = 'running' | 'stopped';

export const LIVE_SESSION_STATES: readonly SessionState[] = ['pending', 'starting', 'running'];

export interface SessionRecord {
  id: string;
  sandboxId: string;
  profileId: string;
  runtimeType: string;
  desiredState: DesiredState;
  observedState: SessionState;
  instanceRef: string | null;
  endpoint: string | null;
  /** Meaningful only while running. */
  idleExpiresAt: Date | null;
  createdAt: Date;
  lastActiveAt: Date;
  lastError: string | null;
}

export interface WorkspaceRecord {
  id: string;
  owner: string;
  managed: boolean;
  managedBySandboxId: string | null;
  volumeRef: string;
  sizeLimitMb: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface IdempotencyRecord {
  owner: string;
  key: string;
  fingerprint: string;
  responseSnapshot: string;
  statusCode: number;
  createdAt: Date;
  expiresAt: Date;
}

export function toDate(ms: number): Date;
export function toDate(ms: number | null): Date | null;
export function toDate(ms: number | null): Date | null {
  return ms === null ? null : new Date(ms);
}

export function toMillis(date: Date): number;
export function toMillis(date: Date | null): number | null;
export function toMillis(date: Date | null): number | null {
  return date === null ? null : date.getTime();
}
