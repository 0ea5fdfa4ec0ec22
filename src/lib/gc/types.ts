export type GcTaskName =
  | 'expired-sandboxes'
  | 'idle-sessions'
  | 'stale-sessions'
  | 'orphan-workspaces'
  | 'orphan-instances'
  | 'expired-idempotency';

export interface GcResult {
  task: GcTaskName;
  cleaned: number;
  errors: number;
  durationMs: number;
}

export interface GcTask {
  readonly name: GcTaskName;
  readonly intervalMs: number;
  run(): Promise<GcResult>;
}
