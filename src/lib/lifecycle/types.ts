export type SandboxStatus = 'idle' | 'starting' | 'ready' | 'failed' | 'expired' | 'deleted';

export const SANDBOX_STATUSES: readonly SandboxStatus[] = [
  'idle',
  'starting',
  'ready',
  'failed',
  'expired',
  'deleted',
];
