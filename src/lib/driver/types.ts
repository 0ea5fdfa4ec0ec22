import type { Profile } from '../config.ts';
import type { WorkspaceRecord } from '../persistence/index.ts';

/** Labels every instance carries; orphan detection keys on `sessionId`. */
export interface InstanceLabels {
  owner: string;
  sandboxId: string;
  sessionId: string;
  workspaceId: string;
  profileId: string;
}

export interface StartedInstance {
  instanceRef: string;
  endpoint: string;
}

export interface InstanceSummary {
  instanceRef: string;
  labels: Record<string, string>;
}

/**
 * Compute engine contract. `destroy` and `deleteVolume` succeed when the target is already gone.
 */
export interface ComputeDriver {
  start(profile: Profile, workspace: WorkspaceRecord, labels: InstanceLabels): Promise<StartedInstance>;
  stop(instanceRef: string): Promise<void>;
  destroy(instanceRef: string): Promise<void>;
  listInstances(labelFilter: Record<string, string>): Promise<InstanceSummary[]>;
  createVolume(name: string, labels: Record<string, string>): Promise<string>;
  deleteVolume(volumeRef: string): Promise<void>;
}

export function labelKeys(prefix: string) {
  return {
    managed: `${prefix}.managed`,
    owner: `${prefix}.owner`,
    sandboxId: `${prefix}.sandbox_id`,
    sessionId: `${prefix}.session_id`,
    workspaceId: `${prefix}.workspace_id`,
    profileId: `${prefix}.profile_id`,
  } as const;
}

/** Flattens instance labels into the namespaced key/value form drivers attach. */
export function toLabelMap(prefix: string, labels: InstanceLabels): Record<string, string> {
  const keys = labelKeys(prefix);
  return {
    [keys.managed]: 'true',
    [keys.owner]: labels.owner,
    [keys.sandboxId]: labels.sandboxId,
    [keys.sessionId]: labels.sessionId,
    [keys.workspaceId]: labels.workspaceId,
    [keys.profileId]: labels.profileId,
  };
}
