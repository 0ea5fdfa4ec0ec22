import type { Profile } from '../config.ts';
import { DriverError } from '../errors.ts';
import type { WorkspaceRecord } from '../persistence/index.ts';
import {
  type ComputeDriver,
  type InstanceLabels,
  type InstanceSummary,
  type StartedInstance,
  toLabelMap,
} from './types.ts';

export interface MockInstance {
  instanceRef: string;
  labels: Record<string, string>;
  running: boolean;
  endpoint: string;
}

/**
 * In-memory driver for tests and `--mock` runs. Failures can be injected per operation.
 */
export class MockDriver implements ComputeDriver {
  readonly instances: Map<string, MockInstance> = new Map();
  readonly volumes: Map<string, Record<string, string>> = new Map();
  readonly calls: { op: string; ref: string }[] = [];

  /** Artificial latency for `start`, in milliseconds. */
  startDelayMs = 0;
  private failures: Map<string, number> = new Map();
  private counter = 0;

  constructor(private labelPrefix = 'shoal') {}

  /** Makes the next `times` calls of `op` throw a DriverError. */
  failNext(op: 'start' | 'destroy' | 'deleteVolume' | 'createVolume' | 'listInstances', times = 1) {
    this.failures.set(op, times);
  }

  private maybeFail(op: string): void {
    const remaining = this.failures.get(op) ?? 0;
    if (remaining > 0) {
      this.failures.set(op, remaining - 1);
      throw new DriverError(`mock ${op} failure`, { operation: op });
    }
  }

  /** Registers an instance the control plane did not create through `start`. */
  addInstance(instanceRef: string, labels: Record<string, string>): void {
    this.instances.set(instanceRef, {
      instanceRef,
      labels,
      running: true,
      endpoint: `mock://${instanceRef}`,
    });
  }

  async start(
    _profile: Profile,
    _workspace: WorkspaceRecord,
    labels: InstanceLabels,
  ): Promise<StartedInstance> {
    this.calls.push({ op: 'start', ref: labels.sessionId });
    if (this.startDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.startDelayMs));
    }
    this.maybeFail('start');
    const instanceRef = `mock-${++this.counter}`;
    const endpoint = `mock://${instanceRef}`;
    this.instances.set(instanceRef, {
      instanceRef,
      labels: toLabelMap(this.labelPrefix, labels),
      running: true,
      endpoint,
    });
    return { instanceRef, endpoint };
  }

  async stop(instanceRef: string): Promise<void> {
    this.calls.push({ op: 'stop', ref: instanceRef });
    const instance = this.instances.get(instanceRef);
    if (instance) instance.running = false;
  }

  async destroy(instanceRef: string): Promise<void> {
    this.calls.push({ op: 'destroy', ref: instanceRef });
    this.maybeFail('destroy');
    this.instances.delete(instanceRef);
  }

  async listInstances(labelFilter: Record<string, string>): Promise<InstanceSummary[]> {
    this.maybeFail('listInstances');
    return [...this.instances.values()]
      .filter((instance) =>
        Object.entries(labelFilter).every(([key, value]) => instance.labels[key] === value),
      )
      .map((instance) => ({ instanceRef: instance.instanceRef, labels: { ...instance.labels } }));
  }

  async createVolume(name: string, labels: Record<string, string>): Promise<string> {
    this.calls.push({ op: 'createVolume', ref: name });
    this.maybeFail('createVolume');
    this.volumes.set(name, labels);
    return name;
  }

  async deleteVolume(volumeRef: string): Promise<void> {
    this.calls.push({ op: 'deleteVolume', ref: volumeRef });
    this.maybeFail('deleteVolume');
    this.volumes.delete(volumeRef);
  }

  countCalls(op: string): number {
    return this.calls.filter((call) => call.op === op).length;
  }
}
