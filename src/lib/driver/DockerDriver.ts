import { getOS } from '../common/os/index.ts';
import type { Profile } from '../config.ts';
import { DriverError } from '../errors.ts';
import { logger } from '../logger.ts';
import type { WorkspaceRecord } from '../persistence/index.ts';
import {
  type ComputeDriver,
  type InstanceLabels,
  type InstanceSummary,
  type StartedInstance,
  toLabelMap,
} from './types.ts';

export interface DockerDriverOptions {
  labelPrefix: string;
  hostAddress: string;
  mountPath: string;
  network?: string;
  timeoutMs: number;
}

const NOT_FOUND = /no such (container|volume|object)/i;

/**
 * Drives the `docker` CLI. Runtime ports are published on `hostAddress` with a random host port.
 */
export class DockerDriver implements ComputeDriver {
  private os = getOS();

  constructor(private options: DockerDriverOptions) {}

  private async docker(args: string[]) {
    const result = await this.os.proc.run('docker', args, {
      reject: false,
      timeoutMs: this.options.timeoutMs,
    });
    logger.debug(`[Docker] ${result.command} -> ${result.exitCode}`);
    return result;
  }

  private fail(operation: string, stderr: string): never {
    throw new DriverError(`docker ${operation} failed: ${stderr.trim() || 'unknown error'}`, {
      operation,
    });
  }

  async start(
    profile: Profile,
    workspace: WorkspaceRecord,
    labels: InstanceLabels,
  ): Promise<StartedInstance> {
    const args = ['run', '-d'];
    for (const [key, value] of Object.entries(toLabelMap(this.options.labelPrefix, labels))) {
      args.push('--label', `${key}=${value}`);
    }
    args.push('-v', `${workspace.volumeRef}:${this.options.mountPath}`);
    args.push('--cpus', String(profile.resources.cpus), '--memory', profile.resources.memory);
    args.push('-p', `${this.options.hostAddress}::${profile.runtimePort}`);
    if (this.options.network) {
      args.push('--network', this.options.network);
    }
    for (const [key, value] of Object.entries(profile.env)) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(profile.image);

    const run = await this.docker(args);
    if (run.exitCode !== 0) this.fail('run', run.stderr);
    const instanceRef = run.stdout.trim();

    const port = await this.docker(['port', instanceRef, `${profile.runtimePort}/tcp`]);
    if (port.exitCode !== 0) {
      await this.destroy(instanceRef);
      this.fail('port', port.stderr);
    }
    const endpoint = parsePortMapping(port.stdout, this.options.hostAddress);
    if (!endpoint) {
      await this.destroy(instanceRef);
      this.fail('port', `no mapping for ${profile.runtimePort}/tcp`);
    }

    return { instanceRef, endpoint };
  }

  async stop(instanceRef: string): Promise<void> {
    const result = await this.docker(['stop', instanceRef]);
    if (result.exitCode !== 0 && !NOT_FOUND.test(result.stderr)) this.fail('stop', result.stderr);
  }

  async destroy(instanceRef: string): Promise<void> {
    const result = await this.docker(['rm', '-f', '-v', instanceRef]);
    if (result.exitCode !== 0 && !NOT_FOUND.test(result.stderr)) this.fail('rm', result.stderr);
  }

  async listInstances(labelFilter: Record<string, string>): Promise<InstanceSummary[]> {
    const args = ['ps', '-a', '--no-trunc', '--format', '{{.ID}}\t{{.Labels}}'];
    for (const [key, value] of Object.entries(labelFilter)) {
      args.push('--filter', `label=${key}=${value}`);
    }
    const result = await this.docker(args);
    if (result.exitCode !== 0) this.fail('ps', result.stderr);

    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((line) => {
        const [instanceRef = '', rawLabels = ''] = line.split('\t');
        return { instanceRef, labels: parseLabels(rawLabels) };
      });
  }

  async createVolume(name: string, labels: Record<string, string>): Promise<string> {
    const args = ['volume', 'create'];
    for (const [key, value] of Object.entries(labels)) {
      args.push('--label', `${key}=${value}`);
    }
    args.push(name);
    const result = await this.docker(args);
    if (result.exitCode !== 0) this.fail('volume create', result.stderr);
    return result.stdout.trim() || name;
  }

  async deleteVolume(volumeRef: string): Promise<void> {
    const result = await this.docker(['volume', 'rm', volumeRef]);
    if (result.exitCode !== 0 && !NOT_FOUND.test(result.stderr)) {
      this.fail('volume rm', result.stderr);
    }
  }
}

/**
 * `docker port` prints one mapping per line, e.g. `127.0.0.1:49153` or `[::]:49153`.
 */
export function parsePortMapping(output: string, hostAddress: string): string | undefined {
  for (const line of output.split('\n')) {
    const match = line.trim().match(/:(\d+)$/);
    if (match?.[1]) return `http://${hostAddress}:${match[1]}`;
  }
  return undefined;
}

/**
 * Parses the `{{.Labels}}` column: `k1=v1,k2=v2`.
 */
export function parseLabels(raw: string): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    labels[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return labels;
}
