import type { ShoalConfig } from '../config.ts';
import { DockerDriver } from './DockerDriver.ts';
import { MockDriver } from './mock.ts';
import type { ComputeDriver } from './types.ts';

export function createDriver(config: ShoalConfig): ComputeDriver {
  if (config.driver === 'mock') {
    return new MockDriver(config.labelPrefix);
  }
  return new DockerDriver({
    labelPrefix: config.labelPrefix,
    hostAddress: config.docker.hostAddress,
    mountPath: config.docker.mountPath,
    network: config.docker.network,
    timeoutMs: config.driverTimeoutMs,
  });
}

export { DockerDriver } from './DockerDriver.ts';
export { callDriver } from './guard.ts';
export { MockDriver } from './mock.ts';
export * from './types.ts';
