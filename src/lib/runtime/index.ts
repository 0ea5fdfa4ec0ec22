import { ValidationError } from '../errors.ts';
import { HttpRuntimeAdapter } from './HttpRuntimeAdapter.ts';
import { MockRuntimeAdapter } from './mock.ts';
import type { RuntimeAdapter, RuntimeAdapterFactory } from './types.ts';

export class RuntimeRegistry {
  private factories: Map<string, RuntimeAdapterFactory> = new Map();

  register(runtimeType: string, factory: RuntimeAdapterFactory): this {
    this.factories.set(runtimeType, factory);
    return this;
  }

  has(runtimeType: string): boolean {
    return this.factories.has(runtimeType);
  }

  create(runtimeType: string, endpoint: string): RuntimeAdapter {
    const factory = this.factories.get(runtimeType);
    if (!factory) {
      throw new ValidationError(`Unknown runtime type: ${runtimeType}`, {
        runtime_type: runtimeType,
        known: [...this.factories.keys()],
      });
    }
    return factory(endpoint);
  }
}

export function createDefaultRegistry(): RuntimeRegistry {
  return new RuntimeRegistry().register('ship', (endpoint) => new HttpRuntimeAdapter(endpoint));
}

/** Every runtime type resolves to an in-memory adapter; used with the mock driver. */
export function createMockRegistry(runtimeTypes: string[]): RuntimeRegistry {
  const registry = new RuntimeRegistry();
  for (const runtimeType of runtimeTypes) {
    registry.register(runtimeType, (endpoint) => new MockRuntimeAdapter(endpoint));
  }
  return registry;
}

export { HttpRuntimeAdapter } from './HttpRuntimeAdapter.ts';
export { MockRuntimeAdapter } from './mock.ts';
export * from './types.ts';
