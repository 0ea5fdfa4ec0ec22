import type { RuntimeAdapter } from './types.ts';

/**
 * In-memory runtime. `unhealthyChecks` negative answers are returned before it reports healthy;
 * `Infinity` keeps it unhealthy forever.
 */
export class MockRuntimeAdapter implements RuntimeAdapter {
  readonly runtimeType = 'mock';
  checks = 0;

  constructor(
    readonly endpoint: string,
    private declared: string[] = ['filesystem', 'shell', 'python'],
    private unhealthyChecks = 0,
  ) {}

  async health(): Promise<boolean> {
    this.checks++;
    return this.checks > this.unhealthyChecks;
  }

  async capabilities(): Promise<string[]> {
    return [...this.declared];
  }
}
