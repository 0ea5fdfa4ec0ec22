import { z } from 'zod';
import { DriverError, TimeoutError } from '../errors.ts';
import type { RuntimeAdapter } from './types.ts';

const MetaSchema = z.object({
  capabilities: z.union([z.array(z.string()), z.record(z.unknown())]),
});

/**
 * Runtime that serves `GET /health` and `GET /meta` over HTTP (the `ship` family).
 */
export class HttpRuntimeAdapter implements RuntimeAdapter {
  readonly runtimeType = 'ship';
  private cachedCapabilities: string[] | undefined;

  constructor(
    readonly endpoint: string,
    private requestTimeoutMs = 2000,
  ) {}

  private url(path: string): string {
    return `${this.endpoint.replace(/\/+$/, '')}${path}`;
  }

  async health(): Promise<boolean> {
    try {
      const response = await fetch(this.url('/health'), {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async capabilities(): Promise<string[]> {
    if (this.cachedCapabilities) return this.cachedCapabilities;

    let response: Response;
    try {
      response = await fetch(this.url('/meta'), {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new TimeoutError(`Runtime meta request timed out: ${this.endpoint}`);
      }
      throw new DriverError(
        `Runtime meta request failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (!response.ok) {
      throw new DriverError(`Runtime meta request failed with status ${response.status}`);
    }

    const parsed = MetaSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DriverError(`Runtime meta response is malformed: ${this.endpoint}`);
    }
    const declared = parsed.data.capabilities;
    this.cachedCapabilities = Array.isArray(declared) ? declared : Object.keys(declared);
    return this.cachedCapabilities;
  }
}
