/**
 * Client for the process running inside a sandbox instance. One implementation per runtime family;
 * an adapter is chosen once when its session is created and kept for the session's lifetime.
 */
export interface RuntimeAdapter {
  readonly runtimeType: string;
  readonly endpoint: string;
  /** True once the runtime answers its health check. */
  health(): Promise<boolean>;
  /** Capabilities the runtime declares; cached after the first successful call. */
  capabilities(): Promise<string[]>;
}

export type RuntimeAdapterFactory = (endpoint: string) => RuntimeAdapter;
