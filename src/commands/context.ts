import { type ShoalApp, createApp } from '../lib/app.ts';
import { getOS } from '../lib/common/os/index.ts';
import { loadConfig } from '../lib/config.ts';
import { ShoalError } from '../lib/errors.ts';
import { errorMessage, logger } from '../lib/logger.ts';

export type GlobalOptions = {
  owner?: string;
  mock?: boolean;
  json?: boolean;
};

export function resolveOwner(options: GlobalOptions): string {
  return options.owner ?? getOS().env.get('USER') ?? 'default';
}

/**
 * Opens the app for one command and closes it afterwards, whatever happens.
 */
export async function withApp<T>(
  options: GlobalOptions,
  fn: (app: ShoalApp, owner: string) => Promise<T>,
): Promise<T> {
  const config = loadConfig(options.mock ? { driver: 'mock' } : {});
  const app = createApp(config);
  try {
    return await fn(app, resolveOwner(options));
  } finally {
    await app.close();
  }
}

export function exitWithError(action: string, err: unknown): never {
  if (err instanceof ShoalError) {
    logger.error(`${action} failed: ${err.message}`, { code: err.code });
  } else {
    logger.error(`${action} failed: ${errorMessage(err)}`);
  }
  process.exit(1);
}

export function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    logger.error(`${name} must be an integer, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}
