import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, parseInteger, withApp } from './context.ts';
import { printJson } from './format.ts';

export type ExtendOptions = GlobalOptions & {
  key?: string;
};

export async function extendCommand(id: string, seconds: string, options: ExtendOptions) {
  const extendBy = parseInteger(seconds, 'seconds') ?? 0;
  try {
    await withApp(options, async (app, owner) => {
      const result = await app.orchestrator.extendTtl(owner, id, extendBy, {
        idempotencyKey: options.key,
      });
      if (options.json) return printJson(result.body);
      const suffix = result.replayed ? ' (replayed)' : '';
      logger.success(`Sandbox ${id} now expires at ${result.body.expiresAt}${suffix}`);
    });
  } catch (err) {
    exitWithError('Extend', err);
  }
}
