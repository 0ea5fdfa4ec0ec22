import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, withApp } from './context.ts';
import { printJson } from './format.ts';

export async function keepaliveCommand(id: string, options: GlobalOptions) {
  try {
    await withApp(options, async (app, owner) => {
      const view = app.orchestrator.keepalive(owner, id);
      if (options.json) return printJson(view);
      if (view.idleExpiresAt) {
        logger.success(`Sandbox ${id} kept alive until ${view.idleExpiresAt}`);
      } else {
        logger.info(`Sandbox ${id} has no running session (${view.status}); nothing to extend`);
      }
    });
  } catch (err) {
    exitWithError('Keepalive', err);
  }
}
