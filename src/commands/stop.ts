import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, withApp } from './context.ts';
import { printJson } from './format.ts';

export async function stopCommand(id: string, options: GlobalOptions) {
  try {
    await withApp(options, async (app, owner) => {
      const view = await app.orchestrator.stop(owner, id);
      if (options.json) return printJson(view);
      logger.success(`Sandbox ${id} stopped; workspace ${view.workspaceId} kept`);
    });
  } catch (err) {
    exitWithError('Stop', err);
  }
}
