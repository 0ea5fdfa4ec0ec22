import { type GlobalOptions, exitWithError, withApp } from './context.ts';
import { printJson, printSandbox } from './format.ts';

export async function getCommand(id: string, options: GlobalOptions) {
  try {
    await withApp(options, async (app, owner) => {
      const view = app.orchestrator.get(owner, id);
      if (options.json) return printJson(view);
      printSandbox(view);
    });
  } catch (err) {
    exitWithError('Get', err);
  }
}
