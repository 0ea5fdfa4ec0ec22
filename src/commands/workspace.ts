import chalk from 'chalk';
import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, parseInteger, withApp } from './context.ts';
import { printJson, printWorkspaceTable } from './format.ts';

export type WorkspaceCreateOptions = GlobalOptions & {
  size?: string;
};

export async function workspaceCreateCommand(options: WorkspaceCreateOptions) {
  const sizeLimitMb = parseInteger(options.size, 'size');
  try {
    await withApp(options, async (app, owner) => {
      const view = await app.workspaces.createExternal(owner, sizeLimitMb);
      if (options.json) return printJson(view);
      logger.success(`Workspace ${view.id} created (${view.sizeLimitMb}MB)`);
    });
  } catch (err) {
    exitWithError('Workspace create', err);
  }
}

export async function workspaceListCommand(options: GlobalOptions) {
  try {
    await withApp(options, async (app, owner) => {
      const views = app.workspaces.list(owner);
      if (options.json) return printJson(views);
      if (views.length === 0) {
        console.log(chalk.yellow(`No workspaces found for ${owner}.`));
        return;
      }
      printWorkspaceTable(views);
    });
  } catch (err) {
    exitWithError('Workspace list', err);
  }
}

export async function workspaceDeleteCommand(id: string, options: GlobalOptions) {
  try {
    await withApp(options, async (app, owner) => {
      await app.workspaces.delete(owner, id);
      logger.success(`Workspace ${id} deleted`);
    });
  } catch (err) {
    exitWithError('Workspace delete', err);
  }
}
