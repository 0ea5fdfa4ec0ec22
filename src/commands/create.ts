import chalk from 'chalk';
import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, parseInteger, withApp } from './context.ts';
import { printJson, printSandbox } from './format.ts';

export type CreateOptions = GlobalOptions & {
  profile: string;
  ttl?: string;
  workspace?: string;
  key?: string;
};

export async function createCommand(options: CreateOptions) {
  const ttl = parseInteger(options.ttl, 'ttl');
  try {
    await withApp(options, async (app, owner) => {
      const created = await app.orchestrator.create(owner, {
        profile: options.profile,
        ttl,
        workspaceId: options.workspace,
        idempotencyKey: options.key,
      });
      if (options.json) return printJson(created.body);
      if (created.replayed) {
        logger.info(`Replayed earlier result for key ${options.key}`);
      }
      console.log(chalk.bold.green('✅ Sandbox created.'));
      printSandbox(created.body);
    });
  } catch (err) {
    exitWithError('Create', err);
  }
}
