import chalk from 'chalk';
import { SANDBOX_STATUSES, type SandboxStatus } from '../lib/lifecycle/index.ts';
import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, parseInteger, withApp } from './context.ts';
import { printJson, printSandboxTable } from './format.ts';

export type ListOptions = GlobalOptions & {
  status?: string;
  limit?: string;
  cursor?: string;
};

function parseStatus(value: string | undefined): SandboxStatus | undefined {
  if (value === undefined) return undefined;
  const status = SANDBOX_STATUSES.find((s) => s === value);
  if (!status) {
    logger.error(`Unknown status "${value}". Use one of: ${SANDBOX_STATUSES.join(', ')}`);
    process.exit(1);
  }
  return status;
}

export async function listCommand(options: ListOptions) {
  const status = parseStatus(options.status);
  const limit = parseInteger(options.limit, 'limit');
  try {
    await withApp(options, async (app, owner) => {
      const page = app.orchestrator.list(owner, { status, limit, cursor: options.cursor });
      if (options.json) return printJson(page);

      if (page.items.length === 0) {
        console.log(chalk.yellow(`No sandboxes found for ${owner}.`));
        return;
      }
      console.log(chalk.bold(`📋 Sandboxes of ${owner} (${page.items.length}):`));
      printSandboxTable(page.items);
      if (page.nextCursor) {
        console.log(chalk.gray(`More results: --cursor ${page.nextCursor}`));
      }
    });
  } catch (err) {
    exitWithError('List', err);
  }
}
