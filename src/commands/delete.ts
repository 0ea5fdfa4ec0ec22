import chalk from 'chalk';
import { MultiBar, Presets } from 'cli-progress';
import pLimit from 'p-limit';
import { errorMessage, logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, parseInteger, withApp } from './context.ts';

export type DeleteOptions = GlobalOptions & {
  concurrency?: string;
};

export async function deleteCommand(ids: string[], options: DeleteOptions) {
  if (ids.length === 0) {
    logger.error('Please specify at least one sandbox id.');
    process.exit(1);
  }

  const concurrency = parseInteger(options.concurrency, 'concurrency') ?? 4;
  const limit = pLimit(concurrency);
  let failed = 0;

  try {
    await withApp(options, async (app, owner) => {
      console.log(chalk.bold(`🗑️ Deleting ${ids.length} sandbox(es)...`));

      const multibar = new MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: '{bar} | {percentage}% | {sandbox} | {step}',
        },
        Presets.shades_grey,
      );

      const tasks = ids.map((id) =>
        limit(async () => {
          const bar = multibar.create(100, 0, { sandbox: id, step: 'Deleting...' });
          try {
            bar.update(30, { step: 'Stopping compute...' });
            await app.orchestrator.delete(owner, id);
            bar.update(100, { step: 'Done' });
          } catch (err) {
            failed++;
            bar.update(0, { step: chalk.red(`Failed: ${errorMessage(err)}`) });
          }
        }),
      );

      await Promise.all(tasks);
      multibar.stop();
    });
  } catch (err) {
    exitWithError('Delete', err);
  }

  if (failed > 0) {
    logger.error(`${failed} of ${ids.length} deletion(s) failed.`);
    process.exit(1);
  }
  console.log(chalk.bold.green('\n✅ Sandboxes deleted.'));
}
