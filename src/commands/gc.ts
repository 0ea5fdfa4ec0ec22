import chalk from 'chalk';
import { type GlobalOptions, exitWithError, withApp } from './context.ts';
import { printGcResults, printJson } from './format.ts';

export async function gcCommand(options: GlobalOptions) {
  try {
    const results = await withApp(options, (app) => app.gc.runAll());
    if (options.json) return printJson(results);
    console.log(chalk.bold('🧹 Reconciliation pass:'));
    printGcResults(results);
    if (results.some((result) => result.errors > 0)) process.exit(1);
  } catch (err) {
    exitWithError('GC', err);
  }
}
