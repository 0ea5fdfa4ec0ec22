import chalk from 'chalk';
import { SessionNotReadyError } from '../lib/errors.ts';
import { logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError, parseInteger, withApp } from './context.ts';
import { printJson } from './format.ts';

export type StartOptions = GlobalOptions & {
  wait?: string;
};

export async function startCommand(id: string, options: StartOptions) {
  const waitMs = parseInteger(options.wait, 'wait');
  try {
    await withApp(options, async (app, owner) => {
      app.orchestrator.get(owner, id);
      const session = await app.orchestrator
        .ensureRunning(id, { waitMs })
        .catch(async (err: unknown) => {
          if (err instanceof SessionNotReadyError) {
            logger.warn(`Sandbox ${id} is still starting; letting the start finish before exiting`);
            await app.orchestrator.settle(id);
          }
          throw err;
        });
      if (options.json) {
        return printJson({
          sandboxId: session.sandboxId,
          sessionId: session.sessionId,
          endpoint: session.endpoint,
          runtimeType: session.runtimeType,
        });
      }
      console.log(chalk.bold.green(`✅ Sandbox ${id} is ready at ${session.endpoint}`));
    });
  } catch (err) {
    if (err instanceof SessionNotReadyError) {
      logger.warn(`Sandbox ${id} was not ready in time; retry in ${err.retryAfterMs}ms`);
      process.exit(2);
    }
    exitWithError('Start', err);
  }
}
