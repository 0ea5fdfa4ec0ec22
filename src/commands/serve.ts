import { createApp } from '../lib/app.ts';
import { loadConfig } from '../lib/config.ts';
import { errorMessage, logger } from '../lib/logger.ts';
import { type GlobalOptions, exitWithError } from './context.ts';
import { printGcResults } from './format.ts';

/**
 * Long-running control-plane process: a catch-up reconciliation pass, then the GC scheduler
 * until SIGINT or SIGTERM.
 */
export async function serveCommand(options: GlobalOptions) {
  try {
    const config = loadConfig(options.mock ? { driver: 'mock' } : {});
    const app = createApp(config);
    logger.info(`Starting shoal control plane (driver: ${config.driver})...`, {
      db: config.databasePath,
    });

    if (!config.gc.enabled) {
      logger.warn('GC is disabled; nothing to schedule.');
      await app.close();
      return;
    }

    if (config.gc.runOnStartup) {
      printGcResults(await app.gc.runAll());
    }
    app.gc.start();
    logger.success('Control plane running. Press Ctrl+C to stop.');

    await new Promise<void>((resolve) => {
      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        app.close().then(resolve, (err: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(err)}`);
          resolve();
        });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
  } catch (err) {
    exitWithError('Serve', err);
  }
}
