import { errorMessage, logger } from '../logger.ts';
import type { GcResult, GcTask, GcTaskName } from './types.ts';

/**
 * Runs each GC task on its own interval. A tick that lands while the previous run of the same
 * task is still going is skipped. A task that throws is reported with `errors: 1`.
 */
export class GcScheduler {
  private timers: NodeJS.Timeout[] = [];
  private inFlight: Map<GcTaskName, Promise<GcResult>> = new Map();

  constructor(private tasks: GcTask[]) {}

  get started(): boolean {
    return this.timers.length > 0;
  }

  runTask(task: GcTask): Promise<GcResult> {
    const current = this.inFlight.get(task.name);
    if (current) return current;

    const run = this.execute(task).finally(() => this.inFlight.delete(task.name));
    this.inFlight.set(task.name, run);
    return run;
  }

  private async execute(task: GcTask): Promise<GcResult> {
    const startedAt = Date.now();
    try {
      const result = await task.run();
      if (result.cleaned > 0 || result.errors > 0) {
        logger.info(`[GC] ${task.name}`, {
          cleaned: result.cleaned,
          errors: result.errors,
          ms: result.durationMs,
        });
      }
      return result;
    } catch (err) {
      logger.error(`[GC] ${task.name} failed: ${errorMessage(err)}`);
      return { task: task.name, cleaned: 0, errors: 1, durationMs: Date.now() - startedAt };
    }
  }

  /** One pass over every task, in order. Used at startup and by the `gc` command. */
  async runAll(): Promise<GcResult[]> {
    const results: GcResult[] = [];
    for (const task of this.tasks) {
      results.push(await this.runTask(task));
    }
    return results;
  }

  start(): void {
    if (this.started) return;
    for (const task of this.tasks) {
      const timer = setInterval(() => {
        if (this.inFlight.has(task.name)) {
          logger.debug(`[GC] ${task.name} still running, skipping tick`);
          return;
        }
        void this.runTask(task);
      }, task.intervalMs);
      this.timers.push(timer);
    }
    logger.info(`[GC] scheduler started with ${this.tasks.length} tasks`);
  }

  /** Stops the timers and waits for runs already in progress. */
  async stop(): Promise<void> {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    await Promise.all(this.inFlight.values());
    logger.info('[GC] scheduler stopped');
  }
}
