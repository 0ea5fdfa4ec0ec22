import fs from 'node:fs';
import path from 'node:path';
import { execa } from 'execa';
import { logger } from '../../logger.ts';
import type { ExecOptions, IProcessResult } from './interface.ts';

const LOG_DIR = '.shoal/logs';
const TRACE_LOG = path.join(LOG_DIR, 'trace.log');

let logDirReady = false;

/**
 * Appends a message to the trace log file.
 * Failures are reported once at debug level and otherwise ignored.
 */
function trace(message: string) {
  try {
    if (!logDirReady) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
      logDirReady = true;
    }
    const timestamp = new Date().toISOString();
    fs.appendFileSync(TRACE_LOG, `[${timestamp}] ${message}\n`);
  } catch (err) {
    logger.debug(`Trace log unavailable: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Executes a command and records it in the trace log.
 *
 * With `reject: false` a non-zero exit is returned to the caller instead of thrown;
 * timeouts are always thrown.
 */
export async function run(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<IProcessResult> {
  const { timeoutMs = 120000, reject = true, env, cwd } = options;
  const commandStr = `${file} ${args.join(' ')}`;

  trace(`EXEC: ${commandStr}`);

  const result = await execa(file, args, {
    env,
    cwd,
    timeout: timeoutMs,
    reject: false,
    all: true,
  });

  if (result.timedOut) {
    trace(`TIMEOUT: ${commandStr} after ${timeoutMs}ms`);
    throw new Error(`Command timed out after ${timeoutMs}ms: ${commandStr}`);
  }

  const exitCode = result.exitCode ?? 1;
  trace(`RESULT [${exitCode}]:\n${String(result.all ?? '')}`);

  if (exitCode !== 0 && reject) {
    throw new Error(
      `Command failed: ${commandStr}\n` +
        `Exit code: ${exitCode}\n` +
        `Output: ${String(result.stderr || result.stdout || '')}`,
    );
  }

  return {
    stdout: String(result.stdout ?? ''),
    stderr: String(result.stderr ?? ''),
    exitCode,
    command: commandStr,
  };
}
