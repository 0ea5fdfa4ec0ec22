import chalk from 'chalk';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

function renderFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return parts.length > 0 ? ` ${chalk.gray(parts.join(' '))}` : '';
}

export const logger = {
  info: (msg: string, fields?: LogFields) =>
    console.log(chalk.blue('ℹ ') + msg + renderFields(fields)),
  success: (msg: string, fields?: LogFields) =>
    console.log(chalk.green('✔ ') + msg + renderFields(fields)),
  warn: (msg: string, fields?: LogFields) =>
    console.log(chalk.yellow('⚠ ') + msg + renderFields(fields)),
  error: (msg: string, fields?: LogFields) =>
    console.error(chalk.red('✖ ') + msg + renderFields(fields)),
  debug: (msg: string, fields?: LogFields) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙ ') + msg + renderFields(fields));
    }
  },
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
