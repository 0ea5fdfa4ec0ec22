import chalk from 'chalk';
import type { GcResult } from '../lib/gc/index.ts';
import type { SandboxStatus } from '../lib/lifecycle/index.ts';
import type { SandboxView } from '../lib/orchestrator/index.ts';
import type { WorkspaceView } from '../lib/workspace/index.ts';

const RULE = chalk.gray('-'.repeat(96));

function colorStatus(status: SandboxStatus): string {
  const label = status.padEnd(9);
  switch (status) {
    case 'ready':
      return chalk.green(`● ${label}`);
    case 'starting':
      return chalk.yellow(`◐ ${label}`);
    case 'idle':
      return chalk.blue(`○ ${label}`);
    case 'failed':
      return chalk.red(`✖ ${label}`);
    case 'expired':
    case 'deleted':
      return chalk.gray(`○ ${label}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printSandbox(view: SandboxView): void {
  console.log(`${chalk.bold(view.id)}  ${colorStatus(view.status)}`);
  console.log(`  profile     ${view.profile}`);
  console.log(`  offers      ${view.capabilities.join(', ') || chalk.gray('nothing')}`);
  console.log(`  workspace   ${view.workspaceId ?? chalk.gray('none')}`);
  console.log(`  expires     ${view.expiresAt ?? chalk.gray('never')}`);
  if (view.idleExpiresAt) {
    console.log(`  idle until  ${view.idleExpiresAt}`);
  }
  console.log(`  created     ${view.createdAt}`);
}

export function printSandboxTable(views: SandboxView[]): void {
  console.log(RULE);
  console.log(
    `${chalk.bold('ID'.padEnd(22))} ${chalk.bold('STATUS'.padEnd(11))} ${chalk.bold('PROFILE'.padEnd(16))} ${chalk.bold('EXPIRES')}`,
  );
  console.log(RULE);
  for (const view of views) {
    console.log(
      `${chalk.cyan(view.id.padEnd(22))} ${colorStatus(view.status)} ${view.profile.padEnd(16)} ${view.expiresAt ?? chalk.gray('never')}`,
    );
  }
  console.log(RULE);
}

export function printWorkspaceTable(views: WorkspaceView[]): void {
  console.log(RULE);
  console.log(
    `${chalk.bold('ID'.padEnd(18))} ${chalk.bold('KIND'.padEnd(9))} ${chalk.bold('SIZE'.padEnd(9))} ${chalk.bold('SANDBOX')}`,
  );
  console.log(RULE);
  for (const view of views) {
    const kind = view.managed ? 'managed' : 'external';
    console.log(
      `${chalk.cyan(view.id.padEnd(18))} ${kind.padEnd(9)} ${`${view.sizeLimitMb}MB`.padEnd(9)} ${view.sandboxId ?? chalk.gray('-')}`,
    );
  }
  console.log(RULE);
}

export function printGcResults(results: GcResult[]): void {
  for (const result of results) {
    const marker = result.errors > 0 ? chalk.red('✖') : chalk.green('✔');
    console.log(
      `${marker} ${result.task.padEnd(20)} cleaned=${result.cleaned} errors=${result.errors} ${chalk.gray(`${result.durationMs}ms`)}`,
    );
  }
}
