#!/usr/bin/env tsx
import { Command } from 'commander';
import type { GlobalOptions } from './commands/context.ts';
import { type CreateOptions, createCommand } from './commands/create.ts';
import { type DeleteOptions, deleteCommand } from './commands/delete.ts';
import { type ExtendOptions, extendCommand } from './commands/extend.ts';
import { gcCommand } from './commands/gc.ts';
import { getCommand } from './commands/get.ts';
import { keepaliveCommand } from './commands/keepalive.ts';
import { type ListOptions, listCommand } from './commands/list.ts';
import { serveCommand } from './commands/serve.ts';
import { type StartOptions, startCommand } from './commands/start.ts';
import { stopCommand } from './commands/stop.ts';
import {
  type WorkspaceCreateOptions,
  workspaceCreateCommand,
  workspaceDeleteCommand,
  workspaceListCommand,
} from './commands/workspace.ts';

const program = new Command();

program
  .name('shoal')
  .description('Provision, multiplex and reclaim short-lived sandboxes')
  .version('0.1.0')
  .option('-o, --owner <owner>', 'act on behalf of this owner (default: $USER)')
  .option('--mock', 'use the in-memory driver and runtime')
  .option('--json', 'print machine-readable output');

program
  .command('create')
  .description('Create a sandbox (compute starts lazily)')
  .requiredOption('-p, --profile <profile>', 'profile id')
  .option('-t, --ttl <seconds>', 'hard expiry in seconds (0 = never)')
  .option('-w, --workspace <id>', 'bind an existing external workspace')
  .option('-k, --key <key>', 'idempotency key')
  .action((_options, command: Command) => createCommand(command.optsWithGlobals<CreateOptions>()));

program
  .command('get')
  .description('Show a sandbox')
  .argument('<id>', 'sandbox id')
  .action((id: string, _options, command: Command) =>
    getCommand(id, command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('list')
  .description('List sandboxes')
  .option('-s, --status <status>', 'only sandboxes in this status')
  .option('-l, --limit <number>', 'page size (1-200)', '50')
  .option('--cursor <id>', 'continue after this sandbox id')
  .action((_options, command: Command) => listCommand(command.optsWithGlobals<ListOptions>()));

program
  .command('start')
  .description('Make sure a sandbox has running compute')
  .argument('<id>', 'sandbox id')
  .option('--wait <ms>', 'give up waiting after this many milliseconds')
  .action((id: string, _options, command: Command) =>
    startCommand(id, command.optsWithGlobals<StartOptions>()),
  );

program
  .command('keepalive')
  .description('Push back the idle deadline of a running sandbox')
  .argument('<id>', 'sandbox id')
  .action((id: string, _options, command: Command) =>
    keepaliveCommand(id, command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('stop')
  .description('Reclaim compute, keep the sandbox and its workspace')
  .argument('<id>', 'sandbox id')
  .action((id: string, _options, command: Command) =>
    stopCommand(id, command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('delete')
  .description('Delete one or more sandboxes')
  .argument('<ids...>', 'sandbox ids')
  .option('-c, --concurrency <number>', 'number of parallel deletions', '4')
  .action((ids: string[], _options, command: Command) =>
    deleteCommand(ids, command.optsWithGlobals<DeleteOptions>()),
  );

program
  .command('extend')
  .description('Extend the hard TTL of a sandbox')
  .argument('<id>', 'sandbox id')
  .argument('<seconds>', 'seconds to add')
  .option('-k, --key <key>', 'idempotency key')
  .action((id: string, seconds: string, _options, command: Command) =>
    extendCommand(id, seconds, command.optsWithGlobals<ExtendOptions>()),
  );

const workspace = program.command('workspace').description('Manage external workspaces');

workspace
  .command('create')
  .description('Create an external workspace')
  .option('--size <mb>', 'size limit in megabytes')
  .action((_options, command: Command) =>
    workspaceCreateCommand(command.optsWithGlobals<WorkspaceCreateOptions>()),
  );

workspace
  .command('list')
  .description('List workspaces')
  .action((_options, command: Command) =>
    workspaceListCommand(command.optsWithGlobals<GlobalOptions>()),
  );

workspace
  .command('delete')
  .description('Delete an external workspace')
  .argument('<id>', 'workspace id')
  .action((id: string, _options, command: Command) =>
    workspaceDeleteCommand(id, command.optsWithGlobals<GlobalOptions>()),
  );

program
  .command('gc')
  .description('Run one reconciliation pass')
  .action((_options, command: Command) => gcCommand(command.optsWithGlobals<GlobalOptions>()));

program
  .command('serve')
  .description('Run the control plane with its GC scheduler')
  .action((_options, command: Command) => serveCommand(command.optsWithGlobals<GlobalOptions>()));

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
