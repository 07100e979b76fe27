#!/usr/bin/env node
import { Command } from 'commander';
import { DEFAULT_API_URL, DEFAULT_BRANCH, DEFAULT_TIMEOUT_MS } from './lib/config';
import { backupCommand } from './commands/backup';
import { restoreCommand } from './commands/restore';
import { setupCommand } from './commands/setup';
import { statusCommand } from './commands/status';
import { parseTimeout, type GlobalOptions } from './commands/options';

const program = new Command();

program
  .name('tasksafe')
  .description('Encrypted settings and GitHub backups for your task list')
  .version('1.0.0')
  .option('-d, --dir <path>', 'directory holding tasks.json and the settings store', process.cwd())
  .option('-b, --branch <name>', 'branch the backups are written to', DEFAULT_BRANCH)
  .option('-t, --timeout <ms>', 'timeout for each request to GitHub', parseTimeout, DEFAULT_TIMEOUT_MS)
  .option('--api-url <url>', 'GitHub API base URL', DEFAULT_API_URL);

program
  .command('setup')
  .description('Create or complete the encrypted settings store')
  .action(async (_options: unknown, command: Command) => {
    await setupCommand(command.optsWithGlobals<GlobalOptions>());
  });

program
  .command('backup [file]')
  .description('Upload the task files (or one of them) to GitHub')
  .action(async (file: string | undefined, _options: unknown, command: Command) => {
    await backupCommand(file, command.optsWithGlobals<GlobalOptions>());
  });

program
  .command('restore [file]')
  .description('Replace the local task files with their GitHub backups')
  .action(async (file: string | undefined, _options: unknown, command: Command) => {
    await restoreCommand(file, command.optsWithGlobals<GlobalOptions>());
  });

program
  .command('status')
  .description('Show which files and settings are present')
  .action(async (_options: unknown, command: Command) => {
    await statusCommand(command.optsWithGlobals<GlobalOptions>());
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${(error as Error).message}`);
  process.exit(1);
});
