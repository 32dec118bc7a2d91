#!/usr/bin/env node

import { Command } from 'commander';
import { createContext } from './lib/context.js';
import { exitWithError } from './lib/errors.js';
import { createCommand, CreateOptions } from './commands/create.js';
import { listCommand } from './commands/list.js';
import { statusCommand, StatusOptions } from './commands/status.js';
import { mergeCommand, MergeOptions } from './commands/merge.js';
import { cleanupCommand, CleanupOptions } from './commands/cleanup.js';

interface VerboseOption {
  verbose?: boolean;
}

const program = new Command();

program
  .name('arbor')
  .description('Create, inspect, merge and clean up git worktrees')
  .version('0.1.0');

program
  .command('create [branch]')
  .description('Create a worktree for a branch next to the repository')
  .option('--from <base>', 'Base branch for a new branch')
  .option('--reuse', 'Use an existing branch without asking')
  .option('--editor <name>', 'Editor to open (cursor, code, vscode; default from config)')
  .option('--no-editor', 'Do not open the editor')
  .option('-v, --verbose', 'Verbose output')
  .action(async (branch: string | undefined, options: CreateOptions & VerboseOption) => {
    try {
      const context = await createContext({ verbose: options.verbose });
      await createCommand(branch, options, context);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('list')
  .description('List all worktrees')
  .option('-v, --verbose', 'Verbose output')
  .action(async (options: VerboseOption) => {
    try {
      const context = await createContext({ verbose: options.verbose });
      await listCommand(context);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('status')
  .description('Show the status of every worktree')
  .option('-w, --watch', 'Refresh continuously')
  .option('--interval <seconds>', 'Seconds between refreshes (default from config)')
  .option('-v, --verbose', 'Verbose output')
  .action(async (options: StatusOptions & VerboseOption) => {
    try {
      const context = await createContext({ verbose: options.verbose });
      await statusCommand(options, context);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('merge [branch]')
  .description('Merge a worktree branch into trunk\nRun without a branch to pick from the list')
  .option('-s, --strategy <strategy>', 'merge, rebase or squash (default from config)')
  .option('-a, --auto', 'Answer yes to every post-merge cleanup question')
  .option('-l, --list', 'List worktrees available to merge')
  .option('--abort-on-conflict', 'Restore trunk to its pre-merge state when the merge conflicts')
  .option('--no-pull', 'Do not pull trunk from the remote first')
  .option('-v, --verbose', 'Verbose output')
  .action(async (branch: string | undefined, options: MergeOptions & VerboseOption) => {
    try {
      const context = await createContext({ verbose: options.verbose });
      await mergeCommand(branch, options, context);
    } catch (error) {
      exitWithError(error);
    }
  });

program
  .command('cleanup')
  .description('Remove orphaned, merged and stale worktrees')
  .option('-n, --dry-run', 'Show what would be removed without changing anything')
  .option('-a, --auto', 'Remove every candidate without asking per worktree')
  .option('-y, --yes', "Skip typing 'yes' to confirm --auto")
  .option('--prune-only', 'Only prune worktree administrative files')
  .option('--merged', 'Only process merged worktrees')
  .option('--orphaned', 'Only process orphaned worktrees')
  .option('--stale [days]', 'Only process stale worktrees, optionally overriding the day threshold')
  .option('-v, --verbose', 'Verbose output')
  .action(async (options: CleanupOptions & VerboseOption) => {
    try {
      const context = await createContext({ verbose: options.verbose });
      await cleanupCommand(options, context);
    } catch (error) {
      exitWithError(error);
    }
  });

program.parseAsync(process.argv).catch(exitWithError);
