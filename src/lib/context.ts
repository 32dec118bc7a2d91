import { loadConfig } from './config.js';
import { GitCliBackend, RepositoryBackend } from './git.js';
import { WorktreeRegistry } from './worktree-list.js';
import { WorktreeClassifier } from './classifier.js';
import { resolveTrunkBranch } from './trunk.js';
import { TerminalPrompts } from './prompts.js';
import { unwrap } from './errors.js';
import { ArborConfig, Logger, Prompts } from '../types.js';

/**
 * Everything a command needs, built once per invocation
 */
export interface CommandContext {
  config: ArborConfig;
  backend: RepositoryBackend;
  registry: WorktreeRegistry;
  repoRoot: string;
  prompts: Prompts;
  logger: Logger;
}

export interface ContextOptions {
  verbose?: boolean;
  cwd?: string;
}

/**
 * Load the config, then locate the repository. Both failures end the command
 * before it does anything.
 */
export async function createContext(options: ContextOptions = {}): Promise<CommandContext> {
  const config = loadConfig();
  const onCommand = options.verbose
    ? (args: string[], cwd: string) => console.log(`$ git ${args.join(' ')}  (in ${cwd})`)
    : undefined;

  const locator = new GitCliBackend(options.cwd ?? process.cwd(), onCommand);
  const repoRoot = unwrap(await locator.repositoryRoot());
  const backend = new GitCliBackend(repoRoot, onCommand);

  return {
    config,
    backend,
    registry: new WorktreeRegistry(backend),
    repoRoot,
    prompts: new TerminalPrompts(),
    logger: console,
  };
}

/**
 * Resolve trunk and build a classifier for it
 */
export async function createClassifier(
  context: CommandContext,
  staleDays: number = context.config.staleDays,
): Promise<WorktreeClassifier> {
  const trunk = unwrap(await resolveTrunkBranch(context.backend, context.config.remote));
  return new WorktreeClassifier(context.backend, { trunk, staleDays });
}
