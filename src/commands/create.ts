import { existsSync } from 'fs';
import { CommandContext } from '../lib/context.js';
import { parseBranchArg } from '../lib/branch-parser.js';
import { ensureWorktreesRoot, getWorktreePath, copyIntoWorktree } from '../lib/paths.js';
import { findByBranch } from '../lib/worktree-list.js';
import { openInEditor } from '../lib/editor.js';
import { WorktreeError, unwrap } from '../lib/errors.js';

export interface CreateOptions {
  from?: string;
  // Use an existing branch without asking
  reuse?: boolean;
  // Editor name overriding the config, false with --no-editor
  editor?: string | false;
}

/**
 * Create a worktree for a branch next to the repository, copy local
 * configuration into it and open it in the editor.
 * @returns The new worktree path
 */
export async function createCommand(
  branchArg: string | undefined,
  options: CreateOptions,
  context: CommandContext,
): Promise<string> {
  const { backend, config, repoRoot, prompts, logger } = context;
  const branch = parseBranchArg(branchArg);

  logger.log(`🔹 Repository: ${repoRoot}`);

  const status = unwrap(await backend.workingTreeStatus(repoRoot));
  if (status.hasUncommittedChanges) {
    logger.warn("⚠️  You have uncommitted changes. It's recommended to commit or stash them first.");
    if (!(await prompts.confirm('Continue anyway?', false))) {
      throw new WorktreeError('PreconditionFailed', 'Aborted: uncommitted changes in the current checkout');
    }
  }

  const records = unwrap(await context.registry.snapshot());
  const checkedOut = findByBranch(records, branch);
  if (checkedOut) {
    throw new WorktreeError('PreconditionFailed', `Branch '${branch}' is already checked out at ${checkedOut.path}`);
  }

  const worktreePath = getWorktreePath(repoRoot, config, branch);
  if (existsSync(worktreePath)) {
    throw new WorktreeError('PreconditionFailed', `Path already exists: ${worktreePath}`);
  }

  const exists = unwrap(await backend.branchExists(branch));
  if (exists) {
    logger.warn(`⚠️  Branch '${branch}' already exists.`);
    const reuse = options.reuse === true || (await prompts.confirm('Use existing branch?', false));
    if (!reuse) {
      throw new WorktreeError('PreconditionFailed', `Aborted: branch '${branch}' already exists`);
    }
    if (options.from) {
      logger.warn(`⚠️  Branch '${branch}' already exists, ignoring --from ${options.from}`);
    }
  } else if (options.from) {
    const base = await backend.resolveRef(options.from);
    if (!base.ok) {
      throw new WorktreeError('PreconditionFailed', `Base branch '${options.from}' not found`);
    }
    logger.log(`📍 Branching from: ${options.from}`);
  }

  ensureWorktreesRoot(repoRoot, config);
  logger.log(`🌱 Creating worktree for branch '${branch}'...`);
  unwrap(await backend.createWorktree(worktreePath, branch, exists, exists ? undefined : options.from));
  logger.log(`✅ Worktree created at: ${worktreePath}`);

  copyIntoWorktree(repoRoot, worktreePath, config.copyPaths, logger);

  if (options.editor !== false) {
    await openInEditor(options.editor ?? config.editor, worktreePath, logger);
  }

  return worktreePath;
}
