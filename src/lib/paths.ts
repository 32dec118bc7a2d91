import { basename, dirname, join, resolve } from 'path';
import { cpSync, existsSync, mkdirSync } from 'fs';
import { expandPath } from './config.js';
import { ArborConfig, Logger } from '../types.js';

/**
 * Directory holding every worktree of a repository: `worktreesDir` when
 * configured, otherwise a sibling of the repository named `<repo>-worktrees`.
 * @example getWorktreesRoot('/src/app', config) -> '/src/app-worktrees'
 */
export function getWorktreesRoot(repoRoot: string, config: ArborConfig): string {
  if (config.worktreesDir) {
    return resolve(repoRoot, expandPath(config.worktreesDir));
  }
  return join(dirname(repoRoot), `${basename(repoRoot)}-worktrees`);
}

/**
 * @example getWorktreePath('/src/app', config, 'feature/login') -> '/src/app-worktrees/feature/login'
 */
export function getWorktreePath(repoRoot: string, config: ArborConfig, branch: string): string {
  return join(getWorktreesRoot(repoRoot, config), branch);
}

export function ensureWorktreesRoot(repoRoot: string, config: ArborConfig): string {
  const root = getWorktreesRoot(repoRoot, config);
  mkdirSync(root, { recursive: true });
  return root;
}

/**
 * Copy each configured path that exists in the repository root into the new
 * worktree, recursively. Returns the entries copied.
 */
export function copyIntoWorktree(
  repoRoot: string,
  worktreePath: string,
  copyPaths: readonly string[],
  logger: Logger = console,
): string[] {
  const copied: string[] = [];
  for (const item of copyPaths) {
    const source = join(repoRoot, item);
    if (!existsSync(source)) continue;
    try {
      cpSync(source, join(worktreePath, item), { recursive: true });
      copied.push(item);
      logger.log(`✅ Copied ${item}`);
    } catch (error) {
      logger.warn(`⚠️  Failed to copy ${item}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return copied;
}
