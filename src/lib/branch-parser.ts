import { WorktreeError } from './errors.js';

/**
 * Validate a branch argument before it reaches git.
 *
 * Rules follow `git check-ref-format --branch` closely enough to reject
 * obvious mistakes early:
 * - Letters, numbers, `.`, `-`, `_` and `/` only
 * - No leading `-` or `/`, no trailing `/`, `.` or `.lock`
 * - No `..` or `//`
 *
 * @returns The trimmed branch name
 * @throws WorktreeError (PreconditionFailed) if the name is empty or invalid
 */
export function parseBranchArg(branchArg: string | undefined): string {
  const name = (branchArg ?? '').trim();

  if (!name) {
    throw new WorktreeError('PreconditionFailed', 'A branch name is required');
  }

  if (!/^[a-zA-Z0-9._\-/]+$/.test(name)) {
    throw new WorktreeError(
      'PreconditionFailed',
      `Invalid branch name: "${name}". Use only letters, numbers, dots, hyphens, underscores, and slashes.`,
    );
  }

  if (
    name.startsWith('-') ||
    name.startsWith('/') ||
    name.endsWith('/') ||
    name.endsWith('.') ||
    name.endsWith('.lock') ||
    name.includes('..') ||
    name.includes('//')
  ) {
    throw new WorktreeError('PreconditionFailed', `Invalid branch name: "${name}"`);
  }

  return name;
}
