import { existsSync, statSync } from 'fs';
import { join } from 'path';
import { execa } from 'execa';
import { WorktreeError, Result, ok, err } from './errors.js';
import { CommitSummary, WorkingTreeChanges } from '../types.js';

export type IntegrationMode = 'merge' | 'ff-only' | 'squash';

export interface AheadBehind {
  ahead: number;
  behind: number;
}

/**
 * Every version-control primitive arbor needs. Each call maps onto a single
 * backend command, returns a Result, and never retries.
 */
export interface RepositoryBackend {
  repositoryRoot(): Promise<Result<string>>;
  listWorktrees(): Promise<Result<string>>;
  createWorktree(path: string, branch: string, fromExisting: boolean, base?: string): Promise<Result<void>>;
  removeWorktree(path: string, force: boolean): Promise<Result<void>>;
  pruneWorktrees(): Promise<Result<void>>;
  isValidCheckout(path: string): Promise<Result<boolean>>;
  branchExists(name: string): Promise<Result<boolean>>;
  remoteBranchExists(remote: string, name: string): Promise<Result<boolean>>;
  hasRemote(remote: string): Promise<Result<boolean>>;
  remoteHeadBranch(remote: string): Promise<Result<string | null>>;
  resolveRef(ref: string, cwd?: string): Promise<Result<string>>;
  revListCount(range: string, cwd?: string): Promise<Result<number>>;
  aheadBehind(base: string, head: string, cwd?: string): Promise<Result<AheadBehind>>;
  isMerged(branch: string, target: string, cwd?: string): Promise<Result<boolean>>;
  workingTreeStatus(path: string): Promise<Result<WorkingTreeChanges>>;
  lastCommit(path: string): Promise<Result<CommitSummary | null>>;
  directoryModifiedAt(path: string): Promise<Result<Date | null>>;
  upstreamOf(path: string): Promise<Result<string | null>>;
  checkout(path: string, branch: string): Promise<Result<void>>;
  pull(path: string, remote: string, branch: string): Promise<Result<void>>;
  merge(path: string, source: string, mode: IntegrationMode): Promise<Result<void>>;
  rebase(path: string, onto: string, branch?: string): Promise<Result<void>>;
  abortMerge(path: string): Promise<Result<void>>;
  abortRebase(path: string): Promise<Result<void>>;
  commit(path: string, message: string): Promise<Result<void>>;
  push(path: string, remote: string, branch: string): Promise<Result<void>>;
  deleteBranch(name: string, force: boolean): Promise<Result<void>>;
  deleteRemoteBranch(remote: string, name: string): Promise<Result<void>>;
}

interface GitRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

const CONFLICT_PATTERN = /CONFLICT|could not apply|Not possible to fast-forward|Automatic merge failed/;

/**
 * Parse `git status --porcelain` into staged / modified / untracked counts.
 * A file with both index and work-tree changes counts in both columns.
 */
export function parseStatusPorcelain(output: string): WorkingTreeChanges {
  let staged = 0;
  let modified = 0;
  let untracked = 0;

  for (const line of output.split('\n')) {
    if (line.length < 3) continue;
    const index = line[0];
    const workTree = line[1];
    if (index === '?' && workTree === '?') {
      untracked++;
      continue;
    }
    if (index !== ' ') staged++;
    if (workTree !== ' ') modified++;
  }

  return {
    hasUncommittedChanges: staged + modified + untracked > 0,
    staged,
    modified,
    untracked,
  };
}

/**
 * Parse the `%h%x1f%ct%x1f%ar%x1f%s` log format
 */
export function parseCommitSummary(output: string): CommitSummary | null {
  const line = output.trim();
  if (!line) return null;
  const [hash, timestamp, relativeDate, ...subject] = line.split('\x1f');
  const seconds = parseInt(timestamp ?? '', 10);
  if (!hash || Number.isNaN(seconds)) return null;
  return {
    hash,
    timestamp: seconds * 1000,
    relativeDate: relativeDate ?? '',
    subject: subject.join('\x1f'),
  };
}

export class GitCliBackend implements RepositoryBackend {
  constructor(
    private readonly cwd: string,
    private readonly onCommand?: (args: string[], cwd: string) => void,
  ) {}

  private async git(args: string[], cwd: string = this.cwd): Promise<GitRun> {
    this.onCommand?.(args, cwd);
    const result = await execa('git', args, { cwd, reject: false });
    return {
      exitCode: result.exitCode ?? 1,
      // Leading spaces are significant in porcelain status lines
      stdout: result.stdout.trimEnd(),
      stderr: result.stderr.trim(),
    };
  }

  private failure<T>(action: string, run: GitRun): Result<T> {
    return err(
      new WorktreeError('BackendOperationFailed', `git ${action} failed`, run.stderr || run.stdout || undefined),
    );
  }

  private async expectSuccess(action: string, args: string[], cwd?: string): Promise<Result<void>> {
    const run = await this.git(args, cwd);
    return run.exitCode === 0 ? ok(undefined) : this.failure(action, run);
  }

  private async conflictedFiles(cwd: string): Promise<string[]> {
    const run = await this.git(['diff', '--name-only', '--diff-filter=U'], cwd);
    if (run.exitCode !== 0) return [];
    return run.stdout.split('\n').filter((file) => file.length > 0);
  }

  private async integrationFailure(action: string, run: GitRun, cwd: string): Promise<Result<void>> {
    const conflicts = await this.conflictedFiles(cwd);
    const output = `${run.stdout}\n${run.stderr}`.trim();
    if (conflicts.length > 0 || CONFLICT_PATTERN.test(output)) {
      return err(new WorktreeError('ConflictDuringMerge', `git ${action} stopped on a conflict`, output, conflicts));
    }
    return this.failure(action, run);
  }

  async repositoryRoot(): Promise<Result<string>> {
    const gitDir = await this.git(['rev-parse', '--git-dir']);
    if (gitDir.exitCode !== 0) {
      return err(new WorktreeError('NotARepository', `Not in a git repository: ${this.cwd}`, gitDir.stderr));
    }
    const topLevel = await this.git(['rev-parse', '--show-toplevel']);
    return ok(topLevel.exitCode === 0 && topLevel.stdout ? topLevel.stdout : this.cwd);
  }

  async listWorktrees(): Promise<Result<string>> {
    const run = await this.git(['worktree', 'list', '--porcelain']);
    return run.exitCode === 0 ? ok(run.stdout) : this.failure('worktree list', run);
  }

  async createWorktree(
    path: string,
    branch: string,
    fromExisting: boolean,
    base?: string,
  ): Promise<Result<void>> {
    const args = fromExisting
      ? ['worktree', 'add', path, branch]
      : ['worktree', 'add', '-b', branch, path, ...(base ? [base] : [])];
    return this.expectSuccess('worktree add', args);
  }

  async removeWorktree(path: string, force: boolean): Promise<Result<void>> {
    return this.expectSuccess('worktree remove', ['worktree', 'remove', ...(force ? ['--force'] : []), path]);
  }

  async pruneWorktrees(): Promise<Result<void>> {
    return this.expectSuccess('worktree prune', ['worktree', 'prune']);
  }

  async isValidCheckout(path: string): Promise<Result<boolean>> {
    // Without its own .git entry a leftover directory would resolve to an enclosing repository
    if (!existsSync(path) || !existsSync(join(path, '.git'))) return ok(false);
    const run = await this.git(['rev-parse', '--git-dir'], path);
    return ok(run.exitCode === 0);
  }

  async branchExists(name: string): Promise<Result<boolean>> {
    const run = await this.git(['show-ref', '--verify', '--quiet', `refs/heads/${name}`]);
    if (run.exitCode === 0) return ok(true);
    if (run.exitCode === 1) return ok(false);
    return this.failure('show-ref', run);
  }

  async remoteBranchExists(remote: string, name: string): Promise<Result<boolean>> {
    const run = await this.git(['ls-remote', '--heads', remote, name]);
    if (run.exitCode !== 0) return this.failure('ls-remote', run);
    return ok(run.stdout.split('\n').some((line) => line.endsWith(`refs/heads/${name}`)));
  }

  async hasRemote(remote: string): Promise<Result<boolean>> {
    const run = await this.git(['remote']);
    if (run.exitCode !== 0) return this.failure('remote', run);
    return ok(run.stdout.split('\n').some((line) => line.trim() === remote));
  }

  async remoteHeadBranch(remote: string): Promise<Result<string | null>> {
    const run = await this.git(['symbolic-ref', '--quiet', `refs/remotes/${remote}/HEAD`]);
    if (run.exitCode !== 0 || !run.stdout) return ok(null);
    return ok(run.stdout.replace(`refs/remotes/${remote}/`, ''));
  }

  async resolveRef(ref: string, cwd?: string): Promise<Result<string>> {
    const run = await this.git(['rev-parse', '--verify', `${ref}^{commit}`], cwd);
    return run.exitCode === 0 ? ok(run.stdout) : this.failure('rev-parse', run);
  }

  async revListCount(range: string, cwd?: string): Promise<Result<number>> {
    const run = await this.git(['rev-list', '--count', range], cwd);
    if (run.exitCode !== 0) return this.failure('rev-list', run);
    const count = parseInt(run.stdout, 10);
    if (Number.isNaN(count)) {
      return err(new WorktreeError('BackendOperationFailed', 'git rev-list returned no count', run.stdout));
    }
    return ok(count);
  }

  async aheadBehind(base: string, head: string, cwd?: string): Promise<Result<AheadBehind>> {
    const ahead = await this.revListCount(`${base}..${head}`, cwd);
    if (!ahead.ok) return ahead;
    const behind = await this.revListCount(`${head}..${base}`, cwd);
    if (!behind.ok) return behind;
    return ok({ ahead: ahead.value, behind: behind.value });
  }

  async isMerged(branch: string, target: string, cwd?: string): Promise<Result<boolean>> {
    const unmerged = await this.revListCount(`${target}..${branch}`, cwd);
    if (!unmerged.ok) return unmerged;
    return ok(unmerged.value === 0);
  }

  async workingTreeStatus(path: string): Promise<Result<WorkingTreeChanges>> {
    const run = await this.git(['status', '--porcelain'], path);
    if (run.exitCode !== 0) return this.failure('status', run);
    return ok(parseStatusPorcelain(run.stdout));
  }

  async lastCommit(path: string): Promise<Result<CommitSummary | null>> {
    const run = await this.git(['log', '-1', '--format=%h%x1f%ct%x1f%ar%x1f%s'], path);
    // A branch without commits makes `git log` fail; that is "no commit", not an error
    if (run.exitCode !== 0) return ok(null);
    return ok(parseCommitSummary(run.stdout));
  }

  async directoryModifiedAt(path: string): Promise<Result<Date | null>> {
    // The directory can be removed by someone else at any moment
    try {
      return ok(statSync(path).mtime);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return ok(null);
      }
      const message = error instanceof Error ? error.message : String(error);
      return err(new WorktreeError('BackendOperationFailed', `Cannot read ${path}`, message));
    }
  }

  async upstreamOf(path: string): Promise<Result<string | null>> {
    const run = await this.git(['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}'], path);
    return ok(run.exitCode === 0 && run.stdout ? run.stdout : null);
  }

  async checkout(path: string, branch: string): Promise<Result<void>> {
    return this.expectSuccess('checkout', ['checkout', branch], path);
  }

  async pull(path: string, remote: string, branch: string): Promise<Result<void>> {
    return this.expectSuccess('pull', ['pull', remote, branch], path);
  }

  async merge(path: string, source: string, mode: IntegrationMode): Promise<Result<void>> {
    const flags: Record<IntegrationMode, string[]> = {
      merge: ['--no-edit'],
      'ff-only': ['--ff-only'],
      squash: ['--squash'],
    };
    const run = await this.git(['merge', ...flags[mode], source], path);
    if (run.exitCode === 0) return ok(undefined);
    return this.integrationFailure('merge', run, path);
  }

  async rebase(path: string, onto: string, branch?: string): Promise<Result<void>> {
    const run = await this.git(['rebase', onto, ...(branch ? [branch] : [])], path);
    if (run.exitCode === 0) return ok(undefined);
    return this.integrationFailure('rebase', run, path);
  }

  async abortMerge(path: string): Promise<Result<void>> {
    // Unlike `merge --abort`, this also undoes a conflicted --squash merge
    return this.expectSuccess('reset --merge', ['reset', '--merge'], path);
  }

  async abortRebase(path: string): Promise<Result<void>> {
    return this.expectSuccess('rebase --abort', ['rebase', '--abort'], path);
  }

  async commit(path: string, message: string): Promise<Result<void>> {
    return this.expectSuccess('commit', ['commit', '-m', message], path);
  }

  async push(path: string, remote: string, branch: string): Promise<Result<void>> {
    return this.expectSuccess('push', ['push', remote, branch], path);
  }

  async deleteBranch(name: string, force: boolean): Promise<Result<void>> {
    return this.expectSuccess('branch delete', ['branch', force ? '-D' : '-d', name]);
  }

  async deleteRemoteBranch(remote: string, name: string): Promise<Result<void>> {
    return this.expectSuccess('push --delete', ['push', remote, '--delete', name]);
  }
}
