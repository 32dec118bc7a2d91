import { RepositoryBackend } from './git.js';
import { WorktreeRegistry, findByPath } from './worktree-list.js';
import { WorktreeClassifier, ClassifiedWorktree } from './classifier.js';
import { Result, ok } from './errors.js';
import { describeChangeCounts } from './status-format.js';
import { DETACHED, Logger, WorktreeReason, WorktreeRecord } from '../types.js';

export type CleanupGroup = WorktreeReason;

/** Processing order: a missing directory allows nothing but removal, so orphans go first. */
export const CLEANUP_ORDER: readonly CleanupGroup[] = ['orphaned', 'merged', 'stale'];

export type GroupDecision = 'all' | 'each' | 'none';

export interface CleanupPrompts {
  reviewGroup(group: CleanupGroup, candidates: ClassifiedWorktree[]): Promise<GroupDecision>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
}

export interface CleanupAnalysis {
  trunk: string;
  groups: Record<CleanupGroup | 'active', ClassifiedWorktree[]>;
}

export type CleanupActionKind = 'prune' | 'remove-worktree' | 'delete-branch' | 'delete-remote-branch';

export interface CleanupAction {
  action: CleanupActionKind;
  target: string;
  status: 'done' | 'planned' | 'failed' | 'skipped';
  forced?: boolean;
  detail?: string;
}

export interface CleanupRunOptions {
  dryRun: boolean;
  auto: boolean;
  // Groups to act on; all of them when omitted
  groups?: readonly CleanupGroup[];
  // Administrative prune after the groups are processed
  prune: boolean;
}

export interface CleanupReport {
  analysis: CleanupAnalysis;
  actions: CleanupAction[];
  retired: number;
}

export interface CleanupEngineOptions {
  remote: string;
  logger?: Logger;
}

export function groupClassified(trunk: string, classified: ClassifiedWorktree[]): CleanupAnalysis {
  const groups: CleanupAnalysis['groups'] = { orphaned: [], merged: [], stale: [], active: [] };
  for (const entry of classified) {
    const { classification } = entry;
    if (classification.status === 'active') {
      groups.active.push(entry);
      continue;
    }
    // A record lands in every group it has a reason for
    for (const reason of classification.reasons) {
      groups[reason].push(entry);
    }
  }
  return { trunk, groups };
}

/**
 * True when a removal or prune that was attempted did not succeed. Branch
 * deletion failures are reported but do not count.
 */
export function removalFailed(report: CleanupReport): boolean {
  return report.actions.some(
    (action) => action.status === 'failed' && (action.action === 'remove-worktree' || action.action === 'prune'),
  );
}

function branchOf(record: WorktreeRecord): string | null {
  return record.branch === DETACHED ? null : record.branch;
}

/**
 * Retires orphaned, merged and stale worktrees. Active worktrees are never
 * touched. In dry-run mode no mutating backend call is made.
 */
export class CleanupEngine {
  private readonly logger: Logger;

  constructor(
    private readonly backend: RepositoryBackend,
    private readonly registry: WorktreeRegistry,
    private readonly classifier: WorktreeClassifier,
    private readonly options: CleanupEngineOptions,
  ) {
    this.logger = options.logger ?? console;
  }

  async analyze(): Promise<Result<CleanupAnalysis>> {
    const snapshot = await this.registry.snapshot();
    if (!snapshot.ok) return snapshot;
    const classified = await this.classifier.classifyAll(snapshot.value);
    if (!classified.ok) return classified;
    return ok(groupClassified(this.classifier.trunk, classified.value));
  }

  /**
   * Act on an analysis, taking a fresh one when none is given. Each removal
   * re-checks the live registry first.
   */
  async run(
    options: CleanupRunOptions,
    prompts: CleanupPrompts,
    precomputed?: CleanupAnalysis,
  ): Promise<Result<CleanupReport>> {
    const analysis = precomputed ? ok(precomputed) : await this.analyze();
    if (!analysis.ok) return analysis;

    const actions: CleanupAction[] = [];
    const handled = new Set<string>();
    const selectedGroups = options.groups ?? CLEANUP_ORDER;
    let retired = 0;
    let pruned = false;

    const hasRemote = await this.backend.hasRemote(this.options.remote);
    if (!hasRemote.ok) return hasRemote;

    for (const group of CLEANUP_ORDER) {
      if (!selectedGroups.includes(group)) continue;
      const candidates = analysis.value.groups[group].filter((entry) => !handled.has(entry.record.path));
      if (candidates.length === 0) continue;

      const decision = options.auto ? 'all' : await prompts.reviewGroup(group, candidates);
      if (decision === 'none') continue;

      const chosen: ClassifiedWorktree[] = [];
      for (const candidate of candidates) {
        const { record, classification } = candidate;
        const label = branchOf(record) ?? record.path;
        const changes = classification.status === 'orphaned' ? null : classification.changes;
        if (changes?.hasUncommittedChanges) {
          // Known uncommitted work is only removed on an explicit answer
          const counts = describeChangeCounts(changes);
          const question = `${label} (${record.path}) has uncommitted changes (${counts}). Remove it anyway?`;
          const remove = !options.auto && !options.dryRun && (await prompts.confirm(question, false));
          if (!remove) {
            this.logger.warn(`⚠️  Keeping ${record.path}: uncommitted changes (${counts})`);
            actions.push({
              action: 'remove-worktree',
              target: record.path,
              status: 'skipped',
              detail: `uncommitted changes: ${counts}`,
            });
            handled.add(record.path);
            continue;
          }
        } else if (decision === 'each') {
          if (!(await prompts.confirm(`Remove ${label} (${record.path})?`))) continue;
        }
        chosen.push(candidate);
        handled.add(record.path);
      }
      if (chosen.length === 0) continue;

      // Orphans lose their record only; their branches may hold the only copy of their commits
      if (group === 'orphaned') {
        const outcome = await this.retireOrphans(chosen, options);
        actions.push(...outcome.actions);
        retired += outcome.retired;
        pruned = true;
        continue;
      }

      for (const candidate of chosen) {
        const removal = await this.retireWorktree(candidate.record, options);
        actions.push(removal);
        if (removal.status !== 'done' && removal.status !== 'planned') continue;
        retired++;
        actions.push(...(await this.deleteBranches(candidate.record, options, prompts, hasRemote.value)));
      }
    }

    if (options.prune && !pruned) {
      actions.push(await this.prune(options.dryRun));
    }

    return ok({ analysis: analysis.value, actions, retired });
  }

  /**
   * Administrative prune only. Orphans have no directory to remove, so nothing
   * is ever deleted from disk for them.
   */
  async prune(dryRun: boolean): Promise<CleanupAction> {
    if (dryRun) {
      this.logger.log('[DRY RUN] Would prune worktree administrative files');
      return { action: 'prune', target: 'worktrees', status: 'planned' };
    }
    const result = await this.backend.pruneWorktrees();
    if (!result.ok) {
      this.logger.warn(`⚠️  Failed to prune worktrees: ${result.error.message}`);
      return { action: 'prune', target: 'worktrees', status: 'failed', detail: result.error.details };
    }
    this.logger.log('✅ Pruned worktree administrative files');
    return { action: 'prune', target: 'worktrees', status: 'done' };
  }

  private async retireOrphans(
    orphans: ClassifiedWorktree[],
    options: CleanupRunOptions,
  ): Promise<{ actions: CleanupAction[]; retired: number }> {
    const actions: CleanupAction[] = [];

    if (options.dryRun) {
      for (const { record } of orphans) {
        this.logger.log(`[DRY RUN] Would prune orphaned worktree record: ${record.path}`);
        actions.push({ action: 'remove-worktree', target: record.path, status: 'planned' });
      }
      actions.unshift(await this.prune(true));
      return { actions, retired: orphans.length };
    }

    const prune = await this.prune(false);
    actions.push(prune);
    if (prune.status === 'failed') {
      for (const { record } of orphans) {
        actions.push({ action: 'remove-worktree', target: record.path, status: 'failed', detail: 'prune failed' });
      }
      return { actions, retired: 0 };
    }

    // Prune only clears records whose directory is gone; check what is left
    const after = await this.registry.snapshot();
    let retired = 0;
    for (const { record } of orphans) {
      if (!after.ok) {
        actions.push({ action: 'remove-worktree', target: record.path, status: 'failed', detail: after.error.message });
      } else if (findByPath(after.value, record.path)) {
        this.logger.warn(`⚠️  ${record.path} is still registered but is not a valid checkout; remove it manually`);
        actions.push({
          action: 'remove-worktree',
          target: record.path,
          status: 'failed',
          detail: 'still registered after prune',
        });
      } else {
        actions.push({ action: 'remove-worktree', target: record.path, status: 'done' });
        retired++;
      }
    }
    return { actions, retired };
  }

  private async retireWorktree(record: WorktreeRecord, options: CleanupRunOptions): Promise<CleanupAction> {
    const target = record.path;

    // The snapshot may be minutes old by now
    const current = await this.registry.snapshot();
    if (!current.ok) {
      return { action: 'remove-worktree', target, status: 'failed', detail: current.error.message };
    }
    const live = findByPath(current.value, target);
    if (!live) {
      this.logger.log(`⚠️  ${target} is no longer registered, skipping`);
      return { action: 'remove-worktree', target, status: 'skipped', detail: 'already removed' };
    }
    if (live.branch !== record.branch) {
      this.logger.warn(`⚠️  ${target} now has ${live.branch} checked out, skipping`);
      return { action: 'remove-worktree', target, status: 'skipped', detail: 'branch changed' };
    }

    if (options.dryRun) {
      this.logger.log(`[DRY RUN] Would remove worktree: ${record.branch} at ${target}`);
      return { action: 'remove-worktree', target, status: 'planned' };
    }

    const graceful = await this.backend.removeWorktree(target, false);
    if (graceful.ok) {
      this.logger.log(`✅ Removed worktree: ${target}`);
      return { action: 'remove-worktree', target, status: 'done' };
    }

    this.logger.warn('⚠️  Could not remove worktree, trying force removal');
    const forced = await this.backend.removeWorktree(target, true);
    if (forced.ok) {
      this.logger.log(`✅ Force removed worktree: ${target}`);
      return { action: 'remove-worktree', target, status: 'done', forced: true };
    }
    this.logger.warn(`❌ Failed to remove worktree: ${target}`);
    return { action: 'remove-worktree', target, status: 'failed', detail: forced.error.details };
  }

  private async deleteBranches(
    record: WorktreeRecord,
    options: CleanupRunOptions,
    prompts: CleanupPrompts,
    hasRemote: boolean,
  ): Promise<CleanupAction[]> {
    const branch = branchOf(record);
    if (!branch) return [];

    const actions: CleanupAction[] = [];
    const ask = (message: string) => (options.auto ? Promise.resolve(true) : prompts.confirm(message));

    if (options.dryRun) {
      this.logger.log(`[DRY RUN] Would delete branch: ${branch}`);
      actions.push({ action: 'delete-branch', target: branch, status: 'planned' });
    } else if (!(await ask(`Delete branch '${branch}'?`))) {
      actions.push({ action: 'delete-branch', target: branch, status: 'skipped' });
    } else {
      actions.push(await this.deleteLocalBranch(branch, ask));
    }

    if (!hasRemote) return actions;
    const { remote } = this.options;
    const onRemote = await this.backend.remoteBranchExists(remote, branch);
    if (!onRemote.ok) {
      actions.push({ action: 'delete-remote-branch', target: `${remote}/${branch}`, status: 'failed', detail: onRemote.error.message });
      return actions;
    }
    if (!onRemote.value) return actions;

    const target = `${remote}/${branch}`;
    if (options.dryRun) {
      this.logger.log(`[DRY RUN] Would delete remote branch: ${target}`);
      actions.push({ action: 'delete-remote-branch', target, status: 'planned' });
    } else if (!(await ask(`Delete remote branch '${target}'?`))) {
      actions.push({ action: 'delete-remote-branch', target, status: 'skipped' });
    } else {
      const deleted = await this.backend.deleteRemoteBranch(remote, branch);
      if (deleted.ok) {
        this.logger.log(`✅ Deleted remote branch: ${target}`);
        actions.push({ action: 'delete-remote-branch', target, status: 'done' });
      } else {
        this.logger.warn(`⚠️  Could not delete remote branch: ${target}`);
        actions.push({ action: 'delete-remote-branch', target, status: 'failed', detail: deleted.error.details });
      }
    }
    return actions;
  }

  private async deleteLocalBranch(
    branch: string,
    ask: (message: string) => Promise<boolean>,
  ): Promise<CleanupAction> {
    const safe = await this.backend.deleteBranch(branch, false);
    if (safe.ok) {
      this.logger.log(`✅ Deleted branch: ${branch}`);
      return { action: 'delete-branch', target: branch, status: 'done' };
    }

    if (!(await ask(`Branch '${branch}' is not fully merged. Force delete it?`))) {
      return { action: 'delete-branch', target: branch, status: 'skipped', detail: safe.error.details };
    }
    const forced = await this.backend.deleteBranch(branch, true);
    if (forced.ok) {
      this.logger.log(`✅ Force deleted branch: ${branch}`);
      return { action: 'delete-branch', target: branch, status: 'done', forced: true };
    }
    this.logger.warn(`⚠️  Could not delete branch: ${branch}`);
    return { action: 'delete-branch', target: branch, status: 'failed', detail: forced.error.details };
  }
}
