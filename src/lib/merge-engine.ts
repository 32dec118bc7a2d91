import { RepositoryBackend } from './git.js';
import { WorktreeRegistry, findByBranch, findTrunkWorktree } from './worktree-list.js';
import { resolveTrunkBranch } from './trunk.js';
import { WorktreeError, Result, ok, preconditionFailed } from './errors.js';
import { Logger, MergeStrategy, WorktreeRecord } from '../types.js';

export type PostMergeStep = 'removeWorktree' | 'deleteBranch' | 'deleteRemoteBranch' | 'pushTrunk';

export interface PostMergeContext {
  branch: string;
  trunk: string;
  remote: string;
  worktreePath?: string;
}

// Force-deleting an unmerged branch is asked separately from deleting it
export type PostMergeQuestion = PostMergeStep | 'forceDeleteBranch';

export type PostMergeDecider = (question: PostMergeQuestion, context: PostMergeContext) => Promise<boolean>;

export interface MergeRequest {
  sourceBranch: string;
  strategy: MergeStrategy;
  // Refresh trunk from the remote before merging (default true)
  pull?: boolean;
  // Ask the backend to undo a conflicted merge or rebase
  abortOnConflict?: boolean;
  // Opting in to post-merge cleanup; each step is asked separately
  postMerge?: PostMergeDecider;
}

export interface MergePlan {
  request: MergeRequest;
  trunk: string;
  trunkPath: string;
  sourcePath: string | null;
}

export interface StepReport {
  step: PostMergeStep;
  status: 'done' | 'skipped' | 'failed';
  forced?: boolean;
  detail?: string;
}

export type MergeOutcome = 'Succeeded' | 'ConflictAbort' | 'PreconditionFailed' | 'BackendFailure';

export type MergeState =
  | { kind: 'Idle'; request: MergeRequest }
  | { kind: 'Preflight'; request: MergeRequest }
  | { kind: 'Merging'; plan: MergePlan }
  | { kind: 'PostMergeCleanup'; plan: MergePlan; addedCommits: number }
  | { kind: 'Done'; outcome: 'Succeeded'; plan: MergePlan; addedCommits: number; cleanup: StepReport[] }
  | {
      kind: 'Aborted';
      outcome: Exclude<MergeOutcome, 'Succeeded'>;
      from: 'Preflight' | 'Merging';
      error: WorktreeError;
      // True when the backend rolled trunk back to its pre-merge state
      rolledBack: boolean;
    };

interface StrategyFailure {
  error: WorktreeError;
  // The rebase itself stopped, as opposed to the merge into trunk
  midRebase: boolean;
}

export type TerminalMergeState = Extract<MergeState, { kind: 'Done' | 'Aborted' }>;
type ActiveMergeState = Exclude<MergeState, TerminalMergeState>;

export function isTerminal(state: MergeState): state is TerminalMergeState {
  return state.kind === 'Done' || state.kind === 'Aborted';
}

function outcomeFor(error: WorktreeError): Exclude<MergeOutcome, 'Succeeded'> {
  switch (error.kind) {
    case 'ConflictDuringMerge':
      return 'ConflictAbort';
    case 'PreconditionFailed':
      return 'PreconditionFailed';
    default:
      return 'BackendFailure';
  }
}

function aborted(from: 'Preflight' | 'Merging', error: WorktreeError, rolledBack = false): MergeState {
  return { kind: 'Aborted', outcome: outcomeFor(error), from, error, rolledBack };
}

export interface MergeEngineOptions {
  remote: string;
  logger?: Logger;
  onTransition?: (state: MergeState) => void;
}

/**
 * Reconciles a worktree branch into trunk.
 *
 * Idle → Preflight → Merging → PostMergeCleanup (opt-in) → Done, with Aborted
 * reachable from Preflight and Merging. Every precondition is checked against a
 * fresh snapshot taken at the start of the run.
 */
export class MergeEngine {
  private readonly logger: Logger;

  constructor(
    private readonly backend: RepositoryBackend,
    private readonly registry: WorktreeRegistry,
    private readonly options: MergeEngineOptions,
  ) {
    this.logger = options.logger ?? console;
  }

  async run(request: MergeRequest): Promise<TerminalMergeState> {
    let state: MergeState = { kind: 'Idle', request };
    for (;;) {
      if (isTerminal(state)) return state;
      state = await this.step(state);
      this.options.onTransition?.(state);
    }
  }

  async step(state: ActiveMergeState): Promise<MergeState> {
    switch (state.kind) {
      case 'Idle':
        return { kind: 'Preflight', request: state.request };
      case 'Preflight': {
        const plan = await this.preflight(state.request);
        return plan.ok ? { kind: 'Merging', plan: plan.value } : aborted('Preflight', plan.error);
      }
      case 'Merging':
        return this.merging(state.plan);
      case 'PostMergeCleanup': {
        const cleanup = await this.postMergeCleanup(state.plan);
        return { kind: 'Done', outcome: 'Succeeded', plan: state.plan, addedCommits: state.addedCommits, cleanup };
      }
    }
  }

  private async preflight(request: MergeRequest): Promise<Result<MergePlan>> {
    const source = request.sourceBranch.trim();
    if (!source) {
      return preconditionFailed('A branch name is required');
    }

    const trunk = await resolveTrunkBranch(this.backend, this.options.remote);
    if (!trunk.ok) return trunk;
    if (source === trunk.value) {
      return preconditionFailed(`Cannot merge ${source} into itself`);
    }

    const exists = await this.backend.branchExists(source);
    if (!exists.ok) return exists;
    if (!exists.value) {
      return preconditionFailed(`Branch not found: ${source}`);
    }

    const snapshot = await this.registry.snapshot();
    if (!snapshot.ok) return snapshot;

    const sourceRecord = findByBranch(snapshot.value, source);
    let sourcePath: string | null = null;
    if (sourceRecord) {
      const clean = await this.ensureClean(sourceRecord, `Branch ${source}`);
      if (!clean.ok) return clean;
      sourcePath = clean.value ? sourceRecord.path : null;
    }

    const trunkRecord = findTrunkWorktree(snapshot.value, trunk.value);
    if (!trunkRecord) {
      return preconditionFailed(`No checkout available to merge into ${trunk.value}`);
    }
    const trunkClean = await this.ensureClean(trunkRecord, `Trunk checkout`);
    if (!trunkClean.ok) return trunkClean;
    if (!trunkClean.value) {
      return preconditionFailed(`Trunk checkout is missing: ${trunkRecord.path}`);
    }

    return ok({ request, trunk: trunk.value, trunkPath: trunkRecord.path, sourcePath });
  }

  /**
   * Resolves to false when the worktree directory is gone, fails when it holds
   * uncommitted work.
   */
  private async ensureClean(record: WorktreeRecord, label: string): Promise<Result<boolean>> {
    const valid = await this.backend.isValidCheckout(record.path);
    if (!valid.ok) return valid;
    if (!valid.value) return ok(false);

    const status = await this.backend.workingTreeStatus(record.path);
    if (!status.ok) return status;
    if (status.value.hasUncommittedChanges) {
      return preconditionFailed(
        `${label} has uncommitted changes in ${record.path}; commit or stash them before merging`,
      );
    }
    return ok(true);
  }

  private async merging(plan: MergePlan): Promise<MergeState> {
    const { request, trunk, trunkPath } = plan;
    const source = request.sourceBranch.trim();

    this.logger.log(`🔀 Switching ${trunkPath} to ${trunk}`);
    const checkout = await this.backend.checkout(trunkPath, trunk);
    if (!checkout.ok) return aborted('Merging', checkout.error);

    if (request.pull !== false) {
      await this.refreshTrunk(trunkPath, trunk);
    }

    const before = await this.backend.resolveRef(trunk, trunkPath);
    if (!before.ok) return aborted('Merging', before.error);

    const failure = await this.applyStrategy(plan, source);
    if (failure) {
      return aborted('Merging', failure.error, await this.rollBack(plan, failure));
    }

    const added = await this.backend.revListCount(`${before.value}..${trunk}`, trunkPath);
    if (!added.ok) return aborted('Merging', added.error);

    this.logger.log(`✅ Merged ${source} into ${trunk} (${request.strategy}, ${added.value} new commit(s))`);

    if (request.postMerge) {
      return { kind: 'PostMergeCleanup', plan, addedCommits: added.value };
    }
    return { kind: 'Done', outcome: 'Succeeded', plan, addedCommits: added.value, cleanup: [] };
  }

  private async refreshTrunk(trunkPath: string, trunk: string): Promise<void> {
    const { remote } = this.options;
    const hasRemote = await this.backend.hasRemote(remote);
    if (!hasRemote.ok) {
      this.logger.warn(`⚠️  Could not list remotes, merging local ${trunk}: ${hasRemote.error.message}`);
      return;
    }
    if (!hasRemote.value) return;

    this.logger.log(`🔄 Pulling ${trunk} from ${remote}`);
    const pulled = await this.backend.pull(trunkPath, remote, trunk);
    if (!pulled.ok) {
      this.logger.warn(`⚠️  Could not pull from ${remote}, merging local ${trunk}: ${pulled.error.message}`);
    }
  }

  private async applyStrategy(plan: MergePlan, source: string): Promise<StrategyFailure | null> {
    const { trunk, trunkPath, sourcePath, request } = plan;

    switch (request.strategy) {
      case 'merge': {
        const merged = await this.backend.merge(trunkPath, source, 'merge');
        return merged.ok ? null : { error: merged.error, midRebase: false };
      }

      case 'rebase': {
        // Rebase happens in the source's own worktree when it has one
        const rebased = sourcePath
          ? await this.backend.rebase(sourcePath, trunk)
          : await this.backend.rebase(trunkPath, trunk, source);
        if (!rebased.ok) return { error: rebased.error, midRebase: true };
        if (!sourcePath) {
          const back = await this.backend.checkout(trunkPath, trunk);
          if (!back.ok) return { error: back.error, midRebase: false };
        }
        // Never fall back to a merge commit
        const forwarded = await this.backend.merge(trunkPath, source, 'ff-only');
        if (forwarded.ok) return null;
        return {
          error: new WorktreeError(
            'ConflictDuringMerge',
            `${trunk} cannot be fast-forwarded to ${source} after the rebase`,
            forwarded.error.details,
            forwarded.error.conflicts,
          ),
          midRebase: false,
        };
      }

      case 'squash': {
        const squashed = await this.backend.merge(trunkPath, source, 'squash');
        if (!squashed.ok) return { error: squashed.error, midRebase: false };
        // Trunk was clean before the squash, so nothing staged means nothing to add
        const staged = await this.backend.workingTreeStatus(trunkPath);
        if (!staged.ok) return { error: staged.error, midRebase: false };
        if (!staged.value.hasUncommittedChanges) {
          this.logger.log(`ℹ️  ${trunk} already contains ${source}, nothing to commit`);
          return null;
        }
        const committed = await this.backend.commit(trunkPath, `Squashed commit from ${source}`);
        return committed.ok ? null : { error: committed.error, midRebase: false };
      }
    }
  }

  /**
   * On request, hand a conflicted merge or rebase back to the backend's own
   * abort. Otherwise trunk stays in the backend's conflict state.
   */
  private async rollBack(plan: MergePlan, failure: StrategyFailure): Promise<boolean> {
    if (!plan.request.abortOnConflict || failure.error.kind !== 'ConflictDuringMerge') {
      return false;
    }
    // A failed fast-forward changes nothing
    if (plan.request.strategy === 'rebase' && !failure.midRebase) {
      return true;
    }

    const result = failure.midRebase
      ? await this.backend.abortRebase(plan.sourcePath ?? plan.trunkPath)
      : await this.backend.abortMerge(plan.trunkPath);
    if (!result.ok) {
      this.logger.warn(`⚠️  Could not abort: ${result.error.message}`);
      return false;
    }
    if (failure.midRebase && !plan.sourcePath) {
      const back = await this.backend.checkout(plan.trunkPath, plan.trunk);
      if (!back.ok) {
        this.logger.warn(`⚠️  Could not switch back to ${plan.trunk}: ${back.error.message}`);
      }
    }
    this.logger.log(`↩️  Aborted; ${plan.trunk} is back to its pre-merge state`);
    return true;
  }

  /**
   * Best-effort: a failed step is reported and the remaining steps still run.
   */
  private async postMergeCleanup(plan: MergePlan): Promise<StepReport[]> {
    const decide = plan.request.postMerge;
    if (!decide) return [];

    const source = plan.request.sourceBranch.trim();
    const { remote } = this.options;
    const reports: StepReport[] = [];

    const snapshot = await this.registry.snapshot();
    const record = snapshot.ok ? findByBranch(snapshot.value, source) : undefined;
    const context: PostMergeContext = { branch: source, trunk: plan.trunk, remote, worktreePath: record?.path };

    // removeWorktree
    if (!snapshot.ok) {
      reports.push({ step: 'removeWorktree', status: 'failed', detail: snapshot.error.message });
    } else if (!record) {
      reports.push({ step: 'removeWorktree', status: 'skipped', detail: 'no worktree' });
    } else if (!(await decide('removeWorktree', context))) {
      reports.push({ step: 'removeWorktree', status: 'skipped' });
    } else {
      reports.push(await this.removeWorktree(record.path));
    }

    // deleteBranch
    if (!(await decide('deleteBranch', context))) {
      reports.push({ step: 'deleteBranch', status: 'skipped' });
    } else {
      reports.push(await this.deleteBranch(source, () => decide('forceDeleteBranch', context)));
    }

    const hasRemote = await this.backend.hasRemote(remote);
    if (!hasRemote.ok || !hasRemote.value) {
      const detail = hasRemote.ok ? `no remote ${remote}` : hasRemote.error.message;
      const status = hasRemote.ok ? 'skipped' : 'failed';
      reports.push({ step: 'deleteRemoteBranch', status, detail }, { step: 'pushTrunk', status, detail });
      return reports;
    }

    // deleteRemoteBranch
    const remoteBranch = await this.backend.remoteBranchExists(remote, source);
    if (!remoteBranch.ok) {
      reports.push({ step: 'deleteRemoteBranch', status: 'failed', detail: remoteBranch.error.message });
    } else if (!remoteBranch.value) {
      reports.push({ step: 'deleteRemoteBranch', status: 'skipped', detail: `not on ${remote}` });
    } else if (!(await decide('deleteRemoteBranch', context))) {
      reports.push({ step: 'deleteRemoteBranch', status: 'skipped' });
    } else {
      const deleted = await this.backend.deleteRemoteBranch(remote, source);
      reports.push(
        deleted.ok
          ? { step: 'deleteRemoteBranch', status: 'done' }
          : { step: 'deleteRemoteBranch', status: 'failed', detail: deleted.error.message },
      );
    }

    // pushTrunk
    if (!(await decide('pushTrunk', context))) {
      reports.push({ step: 'pushTrunk', status: 'skipped' });
    } else {
      const pushed = await this.backend.push(plan.trunkPath, remote, plan.trunk);
      reports.push(
        pushed.ok
          ? { step: 'pushTrunk', status: 'done' }
          : { step: 'pushTrunk', status: 'failed', detail: pushed.error.message },
      );
    }

    return reports;
  }

  private async removeWorktree(path: string): Promise<StepReport> {
    const graceful = await this.backend.removeWorktree(path, false);
    if (graceful.ok) return { step: 'removeWorktree', status: 'done' };

    this.logger.warn(`⚠️  Could not remove ${path}, trying force removal`);
    const forced = await this.backend.removeWorktree(path, true);
    if (forced.ok) return { step: 'removeWorktree', status: 'done', forced: true };
    return { step: 'removeWorktree', status: 'failed', detail: forced.error.message };
  }

  private async deleteBranch(branch: string, confirmForce: () => Promise<boolean>): Promise<StepReport> {
    const exists = await this.backend.branchExists(branch);
    if (!exists.ok) return { step: 'deleteBranch', status: 'failed', detail: exists.error.message };
    if (!exists.value) return { step: 'deleteBranch', status: 'skipped', detail: 'already deleted' };

    const safe = await this.backend.deleteBranch(branch, false);
    if (safe.ok) return { step: 'deleteBranch', status: 'done' };

    // A squash merge leaves the branch unmerged by ancestry; the merge itself succeeded
    if (!(await confirmForce())) {
      return { step: 'deleteBranch', status: 'skipped', detail: safe.error.details ?? safe.error.message };
    }
    const forced = await this.backend.deleteBranch(branch, true);
    if (forced.ok) return { step: 'deleteBranch', status: 'done', forced: true };
    return { step: 'deleteBranch', status: 'failed', detail: forced.error.message };
  }
}
