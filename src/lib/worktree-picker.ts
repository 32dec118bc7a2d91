import { WorktreeRegistry } from './worktree-list.js';
import { WorktreeClassifier } from './classifier.js';
import { Result, WorktreeError, ok } from './errors.js';
import { DETACHED, MERGE_STRATEGIES, MergeStrategy, Prompts } from '../types.js';

export interface MergeCandidate {
  branch: string;
  path: string;
  dirty: boolean;
  ahead: number;
  behind: number;
}

const STRATEGY_DESCRIPTIONS: Record<MergeStrategy, string> = {
  merge: 'merge - keep history with a merge commit',
  rebase: 'rebase - replay commits onto trunk, fast-forward only',
  squash: 'squash - one commit on trunk',
};

/**
 * Worktrees on a branch other than trunk, with their state against trunk
 */
export async function listMergeCandidates(
  registry: WorktreeRegistry,
  classifier: WorktreeClassifier,
): Promise<Result<MergeCandidate[]>> {
  const snapshot = await registry.snapshot();
  if (!snapshot.ok) return snapshot;

  const classified = await classifier.classifyAll(snapshot.value);
  if (!classified.ok) return classified;

  const candidates: MergeCandidate[] = [];
  for (const { record, classification } of classified.value) {
    if (record.branch === DETACHED || classifier.isTrunk(record) || classification.status === 'orphaned') continue;
    candidates.push({
      branch: record.branch,
      path: record.path,
      dirty: classification.changes.hasUncommittedChanges,
      ahead: classification.aheadCount,
      behind: classification.behindCount,
    });
  }
  return ok(candidates);
}

/**
 * @example formatCandidate({ branch: 'login', dirty: true, ahead: 2, behind: 0, ... }) -> 'login *  ↑2/↓0'
 */
export function formatCandidate(candidate: MergeCandidate): string {
  const dirty = candidate.dirty ? ' *' : '';
  return `${candidate.branch}${dirty}  ↑${candidate.ahead}/↓${candidate.behind}`;
}

/**
 * Interactive picker for the branch to merge. Auto-selects a single candidate.
 */
export async function pickMergeBranch(
  prompts: Prompts,
  candidates: MergeCandidate[],
  logger: Pick<Console, 'log'> = console,
): Promise<string> {
  const [first] = candidates;
  if (!first) {
    throw new WorktreeError('PreconditionFailed', 'No worktrees available to merge');
  }
  if (candidates.length === 1) {
    logger.log(`📂 Selected: ${first.branch}`);
    return first.branch;
  }
  return prompts.select(
    'Select worktree to merge',
    candidates.map((candidate) => ({ name: candidate.branch, message: formatCandidate(candidate) })),
  );
}

/**
 * Strategy picker, with the configured default listed first
 */
export async function pickStrategy(prompts: Prompts, defaultStrategy: MergeStrategy): Promise<MergeStrategy> {
  const ordered = [defaultStrategy, ...MERGE_STRATEGIES.filter((strategy) => strategy !== defaultStrategy)];
  return prompts.select(
    'Select merge strategy',
    ordered.map((strategy) => ({ name: strategy, message: STRATEGY_DESCRIPTIONS[strategy] })),
  );
}
