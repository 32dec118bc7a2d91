import { CommandContext, createClassifier } from '../lib/context.js';
import {
  MergeEngine,
  PostMergeContext,
  PostMergeDecider,
  PostMergeQuestion,
  PostMergeStep,
  StepReport,
  TerminalMergeState,
} from '../lib/merge-engine.js';
import { listMergeCandidates, formatCandidate, pickMergeBranch, pickStrategy } from '../lib/worktree-picker.js';
import { WorktreeError, unwrap } from '../lib/errors.js';
import { MERGE_STRATEGIES, MergeStrategy, Prompts } from '../types.js';

export interface MergeOptions {
  strategy?: string;
  // Answer every post-merge question yes
  auto?: boolean;
  list?: boolean;
  abortOnConflict?: boolean;
  // false with --no-pull
  pull?: boolean;
}

const STEP_LABELS: Record<PostMergeStep, string> = {
  removeWorktree: 'Remove worktree',
  deleteBranch: 'Delete branch',
  deleteRemoteBranch: 'Delete remote branch',
  pushTrunk: 'Push trunk',
};

export function parseStrategy(value: string): MergeStrategy {
  const strategy = MERGE_STRATEGIES.find((candidate) => candidate === value);
  if (!strategy) {
    throw new WorktreeError(
      'PreconditionFailed',
      `Invalid strategy: "${value}". Use one of: ${MERGE_STRATEGIES.join(', ')}`,
    );
  }
  return strategy;
}

export function postMergeQuestion(question: PostMergeQuestion, context: PostMergeContext): string {
  switch (question) {
    case 'removeWorktree':
      return `Remove worktree at ${context.worktreePath ?? context.branch}?`;
    case 'deleteBranch':
      return `Delete branch '${context.branch}'?`;
    case 'forceDeleteBranch':
      return `Branch '${context.branch}' is not fully merged. Force delete it?`;
    case 'deleteRemoteBranch':
      return `Delete remote branch '${context.remote}/${context.branch}'?`;
    case 'pushTrunk':
      return `Push ${context.trunk} to ${context.remote}?`;
  }
}

function postMergeDecider(prompts: Prompts, auto: boolean): PostMergeDecider {
  if (auto) {
    return async () => true;
  }
  return (question, context) => prompts.confirm(postMergeQuestion(question, context), false);
}

function describeStep(report: StepReport): string {
  const label = STEP_LABELS[report.step];
  switch (report.status) {
    case 'done':
      return `✅ ${label}${report.forced ? ' (forced)' : ''}`;
    case 'skipped':
      return `⏭️  ${label}: skipped${report.detail ? ` (${report.detail})` : ''}`;
    case 'failed':
      return `⚠️  ${label} failed${report.detail ? `: ${report.detail}` : ''}`;
  }
}

/**
 * Merge a worktree branch into trunk. Without a branch, pick one (and a
 * strategy) interactively.
 * @returns The final merge state, or null for --list
 */
export async function mergeCommand(
  branchArg: string | undefined,
  options: MergeOptions,
  context: CommandContext,
): Promise<TerminalMergeState | null> {
  const { backend, config, registry, prompts, logger } = context;
  const requested = options.strategy ? parseStrategy(options.strategy) : undefined;

  let branch = branchArg?.trim();
  let strategy = requested ?? config.defaultStrategy;

  if (options.list || !branch) {
    const classifier = await createClassifier(context);
    const candidates = unwrap(await listMergeCandidates(registry, classifier));

    if (options.list) {
      if (candidates.length === 0) {
        logger.log('No worktrees available to merge');
        return null;
      }
      logger.log(`📋 Worktrees available to merge into ${classifier.trunk}:`);
      for (const candidate of candidates) {
        logger.log(`   ${formatCandidate(candidate)}  (${candidate.path})`);
      }
      return null;
    }

    branch = await pickMergeBranch(prompts, candidates, logger);
    strategy = requested ?? (await pickStrategy(prompts, config.defaultStrategy));
  }

  logger.log(`🔀 Merging ${branch} (${strategy})`);

  const engine = new MergeEngine(backend, registry, { remote: config.remote, logger });
  const state = await engine.run({
    sourceBranch: branch,
    strategy,
    pull: options.pull,
    abortOnConflict: options.abortOnConflict,
    postMerge: postMergeDecider(prompts, options.auto === true || config.autoConfirm),
  });

  if (state.kind === 'Aborted') {
    throw state.error;
  }

  for (const report of state.cleanup) {
    logger.log(describeStep(report));
  }
  logger.log(`✅ Done: ${state.addedCommits} commit(s) added to ${state.plan.trunk}`);
  return state;
}
