import { CommandContext, createClassifier } from '../lib/context.js';
import {
  CleanupAnalysis,
  CleanupEngine,
  CleanupGroup,
  CleanupPrompts,
  CleanupReport,
  CLEANUP_ORDER,
  GroupDecision,
  removalFailed,
} from '../lib/cleanup-engine.js';
import { ClassifiedWorktree } from '../lib/classifier.js';
import { WorktreeError, unwrap } from '../lib/errors.js';
import { DETACHED, Logger, Prompts } from '../types.js';

export interface CleanupOptions {
  dryRun?: boolean;
  auto?: boolean;
  // Skip the typed confirmation for --auto
  yes?: boolean;
  pruneOnly?: boolean;
  merged?: boolean;
  orphaned?: boolean;
  // true for a bare --stale, the day count otherwise
  stale?: boolean | string;
}

const GROUP_TITLES: Record<CleanupGroup, string> = {
  orphaned: 'Orphaned (directory missing)',
  merged: 'Merged into trunk',
  stale: 'Stale',
};

export function parseStaleDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 1) {
    throw new WorktreeError('PreconditionFailed', `Invalid --stale value: "${value}". Use a whole number of days, at least 1.`);
  }
  return days;
}

function describeEntry(group: CleanupGroup, entry: ClassifiedWorktree): string {
  const { record, classification } = entry;
  const branch = record.branch === DETACHED ? '(detached)' : record.branch;
  if (group === 'stale' && classification.status !== 'orphaned' && classification.ageDays !== null) {
    return `${branch} (${record.path}, ${classification.ageDays} days)`;
  }
  return `${branch} (${record.path})`;
}

export function formatAnalysis(analysis: CleanupAnalysis, groups: readonly CleanupGroup[]): string[] {
  const lines = [`📋 Worktree analysis (trunk: ${analysis.trunk})`, `   Active: ${analysis.groups.active.length}`];
  for (const group of groups) {
    const entries = analysis.groups[group];
    lines.push(`   ${GROUP_TITLES[group]}: ${entries.length}`);
    for (const entry of entries) {
      lines.push(`     - ${describeEntry(group, entry)}`);
    }
  }
  return lines;
}

/**
 * Per-group questions: orphans are all-or-nothing, merged worktrees can be
 * reviewed one by one, stale ones always are.
 */
export function interactiveCleanupPrompts(prompts: Prompts, logger: Logger): CleanupPrompts {
  return {
    async reviewGroup(group, candidates): Promise<GroupDecision> {
      logger.log(`\n${GROUP_TITLES[group]}: ${candidates.length} worktree(s)`);
      switch (group) {
        case 'orphaned':
          return prompts.select<GroupDecision>('Prune orphaned worktree records?', [
            { name: 'all', message: 'Prune all' },
            { name: 'none', message: 'Skip' },
          ]);
        case 'merged':
          return prompts.select<GroupDecision>('Remove merged worktrees?', [
            { name: 'all', message: 'Remove all' },
            { name: 'each', message: 'Review one by one' },
            { name: 'none', message: 'Skip' },
          ]);
        case 'stale':
          return prompts.select<GroupDecision>('Review stale worktrees?', [
            { name: 'each', message: 'Review one by one' },
            { name: 'none', message: 'Skip' },
          ]);
      }
    },
    confirm: (message, defaultValue) => prompts.confirm(message, defaultValue),
  };
}

function selectedGroups(options: CleanupOptions): CleanupGroup[] | undefined {
  const groups = CLEANUP_ORDER.filter((group) => {
    const flag = options[group];
    return flag !== undefined && flag !== false;
  });
  return groups.length > 0 ? groups : undefined;
}

/**
 * Retire orphaned, merged and stale worktrees.
 * @returns The report, or null for --prune-only and when nothing qualified
 */
export async function cleanupCommand(options: CleanupOptions, context: CommandContext): Promise<CleanupReport | null> {
  const { backend, config, registry, prompts, logger } = context;
  const dryRun = options.dryRun === true;
  const staleDays = typeof options.stale === 'string' ? parseStaleDays(options.stale) : config.staleDays;
  const classifier = await createClassifier(context, staleDays);
  const engine = new CleanupEngine(backend, registry, classifier, { remote: config.remote, logger });

  if (dryRun) {
    logger.log('🔍 DRY RUN MODE - No changes will be made');
  }

  if (options.pruneOnly) {
    const action = await engine.prune(dryRun);
    if (action.status === 'failed') {
      throw new WorktreeError('BackendOperationFailed', 'git worktree prune failed', action.detail);
    }
    return null;
  }

  const groups = selectedGroups(options);
  const analysis = unwrap(await engine.analyze());
  for (const line of formatAnalysis(analysis, groups ?? CLEANUP_ORDER)) {
    logger.log(line);
  }

  const pending = (groups ?? CLEANUP_ORDER).some((group) => analysis.groups[group].length > 0);
  if (!pending && groups) {
    logger.log('✨ Nothing to clean up');
    return null;
  }

  const auto = options.auto === true || config.autoConfirm;
  if (auto && !dryRun && pending && !options.yes && !config.autoConfirm) {
    const answer = await prompts.ask("⚠️  Auto mode removes every listed worktree without asking. Type 'yes' to continue:");
    if (answer !== 'yes') {
      throw new WorktreeError('PreconditionFailed', 'Cleanup cancelled');
    }
  }

  const report = unwrap(
    await engine.run(
      { dryRun, auto, groups, prune: groups === undefined },
      interactiveCleanupPrompts(prompts, logger),
      analysis,
    ),
  );

  logger.log('');
  if (dryRun) {
    logger.log(`[DRY RUN] ${report.retired} worktree(s) would be retired`);
  } else {
    logger.log(`🧹 Cleanup complete: ${report.retired} worktree(s) retired`);
  }

  if (removalFailed(report)) {
    const failed = report.actions
      .filter((action) => action.status === 'failed')
      .map((action) => `${action.action} ${action.target}${action.detail ? `: ${action.detail}` : ''}`);
    throw new WorktreeError('BackendOperationFailed', 'Some worktrees could not be removed', failed.join('\n'));
  }
  return report;
}
