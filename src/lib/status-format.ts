import { StatusReport, WorktreeStatus } from './status-reporter.js';
import { DETACHED, WorkingTreeChanges } from '../types.js';

const SUBJECT_LIMIT = 50;

export function truncateSubject(subject: string): string {
  return subject.length > SUBJECT_LIMIT ? `${subject.slice(0, SUBJECT_LIMIT)}...` : subject;
}

/**
 * @example describeChangeCounts({ staged: 0, modified: 3, untracked: 2, ... }) -> '3 modified, 2 untracked'
 */
export function describeChangeCounts(changes: WorkingTreeChanges): string {
  const parts: string[] = [];
  if (changes.staged > 0) parts.push(`${changes.staged} staged`);
  if (changes.modified > 0) parts.push(`${changes.modified} modified`);
  if (changes.untracked > 0) parts.push(`${changes.untracked} untracked`);
  return parts.join(', ');
}

export function formatChanges(changes: WorkingTreeChanges): string {
  if (!changes.hasUncommittedChanges) {
    return '✅ Clean working tree';
  }
  return `⚠️  Has changes: ${describeChangeCounts(changes)}`;
}

export function formatAheadBehind(ahead: number, behind: number): string {
  return `↑${ahead} ↓${behind}`;
}

export function formatWorktreeStatus(entry: WorktreeStatus, trunk: string): string[] {
  const { classification, isTrunk } = entry;
  const { record } = classification;
  const branch = record.branch === DETACHED ? `(detached at ${record.headCommit})` : record.branch;
  const lines = [`⎇ ${branch}${isTrunk ? ' (trunk)' : ''}`, `  📁 ${record.path}`];

  if (classification.status === 'orphaned') {
    lines.push('  ❌ Directory missing or not a valid checkout (orphaned)');
    return lines;
  }

  lines.push(`  ${formatChanges(classification.changes)}`);

  const { lastCommit } = classification;
  if (lastCommit) {
    lines.push(`  Last commit: ${lastCommit.hash} - ${lastCommit.relativeDate}`);
    if (lastCommit.subject) {
      lines.push(`  "${truncateSubject(lastCommit.subject)}"`);
    }
  } else {
    lines.push('  Last commit: none');
  }

  if (!isTrunk && (classification.aheadCount > 0 || classification.behindCount > 0)) {
    lines.push(`  vs ${trunk}: ${formatAheadBehind(classification.aheadCount, classification.behindCount)}`);
  }

  const { remoteTracking } = classification;
  if (remoteTracking) {
    const sync =
      remoteTracking.ahead > 0 || remoteTracking.behind > 0
        ? formatAheadBehind(remoteTracking.ahead, remoteTracking.behind)
        : '✓';
    lines.push(`  Remote: ${remoteTracking.ref} ${sync}`);
  }

  if (classification.reasons.length > 0) {
    const reasons = classification.reasons.map((reason) =>
      reason === 'stale' ? `stale (${classification.ageDays} days)` : reason,
    );
    lines.push(`  Status: ${reasons.join(', ')}`);
  }

  return lines;
}

export function formatStatusReport(report: StatusReport, project: string): string[] {
  const lines = [
    '📋 Worktree status',
    `   Project: ${project}`,
    `   Trunk: ${report.trunk}`,
    `   Worktrees: ${report.total}`,
    `   Generated: ${report.generatedAt.toISOString()}`,
    '',
  ];

  for (const entry of report.worktrees) {
    lines.push(...formatWorktreeStatus(entry, report.trunk), '');
  }

  lines.push('Summary');
  lines.push(`   Total worktrees: ${report.total}`);
  lines.push(`   With uncommitted changes: ${report.withChanges}`);
  if (report.totalAhead > 0 || report.totalBehind > 0) {
    lines.push(`   Total commits: ${formatAheadBehind(report.totalAhead, report.totalBehind)} (vs ${report.trunk})`);
  }
  return lines;
}
