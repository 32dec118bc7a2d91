import { RepositoryBackend } from './git.js';
import { Result, ok } from './errors.js';
import {
  ClassificationResult,
  CommitSummary,
  InspectedClassification,
  RemoteTracking,
  WorktreeRecord,
} from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ClassifierOptions {
  trunk: string;
  staleDays: number;
  now?: () => Date;
}

export interface ClassifiedWorktree {
  record: WorktreeRecord;
  classification: ClassificationResult;
}

export function ageInDays(timestamp: number, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - timestamp) / DAY_MS));
}

/**
 * Derives the status of a worktree from fresh backend queries. Nothing is cached
 * between calls.
 */
export class WorktreeClassifier {
  private readonly now: () => Date;

  constructor(
    private readonly backend: RepositoryBackend,
    private readonly options: ClassifierOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get trunk(): string {
    return this.options.trunk;
  }

  isTrunk(record: WorktreeRecord): boolean {
    return record.branch === this.options.trunk;
  }

  /**
   * Classify one record. The trunk worktree is inspected (dirty state, last commit,
   * upstream) but never gains a reason.
   */
  async classify(record: WorktreeRecord): Promise<Result<ClassificationResult>> {
    // Nothing else can be asked of a directory that is gone
    const valid = await this.backend.isValidCheckout(record.path);
    if (!valid.ok) return valid;
    if (!valid.value) {
      return ok({ status: 'orphaned', reasons: ['orphaned'], record });
    }

    const isTrunk = this.isTrunk(record);
    let aheadCount = 0;
    let behindCount = 0;
    if (!isTrunk) {
      const counts = await this.backend.aheadBehind(this.options.trunk, 'HEAD', record.path);
      if (!counts.ok) return counts;
      aheadCount = counts.value.ahead;
      behindCount = counts.value.behind;
    }

    const changes = await this.backend.workingTreeStatus(record.path);
    if (!changes.ok) return changes;

    const remoteTracking = await this.remoteTracking(record.path);
    if (!remoteTracking.ok) return remoteTracking;

    const lastCommit = await this.backend.lastCommit(record.path);
    if (!lastCommit.ok) return lastCommit;

    const age = await this.age(record.path, lastCommit.value);
    if (!age.ok) return age;

    const reasons: InspectedClassification['reasons'] = [];
    if (!isTrunk) {
      const merged = await this.backend.isMerged('HEAD', this.options.trunk, record.path);
      if (!merged.ok) return merged;
      if (merged.value) reasons.push('merged');
      if (age.value !== null && age.value > this.options.staleDays) reasons.push('stale');
    }

    const result: InspectedClassification = {
      status: reasons[0] ?? 'active',
      reasons,
      record,
      aheadCount,
      behindCount,
      changes: changes.value,
      lastCommit: lastCommit.value,
      ageDays: age.value,
    };
    if (remoteTracking.value) {
      result.remoteTracking = remoteTracking.value;
    }
    return ok(result);
  }

  /**
   * Classify every record except the trunk worktree. Bare records never reach
   * here: the registry drops them.
   */
  async classifyAll(records: WorktreeRecord[]): Promise<Result<ClassifiedWorktree[]>> {
    const classified: ClassifiedWorktree[] = [];
    for (const record of records) {
      if (record.isBare || this.isTrunk(record)) continue;
      const classification = await this.classify(record);
      if (!classification.ok) return classification;
      classified.push({ record, classification: classification.value });
    }
    return ok(classified);
  }

  private async remoteTracking(path: string): Promise<Result<RemoteTracking | null>> {
    const upstream = await this.backend.upstreamOf(path);
    if (!upstream.ok) return upstream;
    if (!upstream.value) return ok(null);

    const counts = await this.backend.aheadBehind(upstream.value, 'HEAD', path);
    if (!counts.ok) return counts;
    return ok({ ref: upstream.value, ahead: counts.value.ahead, behind: counts.value.behind });
  }

  /**
   * Days since the last commit, or since the directory was last modified when the
   * branch has no commits. The fallback is a heuristic: unrelated tools touch
   * directory metadata too.
   */
  private async age(path: string, lastCommit: CommitSummary | null): Promise<Result<number | null>> {
    const now = this.now();
    if (lastCommit) {
      return ok(ageInDays(lastCommit.timestamp, now));
    }
    const modified = await this.backend.directoryModifiedAt(path);
    if (!modified.ok) return modified;
    return ok(modified.value ? ageInDays(modified.value.getTime(), now) : null);
  }
}
