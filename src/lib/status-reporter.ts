import { setTimeout as sleep } from 'timers/promises';
import { WorktreeRegistry } from './worktree-list.js';
import { WorktreeClassifier } from './classifier.js';
import { Result, ok } from './errors.js';
import { ClassificationResult } from '../types.js';

export interface WorktreeStatus {
  readonly isTrunk: boolean;
  readonly classification: ClassificationResult;
}

export interface StatusReport {
  readonly generatedAt: Date;
  readonly trunk: string;
  readonly total: number;
  readonly withChanges: number;
  readonly totalAhead: number;
  readonly totalBehind: number;
  readonly worktrees: readonly WorktreeStatus[];
}

/**
 * Read-only aggregate over every non-bare worktree. Safe to call at any rate.
 */
export class StatusReporter {
  constructor(
    private readonly registry: WorktreeRegistry,
    private readonly classifier: WorktreeClassifier,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async report(): Promise<Result<StatusReport>> {
    const snapshot = await this.registry.snapshot();
    if (!snapshot.ok) return snapshot;

    const worktrees: WorktreeStatus[] = [];
    let withChanges = 0;
    let totalAhead = 0;
    let totalBehind = 0;

    for (const record of snapshot.value) {
      const classification = await this.classifier.classify(record);
      if (!classification.ok) return classification;

      const isTrunk = this.classifier.isTrunk(record);
      const result = classification.value;
      if (result.status !== 'orphaned') {
        if (result.changes.hasUncommittedChanges) withChanges++;
        if (!isTrunk) {
          totalAhead += result.aheadCount;
          totalBehind += result.behindCount;
        }
      }
      worktrees.push(Object.freeze({ isTrunk, classification: result }));
    }

    return ok(
      Object.freeze({
        generatedAt: this.now(),
        trunk: this.classifier.trunk,
        total: worktrees.length,
        withChanges,
        totalAhead,
        totalBehind,
        worktrees: Object.freeze(worktrees),
      }),
    );
  }
}

export interface WatchOptions {
  intervalMs: number;
  // Stop after this many renders; runs until the process ends otherwise
  iterations?: number;
  wait?: (ms: number) => Promise<unknown>;
}

/**
 * Snapshot, render, sleep, repeat. The next snapshot starts only after the
 * previous render has returned.
 */
export async function watchStatus(
  reporter: StatusReporter,
  render: (report: Result<StatusReport>) => void | Promise<void>,
  options: WatchOptions,
): Promise<void> {
  const wait = options.wait ?? ((ms: number) => sleep(ms));
  for (let rendered = 0; options.iterations === undefined || rendered < options.iterations; rendered++) {
    if (rendered > 0) {
      await wait(options.intervalMs);
    }
    await render(await reporter.report());
  }
}
