export type MergeStrategy = 'merge' | 'rebase' | 'squash';

export const MERGE_STRATEGIES: readonly MergeStrategy[] = ['merge', 'rebase', 'squash'];

/** Branch value recorded for a worktree whose HEAD is not on a branch. */
export const DETACHED = 'detached';

export interface ArborConfig {
  editor: string;
  copyPaths: string[];
  defaultStrategy: MergeStrategy;
  autoConfirm: boolean;
  staleDays: number;
  remote: string;
  worktreesDir?: string;
  watchInterval: number;
}

export interface WorktreeRecord {
  path: string;
  // Branch name, or DETACHED
  branch: string;
  headCommit: string;
  isBare: boolean;
  // First entry git lists: the checkout that owns the repository
  isPrimary: boolean;
  // git itself has noticed the directory is gone
  isPrunable: boolean;
}

export type WorktreeReason = 'orphaned' | 'merged' | 'stale';

export interface WorkingTreeChanges {
  hasUncommittedChanges: boolean;
  staged: number;
  modified: number;
  untracked: number;
}

export interface RemoteTracking {
  ref: string;
  ahead: number;
  behind: number;
}

export interface CommitSummary {
  hash: string;
  timestamp: number;
  relativeDate: string;
  subject: string;
}

export interface OrphanedClassification {
  status: 'orphaned';
  reasons: ['orphaned'];
  record: WorktreeRecord;
}

export interface InspectedClassification {
  status: 'active' | 'merged' | 'stale';
  reasons: Array<'merged' | 'stale'>;
  record: WorktreeRecord;
  aheadCount: number;
  behindCount: number;
  changes: WorkingTreeChanges;
  remoteTracking?: RemoteTracking;
  lastCommit: CommitSummary | null;
  ageDays: number | null;
}

export type ClassificationResult = OrphanedClassification | InspectedClassification;

export interface Prompts {
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  // Free-text answer, trimmed
  ask(message: string): Promise<string>;
  select<T extends string>(message: string, choices: Array<{ name: T; message: string }>): Promise<T>;
}

export type Logger = Pick<Console, 'log' | 'warn'>;
