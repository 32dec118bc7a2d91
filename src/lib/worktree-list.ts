import { RepositoryBackend } from './git.js';
import { Result, ok } from './errors.js';
import { DETACHED, WorktreeRecord } from '../types.js';

const SHORT_HASH_LENGTH = 7;

interface PartialRecord {
  path?: string;
  head?: string;
  branch?: string;
  detached?: boolean;
  bare?: boolean;
  prunable?: boolean;
}

function finalize(entry: PartialRecord, isPrimary: boolean): WorktreeRecord | null {
  if (!entry.path) return null;
  return {
    path: entry.path,
    branch: entry.branch ?? DETACHED,
    headCommit: (entry.head ?? '').slice(0, SHORT_HASH_LENGTH),
    isBare: entry.bare === true,
    isPrimary,
    isPrunable: entry.prunable === true,
  };
}

/**
 * Parse `git worktree list --porcelain` output.
 *
 * Entries are blank-line separated blocks of `worktree <path>`, `HEAD <sha>`,
 * and either `branch refs/heads/<name>`, `detached` or `bare`, optionally
 * followed by `locked` / `prunable` annotations. The bare administrative
 * entry is kept here so callers can see it; `snapshot()` drops it.
 */
export function parseWorktreeList(output: string): WorktreeRecord[] {
  const records: WorktreeRecord[] = [];
  let current: PartialRecord = {};

  const flush = () => {
    const record = finalize(current, records.length === 0 && current.bare !== true);
    if (record) records.push(record);
    current = {};
  };

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trimEnd();
    if (line === '') {
      flush();
    } else if (line.startsWith('worktree ')) {
      if (current.path) flush();
      current.path = line.slice('worktree '.length);
    } else if (line.startsWith('HEAD ')) {
      current.head = line.slice('HEAD '.length);
    } else if (line.startsWith('branch ')) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    } else if (line === 'detached') {
      current.detached = true;
    } else if (line === 'bare') {
      current.bare = true;
    } else if (line === 'prunable' || line.startsWith('prunable ')) {
      current.prunable = true;
    }
  }
  flush();

  return records;
}

/**
 * Every worktree the backend knows about, re-read on each call.
 */
export class WorktreeRegistry {
  constructor(private readonly backend: RepositoryBackend) {}

  async snapshot(): Promise<Result<WorktreeRecord[]>> {
    const listing = await this.backend.listWorktrees();
    if (!listing.ok) return listing;
    return ok(parseWorktreeList(listing.value).filter((record) => !record.isBare));
  }
}

export function findByBranch(records: WorktreeRecord[], branch: string): WorktreeRecord | undefined {
  if (branch === DETACHED) return undefined;
  return records.find((record) => record.branch === branch);
}

export function findByPath(records: WorktreeRecord[], path: string): WorktreeRecord | undefined {
  return records.find((record) => record.path === path);
}

/**
 * Worktree that holds the trunk branch, else the primary checkout
 */
export function findTrunkWorktree(records: WorktreeRecord[], trunk: string): WorktreeRecord | undefined {
  return findByBranch(records, trunk) ?? records.find((record) => record.isPrimary);
}

export function formatWorktreeLine(record: WorktreeRecord): string {
  const branch = record.branch === DETACHED ? '(detached)' : `[${record.branch}]`;
  const head = record.headCommit || '0000000';
  const prunable = record.isPrunable ? ' prunable' : '';
  return `${record.path}  ${head}  ${branch}${prunable}`;
}
