import { describe, it, expect } from 'vitest';
import {
  parseWorktreeList,
  WorktreeRegistry,
  findByBranch,
  findTrunkWorktree,
  formatWorktreeLine,
} from '../../lib/worktree-list.js';
import { FakeBackend } from '../helpers/fake-backend.js';

const PORCELAIN = [
  'worktree /src/app',
  'HEAD 1111111aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa',
  'branch refs/heads/main',
  '',
  'worktree /src/app-worktrees/feature/login',
  'HEAD 2222222bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb',
  'branch refs/heads/feature/login',
  '',
  'worktree /src/app worktrees/with space',
  'HEAD 3333333ccccccccccccccccccccccccccccccccc',
  'detached',
  '',
  'worktree /src/gone',
  'HEAD 4444444ddddddddddddddddddddddddddddddddd',
  'branch refs/heads/gone',
  'prunable gitdir file points to non-existent location',
  '',
].join('\n');

describe('parseWorktreeList', () => {
  it('should parse every block with a short head', () => {
    const records = parseWorktreeList(PORCELAIN);
    expect(records).toHaveLength(4);
    expect(records[0]).toEqual({
      path: '/src/app',
      branch: 'main',
      headCommit: '1111111',
      isBare: false,
      isPrimary: true,
      isPrunable: false,
    });
  });

  it('should strip refs/heads/ but keep slashes in branch names', () => {
    const records = parseWorktreeList(PORCELAIN);
    expect(records[1]?.branch).toBe('feature/login');
    expect(records[1]?.isPrimary).toBe(false);
  });

  it('should keep paths with spaces and mark detached heads', () => {
    const records = parseWorktreeList(PORCELAIN);
    expect(records[2]?.path).toBe('/src/app worktrees/with space');
    expect(records[2]?.branch).toBe('detached');
  });

  it('should flag prunable records', () => {
    const records = parseWorktreeList(PORCELAIN);
    expect(records[3]?.isPrunable).toBe(true);
  });

  it('should not treat a bare entry as primary', () => {
    const records = parseWorktreeList(
      ['worktree /src/app.git', 'bare', '', 'worktree /src/wt', 'HEAD abcdef0123', 'branch refs/heads/dev'].join('\n'),
    );
    expect(records.map((record) => [record.isBare, record.isPrimary])).toEqual([
      [true, false],
      [false, false],
    ]);
  });

  it('should handle output without trailing blank line', () => {
    const records = parseWorktreeList('worktree /a\nHEAD 0123456789\nbranch refs/heads/x');
    expect(records).toHaveLength(1);
    expect(records[0]?.branch).toBe('x');
  });

  it('should return nothing for empty output', () => {
    expect(parseWorktreeList('')).toEqual([]);
  });
});

describe('WorktreeRegistry', () => {
  it('should never return the bare administrative entry', async () => {
    const backend = new FakeBackend();
    backend.listWorktrees = async () => ({
      ok: true,
      value: 'worktree /src/app.git\nbare\n\nworktree /src/wt\nHEAD 0123456789\nbranch refs/heads/dev\n',
    });
    const snapshot = await new WorktreeRegistry(backend).snapshot();
    expect(snapshot).toEqual({
      ok: true,
      value: [
        { path: '/src/wt', branch: 'dev', headCommit: '0123456', isBare: false, isPrimary: false, isPrunable: false },
      ],
    });
  });

  it('should re-read the backend on every snapshot', async () => {
    const backend = new FakeBackend();
    const registry = new WorktreeRegistry(backend);
    await registry.snapshot();
    backend.addWorktree('/wt/a', 'a');
    const second = await registry.snapshot();
    expect(second.ok && second.value.map((record) => record.path)).toEqual(['/repo', '/wt/a']);
    expect(backend.callsTo('listWorktrees')).toHaveLength(2);
  });

  it('should pass backend failures through', async () => {
    const backend = new FakeBackend();
    backend.failNext('listWorktrees', 'fatal: broken');
    const snapshot = await new WorktreeRegistry(backend).snapshot();
    expect(snapshot.ok).toBe(false);
  });
});

describe('lookups', () => {
  const records = parseWorktreeList(PORCELAIN);

  it('should never match detached records by branch', () => {
    expect(findByBranch(records, 'detached')).toBeUndefined();
    expect(findByBranch(records, 'feature/login')?.path).toBe('/src/app-worktrees/feature/login');
  });

  it('should fall back to the primary checkout for trunk', () => {
    expect(findTrunkWorktree(records, 'master')?.path).toBe('/src/app');
  });

  it('should format list lines', () => {
    const [primary, login, detached, gone] = records;
    expect(primary && formatWorktreeLine(primary)).toBe('/src/app  1111111  [main]');
    expect(login && formatWorktreeLine(login)).toBe('/src/app-worktrees/feature/login  2222222  [feature/login]');
    expect(detached && formatWorktreeLine(detached)).toBe('/src/app worktrees/with space  3333333  (detached)');
    expect(gone && formatWorktreeLine(gone)).toBe('/src/gone  4444444  [gone] prunable');
  });
});
