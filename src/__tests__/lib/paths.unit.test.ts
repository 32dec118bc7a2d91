import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir, homedir } from 'os';
import { getWorktreesRoot, getWorktreePath, copyIntoWorktree } from '../../lib/paths.js';
import { ArborConfig } from '../../types.js';
import { silentLogger } from '../helpers/fake-backend.js';

describe('paths', () => {
  const createTestConfig = (worktreesDir?: string): ArborConfig => ({
    editor: 'cursor',
    copyPaths: [],
    defaultStrategy: 'merge',
    autoConfirm: false,
    staleDays: 30,
    remote: 'origin',
    worktreesDir,
    watchInterval: 5,
  });

  it('should place worktrees next to the repository by default', () => {
    expect(getWorktreesRoot('/src/app', createTestConfig())).toBe('/src/app-worktrees');
  });

  it('should keep slashes of branch names as directories', () => {
    expect(getWorktreePath('/src/app', createTestConfig(), 'fix/bug-123')).toBe('/src/app-worktrees/fix/bug-123');
  });

  it('should honour worktreesDir with tilde expansion', () => {
    expect(getWorktreePath('/src/app', createTestConfig('~/wt'), 'feature')).toBe(join(homedir(), 'wt', 'feature'));
  });

  it('should resolve a relative worktreesDir against the repository', () => {
    expect(getWorktreesRoot('/src/app', createTestConfig('../trees'))).toBe('/src/trees');
  });
});

describe('copyIntoWorktree', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-copy-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should copy files and directories that exist and skip the rest', () => {
    const repo = join(dir, 'repo');
    const worktree = join(dir, 'worktree');
    mkdirSync(join(repo, '.claude', 'commands'), { recursive: true });
    mkdirSync(worktree);
    writeFileSync(join(repo, '.env'), 'API_KEY=test-secret\n');
    writeFileSync(join(repo, '.claude', 'commands', 'review.md'), '# review\n');

    const copied = copyIntoWorktree(repo, worktree, ['.env', '.claude', '.cursor'], silentLogger());

    expect(copied).toEqual(['.env', '.claude']);
    expect(readFileSync(join(worktree, '.env'), 'utf-8')).toBe('API_KEY=test-secret\n');
    expect(existsSync(join(worktree, '.claude', 'commands', 'review.md'))).toBe(true);
    expect(existsSync(join(worktree, '.cursor'))).toBe(false);
  });
});
