import { describe, it, expect, beforeEach } from 'vitest';
import {
  CleanupEngine,
  CleanupGroup,
  CleanupPrompts,
  GroupDecision,
  groupClassified,
  removalFailed,
} from '../../lib/cleanup-engine.js';
import { WorktreeClassifier } from '../../lib/classifier.js';
import { WorktreeRegistry } from '../../lib/worktree-list.js';
import { unwrap } from '../../lib/errors.js';
import { FakeBackend, NOW, ScriptedPrompts, silentLogger } from '../helpers/fake-backend.js';

function scripted(
  decisions: Partial<Record<CleanupGroup, GroupDecision>>,
  confirms: boolean[] = [],
): { answers: ScriptedPrompts; reviewed: CleanupGroup[]; prompts: CleanupPrompts } {
  const answers = new ScriptedPrompts(confirms);
  const reviewed: CleanupGroup[] = [];
  return {
    answers,
    reviewed,
    prompts: {
      reviewGroup: async (group) => {
        reviewed.push(group);
        return decisions[group] ?? 'none';
      },
      confirm: (message) => answers.confirm(message),
    },
  };
}

describe('CleanupEngine', () => {
  let backend: FakeBackend;
  let engine: CleanupEngine;
  let logger: ReturnType<typeof silentLogger>;

  beforeEach(() => {
    backend = new FakeBackend();
    logger = silentLogger();
    const classifier = new WorktreeClassifier(backend, { trunk: 'main', staleDays: 30, now: () => new Date(NOW) });
    engine = new CleanupEngine(backend, new WorktreeRegistry(backend), classifier, { remote: 'origin', logger });
  });

  function staleWorktree(name: string, ageDays = 60): void {
    backend.createBranch(name);
    backend.commitOn(name, `Work on ${name}`, ageDays);
    backend.addWorktree(`/wt/${name}`, name);
  }

  it('should group worktrees by reason', async () => {
    backend.addWorktree('/wt/gone', 'gone', { missing: true });
    backend.addWorktree('/wt/done', 'done');
    staleWorktree('old');
    staleWorktree('fresh', 1);

    const analysis = unwrap(await engine.analyze());

    const paths = (group: CleanupGroup | 'active') => analysis.groups[group].map((entry) => entry.record.path);
    expect(analysis.trunk).toBe('main');
    expect(paths('orphaned')).toEqual(['/wt/gone']);
    expect(paths('merged')).toEqual(['/wt/done']);
    expect(paths('stale')).toEqual(['/wt/old']);
    expect(paths('active')).toEqual(['/wt/fresh']);
  });

  it('should make no mutating call in dry-run mode', async () => {
    backend.addWorktree('/wt/gone', 'gone', { missing: true });
    backend.addWorktree('/wt/done', 'done');
    backend.pushRemoteBranch('done');
    staleWorktree('old');

    const { prompts } = scripted({});
    const report = unwrap(await engine.run({ dryRun: true, auto: true, prune: true }, prompts));

    expect(backend.mutations()).toEqual([]);
    expect(report.retired).toBe(3);
    expect(report.actions.map((action) => [action.action, action.target, action.status])).toEqual([
      ['prune', 'worktrees', 'planned'],
      ['remove-worktree', '/wt/gone', 'planned'],
      ['remove-worktree', '/wt/done', 'planned'],
      ['delete-branch', 'done', 'planned'],
      ['delete-remote-branch', 'origin/done', 'planned'],
      ['remove-worktree', '/wt/old', 'planned'],
      ['delete-branch', 'old', 'planned'],
    ]);
    expect(logger.lines).toContain('[DRY RUN] Would remove worktree: done at /wt/done');
  });

  it('should retire orphans through prune only', async () => {
    backend.addWorktree('/wt/gone', 'gone', { missing: true });
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, groups: ['orphaned'], prune: false }, prompts));

    expect(backend.callsTo('removeWorktree')).toEqual([]);
    expect(backend.mutations().map((call) => call.method)).toEqual(['pruneWorktrees']);
    expect(report.actions).toEqual([
      { action: 'prune', target: 'worktrees', status: 'done' },
      { action: 'remove-worktree', target: '/wt/gone', status: 'done' },
    ]);
    expect(backend.worktree('/wt/gone')).toBeUndefined();
    expect(backend.hasBranch('gone')).toBe(true);
  });

  it('should keep the unmerged branch of an orphan', async () => {
    backend.createBranch('lost');
    backend.commitOn('lost', 'Only copy of this work');
    backend.addWorktree('/wt/lost', 'lost', { missing: true });
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: true }, prompts));

    expect(backend.mutations().map((call) => call.method)).toEqual(['pruneWorktrees']);
    expect(report.retired).toBe(1);
    expect(backend.hasBranch('lost')).toBe(true);
  });

  it('should report an orphan that survives prune and keep its branch', async () => {
    backend.addWorktree('/wt/husk', 'husk', { broken: true });
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: true }, prompts));

    expect(report.actions).toContainEqual({
      action: 'remove-worktree',
      target: '/wt/husk',
      status: 'failed',
      detail: 'still registered after prune',
    });
    expect(removalFailed(report)).toBe(true);
    expect(report.retired).toBe(0);
    expect(backend.hasBranch('husk')).toBe(true);
    expect(backend.callsTo('removeWorktree')).toEqual([]);
  });

  it('should never touch active worktrees', async () => {
    staleWorktree('fresh', 1);
    const { prompts, reviewed } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: false, prune: false }, prompts));

    expect(reviewed).toEqual([]);
    expect(report.actions).toEqual([]);
    expect(backend.mutations()).toEqual([]);
  });

  it('should ask per worktree when reviewing one by one', async () => {
    backend.addWorktree('/wt/m1', 'm1');
    backend.addWorktree('/wt/m2', 'm2');
    const { prompts, answers, reviewed } = scripted({ merged: 'each' }, [true, false, true]);

    const report = unwrap(await engine.run({ dryRun: false, auto: false, prune: false }, prompts));

    expect(reviewed).toEqual(['merged']);
    expect(answers.asked).toEqual(['Remove m1 (/wt/m1)?', 'Remove m2 (/wt/m2)?', "Delete branch 'm1'?"]);
    expect(report.retired).toBe(1);
    expect(backend.worktree('/wt/m1')).toBeUndefined();
    expect(backend.worktree('/wt/m2')).toBeDefined();
    expect(backend.hasBranch('m1')).toBe(false);
  });

  it('should process a worktree that is both merged and stale once', async () => {
    staleWorktree('both', 60);
    backend.createBranch('main', 'both');
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: false }, prompts));

    expect(report.analysis.groups.merged).toHaveLength(1);
    expect(report.analysis.groups.stale).toHaveLength(1);
    expect(backend.callsTo('removeWorktree')).toHaveLength(1);
    expect(report.retired).toBe(1);
  });

  it('should keep a candidate the analysis found dirty', async () => {
    backend.addWorktree('/wt/new-feature', 'new-feature', { changes: { modified: 3, untracked: 2 } });
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: false }, prompts));

    expect(report.analysis.groups.merged.map((entry) => entry.record.path)).toEqual(['/wt/new-feature']);
    expect(report.actions).toEqual([
      {
        action: 'remove-worktree',
        target: '/wt/new-feature',
        status: 'skipped',
        detail: 'uncommitted changes: 3 modified, 2 untracked',
      },
    ]);
    expect(report.retired).toBe(0);
    expect(backend.callsTo('removeWorktree')).toEqual([]);
    expect(backend.worktree('/wt/new-feature')).toBeDefined();
  });

  it('should remove a dirty candidate only on an explicit answer', async () => {
    backend.addWorktree('/wt/new-feature', 'new-feature', { changes: { modified: 3, untracked: 2 } });
    const { prompts, answers } = scripted({ merged: 'all' }, [true, true]);

    const report = unwrap(await engine.run({ dryRun: false, auto: false, prune: false }, prompts));

    expect(answers.asked).toEqual([
      'new-feature (/wt/new-feature) has uncommitted changes (3 modified, 2 untracked). Remove it anyway?',
      "Delete branch 'new-feature'?",
    ]);
    expect(report.actions[0]).toEqual({
      action: 'remove-worktree',
      target: '/wt/new-feature',
      status: 'done',
      forced: true,
    });
    expect(backend.worktree('/wt/new-feature')).toBeUndefined();
  });

  it('should keep a dirty candidate when the answer is no', async () => {
    backend.addWorktree('/wt/new-feature', 'new-feature', { changes: { untracked: 1 } });
    const { prompts, answers } = scripted({ merged: 'each' }, [false]);

    const report = unwrap(await engine.run({ dryRun: false, auto: false, prune: false }, prompts));

    expect(answers.asked).toEqual([
      'new-feature (/wt/new-feature) has uncommitted changes (1 untracked). Remove it anyway?',
    ]);
    expect(report.actions.map((action) => action.status)).toEqual(['skipped']);
    expect(backend.callsTo('removeWorktree')).toEqual([]);
  });

  it('should force removal of a worktree that became dirty after the analysis', async () => {
    backend.addWorktree('/wt/racy', 'racy');
    const analysis = unwrap(await engine.analyze());
    const worktree = backend.worktree('/wt/racy');
    if (worktree) worktree.changes = { modified: 1 };
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: false }, prompts, analysis));

    expect(report.actions[0]).toEqual({ action: 'remove-worktree', target: '/wt/racy', status: 'done', forced: true });
    expect(backend.callsTo('removeWorktree').map((call) => call.args)).toEqual([
      ['/wt/racy', false],
      ['/wt/racy', true],
    ]);
  });

  it('should only force-delete an unmerged branch after confirmation', async () => {
    staleWorktree('old');
    const { prompts, answers } = scripted({ stale: 'each' }, [true, true, false]);

    const report = unwrap(await engine.run({ dryRun: false, auto: false, prune: false }, prompts));

    expect(answers.asked).toEqual([
      'Remove old (/wt/old)?',
      "Delete branch 'old'?",
      "Branch 'old' is not fully merged. Force delete it?",
    ]);
    expect(report.actions[1]).toEqual({
      action: 'delete-branch',
      target: 'old',
      status: 'skipped',
      detail: "error: the branch 'old' is not fully merged",
    });
    expect(backend.hasBranch('old')).toBe(true);
    expect(backend.callsTo('deleteBranch').map((call) => call.args)).toEqual([['old', false]]);
  });

  it('should skip a worktree whose branch changed after the analysis', async () => {
    backend.addWorktree('/wt/m1', 'm1');
    const analysis = unwrap(await engine.analyze());
    backend.createBranch('other');
    const worktree = backend.worktree('/wt/m1');
    if (worktree) worktree.branch = 'other';
    const { prompts } = scripted({});

    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: false }, prompts, analysis));

    expect(report.actions).toEqual([
      { action: 'remove-worktree', target: '/wt/m1', status: 'skipped', detail: 'branch changed' },
    ]);
    expect(backend.callsTo('removeWorktree')).toEqual([]);
  });

  it('should prune at the end of a full cleanup', async () => {
    const { prompts } = scripted({});
    const report = unwrap(await engine.run({ dryRun: false, auto: true, prune: true }, prompts));
    expect(report.actions).toEqual([{ action: 'prune', target: 'worktrees', status: 'done' }]);
  });

  it('should report a failed prune', async () => {
    backend.failNext('pruneWorktrees', 'fatal: cannot lock');
    const action = await engine.prune(false);
    expect(action).toEqual({ action: 'prune', target: 'worktrees', status: 'failed', detail: 'fatal: cannot lock' });
  });
});

describe('groupClassified', () => {
  it('should return empty groups for nothing', () => {
    expect(groupClassified('main', [])).toEqual({
      trunk: 'main',
      groups: { orphaned: [], merged: [], stale: [], active: [] },
    });
  });
});
