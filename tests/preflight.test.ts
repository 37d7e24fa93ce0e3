import { describe, it, expect, beforeEach } from 'vitest';
import { PreflightValidator } from '../src/validation/preflight.js';
import { ValidationFailedError } from '../src/errors.js';
import type { OperationRecord } from '../src/state/record.js';
import { FakeGitBackend } from './helpers/fake-git-backend.js';
import { InMemoryRecordStore } from './helpers/in-memory-record-store.js';

describe('PreflightValidator', () => {
  let git: FakeGitBackend;
  let store: InMemoryRecordStore;
  let validator: PreflightValidator;
  let commitId: string;

  function record(overrides: Partial<OperationRecord> = {}): OperationRecord {
    return {
      version: 1,
      sourceBranch: 'feature',
      baseBranch: 'main',
      tempBranch: 'rebranch-temp-1',
      commitPlan: [{ id: commitId, summary: 'Add a', action: 'apply' }],
      cursor: 1,
      stage: 'done',
      createdAt: '2026-01-02T03:04:05.000Z',
      updatedAt: '2026-01-02T03:04:05.000Z',
      ...overrides,
    };
  }

  beforeEach(() => {
    git = new FakeGitBackend('main');
    git.fork('feature');
    commitId = git.commit('Add a', { 'a.txt': 'a\n' });
    store = new InMemoryRecordStore();
    validator = new PreflightValidator(git, store);
  });

  describe('run', () => {
    it('runs every start check in order when all pass', async () => {
      const result = await validator.run('start', 'main');

      expect(result.passed).toBe(true);
      expect(result.results.map((r) => r.name)).toEqual([
        'repository',
        'no-active-operation',
        'no-foreign-operation',
        'clean-working-tree',
        'base-branch-exists',
        'on-branch',
        'distinct-branches',
      ]);
    });

    it('stops at the first failing check', async () => {
      git.clean = false;

      const result = await validator.run('start', 'main');

      expect(result.passed).toBe(false);
      expect(result.results.map((r) => [r.name, r.passed])).toEqual([
        ['repository', true],
        ['no-active-operation', true],
        ['no-foreign-operation', true],
        ['clean-working-tree', false],
      ]);
    });

    it('only requires a record for abort', async () => {
      git.repository = { ok: false, reason: 'broken' };
      git.clean = false;
      store.record = record({ stage: 'conflicted', cursor: 0 });

      const result = await validator.run('abort');

      expect(result.passed).toBe(true);
      expect(result.results.map((r) => r.name)).toEqual(['active-operation']);
    });
  });

  describe('formatResults', () => {
    it('lists each check with errors and fixes', async () => {
      const result = await validator.run('start', 'nope');

      expect(validator.formatResults(result).split('\n')).toEqual([
        '✅ repository',
        '✅ no-active-operation',
        '✅ no-foreign-operation',
        '✅ clean-working-tree',
        '❌ base-branch-exists',
        "   Error: base branch 'nope' does not exist",
        '   Fix: Check branch name spelling',
        "   Fix: Run 'git branch -a' to see all available branches",
        '   Fix: Create the branch: git checkout -b nope',
        'FAIL',
      ]);
    });
  });

  describe('assertStart', () => {
    it('passes on a clean feature branch', async () => {
      await expect(validator.assertStart('main')).resolves.toBeUndefined();
    });

    it('reports an invalid repository', async () => {
      git.repository = { ok: false, reason: 'HEAD does not point at a commit' };

      await expect(validator.assertStart('main')).rejects.toMatchObject({
        check: 'repository',
        transition: 'start',
        message: 'invalid repository: HEAD does not point at a commit',
      });
    });

    it('reports an in-progress rebase with its kind', async () => {
      git.foreign = { kind: 'rebase', marker: 'rebase-merge' };

      const err = await validator.assertStart('main').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationFailedError);
      expect(err).toMatchObject({
        check: 'no-foreign-operation',
        remediation: ['View status: git status', 'Complete or abort the current rebase operation', 'Then retry rebranch'],
      });
    });

    it('rejects an existing record before looking at the tree', async () => {
      store.record = record();
      git.clean = false;

      await expect(validator.assertStart('main')).rejects.toMatchObject({ check: 'no-active-operation' });
    });

    it('names both branches when they are the same', async () => {
      git.switchTo('main');

      await expect(validator.assertStart('main')).rejects.toMatchObject({
        check: 'distinct-branches',
        message: "current branch 'main' is the same as base branch 'main'",
      });
    });
  });

  describe('assertContinue', () => {
    it('returns the record in the conflicted stage', async () => {
      store.record = record({ stage: 'conflicted', cursor: 0 });

      expect(await validator.assertContinue()).toBe(store.record);
    });

    it('returns the record in the picking stage', async () => {
      store.record = record({ stage: 'picking', cursor: 0 });

      expect(await validator.assertContinue()).toMatchObject({ stage: 'picking' });
    });

    it('rejects a done operation', async () => {
      store.record = record();

      await expect(validator.assertContinue()).rejects.toMatchObject({
        check: 'resumable-stage',
        message: 'rebranch is not waiting for conflict resolution (current stage: done)',
      });
    });

    it('gives conflict resolution steps for a dirty tree', async () => {
      store.record = record({ stage: 'conflicted', cursor: 0 });
      git.clean = false;

      await expect(validator.assertContinue()).rejects.toMatchObject({
        check: 'clean-working-tree',
        remediation: [
          'Resolve the conflicted files and stage them: git add <files>',
          'Commit the resolution: git cherry-pick --continue (or git commit)',
          'Then run: rebranch --continue',
        ],
      });
    });
  });

  describe('assertFinish', () => {
    it('returns the record when on the temp branch in the done stage', async () => {
      git.fork('rebranch-temp-1');
      store.record = record();

      expect(await validator.assertFinish()).toBe(store.record);
    });

    it('rejects a conflicted operation', async () => {
      git.fork('rebranch-temp-1');
      store.record = record({ stage: 'conflicted', cursor: 0 });

      await expect(validator.assertFinish()).rejects.toMatchObject({ check: 'finishable-stage' });
    });

    it('rejects finishing from a detached HEAD', async () => {
      store.record = record();
      git.detach();

      await expect(validator.assertFinish()).rejects.toMatchObject({
        check: 'on-temp-branch',
        message: "expected to be on temp branch 'rebranch-temp-1', but on 'detached HEAD'",
      });
    });
  });

  describe('without a record', () => {
    it.each(['assertContinue', 'assertFinish', 'assertAbort'] as const)('%s reports no operation', async (method) => {
      await expect(validator[method]()).rejects.toMatchObject({
        check: 'active-operation',
        message: 'no rebranch operation in progress',
        remediation: ['Start one with: rebranch <base-branch>'],
      });
    });
  });
});
