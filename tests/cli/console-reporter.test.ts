import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleReporter } from '../../src/cli/console-reporter.js';

vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
    bold: (s: string) => s,
  },
}));

const A = '1111111aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const B = '2222222bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

describe('ConsoleReporter', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let reporter: ConsoleReporter;

  function stdout(): string[] {
    return logSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    reporter = new ConsoleReporter();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists the resolved commits with short ids', () => {
    reporter.onEvent({
      type: 'commits-resolved',
      sourceBranch: 'feature',
      baseBranch: 'main',
      commits: [
        { id: A, summary: 'Add a' },
        { id: B, summary: 'Add b' },
      ],
    });

    expect(stdout()).toEqual(['Found 2 commits to rebranch:', '  1111111 Add a', '  2222222 Add b']);
  });

  it('uses the singular for one commit', () => {
    reporter.onEvent({ type: 'selection-parsed', applyCount: 1, skipCount: 2 });

    expect(stdout()).toEqual(['Selected 1 commit to apply, 2 skipped']);
  });

  it('prints one line per applied or skipped commit', () => {
    reporter.onEvent({ type: 'commit-applied', index: 0, total: 2, commitId: A, summary: 'Add a' });
    reporter.onEvent({ type: 'commit-skipped', index: 1, total: 2, commitId: B, summary: 'Add b' });

    expect(stdout()).toEqual(['✓ [1/2] 1111111 Add a', '- [2/2] 2222222 Add b (skipped)']);
  });

  it('tells the user how to finish once picking completes', () => {
    reporter.onEvent({ type: 'picking-completed', tempBranch: 'rebranch-temp-1', applied: 2, skipped: 1 });

    expect(stdout()).toEqual([
      'All commits processed on rebranch-temp-1 (2 applied, 1 skipped)',
      'Review the result, then run rebranch --done to replace the original branch or rebranch --abort to cancel.',
    ]);
  });

  it('reports how much is left when resuming', () => {
    reporter.onEvent({ type: 'picking-resumed', cursor: 2, total: 5, afterConflict: true });

    expect(stdout()).toEqual(['Resuming rebranch (3 of 5 remaining)']);
  });

  it('writes cleanup warnings to stderr', () => {
    reporter.onEvent({ type: 'temp-branch-cleanup-failed', tempBranch: 'rebranch-temp-1', error: 'locked' });

    expect(errorSpy).toHaveBeenCalledWith('Warning: could not delete temporary branch rebranch-temp-1: locked');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('leaves conflicts to the error handler', () => {
    reporter.onEvent({ type: 'conflict-detected', index: 0, commitId: A, summary: 'Add a', conflictedFiles: ['a.txt'] });

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('confirms finish and abort', () => {
    reporter.onEvent({ type: 'rebranch-finished', sourceBranch: 'feature', baseBranch: 'main' });
    reporter.onEvent({
      type: 'rebranch-aborted',
      sourceBranch: 'feature',
      tempBranch: 'rebranch-temp-1',
      tempBranchDeleted: true,
    });

    expect(stdout()).toEqual(['✓ feature now sits on top of main', 'Rebranch aborted, back on feature']);
  });
});
