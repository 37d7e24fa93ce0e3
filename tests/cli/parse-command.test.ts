import { describe, it, expect } from 'vitest';
import { parseCommand } from '../../src/cli/parse-command.js';
import { UsageError } from '../../src/errors.js';

describe('parseCommand', () => {
  it('maps a base branch to start', () => {
    expect(parseCommand('main', {})).toEqual({ kind: 'start', baseBranch: 'main' });
  });

  it('maps each flag to its transition', () => {
    expect(parseCommand(undefined, { continue: true })).toEqual({ kind: 'continue' });
    expect(parseCommand(undefined, { done: true })).toEqual({ kind: 'finish' });
    expect(parseCommand(undefined, { abort: true })).toEqual({ kind: 'abort' });
  });

  it('ignores --verbose when choosing the mode', () => {
    expect(parseCommand(undefined, { abort: true, verbose: true })).toEqual({ kind: 'abort' });
  });

  it('requires a mode', () => {
    expect(() => parseCommand(undefined, {})).toThrow(UsageError);
    expect(() => parseCommand('  ', {})).toThrow(
      'Missing base branch. Usage: rebranch <base-branch> | --continue | --done | --abort',
    );
  });

  it('rejects more than one mode', () => {
    expect(() => parseCommand('main', { continue: true })).toThrow(
      'Use only one of <base-branch>, --continue, --done or --abort',
    );
    expect(() => parseCommand(undefined, { done: true, abort: true })).toThrow(UsageError);
  });
});
