import { UsageError } from '../errors.js';

export type RebranchCommand =
  | { kind: 'start'; baseBranch: string }
  | { kind: 'continue' }
  | { kind: 'finish' }
  | { kind: 'abort' };

export interface CliOptions {
  continue?: boolean;
  done?: boolean;
  abort?: boolean;
  verbose?: boolean;
}

/**
 * Map the parsed command line to exactly one transition.
 */
export function parseCommand(baseBranch: string | undefined, opts: CliOptions): RebranchCommand {
  const modes: RebranchCommand[] = [];
  if (baseBranch !== undefined && baseBranch.trim() !== '') {
    modes.push({ kind: 'start', baseBranch: baseBranch.trim() });
  }
  if (opts.continue) modes.push({ kind: 'continue' });
  if (opts.done) modes.push({ kind: 'finish' });
  if (opts.abort) modes.push({ kind: 'abort' });

  const [command, ...rest] = modes;
  if (!command) {
    throw new UsageError('Missing base branch. Usage: rebranch <base-branch> | --continue | --done | --abort');
  }
  if (rest.length > 0) {
    throw new UsageError('Use only one of <base-branch>, --continue, --done or --abort');
  }
  return command;
}
