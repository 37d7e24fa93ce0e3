import chalk from 'chalk';
import {
  ConflictDetectedError,
  EditorLaunchError,
  EmptySelectionError,
  InvalidActionError,
  UnknownCommitError,
  UsageError,
  ValidationFailedError,
} from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';
import { shortId } from '../state/record.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ValidationFailedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    if (err.remediation.length > 0) {
      console.error(chalk.yellow('To fix:'));
      for (const step of err.remediation) {
        console.error(chalk.yellow(`  ${step}`));
      }
    }
  } else if (err instanceof ConflictDetectedError) {
    console.error(chalk.red(`Conflict while applying ${shortId(err.commitId)} ${err.summary}`));
    if (err.conflictedFiles.length > 0) {
      console.error('Conflicted files:');
      for (const file of err.conflictedFiles) {
        console.error(`  ${file}`);
      }
    }
    console.error(chalk.yellow('Resolve the conflicts, then:'));
    console.error(chalk.yellow('  git add <resolved files>'));
    console.error(chalk.yellow('  git cherry-pick --continue   (or git commit)'));
    console.error(chalk.yellow('  rebranch --continue'));
    console.error(chalk.yellow('Or cancel with: rebranch --abort'));
  } else if (
    err instanceof InvalidActionError ||
    err instanceof UnknownCommitError ||
    err instanceof EmptySelectionError ||
    err instanceof EditorLaunchError
  ) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow('Rebranch was not started; no branches were changed.'));
  } else if (err instanceof UsageError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow("Run 'rebranch --help' for usage."));
  } else if (err instanceof ConfigLoadError) {
    console.error(chalk.red(`Error: ${err.message}`));
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
  }
  process.exit(1);
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
