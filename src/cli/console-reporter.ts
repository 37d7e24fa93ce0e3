import chalk from 'chalk';
import type { RebranchReporter } from '../core/orchestrator.js';
import type { RebranchEvent } from '../logging/events.js';
import { shortId } from '../state/record.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Renders progress for a person at a terminal. Warnings go to stderr.
 */
export class ConsoleReporter implements RebranchReporter {
  onEvent(event: RebranchEvent): void {
    switch (event.type) {
      case 'rebranch-started':
        console.log(`Rebranching ${chalk.cyan(event.sourceBranch)} onto ${chalk.cyan(event.baseBranch)}`);
        break;
      case 'commits-resolved':
        console.log(`Found ${plural(event.commits.length, 'commit')} to rebranch:`);
        for (const commit of event.commits) {
          console.log(`  ${chalk.yellow(shortId(commit.id))} ${commit.summary}`);
        }
        break;
      case 'selection-parsed':
        console.log(`Selected ${plural(event.applyCount, 'commit')} to apply, ${event.skipCount} skipped`);
        break;
      case 'temp-branch-created':
        console.log(chalk.dim(`Created temporary branch ${event.tempBranch} from ${event.baseBranch}`));
        break;
      case 'commit-applied':
        console.log(
          `${chalk.green('✓')} [${event.index + 1}/${event.total}] ${chalk.yellow(shortId(event.commitId))} ${event.summary}`,
        );
        break;
      case 'commit-skipped':
        console.log(
          chalk.dim(`- [${event.index + 1}/${event.total}] ${shortId(event.commitId)} ${event.summary} (skipped)`),
        );
        break;
      case 'picking-resumed':
        console.log(`Resuming rebranch (${event.total - event.cursor} of ${event.total} remaining)`);
        break;
      case 'picking-completed':
        console.log(
          chalk.green(
            `All commits processed on ${event.tempBranch} (${event.applied} applied, ${event.skipped} skipped)`,
          ),
        );
        console.log(
          `Review the result, then run ${chalk.bold('rebranch --done')} to replace the original branch ` +
            `or ${chalk.bold('rebranch --abort')} to cancel.`,
        );
        break;
      case 'rebranch-finished':
        console.log(chalk.green(`✓ ${event.sourceBranch} now sits on top of ${event.baseBranch}`));
        break;
      case 'rebranch-aborted':
        console.log(`Rebranch aborted, back on ${chalk.cyan(event.sourceBranch)}`);
        break;
      case 'temp-branch-cleanup-failed':
        console.error(
          chalk.yellow(`Warning: could not delete temporary branch ${event.tempBranch}: ${event.error}`),
        );
        break;
      case 'conflict-detected':
        // Rendered by the command error handler together with the resolution steps.
        break;
    }
  }
}
