import { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { RebranchRuntime } from '../core/runtime.js';
import { withCommandHandler } from './command-error-handler.js';
import { parseCommand, type CliOptions } from './parse-command.js';

export const VERSION = '1.0.0';

const HELP_TEXT = `
Workflow:
  1. Start: rebranch <base-branch>
     - Lists the commits unique to the current branch
     - Opens your editor to pick or drop each commit
     - Creates a temporary branch from <base-branch> and cherry-picks the selection

  2. Resolve conflicts (if any):
     - Edit the conflicted files
     - Stage and commit them: git add <files> && git cherry-pick --continue
     - Resume: rebranch --continue

  3. Review and finish:
     - Inspect the temporary branch
     - Complete: rebranch --done (replaces the original branch)
     - Or cancel: rebranch --abort (restores the original branch)

Selection file format:
  pick abc1234 First commit     apply this commit
  p    def5678 Second commit    apply (abbreviation)
  drop 0a1b2c3 Third commit     skip this commit
  d    4d5e6f7 Fourth commit    skip (abbreviation)
  Lines are applied top to bottom; reorder them to change the order.

Environment:
  REBRANCH_EDITOR, EDITOR, VISUAL   editor command, first one set wins (default: vi)
  REBRANCH_LOG_LEVEL                debug, info, warn or error (default: info)
  REBRANCH_LOG_DIR                  log file directory (default: ~/.rebranch/logs)

Examples:
  rebranch main                     move the current branch onto main
  rebranch --continue               continue after resolving conflicts
  rebranch --done                   replace the original branch with the result
  rebranch --abort                  cancel and clean up
`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rebranch')
    .description('Interactively move the commits of the current branch onto a new base branch')
    .version(VERSION, '-v, --version', 'Show version information')
    .helpOption('-h, --help', 'Show this help message')
    .argument('[base-branch]', 'Branch to move the current branch onto')
    .option('--continue', 'Continue after resolving conflicts')
    .option('--done', 'Complete the rebranch and replace the original branch')
    .option('--abort', 'Cancel the rebranch and restore the original branch')
    .option('--verbose', 'Echo debug log lines to stderr')
    .addHelpText('after', HELP_TEXT)
    .action(
      withCommandHandler(async (baseBranch: string | undefined, opts: CliOptions) => {
        const command = parseCommand(baseBranch, opts);
        const config = loadConfig({
          env: process.env,
          cwd: process.cwd(),
          overrides: { verbose: opts.verbose },
        });
        await new RebranchRuntime(config).execute(command);
      }),
    );

  return program;
}
