import { join } from 'node:path';
import type { RuntimeConfig } from '../config/loader.js';
import type { RebranchCommand } from '../cli/parse-command.js';
import { ConsoleReporter } from '../cli/console-reporter.js';
import { SystemEditor } from '../editor/editor.js';
import { BackendFailureError, ValidationFailedError } from '../errors.js';
import { SimpleGitBackend } from '../git/simple-git-backend.js';
import { Logger } from '../logging/logger.js';
import { PICK_FILE_NAME } from '../state/record.js';
import { FileRecordStore } from '../state/record-store.js';
import { RebranchOrchestrator, type RebranchOutcome, type RebranchReporter } from './orchestrator.js';

/**
 * Top-level RebranchRuntime: wires config to the git backend, record store,
 * editor and reporter, then runs one command.
 */
export class RebranchRuntime {
  private readonly logger: Logger;

  constructor(
    private readonly config: RuntimeConfig,
    private readonly reporter: RebranchReporter = new ConsoleReporter(),
  ) {
    this.logger = new Logger({
      source: 'rebranch',
      logDir: config.logDir,
      level: config.verbose ? 'debug' : config.logLevel,
      console: config.verbose,
    });
  }

  async execute(command: RebranchCommand): Promise<RebranchOutcome> {
    this.logger.debug(`Running ${command.kind} in ${this.config.repoPath}`);
    try {
      const orchestrator = await this.createOrchestrator(command);
      switch (command.kind) {
        case 'start':
          return await orchestrator.start(command.baseBranch);
        case 'continue':
          return await orchestrator.continue();
        case 'finish':
          return await orchestrator.finish();
        case 'abort':
          return await orchestrator.abort();
      }
    } catch (err) {
      this.logger.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
      throw err;
    } finally {
      await this.logger.flush();
    }
  }

  private async createOrchestrator(command: RebranchCommand): Promise<RebranchOrchestrator> {
    const backend = new SimpleGitBackend(this.config.repoPath, this.logger);

    let gitDir: string;
    try {
      gitDir = await backend.gitDir();
    } catch (err) {
      if (!(err instanceof BackendFailureError)) throw err;
      throw new ValidationFailedError(
        `invalid repository: ${this.config.repoPath} is not inside a git work tree`,
        'repository',
        command.kind,
        ['Run rebranch from inside a git work tree'],
      );
    }

    return new RebranchOrchestrator(
      {
        backend,
        store: new FileRecordStore(gitDir, this.logger),
        editor: new SystemEditor(this.config.editor, this.logger),
        logger: this.logger,
        reporter: this.reporter,
      },
      {
        pickFilePath: join(gitDir, PICK_FILE_NAME),
        tempBranchPrefix: this.config.tempBranchPrefix,
      },
    );
  }
}
