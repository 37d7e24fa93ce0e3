import { EditorLaunchError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import { runInteractive, splitCommand } from '../util/process.js';

/**
 * Opens a file for the user to edit and resolves once they are done.
 */
export interface Editor {
  launch(path: string): Promise<void>;
}

/**
 * Runs the configured editor command attached to the terminal.
 * Blocks until the editor exits; there is no timeout.
 */
export class SystemEditor implements Editor {
  constructor(
    private readonly command: string,
    private readonly logger: Logger,
  ) {}

  async launch(path: string): Promise<void> {
    const { command, args } = splitCommand(this.command);
    if (!command) {
      throw new EditorLaunchError('No editor configured', this.command, null);
    }

    this.logger.debug(`Launching editor: ${this.command} ${path}`);
    const result = await runInteractive(command, [...args, path]);

    if (result.spawnError !== undefined) {
      throw new EditorLaunchError(
        `Failed to launch editor '${this.command}': ${result.spawnError}`,
        this.command,
        null,
      );
    }
    if (result.exitCode !== 0) {
      const detail = result.signal ? `signal ${result.signal}` : `code ${result.exitCode}`;
      throw new EditorLaunchError(`Editor '${this.command}' exited with ${detail}`, this.command, result.exitCode);
    }
  }
}
