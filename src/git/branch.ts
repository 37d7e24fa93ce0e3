import type { SimpleGit } from 'simple-git';
import { Logger } from '../logging/logger.js';

/**
 * Manages git branch operations. Failures propagate; callers decide what is best-effort.
 */
export class BranchManager {
  constructor(
    private readonly git: SimpleGit,
    private readonly logger: Logger,
  ) {}

  /**
   * Create a branch at a start point without switching to it.
   */
  async create(branchName: string, startPoint: string): Promise<void> {
    await this.git.branch([branchName, startPoint]);
    this.logger.debug(`Created branch ${branchName} from ${startPoint}`, { branch: branchName });
  }

  /**
   * Force-delete a local branch.
   */
  async delete(branchName: string): Promise<void> {
    await this.git.branch(['-D', branchName]);
    this.logger.debug(`Deleted branch ${branchName}`, { branch: branchName });
  }

  async rename(from: string, to: string): Promise<void> {
    await this.git.branch(['-m', from, to]);
    this.logger.debug(`Renamed branch ${from} to ${to}`, { branch: to });
  }

  async checkout(branchName: string): Promise<void> {
    await this.git.checkout(branchName);
    this.logger.debug(`Checked out ${branchName}`, { branch: branchName });
  }

  /**
   * Check if a branch exists locally.
   */
  async existsLocal(branchName: string): Promise<boolean> {
    const branches = await this.git.branchLocal();
    return branches.all.includes(branchName);
  }

  /**
   * Name of the checked-out branch, or null when HEAD is detached.
   */
  async current(): Promise<string | null> {
    const status = await this.git.status();
    if (status.detached) return null;
    return status.current;
  }
}
