import { simpleGit, type SimpleGit } from 'simple-git';
import { isAbsolute, join, resolve } from 'node:path';
import { Logger } from '../logging/logger.js';
import { BackendFailureError } from '../errors.js';
import { exists } from '../util/fs.js';
import { STATE_FILE_NAME } from '../state/record.js';
import { BranchManager } from './branch.js';
import type {
  CherryPickOutcome,
  CommitNode,
  ForeignOperation,
  ForeignOperationKind,
  GitBackend,
  RepositoryCheck,
} from './backend.js';

/** Markers inside the git dir, checked in order. */
const FOREIGN_OPERATION_MARKERS: ReadonlyArray<[string, ForeignOperationKind]> = [
  ['rebase-merge', 'rebase'],
  ['rebase-apply', 'rebase'],
  ['REBASE_HEAD', 'rebase'],
  ['MERGE_HEAD', 'merge'],
  ['CHERRY_PICK_HEAD', 'cherry-pick'],
  ['REVERT_HEAD', 'revert'],
  [STATE_FILE_NAME, 'rebranch'],
];

const FIELD_SEPARATOR = '\x00';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message.trim() : String(err);
}

/**
 * GitBackend over the `git` executable via simple-git.
 */
export class SimpleGitBackend implements GitBackend {
  private readonly git: SimpleGit;
  private readonly branches: BranchManager;
  private cachedGitDir: string | null = null;

  constructor(
    private readonly repoPath: string,
    private readonly logger: Logger,
    git?: SimpleGit,
  ) {
    this.git = git ?? simpleGit(repoPath);
    this.branches = new BranchManager(this.git, logger);
  }

  /**
   * Run a git operation, surfacing any failure as a BackendFailureError that carries git's own message.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof BackendFailureError) throw err;
      throw new BackendFailureError(`git ${operation} failed: ${errorMessage(err)}`, operation, err);
    }
  }

  async gitDir(): Promise<string> {
    if (this.cachedGitDir) return this.cachedGitDir;
    const raw = (await this.run('rev-parse --absolute-git-dir', () => this.git.revparse(['--absolute-git-dir']))).trim();
    this.cachedGitDir = isAbsolute(raw) ? raw : resolve(this.repoPath, raw);
    return this.cachedGitDir;
  }

  async isValidRepository(): Promise<RepositoryCheck> {
    try {
      if (!(await this.git.checkIsRepo())) {
        return { ok: false, reason: `${this.repoPath} is not inside a git work tree` };
      }
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }

    const head = await this.resolveCommit('HEAD');
    if (!head) {
      return { ok: false, reason: 'HEAD does not point at a commit (is this an empty repository?)' };
    }
    return { ok: true };
  }

  async currentBranch(): Promise<string | null> {
    return this.run('status', () => this.branches.current());
  }

  async branchExists(name: string): Promise<boolean> {
    return this.run('branch --list', () => this.branches.existsLocal(name));
  }

  async resolveCommit(ref: string): Promise<string | null> {
    try {
      const sha = await this.git.revparse(['--verify', '--quiet', `${ref}^{commit}`]);
      return sha.trim() || null;
    } catch {
      return null;
    }
  }

  async readCommit(id: string): Promise<CommitNode> {
    const output = await this.run(`show ${id}`, () =>
      this.git.raw(['show', '-s', '--format=%H%x00%P%x00%s', id]),
    );
    const [sha = '', parents = '', summary = ''] = output.replace(/\n$/, '').split(FIELD_SEPARATOR);
    return {
      id: sha.trim(),
      summary: summary.trim(),
      parents: parents.split(' ').filter(Boolean),
    };
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    if (ancestor === descendant) return true;
    // merge-base exits 1 with no output when the histories are unrelated.
    const output = await this.run('merge-base', () => this.git.raw(['merge-base', '--all', ancestor, descendant]));
    return output.split('\n').map((line) => line.trim()).includes(ancestor);
  }

  async createBranch(name: string, startPoint: string): Promise<void> {
    await this.run(`branch ${name}`, () => this.branches.create(name, startPoint));
  }

  async checkout(name: string): Promise<void> {
    await this.run(`checkout ${name}`, () => this.branches.checkout(name));
  }

  async cherryPick(id: string): Promise<CherryPickOutcome> {
    try {
      await this.git.raw(['cherry-pick', id]);
    } catch (err) {
      // A stopped cherry-pick leaves CHERRY_PICK_HEAD behind for the user to resolve.
      if (await exists(join(await this.gitDir(), 'CHERRY_PICK_HEAD'))) {
        const conflictedFiles = await this.conflictedFiles();
        this.logger.debug(`Cherry-pick of ${id} stopped with ${conflictedFiles.length} conflicted file(s)`, {
          commitId: id,
          data: { conflictedFiles },
        });
        return { status: 'conflict', conflictedFiles };
      }
      throw new BackendFailureError(`git cherry-pick ${id} failed: ${errorMessage(err)}`, 'cherry-pick', err);
    }

    const head = (await this.run('rev-parse HEAD', () => this.git.revparse(['HEAD']))).trim();
    this.logger.debug(`Cherry-picked ${id} as ${head}`, { commitId: id });
    return { status: 'applied', id: head };
  }

  async abortCherryPick(): Promise<void> {
    await this.run('cherry-pick --abort', () => this.git.raw(['cherry-pick', '--abort']));
  }

  async deleteBranch(name: string): Promise<void> {
    await this.run(`branch -D ${name}`, () => this.branches.delete(name));
  }

  async renameBranch(from: string, to: string): Promise<void> {
    await this.run(`branch -m ${from} ${to}`, () => this.branches.rename(from, to));
  }

  async isWorkingTreeClean(): Promise<boolean> {
    const status = await this.run('status', () => this.git.status());
    return status.isClean();
  }

  async detectForeignOperation(): Promise<ForeignOperation | null> {
    const gitDir = await this.gitDir();
    for (const [marker, kind] of FOREIGN_OPERATION_MARKERS) {
      if (await exists(join(gitDir, marker))) {
        return { kind, marker };
      }
    }
    return null;
  }

  private async conflictedFiles(): Promise<string[]> {
    const output = await this.run('diff --diff-filter=U', () =>
      this.git.raw(['diff', '--name-only', '--diff-filter=U']),
    );
    return output.trim().split('\n').filter(Boolean);
  }
}
