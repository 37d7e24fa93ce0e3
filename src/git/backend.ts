/**
 * Version-control capabilities the rebranch engine consumes.
 *
 * The orchestrator and validator only ever talk to this interface, so they can
 * be driven by an in-memory fake in tests.
 */

export interface CommitNode {
  /** Full commit id. */
  id: string;
  /** First line of the commit message. */
  summary: string;
  /** Parent commit ids, first parent first. */
  parents: string[];
}

export type CherryPickOutcome =
  | { status: 'applied'; id: string }
  | { status: 'conflict'; conflictedFiles: string[] };

export type ForeignOperationKind = 'merge' | 'rebase' | 'cherry-pick' | 'revert' | 'rebranch';

export interface ForeignOperation {
  kind: ForeignOperationKind;
  /** Marker file or directory that revealed the operation. */
  marker: string;
}

export type RepositoryCheck = { ok: true } | { ok: false; reason: string };

export interface GitBackend {
  /** Absolute path of the repository's private metadata directory. */
  gitDir(): Promise<string>;
  isValidRepository(): Promise<RepositoryCheck>;

  /** Current branch name, or null on a detached HEAD. */
  currentBranch(): Promise<string | null>;
  branchExists(name: string): Promise<boolean>;

  /** Resolve a ref to a full commit id, or null if it does not name a commit. */
  resolveCommit(ref: string): Promise<string | null>;
  readCommit(id: string): Promise<CommitNode>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;

  createBranch(name: string, startPoint: string): Promise<void>;
  checkout(name: string): Promise<void>;
  /** Replay one commit onto HEAD. Failures other than a conflict throw BackendFailureError. */
  cherryPick(id: string): Promise<CherryPickOutcome>;
  abortCherryPick(): Promise<void>;
  deleteBranch(name: string): Promise<void>;
  renameBranch(from: string, to: string): Promise<void>;

  isWorkingTreeClean(): Promise<boolean>;
  detectForeignOperation(): Promise<ForeignOperation | null>;
}
