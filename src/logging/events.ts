/**
 * Typed event definitions for rebranch's structured logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  branch?: string;
  commitId?: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogContext {
  branch?: string;
  commitId?: string;
  data?: Record<string, unknown>;
}

// ── Start ──

export interface RebranchStartedEvent {
  type: 'rebranch-started';
  sourceBranch: string;
  baseBranch: string;
}

export interface CommitsResolvedEvent {
  type: 'commits-resolved';
  sourceBranch: string;
  baseBranch: string;
  commits: Array<{ id: string; summary: string }>;
}

export interface SelectionParsedEvent {
  type: 'selection-parsed';
  applyCount: number;
  skipCount: number;
}

export interface TempBranchCreatedEvent {
  type: 'temp-branch-created';
  tempBranch: string;
  baseBranch: string;
}

// ── Apply loop ──

export interface CommitAppliedEvent {
  type: 'commit-applied';
  index: number;
  total: number;
  commitId: string;
  summary: string;
}

export interface CommitSkippedEvent {
  type: 'commit-skipped';
  index: number;
  total: number;
  commitId: string;
  summary: string;
}

export interface ConflictDetectedEvent {
  type: 'conflict-detected';
  index: number;
  commitId: string;
  summary: string;
  conflictedFiles: string[];
}

export interface PickingResumedEvent {
  type: 'picking-resumed';
  cursor: number;
  total: number;
  afterConflict: boolean;
}

export interface PickingCompletedEvent {
  type: 'picking-completed';
  tempBranch: string;
  applied: number;
  skipped: number;
}

// ── Finish / abort ──

export interface RebranchFinishedEvent {
  type: 'rebranch-finished';
  sourceBranch: string;
  baseBranch: string;
}

export interface RebranchAbortedEvent {
  type: 'rebranch-aborted';
  sourceBranch: string;
  tempBranch: string;
  tempBranchDeleted: boolean;
}

export interface TempBranchCleanupFailedEvent {
  type: 'temp-branch-cleanup-failed';
  tempBranch: string;
  error: string;
}

export type RebranchEvent =
  | RebranchStartedEvent
  | CommitsResolvedEvent
  | SelectionParsedEvent
  | TempBranchCreatedEvent
  | CommitAppliedEvent
  | CommitSkippedEvent
  | ConflictDetectedEvent
  | PickingResumedEvent
  | PickingCompletedEvent
  | RebranchFinishedEvent
  | RebranchAbortedEvent
  | TempBranchCleanupFailedEvent;
