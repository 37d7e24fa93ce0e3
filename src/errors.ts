import type { PreflightCheckName, PreflightTransition } from './validation/types.js';

export class ValidationFailedError extends Error {
  check: PreflightCheckName;
  transition: PreflightTransition;
  remediation: string[];

  constructor(
    message: string,
    check: PreflightCheckName,
    transition: PreflightTransition,
    remediation: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationFailedError';
    this.check = check;
    this.transition = transition;
    this.remediation = remediation;
  }
}

export class ReferenceNotFoundError extends Error {
  ref: string;

  constructor(message: string, ref: string) {
    super(message);
    this.name = 'ReferenceNotFoundError';
    this.ref = ref;
  }
}

export class NothingToRebranchError extends Error {
  baseBranch: string;
  sourceBranch: string;

  constructor(message: string, baseBranch: string, sourceBranch: string) {
    super(message);
    this.name = 'NothingToRebranchError';
    this.baseBranch = baseBranch;
    this.sourceBranch = sourceBranch;
  }
}

export class ConflictDetectedError extends Error {
  commitId: string;
  summary: string;
  conflictedFiles: string[];
  cursor: number;

  constructor(message: string, commitId: string, summary: string, conflictedFiles: string[], cursor: number) {
    super(message);
    this.name = 'ConflictDetectedError';
    this.commitId = commitId;
    this.summary = summary;
    this.conflictedFiles = conflictedFiles;
    this.cursor = cursor;
  }
}

export class InvalidActionError extends Error {
  line: number;
  token: string;

  constructor(message: string, line: number, token: string) {
    super(message);
    this.name = 'InvalidActionError';
    this.line = line;
    this.token = token;
  }
}

export class UnknownCommitError extends Error {
  line: number;
  shortId: string;

  constructor(message: string, line: number, shortId: string) {
    super(message);
    this.name = 'UnknownCommitError';
    this.line = line;
    this.shortId = shortId;
  }
}

export class EmptySelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptySelectionError';
  }
}

export class BackendFailureError extends Error {
  operation: string;

  constructor(message: string, operation: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'BackendFailureError';
    this.operation = operation;
  }
}

export class EditorLaunchError extends Error {
  command: string;
  exitCode: number | null;

  constructor(message: string, command: string, exitCode: number | null) {
    super(message);
    this.name = 'EditorLaunchError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class StateRecordError extends Error {
  path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'StateRecordError';
    this.path = path;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
