import type { GitBackend } from '../git/backend.js';
import type { OperationRecord } from '../state/record.js';
import type { RecordStore } from '../state/record-store.js';

export type PreflightTransition = 'start' | 'continue' | 'finish' | 'abort';

export type PreflightCheckName =
  | 'repository'
  | 'no-active-operation'
  | 'no-foreign-operation'
  | 'clean-working-tree'
  | 'base-branch-exists'
  | 'on-branch'
  | 'distinct-branches'
  | 'active-operation'
  | 'resumable-stage'
  | 'finishable-stage'
  | 'on-temp-branch';

export interface ValidationResult {
  name: PreflightCheckName;
  passed: boolean;
  errors: string[];
  /** Commands or steps that fix the failure, one per line. */
  remediation: string[];
}

export interface PreflightInput {
  backend: GitBackend;
  store: RecordStore;
  transition: PreflightTransition;
  baseBranch?: string;
  /** Loads the operation record once per run. */
  record(): Promise<OperationRecord>;
}

export interface PreflightCheck {
  name: PreflightCheckName;
  validate(input: PreflightInput): Promise<ValidationResult>;
}
