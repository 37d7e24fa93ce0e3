import { ValidationFailedError } from '../errors.js';
import type { GitBackend } from '../git/backend.js';
import type { OperationRecord } from '../state/record.js';
import type { RecordStore } from '../state/record-store.js';
import {
  activeOperationCheck,
  baseBranchExistsCheck,
  cleanWorkingTreeCheck,
  distinctBranchesCheck,
  finishableStageCheck,
  noActiveOperationCheck,
  noForeignOperationCheck,
  onBranchCheck,
  onTempBranchCheck,
  repositoryCheck,
  resumableStageCheck,
} from './checks.js';
import type { PreflightCheck, PreflightInput, PreflightTransition, ValidationResult } from './types.js';

export interface PreflightResult {
  transition: PreflightTransition;
  passed: boolean;
  results: ValidationResult[];
}

/** Checks run per transition, in order; a run stops at the first failure. */
const CHECKS: Record<PreflightTransition, PreflightCheck[]> = {
  start: [
    repositoryCheck,
    noActiveOperationCheck,
    noForeignOperationCheck,
    cleanWorkingTreeCheck,
    baseBranchExistsCheck,
    onBranchCheck,
    distinctBranchesCheck,
  ],
  continue: [repositoryCheck, activeOperationCheck, resumableStageCheck, cleanWorkingTreeCheck],
  finish: [repositoryCheck, activeOperationCheck, finishableStageCheck, onTempBranchCheck, cleanWorkingTreeCheck],
  abort: [activeOperationCheck],
};

/**
 * Guards every rebranch transition against the repository and the persisted record.
 */
export class PreflightValidator {
  constructor(
    private readonly backend: GitBackend,
    private readonly store: RecordStore,
  ) {}

  async run(transition: PreflightTransition, baseBranch?: string): Promise<PreflightResult> {
    const { result } = await this.execute(transition, baseBranch);
    return result;
  }

  async assertStart(baseBranch: string): Promise<void> {
    await this.assert('start', baseBranch);
  }

  /** Returns the record the checks were run against. */
  async assertContinue(): Promise<OperationRecord> {
    return (await this.assert('continue')).record();
  }

  async assertFinish(): Promise<OperationRecord> {
    return (await this.assert('finish')).record();
  }

  async assertAbort(): Promise<OperationRecord> {
    return (await this.assert('abort')).record();
  }

  formatResults(result: PreflightResult): string {
    const lines: string[] = [];
    for (const check of result.results) {
      lines.push(`${check.passed ? '✅' : '❌'} ${check.name}`);
      for (const err of check.errors) {
        lines.push(`   Error: ${err}`);
      }
      for (const step of check.remediation) {
        lines.push(`   Fix: ${step}`);
      }
    }
    lines.push(result.passed ? 'PASS' : 'FAIL');
    return lines.join('\n');
  }

  private async assert(transition: PreflightTransition, baseBranch?: string): Promise<PreflightInput> {
    const { result, input } = await this.execute(transition, baseBranch);
    const failed = result.results.find((r) => !r.passed);
    if (failed) {
      throw new ValidationFailedError(
        failed.errors.join('; ') || `${failed.name} check failed`,
        failed.name,
        transition,
        failed.remediation,
      );
    }
    return input;
  }

  private async execute(
    transition: PreflightTransition,
    baseBranch?: string,
  ): Promise<{ result: PreflightResult; input: PreflightInput }> {
    let loaded: Promise<OperationRecord> | null = null;
    const input: PreflightInput = {
      backend: this.backend,
      store: this.store,
      transition,
      baseBranch,
      record: () => {
        loaded ??= this.store.load();
        return loaded;
      },
    };

    const results: ValidationResult[] = [];
    for (const check of CHECKS[transition]) {
      const result = await check.validate(input);
      results.push(result);
      if (!result.passed) {
        return { result: { transition, passed: false, results }, input };
      }
    }
    return { result: { transition, passed: true, results }, input };
  }
}
