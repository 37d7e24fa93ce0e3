import { getUnixTime } from 'date-fns';
import type { Editor } from '../editor/editor.js';
import {
  ConflictDetectedError,
  NothingToRebranchError,
  ValidationFailedError,
} from '../errors.js';
import type { GitBackend } from '../git/backend.js';
import { CommitRangeResolver } from '../git/commit-range.js';
import type { LogLevel, RebranchEvent } from '../logging/events.js';
import type { Logger } from '../logging/logger.js';
import { parseSelection, renderSelection } from '../selection/codec.js';
import {
  RECORD_VERSION,
  countByAction,
  shortId,
  type CommitEntry,
  type OperationRecord,
} from '../state/record.js';
import type { RecordStore } from '../state/record-store.js';
import { readTextFile, removeFile, writeTextFile } from '../util/fs.js';
import { PreflightValidator } from '../validation/preflight.js';
import { SystemClock, type Clock } from './clock.js';

/**
 * Receives the same progress events the logger records.
 */
export interface RebranchReporter {
  onEvent(event: RebranchEvent): void;
}

export type RebranchOutcome =
  | { kind: 'picked'; record: OperationRecord; applied: number; skipped: number }
  | { kind: 'finished'; sourceBranch: string; baseBranch: string }
  | { kind: 'aborted'; sourceBranch: string; tempBranch: string; tempBranchDeleted: boolean };

export interface RebranchDeps {
  backend: GitBackend;
  store: RecordStore;
  editor: Editor;
  logger: Logger;
  reporter?: RebranchReporter;
  clock?: Clock;
}

export interface RebranchOptions {
  /** Where the editable selection listing is written. */
  pickFilePath: string;
  tempBranchPrefix: string;
}

type RecordPatch = Partial<Pick<OperationRecord, 'cursor' | 'stage'>>;

/**
 * Drives one rebranch transition per call: start, continue, finish or abort.
 *
 * The persisted record is the only state carried between calls. It is saved
 * after every processed entry, so an interrupted run resumes at the first
 * entry that was not yet recorded as done.
 */
export class RebranchOrchestrator {
  private readonly backend: GitBackend;
  private readonly store: RecordStore;
  private readonly editor: Editor;
  private readonly logger: Logger;
  private readonly reporter: RebranchReporter | undefined;
  private readonly clock: Clock;
  private readonly validator: PreflightValidator;
  private readonly resolver: CommitRangeResolver;

  constructor(
    deps: RebranchDeps,
    private readonly options: RebranchOptions,
  ) {
    this.backend = deps.backend;
    this.store = deps.store;
    this.editor = deps.editor;
    this.logger = deps.logger;
    this.reporter = deps.reporter;
    this.clock = deps.clock ?? new SystemClock();
    this.validator = new PreflightValidator(this.backend, this.store);
    this.resolver = new CommitRangeResolver(this.backend);
  }

  async start(baseBranch: string): Promise<RebranchOutcome> {
    await this.validator.assertStart(baseBranch);

    const sourceBranch = await this.backend.currentBranch();
    if (sourceBranch === null) {
      throw new ValidationFailedError('HEAD is detached; rebranch needs a branch to rewrite', 'on-branch', 'start');
    }
    this.emit({ type: 'rebranch-started', sourceBranch, baseBranch });

    const commits = await this.resolver.resolve(baseBranch, sourceBranch);
    if (commits.length === 0) {
      throw new NothingToRebranchError(
        `No commits to rebranch: '${sourceBranch}' has no commits that are not already in '${baseBranch}'`,
        baseBranch,
        sourceBranch,
      );
    }
    this.emit({ type: 'commits-resolved', sourceBranch, baseBranch, commits });

    const commitPlan = await this.selectCommits(commits);
    this.emit({
      type: 'selection-parsed',
      applyCount: countByAction(commitPlan, 'apply'),
      skipCount: countByAction(commitPlan, 'skip'),
    });

    const tempBranch = await this.allocateTempBranch();
    await this.backend.createBranch(tempBranch, baseBranch);
    try {
      await this.backend.checkout(tempBranch);
    } catch (err) {
      await this.discardTempBranch(tempBranch);
      throw err;
    }
    this.emit({ type: 'temp-branch-created', tempBranch, baseBranch });

    const now = this.clock.now().toISOString();
    const record: OperationRecord = {
      version: RECORD_VERSION,
      sourceBranch,
      baseBranch,
      tempBranch,
      commitPlan,
      cursor: 0,
      stage: 'picking',
      createdAt: now,
      updatedAt: now,
    };
    try {
      await this.store.save(record);
    } catch (err) {
      // No record exists yet, so nothing else could restore the source branch.
      await this.backend.checkout(sourceBranch);
      await this.discardTempBranch(tempBranch);
      throw err;
    }

    return this.applyFrom(record);
  }

  async continue(): Promise<RebranchOutcome> {
    const record = await this.validator.assertContinue();

    // After a conflict the user's own commit stands in for the entry at cursor.
    // A run interrupted while picking never finished its cursor entry, so it is retried.
    const afterConflict = record.stage === 'conflicted';
    const cursor = afterConflict ? record.cursor + 1 : record.cursor;
    const resumed = await this.persist(record, { cursor, stage: 'picking' });
    this.emit({ type: 'picking-resumed', cursor, total: record.commitPlan.length, afterConflict });

    return this.applyFrom(resumed);
  }

  async finish(): Promise<RebranchOutcome> {
    const record = await this.validator.assertFinish();
    const { sourceBranch, baseBranch, tempBranch } = record;

    // Skipped when an earlier --done got as far as deleting it.
    if (await this.backend.branchExists(sourceBranch)) {
      await this.backend.deleteBranch(sourceBranch);
    }
    await this.backend.renameBranch(tempBranch, sourceBranch);
    await this.store.clear();

    this.emit({ type: 'rebranch-finished', sourceBranch, baseBranch });
    return { kind: 'finished', sourceBranch, baseBranch };
  }

  async abort(): Promise<RebranchOutcome> {
    const record = await this.validator.assertAbort();
    const { sourceBranch, tempBranch } = record;

    const foreign = await this.backend.detectForeignOperation();
    if (foreign?.kind === 'cherry-pick') {
      await this.backend.abortCherryPick();
    }
    await this.backend.checkout(sourceBranch);
    const tempBranchDeleted = await this.discardTempBranch(tempBranch);
    await this.store.clear();

    this.emit({ type: 'rebranch-aborted', sourceBranch, tempBranch, tempBranchDeleted });
    return { kind: 'aborted', sourceBranch, tempBranch, tempBranchDeleted };
  }

  private async applyFrom(record: OperationRecord): Promise<RebranchOutcome> {
    const plan = record.commitPlan;
    const total = plan.length;
    let current = record;

    for (let index = record.cursor; index < total; index++) {
      const entry = plan[index];
      if (!entry) break;

      if (entry.action === 'skip') {
        current = await this.persist(current, { cursor: index + 1 });
        this.emit({ type: 'commit-skipped', index, total, commitId: entry.id, summary: entry.summary });
        continue;
      }

      const outcome = await this.backend.cherryPick(entry.id);
      if (outcome.status === 'conflict') {
        current = await this.persist(current, { cursor: index, stage: 'conflicted' });
        this.emit(
          {
            type: 'conflict-detected',
            index,
            commitId: entry.id,
            summary: entry.summary,
            conflictedFiles: outcome.conflictedFiles,
          },
          'warn',
        );
        throw new ConflictDetectedError(
          `Conflict while applying ${shortId(entry.id)} ${entry.summary}`,
          entry.id,
          entry.summary,
          outcome.conflictedFiles,
          index,
        );
      }

      current = await this.persist(current, { cursor: index + 1 });
      this.emit({ type: 'commit-applied', index, total, commitId: entry.id, summary: entry.summary });
    }

    current = await this.persist(current, { cursor: total, stage: 'done' });
    const applied = countByAction(plan, 'apply');
    const skipped = countByAction(plan, 'skip');
    this.emit({ type: 'picking-completed', tempBranch: current.tempBranch, applied, skipped });

    return { kind: 'picked', record: current, applied, skipped };
  }

  private async selectCommits(commits: ReadonlyArray<{ id: string; summary: string }>): Promise<CommitEntry[]> {
    const path = this.options.pickFilePath;
    await writeTextFile(path, renderSelection(commits));
    await this.editor.launch(path);
    const plan = parseSelection(await readTextFile(path), commits);
    await removeFile(path);
    return plan;
  }

  private async allocateTempBranch(): Promise<string> {
    const base = `${this.options.tempBranchPrefix}${getUnixTime(this.clock.now())}`;
    let name = base;
    for (let n = 2; await this.backend.branchExists(name); n++) {
      name = `${base}-${n}`;
    }
    return name;
  }

  /** Deletes the temp branch, reporting a failure as a warning. Returns whether it is gone. */
  private async discardTempBranch(tempBranch: string): Promise<boolean> {
    try {
      await this.backend.deleteBranch(tempBranch);
      return true;
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.emit({ type: 'temp-branch-cleanup-failed', tempBranch, error }, 'warn');
      return false;
    }
  }

  private async persist(record: OperationRecord, patch: RecordPatch): Promise<OperationRecord> {
    const next: OperationRecord = { ...record, ...patch, updatedAt: this.clock.now().toISOString() };
    await this.store.save(next);
    return next;
  }

  private emit(event: RebranchEvent, level: LogLevel = 'info'): void {
    this.logger.event(event, level);
    this.reporter?.onEvent(event);
  }
}
