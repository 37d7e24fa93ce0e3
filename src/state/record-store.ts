import { join } from 'node:path';
import { atomicWriteJSON, readJSON, exists, removeFile } from '../util/fs.js';
import { Logger } from '../logging/logger.js';
import { StateRecordError } from '../errors.js';
import { OperationRecordSchema, STATE_FILE_NAME, type OperationRecord } from './record.js';

/**
 * Durable storage for the one in-progress operation of a repository.
 * The record's presence is the "operation in progress" signal.
 */
export interface RecordStore {
  exists(): Promise<boolean>;
  load(): Promise<OperationRecord>;
  save(record: OperationRecord): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Stores the record as JSON in the repository's git dir.
 * Every save is an atomic temp-file + rename, so a crash leaves either the old or the new record.
 */
export class FileRecordStore implements RecordStore {
  readonly path: string;

  constructor(
    gitDir: string,
    private readonly logger: Logger,
  ) {
    this.path = join(gitDir, STATE_FILE_NAME);
  }

  async exists(): Promise<boolean> {
    return exists(this.path);
  }

  async load(): Promise<OperationRecord> {
    let raw: unknown;
    try {
      raw = await readJSON(this.path);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new StateRecordError(`Failed to read rebranch state at ${this.path}: ${detail}`, this.path);
    }

    const result = OperationRecordSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new StateRecordError(
        `Rebranch state at ${this.path} is inconsistent:\n${issues}\nRemove the file by hand to discard the operation.`,
        this.path,
      );
    }

    return result.data;
  }

  async save(record: OperationRecord): Promise<void> {
    await atomicWriteJSON(this.path, record);
    this.logger.debug(`Saved state: stage=${record.stage} cursor=${record.cursor}/${record.commitPlan.length}`, {
      branch: record.tempBranch,
    });
  }

  async clear(): Promise<void> {
    await removeFile(this.path);
    this.logger.debug(`Cleared state at ${this.path}`);
  }
}
