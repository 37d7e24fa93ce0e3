import { z } from 'zod';

/** Record file inside the git dir. Named so foreign-operation detection can tell it apart from git's own. */
export const STATE_FILE_NAME = 'REBRANCH_STATE';
/** Editable selection listing inside the git dir. */
export const PICK_FILE_NAME = 'REBRANCH_PICK';

export const RECORD_VERSION = 1;

export const CommitActionSchema = z.enum(['apply', 'skip']);
export const OperationStageSchema = z.enum(['picking', 'conflicted', 'done']);

export const CommitEntrySchema = z.object({
  id: z.string().regex(/^[0-9a-f]{7,64}$/, 'must be a hex commit id'),
  summary: z.string(),
  action: CommitActionSchema,
});

export const OperationRecordSchema = z
  .object({
    version: z.literal(RECORD_VERSION),
    sourceBranch: z.string().min(1),
    baseBranch: z.string().min(1),
    tempBranch: z.string().min(1),
    commitPlan: z.array(CommitEntrySchema).min(1),
    cursor: z.number().int().min(0),
    stage: OperationStageSchema,
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
  })
  .superRefine((record, ctx) => {
    const total = record.commitPlan.length;
    if (record.cursor > total) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cursor'],
        message: `cursor ${record.cursor} is past the end of a ${total}-entry plan`,
      });
    }
    if (record.stage === 'done' && record.cursor !== total) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stage'],
        message: `stage "done" requires cursor ${total}, found ${record.cursor}`,
      });
    }
    if (record.stage === 'conflicted') {
      const entry = record.commitPlan[record.cursor];
      if (!entry || entry.action !== 'apply') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stage'],
          message: `stage "conflicted" requires cursor to point at an "apply" entry`,
        });
      }
    }
  });

export type CommitAction = z.infer<typeof CommitActionSchema>;
export type OperationStage = z.infer<typeof OperationStageSchema>;

export interface CommitEntry {
  readonly id: string;
  readonly summary: string;
  readonly action: CommitAction;
}

/**
 * The single source of truth for an in-progress rebranch.
 * Branch names and the plan never change after `start`; only cursor, stage and updatedAt move.
 */
export interface OperationRecord {
  readonly version: typeof RECORD_VERSION;
  readonly sourceBranch: string;
  readonly baseBranch: string;
  readonly tempBranch: string;
  readonly commitPlan: readonly CommitEntry[];
  readonly cursor: number;
  readonly stage: OperationStage;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function countByAction(plan: readonly CommitEntry[], action: CommitAction): number {
  return plan.filter((entry) => entry.action === action).length;
}

export function shortId(id: string): string {
  return id.slice(0, 7);
}
