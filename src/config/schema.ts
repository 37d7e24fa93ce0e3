import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const RebranchConfigSchema = z.object({
  /** Working directory the repository is discovered from. */
  repoPath: z.string().min(1),

  /**
   * Editor command used for the commit selection listing.
   * May carry arguments, e.g. "code --wait".
   */
  editor: z.string().trim().min(1).default('vi'),

  /** Minimum level written to the log file. */
  logLevel: LogLevelSchema.default('info'),

  /** Directory for JSON-lines log files. Defaults to ~/.rebranch/logs. */
  logDir: z.string().optional(),

  /** Echo log lines to the console (stderr). */
  verbose: z.boolean().default(false),

  /** Prefix for the scratch branch; a unix timestamp is appended. */
  tempBranchPrefix: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._/-]*$/, 'must be a valid branch name prefix')
    .default('rebranch-temp-'),
});

export type RebranchConfig = z.infer<typeof RebranchConfigSchema>;
export type RebranchConfigInput = z.input<typeof RebranchConfigSchema>;
