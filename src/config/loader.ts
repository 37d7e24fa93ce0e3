import { resolve, isAbsolute, join } from 'node:path';
import { homedir } from 'node:os';
import { RebranchConfigSchema, type RebranchConfig } from './schema.js';

/**
 * Config as consumed by the runtime: logDir is always resolved to an absolute path.
 */
export interface RuntimeConfig extends Omit<RebranchConfig, 'logDir'> {
  readonly logDir: string;
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export interface ConfigSources {
  env: NodeJS.ProcessEnv;
  cwd: string;
  overrides?: { verbose?: boolean };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Build the runtime config once at process start from the environment and CLI overrides.
 * The result is frozen and passed down explicitly.
 */
export function loadConfig(sources: ConfigSources): RuntimeConfig {
  const { env, cwd, overrides } = sources;

  // Unvalidated input; zod reports unknown values (e.g. a bad log level) with the allowed set.
  const raw = {
    repoPath: cwd,
    editor: nonEmpty(env.REBRANCH_EDITOR) ?? nonEmpty(env.EDITOR) ?? nonEmpty(env.VISUAL),
    logLevel: nonEmpty(env.REBRANCH_LOG_LEVEL)?.toLowerCase(),
    logDir: nonEmpty(env.REBRANCH_LOG_DIR),
    verbose: overrides?.verbose,
  };

  const result = RebranchConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid configuration:\n${issues}`, result.error);
  }

  const config = result.data;
  const repoPath = isAbsolute(config.repoPath) ? config.repoPath : resolve(config.repoPath);
  const logDir = config.logDir
    ? isAbsolute(config.logDir)
      ? config.logDir
      : resolve(repoPath, config.logDir)
    : join(homedir(), '.rebranch', 'logs');

  const frozen: RuntimeConfig = { ...config, repoPath, logDir };
  return Object.freeze(frozen);
}

