import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, LogContext, RebranchEvent } from './events.js';

export interface LoggerOptions {
  /** Base directory for log files. */
  logDir: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string;
  private initPromise: Promise<unknown> | null = null;
  private readonly pending = new Set<Promise<void>>();
  private fileDisabled = false;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? join(homedir(), '.rebranch', 'logs'),
      level: opts.level ?? 'info',
      console: opts.console ?? false,
      source: opts.source,
    };
    this.logFile = join(this.opts.logDir, `${this.opts.source}.log`);
  }

  private async ensureDir(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(this.logFile), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = format(new Date(entry.timestamp), 'HH:mm:ss.SSS');
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [entry.branch ?? null, entry.commitId ? entry.commitId.slice(0, 7) : null]
      .filter(Boolean)
      .join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (this.opts.console) {
      // Console echo goes to stderr so command output on stdout stays clean.
      console.error(this.formatConsole(entry));
    }

    if (this.fileDisabled) return;

    try {
      await this.ensureDir();
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      this.fileDisabled = true;
      if (this.opts.console) {
        console.error(`Log file ${this.logFile} is not writable, file logging disabled: ${String(err)}`);
      }
    }
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    const write = this.writeEntry(this.buildEntry(level, message, context));
    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Log a structured event.
   */
  event(event: RebranchEvent, level: LogLevel = 'info'): void {
    this.log(level, event.type, { data: { ...event } });
  }

  /**
   * Wait for every queued log write to settle.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
