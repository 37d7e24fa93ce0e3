import { spawn, type SpawnOptions } from 'node:child_process';

export interface InteractiveResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  spawnError?: string;
}

export interface InteractiveOpts {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Split a command string such as `code --wait` into the executable and its arguments.
 */
export function splitCommand(command: string): { command: string; args: string[] } {
  const parts = command.trim().split(/\s+/).filter(Boolean);
  const [head = '', ...args] = parts;
  return { command: head, args };
}

/**
 * Run a child process attached to the current terminal and wait for it to exit.
 * stdin, stdout and stderr are inherited, so the child owns the terminal until it exits.
 */
export function runInteractive(
  command: string,
  args: string[],
  opts: InteractiveOpts = {},
): Promise<InteractiveResult> {
  const spawnOpts: SpawnOptions = {
    cwd: opts.cwd,
    env: opts.env ?? process.env,
    stdio: 'inherit',
  };

  return new Promise<InteractiveResult>((resolve) => {
    const child = spawn(command, args, spawnOpts);
    let settled = false;

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: null, signal: null, spawnError: err.message });
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, signal });
    });
  });
}
