import { spawn, type ChildProcess } from 'node:child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
  timedOut: boolean;
}

export interface RunProcessOptions {
  input?: string;
  timeoutMs: number;
  cwd?: string;
}

export type ProcessRunner = (command: string, args: string[], options: RunProcessOptions) => Promise<ProcessResult>;

/** Raised when the executable itself could not be started. */
export class CommandNotFoundError extends Error {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    super(`${command}: command not found`, options);
    this.name = 'CommandNotFoundError';
    this.command = command;
  }
}

// Renderers may run through wrappers (npx) that fork the real tool, so the
// child leads its own process group and a timeout kills the whole group.
function killProcessTree(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch {
    child.kill('SIGKILL');
  }
}

export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      detached: process.platform !== 'win32'
    });

    const finish = (exitCode: number | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        timedOut
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessTree(child);
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (error.code === 'ENOENT' || error.code === 'EACCES') {
        reject(new CommandNotFoundError(command, { cause: error }));
        return;
      }
      reject(error);
    });

    // After a timeout, do not wait for 'close': a surviving grandchild can hold the pipes open.
    child.on('exit', (exitCode) => {
      if (!timedOut) return;
      child.stdout.destroy();
      child.stderr.destroy();
      finish(exitCode);
    });

    child.on('close', (exitCode) => finish(exitCode));

    // EPIPE means the child exited before reading its input; 'close' reports the outcome.
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') killProcessTree(child);
    });
    child.stdin.end(options.input ?? '');
  });
