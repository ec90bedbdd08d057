import { spawn, type ChildProcess } from 'child_process';

export interface CommandResult {
  /** null when the process was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
}

/** Runs an executable to completion. Rejects only when the process cannot be started. */
export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

/** The executable could not be started (not installed, not executable, bad cwd). */
export class SpawnError extends Error {
  constructor(
    readonly command: string,
    readonly code: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = 'SpawnError';
  }
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

// Tools run in their own process group so a timeout also takes down the
// solver and compiler processes they start.
function killGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (err) {
    console.warn(`[process] Could not kill process group ${child.pid}:`, err);
    child.kill('SIGKILL');
  }
}

export const runCommand: CommandRunner = (command, args, { cwd, timeoutMs }) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'], detached: true });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const finish = (exitCode: number | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        timedOut,
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup(child);
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new SpawnError(command, errorCode(err), err.message));
    });

    // After a timeout, a survivor holding the pipes would delay 'close' indefinitely
    child.once('exit', (code) => {
      if (!timedOut) return;
      child.stdout.destroy();
      child.stderr.destroy();
      finish(code);
    });

    child.once('close', (code) => finish(code));
  });

/** Probe an executable with `--version`; returns the first line it prints, or null. */
export async function toolVersion(bin: string, run: CommandRunner = runCommand): Promise<string | null> {
  try {
    const result = await run(bin, ['--version'], { cwd: process.cwd(), timeoutMs: 10_000 });
    if (result.exitCode !== 0) return null;
    return (result.stdout || result.stderr).trim().split('\n')[0] ?? '';
  } catch (err) {
    if (err instanceof SpawnError) return null;
    throw err;
  }
}
