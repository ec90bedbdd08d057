import type { RunnerConfig } from '../config.js';
import { SpawnError, type CommandRunner, type CommandResult } from './process.service.js';

export interface ToolOutcome {
  success: boolean;
  message: string;
  output: string;
}

export interface HalmosTarget {
  contractName: string;
  functionName: string;
}

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

/**
 * Keep the part of a halmos run worth relaying: from the first console.log line
 * (or the "Running" banner) through the "Symbolic test result" summary.
 */
export function formatHalmosOutput(raw: string): string {
  const lines = raw.replace(ANSI_ESCAPE, '').replace(/\r\n?/g, '\n').split('\n');

  let start = lines.findIndex(line => line.includes('[console.log]'));
  if (start === -1) start = lines.findIndex(line => line.includes('Running'));
  if (start === -1) start = 0;

  const end = lines.findIndex((line, i) => i >= start && line.includes('Symbolic test result'));
  const kept = lines.slice(start, end === -1 ? lines.length : end + 1);

  return kept.join('\n').replace(/\n+$/, '');
}

function combined(result: CommandResult): string {
  return result.stdout + result.stderr;
}

function spawnFailure(err: unknown, bin: string): ToolOutcome {
  if (err instanceof SpawnError) {
    const message = err.code === 'ENOENT'
      ? `${bin} not found; make sure Foundry and halmos are installed`
      : `Failed to run ${bin}: ${err.message}`;
    return { success: false, message, output: '' };
  }
  throw err;
}

/**
 * `forge build --force` in the sandbox. Returns a failed outcome only when the
 * compiler complains about our generated file; other build errors belong to
 * files we do not own and are logged.
 */
export async function compileSandbox(
  config: RunnerConfig,
  fileName: string,
  run: CommandRunner,
): Promise<ToolOutcome> {
  const args = ['build', '--force'];
  console.log(`[halmos] ${config.forge.bin} ${args.join(' ')} (cwd ${config.sandboxDir})`);

  let result: CommandResult;
  try {
    result = await run(config.forge.bin, args, { cwd: config.sandboxDir, timeoutMs: config.forge.timeoutMs });
  } catch (err) {
    return spawnFailure(err, config.forge.bin);
  }

  const output = combined(result).replace(ANSI_ESCAPE, '').replace(/\n+$/, '');
  if (result.timedOut) {
    return { success: false, message: `Compilation timed out after ${config.forge.timeoutMs / 1000}s`, output };
  }
  if (result.exitCode !== 0) {
    if (output.includes(fileName)) {
      return { success: false, message: 'Compilation failed', output };
    }
    console.warn(`[halmos] forge build exited with ${result.exitCode}; errors do not involve ${fileName}, continuing`);
  }
  return { success: true, message: 'Compilation succeeded', output };
}

export function halmosArgs(config: RunnerConfig, target: HalmosTarget): string[] {
  return [
    '--contract', target.contractName,
    '--function', target.functionName,
    ...config.halmos.extraArgs,
  ];
}

export async function runHalmos(
  config: RunnerConfig,
  target: HalmosTarget,
  run: CommandRunner,
): Promise<ToolOutcome> {
  const args = halmosArgs(config, target);
  console.log(`[halmos] ${config.halmos.bin} ${args.join(' ')} (cwd ${config.sandboxDir})`);

  let result: CommandResult;
  try {
    result = await run(config.halmos.bin, args, { cwd: config.sandboxDir, timeoutMs: config.halmos.timeoutMs });
  } catch (err) {
    return spawnFailure(err, config.halmos.bin);
  }

  const output = formatHalmosOutput(combined(result));
  if (result.timedOut) {
    return { success: false, message: `Test execution timed out after ${config.halmos.timeoutMs / 1000}s`, output };
  }

  console.log(`[halmos] Exit code ${result.exitCode ?? 'null'}`);
  if (result.exitCode === 0) {
    return { success: true, message: 'Test execution succeeded', output };
  }
  return { success: false, message: `Test execution failed (exit code: ${result.exitCode ?? 'null'})`, output };
}
