import { execa } from 'execa';
import { logger } from './logger.ts';

export interface ExecOptions {
  /**
   * If true, stdout and stderr are captured rather than shown.
   * Defaults to true; installs turn it off so progress stays visible.
   */
  silent?: boolean;
}

export interface RunResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved. Empty when not silent. */
  all: string;
  command: string;
}

/**
 * Runs external processes one at a time. Failures come back as results,
 * never as rejections.
 */
export interface ProcessRunner {
  run(file: string, args: string[], options?: ExecOptions): Promise<RunResult>;
  /** True when `name` resolves to an executable on PATH. */
  which(name: string): Promise<boolean>;
}

// Exit code a shell reports for a command it could not find.
export const COMMAND_NOT_FOUND = 127;

/**
 * Captured runs get no stdin; visible runs share the terminal so installers can prompt.
 */
export function stdioFor(silent: boolean) {
  return silent
    ? ({ stdin: 'ignore', stdout: 'pipe', stderr: 'pipe' } as const)
    : ({ stdin: 'inherit', stdout: 'inherit', stderr: 'inherit' } as const);
}

/**
 * Executes a command and reports its outcome as a RunResult.
 */
export async function run(
  file: string,
  args: string[],
  options: ExecOptions = {}
): Promise<RunResult> {
  const { silent = true } = options;

  logger.debug(`Running: ${file} ${args.join(' ')}`);

  const result = await execa(file, args, {
    reject: false,
    all: silent,
    ...stdioFor(silent),
  });

  // No exit code means the process never started or was killed by a signal
  const exitCode = result.exitCode ?? (result.isTerminated ? 1 : COMMAND_NOT_FOUND);

  return {
    ok: !result.failed,
    exitCode,
    stdout: String(result.stdout ?? ''),
    stderr: String(result.stderr ?? ''),
    all: String(result.all ?? ''),
    command: result.command,
  };
}

/**
 * Resolves an executable on PATH the way `command -v` does.
 */
export async function which(name: string): Promise<boolean> {
  const { ok } = await run('/bin/sh', ['-c', 'command -v "$1" >/dev/null 2>&1', 'sh', name]);
  return ok;
}

export const execaRunner: ProcessRunner = { run, which };
