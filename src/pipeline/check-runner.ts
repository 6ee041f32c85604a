/**
 * Check Runner — executes external tools (ruff, pytest, build, twine)
 * without a shell and captures their output.
 *
 * Safety: argv only (no shell interpolation), cwd enforcement, stream caps,
 * per-stage timeouts.
 */

import { execFile } from 'node:child_process';

// ─── Constants ───────────────────────────────────────────

/** Max stdout/stderr capture in bytes */
export const MAX_OUTPUT_SIZE = 1024 * 1024; // 1 MB

/** Fallback timeout when a caller gives none */
const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

/** Max characters kept in summaries */
const SUMMARY_LIMIT = 2000;

// ─── Types ───────────────────────────────────────────────

export interface CommandOptions {
  cwd: string;
  timeoutMs?: number;
  /** Extra variables for the child process only */
  env?: Record<string, string>;
}

export interface CommandResult {
  command: string;
  /** Absent when the process could not be started or was killed */
  exitCode?: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Spawn or buffer error message */
  error?: string;
  durationMs: number;
}

// ─── Execution ───────────────────────────────────────────

/**
 * Run a command and resolve with its captured output. Never rejects.
 */
export function runCommand(
  file: string,
  args: string[],
  options: CommandOptions,
): Promise<CommandResult> {
  const startTime = Date.now();
  const command = [file, ...args].join(' ');
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise<CommandResult>((resolve) => {
    execFile(
      file,
      args,
      {
        cwd: options.cwd,
        timeout,
        maxBuffer: MAX_OUTPUT_SIZE,
        encoding: 'utf8',
        env: {
          ...process.env,
          CI: 'true',
          ...options.env,
        },
      },
      (error, stdout, stderr) => {
        const durationMs = Date.now() - startTime;

        if (!error) {
          resolve({ command, exitCode: 0, stdout, stderr, timedOut: false, durationMs });
          return;
        }

        const timedOut = error.killed === true && error.signal === 'SIGTERM';
        const exitCode = typeof error.code === 'number' ? error.code : undefined;
        resolve({
          command,
          exitCode,
          stdout,
          stderr,
          timedOut,
          error: timedOut
            ? `${command} timed out after ${timeout}ms`
            : exitCode === undefined
              ? error.message
              : undefined,
          durationMs,
        });
      },
    );
  });
}

/**
 * Combine a command's streams and error into one diagnostic text
 */
export function formatCommandOutput(result: CommandResult): string {
  const parts = [`$ ${result.command}`];
  const stdout = result.stdout.trim();
  const stderr = result.stderr.trim();
  if (stdout) parts.push(stdout);
  if (stderr) parts.push(stderr);
  if (result.error) parts.push(result.error);
  if (result.exitCode !== undefined && result.exitCode !== 0) {
    parts.push(`exit code ${result.exitCode}`);
  }
  return parts.join('\n');
}

/**
 * Truncate long output for summaries
 */
export function summarizeOutput(output: string, limit: number = SUMMARY_LIMIT): string {
  return output.length > limit ? `${output.slice(0, limit)}\n... (truncated)` : output;
}
