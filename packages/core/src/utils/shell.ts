/**
 * @module utils/shell
 * Async process execution with timeout and abort signal.
 * Arguments are passed as an array, so nothing needs shell quoting.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ShellOptions {
  /** Working directory. Default: process.cwd() */
  cwd?: string;
  /** Timeout in ms. Default: 120_000 (2 min). Use 0 for no timeout. */
  timeoutMs?: number;
  /** AbortSignal for cancellation. */
  signal?: AbortSignal;
  /** Environment variables to merge with process.env. */
  env?: Record<string, string>;
  /** Called for every stderr line while the process runs (ffmpeg progress). */
  onStderrLine?: (line: string) => void;
}

/** Exit code reported when the process was killed by the timeout. */
export const TIMEOUT_EXIT_CODE = 124;

/**
 * Run `bin` with `args`.
 * Resolves even on non-zero exit code (check result.exitCode).
 * Rejects only on signal abort or spawn failure.
 */
export function shell(bin: string, args: string[], opts: ShellOptions = {}): Promise<ShellResult> {
  const { cwd, timeoutMs = 120_000, signal, env, onStderrLine } = opts;

  return new Promise<ShellResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(`Command aborted before start: ${bin} ${args.join(' ')}`));
      return;
    }

    const child = spawn(bin, args, {
      cwd,
      env: env ? { ...process.env, ...env } : undefined,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];

    const kill = () => {
      child.kill('SIGTERM');
      setTimeout(() => {
        if (child.exitCode === null) child.kill('SIGKILL');
      }, 5000).unref();
    };

    // ── Timeout ──────────────────────────────────────────────────────
    let timedOut = false;
    const timer = timeoutMs > 0
      ? setTimeout(() => {
        timedOut = true;
        kill();
      }, timeoutMs)
      : undefined;

    // ── Abort signal ─────────────────────────────────────────────────
    signal?.addEventListener('abort', kill, { once: true });

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk.toString()));
    createInterface({ input: child.stderr }).on('line', (line) => {
      stderrChunks.push(line);
      onStderrLine?.(line);
    });

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', kill);
    };

    child.on('error', (err) => {
      cleanup();
      reject(err);
    });

    child.on('close', (code, sig) => {
      cleanup();
      if (signal?.aborted) {
        reject(new Error('Command aborted'));
        return;
      }
      resolve({
        stdout: stdoutChunks.join(''),
        stderr: stderrChunks.join('\n'),
        exitCode: timedOut || sig ? TIMEOUT_EXIT_CODE : code ?? 0,
      });
    });
  });
}

/** Convenience: run a command and throw if exit code is non-zero. */
export async function shellStrict(bin: string, args: string[], opts: ShellOptions = {}): Promise<ShellResult> {
  const result = await shell(bin, args, opts);
  if (result.exitCode !== 0) {
    throw new Error(
      `Command failed (exit ${result.exitCode}): ${bin} ${args.join(' ')}\nstderr: ${result.stderr.slice(-500)}`,
    );
  }
  return result;
}

/** Check if a CLI tool answers `-version` (ffmpeg, ffprobe). */
export async function hasCommand(bin: string): Promise<boolean> {
  try {
    const result = await shell(bin, ['-version'], { timeoutMs: 5000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
