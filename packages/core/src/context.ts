/**
 * @module context
 * RunContext: the shared state object handed to every collaborator call.
 */

import type { WorkflowConfig } from './config.js';
import { WorkflowEmitter } from './events.js';
import { nowStamp } from './utils/fs.js';

// ---------------------------------------------------------------------------
// Logger interface (swappable by consumers)
// ---------------------------------------------------------------------------

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Minimal console-based logger with level filtering.
 * Used as the default when no custom logger is supplied.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly debugEnabled: boolean = false) { }
  debug(msg: string, ...args: unknown[]) {
    if (this.debugEnabled) console.debug(`[debug] ${msg}`, ...args);
  }
  info(msg: string, ...args: unknown[]) {
    console.info(`[info]  ${msg}`, ...args);
  }
  warn(msg: string, ...args: unknown[]) {
    console.warn(`[warn]  ${msg}`, ...args);
  }
  error(msg: string, ...args: unknown[]) {
    console.error(`[error] ${msg}`, ...args);
  }
}

/** Logger that drops everything. Handy for tests and embedding. */
export class SilentLogger implements Logger {
  debug(): void { }
  info(): void { }
  warn(): void { }
  error(): void { }
}

// ---------------------------------------------------------------------------
// RunContext
// ---------------------------------------------------------------------------

export interface RunContext {
  /** Validated, merged configuration. */
  readonly config: WorkflowConfig;
  /** Typed event emitter for progress / status. */
  readonly emitter: WorkflowEmitter;
  /** Unique run identifier (ISO timestamp). */
  readonly runId: string;
  /** AbortSignal for cooperative cancellation. */
  readonly signal: AbortSignal;
  /** Structured logger. */
  readonly logger: Logger;
}

export interface RunContextOptions {
  config: WorkflowConfig;
  logger?: Logger;
  emitter?: WorkflowEmitter;
  signal?: AbortSignal;
  runId?: string;
}

/** Fill in the defaults for a RunContext. */
export function createRunContext(opts: RunContextOptions): RunContext {
  return {
    config: opts.config,
    emitter: opts.emitter ?? new WorkflowEmitter(),
    runId: opts.runId ?? nowStamp(),
    signal: opts.signal ?? new AbortController().signal,
    logger: opts.logger ?? new ConsoleLogger(opts.config.debug),
  };
}
