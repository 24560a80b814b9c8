/**
 * @module errors
 * Error taxonomy for the workflow and publishing coordinators.
 *
 * Every class sets `.name` and keeps the cause chain.
 */

import type { StageName } from './types.js';

// ---------------------------------------------------------------------------
// MissingInputError: the audio source cannot be resolved
// ---------------------------------------------------------------------------

/**
 * Raised before any collaborator runs when the request's audio reference
 * does not resolve.
 */
export class MissingInputError extends Error {
  /** The unresolvable audio reference. */
  readonly audioRef: string;

  constructor(audioRef: string, message = `Audio source not found: ${audioRef}`) {
    super(message);
    this.name = 'MissingInputError';
    this.audioRef = audioRef;
  }
}

// ---------------------------------------------------------------------------
// StageFailure: a stage's collaborator errored or its output failed the gate
// ---------------------------------------------------------------------------

export interface StageFailureOptions {
  cause?: unknown;
  /** Required output fields that were missing or empty. */
  missingFields?: readonly string[];
}

export class StageFailure extends Error {
  /** The stage that aborted the run. */
  readonly stage: StageName;
  readonly missingFields: readonly string[];

  constructor(stage: StageName, message: string, opts: StageFailureOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'StageFailure';
    this.stage = stage;
    this.missingFields = opts.missingFields ?? [];
  }
}

// ---------------------------------------------------------------------------
// PlatformFailure: isolated to one destination during fan-out
// ---------------------------------------------------------------------------

/**
 * Wraps an exception that escaped a platform connector.
 * Recorded in the publishing outcome, never rethrown.
 */
export class PlatformFailure extends Error {
  readonly platform: string;

  constructor(platform: string, cause: unknown) {
    super(`${platform}: ${describeError(cause)}`, { cause });
    this.name = 'PlatformFailure';
    this.platform = platform;
  }
}

// ---------------------------------------------------------------------------
// ConfigurationError: nothing to publish to, or a collaborator is unusable
// ---------------------------------------------------------------------------

export class ConfigurationError extends Error {
  /** The config key at fault, when there is a single one. */
  readonly setting?: string;

  constructor(message: string, setting?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}

// ---------------------------------------------------------------------------
// EpisodeAssemblyError: content cannot be turned into EpisodeData
// ---------------------------------------------------------------------------

export class EpisodeAssemblyError extends Error {
  readonly missingFields: readonly string[];

  constructor(missingFields: readonly string[]) {
    super(`Cannot assemble episode, missing required fields: ${missingFields.join(', ')}`);
    this.name = 'EpisodeAssemblyError';
    this.missingFields = missingFields;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Normalise anything thrown into an `Error`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Human-readable message for anything thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
