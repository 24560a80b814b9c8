/**
 * @module publishing/platform
 * PlatformConnector contract: one publishing destination.
 */

import type { RunContext } from '../context.js';
import type { EpisodeData, PlatformKind, PlatformResult } from '../types.js';

export interface PlatformConnector {
  /** Unique name, used as the key in PublishingOutcome.details. */
  readonly name: string;
  /** Drives episode-URL priority: host, then website, then social. */
  readonly kind: PlatformKind;
  /**
   * Whether the connector has what it needs (credentials, endpoints).
   * Unavailable connectors are left out of the enabled set, not attempted.
   */
  isAvailable(): boolean;
  /**
   * Publish one episode. Implementations bound the call with their own
   * timeout and report transport/API errors as `{ success: false, error }`.
   */
  publish(episode: EpisodeData, ctx: RunContext): Promise<PlatformResult>;
}

/** Lower rank wins when picking the canonical episode URL. */
export const PLATFORM_KIND_PRIORITY: Readonly<Record<PlatformKind, number>> = {
  host: 0,
  website: 1,
  social: 2,
};

/**
 * Connectors ordered by kind priority. `Array.prototype.sort` is stable, so
 * connectors of the same kind keep their enabled order.
 */
export function byUrlPriority<T extends { kind: PlatformKind }>(connectors: readonly T[]): T[] {
  return [...connectors].sort(
    (a, b) => PLATFORM_KIND_PRIORITY[a.kind] - PLATFORM_KIND_PRIORITY[b.kind],
  );
}

/** Failure result for a platform, built from a message. */
export function failedResult(platform: string, error: string): PlatformResult {
  return { success: false, platform, error };
}
