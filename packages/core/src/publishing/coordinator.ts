/**
 * @module publishing/coordinator
 * PublishingCoordinator: fans one episode out to every enabled platform.
 *
 * Usage:
 *   const publisher = new PublishingCoordinator({ platforms, config });
 *   const outcome = await publisher.publish(audioRef, content, metadata);
 *
 * Every platform task is started before any is awaited and the join waits for
 * all of them, so one slow or broken destination never hides the others.
 * Results are matched to platforms by position in the launch list.
 */

import { createRunContext, type Logger, type RunContext } from '../context.js';
import type { WorkflowConfig } from '../config.js';
import { ConfigurationError, PlatformFailure, describeError } from '../errors.js';
import type { WorkflowEmitter } from '../events.js';
import { err, ok, type Result } from '../result.js';
import type {
  EpisodeData,
  EpisodeMetadata,
  GeneratedContent,
  PlatformResult,
  PublishingOutcome,
} from '../types.js';
import { assembleEpisodeData } from './episode.js';
import { byUrlPriority, failedResult, type PlatformConnector } from './platform.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PublishingCoordinatorOptions {
  /** Enabled platforms, in launch order. */
  platforms: readonly PlatformConnector[];
  config: WorkflowConfig;
  logger?: Logger;
  emitter?: WorkflowEmitter;
}

export interface PublishOptions {
  /** Restrict this call to the named platforms (re-publishing). */
  only?: readonly string[];
  /** Context of the surrounding workflow run, when there is one. */
  context?: RunContext;
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class PublishingCoordinator {
  private readonly platforms: readonly PlatformConnector[];
  private readonly config: WorkflowConfig;
  private readonly logger?: Logger;
  private readonly emitter?: WorkflowEmitter;

  constructor(opts: PublishingCoordinatorOptions) {
    const names = new Set<string>();
    for (const platform of opts.platforms) {
      if (names.has(platform.name)) {
        throw new ConfigurationError(`Platform "${platform.name}" is enabled twice`, 'publishing');
      }
      names.add(platform.name);
    }
    this.platforms = [...opts.platforms];
    this.config = opts.config;
    this.logger = opts.logger;
    this.emitter = opts.emitter;
  }

  /** Names of the enabled platforms, in launch order. */
  get platformNames(): string[] {
    return this.platforms.map((p) => p.name);
  }

  /**
   * Publish an episode to every enabled platform.
   *
   * Never throws for a platform failure. Throws `EpisodeAssemblyError` when the
   * content cannot form an episode and `ConfigurationError` when there is
   * nothing to publish to.
   */
  async publish(
    audioRef: string,
    content: GeneratedContent,
    metadata: Readonly<EpisodeMetadata> = {},
    opts: PublishOptions = {},
  ): Promise<PublishingOutcome> {
    const ctx = opts.context ?? createRunContext({
      config: this.config,
      logger: this.logger,
      emitter: this.emitter,
    });

    const episode = assembleEpisodeData(audioRef, content, metadata, this.config.episode);
    const platforms = this.selectPlatforms(opts.only);

    ctx.logger.info(
      `Publishing "${episode.title}" (${episode.episodeId}) to ${platforms.length} platform(s): ${platforms.map((p) => p.name).join(', ')}`,
    );

    const settled = await Promise.allSettled(
      platforms.map((platform) => this.publishTo(platform, episode, ctx)),
    );

    const outcome: PublishingOutcome = {
      episodeId: episode.episodeId,
      publishedPlatforms: [],
      failedPlatforms: [],
      details: {},
    };

    settled.forEach((settlement, i) => {
      const platform = platforms[i];
      const attempt: Result<PlatformResult, PlatformFailure> =
        settlement.status === 'fulfilled'
          ? ok(settlement.value)
          : err(new PlatformFailure(platform.name, settlement.reason));
      const result = toPlatformResult(platform.name, attempt);

      outcome.details[platform.name] = result;
      if (result.success) {
        outcome.publishedPlatforms.push(platform.name);
      } else {
        outcome.failedPlatforms.push(platform.name);
        ctx.logger.error(`Publishing to ${platform.name} failed: ${result.error ?? 'unknown error'}`);
      }
    });

    for (const platform of byUrlPriority(platforms)) {
      const result = outcome.details[platform.name];
      if (result.success && result.url) {
        outcome.episodeUrl = result.url;
        break;
      }
    }

    const total = platforms.length;
    const published = outcome.publishedPlatforms.length;
    if (published === 0) {
      ctx.logger.warn(`Publishing completed: 0/${total} platforms successful`);
    } else {
      ctx.logger.info(`Publishing completed: ${published}/${total} platforms successful`);
    }

    return outcome;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private selectPlatforms(only?: readonly string[]): readonly PlatformConnector[] {
    if (this.platforms.length === 0) {
      throw new ConfigurationError('No publishing platforms are enabled', 'publishing');
    }
    if (!only) return this.platforms;

    const selected = this.platforms.filter((p) => only.includes(p.name));
    if (selected.length === 0) {
      throw new ConfigurationError(
        `None of the requested platforms are enabled: ${only.join(', ')} (enabled: ${this.platformNames.join(', ')})`,
        'publishing',
      );
    }
    return selected;
  }

  /** One platform task. Async so that a synchronous throw also becomes a rejection. */
  private async publishTo(
    platform: PlatformConnector,
    episode: EpisodeData,
    ctx: RunContext,
  ): Promise<PlatformResult> {
    const t0 = Date.now();
    ctx.emitter.emit('platform:start', { platform: platform.name, episodeId: episode.episodeId });
    ctx.logger.debug(`→ ${platform.name} publishing`);

    const settle = (attempt: Result<PlatformResult, PlatformFailure>): void => {
      ctx.emitter.emit('platform:complete', {
        platform: platform.name,
        result: toPlatformResult(platform.name, attempt),
        durationMs: Date.now() - t0,
      });
      ctx.logger.debug(`← ${platform.name} settled (${Date.now() - t0}ms)`);
    };

    try {
      const result = await platform.publish(episode, ctx);
      settle(ok(result));
      return result;
    } catch (thrown) {
      settle(err(new PlatformFailure(platform.name, thrown)));
      throw thrown;
    }
  }
}

// ---------------------------------------------------------------------------
// Result conversion
// ---------------------------------------------------------------------------

/**
 * Normalise a connector's answer (or captured failure) into the result
 * recorded for `platform`. The platform name always comes from the launch list.
 */
export function toPlatformResult(
  platform: string,
  attempt: Result<PlatformResult, PlatformFailure>,
): PlatformResult {
  if (!attempt.ok) {
    const cause = attempt.error.cause;
    return failedResult(platform, describeError(cause === undefined ? attempt.error : cause));
  }
  const value = attempt.value;
  if (value.success === true) {
    return { ...value, platform, success: true };
  }
  return { ...value, platform, success: false, error: value.error ?? 'Platform reported failure' };
}

// ---------------------------------------------------------------------------
// Functional entry point
// ---------------------------------------------------------------------------

/**
 * Publish (or re-publish) an episode without a workflow run. Pass
 * `metadata.episodeId` to keep an existing id and `only` to target a subset.
 */
export function publishEpisode(
  audioRef: string,
  content: GeneratedContent,
  metadata: Readonly<EpisodeMetadata>,
  options: PublishingCoordinatorOptions & PublishOptions,
): Promise<PublishingOutcome> {
  const { only, context, ...coordinatorOptions } = options;
  return new PublishingCoordinator(coordinatorOptions).publish(audioRef, content, metadata, { only, context });
}
