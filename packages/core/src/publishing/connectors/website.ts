/**
 * @module publishing/connectors/website
 * Website connector: pushes the episode record to a content endpoint, or
 * triggers a deploy hook so the site rebuilds from its own data.
 */

import { z } from 'zod';
import type { WebsiteConfig } from '../../config.js';
import type { RunContext } from '../../context.js';
import { describeError } from '../../errors.js';
import type { EpisodeData, PlatformResult } from '../../types.js';
import { requestOk } from '../../utils/http.js';
import { failedResult, type PlatformConnector } from '../platform.js';

const EndpointResponseSchema = z
  .object({ episode_url: z.string().optional(), website_url: z.string().optional() })
  .passthrough();

const DeployResponseSchema = z
  .object({
    id: z.string().optional(),
    job: z.object({ id: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export class WebsiteConnector implements PlatformConnector {
  readonly name = 'website';
  readonly kind = 'website' as const;

  constructor(private readonly config: WebsiteConfig) { }

  isAvailable(): boolean {
    return Boolean(this.config.apiEndpoint || this.config.deployHook);
  }

  async publish(episode: EpisodeData, ctx: RunContext): Promise<PlatformResult> {
    if (!this.isAvailable()) {
      return failedResult(this.name, 'Website deployment not configured (no deploy hook or API endpoint)');
    }
    try {
      return this.config.apiEndpoint
        ? await this.pushEpisode(episode, ctx)
        : await this.triggerDeploy(episode, ctx);
    } catch (err) {
      return failedResult(this.name, describeError(err));
    }
  }

  /** Public episode page, when a site URL is configured. */
  episodeUrl(episodeId: string): string | undefined {
    if (!this.config.siteUrl) return undefined;
    return `${this.config.siteUrl.replace(/\/+$/, '')}/episodes/${episodeId}`;
  }

  // -----------------------------------------------------------------------
  // Modes
  // -----------------------------------------------------------------------

  private async pushEpisode(episode: EpisodeData, ctx: RunContext): Promise<PlatformResult> {
    ctx.logger.info(`Updating website episode data: ${episode.title}`);
    const headers: Record<string, string> = {};
    if (this.config.apiToken) headers.authorization = `Bearer ${this.config.apiToken}`;

    const res = await requestOk('Website', this.config.apiEndpoint, {
      method: 'POST',
      headers,
      body: {
        action: 'add_episode',
        episode: websiteRecord(episode),
        timestamp: new Date().toISOString(),
      },
      timeoutMs: this.config.timeoutMs,
      signal: ctx.signal,
    });

    const parsed = EndpointResponseSchema.safeParse(res.body ?? {});
    const returned = parsed.success ? parsed.data.episode_url : undefined;
    return {
      success: true,
      platform: this.name,
      url: returned || this.episodeUrl(episode.episodeId),
      externalId: episode.episodeId,
      details: { mode: 'api' },
    };
  }

  private async triggerDeploy(episode: EpisodeData, ctx: RunContext): Promise<PlatformResult> {
    ctx.logger.info('Triggering website deployment');
    const res = await requestOk('Deploy hook', this.config.deployHook, {
      method: 'POST',
      body: {
        episode_id: episode.episodeId,
        triggered_at: new Date().toISOString(),
        deployment_type: 'episode_update',
      },
      timeoutMs: this.config.timeoutMs,
      signal: ctx.signal,
    });

    const parsed = DeployResponseSchema.safeParse(res.body ?? {});
    const deploymentId = parsed.success ? parsed.data.id ?? parsed.data.job?.id : undefined;
    return {
      success: true,
      platform: this.name,
      url: this.episodeUrl(episode.episodeId),
      externalId: deploymentId,
      details: { mode: 'deploy_hook' },
    };
  }
}

/** Episode fields the website renders. */
export function websiteRecord(episode: EpisodeData): Record<string, unknown> {
  return {
    episode_id: episode.episodeId,
    title: episode.title,
    description: episode.description,
    show_notes: episode.showNotes,
    summary: episode.summary,
    duration: episode.durationSeconds,
    language: episode.language,
    tags: [...episode.tags],
    publication_date: episode.publicationDate ?? null,
  };
}
