/**
 * @module publishing/connectors/art19
 * Podcast host connector speaking the Art19 JSON:API.
 */

import { z } from 'zod';
import type { Art19Config } from '../../config.js';
import type { RunContext } from '../../context.js';
import { describeError } from '../../errors.js';
import type { EpisodeData, PlatformResult } from '../../types.js';
import { requestOk } from '../../utils/http.js';
import { failedResult, type PlatformConnector } from '../platform.js';

const JSON_API = 'application/vnd.api+json';

const EpisodeResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    attributes: z
      .object({
        url: z.string().optional(),
        canonical_url: z.string().optional(),
        published: z.boolean().optional(),
      })
      .passthrough()
      .default({}),
  }),
});

export class Art19Connector implements PlatformConnector {
  readonly name = 'art19';
  readonly kind = 'host' as const;

  constructor(private readonly config: Art19Config) { }

  isAvailable(): boolean {
    return Boolean(this.config.apiToken && this.config.seriesId);
  }

  async publish(episode: EpisodeData, ctx: RunContext): Promise<PlatformResult> {
    if (!this.isAvailable()) {
      return failedResult(this.name, 'Art19 API not configured (apiToken and seriesId are required)');
    }

    try {
      ctx.logger.info(`Creating episode on Art19: ${episode.title}`);
      const res = await requestOk('Art19', `${this.baseUrl}/episodes`, {
        method: 'POST',
        headers: this.headers(),
        body: this.episodePayload(episode),
        timeoutMs: this.config.timeoutMs,
        signal: ctx.signal,
      });

      const created = EpisodeResponseSchema.parse(res.body).data;
      let published = created.attributes.published ?? false;
      if (this.config.autoPublish && !published) {
        try {
          await this.markPublished(created.id, ctx);
        } catch (patchErr) {
          // The draft exists on Art19; report its id.
          return {
            ...failedResult(
              this.name,
              `Art19 episode ${created.id} was created but publishing it failed: ${describeError(patchErr)}`,
            ),
            externalId: created.id,
            details: { published: false },
          };
        }
        published = true;
      }

      const url =
        created.attributes.url ||
        created.attributes.canonical_url ||
        `${this.config.webBaseUrl.replace(/\/+$/, '')}/episodes/${created.id}`;

      ctx.logger.info(`Episode created on Art19: ${created.id}`);
      return {
        success: true,
        platform: this.name,
        url,
        externalId: created.id,
        details: { published },
      };
    } catch (err) {
      return failedResult(this.name, describeError(err));
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private get baseUrl(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    return {
      authorization: `Bearer ${this.config.apiToken}`,
      'content-type': JSON_API,
      accept: JSON_API,
    };
  }

  /** JSON:API episode document. Unset optional attributes are left out. */
  episodePayload(episode: EpisodeData): Record<string, unknown> {
    const attributes: Record<string, unknown> = {
      title: episode.title,
      description: episode.description,
      content: episode.showNotes,
      season_number: episode.seasonNumber ?? 1,
      explicit: episode.explicit,
      tags: [...episode.tags],
    };
    if (episode.episodeNumber !== undefined) attributes.episode_number = episode.episodeNumber;
    if (episode.publicationDate !== undefined) attributes.published_at = episode.publicationDate;

    return {
      data: {
        type: 'episodes',
        attributes,
        relationships: {
          series: { data: { type: 'series', id: this.config.seriesId } },
        },
      },
    };
  }

  private async markPublished(id: string, ctx: RunContext): Promise<void> {
    await requestOk('Art19', `${this.baseUrl}/episodes/${id}`, {
      method: 'PATCH',
      headers: this.headers(),
      body: {
        data: {
          type: 'episodes',
          id,
          attributes: { published: true, published_at: new Date().toISOString() },
        },
      },
      timeoutMs: this.config.timeoutMs,
      signal: ctx.signal,
    });
  }
}
