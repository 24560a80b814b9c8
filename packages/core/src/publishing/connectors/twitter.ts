/**
 * @module publishing/connectors/twitter
 * Social connector posting the episode announcement through the X/Twitter v2 API.
 */

import { z } from 'zod';
import type { TwitterConfig } from '../../config.js';
import type { RunContext } from '../../context.js';
import { describeError } from '../../errors.js';
import type { EpisodeData, PlatformResult } from '../../types.js';
import { requestOk } from '../../utils/http.js';
import { failedResult, type PlatformConnector } from '../platform.js';

export const MAX_POST_LENGTH = 280;

/** Code point ranges X counts as one character; everything else counts as two. */
const SINGLE_WEIGHT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0000, 0x10ff],
  [0x2000, 0x200d],
  [0x2010, 0x201f],
  [0x2032, 0x2037],
];

function charWeight(char: string): number {
  const cp = char.codePointAt(0) ?? 0;
  return SINGLE_WEIGHT_RANGES.some(([lo, hi]) => cp >= lo && cp <= hi) ? 1 : 2;
}

/** Length as X counts it: CJK and emoji weigh 2. */
export function weightedLength(text: string): number {
  let total = 0;
  for (const char of text) total += charWeight(char);
  return total;
}

/** Longest prefix of whole code points whose weighted length fits `max`. */
export function truncatePost(text: string, max = MAX_POST_LENGTH): string {
  let total = 0;
  let out = '';
  for (const char of text) {
    total += charWeight(char);
    if (total > max) break;
    out += char;
  }
  return out;
}

const TweetResponseSchema = z.object({
  data: z.object({ id: z.string(), text: z.string().optional() }),
});

/**
 * Announcement used when the content carries no `twitter` copy:
 * `🎧 New episode: <title> - <first summary sentence> #podcast #ai`.
 * The sentence is only added while the post stays under 250 characters.
 */
export function defaultPost(episode: Pick<EpisodeData, 'title' | 'summary'>): string {
  const firstSentence = episode.summary ? episode.summary.split('.')[0] : '';
  let post = `🎧 New episode: ${episode.title}`;
  if (firstSentence && weightedLength(`${post} - ${firstSentence}`) < 250) {
    post += ` - ${firstSentence}`;
  }
  post += ' #podcast #ai';
  return truncatePost(post);
}

export class TwitterConnector implements PlatformConnector {
  readonly name = 'twitter';
  readonly kind = 'social' as const;

  constructor(private readonly config: TwitterConfig) { }

  isAvailable(): boolean {
    return Boolean(this.config.bearerToken);
  }

  /** Text that will be posted for `episode`. */
  postText(episode: EpisodeData): string {
    const provided = episode.socialMedia.twitter?.trim();
    return provided ? truncatePost(provided) : defaultPost(episode);
  }

  async publish(episode: EpisodeData, ctx: RunContext): Promise<PlatformResult> {
    if (!this.isAvailable()) {
      return failedResult(this.name, 'Twitter API not configured (bearerToken is required)');
    }
    try {
      const text = this.postText(episode);
      ctx.logger.debug(`Posting announcement (${weightedLength(text)}/${MAX_POST_LENGTH})`);
      const res = await requestOk('Twitter', `${this.config.baseUrl.replace(/\/+$/, '')}/tweets`, {
        method: 'POST',
        headers: { authorization: `Bearer ${this.config.bearerToken}` },
        body: { text },
        timeoutMs: this.config.timeoutMs,
        signal: ctx.signal,
      });

      const { id } = TweetResponseSchema.parse(res.body).data;
      return {
        success: true,
        platform: this.name,
        url: `https://twitter.com/i/web/status/${id}`,
        externalId: id,
        details: { text },
      };
    } catch (err) {
      return failedResult(this.name, describeError(err));
    }
  }
}
