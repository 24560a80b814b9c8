/**
 * @module collaborators/llm-content
 * LlmContentGenerator: episode copy (title, description, show notes,
 * summary, social posts) from a transcript in one chat completion.
 *
 * When no provider is reachable, or the reply cannot be parsed, the generator
 * returns placeholder content built from the transcript itself and flags it
 * with `metadata.fallback = true` rather than failing the run.
 */

import { z } from 'zod';
import type { LLMConfig } from '../config.js';
import type { RunContext } from '../context.js';
import { describeError } from '../errors.js';
import { createLLMProvider, type LLMProvider, type LLMResponse } from '../providers/llm.js';
import type { ContentDraft, Transcript } from '../types.js';
import type { ContentGenerator } from './contracts.js';
import { languageName } from './languages.js';

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

function systemPrompt(language: string): string {
  return [
    `You are the producer of a podcast. Write all copy in ${language}.`,
    'Reply with a single JSON object and nothing else, using exactly these keys:',
    '"title" (under 80 characters),',
    '"description" (2-3 paragraphs for podcast directories),',
    '"show_notes" (bulleted topics and links mentioned, markdown),',
    '"summary" (2-3 sentences),',
    '"social_media" (object with "twitter" under 250 characters, "linkedin", "instagram").',
    'Base everything only on what is actually said in the transcript. Do not invent facts.',
  ].join(' ');
}

const TRUNCATION_MARKER = '\n\n[Transcript truncated for processing...]';

/** Cut a long transcript, preferring a sentence boundary in the last 30%. */
export function truncateTranscript(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let truncated = text.slice(0, Math.max(0, maxChars - 100));
  const lastPeriod = truncated.lastIndexOf('.');
  if (lastPeriod > maxChars * 0.7) truncated = truncated.slice(0, lastPeriod + 1);
  return truncated + TRUNCATION_MARKER;
}

// ---------------------------------------------------------------------------
// Reply parsing
// ---------------------------------------------------------------------------

const DraftReplySchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  show_notes: z.string().optional(),
  summary: z.string().optional(),
  social_media: z.record(z.string()).optional(),
});

/**
 * First `{ … }` block in a model reply, parsed and checked. Tolerates code
 * fences and chatter around the object. Returns undefined when nothing parses.
 */
export function parseDraftReply(reply: string): z.infer<typeof DraftReplySchema> | undefined {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return undefined;
  }
  const parsed = DraftReplySchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

// ---------------------------------------------------------------------------
// Fallback content
// ---------------------------------------------------------------------------

function clip(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1).trimEnd()}…`;
}

/** Placeholder copy derived from the transcript alone. */
export function fallbackContent(transcript: Transcript, languageCode: string): ContentDraft {
  const text = transcript.text.trim().replace(/\s+/g, ' ');
  const opening = text.split(' ').slice(0, 8).join(' ');
  return {
    title: opening ? `New episode: ${clip(opening, 60)}` : 'New episode',
    description: clip(text, 300) || 'A new episode is available.',
    show_notes: `Transcript excerpt:\n\n${clip(text, 1000)}`,
    summary: clip(text, 200),
    social_media: {},
    metadata: {
      language: languageName(languageCode),
      languageCode,
      fallback: true,
    },
  };
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

export interface LlmContentGeneratorOptions {
  config: LLMConfig;
  /** Provider override; defaults to the one named by `config.provider`. */
  provider?: LLMProvider;
}

export class LlmContentGenerator implements ContentGenerator {
  readonly name = 'llm';
  private readonly config: LLMConfig;
  private readonly provider?: LLMProvider;

  constructor(opts: LlmContentGeneratorOptions) {
    this.config = opts.config;
    this.provider = opts.provider ?? (opts.config.apiKey ? createLLMProvider(opts.config) : undefined);
  }

  async generate(transcript: Transcript, languageCode: string, ctx: RunContext): Promise<ContentDraft> {
    const language = languageName(languageCode);
    if (!this.provider) {
      ctx.logger.warn('No LLM provider configured; generating fallback content');
      return fallbackContent(transcript, languageCode);
    }

    ctx.emitter.emit('stage:progress', {
      stage: 'content_generation',
      message: `Writing ${language} copy with ${this.provider.name}…`,
    });

    let reply: LLMResponse;
    try {
      reply = await this.provider.generate(
        {
          systemPrompt: systemPrompt(language),
          prompt: `Transcript:\n\n${truncateTranscript(transcript.text, this.config.maxTranscriptChars)}`,
        },
        ctx,
      );
    } catch (err) {
      if (ctx.signal.aborted) throw err;
      ctx.logger.warn(`Content generation failed (${describeError(err)}); falling back to basic content`);
      return fallbackContent(transcript, languageCode);
    }

    const draft = parseDraftReply(reply.text);
    if (!draft) {
      ctx.logger.warn(`Could not parse ${this.provider.name} reply as JSON; falling back to basic content`);
      return fallbackContent(transcript, languageCode);
    }

    return {
      ...draft,
      metadata: { language, languageCode, fallback: false, model: reply.model },
    };
  }
}
