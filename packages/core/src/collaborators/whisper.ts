/**
 * @module collaborators/whisper
 * WhisperTranscriber: speech-to-text through an OpenAI-compatible
 * `/audio/transcriptions` endpoint.
 */

import { z } from 'zod';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { ASRConfig } from '../config.js';
import type { RunContext } from '../context.js';
import { ConfigurationError } from '../errors.js';
import type { Transcript } from '../types.js';
import { requestOk } from '../utils/http.js';
import type { Transcriber } from './contracts.js';
import { baseLanguage, resolveDetectedLanguage } from './languages.js';

const BASE_URLS: Record<ASRConfig['provider'], string> = {
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
};

const MIME_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.flac': 'audio/flac',
  '.ogg': 'audio/ogg',
  '.webm': 'audio/webm',
};

const VerboseTranscriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z.array(z.object({ avg_logprob: z.number().optional() }).passthrough()).optional(),
});

export type VerboseTranscription = z.infer<typeof VerboseTranscriptionSchema>;

/** Mean per-segment probability, `exp(avg_logprob)`, clamped to 0–1. 1 when unknown. */
export function segmentConfidence(segments: VerboseTranscription['segments']): number {
  const logprobs = (segments ?? [])
    .map((s) => s.avg_logprob)
    .filter((p): p is number => typeof p === 'number');
  if (logprobs.length === 0) return 1;
  const mean = logprobs.reduce((sum, p) => sum + Math.exp(p), 0) / logprobs.length;
  return Math.min(1, Math.max(0, mean));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class WhisperTranscriber implements Transcriber {
  readonly name: string;
  private readonly model: string;
  private readonly baseUrl: string;

  constructor(private readonly config: ASRConfig, opts: { model?: string; baseUrl?: string } = {}) {
    this.model = opts.model ?? config.model;
    this.baseUrl = (opts.baseUrl ?? BASE_URLS[config.provider]).replace(/\/+$/, '');
    this.name = `whisper:${this.model}`;
  }

  async transcribe(audioRef: string, languageCode: string, ctx: RunContext): Promise<Transcript> {
    if (!this.config.apiKey) {
      throw new ConfigurationError('ASR API key is required (asr.apiKey)', 'asr.apiKey');
    }

    const buffer = await fs.readFile(audioRef);
    ctx.logger.debug(
      `ASR request: ${path.basename(audioRef)} (${(buffer.byteLength / 1024 / 1024).toFixed(1)} MB), lang=${languageCode}, model=${this.model}`,
    );

    const mime = MIME_TYPES[path.extname(audioRef).toLowerCase()] ?? 'application/octet-stream';
    const form = new FormData();
    form.append('file', new Blob([buffer], { type: mime }), path.basename(audioRef));
    form.append('model', this.model);
    form.append('language', baseLanguage(languageCode));
    form.append('response_format', 'verbose_json');

    const res = await requestOk(`ASR ${this.name}`, `${this.baseUrl}/audio/transcriptions`, {
      method: 'POST',
      headers: { authorization: `Bearer ${this.config.apiKey}` },
      body: form,
      timeoutMs: this.config.timeoutMs,
      signal: ctx.signal,
    });

    const json = VerboseTranscriptionSchema.parse(res.body);
    const text = json.text.trim();
    return {
      text,
      detectedLanguage: resolveDetectedLanguage(json.language, languageCode),
      confidence: segmentConfidence(json.segments),
      wordCount: countWords(text),
    };
  }
}
