/**
 * @module config
 * Workflow configuration schema powered by Zod.
 *
 * Load order (later wins):
 *   defaults → .podcast-flow.json → env vars → explicit overrides
 *
 * The set of publishing platforms is part of this value and is handed to the
 * PublishingCoordinator at construction; nothing reads process state later.
 */

import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const AudioConfigSchema = z.object({
  /** Target sample rate for the transcription-ready file. */
  sampleRate: z.number().int().positive().default(16_000),
  channels: z.number().int().min(1).max(2).default(1),
  /** Silence below this level (dB) at the start/end is trimmed. */
  silenceThresholdDb: z.number().max(0).default(-50),
  /** Integrated loudness target (LUFS) for `loudnorm`. */
  loudnessTarget: z.number().max(0).default(-16),
  /** Directory for processed files; defaults to a temp dir. */
  outputDir: z.string().optional(),
  timeoutMs: z.number().int().positive().default(600_000),
});

export const ASRConfigSchema = z.object({
  provider: z.enum(['openai', 'openrouter']).default('openai'),
  model: z.string().default('whisper-1'),
  apiKey: z.string().default(''),
  /** Extra models tried in order when the primary one fails. */
  fallbackModels: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().default(600_000),
});

export const LLMConfigSchema = z.object({
  provider: z.enum(['openai', 'openrouter']).default('openrouter'),
  model: z.string().default('openrouter/auto'),
  apiKey: z.string().default(''),
  temperature: z.number().min(0).max(2).default(0.7),
  /** Max tokens for LLM response. */
  maxTokens: z.number().int().positive().default(2000),
  /** Transcript characters sent to the model. */
  maxTranscriptChars: z.number().int().positive().default(50_000),
  timeoutMs: z.number().int().positive().default(120_000),
});

export const Art19ConfigSchema = z.object({
  enabled: z.boolean().default(true),
  apiToken: z.string().default(''),
  seriesId: z.string().default(''),
  baseUrl: z.string().url().default('https://api.art19.com'),
  /** Public site used to build episode URLs when the API returns none. */
  webBaseUrl: z.string().url().default('https://art19.com'),
  autoPublish: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const WebsiteConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Deploy hook that rebuilds the site. */
  deployHook: z.string().default(''),
  /** Endpoint accepting episode records; preferred over the hook. */
  apiEndpoint: z.string().default(''),
  apiToken: z.string().default(''),
  /** Public site root used for episode URLs. */
  siteUrl: z.string().default(''),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const TwitterConfigSchema = z.object({
  enabled: z.boolean().default(true),
  bearerToken: z.string().default(''),
  baseUrl: z.string().url().default('https://api.twitter.com/2'),
  timeoutMs: z.number().int().positive().default(15_000),
});

export const PublishingConfigSchema = z.object({
  art19: Art19ConfigSchema.default(() => Art19ConfigSchema.parse({})),
  website: WebsiteConfigSchema.default(() => WebsiteConfigSchema.parse({})),
  twitter: TwitterConfigSchema.default(() => TwitterConfigSchema.parse({})),
});

export const EpisodeDefaultsSchema = z.object({
  author: z.string().default('AI Podcast Flow'),
  category: z.string().default('Technology'),
});

// ---------------------------------------------------------------------------
// Root schema
// ---------------------------------------------------------------------------

export const WorkflowConfigSchema = z.object({
  /** Default language code for runs that do not name one. */
  lang: z.string().default('en-US'),
  /** Enable verbose debug logging. */
  debug: z.boolean().default(false),
  audio: AudioConfigSchema.default(() => AudioConfigSchema.parse({})),
  asr: ASRConfigSchema.default(() => ASRConfigSchema.parse({})),
  llm: LLMConfigSchema.default(() => LLMConfigSchema.parse({})),
  publishing: PublishingConfigSchema.default(() => PublishingConfigSchema.parse({})),
  episode: EpisodeDefaultsSchema.default(() => EpisodeDefaultsSchema.parse({})),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type AudioConfig = z.infer<typeof AudioConfigSchema>;
export type ASRConfig = z.infer<typeof ASRConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type Art19Config = z.infer<typeof Art19ConfigSchema>;
export type WebsiteConfig = z.infer<typeof WebsiteConfigSchema>;
export type TwitterConfig = z.infer<typeof TwitterConfigSchema>;
export type PublishingConfig = z.infer<typeof PublishingConfigSchema>;
export type EpisodeDefaults = z.infer<typeof EpisodeDefaultsSchema>;

/** Name of the per-project config file looked up in the working directory. */
export const CONFIG_FILE_NAME = '.podcast-flow.json';

// ---------------------------------------------------------------------------
// Config loader
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Directory searched for `.podcast-flow.json`. Default: cwd. */
  cwd?: string;
  /** Environment to read. Default: process.env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration by merging layers:
 *   defaults → .podcast-flow.json → env → overrides
 *
 * Throws a ZodError with detailed messages if the merged config is invalid.
 */
export function loadConfig(
  overrides: Record<string, unknown> = {},
  opts: LoadConfigOptions = {},
): WorkflowConfig {
  const layers: Record<string, unknown>[] = [];

  // Layer 1: .podcast-flow.json
  const filePath = path.resolve(opts.cwd ?? process.cwd(), CONFIG_FILE_NAME);
  const fileJson = readConfigFile(filePath);
  if (fileJson) layers.push(fileJson);

  // Layer 2: environment variables
  layers.push(envLayer(opts.env ?? process.env));

  // Layer 3: explicit overrides
  if (Object.keys(overrides).length > 0) layers.push(overrides);

  return WorkflowConfigSchema.parse(deepMerge({}, ...layers));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readConfigFile(filepath: string): Record<string, unknown> | null {
  if (!fs.existsSync(filepath)) return null;
  const parsed: unknown = JSON.parse(fs.readFileSync(filepath, 'utf8'));
  return isPlainObject(parsed) ? parsed : null;
}

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/** Map recognized env vars to our schema. */
export function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const llm: Record<string, unknown> = {};
  const asr: Record<string, unknown> = {};
  const art19: Record<string, unknown> = {};
  const website: Record<string, unknown> = {};
  const twitter: Record<string, unknown> = {};
  const episode: Record<string, unknown> = {};

  if (env.OPENROUTER_API_KEY) llm.apiKey = env.OPENROUTER_API_KEY;
  if (env.OPENAI_API_KEY) {
    llm.apiKey ??= env.OPENAI_API_KEY;
    asr.apiKey = env.OPENAI_API_KEY;
    if (!env.OPENROUTER_API_KEY) llm.provider = 'openai';
  }
  if (env.LLM_PROVIDER) llm.provider = env.LLM_PROVIDER;
  if (env.LLM_MODEL) llm.model = env.LLM_MODEL;
  if (env.PODCAST_FLOW_DEBUG === '1') out.debug = true;
  if (env.PODCAST_FLOW_LANG) out.lang = env.PODCAST_FLOW_LANG;

  // Art19
  const art19Enabled = flag(env.ART19_ENABLED);
  if (art19Enabled !== undefined) art19.enabled = art19Enabled;
  if (env.ART19_API_TOKEN) art19.apiToken = env.ART19_API_TOKEN;
  if (env.ART19_SERIES_ID) art19.seriesId = env.ART19_SERIES_ID;
  if (env.ART19_API_BASE_URL) art19.baseUrl = env.ART19_API_BASE_URL;
  const autoPublish = flag(env.ART19_AUTO_PUBLISH);
  if (autoPublish !== undefined) art19.autoPublish = autoPublish;

  // Website
  const websiteEnabled = flag(env.WEBSITE_ENABLED);
  if (websiteEnabled !== undefined) website.enabled = websiteEnabled;
  if (env.VERCEL_DEPLOY_HOOK) website.deployHook = env.VERCEL_DEPLOY_HOOK;
  if (env.WEBSITE_API_ENDPOINT) website.apiEndpoint = env.WEBSITE_API_ENDPOINT;
  if (env.WEBSITE_API_TOKEN) website.apiToken = env.WEBSITE_API_TOKEN;
  if (env.WEBSITE_URL) website.siteUrl = env.WEBSITE_URL;

  // Social
  const socialEnabled = flag(env.SOCIAL_MEDIA_ENABLED);
  if (socialEnabled !== undefined) twitter.enabled = socialEnabled;
  if (env.TWITTER_BEARER_TOKEN) twitter.bearerToken = env.TWITTER_BEARER_TOKEN;

  if (env.PODCAST_AUTHOR) episode.author = env.PODCAST_AUTHOR;

  const publishing: Record<string, unknown> = {};
  if (Object.keys(art19).length) publishing.art19 = art19;
  if (Object.keys(website).length) publishing.website = website;
  if (Object.keys(twitter).length) publishing.twitter = twitter;

  if (Object.keys(llm).length) out.llm = llm;
  if (Object.keys(asr).length) out.asr = asr;
  if (Object.keys(publishing).length) out.publishing = publishing;
  if (Object.keys(episode).length) out.episode = episode;

  return out;
}

/** Simple recursive merge for plain objects (arrays are replaced, not merged). */
function deepMerge(
  target: Record<string, unknown>,
  ...sources: Record<string, unknown>[]
): Record<string, unknown> {
  for (const source of sources) {
    for (const key of Object.keys(source)) {
      const sv = source[key];
      const tv = target[key];
      if (isPlainObject(sv) && isPlainObject(tv)) {
        target[key] = deepMerge(tv, sv);
      } else if (isPlainObject(sv)) {
        target[key] = deepMerge({}, sv);
      } else if (sv !== undefined) {
        target[key] = sv;
      }
    }
  }
  return target;
}

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}
