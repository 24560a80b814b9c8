/**
 * @module types
 * Data model shared by the workflow and publishing coordinators.
 *
 * Stage outputs are explicit structs. Collaborators may return loosely
 * filled drafts (see {@link ContentDraft}); the workflow's validation gates
 * narrow them into the required shapes before anything downstream sees them.
 */

import type { MissingInputError, StageFailure } from './errors.js';

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/** Optional per-episode metadata supplied by the caller. */
export interface EpisodeMetadata {
  /** Used verbatim as the episode id when present. */
  episodeId?: string;
  tags?: string[];
  category?: string;
  explicit?: boolean;
  episodeNumber?: number;
  seasonNumber?: number;
  /** ISO-8601 date or date-time. */
  publicationDate?: string;
  author?: string;
  copyright?: string;
  /** Copyright year used when `copyright` is not given. */
  year?: number;
  durationSeconds?: number;
}

export interface WorkflowRequest {
  /** Path (or other resolvable reference) to the raw audio. */
  readonly audioRef: string;
  /** BCP-47-like code, e.g. `en-US`, `ja-JP`. */
  readonly languageCode: string;
  readonly metadata?: Readonly<EpisodeMetadata>;
}

// ---------------------------------------------------------------------------
// Stage outputs
// ---------------------------------------------------------------------------

export type StageName = 'audio_processing' | 'transcription' | 'content_generation' | 'publishing';

export const STAGE_ORDER: readonly StageName[] = [
  'audio_processing',
  'transcription',
  'content_generation',
  'publishing',
];

export interface ProcessedAudio {
  processedAudioRef: string;
  durationSeconds: number;
  sampleRate: number;
  channels: number;
}

export interface Transcript {
  text: string;
  /** Language actually used/detected; takes precedence downstream. */
  detectedLanguage?: string;
  /** 0–1. */
  confidence: number;
  wordCount: number;
}

/** Per-network social copy, keyed by network name (`twitter`, `linkedin`, …). */
export type SocialCopy = Record<string, string>;

export interface ContentMetadata {
  language?: string;
  languageCode?: string;
  /** True when the generator could not reach a provider and produced placeholder text. */
  fallback?: boolean;
  model?: string;
}

/**
 * What a ContentGenerator hands back. Field names follow the JSON the
 * language model is asked to produce.
 */
export interface ContentDraft {
  title?: string;
  description?: string;
  show_notes?: string;
  summary?: string;
  social_media?: SocialCopy;
  metadata?: ContentMetadata;
}

/** A draft that passed the content gate. */
export interface GeneratedContent extends ContentDraft {
  title: string;
  description: string;
  show_notes: string;
}

export const REQUIRED_CONTENT_FIELDS = ['title', 'description', 'show_notes'] as const;

// ---------------------------------------------------------------------------
// Publishing
// ---------------------------------------------------------------------------

export type PlatformKind = 'host' | 'website' | 'social';

/** Canonical, platform-agnostic episode record. Frozen once assembled. */
export interface EpisodeData {
  readonly episodeId: string;
  readonly title: string;
  readonly description: string;
  readonly showNotes: string;
  readonly summary: string;
  readonly audioRef: string;
  readonly audioFilename: string;
  readonly audioSizeMb: number;
  readonly durationSeconds: number;
  readonly language: string;
  readonly languageCode: string;
  readonly socialMedia: Readonly<SocialCopy>;
  readonly tags: readonly string[];
  readonly category: string;
  readonly explicit: boolean;
  readonly episodeNumber?: number;
  readonly seasonNumber?: number;
  readonly publicationDate?: string;
  readonly author: string;
  readonly copyright: string;
}

export interface PlatformResult {
  success: boolean;
  platform: string;
  /** Public URL of the published episode or post. */
  url?: string;
  /** Destination-specific identifier (episode id, deployment id, post id). */
  externalId?: string;
  error?: string;
  /** Extra destination-specific detail. */
  details?: Record<string, unknown>;
}

export interface PublishingOutcome {
  episodeId: string;
  publishedPlatforms: string[];
  failedPlatforms: string[];
  details: Record<string, PlatformResult>;
  /** Canonical URL, chosen by platform priority among successes. */
  episodeUrl?: string;
}

// ---------------------------------------------------------------------------
// Workflow result
// ---------------------------------------------------------------------------

export type WorkflowState =
  | 'pending'
  | 'audio_processing'
  | 'transcribing'
  | 'generating_content'
  | 'publishing'
  | 'completed'
  | 'completed_with_fallback_content'
  | 'failed';

export type WorkflowError = MissingInputError | StageFailure;

/** Stage outputs in pipeline order; a key is set only once its gate passed. */
export interface StageOutputs {
  processedAudio?: ProcessedAudio;
  transcript?: Transcript;
  content?: GeneratedContent;
  publishing?: PublishingOutcome;
}

export interface WorkflowResult {
  readonly runId: string;
  readonly request: WorkflowRequest;
  readonly state: WorkflowState;
  readonly stateHistory: readonly WorkflowState[];
  readonly success: boolean;
  readonly stages: Readonly<StageOutputs>;
  readonly detectedLanguage?: string;
  readonly episodeId?: string;
  /** Content came from the generator's fallback path. */
  readonly contentDegraded: boolean;
  readonly error?: WorkflowError;
  readonly durationMs: number;
}
