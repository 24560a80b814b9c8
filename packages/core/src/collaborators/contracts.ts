/**
 * @module collaborators/contracts
 * The three stage collaborators the workflow drives. Each is a single async
 * operation; the workflow validates whatever comes back before using it.
 */

import type { RunContext } from '../context.js';
import type { ContentDraft, ProcessedAudio, Transcript } from '../types.js';

export interface AudioProcessor {
  readonly name: string;
  /** Condition raw audio for transcription. Rejects on a missing or unsupported file. */
  process(audioRef: string, ctx: RunContext): Promise<ProcessedAudio>;
}

export interface Transcriber {
  readonly name: string;
  /** Rejects on missing input or when every provider failed. */
  transcribe(audioRef: string, languageCode: string, ctx: RunContext): Promise<Transcript>;
}

export interface ContentGenerator {
  readonly name: string;
  /**
   * Produce episode copy in the given language. May return fallback content
   * (flagged with `metadata.fallback`) instead of rejecting.
   */
  generate(transcript: Transcript, languageCode: string, ctx: RunContext): Promise<ContentDraft>;
}

/** Everything the WorkflowCoordinator needs besides the platforms. */
export interface StageCollaborators {
  audioProcessor: AudioProcessor;
  transcriber: Transcriber;
  contentGenerator: ContentGenerator;
}
