/**
 * @module collaborators/fallback-transcriber
 * Tries transcribers in order until one yields text. First success wins.
 */

import type { RunContext } from '../context.js';
import { describeError, toError } from '../errors.js';
import type { Transcript } from '../types.js';
import type { Transcriber } from './contracts.js';

export class FallbackTranscriber implements Transcriber {
  readonly name: string;
  private readonly alternatives: readonly Transcriber[];

  constructor(alternatives: readonly Transcriber[], name = 'fallback') {
    if (alternatives.length === 0) {
      throw new Error(`FallbackTranscriber "${name}": at least one alternative required`);
    }
    this.name = name;
    this.alternatives = alternatives;
  }

  async transcribe(audioRef: string, languageCode: string, ctx: RunContext): Promise<Transcript> {
    const errors: Array<{ name: string; error: unknown }> = [];

    for (const alt of this.alternatives) {
      ctx.emitter.emit('stage:progress', { stage: 'transcription', message: `Trying ${alt.name}…` });
      try {
        const transcript = await alt.transcribe(audioRef, languageCode, ctx);
        if (transcript.text.trim()) return transcript;
        errors.push({ name: alt.name, error: 'empty transcript' });
      } catch (err) {
        // Cancellation is not a provider failure.
        if (ctx.signal.aborted) throw toError(err);
        errors.push({ name: alt.name, error: err });
      }
      ctx.logger.warn(`Transcriber ${alt.name} failed: ${describeError(errors[errors.length - 1].error)}`);
    }

    const summary = errors.map((e) => `  ${e.name}: ${describeError(e.error)}`).join('\n');
    throw new Error(`All ${errors.length} transcribers failed:\n${summary}`);
  }
}
