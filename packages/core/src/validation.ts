/**
 * @module validation
 * Output gates for stage collaborators.
 *
 * Each gate takes whatever a collaborator returned and either narrows it to
 * the stage's required shape or reports what is missing.
 */

import { z } from 'zod';
import fs from 'node:fs/promises';
import { err, ok, type Result } from './result.js';
import type { ContentDraft, GeneratedContent, ProcessedAudio, Transcript } from './types.js';

const nonBlank = z.string().refine((s) => s.trim().length > 0, { message: 'must not be blank' });

export const ContentGateSchema = z.object({
  title: nonBlank,
  description: nonBlank,
  show_notes: nonBlank,
});

export const TranscriptGateSchema = z.object({
  text: nonBlank,
});

export const ProcessedAudioGateSchema = z.object({
  processedAudioRef: nonBlank,
});

/** Resolves an audio reference to "exists / does not exist". */
export type AudioSourceResolver = (ref: string) => Promise<boolean>;

/** Default resolver: the reference is a path to an existing regular file. */
export const fileExists: AudioSourceResolver = async (ref) => {
  if (!ref) return false;
  try {
    return (await fs.stat(ref)).isFile();
  } catch {
    return false;
  }
};

/** Top-level field names of every failing issue, in schema order, de-duplicated. */
function failingFields(error: z.ZodError): string[] {
  const fields: string[] = [];
  for (const issue of error.issues) {
    const field = String(issue.path[0] ?? '');
    if (field && !fields.includes(field)) fields.push(field);
  }
  return fields;
}

/**
 * Content gate: title, description and show_notes must be present and non-blank.
 * On failure the error lists the missing field names.
 */
export function checkContent(draft: ContentDraft): Result<GeneratedContent, string[]> {
  const parsed = ContentGateSchema.safeParse(draft);
  if (!parsed.success) return err(failingFields(parsed.error));
  return ok({
    ...draft,
    title: parsed.data.title,
    description: parsed.data.description,
    show_notes: parsed.data.show_notes,
  });
}

/** Transcript gate: text must be non-empty after trimming. */
export function checkTranscript(transcript: Transcript): Result<Transcript, string[]> {
  const parsed = TranscriptGateSchema.safeParse(transcript);
  return parsed.success ? ok(transcript) : err(failingFields(parsed.error));
}

/** Audio gate: the processed reference must be set and must resolve. */
export async function checkProcessedAudio(
  audio: ProcessedAudio,
  resolve: AudioSourceResolver,
): Promise<Result<ProcessedAudio, string>> {
  const parsed = ProcessedAudioGateSchema.safeParse(audio);
  if (!parsed.success) return err('processed audio reference is empty');
  if (!(await resolve(audio.processedAudioRef))) {
    return err(`processed audio does not resolve: ${audio.processedAudioRef}`);
  }
  return ok(audio);
}
