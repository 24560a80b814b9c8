/**
 * @module utils/files
 * Input files for `run` and `publish`: episode metadata and generated
 * content, as YAML or JSON (YAML parses both).
 */

import fs from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import {
  checkContent,
  writeJson,
  type EpisodeMetadata,
  type GeneratedContent,
  type PublishingOutcome,
  type WorkflowResult,
} from '../../../core/src/index.js';
import { UsageError } from './errors.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const EpisodeMetadataSchema = z
  .object({
    episodeId: z.string().min(1),
    tags: z.array(z.string()),
    category: z.string(),
    explicit: z.boolean(),
    episodeNumber: z.number().int().positive(),
    seasonNumber: z.number().int().positive(),
    publicationDate: z.string(),
    author: z.string(),
    copyright: z.string(),
    year: z.number().int(),
    durationSeconds: z.number().nonnegative(),
  })
  .partial()
  .strict();

const ContentFileSchema = z
  .object({
    title: z.string(),
    description: z.string(),
    show_notes: z.string(),
    summary: z.string(),
    social_media: z.record(z.string()),
    metadata: z
      .object({
        language: z.string(),
        languageCode: z.string(),
        fallback: z.boolean(),
        model: z.string(),
      })
      .partial(),
  })
  .partial();

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/** Parse a YAML/JSON file into an unknown value. */
export function readDataFile(filePath: string, field: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new UsageError(`Cannot read ${field} file: ${filePath}`, field, err);
  }
  try {
    return parse(text);
  } catch (err) {
    throw new UsageError(`${filePath} is not valid YAML or JSON`, field, err);
  }
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function readMetadataFile(filePath: string): EpisodeMetadata {
  const parsed = EpisodeMetadataSchema.safeParse(readDataFile(filePath, '--metadata') ?? {});
  if (!parsed.success) {
    throw new UsageError(`Invalid metadata in ${filePath}: ${issues(parsed.error)}`, '--metadata');
  }
  return parsed.data;
}

/** Read previously generated content; it must pass the same gate as a workflow run. */
export function readContentFile(filePath: string): GeneratedContent {
  const parsed = ContentFileSchema.safeParse(readDataFile(filePath, '--content'));
  if (!parsed.success) {
    throw new UsageError(`Invalid content in ${filePath}: ${issues(parsed.error)}`, '--content');
  }
  const gate = checkContent(parsed.data);
  if (!gate.ok) {
    throw new UsageError(`Content in ${filePath} is missing: ${gate.error.join(', ')}`, '--content');
  }
  return gate.value;
}

// ---------------------------------------------------------------------------
// Result output
// ---------------------------------------------------------------------------

/** Plain-JSON view of a workflow result; errors become `{ name, message, … }`. */
export function serializeResult(result: WorkflowResult): Record<string, unknown> {
  const { error, ...rest } = result;
  if (!error) return { ...rest };
  return {
    ...rest,
    error: {
      name: error.name,
      message: error.message,
      ...('stage' in error ? { stage: error.stage, missingFields: [...error.missingFields] } : {}),
      ...('audioRef' in error ? { audioRef: error.audioRef } : {}),
    },
  };
}

export function writeResultFile(filePath: string, data: WorkflowResult | PublishingOutcome): void {
  writeJson(filePath, 'runId' in data ? serializeResult(data) : data);
}
