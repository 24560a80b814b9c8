/**
 * @module publishing/episode
 * Assembly of the platform-agnostic EpisodeData record and episode ids.
 */

import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { EpisodeDefaults } from '../config.js';
import { EpisodeAssemblyError } from '../errors.js';
import type { EpisodeData, EpisodeMetadata, GeneratedContent } from '../types.js';
import { checkContent } from '../validation.js';

// ---------------------------------------------------------------------------
// Episode ids
// ---------------------------------------------------------------------------

/** Lower-cased, hyphen-joined title with everything but letters, digits and spaces removed. */
export function slugify(title: string): string {
  return title
    .replace(/[^a-zA-Z0-9\s]/g, '')
    .trim()
    .replace(/\s+/g, '-')
    .toLowerCase();
}

/** First 8 hex chars of the title's md5. */
export function titleHash(title: string): string {
  return createHash('md5').update(title).digest('hex').slice(0, 8);
}

let lastTick = 0n;

/**
 * `YYYYMMDDHHmmss` wall-clock time followed by nine digits of a monotonic
 * nanosecond counter. Successive calls in one process never repeat.
 */
export function highResStamp(now: Date = new Date()): string {
  const wall = now.toISOString().replace(/\D/g, '').slice(0, 14);
  let tick = process.hrtime.bigint();
  if (tick <= lastTick) tick = lastTick + 1n;
  lastTick = tick;
  return `${wall}${(tick % 1_000_000_000n).toString().padStart(9, '0')}`;
}

/** `<slug>-<stamp>-<hash>`. */
export function generateEpisodeId(title: string, now?: Date): string {
  return [slugify(title), highResStamp(now), titleHash(title)].join('-');
}

// ---------------------------------------------------------------------------
// EpisodeData assembly
// ---------------------------------------------------------------------------

interface AudioFileInfo {
  filename: string;
  sizeMb: number;
}

function audioFileInfo(audioRef: string): AudioFileInfo {
  const filename = path.basename(audioRef);
  try {
    const stat = fs.statSync(audioRef);
    return { filename, sizeMb: stat.isFile() ? stat.size / (1024 * 1024) : 0 };
  } catch {
    return { filename, sizeMb: 0 };
  }
}

/**
 * Build the frozen EpisodeData shared by every platform task.
 *
 * @throws {EpisodeAssemblyError} when the content lacks a required field
 */
export function assembleEpisodeData(
  audioRef: string,
  content: GeneratedContent,
  metadata: Readonly<EpisodeMetadata>,
  defaults: EpisodeDefaults,
  now: Date = new Date(),
): EpisodeData {
  const checked = checkContent(content);
  if (!checked.ok) throw new EpisodeAssemblyError(checked.error);
  const c = checked.value;

  const audio = audioFileInfo(audioRef);
  const author = metadata.author ?? defaults.author;
  const year = metadata.year ?? now.getFullYear();

  const episode: EpisodeData = {
    episodeId: metadata.episodeId || generateEpisodeId(c.title, now),
    title: c.title,
    description: c.description,
    showNotes: c.show_notes,
    summary: c.summary ?? '',
    audioRef,
    audioFilename: audio.filename,
    audioSizeMb: audio.sizeMb,
    durationSeconds: metadata.durationSeconds ?? 0,
    language: c.metadata?.language ?? 'English',
    languageCode: c.metadata?.languageCode ?? 'en-US',
    socialMedia: Object.freeze({ ...(c.social_media ?? {}) }),
    tags: Object.freeze([...(metadata.tags ?? [])]),
    category: metadata.category ?? defaults.category,
    explicit: metadata.explicit ?? false,
    episodeNumber: metadata.episodeNumber,
    seasonNumber: metadata.seasonNumber,
    publicationDate: metadata.publicationDate,
    author,
    copyright: metadata.copyright ?? `© ${year} ${author}`,
  };

  return Object.freeze(episode);
}
