import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import {
  EpisodeAssemblyError,
  assembleEpisodeData,
  checkContent,
  generateEpisodeId,
  highResStamp,
  slugify,
  titleHash,
} from '../src/index.js';
import { sampleContent, testConfig } from './helpers.js';

const defaults = testConfig().episode;
const june2024 = new Date('2024-06-15T12:00:00Z');

describe('episode ids', () => {
  it('slugifies titles to lowercase hyphenated ASCII', () => {
    expect(slugify('Hello, World! 2024')).toBe('hello-world-2024');
    expect(slugify('  AI   Trends  ')).toBe('ai-trends');
  });

  it('hashes titles to eight hex characters', () => {
    expect(titleHash('abc')).toBe('90015098');
    expect(titleHash('abc')).toBe(titleHash('abc'));
  });

  it('builds slug, timestamp and hash', () => {
    const id = generateEpisodeId('Hello, World! 2024', new Date('2024-03-05T07:08:09.123Z'));
    expect(id).toMatch(/^hello-world-2024-20240305070809\d{9}-[0-9a-f]{8}$/);
  });

  it('never repeats within a process, even for the same title and instant', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateEpisodeId('Same Title', june2024)));
    expect(ids.size).toBe(50);
  });

  it('stamps strictly increase', () => {
    const a = highResStamp(june2024);
    const b = highResStamp(june2024);
    expect(a).not.toBe(b);
    expect(a.slice(0, 14)).toBe('20240615120000');
  });
});

describe('assembleEpisodeData', () => {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'episode-test-'));
  afterAll(() => fs.rmSync(tmp, { recursive: true, force: true }));

  it('fills defaults for absent metadata', () => {
    const episode = assembleEpisodeData('/nowhere/ep1.wav', sampleContent, {}, defaults, june2024);

    expect(episode).toMatchObject({
      title: 'AI Trends in Asia',
      showNotes: '- Intro\n- Interviews\n- Outlook',
      summary: 'Adoption is accelerating. Regulation is catching up.',
      audioRef: '/nowhere/ep1.wav',
      audioFilename: 'ep1.wav',
      audioSizeMb: 0,
      durationSeconds: 0,
      language: 'English',
      languageCode: 'en-US',
      tags: [],
      category: 'Technology',
      explicit: false,
      author: 'AI Podcast Flow',
      copyright: '© 2024 AI Podcast Flow',
    });
    expect(episode.episodeNumber).toBeUndefined();
    expect(Object.isFrozen(episode)).toBe(true);
  });

  it('applies caller metadata', () => {
    const episode = assembleEpisodeData(
      '/nowhere/ep1.wav',
      sampleContent,
      {
        episodeId: 'ep-001',
        author: 'Test Host',
        year: 2023,
        tags: ['ai', 'asia'],
        explicit: true,
        episodeNumber: 3,
        seasonNumber: 2,
        durationSeconds: 1800,
      },
      defaults,
      june2024,
    );

    expect(episode.episodeId).toBe('ep-001');
    expect(episode.copyright).toBe('© 2023 Test Host');
    expect(episode.tags).toEqual(['ai', 'asia']);
    expect(episode.explicit).toBe(true);
    expect(episode.episodeNumber).toBe(3);
    expect(episode.seasonNumber).toBe(2);
    expect(episode.durationSeconds).toBe(1800);
  });

  it('measures the audio file when it exists', () => {
    const file = path.join(tmp, 'ep.wav');
    fs.writeFileSync(file, Buffer.alloc(1024 * 1024));
    const episode = assembleEpisodeData(file, sampleContent, {}, defaults, june2024);
    expect(episode.audioSizeMb).toBe(1);
    expect(episode.audioFilename).toBe('ep.wav');
  });

  it('reports every missing required field', () => {
    const content = { ...sampleContent, description: '', show_notes: '   ' };
    expect(() => assembleEpisodeData('/a.wav', content, {}, defaults)).toThrow(
      'Cannot assemble episode, missing required fields: description, show_notes',
    );
    expect(() => assembleEpisodeData('/a.wav', content, {}, defaults)).toThrow(EpisodeAssemblyError);
  });
});

describe('checkContent', () => {
  it('lists missing fields in declaration order', () => {
    const gate = checkContent({ summary: 'only a summary' });
    expect(gate).toEqual({ ok: false, error: ['title', 'description', 'show_notes'] });
  });

  it('passes optional fields through', () => {
    const gate = checkContent(sampleContent);
    expect(gate.ok).toBe(true);
    if (gate.ok) expect(gate.value.social_media).toEqual({ twitter: 'New episode on AI in Asia' });
  });
});
