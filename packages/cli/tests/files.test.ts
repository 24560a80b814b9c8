import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  StageFailure,
  WorkflowConfigSchema,
  makeTempDir,
  type WorkflowResult,
} from '../../core/src/index.js';
import { buildReport } from '../src/commands/doctor.js';
import { formatOutcome } from '../src/ui/progress.js';
import { UsageError } from '../src/utils/errors.js';
import { readContentFile, readMetadataFile, serializeResult, writeResultFile } from '../src/utils/files.js';

let dir: string;

beforeEach(() => {
  dir = makeTempDir('cli-test-');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function write(name: string, text: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, text);
  return file;
}

describe('readMetadataFile', () => {
  it('reads YAML metadata', () => {
    const file = write(
      'episode.yaml',
      ['episodeId: ep-12', 'tags: [ai, asia]', 'explicit: false', 'episodeNumber: 12', 'publicationDate: 2024-05-01'].join('\n'),
    );
    expect(readMetadataFile(file)).toEqual({
      episodeId: 'ep-12',
      tags: ['ai', 'asia'],
      explicit: false,
      episodeNumber: 12,
      publicationDate: '2024-05-01',
    });
  });

  it('reads JSON metadata', () => {
    const file = write('episode.json', JSON.stringify({ author: 'Test Host', seasonNumber: 2 }));
    expect(readMetadataFile(file)).toEqual({ author: 'Test Host', seasonNumber: 2 });
  });

  it('treats an empty file as no metadata', () => {
    expect(readMetadataFile(write('empty.yaml', ''))).toEqual({});
  });

  it('rejects unknown keys', () => {
    const file = write('bad.yaml', 'episodeId: ep-1\nepisodeTitle: typo\n');
    expect(() => readMetadataFile(file)).toThrow(UsageError);
    expect(() => readMetadataFile(file)).toThrow("Unrecognized key(s) in object: 'episodeTitle'");
  });

  it('reports a missing file', () => {
    const file = path.join(dir, 'nope.yaml');
    expect(() => readMetadataFile(file)).toThrow(`Cannot read --metadata file: ${file}`);
  });
});

describe('readContentFile', () => {
  it('returns content that passes the gate', () => {
    const file = write('content.yaml', 'title: T\ndescription: D\nshow_notes: |\n  - one\n  - two\n');
    expect(readContentFile(file)).toEqual({ title: 'T', description: 'D', show_notes: '- one\n- two\n' });
  });

  it('names the missing required fields', () => {
    const file = write('content.yaml', 'title: T\ndescription: D\n');
    expect(() => readContentFile(file)).toThrow(`Content in ${file} is missing: show_notes`);
  });
});

describe('result output', () => {
  const failed: WorkflowResult = {
    runId: 'run-1',
    request: { audioRef: 'raw.mp3', languageCode: 'en-US' },
    state: 'failed',
    stateHistory: ['pending', 'audio_processing', 'transcribing', 'failed'],
    success: false,
    stages: {},
    contentDegraded: false,
    error: new StageFailure('transcription', 'Transcription returned empty text', { missingFields: ['text'] }),
    durationMs: 12,
  };

  it('turns errors into plain objects', () => {
    expect(serializeResult(failed).error).toEqual({
      name: 'StageFailure',
      message: 'Transcription returned empty text',
      stage: 'transcription',
      missingFields: ['text'],
    });
  });

  it('writes the serialised result as JSON', () => {
    const out = path.join(dir, 'nested', 'result.json');
    writeResultFile(out, failed);
    const written: unknown = JSON.parse(fs.readFileSync(out, 'utf8'));
    expect(written).toMatchObject({ runId: 'run-1', state: 'failed', error: { stage: 'transcription' } });
  });

  it('summarises a publishing outcome', () => {
    const text = formatOutcome({
      episodeId: 'ep-1',
      publishedPlatforms: ['website'],
      failedPlatforms: ['twitter'],
      details: {
        website: { success: true, platform: 'website', url: 'https://site.test/episodes/ep-1' },
        twitter: { success: false, platform: 'twitter', error: 'Twitter HTTP 403: forbidden' },
      },
      episodeUrl: 'https://site.test/episodes/ep-1',
    });
    expect(text).toBe(
      [
        'Episode: ep-1',
        'URL:     https://site.test/episodes/ep-1',
        '  ✔ website https://site.test/episodes/ep-1',
        '  ✖ twitter: Twitter HTTP 403: forbidden',
      ].join('\n'),
    );
  });
});

describe('doctor report', () => {
  it('is ready with tools, an ASR key and one platform', () => {
    const config = WorkflowConfigSchema.parse({
      asr: { apiKey: 'test-secret' },
      publishing: { website: { deployHook: 'https://deploy.test/hook' } },
    });
    expect(buildReport(config, { ffmpeg: true, ffprobe: true }, 'v20.11.0')).toEqual({
      ok: true,
      checks: {
        nodeVersion: 'v20.11.0',
        ffmpeg: true,
        ffprobe: true,
        asrKey: true,
        llmKey: false,
        platforms: ['website'],
      },
      hints: ['Set OPENROUTER_API_KEY or OPENAI_API_KEY; without it episode text is placeholder content.'],
    });
  });

  it('is not ready without ffmpeg', () => {
    const report = buildReport(WorkflowConfigSchema.parse({}), { ffmpeg: false, ffprobe: true }, 'v20.11.0');
    expect(report.ok).toBe(false);
    expect(report.hints[0]).toBe('Install ffmpeg (with ffprobe) for audio processing.');
  });
});
