import { describe, expect, it } from 'vitest';
import {
  FallbackTranscriber,
  SilentLogger,
  WhisperTranscriber,
  createDefaultCollaborators,
  createDefaultTranscriber,
  createDefaultWorkflow,
} from '../src/index.js';
import { fakeAudioProcessor, fakeContentGenerator, fakePlatform, fakeTranscriber, testConfig } from './helpers.js';

describe('presets', () => {
  it('uses a single Whisper transcriber without fallback models', () => {
    const transcriber = createDefaultTranscriber(testConfig());
    expect(transcriber).toBeInstanceOf(WhisperTranscriber);
    expect(transcriber.name).toBe('whisper:whisper-1');
  });

  it('chains fallback models after the primary one', () => {
    const transcriber = createDefaultTranscriber(testConfig({ asr: { fallbackModels: ['whisper-large-v3'] } }));
    expect(transcriber).toBeInstanceOf(FallbackTranscriber);
  });

  it('wires ffmpeg, Whisper and the LLM generator by default', () => {
    const collaborators = createDefaultCollaborators(testConfig());
    expect(collaborators.audioProcessor.name).toBe('ffmpeg');
    expect(collaborators.transcriber.name).toBe('whisper:whisper-1');
    expect(collaborators.contentGenerator.name).toBe('llm');
  });

  it('publishes only to configured platforms', () => {
    const { publisher } = createDefaultWorkflow({
      config: testConfig({ publishing: { twitter: { bearerToken: 'test-secret' } } }),
      logger: new SilentLogger(),
    });
    expect(publisher.platformNames).toEqual(['twitter']);
  });

  it('runs end to end with swapped collaborators and platforms', async () => {
    const website = fakePlatform('website', 'website');
    const { workflow } = createDefaultWorkflow({
      config: testConfig(),
      logger: new SilentLogger(),
      collaborators: {
        audioProcessor: fakeAudioProcessor(),
        transcriber: fakeTranscriber(),
        contentGenerator: fakeContentGenerator(),
      },
      platforms: [website],
      resolveAudio: async () => true,
    });

    const result = await workflow.run({ audioRef: 'raw.mp3', languageCode: 'en-US' });

    expect(result.state).toBe('completed');
    expect(result.stages.publishing?.episodeUrl).toBe(`https://website.test/${result.episodeId}`);
    expect(website.calls[0].audioRef).toBe('/tmp/processed.wav');
  });
});
