/**
 * In-process fakes shared by the core tests.
 */

import { vi } from 'vitest';
import {
  SilentLogger,
  WorkflowConfigSchema,
  createRunContext,
  type AudioProcessor,
  type ContentGenerator,
  type EpisodeData,
  type GeneratedContent,
  type PlatformConnector,
  type PlatformKind,
  type PlatformResult,
  type RunContext,
  type Transcriber,
  type WorkflowConfig,
} from '../src/index.js';

export function testConfig(overrides: Record<string, unknown> = {}): WorkflowConfig {
  return WorkflowConfigSchema.parse(overrides);
}

export function testContext(config: WorkflowConfig = testConfig()): RunContext {
  return createRunContext({ config, logger: new SilentLogger(), runId: 'test-run' });
}

export const sampleContent: GeneratedContent = {
  title: 'AI Trends in Asia',
  description: 'How teams across Asia are adopting AI tools.',
  show_notes: '- Intro\n- Interviews\n- Outlook',
  summary: 'Adoption is accelerating. Regulation is catching up.',
  social_media: { twitter: 'New episode on AI in Asia' },
  metadata: { language: 'English', languageCode: 'en-US', fallback: false },
};

export function fakeAudioProcessor(ref = '/tmp/processed.wav'): AudioProcessor {
  return {
    name: 'fake-audio',
    process: vi.fn(async () => ({ processedAudioRef: ref, durationSeconds: 61.5, sampleRate: 16000, channels: 1 })),
  };
}

export function fakeTranscriber(text = 'hello and welcome to the show', detectedLanguage?: string): Transcriber {
  return {
    name: 'fake-asr',
    transcribe: vi.fn(async () => ({ text, detectedLanguage, confidence: 0.9, wordCount: text.split(/\s+/).length })),
  };
}

export function fakeContentGenerator(content: Partial<GeneratedContent> = sampleContent): ContentGenerator {
  return {
    name: 'fake-llm',
    generate: vi.fn(async () => ({ ...content })),
  };
}

export interface FakePlatform extends PlatformConnector {
  calls: EpisodeData[];
}

type PublishBehaviour = (episode: EpisodeData) => Promise<PlatformResult>;

export function fakePlatform(
  name: string,
  kind: PlatformKind,
  behaviour: PublishBehaviour | 'ok' | 'fail' = 'ok',
): FakePlatform {
  const calls: EpisodeData[] = [];
  const run: PublishBehaviour =
    behaviour === 'ok'
      ? async (episode) => ({ success: true, platform: name, url: `https://${name}.test/${episode.episodeId}`, externalId: `${name}-1` })
      : behaviour === 'fail'
        ? async () => ({ success: false, platform: name, error: `${name} rejected the episode` })
        : behaviour;
  return {
    name,
    kind,
    calls,
    isAvailable: () => true,
    publish: (episode) => {
      calls.push(episode);
      return run(episode);
    },
  };
}

/** Minimal fetch Response stand-in for connector tests. */
export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
