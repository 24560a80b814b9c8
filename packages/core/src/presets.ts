/**
 * @module presets
 * Ready-wired workflow: the default collaborators plus every platform the
 * configuration enables. Pass `collaborators` or `platforms` to swap parts.
 */

import { FfmpegAudioProcessor } from './collaborators/ffmpeg-audio.js';
import { FallbackTranscriber } from './collaborators/fallback-transcriber.js';
import { LlmContentGenerator } from './collaborators/llm-content.js';
import { WhisperTranscriber } from './collaborators/whisper.js';
import type { StageCollaborators, Transcriber } from './collaborators/contracts.js';
import { loadConfig, type WorkflowConfig } from './config.js';
import { ConsoleLogger, type Logger } from './context.js';
import { WorkflowEmitter } from './events.js';
import { createEnabledPlatforms } from './publishing/connectors/index.js';
import { PublishingCoordinator } from './publishing/coordinator.js';
import type { PlatformConnector } from './publishing/platform.js';
import type { AudioSourceResolver } from './validation.js';
import { WorkflowCoordinator } from './workflow/coordinator.js';

export interface DefaultWorkflowOptions {
  /** Fully loaded config; `loadConfig()` is called when omitted. */
  config?: WorkflowConfig;
  logger?: Logger;
  emitter?: WorkflowEmitter;
  /** Replace individual collaborators. */
  collaborators?: Partial<StageCollaborators>;
  /** Replace the enabled platform set. */
  platforms?: readonly PlatformConnector[];
  resolveAudio?: AudioSourceResolver;
}

export interface DefaultWorkflow {
  config: WorkflowConfig;
  workflow: WorkflowCoordinator;
  publisher: PublishingCoordinator;
}

/** Whisper on the configured model, then each fallback model in order. */
export function createDefaultTranscriber(config: WorkflowConfig): Transcriber {
  const primary = new WhisperTranscriber(config.asr);
  if (config.asr.fallbackModels.length === 0) return primary;
  return new FallbackTranscriber([
    primary,
    ...config.asr.fallbackModels.map((model) => new WhisperTranscriber(config.asr, { model })),
  ]);
}

export function createDefaultCollaborators(config: WorkflowConfig): StageCollaborators {
  return {
    audioProcessor: new FfmpegAudioProcessor(config.audio),
    transcriber: createDefaultTranscriber(config),
    contentGenerator: new LlmContentGenerator({ config: config.llm }),
  };
}

export function createDefaultWorkflow(opts: DefaultWorkflowOptions = {}): DefaultWorkflow {
  const config = opts.config ?? loadConfig();
  const logger = opts.logger ?? new ConsoleLogger(config.debug);
  const emitter = opts.emitter ?? new WorkflowEmitter();

  const publisher = new PublishingCoordinator({
    platforms: opts.platforms ?? createEnabledPlatforms(config.publishing, logger),
    config,
    logger,
    emitter,
  });

  const workflow = new WorkflowCoordinator({
    collaborators: { ...createDefaultCollaborators(config), ...opts.collaborators },
    publisher,
    config,
    logger,
    emitter,
    resolveAudio: opts.resolveAudio,
  });

  return { config, workflow, publisher };
}
