/**
 * @module workflow/coordinator
 * WorkflowCoordinator: runs one episode through the four stages:
 * audio processing → transcription → content generation → publishing.
 *
 * Usage:
 *   const workflow = new WorkflowCoordinator({ collaborators, publisher, config });
 *   workflow.emitter.on('stage:progress', (e) => updateSpinner(e));
 *   const result = await workflow.run({ audioRef, languageCode: 'ja-JP' });
 *
 * Stages run strictly in sequence and each output passes a gate before the
 * next stage sees it. The first failure in stages 1–3 ends the run. Publishing
 * is lenient: only a thrown error fails it, zero successful platforms does not.
 */

import type { StageCollaborators } from '../collaborators/contracts.js';
import type { WorkflowConfig } from '../config.js';
import { createRunContext, type Logger, type RunContext } from '../context.js';
import { MissingInputError, StageFailure, describeError, toError } from '../errors.js';
import { WorkflowEmitter } from '../events.js';
import type { PublishingCoordinator } from '../publishing/coordinator.js';
import { err, ok, type Result } from '../result.js';
import type {
  EpisodeMetadata,
  PlatformResult,
  PublishingOutcome,
  StageName,
  StageOutputs,
  WorkflowError,
  WorkflowRequest,
  WorkflowResult,
  WorkflowState,
} from '../types.js';
import {
  checkContent,
  checkProcessedAudio,
  checkTranscript,
  fileExists,
  type AudioSourceResolver,
} from '../validation.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** The slice of PublishingCoordinator the workflow calls. */
export type Publisher = Pick<PublishingCoordinator, 'publish'>;

export interface WorkflowCoordinatorOptions {
  collaborators: StageCollaborators;
  publisher: Publisher;
  config: WorkflowConfig;
  logger?: Logger;
  /** Shared emitter; one is created when omitted. */
  emitter?: WorkflowEmitter;
  /** Decides whether an audio reference exists. Default: a regular file on disk. */
  resolveAudio?: AudioSourceResolver;
}

export interface RunOptions {
  /** Checked before each stage; an abort rejects `run` with the signal's reason. */
  signal?: AbortSignal;
  runId?: string;
}

/** Mutable bookkeeping for one run, frozen into the WorkflowResult at the end. */
interface RunTrack {
  readonly t0: number;
  readonly request: WorkflowRequest;
  readonly ctx: RunContext;
  readonly history: WorkflowState[];
  readonly stages: StageOutputs;
  detectedLanguage?: string;
  contentDegraded: boolean;
}

const STAGE_STATES: Readonly<Record<StageName, WorkflowState>> = {
  audio_processing: 'audio_processing',
  transcription: 'transcribing',
  content_generation: 'generating_content',
  publishing: 'publishing',
};

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class WorkflowCoordinator {
  readonly emitter: WorkflowEmitter;
  private readonly collaborators: StageCollaborators;
  private readonly publisher: Publisher;
  private readonly config: WorkflowConfig;
  private readonly logger?: Logger;
  private readonly resolveAudio: AudioSourceResolver;

  constructor(opts: WorkflowCoordinatorOptions) {
    this.collaborators = opts.collaborators;
    this.publisher = opts.publisher;
    this.config = opts.config;
    this.logger = opts.logger;
    this.emitter = opts.emitter ?? new WorkflowEmitter();
    this.resolveAudio = opts.resolveAudio ?? fileExists;
  }

  /**
   * Execute the pipeline for one request.
   * Pipeline failures are reported in the result (`success: false`, `error`);
   * the promise rejects only when `opts.signal` aborts.
   */
  async run(request: WorkflowRequest, opts: RunOptions = {}): Promise<WorkflowResult> {
    const ctx = createRunContext({
      config: this.config,
      logger: this.logger,
      emitter: this.emitter,
      signal: opts.signal,
      runId: opts.runId,
    });
    const track: RunTrack = {
      t0: Date.now(),
      request,
      ctx,
      history: ['pending'],
      stages: {},
      contentDegraded: false,
    };

    ctx.emitter.emit('workflow:start', {
      runId: ctx.runId,
      audioRef: request.audioRef,
      languageCode: request.languageCode,
    });
    ctx.logger.info(`Workflow ${ctx.runId} started: ${request.audioRef} (${request.languageCode})`);

    try {
      return await this.execute(track);
    } catch (thrown) {
      if (!ctx.signal.aborted) throw thrown;
      track.history.push('failed');
      const error = toError(thrown);
      ctx.emitter.emit('workflow:error', { runId: ctx.runId, error });
      ctx.logger.warn(`Workflow ${ctx.runId} cancelled: ${error.message}`);
      throw thrown;
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async execute(track: RunTrack): Promise<WorkflowResult> {
    const { request, ctx } = track;

    ctx.signal.throwIfAborted();
    if (!(await this.resolveAudio(request.audioRef))) {
      return this.fail(track, new MissingInputError(request.audioRef));
    }

    // ── Stage 1: audio processing ────────────────────────────────────
    const audio = await this.runStage(track, 'audio_processing', async () => {
      const output = await this.collaborators.audioProcessor.process(request.audioRef, ctx);
      const gate = await checkProcessedAudio(output, this.resolveAudio);
      if (!gate.ok) {
        throw new StageFailure('audio_processing', `Audio processing produced no usable audio: ${gate.error}`);
      }
      return gate.value;
    });
    if (!audio.ok) return this.fail(track, audio.error);
    track.stages.processedAudio = audio.value;

    // ── Stage 2: transcription ───────────────────────────────────────
    const transcript = await this.runStage(track, 'transcription', async () => {
      const output = await this.collaborators.transcriber.transcribe(
        audio.value.processedAudioRef,
        request.languageCode,
        ctx,
      );
      const gate = checkTranscript(output);
      if (!gate.ok) {
        throw new StageFailure('transcription', 'Transcription returned empty text', {
          missingFields: gate.error,
        });
      }
      return gate.value;
    });
    if (!transcript.ok) return this.fail(track, transcript.error);
    track.stages.transcript = transcript.value;
    track.detectedLanguage = transcript.value.detectedLanguage || request.languageCode;

    // ── Stage 3: content generation ──────────────────────────────────
    const language = track.detectedLanguage;
    const content = await this.runStage(track, 'content_generation', async () => {
      const draft = await this.collaborators.contentGenerator.generate(transcript.value, language, ctx);
      const gate = checkContent(draft);
      if (!gate.ok) {
        throw new StageFailure(
          'content_generation',
          `Generated content is missing required fields: ${gate.error.join(', ')}`,
          { missingFields: gate.error },
        );
      }
      return gate.value;
    });
    if (!content.ok) return this.fail(track, content.error);
    track.stages.content = content.value;
    track.contentDegraded = content.value.metadata?.fallback === true;
    if (track.contentDegraded) {
      ctx.logger.warn('Content was produced by the fallback generator');
    }

    // ── Stage 4: publishing ──────────────────────────────────────────
    const metadata: Readonly<EpisodeMetadata> = request.metadata ?? {};
    const outcome = await this.runStage(track, 'publishing', () =>
      this.publisher.publish(audio.value.processedAudioRef, content.value, metadata, { context: ctx }),
    );
    if (!outcome.ok) return this.fail(track, outcome.error);
    track.stages.publishing = freezeOutcome(outcome.value);

    if (outcome.value.publishedPlatforms.length === 0) {
      ctx.logger.warn(`No platform accepted episode ${outcome.value.episodeId}`);
    }

    const state: WorkflowState = track.contentDegraded ? 'completed_with_fallback_content' : 'completed';
    track.history.push(state);
    const result = this.freeze(track, state, true, outcome.value.episodeId);

    ctx.emitter.emit('workflow:complete', {
      runId: ctx.runId,
      state,
      episodeId: result.episodeId,
      durationMs: result.durationMs,
    });
    ctx.logger.info(
      `Workflow ${ctx.runId} ${state} in ${result.durationMs}ms, episode ${outcome.value.episodeId}, ` +
      `${outcome.value.publishedPlatforms.length}/${outcome.value.publishedPlatforms.length + outcome.value.failedPlatforms.length} platforms`,
    );
    return result;
  }

  /**
   * Enter a stage's state and run it. Anything thrown other than a
   * cancellation comes back as a StageFailure tagged with the stage.
   */
  private async runStage<T>(
    track: RunTrack,
    stage: StageName,
    work: () => Promise<T>,
  ): Promise<Result<T, StageFailure>> {
    const { ctx } = track;
    ctx.signal.throwIfAborted();

    track.history.push(STAGE_STATES[stage]);
    ctx.emitter.emit('stage:start', { stage });
    ctx.logger.debug(`→ ${stage} starting`);
    const t0 = Date.now();

    try {
      const value = await work();
      // Connectors report an aborted request as a failed platform, so check again.
      ctx.signal.throwIfAborted();
      const durationMs = Date.now() - t0;
      ctx.emitter.emit('stage:complete', { stage, durationMs });
      ctx.logger.info(`Stage "${stage}" completed in ${durationMs}ms`);
      return ok(value);
    } catch (thrown) {
      if (ctx.signal.aborted) throw thrown;
      const failure = thrown instanceof StageFailure && thrown.stage === stage
        ? thrown
        : new StageFailure(stage, `${stage} failed: ${describeError(thrown)}`, { cause: thrown });
      ctx.emitter.emit('stage:error', { stage, error: failure });
      return err(failure);
    }
  }

  private fail(track: RunTrack, error: WorkflowError): WorkflowResult {
    const { ctx } = track;
    track.history.push('failed');
    const result = this.freeze(track, 'failed', false, undefined, error);

    const stage = error instanceof StageFailure ? error.stage : undefined;
    ctx.emitter.emit('workflow:error', { runId: ctx.runId, error, stage });
    ctx.logger.error(
      stage ? `Workflow failed at "${stage}": ${error.message}` : `Workflow failed: ${error.message}`,
    );
    return result;
  }

  private freeze(
    track: RunTrack,
    state: WorkflowState,
    success: boolean,
    episodeId?: string,
    error?: WorkflowError,
  ): WorkflowResult {
    return Object.freeze({
      runId: track.ctx.runId,
      request: track.request,
      state,
      stateHistory: Object.freeze([...track.history]),
      success,
      stages: Object.freeze({ ...track.stages }),
      detectedLanguage: track.detectedLanguage,
      episodeId,
      contentDegraded: track.contentDegraded,
      error,
      durationMs: Date.now() - track.t0,
    });
  }
}

/** Frozen copy of a publishing outcome, down to each platform result. */
function freezeOutcome(outcome: PublishingOutcome): PublishingOutcome {
  const details: Record<string, PlatformResult> = {};
  for (const [name, result] of Object.entries(outcome.details)) {
    details[name] = Object.freeze({ ...result });
  }
  const copy: PublishingOutcome = {
    ...outcome,
    publishedPlatforms: [...outcome.publishedPlatforms],
    failedPlatforms: [...outcome.failedPlatforms],
    details,
  };
  Object.freeze(copy.publishedPlatforms);
  Object.freeze(copy.failedPlatforms);
  Object.freeze(details);
  return Object.freeze(copy);
}

// ---------------------------------------------------------------------------
// Functional entry point
// ---------------------------------------------------------------------------

/** One-shot run without keeping a coordinator around. */
export function runWorkflow(
  audioRef: string,
  languageCode: string,
  metadata: Readonly<EpisodeMetadata> | undefined,
  options: WorkflowCoordinatorOptions & RunOptions,
): Promise<WorkflowResult> {
  const { signal, runId, ...coordinatorOptions } = options;
  return new WorkflowCoordinator(coordinatorOptions).run({ audioRef, languageCode, metadata }, { signal, runId });
}
