/**
 * @module ui/progress
 * @clack/prompts output for workflow runs: a spinner driven by core events
 * and a Logger that writes through clack so lines don't tear the spinner.
 */

import * as clack from '@clack/prompts';
import type {
  Logger,
  PublishingOutcome,
  StageName,
  WorkflowEmitter,
  WorkflowResult,
} from '../../../core/src/index.js';

const STAGE_LABELS: Record<StageName, string> = {
  audio_processing: 'Processing audio',
  transcription: 'Transcribing',
  content_generation: 'Generating content',
  publishing: 'Publishing',
};

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export interface ClackLoggerOptions {
  /** Print info lines. Off by default; the spinner already reports stages. */
  verbose?: boolean;
  debug?: boolean;
}

export class ClackLogger implements Logger {
  private readonly verbose: boolean;
  private readonly debugEnabled: boolean;

  constructor(opts: ClackLoggerOptions = {}) {
    this.debugEnabled = opts.debug ?? false;
    this.verbose = (opts.verbose ?? false) || this.debugEnabled;
  }
  debug(msg: string) {
    if (this.debugEnabled) clack.log.message(msg);
  }
  info(msg: string) {
    if (this.verbose) clack.log.info(msg);
  }
  warn(msg: string) {
    clack.log.warn(msg);
  }
  error(msg: string) {
    clack.log.error(msg);
  }
}

// ---------------------------------------------------------------------------
// Spinner
// ---------------------------------------------------------------------------

/**
 * Drive a clack spinner from workflow events. Returns a function that stops
 * the spinner and detaches the listeners.
 */
export function attachProgress(emitter: WorkflowEmitter): () => void {
  const spin = clack.spinner();
  let active = false;

  const onStart = ({ stage }: { stage: StageName }) => {
    spin.start(`${STAGE_LABELS[stage]}…`);
    active = true;
  };
  const onProgress = ({ stage, message, percent }: { stage: StageName; message: string; percent?: number }) => {
    if (!active) return;
    spin.message(percent === undefined ? `${STAGE_LABELS[stage]}: ${message}` : `${STAGE_LABELS[stage]}: ${percent}%`);
  };
  const onComplete = ({ stage, durationMs }: { stage: StageName; durationMs: number }) => {
    spin.stop(`${STAGE_LABELS[stage]} done (${(durationMs / 1000).toFixed(1)}s)`);
    active = false;
  };
  const onError = ({ stage }: { stage: StageName }) => {
    spin.stop(`${STAGE_LABELS[stage]} failed`, 1);
    active = false;
  };

  emitter.on('stage:start', onStart);
  emitter.on('stage:progress', onProgress);
  emitter.on('stage:complete', onComplete);
  emitter.on('stage:error', onError);

  return () => {
    emitter.off('stage:start', onStart);
    emitter.off('stage:progress', onProgress);
    emitter.off('stage:complete', onComplete);
    emitter.off('stage:error', onError);
    if (active) spin.stop('Cancelled', 1);
  };
}

/** Run `fn` inside a spinner; re-throws after stopping it. */
export async function withSpinnerAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const spin = clack.spinner();
  spin.start(label);
  try {
    const result = await fn();
    spin.stop('Done');
    return result;
  } catch (err) {
    spin.stop('Failed', 1);
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export function formatOutcome(outcome: PublishingOutcome): string {
  const lines = [`Episode: ${outcome.episodeId}`];
  if (outcome.episodeUrl) lines.push(`URL:     ${outcome.episodeUrl}`);
  for (const [name, result] of Object.entries(outcome.details)) {
    lines.push(result.success ? `  ✔ ${name}${result.url ? ` ${result.url}` : ''}` : `  ✖ ${name}: ${result.error ?? 'failed'}`);
  }
  return lines.join('\n');
}

export function formatResult(result: WorkflowResult): string {
  const lines = [
    `State:    ${result.state}`,
    `Language: ${result.detectedLanguage ?? result.request.languageCode}`,
    `Duration: ${(result.durationMs / 1000).toFixed(1)}s`,
  ];
  if (result.stages.content) lines.push(`Title:    ${result.stages.content.title}`);
  if (result.stages.publishing) lines.push('', formatOutcome(result.stages.publishing));
  if (result.error) lines.push('', `Error: ${result.error.message}`);
  return lines.join('\n');
}

export { clack };
