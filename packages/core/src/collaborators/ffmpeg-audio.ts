/**
 * @module collaborators/ffmpeg-audio
 * FfmpegAudioProcessor: turns raw recordings into transcription-ready WAV.
 *
 * Leading and trailing silence is trimmed, loudness is normalised with
 * `loudnorm`, and the result is resampled to the configured rate/channels.
 * Requires `ffmpeg` and `ffprobe` on PATH.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { AudioConfig } from '../config.js';
import type { RunContext } from '../context.js';
import type { ProcessedAudio } from '../types.js';
import { ensureDir, makeTempDir } from '../utils/fs.js';
import { shellStrict, type ShellOptions, type ShellResult } from '../utils/shell.js';
import type { AudioProcessor } from './contracts.js';

export const SUPPORTED_AUDIO_EXTENSIONS = ['.wav', '.mp3', '.m4a', '.flac', '.ogg', '.aac', '.webm'] as const;

/** Process runner; swapped out in tests. */
export type CommandRunner = (bin: string, args: string[], opts?: ShellOptions) => Promise<ShellResult>;

export interface FfmpegAudioProcessorOptions {
  run?: CommandRunner;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `-af` filter graph: trim silence at both ends, then normalise loudness. */
export function buildFilterGraph(config: Pick<AudioConfig, 'silenceThresholdDb' | 'loudnessTarget'>): string {
  const trim = `silenceremove=start_periods=1:start_threshold=${config.silenceThresholdDb}dB`;
  return [trim, 'areverse', trim, 'areverse', `loudnorm=I=${config.loudnessTarget}`].join(',');
}

export function ffmpegArgs(input: string, output: string, config: AudioConfig): string[] {
  return [
    '-y',
    '-hide_banner',
    '-i', input,
    '-af', buildFilterGraph(config),
    '-ar', String(config.sampleRate),
    '-ac', String(config.channels),
    '-c:a', 'pcm_s16le',
    output,
  ];
}

/** Seconds from an ffmpeg progress line (`time=00:01:02.50`), if present. */
export function parseProgressTime(line: string): number | undefined {
  const m = /time=(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(line);
  if (!m) return undefined;
  return Number(m[1]) * 3600 + Number(m[2]) * 60 + Number(m[3]);
}

// ---------------------------------------------------------------------------
// Processor
// ---------------------------------------------------------------------------

export class FfmpegAudioProcessor implements AudioProcessor {
  readonly name = 'ffmpeg';
  private readonly run: CommandRunner;

  constructor(private readonly config: AudioConfig, opts: FfmpegAudioProcessorOptions = {}) {
    this.run = opts.run ?? shellStrict;
  }

  async process(audioRef: string, ctx: RunContext): Promise<ProcessedAudio> {
    const ext = path.extname(audioRef).toLowerCase();
    if (!SUPPORTED_AUDIO_EXTENSIONS.some((e) => e === ext)) {
      throw new Error(
        `Unsupported audio format "${ext || '(none)'}". Supported: ${SUPPORTED_AUDIO_EXTENSIONS.join(', ')}`,
      );
    }

    const stat = await fs.stat(audioRef).catch(() => undefined);
    if (!stat?.isFile()) {
      throw new Error(`Audio file not found: ${audioRef}`);
    }

    const outDir = this.config.outputDir ?? makeTempDir();
    ensureDir(outDir);
    const output = path.join(outDir, `${path.basename(audioRef, path.extname(audioRef))}-processed.wav`);

    const inputDuration = await this.probeDuration(audioRef, ctx);
    ctx.logger.info(
      `Processing ${path.basename(audioRef)} (${(stat.size / 1024 / 1024).toFixed(1)} MB, ${inputDuration.toFixed(1)}s)`,
    );

    await this.run('ffmpeg', ffmpegArgs(audioRef, output, this.config), {
      timeoutMs: this.config.timeoutMs,
      signal: ctx.signal,
      onStderrLine: (line) => {
        const t = parseProgressTime(line);
        if (t === undefined || inputDuration <= 0) return;
        ctx.emitter.emit('stage:progress', {
          stage: 'audio_processing',
          message: 'Normalising audio',
          percent: Math.min(100, Math.round((t / inputDuration) * 100)),
        });
      },
    });

    const durationSeconds = await this.probeDuration(output, ctx);
    ctx.logger.debug(`Processed audio written to ${output} (${durationSeconds.toFixed(1)}s)`);

    return {
      processedAudioRef: output,
      durationSeconds,
      sampleRate: this.config.sampleRate,
      channels: this.config.channels,
    };
  }

  /** Container duration in seconds via ffprobe; 0 when unknown. */
  async probeDuration(file: string, ctx: RunContext): Promise<number> {
    const { stdout } = await this.run(
      'ffprobe',
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', file],
      { timeoutMs: 30_000, signal: ctx.signal },
    );
    const seconds = Number.parseFloat(stdout.trim());
    return Number.isFinite(seconds) ? seconds : 0;
  }
}
