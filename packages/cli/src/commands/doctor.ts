/**
 * @module commands/doctor
 * `podcast-flow doctor` checks environment readiness.
 *
 * Looks for ffmpeg/ffprobe, the ASR and LLM keys, and which publishing
 * platforms are configured. Prints a JSON summary of checks and hints.
 */

import {
  createEnabledPlatforms,
  hasCommand,
  loadConfig,
  loadDotenv,
  SilentLogger,
  type WorkflowConfig,
} from '../../../core/src/index.js';

export interface DoctorReport {
  ok: boolean;
  checks: {
    nodeVersion: string;
    ffmpeg: boolean;
    ffprobe: boolean;
    asrKey: boolean;
    llmKey: boolean;
    platforms: string[];
  };
  hints: string[];
}

export function buildReport(
  config: WorkflowConfig,
  tools: { ffmpeg: boolean; ffprobe: boolean },
  nodeVersion: string = process.version,
): DoctorReport {
  const platforms = createEnabledPlatforms(config.publishing, new SilentLogger()).map((p) => p.name);
  const asrKey = config.asr.apiKey !== '';
  const llmKey = config.llm.apiKey !== '';

  const hints = [
    tools.ffmpeg && tools.ffprobe ? '' : 'Install ffmpeg (with ffprobe) for audio processing.',
    asrKey ? '' : 'Set OPENAI_API_KEY so recordings can be transcribed.',
    llmKey ? '' : 'Set OPENROUTER_API_KEY or OPENAI_API_KEY; without it episode text is placeholder content.',
    platforms.length > 0 ? '' : 'No publishing platform is configured (ART19_API_TOKEN + ART19_SERIES_ID, WEBSITE_API_ENDPOINT or VERCEL_DEPLOY_HOOK, TWITTER_BEARER_TOKEN).',
  ].filter(Boolean);

  return {
    ok: tools.ffmpeg && tools.ffprobe && asrKey && platforms.length > 0,
    checks: { nodeVersion, ffmpeg: tools.ffmpeg, ffprobe: tools.ffprobe, asrKey, llmKey, platforms },
    hints,
  };
}

export async function cmdDoctor(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  const [ffmpeg, ffprobe] = await Promise.all([hasCommand('ffmpeg'), hasCommand('ffprobe')]);
  const report = buildReport(config, { ffmpeg, ffprobe });
  console.log(JSON.stringify(report, null, 2));
  if (!report.ok) process.exitCode = 1;
}
