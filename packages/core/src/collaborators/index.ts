export type { AudioProcessor, Transcriber, ContentGenerator, StageCollaborators } from './contracts.js';
export {
  FfmpegAudioProcessor,
  SUPPORTED_AUDIO_EXTENSIONS,
  buildFilterGraph,
  ffmpegArgs,
  parseProgressTime,
  type CommandRunner,
  type FfmpegAudioProcessorOptions,
} from './ffmpeg-audio.js';
export { WhisperTranscriber, segmentConfidence, countWords } from './whisper.js';
export { FallbackTranscriber } from './fallback-transcriber.js';
export {
  LlmContentGenerator,
  fallbackContent,
  parseDraftReply,
  truncateTranscript,
  type LlmContentGeneratorOptions,
} from './llm-content.js';
export { SUPPORTED_LANGUAGES, baseLanguage, languageName, resolveDetectedLanguage } from './languages.js';
