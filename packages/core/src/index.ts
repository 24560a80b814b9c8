/**
 * @podcast-flow/core
 *
 * Workflow and publishing coordination for turning a raw recording into a
 * published podcast episode.
 *
 * Usage:
 *   import { createDefaultWorkflow, loadConfig } from '@podcast-flow/core';
 *   const { workflow } = createDefaultWorkflow({ config: loadConfig() });
 *   workflow.emitter.on('stage:progress', (e) => console.log(e.message));
 *   const result = await workflow.run({ audioRef: 'episode.mp3', languageCode: 'en-US' });
 */

// --- Data model ---
export {
  STAGE_ORDER,
  REQUIRED_CONTENT_FIELDS,
  type EpisodeMetadata,
  type WorkflowRequest,
  type StageName,
  type ProcessedAudio,
  type Transcript,
  type SocialCopy,
  type ContentMetadata,
  type ContentDraft,
  type GeneratedContent,
  type PlatformKind,
  type EpisodeData,
  type PlatformResult,
  type PublishingOutcome,
  type WorkflowState,
  type WorkflowError,
  type StageOutputs,
  type WorkflowResult,
} from './types.js';

// --- Errors ---
export {
  MissingInputError,
  StageFailure,
  type StageFailureOptions,
  PlatformFailure,
  ConfigurationError,
  EpisodeAssemblyError,
  toError,
  describeError,
} from './errors.js';

export { ok, err, type Result } from './result.js';

// --- Events ---
export {
  WorkflowEmitter,
  type WorkflowEventMap,
  type WorkflowStartEvent,
  type WorkflowCompleteEvent,
  type WorkflowErrorEvent,
  type StageStartEvent,
  type StageProgressEvent,
  type StageCompleteEvent,
  type StageErrorEvent,
  type PlatformStartEvent,
  type PlatformCompleteEvent,
} from './events.js';

// --- Context ---
export {
  type Logger,
  ConsoleLogger,
  SilentLogger,
  type RunContext,
  type RunContextOptions,
  createRunContext,
} from './context.js';

// --- Config ---
export {
  WorkflowConfigSchema,
  AudioConfigSchema,
  ASRConfigSchema,
  LLMConfigSchema,
  Art19ConfigSchema,
  WebsiteConfigSchema,
  TwitterConfigSchema,
  PublishingConfigSchema,
  EpisodeDefaultsSchema,
  CONFIG_FILE_NAME,
  loadConfig,
  envLayer,
  type LoadConfigOptions,
  type WorkflowConfig,
  type AudioConfig,
  type ASRConfig,
  type LLMConfig,
  type Art19Config,
  type WebsiteConfig,
  type TwitterConfig,
  type PublishingConfig,
  type EpisodeDefaults,
} from './config.js';

// --- Validation gates ---
export {
  checkContent,
  checkTranscript,
  checkProcessedAudio,
  fileExists,
  type AudioSourceResolver,
} from './validation.js';

// --- Workflow ---
export {
  WorkflowCoordinator,
  runWorkflow,
  type Publisher,
  type WorkflowCoordinatorOptions,
  type RunOptions,
} from './workflow/coordinator.js';

// --- Publishing ---
export {
  PublishingCoordinator,
  publishEpisode,
  toPlatformResult,
  type PublishingCoordinatorOptions,
  type PublishOptions,
} from './publishing/coordinator.js';
export {
  type PlatformConnector,
  PLATFORM_KIND_PRIORITY,
  byUrlPriority,
  failedResult,
} from './publishing/platform.js';
export {
  assembleEpisodeData,
  generateEpisodeId,
  slugify,
  titleHash,
  highResStamp,
} from './publishing/episode.js';
export {
  Art19Connector,
  WebsiteConnector,
  websiteRecord,
  TwitterConnector,
  defaultPost,
  truncatePost,
  weightedLength,
  MAX_POST_LENGTH,
  createEnabledPlatforms,
} from './publishing/connectors/index.js';

// --- Collaborators ---
export * from './collaborators/index.js';

// --- Providers ---
export {
  type LLMProvider,
  type LLMRequest,
  type LLMResponse,
  OpenAICompatibleProvider,
  createLLMProvider,
} from './providers/index.js';

// --- Presets ---
export {
  createDefaultWorkflow,
  createDefaultCollaborators,
  createDefaultTranscriber,
  type DefaultWorkflowOptions,
  type DefaultWorkflow,
} from './presets.js';

// --- Utilities ---
export {
  shell,
  shellStrict,
  hasCommand,
  TIMEOUT_EXIT_CODE,
  type ShellResult,
  type ShellOptions,
  ensureDir,
  nowStamp,
  makeTempDir,
  writeJson,
  request,
  requestOk,
  HttpError,
  type HttpRequest,
  type HttpResponse,
  loadDotenv,
  parseDotenv,
} from './utils/index.js';
