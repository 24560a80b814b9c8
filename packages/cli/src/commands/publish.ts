/**
 * @module commands/publish
 * `podcast-flow publish` sends already generated content to the enabled
 * platforms, skipping audio processing, transcription and generation.
 */

import {
  WorkflowEmitter,
  createEnabledPlatforms,
  loadConfig,
  loadDotenv,
  publishEpisode,
} from '../../../core/src/index.js';
import { ClackLogger, clack, formatOutcome, withSpinnerAsync } from '../ui/progress.js';
import { arg, hasFlag, listArg } from '../utils/args.js';
import { UsageError } from '../utils/errors.js';
import { readContentFile, readMetadataFile, writeResultFile } from '../utils/files.js';

export async function cmdPublish(argv: readonly string[]): Promise<void> {
  const audioRef = arg(argv, '--audio');
  const contentPath = arg(argv, '--content');
  if (!audioRef) throw new UsageError('--audio <file> is required', '--audio');
  if (!contentPath) throw new UsageError('--content <file> is required', '--content');

  const content = readContentFile(contentPath);
  const metadataPath = arg(argv, '--metadata');
  const metadata = metadataPath ? readMetadataFile(metadataPath) : {};
  const outPath = arg(argv, '--out');

  loadDotenv();
  const config = loadConfig(hasFlag(argv, '--debug') ? { debug: true } : {});
  const logger = new ClackLogger({ verbose: hasFlag(argv, '--verbose'), debug: config.debug });
  const emitter = new WorkflowEmitter();
  emitter.on('platform:complete', ({ platform, durationMs }) => {
    logger.debug(`${platform} finished in ${durationMs}ms`);
  });

  clack.intro('podcast-flow publish');

  const outcome = await withSpinnerAsync('Publishing…', () =>
    publishEpisode(audioRef, content, metadata, {
      platforms: createEnabledPlatforms(config.publishing, logger),
      config,
      logger,
      emitter,
      only: listArg(argv, '--only'),
    }),
  );

  const published = outcome.publishedPlatforms.length;
  const total = published + outcome.failedPlatforms.length;
  clack.note(formatOutcome(outcome), `${published}/${total} platforms published`);
  if (outPath) {
    writeResultFile(outPath, outcome);
    clack.log.info(`Outcome written to ${outPath}`);
  }
  if (published === 0) process.exitCode = 1;
  clack.outro(published === 0 ? 'Nothing was published' : 'Done');
}
