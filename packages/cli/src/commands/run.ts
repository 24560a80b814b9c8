/**
 * @module commands/run
 * `podcast-flow run <audio>` runs the full workflow on one recording and
 * prints the result. Ctrl-C cancels the run between stages.
 */

import {
  createDefaultWorkflow,
  loadConfig,
  loadDotenv,
} from '../../../core/src/index.js';
import { ClackLogger, attachProgress, clack, formatResult } from '../ui/progress.js';
import { arg, hasFlag, positionals } from '../utils/args.js';
import { UsageError } from '../utils/errors.js';
import { readMetadataFile, writeResultFile } from '../utils/files.js';

const VALUE_FLAGS = ['--lang', '--metadata', '--out'] as const;

export async function cmdRun(argv: readonly string[]): Promise<void> {
  const [audioRef] = positionals(argv, VALUE_FLAGS);
  if (!audioRef) {
    throw new UsageError('An audio file is required: podcast-flow run <audio>', '<audio>');
  }

  loadDotenv();
  const config = loadConfig(hasFlag(argv, '--debug') ? { debug: true } : {});
  const languageCode = arg(argv, '--lang', config.lang);
  const metadataPath = arg(argv, '--metadata');
  const metadata = metadataPath ? readMetadataFile(metadataPath) : {};
  const outPath = arg(argv, '--out');

  clack.intro('podcast-flow run');

  const logger = new ClackLogger({ verbose: hasFlag(argv, '--verbose'), debug: config.debug });
  const { workflow } = createDefaultWorkflow({ config, logger });
  const detach = attachProgress(workflow.emitter);

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Cancelled by user'));
  process.once('SIGINT', onSigint);

  try {
    const result = await workflow.run({ audioRef, languageCode, metadata }, { signal: controller.signal });
    detach();
    clack.note(formatResult(result), result.success ? 'Episode published' : 'Workflow failed');
    if (outPath) {
      writeResultFile(outPath, result);
      clack.log.info(`Result written to ${outPath}`);
    }
    if (!result.success) process.exitCode = 1;
    clack.outro(result.state);
  } catch (err) {
    detach();
    if (!controller.signal.aborted) throw err;
    clack.cancel('Run cancelled.');
    process.exitCode = 130;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
