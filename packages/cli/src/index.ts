/**
 * @podcast-flow/cli
 *
 * Barrel export of the command implementations and their helpers.
 */

export { cmdRun } from './commands/run.js';
export { cmdPublish } from './commands/publish.js';
export { cmdDoctor, buildReport, type DoctorReport } from './commands/doctor.js';

export { arg, hasFlag, listArg, positionals } from './utils/args.js';
export { UsageError } from './utils/errors.js';
export {
  EpisodeMetadataSchema,
  readDataFile,
  readMetadataFile,
  readContentFile,
  serializeResult,
  writeResultFile,
} from './utils/files.js';

export {
  ClackLogger,
  type ClackLoggerOptions,
  attachProgress,
  withSpinnerAsync,
  formatOutcome,
  formatResult,
  clack,
} from './ui/progress.js';
