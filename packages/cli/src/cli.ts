#!/usr/bin/env node

/**
 * podcast-flow CLI entry point.
 */

import { describeError } from '../../core/src/index.js';
import { cmdDoctor } from './commands/doctor.js';
import { cmdPublish } from './commands/publish.js';
import { cmdRun } from './commands/run.js';
import { UsageError } from './utils/errors.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
  Usage: podcast-flow <command> [options]

  Commands:
    run <audio>   Process, transcribe, write up and publish one recording
    publish       Publish previously generated content
    doctor        Check environment readiness

  Global options:
    --help        Show this help message
    --version     Show version
    --verbose     Print info logs
    --debug       Print debug logs

  Run options:
    --lang <code>          Language code (default: config lang, en-US)
    --metadata <file>      Episode metadata (YAML or JSON)
    --out <file>           Write the workflow result as JSON

  Publish options:
    --audio <file>         Processed audio to publish
    --content <file>       Generated content (YAML or JSON)
    --metadata <file>      Episode metadata; set episodeId to re-publish
    --only <a,b>           Publish to these platforms only (art19, website, twitter)
    --out <file>           Write the publishing outcome as JSON

  Configuration:
    .podcast-flow.json in the working directory, then environment
    variables (OPENAI_API_KEY, OPENROUTER_API_KEY, ART19_API_TOKEN,
    ART19_SERIES_ID, WEBSITE_API_ENDPOINT, VERCEL_DEPLOY_HOOK,
    TWITTER_BEARER_TOKEN, ...). A .env file is read when present.

  Examples:
    podcast-flow run recording.mp3 --lang ja-JP --metadata episode.yaml
    podcast-flow publish --audio out/ep1.wav --content ep1.yaml --only website
    podcast-flow doctor
`);
}

async function main(argv: readonly string[]): Promise<void> {
  const [command, ...rest] = argv;
  switch (command) {
    case 'run':
      await cmdRun(rest);
      break;
    case 'publish':
      await cmdPublish(rest);
      break;
    case 'doctor':
      await cmdDoctor();
      break;
    case '--help':
    case '-h':
      printHelp();
      break;
    case '--version':
    case '-v':
      console.log(VERSION);
      break;
    default:
      printHelp();
      if (command !== undefined) process.exitCode = 2;
      break;
  }
}

try {
  await main(process.argv.slice(2));
} catch (err) {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    process.exitCode = 2;
  } else {
    console.error(`Error: ${describeError(err)}`);
    process.exitCode = 1;
  }
}
