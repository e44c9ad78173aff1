#!/usr/bin/env tsx
import * as path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs-extra';
import { log } from '@playlist-podcaster/logging';
import { getFeedSyncConfig } from '@playlist-podcaster/config';
import { InvalidArgumentsError } from '@playlist-podcaster/errors';
import { createYtDlpClient } from '@playlist-podcaster/yt-dlp';
import { parseCliArgs, USAGE, type CliCommand } from './utils/parse-cli-args.js';
import { runFeedSync, type FeedSyncCollaborators } from './utils/run-feed-sync.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_INVALID_ARGUMENTS = 2;

function createDefaultCollaborators(): FeedSyncCollaborators {
  const config = getFeedSyncConfig();
  const client = createYtDlpClient(config);
  return { extractor: client, downloader: client };
}

// Main handler function; resolves to the process exit code
export async function handler(
  argv: readonly string[] = process.argv.slice(2),
  collaborators?: FeedSyncCollaborators
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof InvalidArgumentsError) {
      log.error(`❌ ${error.message}`);
      log.error(USAGE);
      return EXIT_INVALID_ARGUMENTS;
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  log.info(`🟢 Starting sync of ${command.options.feedPath}, with logging level: ${log.getLevel()}`);

  try {
    const result = await runFeedSync(command.options, collaborators ?? createDefaultCollaborators());

    for (const warning of result.warnings) {
      log.warn(`⚠️ ${warning.message}`);
    }
    log.info(
      result.written
        ? `✨ Feed ${command.options.feedPath} is up to date`
        : '✨ Sync finished without writing the feed file'
    );
    return EXIT_SUCCESS;
  } catch (error) {
    log.error('❌ Fatal error while syncing the feed:', error);
    return EXIT_FATAL;
  }
}

// ESM check, resolving the symlink npm creates for the bin entry
function isDirectExecution(): boolean {
  const scriptArg = process.argv[1];
  if (!scriptArg || !fs.existsSync(scriptArg)) return false;
  return fileURLToPath(import.meta.url) === fs.realpathSync(path.resolve(scriptArg));
}

if (isDirectExecution()) {
  handler()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(error => {
      log.error('❌ Processing failed with an error:', error);
      process.exit(EXIT_FATAL);
    });
}
