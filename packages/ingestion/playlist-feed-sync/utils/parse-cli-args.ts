import { InvalidArgumentsError } from '@playlist-podcaster/errors';
import { DEFAULT_PLAYLIST_LIMIT } from '@playlist-podcaster/constants';
import type { IncompleteEpisodePolicy, MissingEpisodePolicy } from '@playlist-podcaster/types';
import type { FeedSyncOptions } from './run-feed-sync.js';

export const USAGE = `Usage: playlist-podcaster <feed-file> <base-url> [options] [-- downloader args...]

Keeps a podcast RSS feed in sync with a video playlist, downloading media for new episodes.

Arguments:
  <feed-file>                     RSS file to create or update
  <base-url>                      URL the media directory is served from

Options:
  --playlist-url <url>            Playlist to follow (default: the feed's <link>)
  --limit <n>                     Only look at the first n playlist entries (default: ${DEFAULT_PLAYLIST_LIMIT})
  --keep <n>                      Keep only the newest n episodes and delete older media
  --media-dir <dir>               Where media files are stored (default: the feed file's directory)
  --missing-episodes keep|drop    What to do with episodes no longer in the playlist (default: keep)
  --incomplete-episodes retain|skip|fail
                                  How to write episodes whose media is missing (default: retain)
  --no-write-feed                 Print the feed to stdout instead of writing the file
  --no-pretty                     Write the feed without indentation
  -h, --help                      Show this help

Environment:
  LOG_LEVEL, YT_DLP_PATH, YT_DLP_EXTRACTION_TIMEOUT_MS, YT_DLP_DOWNLOAD_TIMEOUT_MS, YT_DLP_FORMAT`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'sync'; options: FeedSyncOptions };

const VALUE_OPTIONS = [
  'playlist-url',
  'limit',
  'keep',
  'media-dir',
  'missing-episodes',
  'incomplete-episodes'
] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

const MISSING_EPISODE_POLICIES: readonly MissingEpisodePolicy[] = ['keep', 'drop'];
const INCOMPLETE_EPISODE_POLICIES: readonly IncompleteEpisodePolicy[] = ['retain', 'skip', 'fail'];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some(option => option === name);
}

function parseHttpUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidArgumentsError(`${name} must be an absolute URL, got "${value}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidArgumentsError(`${name} must be an http or https URL, got "${value}"`);
  }
  return value;
}

function parseCount(name: string, value: string, minimum: number): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) < minimum) {
    throw new InvalidArgumentsError(`--${name} expects an integer of at least ${minimum}, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parseChoice<T extends string>(name: string, value: string, choices: readonly T[]): T {
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new InvalidArgumentsError(`--${name} expects one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Options take `--name=value` or `--name value`.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const positionals: string[] = [];
  const downloaderArgs: string[] = [];
  const values = new Map<ValueOption, string>();
  let writeFeed = true;
  let pretty = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      downloaderArgs.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [name, inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    if (name === 'no-write-feed' || name === 'no-pretty') {
      if (inlineValue !== undefined) {
        throw new InvalidArgumentsError(`--${name} does not take a value`);
      }
      if (name === 'no-write-feed') writeFeed = false;
      else pretty = false;
      continue;
    }
    if (!isValueOption(name)) {
      throw new InvalidArgumentsError(`Unknown option --${name}. Pass downloader options after --`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new InvalidArgumentsError(`--${name} needs a value`);
      }
      value = next;
      i++;
    }
    values.set(name, value);
  }

  const [feedPath, baseUrl, ...extraPositionals] = positionals;
  if (feedPath === undefined || baseUrl === undefined) {
    throw new InvalidArgumentsError('Missing required arguments <feed-file> and <base-url>');
  }

  const options: FeedSyncOptions = {
    feedPath,
    baseUrl: parseHttpUrl('<base-url>', baseUrl),
    writeFeed,
    pretty,
    downloaderArgs: [...extraPositionals, ...downloaderArgs],
  };

  const playlistUrl = values.get('playlist-url');
  if (playlistUrl !== undefined) options.playlistUrl = parseHttpUrl('--playlist-url', playlistUrl);

  const limit = values.get('limit');
  options.limit = limit === undefined ? DEFAULT_PLAYLIST_LIMIT : parseCount('limit', limit, 1);

  const keep = values.get('keep');
  if (keep !== undefined) options.keep = parseCount('keep', keep, 0);

  const mediaDir = values.get('media-dir');
  if (mediaDir !== undefined) options.mediaDir = mediaDir;

  const missingEpisodes = values.get('missing-episodes');
  if (missingEpisodes !== undefined) {
    options.missingEpisodePolicy = parseChoice('missing-episodes', missingEpisodes, MISSING_EPISODE_POLICIES);
  }

  const incompleteEpisodes = values.get('incomplete-episodes');
  if (incompleteEpisodes !== undefined) {
    options.incompleteEpisodePolicy = parseChoice('incomplete-episodes', incompleteEpisodes, INCOMPLETE_EPISODE_POLICIES);
  }

  return { kind: 'sync', options };
}
