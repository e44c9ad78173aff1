import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import { log } from '@playlist-podcaster/logging';
import {
  DEFAULT_YT_DLP_PATH,
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
  DEFAULT_DOWNLOAD_FORMAT,
  MEDIA_FILE_EXTENSION
} from '@playlist-podcaster/constants';
import { ExtractionError, DegeneratePlaylistError } from '@playlist-podcaster/errors';
import type {
  PlaylistEntry,
  PlaylistListing,
  PlaylistExtractor,
  MediaDownloader,
  EnumeratePlaylistOptions,
  MediaDownloadRequest
} from '@playlist-podcaster/types';

// The subset of ChildProcess the client relies on, so tests can hand in a fake
export interface SpawnedProcess extends EventEmitter {
  stdout: EventEmitter | null;
  stderr: EventEmitter | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnProcess = (command: string, args: string[]) => SpawnedProcess;

export interface YtDlpClientOptions {
  ytDlpPath?: string;
  extractionTimeoutMs?: number;
  downloadTimeoutMs?: number;
  downloadFormat?: string;
  spawnProcess?: SpawnProcess;
}

export interface YtDlpResult {
  stdout: string;
  stderr: string;
}

export type YtDlpClient = PlaylistExtractor & MediaDownloader;

const defaultSpawnProcess: SpawnProcess = (command, args) => spawn(command, args);

/**
 * Run yt-dlp to completion, collecting its output.
 * Rejects with ExtractionError on spawn failure, timeout or a non-zero exit code.
 */
export function runYtDlp(
  spawnProcess: SpawnProcess,
  ytDlpPath: string,
  args: string[],
  timeoutMs: number
): Promise<YtDlpResult> {
  log.debug(`Running: ${ytDlpPath} ${args.join(' ')}`);

  return new Promise((resolve, reject) => {
    // Decoded once at the end; a multi-byte character can straddle two chunks
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const decode = (chunks: Buffer[]) => Buffer.concat(chunks).toString('utf8');
    let settled = false;

    let child: SpawnedProcess;
    try {
      child = spawnProcess(ytDlpPath, args);
    } catch (error) {
      reject(new ExtractionError(`Could not start ${ytDlpPath}`, { cause: error }));
      return;
    }

    const timeout = setTimeout(() => {
      if (settled) return;
      settled = true;
      log.warn(`${ytDlpPath} timed out after ${timeoutMs}ms, killing it`);
      child.kill('SIGKILL');
      reject(new ExtractionError(`${ytDlpPath} timed out after ${timeoutMs}ms`, { stderr: decode(stderrChunks) }));
    }, timeoutMs);

    child.stdout?.on('data', (data: Buffer | string) => {
      stdoutChunks.push(Buffer.isBuffer(data) ? data : Buffer.from(data));
    });

    child.stderr?.on('data', (data: Buffer | string) => {
      stderrChunks.push(Buffer.isBuffer(data) ? data : Buffer.from(data));
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;

      const stdout = decode(stdoutChunks);
      const stderr = decode(stderrChunks);
      if (code !== 0) {
        reject(new ExtractionError(
          `${ytDlpPath} exited with code ${code}: ${stderr.trim()}`,
          { exitCode: code, stderr }
        ));
        return;
      }
      resolve({ stdout, stderr });
    });

    child.on('error', (error: Error) => {
      clearTimeout(timeout);
      if (settled) return;
      settled = true;
      reject(new ExtractionError(`${ytDlpPath} spawn error: ${error.message}`, { cause: error }));
    });
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

// upload_date comes as YYYYMMDD
export function parseUploadDate(value: unknown): Date | undefined {
  if (typeof value !== 'string') return undefined;
  const match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!match) return undefined;

  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return isNaN(date.getTime()) ? undefined : date;
}

function parseDurationSeconds(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return 0;
  return Math.round(value);
}

function toPlaylistEntry(raw: Record<string, unknown>, index: number): PlaylistEntry {
  // Trimmed the same way the feed repository trims a stored guid
  const id = typeof raw.id === 'string' ? raw.id.trim() : '';
  if (id === '') {
    throw new ExtractionError(`Playlist entry #${index + 1} has no id`);
  }

  return {
    id,
    title: optionalString(raw.title) ?? id,
    description: typeof raw.description === 'string' ? raw.description : '',
    uploadedAt: parseUploadDate(raw.upload_date),
    durationInSeconds: parseDurationSeconds(raw.duration),
    thumbnailUrl: optionalString(raw.thumbnail),
    sourceUrl: optionalString(raw.webpage_url) ?? optionalString(raw.url),
  };
}

/**
 * Turn the JSON printed by `yt-dlp --dump-single-json` into a listing.
 * Unavailable entries come back as null and are skipped; a repeated id keeps its first occurrence.
 */
export function parsePlaylistOutput(stdout: string): PlaylistListing {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new ExtractionError('Could not parse yt-dlp output as JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ExtractionError('yt-dlp output is not a JSON object');
  }

  if (parsed._type !== 'playlist') {
    throw new ExtractionError('This URL points to a single video, not a playlist');
  }

  if (!Array.isArray(parsed.entries)) {
    throw new ExtractionError('yt-dlp playlist output has no entries array');
  }

  const entries: PlaylistEntry[] = [];
  const seenIds = new Set<string>();

  parsed.entries.forEach((rawEntry: unknown, index: number) => {
    if (rawEntry === null) {
      log.debug(`Skipping unavailable playlist entry #${index + 1}`);
      return;
    }
    if (!isRecord(rawEntry)) {
      throw new ExtractionError(`Playlist entry #${index + 1} is not an object`);
    }

    const entry = toPlaylistEntry(rawEntry, index);
    if (seenIds.has(entry.id)) {
      log.warn(`Playlist lists ${entry.id} more than once, keeping the first occurrence`);
      return;
    }
    seenIds.add(entry.id);
    entries.push(entry);
  });

  return {
    title: optionalString(parsed.title),
    webpageUrl: optionalString(parsed.webpage_url),
    entries,
  };
}

/**
 * A listing where every entry has a zero duration is what a channel's tab page looks like,
 * not a playlist. Checked once, over the whole enumeration.
 */
export function assertPlaylistNotDegenerate(playlistUrl: string, entries: readonly PlaylistEntry[]): void {
  if (entries.length > 0 && entries.every(entry => entry.durationInSeconds === 0)) {
    throw new DegeneratePlaylistError(playlistUrl, entries.length);
  }
}

export function buildEnumerateArgs(playlistUrl: string, options: EnumeratePlaylistOptions): string[] {
  const args = ['--dump-single-json', '--no-warnings'];
  if (options.limit !== undefined) {
    args.push('--playlist-end', options.limit.toString());
  }
  args.push(...options.extraArgs, '--', playlistUrl);
  return args;
}

// yt-dlp treats --output as a template, so literal percent signs must be doubled
function escapeOutputTemplate(outputPath: string): string {
  return outputPath.replace(/%/g, '%%');
}

export function buildDownloadArgs(request: MediaDownloadRequest, downloadFormat: string): string[] {
  return [
    '--format', downloadFormat,
    '--merge-output-format', MEDIA_FILE_EXTENSION,
    '--no-progress',
    '--no-overwrites',
    '--no-playlist',
    '--output', escapeOutputTemplate(request.outputPath),
    ...request.extraArgs,
    '--',
    request.sourceUrl ?? request.entryId,
  ];
}

export function createYtDlpClient(options: YtDlpClientOptions = {}): YtDlpClient {
  const ytDlpPath = options.ytDlpPath ?? DEFAULT_YT_DLP_PATH;
  const extractionTimeoutMs = options.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
  const downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  const downloadFormat = options.downloadFormat ?? DEFAULT_DOWNLOAD_FORMAT;
  const spawnProcess = options.spawnProcess ?? defaultSpawnProcess;

  return {
    async enumeratePlaylist(playlistUrl: string, enumerateOptions: EnumeratePlaylistOptions): Promise<PlaylistListing> {
      log.info(`📋 Enumerating playlist ${playlistUrl}`);
      const { stdout } = await runYtDlp(
        spawnProcess,
        ytDlpPath,
        buildEnumerateArgs(playlistUrl, enumerateOptions),
        extractionTimeoutMs
      );

      const listing = parsePlaylistOutput(stdout);
      assertPlaylistNotDegenerate(playlistUrl, listing.entries);
      log.info(`Found ${listing.entries.length} entries in "${listing.title ?? playlistUrl}"`);
      return listing;
    },

    async downloadMedia(request: MediaDownloadRequest): Promise<void> {
      log.debug(`Downloading ${request.entryId} to ${request.outputPath}`);
      await runYtDlp(
        spawnProcess,
        ytDlpPath,
        buildDownloadArgs(request, downloadFormat),
        downloadTimeoutMs
      );
    },
  };
}
