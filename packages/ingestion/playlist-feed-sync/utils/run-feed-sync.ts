import * as path from 'path';
import fs from 'fs-extra';
import { log } from '@playlist-podcaster/logging';
import { MissingPlaylistUrlError } from '@playlist-podcaster/errors';
import type { SyncWarning } from '@playlist-podcaster/errors';
import { DEFAULT_PLAYLIST_LIMIT } from '@playlist-podcaster/constants';
import type {
  Episode,
  FeedDestination,
  IncompleteEpisodePolicy,
  MediaDownloader,
  MissingEpisodePolicy,
  PlaylistExtractor,
  RenderFeedOptions
} from '@playlist-podcaster/types';
import { downloadMissingMedia, getEpisodeMediaFilePath } from './download-missing-media.js';
import { loadChannel, saveChannel, type TextSink } from './feed-repository.js';
import { mergePlaylistIntoChannel } from './merge-playlist-into-channel.js';
import { pruneEpisodes } from './prune-episodes.js';
import { renderFeedXml } from './render-feed-xml.js';

export interface FeedSyncOptions {
  feedPath: string;
  baseUrl: string;
  playlistUrl?: string;
  limit?: number;
  keep?: number;
  writeFeed?: boolean;
  pretty?: boolean;
  mediaDir?: string;
  downloaderArgs?: readonly string[];
  missingEpisodePolicy?: MissingEpisodePolicy;
  incompleteEpisodePolicy?: IncompleteEpisodePolicy;
  now?: Date;
}

export interface FeedSyncCollaborators {
  extractor: PlaylistExtractor;
  downloader: MediaDownloader;
  stdout?: TextSink;
}

export interface FeedSyncResult {
  document: string;
  written: boolean;
  newEpisodeIds: string[];
  resolvedEpisodeIds: string[];
  removedEpisodeIds: string[];
  warnings: SyncWarning[];
}

async function removeEpisodeMedia(mediaDir: string, episodes: readonly Episode[]): Promise<void> {
  for (const episode of episodes) {
    try {
      const filePath = getEpisodeMediaFilePath(mediaDir, episode);
      await fs.remove(filePath);
      log.debug(`Removed ${filePath}`);
    } catch (error) {
      // The feed no longer points at it, so a leftover file is only wasted space
      log.warn(`Could not remove the media of episode ${episode.id}:`, error);
    }
  }
}

/**
 * One incremental sync of a feed file against its playlist:
 * load, enumerate, merge, prune, download, then write or print the feed.
 * Any thrown error happens before the feed file is touched.
 */
export async function runFeedSync(
  options: FeedSyncOptions,
  collaborators: FeedSyncCollaborators
): Promise<FeedSyncResult> {
  const limit = options.limit ?? DEFAULT_PLAYLIST_LIMIT;
  const mediaDir = options.mediaDir ?? path.dirname(path.resolve(options.feedPath));
  const downloaderArgs = options.downloaderArgs ?? [];
  const destination: FeedDestination = options.writeFeed === false
    ? { kind: 'stdout' }
    : { kind: 'file', path: options.feedPath };
  const renderOptions: RenderFeedOptions = {
    pretty: options.pretty ?? true,
    incompleteEpisodePolicy: options.incompleteEpisodePolicy ?? 'retain',
  };

  const loaded = await loadChannel(options.feedPath, { baseUrl: options.baseUrl });

  const playlistUrl = options.playlistUrl ?? (loaded.channel.link || undefined);
  if (!playlistUrl) {
    throw new MissingPlaylistUrlError(options.feedPath);
  }

  const listing = await collaborators.extractor.enumeratePlaylist(playlistUrl, {
    limit,
    extraArgs: downloaderArgs,
  });

  const merged = mergePlaylistIntoChannel(loaded.channel, listing, {
    playlistUrl,
    now: options.now ?? new Date(),
    missingEpisodePolicy: options.missingEpisodePolicy,
  });

  if (merged.warnings.length > 0 && loaded.existed && destination.kind === 'file') {
    log.info(`Leaving ${options.feedPath} untouched`);
    return {
      document: renderFeedXml(loaded.channel, renderOptions),
      written: false,
      newEpisodeIds: [],
      resolvedEpisodeIds: [],
      removedEpisodeIds: [],
      warnings: merged.warnings,
    };
  }

  if (options.keep !== undefined && options.keep < limit) {
    log.warn(`--keep ${options.keep} is below --limit ${limit}; entries beyond ${options.keep} will be re-added and pruned on every run`);
  }
  const pruned = pruneEpisodes(merged.channel, options.keep);

  const droppedEpisodes = loaded.channel.episodes.filter(episode => merged.droppedEpisodeIds.includes(episode.id));
  const removedEpisodes = [...droppedEpisodes, ...pruned.removedEpisodes];
  const keptIds = new Set(pruned.channel.episodes.map(episode => episode.id));

  const downloaded = await downloadMissingMedia(pruned.channel, collaborators.downloader, {
    episodeIds: merged.needsMediaIds.filter(id => keptIds.has(id)),
    mediaDir,
    downloaderArgs,
  });

  const document = await saveChannel(downloaded.channel, destination, renderOptions, collaborators.stdout);
  const written = destination.kind === 'file';

  // Only once the written feed no longer references them
  if (written) {
    await removeEpisodeMedia(mediaDir, removedEpisodes);
  }

  const warnings: SyncWarning[] = [...merged.warnings, ...downloaded.failures];
  log.info(
    `📊 ${merged.newEpisodeIds.length} new, ${downloaded.resolvedEpisodeIds.length} downloaded, ` +
    `${removedEpisodes.length} removed, ${warnings.length} warnings`
  );

  return {
    document,
    written,
    newEpisodeIds: merged.newEpisodeIds,
    resolvedEpisodeIds: downloaded.resolvedEpisodeIds,
    removedEpisodeIds: removedEpisodes.map(episode => episode.id),
    warnings,
  };
}
