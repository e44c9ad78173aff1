import * as path from 'path';
import fs from 'fs-extra';
import { log } from '@playlist-podcaster/logging';
import { DownloadFailedWarning } from '@playlist-podcaster/errors';
import type { Channel, Episode, MediaDownloader } from '@playlist-podcaster/types';

export interface DownloadOptions {
  episodeIds: readonly string[];
  mediaDir: string;
  downloaderArgs: readonly string[];
}

export interface DownloadResult {
  channel: Channel;
  resolvedEpisodeIds: string[];
  failures: DownloadFailedWarning[];
}

/**
 * Absolute location of an episode's media file.
 * Throws when the media path would resolve to the media directory itself or outside it.
 */
export function getEpisodeMediaFilePath(mediaDir: string, episode: Episode): string {
  const root = path.resolve(mediaDir);
  const filePath = path.resolve(root, episode.enclosure.mediaPath);
  const relative = path.relative(root, filePath);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Media path "${episode.enclosure.mediaPath}" of episode ${episode.id} is outside ${root}`);
  }
  return filePath;
}

// Size of a usable local media file, or undefined if there is none
async function getLocalMediaSize(filePath: string): Promise<number | undefined> {
  if (!(await fs.pathExists(filePath))) return undefined;
  const stats = await fs.stat(filePath);
  return stats.size > 0 ? stats.size : undefined;
}

async function resolveEpisodeMedia(
  episode: Episode,
  downloader: MediaDownloader,
  options: DownloadOptions
): Promise<number> {
  const filePath = getEpisodeMediaFilePath(options.mediaDir, episode);

  const existingSize = await getLocalMediaSize(filePath);
  if (existingSize !== undefined) {
    log.debug(`Media for ${episode.id} already present at ${filePath}`);
    return existingSize;
  }

  // An empty leftover would block a download that refuses to overwrite
  await fs.remove(filePath);

  log.info(`⬇️ Downloading ${episode.id} - ${episode.title}`);
  await downloader.downloadMedia({
    entryId: episode.id,
    sourceUrl: episode.link,
    outputPath: filePath,
    extraArgs: options.downloaderArgs,
  });

  const downloadedSize = await getLocalMediaSize(filePath);
  if (downloadedSize === undefined) {
    throw new Error(`Downloader finished but ${filePath} is missing or empty`);
  }
  return downloadedSize;
}

/**
 * Fetch media for the listed episodes one at a time and record each file's size as its
 * enclosure length. A failed episode stays unresolved and is reported, not thrown.
 */
export async function downloadMissingMedia(
  channel: Channel,
  downloader: MediaDownloader,
  options: DownloadOptions
): Promise<DownloadResult> {
  const wanted = new Set(options.episodeIds);
  const lengths = new Map<string, number>();
  const failures: DownloadFailedWarning[] = [];

  if (wanted.size > 0) {
    await fs.ensureDir(options.mediaDir);
  }

  for (const episode of channel.episodes) {
    if (!wanted.has(episode.id)) continue;

    try {
      const length = await resolveEpisodeMedia(episode, downloader, options);
      lengths.set(episode.id, length);
    } catch (error) {
      const warning = new DownloadFailedWarning(episode.id, error);
      log.error(`❌ ${warning.message}`, error);
      failures.push(warning);
    }
  }

  const episodes = channel.episodes.map(episode => {
    const length = lengths.get(episode.id);
    if (length === undefined) return episode;
    return { ...episode, enclosure: { ...episode.enclosure, length } };
  });

  if (lengths.size > 0) {
    log.info(`✅ Media ready for ${lengths.size} episodes`);
  }

  return {
    channel: { ...channel, episodes },
    resolvedEpisodeIds: [...lengths.keys()],
    failures,
  };
}
