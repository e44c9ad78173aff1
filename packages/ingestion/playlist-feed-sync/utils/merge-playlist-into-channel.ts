import { log } from '@playlist-podcaster/logging';
import { EmptyExtractionWarning } from '@playlist-podcaster/errors';
import type { SyncWarning } from '@playlist-podcaster/errors';
import { ENCLOSURE_MIME_TYPE, MEDIA_FILE_EXTENSION } from '@playlist-podcaster/constants';
import type {
  Channel,
  Episode,
  MissingEpisodePolicy,
  PlaylistEntry,
  PlaylistListing
} from '@playlist-podcaster/types';

export interface MergeOptions {
  playlistUrl: string;
  now: Date; // captured once per run; every new episode gets this publish time
  missingEpisodePolicy?: MissingEpisodePolicy;
}

export interface MergeResult {
  channel: Channel;
  newEpisodeIds: string[];
  needsMediaIds: string[];
  droppedEpisodeIds: string[];
  warnings: SyncWarning[];
}

export function getEpisodeMediaPath(episodeId: string): string {
  return `${episodeId}.${MEDIA_FILE_EXTENSION}`;
}

export function createEpisodeFromEntry(entry: PlaylistEntry, publishedAt: Date): Episode {
  return {
    id: entry.id,
    title: entry.title,
    description: entry.description,
    link: entry.sourceUrl,
    thumbnailUrl: entry.thumbnailUrl,
    publishedAt,
    durationInSeconds: entry.durationInSeconds,
    enclosure: {
      mediaPath: getEpisodeMediaPath(entry.id),
      type: ENCLOSURE_MIME_TYPE,
    },
  };
}

// A channel read from disk keeps its own metadata; only a brand new one takes the playlist's
function fillChannelMetadata(channel: Channel, listing: PlaylistListing, playlistUrl: string): Channel {
  if (channel.title) return channel;

  const title = listing.title ?? playlistUrl;
  return {
    ...channel,
    title,
    link: channel.link || listing.webpageUrl || playlistUrl,
    description: channel.description || `Podcast feed for ${title}`,
  };
}

/**
 * Reconcile a fresh playlist enumeration with the stored channel.
 *
 * Existing episodes are matched by id and never touched: their GUID and publish date are
 * what subscribers have already seen. Unmatched entries become new episodes published at
 * `now`, placed ahead of everything else in extractor order. The input channel is not modified.
 */
export function mergePlaylistIntoChannel(
  channel: Channel,
  listing: PlaylistListing,
  options: MergeOptions
): MergeResult {
  const missingEpisodePolicy = options.missingEpisodePolicy ?? 'keep';
  const baseChannel = fillChannelMetadata(channel, listing, options.playlistUrl);

  const unresolvedIds = (episodes: Episode[]) =>
    episodes.filter(episode => episode.enclosure.length === undefined).map(episode => episode.id);

  if (listing.entries.length === 0) {
    const warning = new EmptyExtractionWarning(options.playlistUrl);
    log.warn(warning.message);
    return {
      channel: { ...baseChannel, episodes: [...baseChannel.episodes] },
      newEpisodeIds: [],
      needsMediaIds: unresolvedIds(baseChannel.episodes),
      droppedEpisodeIds: [],
      warnings: [warning],
    };
  }

  const existingById = new Map<string, Episode>();
  for (const episode of baseChannel.episodes) {
    existingById.set(episode.id, episode);
  }

  const newEpisodes: Episode[] = [];
  const listedIds = new Set<string>();

  for (const entry of listing.entries) {
    if (listedIds.has(entry.id)) continue;
    listedIds.add(entry.id);

    if (existingById.has(entry.id)) {
      log.debug(`Already in feed: ${entry.id}`);
      continue;
    }

    newEpisodes.push(createEpisodeFromEntry(entry, options.now));
    log.info(`🆕 New episode: ${entry.id} - ${entry.title}`);
  }

  let retainedEpisodes = baseChannel.episodes;
  const droppedEpisodeIds: string[] = [];
  if (missingEpisodePolicy === 'drop') {
    retainedEpisodes = baseChannel.episodes.filter(episode => {
      if (listedIds.has(episode.id)) return true;
      droppedEpisodeIds.push(episode.id);
      return false;
    });
    if (droppedEpisodeIds.length > 0) {
      log.info(`Dropping ${droppedEpisodeIds.length} episodes no longer listed in the playlist`);
    }
  }

  const episodes = [...newEpisodes, ...retainedEpisodes];

  return {
    channel: { ...baseChannel, episodes },
    newEpisodeIds: newEpisodes.map(episode => episode.id),
    needsMediaIds: unresolvedIds(episodes),
    droppedEpisodeIds,
    warnings: [],
  };
}
