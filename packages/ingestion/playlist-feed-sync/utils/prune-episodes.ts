import { log } from '@playlist-podcaster/logging';
import type { Channel, Episode } from '@playlist-podcaster/types';

export interface PruneResult {
  channel: Channel;
  removedEpisodes: Episode[];
}

/**
 * Keep only the newest `keep` episodes. Without `keep` the channel is returned as is.
 */
export function pruneEpisodes(channel: Channel, keep?: number): PruneResult {
  if (keep === undefined || channel.episodes.length <= keep) {
    return { channel, removedEpisodes: [] };
  }

  const removedEpisodes = channel.episodes.slice(keep);
  log.info(`✂️ Pruning ${removedEpisodes.length} episodes beyond the newest ${keep}`);

  return {
    channel: { ...channel, episodes: channel.episodes.slice(0, keep) },
    removedEpisodes,
  };
}
