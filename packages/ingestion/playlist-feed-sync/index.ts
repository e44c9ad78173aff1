export { runFeedSync } from './utils/run-feed-sync.js';
export type { FeedSyncOptions, FeedSyncCollaborators, FeedSyncResult } from './utils/run-feed-sync.js';
export { loadChannel, saveChannel, parseChannel, createEmptyChannel } from './utils/feed-repository.js';
export { mergePlaylistIntoChannel } from './utils/merge-playlist-into-channel.js';
export { pruneEpisodes } from './utils/prune-episodes.js';
export { downloadMissingMedia } from './utils/download-missing-media.js';
export { renderFeedXml } from './utils/render-feed-xml.js';
export { parseCliArgs } from './utils/parse-cli-args.js';
