export { getFeedSyncConfig } from './feed-sync-config.js';
export type { FeedSyncConfig } from './feed-sync-config.js';
