export {
  FeedSyncError,
  ExtractionError,
  DegeneratePlaylistError,
  MalformedFeedError,
  IncompleteEpisodeError,
  MissingPlaylistUrlError,
  InvalidArgumentsError
} from './errors.js';

export { EmptyExtractionWarning, DownloadFailedWarning } from './warnings.js';
export type { SyncWarning } from './warnings.js';
