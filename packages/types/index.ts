export type {
  PlaylistEntry,
  PlaylistListing,
  EnumeratePlaylistOptions,
  MediaDownloadRequest,
  PlaylistExtractor,
  MediaDownloader
} from './playlist.js';

export type {
  Enclosure,
  Episode,
  Channel,
  MissingEpisodePolicy,
  IncompleteEpisodePolicy,
  FeedDestination,
  RenderFeedOptions
} from './feed.js';
