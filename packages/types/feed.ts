export interface Enclosure {
  mediaPath: string; // relative to the media directory, e.g. "dQw4w9WgXcQ.mp4"
  type: string;
  length?: number; // bytes; undefined until the media file exists locally
}

export interface Episode {
  id: string; // feed GUID, never changes once created
  title: string;
  description: string;
  link?: string;
  thumbnailUrl?: string;
  publishedAt: Date; // when the entry was first discovered
  durationInSeconds: number;
  enclosure: Enclosure;
}

export interface Channel {
  title: string;
  link: string; // playlist URL
  description: string;
  baseUrl: string;
  episodes: Episode[]; // newest first
}

export type MissingEpisodePolicy = 'keep' | 'drop';
export type IncompleteEpisodePolicy = 'retain' | 'skip' | 'fail';

export type FeedDestination =
  | { kind: 'file'; path: string }
  | { kind: 'stdout' };

export interface RenderFeedOptions {
  pretty: boolean;
  incompleteEpisodePolicy: IncompleteEpisodePolicy;
}
