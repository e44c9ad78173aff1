export interface PlaylistEntry {
  id: string;
  title: string;
  description: string;
  uploadedAt?: Date; // UTC midnight of the upload day, when the platform reports one
  durationInSeconds: number; // 0 when unknown
  thumbnailUrl?: string;
  sourceUrl?: string;
}

export interface PlaylistListing {
  title?: string;
  webpageUrl?: string;
  entries: PlaylistEntry[]; // extractor order, not necessarily chronological
}

export interface EnumeratePlaylistOptions {
  limit?: number;
  extraArgs: readonly string[];
}

export interface MediaDownloadRequest {
  entryId: string;
  sourceUrl?: string;
  outputPath: string;
  extraArgs: readonly string[];
}

/** Lists the entries of a playlist */
export interface PlaylistExtractor {
  enumeratePlaylist(playlistUrl: string, options: EnumeratePlaylistOptions): Promise<PlaylistListing>;
}

/** Fetches one entry's media to a local path */
export interface MediaDownloader {
  downloadMedia(request: MediaDownloadRequest): Promise<void>;
}
