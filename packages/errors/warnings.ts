// Non-fatal diagnostics, collected during a run and reported at the end

export class EmptyExtractionWarning {
  readonly kind = 'empty-extraction';
  readonly playlistUrl: string;

  constructor(playlistUrl: string) {
    this.playlistUrl = playlistUrl;
  }

  get message(): string {
    return `Playlist ${this.playlistUrl} returned no entries; leaving the feed unchanged`;
  }
}

export class DownloadFailedWarning {
  readonly kind = 'download-failed';
  readonly episodeId: string;
  readonly error: unknown;

  constructor(episodeId: string, error: unknown) {
    this.episodeId = episodeId;
    this.error = error;
  }

  get message(): string {
    const reason = this.error instanceof Error ? this.error.message : String(this.error);
    return `Media for episode ${this.episodeId} could not be downloaded: ${reason}`;
  }
}

export type SyncWarning = EmptyExtractionWarning | DownloadFailedWarning;
