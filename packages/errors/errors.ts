// Fatal errors: each one aborts a sync run before anything is written

export class FeedSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FeedSyncError';
  }
}

/** The downloader failed to start, timed out, exited non-zero or printed something unusable */
export class ExtractionError extends FeedSyncError {
  readonly exitCode?: number | null;
  readonly stderr?: string;

  constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'ExtractionError';
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/**
 * Every entry came back with a zero duration. That is what a channel tab listing looks like,
 * so the URL most likely points at the wrong page.
 */
export class DegeneratePlaylistError extends FeedSyncError {
  readonly entryCount: number;

  constructor(playlistUrl: string, entryCount: number) {
    super(
      `All ${entryCount} entries of ${playlistUrl} have a duration of zero. ` +
      'This usually means the URL is a channel tab rather than a playlist.'
    );
    this.name = 'DegeneratePlaylistError';
    this.entryCount = entryCount;
  }
}

export class MalformedFeedError extends FeedSyncError {
  readonly feedPath: string;

  constructor(feedPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Existing feed ${feedPath} is malformed: ${reason}`, options);
    this.name = 'MalformedFeedError';
    this.feedPath = feedPath;
  }
}

export class IncompleteEpisodeError extends FeedSyncError {
  readonly episodeId: string;

  constructor(episodeId: string) {
    super(`Episode ${episodeId} has no resolved enclosure length; its media has not been downloaded`);
    this.name = 'IncompleteEpisodeError';
    this.episodeId = episodeId;
  }
}

export class MissingPlaylistUrlError extends FeedSyncError {
  constructor(feedPath: string) {
    super(
      `No playlist URL given and ${feedPath} does not link to one. ` +
      'Pass --playlist-url when creating a new feed.'
    );
    this.name = 'MissingPlaylistUrlError';
  }
}

export class InvalidArgumentsError extends FeedSyncError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}
