/** Number of playlist entries requested from the downloader per run, unless overridden */
export const DEFAULT_PLAYLIST_LIMIT = 30;

/** Media container every download is merged into */
export const MEDIA_FILE_EXTENSION = 'mp4';
export const ENCLOSURE_MIME_TYPE = 'video/mp4';

export const DEFAULT_YT_DLP_PATH = 'yt-dlp';
export const DEFAULT_EXTRACTION_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 60 * 60 * 1000;

// Prefer AVC video in an MP4 container so podcast clients can play it without transcoding
export const DEFAULT_DOWNLOAD_FORMAT =
  'bestvideo[ext=mp4][vcodec^=avc1]+bestaudio[ext=m4a]/best[ext=mp4][vcodec^=avc1]/best[ext=mp4]/best';

export const ITUNES_NAMESPACE_URL = 'http://www.itunes.com/dtds/podcast-1.0.dtd';
export const FEED_GENERATOR = 'playlist-podcaster';
export const ITUNES_CATEGORY = 'TV & Film';

/** Suffix of the sibling file a feed is written to before being renamed into place */
export const TEMP_FEED_SUFFIX = '.tmp';
