import { describe, it, expect, vi, beforeEach } from 'vitest';
import { log } from '@playlist-podcaster/logging';
import { getFeedSyncConfig } from './feed-sync-config.js';

vi.mock('@playlist-podcaster/logging', () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('getFeedSyncConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should use defaults when nothing is set', () => {
    const config = getFeedSyncConfig({});

    expect(config.ytDlpPath).toBe('yt-dlp');
    expect(config.extractionTimeoutMs).toBe(600000);
    expect(config.downloadTimeoutMs).toBe(3600000);
    expect(config.downloadFormat).toBe(
      'bestvideo[ext=mp4][vcodec^=avc1]+bestaudio[ext=m4a]/best[ext=mp4][vcodec^=avc1]/best[ext=mp4]/best'
    );
  });

  it('should read values from the environment', () => {
    const config = getFeedSyncConfig({
      YT_DLP_PATH: '/opt/bin/yt-dlp',
      YT_DLP_EXTRACTION_TIMEOUT_MS: '5000',
      YT_DLP_DOWNLOAD_TIMEOUT_MS: '90000',
      YT_DLP_FORMAT: 'best'
    });

    expect(config).toEqual({
      ytDlpPath: '/opt/bin/yt-dlp',
      extractionTimeoutMs: 5000,
      downloadTimeoutMs: 90000,
      downloadFormat: 'best'
    });
  });

  it('should fall back to the default and warn on invalid timeouts', () => {
    const config = getFeedSyncConfig({
      YT_DLP_EXTRACTION_TIMEOUT_MS: 'ten minutes',
      YT_DLP_DOWNLOAD_TIMEOUT_MS: '0'
    });

    expect(config.extractionTimeoutMs).toBe(600000);
    expect(config.downloadTimeoutMs).toBe(3600000);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledWith(
      'Ignoring YT_DLP_EXTRACTION_TIMEOUT_MS="ten minutes", expected a positive integer. Using 600000.'
    );
  });

  it('should treat blank values as unset', () => {
    expect(getFeedSyncConfig({ YT_DLP_PATH: '   ' }).ytDlpPath).toBe('yt-dlp');
  });
});
