import { log } from '@playlist-podcaster/logging';
import {
  DEFAULT_YT_DLP_PATH,
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
  DEFAULT_DOWNLOAD_FORMAT
} from '@playlist-podcaster/constants';

export interface FeedSyncConfig {
  ytDlpPath: string;
  extractionTimeoutMs: number;
  downloadTimeoutMs: number;
  downloadFormat: string;
}

function readPositiveInteger(
  env: Record<string, string | undefined>,
  name: string,
  fallback: number
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw) || parseInt(raw, 10) === 0) {
    log.warn(`Ignoring ${name}="${raw}", expected a positive integer. Using ${fallback}.`);
    return fallback;
  }
  return parseInt(raw, 10);
}

function readString(env: Record<string, string | undefined>, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Read downloader settings from the environment:
 * YT_DLP_PATH, YT_DLP_EXTRACTION_TIMEOUT_MS, YT_DLP_DOWNLOAD_TIMEOUT_MS, YT_DLP_FORMAT
 */
export function getFeedSyncConfig(env: Record<string, string | undefined> = process.env): FeedSyncConfig {
  return {
    ytDlpPath: readString(env, 'YT_DLP_PATH', DEFAULT_YT_DLP_PATH),
    extractionTimeoutMs: readPositiveInteger(env, 'YT_DLP_EXTRACTION_TIMEOUT_MS', DEFAULT_EXTRACTION_TIMEOUT_MS),
    downloadTimeoutMs: readPositiveInteger(env, 'YT_DLP_DOWNLOAD_TIMEOUT_MS', DEFAULT_DOWNLOAD_TIMEOUT_MS),
    downloadFormat: readString(env, 'YT_DLP_FORMAT', DEFAULT_DOWNLOAD_FORMAT),
  };
}
