export {
  createYtDlpClient,
  runYtDlp,
  parsePlaylistOutput,
  parseUploadDate,
  assertPlaylistNotDegenerate,
  buildEnumerateArgs,
  buildDownloadArgs
} from './client.js';

export type {
  YtDlpClient,
  YtDlpClientOptions,
  YtDlpResult,
  SpawnProcess,
  SpawnedProcess
} from './client.js';
