import log from 'loglevel';

const LOG_LEVELS: readonly log.LogLevelNames[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevelName(value: string): value is log.LogLevelNames {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve the level from LOG_LEVEL. Unknown values fall back to 'info',
 * 'silent' turns logging off entirely.
 */
export function resolveLogLevel(value: string | undefined): log.LogLevelNames | 'silent' {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'silent') return 'silent';
  if (normalized && isLogLevelName(normalized)) return normalized;
  return 'info';
}

export const logLevel = resolveLogLevel(
  typeof process !== 'undefined' ? process.env?.LOG_LEVEL : undefined
);

// All levels go to stderr; stdout is reserved for a feed printed with --no-write-feed
log.methodFactory = () => (...message: unknown[]) => console.error(...message);
log.setLevel(logLevel);

export { log };
