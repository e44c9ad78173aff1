import { log } from '@playlist-podcaster/logging';

/** Seconds to the H:MM:SS form podcast clients show, e.g. 706 -> "0:11:46" */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const remainder = seconds % 60;

  return `${hours}:${String(minutes).padStart(2, '0')}:${String(remainder).padStart(2, '0')}`;
}

// Helper to parse itunes:duration (e.g., "HH:MM:SS", "MM:SS", or total seconds)
export function parseDuration(durationStr?: string): number | undefined {
  if (!durationStr) return undefined;
  const trimmed = durationStr.trim();
  if (/^\d+$/.test(trimmed)) { // Check if it's just seconds
    return parseInt(trimmed, 10);
  }
  if (!/^\d+(:\d+){1,2}$/.test(trimmed)) {
    log.warn(`Could not parse duration: ${durationStr}`);
    return undefined;
  }

  const parts = trimmed.split(':').map(Number);
  if (parts.length === 3) { // HH:MM:SS
    return parts[0] * 3600 + parts[1] * 60 + parts[2];
  }
  return parts[0] * 60 + parts[1]; // MM:SS
}
