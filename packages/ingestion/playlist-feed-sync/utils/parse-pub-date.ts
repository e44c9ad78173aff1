/**
 * Parse an RSS pubDate (RFC 2822, as written by Date#toUTCString) or an ISO 8601 string.
 * Returns an invalid Date when the value cannot be parsed; callers check with isNaN(getTime()).
 */
export function parsePubDate(pubDateStr: string): Date {
  return new Date(pubDateStr.trim());
}

/** RFC 2822 in UTC, second precision */
export function formatPubDate(date: Date): string {
  return date.toUTCString();
}
