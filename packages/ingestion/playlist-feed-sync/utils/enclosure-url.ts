/** Enclosure URL = base URL (trailing slashes dropped) + "/" + URL-encoded media path segments */
export function buildEnclosureUrl(baseUrl: string, mediaPath: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  const encodedPath = mediaPath
    .split('/')
    .filter(segment => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
  return `${base}/${encodedPath}`;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Not valid percent-encoding, keep the segment as written
    return segment;
  }
}

// Decoded segments may hide separators (%2F) or dot segments (%2E%2E); neither may leave the media directory
function toRelativeMediaPath(decodedSegments: string[]): string {
  return decodedSegments
    .flatMap(segment => segment.split(/[\\/]/))
    .filter(segment => segment.length > 0 && segment !== '.' && segment !== '..')
    .join('/');
}

/**
 * Recover the media path from an enclosure URL written by buildEnclosureUrl.
 * URLs under a different base (the base URL changed since the feed was written)
 * fall back to their last path segment.
 */
export function mediaPathFromEnclosureUrl(enclosureUrl: string, baseUrl: string): string {
  const base = baseUrl.replace(/\/+$/, '');

  if (enclosureUrl.startsWith(`${base}/`)) {
    return toRelativeMediaPath(enclosureUrl.slice(base.length + 1).split('/').map(safeDecode));
  }

  let pathname = enclosureUrl;
  try {
    pathname = new URL(enclosureUrl).pathname;
  } catch {
    // Relative or otherwise unparsable URL, use it as a path
  }
  const segments = toRelativeMediaPath(pathname.split('/').map(safeDecode)).split('/');
  return segments[segments.length - 1] ?? '';
}
