import { JobKey, NormalizedUrl } from '../types/job';
import { logger } from './logger';

/**
 * Path segments that open the posting-identifying tail of a URL
 */
export const KEY_MARKERS: readonly string[] = ['/opp/', '/job/'];

/**
 * Derives the deduplication key for a posting URL:
 * - host (lowercased)
 * - path from the right-most marker to the end
 *
 * Returns null when no marker is present; such a link cannot be
 * deduplicated and must not be admitted.
 */
export function extractJobKey(url: NormalizedUrl): JobKey | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    logger.warn(`Could not parse URL for job key`, {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const path = parsed.pathname.replace(/\/+$/, '');
  const lowerPath = path.toLowerCase();

  let markerIndex = -1;
  let foundMarker: string | null = null;
  for (const marker of KEY_MARKERS) {
    const index = lowerPath.lastIndexOf(marker);
    if (index > markerIndex) {
      markerIndex = index;
      foundMarker = marker;
    }
  }

  if (foundMarker === null) {
    return null;
  }

  const descriptivePath = foundMarker + path.slice(markerIndex + foundMarker.length);
  return `${parsed.host.toLowerCase()}::${descriptivePath}`;
}
