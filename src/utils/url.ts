import { NormalizedUrl } from '../types/job';

const NON_NAVIGABLE_PREFIXES = ['#', 'mailto:', 'tel:', 'javascript:'];

export type NormalizeResult =
  | { ok: true; url: NormalizedUrl }
  | { ok: false; failure: 'not-navigable' | 'malformed' };

/**
 * Resolves an anchor href against the page it was found on, then drops
 * everything from the first `?` or `#` and a single trailing slash
 */
export function normalizeHref(href: string, sourcePageUrl: string): NormalizeResult {
  const trimmed = href.trim();
  const lower = trimmed.toLowerCase();

  if (!trimmed || NON_NAVIGABLE_PREFIXES.some(prefix => lower.startsWith(prefix))) {
    return { ok: false, failure: 'not-navigable' };
  }

  let absolute: string;
  try {
    absolute = new URL(trimmed, sourcePageUrl).href;
  } catch {
    return { ok: false, failure: 'malformed' };
  }

  let cleaned = absolute.split('?', 1)[0].split('#', 1)[0];
  if (cleaned.endsWith('/')) {
    cleaned = cleaned.slice(0, -1);
  }

  return { ok: true, url: cleaned };
}

export function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

export function stripTrailingSlash(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value;
}
