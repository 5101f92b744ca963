import locationKeywords from '../data/location-keywords.json';
import { NormalizedUrl } from '../types/job';
import { logger } from '../utils/logger';

export interface LocationKeywordOptions {
  extraAllowed?: string[];
  extraDisallowed?: string[];
}

export type LocationVerdict =
  | { disallowed: false; matched: 'allowed'; keyword: string }
  | { disallowed: true; matched: 'disallowed' | 'path-segment'; keyword: string }
  | { disallowed: false; matched: 'none' };

interface KeywordMatcher {
  keyword: string;
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keyword must be bounded by non-alphanumeric characters or string edges,
// so "sf" does not hit "staff" and "ny" does not hit "nyíregyháza"
function toMatcher(keyword: string): KeywordMatcher {
  return {
    keyword,
    pattern: new RegExp(
      `(?:[^\\p{L}\\p{N}_]|^)${escapeRegExp(keyword)}(?:[^\\p{L}\\p{N}_]|$)`,
      'u'
    ),
  };
}

function dedupeLower(values: string[]): string[] {
  return [...new Set(values.map(v => v.trim().toLowerCase()).filter(v => v.length > 0))];
}

/**
 * Decides whether a posting's location is acceptable
 *
 * Allowed keywords are scanned first and win outright; disallowed keywords
 * are only consulted when no allowed keyword is present. Links with no
 * location evidence are kept.
 */
export class LocationFilter {
  private readonly allowed: KeywordMatcher[];
  private readonly disallowed: KeywordMatcher[];
  private readonly pathSegments: string[];

  constructor(options: LocationKeywordOptions = {}) {
    const extraDisallowed = dedupeLower(options.extraDisallowed ?? []);

    this.allowed = dedupeLower([...locationKeywords.allowed, ...(options.extraAllowed ?? [])]).map(
      toMatcher
    );
    this.disallowed = dedupeLower([
      ...locationKeywords.disallowed,
      ...extraDisallowed.filter(k => !k.startsWith('/')),
    ]).map(toMatcher);
    this.pathSegments = dedupeLower([
      ...locationKeywords.disallowedPathSegments,
      ...extraDisallowed.filter(k => k.startsWith('/')),
    ]);
  }

  /**
   * Returns the keyword that decided the outcome
   */
  explain(url: NormalizedUrl, anchorText: string): LocationVerdict {
    const lowerUrl = url.toLowerCase();
    const corpus = buildCorpus(lowerUrl, anchorText);

    for (const matcher of this.allowed) {
      if (matcher.pattern.test(corpus)) {
        return { disallowed: false, matched: 'allowed', keyword: matcher.keyword };
      }
    }

    for (const segment of this.pathSegments) {
      if (lowerUrl.includes(segment)) {
        return { disallowed: true, matched: 'path-segment', keyword: segment };
      }
    }

    for (const matcher of this.disallowed) {
      if (matcher.pattern.test(corpus)) {
        return { disallowed: true, matched: 'disallowed', keyword: matcher.keyword };
      }
    }

    return { disallowed: false, matched: 'none' };
  }

  isDisallowed(url: NormalizedUrl, anchorText: string): boolean {
    const verdict = this.explain(url, anchorText);
    if (verdict.matched !== 'none') {
      logger.debug(`Location keyword matched`, {
        url,
        matched: verdict.matched,
        keyword: verdict.keyword,
      });
    }
    return verdict.disallowed;
  }
}

/**
 * Lowercased URL plus anchor text with list separators turned into spaces
 */
export function buildCorpus(lowerUrl: string, anchorText: string): string {
  if (!anchorText) {
    return lowerUrl;
  }
  return `${lowerUrl} ${anchorText.toLowerCase().replace(/[,()/]/g, ' ')}`;
}
