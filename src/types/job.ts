/**
 * An anchor as found on a rendered career page
 */
export interface RawLink {
  href: string;
  anchorText: string;
  sourcePageUrl: string;
}

/**
 * Absolute URL with no query string, no fragment and no trailing slash
 */
export type NormalizedUrl = string;

/**
 * Deduplication identity: `host::descriptive/path`
 */
export type JobKey = string;

/**
 * A posting accepted during a scan
 * The key only decides admission and never leaves the core
 */
export interface JobRecord {
  url: NormalizedUrl;
  firstSeenAt: Date;
  key: JobKey;
}

/**
 * Persisted (and externally visible) form of a job link
 */
export interface StoredJobLink {
  url: string;
  firstSeenAt: Date;
}

export type RejectionReason =
  | 'not-navigable'
  | 'self-link'
  | 'not-posting-shaped'
  | 'disallowed-location'
  | 'no-key'
  | 'duplicate-session'
  | 'duplicate-historical';

export type ClassifyResult =
  | { status: 'accepted'; record: JobRecord }
  | { status: 'rejected'; reason: RejectionReason; url?: NormalizedUrl };
