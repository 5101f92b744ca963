import {
  ClassifyResult,
  JobKey,
  JobRecord,
  RawLink,
  RejectionReason,
  StoredJobLink,
} from '../types/job';
import { evaluatePosting } from '../filters/posting-classifier';
import { LocationFilter } from '../filters/location-filter';
import { extractJobKey } from '../utils/job-key';
import { normalizeHref } from '../utils/url';
import { logger } from '../utils/logger';
import {
  admitCandidate,
  createDedupState,
  DedupState,
  reconcileRecords,
} from './deduplication';

export interface PipelineStats {
  processed: number;
  accepted: number;
  rejected: Record<RejectionReason, number>;
}

export interface JobLinkPipelineOptions {
  locationFilter?: LocationFilter;
  now?: () => Date;
}

function emptyRejections(): Record<RejectionReason, number> {
  return {
    'not-navigable': 0,
    'self-link': 0,
    'not-posting-shaped': 0,
    'disallowed-location': 0,
    'no-key': 0,
    'duplicate-session': 0,
    'duplicate-historical': 0,
  };
}

/**
 * Decides, link by link, whether a raw anchor is a new job posting
 * No I/O happens here; callers feed links and read the result
 */
export class JobLinkPipeline {
  private readonly locationFilter: LocationFilter;
  private readonly now: () => Date;
  private readonly state: DedupState = createDedupState();
  private history: StoredJobLink[] = [];
  private accepted: JobRecord[] = [];
  private stats: PipelineStats = { processed: 0, accepted: 0, rejected: emptyRejections() };

  constructor(options: JobLinkPipelineOptions = {}) {
    this.locationFilter = options.locationFilter ?? new LocationFilter();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Seeds the historical key set
   */
  loadHistoryKeys(keys: Iterable<JobKey>): void {
    for (const key of keys) {
      this.state.historical.add(key);
    }
  }

  /**
   * Keeps stored links for finalize() and seeds their recomputed keys
   */
  loadHistory(links: readonly StoredJobLink[]): void {
    this.history = [...this.history, ...links];

    const keys: JobKey[] = [];
    for (const link of links) {
      const key = extractJobKey(link.url);
      if (key !== null) {
        keys.push(key);
      }
    }
    this.loadHistoryKeys(keys);

    logger.info(`Loaded history`, { links: links.length, keys: this.state.historical.size });
  }

  classify(link: RawLink): ClassifyResult {
    this.stats.processed++;
    const result = this.decide(link);

    if (result.status === 'accepted') {
      this.stats.accepted++;
      this.accepted.push(result.record);
    } else {
      this.stats.rejected[result.reason]++;
    }

    return result;
  }

  private decide(link: RawLink): ClassifyResult {
    const normalized = normalizeHref(link.href, link.sourcePageUrl);
    if (!normalized.ok) {
      if (normalized.failure === 'malformed') {
        logger.warn(`Skipping malformed link`, { href: link.href, page: link.sourcePageUrl });
      }
      return { status: 'rejected', reason: 'not-navigable' };
    }

    const url = normalized.url;
    const posting = evaluatePosting(url, link.sourcePageUrl);
    if (!posting.posting) {
      const reason = posting.rule === 'self-link' ? 'self-link' : 'not-posting-shaped';
      return { status: 'rejected', reason, url };
    }

    if (this.locationFilter.isDisallowed(url, link.anchorText)) {
      return { status: 'rejected', reason: 'disallowed-location', url };
    }

    const key = extractJobKey(url);
    const outcome = admitCandidate(this.state, { url, key }, this.now());

    if (outcome.status === 'accepted') {
      return { status: 'accepted', record: outcome.record };
    }
    return { status: 'rejected', reason: outcome.status, url };
  }

  getAcceptedRecords(): readonly JobRecord[] {
    return this.accepted;
  }

  getStats(): PipelineStats {
    return {
      processed: this.stats.processed,
      accepted: this.stats.accepted,
      rejected: { ...this.stats.rejected },
    };
  }

  /**
   * Full deduplicated link set: history first, then this session's finds
   */
  finalize(): StoredJobLink[] {
    return reconcileRecords(this.history, this.accepted);
  }
}
