import { JobKey, JobRecord, NormalizedUrl, StoredJobLink } from '../types/job';
import { extractJobKey } from '../utils/job-key';
import { logger } from '../utils/logger';

/**
 * Keys known before and during a scan
 * `historical` grows with every admission so later duplicates are caught
 */
export interface DedupState {
  readonly historical: Set<JobKey>;
  readonly session: Set<JobKey>;
}

export interface DedupCandidate {
  url: NormalizedUrl;
  key: JobKey | null;
}

export type AdmissionOutcome =
  | { status: 'accepted'; record: JobRecord }
  | { status: 'no-key' }
  | { status: 'duplicate-session'; key: JobKey }
  | { status: 'duplicate-historical'; key: JobKey };

export function createDedupState(historicalKeys: Iterable<JobKey> = []): DedupState {
  return { historical: new Set(historicalKeys), session: new Set() };
}

/**
 * Decides whether a candidate is new
 * An accepted key is added to both sets of `state`
 */
export function admitCandidate(
  state: DedupState,
  candidate: DedupCandidate,
  now: Date
): AdmissionOutcome {
  const { key } = candidate;

  if (key === null) {
    logger.debug(`No job key for candidate, dropping`, { url: candidate.url });
    return { status: 'no-key' };
  }

  if (state.session.has(key)) {
    return { status: 'duplicate-session', key };
  }

  if (state.historical.has(key)) {
    return { status: 'duplicate-historical', key };
  }

  state.historical.add(key);
  state.session.add(key);
  return {
    status: 'accepted',
    record: { url: candidate.url, firstSeenAt: now, key },
  };
}

/**
 * Merges stored links with newly accepted records
 * Historical records come first, so repeat keys keep their original date.
 * Records without a derivable key are dropped.
 */
export function reconcileRecords(
  historical: readonly StoredJobLink[],
  accepted: readonly JobRecord[]
): StoredJobLink[] {
  const combined: Array<StoredJobLink & { key: JobKey | null }> = [
    ...historical.map(link => ({ ...link, key: extractJobKey(link.url) })),
    ...accepted,
  ];

  const seen = new Set<JobKey>();
  const result: StoredJobLink[] = [];
  let keyless = 0;

  for (const record of combined) {
    if (record.key === null) {
      keyless++;
      continue;
    }
    if (seen.has(record.key)) {
      continue;
    }
    seen.add(record.key);
    result.push({ url: record.url, firstSeenAt: record.firstSeenAt });
  }

  logger.info(`Reconciliation complete`, {
    historical: historical.length,
    accepted: accepted.length,
    keyless,
    final: result.length,
  });

  return result;
}
