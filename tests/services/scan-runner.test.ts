import { describe, it, expect, vi } from 'vitest';
import { ScanRunner } from '../../src/services/scan-runner';
import { JobLinkPipeline } from '../../src/services/job-link-pipeline';
import { HistoryStore } from '../../src/db/job-links';
import { LinkSource } from '../../src/sources/base';
import { RawLink, StoredJobLink } from '../../src/types/job';

const now = new Date('2026-10-18T09:00:00.000Z');
const earlier = new Date('2026-09-01T08:30:00.000Z');

class InMemoryHistoryStore implements HistoryStore {
  saved: StoredJobLink[][] = [];
  appended: StoredJobLink[][] = [];

  constructor(public links: StoredJobLink[] = [], private failOn?: 'load' | 'save') {}

  async loadAll(): Promise<StoredJobLink[]> {
    if (this.failOn === 'load') throw new Error('history unavailable');
    return [...this.links];
  }

  async replaceAll(links: readonly StoredJobLink[]): Promise<void> {
    if (this.failOn === 'save') throw new Error('disk full');
    this.saved.push([...links]);
    this.links = [...links];
  }

  async appendAll(links: readonly StoredJobLink[]): Promise<void> {
    if (this.failOn === 'save') throw new Error('disk full');
    this.appended.push([...links]);
    const stored = new Set(this.links.map(link => link.url));
    this.links = [...this.links, ...links.filter(link => !stored.has(link.url))];
  }
}

class FakeLinkSource implements LinkSource {
  readonly name = 'fake';
  requested: string[] = [];

  constructor(private pages: Record<string, Array<{ href: string; text: string }> | Error>) {}

  async fetchLinks(pageUrl: string): Promise<RawLink[]> {
    this.requested.push(pageUrl);
    const page = this.pages[pageUrl];
    if (page === undefined) throw new Error(`no page ${pageUrl}`);
    if (page instanceof Error) throw page;
    return page.map(a => ({ href: a.href, anchorText: a.text, sourcePageUrl: pageUrl }));
  }
}

const OPENINGS = 'https://acme.com/openings';
const BROKEN = 'https://broken.example.com/careers';

function createRunner(
  source: LinkSource,
  history: HistoryStore,
  options: { maxLinksPerPage?: number } = {}
) {
  const sleep = vi.fn(async (_ms: number) => {});
  const runner = new ScanRunner(source, history, new JobLinkPipeline({ now: () => now }), {
    pageDelayMs: 1000,
    maxLinksPerPage: options.maxLinksPerPage ?? 0,
    sleep,
  });
  return { runner, sleep };
}

describe('ScanRunner', () => {
  it('keeps going after a failing page and skips invalid targets', async () => {
    const source = new FakeLinkSource({
      [OPENINGS]: [
        { href: '/job/12345', text: 'Analyst, New York' },
        { href: '/job/23456', text: 'Analyst, London' },
        { href: '/about', text: 'About us' },
      ],
      [BROKEN]: new Error('timeout'),
    });
    const history = new InMemoryHistoryStore([{ url: 'https://acme.com/job/99999', firstSeenAt: earlier }]);
    const { runner, sleep } = createRunner(source, history);

    const summary = await runner.run([OPENINGS, 'ftp://files.acme.com', BROKEN]);

    expect(source.requested).toEqual([OPENINGS, BROKEN]);
    expect(summary.pagesProcessed).toBe(1);
    expect(summary.pagesFailed).toBe(1);
    expect(summary.pagesSkipped).toBe(1);
    expect(summary.pageStats[OPENINGS]).toEqual({ links: 3, newJobs: 1 });
    expect(summary.pageStats[BROKEN]).toEqual({ links: 0, newJobs: 0, error: 'timeout' });
    expect(summary.newJobs.map(job => job.url)).toEqual(['https://acme.com/job/12345']);
    expect(summary.pipeline.rejected['disallowed-location']).toBe(1);
    expect(summary.pipeline.rejected['not-posting-shaped']).toBe(1);
    expect(summary.savedLinks).toBe(2);
    expect(history.saved).toEqual([
      [
        { url: 'https://acme.com/job/99999', firstSeenAt: earlier },
        { url: 'https://acme.com/job/12345', firstSeenAt: now },
      ],
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('appends to stored links it could not read instead of rewriting them', async () => {
    const source = new FakeLinkSource({ [OPENINGS]: [{ href: '/job/20001', text: 'Analyst' }] });
    const history = new InMemoryHistoryStore(
      [
        { url: 'https://acme.com/job/10001', firstSeenAt: earlier },
        { url: 'https://acme.com/job/10002', firstSeenAt: earlier },
      ],
      'load'
    );
    const { runner } = createRunner(source, history);

    const summary = await runner.run([OPENINGS]);

    expect(summary.newJobs).toHaveLength(1);
    expect(summary.savedLinks).toBe(1);
    expect(history.saved).toEqual([]);
    expect(history.appended).toEqual([[{ url: 'https://acme.com/job/20001', firstSeenAt: now }]]);
    expect(history.links.map(link => link.url)).toEqual([
      'https://acme.com/job/10001',
      'https://acme.com/job/10002',
      'https://acme.com/job/20001',
    ]);
  });

  it('reads a target listed twice only once', async () => {
    const source = new FakeLinkSource({ [OPENINGS]: [{ href: '/job/12345', text: 'Analyst' }] });
    const { runner } = createRunner(source, new InMemoryHistoryStore());

    const summary = await runner.run([OPENINGS, OPENINGS]);

    expect(source.requested).toEqual([OPENINGS]);
    expect(summary.pagesProcessed).toBe(1);
    expect(summary.pagesSkipped).toBe(1);
    expect(summary.pageStats[OPENINGS]).toEqual({ links: 1, newJobs: 1 });
    expect(summary.pipeline.rejected['duplicate-session']).toBe(0);
  });

  it('leaves history untouched when nothing new was found', async () => {
    const source = new FakeLinkSource({ [OPENINGS]: [{ href: '/job/99999', text: 'Analyst' }] });
    const history = new InMemoryHistoryStore([{ url: 'https://acme.com/job/99999', firstSeenAt: earlier }]);
    const { runner } = createRunner(source, history);

    const summary = await runner.run([OPENINGS]);

    expect(summary.newJobs).toEqual([]);
    expect(summary.savedLinks).toBe(0);
    expect(summary.pipeline.rejected['duplicate-historical']).toBe(1);
    expect(history.saved).toEqual([]);
  });

  it('caps the number of links read from a page', async () => {
    const source = new FakeLinkSource({
      [OPENINGS]: [
        { href: '/job/11111', text: 'Analyst' },
        { href: '/job/22222', text: 'Trader' },
      ],
    });
    const { runner } = createRunner(source, new InMemoryHistoryStore(), { maxLinksPerPage: 1 });

    const summary = await runner.run([OPENINGS]);

    expect(summary.pipeline.processed).toBe(1);
    expect(summary.newJobs.map(job => job.url)).toEqual(['https://acme.com/job/11111']);
  });

  it('fails the run when new links cannot be saved', async () => {
    const source = new FakeLinkSource({ [OPENINGS]: [{ href: '/job/12345', text: 'Analyst' }] });
    const { runner } = createRunner(source, new InMemoryHistoryStore([], 'save'));

    await expect(runner.run([OPENINGS])).rejects.toThrow('disk full');
  });
});
