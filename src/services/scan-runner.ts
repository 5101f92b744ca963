import { setTimeout as delay } from 'timers/promises';
import { LinkSource } from '../sources/base';
import { HistoryStore } from '../db/job-links';
import { JobRecord, StoredJobLink } from '../types/job';
import { isHttpUrl } from '../utils/url';
import { logger } from '../utils/logger';
import { JobLinkPipeline, PipelineStats } from './job-link-pipeline';

export interface ScanRunnerOptions {
  pageDelayMs: number;
  maxLinksPerPage: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface PageStats {
  links: number;
  newJobs: number;
  error?: string;
}

export interface ScanSummary {
  pagesProcessed: number;
  pagesFailed: number;
  pagesSkipped: number;
  newJobs: JobRecord[];
  savedLinks: number;
  pipeline: PipelineStats;
  pageStats: Record<string, PageStats>;
  durationMs: number;
}

/**
 * Orchestrates one scan: history in, pages through the pipeline, history out
 */
export class ScanRunner {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private source: LinkSource,
    private history: HistoryStore,
    private pipeline: JobLinkPipeline,
    private options: ScanRunnerOptions
  ) {
    this.sleep = options.sleep ?? (async (ms: number) => { await delay(ms); });
  }

  async run(targetUrls: string[]): Promise<ScanSummary> {
    const startTime = Date.now();
    logger.info(`Scan started`, { targets: targetUrls.length });

    const history = await this.loadHistory();
    this.pipeline.loadHistory(history.links);

    const seenTargets = new Set<string>();
    const pageStats: Record<string, PageStats> = {};
    let pagesProcessed = 0;
    let pagesFailed = 0;
    let pagesSkipped = 0;

    for (const [index, targetUrl] of targetUrls.entries()) {
      if (!isHttpUrl(targetUrl)) {
        pagesSkipped++;
        logger.warn(`Skipping invalid target URL`, { targetUrl });
        continue;
      }
      if (seenTargets.has(targetUrl)) {
        pagesSkipped++;
        logger.warn(`Skipping repeated target URL`, { targetUrl });
        continue;
      }
      seenTargets.add(targetUrl);

      const stats = await this.processPage(targetUrl);
      pageStats[targetUrl] = stats;
      if (stats.error) {
        pagesFailed++;
      } else {
        pagesProcessed++;
      }

      if (index < targetUrls.length - 1 && this.options.pageDelayMs > 0) {
        await this.sleep(this.options.pageDelayMs);
      }
    }

    const newJobs = [...this.pipeline.getAcceptedRecords()];
    const savedLinks = await this.persist(newJobs, history.loaded);

    const summary: ScanSummary = {
      pagesProcessed,
      pagesFailed,
      pagesSkipped,
      newJobs,
      savedLinks,
      pipeline: this.pipeline.getStats(),
      pageStats,
      durationMs: Date.now() - startTime,
    };

    logger.info(`Scan completed`, {
      duration: `${summary.durationMs}ms`,
      pagesProcessed,
      pagesFailed,
      pagesSkipped,
      newJobs: newJobs.length,
      savedLinks,
      rejected: summary.pipeline.rejected,
    });

    return summary;
  }

  /**
   * A history that cannot be read is treated as empty for deduplication,
   * and `loaded: false` keeps the stored rows from being rewritten later
   */
  private async loadHistory(): Promise<{ links: StoredJobLink[]; loaded: boolean }> {
    try {
      return { links: await this.history.loadAll(), loaded: true };
    } catch (error) {
      logger.error(`Failed to load history, proceeding without existing links`, error);
      return { links: [], loaded: false };
    }
  }

  private async processPage(targetUrl: string): Promise<PageStats> {
    const stats: PageStats = { links: 0, newJobs: 0 };

    try {
      logger.info(`Processing page: ${targetUrl}`);

      const rawLinks = await this.source.fetchLinks(targetUrl);
      const limitedLinks = this.options.maxLinksPerPage > 0
        ? rawLinks.slice(0, this.options.maxLinksPerPage)
        : rawLinks;
      stats.links = limitedLinks.length;

      const found: JobRecord[] = [];
      for (const link of limitedLinks) {
        const result = this.pipeline.classify(link);
        if (result.status === 'accepted') {
          found.push(result.record);
        }
      }
      stats.newJobs = found.length;

      logger.info(`Page ${targetUrl} completed`, {
        fetched: rawLinks.length,
        processed: limitedLinks.length,
        newJobs: found.length,
      });
      for (const record of found) {
        logger.info(`New job link`, { url: record.url, key: record.key });
      }
    } catch (error) {
      stats.error = error instanceof Error ? error.message : String(error);
      logger.error(`Page ${targetUrl} failed`, error);
      // Continue with other pages - isolated failures
    }

    return stats;
  }

  private async persist(newJobs: JobRecord[], historyLoaded: boolean): Promise<number> {
    if (newJobs.length === 0) {
      logger.info('No new job postings found in this run');
      return 0;
    }

    try {
      if (!historyLoaded) {
        // Stored rows were never read, so only this run's finds are written
        await this.history.appendAll(this.pipeline.finalize());
        return newJobs.length;
      }

      const finalLinks = this.pipeline.finalize();
      await this.history.replaceAll(finalLinks);
      return finalLinks.length;
    } catch (error) {
      logger.error(`Failed to save job links`, error, {
        unsaved: newJobs.map(job => job.url),
      });
      throw error;
    }
  }
}
