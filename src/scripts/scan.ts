import { loadConfig } from '../config';
import { closePool, getPool } from '../db/client';
import { JobLinksRepository } from '../db/job-links';
import { LocationFilter } from '../filters/location-filter';
import { JobLinkPipeline } from '../services/job-link-pipeline';
import { ScanRunner } from '../services/scan-runner';
import { createLinkSource } from '../sources';
import { logger } from '../utils/logger';

/**
 * Scans every configured career page once and stores new job links
 */
async function scan(): Promise<void> {
  try {
    const config = loadConfig();

    logger.info('Configuration loaded', {
      targets: config.targetUrls.length,
      pageFetchTimeoutMs: config.pageFetchTimeoutMs,
      pageDelayMs: config.pageDelayMs,
      maxLinksPerPage: config.maxLinksPerPage,
      extraAllowedLocations: config.extraAllowedLocations,
      extraDisallowedLocations: config.extraDisallowedLocations,
    });

    const pipeline = new JobLinkPipeline({
      locationFilter: new LocationFilter({
        extraAllowed: config.extraAllowedLocations,
        extraDisallowed: config.extraDisallowedLocations,
      }),
    });
    const runner = new ScanRunner(
      createLinkSource(config),
      new JobLinksRepository(getPool(config.databaseUrl)),
      pipeline,
      { pageDelayMs: config.pageDelayMs, maxLinksPerPage: config.maxLinksPerPage }
    );

    const summary = await runner.run(config.targetUrls);
    for (const job of summary.newJobs) {
      console.log(`${job.firstSeenAt.toISOString()}\t${job.url}`);
    }
  } catch (error) {
    logger.error('Scan failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void scan();
