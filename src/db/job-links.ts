import { Pool } from 'pg';
import { StoredJobLink } from '../types/job';
import { withTransaction } from './client';
import { logger } from '../utils/logger';

/**
 * Where previously found links live between scans
 */
export interface HistoryStore {
  loadAll(): Promise<StoredJobLink[]>;
  replaceAll(links: readonly StoredJobLink[]): Promise<void>;
  appendAll(links: readonly StoredJobLink[]): Promise<void>;
}

interface JobLinkRow {
  url: string;
  first_seen_at: Date | string;
}

interface MaxPositionRow {
  max_position: number;
}

/**
 * Database operations for found job links
 * Only URL and first-seen time are stored; keys are recomputed on load
 */
export class JobLinksRepository implements HistoryStore {
  constructor(private pool: Pool) {}

  async loadAll(): Promise<StoredJobLink[]> {
    const result = await this.pool.query<JobLinkRow>(
      `SELECT url, first_seen_at FROM job_links ORDER BY position ASC`
    );

    return result.rows.map(row => ({
      url: row.url,
      firstSeenAt: new Date(row.first_seen_at),
    }));
  }

  /**
   * Rewrites the table with the reconciled link set, preserving its order
   */
  async replaceAll(links: readonly StoredJobLink[]): Promise<void> {
    await withTransaction(async (client) => {
      await client.query('DELETE FROM job_links');

      let position = 0;
      for (const link of links) {
        await client.query(
          `INSERT INTO job_links (url, first_seen_at, position)
          VALUES ($1, $2, $3)
          ON CONFLICT (url) DO NOTHING`,
          [link.url, link.firstSeenAt, position++]
        );
      }
    }, this.pool);

    logger.info(`Saved job links`, { count: links.length });
  }

  /**
   * Adds links after the stored ones, leaving existing rows alone
   */
  async appendAll(links: readonly StoredJobLink[]): Promise<void> {
    await withTransaction(async (client) => {
      const result = await client.query<MaxPositionRow>(
        `SELECT COALESCE(MAX(position), -1)::int AS max_position FROM job_links`
      );

      let position = (result.rows[0]?.max_position ?? -1) + 1;
      for (const link of links) {
        await client.query(
          `INSERT INTO job_links (url, first_seen_at, position)
          VALUES ($1, $2, $3)
          ON CONFLICT (url) DO NOTHING`,
          [link.url, link.firstSeenAt, position++]
        );
      }
    }, this.pool);

    logger.info(`Appended job links`, { count: links.length });
  }
}
