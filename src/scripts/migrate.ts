import { readFileSync } from 'fs';
import { join } from 'path';
import { closePool, getPool } from '../db/client';
import { logger } from '../utils/logger';

/**
 * Creates the job_links table (URL, first-seen time, position) from schema.sql
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    const schemaPath = join(__dirname, '../db/schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    await getPool().query(schema);

    logger.info('Database migration completed successfully');
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void migrate();
