import { Pool, PoolClient } from 'pg';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

const SSL_QUERY_PARAMS = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];

/**
 * Drops SSL query parameters so the explicit `ssl` option wins
 */
export function stripSslParams(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    SSL_QUERY_PARAMS.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Not a URL-shaped connection string; pg parses it as is
    return databaseUrl;
  }
}

export function getPool(databaseUrl: string | undefined = process.env.DATABASE_URL): Pool {
  if (!pool) {
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    // Managed databases require SSL; DATABASE_SSL=false turns it off for local servers
    const sslDisabled = process.env.DATABASE_SSL === 'false';

    pool = new Pool({
      connectionString: stripSslParams(databaseUrl),
      ssl: sslDisabled ? false : { rejectUnauthorized: false },
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function withTransaction<T>(
  callback: (client: PoolClient) => Promise<T>,
  target: Pool = getPool()
): Promise<T> {
  const client = await target.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
