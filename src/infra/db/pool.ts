import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import type { Logger } from '../logger.js';

const { Pool } = pg;

export interface PoolSettings {
  connectionString: string;
  poolMax: number;
}

/**
 * Build the process-wide connection pool. Created once by the server
 * bootstrap, passed to whatever needs it and closed on shutdown.
 */
export function createPool(settings: PoolSettings, logger: Logger): PgPool {
  const pool = new Pool({
    connectionString: settings.connectionString,
    max: settings.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established', { component: 'pg' });
  });

  pool.on('error', (err) => {
    logger.error(err, { component: 'pg', event: 'idle_client_error' });
  });

  return pool;
}

export async function pingDatabase(pool: Pick<PgPool, 'query'>): Promise<void> {
  await pool.query('SELECT 1');
}
