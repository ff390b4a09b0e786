/**
 * PostgreSQL Connection Configuration
 *
 * Connection pool for the pgvector embedding store.
 */

import { Pool, type PoolConfig } from 'pg';
import { getEnv } from './env.js';
import { logger } from '../utils/logger.js';

let pool: Pool | null = null;

/**
 * Get PostgreSQL connection pool. Creates a singleton pool on first use.
 */
export function getPostgresPool(): Pool {
  if (pool) {
    return pool;
  }

  const env = getEnv();
  const config: PoolConfig = {
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    database: env.POSTGRES_DB,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
  };

  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ error: err }, 'Unexpected error on idle PostgreSQL client');
  });

  return pool;
}

export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL pool closed');
  }
}
