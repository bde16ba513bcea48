import pg, { type Pool } from 'pg';
import { getConfig } from '../../config/index.js';

let pool: Pool | null = null;

/**
 * Initialize the shared connection pool
 */
export function initializePool(connectionString?: string): Pool {
  if (pool) {
    return pool;
  }

  const url = connectionString ?? getConfig().database.url;
  if (!url) {
    throw new Error('DATABASE_URL must be set to use the PostgreSQL store');
  }

  pool = new pg.Pool({ connectionString: url });
  return pool;
}

/**
 * Get the shared connection pool, creating it from configuration if needed
 */
export function getPool(): Pool {
  if (!pool) {
    pool = initializePool();
  }
  return pool;
}

/**
 * Close the shared connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}
