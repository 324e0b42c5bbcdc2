/**
 * PostgreSQL Configuration
 *
 * A single pg.Pool owned by the process lifecycle: created at startup,
 * ended at shutdown.
 */

import { Pool, type PoolClient } from 'pg';
import { logger } from '../utils/logger';
import { errorMessage } from '../models/errors/api-error';

export interface DatabaseOptions {
  url: string;
  poolMax: number;
}

export function createPool(options: DatabaseOptions): Pool {
  const pool = new Pool({
    connectionString: options.url,
    max: options.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'fleet-safety-alerts',
  });

  pool.on('error', (error) => {
    logger.error('Unexpected error on idle database client', { error: errorMessage(error) });
  });

  logger.info('Database pool initialized', { poolMax: options.poolMax });

  return pool;
}

/**
 * Run a callback inside a transaction; rolls back on error.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Transaction rollback failed', { error: errorMessage(rollbackError) });
    }
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(pool: Pool): Promise<void> {
  logger.info('Closing database connections');
  await pool.end();
}
