import pg from 'pg';
import { dbLogger } from '../../lib/logger.js';

const { Pool } = pg;

/**
 * One pool per process, created at startup and handed to the repositories.
 */
export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    dbLogger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    dbLogger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
