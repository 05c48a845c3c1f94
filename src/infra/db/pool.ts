import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { logger } from '../logger.js';

const { Pool } = pg;

export type DbPool = PgPool;

export function createPool(connectionString: string): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message, stack: err.stack });
  });

  return pool;
}
