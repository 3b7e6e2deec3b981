import pg from 'pg';
import type { Logger } from '../logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export function createPool(databaseUrl: string, logger: Logger): DbPool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', {}, err);
  });

  return pool;
}

/**
 * Postgres SQLSTATE for unique_violation.
 */
export const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof Error) || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return false;
  }
  return constraint === undefined || ('constraint' in error && error.constraint === constraint);
}
