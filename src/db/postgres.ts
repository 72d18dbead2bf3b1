import pg from 'pg';
import type { Config } from '../config/index.js';
import logger from '../utils/logger.js';

/**
 * The part of a pg Pool or Client the stores use. Rows come back untyped and
 * are validated by the caller.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(settings: Config['postgres']): pg.Pool {
  const pool = new pg.Pool({
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.database,
    max: settings.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    ssl: settings.sslEnabled ? { rejectUnauthorized: true } : false,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected PostgreSQL error', { error: err.message });
  });

  pool.on('connect', () => {
    logger.debug('New PostgreSQL connection established');
  });

  return pool;
}

export async function healthCheck(db: Queryable): Promise<boolean> {
  try {
    await db.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}

export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end();
  logger.info('PostgreSQL pool closed');
}

export default { createPool, healthCheck, closePool };
