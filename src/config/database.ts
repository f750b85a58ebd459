import { Pool, type QueryResultRow } from 'pg';
import { logger } from '../utils/logger';
import type { AppConfig } from './environment';

/**
 * Minimal query surface the stores depend on; resolves to the result rows
 */
export interface SqlClient {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export function createPool(config: AppConfig): Pool {
  const pool = new Pool({
    host: config.DB_HOST,
    port: config.DB_PORT,
    database: config.DB_NAME,
    user: config.DB_USER,
    password: config.DB_PASSWORD,
    ssl: config.DB_SSL ? { rejectUnauthorized: false } : undefined,
    max: 20, // Maximum number of clients in the pool
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 10000, // Return an error after 10 seconds if connection could not be established
  });

  pool.on('error', err => {
    logger.error('Unexpected database error:', err);
  });

  pool.on('connect', () => {
    logger.debug('Database client connected');
  });

  return pool;
}

export function fromPool(pool: Pool): SqlClient {
  return {
    async query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
      const start = Date.now();
      try {
        const res = await pool.query<T>(text, params);
        logger.debug('Executed query', { duration: Date.now() - start, rows: res.rowCount });
        return res.rows;
      } catch (error) {
        logger.error('Database query error:', error);
        throw error;
      }
    },
  };
}

export async function testConnection(client: SqlClient): Promise<boolean> {
  try {
    await client.query('SELECT NOW()');
    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed:', error);
    return false;
  }
}
