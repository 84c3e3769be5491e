/**
 * PostgreSQL Database Client
 *
 * Backs the optional cleanup history audit trail. The pool is created on
 * first use so the service runs without a database when history is disabled.
 */

import { Pool, type QueryResultRow } from 'pg';
import { config } from '../config';
import { logger } from '../config/logger';

let pool: Pool | null = null;

function getPool(): Pool {
  if (pool === null) {
    pool = new Pool({
      host: config.database.host,
      port: config.database.port,
      database: config.database.database,
      user: config.database.user,
      password: config.database.password,
      max: config.database.maxConnections,
      ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
    });
    pool.on('error', (error) => {
      logger.error('Database: Idle client error', { error: error.message });
    });
  }
  return pool;
}

export interface Database {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]>;
  queryOne<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<T | null>;
}

/**
 * Database client interface for the index-cleanup-service
 */
export const db = {
  /**
   * Execute a query with parameters
   * Returns array of rows (not QueryResult)
   */
  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]> {
    const result = await getPool().query<T>(sql, params);
    return result.rows;
  },

  /**
   * Execute a query and return a single row
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<T | null> {
    const result = await getPool().query<T>(sql, params);
    return result.rows[0] ?? null;
  },

  /**
   * Test database connection (health check)
   */
  async testConnection(): Promise<boolean> {
    await getPool().query('SELECT 1');
    return true;
  },

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    if (pool !== null) {
      await pool.end();
      pool = null;
    }
  },
};
