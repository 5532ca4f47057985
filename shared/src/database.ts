/**
 * Database utilities for rss-downloader
 */

import pg from 'pg';
import type { DatabaseConfig } from './types.js';
import { createLogger } from './logger.js';

const { Pool } = pg;
const logger = createLogger('database');

export class Database {
  private pool: pg.Pool;
  private connected = false;

  /**
   * Wraps an existing pool; use createDatabase() to build one from the
   * environment.
   */
  constructor(pool: pg.Pool) {
    this.pool = pool;
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
      logger.info('Database connected');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Failed to connect to database', { error: message });
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
    logger.info('Database disconnected');
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('Query executed', { duration: Date.now() - start, rows: result.rowCount });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Query failed', { error: message, query: text.trim().substring(0, 100) });
      throw error;
    }
  }

  async queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  async execute(text: string, params?: unknown[]): Promise<number> {
    const result = await this.query(text, params);
    return result.rowCount ?? 0;
  }
}

/**
 * Parse DATABASE_URL into connection parameters
 */
function parseDatabaseUrl(url: string | undefined): DatabaseConfig | null {
  if (!url) {
    return null;
  }

  const match = url.match(/^postgres(?:ql)?:\/\/([^:]+):([^@]+)@([^:/]+):(\d+)\/([^?]+)(\?.*)?$/);
  if (!match) {
    return null;
  }

  const [, user, password, host, port, database, queryString] = match;
  const ssl = queryString?.includes('sslmode=require') || queryString?.includes('ssl=true') || false;

  return {
    host,
    port: parseInt(port, 10),
    database,
    user: decodeURIComponent(user),
    password: decodeURIComponent(password),
    ssl,
  };
}

export function resolveDatabaseConfig(databaseUrl?: string): DatabaseConfig {
  const fromUrl = parseDatabaseUrl(databaseUrl ?? process.env.DATABASE_URL);

  return {
    host: fromUrl?.host ?? process.env.POSTGRES_HOST ?? 'localhost',
    port: fromUrl?.port ?? parseInt(process.env.POSTGRES_PORT ?? '5432', 10),
    database: fromUrl?.database ?? process.env.POSTGRES_DB ?? 'rss_downloader',
    user: fromUrl?.user ?? process.env.POSTGRES_USER ?? 'postgres',
    password: fromUrl?.password ?? process.env.POSTGRES_PASSWORD ?? '',
    ssl: fromUrl?.ssl ?? process.env.POSTGRES_SSL === 'true',
    maxConnections: parseInt(process.env.POSTGRES_MAX_CONNECTIONS ?? '10', 10),
  };
}

export function createDatabase(databaseUrl?: string): Database {
  const config = resolveDatabaseConfig(databaseUrl);

  if (!config.password) {
    logger.warn('Database password is empty', { host: config.host, database: config.database });
  }

  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
    max: config.maxConnections ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err: Error) => {
    logger.error('Unexpected database pool error', { error: err.message });
  });

  return new Database(pool);
}
