/**
 * Dedup Ledger
 * Append-only PostgreSQL record of every dispatch attempt
 */

import pg from 'pg';
import { createLogger, errorMessage, validateEnum } from '@rss-downloader/utils';
import type { Database, Pagination } from '@rss-downloader/utils';
import { DOWNLOADER_TYPES, DOWNLOAD_MODES, DOWNLOAD_STATUSES } from './types.js';
import type {
  DownloadRecord,
  DownloadSearchFilters,
  DownloadSearchResult,
  NewDownloadRecord,
} from './types.js';

const logger = createLogger('rss-downloader:database');

export const DOWNLOADS_TABLE = 'rssdl_downloads';

/** Returned by insert() when the record could not be written */
export const INSERT_FAILED_ID = 0;

interface DownloadRow extends pg.QueryResultRow {
  id: number | string;
  title: string;
  url: string;
  download_url: string;
  feed_name: string;
  feed_url: string;
  published_time: Date | string;
  download_time: Date | string;
  downloader: string;
  status: string;
  mode: string;
}

interface CountRow extends pg.QueryResultRow {
  count: number | string;
}

export class DownloadLedger {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  // ============================================================================
  // Schema
  // ============================================================================

  async initialize(): Promise<void> {
    logger.info('Initializing database schema');
    await this.db.connect();

    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS ${DOWNLOADS_TABLE} (
        id SERIAL PRIMARY KEY,
        title TEXT NOT NULL,
        url TEXT NOT NULL,
        download_url TEXT NOT NULL,
        feed_name VARCHAR(255) NOT NULL,
        feed_url TEXT NOT NULL,
        published_time TIMESTAMPTZ NOT NULL,
        download_time TIMESTAMPTZ NOT NULL,
        downloader VARCHAR(32) NOT NULL,
        status VARCHAR(16) NOT NULL,
        mode VARCHAR(16) NOT NULL
      )
    `);

    await this.db.execute(`
      CREATE INDEX IF NOT EXISTS idx_${DOWNLOADS_TABLE}_download_url
      ON ${DOWNLOADS_TABLE}(download_url)
    `);

    await this.db.execute(`
      CREATE INDEX IF NOT EXISTS idx_${DOWNLOADS_TABLE}_download_time
      ON ${DOWNLOADS_TABLE}(download_time)
    `);

    logger.success('Database schema initialized');
  }

  /**
   * Administrative wipe: deletes every record and restarts the id sequence.
   * The table and its indexes stay in place.
   */
  async reset(): Promise<void> {
    logger.warn('Resetting download history');
    await this.db.execute(`TRUNCATE TABLE ${DOWNLOADS_TABLE} RESTART IDENTITY`);
  }

  async close(): Promise<void> {
    await this.db.disconnect();
  }

  // ============================================================================
  // Records
  // ============================================================================

  /**
   * True when a successful dispatch of this download URL is already recorded.
   */
  async isDownloaded(downloadUrl: string): Promise<boolean> {
    const row = await this.db.queryOne(
      `SELECT id FROM ${DOWNLOADS_TABLE} WHERE download_url = $1 AND status = 'success' LIMIT 1`,
      [downloadUrl]
    );
    return row !== null;
  }

  /**
   * Appends a record. Never throws: a failed write is logged and reported as
   * INSERT_FAILED_ID so the dispatch loop can carry on.
   */
  async insert(record: NewDownloadRecord): Promise<number> {
    try {
      const row = await this.db.queryOne<{ id: number | string }>(
        `INSERT INTO ${DOWNLOADS_TABLE} (
          title, url, download_url, feed_name, feed_url,
          published_time, download_time, downloader, status, mode
        ) VALUES ($1, $2, $3, $4, $5, $6::timestamptz, $7::timestamptz, $8, $9, $10)
        RETURNING id`,
        [
          record.title,
          record.url,
          record.download_url,
          record.feed_name,
          record.feed_url,
          record.published_time.toISOString(),
          record.download_time.toISOString(),
          record.downloader,
          record.status,
          record.mode,
        ]
      );
      return row ? Number(row.id) : INSERT_FAILED_ID;
    } catch (error) {
      logger.error('Failed to record download', {
        title: record.title,
        download_url: record.download_url,
        feed: record.feed_name,
        error: errorMessage(error),
      });
      return INSERT_FAILED_ID;
    }
  }

  async findById(id: number): Promise<DownloadRecord | null> {
    const row = await this.db.queryOne<DownloadRow>(
      `SELECT * FROM ${DOWNLOADS_TABLE} WHERE id = $1`,
      [id]
    );
    return row ? mapRow(row) : null;
  }

  /**
   * Filtered page of records, newest dispatch first, plus the total number of
   * matching records.
   */
  async search(filters: DownloadSearchFilters = {}, pagination: Pagination = { limit: 20, offset: 0 }): Promise<DownloadSearchResult> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    let paramCount = 1;

    if (filters.title) {
      conditions.push(`title ILIKE $${paramCount++}`);
      values.push(`%${escapeLike(filters.title)}%`);
    }
    if (filters.feed_name) {
      conditions.push(`feed_name ILIKE $${paramCount++}`);
      values.push(`%${escapeLike(filters.feed_name)}%`);
    }
    if (filters.downloader) {
      conditions.push(`downloader = $${paramCount++}`);
      values.push(filters.downloader);
    }
    if (filters.status) {
      conditions.push(`status = $${paramCount++}`);
      values.push(filters.status);
    }
    if (filters.mode) {
      conditions.push(`mode = $${paramCount++}`);
      values.push(filters.mode);
    }
    if (filters.published_start) {
      conditions.push(`published_time >= $${paramCount++}::timestamptz`);
      values.push(filters.published_start.toISOString());
    }
    if (filters.published_end) {
      conditions.push(`published_time <= $${paramCount++}::timestamptz`);
      values.push(filters.published_end.toISOString());
    }
    if (filters.download_start) {
      conditions.push(`download_time >= $${paramCount++}::timestamptz`);
      values.push(filters.download_start.toISOString());
    }
    if (filters.download_end) {
      conditions.push(`download_time <= $${paramCount++}::timestamptz`);
      values.push(filters.download_end.toISOString());
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = Math.max(1, Math.trunc(pagination.limit));
    const offset = Math.max(0, Math.trunc(pagination.offset));

    const countRow = await this.db.queryOne<CountRow>(
      `SELECT COUNT(*) AS count FROM ${DOWNLOADS_TABLE} ${where}`,
      values
    );
    const result = await this.db.query<DownloadRow>(
      `SELECT * FROM ${DOWNLOADS_TABLE} ${where}
       ORDER BY download_time DESC, id DESC
       LIMIT ${limit} OFFSET ${offset}`,
      values
    );

    return {
      records: result.rows.map(mapRow),
      total: countRow ? Number(countRow.count) : 0,
    };
  }
}

function mapRow(row: DownloadRow): DownloadRecord {
  return {
    id: Number(row.id),
    title: row.title,
    url: row.url,
    download_url: row.download_url,
    feed_name: row.feed_name,
    feed_url: row.feed_url,
    published_time: new Date(row.published_time),
    download_time: new Date(row.download_time),
    downloader: validateEnum(row.downloader, DOWNLOADER_TYPES) ?? 'aria2',
    status: validateEnum(row.status, DOWNLOAD_STATUSES) ?? 'failure',
    mode: validateEnum(row.mode, DOWNLOAD_MODES) ?? 'automatic',
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}
