/**
 * DownloadLedger tests against an in-memory Postgres
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import type { Database } from '@rss-downloader/utils';
import { DOWNLOADS_TABLE, DownloadLedger, INSERT_FAILED_ID } from '../src/database.js';
import type { NewDownloadRecord } from '../src/types.js';
import { createMemoryDatabase } from './helpers.js';

function record(overrides: Partial<NewDownloadRecord> = {}): NewDownloadRecord {
  return {
    title: 'Show - 01',
    url: 'https://feeds.example.test/items/1',
    download_url: 'https://feeds.example.test/files/1.torrent',
    feed_name: 'Anime',
    feed_url: 'https://feeds.example.test/rss',
    published_time: new Date('2024-01-01T00:00:00.000Z'),
    download_time: new Date('2024-01-02T00:00:00.000Z'),
    downloader: 'aria2',
    status: 'success',
    mode: 'automatic',
    ...overrides,
  };
}

describe('DownloadLedger', () => {
  let db: Database;
  let ledger: DownloadLedger;

  beforeEach(async () => {
    db = createMemoryDatabase();
    ledger = new DownloadLedger(db);
    await ledger.initialize();
  });

  afterEach(async () => {
    await ledger.close();
  });

  it('assigns increasing ids and reads records back', async () => {
    const first = await ledger.insert(record());
    const second = await ledger.insert(record({ title: 'Show - 02', download_url: 'https://feeds.example.test/files/2.torrent' }));

    assert.ok(first > INSERT_FAILED_ID);
    assert.ok(second > first);

    const stored = await ledger.findById(second);
    assert.deepEqual(stored, { id: second, ...record({ title: 'Show - 02', download_url: 'https://feeds.example.test/files/2.torrent' }) });
  });

  it('returns null for an unknown id', async () => {
    assert.equal(await ledger.findById(999), null);
  });

  it('counts only successful dispatches as downloaded', async () => {
    await ledger.insert(record({ download_url: 'https://feeds.example.test/failed.torrent', status: 'failure' }));
    await ledger.insert(record());

    assert.equal(await ledger.isDownloaded('https://feeds.example.test/files/1.torrent'), true);
    assert.equal(await ledger.isDownloaded('https://feeds.example.test/failed.torrent'), false);
    assert.equal(await ledger.isDownloaded('https://feeds.example.test/unknown.torrent'), false);
  });

  it('reports a failed write with the sentinel id instead of throwing', async () => {
    await db.execute(`DROP TABLE ${DOWNLOADS_TABLE}`);

    assert.equal(await ledger.insert(record()), INSERT_FAILED_ID);
  });

  describe('search', () => {
    beforeEach(async () => {
      await ledger.insert(record({
        title: 'Alpha - 01',
        feed_name: 'Anime',
        download_time: new Date('2024-03-01T00:00:00.000Z'),
        published_time: new Date('2024-02-20T00:00:00.000Z'),
      }));
      await ledger.insert(record({
        title: 'Beta - 01',
        feed_name: 'Drama',
        downloader: 'qbittorrent',
        status: 'failure',
        download_time: new Date('2024-03-03T00:00:00.000Z'),
        published_time: new Date('2024-02-25T00:00:00.000Z'),
      }));
      await ledger.insert(record({
        title: 'Alpha - 02',
        feed_name: 'Anime',
        mode: 'manual',
        download_time: new Date('2024-03-02T00:00:00.000Z'),
        published_time: new Date('2024-03-01T00:00:00.000Z'),
      }));
    });

    it('returns every record newest dispatch first', async () => {
      const result = await ledger.search();

      assert.equal(result.total, 3);
      assert.deepEqual(result.records.map(r => r.title), ['Beta - 01', 'Alpha - 02', 'Alpha - 01']);
    });

    it('matches title and feed name case-insensitively by substring', async () => {
      const byTitle = await ledger.search({ title: 'alpha' });
      assert.deepEqual(byTitle.records.map(r => r.title), ['Alpha - 02', 'Alpha - 01']);

      const byFeed = await ledger.search({ feed_name: 'DRA' });
      assert.deepEqual(byFeed.records.map(r => r.title), ['Beta - 01']);
    });

    it('filters by downloader, status and mode', async () => {
      assert.equal((await ledger.search({ downloader: 'qbittorrent' })).total, 1);
      assert.equal((await ledger.search({ status: 'success' })).total, 2);

      const manual = await ledger.search({ mode: 'manual' });
      assert.deepEqual(manual.records.map(r => r.title), ['Alpha - 02']);
    });

    it('filters by inclusive time ranges', async () => {
      const dispatched = await ledger.search({
        download_start: new Date('2024-03-02T00:00:00.000Z'),
        download_end: new Date('2024-03-03T00:00:00.000Z'),
      });
      assert.deepEqual(dispatched.records.map(r => r.title), ['Beta - 01', 'Alpha - 02']);

      const published = await ledger.search({ published_end: new Date('2024-02-25T00:00:00.000Z') });
      assert.deepEqual(published.records.map(r => r.title), ['Beta - 01', 'Alpha - 01']);
    });

    it('pages results while reporting the full total', async () => {
      const page = await ledger.search({}, { limit: 2, offset: 2 });

      assert.equal(page.total, 3);
      assert.deepEqual(page.records.map(r => r.title), ['Alpha - 01']);
    });
  });

  it('wipes every record on reset', async () => {
    await ledger.insert(record());
    await ledger.insert(record({ title: 'Show - 02' }));
    await ledger.reset();

    assert.equal((await ledger.search()).total, 0);
    assert.equal(await ledger.isDownloaded('https://feeds.example.test/files/1.torrent'), false);
    assert.ok((await ledger.insert(record())) > INSERT_FAILED_ID);
  });
});
