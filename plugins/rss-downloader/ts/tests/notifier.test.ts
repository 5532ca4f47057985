/**
 * Webhook notifier tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { WebhookNotifier, buildWebhookPayload } from '../src/notifier.js';
import type { DownloadRecord } from '../src/types.js';
import { createTempDir, openConfigStore, sendJson, startTestServer } from './helpers.js';
import type { TempDir, TestServer } from './helpers.js';

const RECORD: DownloadRecord = {
  id: 7,
  title: 'Show - 01',
  url: 'https://feeds.example.test/items/1',
  download_url: 'https://feeds.example.test/files/1.torrent',
  feed_name: 'Anime',
  feed_url: 'https://feeds.example.test/rss',
  published_time: new Date('2024-01-01T00:00:00.000Z'),
  download_time: new Date('2024-01-02T03:04:05.000Z'),
  downloader: 'aria2',
  status: 'success',
  mode: 'automatic',
};

describe('buildWebhookPayload', () => {
  it('wraps the record with ISO timestamps', () => {
    assert.deepEqual(buildWebhookPayload(RECORD), {
      event: 'download.dispatched',
      record: {
        ...RECORD,
        published_time: '2024-01-01T00:00:00.000Z',
        download_time: '2024-01-02T03:04:05.000Z',
      },
    });
  });
});

describe('WebhookNotifier', () => {
  let dir: TempDir;
  let server: TestServer;
  let status: number;

  beforeEach(async () => {
    dir = await createTempDir();
    status = 200;
    server = await startTestServer((_request, response) => sendJson(response, status, { received: true }));
  });

  afterEach(async () => {
    await server.close();
    await dir.cleanup();
  });

  async function notifierFor(retries: number): Promise<WebhookNotifier> {
    const store = await openConfigStore(dir, {
      webhooks: [
        { name: 'main', url: `${server.url}/hooks/main` },
        { name: 'muted', url: `${server.url}/hooks/muted`, enabled: false },
      ],
    });
    return new WebhookNotifier(store, { retry: { maxRetries: retries, baseDelay: 1, maxDelay: 1 } });
  }

  it('posts the payload to every enabled webhook', async () => {
    const notifier = await notifierFor(0);

    await notifier.send(RECORD);

    assert.equal(server.requests.length, 1);
    const [request] = server.requests;
    assert.equal(request.method, 'POST');
    assert.equal(request.url, '/hooks/main');
    assert.equal(request.headers['content-type'], 'application/json');
    assert.deepEqual(JSON.parse(request.body), buildWebhookPayload(RECORD));
  });

  it('retries a failing webhook and never throws', async () => {
    status = 500;
    const notifier = await notifierFor(1);

    await notifier.send(RECORD);

    assert.equal(server.requests.length, 2);
  });

  it('does nothing without webhooks', async () => {
    const store = await openConfigStore(dir, {});
    const notifier = new WebhookNotifier(store);

    await notifier.send(RECORD);

    assert.equal(server.requests.length, 0);
  });
});
