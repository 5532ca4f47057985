/**
 * DownloaderRegistry tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { DownloaderRegistry, createDownloaderClient, requiredDownloaders } from '../src/clients/registry.js';
import { Aria2Client } from '../src/clients/aria2.js';
import { defaultConfig } from '../src/config-store.js';
import { DownloaderConnectionError } from '../src/errors.js';
import { createTempDir, openConfigStore, sendJson, sendText, startTestServer } from './helpers.js';
import type { TempDir, TestServer } from './helpers.js';

const LINK = 'https://feeds.example.test/files/1.torrent';

describe('createDownloaderClient', () => {
  it('builds a client only for configured sections', () => {
    const sections = {
      aria2: { rpc: 'http://127.0.0.1:6800/jsonrpc', secret: null, dir: null },
      qbittorrent: null,
      transmission: null,
    };

    assert.ok(createDownloaderClient('aria2', sections) instanceof Aria2Client);
    assert.equal(createDownloaderClient('qbittorrent', sections), null);
  });

  it('collects the downloaders feeds depend on', () => {
    const config = {
      ...defaultConfig(),
      feeds: [
        { name: 'A', url: 'https://a.example.test/rss', include: [], exclude: [], downloader: 'aria2' as const, content_extractor: 'default' as const },
        { name: 'B', url: 'https://b.example.test/rss', include: [], exclude: [], downloader: 'aria2' as const, content_extractor: 'default' as const },
      ],
    };

    assert.deepEqual([...requiredDownloaders(config)], ['aria2']);
  });
});

describe('DownloaderRegistry', () => {
  let dir: TempDir;
  let transmission: TestServer;
  let deadUrl: string;
  let registry: DownloaderRegistry | undefined;

  beforeEach(async () => {
    dir = await createTempDir();
    transmission = await startTestServer((_request, response) =>
      sendJson(response, 200, { result: 'success', arguments: { version: '4.0.5' } })
    );
    const dead = await startTestServer((_request, response) => sendText(response, 200, ''));
    await dead.close();
    deadUrl = dead.url;
  });

  afterEach(async () => {
    registry?.close();
    registry = undefined;
    await transmission.close();
    await dir.cleanup();
  });

  it('throws when a back-end a feed needs cannot connect', async () => {
    const store = await openConfigStore(dir, {
      transmission: { host: deadUrl },
      feeds: [{ name: 'Anime', url: 'https://feeds.example.test/rss', downloader: 'transmission' }],
    });
    registry = new DownloaderRegistry(store);

    await assert.rejects(registry.initialize(), DownloaderConnectionError);
  });

  it('disables an unused back-end that cannot connect', async () => {
    const store = await openConfigStore(dir, {
      aria2: {},
      transmission: { host: deadUrl },
      feeds: [{ name: 'Anime', url: 'https://feeds.example.test/rss' }],
    });
    registry = new DownloaderRegistry(store);
    await registry.initialize();

    const states = registry.status().map(status => [status.type, status.state]);
    assert.deepEqual(states, [['aria2', 'ready'], ['qbittorrent', 'not_configured'], ['transmission', 'disabled']]);

    const outcome = await registry.dispatch('transmission', LINK);
    assert.equal(outcome.status, 'failure');
    if (outcome.status === 'failure') {
      assert.equal(outcome.error.kind, 'unavailable');
      assert.match(outcome.error.message, /^Downloader transmission is unavailable: /);
    }
  });

  it('reports an unconfigured back-end as unavailable on dispatch', async () => {
    const store = await openConfigStore(dir, { aria2: {} });
    registry = new DownloaderRegistry(store);
    await registry.initialize();

    const outcome = await registry.dispatch('qbittorrent', LINK);

    assert.equal(outcome.status, 'failure');
    if (outcome.status === 'failure') {
      assert.equal(outcome.error.message, 'Downloader qbittorrent is unavailable: not configured');
    }
  });

  it('rebuilds a back-end whose settings change on update', async () => {
    const store = await openConfigStore(dir, { transmission: { host: deadUrl } });
    registry = new DownloaderRegistry(store);
    await registry.initialize();
    assert.equal(registry.get('transmission'), undefined);

    await store.update({ transmission: { host: transmission.url } });

    assert.ok(registry.get('transmission'));
    assert.equal(transmission.requests.length, 1);

    await store.update({ web: { port: 9000 } });
    assert.equal(transmission.requests.length, 1);
  });

  it('keeps dispatching through the live client while a rebuild connects', async () => {
    const slow = await startTestServer((request, response) => {
      const method: unknown = JSON.parse(request.body).method;
      const reply = method === 'session-get'
        ? { result: 'success', arguments: { version: '4.0.5' } }
        : { result: 'success', arguments: { 'torrent-added': { hashString: 'abc123' } } };
      setTimeout(() => sendJson(response, 200, reply), 150);
    });

    try {
      const store = await openConfigStore(dir, { transmission: { host: slow.url } });
      registry = new DownloaderRegistry(store);
      await registry.initialize();
      const previous = registry.get('transmission');

      const rebuild = store.update({ transmission: { dir: '/downloads' } });
      await new Promise(resolve => setTimeout(resolve, 20));
      const outcome = await registry.dispatch('transmission', LINK);

      assert.deepEqual(outcome, { status: 'success', acknowledgement: 'abc123' });
      await rebuild;

      assert.ok(registry.get('transmission'));
      assert.notEqual(registry.get('transmission'), previous);
      await registry.dispatch('transmission', LINK);
      const lastBody = JSON.parse(slow.requests[slow.requests.length - 1].body);
      assert.deepEqual(lastBody.arguments, { filename: LINK, 'download-dir': '/downloads' });
    } finally {
      await slow.close();
    }
  });

  it('disables a back-end whose new settings fail to connect', async () => {
    const store = await openConfigStore(dir, { transmission: { host: transmission.url } });
    registry = new DownloaderRegistry(store);
    await registry.initialize();
    assert.ok(registry.get('transmission'));

    await store.update({ transmission: { host: deadUrl } });

    assert.equal(registry.get('transmission'), undefined);
    assert.equal(registry.status().find(status => status.type === 'transmission')?.state, 'disabled');
  });

  it('tests a connection with ad-hoc or configured settings', async () => {
    const store = await openConfigStore(dir, { transmission: { host: transmission.url } });
    registry = new DownloaderRegistry(store);

    assert.deepEqual(await registry.testConnection('transmission'), { downloader: 'transmission', ok: true, version: '4.0.5' });
    assert.deepEqual(await registry.testConnection('qbittorrent'), {
      downloader: 'qbittorrent',
      ok: false,
      error: 'No qbittorrent settings configured',
    });

    const invalid = await registry.testConnection('aria2', { rpc: 'ftp://127.0.0.1/jsonrpc' });
    assert.equal(invalid.ok, false);
    assert.match(invalid.error ?? '', /^aria2\.rpc: /);

    const dead = await registry.testConnection('transmission', { host: deadUrl });
    assert.equal(dead.ok, false);
  });
});
