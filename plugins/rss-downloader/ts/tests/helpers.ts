/**
 * Shared test fixtures: in-process HTTP stand-ins, temp config files and an
 * in-memory Postgres.
 */

import { createServer } from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { newDb } from 'pg-mem';
import YAML from 'yaml';
import { Database } from '@rss-downloader/utils';
import { ConfigStore } from '../src/config-store.js';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingMessage['headers'];
  body: string;
}

export interface TestServer {
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

export type TestHandler = (request: RecordedRequest, response: ServerResponse) => void;

/**
 * HTTP server on an ephemeral local port that records every request and
 * answers through the given handler.
 */
export async function startTestServer(handler: TestHandler): Promise<TestServer> {
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? 'GET',
        url: req.url ?? '/',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      };
      requests.push(recorded);
      handler(recorded, res);
    });
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  const { port }: AddressInfo = address;

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close(error => (error ? reject(error) : resolve()));
    }),
  };
}

export function sendJson(response: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  response.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  response.end(JSON.stringify(body));
}

export function sendText(response: ServerResponse, status: number, body: string, headers: Record<string, string> = {}): void {
  response.writeHead(status, { 'Content-Type': 'text/plain', ...headers });
  response.end(body);
}

export interface TempDir {
  path: string;
  file(name: string): string;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), 'rss-downloader-test-'));
  return {
    path,
    file: name => join(path, name),
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
}

let mtimeSeconds = 1_700_000_000;

/**
 * Writes a YAML config and gives it a fresh, strictly increasing mtime so the
 * watcher always sees the change.
 */
export async function writeConfig(path: string, config: unknown): Promise<void> {
  await writeFile(path, typeof config === 'string' ? config : YAML.stringify(config), 'utf8');
  mtimeSeconds += 10;
  await utimes(path, mtimeSeconds, mtimeSeconds);
}

/**
 * Initialized ConfigStore over `config.yaml` in the given directory.
 */
export async function openConfigStore(dir: TempDir, config: unknown): Promise<ConfigStore> {
  const path = dir.file('config.yaml');
  await writeConfig(path, config);
  const store = new ConfigStore(path);
  await store.initialize();
  return store;
}

/**
 * Database wrapper over an in-memory Postgres.
 */
export function createMemoryDatabase(): Database {
  const { Pool } = newDb().adapters.createPg();
  return new Database(new Pool());
}

export function rssDocument(items: string[], title = 'Test Feed'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>${title}</title>
    <link>https://feeds.example.test/</link>
    <description>Fixture feed</description>
${items.join('\n')}
  </channel>
</rss>`;
}

export function rssItem(fields: { title?: string; link?: string; guid?: string; pubDate?: string; enclosure?: { url: string; type: string } }): string {
  const parts = ['    <item>'];
  if (fields.title !== undefined) parts.push(`      <title>${fields.title}</title>`);
  if (fields.link !== undefined) parts.push(`      <link>${fields.link}</link>`);
  if (fields.guid !== undefined) parts.push(`      <guid>${fields.guid}</guid>`);
  if (fields.pubDate !== undefined) parts.push(`      <pubDate>${fields.pubDate}</pubDate>`);
  if (fields.enclosure) {
    parts.push(`      <enclosure url="${fields.enclosure.url}" type="${fields.enclosure.type}" length="1024"/>`);
  }
  parts.push('    </item>');
  return parts.join('\n');
}
