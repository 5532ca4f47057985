/**
 * Transmission RPC Client
 *
 * Every call carries the cached X-Transmission-Session-Id. A 409 answer holds
 * the id the daemon expects: the client adopts it and replays the same call
 * exactly once. Nothing about a failed call is remembered; the next call
 * simply uses whatever id is cached.
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import { describeHttpError, isSuccessStatus } from '@rss-downloader/utils';
import { DownloaderConnectionError } from '../errors.js';
import type { TransmissionConfig } from '../types.js';
import { ADD_LINK_TIMEOUT_MS, BaseDownloaderClient, HEALTH_CHECK_TIMEOUT_MS } from './base.js';
import type { AddLinkOutcome } from './base.js';

export const SESSION_ID_HEADER = 'X-Transmission-Session-Id';
const SESSION_ID_HEADER_KEY = SESSION_ID_HEADER.toLowerCase();

interface RpcReply {
  result: string;
  arguments: Record<string, unknown>;
}

export class TransmissionClient extends BaseDownloaderClient {
  readonly type = 'transmission' as const;
  private rpcUrl: string;
  private auth?: { username: string; password: string };
  private dir: string | null;
  private sessionId = '';

  constructor(config: TransmissionConfig, http?: AxiosInstance) {
    super('transmission', http);
    this.rpcUrl = new URL('/transmission/rpc', config.host).toString();
    this.dir = config.dir;
    if (config.username) {
      this.auth = { username: config.username, password: config.password ?? '' };
    }
  }

  get currentSessionId(): string {
    return this.sessionId;
  }

  async connect(): Promise<void> {
    await this.getVersion();
    this.logger.success('Connected to Transmission', { rpc: this.rpcUrl });
  }

  async getVersion(): Promise<string> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.rpc('session-get', {}, HEALTH_CHECK_TIMEOUT_MS);
    } catch (error) {
      throw new DownloaderConnectionError('transmission', `Transmission health check failed: ${describeHttpError(error)}`);
    }

    if (response.status === 401) {
      throw new DownloaderConnectionError('transmission', 'Transmission rejected the configured credentials');
    }
    const reply = readReply(response.data);
    if (!isSuccessStatus(response) || !reply || reply.result !== 'success') {
      throw new DownloaderConnectionError(
        'transmission',
        `Transmission health check failed: ${reply?.result ?? `HTTP ${response.status}`}`
      );
    }

    const version = reply.arguments.version;
    return typeof version === 'string' ? version : 'unknown';
  }

  async addLink(url: string): Promise<AddLinkOutcome> {
    const args: Record<string, unknown> = { filename: url };
    if (this.dir) {
      args['download-dir'] = this.dir;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.rpc('torrent-add', args, ADD_LINK_TIMEOUT_MS);
    } catch (error) {
      return this.transportFailure(error, url);
    }

    if (response.status === 401) {
      return this.failed('rejected', 'Transmission rejected the configured credentials');
    }
    const reply = readReply(response.data);
    if (!isSuccessStatus(response) || !reply) {
      this.logger.error('Transmission request failed', { url, status: response.status });
      return this.failed('transport', `HTTP ${response.status}`);
    }
    if (reply.result !== 'success') {
      this.logger.error('Transmission rejected link', { url, result: reply.result });
      return this.failed('rejected', reply.result);
    }

    const acknowledgement = describeAdded(reply.arguments);
    this.logger.info('Link sent to Transmission', { url, torrent: acknowledgement });
    return this.succeeded(acknowledgement);
  }

  /**
   * Posts one RPC call, replaying it once with the renewed session id when the
   * daemon answers 409.
   */
  private async rpc(method: string, args: Record<string, unknown>, timeout: number): Promise<AxiosResponse<unknown>> {
    const response = await this.post(method, args, timeout);
    if (response.status !== 409) {
      return response;
    }

    const renewed = headerString(response.headers[SESSION_ID_HEADER_KEY]);
    if (renewed) {
      this.sessionId = renewed;
      this.logger.debug('Transmission session id renewed', { method });
    } else {
      this.logger.warn('Transmission answered 409 without a session id', { method });
    }
    return this.post(method, args, timeout);
  }

  private post(method: string, args: Record<string, unknown>, timeout: number): Promise<AxiosResponse<unknown>> {
    return this.http.post<unknown>(
      this.rpcUrl,
      { method, arguments: args },
      {
        headers: { [SESSION_ID_HEADER]: this.sessionId },
        auth: this.auth,
        timeout,
      }
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readReply(body: unknown): RpcReply | null {
  if (!isRecord(body) || typeof body.result !== 'string') {
    return null;
  }
  return { result: body.result, arguments: isRecord(body.arguments) ? body.arguments : {} };
}

function headerString(value: unknown): string | null {
  if (typeof value === 'string' && value.length > 0) return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return null;
}

function describeAdded(args: Record<string, unknown>): string {
  const added = args['torrent-added'] ?? args['torrent-duplicate'];
  if (isRecord(added)) {
    if (typeof added.hashString === 'string') return added.hashString;
    if (typeof added.name === 'string') return added.name;
  }
  return 'success';
}
