/**
 * Aria2 JSON-RPC Client
 */

import type { AxiosInstance } from 'axios';
import { describeHttpError, isSuccessStatus } from '@rss-downloader/utils';
import { DownloaderConnectionError } from '../errors.js';
import type { Aria2Config } from '../types.js';
import { ADD_LINK_TIMEOUT_MS, BaseDownloaderClient, HEALTH_CHECK_TIMEOUT_MS } from './base.js';
import type { AddLinkOutcome } from './base.js';

export const ARIA2_REQUEST_ID = 'rss-downloader';

interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string;
  method: string;
  params: unknown[];
}

type RpcResult =
  | { ok: true; result: unknown }
  | { ok: false; kind: 'rejected' | 'transport'; message: string };

export class Aria2Client extends BaseDownloaderClient {
  readonly type = 'aria2' as const;
  private rpcUrl: string;
  private secret: string | null;
  private dir: string | null;

  constructor(config: Aria2Config, http?: AxiosInstance) {
    super('aria2', http);
    this.rpcUrl = config.rpc;
    this.secret = config.secret;
    this.dir = config.dir;
  }

  /** aria2 RPC is stateless: there is no session to open */
  async connect(): Promise<void> {
    this.logger.debug('aria2 client ready', { rpc: this.rpcUrl });
  }

  async getVersion(): Promise<string> {
    const reply = await this.call('aria2.getVersion', [], HEALTH_CHECK_TIMEOUT_MS);
    if (!reply.ok) {
      throw new DownloaderConnectionError('aria2', `aria2 health check failed: ${reply.message}`);
    }
    const version = readVersion(reply.result);
    this.logger.debug('aria2 version', { version });
    return version;
  }

  async addLink(url: string): Promise<AddLinkOutcome> {
    const params: unknown[] = [[url]];
    if (this.dir) {
      params.push({ dir: this.dir });
    }

    const reply = await this.call('aria2.addUri', params, ADD_LINK_TIMEOUT_MS);
    if (!reply.ok) {
      this.logger.error('aria2 rejected link', { url, error: reply.message });
      return this.failed(reply.kind, reply.message);
    }

    const gid = typeof reply.result === 'string' ? reply.result : JSON.stringify(reply.result);
    this.logger.info('Link sent to aria2', { url, gid });
    return this.succeeded(gid);
  }

  buildRequest(method: string, params: unknown[] = []): JsonRpcRequest {
    return {
      jsonrpc: '2.0',
      id: ARIA2_REQUEST_ID,
      method,
      params: this.secret ? [`token:${this.secret}`, ...params] : params,
    };
  }

  private async call(method: string, params: unknown[], timeout: number): Promise<RpcResult> {
    try {
      const response = await this.http.post<unknown>(this.rpcUrl, this.buildRequest(method, params), { timeout });
      const rpcError = readRpcError(response.data);
      if (rpcError) {
        return { ok: false, kind: 'rejected', message: rpcError };
      }
      if (!isSuccessStatus(response)) {
        return { ok: false, kind: 'transport', message: `HTTP ${response.status}` };
      }
      if (!isRecord(response.data) || !('result' in response.data)) {
        return { ok: false, kind: 'transport', message: 'Malformed JSON-RPC response' };
      }
      return { ok: true, result: response.data.result };
    } catch (error) {
      return { ok: false, kind: 'transport', message: describeHttpError(error) };
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRpcError(body: unknown): string | null {
  if (!isRecord(body) || body.error === undefined || body.error === null) {
    return null;
  }
  const { error } = body;
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

function readVersion(result: unknown): string {
  if (isRecord(result) && typeof result.version === 'string') {
    return result.version;
  }
  return 'unknown';
}
