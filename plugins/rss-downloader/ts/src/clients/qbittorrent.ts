/**
 * qBittorrent Web API Client
 *
 * Session-cookie REST: a login sets the SID cookie, which is replayed on every
 * later call. A 403 on add means the session expired; with credentials the
 * client logs in again and retries once.
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import { describeHttpError, isSuccessStatus } from '@rss-downloader/utils';
import { DownloaderConnectionError } from '../errors.js';
import type { QBittorrentConfig } from '../types.js';
import { ADD_LINK_TIMEOUT_MS, BaseDownloaderClient, HEALTH_CHECK_TIMEOUT_MS } from './base.js';
import type { AddLinkOutcome } from './base.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
const OK_BODY = 'ok.';

export class QBittorrentClient extends BaseDownloaderClient {
  readonly type = 'qbittorrent' as const;
  private host: string;
  private username: string | null;
  private password: string | null;
  private cookie: string | null = null;

  constructor(config: QBittorrentConfig, http?: AxiosInstance) {
    super('qbittorrent', http);
    this.host = config.host;
    this.username = config.username;
    this.password = config.password;
  }

  async connect(): Promise<void> {
    if (!this.hasCredentials()) {
      this.logger.warn('qBittorrent username/password not set; privileged calls may be refused', { host: this.host });
      return;
    }

    await this.login();
    this.logger.success('Logged in to qBittorrent', { host: this.host });
  }

  async getVersion(): Promise<string> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.endpoint('/api/v2/app/version'), {
        headers: this.sessionHeaders(),
        responseType: 'text',
        timeout: HEALTH_CHECK_TIMEOUT_MS,
      });
    } catch (error) {
      throw new DownloaderConnectionError('qbittorrent', `qBittorrent health check failed: ${describeHttpError(error)}`);
    }

    if (!isSuccessStatus(response)) {
      throw new DownloaderConnectionError('qbittorrent', `qBittorrent health check failed: HTTP ${response.status}`);
    }
    return bodyText(response.data).trim();
  }

  async addLink(url: string): Promise<AddLinkOutcome> {
    try {
      let response = await this.submit(url);

      if (response.status === 403 && this.hasCredentials()) {
        this.logger.warn('qBittorrent session rejected, logging in again', { host: this.host });
        await this.login();
        response = await this.submit(url);
      }

      const body = bodyText(response.data).trim();
      if (isSuccessStatus(response) && body.toLowerCase() === OK_BODY) {
        this.logger.info('Link sent to qBittorrent', { url });
        return this.succeeded(body);
      }

      this.logger.error('qBittorrent rejected link', { url, status: response.status, body });
      if (response.status === 403) {
        return this.failed('rejected', 'qBittorrent refused the request: not authenticated');
      }
      if (!isSuccessStatus(response)) {
        return this.failed('transport', body ? `HTTP ${response.status}: ${body}` : `HTTP ${response.status}`);
      }
      return this.failed('rejected', body || 'Empty response from qBittorrent');
    } catch (error) {
      if (error instanceof DownloaderConnectionError) {
        return this.failed('rejected', error.message);
      }
      return this.transportFailure(error, url);
    }
  }

  private hasCredentials(): boolean {
    return Boolean(this.username && this.password);
  }

  private async login(): Promise<void> {
    const form = new URLSearchParams({
      username: this.username ?? '',
      password: this.password ?? '',
    });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.endpoint('/api/v2/auth/login'), form.toString(), {
        headers: { 'Content-Type': FORM_CONTENT_TYPE, Referer: this.host },
        responseType: 'text',
        timeout: ADD_LINK_TIMEOUT_MS,
      });
    } catch (error) {
      throw new DownloaderConnectionError('qbittorrent', `qBittorrent login request failed: ${describeHttpError(error)}`);
    }

    const body = bodyText(response.data).trim();
    if (!isSuccessStatus(response) || body.toLowerCase() !== OK_BODY) {
      this.cookie = null;
      throw new DownloaderConnectionError(
        'qbittorrent',
        `qBittorrent login rejected: ${body || `HTTP ${response.status}`}`
      );
    }

    this.cookie = readCookies(response.headers['set-cookie']);
    if (!this.cookie) {
      this.logger.warn('qBittorrent login succeeded without a session cookie', { host: this.host });
    }
  }

  private submit(url: string): Promise<AxiosResponse<unknown>> {
    const form = new URLSearchParams({ urls: url });
    return this.http.post<unknown>(this.endpoint('/api/v2/torrents/add'), form.toString(), {
      headers: { 'Content-Type': FORM_CONTENT_TYPE, ...this.sessionHeaders() },
      responseType: 'text',
      timeout: ADD_LINK_TIMEOUT_MS,
    });
  }

  private sessionHeaders(): Record<string, string> {
    return this.cookie ? { Cookie: this.cookie } : {};
  }

  private endpoint(path: string): string {
    return new URL(path, this.host).toString();
  }
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

/**
 * Cookie header value built from set-cookie response headers (name=value
 * pairs only, attributes dropped).
 */
function readCookies(setCookie: unknown): string | null {
  const values = Array.isArray(setCookie) ? setCookie : [setCookie];
  const pairs = values
    .filter((value): value is string => typeof value === 'string')
    .map(value => value.split(';')[0].trim())
    .filter(pair => pair.length > 0);
  return pairs.length > 0 ? pairs.join('; ') : null;
}
