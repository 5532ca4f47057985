/**
 * Downloader Registry
 *
 * Builds and connects one client per configured back-end, and rebuilds a
 * client when its connection settings change on reload.
 */

import { isDeepStrictEqual } from 'node:util';
import { createLogger, errorMessage } from '@rss-downloader/utils';
import type { ConfigStore } from '../config-store.js';
import { DownloaderError } from '../errors.js';
import { BackendSectionsSchema, formatIssues } from '../schemas.js';
import { DOWNLOADER_TYPES } from '../types.js';
import type { AppConfig, DownloaderType } from '../types.js';
import { Aria2Client } from './aria2.js';
import type { AddLinkOutcome, DownloaderClient } from './base.js';
import { QBittorrentClient } from './qbittorrent.js';
import { TransmissionClient } from './transmission.js';

const logger = createLogger('rss-downloader:downloaders');

export type BackendSections = Pick<AppConfig, DownloaderType>;

export type DownloaderState = 'ready' | 'disabled' | 'not_configured';

export interface DownloaderStatus {
  type: DownloaderType;
  state: DownloaderState;
  error?: string;
}

export interface ConnectionTestResult {
  downloader: DownloaderType;
  ok: boolean;
  version?: string;
  error?: string;
}

/**
 * The one place a downloader type is turned into a client. Returns null when
 * the back-end has no connection section.
 */
export function createDownloaderClient(type: DownloaderType, sections: BackendSections): DownloaderClient | null {
  switch (type) {
    case 'aria2':
      return sections.aria2 ? new Aria2Client(sections.aria2) : null;
    case 'qbittorrent':
      return sections.qbittorrent ? new QBittorrentClient(sections.qbittorrent) : null;
    case 'transmission':
      return sections.transmission ? new TransmissionClient(sections.transmission) : null;
  }
}

export function requiredDownloaders(config: Readonly<AppConfig>): Set<DownloaderType> {
  return new Set(config.feeds.map(feed => feed.downloader));
}

export class DownloaderRegistry {
  private store: ConfigStore;
  private clients = new Map<DownloaderType, DownloaderClient>();
  private failures = new Map<DownloaderType, string>();
  private appliedSettings = new Map<DownloaderType, unknown>();
  private generations = new Map<DownloaderType, number>();
  private unsubscribe: (() => void) | null = null;

  constructor(store: ConfigStore) {
    this.store = store;
  }

  /**
   * Connects every configured back-end. A back-end that fails to connect is
   * disabled with a warning, unless a feed uses it: then the error is thrown.
   */
  async initialize(): Promise<void> {
    const config = this.store.get();
    const required = requiredDownloaders(config);

    for (const type of DOWNLOADER_TYPES) {
      await this.build(type, config, required.has(type));
    }

    this.unsubscribe ??= this.store.subscribe(snapshot => this.reconcile(snapshot.config));
  }

  /**
   * Rebuilds the back-ends whose connection settings changed. Failures only
   * disable the back-end; a reload never stops the process.
   */
  async reconcile(config: Readonly<AppConfig>): Promise<void> {
    for (const type of DOWNLOADER_TYPES) {
      if (isDeepStrictEqual(this.appliedSettings.get(type), config[type])) {
        continue;
      }
      logger.info('Downloader settings changed, rebuilding client', { downloader: type });
      await this.build(type, config, false);
    }
  }

  get(type: DownloaderType): DownloaderClient | undefined {
    return this.clients.get(type);
  }

  status(): DownloaderStatus[] {
    return DOWNLOADER_TYPES.map(type => {
      if (this.clients.has(type)) {
        return { type, state: 'ready' };
      }
      const error = this.failures.get(type);
      return error ? { type, state: 'disabled', error } : { type, state: 'not_configured' };
    });
  }

  /**
   * Sends a link to a back-end. A missing or disabled back-end yields an
   * `unavailable` failure rather than an exception.
   */
  async dispatch(type: DownloaderType, url: string): Promise<AddLinkOutcome> {
    const client = this.clients.get(type);
    if (!client) {
      const reason = this.failures.get(type) ?? 'not configured';
      return {
        status: 'failure',
        error: new DownloaderError(type, 'unavailable', `Downloader ${type} is unavailable: ${reason}`),
      };
    }
    return client.addLink(url);
  }

  /**
   * Connects a throw-away client built from the given settings (or the
   * configured ones) and asks it for its version.
   */
  async testConnection(type: DownloaderType, settings?: unknown): Promise<ConnectionTestResult> {
    let sections: BackendSections = this.store.get();
    if (settings !== undefined) {
      const parsed = BackendSectionsSchema.safeParse({ [type]: settings });
      if (!parsed.success) {
        return { downloader: type, ok: false, error: formatIssues(parsed.error).join('; ') };
      }
      sections = parsed.data;
    }

    const client = createDownloaderClient(type, sections);
    if (!client) {
      return { downloader: type, ok: false, error: `No ${type} settings configured` };
    }

    try {
      await client.connect();
      const version = await client.getVersion();
      return { downloader: type, ok: true, version };
    } catch (error) {
      return { downloader: type, ok: false, error: errorMessage(error) };
    }
  }

  close(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.clients.clear();
  }

  /**
   * Connects a fresh client before it replaces the live one, so dispatches
   * made during a rebuild keep using the previous client. When the new
   * settings fail to connect the back-end is disabled: the previous client
   * points at settings that are no longer configured. A build superseded by
   * a later one while connecting is discarded.
   */
  private async build(type: DownloaderType, config: Readonly<AppConfig>, required: boolean): Promise<void> {
    const generation = (this.generations.get(type) ?? 0) + 1;
    this.generations.set(type, generation);
    this.appliedSettings.set(type, structuredClone(config[type]));

    const client = createDownloaderClient(type, config);
    if (!client) {
      this.clients.delete(type);
      this.failures.delete(type);
      return;
    }

    try {
      await client.connect();
      if (this.generations.get(type) !== generation) return;
      this.clients.set(type, client);
      this.failures.delete(type);
      logger.info('Downloader ready', { downloader: type });
    } catch (error) {
      if (this.generations.get(type) !== generation) return;
      const message = errorMessage(error);
      this.clients.delete(type);
      this.failures.set(type, message);
      if (required) {
        logger.error('Downloader required by a feed failed to connect', { downloader: type, error: message });
        throw error;
      }
      logger.warn('Downloader disabled', { downloader: type, error: message });
    }
  }
}
