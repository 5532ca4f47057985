/**
 * Download notifications
 *
 * A Notifier receives every finished DownloadRecord, successful or not. The
 * webhook notifier posts it as JSON to each enabled webhook in the current
 * config; delivery problems are logged and never reach the caller.
 */

import type { AxiosInstance } from 'axios';
import { HttpError, createHttpClient, createLogger, describeHttpError, isSuccessStatus, withRetry } from '@rss-downloader/utils';
import type { RetryOptions } from '@rss-downloader/utils';
import type { ConfigStore } from './config-store.js';
import type { DownloadRecord, WebhookConfig } from './types.js';

const logger = createLogger('rss-downloader:notifier');

export const WEBHOOK_EVENT = 'download.dispatched';
export const WEBHOOK_TIMEOUT_MS = 10000;

export interface Notifier {
  send(record: DownloadRecord): Promise<void>;
}

export interface WebhookPayload {
  event: typeof WEBHOOK_EVENT;
  record: Omit<DownloadRecord, 'published_time' | 'download_time'> & {
    published_time: string;
    download_time: string;
  };
}

export function buildWebhookPayload(record: DownloadRecord): WebhookPayload {
  return {
    event: WEBHOOK_EVENT,
    record: {
      ...record,
      published_time: record.published_time.toISOString(),
      download_time: record.download_time.toISOString(),
    },
  };
}

export interface WebhookNotifierOptions {
  retry?: Partial<RetryOptions>;
  http?: AxiosInstance;
}

export class WebhookNotifier implements Notifier {
  private store: ConfigStore;
  private http: AxiosInstance;
  private retry: Partial<RetryOptions>;

  constructor(store: ConfigStore, options: WebhookNotifierOptions = {}) {
    this.store = store;
    this.http = options.http ?? createHttpClient({ timeout: WEBHOOK_TIMEOUT_MS });
    this.retry = { maxRetries: 2, baseDelay: 1000, ...options.retry };
  }

  async send(record: DownloadRecord): Promise<void> {
    const webhooks = this.store.get().webhooks.filter(webhook => webhook.enabled);
    if (webhooks.length === 0) {
      return;
    }

    const payload = buildWebhookPayload(record);
    await Promise.all(webhooks.map(webhook => this.deliver(webhook, payload)));
  }

  private async deliver(webhook: WebhookConfig, payload: WebhookPayload): Promise<void> {
    try {
      await withRetry(async () => {
        const response = await this.http.post(webhook.url, payload, {
          headers: { 'Content-Type': 'application/json' },
        });
        if (!isSuccessStatus(response)) {
          throw new HttpError(response.status, `Webhook ${webhook.name} answered ${response.status}`);
        }
      }, { ...this.retry, label: `webhook:${webhook.name}` });

      logger.debug('Webhook delivered', { webhook: webhook.name, record: payload.record.id });
    } catch (error) {
      logger.error('Webhook delivery failed', {
        webhook: webhook.name,
        url: webhook.url,
        record: payload.record.id,
        error: describeHttpError(error),
      });
    }
  }
}

/**
 * Notifier that does nothing; used when no delivery is wanted.
 */
export class NullNotifier implements Notifier {
  async send(): Promise<void> {}
}
