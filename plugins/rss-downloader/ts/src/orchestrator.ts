/**
 * Orchestrator
 * parse -> filter -> dedup check -> dispatch -> record -> notify
 */

import { createLogger, errorMessage } from '@rss-downloader/utils';
import type { DownloaderRegistry } from './clients/registry.js';
import type { ConfigStore } from './config-store.js';
import type { DownloadLedger } from './database.js';
import { InvalidRecordError, ItemNotFoundError } from './errors.js';
import type { DownloaderError } from './errors.js';
import type { Notifier } from './notifier.js';
import { NullNotifier } from './notifier.js';
import type { FeedParser } from './parser.js';
import type {
  DownloadMode,
  DownloadRecord,
  DownloaderType,
  FeedRunStats,
  ParsedItem,
  RunSummary,
} from './types.js';

const logger = createLogger('rss-downloader:orchestrator');

export interface OrchestratorDeps {
  store: ConfigStore;
  parser: FeedParser;
  ledger: DownloadLedger;
  downloaders: DownloaderRegistry;
  notifier?: Notifier;
}

interface DispatchResult {
  record: DownloadRecord;
  error?: DownloaderError;
}

interface DispatchSource {
  item: ParsedItem;
  feed_name: string;
  feed_url: string;
}

export class Orchestrator {
  private store: ConfigStore;
  private parser: FeedParser;
  private ledger: DownloadLedger;
  private downloaders: DownloaderRegistry;
  private notifier: Notifier;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.parser = deps.parser;
    this.ledger = deps.ledger;
    this.downloaders = deps.downloaders;
    this.notifier = deps.notifier ?? new NullNotifier();
  }

  /**
   * Processes one feed. Items already downloaded successfully are skipped;
   * a failing item is recorded and logged without stopping the rest.
   * `dispatched` counts successful dispatches only. A feed name missing from
   * the config is not fetched at all, since it has no downloader to send to.
   */
  async processFeed(feedName: string, feedUrl: string): Promise<FeedRunStats> {
    const feed = this.store.get().feeds.find(candidate => candidate.name === feedName);
    if (!feed) {
      logger.warn('Feed is not configured, skipping', { feed: feedName });
      return { total: 0, matched: 0, dispatched: 0 };
    }

    const { total, items } = await this.parser.parse(feedName, feedUrl);
    let dispatched = 0;

    for (const item of items) {
      try {
        if (await this.ledger.isDownloaded(item.download_url)) {
          logger.info('Skipping already downloaded item', { feed: feedName, title: item.title });
          continue;
        }

        const { record } = await this.dispatch({ item, feed_name: feedName, feed_url: feedUrl }, feed.downloader, 'automatic');
        if (record.status === 'success') {
          dispatched++;
        }
      } catch (error) {
        logger.error('Failed to process item', {
          feed: feedName,
          title: item.title,
          download_url: item.download_url,
          error: errorMessage(error),
        });
      }
    }

    return { total, matched: items.length, dispatched };
  }

  /**
   * Sends a recorded item again, tagged as a manual download. Throws
   * ItemNotFoundError for an unknown id, InvalidRecordError when the record
   * has no download URL, and DownloaderError when the dispatch fails (the
   * failed attempt is recorded first).
   */
  async redownload(id: number, downloader: DownloaderType): Promise<DownloadRecord> {
    const previous = await this.ledger.findById(id);
    if (!previous) {
      throw new ItemNotFoundError(id);
    }
    if (!previous.download_url.trim()) {
      throw new InvalidRecordError(`Download record ${id} has no download URL`, { id });
    }

    const { record, error } = await this.dispatch(
      {
        item: {
          title: previous.title,
          url: previous.url,
          download_url: previous.download_url,
          published_time: previous.published_time,
        },
        feed_name: previous.feed_name,
        feed_url: previous.feed_url,
      },
      downloader,
      'manual'
    );

    if (error) {
      throw error;
    }
    return record;
  }

  /**
   * Processes every configured feed in order. A feed that throws is logged
   * and the run moves on.
   */
  async runOnce(): Promise<RunSummary> {
    const feeds = this.store.get().feeds;
    const summary: RunSummary = { feeds: feeds.length, failed_feeds: 0, total: 0, matched: 0, dispatched: 0 };

    for (const feed of feeds) {
      logger.info('Processing feed', { feed: feed.name, url: feed.url });
      try {
        const stats = await this.processFeed(feed.name, feed.url);
        summary.total += stats.total;
        summary.matched += stats.matched;
        summary.dispatched += stats.dispatched;
      } catch (error) {
        summary.failed_feeds++;
        logger.error('Feed processing failed', { feed: feed.name, url: feed.url, error: errorMessage(error) });
      }
    }

    logger.info('Run complete', { ...summary });
    return summary;
  }

  /**
   * Sends one item, records the attempt and hands the record to the
   * notifier. Dispatch failures end up in the record, not in an exception.
   */
  private async dispatch(source: DispatchSource, downloader: DownloaderType, mode: DownloadMode): Promise<DispatchResult> {
    const { item } = source;
    const outcome = await this.downloaders.dispatch(downloader, item.download_url);

    const fields = {
      title: item.title,
      url: item.url,
      download_url: item.download_url,
      feed_name: source.feed_name,
      feed_url: source.feed_url,
      published_time: item.published_time,
      download_time: new Date(),
      downloader,
      status: outcome.status,
      mode,
    };
    const id = await this.ledger.insert(fields);
    const record: DownloadRecord = { id, ...fields };

    if (outcome.status === 'success') {
      logger.success('Download dispatched', { id, downloader, title: item.title, mode });
    } else {
      logger.error('Download dispatch failed', {
        id,
        downloader,
        feed: source.feed_name,
        title: item.title,
        download_url: item.download_url,
        kind: outcome.error.kind,
        error: outcome.error.message,
      });
    }

    try {
      await this.notifier.send(record);
    } catch (error) {
      logger.error('Notifier failed', { id, error: errorMessage(error) });
    }

    return { record, error: outcome.status === 'failure' ? outcome.error : undefined };
  }
}
