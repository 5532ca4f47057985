/**
 * Feed Parser
 * Fetches one feed, extracts candidate items and applies the feed's filters
 */

import Parser from 'rss-parser';
import { USER_AGENT, createLogger, errorMessage } from '@rss-downloader/utils';
import type { ConfigStore } from './config-store.js';
import { extractCandidate } from './extractors.js';
import type { FeedEntry, FeedLink } from './extractors.js';
import { matchesPatterns } from './pattern-cache.js';
import type { PatternCache } from './pattern-cache.js';
import { ParsedItemSchema, formatIssues } from './schemas.js';
import type { ParseResult, ParsedItem } from './types.js';

const logger = createLogger('rss-downloader:parser');

export const FEED_FETCH_TIMEOUT_MS = 30000;

type FeedMeta = Record<string, unknown>;
type EntryExtras = { id?: string; links?: unknown };

export interface FeedParserOptions {
  timeoutMs?: number;
}

export class FeedParser {
  private store: ConfigStore;
  private patterns: PatternCache;
  private parser: Parser<FeedMeta, EntryExtras>;

  constructor(store: ConfigStore, patterns: PatternCache, options: FeedParserOptions = {}) {
    this.store = store;
    this.patterns = patterns;
    this.parser = new Parser<FeedMeta, EntryExtras>({
      timeout: options.timeoutMs ?? FEED_FETCH_TIMEOUT_MS,
      headers: { 'User-Agent': USER_AGENT },
      // Atom entries keep every <link>, not just rel="alternate"
      customFields: { item: ['id', ['link', 'links', { keepArray: true }]] },
    });
  }

  /**
   * Returns the feed's entry count and the entries that pass its filters. The
   * config version is pinned at the start of the call: every entry is judged
   * by the rules of that version even if a reload lands mid-parse. A feed
   * that cannot be fetched or parsed yields zero entries.
   */
  async parse(feedName: string, feedUrl: string): Promise<ParseResult> {
    const snapshot = this.store.snapshot();
    const feed = snapshot.config.feeds.find(candidate => candidate.name === feedName);
    const extractor = feed?.content_extractor ?? 'default';
    const patterns = this.patterns.patternsFor(feedName, snapshot.version);

    logger.info('Parsing feed', { feed: feedName, url: feedUrl, extractor, version: snapshot.version });

    let document: Parser.Output<EntryExtras> & FeedMeta;
    try {
      document = await this.parser.parseURL(feedUrl);
    } catch (error) {
      logger.error('Feed could not be fetched or parsed', { feed: feedName, url: feedUrl, error: errorMessage(error) });
      return { total: 0, items: [] };
    }

    const entries = document.items ?? [];
    if (entries.length === 0 && !document.title && !document.link) {
      logger.error('Feed is empty or unreachable', { feed: feedName, url: feedUrl });
      return { total: 0, items: [] };
    }

    const now = new Date();
    const items: ParsedItem[] = [];

    for (const entry of entries) {
      const raw: FeedEntry = {
        title: entry.title,
        link: entry.link,
        guid: entry.guid,
        id: entry.id,
        isoDate: entry.isoDate,
        pubDate: entry.pubDate,
        enclosure: entry.enclosure,
        links: readLinks(entry.links),
      };

      const parsed = ParsedItemSchema.safeParse(extractCandidate(extractor, raw, now));
      if (!parsed.success) {
        logger.error('Skipping invalid feed entry', {
          feed: feedName,
          title: entry.title,
          issues: formatIssues(parsed.error),
        });
        continue;
      }

      if (matchesPatterns(patterns, parsed.data.title)) {
        items.push(parsed.data);
      } else {
        logger.debug('Entry filtered out', { feed: feedName, title: parsed.data.title });
      }
    }

    logger.info('Feed parsed', { feed: feedName, total: entries.length, matched: items.length });
    return { total: entries.length, items };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Atom `<link>` elements as parsed by xml2js (`{ $: { href, rel, type } }`).
 * RSS `<link>` text nodes carry no attributes and are skipped.
 */
function readLinks(raw: unknown): FeedLink[] {
  if (!Array.isArray(raw)) return [];

  const links: FeedLink[] = [];
  for (const element of raw) {
    const attributes = isRecord(element) ? element.$ : undefined;
    if (isRecord(attributes) && typeof attributes.href === 'string') {
      links.push({
        href: attributes.href,
        rel: optionalString(attributes.rel),
        type: optionalString(attributes.type),
      });
    }
  }
  return links;
}
