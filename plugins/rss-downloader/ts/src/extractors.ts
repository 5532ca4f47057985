/**
 * Content extractors: where a feed entry keeps its page URL and its download URL
 */

import type { ContentExtractor } from './types.js';

export const BITTORRENT_MEDIA_TYPE = 'application/x-bittorrent';

/** One `<link>` of an Atom entry */
export interface FeedLink {
  href: string;
  rel?: string;
  type?: string;
}

export interface FeedEntry {
  title?: string;
  link?: string;
  guid?: string;
  id?: string;
  isoDate?: string;
  pubDate?: string;
  enclosure?: { url?: string; type?: string };
  links?: FeedLink[];
}

/** Unvalidated item; ParsedItemSchema decides whether it is usable */
export interface CandidateItem {
  title: string | undefined;
  url: string | undefined;
  download_url: string | undefined;
  published_time: Date;
}

type ExtractRule = (entry: FeedEntry, now: Date) => CandidateItem;

const HTTP_URL = /^https?:\/\//i;

function text(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * The entry's structured publish time, or `now` when it carries none.
 */
export function publishedTime(entry: FeedEntry, now: Date): Date {
  for (const value of [entry.isoDate, entry.pubDate]) {
    const raw = text(value);
    if (raw) {
      const parsed = new Date(raw);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }
  }
  return now;
}

function identifier(entry: FeedEntry): string | undefined {
  return text(entry.guid) ?? text(entry.id);
}

function isTorrent(type: string | undefined): boolean {
  return type?.trim().toLowerCase() === BITTORRENT_MEDIA_TYPE;
}

/**
 * The entry's enclosure URL: the RSS `<enclosure>`, else the first Atom
 * `rel="enclosure"` link. With `torrentOnly`, only bittorrent media types
 * count.
 */
function enclosureUrl(entry: FeedEntry, torrentOnly: boolean): string | undefined {
  if (entry.enclosure && (!torrentOnly || isTorrent(entry.enclosure.type))) {
    const url = text(entry.enclosure.url);
    if (url) return url;
  }

  const link = entry.links?.find(candidate =>
    candidate.rel?.toLowerCase() === 'enclosure' && (!torrentOnly || isTorrent(candidate.type))
  );
  return link ? text(link.href) : undefined;
}

/**
 * mikan / dmhy: the .torrent enclosure is the download; the entry link is the
 * page. Each falls back to the other when missing.
 */
const torrentEnclosureRule: ExtractRule = (entry, now) => {
  const enclosure = enclosureUrl(entry, true);
  const link = text(entry.link);

  return {
    title: text(entry.title),
    url: link ?? enclosure,
    download_url: enclosure ?? link,
    published_time: publishedTime(entry, now),
  };
};

/**
 * nyaa: the entry id is the page; the entry link is the .torrent.
 */
const nyaaRule: ExtractRule = (entry, now) => ({
  title: text(entry.title),
  url: identifier(entry),
  download_url: text(entry.link),
  published_time: publishedTime(entry, now),
});

/**
 * Anything else: any enclosure is the download, otherwise the link. The page
 * is the entry id only when that id is an http(s) URL; ids such as `tag:` or
 * `urn:` URIs are not pages, so the download URL stands in for them.
 */
const defaultRule: ExtractRule = (entry, now) => {
  const downloadUrl = enclosureUrl(entry, false) ?? text(entry.link);
  const id = identifier(entry);

  return {
    title: text(entry.title),
    url: id && HTTP_URL.test(id) ? id : downloadUrl,
    download_url: downloadUrl,
    published_time: publishedTime(entry, now),
  };
};

const RULES: Record<ContentExtractor, ExtractRule> = {
  mikan: torrentEnclosureRule,
  dmhy: torrentEnclosureRule,
  nyaa: nyaaRule,
  default: defaultRule,
};

export function extractCandidate(extractor: ContentExtractor, entry: FeedEntry, now: Date = new Date()): CandidateItem {
  return RULES[extractor](entry, now);
}
