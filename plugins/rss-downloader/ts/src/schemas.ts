/**
 * Validation Schemas
 * Zod schemas for the YAML configuration, parsed feed entries and API bodies
 */

import { z } from 'zod';
import { compilePattern } from './pattern-cache.js';
import {
  CONTENT_EXTRACTORS,
  DOWNLOADER_TYPES,
  DOWNLOAD_MODES,
  DOWNLOAD_STATUSES,
  LOG_LEVEL_NAMES,
} from './types.js';
import type { ContentExtractor } from './types.js';

const HTTP_URL = /^https?:\/\//i;

export const HttpUrlSchema = z
  .string()
  .trim()
  .url('must be a valid URL')
  .refine(value => HTTP_URL.test(value), 'must use http or https');

export const DownloaderTypeSchema = z.enum(DOWNLOADER_TYPES);
export const ContentExtractorSchema = z.enum(CONTENT_EXTRACTORS);
export const DownloadStatusSchema = z.enum(DOWNLOAD_STATUSES);
export const DownloadModeSchema = z.enum(DOWNLOAD_MODES);

const EXTRACTOR_DOMAINS: ReadonlyArray<[ContentExtractor, readonly string[]]> = [
  ['mikan', ['mikanime.tv', 'mikanani.me']],
  ['nyaa', ['nyaa.si']],
  ['dmhy', ['dmhy.org']],
];

/**
 * Picks an extractor from the feed host when the feed leaves it at `default`.
 */
export function deriveContentExtractor(url: string, extractor: ContentExtractor): ContentExtractor {
  if (extractor !== 'default') {
    return extractor;
  }

  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return extractor;
  }

  for (const [name, domains] of EXTRACTOR_DOMAINS) {
    if (domains.some(domain => hostname.endsWith(domain))) {
      return name;
    }
  }
  return extractor;
}

// ============================================================================
// Application Configuration
// ============================================================================

export const LogConfigSchema = z.object({
  level: z
    .string()
    .transform(value => value.trim().toUpperCase())
    .pipe(z.enum(LOG_LEVEL_NAMES))
    .default('INFO'),
});

export const WebConfigSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8000),
  interval_hours: z.number().int().positive('interval_hours must be a positive integer').default(6),
});

export const Aria2ConfigSchema = z.object({
  rpc: HttpUrlSchema.default('http://127.0.0.1:6800/jsonrpc'),
  secret: z.string().nullable().default(null),
  dir: z.string().nullable().default(null),
});

export const QBittorrentConfigSchema = z.object({
  host: HttpUrlSchema.default('http://127.0.0.1:8080'),
  username: z.string().nullable().default(null),
  password: z.string().nullable().default(null),
});

export const TransmissionConfigSchema = z.object({
  host: HttpUrlSchema.default('http://127.0.0.1:9091'),
  username: z.string().nullable().default(null),
  password: z.string().nullable().default(null),
  dir: z.string().nullable().default(null),
});

/** Connection sections only, as accepted by the connection test */
export const BackendSectionsSchema = z.object({
  aria2: Aria2ConfigSchema.nullable().default(null),
  qbittorrent: QBittorrentConfigSchema.nullable().default(null),
  transmission: TransmissionConfigSchema.nullable().default(null),
});

export const FeedConfigSchema = z
  .object({
    name: z.string().trim().min(1, 'feed name is required'),
    url: HttpUrlSchema,
    include: z.array(z.string()).default([]),
    exclude: z.array(z.string()).default([]),
    downloader: DownloaderTypeSchema.default('aria2'),
    content_extractor: ContentExtractorSchema.default('default'),
  })
  .transform(feed => ({
    ...feed,
    content_extractor: deriveContentExtractor(feed.url, feed.content_extractor),
  }));

export const WebhookConfigSchema = z.object({
  name: z.string().trim().min(1, 'webhook name is required'),
  url: HttpUrlSchema,
  enabled: z.boolean().default(true),
});

export const AppConfigSchema = z
  .object({
    log: LogConfigSchema.default({}),
    web: WebConfigSchema.default({}),
    aria2: Aria2ConfigSchema.nullable().default(null),
    qbittorrent: QBittorrentConfigSchema.nullable().default(null),
    transmission: TransmissionConfigSchema.nullable().default(null),
    feeds: z.array(FeedConfigSchema).default([]),
    webhooks: z.array(WebhookConfigSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.feeds.forEach((feed, index) => {
      const key = feed.name.trim().toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['feeds', index, 'name'],
          message: `Duplicate feed name: ${feed.name}`,
        });
      }
      seen.add(key);

      if (config[feed.downloader] === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['feeds', index, 'downloader'],
          message: `Feed "${feed.name}" uses ${feed.downloader} but no ${feed.downloader} section is configured`,
        });
      }

      for (const [kind, patterns] of [['include', feed.include], ['exclude', feed.exclude]] as const) {
        patterns.forEach((pattern, patternIndex) => {
          try {
            compilePattern(pattern);
          } catch (error) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['feeds', index, kind, patternIndex],
              message: `Feed "${feed.name}" has an invalid ${kind} pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`,
            });
          }
        });
      }
    });
  });

/**
 * Formats zod issues as "path: message" lines for ConfigValidationError.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// ============================================================================
// Feed Entries
// ============================================================================

export const ParsedItemSchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
  url: HttpUrlSchema,
  download_url: z.string().trim().min(1, 'download_url is required'),
  published_time: z.date(),
});

// ============================================================================
// API Bodies & Queries
// ============================================================================

export const RedownloadBodySchema = z.object({
  downloader: DownloaderTypeSchema,
});

export type RedownloadBody = z.infer<typeof RedownloadBodySchema>;

const QueryDateSchema = z
  .string()
  .trim()
  .refine(value => !Number.isNaN(Date.parse(value)), 'must be an ISO date or date-time');

export const DownloadQuerySchema = z.object({
  title: z.string().optional(),
  feed_name: z.string().optional(),
  downloader: DownloaderTypeSchema.optional(),
  status: DownloadStatusSchema.optional(),
  mode: DownloadModeSchema.optional(),
  published_start: QueryDateSchema.optional(),
  published_end: QueryDateSchema.optional(),
  download_start: QueryDateSchema.optional(),
  download_end: QueryDateSchema.optional(),
  page: z.string().optional(),
  limit: z.string().optional(),
});

export type DownloadQuery = z.infer<typeof DownloadQuerySchema>;
