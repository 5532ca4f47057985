/**
 * RSS Downloader Types
 */

import type { LogLevel } from '@rss-downloader/utils';

// ============================================================================
// Enums
// ============================================================================

export const DOWNLOADER_TYPES = ['aria2', 'qbittorrent', 'transmission'] as const;
export type DownloaderType = typeof DOWNLOADER_TYPES[number];

export const CONTENT_EXTRACTORS = ['default', 'mikan', 'nyaa', 'dmhy'] as const;
export type ContentExtractor = typeof CONTENT_EXTRACTORS[number];

export const DOWNLOAD_STATUSES = ['success', 'failure'] as const;
export type DownloadStatus = typeof DOWNLOAD_STATUSES[number];

export const DOWNLOAD_MODES = ['automatic', 'manual'] as const;
export type DownloadMode = typeof DOWNLOAD_MODES[number];

/** Level names accepted in the YAML file, normalised to upper case */
export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'SUCCESS', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevelName = typeof LOG_LEVEL_NAMES[number];

// ============================================================================
// Application Configuration (YAML)
// ============================================================================

export interface FeedConfig {
  name: string;
  url: string;
  include: string[];
  exclude: string[];
  downloader: DownloaderType;
  content_extractor: ContentExtractor;
}

export interface Aria2Config {
  rpc: string;
  secret: string | null;
  dir: string | null;
}

export interface QBittorrentConfig {
  host: string;
  username: string | null;
  password: string | null;
}

export interface TransmissionConfig {
  host: string;
  username: string | null;
  password: string | null;
  dir: string | null;
}

export interface WebhookConfig {
  name: string;
  url: string;
  enabled: boolean;
}

export interface WebConfig {
  enabled: boolean;
  host: string;
  port: number;
  interval_hours: number;
}

export interface AppConfig {
  log: { level: LogLevelName };
  web: WebConfig;
  aria2: Aria2Config | null;
  qbittorrent: QBittorrentConfig | null;
  transmission: TransmissionConfig | null;
  feeds: FeedConfig[];
  webhooks: WebhookConfig[];
}

/**
 * Recursive partial used by ConfigStore.update(). Arrays are replaced as a
 * whole, never merged element by element.
 */
export type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> | null }
    : T;

export interface ConfigSnapshot {
  config: Readonly<AppConfig>;
  version: number;
}

// ============================================================================
// Runtime Environment
// ============================================================================

export interface RuntimeConfig {
  database_url?: string;
  config_path?: string;
  log_level?: LogLevel;
  api_key?: string;
}

// ============================================================================
// Pipeline Records
// ============================================================================

export interface ParsedItem {
  title: string;
  url: string;
  download_url: string;
  published_time: Date;
}

export interface ParseResult {
  total: number;
  items: ParsedItem[];
}

export interface NewDownloadRecord {
  title: string;
  url: string;
  download_url: string;
  feed_name: string;
  feed_url: string;
  published_time: Date;
  download_time: Date;
  downloader: DownloaderType;
  status: DownloadStatus;
  mode: DownloadMode;
}

export interface DownloadRecord extends NewDownloadRecord {
  id: number;
}

export interface DownloadSearchFilters {
  title?: string;
  feed_name?: string;
  downloader?: DownloaderType;
  status?: DownloadStatus;
  mode?: DownloadMode;
  published_start?: Date;
  published_end?: Date;
  download_start?: Date;
  download_end?: Date;
}

export interface DownloadSearchResult {
  records: DownloadRecord[];
  total: number;
}

export interface FeedRunStats {
  total: number;
  matched: number;
  dispatched: number;
}

export interface RunSummary extends FeedRunStats {
  feeds: number;
  failed_feeds: number;
}
