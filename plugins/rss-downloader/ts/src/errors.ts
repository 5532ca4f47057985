/**
 * RSS Downloader Errors
 */

import type { DownloaderType } from './types.js';

export class RssDownloaderError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RssDownloaderError';
    this.code = code;
    this.details = details;
  }
}

export class ConfigValidationError extends RssDownloaderError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`, { issues });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * rejected: the back-end answered and refused the link.
 * transport: the request never produced a usable answer (timeout, refused connection, bad status).
 * unavailable: the back-end is not configured or was disabled at startup.
 */
export type DownloaderErrorKind = 'rejected' | 'transport' | 'unavailable';

export class DownloaderError extends RssDownloaderError {
  readonly kind: DownloaderErrorKind;
  readonly downloader: DownloaderType;

  constructor(downloader: DownloaderType, kind: DownloaderErrorKind, message: string) {
    super('DOWNLOADER_ERROR', message, { downloader, kind });
    this.name = 'DownloaderError';
    this.kind = kind;
    this.downloader = downloader;
  }
}

export class DownloaderConnectionError extends RssDownloaderError {
  readonly downloader: DownloaderType;

  constructor(downloader: DownloaderType, message: string) {
    super('DOWNLOADER_CONNECTION_FAILED', message, { downloader });
    this.name = 'DownloaderConnectionError';
    this.downloader = downloader;
  }
}

export class ItemNotFoundError extends RssDownloaderError {
  constructor(id: number) {
    super('ITEM_NOT_FOUND', `Download record ${id} not found`, { id });
    this.name = 'ItemNotFoundError';
  }
}

export class InvalidRecordError extends RssDownloaderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_RECORD', message, details);
    this.name = 'InvalidRecordError';
  }
}
