/**
 * Base Downloader Client
 */

import type { AxiosInstance } from 'axios';
import { createHttpClient, createLogger, describeHttpError } from '@rss-downloader/utils';
import type { Logger } from '@rss-downloader/utils';
import { DownloaderError } from '../errors.js';
import type { DownloaderErrorKind } from '../errors.js';
import type { DownloaderType } from '../types.js';

export const HEALTH_CHECK_TIMEOUT_MS = 5000;
export const ADD_LINK_TIMEOUT_MS = 10000;

export type AddLinkOutcome =
  | { status: 'success'; acknowledgement: string }
  | { status: 'failure'; error: DownloaderError };

export interface DownloaderClient {
  readonly type: DownloaderType;
  /** Establishes whatever session the back-end needs; throws DownloaderConnectionError */
  connect(): Promise<void>;
  /** Health check; throws DownloaderConnectionError when the back-end does not answer */
  getVersion(): Promise<string>;
  /** Never throws: every failure is reported through the outcome */
  addLink(url: string): Promise<AddLinkOutcome>;
}

export abstract class BaseDownloaderClient implements DownloaderClient {
  abstract readonly type: DownloaderType;

  protected http: AxiosInstance;
  protected logger: Logger;

  constructor(name: string, http?: AxiosInstance) {
    this.http = http ?? createHttpClient({ timeout: ADD_LINK_TIMEOUT_MS });
    this.logger = createLogger(`rss-downloader:${name}`);
  }

  abstract connect(): Promise<void>;
  abstract getVersion(): Promise<string>;
  abstract addLink(url: string): Promise<AddLinkOutcome>;

  protected succeeded(acknowledgement: string): AddLinkOutcome {
    return { status: 'success', acknowledgement };
  }

  protected failed(kind: DownloaderErrorKind, message: string): AddLinkOutcome {
    return { status: 'failure', error: new DownloaderError(this.type, kind, message) };
  }

  /**
   * Failure outcome for an exception thrown while talking to the back-end.
   */
  protected transportFailure(error: unknown, url: string): AddLinkOutcome {
    const message = describeHttpError(error);
    this.logger.error('Request to downloader failed', { url, error: message });
    return this.failed('transport', message);
  }
}
