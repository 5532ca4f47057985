/**
 * HTTP client utilities for rss-downloader
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';

export const USER_AGENT = 'rss-downloader/1.0';

export interface HttpClientConfig {
  baseUrl?: string;
  headers?: Record<string, string>;
  /** Milliseconds; applies to every request unless overridden per call */
  timeout?: number;
  auth?: { username: string; password: string };
}

/**
 * Axios instance that never rejects on an HTTP status: callers decide what a
 * non-2xx answer means for their protocol.
 */
export function createHttpClient(config: HttpClientConfig = {}): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeout ?? 10000,
    headers: {
      'User-Agent': USER_AGENT,
      ...config.headers,
    },
    auth: config.auth,
    validateStatus: () => true,
  });
}

export class HttpError extends Error {
  status: number;
  response: unknown;

  constructor(status: number, message: string, response?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.response = response;
  }
}

export function isSuccessStatus(response: AxiosResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Human-readable cause of a failed request: timeout, refused connection,
 * HTTP status, or the plain error message.
 */
export function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return `request timed out (${error.message})`;
    }
    if (error.response) {
      return `HTTP ${error.response.status} ${error.response.statusText}`.trim();
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof HttpError) {
    return `HTTP ${error.status}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
