/**
 * Retry helper with exponential backoff
 */

import type { RetryConfig } from './types.js';
import { DEFAULT_RETRY_CONFIG } from './types.js';
import { createLogger } from './logger.js';

const logger = createLogger('retry');

export interface RetryOptions extends RetryConfig {
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: Error) => boolean;
  label?: string;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const config: RetryOptions = { ...DEFAULT_RETRY_CONFIG, ...options };
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === config.maxRetries || (config.shouldRetry && !config.shouldRetry(lastError))) {
        break;
      }

      const delay = Math.min(
        config.baseDelay * Math.pow(config.backoffMultiplier, attempt),
        config.maxDelay
      );

      logger.warn(`Retry attempt ${attempt + 1}/${config.maxRetries}`, {
        label: config.label,
        error: lastError.message,
        nextRetryIn: delay,
      });

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
