/**
 * rss-downloader shared utilities
 */

export * from './types.js';
export * from './logger.js';
export * from './database.js';
export * from './http.js';
export * from './retry.js';
export * from './validation.js';
export * from './security.js';
