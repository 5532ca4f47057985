/**
 * RSS Downloader
 * Feed watching, filtering, deduplication and dispatch to download back-ends
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './config-store.js';
export * from './schemas.js';
export * from './pattern-cache.js';
export * from './extractors.js';
export * from './parser.js';
export * from './database.js';
export * from './clients/base.js';
export * from './clients/aria2.js';
export * from './clients/qbittorrent.js';
export * from './clients/transmission.js';
export * from './clients/registry.js';
export * from './notifier.js';
export * from './orchestrator.js';
export * from './scheduler.js';
export * from './services.js';
export * from './server.js';
