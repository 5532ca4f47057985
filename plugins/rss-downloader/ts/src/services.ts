/**
 * Services container
 *
 * Every component is built once here and handed to the ones that need it.
 */

import { createDatabase, createLogger, errorMessage, setLogLevel } from '@rss-downloader/utils';
import type { Database } from '@rss-downloader/utils';
import { DownloaderRegistry } from './clients/registry.js';
import { loadRuntimeConfig } from './config.js';
import { ConfigStore } from './config-store.js';
import { DownloadLedger } from './database.js';
import { WebhookNotifier } from './notifier.js';
import type { Notifier } from './notifier.js';
import { Orchestrator } from './orchestrator.js';
import { FeedParser } from './parser.js';
import type { FeedParserOptions } from './parser.js';
import { PatternCache } from './pattern-cache.js';
import { FeedScheduler } from './scheduler.js';
import type { RuntimeConfig } from './types.js';

const logger = createLogger('rss-downloader:services');

export interface Services {
  runtime: RuntimeConfig;
  store: ConfigStore;
  patterns: PatternCache;
  parser: FeedParser;
  ledger: DownloadLedger;
  downloaders: DownloaderRegistry;
  notifier: Notifier;
  orchestrator: Orchestrator;
  scheduler: FeedScheduler;
}

export interface CreateServicesOptions {
  runtime?: RuntimeConfig;
  /** Explicit YAML path; wins over the runtime config */
  configPath?: string;
  database?: Database;
  notifier?: Notifier;
  parser?: FeedParserOptions;
}

export function createServices(options: CreateServicesOptions = {}): Services {
  const runtime = options.runtime ?? loadRuntimeConfig();
  if (runtime.log_level) {
    setLogLevel(runtime.log_level);
  }

  const configPath = options.configPath ?? runtime.config_path;
  if (!configPath) {
    throw new Error('No configuration path resolved');
  }

  const store = new ConfigStore(configPath);
  const patterns = new PatternCache(store);
  const parser = new FeedParser(store, patterns, options.parser);
  const ledger = new DownloadLedger(options.database ?? createDatabase(runtime.database_url));
  const downloaders = new DownloaderRegistry(store);
  const notifier = options.notifier ?? new WebhookNotifier(store);
  const orchestrator = new Orchestrator({ store, parser, ledger, downloaders, notifier });
  const scheduler = new FeedScheduler(store, orchestrator);

  return { runtime, store, patterns, parser, ledger, downloaders, notifier, orchestrator, scheduler };
}

export interface StartOptions {
  /** Connect downloader back-ends (not needed for history or admin commands) */
  downloaders?: boolean;
}

/**
 * Loads the config, prepares the schema and connects back-ends.
 */
export async function initializeServices(services: Services, options: StartOptions = {}): Promise<void> {
  await services.store.initialize();
  await services.ledger.initialize();
  if (options.downloaders ?? true) {
    await services.downloaders.initialize();
  }
}

export interface Stoppable {
  stop(): Promise<void>;
}

/**
 * Stops the scheduler, the config watcher and the web server, waits for a
 * run in progress, then closes the database pool.
 */
export async function shutdownServices(services: Services, server?: Stoppable): Promise<void> {
  services.scheduler.stop();
  services.store.stopWatching();

  if (server) {
    try {
      await server.stop();
    } catch (error) {
      logger.error('Failed to stop server', { error: errorMessage(error) });
    }
  }

  await services.scheduler.idle();
  services.downloaders.close();
  await services.ledger.close();
  logger.info('Shutdown complete');
}
