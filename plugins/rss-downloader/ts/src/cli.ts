#!/usr/bin/env tsx
/**
 * RSS Downloader CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger, errorMessage, validateEnum, validateId, validatePositiveInt } from '@rss-downloader/utils';
import { RssDownloaderError } from './errors.js';
import { RssDownloaderServer, buildSearchFilters } from './server.js';
import { createServices, initializeServices, shutdownServices } from './services.js';
import type { Services } from './services.js';
import { DOWNLOADER_TYPES, DOWNLOAD_STATUSES } from './types.js';
import type { DownloadRecord } from './types.js';

const logger = createLogger('rss-downloader:cli');
const program = new Command();

program
  .name('rss-downloader')
  .description('Watch RSS feeds and send matching entries to aria2, qBittorrent or Transmission')
  .version('1.0.0')
  .option('-c, --config <path>', 'YAML configuration file');

function servicesFromOptions(): Services {
  const { config } = program.opts<{ config?: string }>();
  return createServices({ configPath: config });
}

function fail(error: unknown): never {
  const message = errorMessage(error);
  console.error(chalk.red(message));
  if (error instanceof RssDownloaderError && error.details) {
    console.error(chalk.gray(JSON.stringify(error.details)));
  }
  process.exit(1);
}

function formatRecord(record: DownloadRecord): string {
  const status = record.status === 'success' ? chalk.green('ok  ') : chalk.red('fail');
  const mode = record.mode === 'manual' ? chalk.yellow(' (manual)') : '';
  return `${chalk.gray(String(record.id).padStart(5))} ${status} ${record.download_time.toISOString()} ` +
    `${chalk.cyan(record.downloader)} ${record.feed_name}: ${record.title}${mode}`;
}

// ============================================================================
// Run Command
// ============================================================================

program
  .command('run')
  .description('Process every configured feed once')
  .action(async () => {
    const services = servicesFromOptions();
    const spinner = ora('Initializing').start();

    try {
      await initializeServices(services);
      spinner.text = 'Processing feeds';
      const summary = await services.orchestrator.runOnce();
      spinner.succeed(
        `Processed ${summary.feeds} feed(s): ${summary.total} entries, ${summary.matched} matched, ${summary.dispatched} dispatched`
      );
      if (summary.failed_feeds > 0) {
        console.log(chalk.yellow(`${summary.failed_feeds} feed(s) failed, see log for details`));
      }
      await shutdownServices(services);
    } catch (error) {
      spinner.fail('Run failed');
      await shutdownServices(services).catch((shutdownError: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(shutdownError) });
      });
      fail(error);
    }
  });

// ============================================================================
// Start Command
// ============================================================================

program
  .command('start')
  .description('Run feeds on a schedule, watching the config file for changes')
  .option('-w, --web', 'Serve the HTTP API even if web.enabled is false')
  .option('--no-initial-run', 'Wait for the first scheduled tick instead of running immediately')
  .action(async (options: { web?: boolean; initialRun: boolean }) => {
    const services = servicesFromOptions();
    let server: RssDownloaderServer | undefined;

    try {
      await initializeServices(services);
      services.store.startWatching();
      services.scheduler.start();

      const { web } = services.store.get();
      if (options.web || web.enabled) {
        server = new RssDownloaderServer(services, {
          host: web.host,
          port: web.port,
        });
        await server.initialize();
        await server.start();
      }

      if (options.initialRun) {
        await services.scheduler.trigger();
      }
    } catch (error) {
      await shutdownServices(services, server).catch((shutdownError: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(shutdownError) });
      });
      fail(error);
    }

    const stop = (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      shutdownServices(services, server)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    };
    process.once('SIGINT', () => stop('SIGINT'));
    process.once('SIGTERM', () => stop('SIGTERM'));
  });

// ============================================================================
// History Command
// ============================================================================

program
  .command('history')
  .description('List recorded dispatch attempts, newest first')
  .option('-t, --title <text>', 'Title contains')
  .option('-f, --feed <text>', 'Feed name contains')
  .option('-d, --downloader <name>', `Downloader (${DOWNLOADER_TYPES.join(', ')})`)
  .option('-s, --status <status>', 'success or failure')
  .option('--since <date>', 'Dispatched on or after')
  .option('--until <date>', 'Dispatched on or before')
  .option('-l, --limit <n>', 'Number of records', '20')
  .action(async (options: { title?: string; feed?: string; downloader?: string; status?: string; since?: string; until?: string; limit: string }) => {
    const services = servicesFromOptions();

    try {
      await initializeServices(services, { downloaders: false });
      const filters = buildSearchFilters({
        title: options.title,
        feed_name: options.feed,
        downloader: validateEnum(options.downloader, DOWNLOADER_TYPES),
        status: validateEnum(options.status, DOWNLOAD_STATUSES),
        download_start: options.since,
        download_end: options.until,
      });
      const { records, total } = await services.ledger.search(filters, {
        limit: validatePositiveInt(options.limit, 20),
        offset: 0,
      });

      if (records.length === 0) {
        console.log(chalk.gray('No records found'));
      }
      for (const record of records) {
        console.log(formatRecord(record));
      }
      console.log(chalk.gray(`\n${records.length} of ${total} record(s)`));
      await shutdownServices(services);
    } catch (error) {
      await shutdownServices(services).catch((shutdownError: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(shutdownError) });
      });
      fail(error);
    }
  });

// ============================================================================
// Redownload Command
// ============================================================================

program
  .command('redownload <id>')
  .description('Send a recorded item to a downloader again')
  .requiredOption('-d, --downloader <name>', `Downloader (${DOWNLOADER_TYPES.join(', ')})`)
  .action(async (rawId: string, options: { downloader: string }) => {
    const id = validateId(rawId);
    const downloader = validateEnum(options.downloader, DOWNLOADER_TYPES);
    if (id === null) {
      fail(new Error(`Invalid id: ${rawId}`));
    }
    if (!downloader) {
      fail(new Error(`Unknown downloader: ${options.downloader}`));
    }

    const services = servicesFromOptions();
    const spinner = ora(`Redownloading record ${id} via ${downloader}`).start();

    try {
      await initializeServices(services);
      const record = await services.orchestrator.redownload(id, downloader);
      spinner.succeed(`Dispatched as record ${record.id}: ${record.title}`);
      await shutdownServices(services);
    } catch (error) {
      spinner.fail('Redownload failed');
      await shutdownServices(services).catch((shutdownError: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(shutdownError) });
      });
      fail(error);
    }
  });

// ============================================================================
// Reset Command
// ============================================================================

program
  .command('reset-db')
  .description('Delete the entire download history')
  .option('-y, --yes', 'Confirm the wipe')
  .action(async (options: { yes?: boolean }) => {
    if (!options.yes) {
      console.log(chalk.yellow('This deletes every download record. Re-run with --yes to confirm.'));
      return;
    }

    const services = servicesFromOptions();
    const spinner = ora('Resetting download history').start();

    try {
      await initializeServices(services, { downloaders: false });
      await services.ledger.reset();
      spinner.succeed('Download history cleared');
      await shutdownServices(services);
    } catch (error) {
      spinner.fail('Reset failed');
      await shutdownServices(services).catch((shutdownError: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(shutdownError) });
      });
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
