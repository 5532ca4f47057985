/**
 * Feed Scheduler
 * Runs the orchestrator every web.interval_hours, measured from the end of the
 * previous run
 */

import { createLogger, errorMessage } from '@rss-downloader/utils';
import type { ConfigStore } from './config-store.js';
import type { RunSummary } from './types.js';

const logger = createLogger('rss-downloader:scheduler');

const HOUR_MS = 3_600_000;

export interface Runner {
  runOnce(): Promise<RunSummary>;
}

export function intervalMsFor(intervalHours: number): number {
  return Math.max(1, Math.floor(intervalHours)) * HOUR_MS;
}

export class FeedScheduler {
  private store: ConfigStore;
  private runner: Runner;
  private timer: NodeJS.Timeout | null = null;
  private intervalMs: number | null = null;
  private running: Promise<RunSummary> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(store: ConfigStore, runner: Runner) {
    this.store = store;
    this.runner = runner;
  }

  /** Milliseconds between runs while started, otherwise null */
  get scheduledIntervalMs(): number | null {
    return this.intervalMs;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    this.intervalMs = intervalMsFor(this.store.get().web.interval_hours);
    this.arm();

    this.unsubscribe ??= this.store.subscribe(snapshot => {
      const intervalMs = intervalMsFor(snapshot.config.web.interval_hours);
      if (this.intervalMs !== null && intervalMs !== this.intervalMs) {
        this.intervalMs = intervalMs;
        this.arm();
      }
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.disarm();
    this.intervalMs = null;
    logger.info('Scheduler stopped');
  }

  /**
   * Runs once now. Runs never overlap: a call made while one is in progress
   * returns null without starting another.
   */
  async trigger(): Promise<RunSummary | null> {
    if (this.running) {
      logger.warn('Previous run still in progress, skipping');
      return null;
    }

    this.running = this.runner.runOnce();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  /**
   * Resolves once the run in progress (if any) has finished.
   */
  async idle(): Promise<void> {
    if (this.running) {
      await this.running.catch(() => undefined);
    }
  }

  private arm(): void {
    this.disarm();
    if (this.intervalMs === null) return;

    const delay = this.intervalMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((error: unknown) => {
        logger.error('Scheduled run failed', { error: errorMessage(error) });
      });
    }, delay);

    logger.info('Next feed check scheduled', { in_hours: delay / HOUR_MS });
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    try {
      await this.trigger();
    } finally {
      // Stopped while the run was in progress: stay stopped
      if (this.intervalMs !== null && this.timer === null) {
        this.arm();
      }
    }
  }
}
