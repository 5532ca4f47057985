/**
 * Scheduler tests
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { FeedScheduler, intervalMsFor } from '../src/scheduler.js';
import type { Runner } from '../src/scheduler.js';
import type { RunSummary } from '../src/types.js';
import { createTempDir, openConfigStore } from './helpers.js';
import type { TempDir } from './helpers.js';

const SUMMARY: RunSummary = { feeds: 1, failed_feeds: 0, total: 2, matched: 1, dispatched: 1 };

/** Runner whose run stays in progress until release() is called */
class ManualRunner implements Runner {
  calls = 0;
  private pending: Array<(summary: RunSummary) => void> = [];

  runOnce(): Promise<RunSummary> {
    this.calls++;
    return new Promise(resolve => this.pending.push(resolve));
  }

  release(): void {
    for (const resolve of this.pending.splice(0)) {
      resolve(SUMMARY);
    }
  }
}

describe('intervalMsFor', () => {
  it('converts whole hours to milliseconds', () => {
    assert.equal(intervalMsFor(1), 3_600_000);
    assert.equal(intervalMsFor(5), 18_000_000);
    assert.equal(intervalMsFor(30), 108_000_000);
  });

  it('never goes below one hour', () => {
    assert.equal(intervalMsFor(0), 3_600_000);
  });
});

describe('FeedScheduler', () => {
  let dir: TempDir | undefined;
  let scheduler: FeedScheduler | undefined;

  afterEach(async () => {
    scheduler?.stop();
    scheduler = undefined;
    mock.timers.reset();
    await dir?.cleanup();
    dir = undefined;
  });

  it('never runs twice at once', async () => {
    dir = await createTempDir();
    const store = await openConfigStore(dir, {});
    const runner = new ManualRunner();
    scheduler = new FeedScheduler(store, runner);

    const first = scheduler.trigger();
    assert.equal(scheduler.isRunning, true);
    assert.equal(await scheduler.trigger(), null);

    runner.release();
    assert.deepEqual(await first, SUMMARY);
    assert.equal(scheduler.isRunning, false);
    assert.equal(runner.calls, 1);

    const again = scheduler.trigger();
    runner.release();
    assert.deepEqual(await again, SUMMARY);
    assert.equal(runner.calls, 2);
  });

  it('waits for the run in progress when idling', async () => {
    dir = await createTempDir();
    const store = await openConfigStore(dir, {});
    const runner = new ManualRunner();
    scheduler = new FeedScheduler(store, runner);

    const run = scheduler.trigger();
    const idle = scheduler.idle();
    runner.release();
    await idle;

    assert.deepEqual(await run, SUMMARY);
  });

  it('follows interval changes while started', async () => {
    dir = await createTempDir();
    const store = await openConfigStore(dir, { web: { interval_hours: 6 } });
    scheduler = new FeedScheduler(store, new ManualRunner());

    scheduler.start();
    assert.equal(scheduler.scheduledIntervalMs, 6 * 3_600_000);

    await store.update({ web: { interval_hours: 30 } });
    assert.equal(scheduler.scheduledIntervalMs, 30 * 3_600_000);

    scheduler.stop();
    assert.equal(scheduler.scheduledIntervalMs, null);

    await store.update({ web: { interval_hours: 12 } });
    assert.equal(scheduler.scheduledIntervalMs, null);
  });

  it('runs on a fixed interval counted from the end of each run', async () => {
    dir = await createTempDir();
    const store = await openConfigStore(dir, { web: { interval_hours: 5 } });
    const runner = new ManualRunner();
    const fiveHours = 5 * 3_600_000;

    mock.timers.enable({ apis: ['setTimeout'] });
    scheduler = new FeedScheduler(store, runner);
    scheduler.start();

    mock.timers.tick(fiveHours - 1);
    assert.equal(runner.calls, 0);
    mock.timers.tick(1);
    assert.equal(runner.calls, 1);

    // A slow run delays the next one instead of overlapping it
    mock.timers.tick(fiveHours);
    assert.equal(runner.calls, 1);

    runner.release();
    await new Promise(resolve => setImmediate(resolve));

    mock.timers.tick(fiveHours - 1);
    assert.equal(runner.calls, 1);
    mock.timers.tick(1);
    assert.equal(runner.calls, 2);

    runner.release();
    await new Promise(resolve => setImmediate(resolve));
    mock.timers.tick(fiveHours);
    assert.equal(runner.calls, 3);
  });

  it('stops firing once stopped', async () => {
    dir = await createTempDir();
    const store = await openConfigStore(dir, { web: { interval_hours: 7 } });
    const runner = new ManualRunner();

    mock.timers.enable({ apis: ['setTimeout'] });
    scheduler = new FeedScheduler(store, runner);
    scheduler.start();
    scheduler.stop();

    mock.timers.tick(7 * 3_600_000);
    assert.equal(runner.calls, 0);
  });
});
