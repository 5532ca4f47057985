/**
 * Hot-reloadable YAML configuration store
 *
 * Holds the validated application config, writes updates back to disk, and
 * polls the file for external edits. Every committed change bumps a version
 * counter that PatternCache keys its entries on.
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import YAML from 'yaml';
import { createLogger, errorMessage, normalizeLogLevel, setLogLevel } from '@rss-downloader/utils';
import { ConfigValidationError } from './errors.js';
import { AppConfigSchema, formatIssues } from './schemas.js';
import type { AppConfig, ConfigSnapshot, DeepPartial } from './types.js';

const logger = createLogger('rss-downloader:config-store');

export const DEFAULT_WATCH_INTERVAL_MS = 5000;

export type ConfigChangeSource = 'update' | 'reload';

export type ConfigListener = (
  snapshot: ConfigSnapshot,
  previous: ConfigSnapshot,
  source: ConfigChangeSource
) => void | Promise<void>;

export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Validates a candidate config, throwing ConfigValidationError with every
 * issue found.
 */
export function validateAppConfig(candidate: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(candidate ?? {});
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Recursive merge where plain objects merge key by key and anything else in
 * the patch (arrays, scalars, null) replaces the base value. Undefined patch
 * values leave the base untouched.
 */
export function deepMerge(base: unknown, patch: unknown): unknown {
  if (patch === undefined) {
    return base;
  }
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch;
  }

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

interface FileStamp {
  mtimeMs: number;
  size: number;
}

export class ConfigStore {
  readonly path: string;
  private current: ConfigSnapshot;
  private lastStamp: FileStamp | null = null;
  private lock: Promise<void> = Promise.resolve();
  private watchTimer: NodeJS.Timeout | null = null;
  private listeners = new Set<ConfigListener>();

  constructor(path: string) {
    this.path = path;
    this.current = { config: deepFreeze(defaultConfig()), version: 0 };
  }

  /**
   * Loads the file (creating it when missing), fills in defaults and writes
   * the filled result back when it differs from what is on disk. An invalid
   * file at startup is fatal.
   */
  async initialize(): Promise<void> {
    await this.exclusive(async () => {
      const raw = await this.readRaw();
      const config = validateAppConfig(raw);

      if (!isDeepStrictEqual(toPlain(config), raw ?? {})) {
        await this.writeFile(config);
        logger.info('Configuration file filled with defaults', { path: this.path });
      }

      this.lastStamp = await this.stampOf();
      this.current = { config: deepFreeze(config), version: this.current.version };
      this.applyLogLevel(config);
      logger.info('Configuration loaded', {
        path: this.path,
        feeds: config.feeds.length,
        webhooks: config.webhooks.length,
      });
    });
  }

  get(): Readonly<AppConfig> {
    return this.current.config;
  }

  version(): number {
    return this.current.version;
  }

  /**
   * Config and version read together, so callers can pin both for the
   * duration of one operation.
   */
  snapshot(): ConfigSnapshot {
    return this.current;
  }

  subscribe(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Deep-merges a partial config into the current one, validates the result
   * and commits it only when valid. The previous config stays active when
   * validation or the write-back fails. Untyped patches (API bodies) are
   * accepted since the merged result is validated as a whole.
   */
  async update(partial: DeepPartial<AppConfig> | Record<string, unknown>): Promise<ConfigSnapshot> {
    const change = await this.exclusive(async () => {
      const merged = deepMerge(toPlain(this.current.config), partial);
      const config = validateAppConfig(merged);

      await this.writeFile(config);
      this.lastStamp = await this.stampOf();
      return this.commit(config);
    });

    logger.info('Configuration updated', { version: change.snapshot.version });
    await this.notify(change.snapshot, change.previous, 'update');
    return change.snapshot;
  }

  /**
   * One poll of the backing file. Returns true when a changed, valid file was
   * reloaded. A file that fails validation is logged once per modification.
   */
  async checkForChanges(): Promise<boolean> {
    const change = await this.exclusive(async () => {
      const stamp = await this.stampOf();
      if (!stamp || (this.lastStamp && sameStamp(stamp, this.lastStamp))) {
        return null;
      }
      this.lastStamp = stamp;

      try {
        const config = validateAppConfig(await this.readRaw());
        return this.commit(config);
      } catch (error) {
        logger.error('Configuration reload rejected, keeping previous config', {
          path: this.path,
          version: this.current.version,
          error: errorMessage(error),
        });
        return null;
      }
    });

    if (!change) {
      return false;
    }

    logger.info('Configuration reloaded', { path: this.path, version: change.snapshot.version });
    await this.notify(change.snapshot, change.previous, 'reload');
    return true;
  }

  startWatching(intervalMs = DEFAULT_WATCH_INTERVAL_MS): void {
    if (this.watchTimer) return;

    this.watchTimer = setInterval(() => {
      this.checkForChanges().catch((error: unknown) => {
        logger.error('Configuration watcher failed', { error: errorMessage(error) });
      });
    }, intervalMs);
    logger.debug('Watching configuration file', { path: this.path, intervalMs });
  }

  stopWatching(): void {
    if (this.watchTimer) {
      clearInterval(this.watchTimer);
      this.watchTimer = null;
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private commit(config: AppConfig): { snapshot: ConfigSnapshot; previous: ConfigSnapshot } {
    const previous = this.current;
    this.current = { config: deepFreeze(config), version: previous.version + 1 };
    this.applyLogLevel(config);
    return { snapshot: this.current, previous };
  }

  private async notify(snapshot: ConfigSnapshot, previous: ConfigSnapshot, source: ConfigChangeSource): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(snapshot, previous, source);
      } catch (error) {
        logger.error('Configuration listener failed', { source, error: errorMessage(error) });
      }
    }
  }

  private applyLogLevel(config: AppConfig): void {
    const level = normalizeLogLevel(config.log.level);
    if (level) {
      setLogLevel(level);
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async readRaw(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.warn('Configuration file not found, creating it', { path: this.path });
        return {};
      }
      throw error;
    }

    try {
      return YAML.parse(text) ?? {};
    } catch (error) {
      throw new ConfigValidationError([`${this.path}: ${errorMessage(error)}`]);
    }
  }

  private async writeFile(config: AppConfig): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, YAML.stringify(toPlain(config)), 'utf8');
  }

  private async stampOf(): Promise<FileStamp | null> {
    try {
      const stats = await stat(this.path);
      return { mtimeMs: stats.mtimeMs, size: stats.size };
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }
}

function toPlain(config: Readonly<AppConfig>): AppConfig {
  return structuredClone(config);
}

function sameStamp(a: FileStamp, b: FileStamp): boolean {
  return a.mtimeMs === b.mtimeMs && a.size === b.size;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
