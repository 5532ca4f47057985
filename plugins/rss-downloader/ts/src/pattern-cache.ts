/**
 * Per-feed include/exclude pattern cache
 *
 * Entries are keyed by (feed name, config version), so a config reload turns
 * every lookup into a miss without an explicit invalidation pass.
 */

import { createLogger } from '@rss-downloader/utils';
import type { ConfigSnapshot } from './types.js';

const logger = createLogger('rss-downloader:patterns');

export const DEFAULT_PATTERN_CACHE_CAPACITY = 32;

const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_INLINE_FLAGS = new Set(['i', 'm', 's']);

export interface CompiledPatterns {
  include: RegExp[];
  exclude: RegExp[];
}

export interface PatternSource {
  snapshot(): ConfigSnapshot;
}

/**
 * Compiles a filter pattern. A leading inline flag group such as `(?i)` is
 * lifted into RegExp flags, since JavaScript patterns cannot carry it inline.
 */
export function compilePattern(pattern: string): RegExp {
  const match = INLINE_FLAGS.exec(pattern);
  if (!match) {
    return new RegExp(pattern);
  }

  const flags = [...new Set(match[1].toLowerCase())];
  const unsupported = flags.filter(flag => !SUPPORTED_INLINE_FLAGS.has(flag));
  if (unsupported.length > 0) {
    throw new SyntaxError(`Unsupported inline flag(s): ${unsupported.join('')}`);
  }

  return new RegExp(pattern.slice(match[0].length), flags.join(''));
}

/**
 * Search semantics: a title passes when there are no include patterns or any
 * of them matches, and no exclude pattern matches.
 */
export function matchesPatterns(patterns: CompiledPatterns, title: string): boolean {
  if (patterns.exclude.some(pattern => pattern.test(title))) {
    return false;
  }
  return patterns.include.length === 0 || patterns.include.some(pattern => pattern.test(title));
}

export class PatternCache {
  private entries = new Map<string, CompiledPatterns>();
  private source: PatternSource;
  readonly capacity: number;

  constructor(source: PatternSource, capacity = DEFAULT_PATTERN_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('PatternCache capacity must be a positive integer');
    }
    this.source = source;
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Compiled patterns for a feed at a config version. A version older than
   * the live one is only served from the cache; on a miss the live rules are
   * compiled and stored under the live version.
   */
  patternsFor(feedName: string, version: number): CompiledPatterns {
    const cached = this.touch(cacheKey(feedName, version));
    if (cached) {
      return cached;
    }

    const snapshot = this.source.snapshot();
    if (snapshot.version !== version) {
      logger.debug('Pattern request for a superseded config version', {
        feed: feedName,
        requested: version,
        current: snapshot.version,
      });
      const current = this.touch(cacheKey(feedName, snapshot.version));
      if (current) {
        return current;
      }
    }

    const feed = snapshot.config.feeds.find(candidate => candidate.name === feedName);
    const compiled: CompiledPatterns = {
      include: (feed?.include ?? []).map(compilePattern),
      exclude: (feed?.exclude ?? []).map(compilePattern),
    };

    logger.debug('Compiled filter patterns', {
      feed: feedName,
      version: snapshot.version,
      include: compiled.include.length,
      exclude: compiled.exclude.length,
    });

    this.store(cacheKey(feedName, snapshot.version), compiled);
    return compiled;
  }

  /**
   * Whether a title passes a feed's filters under the live config version.
   */
  matchFilters(title: string, feedName: string): boolean {
    const { version } = this.source.snapshot();
    return matchesPatterns(this.patternsFor(feedName, version), title);
  }

  private touch(key: string): CompiledPatterns | undefined {
    const entry = this.entries.get(key);
    if (entry) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return entry;
  }

  private store(key: string, value: CompiledPatterns): void {
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

function cacheKey(feedName: string, version: number): string {
  return `${version}\u0000${feedName}`;
}
