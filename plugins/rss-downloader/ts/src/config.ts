/**
 * RSS Downloader Runtime Configuration
 *
 * Process-level settings come from the environment (and a .env file); the
 * application settings live in the YAML file owned by ConfigStore.
 */

import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { createLogger, normalizeLogLevel } from '@rss-downloader/utils';
import type { RuntimeConfig } from './types.js';

const logger = createLogger('rss-downloader:config');

export const CONFIG_FILE_NAME = 'config.yaml';
export const APP_DIR_NAME = 'rss-downloader';

/**
 * Load runtime configuration from the environment
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env, loadDotenv = true): RuntimeConfig {
  if (loadDotenv) {
    dotenvConfig();
  }

  const logLevel = normalizeLogLevel(env.LOG_LEVEL);
  if (env.LOG_LEVEL && !logLevel) {
    logger.warn('Ignoring unknown LOG_LEVEL', { value: env.LOG_LEVEL });
  }

  const config: RuntimeConfig = {
    database_url: env.DATABASE_URL || undefined,
    config_path: resolveConfigPath(env),
    log_level: logLevel,
    api_key: env.RSS_DOWNLOADER_API_KEY || undefined,
  };

  logger.debug('Runtime configuration loaded', {
    config_path: config.config_path,
    database: config.database_url ? 'DATABASE_URL' : 'POSTGRES_*',
    api_key: config.api_key ? 'set' : 'unset',
  });

  return config;
}

/**
 * Candidate YAML locations, most specific first: an explicit
 * RSS_DOWNLOADER_CONFIG, the XDG config directory, then the working directory.
 */
export function configPathCandidates(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string[] {
  const candidates: string[] = [];

  if (env.RSS_DOWNLOADER_CONFIG) {
    candidates.push(resolve(cwd, env.RSS_DOWNLOADER_CONFIG));
  }

  const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  candidates.push(join(configHome, APP_DIR_NAME, CONFIG_FILE_NAME));
  candidates.push(resolve(cwd, CONFIG_FILE_NAME));

  return candidates;
}

/**
 * First candidate that exists, or the first candidate (where the file will be
 * created) when none does. An explicit path always wins.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  const candidates = configPathCandidates(env, cwd);
  if (env.RSS_DOWNLOADER_CONFIG) {
    return candidates[0];
  }
  return candidates.find(candidate => existsSync(candidate)) ?? candidates[0];
}
