/**
 * Logging utilities for rss-downloader
 */

import type { LogLevel } from './types.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Level names accepted from configuration files, mapped onto the four levels
 * the logger knows about.
 */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  success: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  critical: 'error',
  fatal: 'error',
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

let processLevel: LogLevel = normalizeLogLevel(process.env.LOG_LEVEL) ?? 'info';

export function normalizeLogLevel(value: string | undefined | null): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_ALIASES[value.trim().toLowerCase()];
}

/**
 * Set the level used by every logger that was not given an explicit one.
 */
export function setLogLevel(level: LogLevel): void {
  processLevel = level;
}

export class Logger {
  private name: string;
  private level?: LogLevel;
  private useColors: boolean;

  constructor(name: string, level?: LogLevel, useColors = true) {
    this.name = name;
    this.level = level;
    this.useColors = useColors && process.stdout.isTTY === true;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level ?? processLevel];
  }

  private colorize(text: string, color: keyof typeof COLORS): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private format(label: string, color: keyof typeof COLORS, message: string, meta?: Record<string, unknown>): string {
    const timestamp = this.colorize(new Date().toISOString(), 'gray');
    const name = this.colorize(`[${this.name}]`, 'cyan');

    let output = `${timestamp} ${this.colorize(label, color)} ${name} ${message}`;

    if (meta && Object.keys(meta).length > 0) {
      output += ` ${this.colorize(JSON.stringify(meta), 'gray')}`;
    }

    return output;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('DEBUG', 'gray', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('INFO ', 'blue', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('WARN ', 'yellow', message, meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('ERROR', 'red', message, meta));
    }
  }

  success(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('OK   ', 'green', message, meta));
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, this.level, this.useColors);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function createLogger(name: string, level?: LogLevel): Logger {
  return new Logger(name, level);
}

/**
 * Message of an unknown thrown value, for log metadata.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
