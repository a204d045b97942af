/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[dav-sync:<scope>]`; the threshold comes from
 * the `logLevel` configuration key and is read on each call so that
 * `configure()` takes effect without recreating loggers.
 */

import { DEFAULT_LOG_LEVEL, getConfig } from './config.js';
import type { LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown): void;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  const threshold = getConfig().logLevel ?? DEFAULT_LOG_LEVEL;
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function createLogger(scope: string): Logger {
  const prefix = `[dav-sync:${scope}]`;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, error) {
      if (!enabled('error')) return;
      if (error !== undefined) {
        console.error(`${prefix} ${message}`, error);
      } else {
        console.error(`${prefix} ${message}`);
      }
    },
  };
}
