/**
 * Library-wide settings.
 *
 * Set once by the host application through `configure()`; nothing is read
 * from the environment. Constructor options take precedence over these.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface DAVClientConfig {
  /** Per-request timeout for FetchTransport (ms). Default: 30000 */
  requestTimeout?: number;
  /** User-Agent header sent with every request. Default: 'dav-sync-client' */
  userAgent?: string;
  /** Minimum level written by the logger. Default: 'warn' */
  logLevel?: LogLevel;
  /** Maximum number of response body characters copied into errors. Default: 512 */
  bodySnippetLength?: number;
  /** PRODID written by the iCalendar and vCard serializers. Default: '-//dav-sync-client//EN' */
  prodId?: string;
  /** Hrefs per calendar-multiget / addressbook-multiget REPORT. Default: 50 */
  multigetBatchSize?: number;
}

export const DEFAULT_REQUEST_TIMEOUT = 30000;
export const DEFAULT_USER_AGENT = 'dav-sync-client';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const DEFAULT_BODY_SNIPPET_LENGTH = 512;
export const DEFAULT_PROD_ID = '-//dav-sync-client//EN';
export const DEFAULT_MULTIGET_BATCH_SIZE = 50;

let _config: DAVClientConfig = {};

/**
 * Merge `config` into the current settings.
 */
export function configure(config: Partial<DAVClientConfig>): void {
  _config = { ..._config, ...config };
}

/** Current settings, as a copy. */
export function getConfig(): DAVClientConfig {
  return { ..._config };
}

/**
 * Drop every setting; defaults apply again.
 */
export function resetConfig(): void {
  _config = {};
}
