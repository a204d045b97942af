/**
 * Server detection
 *
 * Reads the features a server advertises in its OPTIONS response and
 * recognizes the common server products by host name and `Server` header.
 */

import { DEFAULT_MULTIGET_BATCH_SIZE } from './config.js';
import { DAVError } from './errors.js';
import { headerValue } from './transport.js';
import type { HttpResponse } from './transport.js';

export type ServerType = 'icloud' | 'google' | 'nextcloud' | 'radicale' | 'sogo' | 'baikal' | 'generic';

export interface ServerCapabilities {
  /** Compliance classes from the DAV header, e.g. ['1', '2', 'calendar-access']. */
  dav: string[];
  /** Methods from the Allow header, upper-cased. */
  allowedMethods: string[];
  calendarAccess: boolean;
  addressBook: boolean;
  /** RFC 6578 advertised through the DAV header. */
  syncCollection: boolean;
  scheduling: boolean;
  extendedMkcol: boolean;
  /** Value of the `Server` response header. */
  serverProduct?: string;
  serverType: ServerType;
}

const MULTIGET_LIMITS: Record<ServerType, number> = {
  icloud: 50,
  google: 100,
  nextcloud: 100,
  radicale: 100,
  sogo: 100,
  baikal: 100,
  generic: DEFAULT_MULTIGET_BATCH_SIZE,
};

export function splitHeaderList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Guess the server product. The host name is checked first, then the
 * `Server` header.
 */
export function detectServerType(url: string, serverProduct?: string): ServerType {
  const host = new URL(url).hostname.toLowerCase();

  if (host.includes('icloud.com')) return 'icloud';
  if (['google.com', 'googleapis.com', 'googleusercontent.com'].some((domain) => host.includes(domain))) {
    return 'google';
  }
  if (host.includes('nextcloud')) return 'nextcloud';

  const product = serverProduct?.toLowerCase() ?? '';
  if (product.includes('nextcloud')) return 'nextcloud';
  if (product.includes('radicale')) return 'radicale';
  if (product.includes('sogo')) return 'sogo';
  if (product.includes('baikal') || product.includes('sabre')) return 'baikal';
  return 'generic';
}

export function parseCapabilities(response: HttpResponse, url: string): ServerCapabilities {
  const dav = splitHeaderList(headerValue(response, 'dav'));
  const serverProduct = headerValue(response, 'server');

  return {
    dav,
    allowedMethods: splitHeaderList(headerValue(response, 'allow')).map((method) => method.toUpperCase()),
    calendarAccess: dav.includes('calendar-access') || dav.includes('calendar-schedule'),
    addressBook: dav.includes('addressbook'),
    syncCollection: dav.includes('sync-collection'),
    scheduling: dav.includes('calendar-schedule'),
    extendedMkcol: dav.includes('extended-mkcol'),
    serverProduct,
    serverType: detectServerType(url, serverProduct),
  };
}

/** Most hrefs a server of this type accepts in one multiget REPORT. */
export function multigetLimit(serverType: ServerType): number {
  return MULTIGET_LIMITS[serverType];
}

/**
 * Split `items` into consecutive batches of at most `size` entries.
 */
export function batches<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw DAVError.invalidData(`Batch size must be positive, got ${size}`);
  }
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}
