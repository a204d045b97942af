/**
 * XML Utilities
 *
 * Request bodies and response parsing for WebDAV/CalDAV/CardDAV:
 * - PROPFIND
 * - calendar-query / addressbook-query REPORT
 * - sync-collection REPORT (RFC 6578)
 * - 207 multistatus responses, one outcome per resource
 */

import { XMLParser } from 'fast-xml-parser';
import { formatICalDate } from './date-utils.js';
import { DAVError, errorFromStatus, isSuccessStatus } from './errors.js';
import { createLogger } from './logger.js';
import { resolveHref } from './resource.js';
import type { ResourceType } from './resource.js';

const log = createLogger('xml');

// XML parser configured for WebDAV/CalDAV responses
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => {
    return ['response', 'propstat', 'prop'].includes(name);
  },
});

const NAMESPACES =
  'xmlns:d="DAV:" xmlns:c="urn:ietf:params:xml:ns:caldav" xmlns:card="urn:ietf:params:xml:ns:carddav" ' +
  'xmlns:cs="http://calendarserver.org/ns/" xmlns:ical="http://apple.com/ns/ical/"';

const PROPERTY_NAMES = {
  getetag: 'd:getetag',
  resourcetype: 'd:resourcetype',
  displayname: 'd:displayname',
  getcontenttype: 'd:getcontenttype',
  'sync-token': 'd:sync-token',
  'current-user-principal': 'd:current-user-principal',
  getctag: 'cs:getctag',
  'calendar-home-set': 'c:calendar-home-set',
  'calendar-description': 'c:calendar-description',
  'supported-calendar-component-set': 'c:supported-calendar-component-set',
  'calendar-data': 'c:calendar-data',
  'calendar-color': 'ical:calendar-color',
  'addressbook-home-set': 'card:addressbook-home-set',
  'addressbook-description': 'card:addressbook-description',
  'address-data': 'card:address-data',
} as const;

export type DAVPropertyName = keyof typeof PROPERTY_NAMES;

/**
 * Properties read from a multistatus `prop` element.
 */
export interface DAVProperties {
  etag?: string;
  displayName?: string;
  resourceType?: ResourceType;
  contentType?: string;
  syncToken?: string;
  ctag?: string;
  currentUserPrincipal?: string;
  calendarHomeSet?: string;
  addressBookHomeSet?: string;
  calendarDescription?: string;
  addressBookDescription?: string;
  calendarColor?: string;
  supportedComponents?: string[];
  calendarData?: string;
  addressData?: string;
}

export type ResourceOutcome =
  | { ok: true; href: string; url: string; status: number; props: DAVProperties }
  | { ok: false; href: string; url: string; status?: number; error: DAVError };

export interface MultistatusDocument {
  outcomes: ResourceOutcome[];
  /** Top-level sync-token of a sync-collection response. */
  syncToken?: string;
}

type XmlNode = { [key: string]: unknown };

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  if (Array.isArray(value)) return textOf(value[0]);
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function hrefOf(value: unknown): string | undefined {
  for (const item of asArray(value)) {
    if (isNode(item)) {
      const href = nonEmpty(textOf(item['href']));
      if (href) return href;
    }
  }
  return undefined;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Parse a status line such as `HTTP/1.1 404 Not Found`.
 */
export function parseStatusLine(text: string | undefined): number | undefined {
  if (!text) return undefined;
  const match = /HTTP\/\d(?:\.\d)?\s+(\d{3})/i.exec(text);
  return match ? Number(match[1]) : undefined;
}

function resourceTypeOf(value: unknown): ResourceType {
  const keys = new Set<string>();
  for (const item of asArray(value)) {
    if (isNode(item)) Object.keys(item).forEach((key) => keys.add(key));
  }
  if (keys.has('calendar')) return 'calendar';
  if (keys.has('addressbook')) return 'addressBook';
  if (keys.has('collection')) return 'collection';
  return 'resource';
}

function componentsOf(value: unknown): string[] {
  const components: string[] = [];
  for (const item of asArray(value)) {
    if (!isNode(item)) continue;
    for (const comp of asArray(item['comp'])) {
      const name = isNode(comp) ? textOf(comp['@_name']) : undefined;
      if (name) components.push(name.toUpperCase());
    }
  }
  return components;
}

function readProperties(prop: XmlNode, into: DAVProperties): void {
  const text = (key: string) => nonEmpty(textOf(prop[key]));

  if ('getetag' in prop) into.etag = text('getetag');
  if ('displayname' in prop) into.displayName = text('displayname');
  if ('resourcetype' in prop) into.resourceType = resourceTypeOf(prop['resourcetype']);
  if ('getcontenttype' in prop) into.contentType = text('getcontenttype');
  if ('sync-token' in prop) into.syncToken = text('sync-token');
  if ('getctag' in prop) into.ctag = text('getctag');
  if ('current-user-principal' in prop) into.currentUserPrincipal = hrefOf(prop['current-user-principal']);
  if ('calendar-home-set' in prop) into.calendarHomeSet = hrefOf(prop['calendar-home-set']);
  if ('addressbook-home-set' in prop) into.addressBookHomeSet = hrefOf(prop['addressbook-home-set']);
  if ('calendar-description' in prop) into.calendarDescription = text('calendar-description');
  if ('addressbook-description' in prop) into.addressBookDescription = text('addressbook-description');
  if ('calendar-color' in prop) into.calendarColor = text('calendar-color');
  if ('supported-calendar-component-set' in prop) {
    into.supportedComponents = componentsOf(prop['supported-calendar-component-set']);
  }
  if ('calendar-data' in prop) into.calendarData = textOf(prop['calendar-data']);
  if ('address-data' in prop) into.addressData = textOf(prop['address-data']);
}

function outcomeFor(response: XmlNode, href: string, url: string): ResourceOutcome {
  const props: DAVProperties = {};
  let successStatus: number | undefined;
  let failureStatus: number | undefined;

  for (const propstat of asArray(response['propstat'])) {
    if (!isNode(propstat)) continue;
    const status = parseStatusLine(textOf(propstat['status']));
    if (status === undefined) continue;

    if (isSuccessStatus(status)) {
      successStatus ??= status;
      for (const prop of asArray(propstat['prop'])) {
        if (isNode(prop)) readProperties(prop, props);
      }
    } else {
      failureStatus ??= status;
    }
  }

  const responseStatusText = textOf(response['status']);
  if (responseStatusText !== undefined) {
    const status = parseStatusLine(responseStatusText);
    if (status === undefined) {
      const error = DAVError.parsingError(`Invalid status line for ${href}: ${responseStatusText}`);
      return { ok: false, href, url, error };
    }
    return isSuccessStatus(status)
      ? { ok: true, href, url, status, props }
      : { ok: false, href, url, status, error: errorFromStatus(status, undefined) };
  }

  if (successStatus !== undefined) {
    return { ok: true, href, url, status: successStatus, props };
  }
  if (failureStatus !== undefined) {
    const error = errorFromStatus(failureStatus, undefined);
    return { ok: false, href, url, status: failureStatus, error };
  }
  return { ok: false, href, url, error: DAVError.parsingError(`Missing status for ${href}`) };
}

/**
 * Parse a 207 multistatus body into per-resource outcomes.
 *
 * A missing `multistatus` root fails the whole document; a malformed
 * `response` only affects its own outcome.
 */
export function parseMultistatus(xmlText: string, baseUrl: string): MultistatusDocument {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xmlText);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw DAVError.parsingError(`Malformed multistatus XML: ${reason}`);
  }

  const multistatus = isNode(parsed) ? parsed['multistatus'] : undefined;
  if (multistatus === undefined) {
    throw DAVError.parsingError('Missing multistatus element');
  }

  const root: XmlNode = isNode(multistatus) ? multistatus : {};
  const outcomes: ResourceOutcome[] = [];

  for (const response of asArray(root['response'])) {
    if (!isNode(response)) continue;

    const hrefs = asArray(response['href'])
      .map((href) => nonEmpty(textOf(href)))
      .filter((href): href is string => href !== undefined);

    if (hrefs.length === 0) {
      log.warn('Skipping multistatus response without href');
      continue;
    }

    // Several hrefs only occur together with a response-level status
    for (const href of response['status'] === undefined ? hrefs.slice(0, 1) : hrefs) {
      let url: string;
      try {
        url = resolveHref(href, baseUrl);
      } catch {
        outcomes.push({ ok: false, href, url: href, error: DAVError.parsingError(`Invalid href: ${href}`) });
        continue;
      }
      outcomes.push(outcomeFor(response, href, url));
    }
  }

  const syncToken = nonEmpty(textOf(root['sync-token']));
  return syncToken ? { outcomes, syncToken } : { outcomes };
}

/**
 * Build a PROPFIND body requesting the given properties.
 */
export function buildPropfindXml(properties: DAVPropertyName[]): string {
  const props = properties.map((name) => `<${PROPERTY_NAMES[name]}/>`).join('\n    ');
  return `<?xml version="1.0" encoding="utf-8"?>
<d:propfind ${NAMESPACES}>
  <d:prop>
    ${props}
  </d:prop>
</d:propfind>`;
}

export interface CalendarQueryOptions {
  /** Component to filter on. Default: VEVENT */
  component?: string;
  start?: Date;
  end?: Date;
}

/**
 * Build calendar-query REPORT XML body
 */
export function buildCalendarQueryXml(options: CalendarQueryOptions = {}): string {
  const component = escapeXml(options.component ?? 'VEVENT');
  let timeRangeFilter = '';

  if (options.start || options.end) {
    const start = options.start ? formatICalDate(options.start) : '19700101T000000Z';
    const end = options.end ? formatICalDate(options.end) : '20991231T235959Z';
    timeRangeFilter = `<c:time-range start="${start}" end="${end}"/>`;
  }

  return `<?xml version="1.0" encoding="utf-8"?>
<c:calendar-query ${NAMESPACES}>
  <d:prop>
    <d:getetag/>
    <c:calendar-data/>
  </d:prop>
  <c:filter>
    <c:comp-filter name="VCALENDAR">
      <c:comp-filter name="${component}">
        ${timeRangeFilter}
      </c:comp-filter>
    </c:comp-filter>
  </c:filter>
</c:calendar-query>`;
}

/**
 * Build addressbook-query REPORT XML body. Without a search term every card matches.
 */
export function buildAddressBookQueryXml(search?: string): string {
  const term = search ? escapeXml(search) : '';
  const filter = search
    ? `<card:filter>
    <card:prop-filter name="FN">
      <card:text-match collation="i;unicode-casemap" match-type="contains">${term}</card:text-match>
    </card:prop-filter>
  </card:filter>`
    : '<card:filter/>';

  return `<?xml version="1.0" encoding="utf-8"?>
<card:addressbook-query ${NAMESPACES}>
  <d:prop>
    <d:getetag/>
    <card:address-data/>
  </d:prop>
  ${filter}
</card:addressbook-query>`;
}

/**
 * Build a calendar-multiget or addressbook-multiget REPORT body for the
 * given server-relative hrefs.
 */
export function buildMultigetXml(kind: 'calendar' | 'addressBook', hrefs: string[]): string {
  const list = hrefs.map((href) => `<d:href>${escapeXml(href)}</d:href>`).join('\n  ');
  const [root, data] =
    kind === 'calendar'
      ? ['c:calendar-multiget', 'c:calendar-data']
      : ['card:addressbook-multiget', 'card:address-data'];

  return `<?xml version="1.0" encoding="utf-8"?>
<${root} ${NAMESPACES}>
  <d:prop>
    <d:getetag/>
    <${data}/>
  </d:prop>
  ${list}
</${root}>`;
}

/**
 * Build sync-collection REPORT XML body.
 * The sync-token element is written with explicit open/close tags even when empty.
 */
export function buildSyncCollectionXml(
  syncToken: string | undefined,
  properties: DAVPropertyName[] = ['getetag']
): string {
  const props = properties.map((name) => `<${PROPERTY_NAMES[name]}/>`).join('\n    ');

  return `<?xml version="1.0" encoding="utf-8"?>
<d:sync-collection ${NAMESPACES}>
  <d:sync-token>${syncToken ? escapeXml(syncToken) : ''}</d:sync-token>
  <d:sync-level>1</d:sync-level>
  <d:prop>
    ${props}
  </d:prop>
</d:sync-collection>`;
}

/**
 * Whether an error body carries the RFC 6578 `valid-sync-token` precondition.
 */
export function isInvalidSyncTokenBody(body: string): boolean {
  return /valid-sync-token/.test(body);
}
