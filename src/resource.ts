/**
 * Resource model: typed descriptions of WebDAV nodes.
 */

export type ResourceType = 'resource' | 'collection' | 'calendar' | 'addressBook';

export interface DAVResource {
  /** Absolute URL; identity of the node for its lifetime. */
  url: string;
  /** Opaque version token. Only meaningful for this URL; absent until assigned. */
  etag?: string;
  resourceType: ResourceType;
}

export interface DAVCollection extends DAVResource {
  resourceType: 'collection' | 'calendar' | 'addressBook';
  displayName?: string;
  description?: string;
  /** CalendarServer getctag, an aggregate change indicator. */
  ctag?: string;
  syncToken?: string;
}

export interface Calendar extends DAVCollection {
  resourceType: 'calendar';
  /** Component names the calendar accepts, e.g. VEVENT, VTODO. */
  supportedComponents: string[];
  color?: string;
}

export interface AddressBook extends DAVCollection {
  resourceType: 'addressBook';
}

export type CollectionKind = 'calendar' | 'addressBook';

/**
 * Resolve an href from a multistatus response against the URL it came from.
 */
export function resolveHref(href: string, base: string): string {
  return new URL(href.trim(), base).toString();
}

/**
 * Compare two URLs ignoring a trailing slash.
 */
export function sameUrl(a: string, b: string): boolean {
  const strip = (url: string) => (url.endsWith('/') ? url.slice(0, -1) : url);
  return strip(a) === strip(b);
}

/**
 * Build the URL of a member resource inside a collection.
 */
export function memberUrl(collection: DAVCollection, name: string): string {
  const base = collection.url.endsWith('/') ? collection.url : `${collection.url}/`;
  return new URL(encodeURIComponent(name), base).toString();
}

export function contentTypeFor(kind: CollectionKind): string {
  return kind === 'calendar' ? 'text/calendar; charset=utf-8' : 'text/vcard; charset=utf-8';
}

export function collectionKind(collection: DAVCollection): CollectionKind | undefined {
  if (collection.resourceType === 'calendar' || collection.resourceType === 'addressBook') {
    return collection.resourceType;
  }
  return undefined;
}
