/**
 * DAVClient
 *
 * CalDAV/CardDAV client: principal and home-set discovery, collection
 * listing, calendar-query/addressbook-query/multiget REPORTs and conditional
 * writes.
 */

import { getConfig } from './config.js';
import { DAVError, isDAVError } from './errors.js';
import type { DAVErrorKind } from './errors.js';
import { parseICalendar } from './ical-utils.js';
import type { ICalendarObject } from './ical-utils.js';
import { createLogger } from './logger.js';
import { collectionKind, contentTypeFor, resolveHref, sameUrl } from './resource.js';
import type { AddressBook, Calendar, CollectionKind, DAVCollection, DAVResource } from './resource.js';
import { batches, detectServerType, multigetLimit } from './server-detection.js';
import type { ServerCapabilities } from './server-detection.js';
import type { CredentialInjector, Transport } from './transport.js';
import { parseVCard } from './vcard-utils.js';
import type { VCard } from './vcard-utils.js';
import { WebDAVClient } from './webdav-client.js';
import type { FetchedBody, SyncCollectionResponse, WritePrecondition } from './webdav-client.js';
import { buildAddressBookQueryXml, buildCalendarQueryXml, buildMultigetXml } from './xml-utils.js';
import type { DAVPropertyName, DAVProperties, ResourceOutcome } from './xml-utils.js';

const log = createLogger('client');

export type ParsedBody = { kind: 'icalendar'; calendar: ICalendarObject } | { kind: 'vcard'; card: VCard };

export interface CalendarObjectResource extends DAVResource {
  data: string;
  calendar: ICalendarObject;
}

export interface VCardResource extends DAVResource {
  data: string;
  card: VCard;
}

export interface ResourceFailure {
  url: string;
  error: DAVError;
}

export interface QueryResult<T> {
  objects: T[];
  failures: ResourceFailure[];
}

export interface CollectionMembers {
  members: DAVResource[];
  failures: ResourceFailure[];
  syncToken?: string;
  ctag?: string;
}

export interface MultigetResult {
  resources: Array<DAVResource & FetchedBody>;
  /** URLs the server answered 404 for. */
  missing: string[];
  failures: ResourceFailure[];
}

export interface WriteOptions {
  /** Send `If-None-Match: *` so the PUT only creates. */
  createOnly?: boolean;
  contentType?: string;
  signal?: AbortSignal;
}

export interface DAVClientOptions {
  /** Server context URL, e.g. https://dav.example.com/ */
  baseUrl: string;
  transport: Transport;
  credentials?: CredentialInjector;
  userAgent?: string;
  /** Hrefs per multiget REPORT; overrides configuration and the server's limit. */
  multigetBatchSize?: number;
}

const WELL_KNOWN_PATHS = ['/.well-known/caldav', '/.well-known/carddav'];

// Discovery failures after which the well-known URIs are tried
const WELL_KNOWN_FALLBACK = new Set<DAVErrorKind>(['notFound', 'parsingError', 'invalidResponse']);

function fallsBackToWellKnown(error: unknown): error is DAVError {
  return isDAVError(error) && WELL_KNOWN_FALLBACK.has(error.kind);
}

const COLLECTION_PROPS: DAVPropertyName[] = [
  'resourcetype',
  'displayname',
  'getetag',
  'getctag',
  'sync-token',
  'calendar-description',
  'addressbook-description',
  'supported-calendar-component-set',
  'calendar-color',
];

const MEMBER_PROPS: DAVPropertyName[] = [
  'resourcetype',
  'getetag',
  'getcontenttype',
  'sync-token',
  'getctag',
];

/**
 * Parse a resource body according to the collection it belongs to.
 */
export function parseBody(kind: CollectionKind, data: string): ParsedBody {
  return kind === 'calendar'
    ? { kind: 'icalendar', calendar: parseICalendar(data) }
    : { kind: 'vcard', card: parseVCard(data) };
}

function failureOf(outcome: ResourceOutcome): ResourceFailure | undefined {
  return outcome.ok ? undefined : { url: outcome.url, error: outcome.error };
}

function toCollection(kind: CollectionKind, url: string, props: DAVProperties): Calendar | AddressBook {
  const base = {
    url,
    etag: props.etag,
    displayName: props.displayName,
    ctag: props.ctag,
    syncToken: props.syncToken,
  };

  if (kind === 'calendar') {
    return {
      ...base,
      resourceType: 'calendar',
      description: props.calendarDescription,
      supportedComponents: props.supportedComponents?.length ? props.supportedComponents : ['VEVENT'],
      color: props.calendarColor,
    };
  }
  return { ...base, resourceType: 'addressBook', description: props.addressBookDescription };
}

export class DAVClient {
  readonly webdav: WebDAVClient;
  readonly baseUrl: string;
  private readonly multigetBatchSize?: number;

  // Cached discovery results
  private principalUrl?: string;
  private homeSets = new Map<CollectionKind, string>();
  private detected?: ServerCapabilities;

  constructor(options: DAVClientOptions) {
    this.baseUrl = options.baseUrl;
    this.multigetBatchSize = options.multigetBatchSize;
    this.webdav = new WebDAVClient({
      transport: options.transport,
      credentials: options.credentials,
      userAgent: options.userAgent,
    });
  }

  // ==========================================================================
  // Discovery
  // ==========================================================================

  /**
   * Resolve the authenticated user's principal URL (RFC 5397).
   *
   * When the base URL does not answer with a principal, the RFC 6764
   * well-known URIs of the same host are tried before giving up.
   */
  async discoverPrincipal(signal?: AbortSignal): Promise<string> {
    if (this.principalUrl) return this.principalUrl;

    try {
      this.principalUrl = await this.principalAt(this.baseUrl, signal);
    } catch (error: unknown) {
      if (!fallsBackToWellKnown(error)) throw error;
      this.principalUrl = await this.principalAtWellKnown(error, signal);
    }
    return this.principalUrl;
  }

  private async principalAt(url: string, signal?: AbortSignal): Promise<string> {
    const outcomes = await this.webdav.propfind(url, ['current-user-principal'], '0', signal);
    const href = this.firstProperty(
      outcomes,
      'current-user-principal',
      (props) => props.currentUserPrincipal
    );
    return resolveHref(href, url);
  }

  private async principalAtWellKnown(original: DAVError, signal?: AbortSignal): Promise<string> {
    for (const path of WELL_KNOWN_PATHS) {
      const url = new URL(path, this.baseUrl).toString();
      try {
        return await this.principalAt(url, signal);
      } catch (error: unknown) {
        if (!fallsBackToWellKnown(error)) throw error;
        log.debug(`No principal at ${url}: ${error.message}`);
      }
    }
    throw original;
  }

  /**
   * Resolve the calendar-home-set or addressbook-home-set of the principal.
   */
  async discoverHomeSet(kind: CollectionKind, signal?: AbortSignal): Promise<string> {
    const cached = this.homeSets.get(kind);
    if (cached) return cached;

    const principal = await this.discoverPrincipal(signal);
    const property: DAVPropertyName = kind === 'calendar' ? 'calendar-home-set' : 'addressbook-home-set';
    const outcomes = await this.webdav.propfind(principal, [property], '0', signal);
    const href = this.firstProperty(outcomes, property, (props) =>
      kind === 'calendar' ? props.calendarHomeSet : props.addressBookHomeSet
    );

    const home = resolveHref(href, principal);
    this.homeSets.set(kind, home);
    return home;
  }

  private firstProperty(
    outcomes: ResourceOutcome[],
    name: string,
    pick: (props: DAVProperties) => string | undefined
  ): string {
    const [first] = outcomes;
    if (!first) {
      throw DAVError.notFound();
    }
    if (!first.ok) {
      throw first.error;
    }
    const value = pick(first.props);
    if (!value) {
      throw DAVError.parsingError(`${name} property not found`);
    }
    return value;
  }

  async listCalendars(signal?: AbortSignal): Promise<Calendar[]> {
    const collections = await this.listCollections('calendar', signal);
    return collections.filter(
      (collection): collection is Calendar => collection.resourceType === 'calendar'
    );
  }

  async listAddressBooks(signal?: AbortSignal): Promise<AddressBook[]> {
    const collections = await this.listCollections('addressBook', signal);
    return collections.filter(
      (collection): collection is AddressBook => collection.resourceType === 'addressBook'
    );
  }

  private async listCollections(
    kind: CollectionKind,
    signal?: AbortSignal
  ): Promise<Array<Calendar | AddressBook>> {
    const home = await this.discoverHomeSet(kind, signal);
    const outcomes = await this.webdav.propfind(home, COLLECTION_PROPS, '1', signal);
    const collections: Array<Calendar | AddressBook> = [];

    for (const outcome of outcomes) {
      if (sameUrl(outcome.url, home)) continue;
      if (!outcome.ok) {
        log.warn(`Skipping ${outcome.url}: ${outcome.error.message}`);
        continue;
      }
      if (outcome.props.resourceType !== kind) continue;
      collections.push(toCollection(kind, outcome.url, outcome.props));
    }

    return collections;
  }

  /**
   * List the member resources of a collection with their ETags, plus the
   * collection's own sync token and ctag.
   */
  async listMembers(collection: DAVCollection, signal?: AbortSignal): Promise<CollectionMembers> {
    const outcomes = await this.webdav.propfind(collection.url, MEMBER_PROPS, '1', signal);
    const result: CollectionMembers = { members: [], failures: [] };

    for (const outcome of outcomes) {
      if (sameUrl(outcome.url, collection.url)) {
        if (outcome.ok) {
          result.syncToken = outcome.props.syncToken;
          result.ctag = outcome.props.ctag;
        }
        continue;
      }

      const failure = failureOf(outcome);
      if (failure) {
        result.failures.push(failure);
        continue;
      }
      if (!outcome.ok || (outcome.props.resourceType && outcome.props.resourceType !== 'resource')) {
        continue;
      }
      result.members.push({ url: outcome.url, etag: outcome.props.etag, resourceType: 'resource' });
    }

    return result;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Fetch the calendar objects with a component overlapping [start, end).
   */
  async fetchRange(
    calendar: Calendar,
    start: Date,
    end: Date,
    component = 'VEVENT',
    signal?: AbortSignal
  ): Promise<QueryResult<CalendarObjectResource>> {
    if (end.getTime() <= start.getTime()) {
      throw DAVError.invalidData('fetchRange end must be after start');
    }

    const document = await this.webdav.report(
      calendar.url,
      buildCalendarQueryXml({ component, start, end }),
      '1',
      signal
    );

    const result: QueryResult<CalendarObjectResource> = { objects: [], failures: [] };
    for (const outcome of document.outcomes) {
      const failure = failureOf(outcome);
      if (failure) {
        result.failures.push(failure);
        continue;
      }
      if (!outcome.ok) continue;

      const data = outcome.props.calendarData;
      if (!data) {
        const error = DAVError.parsingError(`Missing calendar-data for ${outcome.href}`);
        result.failures.push({ url: outcome.url, error });
        continue;
      }
      try {
        result.objects.push({
          url: outcome.url,
          etag: outcome.props.etag,
          resourceType: 'resource',
          data,
          calendar: parseICalendar(data),
        });
      } catch (error: unknown) {
        result.failures.push({ url: outcome.url, error: this.asDAVError(error) });
      }
    }
    return result;
  }

  /**
   * Fetch the cards of an address book, optionally only those whose FN contains `search`.
   */
  async queryAddressBook(
    addressBook: AddressBook,
    search?: string,
    signal?: AbortSignal
  ): Promise<QueryResult<VCardResource>> {
    const document = await this.webdav.report(
      addressBook.url,
      buildAddressBookQueryXml(search),
      '1',
      signal
    );

    const result: QueryResult<VCardResource> = { objects: [], failures: [] };
    for (const outcome of document.outcomes) {
      const failure = failureOf(outcome);
      if (failure) {
        result.failures.push(failure);
        continue;
      }
      if (!outcome.ok) continue;

      const data = outcome.props.addressData;
      if (!data) {
        const error = DAVError.parsingError(`Missing address-data for ${outcome.href}`);
        result.failures.push({ url: outcome.url, error });
        continue;
      }
      try {
        result.objects.push({
          url: outcome.url,
          etag: outcome.props.etag,
          resourceType: 'resource',
          data,
          card: parseVCard(data),
        });
      } catch (error: unknown) {
        result.failures.push({ url: outcome.url, error: this.asDAVError(error) });
      }
    }
    return result;
  }

  /**
   * Fetch many member bodies with calendar-multiget / addressbook-multiget
   * (RFC 4791 §7.9, RFC 6352 §8.7), in batches the server accepts.
   */
  async multiget(collection: DAVCollection, urls: string[], signal?: AbortSignal): Promise<MultigetResult> {
    const kind = collectionKind(collection);
    if (!kind) {
      throw DAVError.unsupportedOperation(`multiget needs a calendar or address book: ${collection.url}`);
    }

    const result: MultigetResult = { resources: [], missing: [], failures: [] };
    for (const batch of batches(urls, this.batchSize())) {
      const hrefs = batch.map((url) => new URL(url).pathname);
      const document = await this.webdav.report(collection.url, buildMultigetXml(kind, hrefs), '1', signal);

      for (const outcome of document.outcomes) {
        if (!outcome.ok) {
          if (outcome.error.kind === 'notFound') result.missing.push(outcome.url);
          else result.failures.push({ url: outcome.url, error: outcome.error });
          continue;
        }
        const data = kind === 'calendar' ? outcome.props.calendarData : outcome.props.addressData;
        if (data === undefined) {
          const error = DAVError.parsingError(`Missing body for ${outcome.href}`);
          result.failures.push({ url: outcome.url, error });
          continue;
        }
        result.resources.push({
          url: outcome.url,
          etag: outcome.props.etag,
          resourceType: 'resource',
          data,
        });
      }
    }
    return result;
  }

  private batchSize(): number {
    const serverType = this.detected?.serverType ?? detectServerType(this.baseUrl);
    return this.multigetBatchSize ?? getConfig().multigetBatchSize ?? multigetLimit(serverType);
  }

  private asDAVError(error: unknown): DAVError {
    if (isDAVError(error)) return error;
    return DAVError.parsingError(error instanceof Error ? error.message : String(error));
  }

  // ==========================================================================
  // Resources
  // ==========================================================================

  async fetchResource(resource: DAVResource | string, signal?: AbortSignal): Promise<FetchedBody> {
    return this.webdav.get(typeof resource === 'string' ? resource : resource.url, signal);
  }

  /**
   * PUT a resource body.
   *
   * With `expectedEtag` the write only succeeds if the server copy is
   * unchanged (`If-Match`); a mismatch rejects with `preconditionFailed`.
   * With `createOnly` it only succeeds if nothing exists at the URL.
   *
   * @returns The resource with the ETag the server assigned, if it sent one
   */
  async createOrUpdate(
    resource: DAVResource,
    data: string,
    expectedEtag?: string,
    options: WriteOptions = {}
  ): Promise<DAVResource> {
    if (expectedEtag && options.createOnly) {
      throw DAVError.invalidData('expectedEtag and createOnly are mutually exclusive');
    }

    let precondition: WritePrecondition | undefined;
    if (expectedEtag) precondition = { ifMatch: expectedEtag };
    else if (options.createOnly) precondition = { ifNoneMatch: '*' };

    const contentType =
      options.contentType ?? contentTypeFor(/^\s*BEGIN:VCARD/i.test(data) ? 'addressBook' : 'calendar');

    const etag = await this.webdav.put(resource.url, data, contentType, precondition, options.signal);
    return { url: resource.url, etag, resourceType: resource.resourceType };
  }

  async delete(resource: DAVResource, expectedEtag?: string, signal?: AbortSignal): Promise<void> {
    await this.webdav.delete(resource.url, expectedEtag, signal);
  }

  async makeCollection(url: string, signal?: AbortSignal): Promise<void> {
    await this.webdav.mkcol(url, signal);
  }

  // ==========================================================================
  // Sync (RFC 6578) and change indicators
  // ==========================================================================

  async syncCollection(
    collection: DAVCollection,
    syncToken: string | undefined,
    signal?: AbortSignal
  ): Promise<SyncCollectionResponse> {
    return this.webdav.syncCollection(collection.url, syncToken, ['getetag'], signal);
  }

  /**
   * Get current sync token for a collection.
   */
  async getSyncToken(collection: DAVCollection, signal?: AbortSignal): Promise<string | undefined> {
    const outcomes = await this.webdav.propfind(collection.url, ['sync-token'], '0', signal);
    const [first] = outcomes;
    return first?.ok ? first.props.syncToken : undefined;
  }

  /**
   * Get the CalendarServer ctag; undefined when the server does not support it.
   */
  async getCTag(collection: DAVCollection, signal?: AbortSignal): Promise<string | undefined> {
    const outcomes = await this.webdav.propfind(collection.url, ['getctag'], '0', signal);
    const [first] = outcomes;
    return first?.ok ? first.props.ctag : undefined;
  }

  /**
   * OPTIONS on the base URL. The detected server type then sets the default
   * multiget batch size.
   */
  async capabilities(signal?: AbortSignal): Promise<ServerCapabilities> {
    this.detected = await this.webdav.options(this.baseUrl, signal);
    return this.detected;
  }
}
