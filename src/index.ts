/**
 * dav-sync-client
 *
 * CalDAV/CardDAV client with RFC 6578 incremental synchronization,
 * iCalendar/vCard codecs and a typed error model.
 *
 * @example
 * ```ts
 * import { DAVClient, FetchTransport, SyncEngine, basicAuth } from 'dav-sync-client';
 *
 * const client = new DAVClient({
 *   baseUrl: 'https://dav.example.com/',
 *   transport: new FetchTransport(),
 *   credentials: basicAuth('alice', 'secret'),
 * });
 *
 * const [calendar] = await client.listCalendars();
 * const engine = new SyncEngine(client);
 * const { changes } = await engine.synchronize(calendar);
 * // later
 * const { changes: since } = await engine.synchronizeIncremental(calendar);
 * ```
 */

// Configuration (DI)
export { configure, getConfig, resetConfig } from './config.js';
export type { DAVClientConfig, LogLevel } from './config.js';

export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

// Errors
export { DAVError, isDAVError, errorFromStatus } from './errors.js';
export type { DAVErrorDetail, DAVErrorKind } from './errors.js';

// Transport
export { FetchTransport, basicAuth, bearerAuth, headerValue } from './transport.js';
export type {
  CredentialInjector,
  FetchTransportOptions,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  Transport,
} from './transport.js';

// Resource model
export { collectionKind, contentTypeFor, memberUrl, resolveHref, sameUrl } from './resource.js';
export type {
  AddressBook,
  Calendar,
  CollectionKind,
  DAVCollection,
  DAVResource,
  ResourceType,
} from './resource.js';

// Codecs
export {
  escapeText,
  unescapeText,
  foldLine,
  unfoldLines,
  parseContentLine,
  serializeContentLine,
} from './content-line.js';
export type { ContentLine } from './content-line.js';
export { formatICalDate, formatTemporal, parseTemporal, temporalToDate } from './date-utils.js';
export type { CalendarDate, DateProperty, TemporalValue, WallClockTime } from './date-utils.js';
export { extractTzid, formatUtcOffset, parseUtcOffset, parseVTimeZone } from './vtimezone.js';
export type { VTimeZone } from './vtimezone.js';
export {
  createEntity,
  generateICalData,
  generateICalendar,
  parseICalendar,
  primaryEntity,
} from './ical-utils.js';
export type { CalendarEntity, EntityType, ICalendarObject, Subcomponent } from './ical-utils.js';
export { generateVCard, parseVCard, parseVCards } from './vcard-utils.js';
export type { StructuredName, TypedValue, VCard, VCardVersion } from './vcard-utils.js';

// XML
export {
  buildAddressBookQueryXml,
  buildCalendarQueryXml,
  buildMultigetXml,
  buildPropfindXml,
  buildSyncCollectionXml,
  parseMultistatus,
} from './xml-utils.js';
export type {
  DAVProperties,
  DAVPropertyName,
  MultistatusDocument,
  ResourceOutcome,
} from './xml-utils.js';

// Server detection
export {
  batches,
  detectServerType,
  multigetLimit,
  parseCapabilities,
} from './server-detection.js';
export type { ServerCapabilities, ServerType } from './server-detection.js';

// Clients
export { WebDAVClient } from './webdav-client.js';
export type {
  Depth,
  FetchedBody,
  SyncCollectionResponse,
  WritePrecondition,
} from './webdav-client.js';
export { DAVClient, parseBody } from './dav-client.js';
export type {
  CalendarObjectResource,
  CollectionMembers,
  DAVClientOptions,
  MultigetResult,
  ParsedBody,
  QueryResult,
  ResourceFailure,
  VCardResource,
  WriteOptions,
} from './dav-client.js';

// Synchronization
export { SyncEngine, resolveByUid } from './sync-engine.js';
export type {
  ChangedResource,
  ChangeSet,
  DeletedResource,
  SyncEngineOptions,
  SyncOptions,
  SyncResult,
  SyncState,
} from './sync-engine.js';
