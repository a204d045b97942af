/**
 * WebDAVClient tests: one HTTP exchange per method, status mapping,
 * credential injection and sync-token expiry detection.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DAVError, WebDAVClient, basicAuth, isDAVError, resetConfig } from '../src/index.js';
import type { HttpRequest } from '../src/index.js';
import { FakeTransport, ORIGIN, multistatus, propResponse, response } from './helpers/fake-transport.js';

const COLLECTION = '/calendars/alice/work/';

async function rejectionOf(promise: Promise<unknown>): Promise<DAVError> {
  try {
    await promise;
  } catch (error: unknown) {
    if (isDAVError(error)) return error;
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

describe('WebDAVClient', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    resetConfig();
    transport = new FakeTransport();
  });

  // ===========================================================================
  // 1. Request assembly
  // ===========================================================================

  describe('request', () => {
    it('should send the User-Agent and the injected credentials', async () => {
      transport.on('GET', '/a.ics', response(200, 'body'));
      const client = new WebDAVClient({
        transport,
        credentials: basicAuth('alice', 'secret'),
        userAgent: 'test-agent',
      });

      await client.request('GET', `${ORIGIN}/a.ics`, { headers: { Accept: 'text/calendar' } });

      expect(transport.last().headers).toEqual({
        'User-Agent': 'test-agent',
        Accept: 'text/calendar',
        Authorization: 'Basic YWxpY2U6c2VjcmV0',
      });
    });

    it('should ask the credential injector once per request', async () => {
      const headersFor = vi.fn((_request: HttpRequest) => ({ Authorization: 'Bearer test-token' }));
      transport.on('GET', '/a.ics', response(200));
      const client = new WebDAVClient({ transport, credentials: { headersFor } });

      await client.request('GET', `${ORIGIN}/a.ics`);
      await client.request('GET', `${ORIGIN}/a.ics`);

      expect(headersFor).toHaveBeenCalledTimes(2);
      expect(headersFor.mock.calls[0]?.[0].method).toBe('GET');
    });

    it('should default the User-Agent to the configured value', async () => {
      transport.on('GET', '/a.ics', response(200));
      const client = new WebDAVClient({ transport });

      await client.request('GET', `${ORIGIN}/a.ics`);

      expect(transport.last().headers['User-Agent']).toBe('dav-sync-client');
    });

    it('should resolve with error statuses instead of rejecting', async () => {
      const client = new WebDAVClient({ transport });
      const result = await client.request('GET', `${ORIGIN}/missing.ics`);
      expect(result.status).toBe(404);
    });

    it('should wrap transport rejections as networkFailure', async () => {
      const cause = new Error('socket hang up');
      const client = new WebDAVClient({
        transport: { send: () => Promise.reject(cause) },
      });

      const error = await rejectionOf(client.request('GET', `${ORIGIN}/a.ics`));

      expect(error.detail).toEqual({ kind: 'networkFailure', cause });
      expect(error.message).toBe('Network error: socket hang up');
    });
  });

  // ===========================================================================
  // 2. PROPFIND / REPORT
  // ===========================================================================

  describe('propfind', () => {
    it('should send Depth and the requested properties', async () => {
      transport.on('PROPFIND', COLLECTION, multistatus(propResponse(COLLECTION, '<d:getetag>"x"</d:getetag>')));
      const client = new WebDAVClient({ transport });

      const outcomes = await client.propfind(`${ORIGIN}${COLLECTION}`, ['getetag', 'getctag'], '1');

      const request = transport.last();
      expect(request.headers['Depth']).toBe('1');
      expect(request.body).toContain('<d:getetag/>');
      expect(request.body).toContain('<cs:getctag/>');
      const [first] = outcomes;
      expect(outcomes).toHaveLength(1);
      expect(first?.ok ? first.props.etag : undefined).toBe('"x"');
    });

    it('should follow a redirect to the context path', async () => {
      transport
        .on('PROPFIND', '/.well-known/caldav', response(301, '', { location: '/dav/' }))
        .on('PROPFIND', '/dav/', multistatus(propResponse('/dav/', '<d:displayname>root</d:displayname>')));
      const client = new WebDAVClient({ transport });

      const outcomes = await client.propfind(`${ORIGIN}/.well-known/caldav`, ['displayname'], '0');

      expect(transport.requests.map((request) => request.url)).toEqual([
        `${ORIGIN}/.well-known/caldav`,
        `${ORIGIN}/dav/`,
      ]);
      expect(outcomes[0]?.url).toBe(`${ORIGIN}/dav/`);
    });

    it('should stop following redirects after five hops', async () => {
      transport.on('PROPFIND', '/loop/', response(302, '', { location: '/loop/' }));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.propfind(`${ORIGIN}/loop/`, ['displayname'], '0'));

      expect(transport.count('PROPFIND', '/loop/')).toBe(6);
      expect(error.kind).toBe('invalidResponse');
    });

    it('should reject a success status other than 207', async () => {
      transport.on('PROPFIND', COLLECTION, response(200, '<html/>'));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.propfind(`${ORIGIN}${COLLECTION}`, ['getetag'], '0'));

      expect(error.detail).toEqual({ kind: 'invalidResponse', status: 200, body: '<html/>' });
    });

    it('should map 401 to authenticationRequired without credentials', async () => {
      transport.on('PROPFIND', COLLECTION, response(401));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.propfind(`${ORIGIN}${COLLECTION}`, ['getetag'], '0'));
      expect(error.kind).toBe('authenticationRequired');
    });

    it('should map 401 to unauthorized with credentials', async () => {
      transport.on('PROPFIND', COLLECTION, response(401));
      const client = new WebDAVClient({ transport, credentials: basicAuth('alice', 'wrong') });

      const error = await rejectionOf(client.propfind(`${ORIGIN}${COLLECTION}`, ['getetag'], '0'));
      expect(error.kind).toBe('unauthorized');
    });

    it('should return the report document with its sync token', async () => {
      transport.on('REPORT', COLLECTION, (request) => {
        expect(request.headers['Depth']).toBe('1');
        return multistatus('<d:sync-token>tok-1</d:sync-token>');
      });
      const client = new WebDAVClient({ transport });

      const document = await client.report(`${ORIGIN}${COLLECTION}`, '<x/>', '1');

      expect(document).toEqual({ outcomes: [], syncToken: 'tok-1' });
    });
  });

  // ===========================================================================
  // 3. sync-collection
  // ===========================================================================

  describe('syncCollection', () => {
    const url = `${ORIGIN}${COLLECTION}`;

    it('should send an empty sync-token element for an initial sync', async () => {
      transport.on('REPORT', COLLECTION, multistatus('<d:sync-token>tok-1</d:sync-token>'));
      const client = new WebDAVClient({ transport });

      const result = await client.syncCollection(url, undefined);

      expect(transport.last().body).toContain('<d:sync-token></d:sync-token>');
      expect(transport.last().headers['Depth']).toBe('0');
      expect(result).toEqual({ syncToken: 'tok-1', outcomes: [] });
    });

    it('should report 410 Gone as syncTokenExpired', async () => {
      transport.on('REPORT', COLLECTION, response(410));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.syncCollection(url, 'tok-old'));
      expect(error.kind).toBe('syncTokenExpired');
    });

    it('should report a valid-sync-token precondition as syncTokenExpired', async () => {
      transport.on('REPORT', COLLECTION, response(409, '<d:error xmlns:d="DAV:"><d:valid-sync-token/></d:error>'));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.syncCollection(url, 'tok-old'));
      expect(error.kind).toBe('syncTokenExpired');
    });

    it('should report any 403 on a tokened request as syncTokenExpired', async () => {
      transport.on('REPORT', COLLECTION, response(403, 'no'));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.syncCollection(url, 'tok-old'));
      expect(error.kind).toBe('syncTokenExpired');
    });

    it('should keep 403 on an initial sync as forbidden', async () => {
      transport.on('REPORT', COLLECTION, response(403, 'no'));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.syncCollection(url, undefined));
      expect(error.kind).toBe('forbidden');
    });

    it('should keep 409 without the precondition as conflict', async () => {
      transport.on('REPORT', COLLECTION, response(409, 'busy'));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.syncCollection(url, 'tok-old'));
      expect(error.kind).toBe('conflict');
    });

    it('should fail when the response carries no sync token', async () => {
      transport.on('REPORT', COLLECTION, multistatus());
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.syncCollection(url, 'tok-1'));
      expect(error.detail).toEqual({
        kind: 'parsingError',
        message: 'No sync-token found in sync-collection response',
      });
    });
  });

  // ===========================================================================
  // 4. Resources
  // ===========================================================================

  describe('resources', () => {
    const url = `${ORIGIN}${COLLECTION}a.ics`;

    it('should return body, ETag and content type from GET', async () => {
      transport.on(
        'GET',
        `${COLLECTION}a.ics`,
        response(200, 'BEGIN:VCALENDAR', { etag: '"1"', 'content-type': 'text/calendar' })
      );
      const client = new WebDAVClient({ transport });

      expect(await client.get(url)).toEqual({ data: 'BEGIN:VCALENDAR', etag: '"1"', contentType: 'text/calendar' });
    });

    it('should send If-Match on a conditional PUT and return the new ETag', async () => {
      transport.on('PUT', `${COLLECTION}a.ics`, response(204, '', { etag: '"2"' }));
      const client = new WebDAVClient({ transport });

      const etag = await client.put(url, 'data', 'text/calendar; charset=utf-8', { ifMatch: '"1"' });

      expect(etag).toBe('"2"');
      expect(transport.last().headers['If-Match']).toBe('"1"');
      expect(transport.last().headers['Content-Type']).toBe('text/calendar; charset=utf-8');
    });

    it('should send If-None-Match for a create-only PUT', async () => {
      transport.on('PUT', `${COLLECTION}a.ics`, response(201));
      const client = new WebDAVClient({ transport });

      const etag = await client.put(url, 'data', 'text/calendar', { ifNoneMatch: '*' });

      expect(etag).toBeUndefined();
      expect(transport.last().headers['If-None-Match']).toBe('*');
    });

    it('should map 412 on PUT to preconditionFailed with the expected ETag', async () => {
      transport.on('PUT', `${COLLECTION}a.ics`, response(412));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.put(url, 'data', 'text/calendar', { ifMatch: '"1"' }));
      expect(error.detail).toEqual({ kind: 'preconditionFailed', etag: '"1"' });
    });

    it('should treat an unconditioned DELETE of a missing resource as done', async () => {
      const client = new WebDAVClient({ transport });
      await expect(client.delete(url)).resolves.toBeUndefined();
    });

    it('should fail a conditioned DELETE of a missing resource', async () => {
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.delete(url, '"1"'));
      expect(error.kind).toBe('notFound');
    });

    it('should map 5xx on MKCOL to serverError', async () => {
      transport.on('MKCOL', '/calendars/alice/new/', response(507, 'Insufficient Storage'));
      const client = new WebDAVClient({ transport });

      const error = await rejectionOf(client.mkcol(`${ORIGIN}/calendars/alice/new/`));
      expect(error.detail).toEqual({ kind: 'serverError', status: 507, message: 'Insufficient Storage' });
    });
  });

  // ===========================================================================
  // 5. OPTIONS
  // ===========================================================================

  describe('options', () => {
    it('should parse compliance classes and allowed methods', async () => {
      transport.on(
        'OPTIONS',
        '/',
        response(200, '', { dav: '1, 2, 3, calendar-access, addressbook', allow: 'options, GET, PROPFIND, REPORT' })
      );
      const client = new WebDAVClient({ transport });

      expect(await client.options(`${ORIGIN}/`)).toEqual({
        dav: ['1', '2', '3', 'calendar-access', 'addressbook'],
        allowedMethods: ['OPTIONS', 'GET', 'PROPFIND', 'REPORT'],
        calendarAccess: true,
        addressBook: true,
        syncCollection: false,
        scheduling: false,
        extendedMkcol: false,
        serverProduct: undefined,
        serverType: 'generic',
      });
    });

    it('should recognize the server product from the Server header', async () => {
      transport.on(
        'OPTIONS',
        '/',
        response(200, '', {
          dav: '1, 3, calendar-access, calendar-schedule, sync-collection',
          server: 'Radicale/3.2',
        })
      );
      const client = new WebDAVClient({ transport });

      const capabilities = await client.options(`${ORIGIN}/`);

      expect(capabilities.syncCollection).toBe(true);
      expect(capabilities.scheduling).toBe(true);
      expect(capabilities.serverProduct).toBe('Radicale/3.2');
      expect(capabilities.serverType).toBe('radicale');
    });
  });
});
