/**
 * Server detection: capabilities from OPTIONS, product guessing and
 * multiget batching.
 */

import { describe, it, expect } from 'vitest';
import { batches, detectServerType, multigetLimit, parseCapabilities } from '../src/index.js';
import { response } from './helpers/fake-transport.js';

describe('detectServerType', () => {
  it.each([
    ['https://caldav.icloud.com/', undefined, 'icloud'],
    ['https://apidata.googleusercontent.com/caldav/v2/', undefined, 'google'],
    ['https://www.googleapis.com/carddav/v1/', undefined, 'google'],
    ['https://nextcloud.example.org/remote.php/dav/', undefined, 'nextcloud'],
    ['https://cloud.example.org/', 'Nextcloud', 'nextcloud'],
    ['https://dav.example.org/', 'Radicale/3.2.0', 'radicale'],
    ['https://mail.example.org/SOGo/dav/', 'SOGo/5.8', 'sogo'],
    ['https://dav.example.org/', 'sabre/dav 4.6', 'baikal'],
    ['https://dav.example.org/', 'Apache', 'generic'],
    ['https://dav.example.org/', undefined, 'generic'],
  ])('should read %s with Server %j as %s', (url, product, type) => {
    expect(detectServerType(url, product)).toBe(type);
  });

  it('should prefer the host name over the Server header', () => {
    expect(detectServerType('https://p42-caldav.icloud.com/', 'Radicale')).toBe('icloud');
  });
});

describe('parseCapabilities', () => {
  it('should read the compliance classes', () => {
    const capabilities = parseCapabilities(
      response(200, '', {
        dav: '1, 2, 3, calendar-access, addressbook, extended-mkcol, sync-collection',
        allow: 'OPTIONS, propfind, REPORT',
        server: 'Apache',
      }),
      'https://dav.example.org/'
    );

    expect(capabilities).toEqual({
      dav: ['1', '2', '3', 'calendar-access', 'addressbook', 'extended-mkcol', 'sync-collection'],
      allowedMethods: ['OPTIONS', 'PROPFIND', 'REPORT'],
      calendarAccess: true,
      addressBook: true,
      syncCollection: true,
      scheduling: false,
      extendedMkcol: true,
      serverProduct: 'Apache',
      serverType: 'generic',
    });
  });

  it('should count calendar-schedule as calendar access', () => {
    const capabilities = parseCapabilities(
      response(200, '', { dav: '1, calendar-schedule' }),
      'https://dav.example.org/'
    );

    expect(capabilities.calendarAccess).toBe(true);
    expect(capabilities.scheduling).toBe(true);
  });

  it('should report nothing for a server without a DAV header', () => {
    const capabilities = parseCapabilities(response(200), 'https://dav.example.org/');

    expect(capabilities.dav).toEqual([]);
    expect(capabilities.calendarAccess).toBe(false);
    expect(capabilities.serverProduct).toBeUndefined();
  });
});

describe('multiget batching', () => {
  it('should allow 50 hrefs for iCloud and 100 for Google and Nextcloud', () => {
    expect(multigetLimit('icloud')).toBe(50);
    expect(multigetLimit('google')).toBe(100);
    expect(multigetLimit('nextcloud')).toBe(100);
    expect(multigetLimit('generic')).toBe(50);
  });

  it('should split into consecutive batches', () => {
    const items = Array.from({ length: 120 }, (_, i) => i);

    const result = batches(items, 50);

    expect(result.map((batch) => batch.length)).toEqual([50, 50, 20]);
    expect(result[2]?.[0]).toBe(100);
  });

  it('should return no batch for no items', () => {
    expect(batches([], 10)).toEqual([]);
  });

  it('should reject a batch size below one', () => {
    expect(() => batches([1], 0)).toThrow('Invalid data: Batch size must be positive, got 0');
  });
});
