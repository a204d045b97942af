/**
 * Error taxonomy and configuration tests.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  configure,
  getConfig,
  resetConfig,
  createLogger,
  DAVError,
  errorFromStatus,
  isDAVError,
} from '../src/index.js';

// ===========================================================================
// 1. Config DI
// ===========================================================================

describe('Config DI', () => {
  beforeEach(() => resetConfig());

  it('should return empty config by default', () => {
    expect(getConfig()).toEqual({});
  });

  it('should merge successive configure calls', () => {
    configure({ requestTimeout: 5000 });
    configure({ userAgent: 'test-agent' });

    expect(getConfig()).toEqual({ requestTimeout: 5000, userAgent: 'test-agent' });
  });

  it('should return a copy', () => {
    configure({ prodId: '-//Test//EN' });
    const config = getConfig();
    config.prodId = 'changed';

    expect(getConfig().prodId).toBe('-//Test//EN');
  });

  it('should reset to empty', () => {
    configure({ logLevel: 'debug' });
    resetConfig();
    expect(getConfig()).toEqual({});
  });
});

// ===========================================================================
// 2. Logger
// ===========================================================================

describe('createLogger', () => {
  beforeEach(() => resetConfig());
  afterEach(() => vi.restoreAllMocks());

  it('should prefix lines with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('sync').warn('token expired');

    expect(warn).toHaveBeenCalledWith('[dav-sync:sync] token expired');
  });

  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = createLogger('sync');

    log.info('hidden');
    configure({ logLevel: 'info' });
    log.info('shown');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('[dav-sync:sync] shown');
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    configure({ logLevel: 'silent' });

    createLogger('client').error('boom', new Error('x'));

    expect(error).not.toHaveBeenCalled();
  });
});

// ===========================================================================
// 3. DAVError
// ===========================================================================

describe('DAVError', () => {
  beforeEach(() => resetConfig());

  it('should be an Error with a readable message', () => {
    const error = DAVError.parsingError('Missing TZID in VTIMEZONE');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DAVError');
    expect(error.kind).toBe('parsingError');
    expect(error.message).toBe('Parsing error: Missing TZID in VTIMEZONE');
  });

  it('should format payload-carrying variants', () => {
    expect(DAVError.preconditionFailed('"abc"').message).toBe('Precondition failed (etag: "abc")');
    expect(DAVError.preconditionFailed().message).toBe('Precondition failed');
    expect(DAVError.serverError(503, 'down').message).toBe('Server error (503): down');
    expect(DAVError.invalidResponse(418).message).toBe('Invalid response with status code: 418');
    expect(DAVError.syncTokenExpired().message).toBe('Sync token has expired');
  });

  it('should keep the network cause', () => {
    const cause = new TypeError('fetch failed');
    const error = DAVError.networkFailure(cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Network error: fetch failed');
  });

  describe('equals', () => {
    it('should treat all network failures as equal', () => {
      expect(DAVError.networkFailure(new Error('a')).equals(DAVError.networkFailure('b'))).toBe(true);
    });

    it('should compare payloads of other variants', () => {
      expect(DAVError.notFound().equals(DAVError.notFound())).toBe(true);
      expect(DAVError.notFound().equals(DAVError.forbidden())).toBe(false);
      expect(DAVError.preconditionFailed('"a"').equals(DAVError.preconditionFailed('"b"'))).toBe(false);
      expect(DAVError.conflict('x').equals(DAVError.conflict('x'))).toBe(true);
      expect(DAVError.serverError(500).equals(DAVError.serverError(502))).toBe(false);
    });
  });

  it('should narrow with isDAVError', () => {
    const error: unknown = DAVError.notFound();

    expect(isDAVError(error)).toBe(true);
    expect(isDAVError(error, 'notFound')).toBe(true);
    expect(isDAVError(error, 'forbidden')).toBe(false);
    expect(isDAVError(new Error('plain'))).toBe(false);
  });
});

// ===========================================================================
// 4. Status mapping
// ===========================================================================

describe('errorFromStatus', () => {
  beforeEach(() => resetConfig());

  it('should distinguish missing and rejected credentials on 401', () => {
    expect(errorFromStatus(401, '').kind).toBe('authenticationRequired');
    expect(errorFromStatus(401, '', { credentialsSupplied: true }).kind).toBe('unauthorized');
  });

  it('should map the fixed statuses', () => {
    expect(errorFromStatus(403, '').detail).toEqual({ kind: 'forbidden' });
    expect(errorFromStatus(404, '').detail).toEqual({ kind: 'notFound' });
    expect(errorFromStatus(412, '', { etag: '"1"' }).detail).toEqual({ kind: 'preconditionFailed', etag: '"1"' });
  });

  it('should carry the body of a 409', () => {
    expect(errorFromStatus(409, 'locked').detail).toEqual({ kind: 'conflict', message: 'locked' });
    expect(errorFromStatus(409, '').detail).toEqual({ kind: 'conflict', message: 'Resource state conflict' });
  });

  it('should map 5xx to serverError and anything else to invalidResponse', () => {
    expect(errorFromStatus(500, 'boom').detail).toEqual({ kind: 'serverError', status: 500, message: 'boom' });
    expect(errorFromStatus(418, 'teapot').detail).toEqual({ kind: 'invalidResponse', status: 418, body: 'teapot' });
  });

  it('should truncate bodies to the configured length', () => {
    configure({ bodySnippetLength: 4 });
    expect(errorFromStatus(500, 'abcdefgh').detail).toEqual({ kind: 'serverError', status: 500, message: 'abcd' });
  });
});
