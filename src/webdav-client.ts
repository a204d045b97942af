/**
 * WebDAVClient
 *
 * One method per WebDAV exchange. Credentials are injected per request,
 * non-success statuses are mapped to DAVError variants, and nothing is
 * retried here.
 */

import { DEFAULT_USER_AGENT, getConfig } from './config.js';
import { DAVError, errorFromStatus, isDAVError, isSuccessStatus } from './errors.js';
import { createLogger } from './logger.js';
import { parseCapabilities } from './server-detection.js';
import type { ServerCapabilities } from './server-detection.js';
import { headerValue } from './transport.js';
import type { CredentialInjector, HttpMethod, HttpRequest, HttpResponse, Transport } from './transport.js';
import {
  buildPropfindXml,
  buildSyncCollectionXml,
  isInvalidSyncTokenBody,
  parseMultistatus,
} from './xml-utils.js';
import type { DAVPropertyName, MultistatusDocument, ResourceOutcome } from './xml-utils.js';

const log = createLogger('webdav');

export type Depth = '0' | '1' | 'infinity';

export interface DAVRequestInit {
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type WritePrecondition = { ifMatch: string } | { ifNoneMatch: '*' };

export interface FetchedBody {
  data: string;
  etag?: string;
  contentType?: string;
}

export interface SyncCollectionResponse {
  syncToken: string;
  outcomes: ResourceOutcome[];
}

export interface WebDAVClientOptions {
  transport: Transport;
  credentials?: CredentialInjector;
  userAgent?: string;
}

const MAX_REDIRECTS = 5;

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 307 || status === 308;
}

export class WebDAVClient {
  private transport: Transport;
  private credentials?: CredentialInjector;
  private userAgent: string;

  constructor(options: WebDAVClientOptions) {
    this.transport = options.transport;
    this.credentials = options.credentials;
    this.userAgent = options.userAgent ?? getConfig().userAgent ?? DEFAULT_USER_AGENT;
  }

  get hasCredentials(): boolean {
    return this.credentials !== undefined;
  }

  // ==========================================================================
  // Raw exchange
  // ==========================================================================

  /**
   * Send a request through the transport. Resolves with any HTTP status;
   * rejects only with `networkFailure`.
   */
  async request(method: HttpMethod, url: string, init: DAVRequestInit = {}): Promise<HttpResponse> {
    const request: HttpRequest = {
      method,
      url,
      headers: { 'User-Agent': this.userAgent, ...init.headers },
      body: init.body,
      signal: init.signal,
    };

    if (this.credentials) {
      const authHeaders = await this.credentials.headersFor(request);
      request.headers = { ...request.headers, ...authHeaders };
    }

    log.debug(`${method} ${url}`);

    try {
      const response = await this.transport.send(request);
      log.debug(`${method} ${url} -> ${response.status}`);
      return response;
    } catch (error: unknown) {
      if (isDAVError(error, 'networkFailure')) throw error;
      throw DAVError.networkFailure(error);
    }
  }

  private fail(response: HttpResponse, etag?: string): DAVError {
    return errorFromStatus(response.status, response.body, {
      credentialsSupplied: this.hasCredentials,
      etag,
    });
  }

  private multistatus(response: HttpResponse, url: string): MultistatusDocument {
    if (response.status !== 207) {
      throw isSuccessStatus(response.status)
        ? DAVError.invalidResponse(response.status, response.body)
        : this.fail(response);
    }
    return parseMultistatus(response.body, url);
  }

  // ==========================================================================
  // PROPFIND / REPORT
  // ==========================================================================

  async propfind(
    url: string,
    properties: DAVPropertyName[],
    depth: Depth,
    signal?: AbortSignal
  ): Promise<ResourceOutcome[]> {
    let target = url;
    for (let hops = 0; ; hops++) {
      const response = await this.request('PROPFIND', target, {
        headers: { 'Content-Type': 'application/xml; charset=utf-8', Depth: depth },
        body: buildPropfindXml(properties),
        signal,
      });

      // Well-known URIs (RFC 6764) answer with a redirect to the context path
      const location = headerValue(response, 'location');
      if (isRedirect(response.status) && location && hops < MAX_REDIRECTS) {
        target = new URL(location, target).toString();
        log.debug(`PROPFIND redirected to ${target}`);
        continue;
      }
      return this.multistatus(response, target).outcomes;
    }
  }

  async report(url: string, body: string, depth: Depth, signal?: AbortSignal): Promise<MultistatusDocument> {
    const response = await this.request('REPORT', url, {
      headers: { 'Content-Type': 'application/xml; charset=utf-8', Depth: depth },
      body,
      signal,
    });
    return this.multistatus(response, url);
  }

  /**
   * sync-collection REPORT (RFC 6578).
   *
   * When a token was sent, 410 Gone, any 403, or a 409 carrying the
   * `valid-sync-token` precondition means the server no longer accepts it.
   */
  async syncCollection(
    url: string,
    syncToken: string | undefined,
    properties: DAVPropertyName[] = ['getetag'],
    signal?: AbortSignal
  ): Promise<SyncCollectionResponse> {
    const response = await this.request('REPORT', url, {
      headers: { 'Content-Type': 'application/xml; charset=utf-8', Depth: '0' },
      body: buildSyncCollectionXml(syncToken, properties),
      signal,
    });

    if (syncToken) {
      const rejected =
        response.status === 410 ||
        response.status === 403 ||
        (response.status === 409 && isInvalidSyncTokenBody(response.body));
      if (rejected) throw DAVError.syncTokenExpired();
    }

    const document = this.multistatus(response, url);
    if (!document.syncToken) {
      throw DAVError.parsingError('No sync-token found in sync-collection response');
    }
    return { syncToken: document.syncToken, outcomes: document.outcomes };
  }

  // ==========================================================================
  // Resources
  // ==========================================================================

  async get(url: string, signal?: AbortSignal): Promise<FetchedBody> {
    const response = await this.request('GET', url, { signal });
    if (!isSuccessStatus(response.status)) {
      throw this.fail(response);
    }
    return {
      data: response.body,
      etag: headerValue(response, 'etag'),
      contentType: headerValue(response, 'content-type'),
    };
  }

  /**
   * PUT a resource body.
   * @returns The new ETag, when the server sends one
   */
  async put(
    url: string,
    data: string,
    contentType: string,
    precondition?: WritePrecondition,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const headers: Record<string, string> = { 'Content-Type': contentType };
    let expectedEtag: string | undefined;

    if (precondition && 'ifMatch' in precondition) {
      headers['If-Match'] = precondition.ifMatch;
      expectedEtag = precondition.ifMatch;
    } else if (precondition) {
      headers['If-None-Match'] = precondition.ifNoneMatch;
    }

    const response = await this.request('PUT', url, { headers, body: data, signal });
    if (!isSuccessStatus(response.status)) {
      throw this.fail(response, expectedEtag);
    }
    return headerValue(response, 'etag');
  }

  /**
   * DELETE a resource. An unconditioned delete of a missing resource succeeds.
   */
  async delete(url: string, ifMatch?: string, signal?: AbortSignal): Promise<void> {
    const headers: Record<string, string> = {};
    if (ifMatch) headers['If-Match'] = ifMatch;

    const response = await this.request('DELETE', url, { headers, signal });
    if (isSuccessStatus(response.status)) return;
    if (response.status === 404 && !ifMatch) return;
    throw this.fail(response, ifMatch);
  }

  async mkcol(url: string, signal?: AbortSignal): Promise<void> {
    const response = await this.request('MKCOL', url, { signal });
    if (!isSuccessStatus(response.status)) {
      throw this.fail(response);
    }
  }

  async options(url: string, signal?: AbortSignal): Promise<ServerCapabilities> {
    const response = await this.request('OPTIONS', url, { signal });
    if (!isSuccessStatus(response.status)) {
      throw this.fail(response);
    }

    return parseCapabilities(response, url);
  }
}
