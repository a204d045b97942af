/**
 * A single-collection DAV server held in memory.
 *
 * Supports the exchanges the sync engine drives: PROPFIND depth 1 listing,
 * sync-collection REPORT with revision-numbered tokens, calendar-multiget,
 * GET, conditional PUT and DELETE.
 */

import type { HttpRequest, HttpResponse, Transport } from '../../src/transport.js';
import { escapeXml } from '../../src/xml-utils.js';
import { ORIGIN, multistatus, propResponse, response, statusResponse } from './fake-transport.js';

interface StoredResource {
  data: string;
  etag: string;
}

export class MemoryDavServer implements Transport {
  readonly requests: HttpRequest[] = [];
  private resources = new Map<string, StoredResource>();
  private changes: Array<{ revision: number; path: string }> = [];
  private revision = 0;
  private etagCounter = 0;

  /** When false, no sync-token is advertised (a server without RFC 6578). */
  supportsSyncTokens = true;
  /**
   * Reject every non-empty sync token with 410 Gone, a 403 precondition body,
   * or a 403 without a body.
   */
  tokenRejection: 'gone' | 'forbidden' | 'plainForbidden' | undefined;
  /** Member names whose GET answers 503. */
  readonly unavailable = new Set<string>();
  /** Runs before each request is answered. */
  onRequest?: (request: HttpRequest) => void;

  constructor(readonly collectionPath: string) {}

  get collectionUrl(): string {
    return `${ORIGIN}${this.collectionPath}`;
  }

  get syncToken(): string {
    return `${ORIGIN}/sync/${this.revision}`;
  }

  urlOf(name: string): string {
    return `${this.collectionUrl}${name}`;
  }

  etagOf(name: string): string | undefined {
    return this.resources.get(`${this.collectionPath}${name}`)?.etag;
  }

  /** Create or replace a member directly, as another client would. */
  store(name: string, data: string): string {
    return this.write(`${this.collectionPath}${name}`, data);
  }

  remove(name: string): void {
    this.erase(`${this.collectionPath}${name}`);
  }

  count(method: string): number {
    return this.requests.filter((request) => request.method === method).length;
  }

  private write(path: string, data: string): string {
    this.etagCounter += 1;
    const etag = `"e${this.etagCounter}"`;
    this.resources.set(path, { data, etag });
    this.record(path);
    return etag;
  }

  private erase(path: string): void {
    if (this.resources.delete(path)) this.record(path);
  }

  private record(path: string): void {
    this.revision += 1;
    this.changes.push({ revision: this.revision, path });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    this.onRequest?.(request);

    const path = new URL(request.url).pathname;
    switch (request.method) {
      case 'PROPFIND':
        return path === this.collectionPath ? this.listing() : response(404);
      case 'REPORT': {
        const body = request.body ?? '';
        return /calendar-multiget|addressbook-multiget/.test(body) ? this.multiget(body) : this.syncReport(body);
      }
      case 'GET': {
        if (this.unavailable.has(path.slice(this.collectionPath.length))) return response(503);
        const resource = this.resources.get(path);
        return resource
          ? response(200, resource.data, { etag: resource.etag, 'content-type': 'text/calendar' })
          : response(404);
      }
      case 'PUT':
        return this.put(path, request);
      case 'DELETE':
        return this.delete(path, request);
      default:
        return response(405);
    }
  }

  private listing(): HttpResponse {
    const token = this.supportsSyncTokens ? `<d:sync-token>${this.syncToken}</d:sync-token>` : '';
    const self = propResponse(
      this.collectionPath,
      `<d:resourcetype><d:collection/></d:resourcetype>${token}<cs:getctag>${this.revision}</cs:getctag>`
    );
    const members = [...this.resources].map(([path, resource]) =>
      propResponse(path, `<d:resourcetype/><d:getetag>${resource.etag}</d:getetag>`)
    );
    return multistatus(self, ...members);
  }

  private syncReport(body: string): HttpResponse {
    if (!this.supportsSyncTokens) return response(501);

    const token = /<d:sync-token>([^<]*)<\/d:sync-token>/.exec(body)?.[1] ?? '';
    let paths: string[];

    if (token === '') {
      paths = [...this.resources.keys()];
    } else {
      if (this.tokenRejection === 'gone') return response(410);
      if (this.tokenRejection === 'forbidden') {
        return response(403, '<d:error xmlns:d="DAV:"><d:valid-sync-token/></d:error>');
      }
      if (this.tokenRejection === 'plainForbidden') return response(403);
      const since = Number(token.split('/').pop());
      if (Number.isNaN(since)) return response(410);
      paths = [...new Set(this.changes.filter((change) => change.revision > since).map((change) => change.path))];
    }

    const entries = paths.map((path) => {
      const resource = this.resources.get(path);
      return resource
        ? propResponse(path, `<d:getetag>${resource.etag}</d:getetag>`)
        : statusResponse(path, 'HTTP/1.1 404 Not Found');
    });

    const document = multistatus(...entries);
    return {
      ...document,
      body: document.body.replace(
        '</d:multistatus>',
        `<d:sync-token>${this.syncToken}</d:sync-token>\n</d:multistatus>`
      ),
    };
  }

  private multiget(body: string): HttpResponse {
    const paths = [...body.matchAll(/<d:href>([^<]+)<\/d:href>/g)].map((match) => match[1] ?? '');
    const dataElement = body.includes('addressbook-multiget') ? 'card:address-data' : 'c:calendar-data';

    return multistatus(
      ...paths.map((path) => {
        const resource = this.resources.get(path);
        return resource
          ? propResponse(
              path,
              `<d:getetag>${resource.etag}</d:getetag>` +
                `<${dataElement}>${escapeXml(resource.data)}</${dataElement}>`
            )
          : statusResponse(path, 'HTTP/1.1 404 Not Found');
      })
    );
  }

  private put(path: string, request: HttpRequest): HttpResponse {
    const existing = this.resources.get(path);
    const ifMatch = request.headers['If-Match'];
    const ifNoneMatch = request.headers['If-None-Match'];

    if (ifMatch !== undefined && existing?.etag !== ifMatch) return response(412);
    if (ifNoneMatch === '*' && existing) return response(412);

    const etag = this.write(path, request.body ?? '');
    return response(existing ? 204 : 201, '', { etag });
  }

  private delete(path: string, request: HttpRequest): HttpResponse {
    const existing = this.resources.get(path);
    const ifMatch = request.headers['If-Match'];

    if (!existing) return response(404);
    if (ifMatch !== undefined && existing.etag !== ifMatch) return response(412);

    this.erase(path);
    return response(204);
  }
}
