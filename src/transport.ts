/**
 * Transport
 *
 * The HTTP exchange the client core consumes but does not own. Anything able
 * to send a request and hand back status, headers and body text can be plugged
 * in; `FetchTransport` wraps the global `fetch` of Node 20.
 */

import { DEFAULT_REQUEST_TIMEOUT, getConfig } from './config.js';
import { DAVError } from './errors.js';

export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'OPTIONS'
  | 'PROPFIND'
  | 'PROPPATCH'
  | 'REPORT'
  | 'MKCOL'
  | 'COPY'
  | 'MOVE'
  | 'LOCK'
  | 'UNLOCK';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

export interface Transport {
  /**
   * Send one request. Rejections are treated as network failures by the
   * caller; an HTTP error status is a normal resolved response.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Supplies authentication headers for an outgoing request. Called once per
 * request; the core never reads or keeps the credentials themselves.
 */
export interface CredentialInjector {
  headersFor(request: HttpRequest): Record<string, string> | Promise<Record<string, string>>;
}

export function basicAuth(username: string, password: string): CredentialInjector {
  const encoded = Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
  return {
    headersFor: () => ({ Authorization: `Basic ${encoded}` }),
  };
}

export function bearerAuth(token: string): CredentialInjector {
  return {
    headersFor: () => ({ Authorization: `Bearer ${token}` }),
  };
}

export function headerValue(response: HttpResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}

export interface FetchTransportOptions {
  /** Abort a request after this many milliseconds. */
  timeout?: number;
}

/**
 * Transport backed by the global `fetch`.
 *
 * A request that exceeds the timeout, is aborted by the caller's signal, or
 * fails below HTTP is rejected with a `networkFailure` DAVError.
 */
export class FetchTransport implements Transport {
  private timeout: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout ?? getConfig().requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${this.timeout}ms`)),
      this.timeout
    );
    const onAbort = () => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      onAbort();
    } else {
      request.signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error: unknown) {
      throw DAVError.networkFailure(error);
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
