/**
 * DAV Errors
 *
 * Every failure raised by the library is a `DAVError`. The variant and its
 * payload live in `detail`, a closed discriminated union, so callers can
 * `switch (error.kind)` to decide between retrying, re-fetching or failing.
 */

import { DEFAULT_BODY_SNIPPET_LENGTH, getConfig } from './config.js';

export type DAVErrorDetail =
  | { kind: 'networkFailure'; cause: unknown }
  | { kind: 'invalidResponse'; status: number; body?: string }
  | { kind: 'parsingError'; message: string }
  | { kind: 'authenticationRequired' }
  | { kind: 'unauthorized' }
  | { kind: 'forbidden' }
  | { kind: 'notFound' }
  | { kind: 'conflict'; message: string }
  | { kind: 'preconditionFailed'; etag?: string }
  | { kind: 'serverError'; status: number; message?: string }
  | { kind: 'unsupportedOperation'; message: string }
  | { kind: 'invalidData'; message: string }
  | { kind: 'syncTokenExpired' };

export type DAVErrorKind = DAVErrorDetail['kind'];

function describeDetail(detail: DAVErrorDetail): string {
  switch (detail.kind) {
    case 'networkFailure':
      return `Network error: ${detail.cause instanceof Error ? detail.cause.message : String(detail.cause)}`;
    case 'invalidResponse':
      return `Invalid response with status code: ${detail.status}`;
    case 'parsingError':
      return `Parsing error: ${detail.message}`;
    case 'authenticationRequired':
      return 'Authentication is required';
    case 'unauthorized':
      return 'Unauthorized access';
    case 'forbidden':
      return 'Access forbidden';
    case 'notFound':
      return 'Resource not found';
    case 'conflict':
      return `Conflict: ${detail.message}`;
    case 'preconditionFailed':
      return detail.etag ? `Precondition failed (etag: ${detail.etag})` : 'Precondition failed';
    case 'serverError':
      return detail.message
        ? `Server error (${detail.status}): ${detail.message}`
        : `Server error (${detail.status})`;
    case 'unsupportedOperation':
      return `Unsupported operation: ${detail.message}`;
    case 'invalidData':
      return `Invalid data: ${detail.message}`;
    case 'syncTokenExpired':
      return 'Sync token has expired';
  }
}

export class DAVError extends Error {
  readonly detail: DAVErrorDetail;

  constructor(detail: DAVErrorDetail) {
    super(describeDetail(detail), detail.kind === 'networkFailure' ? { cause: detail.cause } : undefined);
    this.name = 'DAVError';
    this.detail = detail;
  }

  get kind(): DAVErrorKind {
    return this.detail.kind;
  }

  /**
   * Network failures are equal regardless of their cause, since transports
   * represent causes differently. Other variants compare their payloads.
   */
  equals(other: DAVError): boolean {
    const a = this.detail;
    const b = other.detail;
    switch (a.kind) {
      case 'networkFailure':
      case 'authenticationRequired':
      case 'unauthorized':
      case 'forbidden':
      case 'notFound':
      case 'syncTokenExpired':
        return a.kind === b.kind;
      case 'invalidResponse':
        return b.kind === a.kind && a.status === b.status && a.body === b.body;
      case 'serverError':
        return b.kind === a.kind && a.status === b.status && a.message === b.message;
      case 'preconditionFailed':
        return b.kind === a.kind && a.etag === b.etag;
      case 'parsingError':
      case 'conflict':
      case 'unsupportedOperation':
      case 'invalidData':
        return b.kind === a.kind && a.message === b.message;
    }
  }

  static networkFailure(cause: unknown): DAVError {
    return new DAVError({ kind: 'networkFailure', cause });
  }

  static invalidResponse(status: number, body?: string): DAVError {
    return new DAVError({ kind: 'invalidResponse', status, body });
  }

  static parsingError(message: string): DAVError {
    return new DAVError({ kind: 'parsingError', message });
  }

  static authenticationRequired(): DAVError {
    return new DAVError({ kind: 'authenticationRequired' });
  }

  static unauthorized(): DAVError {
    return new DAVError({ kind: 'unauthorized' });
  }

  static forbidden(): DAVError {
    return new DAVError({ kind: 'forbidden' });
  }

  static notFound(): DAVError {
    return new DAVError({ kind: 'notFound' });
  }

  static conflict(message: string): DAVError {
    return new DAVError({ kind: 'conflict', message });
  }

  static preconditionFailed(etag?: string): DAVError {
    return new DAVError({ kind: 'preconditionFailed', etag });
  }

  static serverError(status: number, message?: string): DAVError {
    return new DAVError({ kind: 'serverError', status, message });
  }

  static unsupportedOperation(message: string): DAVError {
    return new DAVError({ kind: 'unsupportedOperation', message });
  }

  static invalidData(message: string): DAVError {
    return new DAVError({ kind: 'invalidData', message });
  }

  static syncTokenExpired(): DAVError {
    return new DAVError({ kind: 'syncTokenExpired' });
  }
}

/**
 * Narrow an unknown value to a DAVError, optionally of one kind.
 */
export function isDAVError(value: unknown, kind?: DAVErrorKind): value is DAVError {
  return value instanceof DAVError && (kind === undefined || value.kind === kind);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function bodySnippet(body: string | undefined): string | undefined {
  if (!body) return undefined;
  const limit = getConfig().bodySnippetLength ?? DEFAULT_BODY_SNIPPET_LENGTH;
  return body.length > limit ? body.slice(0, limit) : body;
}

export interface StatusContext {
  /** Whether a credential injector was configured for the request. */
  credentialsSupplied?: boolean;
  /** ETag the request was conditioned on, reported back on 412. */
  etag?: string;
}

/**
 * Map a non-success HTTP status to its DAVError variant.
 */
export function errorFromStatus(
  status: number,
  body: string | undefined,
  context: StatusContext = {}
): DAVError {
  const snippet = bodySnippet(body);

  if (status === 401) {
    return context.credentialsSupplied ? DAVError.unauthorized() : DAVError.authenticationRequired();
  }
  if (status === 403) return DAVError.forbidden();
  if (status === 404) return DAVError.notFound();
  if (status === 409) return DAVError.conflict(snippet ?? 'Resource state conflict');
  if (status === 412) return DAVError.preconditionFailed(context.etag);
  if (status >= 500 && status < 600) return DAVError.serverError(status, snippet);
  return DAVError.invalidResponse(status, snippet);
}
