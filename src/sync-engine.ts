/**
 * SyncEngine
 *
 * Synchronization of calendar and address book collections.
 * `synchronize` fetches everything, or the changes since the token it is
 * given; `synchronizeIncremental` continues from the state the engine holds,
 * with the RFC 6578 sync-collection REPORT when a token is known and an ETag
 * comparison for servers that never issue sync tokens.
 *
 * The engine owns, per collection, the current sync token, the last-known
 * ETag of every member, and the members whose body could not be fetched.
 * A cycle reads that state at its start and commits the new state in one
 * assignment at its end, so a failed or cancelled cycle leaves the prior
 * state untouched.
 */

import { parseBody } from './dav-client.js';
import type { DAVClient, ParsedBody, ResourceFailure, WriteOptions } from './dav-client.js';
import type { FetchedBody } from './webdav-client.js';
import { DAVError, isDAVError } from './errors.js';
import { primaryEntity } from './ical-utils.js';
import { createLogger } from './logger.js';
import { collectionKind, sameUrl } from './resource.js';
import type { CollectionKind, DAVCollection, DAVResource } from './resource.js';

const log = createLogger('sync');

const STATE_VERSION = 1;

export type SyncState =
  | { status: 'neverSynced' }
  | { status: 'awaitingServer' }
  | { status: 'fullySynced'; token?: string; etags: Record<string, string>; pending: string[] };

export interface ChangedResource {
  url: string;
  etag?: string;
  data: string;
  body: ParsedBody;
}

export interface DeletedResource {
  url: string;
}

export interface ChangeSet {
  added: ChangedResource[];
  modified: ChangedResource[];
  deleted: DeletedResource[];
}

export interface SyncResult {
  changes: ChangeSet;
  /** Token to present next time; undefined for servers without RFC 6578. */
  syncToken?: string;
  failures: ResourceFailure[];
  /** Entries dropped because another entry with the same UID won. */
  superseded: ChangedResource[];
  /** Members to fetch again in the next incremental cycle. */
  pending: string[];
}

export interface SyncOptions {
  signal?: AbortSignal;
}

export interface SyncEngineOptions {
  /** Fetch changed bodies with multiget REPORTs instead of one GET each. */
  multiget?: boolean;
}

interface Snapshot {
  token?: string;
  etags: ReadonlyMap<string, string>;
  pending: ReadonlySet<string>;
}

interface FetchedBodies {
  bodies: Map<string, FetchedBody>;
  missing: Set<string>;
  failures: Map<string, DAVError>;
}

type CycleOutcome = { result: SyncResult; snapshot: Snapshot };

interface Candidate {
  url: string;
  change: 'added' | 'modified';
  etag?: string;
}

function stateKey(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

function checkAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw DAVError.networkFailure(signal.reason);
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === 'string')
  );
}

function entitySequence(entry: ChangedResource): { uid: string; sequence: number } | undefined {
  if (entry.body.kind !== 'icalendar') return undefined;
  const entity = primaryEntity(entry.body.calendar);
  return entity ? { uid: entity.uid, sequence: entity.sequence } : undefined;
}

/**
 * Resolve entries sharing a UID: the higher SEQUENCE wins, the first seen on
 * ties. Entries without a calendar UID always survive.
 */
export function resolveByUid(entries: ChangedResource[]): {
  winners: ChangedResource[];
  superseded: ChangedResource[];
} {
  const winners: Array<ChangedResource | undefined> = [];
  const superseded: ChangedResource[] = [];
  const byUid = new Map<string, { index: number; sequence: number }>();

  for (const entry of entries) {
    const identity = entitySequence(entry);
    if (!identity) {
      winners.push(entry);
      continue;
    }

    const current = byUid.get(identity.uid);
    if (!current) {
      byUid.set(identity.uid, { index: winners.length, sequence: identity.sequence });
      winners.push(entry);
      continue;
    }

    if (identity.sequence > current.sequence) {
      const loser = winners[current.index];
      if (loser) superseded.push(loser);
      winners[current.index] = undefined;
      byUid.set(identity.uid, { index: winners.length, sequence: identity.sequence });
      winners.push(entry);
    } else {
      superseded.push(entry);
    }
  }

  return {
    winners: winners.filter((entry): entry is ChangedResource => entry !== undefined),
    superseded,
  };
}

export class SyncEngine {
  private snapshots = new Map<string, Snapshot>();
  private inFlight = new Set<string>();

  constructor(
    private readonly client: DAVClient,
    private readonly options: SyncEngineOptions = {}
  ) {}

  // ==========================================================================
  // State
  // ==========================================================================

  state(url: string): SyncState {
    const key = stateKey(url);
    if (this.inFlight.has(key)) return { status: 'awaitingServer' };

    const snapshot = this.snapshots.get(key);
    if (!snapshot) return { status: 'neverSynced' };
    return {
      status: 'fullySynced',
      token: snapshot.token,
      etags: Object.fromEntries(snapshot.etags),
      pending: [...snapshot.pending],
    };
  }

  tokenFor(url: string): string | undefined {
    return this.snapshots.get(stateKey(url))?.token;
  }

  reset(url: string): void {
    this.snapshots.delete(stateKey(url));
  }

  /**
   * Serialize the state of one collection; undefined if it was never synced.
   */
  exportState(url: string): string | undefined {
    const snapshot = this.snapshots.get(stateKey(url));
    if (!snapshot) return undefined;
    return JSON.stringify({
      version: STATE_VERSION,
      url,
      token: snapshot.token,
      etags: Object.fromEntries(snapshot.etags),
      pending: [...snapshot.pending],
    });
  }

  /**
   * Restore state produced by `exportState`.
   * @returns The collection URL the state belongs to
   */
  importState(blob: string): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(blob);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw DAVError.invalidData(`Sync state is not JSON: ${reason}`);
    }

    if (typeof parsed !== 'object' || parsed === null) {
      throw DAVError.invalidData('Sync state must be an object');
    }
    const version = 'version' in parsed ? parsed.version : undefined;
    const url = 'url' in parsed ? parsed.url : undefined;
    const token = 'token' in parsed ? parsed.token : undefined;
    const etags = 'etags' in parsed ? parsed.etags : undefined;
    const pending = 'pending' in parsed ? parsed.pending : [];

    if (version !== STATE_VERSION) {
      throw DAVError.invalidData(`Unsupported sync state version: ${String(version)}`);
    }
    if (typeof url !== 'string' || url.length === 0) {
      throw DAVError.invalidData('Sync state is missing the collection url');
    }
    if (token !== undefined && typeof token !== 'string') {
      throw DAVError.invalidData('Sync state token must be a string');
    }
    if (!isStringRecord(etags)) {
      throw DAVError.invalidData('Sync state etags must map URLs to strings');
    }
    if (!isStringArray(pending)) {
      throw DAVError.invalidData('Sync state pending must be a list of URLs');
    }

    this.snapshots.set(stateKey(url), {
      token: typeof token === 'string' ? token : undefined,
      etags: new Map(Object.entries(etags)),
      pending: new Set(pending),
    });
    return url;
  }

  // ==========================================================================
  // Synchronization
  // ==========================================================================

  /**
   * Fetch `collection` from the server.
   *
   * Without `priorToken` every member is fetched and reported as added, and
   * the held state is replaced. With it, only the changes since that token
   * are fetched and classified against the held ETags.
   */
  async synchronize(
    collection: DAVCollection,
    priorToken?: string,
    options: SyncOptions = {}
  ): Promise<SyncResult> {
    return this.cycle(collection, options, (kind, prior) =>
      priorToken
        ? this.incremental(collection, kind, priorToken, prior, options.signal)
        : this.listing(collection, kind, undefined, options.signal)
    );
  }

  /**
   * Continue from the held state: a sync-collection REPORT with the held
   * token, an ETag diff against the held snapshot when the server issues no
   * token, or a full fetch for a collection never synced. Pending members
   * are fetched again.
   */
  async synchronizeIncremental(collection: DAVCollection, options: SyncOptions = {}): Promise<SyncResult> {
    return this.cycle(collection, options, (kind, prior) =>
      prior?.token
        ? this.incremental(collection, kind, prior.token, prior, options.signal)
        : this.listing(collection, kind, prior, options.signal)
    );
  }

  /**
   * Guard, commit and log one cycle. A rejected token resets the collection
   * to `neverSynced` and rethrows `syncTokenExpired`.
   */
  private async cycle(
    collection: DAVCollection,
    options: SyncOptions,
    run: (kind: CollectionKind, prior: Snapshot | undefined) => Promise<CycleOutcome>
  ): Promise<SyncResult> {
    const key = stateKey(collection.url);
    if (this.inFlight.has(key)) {
      throw DAVError.conflict(`Synchronization already in progress for ${collection.url}`);
    }

    const kind = collectionKind(collection);
    if (!kind) {
      throw DAVError.unsupportedOperation(`Cannot synchronize a plain collection: ${collection.url}`);
    }

    this.inFlight.add(key);
    try {
      checkAborted(options.signal);
      log.info(`Synchronizing ${collection.url}`);

      const { result, snapshot } = await run(kind, this.snapshots.get(key));

      checkAborted(options.signal);
      this.snapshots.set(key, snapshot);

      log.info(
        `Synchronized ${collection.url}: ${result.changes.added.length} added, ` +
          `${result.changes.modified.length} modified, ${result.changes.deleted.length} deleted`
      );
      return result;
    } catch (error: unknown) {
      if (isDAVError(error, 'syncTokenExpired')) {
        log.warn(`Sync token for ${collection.url} expired; a full synchronization is required`);
        this.snapshots.delete(key);
      } else {
        log.error(`Synchronization of ${collection.url} failed`, error);
      }
      throw error;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async incremental(
    collection: DAVCollection,
    kind: CollectionKind,
    token: string,
    prior: Snapshot | undefined,
    signal: AbortSignal | undefined
  ): Promise<CycleOutcome> {
    const response = await this.client.syncCollection(collection, token, signal);
    const etags = new Map<string, string>(prior?.etags ?? []);
    const candidates: Candidate[] = [];
    const deleted: DeletedResource[] = [];
    const failures: ResourceFailure[] = [];
    const reported = new Set<string>();

    for (const outcome of response.outcomes) {
      if (sameUrl(outcome.url, collection.url)) continue;
      reported.add(outcome.url);

      if (!outcome.ok) {
        if (outcome.status === 404) {
          etags.delete(outcome.url);
          deleted.push({ url: outcome.url });
        } else {
          failures.push({ url: outcome.url, error: outcome.error });
        }
        continue;
      }

      if (outcome.props.resourceType && outcome.props.resourceType !== 'resource') continue;

      const known = etags.get(outcome.url);
      if (known !== undefined && outcome.props.etag === known) {
        log.debug(`Unchanged ${outcome.url}`);
        continue;
      }
      candidates.push({
        url: outcome.url,
        change: known === undefined ? 'added' : 'modified',
        etag: outcome.props.etag,
      });
    }

    // Members that failed last time are not reported again under the new token
    for (const url of prior?.pending ?? []) {
      if (reported.has(url)) continue;
      candidates.push({ url, change: etags.has(url) ? 'modified' : 'added' });
    }

    const result = await this.fetchCandidates(collection, kind, candidates, etags, signal);
    return {
      result: {
        ...result,
        changes: { ...result.changes, deleted: [...deleted, ...result.changes.deleted] },
        failures: [...failures, ...result.failures],
        syncToken: response.syncToken,
      },
      snapshot: { token: response.syncToken, etags, pending: new Set(result.pending) },
    };
  }

  /**
   * Listing cycle: without `prior` every member is new; with it the member
   * ETags are diffed against the snapshot.
   */
  private async listing(
    collection: DAVCollection,
    kind: CollectionKind,
    prior: Snapshot | undefined,
    signal: AbortSignal | undefined
  ): Promise<CycleOutcome> {
    const listing = await this.client.listMembers(collection, signal);
    const etags = new Map<string, string>();
    const candidates: Candidate[] = [];
    const deleted: DeletedResource[] = [];
    const seen = new Set<string>();

    for (const member of listing.members) {
      seen.add(member.url);
      const known = prior?.etags.get(member.url);

      if (known !== undefined && member.etag === known) {
        etags.set(member.url, known);
        continue;
      }
      if (known !== undefined) {
        // Keep the old ETag until the new body is fetched
        etags.set(member.url, known);
      }
      candidates.push({
        url: member.url,
        change: known === undefined ? 'added' : 'modified',
        etag: member.etag,
      });
    }

    for (const url of prior?.etags.keys() ?? []) {
      if (!seen.has(url)) deleted.push({ url });
    }

    const result = await this.fetchCandidates(collection, kind, candidates, etags, signal);
    return {
      result: {
        ...result,
        changes: { ...result.changes, deleted: [...deleted, ...result.changes.deleted] },
        failures: [...listing.failures, ...result.failures],
        syncToken: listing.syncToken,
      },
      snapshot: { token: listing.syncToken, etags, pending: new Set(result.pending) },
    };
  }

  /**
   * Fetch and parse each candidate, then resolve UID duplicates. Updates
   * `etags` for every body parsed; candidates that failed come back as
   * `pending`.
   */
  private async fetchCandidates(
    collection: DAVCollection,
    kind: CollectionKind,
    candidates: Candidate[],
    etags: Map<string, string>,
    signal: AbortSignal | undefined
  ): Promise<Omit<SyncResult, 'syncToken'>> {
    const fetched: Array<{ change: Candidate['change']; entry: ChangedResource }> = [];
    const deleted: DeletedResource[] = [];
    const failures: ResourceFailure[] = [];
    const pending: string[] = [];
    const bodies = await this.fetchBodies(collection, candidates, signal);

    for (const candidate of candidates) {
      const body = bodies.bodies.get(candidate.url);
      if (!body) {
        if (bodies.missing.has(candidate.url)) {
          etags.delete(candidate.url);
          deleted.push({ url: candidate.url });
          continue;
        }
        const error =
          bodies.failures.get(candidate.url) ??
          DAVError.parsingError(`No body returned for ${candidate.url}`);
        log.warn(`Skipping ${candidate.url}: ${error.message}`);
        failures.push({ url: candidate.url, error });
        pending.push(candidate.url);
        continue;
      }

      try {
        const etag = body.etag ?? candidate.etag;
        const parsed = parseBody(kind, body.data);

        if (etag) etags.set(candidate.url, etag);
        fetched.push({
          change: candidate.change,
          entry: { url: candidate.url, etag, data: body.data, body: parsed },
        });
      } catch (error: unknown) {
        if (!isDAVError(error)) throw error;
        log.warn(`Skipping ${candidate.url}: ${error.message}`);
        failures.push({ url: candidate.url, error });
        pending.push(candidate.url);
      }
    }

    const { winners, superseded } = resolveByUid(fetched.map(({ entry }) => entry));
    for (const entry of superseded) {
      log.warn(`Superseded ${entry.url}: another resource carries the same UID with a newer SEQUENCE`);
    }

    const winning = new Set(winners);
    const pick = (change: Candidate['change']) =>
      fetched.filter((item) => item.change === change && winning.has(item.entry)).map(({ entry }) => entry);

    return {
      changes: { added: pick('added'), modified: pick('modified'), deleted },
      failures,
      superseded,
      pending,
    };
  }

  /**
   * One multiget pass when enabled, otherwise one GET per candidate.
   */
  private async fetchBodies(
    collection: DAVCollection,
    candidates: Candidate[],
    signal: AbortSignal | undefined
  ): Promise<FetchedBodies> {
    const fetched: FetchedBodies = { bodies: new Map(), missing: new Set(), failures: new Map() };
    if (candidates.length === 0) return fetched;

    if (this.options.multiget) {
      checkAborted(signal);
      const result = await this.client.multiget(
        collection,
        candidates.map((candidate) => candidate.url),
        signal
      );
      for (const resource of result.resources) fetched.bodies.set(resource.url, resource);
      for (const url of result.missing) fetched.missing.add(url);
      for (const failure of result.failures) fetched.failures.set(failure.url, failure.error);
      return fetched;
    }

    for (const candidate of candidates) {
      checkAborted(signal);
      try {
        fetched.bodies.set(candidate.url, await this.client.fetchResource(candidate.url, signal));
      } catch (error: unknown) {
        checkAborted(signal);
        if (!isDAVError(error)) throw error;

        if (error.kind === 'notFound') fetched.missing.add(candidate.url);
        else fetched.failures.set(candidate.url, error);
      }
    }
    return fetched;
  }

  // ==========================================================================
  // Write-through
  // ==========================================================================

  /**
   * PUT through the client and record the new ETag in the collection's
   * snapshot. `preconditionFailed` and `conflict` are passed through as-is.
   */
  async createOrUpdate(
    collection: DAVCollection,
    resource: DAVResource,
    data: string,
    expectedEtag?: string,
    options: WriteOptions = {}
  ): Promise<DAVResource> {
    const written = await this.client.createOrUpdate(resource, data, expectedEtag, options);
    this.updateSnapshot(collection, (etags) => {
      if (written.etag) etags.set(written.url, written.etag);
      else etags.delete(written.url);
    });
    return written;
  }

  async delete(
    collection: DAVCollection,
    resource: DAVResource,
    expectedEtag?: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.client.delete(resource, expectedEtag, signal);
    this.updateSnapshot(collection, (etags) => etags.delete(resource.url));
  }

  private updateSnapshot(
    collection: DAVCollection,
    change: (etags: Map<string, string>) => void
  ): void {
    const key = stateKey(collection.url);
    const snapshot = this.snapshots.get(key);
    if (!snapshot) return;

    const etags = new Map(snapshot.etags);
    change(etags);
    this.snapshots.set(key, { ...snapshot, etags });
  }
}
