/**
 * run-catalog — In-memory backend
 *
 * Holds registered runs by uid. A registration carries the run's start and
 * stop documents plus a loader for the rest of its documents, which is only
 * invoked on first data access and then cached.
 */

import type {
  CatalogBackend,
  Datum,
  DatumPage,
  Descriptor,
  Event,
  EventPage,
  ListRunsOptions,
  Query,
  Resource,
  Result,
  RunDocument,
  RunStart,
  RunStop,
} from '../types.js';
import { CatalogStreamError, fromThrown, notFound } from '../errors.js';
import { DEFAULT_PAGE_SIZE } from '../config.js';
import { matchesFilter } from '../query/filter.js';
import { packDatumPage, packEventPage, unpackDatumPage, unpackEventPage } from '../paging/page-codec.js';

/** A run as handed to the registry. */
export interface RunRegistration {
  readonly start: RunStart;
  readonly stop: RunStop | undefined;
  /** Where the run came from, e.g. a file path. */
  readonly source: string;
  /** Produce the run's full document stream. */
  readonly load: () => AsyncIterable<RunDocument>;
}

/** A run's documents, grouped for serving. */
export interface LoadedRun {
  readonly descriptors: readonly Descriptor[];
  readonly resources: readonly Resource[];
  readonly eventPages: ReadonlyMap<string, readonly EventPage[]>;
  readonly datumPages: ReadonlyMap<string, readonly DatumPage[]>;
  /** datum_id → resource uid */
  readonly datumResources: ReadonlyMap<string, string>;
}

interface Registered extends RunRegistration {
  loaded?: Promise<LoadedRun> | undefined;
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list === undefined) {
    map.set(key, [value]);
  } else {
    list.push(value);
  }
}

/** Cut a flat list into pages of `pageSize`, indexed from 0. */
function paginate<R, P>(
  records: readonly R[],
  pageSize: number,
  pack: (batch: readonly R[], firstIndex: number) => P,
): P[] {
  const pages: P[] = [];
  for (let i = 0; i < records.length; i += pageSize) {
    pages.push(pack(records.slice(i, i + pageSize), i));
  }
  return pages;
}

/** Mark external fields that carry no filled flag as unfilled. */
function withUnfilledExternals(event: Event, externalKeys: readonly string[]): Event {
  const missing = externalKeys.filter((key) => !(key in event.filled));
  if (missing.length === 0) return event;
  const filled: Record<string, boolean | string> = { ...event.filled };
  for (const key of missing) {
    filled[key] = false;
  }
  return { ...event, filled };
}

/** Group a run's document stream into descriptors, resources and pages. */
export async function groupDocuments(
  documents: AsyncIterable<RunDocument>,
  pageSize: number,
): Promise<LoadedRun> {
  const descriptors: Descriptor[] = [];
  const resources: Resource[] = [];
  const events = new Map<string, Event[]>();
  const datums = new Map<string, Datum[]>();

  for await (const doc of documents) {
    switch (doc[0]) {
      case 'descriptor':
        descriptors.push(doc[1]);
        break;
      case 'resource':
        resources.push(doc[1]);
        break;
      case 'event':
        pushTo(events, doc[1].descriptor, doc[1]);
        break;
      case 'event_page':
        for (const event of unpackEventPage(doc[1])) {
          pushTo(events, event.descriptor, event);
        }
        break;
      case 'datum':
        pushTo(datums, doc[1].resource, doc[1]);
        break;
      case 'datum_page':
        for (const datum of unpackDatumPage(doc[1])) {
          pushTo(datums, datum.resource, datum);
        }
        break;
      case 'start':
      case 'stop':
        break;
    }
  }

  descriptors.sort((a, b) => a.time - b.time);

  const eventPages = new Map<string, readonly EventPage[]>();
  for (const descriptor of descriptors) {
    const externalKeys = Object.entries(descriptor.data_keys)
      .filter(([, key]) => key.external !== undefined)
      .map(([name]) => name);
    const stream = (events.get(descriptor.uid) ?? []).map((e) => withUnfilledExternals(e, externalKeys));
    eventPages.set(descriptor.uid, paginate(stream, pageSize, packEventPage));
  }

  const datumPages = new Map<string, readonly DatumPage[]>();
  const datumResources = new Map<string, string>();
  for (const [resourceUid, stream] of datums) {
    datumPages.set(resourceUid, paginate(stream, pageSize, packDatumPage));
    for (const datum of stream) {
      datumResources.set(datum.datum_id, resourceUid);
    }
  }

  return { descriptors, resources, eventPages, datumPages, datumResources };
}

/** Newest first; equal times by uid, descending. */
function byTimeDescending(a: RunStart, b: RunStart): number {
  if (a.time !== b.time) return b.time - a.time;
  return a.uid < b.uid ? 1 : a.uid > b.uid ? -1 : 0;
}

/**
 * Registered runs, keyed by uid. Replacing a registration discards anything
 * loaded for the previous one.
 */
export class RunRegistry {
  private readonly runs = new Map<string, Registered>();

  constructor(private readonly pageSize: number = DEFAULT_PAGE_SIZE) {}

  upsert(registration: RunRegistration): void {
    this.runs.set(registration.start.uid, { ...registration });
  }

  remove(uid: string): boolean {
    return this.runs.delete(uid);
  }

  get size(): number {
    return this.runs.size;
  }

  get(uid: string): RunRegistration | undefined {
    return this.runs.get(uid);
  }

  /** Starts of every registered run, most recent first. */
  starts(): RunStart[] {
    return [...this.runs.values()].map((r) => r.start).sort(byTimeDescending);
  }

  /** Load (once) and return the documents of a run. */
  load(uid: string): Promise<LoadedRun> | undefined {
    const run = this.runs.get(uid);
    if (run === undefined) return undefined;
    if (run.loaded === undefined) {
      const loaded = groupDocuments(run.load(), this.pageSize);
      // A failed load is retried on the next access.
      void loaded.catch(() => {
        if (run.loaded === loaded) run.loaded = undefined;
      });
      run.loaded = loaded;
    }
    return run.loaded;
  }

  /**
   * Find the run for which `pick` returns a value. Runs already loaded are
   * searched first; the rest are then loaded in recency order until one
   * matches.
   */
  async find<T>(pick: (run: LoadedRun) => T | undefined): Promise<T | undefined> {
    const uids = this.starts().map((s) => s.uid);
    const loadedFirst = [
      ...uids.filter((uid) => this.runs.get(uid)?.loaded !== undefined),
      ...uids.filter((uid) => this.runs.get(uid)?.loaded === undefined),
    ];
    for (const uid of loadedFirst) {
      const loaded = this.load(uid);
      if (loaded === undefined) continue;
      const value = pick(await loaded);
      if (value !== undefined) return value;
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

async function attempt<T>(operation: string, fn: () => Promise<Result<T>>): Promise<Result<T>> {
  try {
    return await fn();
  } catch (err: unknown) {
    return { ok: false, error: fromThrown(operation, err) };
  }
}

/** Run a lookup inside a page stream, rethrowing failures as a CatalogStreamError. */
async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw new CatalogStreamError(fromThrown(operation, err));
  }
}

/** Pages intersecting `[skip, skip + limit)`, sorted by `first_index`. */
function* windowOf<P extends { first_index: number; last_index: number }>(
  pages: readonly P[],
  skip: number,
  limit: number | undefined,
): Generator<P, void, undefined> {
  const end = limit === undefined ? Number.POSITIVE_INFINITY : skip + limit;
  const sorted = [...pages].sort((a, b) => a.first_index - b.first_index);
  for (const page of sorted) {
    if (page.first_index >= end) return;
    if (page.last_index >= skip) yield page;
  }
}

/** Create a backend serving the runs of `registry`. */
export function createMemoryBackend(registry: RunRegistry): CatalogBackend {
  return {
    async *listRunStarts(query: Query, options?: ListRunsOptions): AsyncGenerator<RunStart, void, undefined> {
      const skip = options?.skip ?? 0;
      const limit = options?.limit ?? Number.POSITIVE_INFINITY;
      let seen = 0;
      let emitted = 0;
      for (const start of registry.starts()) {
        if (emitted >= limit) return;
        if (!matchesFilter(start, query)) continue;
        seen += 1;
        if (seen <= skip) continue;
        emitted += 1;
        yield start;
      }
    },

    async countRuns(query: Query): Promise<Result<number>> {
      return { ok: true, value: registry.starts().filter((s) => matchesFilter(s, query)).length };
    },

    async getRunStop(runUid: string): Promise<Result<RunStop | undefined>> {
      const run = registry.get(runUid);
      if (run === undefined) {
        return { ok: false, error: notFound('run', runUid) };
      }
      return { ok: true, value: run.stop };
    },

    getDescriptors(runUid: string): Promise<Result<readonly Descriptor[]>> {
      return attempt('getDescriptors', async () => {
        const run = await registry.load(runUid);
        if (run === undefined) return { ok: false, error: notFound('run', runUid) };
        return { ok: true, value: run.descriptors };
      });
    },

    getResources(runUid: string): Promise<Result<readonly Resource[]>> {
      return attempt('getResources', async () => {
        const run = await registry.load(runUid);
        if (run === undefined) return { ok: false, error: notFound('run', runUid) };
        return { ok: true, value: run.resources };
      });
    },

    async *getEventPages(
      descriptorUid: string,
      skip: number,
      limit: number | undefined,
    ): AsyncGenerator<EventPage, void, undefined> {
      const pages = await guard('getEventPages', () => registry.find((run) => run.eventPages.get(descriptorUid)));
      yield* windowOf(pages ?? [], skip, limit);
    },

    countEvents(descriptorUid: string): Promise<Result<number>> {
      return attempt('countEvents', async () => {
        const pages = await registry.find((run) => run.eventPages.get(descriptorUid));
        const total = (pages ?? []).reduce((sum, page) => sum + page.seq_num.length, 0);
        return { ok: true, value: total };
      });
    },

    getResource(resourceUid: string): Promise<Result<Resource>> {
      return attempt('getResource', async () => {
        const resource = await registry.find((run) => run.resources.find((r) => r.uid === resourceUid));
        if (resource === undefined) return { ok: false, error: notFound('resource', resourceUid) };
        return { ok: true, value: resource };
      });
    },

    lookupResourceForDatum(datumId: string): Promise<Result<string>> {
      return attempt('lookupResourceForDatum', async () => {
        const resourceUid = await registry.find((run) => run.datumResources.get(datumId));
        if (resourceUid === undefined) return { ok: false, error: notFound('datum', datumId) };
        return { ok: true, value: resourceUid };
      });
    },

    async *getDatumPages(
      resourceUid: string,
      skip: number,
      limit: number | undefined,
    ): AsyncGenerator<DatumPage, void, undefined> {
      const pages = await guard('getDatumPages', () => registry.find((run) => run.datumPages.get(resourceUid)));
      yield* windowOf(pages ?? [], skip, limit);
    },
  };
}
