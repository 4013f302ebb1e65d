/**
 * run-catalog — Document-store backend
 *
 * Serves runs from a RunDatabase. Run queries are evaluated over the
 * time-ordered start table; page streams walk the
 * `[descriptor+first_index]` / `[resource+first_index]` compound indexes in
 * fixed-size batches, resuming after the last page seen.
 */

import Dexie from 'dexie';
import type { Collection, DexieOptions, Table } from 'dexie';
import type {
  CatalogBackend,
  DatumPage,
  Descriptor,
  EntryIndex,
  EventPage,
  ListRunsOptions,
  Query,
  Resource,
  Result,
  RunStart,
  RunStop,
} from '../types.js';
import { CatalogStreamError, fromThrown, misconfigured, notFound } from '../errors.js';
import type { CatalogConfig } from '../config.js';
import { DEFAULT_FETCH_BATCH_SIZE, resolveConfig } from '../config.js';
import type { RunDatabase, StoredDatumPage, StoredEventPage } from '../storage/database.js';
import { createDatabase, toDatumPage, toEventPage } from '../storage/database.js';
import { matchesFilter } from '../query/filter.js';
import { createEntryIndex } from '../entries/entry-index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Run `fn`, converting a thrown error into a DATABASE_ERROR result. */
async function attempt<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err: unknown) {
    return { ok: false, error: fromThrown(operation, err) };
  }
}

/** Run `fn`, rethrowing failures as a CatalogStreamError. */
async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw new CatalogStreamError(fromThrown(operation, err));
  }
}

type PageTable<P> = Table<P, number>;

/**
 * Walk the pages of one stream whose index range intersects
 * `[skip, skip + limit)`, ascending by `first_index`.
 */
async function* walkPages<P extends { first_index: number; last_index: number }>(
  operation: string,
  table: PageTable<P>,
  compoundIndex: string,
  streamUid: string,
  skip: number,
  limit: number | undefined,
  batchSize: number,
): AsyncGenerator<P, void, undefined> {
  const end = limit === undefined ? Number.POSITIVE_INFINITY : skip + limit;
  let after: number = Number.NEGATIVE_INFINITY;
  let includeLower = true;

  for (;;) {
    const lower = after;
    const rows = await guard(operation, () =>
      table
        .where(compoundIndex)
        .between([streamUid, lower], [streamUid, end], includeLower, false)
        .filter((page) => page.last_index >= skip)
        .limit(batchSize)
        .toArray(),
    );

    for (const row of rows) {
      yield row;
    }

    const last = rows[rows.length - 1];
    if (last === undefined || rows.length < batchSize) {
      return;
    }
    after = last.first_index;
    includeLower = false;
  }
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

/** Options for the document-store backend. */
export interface DocumentStoreBackendOptions {
  /** Pages or run starts fetched per round trip. Default: 16. */
  readonly fetchBatchSize?: number | undefined;
}

/** Create a backend reading from `db`. */
export function createDocumentStoreBackend(
  db: RunDatabase,
  options?: DocumentStoreBackendOptions,
): CatalogBackend {
  const batchSize = options?.fetchBatchSize ?? DEFAULT_FETCH_BATCH_SIZE;

  function matchingStarts(query: Query): Collection<RunStart, string> {
    return db.runStarts
      .orderBy('time')
      .reverse()
      .filter((doc) => matchesFilter(doc, query));
  }

  return {
    async *listRunStarts(query: Query, listOptions?: ListRunsOptions): AsyncGenerator<RunStart, void, undefined> {
      let offset = listOptions?.skip ?? 0;
      let remaining = listOptions?.limit ?? Number.POSITIVE_INFINITY;

      while (remaining > 0) {
        const size = Math.min(batchSize, remaining);
        const start = offset;
        const rows = await guard('listRunStarts', () =>
          matchingStarts(query).offset(start).limit(size).toArray(),
        );
        for (const row of rows) {
          yield row;
        }
        if (rows.length < size) {
          return;
        }
        offset += rows.length;
        remaining -= rows.length;
      }
    },

    countRuns(query: Query): Promise<Result<number>> {
      return attempt('countRuns', () => db.runStarts.filter((doc) => matchesFilter(doc, query)).count());
    },

    getRunStop(runUid: string): Promise<Result<RunStop | undefined>> {
      return attempt('getRunStop', () => db.runStops.where('run_start').equals(runUid).first());
    },

    getDescriptors(runUid: string): Promise<Result<readonly Descriptor[]>> {
      return attempt('getDescriptors', () =>
        db.descriptors
          .where('[run_start+time]')
          .between([runUid, Dexie.minKey], [runUid, Dexie.maxKey])
          .toArray(),
      );
    },

    getResources(runUid: string): Promise<Result<readonly Resource[]>> {
      return attempt('getResources', () => db.resources.where('run_start').equals(runUid).toArray());
    },

    async *getEventPages(
      descriptorUid: string,
      skip: number,
      limit: number | undefined,
    ): AsyncGenerator<EventPage, void, undefined> {
      const pages = walkPages<StoredEventPage>(
        'getEventPages', db.eventPages, '[descriptor+first_index]', descriptorUid, skip, limit, batchSize,
      );
      for await (const page of pages) {
        yield toEventPage(page);
      }
    },

    async countEvents(descriptorUid: string): Promise<Result<number>> {
      return attempt('countEvents', async () => {
        const last = await db.eventPages
          .where('[descriptor+first_index]')
          .between([descriptorUid, Dexie.minKey], [descriptorUid, Dexie.maxKey])
          .last();
        return last === undefined ? 0 : last.last_index + 1;
      });
    },

    async getResource(resourceUid: string): Promise<Result<Resource>> {
      const found = await attempt('getResource', () => db.resources.get(resourceUid));
      if (!found.ok) return found;
      if (found.value === undefined) {
        return { ok: false, error: notFound('resource', resourceUid) };
      }
      return { ok: true, value: found.value };
    },

    async lookupResourceForDatum(datumId: string): Promise<Result<string>> {
      const found = await attempt('lookupResourceForDatum', () =>
        db.datumPages.where('datum_id').equals(datumId).first(),
      );
      if (!found.ok) return found;
      if (found.value === undefined) {
        return { ok: false, error: notFound('datum', datumId) };
      }
      return { ok: true, value: found.value.resource };
    },

    async *getDatumPages(
      resourceUid: string,
      skip: number,
      limit: number | undefined,
    ): AsyncGenerator<DatumPage, void, undefined> {
      const pages = walkPages<StoredDatumPage>(
        'getDatumPages', db.datumPages, '[resource+first_index]', resourceUid, skip, limit, batchSize,
      );
      for await (const page of pages) {
        yield toDatumPage(page);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Catalog factory
// ---------------------------------------------------------------------------

/** Configuration for a document-store catalog. */
export interface DocumentStoreConfig extends CatalogConfig {
  /** An open database. Takes precedence over `databaseName`. */
  readonly database?: RunDatabase | undefined;
  /** Name of the IndexedDB database to open. */
  readonly databaseName?: string | undefined;
  /** Passed to Dexie, e.g. to supply an `indexedDB` implementation outside the browser. */
  readonly dexieOptions?: DexieOptions | undefined;
}

/** A catalog over a document store. */
export interface DocumentStoreCatalog extends EntryIndex {
  readonly database: RunDatabase;
  /** Close the database if this catalog opened it. */
  close(): void;
}

/**
 * Create a catalog backed by a document store.
 *
 * Fails with MISCONFIGURED when neither a database nor a database name is
 * given.
 */
export function createDocumentStoreCatalog(config: DocumentStoreConfig): Result<DocumentStoreCatalog> {
  const resolved = resolveConfig(config);
  if (!resolved.ok) return resolved;

  let database = config.database;
  const owned = database === undefined;
  if (database === undefined) {
    const name = config.databaseName?.trim() ?? '';
    if (name === '') {
      return {
        ok: false,
        error: misconfigured('databaseName', 'a database or a database name is required'),
      };
    }
    database = createDatabase(name, config.dexieOptions);
  }

  const db = database;
  const backend = createDocumentStoreBackend(db, { fetchBatchSize: resolved.value.fetchBatchSize });
  const index = createEntryIndex(backend, resolved.value);
  resolved.value.logger.debug(`Opened document-store catalog on ${db.name}`);

  return {
    ok: true,
    value: Object.assign(index, {
      database: db,
      close(): void {
        if (owned) db.close();
      },
    }),
  };
}
