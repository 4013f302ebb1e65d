/**
 * run-catalog — Core type definitions
 *
 * Documents of an acquisition run, the storage backend contract, and the
 * public catalog API.
 */

import type { CatalogError } from './errors.js';

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** Kinds of document that appear in a run's document stream. */
export type DocumentKind =
  | 'start'
  | 'descriptor'
  | 'event'
  | 'event_page'
  | 'resource'
  | 'datum'
  | 'datum_page'
  | 'stop';

/** Creation metadata for a run. */
export interface RunStart {
  readonly uid: string;
  /** Epoch seconds. */
  readonly time: number;
  /** Domain-assigned run number. Not unique over time. */
  readonly scan_id?: number | undefined;
  readonly [field: string]: unknown;
}

/** Finalization metadata for a run. */
export interface RunStop {
  readonly uid: string;
  readonly run_start: string;
  readonly time: number;
  readonly exit_status?: string | undefined;
  readonly [field: string]: unknown;
}

/** Schema entry for one field of a descriptor. */
export interface DataKey {
  readonly source?: string | undefined;
  readonly dtype?: string | undefined;
  readonly shape?: readonly number[] | undefined;
  /** Present when the value lives in an external asset and must be resolved through a datum. */
  readonly external?: string | undefined;
  readonly [field: string]: unknown;
}

/** Schema declaration for one stream of events within a run. */
export interface Descriptor {
  readonly uid: string;
  readonly run_start: string;
  readonly time: number;
  readonly name?: string | undefined;
  readonly data_keys: Readonly<Record<string, DataKey>>;
  readonly [field: string]: unknown;
}

/** A single time-sample. */
export interface Event {
  readonly uid: string;
  readonly descriptor: string;
  readonly seq_num: number;
  readonly time: number;
  readonly data: Readonly<Record<string, unknown>>;
  readonly timestamps: Readonly<Record<string, number>>;
  /** `false` (or a datum id) marks a value that is still a datum reference. */
  readonly filled: Readonly<Record<string, boolean | string>>;
}

/**
 * A columnar batch of consecutive events for one descriptor.
 *
 * `first_index` and `last_index` are 0-based and inclusive positions in the
 * descriptor's event stream.
 */
export interface EventPage {
  readonly descriptor: string;
  readonly uid: readonly string[];
  readonly seq_num: readonly number[];
  readonly time: readonly number[];
  readonly data: Readonly<Record<string, readonly unknown[]>>;
  /** A field absent from some events leaves `undefined` at their positions. */
  readonly timestamps: Readonly<Record<string, readonly (number | undefined)[]>>;
  readonly filled: Readonly<Record<string, readonly (boolean | string | undefined)[]>>;
  readonly first_index: number;
  readonly last_index: number;
}

/** An external asset referenced by a run. */
export interface Resource {
  readonly uid: string;
  readonly run_start?: string | undefined;
  /** Asset format; selects the handler. */
  readonly spec: string;
  readonly root?: string | undefined;
  readonly resource_path: string;
  readonly resource_kwargs: Readonly<Record<string, unknown>>;
  readonly [field: string]: unknown;
}

/** A reference to one value inside a resource. */
export interface Datum {
  readonly datum_id: string;
  readonly resource: string;
  readonly datum_kwargs: Readonly<Record<string, unknown>>;
}

/** A columnar batch of consecutive datums for one resource. */
export interface DatumPage {
  readonly resource: string;
  readonly datum_id: readonly string[];
  readonly datum_kwargs: Readonly<Record<string, readonly unknown[]>>;
  readonly first_index: number;
  readonly last_index: number;
}

/** Maps each document kind to its body type. */
export interface DocumentBodies {
  readonly start: RunStart;
  readonly descriptor: Descriptor;
  readonly event: Event;
  readonly event_page: EventPage;
  readonly resource: Resource;
  readonly datum: Datum;
  readonly datum_page: DatumPage;
  readonly stop: RunStop;
}

/** A `[kind, body]` pair as it appears in a run's document stream. */
export type RunDocument = {
  readonly [K in DocumentKind]: readonly [K, DocumentBodies[K]];
}[DocumentKind];

// ---------------------------------------------------------------------------
// Queries and keys
// ---------------------------------------------------------------------------

/**
 * Mongo-style filter evaluated against a run's start document.
 * The empty object matches every run.
 */
export type Query = Readonly<Record<string, unknown>>;

/**
 * Lookup key for a run: a uid or uid prefix, a negative recency offset
 * (`-1` is the most recent run), or a non-negative scan id.
 */
export type RunKey = string | number;

/** A slice of a logical stream. `limit` undefined means unbounded. */
export interface StreamWindow {
  readonly skip?: number | undefined;
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** A discriminated union for fallible operations. */
export type Result<T, E = CatalogError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// ---------------------------------------------------------------------------
// Backend contract
// ---------------------------------------------------------------------------

/** Options for enumerating run starts. */
export interface ListRunsOptions {
  readonly skip?: number | undefined;
  readonly limit?: number | undefined;
}

/**
 * What the catalog requires from a storage backend.
 *
 * Lookups return `Result`s. Page sequences surface failures by throwing a
 * `CatalogStreamError` when iterated, and must release any storage handle
 * when iteration is abandoned.
 */
export interface CatalogBackend {
  /** Run starts matching `query`, ordered by time descending. */
  listRunStarts(query: Query, options?: ListRunsOptions): AsyncIterable<RunStart>;
  countRuns(query: Query): Promise<Result<number>>;
  getRunStop(runUid: string): Promise<Result<RunStop | undefined>>;
  /** Descriptors of a run, ordered by time ascending. */
  getDescriptors(runUid: string): Promise<Result<readonly Descriptor[]>>;
  getResources(runUid: string): Promise<Result<readonly Resource[]>>;
  /**
   * Event pages whose `[first_index, last_index]` intersects
   * `[skip, skip + limit)`, ascending by `first_index`.
   */
  getEventPages(descriptorUid: string, skip: number, limit: number | undefined): AsyncIterable<EventPage>;
  countEvents(descriptorUid: string): Promise<Result<number>>;
  getResource(resourceUid: string): Promise<Result<Resource>>;
  lookupResourceForDatum(datumId: string): Promise<Result<string>>;
  /** Datum pages intersecting the window, ascending by `first_index`. */
  getDatumPages(resourceUid: string, skip: number, limit: number | undefined): AsyncIterable<DatumPage>;
}

// ---------------------------------------------------------------------------
// Public catalog API
// ---------------------------------------------------------------------------

/** Options for reading events across a run's descriptors. */
export interface EventStreamOptions extends StreamWindow {
  /** Descriptor uids to read. Defaults to every descriptor of the run. */
  readonly descriptors?: readonly string[] | undefined;
}

/** Options for reading events rebatched into pages. */
export interface EventPageOptions {
  readonly descriptors?: readonly string[] | undefined;
  readonly pageSize?: number | undefined;
}

/** A handler reference parsed from the handler registry. */
export interface HandlerSpec {
  /** Asset format this handler serves. */
  readonly spec: string;
  readonly module: string;
  readonly exportName: string;
}

/** One run, with access to its descriptors, events, resources and datums. */
export interface RunEntry {
  readonly uid: string;
  readonly start: RunStart;
  /** Undefined while the run is in progress. */
  readonly stop: RunStop | undefined;

  getDescriptors(): Promise<Result<readonly Descriptor[]>>;
  getResources(): Promise<Result<readonly Resource[]>>;

  /** Events merged across descriptors in ascending time order. */
  events(options?: EventStreamOptions): AsyncGenerator<Event, void, undefined>;
  /** Merged events rebatched into pages of at most `pageSize`. */
  eventPages(options?: EventPageOptions): AsyncGenerator<EventPage, void, undefined>;
  getEventCount(descriptors?: readonly string[]): Promise<Result<number>>;

  getResource(resourceUid: string): Promise<Result<Resource>>;
  lookupResourceForDatum(datumId: string): Promise<Result<string>>;
  datums(resourceUid: string, window?: StreamWindow): AsyncGenerator<Datum, void, undefined>;
  datumPages(resourceUid: string, options?: { readonly pageSize?: number | undefined }): AsyncGenerator<DatumPage, void, undefined>;

  /** The run as a canonical document stream, start first and stop last. */
  documents(): AsyncGenerator<RunDocument, void, undefined>;
  resolveHandler(resourceUid: string): Promise<Result<HandlerSpec>>;
}

/** Read-only ordered map of runs under a query scope. */
export interface EntryIndex {
  readonly query: Query;

  /** Uids of matching runs, most recent first. */
  keys(): AsyncGenerator<string, void, undefined>;
  values(): AsyncGenerator<RunEntry, void, undefined>;
  items(): AsyncGenerator<readonly [string, RunEntry], void, undefined>;

  get(key: RunKey): Promise<Result<RunEntry>>;
  contains(key: RunKey): Promise<Result<boolean>>;
  length(): Promise<Result<number>>;

  /** A new index scoped to the AND of this index's query and `query`. */
  search(query: Query): EntryIndex;
}

// ---------------------------------------------------------------------------
// Loader reports
// ---------------------------------------------------------------------------

/** A file that could not be registered during a scan. */
export interface ScanError {
  readonly path: string;
  readonly error: CatalogError;
}

/** Outcome of one incremental scan. */
export interface ScanReport {
  /** Files (re)registered in this scan. */
  readonly registered: readonly string[];
  /** Files skipped because their modification time did not change. */
  readonly unchanged: readonly string[];
  /** Files skipped because they look like they are still being written. */
  readonly pending: readonly string[];
  readonly errors: readonly ScanError[];
}

/** A catalog backed by JSONL files that can be re-scanned. */
export interface JsonlCatalog extends EntryIndex {
  /** Outcome of the scan run when the catalog was created. */
  readonly initialScan: ScanReport;
  reload(): Promise<Result<ScanReport>>;
}

export type { CatalogError, CatalogErrorCode } from './errors.js';
