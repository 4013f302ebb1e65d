/**
 * run-catalog
 *
 * Indexes data-acquisition runs stored as JSONL run logs or as paged
 * documents in IndexedDB, with run lookup, query scoping, and time-ordered
 * event streaming across pages and descriptors.
 *
 * @packageDocumentation
 */

// Types
export type {
  DocumentKind,
  RunStart,
  RunStop,
  DataKey,
  Descriptor,
  Event,
  EventPage,
  Resource,
  Datum,
  DatumPage,
  DocumentBodies,
  RunDocument,
  Query,
  RunKey,
  StreamWindow,
  Result,
  ListRunsOptions,
  CatalogBackend,
  EventStreamOptions,
  EventPageOptions,
  HandlerSpec,
  RunEntry,
  EntryIndex,
  ScanError,
  ScanReport,
  JsonlCatalog,
} from './types.js';

// Errors
export type { CatalogError, CatalogErrorCode, NotFoundKind } from './errors.js';
export {
  notFound,
  ambiguousKey,
  indexOutOfRange,
  malformedRecord,
  misconfigured,
  invalidArgument,
  databaseError,
  formatError,
  CatalogStreamError,
} from './errors.js';

// Configuration
export type { CatalogConfig, ResolvedConfig } from './config.js';
export {
  DEFAULT_PAGE_SIZE,
  DEFAULT_PREFIX_MATCH_CAP,
  DEFAULT_FETCH_BATCH_SIZE,
  parseHandlerRegistry,
  resolveConfig,
} from './config.js';

// Logging
export type { Logger } from './utils/logger.js';
export { consoleLogger, noopLogger } from './utils/logger.js';

// Queries
export { matchesFilter, andQueries, isEmptyQuery, escapeRegex } from './query/filter.js';

// Pages and streams
export type { PackFn } from './paging/page-codec.js';
export {
  unpackEventPage,
  unpackDatumPage,
  packEventPage,
  packDatumPage,
  sliceEventPage,
  repack,
  toEventPages,
  toDatumPages,
} from './paging/page-codec.js';
export type { PageBounds, PagedReadOptions } from './paging/paged-cursor.js';
export { readPaged, readEvents, readDatums } from './paging/paged-cursor.js';
export type { Source } from './merge/stream-merger.js';
export { mergeByTime, sliceStream, interlaceEventPages, eventTime, pageTime } from './merge/stream-merger.js';

// Catalogs
export { createEntryIndex, parseRunKey } from './entries/entry-index.js';
export { createRunEntry } from './entries/run-entry.js';
export type { JsonlCatalogConfig } from './backends/jsonl.js';
export { createJsonlCatalog } from './backends/jsonl.js';
export type {
  DocumentStoreBackendOptions,
  DocumentStoreConfig,
  DocumentStoreCatalog,
} from './backends/document-store.js';
export { createDocumentStoreBackend, createDocumentStoreCatalog } from './backends/document-store.js';
export type { RunRegistration } from './backends/memory-backend.js';
export { RunRegistry, createMemoryBackend } from './backends/memory-backend.js';
export { RunDatabase, createDatabase } from './storage/database.js';

// Run logs
export type { LogFileSystem, LogLine } from './loader/log-files.js';
export { nodeLogFileSystem } from './loader/log-files.js';
export type { IncrementalLoader, IncrementalLoaderOptions } from './loader/incremental-loader.js';
export { createIncrementalLoader } from './loader/incremental-loader.js';
export { parseDocumentLine } from './loader/document-line.js';
