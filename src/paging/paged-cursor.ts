/**
 * run-catalog — Paged cursor
 *
 * Presents one page-backed logical stream (one descriptor's events, or one
 * resource's datums) as a flat sequence that can be sliced by global index.
 */

import type {
  CatalogBackend,
  Datum,
  DatumPage,
  Event,
  EventPage,
  StreamWindow,
} from '../types.js';
import { CatalogStreamError, invalidArgument, malformedRecord } from '../errors.js';
import { unpackDatumPage, unpackEventPage } from './page-codec.js';

/** The index range a stored page declares. */
export interface PageBounds {
  readonly first_index: number;
  readonly last_index: number;
}

/** Everything the cursor needs to read one stream. */
export interface PagedReadOptions<P extends PageBounds, R> {
  /** Label used in error messages, e.g. the descriptor uid. */
  readonly stream: string;
  /** Pages intersecting `[skip, skip + limit)`, ascending by `first_index`. */
  readonly fetchPages: (skip: number, limit: number | undefined) => AsyncIterable<P>;
  readonly unpack: (page: P) => Iterable<R>;
  readonly skip?: number | undefined;
  readonly limit?: number | undefined;
}

function checkWindowField(field: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new CatalogStreamError(invalidArgument(field, 'must be a non-negative integer'));
  }
}

/**
 * Yield the records with global index in `[skip, skip + limit)`.
 *
 * The global index of a record is the running count of records in all
 * earlier pages plus its position within its page. The count starts at the
 * first fetched page's `first_index` and each later page must begin exactly
 * where the previous one ended.
 */
export async function* readPaged<P extends PageBounds, R>(
  options: PagedReadOptions<P, R>,
): AsyncGenerator<R, void, undefined> {
  const skip = options.skip ?? 0;
  const limit = options.limit;
  checkWindowField('skip', skip);
  checkWindowField('limit', limit);

  if (limit === 0) {
    return;
  }
  const end = limit === undefined ? Number.POSITIVE_INFINITY : skip + limit;

  let offset: number | undefined;
  for await (const page of options.fetchPages(skip, limit)) {
    if (offset === undefined) {
      if (page.first_index > skip) {
        throw new CatalogStreamError(
          malformedRecord(
            options.stream,
            `first page starts at index ${String(page.first_index)}, after requested index ${String(skip)}`,
          ),
        );
      }
      offset = page.first_index;
    } else if (page.first_index !== offset) {
      throw new CatalogStreamError(
        malformedRecord(
          options.stream,
          `page starting at index ${String(page.first_index)} does not continue from index ${String(offset)}`,
        ),
      );
    }

    for (const record of options.unpack(page)) {
      const globalIndex = offset;
      offset += 1;
      if (globalIndex < skip) continue;
      if (globalIndex >= end) return;
      yield record;
    }

    if (offset !== page.last_index + 1) {
      throw new CatalogStreamError(
        malformedRecord(
          options.stream,
          `page declares indexes ${String(page.first_index)}-${String(page.last_index)} ` +
            `but holds ${String(offset - page.first_index)} records`,
        ),
      );
    }
    if (offset >= end) return;
  }
}

/** Read a descriptor's events through a backend. */
export function readEvents(
  backend: CatalogBackend,
  descriptorUid: string,
  window: StreamWindow = {},
): AsyncGenerator<Event, void, undefined> {
  return readPaged<EventPage, Event>({
    stream: descriptorUid,
    fetchPages: (skip, limit) => backend.getEventPages(descriptorUid, skip, limit),
    unpack: unpackEventPage,
    skip: window.skip,
    limit: window.limit,
  });
}

/** Read a resource's datums through a backend. */
export function readDatums(
  backend: CatalogBackend,
  resourceUid: string,
  window: StreamWindow = {},
): AsyncGenerator<Datum, void, undefined> {
  return readPaged<DatumPage, Datum>({
    stream: resourceUid,
    fetchPages: (skip, limit) => backend.getDatumPages(resourceUid, skip, limit),
    unpack: unpackDatumPage,
    skip: window.skip,
    limit: window.limit,
  });
}
