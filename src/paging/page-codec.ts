/**
 * run-catalog — Page codec
 *
 * Converts between columnar pages and flat record sequences, in both
 * directions: unpacking stored pages into records, and rebatching a record
 * stream into pages of a requested size.
 */

import type { Datum, DatumPage, Event, EventPage } from '../types.js';
import { CatalogStreamError, invalidArgument, malformedRecord } from '../errors.js';

// ---------------------------------------------------------------------------
// Column checks
// ---------------------------------------------------------------------------

/** Throw unless every column has `length` entries. */
function assertColumns(
  source: string,
  length: number,
  columns: Readonly<Record<string, readonly unknown[]>>,
): void {
  for (const [name, column] of Object.entries(columns)) {
    if (column.length !== length) {
      throw new CatalogStreamError(
        malformedRecord(
          source,
          `column "${name}" has ${String(column.length)} entries, expected ${String(length)}`,
        ),
      );
    }
  }
}

/** Pick entry `index` of every column, leaving out gaps. */
function row<T>(columns: Readonly<Record<string, readonly (T | undefined)[]>>, index: number): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [name, column] of Object.entries(columns)) {
    const value = column[index];
    if (value !== undefined) {
      out[name] = value;
    }
  }
  return out;
}

/**
 * Transpose records into columns keyed by field name. A field missing from
 * some records leaves `undefined` in those positions.
 */
function columnsOf<T>(rows: readonly Readonly<Record<string, T>>[]): Record<string, (T | undefined)[]> {
  const columns: Record<string, (T | undefined)[]> = {};
  rows.forEach((r, index) => {
    for (const [name, value] of Object.entries(r)) {
      let column = columns[name];
      if (column === undefined) {
        column = new Array<T | undefined>(rows.length).fill(undefined);
        columns[name] = column;
      }
      column[index] = value;
    }
  });
  return columns;
}

// ---------------------------------------------------------------------------
// Unpacking
// ---------------------------------------------------------------------------

/** Number of records in an event page. */
export function eventPageLength(page: EventPage): number {
  return page.seq_num.length;
}

/** Number of records in a datum page. */
export function datumPageLength(page: DatumPage): number {
  return page.datum_id.length;
}

/**
 * Yield the events of a page one column index at a time, in column order.
 */
export function* unpackEventPage(page: EventPage): Generator<Event, void, undefined> {
  const length = eventPageLength(page);
  const source = `event page ${page.descriptor}[${String(page.first_index)}]`;
  assertColumns(source, length, { uid: page.uid, time: page.time });
  assertColumns(source, length, page.data);
  assertColumns(source, length, page.timestamps);
  assertColumns(source, length, page.filled);

  for (let i = 0; i < length; i++) {
    yield {
      uid: page.uid[i] ?? '',
      descriptor: page.descriptor,
      seq_num: page.seq_num[i] ?? 0,
      time: page.time[i] ?? 0,
      data: row(page.data, i),
      timestamps: row(page.timestamps, i),
      filled: row(page.filled, i),
    };
  }
}

/** Yield the datums of a page in column order. */
export function* unpackDatumPage(page: DatumPage): Generator<Datum, void, undefined> {
  const length = datumPageLength(page);
  assertColumns(`datum page ${page.resource}[${String(page.first_index)}]`, length, page.datum_kwargs);

  for (let i = 0; i < length; i++) {
    yield {
      datum_id: page.datum_id[i] ?? '',
      resource: page.resource,
      datum_kwargs: row(page.datum_kwargs, i),
    };
  }
}

// ---------------------------------------------------------------------------
// Packing
// ---------------------------------------------------------------------------

/**
 * Build one event page from a non-empty batch of events of one descriptor.
 * The page covers indexes `firstIndex` to `firstIndex + events.length - 1`.
 */
export function packEventPage(events: readonly Event[], firstIndex: number): EventPage {
  const head = events[0];
  if (head === undefined) {
    throw new CatalogStreamError(invalidArgument('events', 'cannot pack an empty batch'));
  }
  return {
    descriptor: head.descriptor,
    uid: events.map((e) => e.uid),
    seq_num: events.map((e) => e.seq_num),
    time: events.map((e) => e.time),
    data: columnsOf(events.map((e) => e.data)),
    timestamps: columnsOf(events.map((e) => e.timestamps)),
    filled: columnsOf(events.map((e) => e.filled)),
    first_index: firstIndex,
    last_index: firstIndex + events.length - 1,
  };
}

/** Build one datum page from a non-empty batch of datums of one resource. */
export function packDatumPage(datums: readonly Datum[], firstIndex: number): DatumPage {
  const head = datums[0];
  if (head === undefined) {
    throw new CatalogStreamError(invalidArgument('datums', 'cannot pack an empty batch'));
  }
  return {
    resource: head.resource,
    datum_id: datums.map((d) => d.datum_id),
    datum_kwargs: columnsOf(datums.map((d) => d.datum_kwargs)),
    first_index: firstIndex,
    last_index: firstIndex + datums.length - 1,
  };
}

function sliceColumns<T>(
  columns: Readonly<Record<string, readonly T[]>>,
  start: number,
  end: number,
): Record<string, T[]> {
  const out: Record<string, T[]> = {};
  for (const [name, column] of Object.entries(columns)) {
    out[name] = column.slice(start, end);
  }
  return out;
}

/**
 * Cut records `[start, end)` out of an event page. The result keeps its
 * position in the descriptor's stream.
 */
export function sliceEventPage(page: EventPage, start: number, end: number): EventPage {
  const count = Math.max(0, Math.min(end, eventPageLength(page)) - start);
  return {
    descriptor: page.descriptor,
    uid: page.uid.slice(start, end),
    seq_num: page.seq_num.slice(start, end),
    time: page.time.slice(start, end),
    data: sliceColumns(page.data, start, end),
    timestamps: sliceColumns(page.timestamps, start, end),
    filled: sliceColumns(page.filled, start, end),
    first_index: page.first_index + start,
    last_index: page.first_index + start + count - 1,
  };
}

// ---------------------------------------------------------------------------
// Rebatching
// ---------------------------------------------------------------------------

/** Builds a page from a buffered batch starting at `firstIndex`. */
export type PackFn<R, P> = (batch: readonly R[], firstIndex: number) => P;

/**
 * Buffer records into pages of at most `pageSize`.
 *
 * A page is emitted when the buffer is full, when the input ends, or, if
 * `groupKey` is given, when the next record belongs to a different group.
 * Records are never reordered: callers that need global order merge first.
 * Page bounds count positions within each group, so every group's pages are
 * contiguous in its own index space.
 */
export async function* repack<R, P>(
  records: AsyncIterable<R> | Iterable<R>,
  pageSize: number,
  pack: PackFn<R, P>,
  groupKey?: (record: R) => string,
): AsyncGenerator<P, void, undefined> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new CatalogStreamError(invalidArgument('pageSize', 'must be a positive integer'));
  }

  let buffer: R[] = [];
  let bufferKey = '';
  const emitted = new Map<string, number>();

  function flush(): P {
    const first = emitted.get(bufferKey) ?? 0;
    emitted.set(bufferKey, first + buffer.length);
    const page = pack(buffer, first);
    buffer = [];
    return page;
  }

  for await (const record of records) {
    const key = groupKey?.(record) ?? '';
    if (buffer.length > 0 && key !== bufferKey) {
      yield flush();
    }
    bufferKey = key;
    buffer.push(record);
    if (buffer.length === pageSize) {
      yield flush();
    }
  }

  if (buffer.length > 0) {
    yield flush();
  }
}

/** Rebatch events into pages, starting a new page whenever the descriptor changes. */
export function toEventPages(
  events: AsyncIterable<Event> | Iterable<Event>,
  pageSize: number,
): AsyncGenerator<EventPage, void, undefined> {
  return repack(events, pageSize, packEventPage, (e) => e.descriptor);
}

/** Rebatch datums into pages, starting a new page whenever the resource changes. */
export function toDatumPages(
  datums: AsyncIterable<Datum> | Iterable<Datum>,
  pageSize: number,
): AsyncGenerator<DatumPage, void, undefined> {
  return repack(datums, pageSize, packDatumPage, (d) => d.resource);
}
