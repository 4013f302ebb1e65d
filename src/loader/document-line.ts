/**
 * run-catalog — Document lines
 *
 * Parses one line of a run log, a JSON `[kind, document]` pair, into a typed
 * run document. Only the fields the catalog reads are checked; everything
 * else passes through untouched.
 */

import type {
  Datum,
  DatumPage,
  Descriptor,
  DocumentKind,
  Event,
  EventPage,
  Resource,
  Result,
  RunDocument,
  RunStart,
  RunStop,
} from '../types.js';

const DOCUMENT_KINDS: ReadonlySet<string> = new Set<string>([
  'start',
  'descriptor',
  'event',
  'event_page',
  'resource',
  'datum',
  'datum_page',
  'stop',
]);

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isFilledFlag(value: unknown): value is boolean | string {
  return typeof value === 'boolean' || typeof value === 'string';
}

function isAnything(_value: unknown): _value is unknown {
  return true;
}

export function isDocumentKind(value: unknown): value is DocumentKind {
  return typeof value === 'string' && DOCUMENT_KINDS.has(value);
}

function isRunStart(o: Record<string, unknown>): o is RunStart {
  return isString(o['uid']) && isNumber(o['time']) && (o['scan_id'] === undefined || isNumber(o['scan_id']));
}

function isRunStop(o: Record<string, unknown>): o is RunStop {
  return isString(o['uid']) && isString(o['run_start']) && isNumber(o['time']);
}

function isDescriptor(o: Record<string, unknown>): o is Descriptor {
  const dataKeys = o['data_keys'];
  return (
    isString(o['uid']) &&
    isString(o['run_start']) &&
    isNumber(o['time']) &&
    isRecord(dataKeys) &&
    Object.values(dataKeys).every(isRecord)
  );
}

function isResource(o: Record<string, unknown>): o is Resource {
  return (
    isString(o['uid']) &&
    isString(o['spec']) &&
    isString(o['resource_path']) &&
    isRecord(o['resource_kwargs'])
  );
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/** A map whose values all pass `isItem`; a missing map reads as empty. */
function readMap<T>(value: unknown, isItem: (v: unknown) => v is T): Record<string, T> | undefined {
  if (value === undefined) return {};
  if (!isRecord(value)) return undefined;
  const out: Record<string, T> = {};
  for (const [key, item] of Object.entries(value)) {
    if (!isItem(item)) return undefined;
    out[key] = item;
  }
  return out;
}

function readColumn<T>(value: unknown, isItem: (v: unknown) => v is T): T[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items: readonly unknown[] = value;
  const out: T[] = [];
  for (const item of items) {
    if (!isItem(item)) return undefined;
    out.push(item);
  }
  return out;
}

/** Columns keyed by field. `null` entries become gaps; a missing map reads as empty. */
function readColumns<T>(
  value: unknown,
  isItem: (v: unknown) => v is T,
): Record<string, (T | undefined)[]> | undefined {
  if (value === undefined) return {};
  if (!isRecord(value)) return undefined;
  const out: Record<string, (T | undefined)[]> = {};
  for (const [key, column] of Object.entries(value)) {
    const read = readColumn(column, (v): v is T | null => v === null || isItem(v));
    if (read === undefined) return undefined;
    out[key] = read.map((v) => (v === null ? undefined : v));
  }
  return out;
}

/** Column maps without gaps, used for data and kwargs. */
function readDenseColumns(value: unknown): Record<string, unknown[]> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, unknown[]> = {};
  for (const [key, column] of Object.entries(value)) {
    const read = readColumn(column, isAnything);
    if (read === undefined) return undefined;
    out[key] = read;
  }
  return out;
}

/** Page bounds, defaulting to a page that starts the stream. */
function readBounds(o: Record<string, unknown>, length: number): { first_index: number; last_index: number } | undefined {
  const first = o['first_index'] ?? 0;
  if (!isNumber(first) || !Number.isInteger(first) || first < 0) return undefined;
  const last = o['last_index'] ?? first + length - 1;
  if (!isNumber(last) || !Number.isInteger(last)) return undefined;
  return { first_index: first, last_index: last };
}

function readEvent(o: Record<string, unknown>): Event | string {
  const uid = o['uid'];
  const descriptor = o['descriptor'];
  const seqNum = o['seq_num'];
  const time = o['time'];
  const data = o['data'];
  if (!isString(uid) || !isString(descriptor)) return 'event needs string "uid" and "descriptor"';
  if (!isNumber(seqNum) || !isNumber(time)) return 'event needs numeric "seq_num" and "time"';
  if (!isRecord(data)) return 'event "data" must be an object';
  const timestamps = readMap(o['timestamps'], isNumber);
  if (timestamps === undefined) return 'event "timestamps" must map fields to numbers';
  const filled = readMap(o['filled'], isFilledFlag);
  if (filled === undefined) return 'event "filled" must map fields to booleans or datum ids';
  return { uid, descriptor, seq_num: seqNum, time, data, timestamps, filled };
}

function readEventPage(o: Record<string, unknown>): EventPage | string {
  const descriptor = o['descriptor'];
  if (!isString(descriptor)) return 'event page needs a string "descriptor"';
  const uid = readColumn(o['uid'], isString);
  const seqNum = readColumn(o['seq_num'], isNumber);
  const time = readColumn(o['time'], isNumber);
  if (uid === undefined || seqNum === undefined || time === undefined) {
    return 'event page needs "uid", "seq_num" and "time" columns';
  }
  const data = readDenseColumns(o['data']);
  if (data === undefined) return 'event page "data" must map fields to columns';
  const timestamps = readColumns(o['timestamps'], isNumber);
  if (timestamps === undefined) return 'event page "timestamps" must map fields to number columns';
  const filled = readColumns(o['filled'], isFilledFlag);
  if (filled === undefined) return 'event page "filled" must map fields to flag columns';
  const bounds = readBounds(o, seqNum.length);
  if (bounds === undefined) return 'event page has invalid "first_index"/"last_index"';
  return { descriptor, uid, seq_num: seqNum, time, data, timestamps, filled, ...bounds };
}

function readDatum(o: Record<string, unknown>): Datum | string {
  const datumId = o['datum_id'];
  const resource = o['resource'];
  const kwargs = o['datum_kwargs'] ?? {};
  if (!isString(datumId) || !isString(resource)) return 'datum needs string "datum_id" and "resource"';
  if (!isRecord(kwargs)) return 'datum "datum_kwargs" must be an object';
  return { datum_id: datumId, resource, datum_kwargs: kwargs };
}

function readDatumPage(o: Record<string, unknown>): DatumPage | string {
  const resource = o['resource'];
  if (!isString(resource)) return 'datum page needs a string "resource"';
  const datumId = readColumn(o['datum_id'], isString);
  if (datumId === undefined) return 'datum page needs a "datum_id" column';
  const kwargs = readDenseColumns(o['datum_kwargs'] ?? {});
  if (kwargs === undefined) return 'datum page "datum_kwargs" must map fields to columns';
  const bounds = readBounds(o, datumId.length);
  if (bounds === undefined) return 'datum page has invalid "first_index"/"last_index"';
  return { resource, datum_id: datumId, datum_kwargs: kwargs, ...bounds };
}

function fail(reason: string): Result<RunDocument, string> {
  return { ok: false, error: reason };
}

function readDocument(kind: DocumentKind, body: Record<string, unknown>): Result<RunDocument, string> {
  switch (kind) {
    case 'start':
      return isRunStart(body) ? { ok: true, value: ['start', body] } : fail('start needs string "uid" and numeric "time"');
    case 'stop':
      return isRunStop(body)
        ? { ok: true, value: ['stop', body] }
        : fail('stop needs string "uid", "run_start" and numeric "time"');
    case 'descriptor':
      return isDescriptor(body)
        ? { ok: true, value: ['descriptor', body] }
        : fail('descriptor needs "uid", "run_start", "time" and "data_keys"');
    case 'resource':
      return isResource(body)
        ? { ok: true, value: ['resource', body] }
        : fail('resource needs "uid", "spec", "resource_path" and "resource_kwargs"');
    case 'event': {
      const event = readEvent(body);
      return typeof event === 'string' ? fail(event) : { ok: true, value: ['event', event] };
    }
    case 'event_page': {
      const page = readEventPage(body);
      return typeof page === 'string' ? fail(page) : { ok: true, value: ['event_page', page] };
    }
    case 'datum': {
      const datum = readDatum(body);
      return typeof datum === 'string' ? fail(datum) : { ok: true, value: ['datum', datum] };
    }
    case 'datum_page': {
      const page = readDatumPage(body);
      return typeof page === 'string' ? fail(page) : { ok: true, value: ['datum_page', page] };
    }
  }
}

/**
 * Parse a `[kind, document]` line. The error is a human-readable reason;
 * callers attach the file and line number.
 */
export function parseDocumentLine(text: string): Result<RunDocument, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    return fail(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Array.isArray(raw) || raw.length !== 2) {
    return fail('expected a [kind, document] pair');
  }
  const pair: readonly unknown[] = raw;
  const kind = pair[0];
  const body = pair[1];
  if (!isDocumentKind(kind)) {
    return fail(`unknown document kind ${JSON.stringify(kind)}`);
  }
  if (!isRecord(body)) {
    return fail(`${kind} document must be an object`);
  }
  return readDocument(kind, body);
}
