/**
 * run-catalog — Dexie database setup
 *
 * IndexedDB schema for the document-store backend: one table per document
 * kind, with event and datum pages stored as columnar documents.
 */

import Dexie from 'dexie';
import type { DexieOptions, Table } from 'dexie';
import type {
  DatumPage,
  Descriptor,
  EventPage,
  Resource,
  RunStart,
  RunStop,
} from '../types.js';

/** Stored event page. `id` is assigned by the database. */
export interface StoredEventPage extends EventPage {
  id?: number;
}

/** Stored datum page. `id` is assigned by the database. */
export interface StoredDatumPage extends DatumPage {
  id?: number;
}

/** The Dexie database class for the run catalog. */
export class RunDatabase extends Dexie {
  runStarts!: Table<RunStart, string>;
  runStops!: Table<RunStop, string>;
  descriptors!: Table<Descriptor, string>;
  eventPages!: Table<StoredEventPage, number>;
  resources!: Table<Resource, string>;
  datumPages!: Table<StoredDatumPage, number>;

  constructor(databaseName: string = 'run-catalog', options?: DexieOptions) {
    super(databaseName, options);

    this.version(1).stores({
      runStarts: 'uid, time, scan_id',
      runStops: 'uid, &run_start',
      descriptors: 'uid, run_start, [run_start+time]',
      eventPages: '++id, descriptor, [descriptor+first_index]',
      resources: 'uid, run_start',
      datumPages: '++id, resource, [resource+first_index], *datum_id',
    });
  }
}

/** Create a RunDatabase instance. */
export function createDatabase(databaseName: string = 'run-catalog', options?: DexieOptions): RunDatabase {
  return new RunDatabase(databaseName, options);
}

/** Strip the storage id from a stored event page. */
export function toEventPage(stored: StoredEventPage): EventPage {
  const { id: _id, ...page } = stored;
  return page;
}

/** Strip the storage id from a stored datum page. */
export function toDatumPage(stored: StoredDatumPage): DatumPage {
  const { id: _id, ...page } = stored;
  return page;
}
