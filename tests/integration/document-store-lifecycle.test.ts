/**
 * run-catalog — Document-store lifecycle integration tests
 *
 * Writes runs through the database, then reads them back through a catalog
 * that opens the database by name.
 */

import { describe, it, expect, afterEach } from 'vitest';
import 'fake-indexeddb/auto';
import { createDocumentStoreCatalog } from '../../src/backends/document-store.js';
import { createDatabase } from '../../src/storage/database.js';
import { packEventPage } from '../../src/paging/page-codec.js';
import type { DocumentStoreCatalog } from '../../src/backends/document-store.js';
import type { Event } from '../../src/types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function uniqueDbName(): string {
  return `test-lifecycle-${Math.random().toString(36).slice(2)}`;
}

function event(descriptor: string, seq: number): Event {
  return {
    uid: `${descriptor}-${String(seq)}`,
    descriptor,
    seq_num: seq,
    time: seq,
    data: { det: seq },
    timestamps: { det: seq },
    filled: {},
  };
}

/** Store `runs` runs of `perRun` events each, in pages of 10. */
async function writeRuns(name: string, runs: number, perRun: number): Promise<void> {
  const db = createDatabase(name);
  for (let r = 0; r < runs; r++) {
    const uid = `run-${String(r).padStart(3, '0')}`;
    const descriptor = `${uid}-primary`;
    await db.runStarts.add({ uid, time: r, scan_id: r });
    await db.descriptors.add({ uid: descriptor, run_start: uid, time: r, data_keys: { det: {} } });
    const events = Array.from({ length: perRun }, (_, i) => event(descriptor, i + 1));
    for (let i = 0; i < events.length; i += 10) {
      await db.eventPages.add(packEventPage(events.slice(i, i + 10), i));
    }
    await db.runStops.add({ uid: `${uid}-stop`, run_start: uid, time: r + 0.5, exit_status: 'success' });
  }
  db.close();
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Document-store lifecycle', () => {
  const dbs: string[] = [];
  const catalogs: DocumentStoreCatalog[] = [];

  function open(name: string): DocumentStoreCatalog {
    const result = createDocumentStoreCatalog({ databaseName: name, fetchBatchSize: 3 });
    if (!result.ok) throw new Error('catalog should open');
    catalogs.push(result.value);
    return result.value;
  }

  afterEach(async () => {
    for (const catalog of catalogs) catalog.close();
    catalogs.length = 0;
    for (const name of dbs) {
      const db = createDatabase(name);
      db.close();
      await db.delete();
    }
    dbs.length = 0;
  });

  it('enumerates many runs and resolves recency offsets', async () => {
    const name = uniqueDbName();
    dbs.push(name);
    await writeRuns(name, 25, 1);
    const catalog = open(name);

    const keys = await collect(catalog.keys());
    expect(keys).toHaveLength(25);
    expect(keys[0]).toBe('run-024');
    expect(keys[24]).toBe('run-000');

    const tenth = await catalog.get(-10);
    expect(tenth.ok && tenth.value.uid).toBe('run-015');
    expect(await catalog.get(-26)).toEqual({
      ok: false,
      error: { code: 'INDEX_OUT_OF_RANGE', index: -26, available: 25 },
    });
  });

  it('reads a window spanning several stored pages', async () => {
    const name = uniqueDbName();
    dbs.push(name);
    await writeRuns(name, 1, 45);
    const catalog = open(name);

    const run = await catalog.get('run-000');
    if (!run.ok) throw new Error('run-000 should exist');
    const events = await collect(run.value.events({ skip: 18, limit: 5 }));
    expect(events.map((e) => e.seq_num)).toEqual([19, 20, 21, 22, 23]);
    expect(await run.value.getEventCount()).toEqual({ ok: true, value: 45 });
  });

  it('stops reading when the consumer stops', async () => {
    const name = uniqueDbName();
    dbs.push(name);
    await writeRuns(name, 1, 45);
    const catalog = open(name);

    const run = await catalog.get(0);
    if (!run.ok) throw new Error('scan 0 should exist');
    const seen: number[] = [];
    for await (const e of run.value.events()) {
      seen.push(e.seq_num);
      if (seen.length === 3) break;
    }
    expect(seen).toEqual([1, 2, 3]);
  });
});
