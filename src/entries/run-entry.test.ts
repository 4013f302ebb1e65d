/**
 * run-catalog — Run entry tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RunRegistry, createMemoryBackend } from '../backends/memory-backend.js';
import { resolveConfig } from '../config.js';
import type { CatalogConfig } from '../config.js';
import { createEntryIndex } from './entry-index.js';
import { CatalogStreamError } from '../errors.js';
import { readPaged } from '../paging/paged-cursor.js';
import { unpackEventPage } from '../paging/page-codec.js';
import type { Descriptor, Event, RunDocument, RunEntry, RunStart, RunStop } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const START: RunStart = { uid: 'run-1', time: 0, scan_id: 12 };
const STOP: RunStop = { uid: 'stop-1', run_start: 'run-1', time: 10, exit_status: 'success' };

function descriptor(uid: string, time: number, name: string): Descriptor {
  return {
    uid,
    run_start: START.uid,
    time,
    name,
    data_keys: { value: { source: 'sim', dtype: 'number', shape: [] } },
  };
}

function event(descriptorUid: string, seq: number, time: number): Event {
  return {
    uid: `${descriptorUid}-${String(seq)}`,
    descriptor: descriptorUid,
    seq_num: seq,
    time,
    data: { value: time * 100 },
    timestamps: { value: time },
    filled: {},
  };
}

/** Three interleaved streams with events at t=1..6. */
function documents(): RunDocument[] {
  return [
    ['start', START],
    ['descriptor', descriptor('desc-b', 0.2, 'baseline')],
    ['descriptor', descriptor('desc-a', 0.1, 'primary')],
    ['descriptor', descriptor('desc-c', 0.3, 'monitor')],
    ['event', event('desc-a', 1, 1)],
    ['event', event('desc-b', 1, 2)],
    ['event', event('desc-c', 1, 3)],
    ['event', event('desc-a', 2, 4)],
    ['event', event('desc-b', 2, 5)],
    ['event', event('desc-c', 2, 6)],
    [
      'resource',
      { uid: 'res-1', run_start: START.uid, spec: 'AD_TIFF', root: '/data', resource_path: 'img', resource_kwargs: {} },
    ],
    [
      'datum_page',
      {
        resource: 'res-1',
        datum_id: ['res-1/0', 'res-1/1', 'res-1/2'],
        datum_kwargs: { point: [0, 1, 2] },
        first_index: 0,
        last_index: 2,
      },
    ],
    ['stop', STOP],
  ];
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

async function openEntry(overrides: CatalogConfig = {}, pageSize = 1): Promise<RunEntry> {
  const registry = new RunRegistry(pageSize);
  const docs = documents();
  registry.upsert({
    start: START,
    stop: STOP,
    source: 'memory:run-1',
    load: async function* () {
      yield* docs;
    },
  });
  const config = resolveConfig(overrides);
  if (!config.ok) throw new Error('test config is invalid');
  const found = await createEntryIndex(createMemoryBackend(registry), config.value).get('run-1');
  if (!found.ok) throw new Error('run-1 is not registered');
  return found.value;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RunEntry', () => {
  let entry: RunEntry;

  beforeEach(async () => {
    entry = await openEntry();
  });

  it('exposes the start and stop documents', () => {
    expect(entry.uid).toBe('run-1');
    expect(entry.start.scan_id).toBe(12);
    expect(entry.stop?.exit_status).toBe('success');
  });

  it('lists descriptors in time order', async () => {
    const result = await entry.getDescriptors();
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((d) => d.uid)).toEqual(['desc-a', 'desc-b', 'desc-c']);
  });

  // --- Events ---

  it('merges every descriptor stream by time across one-event pages', async () => {
    const events = await collect(entry.events());
    expect(events.map((e) => e.time)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(events.map((e) => e.descriptor)).toEqual(['desc-a', 'desc-b', 'desc-c', 'desc-a', 'desc-b', 'desc-c']);
  });

  it('slices the merged stream', async () => {
    const events = await collect(entry.events({ skip: 1, limit: 3 }));
    expect(events.map((e) => e.time)).toEqual([2, 3, 4]);
  });

  it('reads a single descriptor with the window pushed down', async () => {
    expect((await collect(entry.events({ descriptors: ['desc-b'] }))).map((e) => e.time)).toEqual([2, 5]);
    expect((await collect(entry.events({ descriptors: ['desc-b'], skip: 1 }))).map((e) => e.uid)).toEqual([
      'desc-b-2',
    ]);
  });

  it('merges a chosen subset of descriptors', async () => {
    const events = await collect(entry.events({ descriptors: ['desc-c', 'desc-a'] }));
    expect(events.map((e) => e.time)).toEqual([1, 3, 4, 6]);
  });

  it('fails the stream for a descriptor outside the run', async () => {
    let caught: unknown;
    try {
      await collect(entry.events({ descriptors: ['desc-zzz'] }));
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CatalogStreamError);
    if (!(caught instanceof CatalogStreamError)) return;
    expect(caught.error).toEqual({ code: 'NOT_FOUND', kind: 'descriptor', key: 'desc-zzz' });
  });

  it('rebatches merged events into single-descriptor pages', async () => {
    const pages = await collect(entry.eventPages({ descriptors: ['desc-a', 'desc-b'], pageSize: 2 }));
    expect(pages.map((p) => [p.descriptor, p.first_index, p.last_index])).toEqual([
      ['desc-a', 0, 0],
      ['desc-b', 0, 0],
      ['desc-a', 1, 1],
      ['desc-b', 1, 1],
    ]);
  });

  it('emits pages that read back as a contiguous stream per descriptor', async () => {
    const pages = await collect(entry.eventPages({ pageSize: 10 }));
    for (const uid of ['desc-a', 'desc-b', 'desc-c']) {
      const own = pages.filter((p) => p.descriptor === uid);
      const events = await collect(
        readPaged({
          stream: uid,
          fetchPages: async function* () {
            yield* own;
          },
          unpack: unpackEventPage,
          skip: 1,
        }),
      );
      expect(events.map((e) => e.uid)).toEqual([`${uid}-2`]);
    }
  });

  it('keeps consecutive events of one descriptor together', async () => {
    const pages = await collect(entry.eventPages({ descriptors: ['desc-c'], pageSize: 5 }));
    expect(pages).toHaveLength(1);
    expect(pages[0]?.time).toEqual([3, 6]);
    expect(pages[0]?.data).toEqual({ value: [300, 600] });
  });

  it('counts events', async () => {
    expect(await entry.getEventCount()).toEqual({ ok: true, value: 6 });
    expect(await entry.getEventCount(['desc-a'])).toEqual({ ok: true, value: 2 });
  });

  // --- Resources and datums ---

  it('finds resources and the resource behind a datum', async () => {
    const resources = await entry.getResources();
    expect(resources.ok && resources.value.map((r) => r.uid)).toEqual(['res-1']);
    expect(await entry.lookupResourceForDatum('res-1/2')).toEqual({ ok: true, value: 'res-1' });

    const missing = await entry.getResource('res-404');
    expect(missing.ok).toBe(false);
    if (missing.ok) return;
    expect(missing.error).toEqual({ code: 'NOT_FOUND', kind: 'resource', key: 'res-404' });
  });

  it('reports an unknown datum as not found', async () => {
    const result = await entry.lookupResourceForDatum('res-1/99');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({ code: 'NOT_FOUND', kind: 'datum', key: 'res-1/99' });
  });

  it('streams datums with a window', async () => {
    const datums = await collect(entry.datums('res-1', { skip: 1 }));
    expect(datums).toEqual([
      { datum_id: 'res-1/1', resource: 'res-1', datum_kwargs: { point: 1 } },
      { datum_id: 'res-1/2', resource: 'res-1', datum_kwargs: { point: 2 } },
    ]);
  });

  it('rebatches datums into pages', async () => {
    const pages = await collect(entry.datumPages('res-1', { pageSize: 2 }));
    expect(pages.map((p) => p.datum_id)).toEqual([['res-1/0', 'res-1/1'], ['res-1/2']]);
  });

  // --- Documents ---

  it('replays the run as a canonical document stream', async () => {
    const kinds = (await collect(entry.documents())).map(([kind]) => kind);
    expect(kinds).toEqual([
      'start',
      'descriptor',
      'descriptor',
      'descriptor',
      'resource',
      'datum_page',
      'event_page',
      'event_page',
      'event_page',
      'event_page',
      'event_page',
      'event_page',
      'stop',
    ]);
  });

  // --- Handlers ---

  it('resolves a handler from the registry by resource spec', async () => {
    const withHandlers = await openEntry({ handlerRegistry: { AD_TIFF: 'tiff-handlers#TiffHandler' } });
    expect(await withHandlers.resolveHandler('res-1')).toEqual({
      ok: true,
      value: { spec: 'AD_TIFF', module: 'tiff-handlers', exportName: 'TiffHandler' },
    });
  });

  it('reports a spec without a registered handler', async () => {
    const result = await entry.resolveHandler('res-1');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({ code: 'NOT_FOUND', kind: 'handler', key: 'AD_TIFF' });
  });
});
