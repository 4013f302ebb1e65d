/**
 * run-catalog — In-memory backend tests
 */

import { describe, it, expect } from 'vitest';
import { RunRegistry, createMemoryBackend, groupDocuments } from './memory-backend.js';
import type { RunRegistration } from './memory-backend.js';
import type { Event, EventPage, RunDocument, RunStart } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function event(descriptor: string, seq: number, filled: Record<string, boolean | string> = {}): Event {
  return {
    uid: `${descriptor}-${String(seq)}`,
    descriptor,
    seq_num: seq,
    time: seq,
    data: { image: `ref-${String(seq)}` },
    timestamps: { image: seq },
    filled,
  };
}

async function* stream(docs: readonly RunDocument[]): AsyncGenerator<RunDocument, void, undefined> {
  yield* docs;
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

function registration(start: RunStart, docs: readonly RunDocument[], onLoad?: () => void): RunRegistration {
  return {
    start,
    stop: undefined,
    source: `memory:${start.uid}`,
    load: () => {
      onLoad?.();
      return stream(docs);
    },
  };
}

const DESCRIPTOR: RunDocument = [
  'descriptor',
  {
    uid: 'd1',
    run_start: 'run-1',
    time: 0,
    data_keys: { image: { source: 'camera', external: 'FILESTORE:' } },
  },
];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('groupDocuments', () => {
  it('pages single events and unpacked event pages together', async () => {
    const page: EventPage = {
      descriptor: 'd1',
      uid: ['d1-3', 'd1-4'],
      seq_num: [3, 4],
      time: [3, 4],
      data: { image: ['ref-3', 'ref-4'] },
      timestamps: { image: [3, 4] },
      filled: { image: [true, true] },
      first_index: 2,
      last_index: 3,
    };
    const loaded = await groupDocuments(
      stream([DESCRIPTOR, ['event', event('d1', 1)], ['event', event('d1', 2)], ['event_page', page]]),
      3,
    );

    const pages = loaded.eventPages.get('d1') ?? [];
    expect(pages.map((p) => [p.first_index, p.last_index])).toEqual([[0, 2], [3, 3]]);
    expect(pages.flatMap((p) => p.seq_num)).toEqual([1, 2, 3, 4]);
  });

  it('marks external fields without a filled flag as unfilled', async () => {
    const loaded = await groupDocuments(
      stream([DESCRIPTOR, ['event', event('d1', 1)], ['event', event('d1', 2, { image: 'datum-2' })]]),
      10,
    );
    expect(loaded.eventPages.get('d1')?.[0]?.filled).toEqual({ image: [false, 'datum-2'] });
  });

  it('groups datums by resource and indexes datum ids', async () => {
    const loaded = await groupDocuments(
      stream([
        ['datum', { datum_id: 'r1/0', resource: 'r1', datum_kwargs: { frame: 0 } }],
        ['datum', { datum_id: 'r2/0', resource: 'r2', datum_kwargs: { frame: 0 } }],
        ['datum', { datum_id: 'r1/1', resource: 'r1', datum_kwargs: { frame: 1 } }],
      ]),
      10,
    );
    expect(loaded.datumPages.get('r1')?.[0]?.datum_id).toEqual(['r1/0', 'r1/1']);
    expect(loaded.datumResources.get('r2/0')).toBe('r2');
  });
});

describe('RunRegistry', () => {
  it('loads a run only on first data access and caches it', async () => {
    let loads = 0;
    const registry = new RunRegistry(2);
    registry.upsert(registration({ uid: 'run-1', time: 1 }, [DESCRIPTOR], () => (loads += 1)));
    const backend = createMemoryBackend(registry);

    expect(await backend.countRuns({})).toEqual({ ok: true, value: 1 });
    expect(await backend.getRunStop('run-1')).toEqual({ ok: true, value: undefined });
    expect(loads).toBe(0);

    await backend.getDescriptors('run-1');
    await backend.getResources('run-1');
    expect(loads).toBe(1);
  });

  it('discards the loaded documents when a run is replaced', async () => {
    const registry = new RunRegistry(2);
    const backend = createMemoryBackend(registry);
    registry.upsert(registration({ uid: 'run-1', time: 1 }, [DESCRIPTOR, ['event', event('d1', 1)]]));
    expect(await backend.countEvents('d1')).toEqual({ ok: true, value: 1 });

    registry.upsert(
      registration({ uid: 'run-1', time: 1 }, [DESCRIPTOR, ['event', event('d1', 1)], ['event', event('d1', 2)]]),
    );
    expect(await backend.countEvents('d1')).toEqual({ ok: true, value: 2 });
  });

  it('retries a load that failed', async () => {
    let attempts = 0;
    const registry = new RunRegistry();
    registry.upsert({
      start: { uid: 'run-1', time: 1 },
      stop: undefined,
      source: 'memory:run-1',
      load: async function* () {
        attempts += 1;
        if (attempts === 1) throw new Error('file busy');
        yield DESCRIPTOR;
      },
    });
    const backend = createMemoryBackend(registry);

    const failed = await backend.getDescriptors('run-1');
    expect(failed).toEqual({ ok: false, error: { code: 'DATABASE_ERROR', operation: 'getDescriptors', reason: 'file busy' } });

    const retried = await backend.getDescriptors('run-1');
    expect(retried.ok && retried.value.map((d) => d.uid)).toEqual(['d1']);
  });

  it('removes runs', () => {
    const registry = new RunRegistry();
    registry.upsert(registration({ uid: 'run-1', time: 1 }, []));
    expect(registry.remove('run-1')).toBe(true);
    expect(registry.remove('run-1')).toBe(false);
    expect(registry.size).toBe(0);
  });
});

describe('createMemoryBackend', () => {
  function backendWith(count: number, pageSize: number) {
    const registry = new RunRegistry(pageSize);
    const docs: RunDocument[] = [DESCRIPTOR];
    for (let seq = 1; seq <= count; seq++) docs.push(['event', event('d1', seq)]);
    registry.upsert(registration({ uid: 'run-1', time: 1 }, docs));
    return createMemoryBackend(registry);
  }

  it('returns only the pages intersecting the window', async () => {
    const backend = backendWith(10, 3);
    const pages = await collect(backend.getEventPages('d1', 4, 3));
    expect(pages.map((p) => [p.first_index, p.last_index])).toEqual([[3, 5], [6, 8]]);
  });

  it('returns every page from skip onwards without a limit', async () => {
    const backend = backendWith(10, 3);
    const pages = await collect(backend.getEventPages('d1', 9, undefined));
    expect(pages.map((p) => p.first_index)).toEqual([9]);
  });

  it('returns no pages for an unknown descriptor', async () => {
    const backend = backendWith(2, 3);
    expect(await collect(backend.getEventPages('nope', 0, undefined))).toEqual([]);
    expect(await backend.countEvents('nope')).toEqual({ ok: true, value: 0 });
  });

  it('filters and windows run starts', async () => {
    const registry = new RunRegistry();
    for (const [uid, time] of [['a', 1], ['b', 2], ['c', 3], ['d', 4]] as const) {
      registry.upsert(registration({ uid, time, even: time % 2 === 0 }, []));
    }
    const backend = createMemoryBackend(registry);

    const all = await collect(backend.listRunStarts({}, { skip: 1, limit: 2 }));
    expect(all.map((s) => s.uid)).toEqual(['c', 'b']);
    const even = await collect(backend.listRunStarts({ even: true }));
    expect(even.map((s) => s.uid)).toEqual(['d', 'b']);
  });

  it('reports unknown runs as not found', async () => {
    const backend = createMemoryBackend(new RunRegistry());
    expect(await backend.getRunStop('ghost')).toEqual({
      ok: false,
      error: { code: 'NOT_FOUND', kind: 'run', key: 'ghost' },
    });
    expect(await backend.getDescriptors('ghost')).toEqual({
      ok: false,
      error: { code: 'NOT_FOUND', kind: 'run', key: 'ghost' },
    });
  });
});
