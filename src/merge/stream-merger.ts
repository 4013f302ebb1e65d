/**
 * run-catalog — Stream merger
 *
 * Lazy k-way merge of time-ordered sequences, plus slicing over any lazy
 * sequence.
 */

import type { Event, EventPage } from '../types.js';
import { CatalogStreamError, invalidArgument } from '../errors.js';
import { eventPageLength, sliceEventPage } from '../paging/page-codec.js';
import { MinHeap } from './min-heap.js';

/** Something the merger can pull from. */
export type Source<T> = AsyncIterable<T> | Iterable<T>;

interface Pending<T> {
  readonly time: number;
  readonly source: number;
  readonly item: T;
}

async function* fromSource<T>(source: Source<T>): AsyncGenerator<T, void, undefined> {
  yield* source;
}

/** Merge key of an event. */
export function eventTime(event: Event): number {
  return event.time;
}

/** Merge key of a page: the time of its first record. */
export function pageTime(page: EventPage): number {
  return page.time[0] ?? Number.NEGATIVE_INFINITY;
}

/**
 * Merge ascending sources into one ascending sequence.
 *
 * Holds at most one pending item per source in a heap keyed by
 * `(time, sourceIndex)`, so equal times come out in source order. Returning
 * early from the merged sequence returns every source that is still open.
 */
export async function* mergeByTime<T>(
  sources: readonly Source<T>[],
  timeOf: (item: T) => number,
): AsyncGenerator<T, void, undefined> {
  const iterators = sources.map((s) => fromSource(s));
  const open = new Set<number>(iterators.keys());
  const heap = new MinHeap<Pending<T>>((a, b) => a.time - b.time || a.source - b.source);

  const refill = async (source: number): Promise<void> => {
    const iterator = iterators[source];
    if (iterator === undefined) return;
    const next = await iterator.next();
    if (next.done === true) {
      open.delete(source);
      return;
    }
    heap.push({ time: timeOf(next.value), source, item: next.value });
  };

  try {
    for (const source of iterators.keys()) {
      await refill(source);
    }
    for (let pending = heap.pop(); pending !== undefined; pending = heap.pop()) {
      yield pending.item;
      await refill(pending.source);
    }
  } finally {
    heap.drain();
    await Promise.all([...open].map(async (source) => {
      await iterators[source]?.return();
    }));
  }
}

/**
 * Yield items `skip` through `skip + limit - 1` of a sequence. The source is
 * returned as soon as the window is complete.
 */
export async function* sliceStream<T>(
  source: Source<T>,
  skip = 0,
  limit?: number,
): AsyncGenerator<T, void, undefined> {
  if (!Number.isInteger(skip) || skip < 0) {
    throw new CatalogStreamError(invalidArgument('skip', 'must be a non-negative integer'));
  }
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new CatalogStreamError(invalidArgument('limit', 'must be a non-negative integer'));
  }
  if (limit === 0) return;

  const end = limit === undefined ? Number.POSITIVE_INFINITY : skip + limit;
  let index = 0;
  for await (const item of source) {
    const current = index;
    index += 1;
    if (current < skip) continue;
    yield item;
    if (index >= end) return;
  }
}

/** Split every page of a source into pages of at most `chunkSize` records. */
async function* chunkPages(
  pages: Source<EventPage>,
  chunkSize: number,
): AsyncGenerator<EventPage, void, undefined> {
  for await (const page of pages) {
    const length = eventPageLength(page);
    for (let start = 0; start < length; start += chunkSize) {
      yield sliceEventPage(page, start, Math.min(start + chunkSize, length));
    }
  }
}

/**
 * Interlace several page sources by time. Each source's pages are cut into
 * chunks of at most `chunkSize` records, then the chunks are merged by the
 * time of their first record.
 */
export function interlaceEventPages(
  sources: readonly Source<EventPage>[],
  chunkSize: number,
): AsyncGenerator<EventPage, void, undefined> {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new CatalogStreamError(invalidArgument('chunkSize', 'must be a positive integer'));
  }
  return mergeByTime(sources.map((s) => chunkPages(s, chunkSize)), pageTime);
}
