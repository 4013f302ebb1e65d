/**
 * run-catalog — Run entry
 *
 * One run's view over a backend: its descriptors and resources, its events
 * merged across descriptors in time order, and its datums.
 */

import type {
  CatalogBackend,
  Datum,
  DatumPage,
  Descriptor,
  Event,
  EventPage,
  EventPageOptions,
  EventStreamOptions,
  HandlerSpec,
  Resource,
  Result,
  RunDocument,
  RunEntry,
  RunStart,
  RunStop,
  StreamWindow,
} from '../types.js';
import { CatalogStreamError, notFound } from '../errors.js';
import type { ResolvedConfig } from '../config.js';
import { readDatums, readEvents } from '../paging/paged-cursor.js';
import { toDatumPages, toEventPages } from '../paging/page-codec.js';
import { eventTime, mergeByTime, sliceStream } from '../merge/stream-merger.js';

/** Unwrap a result inside a stream, throwing its error. */
function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new CatalogStreamError(result.error);
  }
  return result.value;
}

/** Create the entry for a run whose start and stop documents are known. */
export function createRunEntry(
  backend: CatalogBackend,
  config: ResolvedConfig,
  start: RunStart,
  stop: RunStop | undefined,
): RunEntry {
  const runUid = start.uid;

  /** The requested descriptor uids, checked against the run's own. */
  async function selectDescriptors(requested: readonly string[] | undefined): Promise<readonly string[]> {
    const descriptors = unwrap(await backend.getDescriptors(runUid));
    const uids = descriptors.map((d) => d.uid);
    if (requested === undefined) {
      return uids;
    }
    const known = new Set(uids);
    for (const uid of requested) {
      if (!known.has(uid)) {
        throw new CatalogStreamError(notFound('descriptor', uid));
      }
    }
    return requested;
  }

  const entry: RunEntry = {
    uid: runUid,
    start,
    stop,

    getDescriptors(): Promise<Result<readonly Descriptor[]>> {
      return backend.getDescriptors(runUid);
    },

    getResources(): Promise<Result<readonly Resource[]>> {
      return backend.getResources(runUid);
    },

    async *events(options: EventStreamOptions = {}): AsyncGenerator<Event, void, undefined> {
      const uids = await selectDescriptors(options.descriptors);
      const window: StreamWindow = { skip: options.skip, limit: options.limit };
      const [only, ...rest] = uids;

      if (only !== undefined && rest.length === 0) {
        // A single stream can push the window down to the page fetch.
        yield* readEvents(backend, only, window);
        return;
      }
      const merged = mergeByTime(uids.map((uid) => readEvents(backend, uid)), eventTime);
      yield* sliceStream(merged, window.skip, window.limit);
    },

    eventPages(options: EventPageOptions = {}): AsyncGenerator<EventPage, void, undefined> {
      return toEventPages(
        entry.events({ descriptors: options.descriptors }),
        options.pageSize ?? config.pageSize,
      );
    },

    async getEventCount(descriptors?: readonly string[]): Promise<Result<number>> {
      let uids = descriptors;
      if (uids === undefined) {
        const found = await backend.getDescriptors(runUid);
        if (!found.ok) return found;
        uids = found.value.map((d) => d.uid);
      }
      let total = 0;
      for (const uid of uids) {
        const count = await backend.countEvents(uid);
        if (!count.ok) return count;
        total += count.value;
      }
      return { ok: true, value: total };
    },

    getResource(resourceUid: string): Promise<Result<Resource>> {
      return backend.getResource(resourceUid);
    },

    lookupResourceForDatum(datumId: string): Promise<Result<string>> {
      return backend.lookupResourceForDatum(datumId);
    },

    datums(resourceUid: string, window: StreamWindow = {}): AsyncGenerator<Datum, void, undefined> {
      return readDatums(backend, resourceUid, window);
    },

    datumPages(
      resourceUid: string,
      options: { readonly pageSize?: number | undefined } = {},
    ): AsyncGenerator<DatumPage, void, undefined> {
      return toDatumPages(readDatums(backend, resourceUid), options.pageSize ?? config.pageSize);
    },

    async *documents(): AsyncGenerator<RunDocument, void, undefined> {
      yield ['start', start];
      for (const descriptor of unwrap(await backend.getDescriptors(runUid))) {
        yield ['descriptor', descriptor];
      }
      const resources = unwrap(await backend.getResources(runUid));
      for (const resource of resources) {
        yield ['resource', resource];
      }
      for (const resource of resources) {
        for await (const page of entry.datumPages(resource.uid)) {
          yield ['datum_page', page];
        }
      }
      for await (const page of entry.eventPages()) {
        yield ['event_page', page];
      }
      if (stop !== undefined) {
        yield ['stop', stop];
      }
    },

    async resolveHandler(resourceUid: string): Promise<Result<HandlerSpec>> {
      const resource = await backend.getResource(resourceUid);
      if (!resource.ok) return resource;
      const handler = config.handlers.get(resource.value.spec);
      if (handler === undefined) {
        return { ok: false, error: notFound('handler', resource.value.spec) };
      }
      return { ok: true, value: handler };
    },
  };

  return Object.freeze(entry);
}
