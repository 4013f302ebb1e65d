/**
 * run-catalog — Entry index
 *
 * Read-only ordered map from run keys to run entries under a query scope.
 * Enumeration is most recent first.
 */

import type {
  CatalogBackend,
  EntryIndex,
  Query,
  Result,
  RunEntry,
  RunKey,
  RunStart,
} from '../types.js';
import { CatalogStreamError, ambiguousKey, fromThrown, indexOutOfRange, notFound } from '../errors.js';
import type { ResolvedConfig } from '../config.js';
import { andQueries, escapeRegex } from '../query/filter.js';
import { createRunEntry } from './run-entry.js';

/** A key resolved to one of the three lookup modes. */
export type ParsedKey =
  | { readonly mode: 'scan_id'; readonly scanId: number }
  | { readonly mode: 'recent'; readonly offset: number; readonly raw: number }
  | { readonly mode: 'uid'; readonly uid: string };

const INTEGER_KEY = /^\s*[-+]?\d+\s*$/;

/**
 * Integers (and integer-looking strings) are scan ids when non-negative and
 * recency offsets when negative; everything else is a uid or uid prefix.
 */
export function parseRunKey(key: RunKey): ParsedKey {
  let n: number | null = null;
  if (typeof key === 'number') {
    n = Number.isInteger(key) ? key : null;
  } else if (INTEGER_KEY.test(key)) {
    n = Number.parseInt(key, 10);
  }

  if (n === null) {
    return { mode: 'uid', uid: String(key) };
  }
  if (n < 0) {
    return { mode: 'recent', offset: -n - 1, raw: n };
  }
  return { mode: 'scan_id', scanId: n };
}

/** Pull at most `limit` starts and stop the enumeration. */
async function take(source: AsyncIterable<RunStart>, limit: number): Promise<RunStart[]> {
  const out: RunStart[] = [];
  if (limit <= 0) return out;
  for await (const doc of source) {
    out.push(doc);
    if (out.length >= limit) break;
  }
  return out;
}

/**
 * Create an entry index over `backend`, scoped to `config.query`.
 */
export function createEntryIndex(backend: CatalogBackend, config: ResolvedConfig): EntryIndex {
  const query = config.query;

  async function toEntry(start: RunStart): Promise<Result<RunEntry>> {
    const stop = await backend.getRunStop(start.uid);
    if (!stop.ok) return stop;
    return { ok: true, value: createRunEntry(backend, config, start, stop.value) };
  }

  async function first(scoped: Query, skip = 0): Promise<RunStart | undefined> {
    const [doc] = await take(backend.listRunStarts(scoped, { skip, limit: 1 }), 1);
    return doc;
  }

  async function lookupStart(key: RunKey): Promise<Result<RunStart>> {
    const parsed = parseRunKey(key);

    switch (parsed.mode) {
      case 'scan_id': {
        const doc = await first(andQueries(query, { scan_id: parsed.scanId }));
        return doc === undefined
          ? { ok: false, error: notFound('run', `scan_id=${String(parsed.scanId)}`) }
          : { ok: true, value: doc };
      }

      case 'recent': {
        const doc = await first(query, parsed.offset);
        if (doc !== undefined) {
          return { ok: true, value: doc };
        }
        const count = await backend.countRuns(query);
        if (!count.ok) return count;
        return { ok: false, error: indexOutOfRange(parsed.raw, count.value) };
      }

      case 'uid': {
        const exact = await first(andQueries(query, { uid: parsed.uid }));
        if (exact !== undefined) {
          return { ok: true, value: exact };
        }
        const prefixQuery = andQueries(query, { uid: { $regex: `^${escapeRegex(parsed.uid)}` } });
        const matches = await take(
          backend.listRunStarts(prefixQuery, { limit: config.prefixMatchCap }),
          config.prefixMatchCap,
        );
        const [only, ...rest] = matches;
        if (only === undefined) {
          return { ok: false, error: notFound('run', parsed.uid) };
        }
        if (rest.length > 0) {
          return { ok: false, error: ambiguousKey(parsed.uid, matches.map((doc) => doc.uid)) };
        }
        return { ok: true, value: only };
      }
    }
  }

  const index: EntryIndex = {
    query,

    async *keys(): AsyncGenerator<string, void, undefined> {
      for await (const start of backend.listRunStarts(query)) {
        yield start.uid;
      }
    },

    async *values(): AsyncGenerator<RunEntry, void, undefined> {
      for await (const [, entry] of index.items()) {
        yield entry;
      }
    },

    async *items(): AsyncGenerator<readonly [string, RunEntry], void, undefined> {
      for await (const start of backend.listRunStarts(query)) {
        const entry = await toEntry(start);
        if (!entry.ok) {
          throw new CatalogStreamError(entry.error);
        }
        yield [start.uid, entry.value] as const;
      }
    },

    async get(key: RunKey): Promise<Result<RunEntry>> {
      try {
        const start = await lookupStart(key);
        if (!start.ok) return start;
        return await toEntry(start.value);
      } catch (err: unknown) {
        return { ok: false, error: fromThrown('get', err) };
      }
    },

    async contains(key: RunKey): Promise<Result<boolean>> {
      const found = await index.get(key);
      if (found.ok) {
        return { ok: true, value: true };
      }
      switch (found.error.code) {
        case 'NOT_FOUND':
        case 'AMBIGUOUS_KEY':
        case 'INDEX_OUT_OF_RANGE':
          return { ok: true, value: false };
        default:
          return found;
      }
    },

    length(): Promise<Result<number>> {
      return backend.countRuns(query);
    },

    search(next: Query): EntryIndex {
      return createEntryIndex(backend, { ...config, query: andQueries(query, next) });
    },
  };

  return index;
}
