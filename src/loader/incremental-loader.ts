/**
 * run-catalog — Incremental loader
 *
 * Keeps a run registry in step with a set of JSONL run logs. Each scan looks
 * only at files whose modification time changed since the last scan, and
 * reads just their first and last lines; the rest of a file is read when its
 * run's data is first requested.
 */

import type { Result, RunDocument, RunStart, RunStop, ScanError, ScanReport } from '../types.js';
import { CatalogStreamError, fromThrown, malformedRecord } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';
import type { RunRegistry } from '../backends/memory-backend.js';
import type { LogFileSystem, LogLine } from './log-files.js';
import { nodeLogFileSystem } from './log-files.js';
import { parseDocumentLine } from './document-line.js';

export interface IncrementalLoaderOptions {
  /** File paths; the file-name part may contain `*` and `?` wildcards. */
  readonly paths: readonly string[];
  readonly registry: RunRegistry;
  readonly files?: LogFileSystem | undefined;
  readonly logger?: Logger | undefined;
}

export interface IncrementalLoader {
  /** Re-scan every path, registering new and changed files. */
  scan(): Promise<Result<ScanReport>>;
}

/** What a changed file turned out to hold. */
type Inspection =
  | { readonly status: 'run'; readonly start: RunStart; readonly stop: RunStop | undefined }
  | { readonly status: 'pending' }
  | { readonly status: 'malformed'; readonly error: ScanError };

/** Every document in a run log, in file order. */
async function* readDocuments(files: LogFileSystem, path: string): AsyncGenerator<RunDocument, void, undefined> {
  let line = 0;
  for await (const text of files.readLines(path)) {
    line += 1;
    if (text.trim() === '') continue;
    const parsed = parseDocumentLine(text);
    if (!parsed.ok) {
      throw new CatalogStreamError(malformedRecord(path, parsed.error, line));
    }
    yield parsed.value;
  }
}

export function createIncrementalLoader(options: IncrementalLoaderOptions): IncrementalLoader {
  const files = options.files ?? nodeLogFileSystem;
  const logger = options.logger ?? noopLogger;
  const registry = options.registry;

  const seenMtimes = new Map<string, number>();
  const registeredUids = new Map<string, string>();

  function malformed(path: string, reason: string, line?: number): Inspection {
    return { status: 'malformed', error: { path, error: malformedRecord(path, reason, line) } };
  }

  /** The stop document on the last line, if there is one. */
  function stopFrom(last: LogLine | undefined): Result<RunStop | undefined, string> {
    if (last === undefined || last.text.trim() === '') return { ok: true, value: undefined };
    const parsed = parseDocumentLine(last.text);
    if (!parsed.ok) {
      // A half-written last line means the run is still being recorded.
      return last.terminated ? { ok: false, error: `last line: ${parsed.error}` } : { ok: true, value: undefined };
    }
    const doc = parsed.value;
    return { ok: true, value: doc[0] === 'stop' ? doc[1] : undefined };
  }

  async function inspect(path: string): Promise<Inspection> {
    const first = await files.readFirstLine(path);
    if (first === undefined) {
      return { status: 'pending' };
    }

    const parsed = parseDocumentLine(first.text);
    if (!parsed.ok) {
      return first.terminated ? malformed(path, parsed.error, 1) : { status: 'pending' };
    }
    const doc = parsed.value;
    if (doc[0] !== 'start') {
      return malformed(path, `first document is "${doc[0]}", expected "start"`, 1);
    }
    const start = doc[1];

    if (!first.terminated) {
      return { status: 'run', start, stop: undefined };
    }
    const stop = stopFrom(await files.readLastLine(path));
    if (!stop.ok) {
      return malformed(path, stop.error);
    }
    return { status: 'run', start, stop: stop.value };
  }

  /** Drop whatever `path` registered before, unless another file has since claimed the uid. */
  function forget(path: string): void {
    const uid = registeredUids.get(path);
    if (uid === undefined) return;
    registeredUids.delete(path);
    if (registry.get(uid)?.source === path) {
      registry.remove(uid);
    }
  }

  async function scanFile(path: string, report: MutableReport): Promise<void> {
    const mtime = await files.mtime(path);
    if (mtime === undefined) {
      forget(path);
      seenMtimes.delete(path);
      return;
    }
    if (seenMtimes.get(path) === mtime) {
      report.unchanged.push(path);
      return;
    }

    forget(path);
    const inspection = await inspect(path);
    switch (inspection.status) {
      case 'pending':
        logger.debug(`Skipping ${path}: still being written`);
        seenMtimes.delete(path);
        report.pending.push(path);
        return;
      case 'malformed':
        logger.warn(`Skipping malformed run log ${path}`, inspection.error.error);
        seenMtimes.set(path, mtime);
        report.errors.push(inspection.error);
        return;
      case 'run':
        registry.upsert({
          start: inspection.start,
          stop: inspection.stop,
          source: path,
          load: () => readDocuments(files, path),
        });
        registeredUids.set(path, inspection.start.uid);
        seenMtimes.set(path, mtime);
        report.registered.push(path);
        return;
    }
  }

  return {
    async scan(): Promise<Result<ScanReport>> {
      const report: MutableReport = { registered: [], unchanged: [], pending: [], errors: [] };

      let matched: string[];
      try {
        const expanded = await Promise.all(options.paths.map((pattern) => files.expand(pattern)));
        matched = [...new Set(expanded.flat())];
      } catch (err: unknown) {
        return { ok: false, error: fromThrown('expand run log paths', err) };
      }

      const present = new Set(matched);
      for (const path of [...seenMtimes.keys(), ...registeredUids.keys()]) {
        if (!present.has(path)) {
          forget(path);
          seenMtimes.delete(path);
        }
      }

      for (const path of matched) {
        try {
          await scanFile(path, report);
        } catch (err: unknown) {
          seenMtimes.delete(path);
          report.errors.push({ path, error: fromThrown('read run log', err) });
        }
      }

      logger.debug(
        `Scanned ${String(matched.length)} run logs: ${String(report.registered.length)} registered, ` +
          `${String(report.unchanged.length)} unchanged, ${String(report.pending.length)} pending, ` +
          `${String(report.errors.length)} failed`,
      );
      return { ok: true, value: report };
    },
  };
}

interface MutableReport {
  registered: string[];
  unchanged: string[];
  pending: string[];
  errors: ScanError[];
}
