/**
 * run-catalog — JSONL catalog
 *
 * A catalog over run logs on disk, one run per file. `reload()` picks up new
 * and changed files without re-reading the rest.
 */

import type { JsonlCatalog, Result } from '../types.js';
import { misconfigured } from '../errors.js';
import type { CatalogConfig } from '../config.js';
import { resolveConfig } from '../config.js';
import { createEntryIndex } from '../entries/entry-index.js';
import type { LogFileSystem } from '../loader/log-files.js';
import { createIncrementalLoader } from '../loader/incremental-loader.js';
import { RunRegistry, createMemoryBackend } from './memory-backend.js';

/** Configuration for a JSONL catalog. */
export interface JsonlCatalogConfig extends CatalogConfig {
  /** Run log paths. Any path segment may contain `*` and `?` wildcards. */
  readonly paths: string | readonly string[];
  /** File access. Default: the local file system. */
  readonly files?: LogFileSystem | undefined;
}

/**
 * Create a catalog over JSONL run logs and run the first scan.
 *
 * The first scan's report is kept as `initialScan`; later scans are
 * reported by `reload()`.
 */
export async function createJsonlCatalog(config: JsonlCatalogConfig): Promise<Result<JsonlCatalog>> {
  const resolved = resolveConfig(config);
  if (!resolved.ok) return resolved;
  const { logger } = resolved.value;

  const paths = typeof config.paths === 'string' ? [config.paths] : [...config.paths];
  if (paths.length === 0) {
    return { ok: false, error: misconfigured('paths', 'at least one path is required') };
  }
  if (paths.some((path) => path.trim() === '')) {
    return { ok: false, error: misconfigured('paths', 'paths must not be empty strings') };
  }

  const registry = new RunRegistry(resolved.value.pageSize);
  const loader = createIncrementalLoader({ paths, registry, files: config.files, logger });

  const initial = await loader.scan();
  if (!initial.ok) return initial;
  for (const { path, error } of initial.value.errors) {
    logger.warn(`Could not index ${path}`, error);
  }
  logger.debug(`Indexed ${String(registry.size)} runs from ${paths.join(', ')}`);

  const index = createEntryIndex(createMemoryBackend(registry), resolved.value);
  return {
    ok: true,
    value: Object.assign(index, {
      initialScan: initial.value,
      reload: () => loader.scan(),
    }),
  };
}
