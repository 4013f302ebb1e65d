/**
 * run-catalog — Configuration
 *
 * Catalog options, their defaults, and the handler registry parser.
 */

import type { HandlerSpec, Query, Result } from './types.js';
import type { CatalogError } from './errors.js';
import { invalidArgument, misconfigured } from './errors.js';
import type { Logger } from './utils/logger.js';
import { noopLogger } from './utils/logger.js';

/** Options shared by every catalog. */
export interface CatalogConfig {
  /** Initial query scope. Default: `{}` (all runs). */
  readonly query?: Query | undefined;
  /** Records per page when rebatching events or datums. Default: 2500. */
  readonly pageSize?: number | undefined;
  /** Maximum uids fetched when resolving a uid prefix. Default: 10. */
  readonly prefixMatchCap?: number | undefined;
  /** Pages fetched per round trip by store-backed cursors. Default: 16. */
  readonly fetchBatchSize?: number | undefined;
  /**
   * Maps each asset spec to a handler reference, written as
   * `"module#exportName"` or `"module:exportName"`.
   */
  readonly handlerRegistry?: Readonly<Record<string, string>> | undefined;
  readonly logger?: Logger | undefined;
}

/** Configuration with defaults applied. */
export interface ResolvedConfig {
  readonly query: Query;
  readonly pageSize: number;
  readonly prefixMatchCap: number;
  readonly fetchBatchSize: number;
  readonly handlers: ReadonlyMap<string, HandlerSpec>;
  readonly logger: Logger;
}

export const DEFAULT_PAGE_SIZE = 2500;
export const DEFAULT_PREFIX_MATCH_CAP = 10;
export const DEFAULT_FETCH_BATCH_SIZE = 16;

function checkPositiveInteger(field: string, value: number | undefined): CatalogError | null {
  if (value === undefined) return null;
  if (!Number.isInteger(value) || value < 1) {
    return invalidArgument(field, 'must be a positive integer');
  }
  return null;
}

/**
 * Parse a handler registry into handler specs.
 *
 * Every value must name a module and an export separated by `#` or `:`.
 */
export function parseHandlerRegistry(
  registry: Readonly<Record<string, string>>,
): Result<ReadonlyMap<string, HandlerSpec>> {
  const handlers = new Map<string, HandlerSpec>();
  for (const [spec, reference] of Object.entries(registry)) {
    const match = /^([^#:\s]+)[#:]([A-Za-z_$][\w$]*)$/.exec(reference.trim());
    const module = match?.[1];
    const exportName = match?.[2];
    if (module === undefined || exportName === undefined) {
      return {
        ok: false,
        error: misconfigured(
          `handlerRegistry.${spec}`,
          `cannot parse handler reference ${JSON.stringify(reference)}; expected "module#exportName"`,
        ),
      };
    }
    handlers.set(spec, Object.freeze({ spec, module, exportName }));
  }
  return { ok: true, value: handlers };
}

/** Validate user-provided config and apply defaults. */
export function resolveConfig(config?: CatalogConfig): Result<ResolvedConfig> {
  const invalid =
    checkPositiveInteger('pageSize', config?.pageSize) ??
    checkPositiveInteger('prefixMatchCap', config?.prefixMatchCap) ??
    checkPositiveInteger('fetchBatchSize', config?.fetchBatchSize);
  if (invalid !== null) {
    return { ok: false, error: invalid };
  }

  const handlers = parseHandlerRegistry(config?.handlerRegistry ?? {});
  if (!handlers.ok) {
    return handlers;
  }

  return {
    ok: true,
    value: {
      query: config?.query ?? {},
      pageSize: config?.pageSize ?? DEFAULT_PAGE_SIZE,
      prefixMatchCap: config?.prefixMatchCap ?? DEFAULT_PREFIX_MATCH_CAP,
      fetchBatchSize: config?.fetchBatchSize ?? DEFAULT_FETCH_BATCH_SIZE,
      handlers: handlers.value,
      logger: config?.logger ?? noopLogger,
    },
  };
}
