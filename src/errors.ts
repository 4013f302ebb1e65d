/**
 * run-catalog — Error types
 *
 * Discriminated union of all error types the catalog can produce.
 */

/** All possible error codes produced by the catalog. */
export type CatalogErrorCode =
  | 'NOT_FOUND'
  | 'AMBIGUOUS_KEY'
  | 'INDEX_OUT_OF_RANGE'
  | 'MALFORMED_RECORD'
  | 'MISCONFIGURED'
  | 'INVALID_ARGUMENT'
  | 'DATABASE_ERROR';

/** What a NOT_FOUND lookup was looking for. */
export type NotFoundKind = 'run' | 'resource' | 'datum' | 'descriptor' | 'handler';

/** Discriminated union of all catalog errors. */
export type CatalogError =
  | {
      readonly code: 'NOT_FOUND';
      readonly kind: NotFoundKind;
      readonly key: string;
    }
  | {
      readonly code: 'AMBIGUOUS_KEY';
      readonly key: string;
      readonly candidates: readonly string[];
    }
  | {
      readonly code: 'INDEX_OUT_OF_RANGE';
      readonly index: number;
      readonly available: number;
    }
  | {
      readonly code: 'MALFORMED_RECORD';
      readonly source: string;
      readonly reason: string;
      readonly line?: number | undefined;
    }
  | {
      readonly code: 'MISCONFIGURED';
      readonly field: string;
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_ARGUMENT';
      readonly field: string;
      readonly reason: string;
    }
  | {
      readonly code: 'DATABASE_ERROR';
      readonly operation: string;
      readonly reason: string;
    };

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create a NOT_FOUND error. */
export function notFound(kind: NotFoundKind, key: string): CatalogError {
  return { code: 'NOT_FOUND', kind, key } as const;
}

/** Create an AMBIGUOUS_KEY error. */
export function ambiguousKey(key: string, candidates: readonly string[]): CatalogError {
  return { code: 'AMBIGUOUS_KEY', key, candidates: Object.freeze([...candidates]) } as const;
}

/** Create an INDEX_OUT_OF_RANGE error. */
export function indexOutOfRange(index: number, available: number): CatalogError {
  return { code: 'INDEX_OUT_OF_RANGE', index, available } as const;
}

/** Create a MALFORMED_RECORD error. */
export function malformedRecord(source: string, reason: string, line?: number): CatalogError {
  return { code: 'MALFORMED_RECORD', source, reason, line } as const;
}

/** Create a MISCONFIGURED error. */
export function misconfigured(field: string, reason: string): CatalogError {
  return { code: 'MISCONFIGURED', field, reason } as const;
}

/** Create an INVALID_ARGUMENT error. */
export function invalidArgument(field: string, reason: string): CatalogError {
  return { code: 'INVALID_ARGUMENT', field, reason } as const;
}

/** Create a DATABASE_ERROR error. */
export function databaseError(operation: string, reason: string): CatalogError {
  return { code: 'DATABASE_ERROR', operation, reason } as const;
}

/** Wrap an unknown thrown value as a DATABASE_ERROR for `operation`. */
export function fromThrown(operation: string, err: unknown): CatalogError {
  if (err instanceof CatalogStreamError) {
    return err.error;
  }
  return databaseError(operation, err instanceof Error ? err.message : String(err));
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Render a human-readable message for an error. */
export function formatError(error: CatalogError): string {
  switch (error.code) {
    case 'NOT_FOUND':
      return `No ${error.kind} found for key ${JSON.stringify(error.key)}`;
    case 'AMBIGUOUS_KEY':
      return (
        `Multiple matches to partial uid ${JSON.stringify(error.key)}. ` +
        `Up to ${String(error.candidates.length)} listed here:\n` +
        error.candidates.join('\n')
      );
    case 'INDEX_OUT_OF_RANGE':
      return `Index ${String(error.index)} is out of range: catalog only contains ${String(error.available)} runs.`;
    case 'MALFORMED_RECORD':
      return error.line !== undefined
        ? `Malformed record in ${error.source} at line ${String(error.line)}: ${error.reason}`
        : `Malformed record in ${error.source}: ${error.reason}`;
    case 'MISCONFIGURED':
      return `Misconfigured ${error.field}: ${error.reason}`;
    case 'INVALID_ARGUMENT':
      return `Invalid ${error.field}: ${error.reason}`;
    case 'DATABASE_ERROR':
      return `${error.operation} failed: ${error.reason}`;
  }
}

/**
 * Thrown from inside lazy record streams, where a `Result` cannot be
 * returned. Carries the structured error.
 */
export class CatalogStreamError extends Error {
  readonly error: CatalogError;

  constructor(error: CatalogError) {
    super(formatError(error));
    this.name = 'CatalogStreamError';
    this.error = error;
  }
}
