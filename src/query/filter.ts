/**
 * run-catalog — Query filter
 *
 * Mongo-style filter evaluation against run start documents.
 *
 * Supported operators:
 * - Comparison: $eq, $ne, $gt, $gte, $lt, $lte, $in, $nin, $exists, $regex, $not
 * - Logical: $and, $or
 * - Implicit $eq (`{ scan_id: 3 }`) and dot-notation paths (`'sample.name'`)
 *
 * All field conditions within a filter are ANDed together.
 */

import type { Query } from '../types.js';

/** Comparison operators accepted on a field. */
export interface ComparisonFilter {
  readonly $eq?: unknown;
  readonly $ne?: unknown;
  readonly $gt?: unknown;
  readonly $gte?: unknown;
  readonly $lt?: unknown;
  readonly $lte?: unknown;
  readonly $in?: unknown;
  readonly $nin?: unknown;
  readonly $exists?: unknown;
  readonly $regex?: unknown;
  readonly $not?: unknown;
}

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set([
  '$eq', '$ne', '$gt', '$gte', '$lt', '$lte',
  '$in', '$nin', '$exists', '$regex', '$not',
]);

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dot-notation path on a document.
 * Returns undefined if any intermediate segment is not an object.
 */
export function getNestedValue(doc: Readonly<Record<string, unknown>>, path: string): unknown {
  let current: unknown = doc;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function isComparisonFilter(value: unknown): value is ComparisonFilter {
  if (!isRecord(value) || value instanceof RegExp) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((k) => COMPARISON_OPERATORS.has(k));
}

type Ordered = number | string;

function isOrdered(value: unknown): value is Ordered {
  return typeof value === 'number' || typeof value === 'string';
}

/** Compare two values of the same primitive type; null when incomparable. */
function compare(a: unknown, b: unknown): number | null {
  if (!isOrdered(a) || !isOrdered(b) || typeof a !== typeof b) {
    return null;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function toRegExp(pattern: unknown): RegExp | null {
  if (pattern instanceof RegExp) return pattern;
  if (typeof pattern === 'string') return new RegExp(pattern);
  return null;
}

function evaluateComparison(value: unknown, filter: ComparisonFilter): boolean {
  if ('$eq' in filter && value !== filter.$eq) return false;
  if ('$ne' in filter && value === filter.$ne) return false;

  if ('$gt' in filter) {
    const c = compare(value, filter.$gt);
    if (c === null || c <= 0) return false;
  }
  if ('$gte' in filter) {
    const c = compare(value, filter.$gte);
    if (c === null || c < 0) return false;
  }
  if ('$lt' in filter) {
    const c = compare(value, filter.$lt);
    if (c === null || c >= 0) return false;
  }
  if ('$lte' in filter) {
    const c = compare(value, filter.$lte);
    if (c === null || c > 0) return false;
  }

  if ('$in' in filter) {
    if (!Array.isArray(filter.$in) || !filter.$in.includes(value)) return false;
  }
  if ('$nin' in filter) {
    if (!Array.isArray(filter.$nin) || filter.$nin.includes(value)) return false;
  }

  if ('$exists' in filter) {
    if (Boolean(filter.$exists) !== (value !== undefined)) return false;
  }

  if ('$regex' in filter) {
    const re = toRegExp(filter.$regex);
    if (re === null || typeof value !== 'string' || !re.test(value)) return false;
  }

  if ('$not' in filter) {
    const inner = filter.$not;
    if (isComparisonFilter(inner)) {
      if (evaluateComparison(value, inner)) return false;
    } else if (value === inner) {
      return false;
    }
  }

  return true;
}

function matchFieldCondition(value: unknown, condition: unknown): boolean {
  if (isComparisonFilter(condition)) {
    return evaluateComparison(value, condition);
  }
  if (condition instanceof RegExp) {
    return typeof value === 'string' && condition.test(value);
  }
  return value === condition;
}

/**
 * Check whether a document matches every condition in a query.
 *
 * `$and` and `$or` take arrays of sub-queries; an empty `$or` matches
 * nothing and an empty `$and` matches everything.
 */
export function matchesFilter(doc: Readonly<Record<string, unknown>>, query: Query): boolean {
  for (const [key, condition] of Object.entries(query)) {
    if (key === '$or') {
      if (!Array.isArray(condition) || condition.length === 0) return false;
      if (!condition.some((sub) => isRecord(sub) && matchesFilter(doc, sub))) return false;
    } else if (key === '$and') {
      if (!Array.isArray(condition)) return false;
      if (!condition.every((sub) => isRecord(sub) && matchesFilter(doc, sub))) return false;
    } else if (!matchFieldCondition(getNestedValue(doc, key), condition)) {
      return false;
    }
  }
  return true;
}

/** True for the query that matches everything. */
export function isEmptyQuery(query: Query): boolean {
  return Object.keys(query).length === 0;
}

/** AND-compose two queries, dropping empty operands. */
export function andQueries(current: Query, next: Query): Query {
  if (isEmptyQuery(current)) return next;
  if (isEmptyQuery(next)) return current;
  return { $and: [current, next] };
}

/** Escape a literal string for use inside a regular expression. */
export function escapeRegex(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
