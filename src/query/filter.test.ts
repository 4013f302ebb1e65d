/**
 * run-catalog — Query filter tests
 */

import { describe, it, expect } from 'vitest';
import { andQueries, escapeRegex, getNestedValue, isEmptyQuery, matchesFilter } from './filter.js';

const start = {
  uid: 'abc123',
  time: 1_700_000_000,
  scan_id: 7,
  plan_name: 'count',
  sample: { name: 'silicon', temperature: 300 },
  tags: ['calibration'],
};

describe('matchesFilter', () => {
  it('matches everything with the empty query', () => {
    expect(matchesFilter(start, {})).toBe(true);
  });

  it('uses implicit equality and dot paths', () => {
    expect(matchesFilter(start, { plan_name: 'count' })).toBe(true);
    expect(matchesFilter(start, { 'sample.name': 'silicon' })).toBe(true);
    expect(matchesFilter(start, { 'sample.name': 'gold' })).toBe(false);
    expect(matchesFilter(start, { 'sample.missing.deep': 'x' })).toBe(false);
  });

  it('compares numbers and strings of the same type only', () => {
    expect(matchesFilter(start, { scan_id: { $gt: 5, $lte: 7 } })).toBe(true);
    expect(matchesFilter(start, { scan_id: { $lt: 7 } })).toBe(false);
    expect(matchesFilter(start, { scan_id: { $gte: '5' } })).toBe(false);
    expect(matchesFilter(start, { plan_name: { $gt: 'a' } })).toBe(true);
  });

  it('supports $in, $nin, $ne and $exists', () => {
    expect(matchesFilter(start, { scan_id: { $in: [1, 7] } })).toBe(true);
    expect(matchesFilter(start, { scan_id: { $nin: [1, 7] } })).toBe(false);
    expect(matchesFilter(start, { plan_name: { $ne: 'scan' } })).toBe(true);
    expect(matchesFilter(start, { operator: { $exists: false } })).toBe(true);
    expect(matchesFilter(start, { sample: { $exists: true } })).toBe(true);
  });

  it('supports $regex strings and RegExp conditions', () => {
    expect(matchesFilter(start, { uid: { $regex: '^abc' } })).toBe(true);
    expect(matchesFilter(start, { uid: /^xyz/ })).toBe(false);
    expect(matchesFilter(start, { scan_id: { $regex: '7' } })).toBe(false);
  });

  it('supports $not over an operator or a value', () => {
    expect(matchesFilter(start, { scan_id: { $not: { $gt: 10 } } })).toBe(true);
    expect(matchesFilter(start, { plan_name: { $not: 'count' } })).toBe(false);
  });

  it('combines sub-queries with $and and $or', () => {
    expect(matchesFilter(start, { $and: [{ scan_id: 7 }, { plan_name: 'count' }] })).toBe(true);
    expect(matchesFilter(start, { $and: [{ scan_id: 7 }, { plan_name: 'scan' }] })).toBe(false);
    expect(matchesFilter(start, { $or: [{ scan_id: 1 }, { plan_name: 'count' }] })).toBe(true);
    expect(matchesFilter(start, { $or: [] })).toBe(false);
  });
});

describe('query helpers', () => {
  it('reads nested values', () => {
    expect(getNestedValue(start, 'sample.temperature')).toBe(300);
    expect(getNestedValue(start, 'plan_name.length')).toBeUndefined();
  });

  it('AND-composes queries, dropping empty ones', () => {
    expect(andQueries({}, { scan_id: 1 })).toEqual({ scan_id: 1 });
    expect(andQueries({ scan_id: 1 }, {})).toEqual({ scan_id: 1 });
    expect(andQueries({ a: 1 }, { b: 2 })).toEqual({ $and: [{ a: 1 }, { b: 2 }] });
    expect(isEmptyQuery({})).toBe(true);
  });

  it('escapes regular expression syntax', () => {
    expect(escapeRegex('a.b*c')).toBe('a\\.b\\*c');
    expect(new RegExp(`^${escapeRegex('1+1')}`).test('1+1=2')).toBe(true);
  });
});
