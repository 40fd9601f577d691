import type { FacetOrder } from '../types.js';
import { compareValues, readPath, valueKey } from './evaluator.js';

export type AggregateBound = number | bigint | string | Date | null;

export interface CountsAggregate {
  readonly kind: 'counts';
  /** Iteration order is the facet's display order. */
  readonly counts: ReadonlyMap<string, number>;
}

export interface RangeAggregate {
  readonly kind: 'range';
  readonly min: AggregateBound;
  readonly max: AggregateBound;
}

export interface BooleanAggregate {
  readonly kind: 'boolean';
  readonly trueCount: number;
  readonly falseCount: number;
}

export type FacetAggregate = CountsAggregate | RangeAggregate | BooleanAggregate;

export type FacetAggregationResult = Readonly<Record<string, FacetAggregate>>;

export interface CountsOptions {
  readonly orderBy: FacetOrder;
  readonly limit: number;
}

function byValue(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * `Value` orders ascending by value; every other order is count descending
 * with ties broken by value. A positive limit truncates after ordering.
 */
export function orderBuckets(
  buckets: Iterable<readonly [string, number]>,
  options: CountsOptions,
): ReadonlyMap<string, number> {
  const entries = [...buckets];
  if (options.orderBy === 'Value') {
    entries.sort(([a], [b]) => byValue(a, b));
  } else {
    entries.sort(([va, ca], [vb, cb]) => cb - ca || byValue(va, vb));
  }
  const kept = options.limit > 0 ? entries.slice(0, options.limit) : entries;
  return new Map(kept);
}

/** Grouped counts of the non-null values at `path`. */
export function aggregateCounts(rows: readonly unknown[], path: string, options: CountsOptions): CountsAggregate {
  const tally = new Map<string, number>();
  for (const row of rows) {
    const value = readPath(row, path);
    if (value === null || value === undefined) continue;
    const key = valueKey(value);
    tally.set(key, (tally.get(key) ?? 0) + 1);
  }
  return { kind: 'counts', counts: orderBuckets(tally, options) };
}

function asBound(value: unknown): AggregateBound {
  if (
    value instanceof Date ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string'
  ) {
    return value;
  }
  return null;
}

/** (min, max) of the comparable values at `path`; (null, null) when there are none. */
export function aggregateRange(rows: readonly unknown[], path: string): RangeAggregate {
  let min: AggregateBound = null;
  let max: AggregateBound = null;
  for (const row of rows) {
    const value = asBound(readPath(row, path));
    if (value === null) continue;
    if (min === null || (compareValues(value, min) ?? 0) < 0) min = value;
    if (max === null || (compareValues(value, max) ?? 0) > 0) max = value;
  }
  return { kind: 'range', min, max };
}

export function aggregateBoolean(rows: readonly unknown[], path: string): BooleanAggregate {
  let trueCount = 0;
  let falseCount = 0;
  for (const row of rows) {
    const value = readPath(row, path);
    if (value === true) trueCount += 1;
    else if (value === false) falseCount += 1;
  }
  return { kind: 'boolean', trueCount, falseCount };
}
