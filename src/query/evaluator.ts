import { PredicateEvaluationError } from '../errors.js';
import { likeToRegExp, matchesText } from '../fulltext/patterns.js';
import type { PredicateNode } from './types.js';

const EARTH_RADIUS_KM = 6371;

/** Reads a dotted path; a null or missing segment yields undefined. */
export function readPath(row: unknown, path: string): unknown {
  let current: unknown = row;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/** String form used for set membership and grouped counts. */
export function valueKey(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

type Comparable = number | bigint | string;

function toComparable(value: unknown): Comparable | null {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'bigint' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return null;
}

function toNumber(value: Comparable, dateLike: boolean): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  const parsed = dateLike ? Date.parse(value) : Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Orders two scalar values; null when they cannot be compared (missing
 * values, or a string that does not parse as the other side's type).
 */
export function compareValues(a: unknown, b: unknown): number | null {
  const x = toComparable(a);
  const y = toComparable(b);
  if (x === null || y === null) return null;

  if (typeof x === 'string' && typeof y === 'string') return x < y ? -1 : x > y ? 1 : 0;
  if (typeof x === 'bigint' && typeof y === 'bigint') return x < y ? -1 : x > y ? 1 : 0;

  const dateLike = a instanceof Date || b instanceof Date;
  const nx = toNumber(x, dateLike);
  const ny = toNumber(y, dateLike);
  if (nx === null || ny === null) return null;
  return nx < ny ? -1 : nx > ny ? 1 : 0;
}

function readCoordinate(point: unknown, key: 'latitude' | 'longitude'): number | null {
  const v = readPath(point, key);
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

export function distanceKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const rad = Math.PI / 180;
  const dLat = (lat2 - lat1) * rad;
  const dLon = (lon2 - lon1) * rad;
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1 * rad) * Math.cos(lat2 * rad) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Evaluates a predicate against one materialised row. Provider primitives
 * have no in-process meaning and raise PredicateEvaluationError.
 */
export function evaluatePredicate(node: PredicateNode, row: unknown): boolean {
  switch (node.kind) {
    case 'and':
      return node.nodes.every((n) => evaluatePredicate(n, row));
    case 'or':
      return node.nodes.some((n) => evaluatePredicate(n, row));
    case 'in': {
      const value = readPath(row, node.path);
      return value !== null && value !== undefined && node.values.includes(valueKey(value));
    }
    case 'compare': {
      const cmp = compareValues(readPath(row, node.path), node.value);
      if (cmp === null) return false;
      if (node.op === 'eq') return cmp === 0;
      return node.op === 'gte' ? cmp >= 0 : cmp <= 0;
    }
    case 'text':
      return matchesText(readPath(row, node.path), node.behavior, node.term, node.caseSensitive);
    case 'like': {
      const value = readPath(row, node.path);
      return value !== null && value !== undefined && likeToRegExp(node.pattern).test(String(value));
    }
    case 'withinRadius': {
      const point = readPath(row, node.path);
      const lat = readCoordinate(point, 'latitude');
      const lon = readCoordinate(point, 'longitude');
      if (lat === null || lon === null) return false;
      return distanceKm(node.latitude, node.longitude, lat, lon) <= node.radiusKm;
    }
    case 'primitive':
      throw new PredicateEvaluationError(
        `provider primitive "${node.primitive}" on "${node.path}" cannot be evaluated in process`,
      );
  }
}
