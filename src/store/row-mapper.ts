import type { PropertyType } from '../types.js';
import type { SqlTableMapping } from '../query/compiler.js';
import { snakeCase } from '../query/compiler.js';
import type { AggregateBound } from '../query/aggregates.js';

export type DbRow = Record<string, unknown>;

export function camelCase(column: string): string {
  return column.replace(/_([a-z0-9])/g, (_match: string, ch: string) => ch.toUpperCase());
}

function invert(columns: Readonly<Record<string, string>> | undefined): Map<string, string> {
  const inverted = new Map<string, string>();
  for (const [property, column] of Object.entries(columns ?? {})) inverted.set(column, property);
  return inverted;
}

function isRecord(value: unknown): value is DbRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function renameKeys(row: DbRow, properties: Map<string, string>): DbRow {
  const entity: DbRow = {};
  for (const [column, value] of Object.entries(row)) {
    entity[properties.get(column) ?? camelCase(column)] = value;
  }
  return entity;
}

function addProperty(lookup: Map<string, string>, property: string): void {
  const column = snakeCase(property);
  if (!lookup.has(column)) lookup.set(column, property);
}

/**
 * Maps a row from compileSelectQuery() back to property names: mapped
 * columns by their mapping, columns named after one of `properties` by that
 * property, the rest camelCased. Included navigation roots arrive as jsonb
 * (pg parses them) and are renamed the same way; a dotted property
 * `Root.Name` names the `Name` key of root `Root`.
 */
export function createRowMapper(
  mapping: SqlTableMapping,
  properties: readonly string[] = [],
): (row: DbRow) => DbRow {
  const base = invert(mapping.columns);
  const relations = new Map(
    Object.entries(mapping.relations ?? {}).map(([root, relation]) => [root, invert(relation.columns)] as const),
  );
  for (const property of properties) {
    const dot = property.indexOf('.');
    if (dot < 0) {
      addProperty(base, property);
      continue;
    }
    const nested = relations.get(property.slice(0, dot));
    const rest = property.slice(dot + 1);
    if (nested !== undefined && !rest.includes('.')) addProperty(nested, rest);
  }

  return (row) => {
    const entity: DbRow = {};
    for (const [column, value] of Object.entries(row)) {
      const nested = relations.get(column);
      if (nested !== undefined) {
        entity[column] = isRecord(value) ? renameKeys(value, nested) : null;
      } else {
        entity[base.get(column) ?? camelCase(column)] = value;
      }
    }
    return entity;
  };
}

/** pg returns COUNT(*) (int8) as a string. */
export function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' || typeof value === 'bigint') return Number(value);
  return 0;
}

/** pg returns int8 and numeric as strings; converts them back to numbers for numeric facets. */
export function toBound(value: unknown, valueType: PropertyType): AggregateBound {
  if (value === null || value === undefined) return null;
  if (value instanceof Date || typeof value === 'number' || typeof value === 'bigint') return value;
  if (typeof value !== 'string') return String(value);

  if (valueType === 'integer') {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : BigInt(value);
  }
  if (valueType === 'decimal' || valueType === 'float') {
    const n = Number(value);
    return Number.isNaN(n) ? value : n;
  }
  return value;
}
