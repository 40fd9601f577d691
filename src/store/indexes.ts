import type pg from 'pg';
import type { EntitySearchSpec, FullTextStrategy } from '../types.js';
import { facetPath } from '../types.js';
import type { SqlTableMapping } from '../query/compiler.js';
import { resolveColumn } from '../query/compiler.js';

const MAX_IDENTIFIER_LENGTH = 63;

function indexName(table: string, columns: readonly string[], suffix = ''): string {
  return `idx_${table.replace('.', '_')}_${columns.join('_')}${suffix}`.slice(0, MAX_IDENTIFIER_LENGTH);
}

function fullTextIndex(strategy: FullTextStrategy, table: string, column: string): string | null {
  switch (strategy) {
    case 'FreeText':
    case 'BooleanContains':
      return `CREATE INDEX IF NOT EXISTS ${indexName(table, [column], '_fts')}
  ON ${table} USING GIN (to_tsvector('simple', ${column}))`;
    case 'PatternMatch':
    case 'Like':
    case 'PostgresILike':
      return `CREATE INDEX IF NOT EXISTS ${indexName(table, [column], '_lower')}
  ON ${table} (LOWER(${column}) text_pattern_ops)`;
    case 'ClientSide':
      return null;
  }
}

/**
 * Idempotent index DDL for an entity's facets and full-text fields. Facets
 * reached through a navigation are indexed on the related table. Duplicate
 * statements are emitted once.
 */
export function compileSearchIndexes(spec: EntitySearchSpec, mapping: SqlTableMapping): string[] {
  const statements: string[] = [];
  const add = (ddl: string | null): void => {
    if (ddl !== null && !statements.includes(ddl)) statements.push(ddl);
  };

  for (const facet of spec.facets) {
    const path = facetPath(facet);
    if (facet.kind === 'Geo') {
      const lat = resolveColumn(mapping, path, '_latitude');
      const lon = resolveColumn(mapping, path, '_longitude');
      add(`CREATE INDEX IF NOT EXISTS ${indexName(lat.table, [lat.column, lon.column])}
  ON ${lat.table} (${lat.column}, ${lon.column})`);
      continue;
    }
    const { table, column } = resolveColumn(mapping, path);
    add(`CREATE INDEX IF NOT EXISTS ${indexName(table, [column])}
  ON ${table} (${column})`);
  }

  for (const field of spec.fullTextFields) {
    const { table, column } = resolveColumn(mapping, field.propertyName);
    add(fullTextIndex(spec.fullTextStrategy, table, column));
  }

  return statements;
}

export async function applySearchIndexes(
  client: pg.ClientBase,
  spec: EntitySearchSpec,
  mapping: SqlTableMapping,
): Promise<void> {
  for (const ddl of compileSearchIndexes(spec, mapping)) {
    await client.query(ddl);
  }
}
