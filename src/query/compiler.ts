import type { OrderTerm, PredicateNode, ProviderPrimitive, ValueKeyType } from './types.js';
import type { SearchQuery } from './builder.js';
import type { AggregationPlan } from '../compilers/aggregation.js';
import { SqlCompileError } from '../errors.js';
import { likePatternFor } from '../fulltext/patterns.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface SqlRelationMapping {
  table: string;
  /** Column on the entity table holding the key. */
  localColumn: string;
  /** Column on the related table the key refers to. */
  foreignColumn: string;
  /** Property path (below the root) → column; unmapped paths are snake_cased. */
  columns?: Readonly<Record<string, string>>;
}

/**
 * Where an entity lives in PostgreSQL. Property names without an entry in
 * `columns` map to their snake_case form; navigation roots must be listed in
 * `relations` to be filtered on or included.
 */
export interface SqlTableMapping {
  table: string;
  columns?: Readonly<Record<string, string>>;
  relations?: Readonly<Record<string, SqlRelationMapping>>;
}

interface SqlContext {
  readonly mapping: SqlTableMapping;
  readonly includes: readonly string[];
  readonly params: unknown[];
  readonly counter: { n: number };
}

const BASE_ALIAS = 'e';
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const EARTH_RADIUS_KM = 6371;

/** `releasedAt` → `released_at`, `HTTPStatus` → `http_status`. */
export function snakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

function identifier(name: string): string {
  if (!IDENTIFIER.test(name)) throw new SqlCompileError(`invalid SQL identifier "${name}"`);
  return name;
}

function tableName(name: string): string {
  if (!TABLE_NAME.test(name)) throw new SqlCompileError(`invalid SQL table name "${name}"`);
  return name;
}

function relationAlias(root: string): string {
  return identifier(`j_${snakeCase(root)}`);
}

function relationFor(mapping: SqlTableMapping, root: string): SqlRelationMapping {
  const relation = mapping.relations?.[root];
  if (relation === undefined) {
    throw new SqlCompileError(`navigation "${root}" has no relation mapping on table "${mapping.table}"`);
  }
  return relation;
}

export interface ResolvedColumn {
  /** Navigation root the column is reached through; null for the entity table. */
  root: string | null;
  table: string;
  column: string;
}

/** Resolves a property path to its table and column, appending `suffix` to the column name. */
export function resolveColumn(mapping: SqlTableMapping, path: string, suffix = ''): ResolvedColumn {
  const dot = path.indexOf('.');
  if (dot < 0) {
    const column = mapping.columns?.[path] ?? snakeCase(path);
    return { root: null, table: tableName(mapping.table), column: identifier(column + suffix) };
  }

  const root = path.slice(0, dot);
  const rest = path.slice(dot + 1);
  const relation = relationFor(mapping, root);
  const column = relation.columns?.[rest] ?? snakeCase(rest.replaceAll('.', '_'));
  return { root, table: tableName(relation.table), column: identifier(column + suffix) };
}

function columnRef(path: string, ctx: SqlContext, suffix = ''): string {
  const resolved = resolveColumn(ctx.mapping, path, suffix);
  if (resolved.root === null) return `${BASE_ALIAS}.${resolved.column}`;
  if (!ctx.includes.includes(resolved.root)) {
    throw new SqlCompileError(`navigation "${resolved.root}" is referenced but not included in the query`);
  }
  return `${relationAlias(resolved.root)}.${resolved.column}`;
}

function param(value: unknown, ctx: SqlContext): string {
  ctx.params.push(value);
  ctx.counter.n += 1;
  return `$${ctx.counter.n}`;
}

/**
 * Text form of a column that matches valueKey() in process: shortest float
 * text for decimals and floats, ISO-8601 UTC for timestamptz columns.
 */
export function valueKeySql(column: string, keyType: ValueKeyType = 'text'): string {
  switch (keyType) {
    case 'number':
      return `CAST(CAST(${column} AS float8) AS TEXT)`;
    case 'date':
      return `to_char(${column} AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"')`;
    case 'text':
      return `CAST(${column} AS TEXT)`;
  }
}

function compilePrimitive(primitive: ProviderPrimitive, column: string, ref: string): string {
  switch (primitive) {
    case 'freetext':
      return `to_tsvector('simple', ${column}) @@ plainto_tsquery('simple', ${ref})`;
    case 'boolean-contains':
      return `to_tsvector('simple', ${column}) @@ websearch_to_tsquery('simple', ${ref})`;
    case 'ilike':
      return `${column} ILIKE ${ref}`;
  }
}

/**
 * Compiles a predicate node into a SQL condition and appends parameters.
 * Uses a shared counter object so recursive calls share the same sequence.
 */
function compileNode(node: PredicateNode, ctx: SqlContext): string {
  switch (node.kind) {
    case 'and':
    case 'or': {
      if (node.nodes.length === 0) return node.kind === 'and' ? 'TRUE' : 'FALSE';
      const parts = node.nodes.map((n) => compileNode(n, ctx));
      return `(${parts.join(node.kind === 'and' ? ' AND ' : ' OR ')})`;
    }
    case 'in':
      return `${valueKeySql(columnRef(node.path, ctx), node.keyType)} = ANY(${param([...node.values], ctx)})`;
    case 'compare': {
      const op = node.op === 'eq' ? '=' : node.op === 'gte' ? '>=' : '<=';
      return `${columnRef(node.path, ctx)} ${op} ${param(node.value, ctx)}`;
    }
    case 'text': {
      const column = columnRef(node.path, ctx);
      const pattern = likePatternFor(node.behavior, node.term);
      return node.caseSensitive
        ? `${column} LIKE ${param(pattern, ctx)}`
        : `LOWER(${column}) LIKE ${param(pattern.toLowerCase(), ctx)}`;
    }
    case 'like':
      return `LOWER(${columnRef(node.path, ctx)}) LIKE ${param(node.pattern, ctx)}`;
    case 'primitive':
      return compilePrimitive(node.primitive, columnRef(node.path, ctx), param(node.argument, ctx));
    case 'withinRadius': {
      const lat = columnRef(node.path, ctx, '_latitude');
      const lon = columnRef(node.path, ctx, '_longitude');
      const pLat = `${param(node.latitude, ctx)}::float8`;
      const pLon = `${param(node.longitude, ctx)}::float8`;
      const pRadius = `${param(node.radiusKm, ctx)}::float8`;
      const h =
        `POWER(SIN(RADIANS(${lat} - ${pLat}) / 2), 2) + ` +
        `COS(RADIANS(${pLat})) * COS(RADIANS(${lat})) * POWER(SIN(RADIANS(${lon} - ${pLon}) / 2), 2)`;
      return `2 * ${EARTH_RADIUS_KM} * ASIN(LEAST(1, SQRT(${h}))) <= ${pRadius}`;
    }
  }
}

function createContext<T extends object>(query: SearchQuery<T>, mapping: SqlTableMapping): SqlContext {
  return { mapping, includes: query.includes, params: [], counter: { n: 0 } };
}

function compileFrom(ctx: SqlContext): string {
  const lines = [`FROM ${tableName(ctx.mapping.table)} AS ${BASE_ALIAS}`];
  for (const root of ctx.includes) {
    const relation = relationFor(ctx.mapping, root);
    const alias = relationAlias(root);
    lines.push(
      `LEFT JOIN ${tableName(relation.table)} AS ${alias}` +
        ` ON ${alias}.${identifier(relation.foreignColumn)} = ${BASE_ALIAS}.${identifier(relation.localColumn)}`,
    );
  }
  return lines.join('\n');
}

/** WHERE clause for the query's predicate plus any extra conditions; empty when there are none. */
function compileWhere(predicate: PredicateNode | null, ctx: SqlContext, extra: readonly string[] = []): string {
  const conditions = predicate !== null ? [compileNode(predicate, ctx), ...extra] : [...extra];
  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
}

function compileOrderBy(terms: readonly OrderTerm[], ctx: SqlContext): string {
  if (terms.length === 0) return '';
  const parts = terms.map((t) => `${columnRef(t.path, ctx)} ${t.descending ? 'DESC' : 'ASC'}`);
  return `ORDER BY ${parts.join(', ')}`;
}

function assemble(lines: readonly string[]): string {
  return lines.filter((line) => line !== '').join('\n');
}

/** Compiles a predicate on its own; exposed for callers embedding it in larger statements. */
export function compilePredicateSql(
  predicate: PredicateNode,
  mapping: SqlTableMapping,
  includes: readonly string[] = [],
  paramOffset = 0,
): CompiledQuery {
  const ctx: SqlContext = { mapping, includes, params: [], counter: { n: paramOffset } };
  return { sql: compileNode(predicate, ctx), params: ctx.params };
}

export interface SelectOptions {
  /** Emit LIMIT/OFFSET for the query's skip/take. Default true. */
  paginate?: boolean;
}

/**
 * SELECT of the entity row and, per included navigation root, the related
 * row as jsonb under the root's name.
 */
export function compileSelectQuery<T extends object>(
  query: SearchQuery<T>,
  mapping: SqlTableMapping,
  options: SelectOptions = {},
): CompiledQuery {
  const ctx = createContext(query, mapping);
  const { predicate, orderBy, skip, take } = query._state;

  const columns = [`${BASE_ALIAS}.*`, ...ctx.includes.map((root) => `to_jsonb(${relationAlias(root)}) AS "${identifier(root)}"`)];
  const from = compileFrom(ctx);
  const where = compileWhere(predicate, ctx);
  const order = compileOrderBy(orderBy, ctx);

  const paging: string[] = [];
  if (options.paginate ?? true) {
    if (take !== null) paging.push(`LIMIT ${param(take, ctx)}`);
    if (skip !== null && skip > 0) paging.push(`OFFSET ${param(skip, ctx)}`);
  }

  const sql = assemble([`SELECT ${columns.join(', ')}`, from, where, order, paging.join(' ')]);
  return { sql, params: ctx.params };
}

/** COUNT(*) of the filtered candidate set; ordering and paging are ignored. */
export function compileCountQuery<T extends object>(query: SearchQuery<T>, mapping: SqlTableMapping): CompiledQuery {
  const ctx = createContext(query, mapping);
  const from = compileFrom(ctx);
  const where = compileWhere(query.predicate, ctx);
  return { sql: assemble(['SELECT COUNT(*) AS count', from, where]), params: ctx.params };
}

/**
 * Aggregation over the query's filtered candidate set. Result columns:
 * counts → (value, count) rows; range → (min, max); boolean → (true_count, false_count).
 */
export function compileAggregationQuery<T extends object>(
  plan: AggregationPlan,
  query: SearchQuery<T>,
  mapping: SqlTableMapping,
): CompiledQuery {
  const ctx = createContext(query, mapping);
  const column = columnRef(plan.path, ctx);
  const from = compileFrom(ctx);

  switch (plan.kind) {
    case 'counts': {
      const where = compileWhere(query.predicate, ctx, [`${column} IS NOT NULL`]);
      // output aliases are not visible inside ORDER BY expressions
      const key = valueKeySql(column, plan.keyType);
      const order =
        plan.orderBy === 'Value'
          ? `ORDER BY ${key} COLLATE "C" ASC`
          : `ORDER BY COUNT(*) DESC, ${key} COLLATE "C" ASC`;
      const limit = plan.limit > 0 ? `LIMIT ${param(plan.limit, ctx)}` : '';
      const sql = assemble([
        `SELECT ${key} AS value, COUNT(*) AS count`,
        from,
        where,
        'GROUP BY 1',
        order,
        limit,
      ]);
      return { sql, params: ctx.params };
    }
    case 'range': {
      const where = compileWhere(query.predicate, ctx);
      return { sql: assemble([`SELECT MIN(${column}) AS min, MAX(${column}) AS max`, from, where]), params: ctx.params };
    }
    case 'boolean': {
      const where = compileWhere(query.predicate, ctx);
      const select =
        `SELECT COUNT(*) FILTER (WHERE ${column} = TRUE) AS true_count, ` +
        `COUNT(*) FILTER (WHERE ${column} = FALSE) AS false_count`;
      return { sql: assemble([select, from, where]), params: ctx.params };
    }
  }
}
