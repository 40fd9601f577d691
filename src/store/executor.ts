import type pg from 'pg';
import type { EntitySearchSpec } from '../types.js';
import { facetPath } from '../types.js';
import type { SearchQuery } from '../query/builder.js';
import type { SqlTableMapping } from '../query/compiler.js';
import { compileAggregationQuery, compileCountQuery, compileSelectQuery } from '../query/compiler.js';
import { finishInProcess } from '../query/in-memory.js';
import type { AggregationArtifact, AggregationPlan } from '../compilers/aggregation.js';
import type { FacetAggregate, FacetAggregationResult } from '../query/aggregates.js';
import { orderBuckets } from '../query/aggregates.js';
import { SearchExecutionError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { SearchLogger } from '../logger.js';
import type { DbRow } from './row-mapper.js';
import { createRowMapper, toBound, toCount } from './row-mapper.js';
import { applySearchIndexes } from './indexes.js';

/** A table mapping plus the function turning its rows into entities. */
export interface SearchSource<T extends object> {
  mapping: SqlTableMapping;
  mapRow: (row: DbRow) => T;
}

/** Property paths a spec filters, searches, sorts or aggregates on. */
export function searchProperties(spec: EntitySearchSpec): string[] {
  const paths = [
    ...spec.facets.map(facetPath),
    ...spec.fullTextFields.map((f) => f.propertyName),
    ...spec.sortableFields.map((f) => f.propertyName),
  ];
  return [...new Set(paths)];
}

/**
 * Source whose entities are the mapped rows themselves. With a spec, columns
 * named after its search properties keep the properties' exact names.
 */
export function tableSource(mapping: SqlTableMapping, spec?: EntitySearchSpec): SearchSource<DbRow> {
  return { mapping, mapRow: createRowMapper(mapping, spec !== undefined ? searchProperties(spec) : []) };
}

export interface ExecutorConfig {
  pool: pg.Pool;
  logger?: SearchLogger;
  /** Page size used when toPagedResult() receives one below 1. Default 10. */
  defaultPageSize?: number;
}

export interface ResolvedExecutorConfig {
  pool: pg.Pool;
  logger: SearchLogger;
  defaultPageSize: number;
}

export function resolveExecutorConfig(config: ExecutorConfig): ResolvedExecutorConfig {
  return {
    pool: config.pool,
    logger: config.logger ?? createLogger(),
    defaultPageSize: config.defaultPageSize ?? 10,
  };
}

export interface PagedResult<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
}

/**
 * Runs search queries against PostgreSQL. Queries carrying in-process
 * filters (ClientSide full text) are fetched without LIMIT/OFFSET and
 * finished in memory.
 */
export class PostgresSearchExecutor {
  private readonly resolved: ResolvedExecutorConfig;

  constructor(config: ExecutorConfig) {
    this.resolved = resolveExecutorConfig(config);
  }

  async execute<T extends object>(query: SearchQuery<T>, source: SearchSource<T>): Promise<T[]> {
    if (query._state.inProcess.length === 0) {
      const rows = await this.run(compileSelectQuery(query, source.mapping), 'execute search');
      return rows.map(source.mapRow);
    }

    this.resolved.logger.debug(
      { table: source.mapping.table, filters: query._state.inProcess.map((f) => f.description) },
      'materialising candidate set for in-process filters',
    );
    const rows = await this.run(compileSelectQuery(query, source.mapping, { paginate: false }), 'execute search');
    return finishInProcess(query, rows.map(source.mapRow));
  }

  async count<T extends object>(query: SearchQuery<T>, source: SearchSource<T>): Promise<number> {
    if (query._state.inProcess.length > 0) {
      return (await this.execute(query.unpaged(), source)).length;
    }
    const rows = await this.run(compileCountQuery(query, source.mapping), 'count search results');
    return toCount(rows[0]?.['count']);
  }

  /** Page numbers start at 1; page < 1 becomes 1, pageSize < 1 the default page size. */
  async toPagedResult<T extends object>(
    query: SearchQuery<T>,
    source: SearchSource<T>,
    page: number,
    pageSize: number,
  ): Promise<PagedResult<T>> {
    const p = page < 1 ? 1 : Math.trunc(page);
    const size = pageSize < 1 ? this.resolved.defaultPageSize : Math.trunc(pageSize);

    const totalCount = await this.count(query, source);
    const items = await this.execute(query.paginate(p, size), source);
    const totalPages = Math.ceil(totalCount / size);

    return {
      items,
      totalCount,
      page: p,
      pageSize: size,
      totalPages,
      hasNextPage: p < totalPages,
      hasPreviousPage: p > 1,
    };
  }

  /** Aggregates the query's full candidate set; skip/take are ignored. */
  async aggregate<T extends object>(
    query: SearchQuery<T>,
    artifact: AggregationArtifact,
    source: SearchSource<T>,
  ): Promise<FacetAggregationResult> {
    const candidates = query.unpaged();
    if (candidates._state.inProcess.length > 0) {
      return artifact.aggregate(await this.execute(candidates, source));
    }

    const result: Record<string, FacetAggregate> = {};
    for (const plan of artifact.plans) {
      const rows = await this.run(
        compileAggregationQuery(plan, candidates, source.mapping),
        `aggregate facet "${plan.facet}"`,
      );
      result[plan.facet] = readAggregate(plan, rows);
    }
    return Object.freeze(result);
  }

  /** Creates the search indexes for an entity; see compileSearchIndexes(). */
  async applyIndexes(spec: EntitySearchSpec, mapping: SqlTableMapping): Promise<void> {
    const client = await this.resolved.pool.connect();
    try {
      await applySearchIndexes(client, spec, mapping);
    } catch (err) {
      throw new SearchExecutionError(`Failed to apply search indexes for ${spec.entityName}: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.resolved.pool.end();
  }

  private async run(compiled: { sql: string; params: unknown[] }, action: string): Promise<DbRow[]> {
    this.resolved.logger.debug({ sql: compiled.sql, params: compiled.params.length }, action);
    let result: pg.QueryResult<DbRow>;
    try {
      result = await this.resolved.pool.query<DbRow>(compiled.sql, compiled.params);
    } catch (err) {
      throw new SearchExecutionError(`Failed to ${action}: ${String(err)}`, err);
    }
    return result.rows;
  }
}

function readAggregate(plan: AggregationPlan, rows: readonly DbRow[]): FacetAggregate {
  switch (plan.kind) {
    case 'counts': {
      // re-ordered by code unit; the database collation may order ties differently
      const buckets = rows.map((row) => [String(row['value']), toCount(row['count'])] as const);
      return { kind: 'counts', counts: orderBuckets(buckets, plan) };
    }
    case 'range': {
      const row = rows[0];
      return {
        kind: 'range',
        min: toBound(row?.['min'], plan.valueType),
        max: toBound(row?.['max'], plan.valueType),
      };
    }
    case 'boolean': {
      const row = rows[0];
      return { kind: 'boolean', trueCount: toCount(row?.['true_count']), falseCount: toCount(row?.['false_count']) };
    }
  }
}
