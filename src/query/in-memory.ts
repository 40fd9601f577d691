import type { SearchQuery } from './builder.js';
import type { OrderTerm } from './types.js';
import { compareValues, evaluatePredicate, readPath } from './evaluator.js';

function isMissing(value: unknown): boolean {
  return value === null || value === undefined;
}

/** NULLS LAST ascending, NULLS FIRST descending: the PostgreSQL defaults. */
function compareRows(a: unknown, b: unknown, terms: readonly OrderTerm[]): number {
  for (const term of terms) {
    const va = readPath(a, term.path);
    const vb = readPath(b, term.path);
    let cmp: number;
    if (isMissing(va) || isMissing(vb)) {
      cmp = isMissing(va) === isMissing(vb) ? 0 : isMissing(va) ? 1 : -1;
    } else {
      cmp = compareValues(va, vb) ?? 0;
    }
    if (cmp !== 0) return term.descending ? -cmp : cmp;
  }
  return 0;
}

/** Applies predicate and in-process filters only; no ordering or paging. */
export function filterInMemory<T extends object>(query: SearchQuery<T>, rows: readonly T[]): T[] {
  const { predicate, inProcess } = query._state;
  return rows.filter(
    (row) => (predicate === null || evaluatePredicate(predicate, row)) && inProcess.every((f) => f.test(row)),
  );
}

function page<T>(rows: T[], skip: number | null, take: number | null): T[] {
  const start = skip ?? 0;
  const end = take !== null ? start + take : undefined;
  return rows.slice(start, end);
}

/**
 * Runs a query over an in-memory candidate set: predicate, in-process
 * filters, ordering (stable), then skip/take.
 */
export function runInMemory<T extends object>(query: SearchQuery<T>, rows: readonly T[]): T[] {
  const { orderBy, skip, take } = query._state;
  let result = filterInMemory(query, rows);

  if (orderBy.length > 0) {
    result = result
      .map((row, index) => ({ row, index }))
      .sort((a, b) => compareRows(a.row, b.row, orderBy) || a.index - b.index)
      .map((entry) => entry.row);
  }

  return page(result, skip, take);
}

/**
 * Finishes rows a provider already filtered and ordered: in-process filters,
 * then skip/take.
 */
export function finishInProcess<T extends object>(query: SearchQuery<T>, rows: readonly T[]): T[] {
  const { inProcess, skip, take } = query._state;
  return page(
    rows.filter((row) => inProcess.every((f) => f.test(row))),
    skip,
    take,
  );
}

export function countInMemory<T extends object>(query: SearchQuery<T>, rows: readonly T[]): number {
  return filterInMemory(query, rows).length;
}
