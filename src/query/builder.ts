import type { InProcessFilter, OrderTerm, PredicateNode, QueryState } from './types.js';

/**
 * ANDs a node onto an existing predicate, flattening into an existing
 * and-node instead of nesting.
 */
function _andPredicate(existing: PredicateNode | null, next: PredicateNode): PredicateNode {
  if (existing === null) return next;
  if (existing.kind === 'and') {
    return { kind: 'and', nodes: [...existing.nodes, next] };
  }
  return { kind: 'and', nodes: [existing, next] };
}

/**
 * Immutable candidate-set query. Every operation returns a new SearchQuery;
 * existing instances are never mutated, so one base query can be refined
 * independently by several callers.
 */
export class SearchQuery<T extends object = Record<string, unknown>> {
  constructor(readonly _state: QueryState<T>) {}

  get predicate(): PredicateNode | null {
    return this._state.predicate;
  }

  get includes(): readonly string[] {
    return this._state.includes;
  }

  /** Combine with the existing predicate using AND. */
  where(node: PredicateNode): SearchQuery<T> {
    return new SearchQuery({ ...this._state, predicate: _andPredicate(this._state.predicate, node) });
  }

  /** Eagerly associate a navigation root. Idempotent. */
  include(root: string): SearchQuery<T> {
    if (this._state.includes.includes(root)) return this;
    return new SearchQuery({ ...this._state, includes: [...this._state.includes, root] });
  }

  /** Replace any ordering with a single term. */
  orderBy(path: string, descending = false): SearchQuery<T> {
    const term: OrderTerm = { path, descending };
    return new SearchQuery({ ...this._state, orderBy: [term] });
  }

  /** Append a secondary ordering term. */
  thenBy(path: string, descending = false): SearchQuery<T> {
    const term: OrderTerm = { path, descending };
    return new SearchQuery({ ...this._state, orderBy: [...this._state.orderBy, term] });
  }

  skip(count: number): SearchQuery<T> {
    return new SearchQuery({ ...this._state, skip: Math.max(0, Math.trunc(count)) });
  }

  take(count: number): SearchQuery<T> {
    return new SearchQuery({ ...this._state, take: Math.max(0, Math.trunc(count)) });
  }

  /** Drop skip/take, keeping predicate, includes and ordering. */
  unpaged(): SearchQuery<T> {
    return new SearchQuery({ ...this._state, skip: null, take: null });
  }

  /** Page numbers start at 1; page < 1 becomes 1 and pageSize < 1 becomes 10. */
  paginate(page: number, pageSize: number): SearchQuery<T> {
    const p = page < 1 ? 1 : Math.trunc(page);
    const size = pageSize < 1 ? 10 : Math.trunc(pageSize);
    return this.skip((p - 1) * size).take(size);
  }

  /**
   * Attach a condition evaluated after the candidate set is materialised.
   * Not translated by any provider.
   */
  filterInProcess(filter: InProcessFilter<T>): SearchQuery<T> {
    return new SearchQuery({ ...this._state, inProcess: [...this._state.inProcess, filter] });
  }
}
