import type { TextSearchBehavior } from '../types.js';

export type ScalarValue = string | number | bigint | boolean | Date;

/** How a value is turned into its membership key; see valueKey(). */
export type ValueKeyType = 'text' | 'number' | 'date';

/** Provider functions a full-text fragment may target. */
export type ProviderPrimitive = 'freetext' | 'boolean-contains' | 'ilike';

/**
 * Provider-neutral predicate tree. Every node compiles to SQL; all but
 * `primitive` also evaluate in process.
 */
export type PredicateNode =
  | { kind: 'in'; path: string; values: readonly string[]; keyType?: ValueKeyType }
  | { kind: 'compare'; path: string; op: 'eq' | 'gte' | 'lte'; value: ScalarValue }
  | { kind: 'text'; path: string; behavior: TextSearchBehavior; term: string; caseSensitive: boolean }
  /** Case-insensitive LIKE; `pattern` is already wildcard-wrapped and backslash-escaped. */
  | { kind: 'like'; path: string; pattern: string }
  | { kind: 'primitive'; primitive: ProviderPrimitive; path: string; argument: string }
  | { kind: 'withinRadius'; path: string; latitude: number; longitude: number; radiusKm: number }
  | { kind: 'and'; nodes: readonly PredicateNode[] }
  | { kind: 'or'; nodes: readonly PredicateNode[] };

export interface OrderTerm {
  path: string;
  descending: boolean;
}

/** A condition only the host process can evaluate (ClientSide full-text). */
export interface InProcessFilter<T> {
  readonly description: string;
  readonly test: (row: T) => boolean;
}

/**
 * Opaque query value passed to apply(), runInMemory() and the executor.
 * Built exclusively via SearchQuery; do not construct directly.
 */
export interface QueryState<T> {
  readonly source: string;
  readonly predicate: PredicateNode | null;
  readonly includes: readonly string[];
  readonly orderBy: readonly OrderTerm[];
  readonly skip: number | null;
  readonly take: number | null;
  readonly inProcess: readonly InProcessFilter<T>[];
}
