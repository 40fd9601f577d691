import type { TextSearchBehavior } from '../types.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import { isBlank, escapeLikePattern, likePatternFor, matchesText, quoteBooleanTerm } from '../fulltext/patterns.js';
import type { SearchQuery } from './builder.js';
import type { PredicateNode, ScalarValue, ValueKeyType } from './types.js';
import { readPath } from './evaluator.js';

// Conditional fragments shared by compiled predicates and emitted source.
// Each one returns the query unchanged when its filter value is absent.

export interface FullTextFieldRef {
  readonly path: string;
  readonly behavior: TextSearchBehavior;
  readonly caseSensitive: boolean;
}

function isPresent<V>(value: V | null | undefined): value is V {
  return value !== null && value !== undefined;
}

/** Membership in the supplied set. An empty set is treated as absent. */
export function memberOf<T extends object>(
  query: SearchQuery<T>,
  path: string,
  values: readonly string[] | null | undefined,
  keyType: ValueKeyType = 'text',
): SearchQuery<T> {
  if (!isPresent(values) || values.length === 0) return query;
  if (keyType === 'text') return query.where({ kind: 'in', path, values: [...values] });
  return query.where({ kind: 'in', path, values: [...values], keyType });
}

export function atLeast<T extends object>(
  query: SearchQuery<T>,
  path: string,
  bound: ScalarValue | null | undefined,
): SearchQuery<T> {
  if (!isPresent(bound)) return query;
  return query.where({ kind: 'compare', path, op: 'gte', value: bound });
}

export function atMost<T extends object>(
  query: SearchQuery<T>,
  path: string,
  bound: ScalarValue | null | undefined,
): SearchQuery<T> {
  if (!isPresent(bound)) return query;
  return query.where({ kind: 'compare', path, op: 'lte', value: bound });
}

export function equalTo<T extends object>(
  query: SearchQuery<T>,
  path: string,
  value: ScalarValue | null | undefined,
): SearchQuery<T> {
  if (!isPresent(value)) return query;
  return query.where({ kind: 'compare', path, op: 'eq', value });
}

/** Applied only when latitude, longitude and radius are all supplied. */
export function withinRadius<T extends object>(
  query: SearchQuery<T>,
  path: string,
  latitude: number | null | undefined,
  longitude: number | null | undefined,
  radiusKm: number | null | undefined,
): SearchQuery<T> {
  if (!isPresent(latitude) || !isPresent(longitude) || !isPresent(radiusKm)) return query;
  return query.where({ kind: 'withinRadius', path, latitude, longitude, radiusKm });
}

function fieldNode(resolution: FullTextResolution, field: FullTextFieldRef, term: string): PredicateNode {
  switch (resolution.mode) {
    case 'like':
      return { kind: 'like', path: field.path, pattern: likePatternFor(field.behavior, term).toLowerCase() };
    case 'primitive': {
      const argument =
        resolution.primitive === 'ilike'
          ? `%${escapeLikePattern(term)}%`
          : resolution.primitive === 'boolean-contains'
            ? quoteBooleanTerm(term)
            : term;
      return { kind: 'primitive', primitive: resolution.primitive, path: field.path, argument };
    }
    case 'pattern-match':
    case 'client-side':
      return {
        kind: 'text',
        path: field.path,
        behavior: field.behavior,
        term,
        caseSensitive: field.caseSensitive,
      };
  }
}

/**
 * One fragment for all full-text fields, ORed. A blank term disables it
 * regardless of the field count.
 */
export function fullText<T extends object>(
  query: SearchQuery<T>,
  term: string | null | undefined,
  resolution: FullTextResolution,
  fields: readonly FullTextFieldRef[],
): SearchQuery<T> {
  if (!isPresent(term) || isBlank(term) || fields.length === 0) return query;
  const searchTerm: string = term;

  if (resolution.mode === 'client-side') {
    return query.filterInProcess({
      description: `full-text ${JSON.stringify(searchTerm)} on ${fields.map((f) => f.path).join(', ')}`,
      test: (row) => fields.some((f) => matchesText(readPath(row, f.path), f.behavior, searchTerm, f.caseSensitive)),
    });
  }

  const nodes = fields.map((f) => fieldNode(resolution, f, searchTerm));
  const [only] = nodes;
  if (nodes.length === 1 && only !== undefined) return query.where(only);
  return query.where({ kind: 'or', nodes });
}

/** Orders by a sortable field; names outside `sortable` are ignored. */
export function sortBy<T extends object>(
  query: SearchQuery<T>,
  field: string | null | undefined,
  descending: boolean | null | undefined,
  sortable: readonly string[],
): SearchQuery<T> {
  if (!isPresent(field) || !sortable.includes(field)) return query;
  return query.orderBy(field, descending ?? false);
}

export function include<T extends object>(query: SearchQuery<T>, root: string): SearchQuery<T> {
  return query.include(root);
}
