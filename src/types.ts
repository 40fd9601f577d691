import type { ValueKeyType } from './query/types.js';

export const FACET_KINDS = ['Categorical', 'Range', 'Boolean', 'DateRange', 'Hierarchical', 'Geo'] as const;
export type FacetKind = (typeof FACET_KINDS)[number];

export const FACET_ORDERS = ['Count', 'Value', 'Relevance', 'Custom'] as const;
export type FacetOrder = (typeof FACET_ORDERS)[number];

export const RANGE_AGGREGATIONS = ['Auto', 'Custom', 'Fixed', 'None'] as const;
export type RangeAggregation = (typeof RANGE_AGGREGATIONS)[number];

export const TEXT_SEARCH_BEHAVIORS = ['Contains', 'StartsWith', 'EndsWith', 'Exact'] as const;
export type TextSearchBehavior = (typeof TEXT_SEARCH_BEHAVIORS)[number];

/**
 * How full-text fragments are rendered.
 *
 * - `PatternMatch`: per-field behavior with case folding (default).
 * - `Like`: case-insensitive LIKE pattern, works on any SQL provider.
 * - `FreeText`: natural-language match (`freetext` capability).
 * - `BooleanContains`: boolean-operator match on a quoted term (`boolean-contains` capability).
 * - `PostgresILike`: ILIKE pattern (`ilike` capability).
 * - `ClientSide`: evaluated in process after materialisation.
 */
export const FULL_TEXT_STRATEGIES = [
  'PatternMatch',
  'Like',
  'FreeText',
  'BooleanContains',
  'PostgresILike',
  'ClientSide',
] as const;
export type FullTextStrategy = (typeof FULL_TEXT_STRATEGIES)[number];

export const PROPERTY_TYPES = ['integer', 'decimal', 'float', 'boolean', 'date', 'string', 'reference'] as const;
export type PropertyType = (typeof PROPERTY_TYPES)[number];

export interface FacetSpec {
  readonly propertyName: string;
  readonly propertyType: PropertyType;
  /** Type of the filtered value; differs from propertyType only for navigation facets. */
  readonly valueType: PropertyType;
  readonly kind: FacetKind;
  readonly displayName: string;
  readonly orderBy: FacetOrder;
  readonly limit: number;
  readonly dependsOn: string | null;
  readonly isHierarchical: boolean;
  readonly rangeAggregation: RangeAggregation;
  readonly rangeIntervals: string | null;
  readonly navigationPath: string | null;
  readonly autoInclude: boolean;
}

export interface FullTextFieldSpec {
  readonly propertyName: string;
  readonly propertyType: PropertyType;
  readonly weight: number;
  readonly caseSensitive: boolean;
  readonly behavior: TextSearchBehavior;
}

export interface SortableFieldSpec {
  readonly propertyName: string;
  readonly sortable: boolean;
}

export interface EntitySearchSpec {
  readonly entityName: string;
  readonly namespaceHint: string;
  readonly filterName: string;
  readonly generateAggregations: boolean;
  readonly generateMetadata: boolean;
  readonly fullTextStrategy: FullTextStrategy;
  readonly facets: readonly FacetSpec[];
  readonly fullTextFields: readonly FullTextFieldSpec[];
  readonly sortableFields: readonly SortableFieldSpec[];
}

/** Membership key form of a facet's values, matched by both providers. */
export function facetKeyType(facet: FacetSpec): ValueKeyType {
  switch (facet.valueType) {
    case 'decimal':
    case 'float':
      return 'number';
    case 'date':
      return 'date';
    case 'integer':
    case 'boolean':
    case 'string':
    case 'reference':
      return 'text';
  }
}

/** Path a facet's predicate and aggregation read from. */
export function facetPath(facet: FacetSpec): string {
  return facet.navigationPath ?? facet.propertyName;
}
