import type {
  FacetKind,
  FacetOrder,
  FullTextStrategy,
  PropertyType,
  RangeAggregation,
  TextSearchBehavior,
} from '../types.js';

/** Type-level generation options. Every field falls back to a documented default. */
export interface SearchableOptions {
  /** Defaults to `{entityName}SearchFilter`. */
  readonly filterName?: string;
  /** Overrides the declaration's namespace for emitted files. */
  readonly namespace?: string;
  readonly generateAggregations?: boolean;
  readonly generateMetadata?: boolean;
  readonly fullTextStrategy?: FullTextStrategy;
}

export interface FacetAnnotation {
  readonly kind: 'facet';
  readonly type?: FacetKind;
  readonly displayName?: string;
  readonly orderBy?: FacetOrder;
  readonly limit?: number;
  readonly dependsOn?: string;
  readonly isHierarchical?: boolean;
  readonly rangeAggregation?: RangeAggregation;
  readonly rangeIntervals?: string;
  /** Dotted path through an association, e.g. `Customer.Name`. */
  readonly navigationPath?: string;
  readonly autoInclude?: boolean;
  /** Type of the path's terminal property; only read when navigationPath is set. */
  readonly valueType?: PropertyType;
}

export interface FullTextAnnotation {
  readonly kind: 'fullText';
  readonly weight?: number;
  readonly caseSensitive?: boolean;
  readonly behavior?: TextSearchBehavior;
}

export interface SortableAnnotation {
  readonly kind: 'sortable';
  readonly sortable?: boolean;
}

export type MemberAnnotation = FacetAnnotation | FullTextAnnotation | SortableAnnotation;

export interface MemberDeclaration {
  readonly name: string;
  readonly type: PropertyType;
  readonly annotations?: readonly MemberAnnotation[];
}

/**
 * One searchable domain type, as handed over by the host build integration.
 * Use defineSearchable() or parseDeclaration() to obtain validated instances.
 */
export interface EntityDeclaration {
  readonly name: string;
  readonly namespace?: string;
  readonly options?: SearchableOptions;
  readonly members: readonly MemberDeclaration[];
}
