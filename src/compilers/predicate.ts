import type { EntitySearchSpec, FacetSpec } from '../types.js';
import { facetKeyType, facetPath } from '../types.js';
import { resolveFacetShape, SEARCH_TEXT_FIELD, SORT_BY_FIELD, SORT_DESCENDING_FIELD } from '../shape/resolver.js';
import type { FilterField, FilterFieldRole, FilterValueType } from '../shape/resolver.js';
import type { FullTextResolution, FullTextStrategyDispatcher } from '../fulltext/dispatcher.js';
import type { SearchQuery } from '../query/builder.js';
import type { ScalarValue, ValueKeyType } from '../query/types.js';
import * as fragments from '../query/fragments.js';
import type { FullTextFieldRef } from '../query/fragments.js';

/** One conditional fragment of the compiled query transform, in application order. */
export type FragmentPlan =
  | {
      readonly kind: 'memberOf';
      readonly facet: string;
      readonly path: string;
      readonly field: string;
      readonly keyType: ValueKeyType;
    }
  | {
      readonly kind: 'bounds';
      readonly facet: string;
      readonly path: string;
      readonly minField: string;
      readonly maxField: string;
      /** Accepted bound type; other values are ignored. */
      readonly type: FilterValueType;
    }
  | { readonly kind: 'equalTo'; readonly facet: string; readonly path: string; readonly field: string }
  | {
      readonly kind: 'withinRadius';
      readonly facet: string;
      readonly path: string;
      readonly latitudeField: string;
      readonly longitudeField: string;
      readonly radiusField: string;
    }
  | {
      readonly kind: 'fullText';
      readonly field: string;
      readonly resolution: FullTextResolution;
      readonly fields: readonly FullTextFieldRef[];
    }
  | {
      readonly kind: 'sortBy';
      readonly field: string;
      readonly descendingField: string;
      readonly sortable: readonly string[];
    };

/** Filter values keyed by filter field name; see buildFilterSchema(). */
export type FilterValues = Readonly<Record<string, unknown>>;

export interface PredicateArtifact {
  readonly entityName: string;
  readonly plan: readonly FragmentPlan[];
  /** Navigation roots the predicate reads through; added to every filtered query. */
  readonly requiredIncludes: readonly string[];
  apply<T extends object>(query: SearchQuery<T>, filter?: FilterValues | null): SearchQuery<T>;
}

function shapeField(fields: readonly FilterField[], role: FilterFieldRole): FilterField {
  const found = fields.find((f) => f.role === role);
  if (found === undefined) {
    // resolveFacetShape() always produces the roles read below
    throw new Error(`filter shape has no "${role}" field`);
  }
  return found;
}

function fieldFor(fields: readonly FilterField[], role: FilterFieldRole): string {
  return shapeField(fields, role).name;
}

function boundsPlan(
  facet: FacetSpec,
  shape: readonly FilterField[],
  minRole: FilterFieldRole,
  maxRole: FilterFieldRole,
): FragmentPlan {
  const min = shapeField(shape, minRole);
  return {
    kind: 'bounds',
    facet: facet.propertyName,
    path: facetPath(facet),
    minField: min.name,
    maxField: fieldFor(shape, maxRole),
    type: min.type,
  };
}

function facetPlan(facet: FacetSpec): FragmentPlan {
  const shape = resolveFacetShape(facet);
  const path = facetPath(facet);
  const name = facet.propertyName;

  switch (facet.kind) {
    case 'Categorical':
    case 'Hierarchical':
      return { kind: 'memberOf', facet: name, path, field: fieldFor(shape, 'values'), keyType: facetKeyType(facet) };
    case 'Range':
      return boundsPlan(facet, shape, 'min', 'max');
    case 'DateRange':
      return boundsPlan(facet, shape, 'from', 'to');
    case 'Boolean':
      return { kind: 'equalTo', facet: name, path, field: fieldFor(shape, 'equals') };
    case 'Geo':
      return {
        kind: 'withinRadius',
        facet: name,
        path,
        latitudeField: fieldFor(shape, 'latitude'),
        longitudeField: fieldFor(shape, 'longitude'),
        radiusField: fieldFor(shape, 'radius'),
      };
  }
}

export function requiredIncludes(spec: EntitySearchSpec): string[] {
  const roots: string[] = [];
  for (const facet of spec.facets) {
    if (facet.navigationPath === null || !facet.autoInclude) continue;
    const [root] = facet.navigationPath.split('.');
    if (root !== undefined && !roots.includes(root)) roots.push(root);
  }
  return roots;
}

/** Facet fragments in declaration order, then full text, then sorting. */
export function planPredicate(spec: EntitySearchSpec, dispatcher: FullTextStrategyDispatcher): FragmentPlan[] {
  const plan = spec.facets.map(facetPlan);

  if (spec.fullTextFields.length > 0) {
    plan.push({
      kind: 'fullText',
      field: SEARCH_TEXT_FIELD,
      resolution: dispatcher.resolve(spec.fullTextStrategy),
      fields: spec.fullTextFields.map((f) => ({
        path: f.propertyName,
        behavior: f.behavior,
        caseSensitive: f.caseSensitive,
      })),
    });
  }

  const sortable = spec.sortableFields.filter((f) => f.sortable).map((f) => f.propertyName);
  if (sortable.length > 0) {
    plan.push({ kind: 'sortBy', field: SORT_BY_FIELD, descendingField: SORT_DESCENDING_FIELD, sortable });
  }

  return plan;
}

// Filter values arrive untyped; malformed values count as absent.

function readStrings(value: unknown): readonly string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return undefined;
    strings.push(item);
  }
  return strings;
}

function readDate(value: unknown): Date | undefined {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value;
  if (typeof value !== 'string') return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/** A range bound of the facet's value type; anything else counts as absent. */
function readBound(value: unknown, type: FilterValueType): ScalarValue | undefined {
  switch (type) {
    case 'integer':
      if (typeof value === 'bigint') return value;
      return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
    case 'decimal':
    case 'float':
      return readNumber(value);
    case 'date-time':
      return readDate(value);
    case 'boolean':
      return readBoolean(value);
    case 'string':
      return readString(value);
    case 'string[]':
      return undefined;
  }
}

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function applyFragment<T extends object>(query: SearchQuery<T>, step: FragmentPlan, filter: FilterValues): SearchQuery<T> {
  switch (step.kind) {
    case 'memberOf':
      return fragments.memberOf(query, step.path, readStrings(filter[step.field]), step.keyType);
    case 'bounds': {
      const lower = fragments.atLeast(query, step.path, readBound(filter[step.minField], step.type));
      return fragments.atMost(lower, step.path, readBound(filter[step.maxField], step.type));
    }
    case 'equalTo':
      return fragments.equalTo(query, step.path, readBoolean(filter[step.field]));
    case 'withinRadius':
      return fragments.withinRadius(
        query,
        step.path,
        readNumber(filter[step.latitudeField]),
        readNumber(filter[step.longitudeField]),
        readNumber(filter[step.radiusField]),
      );
    case 'fullText':
      return fragments.fullText(query, readString(filter[step.field]), step.resolution, step.fields);
    case 'sortBy':
      return fragments.sortBy(
        query,
        readString(filter[step.field]),
        readBoolean(filter[step.descendingField]),
        step.sortable,
      );
  }
}

/**
 * Compiles a spec into its query transform. The full-text strategy is
 * resolved once here; apply() itself never probes capabilities.
 */
export function compilePredicate(spec: EntitySearchSpec, dispatcher: FullTextStrategyDispatcher): PredicateArtifact {
  const plan = Object.freeze(planPredicate(spec, dispatcher));
  const includes = Object.freeze(requiredIncludes(spec));

  return Object.freeze({
    entityName: spec.entityName,
    plan,
    requiredIncludes: includes,
    apply<T extends object>(query: SearchQuery<T>, filter?: FilterValues | null): SearchQuery<T> {
      if (filter === null || filter === undefined) return query;
      let q = query;
      for (const root of includes) q = fragments.include(q, root);
      for (const step of plan) q = applyFragment(q, step, filter);
      return q;
    },
  });
}
