import type { EntitySearchSpec, FacetSpec, PropertyType } from '../types.js';

export type FilterValueType = 'string[]' | 'string' | 'integer' | 'decimal' | 'float' | 'boolean' | 'date-time';

export type FilterFieldRole =
  | 'values'
  | 'min'
  | 'max'
  | 'equals'
  | 'from'
  | 'to'
  | 'latitude'
  | 'longitude'
  | 'radius'
  | 'searchText'
  | 'sortBy'
  | 'sortDescending';

export interface FilterField {
  readonly name: string;
  readonly role: FilterFieldRole;
  readonly type: FilterValueType;
  /** Whether null is an accepted value in addition to absence. */
  readonly nullable: boolean;
  /** Facet the field constrains; null for search text and sorting fields. */
  readonly facet: string | null;
}

export interface FilterSchema {
  readonly name: string;
  readonly fields: readonly FilterField[];
}

export const SEARCH_TEXT_FIELD = 'searchText';
export const SORT_BY_FIELD = 'sortBy';
export const SORT_DESCENDING_FIELD = 'sortDescending';

function scalarType(type: PropertyType): FilterValueType {
  switch (type) {
    case 'integer':
    case 'decimal':
    case 'float':
    case 'boolean':
      return type;
    case 'date':
      return 'date-time';
    case 'string':
    case 'reference':
      return 'string';
  }
}

/** `Min` + `Price` → `MinPrice`, `min` + `price` → `minPrice`. */
function prefixed(prefix: string, name: string): string {
  const first = name.charAt(0);
  if (first !== '' && first === first.toLowerCase() && first !== first.toUpperCase()) {
    return prefix.toLowerCase() + first.toUpperCase() + name.slice(1);
  }
  return prefix + name;
}

/**
 * Maps one facet to its generated filter fields. This table is the single
 * source of truth for filter shapes: new kinds extend it, existing rows never
 * change.
 */
export function resolveFacetShape(facet: FacetSpec): readonly FilterField[] {
  const name = facet.propertyName;
  const field = (fieldName: string, role: FilterFieldRole, type: FilterValueType, nullable: boolean): FilterField => ({
    name: fieldName,
    role,
    type,
    nullable,
    facet: name,
  });

  switch (facet.kind) {
    case 'Categorical':
    case 'Hierarchical':
      return [field(name, 'values', 'string[]', false)];
    case 'Range': {
      const type = scalarType(facet.valueType);
      return [field(prefixed('Min', name), 'min', type, false), field(prefixed('Max', name), 'max', type, false)];
    }
    case 'Boolean':
      return [field(name, 'equals', 'boolean', true)];
    case 'DateRange':
      return [field(`${name}From`, 'from', 'date-time', true), field(`${name}To`, 'to', 'date-time', true)];
    case 'Geo':
      return [
        field(`${name}Latitude`, 'latitude', 'float', false),
        field(`${name}Longitude`, 'longitude', 'float', false),
        field(`${name}RadiusKm`, 'radius', 'float', true),
      ];
  }
}

/**
 * The complete filter schema of an entity: facet fields in declaration order,
 * then the search text field (when the entity has full-text fields) and the
 * sorting fields (when it has sortable fields).
 */
export function buildFilterSchema(spec: EntitySearchSpec): FilterSchema {
  const fields: FilterField[] = spec.facets.flatMap((f) => resolveFacetShape(f));

  if (spec.fullTextFields.length > 0) {
    fields.push({ name: SEARCH_TEXT_FIELD, role: 'searchText', type: 'string', nullable: true, facet: null });
  }
  if (spec.sortableFields.some((f) => f.sortable)) {
    fields.push({ name: SORT_BY_FIELD, role: 'sortBy', type: 'string', nullable: true, facet: null });
    fields.push({ name: SORT_DESCENDING_FIELD, role: 'sortDescending', type: 'boolean', nullable: true, facet: null });
  }

  return Object.freeze({ name: spec.filterName, fields: Object.freeze(fields.map((f) => Object.freeze(f))) });
}
