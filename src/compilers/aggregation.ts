import type { EntitySearchSpec, FacetOrder, FacetSpec, PropertyType } from '../types.js';
import { facetKeyType, facetPath } from '../types.js';
import type { ValueKeyType } from '../query/types.js';
import { aggregateBoolean, aggregateCounts, aggregateRange } from '../query/aggregates.js';
import type { FacetAggregate, FacetAggregationResult } from '../query/aggregates.js';

export type AggregationPlan =
  | {
      readonly kind: 'counts';
      readonly facet: string;
      readonly path: string;
      readonly orderBy: FacetOrder;
      readonly limit: number;
      readonly keyType: ValueKeyType;
    }
  | { readonly kind: 'range'; readonly facet: string; readonly path: string; readonly valueType: PropertyType }
  | { readonly kind: 'boolean'; readonly facet: string; readonly path: string };

export interface AggregationArtifact {
  readonly entityName: string;
  readonly plans: readonly AggregationPlan[];
  /** Aggregates an already-filtered candidate set; filters are never re-applied. */
  aggregate(candidates: readonly object[]): FacetAggregationResult;
}

export function planAggregation(facet: FacetSpec): AggregationPlan | null {
  const path = facetPath(facet);
  const name = facet.propertyName;

  switch (facet.kind) {
    case 'Categorical':
    case 'Hierarchical':
      return {
        kind: 'counts',
        facet: name,
        path,
        orderBy: facet.orderBy,
        limit: facet.limit,
        keyType: facetKeyType(facet),
      };
    case 'Range':
      if (facet.rangeAggregation === 'None') return null;
      return { kind: 'range', facet: name, path, valueType: facet.valueType };
    case 'DateRange':
      return { kind: 'range', facet: name, path, valueType: facet.valueType };
    case 'Boolean':
      return { kind: 'boolean', facet: name, path };
    case 'Geo':
      return null;
  }
}

export function runAggregation(plan: AggregationPlan, candidates: readonly object[]): FacetAggregate {
  switch (plan.kind) {
    case 'counts':
      return aggregateCounts(candidates, plan.path, plan);
    case 'range':
      return aggregateRange(candidates, plan.path);
    case 'boolean':
      return aggregateBoolean(candidates, plan.path);
  }
}

/** Null when the entity opted out of aggregations. */
export function compileAggregations(spec: EntitySearchSpec): AggregationArtifact | null {
  if (!spec.generateAggregations) return null;

  const plans: AggregationPlan[] = [];
  for (const facet of spec.facets) {
    const plan = planAggregation(facet);
    if (plan !== null) plans.push(Object.freeze(plan));
  }
  const frozen = Object.freeze(plans);

  return Object.freeze({
    entityName: spec.entityName,
    plans: frozen,
    aggregate(candidates: readonly object[]): FacetAggregationResult {
      const result: Record<string, FacetAggregate> = {};
      for (const plan of frozen) result[plan.facet] = runAggregation(plan, candidates);
      return Object.freeze(result);
    },
  });
}
