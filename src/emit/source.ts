import type { EntitySearchSpec } from '../types.js';
import type { FilterSchema } from '../shape/resolver.js';
import type { PredicateArtifact } from '../compilers/predicate.js';
import type { AggregationArtifact } from '../compilers/aggregation.js';
import type { FacetDescriptor } from '../compilers/metadata.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import type { GeneratedFile } from './writer.js';
import { emitFilter } from './filter.js';
import { emitSearchExtensions } from './extensions.js';
import { emitAggregations } from './aggregations.js';
import { emitMetadata } from './metadata.js';

export interface EmitInput {
  spec: EntitySearchSpec;
  schema: FilterSchema;
  predicate: PredicateArtifact;
  aggregations: AggregationArtifact | null;
  metadata: readonly FacetDescriptor[] | null;
}

export function resolutionOf(predicate: PredicateArtifact): FullTextResolution | null {
  for (const step of predicate.plan) {
    if (step.kind === 'fullText') return step.resolution;
  }
  return null;
}

/**
 * Renders a unit's artifacts as TypeScript modules: filter, search
 * extensions, then aggregations and metadata when enabled. Output depends
 * only on the input.
 */
export function emitSource(input: EmitInput): GeneratedFile[] {
  const resolution = resolutionOf(input.predicate);
  const files = [
    emitFilter(input.spec, input.schema, resolution),
    emitSearchExtensions(input.spec, input.predicate, resolution),
  ];
  if (input.aggregations !== null) files.push(emitAggregations(input.spec, input.aggregations, resolution));
  if (input.metadata !== null) files.push(emitMetadata(input.spec, input.metadata, resolution));
  return files;
}
