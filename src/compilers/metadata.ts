import type { EntitySearchSpec, FacetKind, FacetOrder, FacetSpec } from '../types.js';

/** Static description of one facet, for UIs that render facet panels. */
export interface FacetDescriptor {
  readonly propertyName: string;
  readonly displayName: string;
  readonly kind: FacetKind;
  readonly isHierarchical: boolean;
  readonly orderBy: FacetOrder;
  readonly limit: number;
  readonly dependsOn?: string;
  readonly rangeIntervals?: string;
  readonly navigationPath?: string;
}

export function describeFacet(facet: FacetSpec): FacetDescriptor {
  const descriptor: {
    -readonly [K in keyof FacetDescriptor]: FacetDescriptor[K];
  } = {
    propertyName: facet.propertyName,
    displayName: facet.displayName,
    kind: facet.kind,
    isHierarchical: facet.isHierarchical,
    orderBy: facet.orderBy,
    limit: facet.limit,
  };
  if (facet.dependsOn !== null) descriptor.dependsOn = facet.dependsOn;
  if (facet.rangeIntervals !== null) descriptor.rangeIntervals = facet.rangeIntervals;
  if (facet.navigationPath !== null) descriptor.navigationPath = facet.navigationPath;
  return Object.freeze(descriptor);
}

/** Frozen catalog in declaration order; null when metadata is disabled. */
export function compileMetadata(spec: EntitySearchSpec): readonly FacetDescriptor[] | null {
  if (!spec.generateMetadata) return null;
  return Object.freeze(spec.facets.map(describeFacet));
}
