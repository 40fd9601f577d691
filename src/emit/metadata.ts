import type { EntitySearchSpec } from '../types.js';
import type { FacetDescriptor } from '../compilers/metadata.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import type { GeneratedFile } from './writer.js';
import { header, literal, lowerFirst, modulePath, render, RUNTIME_PACKAGE } from './writer.js';

export function emitMetadata(
  spec: EntitySearchSpec,
  catalog: readonly FacetDescriptor[],
  resolution: FullTextResolution | null,
): GeneratedFile {
  const entity = spec.entityName;
  const lines = [
    ...header(spec, resolution),
    `import type { FacetDescriptor } from ${literal(RUNTIME_PACKAGE)};`,
    '',
    'const descriptors: FacetDescriptor[] = [',
    ...catalog.map((d) => `  ${literal(d)},`),
    '];',
    '',
    `/** Facets of ${entity} in declaration order. */`,
    `export const ${lowerFirst(entity)}SearchMetadata: readonly FacetDescriptor[] = Object.freeze(`,
    '  descriptors.map((d) => Object.freeze(d)),',
    ');',
  ];
  return { path: modulePath(spec, `${entity}SearchMetadata`), contents: render(lines) };
}
