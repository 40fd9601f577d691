import type { EntitySearchSpec } from '../types.js';
import type { AggregationArtifact, AggregationPlan } from '../compilers/aggregation.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import type { GeneratedFile } from './writer.js';
import { header, literal, modulePath, render, RUNTIME_PACKAGE } from './writer.js';

const HELPER = { counts: 'aggregateCounts', range: 'aggregateRange', boolean: 'aggregateBoolean' } as const;
const RESULT = { counts: 'CountsAggregate', range: 'RangeAggregate', boolean: 'BooleanAggregate' } as const;

function call(plan: AggregationPlan): string {
  if (plan.kind === 'counts') {
    return `aggregateCounts(candidates, ${literal(plan.path)}, ${literal({ orderBy: plan.orderBy, limit: plan.limit })})`;
  }
  return `${HELPER[plan.kind]}(candidates, ${literal(plan.path)})`;
}

export function emitAggregations(
  spec: EntitySearchSpec,
  artifact: AggregationArtifact,
  resolution: FullTextResolution | null,
): GeneratedFile {
  const entity = spec.entityName;
  const resultName = `${entity}FacetAggregations`;
  const kinds = [...new Set(artifact.plans.map((p) => p.kind))].sort();

  const lines = [...header(spec, resolution)];
  if (kinds.length > 0) {
    lines.push(
      `import { ${kinds.map((k) => HELPER[k]).join(', ')} } from ${literal(RUNTIME_PACKAGE)};`,
      `import type { ${kinds.map((k) => RESULT[k]).join(', ')} } from ${literal(RUNTIME_PACKAGE)};`,
      '',
    );
  }

  lines.push(
    `export interface ${resultName} {`,
    ...artifact.plans.map((p) => `  readonly ${p.facet}: ${RESULT[p.kind]};`),
    '}',
    '',
    `/** Aggregates an already-filtered ${entity} candidate set. */`,
    `export function aggregate${entity}Facets(candidates: readonly object[]): ${resultName} {`,
    '  return {',
    ...artifact.plans.map((p) => `    ${p.facet}: ${call(p)},`),
    '  };',
    '}',
  );

  return { path: modulePath(spec, resultName), contents: render(lines) };
}
