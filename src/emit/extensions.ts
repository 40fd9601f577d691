import type { EntitySearchSpec } from '../types.js';
import type { FragmentPlan, PredicateArtifact } from '../compilers/predicate.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import type { GeneratedFile } from './writer.js';
import { header, literal, lowerFirst, modulePath, render, RUNTIME_PACKAGE } from './writer.js';

function fragmentCall(step: FragmentPlan): string {
  switch (step.kind) {
    case 'memberOf': {
      const keyType = step.keyType === 'text' ? '' : `, ${literal(step.keyType)}`;
      return `fragments.memberOf(q, ${literal(step.path)}, filter.${step.field}${keyType})`;
    }
    case 'bounds':
      return `fragments.atMost(fragments.atLeast(q, ${literal(step.path)}, filter.${step.minField}), ${literal(step.path)}, filter.${step.maxField})`;
    case 'equalTo':
      return `fragments.equalTo(q, ${literal(step.path)}, filter.${step.field})`;
    case 'withinRadius':
      return `fragments.withinRadius(q, ${literal(step.path)}, filter.${step.latitudeField}, filter.${step.longitudeField}, filter.${step.radiusField})`;
    case 'fullText':
      return `fragments.fullText(q, filter.${step.field}, fullTextResolution, fullTextFields)`;
    case 'sortBy':
      return `fragments.sortBy(q, filter.${step.field}, filter.${step.descendingField}, sortableFields)`;
  }
}

export function emitSearchExtensions(
  spec: EntitySearchSpec,
  predicate: PredicateArtifact,
  resolution: FullTextResolution | null,
): GeneratedFile {
  const entity = spec.entityName;
  const includesName = `${lowerFirst(entity)}RequiredIncludes`;
  const fullText = predicate.plan.find((s) => s.kind === 'fullText');
  const sort = predicate.plan.find((s) => s.kind === 'sortBy');

  const typeImports = ['SearchQuery'];
  if (fullText !== undefined) typeImports.unshift('FullTextFieldRef', 'FullTextResolution');

  const lines = [
    ...header(spec, resolution),
    `import { fragments } from ${literal(RUNTIME_PACKAGE)};`,
    `import type { ${typeImports.join(', ')} } from ${literal(RUNTIME_PACKAGE)};`,
    `import type { ${spec.filterName} } from ${literal(`./${spec.filterName}.js`)};`,
    '',
    `/** Navigation roots ${entity} search reads through; included on every filtered query. */`,
    `export const ${includesName}: readonly string[] = ${literal(predicate.requiredIncludes)};`,
    '',
  ];

  if (fullText !== undefined && fullText.kind === 'fullText') {
    lines.push(
      `const fullTextResolution: FullTextResolution = ${literal(fullText.resolution)};`,
      `const fullTextFields: readonly FullTextFieldRef[] = ${literal(fullText.fields)};`,
      '',
    );
  }
  if (sort !== undefined && sort.kind === 'sortBy') {
    lines.push(`const sortableFields: readonly string[] = ${literal(sort.sortable)};`, '');
  }

  lines.push(
    `/** Applies a ${spec.filterName} to a ${entity} query. A null or undefined filter returns the query unchanged. */`,
    `export function apply${entity}Search<T extends object>(`,
    '  query: SearchQuery<T>,',
    `  filter: ${spec.filterName} | null | undefined,`,
    '): SearchQuery<T> {',
    '  if (filter === null || filter === undefined) return query;',
    '  let q = query;',
    `  for (const root of ${includesName}) q = fragments.include(q, root);`,
    ...predicate.plan.map((step) => `  q = ${fragmentCall(step)};`),
    '  return q;',
    '}',
  );

  return { path: modulePath(spec, `${entity}SearchExtensions`), contents: render(lines) };
}
