import type { EntitySearchSpec } from '../types.js';
import type { FilterSchema, FilterValueType } from '../shape/resolver.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import type { GeneratedFile } from './writer.js';
import { header, modulePath, render } from './writer.js';

function tsType(type: FilterValueType): string {
  switch (type) {
    case 'string[]':
      return 'readonly string[]';
    case 'string':
      return 'string';
    case 'integer':
    case 'decimal':
    case 'float':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'date-time':
      return 'Date';
  }
}

export function emitFilter(
  spec: EntitySearchSpec,
  schema: FilterSchema,
  resolution: FullTextResolution | null,
): GeneratedFile {
  const lines = [
    ...header(spec, resolution),
    `/** Search filter for ${spec.entityName}. Every field is optional; an absent field applies no constraint. */`,
    `export interface ${schema.name} {`,
    ...schema.fields.map((f) => `  ${f.name}?: ${tsType(f.type)}${f.nullable ? ' | null' : ''};`),
    '}',
  ];
  return { path: modulePath(spec, schema.name), contents: render(lines) };
}
