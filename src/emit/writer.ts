import type { EntitySearchSpec } from '../types.js';
import type { FullTextResolution } from '../fulltext/dispatcher.js';
import { describeResolution } from '../fulltext/dispatcher.js';

export interface GeneratedFile {
  /** POSIX path relative to the output root, derived from the namespace hint. */
  path: string;
  contents: string;
}

/** Package the emitted modules import their runtime helpers from. */
export const RUNTIME_PACKAGE = 'facet-search';

export function modulePath(spec: EntitySearchSpec, moduleName: string): string {
  const dirs = spec.namespaceHint === '' ? [] : spec.namespaceHint.split('.');
  return [...dirs, `${moduleName}.ts`].join('/');
}

export function lowerFirst(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

/** Deterministic literal for strings, numbers, booleans and plain data. */
export function literal(value: unknown): string {
  return JSON.stringify(value);
}

export function header(spec: EntitySearchSpec, resolution: FullTextResolution | null): string[] {
  const strategy =
    resolution === null
      ? 'none (no full-text fields)'
      : `${spec.fullTextStrategy} -> ${describeResolution(resolution)}`;
  return [
    '// <auto-generated>',
    `//   Generated by ${RUNTIME_PACKAGE} from the ${spec.entityName} declaration. Do not edit.`,
    `//   Full-text strategy: ${strategy}`,
    '// </auto-generated>',
    '',
  ];
}

/** Joins lines with LF and ends the file with a single newline. */
export function render(lines: readonly string[]): string {
  return `${lines.join('\n').replace(/\n+$/, '')}\n`;
}
