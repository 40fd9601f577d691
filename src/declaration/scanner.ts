import type { PropertyType } from '../types.js';
import type {
  EntityDeclaration,
  FacetAnnotation,
  FullTextAnnotation,
  MemberAnnotation,
  SearchableOptions,
  SortableAnnotation,
} from './types.js';

export type RecognizedAnnotation = FacetAnnotation | FullTextAnnotation | SortableAnnotation;

export interface ScannedMember {
  readonly name: string;
  readonly type: PropertyType;
  readonly annotation: RecognizedAnnotation;
  /** Recognised annotations dropped because a higher-precedence one was present. */
  readonly shadowed: readonly RecognizedAnnotation[];
}

export interface ScannedDeclaration {
  readonly entityName: string;
  readonly namespace: string | null;
  readonly options: SearchableOptions;
  readonly members: readonly ScannedMember[];
}

/** facet → full-text → sortable; the first one found on a member wins. */
const PRECEDENCE: readonly MemberAnnotation['kind'][] = ['facet', 'fullText', 'sortable'];

function firstOfKind(annotations: readonly MemberAnnotation[], kind: MemberAnnotation['kind']) {
  return annotations.find((a) => a.kind === kind);
}

/**
 * Enumerates the members of one declaration that carry a recognised
 * annotation, in declaration order. Pure read: no defaults are applied here.
 */
export function scanDeclaration(declaration: EntityDeclaration): ScannedDeclaration {
  const members: ScannedMember[] = [];

  for (const member of declaration.members) {
    const annotations = member.annotations ?? [];
    const recognized: RecognizedAnnotation[] = [];
    for (const kind of PRECEDENCE) {
      const found = firstOfKind(annotations, kind);
      if (found !== undefined) recognized.push(found);
    }

    const [winner, ...shadowed] = recognized;
    if (winner === undefined) continue;

    members.push({ name: member.name, type: member.type, annotation: winner, shadowed });
  }

  return {
    entityName: declaration.name,
    namespace: declaration.namespace ?? null,
    options: declaration.options ?? {},
    members,
  };
}
