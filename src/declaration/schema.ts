import { z } from 'zod';
import {
  FACET_KINDS,
  FACET_ORDERS,
  FULL_TEXT_STRATEGIES,
  PROPERTY_TYPES,
  RANGE_AGGREGATIONS,
  TEXT_SEARCH_BEHAVIORS,
} from '../types.js';
import { DeclarationError } from '../errors.js';
import type { EntityDeclaration } from './types.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const NAVIGATION_PATH = /^[A-Za-z_$][A-Za-z0-9_$]*(\.[A-Za-z_$][A-Za-z0-9_$]*)+$/;
const NAMESPACE = /^[A-Za-z0-9_$./-]*$/;

/**
 * Accepts an enum option either by symbolic name or by ordinal and always
 * yields the symbolic name. Ordinals never leave the parser.
 */
function symbolic<T extends readonly [string, ...string[]]>(names: T) {
  return z.union([
    z.enum(names),
    z
      .number()
      .int()
      .transform((ordinal, ctx) => {
        const name: T[number] | undefined = names[ordinal];
        if (name === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `ordinal ${ordinal} is not one of ${names.join(', ')}`,
          });
          return z.NEVER;
        }
        return name;
      }),
  ]);
}

const identifier = z.string().regex(IDENTIFIER, 'must be a valid identifier');

const facetAnnotationSchema = z.object({
  kind: z.literal('facet'),
  type: symbolic(FACET_KINDS).optional(),
  displayName: z.string().optional(),
  orderBy: symbolic(FACET_ORDERS).optional(),
  limit: z.number().int().nonnegative().optional(),
  dependsOn: identifier.optional(),
  isHierarchical: z.boolean().optional(),
  rangeAggregation: symbolic(RANGE_AGGREGATIONS).optional(),
  rangeIntervals: z.string().optional(),
  navigationPath: z.string().regex(NAVIGATION_PATH, 'must be a dotted member path').optional(),
  autoInclude: z.boolean().optional(),
  valueType: z.enum(PROPERTY_TYPES).optional(),
});

const fullTextAnnotationSchema = z.object({
  kind: z.literal('fullText'),
  weight: z.number().nonnegative().optional(),
  caseSensitive: z.boolean().optional(),
  behavior: symbolic(TEXT_SEARCH_BEHAVIORS).optional(),
});

const sortableAnnotationSchema = z.object({
  kind: z.literal('sortable'),
  sortable: z.boolean().optional(),
});

export const memberDeclarationSchema = z.object({
  name: identifier,
  type: z.enum(PROPERTY_TYPES),
  annotations: z
    .array(z.discriminatedUnion('kind', [facetAnnotationSchema, fullTextAnnotationSchema, sortableAnnotationSchema]))
    .optional(),
});

export const entityDeclarationSchema = z.object({
  name: identifier,
  namespace: z.string().regex(NAMESPACE, 'must be a module path').optional(),
  options: z
    .object({
      filterName: identifier.optional(),
      namespace: z.string().regex(NAMESPACE, 'must be a module path').optional(),
      generateAggregations: z.boolean().optional(),
      generateMetadata: z.boolean().optional(),
      fullTextStrategy: symbolic(FULL_TEXT_STRATEGIES).optional(),
    })
    .optional(),
  members: z.array(memberDeclarationSchema),
});

export type EntityDeclarationInput = z.input<typeof entityDeclarationSchema>;

function describeEntity(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'name' in input && typeof input.name === 'string') {
    return input.name;
  }
  return '<unnamed>';
}

/**
 * Validates an untyped declaration (e.g. read from a JSON file by the host
 * build integration). Throws DeclarationError listing every issue.
 */
export function parseDeclaration(input: unknown): EntityDeclaration {
  const result = entityDeclarationSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new DeclarationError(describeEntity(input), `invalid declaration (${issues})`);
  }
  return result.data;
}

/**
 * Validates a declaration written in code. Enum options may be given by name
 * or ordinal; the returned declaration only carries names.
 */
export function defineSearchable(declaration: EntityDeclarationInput): EntityDeclaration {
  return parseDeclaration(declaration);
}
