import type { EntitySearchSpec } from './types.js';
import { parseDeclaration } from './declaration/schema.js';
import { scanDeclaration } from './declaration/scanner.js';
import type { ScannedDeclaration } from './declaration/scanner.js';
import { buildSearchSpec } from './spec/builder.js';
import { specKey } from './spec/canonical.js';
import { buildFilterSchema } from './shape/resolver.js';
import type { FilterSchema } from './shape/resolver.js';
import { compilePredicate } from './compilers/predicate.js';
import type { PredicateArtifact } from './compilers/predicate.js';
import { compileAggregations } from './compilers/aggregation.js';
import type { AggregationArtifact } from './compilers/aggregation.js';
import { compileMetadata } from './compilers/metadata.js';
import type { FacetDescriptor } from './compilers/metadata.js';
import { CapabilityRegistry } from './fulltext/capabilities.js';
import { FullTextStrategyDispatcher } from './fulltext/dispatcher.js';
import { emitSource } from './emit/source.js';
import type { GeneratedFile } from './emit/writer.js';
import { DeclarationError, GenerationError } from './errors.js';
import type { UnitFailure } from './errors.js';
import { createLogger } from './logger.js';
import type { SearchLogger } from './logger.js';

/** Everything generated for one declaration. */
export interface GeneratedSearch {
  readonly entityName: string;
  readonly spec: EntitySearchSpec;
  readonly filterSchema: FilterSchema;
  readonly predicate: PredicateArtifact;
  readonly aggregations: AggregationArtifact | null;
  readonly metadata: readonly FacetDescriptor[] | null;
  /** Empty when source emission is disabled. */
  readonly files: readonly GeneratedFile[];
}

/**
 * Caller-owned memo of generated units keyed by spec and capabilities. A
 * unit whose spec is unchanged is returned from the cache as-is.
 */
export class GenerationCache {
  private readonly entries = new Map<string, GeneratedSearch>();

  get(key: string): GeneratedSearch | undefined {
    return this.entries.get(key);
  }

  set(key: string, unit: GeneratedSearch): void {
    this.entries.set(key, unit);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface GeneratorConfig {
  logger?: SearchLogger;
  /** Provider primitives available to the consuming process. Default: none. */
  capabilities?: CapabilityRegistry;
  /** Render TypeScript source for each unit. Default true. */
  emitSource?: boolean;
  /** Throw a GenerationError after all units ran if any failed. Default false. */
  failOnError?: boolean;
  cache?: GenerationCache;
}

export interface ResolvedGeneratorConfig {
  logger: SearchLogger;
  capabilities: CapabilityRegistry;
  emitSource: boolean;
  failOnError: boolean;
  cache: GenerationCache | null;
}

export function resolveGeneratorConfig(config: GeneratorConfig = {}): ResolvedGeneratorConfig {
  return {
    logger: config.logger ?? createLogger(),
    capabilities: config.capabilities ?? CapabilityRegistry.none(),
    emitSource: config.emitSource ?? true,
    failOnError: config.failOnError ?? false,
    cache: config.cache ?? null,
  };
}

export interface GenerationResult {
  readonly units: readonly GeneratedSearch[];
  readonly failures: readonly UnitFailure[];
}

function warnShadowed(scanned: ScannedDeclaration, logger: SearchLogger): void {
  for (const member of scanned.members) {
    if (member.shadowed.length === 0) continue;
    logger.warn(
      {
        entity: scanned.entityName,
        member: member.name,
        kept: member.annotation.kind,
        ignored: member.shadowed.map((a) => a.kind),
      },
      'conflicting search annotations; lower-precedence annotations ignored',
    );
  }
}

function runUnit(input: unknown, config: ResolvedGeneratorConfig): GeneratedSearch {
  const scanned = scanDeclaration(parseDeclaration(input));
  warnShadowed(scanned, config.logger);
  const spec = buildSearchSpec(scanned);

  const key = `${config.capabilities.list().join(',')}|${config.emitSource ? 'source' : 'runtime'}|${specKey(spec)}`;
  const cached = config.cache?.get(key);
  if (cached !== undefined) {
    config.logger.debug({ entity: spec.entityName }, 'spec unchanged; reusing generated search');
    return cached;
  }

  const dispatcher = new FullTextStrategyDispatcher(config.capabilities, config.logger);
  const filterSchema = buildFilterSchema(spec);
  const predicate = compilePredicate(spec, dispatcher);
  const aggregations = compileAggregations(spec);
  const metadata = compileMetadata(spec);
  const files = config.emitSource
    ? emitSource({ spec, schema: filterSchema, predicate, aggregations, metadata })
    : [];

  const unit: GeneratedSearch = Object.freeze({
    entityName: spec.entityName,
    spec,
    filterSchema,
    predicate,
    aggregations,
    metadata,
    files: Object.freeze(files),
  });
  config.cache?.set(key, unit);
  config.logger.debug({ entity: spec.entityName, files: files.length }, 'generated search');
  return unit;
}

/** Generates one unit from a typed (see defineSearchable()) or untyped declaration. Errors propagate to the caller. */
export function generateSearch(declaration: unknown, config: GeneratorConfig = {}): GeneratedSearch {
  return runUnit(declaration, resolveGeneratorConfig(config));
}

function entityNameOf(input: unknown, err: unknown): string {
  if (err instanceof DeclarationError) return err.entityName;
  if (typeof input === 'object' && input !== null) {
    const name: unknown = Reflect.get(input, 'name');
    if (typeof name === 'string') return name;
  }
  return '<unnamed>';
}

/**
 * Generates every declaration. A failing unit yields nothing, is logged and
 * reported in `failures`; the remaining units still run. With `failOnError`
 * the failures are thrown as one GenerationError once all units ran.
 */
export function generateAll(
  declarations: readonly unknown[],
  config: GeneratorConfig = {},
): GenerationResult {
  const resolved = resolveGeneratorConfig(config);
  const units: GeneratedSearch[] = [];
  const failures: UnitFailure[] = [];

  for (const declaration of declarations) {
    try {
      units.push(runUnit(declaration, resolved));
    } catch (err) {
      const entityName = entityNameOf(declaration, err);
      resolved.logger.error({ entity: entityName, err }, 'search generation failed; unit skipped');
      failures.push({ entityName, error: err });
    }
  }

  if (resolved.failOnError && failures.length > 0) {
    throw new GenerationError(failures);
  }
  return { units, failures };
}
