export {
  FACET_KINDS,
  FACET_ORDERS,
  RANGE_AGGREGATIONS,
  TEXT_SEARCH_BEHAVIORS,
  FULL_TEXT_STRATEGIES,
  PROPERTY_TYPES,
  facetPath,
  facetKeyType,
} from './types.js';
export type {
  FacetKind,
  FacetOrder,
  RangeAggregation,
  TextSearchBehavior,
  FullTextStrategy,
  PropertyType,
  FacetSpec,
  FullTextFieldSpec,
  SortableFieldSpec,
  EntitySearchSpec,
} from './types.js';

export type {
  SearchableOptions,
  FacetAnnotation,
  FullTextAnnotation,
  SortableAnnotation,
  MemberAnnotation,
  MemberDeclaration,
  EntityDeclaration,
} from './declaration/types.js';
export { defineSearchable, parseDeclaration, entityDeclarationSchema } from './declaration/schema.js';
export type { EntityDeclarationInput } from './declaration/schema.js';
export { scanDeclaration } from './declaration/scanner.js';
export type { ScannedDeclaration, ScannedMember, RecognizedAnnotation } from './declaration/scanner.js';

export { buildSearchSpec } from './spec/builder.js';
export { specKey, specsEqual } from './spec/canonical.js';

export {
  resolveFacetShape,
  buildFilterSchema,
  SEARCH_TEXT_FIELD,
  SORT_BY_FIELD,
  SORT_DESCENDING_FIELD,
} from './shape/resolver.js';
export type { FilterField, FilterFieldRole, FilterSchema, FilterValueType } from './shape/resolver.js';

export { compilePredicate, planPredicate, requiredIncludes } from './compilers/predicate.js';
export type { PredicateArtifact, FragmentPlan, FilterValues } from './compilers/predicate.js';
export { compileAggregations, planAggregation } from './compilers/aggregation.js';
export type { AggregationArtifact, AggregationPlan } from './compilers/aggregation.js';
export { compileMetadata, describeFacet } from './compilers/metadata.js';
export type { FacetDescriptor } from './compilers/metadata.js';

export { CapabilityRegistry } from './fulltext/capabilities.js';
export type { CapabilityProbe } from './fulltext/capabilities.js';
export { FullTextStrategyDispatcher, describeResolution } from './fulltext/dispatcher.js';
export type { FullTextResolution } from './fulltext/dispatcher.js';

export { searchQuery } from './query/query-object.js';
export { SearchQuery } from './query/builder.js';
export type {
  PredicateNode,
  ScalarValue,
  ValueKeyType,
  ProviderPrimitive,
  OrderTerm,
  InProcessFilter,
} from './query/types.js';
export * as fragments from './query/fragments.js';
export type { FullTextFieldRef } from './query/fragments.js';
export { runInMemory, countInMemory, filterInMemory } from './query/in-memory.js';
export { evaluatePredicate } from './query/evaluator.js';
export { aggregateCounts, aggregateRange, aggregateBoolean } from './query/aggregates.js';
export type {
  FacetAggregate,
  FacetAggregationResult,
  CountsAggregate,
  RangeAggregate,
  BooleanAggregate,
  AggregateBound,
} from './query/aggregates.js';
export {
  compileSelectQuery,
  compileCountQuery,
  compileAggregationQuery,
  compilePredicateSql,
  valueKeySql,
} from './query/compiler.js';
export type { CompiledQuery, SqlTableMapping, SqlRelationMapping, SelectOptions } from './query/compiler.js';

export { emitSource } from './emit/source.js';
export type { GeneratedFile } from './emit/writer.js';

export { generateSearch, generateAll, resolveGeneratorConfig, GenerationCache } from './generator.js';
export type { GeneratorConfig, ResolvedGeneratorConfig, GeneratedSearch, GenerationResult } from './generator.js';

export { PostgresSearchExecutor, resolveExecutorConfig, searchProperties, tableSource } from './store/executor.js';
export type { ExecutorConfig, ResolvedExecutorConfig, PagedResult, SearchSource } from './store/executor.js';
export { compileSearchIndexes, applySearchIndexes } from './store/indexes.js';
export { createRowMapper } from './store/row-mapper.js';
export type { DbRow } from './store/row-mapper.js';

export { createLogger, LOG_LEVEL_ENV } from './logger.js';
export type { SearchLogger } from './logger.js';
export {
  DeclarationError,
  GenerationError,
  SqlCompileError,
  PredicateEvaluationError,
  SearchExecutionError,
} from './errors.js';
export type { UnitFailure } from './errors.js';
