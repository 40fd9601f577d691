import type { FullTextStrategy } from '../types.js';
import type { ProviderPrimitive } from '../query/types.js';
import type { SearchLogger } from '../logger.js';
import { CapabilityRegistry } from './capabilities.js';

/** What a compiled full-text fragment targets after capability probing. */
export type FullTextResolution =
  | { mode: 'pattern-match' }
  | { mode: 'like'; fellBackFrom: FullTextStrategy | null }
  | { mode: 'primitive'; primitive: ProviderPrimitive }
  | { mode: 'client-side' };

const PRIMITIVE_OF: Partial<Record<FullTextStrategy, ProviderPrimitive>> = {
  FreeText: 'freetext',
  BooleanContains: 'boolean-contains',
  PostgresILike: 'ilike',
};

export function describeResolution(resolution: FullTextResolution): string {
  switch (resolution.mode) {
    case 'pattern-match':
      return 'pattern match';
    case 'like':
      return resolution.fellBackFrom !== null
        ? `case-insensitive LIKE (fallback from ${resolution.fellBackFrom})`
        : 'case-insensitive LIKE';
    case 'primitive':
      return `provider primitive ${resolution.primitive}`;
    case 'client-side':
      return 'CLIENT-SIDE evaluation (materialises the candidate set)';
  }
}

/**
 * Resolves a declared full-text strategy against the capabilities the host
 * declared. One dispatcher serves one compiled unit and remembers each
 * resolution. Missing primitives fall back to the universal LIKE fragment;
 * resolution never throws.
 */
export class FullTextStrategyDispatcher {
  private readonly resolved = new Map<FullTextStrategy, FullTextResolution>();

  constructor(
    private readonly capabilities: CapabilityRegistry = CapabilityRegistry.none(),
    private readonly logger?: SearchLogger,
  ) {}

  resolve(strategy: FullTextStrategy): FullTextResolution {
    const cached = this.resolved.get(strategy);
    if (cached !== undefined) return cached;

    const resolution = this.compute(strategy);
    this.resolved.set(strategy, resolution);
    return resolution;
  }

  private compute(strategy: FullTextStrategy): FullTextResolution {
    if (strategy === 'PatternMatch') return { mode: 'pattern-match' };
    if (strategy === 'Like') return { mode: 'like', fellBackFrom: null };
    if (strategy === 'ClientSide') return { mode: 'client-side' };

    const primitive = PRIMITIVE_OF[strategy];
    if (primitive !== undefined && this.capabilities.has(primitive)) {
      return { mode: 'primitive', primitive };
    }

    this.logger?.debug({ strategy, primitive }, 'full-text primitive unavailable; using LIKE fallback');
    return { mode: 'like', fellBackFrom: strategy };
  }
}
