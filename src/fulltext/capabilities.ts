import type { ProviderPrimitive } from '../query/types.js';
import type { SearchLogger } from '../logger.js';

export type CapabilityProbe = () => Iterable<ProviderPrimitive>;

/**
 * The query-provider primitives available to the consuming process, declared
 * once by the host at startup. The probe runs at most once per registry and
 * its answer is kept for the registry's lifetime; a probe that throws counts
 * as "nothing available".
 */
export class CapabilityRegistry {
  private probed: ReadonlySet<ProviderPrimitive> | null = null;

  constructor(
    private readonly probe: CapabilityProbe,
    private readonly logger?: SearchLogger,
  ) {}

  static of(...capabilities: ProviderPrimitive[]): CapabilityRegistry {
    return new CapabilityRegistry(() => capabilities);
  }

  static none(): CapabilityRegistry {
    return new CapabilityRegistry(() => []);
  }

  /** Everything the bundled PostgreSQL compiler can render. */
  static postgres(): CapabilityRegistry {
    return CapabilityRegistry.of('freetext', 'boolean-contains', 'ilike');
  }

  has(capability: ProviderPrimitive): boolean {
    return this.resolve().has(capability);
  }

  list(): ProviderPrimitive[] {
    return [...this.resolve()].sort();
  }

  private resolve(): ReadonlySet<ProviderPrimitive> {
    if (this.probed === null) {
      let found: Set<ProviderPrimitive>;
      try {
        found = new Set(this.probe());
      } catch (err) {
        this.logger?.debug({ err }, 'capability probe failed; treating all provider primitives as unavailable');
        found = new Set();
      }
      this.probed = found;
    }
    return this.probed;
  }
}
