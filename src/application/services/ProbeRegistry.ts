import { ConfigurationError } from '../../domain/errors/AppErrors';
import { ProbeKind, ProbeSpec, freezeProbeSpec } from '../../domain/probes/ProbeSpec';

/**
 * Holds the declarative, ordered list of probes to run.
 * Pure data: built once at startup, never mutated.
 */
export class ProbeRegistry {
  private readonly specs: readonly ProbeSpec[];
  private readonly byId: ReadonlyMap<string, ProbeSpec>;

  constructor(specs: readonly ProbeSpec[]) {
    const byId = new Map<string, ProbeSpec>();
    const frozen: ProbeSpec[] = [];

    for (const spec of specs) {
      if (byId.has(spec.id)) {
        throw new ConfigurationError(`Duplicate probe id '${spec.id}'`);
      }
      if (spec.timeoutMs <= 0) {
        throw new ConfigurationError(`Probe '${spec.id}' must have a positive timeout`);
      }
      const copy = freezeProbeSpec(spec);
      byId.set(copy.id, copy);
      frozen.push(copy);
    }

    this.specs = Object.freeze(frozen);
    this.byId = byId;
  }

  /**
   * All probe specs in declaration order.
   */
  list(): readonly ProbeSpec[] {
    return this.specs;
  }

  get(id: string): ProbeSpec | undefined {
    return this.byId.get(id);
  }

  byKind<K extends ProbeKind>(kind: K): Extract<ProbeSpec, { kind: K }>[] {
    return this.specs.filter(
      (spec): spec is Extract<ProbeSpec, { kind: K }> => spec.kind === kind
    );
  }

  get size(): number {
    return this.specs.length;
  }
}
