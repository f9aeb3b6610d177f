import {
  DEFAULT_CHANNEL,
  DEFAULT_EFFECT,
  type Defaults,
  type Policy,
  type PolicySet,
} from './models.js';

/**
 * Everything one evaluation reads. Replaced as a whole on load and never
 * mutated afterwards.
 */
export interface PolicySnapshot {
  readonly policies: readonly Policy[];
  readonly defaults: Readonly<Defaults>;
  readonly contextFallbacks: Readonly<Record<string, string>>;
}

const EMPTY_SNAPSHOT: PolicySnapshot = Object.freeze({
  policies: Object.freeze([]),
  defaults: Object.freeze({ effect: DEFAULT_EFFECT, channel: DEFAULT_CHANNEL }),
  contextFallbacks: Object.freeze({}),
});

/**
 * Sort by priority ascending. Array#sort is stable, so equal priorities keep
 * declaration order.
 */
export function sortPolicies(policies: readonly Policy[]): Policy[] {
  return [...policies].sort((a, b) => a.priority - b.priority);
}

function freezePolicy(policy: Policy): Policy {
  for (const patterns of Object.values(policy.condition)) {
    if (patterns) Object.freeze(patterns);
  }
  Object.freeze(policy.condition);
  return Object.freeze(policy);
}

export class PolicyStore {
  private current: PolicySnapshot = EMPTY_SNAPSHOT;

  /**
   * Replace the active policy set. The set is copied, so later changes to
   * the caller's object have no effect here.
   */
  load(policySet: PolicySet): void {
    const copy = structuredClone(policySet);
    this.current = Object.freeze({
      policies: Object.freeze(sortPolicies(copy.policies).map(freezePolicy)),
      defaults: Object.freeze({ ...copy.defaults }),
      contextFallbacks: Object.freeze({ ...copy.context_fallbacks }),
    });
  }

  /** The live snapshot. Frozen throughout, down to the condition lists. */
  snapshot(): PolicySnapshot {
    return this.current;
  }

  /** Currently loaded policies (sorted by priority). */
  get policies(): Policy[] {
    return structuredClone([...this.current.policies]);
  }

  get defaults(): Defaults {
    return { ...this.current.defaults };
  }

  get contextFallbacks(): Record<string, string> {
    return { ...this.current.contextFallbacks };
  }
}
