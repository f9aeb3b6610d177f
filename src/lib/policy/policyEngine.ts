/**
 * Policy Evaluation Engine
 *
 * Policies are scanned in priority order (ascending) and the first enabled
 * policy whose condition matches wins. When nothing matches, the context is
 * retried under each mode of the context_fallbacks chain; when the chain is
 * exhausted the PolicySet defaults apply.
 *
 * Evaluation is synchronous, pure and total: it never throws for a
 * well-formed context. Errors thrown by an injected logger do propagate.
 */

import { conditionMatches } from './conditionMatcher.js';
import type { EvaluationLogger } from './evaluationLog.js';
import type {
  Defaults,
  EvalContext,
  Policy,
  PolicyReport,
  PolicySet,
  Verdict,
} from './models.js';
import { PolicyStore, type PolicySnapshot } from './policyStore.js';

interface FallbackWalk {
  verdict: Verdict | null;
  matchedMode: string | null;
  hops: number;
}

function matchOnce(policies: readonly Policy[], ctx: EvalContext): Verdict | null {
  for (const policy of policies) {
    if (!policy.enabled) continue;
    if (conditionMatches(policy.condition, ctx)) {
      return {
        effect: policy.effect,
        channel: policy.channel,
        policy_id: policy.id,
      };
    }
  }
  return null;
}

/**
 * Walk the fallback chain starting at `ctx.mode`. Each hop rescans with a
 * fresh context differing only in mode. A revisited mode ends the walk.
 */
function walkFallbacks(snapshot: PolicySnapshot, ctx: EvalContext): FallbackWalk {
  const fallbacks = snapshot.contextFallbacks;
  let mode = ctx.mode ?? '';
  const visited = new Set<string>([mode]);
  let hops = 0;

  while (Object.prototype.hasOwnProperty.call(fallbacks, mode)) {
    const next = fallbacks[mode];
    if (next === undefined || visited.has(next)) break;
    visited.add(next);
    hops += 1;
    mode = next;
    const verdict = matchOnce(snapshot.policies, { ...ctx, mode });
    if (verdict) return { verdict, matchedMode: mode, hops };
  }

  return { verdict: null, matchedMode: null, hops };
}

export class PolicyEngine {
  private store = new PolicyStore();
  private logger?: EvaluationLogger;

  constructor(options: { policySet?: PolicySet; logger?: EvaluationLogger } = {}) {
    this.logger = options.logger;
    if (options.policySet) this.load(options.policySet);
  }

  /** Load (or replace) the active policy set. */
  load(policySet: PolicySet): void {
    this.store.load(policySet);
  }

  /** Currently loaded policies (sorted by priority). */
  get policies(): Policy[] {
    return this.store.policies;
  }

  get defaults(): Defaults {
    return this.store.defaults;
  }

  get contextFallbacks(): Record<string, string> {
    return this.store.contextFallbacks;
  }

  /**
   * Evaluate the context and return exactly one verdict.
   */
  evaluate(ctx: EvalContext): Verdict {
    // one snapshot per call so a concurrent load is never half-observed
    const snapshot = this.store.snapshot();

    const direct = matchOnce(snapshot.policies, ctx);
    if (direct) {
      this.logEvaluation(ctx, direct, ctx.mode ?? '', 0);
      return direct;
    }

    const walk = walkFallbacks(snapshot, ctx);
    if (walk.verdict) {
      this.logEvaluation(ctx, walk.verdict, walk.matchedMode, walk.hops);
      return walk.verdict;
    }

    const verdict: Verdict = {
      effect: snapshot.defaults.effect,
      channel: snapshot.defaults.channel,
      policy_id: null,
    };
    this.logEvaluation(ctx, verdict, null, walk.hops);
    return verdict;
  }

  /**
   * Just the effect string. Useful when integrating with systems that
   * dispatch on string strategies.
   */
  resolve(ctx: EvalContext): string {
    return this.evaluate(ctx).effect;
  }

  /**
   * Match result for every policy, in priority order, against the context
   * as given (no fallbacks). For debugging and audit trails; has no effect
   * on evaluate().
   */
  evaluateAll(ctx: EvalContext): PolicyReport[] {
    return this.store.snapshot().policies.map((policy) => ({
      policy_id: policy.id,
      name: policy.name,
      priority: policy.priority,
      effect: policy.effect,
      enabled: policy.enabled,
      matched: policy.enabled && conditionMatches(policy.condition, ctx),
    }));
  }

  private logEvaluation(
    ctx: EvalContext,
    verdict: Verdict,
    matchedMode: string | null,
    hops: number
  ): void {
    if (!this.logger) return;
    this.logger.log({
      timestamp: new Date().toISOString(),
      tool: ctx.tool ?? '',
      mode: ctx.mode ?? '',
      matched_mode: matchedMode,
      effect: verdict.effect,
      channel: verdict.channel,
      policy_id: verdict.policy_id,
      fallback_hops: hops,
    });
  }
}
