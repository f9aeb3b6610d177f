/**
 * Policy data model
 *
 * The engine consumes these shapes already materialized by the loader
 * (see policyLoader.ts); it performs no validation of its own.
 */

// ============================================================================
// Effects and channels
// ============================================================================

/**
 * Well-known effect tags understood by agent runtimes.
 */
export const Effect = {
  allow: 'allow',
  deny: 'deny',
  ask: 'ask',
  hitl: 'hitl',
  pitl: 'pitl',
  aitl: 'aitl',
  filter: 'filter',
} as const;

export type KnownEffect = (typeof Effect)[keyof typeof Effect];

/**
 * The effect a policy applies to a matching tool invocation.
 *
 * Open set: any string is a valid effect, so organizations can define their
 * own approval or verification strategies. The engine treats it as opaque.
 */
export type Effect = KnownEffect | (string & {});

export const ALLOW: Effect = Effect.allow;
export const DENY: Effect = Effect.deny;
export const ASK: Effect = Effect.ask;
export const HITL: Effect = Effect.hitl;
export const PITL: Effect = Effect.pitl;
export const AITL: Effect = Effect.aitl;
export const FILTER: Effect = Effect.filter;

export const CHANNELS = ['chat', 'phone'] as const;

/** Out-of-band route for approval effects. */
export type Channel = (typeof CHANNELS)[number];

export const DEFAULT_EFFECT: Effect = Effect.ask;
export const DEFAULT_CHANNEL: Channel = 'chat';
export const DEFAULT_PRIORITY = 100;

// ============================================================================
// Evaluation input
// ============================================================================

/**
 * Snapshot of runtime state for a single tool invocation.
 * A missing field is read as "" (unset).
 */
export interface EvalContext {
  readonly mode?: string;
  readonly model?: string;
  readonly channel?: string;
  readonly tool?: string;
  readonly mcp_server?: string;
  readonly risk?: string;
  readonly user?: string;
  readonly session?: string;
}

// ============================================================================
// Policy document
// ============================================================================

/**
 * Matching criteria for a policy.
 *
 * AND across fields, OR within a field's list. An absent list means
 * "don't care"; a present list (even an empty one) must match.
 */
export interface Condition {
  modes?: string[];
  models?: string[];
  channels?: string[];
  tools?: string[];
  mcp_servers?: string[];
  risk?: string[];
  users?: string[];
  sessions?: string[];
}

export interface Policy {
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  /** Lower evaluates first; ties keep declaration order. */
  priority: number;
  condition: Condition;
  effect: Effect;
  channel: Channel;
}

export interface Metadata {
  name: string;
  description: string;
  version: string;
  labels: Record<string, string>;
}

/** Applied when no policy matches after every fallback. */
export interface Defaults {
  effect: Effect;
  channel: Channel;
}

export interface PolicySet {
  apiVersion: string;
  kind: 'PolicySet';
  metadata: Metadata;
  defaults: Defaults;
  policies: Policy[];
  /** Mode to retry as when nothing matched under the key mode. May contain cycles. */
  context_fallbacks: Record<string, string>;
}

// ============================================================================
// Evaluation output
// ============================================================================

export interface Verdict {
  effect: Effect;
  channel: Channel;
  /** null when the defaults applied */
  policy_id: string | null;
}

export interface PolicyReport {
  policy_id: string;
  name: string;
  priority: number;
  effect: Effect;
  enabled: boolean;
  matched: boolean;
}
