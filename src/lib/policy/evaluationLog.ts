import type { Channel, Effect } from './models.js';

/**
 * Emitted once per PolicyEngine.evaluate call
 */
export interface PolicyEvaluationEvent {
  timestamp: string;
  tool: string;
  mode: string;
  /** Mode the winning policy matched under; null when the defaults applied */
  matched_mode: string | null;
  effect: Effect;
  channel: Channel;
  policy_id: string | null;
  /** Fallback modes tried before the verdict was reached */
  fallback_hops: number;
}

/**
 * Logger interface for evaluation events
 */
export interface EvaluationLogger {
  log(event: PolicyEvaluationEvent): void;
}

/**
 * Create a simple console logger for evaluation events
 */
export function createConsoleEvaluationLogger(): EvaluationLogger {
  return {
    log(event: PolicyEvaluationEvent): void {
      console.log(formatEvaluationEvent(event));
    },
  };
}

export function formatEvaluationEvent(event: PolicyEvaluationEvent): string {
  const source = event.policy_id ? `policy=${event.policy_id}` : 'policy=<default>';
  const fallback =
    event.matched_mode !== null && event.matched_mode !== event.mode
      ? ` via=${event.matched_mode}`
      : '';
  return `[POLICY] ${event.effect.toUpperCase()} ${source} tool=${event.tool || '-'} mode=${event.mode || '-'}${fallback} channel=${event.channel}`;
}
