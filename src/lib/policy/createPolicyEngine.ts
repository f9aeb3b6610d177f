import { config } from '../core/config.js';
import { createConsoleEvaluationLogger, type EvaluationLogger } from './evaluationLog.js';
import { PolicyEngine } from './policyEngine.js';
import { loadPolicySet } from './policyLoader.js';

/**
 * Load a policy file and return an engine for it.
 *
 * Without an explicit logger, evaluations are printed to the console when
 * GUARDRAILS_LOG_EVALUATIONS=true.
 */
export async function createPolicyEngine(
  options: { path?: string; logger?: EvaluationLogger } = {}
): Promise<PolicyEngine> {
  const policySet = await loadPolicySet(options.path ?? config.policyPath);
  const logger =
    options.logger ?? (config.logEvaluations ? createConsoleEvaluationLogger() : undefined);
  return new PolicyEngine({ policySet, logger });
}
