export { PolicyEngine } from './policyEngine.js';
export { PolicyStore, sortPolicies, type PolicySnapshot } from './policyStore.js';
export { createPolicyEngine } from './createPolicyEngine.js';
export { conditionMatches } from './conditionMatcher.js';
export { globMatch, globToRegExp, listMatches } from './globMatch.js';
export {
  loadPolicySet,
  loadPolicySetFromObject,
  loadPolicySetFromString,
  PolicyConfigError,
  type PolicyConfigErrorCode,
  type PolicyConfigIssue,
} from './policyLoader.js';
export {
  createConsoleEvaluationLogger,
  formatEvaluationEvent,
  type EvaluationLogger,
  type PolicyEvaluationEvent,
} from './evaluationLog.js';
export {
  Effect,
  ALLOW,
  AITL,
  ASK,
  DENY,
  FILTER,
  HITL,
  PITL,
  CHANNELS,
  DEFAULT_CHANNEL,
  DEFAULT_EFFECT,
  DEFAULT_PRIORITY,
  type Channel,
  type Condition,
  type Defaults,
  type EvalContext,
  type KnownEffect,
  type Metadata,
  type Policy,
  type PolicyReport,
  type PolicySet,
  type Verdict,
} from './models.js';
