import dotenv from "dotenv";

dotenv.config();

export const config = {
  // Policy document loaded by createPolicyEngine() and the CLI
  policyPath: process.env.GUARDRAILS_POLICY_PATH || "./config/policies.yaml",

  // Print one [POLICY] line per evaluation when no logger is injected
  logEvaluations: process.env.GUARDRAILS_LOG_EVALUATIONS === "true",
};
