#!/usr/bin/env node
/**
 * Guardrails CLI
 *
 * Check a policy document and evaluate tool invocations against it.
 */
import { Command } from "commander";
import { config } from "./lib/core/config.js";
import { PolicyEngine } from "./lib/policy/policyEngine.js";
import { loadPolicySet, PolicyConfigError } from "./lib/policy/policyLoader.js";
import { createConsoleEvaluationLogger } from "./lib/policy/evaluationLog.js";
import type { EvalContext, PolicySet } from "./lib/policy/models.js";

interface EvaluateOptions {
  mode?: string;
  model?: string;
  channel?: string;
  tool?: string;
  mcpServer?: string;
  risk?: string;
  user?: string;
  session?: string;
  explain?: boolean;
  log?: boolean;
}

async function loadOrExit(file: string | undefined): Promise<PolicySet> {
  const path = file || config.policyPath;
  try {
    return await loadPolicySet(path);
  } catch (err) {
    if (err instanceof PolicyConfigError) {
      console.error(`Invalid policy file ${path} (${err.code}): ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const program = new Command();

program.name("guardrails").description("Agent tool-call guardrail policies").version("0.1.0");

program
  .command("check [file]")
  .description("Validate a policy file and list its policies in evaluation order")
  .action(async (file: string | undefined) => {
    const policySet = await loadOrExit(file);
    const engine = new PolicyEngine({ policySet });
    const { metadata } = policySet;
    console.log(`${metadata.name}${metadata.version ? ` v${metadata.version}` : ""}`);
    console.log(`Policies: ${policySet.policies.length}`);
    for (const policy of engine.policies) {
      const status = policy.enabled ? "" : " (disabled)";
      console.log(`  [${policy.priority}] ${policy.id} -> ${policy.effect}${status}`);
    }
    const fallbacks = Object.entries(engine.contextFallbacks);
    if (fallbacks.length) {
      console.log("Context fallbacks:");
      fallbacks.forEach(([from, to]) => console.log(`  ${from} -> ${to}`));
    }
    console.log(`Default: ${engine.defaults.effect} (${engine.defaults.channel})`);
  });

program
  .command("evaluate [file]")
  .description("Evaluate one tool invocation and print the verdict as JSON")
  .option("--mode <mode>", "Agent mode")
  .option("--model <model>", "Model identifier")
  .option("--channel <channel>", "Conversation channel")
  .option("--tool <tool>", "Tool name")
  .option("--mcp-server <server>", "MCP server the tool belongs to")
  .option("--risk <risk>", "Risk level")
  .option("--user <user>", "User identifier")
  .option("--session <session>", "Session identifier")
  .option("--explain", "Also print the match result of every policy")
  .option("--log", "Print the evaluation log line")
  .action(async (file: string | undefined, opts: EvaluateOptions) => {
    const policySet = await loadOrExit(file);
    const logger = opts.log || config.logEvaluations ? createConsoleEvaluationLogger() : undefined;
    const engine = new PolicyEngine({ policySet, logger });
    const ctx: EvalContext = {
      mode: opts.mode,
      model: opts.model,
      channel: opts.channel,
      tool: opts.tool,
      mcp_server: opts.mcpServer,
      risk: opts.risk,
      user: opts.user,
      session: opts.session,
    };
    console.log(JSON.stringify(engine.evaluate(ctx), null, 2));
    if (opts.explain) {
      console.log("\nPolicies:");
      for (const report of engine.evaluateAll(ctx)) {
        const mark = report.matched ? "✓" : report.enabled ? "·" : "-";
        console.log(`  ${mark} [${report.priority}] ${report.policy_id} -> ${report.effect}`);
      }
    }
  });

program.parseAsync().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
