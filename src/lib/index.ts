/**
 * Agent Guardrails Library
 *
 * - core: configuration
 * - policy: policy model, loader, matching and evaluation engine
 */

export { config } from './core/config.js';
export * from './policy/index.js';
