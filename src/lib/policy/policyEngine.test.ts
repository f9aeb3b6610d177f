import { describe, expect, it } from 'vitest';
import type { PolicyEvaluationEvent } from './evaluationLog.js';
import { Effect, type Policy, type PolicySet } from './models.js';
import { PolicyEngine } from './policyEngine.js';

function policy(id: string, overrides: Partial<Policy> = {}): Policy {
  return {
    id,
    name: id,
    description: '',
    enabled: true,
    priority: 100,
    condition: {},
    effect: 'allow',
    channel: 'chat',
    ...overrides,
  };
}

function policySet(overrides: Partial<PolicySet> = {}): PolicySet {
  return {
    apiVersion: 'agent-policy/v1',
    kind: 'PolicySet',
    metadata: { name: 'test', description: '', version: '', labels: {} },
    defaults: { effect: 'ask', channel: 'chat' },
    policies: [],
    context_fallbacks: {},
    ...overrides,
  };
}

function engineFor(overrides: Partial<PolicySet> = {}): PolicyEngine {
  return new PolicyEngine({ policySet: policySet(overrides) });
}

describe('PolicyEngine.evaluate', () => {
  it('returns the defaults when no policy is loaded', () => {
    const engine = new PolicyEngine();
    expect(engine.evaluate({ tool: 'bash' })).toEqual({
      effect: 'ask',
      channel: 'chat',
      policy_id: null,
    });
  });

  it('returns the configured default with no policy id when nothing matches', () => {
    const engine = engineFor({ defaults: { effect: 'deny', channel: 'chat' } });
    expect(engine.evaluate({ tool: 'bash' })).toEqual({
      effect: 'deny',
      channel: 'chat',
      policy_id: null,
    });
  });

  it('lets the lower priority number win regardless of declaration order', () => {
    const engine = engineFor({
      policies: [
        policy('deny-bash', { priority: 50, condition: { tools: ['bash'] }, effect: 'deny' }),
        policy('allow-bash', { priority: 10, condition: { tools: ['bash'] }, effect: 'allow' }),
      ],
    });
    expect(engine.evaluate({ tool: 'bash' })).toEqual({
      effect: 'allow',
      channel: 'chat',
      policy_id: 'allow-bash',
    });
  });

  it('breaks priority ties by declaration order', () => {
    const engine = engineFor({
      policies: [
        policy('first', { priority: 10, effect: 'hitl' }),
        policy('second', { priority: 10, effect: 'deny' }),
      ],
    });
    expect(engine.evaluate({}).policy_id).toBe('first');
  });

  it('never lets a disabled policy win', () => {
    const engine = engineFor({
      policies: [
        policy('disabled-allow', { priority: 1, enabled: false, effect: 'allow' }),
        policy('enabled-deny', { priority: 99, effect: 'deny' }),
      ],
    });
    expect(engine.evaluate({ tool: 'bash' })).toEqual({
      effect: 'deny',
      channel: 'chat',
      policy_id: 'enabled-deny',
    });
  });

  it('falls to the defaults when only disabled policies match', () => {
    const engine = engineFor({
      defaults: { effect: 'deny', channel: 'chat' },
      policies: [policy('off', { enabled: false })],
    });
    expect(engine.evaluate({}).policy_id).toBeNull();
  });

  it('uses the matching policy channel', () => {
    const engine = engineFor({
      policies: [policy('deploy', { condition: { tools: ['deploy'] }, effect: 'ask', channel: 'phone' })],
    });
    expect(engine.evaluate({ tool: 'deploy' })).toEqual({
      effect: 'ask',
      channel: 'phone',
      policy_id: 'deploy',
    });
  });

  it('does not let server patterns fire on an invocation without a server', () => {
    const engine = engineFor({
      defaults: { effect: 'allow', channel: 'chat' },
      policies: [policy('azure', { condition: { mcp_servers: ['azure-*'] }, effect: 'deny' })],
    });
    expect(engine.evaluate({ tool: 'deploy' })).toEqual({
      effect: 'allow',
      channel: 'chat',
      policy_id: null,
    });
    expect(engine.evaluate({ tool: 'deploy', mcp_server: 'azure-prod' }).policy_id).toBe('azure');
  });

  it('passes custom effects through untouched', () => {
    const engine = engineFor({
      policies: [policy('custom', { effect: 'escalate-to-secops' })],
    });
    expect(engine.evaluate({}).effect).toBe('escalate-to-secops');
  });

  it('treats an unknown mode as a plain non-match', () => {
    const engine = engineFor({
      defaults: { effect: 'deny', channel: 'chat' },
      policies: [policy('chat-only', { condition: { modes: ['interactive'] } })],
    });
    expect(engine.evaluate({ mode: 'made-up-mode' }).effect).toBe('deny');
  });
});

describe('PolicyEngine context fallbacks', () => {
  it('follows a multi-hop chain to a matching policy', () => {
    const engine = engineFor({
      policies: [policy('bg', { condition: { modes: ['background'] }, effect: 'hitl' })],
      context_fallbacks: { scheduler: 'bot_processor', bot_processor: 'background' },
    });
    expect(engine.evaluate({ mode: 'scheduler' })).toEqual({
      effect: 'hitl',
      channel: 'chat',
      policy_id: 'bg',
    });
  });

  it('prefers a match under the original mode over a fallback match', () => {
    const engine = engineFor({
      policies: [
        policy('c-mode', { priority: 1, condition: { modes: ['c'] }, effect: 'deny' }),
        policy('a-mode', { priority: 50, condition: { modes: ['a'] }, effect: 'allow' }),
      ],
      context_fallbacks: { a: 'b', b: 'c' },
    });
    expect(engine.evaluate({ mode: 'a' }).policy_id).toBe('a-mode');
    expect(engine.evaluate({ mode: 'b' }).policy_id).toBe('c-mode');
  });

  it('keeps every other field when retrying under a fallback mode', () => {
    const engine = engineFor({
      policies: [
        policy('bg-bash', { condition: { modes: ['background'], tools: ['bash'] }, effect: 'deny' }),
      ],
      context_fallbacks: { scheduler: 'background' },
    });
    expect(engine.evaluate({ mode: 'scheduler', tool: 'bash' }).policy_id).toBe('bg-bash');
    expect(engine.evaluate({ mode: 'scheduler', tool: 'edit' }).policy_id).toBeNull();
  });

  it('stops at a two-node cycle and returns the default', () => {
    const engine = engineFor({
      defaults: { effect: 'deny', channel: 'chat' },
      policies: [policy('never', { condition: { modes: ['z'] } })],
      context_fallbacks: { a: 'b', b: 'a' },
    });
    expect(engine.evaluate({ mode: 'a' })).toEqual({
      effect: 'deny',
      channel: 'chat',
      policy_id: null,
    });
  });

  it('stops at a self-loop', () => {
    const engine = engineFor({
      defaults: { effect: 'deny', channel: 'chat' },
      context_fallbacks: { a: 'a' },
    });
    expect(engine.evaluate({ mode: 'a' }).effect).toBe('deny');
  });

  it('stops at a cycle that does not return to the start', () => {
    const engine = engineFor({
      policies: [policy('c-mode', { condition: { modes: ['c'] }, effect: 'hitl' })],
      context_fallbacks: { start: 'b', b: 'c2', c2: 'b' },
    });
    expect(engine.evaluate({ mode: 'start' }).policy_id).toBeNull();
  });

  it('walks from the empty mode when the context has none', () => {
    const engine = engineFor({
      policies: [policy('interactive', { condition: { modes: ['interactive'] }, effect: 'allow' })],
      context_fallbacks: { '': 'interactive' },
    });
    expect(engine.evaluate({ tool: 'bash' }).policy_id).toBe('interactive');
  });

  it('treats an empty fallback target as an ordinary mode', () => {
    const engine = engineFor({
      policies: [policy('blank-mode', { condition: { modes: ['*'] }, effect: 'filter' })],
      context_fallbacks: { cron: '' },
    });
    // modes ['*'] matches every mode, so the original mode already wins
    expect(engine.evaluate({ mode: 'cron' }).policy_id).toBe('blank-mode');

    const strict = engineFor({
      policies: [policy('only-blank', { condition: { modes: ['[!a-z]*'] }, effect: 'filter' })],
      context_fallbacks: { cron: '' },
    });
    // '[!a-z]*' needs at least one character, so the blank fallback mode misses too
    expect(strict.evaluate({ mode: 'cron' }).policy_id).toBeNull();
  });

  it('does not mutate the caller context', () => {
    const engine = engineFor({ context_fallbacks: { a: 'b', b: 'c' } });
    const ctx = { mode: 'a', tool: 'bash' };
    engine.evaluate(ctx);
    expect(ctx).toEqual({ mode: 'a', tool: 'bash' });
  });
});

describe('PolicyEngine.resolve', () => {
  it('returns only the effect tag', () => {
    const engine = engineFor({
      policies: [policy('bash', { condition: { tools: ['bash'] }, effect: Effect.hitl })],
      defaults: { effect: 'deny', channel: 'chat' },
    });
    expect(engine.resolve({ tool: 'bash' })).toBe('hitl');
    expect(engine.resolve({ tool: 'edit' })).toBe('deny');
  });
});

describe('PolicyEngine.evaluateAll', () => {
  it('reports every policy in priority order', () => {
    const engine = engineFor({
      policies: [
        policy('late', { priority: 90, name: 'Late', condition: { tools: ['edit'] }, effect: 'deny' }),
        policy('early', { priority: 5, name: 'Early', condition: { tools: ['bash'] }, effect: 'allow' }),
        policy('off', { priority: 50, name: 'Off', enabled: false, effect: 'hitl' }),
      ],
    });
    expect(engine.evaluateAll({ tool: 'bash' })).toEqual([
      { policy_id: 'early', name: 'Early', priority: 5, effect: 'allow', enabled: true, matched: true },
      { policy_id: 'off', name: 'Off', priority: 50, effect: 'hitl', enabled: false, matched: false },
      { policy_id: 'late', name: 'Late', priority: 90, effect: 'deny', enabled: true, matched: false },
    ]);
  });

  it('reports every matching policy, not only the winner', () => {
    const engine = engineFor({
      policies: [
        policy('a', { priority: 1, condition: { tools: ['bash'] } }),
        policy('b', { priority: 2, condition: { tools: ['b*'] } }),
      ],
    });
    const report = engine.evaluateAll({ tool: 'bash' });
    expect(report.filter((entry) => entry.matched).map((entry) => entry.policy_id)).toEqual([
      'a',
      'b',
    ]);
    expect(engine.evaluate({ tool: 'bash' }).policy_id).toBe('a');
  });

  it('has exactly one matched entry when one enabled policy matches', () => {
    const engine = engineFor({
      policies: [
        policy('a', { condition: { tools: ['bash'] } }),
        policy('b', { condition: { tools: ['edit'] } }),
        policy('c', { enabled: false }),
      ],
    });
    const report = engine.evaluateAll({ tool: 'bash' });
    expect(report).toHaveLength(3);
    expect(report.filter((entry) => entry.matched)).toHaveLength(1);
  });

  it('does not follow fallbacks', () => {
    const engine = engineFor({
      policies: [policy('bg', { condition: { modes: ['background'] } })],
      context_fallbacks: { scheduler: 'background' },
    });
    expect(engine.evaluateAll({ mode: 'scheduler' })[0]?.matched).toBe(false);
    expect(engine.evaluate({ mode: 'scheduler' }).policy_id).toBe('bg');
  });
});

describe('PolicyEngine state', () => {
  it('reads back loaded policies, defaults and fallbacks', () => {
    const input = policySet({
      defaults: { effect: 'deny', channel: 'phone' },
      policies: [
        policy('a', { priority: 10, condition: { tools: ['bash'], mcp_servers: ['gh'] } }),
        policy('b', { priority: 20, description: 'second', channel: 'phone' }),
      ],
      context_fallbacks: { scheduler: 'background' },
    });
    const engine = new PolicyEngine({ policySet: input });
    expect(engine.policies).toEqual(input.policies);
    expect(engine.defaults).toEqual({ effect: 'deny', channel: 'phone' });
    expect(engine.contextFallbacks).toEqual({ scheduler: 'background' });
  });

  it('replaces the previous policy set on load', () => {
    const engine = engineFor({ policies: [policy('old', { effect: 'allow' })] });
    engine.load(policySet({ defaults: { effect: 'deny', channel: 'chat' } }));
    expect(engine.policies).toEqual([]);
    expect(engine.evaluate({}).effect).toBe('deny');
  });

  it('ignores mutation of the loaded document and of returned policies', () => {
    const input = policySet({ policies: [policy('bash', { condition: { tools: ['bash'] } })] });
    const engine = new PolicyEngine({ policySet: input });

    input.policies[0]!.enabled = false;
    engine.policies[0]!.condition.tools = ['edit'];

    expect(engine.evaluate({ tool: 'bash' }).policy_id).toBe('bash');
  });
});

describe('PolicyEngine logging', () => {
  it('logs one event per evaluation', () => {
    const events: PolicyEvaluationEvent[] = [];
    const engine = new PolicyEngine({
      policySet: policySet({
        policies: [policy('bg', { condition: { modes: ['background'] }, effect: 'hitl' })],
        context_fallbacks: { scheduler: 'bot_processor', bot_processor: 'background' },
      }),
      logger: { log: (event) => events.push(event) },
    });

    engine.evaluate({ mode: 'background', tool: 'bash' });
    engine.evaluate({ mode: 'scheduler', tool: 'bash' });
    engine.evaluate({ mode: 'interactive' });

    expect(events).toHaveLength(3);
    expect(events.map(({ timestamp: _timestamp, ...rest }) => rest)).toEqual([
      {
        tool: 'bash',
        mode: 'background',
        matched_mode: 'background',
        effect: 'hitl',
        channel: 'chat',
        policy_id: 'bg',
        fallback_hops: 0,
      },
      {
        tool: 'bash',
        mode: 'scheduler',
        matched_mode: 'background',
        effect: 'hitl',
        channel: 'chat',
        policy_id: 'bg',
        fallback_hops: 2,
      },
      {
        tool: '',
        mode: 'interactive',
        matched_mode: null,
        effect: 'ask',
        channel: 'chat',
        policy_id: null,
        fallback_hops: 0,
      },
    ]);
  });

  it('does not log from evaluateAll', () => {
    const events: PolicyEvaluationEvent[] = [];
    const engine = new PolicyEngine({
      policySet: policySet({ policies: [policy('a')] }),
      logger: { log: (event) => events.push(event) },
    });
    engine.evaluateAll({});
    expect(events).toEqual([]);
  });

  it('lets a failing logger error reach the caller', () => {
    const engine = new PolicyEngine({
      policySet: policySet({ policies: [policy('a')] }),
      logger: {
        log: () => {
          throw new Error('log sink unavailable');
        },
      },
    });
    expect(() => engine.evaluate({})).toThrow('log sink unavailable');
    expect(engine.evaluateAll({})[0]?.matched).toBe(true);
  });
});
