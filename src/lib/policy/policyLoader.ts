/**
 * PolicySet loader
 *
 * Turns a YAML/JSON document (text, file, or an already parsed object) into
 * the materialized PolicySet the engine consumes. All validation happens
 * here; a failed load throws PolicyConfigError and produces nothing.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import {
  DEFAULT_CHANNEL,
  DEFAULT_EFFECT,
  type Condition,
  type Metadata,
  type Policy,
  type PolicySet,
} from './models.js';
import {
  PolicySetDocumentSchema,
  type ConditionDocument,
  type PolicyDocument,
  type PolicySetDocument,
} from './policySchema.js';

export type PolicyConfigErrorCode = 'unsupported_kind' | 'invalid_value' | 'invalid_document';

export interface PolicyConfigIssue {
  path: string;
  message: string;
}

export class PolicyConfigError extends Error {
  code: PolicyConfigErrorCode;
  issues: PolicyConfigIssue[];

  constructor(message: string, code: PolicyConfigErrorCode, issues: PolicyConfigIssue[] = []) {
    super(message);
    this.name = 'PolicyConfigError';
    this.code = code;
    this.issues = issues;
  }
}

const CONDITION_FIELDS = [
  'modes',
  'models',
  'channels',
  'tools',
  'mcp_servers',
  'risk',
  'users',
  'sessions',
] as const satisfies ReadonlyArray<keyof Condition>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIssue(issue: ZodIssue): PolicyConfigIssue {
  return { path: issue.path.join('.'), message: issue.message };
}

/** Only present lists are kept; null and missing both mean "don't care". */
function toCondition(raw: ConditionDocument | null | undefined): Condition {
  const condition: Condition = {};
  if (!raw) return condition;
  for (const field of CONDITION_FIELDS) {
    const patterns = raw[field];
    if (patterns) condition[field] = [...patterns];
  }
  return condition;
}

function toPolicy(raw: PolicyDocument): Policy {
  return {
    id: raw.id,
    name: raw.name,
    description: raw.description,
    enabled: raw.enabled,
    priority: raw.priority,
    condition: toCondition(raw.condition),
    effect: raw.effect,
    channel: raw.channel,
  };
}

function toMetadata(raw: PolicySetDocument['metadata']): Metadata {
  return {
    name: raw?.name ?? 'unnamed',
    description: raw?.description ?? '',
    version: raw?.version ?? '',
    labels: { ...(raw?.labels ?? {}) },
  };
}

/**
 * Parse a PolicySet from a raw object (e.g. parsed YAML/JSON).
 */
export function loadPolicySetFromObject(data: unknown): PolicySet {
  if (!isRecord(data)) {
    throw new PolicyConfigError('Expected a mapping at the top level', 'invalid_document');
  }

  const kind = data.kind === undefined ? 'PolicySet' : data.kind;
  if (kind !== 'PolicySet') {
    throw new PolicyConfigError(
      `Unsupported kind: ${String(kind)} (expected PolicySet)`,
      'unsupported_kind'
    );
  }

  const parsed = PolicySetDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    const code = issues.some((issue) => issue.code === 'invalid_enum_value')
      ? 'invalid_value'
      : 'invalid_document';
    const mapped = issues.map(toIssue);
    const summary = mapped.map((issue) => `${issue.path || '<root>'}: ${issue.message}`).join('; ');
    throw new PolicyConfigError(`Invalid policy document: ${summary}`, code, mapped);
  }

  const doc = parsed.data;
  return {
    apiVersion: doc.apiVersion,
    kind: doc.kind,
    metadata: toMetadata(doc.metadata),
    defaults: {
      effect: doc.defaults?.effect ?? DEFAULT_EFFECT,
      channel: doc.defaults?.channel ?? DEFAULT_CHANNEL,
    },
    policies: (doc.policies ?? []).map(toPolicy),
    context_fallbacks: { ...(doc.context_fallbacks ?? {}) },
  };
}

/**
 * Parse a PolicySet from YAML text. JSON is valid input too.
 */
export function loadPolicySetFromString(text: string): PolicySet {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    throw new PolicyConfigError(
      `Could not parse policy document: ${err instanceof Error ? err.message : String(err)}`,
      'invalid_document'
    );
  }
  return loadPolicySetFromObject(data);
}

/** Load a PolicySet from a YAML or JSON file. */
export async function loadPolicySet(path: string): Promise<PolicySet> {
  const text = await readFile(path, 'utf-8');
  return loadPolicySetFromString(text);
}
