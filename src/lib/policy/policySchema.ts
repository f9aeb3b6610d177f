import { z } from 'zod';
import { CHANNELS, DEFAULT_CHANNEL, DEFAULT_EFFECT, DEFAULT_PRIORITY } from './models.js';

export const ChannelSchema = z.enum(CHANNELS);

/** Open set: any non-empty tag is accepted. */
export const EffectSchema = z.string().min(1);

/** `null` is read the same as a missing list. */
const PatternListSchema = z.array(z.string()).nullish();

export const ConditionSchema = z
  .object({
    modes: PatternListSchema,
    models: PatternListSchema,
    channels: PatternListSchema,
    tools: PatternListSchema,
    mcp_servers: PatternListSchema,
    risk: PatternListSchema,
    users: PatternListSchema,
    sessions: PatternListSchema,
  })
  .strict();

export const PolicyDocumentSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  description: z.string().default(''),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(DEFAULT_PRIORITY),
  condition: ConditionSchema.nullish(),
  effect: EffectSchema,
  channel: ChannelSchema.default(DEFAULT_CHANNEL),
});

export const DefaultsSchema = z.object({
  effect: EffectSchema.default(DEFAULT_EFFECT),
  channel: ChannelSchema.default(DEFAULT_CHANNEL),
});

export const MetadataSchema = z.object({
  name: z.string().default('unnamed'),
  description: z.string().default(''),
  // YAML reads an unquoted 1.0 as a number
  version: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .default(''),
  labels: z.record(z.string()).default({}),
});

export const PolicySetDocumentSchema = z.object({
  apiVersion: z.string().default('agent-policy/v1'),
  kind: z.literal('PolicySet').default('PolicySet'),
  metadata: MetadataSchema.nullish(),
  defaults: DefaultsSchema.nullish(),
  policies: z.array(PolicyDocumentSchema).nullish(),
  context_fallbacks: z.record(z.string()).nullish(),
});

export type ConditionDocument = z.infer<typeof ConditionSchema>;
export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;
export type PolicySetDocument = z.infer<typeof PolicySetDocumentSchema>;
