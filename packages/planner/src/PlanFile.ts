import { type ResolvedValue, StratumError, type Value } from '@stratum/contracts';
import { resolvedValueSchema } from '@stratum/state';
import crypto from 'node:crypto';
import { z } from 'zod';

import type { PlanAction } from './index';

export const PLAN_FILE_VERSION = '1';

export interface PlanFile {
  version: string;
  timestamp: string;
  /** SHA-256 of the configuration the plan was computed from */
  config_hash: string;
  /** Variable values the plan was computed with */
  variables: Record<string, ResolvedValue>;
  actions: PlanAction[];
}

const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('String'), value: z.string() }),
    z.object({ type: z.literal('Number'), value: z.number() }),
    z.object({ type: z.literal('Boolean'), value: z.boolean() }),
    z.object({ type: z.literal('List'), value: z.array(valueSchema) }),
    z.object({ type: z.literal('Map'), value: z.record(valueSchema) }),
    z.object({ type: z.literal('Reference'), value: z.object({ resourceType: z.string(), name: z.string(), attribute: z.string() }) }),
  ])
);

const actionSchema = z.object({
  type: z.enum(['CREATE', 'UPDATE', 'DELETE']),
  resourceType: z.string().min(1),
  name: z.string().min(1),
  id: z.string().optional(),
  attributes: z.record(valueSchema).optional(),
  prior: z.record(resolvedValueSchema).optional(),
  changes: z.record(z.object({ old: resolvedValueSchema.optional(), new: resolvedValueSchema.optional(), computed: z.boolean() })).optional(),
  replace: z.boolean().optional(),
  dependencies: z.array(z.string()),
  released: z.array(z.string()).optional(),
});

const planFileSchema: z.ZodType<PlanFile, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(PLAN_FILE_VERSION),
  timestamp: z.string(),
  config_hash: z.string().regex(/^[\da-f]{64}$/),
  variables: z.record(resolvedValueSchema).default({}),
  actions: z.array(actionSchema),
});

export function hashConfig(configContent: string): string {
  return crypto.createHash('sha256').update(configContent).digest('hex');
}

export function serializePlan(actions: PlanAction[], configContent: string, variables: Record<string, ResolvedValue> = {}): PlanFile {
  return {
    version: PLAN_FILE_VERSION,
    timestamp: new Date().toISOString(),
    config_hash: hashConfig(configContent),
    variables,
    actions,
  };
}

function canonical(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map((item) => canonical(item)).join(',')}]`;
  if (typeof value !== 'object' || value === null) return JSON.stringify(value);

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${canonical(item)}`).join(',')}}`;
}

/** Whether two plans contain the same operations, ignoring key order and absent fields */
export function samePlan(a: PlanAction[], b: PlanAction[]): boolean {
  return canonical(a) === canonical(b);
}

export function parsePlanFile(data: unknown): PlanFile {
  const result = planFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new StratumError(`Invalid plan file: ${issues.join('; ')}`);
  }
  return result.data;
}
