import { type ResolvedValue, StratumError } from '@stratum/contracts';
import { z } from 'zod';

import { IState, STATE_FORMAT_VERSION } from './IState';

export const resolvedValueSchema: z.ZodType<ResolvedValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(resolvedValueSchema), z.record(resolvedValueSchema)])
);

const resourceStateSchema = z.object({
  resourceType: z.string().min(1),
  name: z.string().min(1),
  id: z.string(),
  inputs: z.record(resolvedValueSchema),
  attributes: z.record(resolvedValueSchema),
  dependencies: z.array(z.string()),
});

export const stateSchema: z.ZodType<IState, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(STATE_FORMAT_VERSION),
  serial: z.number().int().nonnegative(),
  lineage: z.string().min(1),
  resources: z.record(resourceStateSchema),
  outputs: z.record(resolvedValueSchema).default({}),
});

export const lockInfoSchema = z.object({
  id: z.string(),
  operation: z.string(),
  who: z.string(),
  created: z.string(),
});

/** Validates parsed JSON against the state file format */
export function parseState(data: unknown, source: string): IState {
  const result = stateSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new StratumError(`Invalid state file ${source}: ${issues.join('; ')}`);
  }
  return result.data;
}
