import type { ISchema } from '@stratum/contracts';
import { z } from 'zod';

import table from './kinds.json';

const attributeSchema = z.object({
  type: z.enum(['string', 'number', 'boolean', 'list', 'map']),
  required: z.boolean().optional(),
  forceNew: z.boolean().optional(),
  computed: z.boolean().optional(),
  /** Computed value: `{id}`, `{octet}` and `{<input>}` are substituted */
  template: z.string().optional(),
  /** Resource type whose id (or arn) the value must name */
  references: z.string().optional(),
});

const kindSchema = z.object({
  idPrefix: z.string().min(1),
  attributes: z.record(attributeSchema),
  exactlyOneOf: z.array(z.array(z.string())).optional(),
});

export type KindDefinition = z.infer<typeof kindSchema>;

export const KINDS: Record<string, KindDefinition> = z.record(kindSchema).parse(table);

/** The engine-facing schema of a kind; simulator-only fields are left out */
export function schemaOf(kind: KindDefinition): ISchema {
  const attributes: ISchema['attributes'] = {};
  for (const [name, { type, required, forceNew, computed }] of Object.entries(kind.attributes)) attributes[name] = { type, required, forceNew, computed };
  return kind.exactlyOneOf ? { attributes, exactlyOneOf: kind.exactlyOneOf } : { attributes };
}
