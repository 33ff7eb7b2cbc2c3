import { Address } from './Address';
import { SchemaError } from './errors';
import type { Resource } from './resource';
import type { ISchema, SchemaType } from './schema';
import type { Value } from './values';

const VALUE_TYPES: Record<Exclude<Value['type'], 'Reference'>, SchemaType> = {
  String: 'string',
  Number: 'number',
  Boolean: 'boolean',
  List: 'list',
  Map: 'map',
};

/** Every problem with a declaration against its schema; empty when valid */
export function schemaIssues(resource: Resource, schema: ISchema): string[] {
  const issues: string[] = [];

  for (const [name, value] of Object.entries(resource.attributes)) {
    const definition = schema.attributes[name];
    if (!definition) {
      issues.push(`Unknown attribute "${name}"`);
      continue;
    }
    if (definition.computed) {
      issues.push(`Attribute "${name}" is computed by the provider and cannot be set`);
      continue;
    }
    // A reference's type is only known once it resolves
    if (value.type === 'Reference') continue;

    const actual = VALUE_TYPES[value.type];
    if (actual !== definition.type) issues.push(`Attribute "${name}" must be a ${definition.type}, got ${actual}`);
  }

  for (const [name, definition] of Object.entries(schema.attributes))
    if (definition.required && !(name in resource.attributes)) issues.push(`Missing required attribute "${name}"`);

  for (const group of schema.exactlyOneOf ?? []) {
    const set = group.filter((name) => name in resource.attributes);
    if (set.length !== 1) issues.push(`Exactly one of ${group.map((name) => `"${name}"`).join(', ')} must be set (found ${set.length})`);
  }

  return issues;
}

/**
 * Checks a declaration against its resource type's schema.
 * Throws SchemaError listing every issue found.
 */
export function validate(resource: Resource, schema: ISchema): void {
  const issues = schemaIssues(resource, schema);
  if (issues.length > 0) throw new SchemaError(Address.of(resource).toString(), issues);
}
