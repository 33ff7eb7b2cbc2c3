/** Pointer from an attribute to another resource's attribute, e.g. `aws_vpc.main.id` */
export interface ReferenceTarget {
  resourceType: string;
  name: string;
  attribute: string;
}

/** Attribute value as declared in configuration (may still contain references) */
export type Value =
  | { type: 'String'; value: string }
  | { type: 'Number'; value: number }
  | { type: 'Boolean'; value: boolean }
  | { type: 'List'; value: Value[] }
  | { type: 'Map'; value: Record<string, Value> }
  | { type: 'Reference'; value: ReferenceTarget };

/** Attribute value once every reference has been replaced by what it points to */
export type ResolvedValue = string | number | boolean | ResolvedValue[] | { [key: string]: ResolvedValue };

export type ResolvedAttributes = Record<string, ResolvedValue>;

/** Collects every reference contained in a value, including nested lists and maps */
export function collectReferences(value: Value, into: ReferenceTarget[] = []): ReferenceTarget[] {
  switch (value.type) {
    case 'Reference': {
      into.push(value.value);
      break;
    }
    case 'List': {
      for (const item of value.value) collectReferences(item, into);
      break;
    }
    case 'Map': {
      for (const item of Object.values(value.value)) collectReferences(item, into);
      break;
    }
    default: {
      break;
    }
  }
  return into;
}

export type ReferenceLookup = (target: ReferenceTarget) => ResolvedValue | undefined;

/**
 * Replaces every reference through `lookup`.
 * Returns undefined as soon as one reference has no known value.
 */
export function resolveValue(value: Value, lookup: ReferenceLookup): ResolvedValue | undefined {
  switch (value.type) {
    case 'String':
    case 'Number':
    case 'Boolean': {
      return value.value;
    }
    case 'List': {
      const items: ResolvedValue[] = [];
      for (const item of value.value) {
        const resolved = resolveValue(item, lookup);
        if (resolved === undefined) return undefined;
        items.push(resolved);
      }
      return items;
    }
    case 'Map': {
      const entries: Record<string, ResolvedValue> = {};
      for (const [key, item] of Object.entries(value.value)) {
        const resolved = resolveValue(item, lookup);
        if (resolved === undefined) return undefined;
        entries[key] = resolved;
      }
      return entries;
    }
    case 'Reference': {
      return lookup(value.value);
    }
  }
}

/** Wraps a plain value back into the tagged form */
export function fromLiteral(value: ResolvedValue): Value {
  if (typeof value === 'string') return { type: 'String', value };
  if (typeof value === 'number') return { type: 'Number', value };
  if (typeof value === 'boolean') return { type: 'Boolean', value };
  if (Array.isArray(value)) return { type: 'List', value: value.map((item) => fromLiteral(item)) };

  const entries: Record<string, Value> = {};
  for (const [key, item] of Object.entries(value)) entries[key] = fromLiteral(item);
  return { type: 'Map', value: entries };
}

/** Structural equality for plain values; map key order is ignored */
export function valuesEqual(a: ResolvedValue | undefined, b: ResolvedValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (typeof a === 'object' && typeof b === 'object') {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) if (!valuesEqual(a[key], b[key])) return false;
    return true;
  }
  return a === b;
}

export function formatReference(target: ReferenceTarget): string {
  return `${target.resourceType}.${target.name}.${target.attribute}`;
}
