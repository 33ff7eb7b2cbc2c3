import { SchemaError, UnresolvedReferenceError, type Value } from '@stratum/contracts';
import { type ReferenceSegment, renderReference } from '@stratum/parser';

import { IResolver, ResolveContext } from './IResolver';

export interface VariableDefinition {
  value?: Value;
  description?: string;
}

interface IndexEvaluator {
  index(segment: ReferenceSegment, context: ResolveContext): number | string | undefined;
}

/** `var.name`, optionally followed by list indexes and map keys: `var.cidrs[count.index]`, `var.tags.Name` */
export class VariableResolver implements IResolver {
  constructor(
    private variables: Map<string, VariableDefinition>,
    private evaluator: IndexEvaluator
  ) {}

  resolve(segments: ReferenceSegment[], context: ResolveContext): Value {
    const reference = renderReference(segments);
    const [, variableSegment, ...path] = segments;
    if (!variableSegment) throw new UnresolvedReferenceError(context.address, reference, 'expected var.<name>');

    const variable = this.variables.get(variableSegment.name);
    if (!variable) throw new UnresolvedReferenceError(context.address, reference, `variable "${variableSegment.name}" is not declared`);
    if (!variable.value)
      throw new SchemaError(context.address, [`Variable "${variableSegment.name}" has no value (set a default, a values file entry or --var ${variableSegment.name}=...)`]);

    let value = this.select(variable.value, this.evaluator.index(variableSegment, context), reference, context);
    for (const segment of path) {
      value = this.select(value, segment.name, reference, context);
      value = this.select(value, this.evaluator.index(segment, context), reference, context);
    }
    return value;
  }

  private select(value: Value, key: number | string | undefined, reference: string, context: ResolveContext): Value {
    if (key === undefined) return value;

    if (typeof key === 'number' && value.type === 'List') {
      const item = value.value[key];
      if (!item) throw new UnresolvedReferenceError(context.address, reference, `index ${key} is out of range (length ${value.value.length})`);
      return item;
    }

    if (typeof key === 'string' && value.type === 'Map') {
      const item = value.value[key];
      if (!item) throw new UnresolvedReferenceError(context.address, reference, `key "${key}" does not exist`);
      return item;
    }

    throw new UnresolvedReferenceError(context.address, reference, `cannot select ${JSON.stringify(key)} from a ${value.type.toLowerCase()}`);
  }
}
