import { Address, UnresolvedReferenceError, type Value } from '@stratum/contracts';
import { type AttributeValue, type ReferenceSegment, renderReference } from '@stratum/parser';

import { CountResolver } from './CountResolver';
import { IResolver, ResolveContext } from './IResolver';
import { ResourceResolver } from './ResourceResolver';
import { VariableDefinition, VariableResolver } from './VariableResolver';

/**
 * Turns parsed attribute values into resource model values: variables and
 * `count.index` are substituted, resource references become typed references.
 */
export class ReferenceResolver {
  private resolvers: Map<string, IResolver> = new Map();
  private resourceResolver: ResourceResolver;

  constructor(variables: Map<string, VariableDefinition>, counts: Map<string, number> = new Map()) {
    this.resolvers.set('var', new VariableResolver(variables, this));
    this.resolvers.set('count', new CountResolver());
    this.resourceResolver = new ResourceResolver(counts, this);
  }

  resolve(segments: ReferenceSegment[], context: ResolveContext): Value {
    const resolver = this.resolvers.get(segments[0].name) ?? this.resourceResolver;
    return resolver.resolve(segments, context);
  }

  convert(value: AttributeValue, context: ResolveContext): Value {
    switch (value.type) {
      case 'List': {
        return { type: 'List', value: value.value.map((item) => this.convert(item, context)) };
      }
      case 'Map': {
        const entries: Record<string, Value> = {};
        for (const [key, item] of Object.entries(value.value)) entries[key] = this.convert(item, context);
        return { type: 'Map', value: entries };
      }
      case 'Reference': {
        return this.resolve(value.value, context);
      }
      default: {
        return value;
      }
    }
  }

  addresses(segments: ReferenceSegment[], context: ResolveContext): Address[] {
    return this.resourceResolver.addresses(segments, context);
  }

  /** Evaluates the `[...]` of a segment to a list index or map key */
  index(segment: ReferenceSegment, context: ResolveContext): number | string | undefined {
    if (!segment.index) return undefined;

    const value = this.convert(segment.index, context);
    if (value.type === 'String') return value.value;
    if (value.type === 'Number' && Number.isInteger(value.value) && value.value >= 0) return value.value;
    throw new UnresolvedReferenceError(context.address, renderReference([segment]), 'index must be a non-negative integer or a string');
  }
}
