import { Address, UnresolvedReferenceError, type Value } from '@stratum/contracts';
import { type ReferenceSegment, renderReference } from '@stratum/parser';

import { IResolver, ResolveContext } from './IResolver';

interface IndexEvaluator {
  index(segment: ReferenceSegment, context: ResolveContext): number | string | undefined;
}

/**
 * `type.name.attribute` and `type.name[i].attribute`, turned into typed
 * references. Whether the target exists is checked once the whole
 * configuration is known, when the dependency graph is built.
 */
export class ResourceResolver implements IResolver {
  constructor(
    private counts: Map<string, number>,
    private evaluator: IndexEvaluator
  ) {}

  resolve(segments: ReferenceSegment[], context: ResolveContext): Value {
    const reference = renderReference(segments);
    if (segments.length !== 3) throw new UnresolvedReferenceError(context.address, reference, 'expected <type>.<name>.<attribute>');

    const [typeSegment, nameSegment, attributeSegment] = segments;
    if (typeSegment.index || attributeSegment.index) throw new UnresolvedReferenceError(context.address, reference, 'only the resource name can be indexed');

    const name = this.instanceName(typeSegment.name, nameSegment, context, reference);
    return { type: 'Reference', value: { resourceType: typeSegment.name, name, attribute: attributeSegment.name } };
  }

  /** `depends_on` entries: `type.name`, or `type.name[i]`; a counted resource without index means every instance */
  addresses(segments: ReferenceSegment[], context: ResolveContext): Address[] {
    const reference = renderReference(segments);
    if (segments.length !== 2 || segments[0].index) throw new UnresolvedReferenceError(context.address, reference, 'depends_on entries must be <type>.<name>');

    const [typeSegment, nameSegment] = segments;
    const count = this.counts.get(`${typeSegment.name}.${nameSegment.name}`);
    if (count !== undefined && !nameSegment.index) return Array.from({ length: count }, (_, index) => new Address(typeSegment.name, `${nameSegment.name}[${index}]`));

    return [new Address(typeSegment.name, this.instanceName(typeSegment.name, nameSegment, context, reference))];
  }

  private instanceName(resourceType: string, segment: ReferenceSegment, context: ResolveContext, reference: string): string {
    const base = `${resourceType}.${segment.name}`;
    const counted = this.counts.has(base);
    const index = this.evaluator.index(segment, context);

    if (index === undefined) {
      if (counted) throw new UnresolvedReferenceError(context.address, reference, `"${base}" sets count; reference one instance, e.g. ${base}[0]`);
      return segment.name;
    }

    if (!counted) throw new UnresolvedReferenceError(context.address, reference, `"${base}" does not set count and cannot be indexed`);
    if (typeof index !== 'number') throw new UnresolvedReferenceError(context.address, reference, 'instance index must be a number');
    return `${segment.name}[${index}]`;
  }
}
