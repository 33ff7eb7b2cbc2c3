import { UnresolvedReferenceError, type Value } from '@stratum/contracts';
import { type ReferenceSegment, renderReference } from '@stratum/parser';

import { IResolver, ResolveContext } from './IResolver';

/** `count.index`: the instance number of a counted resource */
export class CountResolver implements IResolver {
  resolve(segments: ReferenceSegment[], context: ResolveContext): Value {
    const reference = renderReference(segments);
    if (segments.length !== 2 || segments[1].name !== 'index' || segments[1].index)
      throw new UnresolvedReferenceError(context.address, reference, 'the only count attribute is count.index');
    if (context.countIndex === undefined) throw new UnresolvedReferenceError(context.address, reference, 'count.index is only available in resources that set count');

    return { type: 'Number', value: context.countIndex };
  }
}
