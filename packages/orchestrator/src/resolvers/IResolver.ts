import type { Value } from '@stratum/contracts';
import type { ReferenceSegment } from '@stratum/parser';

export interface ResolveContext {
  /** Block holding the reference, for error messages */
  address: string;
  /** Instance number while expanding a resource that sets `count` */
  countIndex?: number;
}

/**
 * Interface for reference resolvers.
 * Each resolver handles one kind of reference (var, count, resource).
 */
export interface IResolver {
  resolve(segments: ReferenceSegment[], context: ResolveContext): Value;
}
