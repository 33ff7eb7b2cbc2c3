import type { Address } from './Address';
import type { ResolvedAttributes, Value } from './values';

/** A declared resource after variables and `count` have been expanded */
export interface Resource {
  resourceType: string;
  name: string;
  attributes: Record<string, Value>;
  dependsOn: Address[];
}

export interface OutputDeclaration {
  name: string;
  value: Value;
}

/** Everything one run asks for. Treated as immutable for the duration of a plan. */
export interface DesiredState {
  resources: Resource[];
  outputs: OutputDeclaration[];
}

/** A resource as last reconciled, including what the provider assigned */
export interface ResourceState {
  resourceType: string;
  name: string;
  id: string;
  /** Configured attributes, resolved */
  inputs: ResolvedAttributes;
  /** Inputs merged with the provider's computed attributes */
  attributes: ResolvedAttributes;
  /** Addresses this resource referenced when it was last applied */
  dependencies: string[];
}
