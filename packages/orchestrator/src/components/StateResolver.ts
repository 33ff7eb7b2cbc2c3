import {
  formatReference,
  type OutputDeclaration,
  type ReferenceTarget,
  type ResolvedAttributes,
  type ResolvedValue,
  resolveValue,
  UnresolvedReferenceError,
  type Value,
} from '@stratum/contracts';
import type { IState } from '@stratum/state';

import { ID_ATTRIBUTE } from '../constants';

/**
 * Resolves references against applied state. Used right before a provider
 * call, when every dependency of the resource has been applied.
 */
export class StateResolver {
  constructor(private state: IState) {}

  lookup(target: ReferenceTarget, address: string): ResolvedValue {
    const key = `${target.resourceType}.${target.name}`;
    const record = this.state.resources[key];
    if (!record) throw new UnresolvedReferenceError(address, formatReference(target), `"${key}" has not been applied`);

    if (target.attribute === ID_ATTRIBUTE) return record.id;

    const value = record.attributes[target.attribute];
    if (value === undefined) throw new UnresolvedReferenceError(address, formatReference(target), `attribute "${target.attribute}" is not set on "${key}"`);
    return value;
  }

  resolve(value: Value, address: string): ResolvedValue {
    const resolved = resolveValue(value, (target) => this.lookup(target, address));
    // lookup throws instead of returning undefined
    if (resolved === undefined) throw new Error(`Could not resolve a value of "${address}"`);
    return resolved;
  }

  resolveAttributes(attributes: Record<string, Value>, address: string): ResolvedAttributes {
    const resolved: ResolvedAttributes = {};
    for (const [name, value] of Object.entries(attributes)) resolved[name] = this.resolve(value, address);
    return resolved;
  }

  resolveOutputs(outputs: OutputDeclaration[]): Record<string, ResolvedValue> {
    const values: Record<string, ResolvedValue> = {};
    for (const output of outputs) values[output.name] = this.resolve(output.value, `output.${output.name}`);
    return values;
  }
}
