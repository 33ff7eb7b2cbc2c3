import type { CreateResult, IProvider, IResourceHandler, ISchema, ResolvedAttributes } from '@stratum/contracts';
import { ProviderError } from '@stratum/contracts';
import { setTimeout as delay } from 'node:timers/promises';

import { type CloudObject, CloudStore } from './CloudStore';
import { KINDS } from './kinds';
import { SimulatedResource } from './resources/SimulatedResource';

export type Operation = 'create' | 'update' | 'delete';

/** Makes matching calls fail, to rehearse retries and partial failures */
export interface Fault {
  operation?: Operation;
  resourceType?: string;
  code: string;
  retryable: boolean;
  /** How many matching calls fail; every one when omitted */
  times?: number;
}

export interface SimulatedCloudOptions {
  /** JSON file holding the simulated objects; kept in memory when omitted */
  file?: string;
  /** Added to every call */
  latencyMs?: number;
  faults?: Fault[];
}

/**
 * A cloud that lives in memory or in a local file, offering AWS-style
 * networking, compute, load balancing, storage and database resource types.
 */
export class SimulatedCloudProvider implements IProvider {
  readonly name = 'sim';
  readonly resources: string[];
  private handlers: Map<string, IResourceHandler> = new Map();
  private store: CloudStore;
  private faults: Fault[];
  private calls: Array<{ operation: Operation; resourceType: string }> = [];

  constructor(private options: SimulatedCloudOptions = {}) {
    this.store = new CloudStore(options.file);
    this.faults = (options.faults ?? []).map((fault) => ({ ...fault }));

    for (const [resourceType, kind] of Object.entries(KINDS)) this.handlers.set(resourceType, new SimulatedResource(resourceType, kind, this.store));
    this.resources = [...this.handlers.keys()].sort();
  }

  async getSchema(type: string): Promise<ISchema> {
    return this.handler(type).getSchema();
  }

  async create(type: string, inputs: ResolvedAttributes): Promise<CreateResult> {
    const handler = this.handler(type);
    await this.simulate('create', type);
    return handler.create(inputs);
  }

  async update(type: string, id: string, inputs: ResolvedAttributes): Promise<ResolvedAttributes> {
    const handler = this.handler(type);
    await this.simulate('update', type);
    return handler.update(id, inputs);
  }

  async delete(type: string, id: string): Promise<void> {
    const handler = this.handler(type);
    await this.simulate('delete', type);
    await handler.delete(id);
  }

  /** Everything the simulated cloud holds, ordered by id */
  async objects(): Promise<CloudObject[]> {
    return this.store.list();
  }

  /** Calls received so far, failed ones included */
  get history(): ReadonlyArray<{ operation: Operation; resourceType: string }> {
    return this.calls;
  }

  private handler(type: string): IResourceHandler {
    const handler = this.handlers.get(type);
    if (!handler) throw new Error(`Unsupported resource type: ${type}`);
    return handler;
  }

  private async simulate(operation: Operation, resourceType: string): Promise<void> {
    this.calls.push({ operation, resourceType });
    if (this.options.latencyMs) await delay(this.options.latencyMs);

    const fault = this.faults.find(
      (candidate) =>
        (candidate.operation ?? operation) === operation && (candidate.resourceType ?? resourceType) === resourceType && (candidate.times === undefined || candidate.times > 0)
    );
    if (!fault) return;

    if (fault.times !== undefined) fault.times--;
    throw new ProviderError(`Simulated ${fault.code} on ${operation} of ${resourceType}`, fault.retryable, fault.code);
  }
}

export { type CloudData, type CloudObject, CloudStore } from './CloudStore';
export { KINDS, type KindDefinition, schemaOf } from './kinds';
export { SimulatedResource } from './resources/SimulatedResource';
