import { type DesiredState, type IProvider, type ResolvedValue, SchemaError, StratumError, validate } from '@stratum/contracts';
import { Graph } from '@stratum/graph';
import { type DependencyGraph, plan, type PlanAction, samePlan } from '@stratum/planner';
import type { StateManager } from '@stratum/state';

import { ActionExecutor, type ApplyReport, type ExecutorOptions } from './components/ActionExecutor';
import { ConfigLoader, type ConfigSource, type VariableValues } from './components/ConfigLoader';
import { DependencyGraphBuilder } from './components/DependencyGraphBuilder';
import { ProviderRegistry } from './components/ProviderRegistry';
import { StateResolver } from './components/StateResolver';

export interface PlanResult {
  actions: PlanAction[];
  graph: DependencyGraph;
  desired: DesiredState;
}

export interface ApplyOptions extends ExecutorOptions {
  /** A plan shown to the user earlier; the apply fails if planning again gives anything else */
  plan?: PlanAction[];
}

export interface ApplyResult extends ApplyReport {
  actions: PlanAction[];
  outputs: Record<string, ResolvedValue>;
}

export class Orchestrator {
  private registry: ProviderRegistry = new ProviderRegistry();
  private loader: ConfigLoader = new ConfigLoader();

  constructor(private stateManager: StateManager) {}

  /**
   * Register a provider for specific resource types
   */
  registerProvider(provider: IProvider): void {
    this.registry.register(provider);
  }

  /**
   * Loads the configuration and checks every resource against its schema.
   * Does not look at references between resources.
   */
  async validate(config: ConfigSource, variables: VariableValues = {}): Promise<DesiredState> {
    const desired = this.loader.load(config, variables);

    for (const resource of desired.resources)
      if (!this.registry.has(resource.resourceType))
        throw new SchemaError(`${resource.resourceType}.${resource.name}`, [`No provider registered for resource type "${resource.resourceType}"`]);

    const schemas = await this.registry.getSchemas(desired.resources.map((resource) => resource.resourceType));
    for (const resource of desired.resources) validate(resource, schemas[resource.resourceType]);

    return desired;
  }

  /**
   * Generate an execution plan without applying it
   */
  async plan(config: ConfigSource, variables: VariableValues = {}): Promise<PlanResult> {
    return this.stateManager.withLock('plan', () => this.computePlan(config, variables));
  }

  /**
   * Plans and executes under one lock. The lock is released when the run ends,
   * whether it completed, failed part way or was cancelled.
   */
  async apply(config: ConfigSource, variables: VariableValues = {}, options: ApplyOptions = {}): Promise<ApplyResult> {
    return this.stateManager.withLock('apply', async () => {
      const { actions, desired } = await this.computePlan(config, variables);
      if (options.plan && !samePlan(options.plan, actions))
        throw new StratumError('Saved plan is stale: the configuration or the state changed since it was created. Run plan again.');

      return this.execute(actions, desired, options);
    });
  }

  /** Plan that removes every applied resource */
  async planDestroy(): Promise<PlanAction[]> {
    return this.stateManager.withLock('plan', async () => this.destroyActions());
  }

  async destroy(options: ApplyOptions = {}): Promise<ApplyResult> {
    return this.stateManager.withLock('destroy', async () => {
      const actions = await this.destroyActions();
      if (options.plan && !samePlan(options.plan, actions)) throw new StratumError('Saved plan is stale: the state changed since it was created. Run destroy again.');

      return this.execute(actions, { resources: [], outputs: [] }, options);
    });
  }

  async outputs(): Promise<Record<string, ResolvedValue>> {
    return (await this.stateManager.load()).outputs;
  }

  private async computePlan(config: ConfigSource, variables: VariableValues): Promise<PlanResult> {
    const desired = await this.validate(config, variables);
    const schemas = await this.registry.getSchemas(desired.resources.map((resource) => resource.resourceType));

    const builder = new DependencyGraphBuilder(schemas);
    const graph = builder.build(desired.resources);
    builder.checkOutputs(desired.outputs, graph);

    const applied = await this.stateManager.load();
    return { actions: plan(desired, applied, graph, schemas), graph, desired };
  }

  private async destroyActions(): Promise<PlanAction[]> {
    const applied = await this.stateManager.load();
    return plan({ resources: [], outputs: [] }, applied, new Graph(), {});
  }

  private async execute(actions: PlanAction[], desired: DesiredState, options: ExecutorOptions): Promise<ApplyResult> {
    const executor = new ActionExecutor(this.registry, this.stateManager, options);
    const report = await executor.execute(actions);
    if (!report.complete) return { ...report, actions, outputs: report.state.outputs };

    const outputs = new StateResolver(report.state).resolveOutputs(desired.outputs);
    await this.stateManager.setOutputs(outputs);
    return { ...report, state: await this.stateManager.snapshot(), actions, outputs };
  }
}

export type { ApplyReport, ExecutorEvent, ExecutorOptions, OperationResult, OperationStatus } from './components/ActionExecutor';
export { ActionExecutor, gatingOf } from './components/ActionExecutor';
export { CONFIG_EXTENSION, ConfigLoader, configContent, readConfigDirectory, toConfigFiles } from './components/ConfigLoader';
export type { ConfigFile, ConfigSource, VariableValues } from './components/ConfigLoader';
export { DependencyGraphBuilder } from './components/DependencyGraphBuilder';
export { ProviderRegistry } from './components/ProviderRegistry';
export { StateResolver } from './components/StateResolver';
export * from './constants';
export { backoffDelay, RETRY_DEFAULTS, shouldRetry, withTimeout } from './retry';
export type { RetryConfig } from './retry';
