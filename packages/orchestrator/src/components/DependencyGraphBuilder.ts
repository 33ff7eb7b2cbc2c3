import {
  Address,
  collectReferences,
  CycleError,
  formatReference,
  type ISchema,
  type OutputDeclaration,
  type ReferenceTarget,
  type Resource,
  UnresolvedReferenceError,
} from '@stratum/contracts';
import { Graph } from '@stratum/graph';
import type { DependencyGraph } from '@stratum/planner';

import { ID_ATTRIBUTE } from '../constants';

/**
 * Builds the dependency graph of a desired state. An edge runs from a
 * dependency to each resource that references it or names it in depends_on.
 */
export class DependencyGraphBuilder {
  constructor(private schemas: Record<string, ISchema> = {}) {}

  build(resources: Resource[]): DependencyGraph {
    const graph = new Graph<Resource>();
    for (const resource of resources) graph.addNode(Address.of(resource).toString(), resource);

    for (const resource of resources) {
      const address = Address.of(resource).toString();

      for (const value of Object.values(resource.attributes))
        for (const target of collectReferences(value)) this.addReference(graph, address, target);

      for (const dependency of resource.dependsOn) {
        const key = dependency.toString();
        if (key === address) throw new UnresolvedReferenceError(address, key, 'a resource cannot depend on itself');
        if (!graph.hasNode(key)) throw new UnresolvedReferenceError(address, key, `depends_on names undeclared resource "${key}"`);
        graph.addEdge(key, address);
      }
    }

    // Graph edges run dependency -> dependent; report the cycle in reference order
    const cycle = graph.findCycle(Address.compareKeys);
    if (cycle) throw new CycleError([...cycle].reverse());

    return graph;
  }

  /** Outputs may only reference declared resources and attributes */
  checkOutputs(outputs: OutputDeclaration[], graph: DependencyGraph): void {
    for (const output of outputs) for (const target of collectReferences(output.value)) this.checkTarget(graph, `output.${output.name}`, target);
  }

  private addReference(graph: DependencyGraph, address: string, target: ReferenceTarget): void {
    const key = `${target.resourceType}.${target.name}`;
    if (key === address) throw new UnresolvedReferenceError(address, formatReference(target), 'a resource cannot reference itself');

    this.checkTarget(graph, address, target);
    graph.addEdge(key, address);
  }

  private checkTarget(graph: DependencyGraph, address: string, target: ReferenceTarget): void {
    const key = `${target.resourceType}.${target.name}`;
    const resource = graph.getNode(key);
    if (!resource) throw new UnresolvedReferenceError(address, formatReference(target), `resource "${key}" is not declared`);

    const schema = this.schemas[target.resourceType];
    if (!schema || target.attribute === ID_ATTRIBUTE || target.attribute in resource.attributes) return;
    if (schema.attributes[target.attribute]?.computed) return;

    throw new UnresolvedReferenceError(address, formatReference(target), `attribute "${target.attribute}" is neither set on "${key}" nor computed by its provider`);
  }
}
