import {
  Address,
  type DesiredState,
  type ISchema,
  type ReferenceTarget,
  type ResolvedAttributes,
  type ResolvedValue,
  type Resource,
  type ResourceState,
  resolveValue,
  type Value,
  valuesEqual,
} from '@stratum/contracts';
import { Graph, type NodeComparator } from '@stratum/graph';
import type { IState } from '@stratum/state';

export type ActionType = 'CREATE' | 'UPDATE' | 'DELETE';

export interface AttributeChange {
  old?: ResolvedValue;
  new?: ResolvedValue;
  /** The new value is only known once a dependency has been applied */
  computed: boolean;
}

export interface PlanAction {
  type: ActionType;
  resourceType: string;
  name: string;
  id?: string; // Provider id, for UPDATE and DELETE
  attributes?: Record<string, Value>; // Desired attributes, still unresolved
  prior?: ResolvedAttributes; // Inputs recorded at the last apply
  changes?: Record<string, AttributeChange>;
  replace?: boolean;
  /** Addresses this resource depends on */
  dependencies: string[];
  /** For an UPDATE, applied dependencies it stops referencing */
  released?: string[];
}

/** Edges run from a dependency to its dependents */
export type DependencyGraph = Graph<Resource>;

/** Resolved desired inputs; undefined marks a value known only after apply */
type PlannedInputs = Record<string, ResolvedValue | undefined>;

export function addressOf(action: { resourceType: string; name: string }): string {
  return `${action.resourceType}.${action.name}`;
}

function diffInputs(prior: ResolvedAttributes, next: PlannedInputs): Record<string, AttributeChange> {
  const changes: Record<string, AttributeChange> = {};
  const names = [...new Set([...Object.keys(prior), ...Object.keys(next)])].sort();

  for (const name of names) {
    const old = prior[name];
    const value = next[name];

    if (name in next && value === undefined) changes[name] = { old, computed: true };
    else if (!valuesEqual(old, value)) changes[name] = { old, new: value, computed: false };
  }

  return changes;
}

function creationChanges(inputs: PlannedInputs): Record<string, AttributeChange> {
  const changes: Record<string, AttributeChange> = {};
  for (const name of Object.keys(inputs).sort()) {
    const value = inputs[name];
    changes[name] = value === undefined ? { computed: true } : { new: value, computed: false };
  }
  return changes;
}

/**
 * Orders destroys so that dependents go before their dependencies,
 * following the dependency edges recorded in applied state.
 */
function orderDestroys(destroys: PlanAction[], applied: IState): PlanAction[] {
  const reverse = new Graph<null>();
  for (const key of Object.keys(applied.resources)) reverse.addNode(key, null);

  for (const [key, record] of Object.entries(applied.resources))
    for (const dependency of record.dependencies) if (dependency !== key && reverse.hasNode(dependency)) reverse.addEdge(key, dependency);

  const byAddress = new Map(destroys.map((action) => [addressOf(action), action]));
  const ordered: PlanAction[] = [];
  for (const key of reverse.topologicalSort(Address.compareKeys).flat()) {
    const action = byAddress.get(key);
    if (action) ordered.push(action);
  }
  return ordered;
}

interface Diff {
  destroys: PlanAction[];
  applies: PlanAction[];
  /** Existing resources this plan deletes and creates again */
  replaced: Set<string>;
  /** Existing resources no longer in the configuration */
  removed: Set<string>;
}

function deleteOf(record: ResourceState, replace?: boolean): PlanAction {
  return {
    type: 'DELETE',
    resourceType: record.resourceType,
    name: record.name,
    id: record.id,
    prior: record.inputs,
    ...(replace ? { replace } : {}),
    dependencies: [...record.dependencies].sort(Address.compareKeys),
  };
}

function diffResources(desired: DesiredState, applied: IState, graph: DependencyGraph, schemas: Record<string, ISchema>, forced: Set<string>): Diff {
  const resources = new Map(desired.resources.map((resource) => [addressOf(resource), resource]));
  const planned = new Map<string, PlannedInputs>();
  // Created or replaced in this plan: provider-assigned values are unknown
  const recreated = new Set<string>();
  const diff: Diff = { destroys: [], applies: [], replaced: new Set(), removed: new Set() };

  const lookup = (target: ReferenceTarget): ResolvedValue | undefined => {
    const key = addressOf(target);
    if (resources.get(key)?.attributes[target.attribute] !== undefined) return planned.get(key)?.[target.attribute];
    if (recreated.has(key)) return undefined;

    const record = applied.resources[key];
    if (!record) return undefined;
    return target.attribute === 'id' ? record.id : record.attributes[target.attribute];
  };

  for (const key of graph.topologicalSort(Address.compareKeys).flat()) {
    const resource = resources.get(key);
    if (!resource) throw new Error(`Resource "${key}" is in the dependency graph but not in the desired state`);

    const inputs: PlannedInputs = {};
    for (const [name, value] of Object.entries(resource.attributes)) inputs[name] = resolveValue(value, lookup);
    planned.set(key, inputs);

    const dependencies = graph.predecessors(key).sort(Address.compareKeys);
    const base = { resourceType: resource.resourceType, name: resource.name, attributes: resource.attributes, dependencies };
    const record = applied.resources[key];

    if (!record) {
      recreated.add(key);
      diff.applies.push({ type: 'CREATE', ...base, changes: creationChanges(inputs) });
      continue;
    }

    const changes = diffInputs(record.inputs, inputs);
    const schema = schemas[resource.resourceType];
    const forcesNew = forced.has(key) || Object.keys(changes).some((name) => schema?.attributes[name]?.forceNew === true);

    if (forcesNew) {
      recreated.add(key);
      diff.replaced.add(key);
      diff.destroys.push(deleteOf(record, true));
      diff.applies.push({ type: 'CREATE', ...base, prior: record.inputs, changes, replace: true });
      continue;
    }

    // A dependent of a recreated resource is updated after it even when nothing it declares changed
    const tainted = dependencies.some((dependency) => recreated.has(dependency));
    if (Object.keys(changes).length === 0 && !tainted) continue;

    const released = record.dependencies.filter((dependency) => !dependencies.includes(dependency)).sort(Address.compareKeys);
    diff.applies.push({ type: 'UPDATE', ...base, id: record.id, prior: record.inputs, changes, ...(released.length > 0 ? { released } : {}) });
  }

  for (const [key, record] of Object.entries(applied.resources))
    if (!resources.has(key)) {
      diff.removed.add(key);
      diff.destroys.push(deleteOf(record));
    }

  return diff;
}

/** Existing resources whose applied dependencies include a replaced resource */
function stillReferencing(diff: Diff, applied: IState): string[] {
  const result: string[] = [];
  for (const [key, record] of Object.entries(applied.resources))
    if (!diff.replaced.has(key) && !diff.removed.has(key) && record.dependencies.some((dependency) => diff.replaced.has(dependency))) result.push(key);
  return result;
}

interface Operations {
  graph: Graph<PlanAction>;
  compare: NodeComparator;
}

/**
 * Orders every action against the others. Deletes come first, dependents
 * before dependencies, then creates and updates in dependency order, except
 * that a delete an update still has to release waits for that update.
 */
function operationsOf(diff: Diff, applied: IState): Operations {
  const preferred = [...orderDestroys(diff.destroys, applied), ...diff.applies];
  const graph = new Graph<PlanAction>();
  const rank = new Map<string, number>();
  const deleteId = (key: string): string => `DELETE ${key}`;
  const applyId = (key: string): string => `APPLY ${key}`;

  preferred.forEach((action, index) => {
    const id = action.type === 'DELETE' ? deleteId(addressOf(action)) : applyId(addressOf(action));
    graph.addNode(id, action);
    rank.set(id, index);
  });

  for (const action of preferred) {
    const key = addressOf(action);

    if (action.type === 'DELETE') {
      for (const dependency of action.dependencies) if (dependency !== key && graph.hasNode(deleteId(dependency))) graph.addEdge(deleteId(key), deleteId(dependency));
      if (graph.hasNode(applyId(key))) graph.addEdge(deleteId(key), applyId(key));
      continue;
    }

    for (const dependency of action.dependencies) if (graph.hasNode(applyId(dependency))) graph.addEdge(applyId(dependency), applyId(key));
    for (const dependency of action.released ?? []) if (graph.hasNode(deleteId(dependency))) graph.addEdge(applyId(key), deleteId(dependency));
  }

  return { graph, compare: (a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0) };
}

/**
 * Diffs the desired resources against the applied state.
 *
 * The result lists every DELETE first (dependents before dependencies), then
 * every CREATE and UPDATE in dependency order. A DELETE of a removed resource
 * that an UPDATE stops referencing is placed right after that UPDATE.
 * Resources without an ordering constraint between them are ordered by
 * (resourceType, name), so the same inputs always give the same plan.
 * Unchanged resources produce no action.
 *
 * Replacement is transitive: once a resource is recreated, the values its
 * dependents read from it are unknown, which replaces those dependents when
 * the attribute is forceNew and updates them otherwise. An existing resource
 * whose applied dependencies include a replaced one is replaced as well, as
 * the old object can't be deleted while something still references it. So is
 * an update whose release of a removed resource would have to wait for itself.
 */
export function plan(desired: DesiredState, applied: IState, graph: DependencyGraph, schemas: Record<string, ISchema> = {}): PlanAction[] {
  const forced = new Set<string>();

  for (;;) {
    const diff = diffResources(desired, applied, graph, schemas, forced);
    const referencing = stillReferencing(diff, applied);
    if (referencing.length > 0) {
      for (const key of referencing) forced.add(key);
      continue;
    }

    const operations = operationsOf(diff, applied);
    const blocking: string[] = [];
    for (const id of operations.graph.findCycle(operations.compare) ?? []) {
      const action = operations.graph.getNode(id);
      if (action?.type === 'UPDATE' && action.released) blocking.push(addressOf(action));
    }
    if (blocking.length === 0) {
      const ordered: PlanAction[] = [];
      for (const id of operations.graph.topologicalOrder(operations.compare)) {
        const action = operations.graph.getNode(id);
        if (action) ordered.push(action);
      }
      return ordered;
    }
    for (const key of blocking) forced.add(key);
  }
}

export { hashConfig, parsePlanFile, type PlanFile, samePlan, serializePlan } from './PlanFile';
