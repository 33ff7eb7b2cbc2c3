export type NodeComparator = (a: string, b: string) => number;

const defaultCompare: NodeComparator = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Directed graph. An edge `from -> to` means `from` must be handled before `to`.
 */
export class Graph<T> {
  private nodes: Map<string, T> = new Map();
  private adjacencyList: Map<string, Set<string>> = new Map();
  private reverseAdjacencyList: Map<string, Set<string>> = new Map();

  addNode(id: string, data: T): void {
    if (this.nodes.has(id)) throw new Error(`Node ${id} already exists`);
    this.nodes.set(id, data);
    this.adjacencyList.set(id, new Set());
    this.reverseAdjacencyList.set(id, new Set());
  }

  addEdge(from: string, to: string): void {
    const successors = this.successorSet(from);
    const predecessors = this.predecessorSet(to);

    successors.add(to);
    predecessors.add(from);
  }

  getNode(id: string): T | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  hasEdge(from: string, to: string): boolean {
    return this.adjacencyList.get(from)?.has(to) ?? false;
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Nodes that must come after `id` */
  successors(id: string): string[] {
    return [...this.successorSet(id)];
  }

  /** Nodes that must come before `id` */
  predecessors(id: string): string[] {
    return [...this.predecessorSet(id)];
  }

  edges(): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const [from, targets] of this.adjacencyList) for (const to of targets) result.push([from, to]);
    return result;
  }

  /*
   * Returns nodes in topological order, grouped by layers for parallel execution.
   * Format: [['A', 'B'], ['C']] -> A and B can run in parallel, then C.
   */
  topologicalSort(compare: NodeComparator = defaultCompare): string[][] {
    const inDegree = this.calculateInDegrees();
    const result: string[][] = [];
    let queue: string[] = [];

    for (const [node, degree] of inDegree.entries()) if (degree === 0) queue.push(node);

    while (queue.length > 0) {
      const currentLayer = [...queue].sort(compare);
      result.push(currentLayer);

      const nextQueue: string[] = [];

      for (const node of currentLayer)
        for (const neighbor of this.successorSet(node)) {
          const newDegree = (inDegree.get(neighbor) ?? 0) - 1;
          inDegree.set(neighbor, newDegree);
          if (newDegree === 0) nextQueue.push(neighbor);
        }

      queue = nextQueue;
    }

    const totalNodes = result.reduce((acc, layer) => acc + layer.length, 0);
    if (totalNodes !== this.nodes.size) this.throwCycle();

    return result;
  }

  /**
   * Returns a single topological order. Among the nodes that are ready, the
   * smallest by `compare` always goes next.
   */
  topologicalOrder(compare: NodeComparator = defaultCompare): string[] {
    const inDegree = this.calculateInDegrees();
    const ready: string[] = [];
    const result: string[] = [];

    for (const [node, degree] of inDegree.entries()) if (degree === 0) ready.push(node);

    while (ready.length > 0) {
      ready.sort(compare);
      const node = ready.shift();
      if (node === undefined) break;
      result.push(node);

      for (const neighbor of this.successorSet(node)) {
        const newDegree = (inDegree.get(neighbor) ?? 0) - 1;
        inDegree.set(neighbor, newDegree);
        if (newDegree === 0) ready.push(neighbor);
      }
    }

    if (result.length !== this.nodes.size) this.throwCycle();

    return result;
  }

  /**
   * Depth-first search with a recursion stack. Returns the first cycle found,
   * closed on its starting node (['A', 'B', 'A']), or null if the graph is acyclic.
   * Nodes and edges are visited in `compare` order.
   */
  findCycle(compare: NodeComparator = defaultCompare): string[] | null {
    const visited = new Set<string>();
    const stack: string[] = [];
    const onStack = new Set<string>();

    const visit = (node: string): string[] | null => {
      visited.add(node);
      stack.push(node);
      onStack.add(node);

      for (const neighbor of [...this.successorSet(node)].sort(compare)) {
        if (onStack.has(neighbor)) return [...stack.slice(stack.indexOf(neighbor)), neighbor];
        if (!visited.has(neighbor)) {
          const cycle = visit(neighbor);
          if (cycle) return cycle;
        }
      }

      stack.pop();
      onStack.delete(node);
      return null;
    };

    for (const node of [...this.nodes.keys()].sort(compare)) {
      if (visited.has(node)) continue;
      const cycle = visit(node);
      if (cycle) return cycle;
    }

    return null;
  }

  private throwCycle(): never {
    const cycle = this.findCycle();
    throw new Error(cycle ? `Dependency Cycle Detected: ${cycle.join(' -> ')}` : 'Dependency Cycle Detected');
  }

  private successorSet(id: string): Set<string> {
    const set = this.adjacencyList.get(id);
    if (!set) throw new Error(`Node ${id} does not exist`);
    return set;
  }

  private predecessorSet(id: string): Set<string> {
    const set = this.reverseAdjacencyList.get(id);
    if (!set) throw new Error(`Node ${id} does not exist`);
    return set;
  }

  private calculateInDegrees(): Map<string, number> {
    const inDegree: Map<string, number> = new Map();

    for (const [node, predecessors] of this.reverseAdjacencyList) inDegree.set(node, predecessors.size);

    return inDegree;
  }
}
