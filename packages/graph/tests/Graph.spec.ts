import { describe, expect, it } from 'vitest';

import { Graph } from '../src/Graph';

function buildGraph(nodes: string[], edges: Array<[string, string]>): Graph<null> {
  const graph = new Graph<null>();
  for (const node of nodes) graph.addNode(node, null);
  for (const [from, to] of edges) graph.addEdge(from, to);
  return graph;
}

describe('Graph', () => {
  it('should add nodes', () => {
    const graph = new Graph<string>();
    graph.addNode('A', 'Data A');
    expect(graph.getNode('A')).toBe('Data A');
    expect(graph.size).toBe(1);
  });

  it('should throw when adding duplicate node', () => {
    const graph = new Graph<string>();
    graph.addNode('A', 'val');
    expect(() => graph.addNode('A', 'val2')).toThrow(/exists/);
  });

  it('should sort nodes topologically (simple)', () => {
    const graph = buildGraph(['A', 'B'], [['A', 'B']]);

    expect(graph.topologicalSort().flat()).toEqual(['A', 'B']);
  });

  it('should sort nodes topologically (complex)', () => {
    // A -> B, A -> C, B -> D, C -> D
    const graph = buildGraph(
      ['A', 'B', 'C', 'D'],
      [
        ['A', 'B'],
        ['A', 'C'],
        ['B', 'D'],
        ['C', 'D'],
      ]
    );

    expect(graph.topologicalSort()).toEqual([['A'], ['B', 'C'], ['D']]);
  });

  it('should order each layer with the comparator', () => {
    const graph = buildGraph(['a', 'b', 'c'], []);

    expect(graph.topologicalSort((x, y) => y.localeCompare(x))).toEqual([['c', 'b', 'a']]);
  });

  it('should sort nodes batch-wise (parallel)', () => {
    // A -> C, B -> C, D independent
    const graph = buildGraph(
      ['A', 'B', 'C', 'D'],
      [
        ['A', 'C'],
        ['B', 'C'],
      ]
    );

    expect(graph.topologicalSort()).toEqual([['A', 'B', 'D'], ['C']]);
  });

  it('should pick the smallest ready node first in a single order', () => {
    // C -> A, ranked A < B < C < D
    const graph = buildGraph(['A', 'B', 'C', 'D'], [['C', 'A']]);
    const rank: Record<string, number> = { A: 0, B: 1, C: 2, D: 3 };

    expect(graph.topologicalOrder((x, y) => rank[x] - rank[y])).toEqual(['B', 'C', 'A', 'D']);
    expect(() => buildGraph(['A', 'B'], [['A', 'B'], ['B', 'A']]).topologicalOrder()).toThrow('Dependency Cycle Detected: A -> B -> A');
  });

  it('should detect cycles', () => {
    const graph = buildGraph(
      ['A', 'B'],
      [
        ['A', 'B'],
        ['B', 'A'],
      ]
    );

    expect(() => graph.topologicalSort()).toThrow('Dependency Cycle Detected: A -> B -> A');
  });

  it('should throw when adding edge from non-existent node', () => {
    const graph = new Graph<string>();
    graph.addNode('B', 'val');
    expect(() => graph.addEdge('A', 'B')).toThrow(/node a does not exist/i);
  });

  it('should throw when adding edge to non-existent node without recording it', () => {
    const graph = new Graph<string>();
    graph.addNode('A', 'val');
    expect(() => graph.addEdge('A', 'Z')).toThrow(/node z does not exist/i);
    expect(graph.successors('A')).toEqual([]);
  });

  describe('findCycle', () => {
    it('should return null for an acyclic graph', () => {
      const graph = buildGraph(
        ['A', 'B', 'C'],
        [
          ['A', 'B'],
          ['B', 'C'],
          ['A', 'C'],
        ]
      );

      expect(graph.findCycle()).toBeNull();
    });

    it('should return the full cycle path', () => {
      // X -> A -> B -> C -> A
      const graph = buildGraph(
        ['X', 'A', 'B', 'C'],
        [
          ['X', 'A'],
          ['A', 'B'],
          ['B', 'C'],
          ['C', 'A'],
        ]
      );

      expect(graph.findCycle()).toEqual(['A', 'B', 'C', 'A']);
    });

    it('should report a self loop', () => {
      const graph = buildGraph(['A'], [['A', 'A']]);

      expect(graph.findCycle()).toEqual(['A', 'A']);
    });
  });

  it('should expose predecessors, successors and edges', () => {
    const graph = buildGraph(
      ['A', 'B', 'C'],
      [
        ['A', 'C'],
        ['B', 'C'],
      ]
    );

    expect(graph.predecessors('C').sort()).toEqual(['A', 'B']);
    expect(graph.successors('A')).toEqual(['C']);
    expect(graph.hasEdge('B', 'C')).toBe(true);
    expect(graph.hasEdge('C', 'B')).toBe(false);
    expect(graph.edges()).toHaveLength(2);
  });
});
