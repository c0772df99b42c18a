/**
 * Graph Traversal
 *
 * @module digraph-kit/graph/traversal
 */

/** What a traversal needs from a graph */
export interface TraversableGraph<N> {
  outNeighbors(node: N): Iterable<N>;
}

/**
 * Nodes reachable from `start`, breadth first
 *
 * The queue is seeded with the out-neighbors of `start`, so `start` itself is
 * only yielded when it lies on a cycle. Each node is yielded once.
 */
export function* visitBreadthFirst<N>(
  graph: TraversableGraph<N>,
  start: N,
): Generator<N> {
  const queue: N[] = Array.from(graph.outNeighbors(start));
  const visited = new Set<N>();

  // Index-based dequeue; the array is dropped with the generator
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (visited.has(node)) continue;
    visited.add(node);
    yield node;
    for (const neighbor of graph.outNeighbors(node)) {
      if (!visited.has(neighbor)) {
        queue.push(neighbor);
      }
    }
  }
}
