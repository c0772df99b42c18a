/**
 * Graph Serialization Helpers
 *
 * Conversion between graphs and flat sequences of node and edge items. Items
 * are structural tuples, not text:
 * - `[node]` or `[node, null]` / `[node, undefined]`: an isolated node
 * - `[node1, node2]`: an edge (both endpoints are registered)
 *
 * @module digraph-kit/graph/serialization
 */

import { ConstructionError } from "../core/errors.ts";
import type { Edge } from "../store/types.ts";

// ==========================================================================
// Item Types
// ==========================================================================

/** A node or an edge in a nodes-and-edges sequence */
export type NodesEdgesItem<N> = readonly [node: N, other?: N | null];

/** An edge together with its resolved weight */
export type EdgeWeightItem<N, V> = readonly [edge: Edge<N>, weight: V | undefined];

export type NodesEdgesWeightsItem<N, V> = readonly [node: N] | EdgeWeightItem<N, V>;

export type NodeComparator<N> = (a: N, b: N) => number;

export interface SerializationOptions<N> {
  /** Sort nodes and edges; requires a total order on nodes */
  sort?: boolean;
  /** Order used when sorting (default: naturalOrder) */
  compare?: NodeComparator<N>;
}

// ==========================================================================
// Ordering
// ==========================================================================

/**
 * Natural order of numbers, bigints and strings
 *
 * @throws TypeError for values of other types, or of mixed types
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeError(
    `Nodes are not orderable: ${typeof a} and ${typeof b}; pass a comparator`,
  );
}

/** Lexicographic order of edges under a node order */
export function compareEdges<N>(compare: NodeComparator<N>): (a: Edge<N>, b: Edge<N>) => number {
  return (a, b) => compare(a[0], b[0]) || compare(a[1], b[1]);
}

// ==========================================================================
// Export
// ==========================================================================

/**
 * Minimal read interface needed to serialize a graph
 */
export interface SerializableGraph<N, V> {
  nodes(): Iterable<N>;
  edges(): Iterable<Edge<N>>;
  weight(from: N, to: N): V | undefined;
}

/**
 * All nodes as `[node]`, then all edges as `[from, to]`
 */
export function* toNodesEdges<N, V>(
  graph: SerializableGraph<N, V>,
  options: SerializationOptions<N> = {},
): Generator<NodesEdgesItem<N>> {
  const { nodes, edges } = collect(graph, options);
  for (const node of nodes) {
    yield [node];
  }
  yield* edges;
}

/**
 * All nodes as `[node]`, then all edges as `[[from, to], weight]`
 */
export function* toNodesEdgesWeights<N, V>(
  graph: SerializableGraph<N, V>,
  options: SerializationOptions<N> = {},
): Generator<NodesEdgesWeightsItem<N, V>> {
  const { nodes, edges } = collect(graph, options);
  for (const node of nodes) {
    yield [node];
  }
  for (const edge of edges) {
    yield [edge, graph.weight(edge[0], edge[1])];
  }
}

function collect<N, V>(
  graph: SerializableGraph<N, V>,
  options: SerializationOptions<N>,
): { nodes: Iterable<N>; edges: Iterable<Edge<N>> } {
  if (!options.sort) {
    return { nodes: graph.nodes(), edges: graph.edges() };
  }
  const compare: NodeComparator<N> = options.compare ?? naturalOrder;
  return {
    nodes: Array.from(graph.nodes()).sort(compare),
    edges: Array.from(graph.edges()).sort(compareEdges(compare)),
  };
}

// ==========================================================================
// Import
// ==========================================================================

/**
 * Minimal write interface needed to populate a graph
 */
export interface PopulatableGraph<N> {
  addNode(node: N): void;
  addEdge(from: N, to: N): void;
}

/**
 * Add every item to `graph`
 *
 * @throws ConstructionError for an item of arity other than 1 or 2
 */
export function addNodesEdges<N>(
  graph: PopulatableGraph<N>,
  items: Iterable<NodesEdgesItem<N>>,
): void {
  for (const item of items) {
    // Runtime arity: callers outside the type system can pass anything
    const arity: number = item.length;
    if (arity !== 1 && arity !== 2) {
      throw new ConstructionError(item);
    }
    const [node, other] = item;
    if (other === null || other === undefined) {
      graph.addNode(node);
    } else {
      graph.addEdge(node, other);
    }
  }
}
