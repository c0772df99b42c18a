/**
 * Graph Facade
 *
 * Composes a node store, an edge store and a property store behind one
 * query/mutation API, and designates one property key as edge weight.
 *
 * Structural invariants kept here rather than in the stores:
 * - adding an edge registers both endpoints as nodes first
 * - deleting an edge deletes its weight first
 * - deleting a node deletes every incident edge first
 *
 * @module digraph-kit/graph/graph
 */

import { NotFoundError } from "../core/errors.ts";
import type { Edge, EdgeStore, NodeStore, PropertyStore } from "../store/types.ts";
import { MapSetEdgeStore, MapSetNodeEdgeStore } from "../store/map-set-edge-store.ts";
import { MapPropertyStore } from "../store/map-property-store.ts";
import { SetNodeStore } from "../store/set-node-store.ts";
import {
  addNodesEdges,
  type EdgeWeightItem,
  type NodesEdgesItem,
  type NodesEdgesWeightsItem,
  type SerializationOptions,
  toNodesEdges,
  toNodesEdgesWeights,
} from "./serialization.ts";

// ============================================================================
// Configuration
// ============================================================================

/** Property key under which edge weights are stored unless configured */
export const DEFAULT_WEIGHT_KEY = "weight";

/**
 * Graph construction options
 *
 * With no stores, a single MapSetNodeEdgeStore plays both the node and the
 * edge role. To use another combined store, pass it as both `nodeStore` and
 * `edgeStore`.
 */
export interface GraphOptions<N, V> {
  /** Default: SetNodeStore (or the shared combined store) */
  nodeStore?: NodeStore<N>;
  /** Default: MapSetEdgeStore (or the shared combined store) */
  edgeStore?: EdgeStore<N>;
  /** Default: MapPropertyStore */
  propertyStore?: PropertyStore<N, V>;
  /** Property key holding edge weights (default: "weight") */
  weightKey?: string;
  /** Installed as the weight key's store-wide default */
  defaultWeight?: V;
}

interface ResolvedStores<N> {
  nodeStore: NodeStore<N>;
  edgeStore: EdgeStore<N>;
}

function resolveStores<N>(
  { nodeStore, edgeStore }: Partial<ResolvedStores<N>>,
): ResolvedStores<N> {
  if (nodeStore && edgeStore) {
    return { nodeStore, edgeStore };
  }
  if (nodeStore) {
    return { nodeStore, edgeStore: new MapSetEdgeStore<N>() };
  }
  if (edgeStore) {
    return { nodeStore: new SetNodeStore<N>(), edgeStore };
  }
  const combined = new MapSetNodeEdgeStore<N>();
  return { nodeStore: combined, edgeStore: combined };
}

// ============================================================================
// Graph
// ============================================================================

/**
 * Directed graph over pluggable stores
 *
 * @typeParam N Node identifier; compared like Map keys
 * @typeParam V Property value type, weights included
 *
 * @example
 * ```typescript
 * const graph = new Graph<string>({ defaultWeight: 1 });
 * graph.addEdge("a", "b", 3);
 * graph.addEdge("b", "c");
 * graph.weight("a", "b"); // 3
 * graph.weight("b", "c"); // 1
 * ```
 */
export class Graph<N, V = number> {
  readonly weightKey: string;

  private readonly nodeStore: NodeStore<N>;
  private readonly edgeStore: EdgeStore<N>;
  private readonly propertyStore: PropertyStore<N, V>;

  constructor(options: GraphOptions<N, V> = {}) {
    const { nodeStore, edgeStore } = resolveStores(options);
    this.nodeStore = nodeStore;
    this.edgeStore = edgeStore;
    this.propertyStore = options.propertyStore ?? new MapPropertyStore<N, V>();
    this.weightKey = options.weightKey ?? DEFAULT_WEIGHT_KEY;
    if (options.defaultWeight !== undefined) {
      this.propertyStore.setPropertyDefault(this.weightKey, options.defaultWeight);
    }
  }

  /**
   * Build a graph from node and edge items
   *
   * @throws ConstructionError for an item of arity other than 1 or 2
   */
  static fromNodesEdges<N, V = number>(
    items: Iterable<NodesEdgesItem<N>>,
    options?: GraphOptions<N, V>,
  ): Graph<N, V> {
    const graph = new Graph<N, V>(options);
    addNodesEdges(graph, items);
    return graph;
  }

  /** Every node as `[node]`, then every edge as `[from, to]` */
  toNodesEdges(options?: SerializationOptions<N>): Generator<NodesEdgesItem<N>> {
    return toNodesEdges(this, options);
  }

  /** Every node as `[node]`, then every edge as `[[from, to], weight]` */
  toNodesEdgesWeights(
    options?: SerializationOptions<N>,
  ): Generator<NodesEdgesWeightsItem<N, V>> {
    return toNodesEdgesWeights(this, options);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  hasNode(node: N): boolean {
    return this.nodeStore.hasNode(node);
  }

  hasEdge(from: N, to: N): boolean {
    return this.edgeStore.hasEdge(from, to);
  }

  /** Whether the edge has its own weight (the default does not count) */
  hasWeight(from: N, to: N): boolean {
    return this.propertyStore.hasProperty(this.weightKey, [from, to]);
  }

  /**
   * Whether `nodes` is a walk in this graph
   *
   * `nodes` is consumed once. The empty sequence is a path of every graph.
   * With `closed`, the edge from the last node back to the first must exist
   * too.
   */
  hasPath(nodes: Iterable<N>, closed = false): boolean {
    const iterator = nodes[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) return true;
    if (!this.hasNode(first.value)) return false;

    let previous = first.value;
    for (let next = iterator.next(); !next.done; next = iterator.next()) {
      if (!this.hasEdge(previous, next.value)) return false;
      previous = next.value;
    }
    return closed ? this.hasEdge(previous, first.value) : true;
  }

  /** Whether `nodes` is a closed walk */
  hasCycle(nodes: Iterable<N>): boolean {
    return this.hasPath(nodes, true);
  }

  nNodes(): number {
    return this.nodeStore.nNodes();
  }

  nEdges(): number {
    return this.edgeStore.nEdges();
  }

  nodes(): IterableIterator<N> {
    return this.nodeStore.nodes();
  }

  edges(): IterableIterator<Edge<N>> {
    return this.edgeStore.edges();
  }

  /** Edge weight, else the default weight, else `valueIfAbsent` */
  weight(from: N, to: N): V | undefined;
  weight(from: N, to: N, valueIfAbsent: V): V;
  weight(from: N, to: N, valueIfAbsent?: V): V | undefined {
    return valueIfAbsent === undefined
      ? this.propertyStore.getProperty(this.weightKey, [from, to])
      : this.propertyStore.getProperty(this.weightKey, [from, to], valueIfAbsent);
  }

  *edgesWeights(): Generator<EdgeWeightItem<N, V>> {
    for (const edge of this.edges()) {
      yield [edge, this.weight(edge[0], edge[1])];
    }
  }

  outDegree(node: N): number {
    return this.edgeStore.outDegree(node);
  }

  inDegree(node: N): number {
    return this.edgeStore.inDegree(node);
  }

  outNeighbors(node: N): IterableIterator<N> {
    return this.edgeStore.outNeighbors(node);
  }

  /** Cost depends on the edge store; O(total adjacency) for the map stores */
  inNeighbors(node: N): IterableIterator<N> {
    return this.edgeStore.inNeighbors(node);
  }

  /** `[neighbor, weight of node → neighbor]` pairs */
  *outNeighborsWeights(node: N): Generator<readonly [N, V | undefined]> {
    for (const neighbor of this.outNeighbors(node)) {
      yield [neighbor, this.weight(node, neighbor)];
    }
  }

  /** `[neighbor, weight of neighbor → node]` pairs */
  *inNeighborsWeights(node: N): Generator<readonly [N, V | undefined]> {
    for (const neighbor of this.inNeighbors(node)) {
      yield [neighbor, this.weight(neighbor, node)];
    }
  }

  hasProperty(key: string, nodes: readonly N[]): boolean {
    return this.propertyStore.hasProperty(key, nodes);
  }

  property(key: string, nodes: readonly N[]): V | undefined;
  property(key: string, nodes: readonly N[], valueIfAbsent: V): V;
  property(key: string, nodes: readonly N[], valueIfAbsent?: V): V | undefined {
    return valueIfAbsent === undefined
      ? this.propertyStore.getProperty(key, nodes)
      : this.propertyStore.getProperty(key, nodes, valueIfAbsent);
  }

  hasPropertyDefault(key: string): boolean {
    return this.propertyStore.hasPropertyDefault(key);
  }

  propertyDefault(key: string): V | undefined;
  propertyDefault(key: string, valueIfAbsent: V): V;
  propertyDefault(key: string, valueIfAbsent?: V): V | undefined {
    return valueIfAbsent === undefined
      ? this.propertyStore.getPropertyDefault(key)
      : this.propertyStore.getPropertyDefault(key, valueIfAbsent);
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  addNode(node: N): void {
    this.nodeStore.addNode(node);
  }

  addNodes(nodes: Iterable<N>): void {
    for (const node of nodes) {
      this.addNode(node);
    }
  }

  /**
   * Register both endpoints and insert the edge
   *
   * The weight is only written when given; omitting it leaves any existing
   * weight in place.
   */
  addEdge(from: N, to: N, weight?: V): void {
    this.nodeStore.addNode(from);
    this.nodeStore.addNode(to);
    this.edgeStore.addEdge(from, to);
    if (weight !== undefined) {
      this.propertyStore.setProperty(this.weightKey, [from, to], weight);
    }
  }

  addEdges(edges: Iterable<Edge<N>>): void {
    for (const [from, to] of edges) {
      this.addEdge(from, to);
    }
  }

  /**
   * Add the nodes of `nodes` and an edge between each consecutive pair
   *
   * With `closed`, also adds the edge from the last node to the first.
   */
  addPath(nodes: Iterable<N>, closed = false): void {
    const iterator = nodes[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) return;
    this.addNode(first.value);

    let previous = first.value;
    for (let next = iterator.next(); !next.done; next = iterator.next()) {
      this.addEdge(previous, next.value);
      previous = next.value;
    }
    if (closed) {
      this.addEdge(previous, first.value);
    }
  }

  /** Set the edge's weight, adding the edge first if needed */
  setWeight(from: N, to: N, weight: V): void {
    if (!this.hasEdge(from, to)) {
      this.addEdge(from, to);
    }
    this.propertyStore.setProperty(this.weightKey, [from, to], weight);
  }

  /** No-op if the edge has no weight of its own */
  delWeight(from: N, to: N): void {
    this.propertyStore.delProperty(this.weightKey, [from, to]);
  }

  setProperty(key: string, nodes: readonly N[], value: V): void {
    this.propertyStore.setProperty(key, nodes, value);
  }

  delProperty(key: string, nodes: readonly N[]): void {
    this.propertyStore.delProperty(key, nodes);
  }

  setPropertyDefault(key: string, value: V): void {
    this.propertyStore.setPropertyDefault(key, value);
  }

  delPropertyDefault(key: string): void {
    this.propertyStore.delPropertyDefault(key);
  }

  /**
   * Delete the node and every edge into or out of it
   *
   * @throws NotFoundError if the node is absent
   */
  delNode(node: N): void {
    // Materialize first: deleting while iterating a store's sets is unsafe
    for (const neighbor of Array.from(this.inNeighbors(node))) {
      this.delEdge(neighbor, node);
    }
    for (const neighbor of Array.from(this.outNeighbors(node))) {
      this.delEdge(node, neighbor);
    }
    this.nodeStore.delNode(node);
  }

  delNodes(nodes: Iterable<N>): void {
    for (const node of nodes) {
      this.delNode(node);
    }
  }

  /**
   * Delete the edge's weight, then the edge
   *
   * @throws NotFoundError if the edge is absent; nothing is deleted then
   */
  delEdge(from: N, to: N): void {
    if (!this.hasEdge(from, to)) {
      throw new NotFoundError("edge", [from, to]);
    }
    if (this.hasWeight(from, to)) {
      this.delWeight(from, to);
    }
    this.edgeStore.delEdge(from, to);
  }

  delEdges(edges: Iterable<Edge<N>>): void {
    for (const [from, to] of edges) {
      this.delEdge(from, to);
    }
  }
}
