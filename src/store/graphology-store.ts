/**
 * Graphology-backed node and edge store
 *
 * Keeps adjacency in a graphology DirectedGraph, which indexes edges in both
 * directions: `inNeighbors` and `inDegree` cost O(in-degree) instead of the
 * full adjacency scan of MapSetNodeEdgeStore. Graphology keys nodes by
 * string, hence `string` nodes only.
 *
 * @module digraph-kit/store/graphology-store
 */

import { DirectedGraph } from "graphology";
import { NotFoundError } from "../core/errors.ts";
import type { Edge, EdgeStore, NodeStore } from "./types.ts";

export class GraphologyNodeEdgeStore
  implements NodeStore<string>, EdgeStore<string> {
  private readonly graph: DirectedGraph;

  /**
   * @param graph Existing graph to adopt; must not be a multigraph
   */
  constructor(graph?: DirectedGraph) {
    this.graph = graph ?? new DirectedGraph({ allowSelfLoops: true, multi: false });
  }

  /** The underlying graphology instance, for interop with its ecosystem */
  get backing(): DirectedGraph {
    return this.graph;
  }

  // ==========================================================================
  // Nodes
  // ==========================================================================

  hasNode(node: string): boolean {
    return this.graph.hasNode(node);
  }

  addNode(node: string): void {
    this.graph.mergeNode(node);
  }

  delNode(node: string): void {
    if (!this.graph.hasNode(node)) {
      throw new NotFoundError("node", [node]);
    }
    this.graph.dropNode(node);
  }

  *nodes(): IterableIterator<string> {
    for (const { node } of this.graph.nodeEntries()) {
      yield node;
    }
  }

  nNodes(): number {
    return this.graph.order;
  }

  // ==========================================================================
  // Edges
  // ==========================================================================

  hasEdge(from: string, to: string): boolean {
    return this.graph.hasDirectedEdge(from, to);
  }

  /** Graphology creates missing endpoints, so both become nodes */
  addEdge(from: string, to: string): void {
    this.graph.mergeDirectedEdge(from, to);
  }

  delEdge(from: string, to: string): void {
    if (!this.graph.hasDirectedEdge(from, to)) {
      throw new NotFoundError("edge", [from, to]);
    }
    this.graph.dropDirectedEdge(from, to);
  }

  *edges(): IterableIterator<Edge<string>> {
    for (const { source, target } of this.graph.directedEdgeEntries()) {
      yield [source, target];
    }
  }

  nEdges(): number {
    return this.graph.directedSize;
  }

  *outNeighbors(node: string): IterableIterator<string> {
    if (!this.graph.hasNode(node)) return;
    for (const { neighbor } of this.graph.outNeighborEntries(node)) {
      yield neighbor;
    }
  }

  *inNeighbors(node: string): IterableIterator<string> {
    if (!this.graph.hasNode(node)) return;
    for (const { neighbor } of this.graph.inNeighborEntries(node)) {
      yield neighbor;
    }
  }

  outDegree(node: string): number {
    return this.graph.hasNode(node) ? this.graph.outDegree(node) : 0;
  }

  inDegree(node: string): number {
    return this.graph.hasNode(node) ? this.graph.inDegree(node) : 0;
  }
}
