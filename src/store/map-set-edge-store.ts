/**
 * Adjacency stores over `Map<N, Set<N>>`
 *
 * Adjacency is kept in the forward direction only. `inNeighbors` and
 * `inDegree` therefore scan every adjacency set: O(total adjacency) per
 * call, and `Graph.delNode` inherits that cost. Use GraphologyNodeEdgeStore
 * when reverse queries dominate.
 *
 * @module digraph-kit/store/map-set-edge-store
 */

import { NotFoundError } from "../core/errors.ts";
import type { Edge, EdgeStore, NodeStore } from "./types.ts";

/**
 * Shared forward-adjacency logic. Subclasses decide whether a node without
 * outgoing edges keeps an (empty) entry.
 */
abstract class ForwardAdjacency<N> implements EdgeStore<N> {
  protected readonly successors = new Map<N, Set<N>>();

  hasEdge(from: N, to: N): boolean {
    return this.successors.get(from)?.has(to) ?? false;
  }

  addEdge(from: N, to: N): void {
    let children = this.successors.get(from);
    if (!children) {
      children = new Set<N>();
      this.successors.set(from, children);
    }
    children.add(to);
  }

  delEdge(from: N, to: N): void {
    const children = this.successors.get(from);
    if (!children || !children.delete(to)) {
      throw new NotFoundError("edge", [from, to]);
    }
    this.afterEdgeRemoved(from, children);
  }

  *edges(): IterableIterator<Edge<N>> {
    for (const [from, children] of this.successors) {
      for (const to of children) {
        yield [from, to];
      }
    }
  }

  nEdges(): number {
    let count = 0;
    for (const children of this.successors.values()) {
      count += children.size;
    }
    return count;
  }

  *outNeighbors(node: N): IterableIterator<N> {
    const children = this.successors.get(node);
    if (children) {
      yield* children;
    }
  }

  /** Scans all adjacency sets */
  *inNeighbors(node: N): IterableIterator<N> {
    for (const [parent, children] of this.successors) {
      if (children.has(node)) {
        yield parent;
      }
    }
  }

  outDegree(node: N): number {
    return this.successors.get(node)?.size ?? 0;
  }

  /** Scans all adjacency sets */
  inDegree(node: N): number {
    let degree = 0;
    for (const children of this.successors.values()) {
      if (children.has(node)) degree++;
    }
    return degree;
  }

  protected abstract afterEdgeRemoved(from: N, children: Set<N>): void;
}

/**
 * Edge-only store. Entries exist only for nodes with outgoing edges.
 */
export class MapSetEdgeStore<N> extends ForwardAdjacency<N> {
  protected afterEdgeRemoved(from: N, children: Set<N>): void {
    if (children.size === 0) {
      this.successors.delete(from);
    }
  }
}

/**
 * Combined node and edge store over a single map
 *
 * A node exists iff it has an adjacency entry, possibly empty. Adding an
 * edge creates the source's entry (and so registers the source), not the
 * target's. Deleting a node does not remove edges pointing at it.
 */
export class MapSetNodeEdgeStore<N> extends ForwardAdjacency<N>
  implements NodeStore<N> {
  hasNode(node: N): boolean {
    return this.successors.has(node);
  }

  addNode(node: N): void {
    if (!this.successors.has(node)) {
      this.successors.set(node, new Set<N>());
    }
  }

  delNode(node: N): void {
    if (!this.successors.delete(node)) {
      throw new NotFoundError("node", [node]);
    }
  }

  nodes(): IterableIterator<N> {
    return this.successors.keys();
  }

  nNodes(): number {
    return this.successors.size;
  }

  protected afterEdgeRemoved(): void {
    // Keep the (possibly empty) entry: it is the node's existence
  }
}
