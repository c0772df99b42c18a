/**
 * Storage interfaces
 *
 * Node existence, adjacency and properties are stored independently so each
 * can be swapped. A single object may implement both NodeStore and
 * EdgeStore; the Graph facade is handed it in both roles.
 *
 * @module digraph-kit/store/types
 */

import type { Maybe } from "../core/maybe.ts";

/** Ordered pair of nodes */
export type Edge<N> = readonly [from: N, to: N];

/**
 * Node existence and enumeration
 */
export interface NodeStore<N> {
  hasNode(node: N): boolean;
  /** Idempotent */
  addNode(node: N): void;
  /** @throws NotFoundError if the node is absent */
  delNode(node: N): void;
  /** Fresh iterator per call */
  nodes(): IterableIterator<N>;
  nNodes(): number;
}

/**
 * Directed adjacency
 *
 * Adding an edge does not register its endpoints as nodes; that is the
 * facade's job. Neighbor queries on unknown nodes yield nothing.
 */
export interface EdgeStore<N> {
  hasEdge(from: N, to: N): boolean;
  /** Idempotent */
  addEdge(from: N, to: N): void;
  /** @throws NotFoundError if the edge is absent */
  delEdge(from: N, to: N): void;
  edges(): IterableIterator<Edge<N>>;
  nEdges(): number;
  outNeighbors(node: N): IterableIterator<N>;
  inNeighbors(node: N): IterableIterator<N>;
  outDegree(node: N): number;
  inDegree(node: N): number;
}

/**
 * Keyed values attached to node tuples
 *
 * A tuple of length 1 addresses a node, of length 2 an edge. Each key may
 * carry a default that is returned when no specific value is set.
 */
export interface PropertyStore<N, V> {
  /** Whether a specific value is set (defaults are not consulted) */
  hasProperty(key: string, nodes: readonly N[]): boolean;
  /** Specific value, else the key's default, else absent */
  lookupProperty(key: string, nodes: readonly N[]): Maybe<V>;
  getProperty(key: string, nodes: readonly N[]): V | undefined;
  getProperty(key: string, nodes: readonly N[], valueIfAbsent: V): V;
  setProperty(key: string, nodes: readonly N[], value: V): void;
  /** No-op if absent */
  delProperty(key: string, nodes: readonly N[]): void;

  hasPropertyDefault(key: string): boolean;
  getPropertyDefault(key: string): V | undefined;
  getPropertyDefault(key: string, valueIfAbsent: V): V;
  setPropertyDefault(key: string, value: V): void;
  /** No-op if absent */
  delPropertyDefault(key: string): void;
}
