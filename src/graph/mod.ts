/**
 * Graph Module
 *
 * The Graph facade, bulk construction and export, and traversal.
 *
 * @module digraph-kit/graph
 */

export { DEFAULT_WEIGHT_KEY, Graph, type GraphOptions } from "./graph.ts";

export {
  addNodesEdges,
  compareEdges,
  type EdgeWeightItem,
  naturalOrder,
  type NodeComparator,
  type NodesEdgesItem,
  type NodesEdgesWeightsItem,
  type PopulatableGraph,
  type SerializableGraph,
  type SerializationOptions,
  toNodesEdges,
  toNodesEdgesWeights,
} from "./serialization.ts";

export { type TraversableGraph, visitBreadthFirst } from "./traversal.ts";
