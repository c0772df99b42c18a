/**
 * digraph-kit - Directed graphs over pluggable stores
 *
 * Node existence, adjacency and keyed properties (edge weight among them)
 * live in independent, swappable stores behind one Graph facade. On top sits
 * a Dijkstra search generalized to sets of begin and end nodes, node and edge
 * exclusions, and an acceptance window on goal distances.
 *
 * @example
 * ```typescript
 * import { Graph, shortestPath, weightDistance } from "digraph-kit";
 *
 * const graph = new Graph<string>({ defaultWeight: 1 });
 * graph.addEdge("a", "b", 4);
 * graph.addEdge("a", "c");
 * graph.addEdge("c", "b");
 *
 * shortestPath(graph, "a", "b", { distance: weightDistance });
 * // { path: ["a", "c", "b"], distance: 2 }
 * ```
 *
 * @module digraph-kit
 */

// Graph facade, construction and traversal
export * from "./src/graph/mod.ts";

// Storage backends
export * from "./src/store/mod.ts";

// Shortest paths
export * from "./src/search/mod.ts";

// Errors, logger adapter, presence type
export * from "./src/core/mod.ts";
