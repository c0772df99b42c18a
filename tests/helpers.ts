/**
 * Shared test fixtures
 *
 * @module digraph-kit/tests/helpers
 */

import { type Edge, Graph } from "../mod.ts";
import fixtures from "./fixtures/graphs.json";

export interface GraphFixture {
  description: string;
  nodes?: string;
  edges?: string[];
  /** Two-letter edge name → weight, applied in both directions */
  dists?: Record<string, number>;
}

export type FixtureName = keyof typeof fixtures;

/**
 * Build a fixture graph: every listed edge in both directions, weighted
 * symmetrically, default weight 1
 */
export function mkGraph(name: FixtureName): Graph<string> {
  const def: GraphFixture = fixtures[name];
  const graph = new Graph<string>({ defaultWeight: 1 });
  graph.addNodes(def.nodes ?? "");
  const dists = def.dists ?? {};
  for (const pair of [...(def.edges ?? []), ...Object.keys(dists)]) {
    graph.addEdge(pair[0], pair[1]);
    graph.addEdge(pair[1], pair[0]);
  }
  for (const [pair, weight] of Object.entries(dists)) {
    graph.setWeight(pair[0], pair[1], weight);
    graph.setWeight(pair[1], pair[0], weight);
  }
  return graph;
}

/** "SM DY" → both directions of S-M and D-Y */
export function bothWays(names: string): Edge<string>[] {
  return names.split(" ").flatMap((pair): Edge<string>[] => [
    [pair[0], pair[1]],
    [pair[1], pair[0]],
  ]);
}

/** Deterministic PRNG (mulberry32) for generated graphs */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Sorted copy, for order-insensitive comparisons */
export function sorted(values: Iterable<string>): string[] {
  return Array.from(values).sort();
}
