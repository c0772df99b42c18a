/**
 * Shortest Paths Between Node Sets
 *
 * Dijkstra's algorithm generalized to:
 * - several begin nodes (all seeded at distance 0) and several end nodes
 * - node and edge exclusion sets, pretended absent for one search
 * - an acceptance window over goal distances (`isDistanceOk`) that can reject
 *   goals reached too early and stop the whole search once distances grow
 *   past a bound
 *
 * The search reads the graph through `hasNode`, `outNeighbors` and the
 * distance function only, and never mutates it. Distances must be
 * non-negative.
 *
 * Self paths: a begin node is settled at distance 0 with no predecessor and
 * is never expanded again, so `shortestPath(graph, x, x)` is `null`. For the
 * shortest cycle through `x`, search from each out-neighbor `y` of `x` back
 * to `x` with the edge `x → y` excluded; `shortestCycle` does exactly that.
 *
 * @module digraph-kit/search/shortest-path
 */

import { ExclusionError, type ExclusionSide } from "../core/errors.ts";
import { getLogger } from "../core/logger.ts";
import { type Maybe, none, some } from "../core/maybe.ts";
import type { Edge } from "../store/types.ts";
import { Frontier } from "./frontier.ts";

// ============================================================================
// Types
// ============================================================================

/** What the search needs from a graph */
export interface SearchableGraph<N> {
  hasNode(node: N): boolean;
  outNeighbors(node: N): Iterable<N>;
}

/** Graphs that expose numeric edge weights */
export interface WeightedGraph<N> extends SearchableGraph<N> {
  weight(from: N, to: N, valueIfAbsent: number): number;
}

/** Length of the edge `from → to`; must be non-negative */
export type DistanceFn<N, G> = (graph: G, from: N, to: N) => number;

/**
 * Verdict on a candidate distance:
 * - `-1` too short: keep searching, the node is not a goal at this distance
 * - `0` acceptable
 * - `1` too long: stop the search, nothing closer remains
 */
export type DistanceVerdict = -1 | 0 | 1;

export type DistanceAcceptor = (distance: number) => DistanceVerdict;

export interface ShortestPathOptions<N, G> {
  /** Edge length (default: unitDistance) */
  distance?: DistanceFn<N, G>;
  /** Nodes treated as absent */
  excludedNodes?: Iterable<N>;
  /** Edges treated as absent */
  excludedEdges?: Iterable<Edge<N>>;
  /** Acceptance window (default: acceptAnyDistance) */
  isDistanceOk?: DistanceAcceptor;
}

export interface PathResult<N> {
  /** Begin node first, end node last */
  path: N[];
  /** Sum of the edge distances along `path` */
  distance: number;
}

/** Entry of the shortest-path spanning tree */
interface Settled<N> {
  distance: number;
  predecessor: Maybe<N>;
}

// ============================================================================
// Defaults
// ============================================================================

/** Every edge has length 1 */
export function unitDistance(): number {
  return 1;
}

/** Edge weight, falling back to 1 when neither weight nor default is set */
export function weightDistance<N>(graph: WeightedGraph<N>, from: N, to: N): number {
  return graph.weight(from, to, 1);
}

export function acceptAnyDistance(): DistanceVerdict {
  return 0;
}

// ============================================================================
// Search
// ============================================================================

/**
 * Shortest path from any node of `begins` to any node of `ends`
 *
 * Begin and end nodes missing from the graph are ignored; if none remain on
 * either side the result is `null`.
 *
 * @returns the path and its distance, or `null` when no acceptable path
 *   exists
 * @throws ExclusionError if the excluded nodes cover every begin or every
 *   end node
 */
export function shortestPathBetweenSets<N, G extends SearchableGraph<N>>(
  graph: G,
  begins: Iterable<N>,
  ends: Iterable<N>,
  options: ShortestPathOptions<N, G> = {},
): PathResult<N> | null {
  const distanceOf: DistanceFn<N, G> = options.distance ?? unitDistance;
  const isDistanceOk: DistanceAcceptor = options.isDistanceOk ?? acceptAnyDistance;

  const beginSet = presentNodes(graph, begins);
  const endSet = presentNodes(graph, ends);
  if (beginSet.size === 0 || endSet.size === 0) {
    return null;
  }

  // Excluded nodes are settled up front as dead: never expanded, never goals
  const spst = new Map<N, Settled<N>>();
  const excludedNodes = new Set(options.excludedNodes ?? []);
  for (const node of excludedNodes) {
    spst.set(node, { distance: Infinity, predecessor: none() });
  }
  const liveBegins = checkExclusions("begins", beginSet, excludedNodes);
  checkExclusions("ends", endSet, excludedNodes);

  const excludedEdges = indexEdges(options.excludedEdges ?? []);

  const frontier = new Frontier<N>();
  for (const begin of liveBegins) {
    frontier.push(0, begin, none());
  }

  for (let entry = frontier.pop(); entry; entry = frontier.pop()) {
    const { distance, node, predecessor } = entry;

    // Distances only grow from here, so "too long" ends the search
    const verdict = isDistanceOk(distance);
    if (verdict > 0) {
      getLogger().debug(`Search stopped: distance ${distance} exceeds the acceptance window`);
      return null;
    }

    // Stale: a shorter entry for this node was settled earlier
    if (spst.has(node)) continue;
    spst.set(node, { distance, predecessor });

    if (verdict === 0 && predecessor.present && endSet.has(node)) {
      return { path: tracePath(spst, node), distance };
    }

    for (const neighbor of graph.outNeighbors(node)) {
      if (spst.has(neighbor) || excludedEdges.get(node)?.has(neighbor)) continue;
      frontier.push(distance + distanceOf(graph, node, neighbor), neighbor, some(node));
    }
  }

  return null;
}

/**
 * Shortest path from `begin` to `end`
 *
 * `null` when `begin === end`: see the module notes on self paths.
 */
export function shortestPath<N, G extends SearchableGraph<N>>(
  graph: G,
  begin: N,
  end: N,
  options?: ShortestPathOptions<N, G>,
): PathResult<N> | null {
  return shortestPathBetweenSets(graph, [begin], [end], options);
}

/**
 * Shortest cycle through `node`
 *
 * Runs one search per out-neighbor `y` of `node`, from `y` back to `node`
 * with the edge `node → y` excluded, and keeps the shortest. A self loop is
 * a cycle of one edge. The returned path starts and ends with `node`.
 *
 * @throws ExclusionError if `node` itself is excluded
 */
export function shortestCycle<N, G extends SearchableGraph<N>>(
  graph: G,
  node: N,
  options: Omit<ShortestPathOptions<N, G>, "isDistanceOk"> = {},
): PathResult<N> | null {
  if (!graph.hasNode(node)) return null;

  const distanceOf: DistanceFn<N, G> = options.distance ?? unitDistance;
  const excludedNodes = Array.from(options.excludedNodes ?? []);
  const excludedEdges = Array.from(options.excludedEdges ?? []);
  const skipNodes = new Set(excludedNodes);
  const skipEdges = indexEdges(excludedEdges);
  if (skipNodes.has(node)) {
    throw new ExclusionError("begins", [node]);
  }

  let best: PathResult<N> | null = null;
  for (const neighbor of Array.from(graph.outNeighbors(node))) {
    if (skipNodes.has(neighbor) || skipEdges.get(node)?.has(neighbor)) continue;

    const firstHop = distanceOf(graph, node, neighbor);
    let candidate: PathResult<N> | null;
    if (neighbor === node) {
      candidate = { path: [node, node], distance: firstHop };
    } else {
      const withoutFirstHop: Edge<N>[] = [...excludedEdges, [node, neighbor]];
      const rest = shortestPath(graph, neighbor, node, {
        distance: distanceOf,
        excludedNodes,
        excludedEdges: withoutFirstHop,
      });
      candidate = rest && { path: [node, ...rest.path], distance: firstHop + rest.distance };
    }

    if (candidate && (!best || candidate.distance < best.distance)) {
      best = candidate;
    }
  }
  return best;
}

// ============================================================================
// Helpers
// ============================================================================

function presentNodes<N>(graph: SearchableGraph<N>, nodes: Iterable<N>): Set<N> {
  const present = new Set<N>();
  for (const node of nodes) {
    if (graph.hasNode(node)) present.add(node);
  }
  return present;
}

/**
 * @returns the members of `nodes` that are not excluded
 * @throws ExclusionError if none remain
 */
function checkExclusions<N>(
  side: ExclusionSide,
  nodes: Set<N>,
  excluded: Set<N>,
): N[] {
  const live: N[] = [];
  const removed: N[] = [];
  for (const node of nodes) {
    (excluded.has(node) ? removed : live).push(node);
  }
  if (live.length === 0) {
    throw new ExclusionError(side, removed);
  }
  if (removed.length > 0) {
    getLogger().warn(
      `Excluded nodes remove ${removed.length} of ${nodes.size} ${side} nodes`,
      removed,
    );
  }
  return live;
}

function indexEdges<N>(edges: Iterable<Edge<N>>): Map<N, Set<N>> {
  const index = new Map<N, Set<N>>();
  for (const [from, to] of edges) {
    let targets = index.get(from);
    if (!targets) {
      targets = new Set<N>();
      index.set(from, targets);
    }
    targets.add(to);
  }
  return index;
}

/** Walk predecessors from `node` back to a begin node */
function tracePath<N>(spst: Map<N, Settled<N>>, node: N): N[] {
  const path: N[] = [node];
  let predecessor = spst.get(node)?.predecessor ?? none<N>();
  while (predecessor.present) {
    path.push(predecessor.value);
    predecessor = spst.get(predecessor.value)?.predecessor ?? none<N>();
  }
  return path.reverse();
}
