/**
 * Search Module
 *
 * @module digraph-kit/search
 */

export {
  acceptAnyDistance,
  type DistanceAcceptor,
  type DistanceFn,
  type DistanceVerdict,
  type PathResult,
  type SearchableGraph,
  shortestCycle,
  shortestPath,
  shortestPathBetweenSets,
  type ShortestPathOptions,
  unitDistance,
  type WeightedGraph,
  weightDistance,
} from "./shortest-path.ts";

export { Frontier, type FrontierEntry } from "./frontier.ts";
