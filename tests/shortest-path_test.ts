/**
 * Shortest Path Search Tests
 *
 * Fixture graphs are symmetric (every edge in both directions) and weighted
 * so that each asserted path is the single optimum.
 *
 * @module digraph-kit/tests/shortest-path_test
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import {
  type DistanceVerdict,
  ExclusionError,
  Frontier,
  Graph,
  none,
  resetLogger,
  setLogger,
  shortestCycle,
  shortestPath,
  shortestPathBetweenSets,
  some,
  weightDistance,
} from "../mod.ts";
import { bothWays, mkGraph, seededRandom } from "./helpers.ts";

const weighted = { distance: weightDistance };

function chars(path: string): string[] {
  return path.split("");
}

afterEach(() => {
  resetLogger();
});

// =============================================================================
// Single pair
// =============================================================================

test("shortestPath - weighted grid", () => {
  const graph = mkGraph("grid3x3");

  expect(shortestPath<string, Graph<string>>(graph, "U", "P", weighted)).toEqual({ path: chars("UJKWP"), distance: 6 });
});

test("shortestPath - unit distance counts hops", () => {
  const graph = mkGraph("grid3x3");

  expect(shortestPath(graph, "U", "P")?.distance).toBe(4);
});

test("shortestPath - cheap chain beats direct shortcuts", () => {
  expect(shortestPath<string, Graph<string>>(mkGraph("shortcuts"), "A", "Z", weighted)).toEqual({
    path: chars("ABCDEFGZ"),
    distance: 8,
  });
});

test("shortestPath - cheapest first hop is not the cheapest path", () => {
  expect(shortestPath<string, Graph<string>>(mkGraph("fan"), "A", "Z", weighted)).toEqual({
    path: chars("ADZ"),
    distance: 11,
  });
});

test("shortestPath - every node of the layered graph", () => {
  const graph = mkGraph("layers");
  const expected: Record<string, [string, number]> = {
    A: ["RA", 1],
    B: ["RB", 3],
    C: ["RAC", 3],
    D: ["RBD", 4],
    E: ["RBE", 12],
    F: ["RACF", 7],
    G: ["RBDG", 6],
    H: ["RBDH", 11],
  };

  for (const [end, [path, distance]] of Object.entries(expected)) {
    expect(shortestPath(graph, "R", end, weighted)).toEqual({ path: chars(path), distance });
  }
});

test("shortestPath - unweighted bridge between triangles", () => {
  const graph = mkGraph("bowtie");

  expect(shortestPath(graph, "A", "E")).toEqual({ path: chars("ACXDE"), distance: 4 });
  expect(shortestPath(graph, "A", "F")).toEqual({ path: chars("ACXDF"), distance: 4 });
});

test("shortestPath - from a node to itself is null", () => {
  expect(shortestPath(mkGraph("grid3x3"), "U", "U")).toBeNull();
  expect(shortestPath<string, Graph<string>>(mkGraph("layers"), "R", "R", weighted)).toBeNull();
});

test("shortestPath - unknown nodes and empty graphs give null", () => {
  const graph = mkGraph("grid3x3");

  expect(shortestPath(graph, "U", "Q")).toBeNull();
  expect(shortestPath(graph, "Q", "U")).toBeNull();
  expect(shortestPath(new Graph<string>(), "a", "b")).toBeNull();
});

test("shortestPath - unreachable end gives null", () => {
  const graph = new Graph<string>();
  graph.addEdge("a", "b");
  graph.addNode("c");

  expect(shortestPath(graph, "a", "c")).toBeNull();
  expect(shortestPath(graph, "b", "a")).toBeNull();
});

test("shortestPath - does not mutate the graph", () => {
  const graph = mkGraph("grid3x3");
  const before = Array.from(graph.toNodesEdgesWeights({ sort: true }));

  shortestPath(graph, "S", "Y", { ...weighted, excludedNodes: "K", excludedEdges: bothWays("SM") });

  expect(Array.from(graph.toNodesEdgesWeights({ sort: true }))).toEqual(before);
});

// =============================================================================
// Node sets
// =============================================================================

describe("shortestPathBetweenSets - west column to east column", () => {
  const graph = mkGraph("grid3x4");
  const west = "AEI";
  const east = "DHL";

  test("no exclusions", () => {
    expect(shortestPathBetweenSets(graph, west, east, weighted)).toEqual({
      path: chars("IJKL"),
      distance: 14,
    });
  });

  test("excluding a begin and its way out", () => {
    expect(
      shortestPathBetweenSets(graph, west, east, { ...weighted, excludedNodes: "IFG" }),
    ).toEqual({ path: chars("ABCD"), distance: 15 });
  });

  test("excluding the middle of two rows", () => {
    expect(
      shortestPathBetweenSets(graph, west, east, { ...weighted, excludedNodes: "KC" }),
    ).toEqual({ path: chars("EFGH"), distance: 15 });
  });

  test("a wall of exclusions gives null", () => {
    expect(
      shortestPathBetweenSets(graph, west, east, { ...weighted, excludedNodes: "BFJ" }),
    ).toBeNull();
  });
});

test("shortestPathBetweenSets - a begin inside the end set is not a goal by itself", () => {
  const graph = new Graph<string>();
  graph.addPath(["a", "b", "c"]);

  expect(shortestPathBetweenSets(graph, ["a", "b"], ["b", "c"])).toEqual({
    path: ["b", "c"],
    distance: 1,
  });
});

test("shortestPathBetweenSets - missing begins and ends are dropped", () => {
  const graph = mkGraph("grid3x3");

  expect(shortestPathBetweenSets(graph, ["nowhere", "U"], ["P", "elsewhere"], weighted)).toEqual({
    path: chars("UJKWP"),
    distance: 6,
  });
  expect(shortestPathBetweenSets(graph, ["nowhere"], ["P"])).toBeNull();
  expect(shortestPathBetweenSets(graph, [], ["P"])).toBeNull();
});

// =============================================================================
// Exclusions
// =============================================================================

test("exclusion - nodes", () => {
  const graph = mkGraph("grid3x3");

  expect(shortestPath(graph, "U", "P", { ...weighted, excludedNodes: ["K"] })).toEqual({
    path: chars("UDYWP"),
    distance: 11,
  });
  expect(shortestPath(graph, "U", "P", { ...weighted, excludedNodes: "KY" })).toEqual({
    path: chars("UJSMP"),
    distance: 15,
  });
  expect(shortestPath(graph, "U", "P", { ...weighted, excludedNodes: "SKY" })).toBeNull();
});

test("exclusion - edges", () => {
  const graph = mkGraph("grid3x3");
  const cases: Array<[string, string, number]> = [
    ["SM", "SJUDY", 13],
    ["SM DY", "SJKWY", 20],
    ["SM JK DY KW", "SJUDKMPWY", 34],
  ];

  for (const [excluded, path, distance] of cases) {
    expect(
      shortestPath(graph, "S", "Y", { ...weighted, excludedEdges: bothWays(excluded) }),
    ).toEqual({ path: chars(path), distance });
  }
  expect(
    shortestPath(graph, "S", "Y", { ...weighted, excludedEdges: bothWays("DY KW MP") }),
  ).toBeNull();
});

test("exclusion - edges are directed", () => {
  const graph = mkGraph("grid3x3");

  // Only D → Y is gone; Y → D is still usable
  expect(shortestPath(graph, "U", "Y", { ...weighted, excludedEdges: [["D", "Y"]] })).toEqual({
    path: chars("UJKWY"),
    distance: 13,
  });
  expect(shortestPath(graph, "Y", "U", { ...weighted, excludedEdges: [["D", "Y"]] })).toEqual({
    path: chars("YDU"),
    distance: 2,
  });
});

test("exclusion - the only begin or end throws ExclusionError", () => {
  const graph = mkGraph("grid3x3");

  expect(() => shortestPath(graph, "U", "P", { excludedNodes: "U" })).toThrow(ExclusionError);
  expect(() => shortestPath(graph, "U", "P", { excludedNodes: "P" })).toThrow(ExclusionError);
});

test("exclusion - every begin or every end throws ExclusionError", () => {
  const graph = mkGraph("grid3x4");

  try {
    shortestPathBetweenSets(graph, "AEI", "DHL", { excludedNodes: "IAE" });
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(ExclusionError);
    if (error instanceof ExclusionError) {
      expect(error.side).toBe("begins");
      expect(error.excluded).toEqual(["A", "E", "I"]);
      expect(error.message).toBe("Excluded nodes remove all begins nodes: {A, E, I}");
    }
  }

  expect(() => shortestPathBetweenSets(graph, "AEI", "DHL", { excludedNodes: "DHL" })).toThrow(
    "Excluded nodes remove all ends nodes: {D, H, L}",
  );
});

test("exclusion - partial overlap is a warning", () => {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  setLogger(logger);
  const graph = mkGraph("grid3x4");

  const result = shortestPathBetweenSets(graph, "AEI", "DHL", {
    ...weighted,
    excludedNodes: "IFG",
  });

  expect(result?.distance).toBe(15);
  expect(logger.warn).toHaveBeenCalledTimes(1);
  expect(logger.warn).toHaveBeenCalledWith("Excluded nodes remove 1 of 3 begins nodes", ["I"]);
});

test("exclusion - partial overlap with the ends is a warning too", () => {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  setLogger(logger);
  const graph = mkGraph("grid3x4");

  const result = shortestPathBetweenSets(graph, "AEI", "DHL", { ...weighted, excludedNodes: "L" });

  expect(result?.distance).toBe(15);
  expect(result?.path).not.toContain("L");
  expect(logger.warn).toHaveBeenCalledWith("Excluded nodes remove 1 of 3 ends nodes", ["L"]);
});

// =============================================================================
// Acceptance window
// =============================================================================

test("isDistanceOk - too-short goals are passed over", () => {
  const graph = mkGraph("layers");

  expect(
    shortestPath<string, Graph<string>>(graph, "R", "D", { ...weighted, isDistanceOk: (d) => (d < 4 ? -1 : 0) }),
  ).toEqual({ path: chars("RBD"), distance: 4 });

  // D settles at 4, which is still too short, and is never revisited
  expect(shortestPath<string, Graph<string>>(graph, "R", "D", { ...weighted, isDistanceOk: (d) => (d < 5 ? -1 : 0) }))
    .toBeNull();
});

test("isDistanceOk - too-long distances stop the search", () => {
  const graph = mkGraph("layers");

  expect(
    shortestPath<string, Graph<string>>(graph, "R", "H", { ...weighted, isDistanceOk: (d) => (d > 11 ? 1 : 0) }),
  ).toEqual({ path: chars("RBDH"), distance: 11 });
  expect(shortestPath<string, Graph<string>>(graph, "R", "H", { ...weighted, isDistanceOk: (d) => (d > 10 ? 1 : 0) }))
    .toBeNull();
});

test("isDistanceOk - window with both bounds", () => {
  const graph = mkGraph("layers");
  const window = (d: number): DistanceVerdict => (d < 5 ? -1 : d > 12 ? 1 : 0);

  expect(shortestPath<string, Graph<string>>(graph, "R", "G", { ...weighted, isDistanceOk: window })).toEqual({
    path: chars("RBDG"),
    distance: 6,
  });
  expect(shortestPath<string, Graph<string>>(graph, "R", "F", { ...weighted, isDistanceOk: window })).toEqual({
    path: chars("RACF"),
    distance: 7,
  });
  expect(shortestPath<string, Graph<string>>(graph, "R", "C", { ...weighted, isDistanceOk: window })).toBeNull();
  expect(shortestPath<string, Graph<string>>(graph, "R", "E", { ...weighted, isDistanceOk: window })).toEqual({
    path: chars("RBE"),
    distance: 12,
  });
});

test("isDistanceOk - the bound limits distance evaluations", () => {
  const graph = mkGraph("layers");
  const cases: Array<[number, number | null, number]> = [
    [0, null, 2],
    [2, null, 4],
    [5, null, 10],
    [100, 11, 10],
  ];

  for (const [bound, distance, calls] of cases) {
    let evaluated = 0;
    const result = shortestPath(graph, "R", "H", {
      distance: (g, from, to) => {
        evaluated++;
        return g.weight(from, to, 1);
      },
      isDistanceOk: (d) => (d > bound ? 1 : 0),
    });

    expect(result?.distance ?? null).toBe(distance);
    expect(evaluated).toBe(calls);
  }
});

test("isDistanceOk - stopping is logged at debug", () => {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  setLogger(logger);

  shortestPath<string, Graph<string>>(mkGraph("layers"), "R", "H", { ...weighted, isDistanceOk: (d) => (d > 0 ? 1 : 0) });

  expect(logger.debug).toHaveBeenCalledWith(
    "Search stopped: distance 1 exceeds the acceptance window",
  );
});

// =============================================================================
// Cycles
// =============================================================================

test("shortestCycle - shortest of several cycles", () => {
  const graph = new Graph<string>();
  graph.addEdge("A", "B", 1);
  graph.addEdge("B", "C", 1);
  graph.addEdge("C", "A", 1);
  graph.addEdge("A", "D", 2);
  graph.addEdge("D", "A", 2);

  expect(shortestCycle<string, Graph<string>>(graph, "A", weighted)).toEqual({ path: chars("ABCA"), distance: 3 });
  expect(shortestCycle(graph, "A", { ...weighted, excludedNodes: "C" })).toEqual({
    path: chars("ADA"),
    distance: 4,
  });
});

test("shortestCycle - self loops", () => {
  const graph = new Graph<string>();
  graph.addEdge("X", "X", 5);

  expect(shortestCycle<string, Graph<string>>(graph, "X", weighted)).toEqual({ path: ["X", "X"], distance: 5 });

  graph.addEdge("X", "Y", 1);
  graph.addEdge("Y", "X", 1);
  expect(shortestCycle<string, Graph<string>>(graph, "X", weighted)).toEqual({ path: ["X", "Y", "X"], distance: 2 });
});

test("shortestCycle - unit distance over symmetric edges", () => {
  expect(shortestCycle(mkGraph("bowtie"), "A")).toEqual({ path: ["A", "B", "A"], distance: 2 });
});

test("shortestCycle - excluding the node itself throws ExclusionError", () => {
  const graph = new Graph<string>();
  graph.addEdge("x", "x");
  graph.addPath(["x", "y"], true);

  expect(() => shortestCycle(graph, "x", { excludedNodes: ["x"] })).toThrow(ExclusionError);
  expect(shortestCycle(graph, "x", { excludedNodes: ["y"] })).toEqual({
    path: ["x", "x"],
    distance: 1,
  });
});

test("shortestCycle - acyclic and unknown nodes give null", () => {
  const graph = new Graph<string>();
  graph.addPath(["a", "b", "c"]);

  expect(shortestCycle(graph, "a")).toBeNull();
  expect(shortestCycle(graph, "zz")).toBeNull();
});

// =============================================================================
// Frontier
// =============================================================================

test("Frontier - distance order, then insertion order", () => {
  const frontier = new Frontier<string>();
  frontier.push(1, "x", none());
  frontier.push(0, "y", none());
  frontier.push(1, "z", some("y"));
  frontier.push(0, "w", some("x"));

  expect(frontier.size).toBe(4);
  expect([1, 2, 3, 4].map(() => frontier.pop()?.node)).toEqual(["y", "w", "x", "z"]);
  expect(frontier.pop()).toBeUndefined();
});

test("Frontier - nodes need no ordering", () => {
  const frontier = new Frontier<{ id: number }>();
  frontier.push(2, { id: 1 }, none());
  frontier.push(2, { id: 2 }, none());

  expect(frontier.pop()?.node).toEqual({ id: 1 });
  expect(frontier.pop()?.node).toEqual({ id: 2 });
});

// =============================================================================
// Random graphs against brute force
// =============================================================================

function randomGraph(random: () => number): Graph<number> {
  const graph = new Graph<number>();
  const order = 3 + Math.floor(random() * 6);
  for (let i = 0; i < order; i++) {
    graph.addNode(i);
  }
  for (let from = 0; from < order; from++) {
    for (let to = 0; to < order; to++) {
      if (from !== to && random() < 0.35) {
        graph.addEdge(from, to, Math.floor(random() * 10));
      }
    }
  }
  return graph;
}

/** Minimum over all simple paths; Infinity when there is none */
function bruteForce(graph: Graph<number>, begin: number, end: number, excluded: Set<number>): number {
  let best = Infinity;
  const onPath = new Set([begin]);
  const visit = (node: number, distance: number): void => {
    for (const next of graph.outNeighbors(node)) {
      if (excluded.has(next)) continue;
      const total = distance + graph.weight(node, next, 1);
      if (next === end) {
        best = Math.min(best, total);
      } else if (!onPath.has(next)) {
        onPath.add(next);
        visit(next, total);
        onPath.delete(next);
      }
    }
  };
  visit(begin, 0);
  return best;
}

function pathLength(graph: Graph<number>, path: number[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    total += graph.weight(path[i - 1], path[i], 1);
  }
  return total;
}

test("shortestPath - minimal on random graphs", () => {
  const random = seededRandom(20241019);

  for (let round = 0; round < 40; round++) {
    const graph = randomGraph(random);
    const order = graph.nNodes();
    for (let begin = 0; begin < order; begin++) {
      for (let end = 0; end < order; end++) {
        if (begin === end) continue;
        const best = bruteForce(graph, begin, end, new Set());
        const result = shortestPath(graph, begin, end, weighted);

        if (best === Infinity) {
          expect(result).toBeNull();
          continue;
        }
        expect(result?.distance).toBe(best);
        expect(result?.path[0]).toBe(begin);
        expect(result?.path.at(-1)).toBe(end);
        expect(graph.hasPath(result?.path ?? [])).toBe(true);
        expect(pathLength(graph, result?.path ?? [])).toBe(best);
      }
    }
  }
});

test("shortestPath - excluded node is never on the path", () => {
  const random = seededRandom(7);

  for (let round = 0; round < 40; round++) {
    const graph = randomGraph(random);
    const order = graph.nNodes();
    const begin = 0;
    const end = order - 1;
    const excluded = 1 + Math.floor(random() * (order - 2));

    const best = bruteForce(graph, begin, end, new Set([excluded]));
    const result = shortestPath(graph, begin, end, { ...weighted, excludedNodes: [excluded] });

    if (best === Infinity) {
      expect(result).toBeNull();
    } else {
      expect(result?.distance).toBe(best);
      expect(result?.path).not.toContain(excluded);
    }
  }
});
