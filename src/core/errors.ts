/**
 * Error taxonomy
 *
 * Every failure raised by the library is a GraphError. "No path" is not an
 * error: searches return `null` for it.
 *
 * @module digraph-kit/core/errors
 */

/**
 * Base class for all library errors
 */
export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphError";
  }
}

/**
 * Thrown by bulk construction for an item that is neither a node nor an edge
 */
export class ConstructionError extends GraphError {
  constructor(public readonly item: readonly unknown[]) {
    super(
      `Not interpretable as a node or edge: [${item.map(String).join(", ")}] ` +
        `(arity ${item.length}, expected 1 or 2)`,
    );
    this.name = "ConstructionError";
  }
}

export type NotFoundKind = "node" | "edge";

/**
 * Thrown when deleting a node or edge that does not exist
 */
export class NotFoundError extends GraphError {
  constructor(
    public readonly kind: NotFoundKind,
    public readonly subject: readonly unknown[],
  ) {
    super(`No such ${kind}: ${subject.map(String).join(" → ")}`);
    this.name = "NotFoundError";
  }
}

export type ExclusionSide = "begins" | "ends";

/**
 * Thrown when node exclusions remove every begin or every end node of a
 * search. This is a usage error, not an unreachable goal.
 */
export class ExclusionError extends GraphError {
  constructor(
    public readonly side: ExclusionSide,
    public readonly excluded: readonly unknown[],
  ) {
    super(
      `Excluded nodes remove all ${side} nodes: ` +
        `{${excluded.map(String).join(", ")}}`,
    );
    this.name = "ExclusionError";
  }
}
