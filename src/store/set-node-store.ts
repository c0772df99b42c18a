/**
 * Set-backed node store
 *
 * @module digraph-kit/store/set-node-store
 */

import { NotFoundError } from "../core/errors.ts";
import type { NodeStore } from "./types.ts";

export class SetNodeStore<N> implements NodeStore<N> {
  private readonly members = new Set<N>();

  hasNode(node: N): boolean {
    return this.members.has(node);
  }

  addNode(node: N): void {
    this.members.add(node);
  }

  delNode(node: N): void {
    if (!this.members.delete(node)) {
      throw new NotFoundError("node", [node]);
    }
  }

  nodes(): IterableIterator<N> {
    return this.members.values();
  }

  nNodes(): number {
    return this.members.size;
  }
}
