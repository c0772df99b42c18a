/**
 * Search Frontier
 *
 * Min-priority queue of candidate (distance, node, predecessor) entries.
 * Ties on distance are broken by insertion order, never by comparing node
 * values, so nodes need no ordering.
 *
 * @module digraph-kit/search/frontier
 */

import Heap from "mnemonist/heap.js";
import type { Maybe } from "../core/maybe.ts";

export interface FrontierEntry<N> {
  distance: number;
  /** Monotonic insertion counter */
  sequence: number;
  node: N;
  predecessor: Maybe<N>;
}

function compareEntries<N>(a: FrontierEntry<N>, b: FrontierEntry<N>): number {
  return a.distance - b.distance || a.sequence - b.sequence;
}

export class Frontier<N> {
  private readonly heap = new Heap<FrontierEntry<N>>(compareEntries);
  private nextSequence = 0;

  get size(): number {
    return this.heap.size;
  }

  push(distance: number, node: N, predecessor: Maybe<N>): void {
    this.heap.push({ distance, sequence: this.nextSequence++, node, predecessor });
  }

  /** Remove and return the closest entry, or undefined when empty */
  pop(): FrontierEntry<N> | undefined {
    return this.heap.pop();
  }
}
