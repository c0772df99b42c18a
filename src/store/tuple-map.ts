/**
 * TupleMap
 *
 * Map keyed by node tuples, stored as a trie of Maps so that composite keys
 * never need hashing or stringifying: each tuple element indexes one level.
 *
 * @module digraph-kit/store/tuple-map
 */

import { type Maybe, none, some } from "../core/maybe.ts";

interface TrieLevel<K, V> {
  value: Maybe<V>;
  children: Map<K, TrieLevel<K, V>>;
}

function emptyLevel<K, V>(): TrieLevel<K, V> {
  return { value: none(), children: new Map() };
}

export class TupleMap<K, V> {
  private readonly root: TrieLevel<K, V> = emptyLevel<K, V>();
  private count = 0;

  /** Number of tuples holding a value */
  get size(): number {
    return this.count;
  }

  get(tuple: readonly K[]): Maybe<V> {
    const level = this.find(tuple);
    return level ? level.value : none();
  }

  has(tuple: readonly K[]): boolean {
    return this.find(tuple)?.value.present ?? false;
  }

  set(tuple: readonly K[], value: V): void {
    let level = this.root;
    for (const key of tuple) {
      let child = level.children.get(key);
      if (!child) {
        child = emptyLevel<K, V>();
        level.children.set(key, child);
      }
      level = child;
    }
    if (!level.value.present) {
      this.count++;
    }
    level.value = some(value);
  }

  /**
   * Remove the value at `tuple`, pruning branches left empty
   *
   * @returns whether a value was removed
   */
  delete(tuple: readonly K[]): boolean {
    const trail: Array<[TrieLevel<K, V>, K]> = [];
    let level = this.root;
    for (const key of tuple) {
      const child = level.children.get(key);
      if (!child) return false;
      trail.push([level, key]);
      level = child;
    }
    if (!level.value.present) return false;

    level.value = none();
    this.count--;

    // Prune from the leaf upwards while levels hold nothing
    for (let i = trail.length - 1; i >= 0; i--) {
      const [parent, key] = trail[i];
      const child = parent.children.get(key);
      if (!child || child.value.present || child.children.size > 0) break;
      parent.children.delete(key);
    }
    return true;
  }

  private find(tuple: readonly K[]): TrieLevel<K, V> | undefined {
    let level: TrieLevel<K, V> | undefined = this.root;
    for (const key of tuple) {
      level = level.children.get(key);
      if (!level) return undefined;
    }
    return level;
  }
}
