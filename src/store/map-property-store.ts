/**
 * Map-backed property store
 *
 * One TupleMap of specific values per property key, plus a map of per-key
 * defaults.
 *
 * @module digraph-kit/store/map-property-store
 */

import { type Maybe, none, orElse, some } from "../core/maybe.ts";
import type { PropertyStore } from "./types.ts";
import { TupleMap } from "./tuple-map.ts";

export class MapPropertyStore<N, V> implements PropertyStore<N, V> {
  private readonly values = new Map<string, TupleMap<N, V>>();
  // Boxed so that an `undefined` default is distinguishable from none
  private readonly defaults = new Map<string, { readonly value: V }>();

  hasProperty(key: string, nodes: readonly N[]): boolean {
    return this.values.get(key)?.has(nodes) ?? false;
  }

  lookupProperty(key: string, nodes: readonly N[]): Maybe<V> {
    const specific = this.values.get(key)?.get(nodes);
    if (specific?.present) {
      return specific;
    }
    return this.lookupDefault(key);
  }

  getProperty(key: string, nodes: readonly N[]): V | undefined;
  getProperty(key: string, nodes: readonly N[], valueIfAbsent: V): V;
  getProperty(key: string, nodes: readonly N[], valueIfAbsent?: V): V | undefined {
    return orElse(this.lookupProperty(key, nodes), valueIfAbsent);
  }

  setProperty(key: string, nodes: readonly N[], value: V): void {
    let byTuple = this.values.get(key);
    if (!byTuple) {
      byTuple = new TupleMap<N, V>();
      this.values.set(key, byTuple);
    }
    byTuple.set(nodes, value);
  }

  delProperty(key: string, nodes: readonly N[]): void {
    const byTuple = this.values.get(key);
    if (byTuple && byTuple.delete(nodes) && byTuple.size === 0) {
      this.values.delete(key);
    }
  }

  hasPropertyDefault(key: string): boolean {
    return this.defaults.has(key);
  }

  getPropertyDefault(key: string): V | undefined;
  getPropertyDefault(key: string, valueIfAbsent: V): V;
  getPropertyDefault(key: string, valueIfAbsent?: V): V | undefined {
    return orElse(this.lookupDefault(key), valueIfAbsent);
  }

  setPropertyDefault(key: string, value: V): void {
    this.defaults.set(key, { value });
  }

  delPropertyDefault(key: string): void {
    this.defaults.delete(key);
  }

  private lookupDefault(key: string): Maybe<V> {
    const boxed = this.defaults.get(key);
    return boxed ? some(boxed.value) : none();
  }
}
