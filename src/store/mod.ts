/**
 * Storage backends
 *
 * @module digraph-kit/store
 */

export type { Edge, EdgeStore, NodeStore, PropertyStore } from "./types.ts";
export { SetNodeStore } from "./set-node-store.ts";
export { MapSetEdgeStore, MapSetNodeEdgeStore } from "./map-set-edge-store.ts";
export { MapPropertyStore } from "./map-property-store.ts";
export { GraphologyNodeEdgeStore } from "./graphology-store.ts";
export { TupleMap } from "./tuple-map.ts";
