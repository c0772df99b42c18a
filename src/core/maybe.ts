/**
 * Presence type for values that may be unset.
 *
 * `undefined` and `null` are ordinary values here: a property explicitly set
 * to `undefined` is `{ present: true, value: undefined }`.
 *
 * @module digraph-kit/core/maybe
 */

export type Maybe<T> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false };

const NONE: Maybe<never> = Object.freeze({ present: false });

export function some<T>(value: T): Maybe<T> {
  return { present: true, value };
}

export function none<T>(): Maybe<T> {
  return NONE;
}

/** Unwrap, falling back to `fallback` when absent */
export function orElse<T, F>(maybe: Maybe<T>, fallback: F): T | F {
  return maybe.present ? maybe.value : fallback;
}
