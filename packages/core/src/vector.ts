/**
 * Vector capability — the minimal contract every fixed-size vector type
 * implements to take part in vecn.
 *
 * A descriptor is the runtime witness for one concrete vector type `V`.
 * Things that belong to the type rather than to an instance (dimension
 * count, construction from a scalar) live on the descriptor; vectors
 * themselves stay plain values (tuples, three.js objects, typed arrays).
 */

import type { Scalar } from './scalar.js';

export type Dimension = 2 | 3 | 4;

export interface VectorN<V, S, D extends Dimension = Dimension> {
  /** Fixed component count of `V`. */
  readonly dimensions: D;

  /** Arithmetic of the component type. */
  readonly scalar: Scalar<S>;

  /** New vector with every component set to `value`. */
  fromValue(value: S): V;

  /** Component at `index`. Throws ComponentIndexError outside 0..dimensions-1. */
  nth(v: V, index: number): S;

  /** Overwrite the component at `index` in place. Same bounds as `nth`. */
  setNth(v: V, index: number, value: S): void;

  clone(v: V): V;
  equals(a: V, b: V): boolean;
  debug(v: V): string;
}

export class ComponentIndexError extends RangeError {
  constructor(readonly index: number, readonly dimensions: number) {
    super(`Component index ${index} is out of range for a ${dimensions}-dimensional vector`);
    this.name = 'ComponentIndexError';
  }
}

export class DimensionMismatchError extends Error {
  constructor(readonly expected: number, readonly actual: number, context: string) {
    super(`${context}: expected ${expected} dimensions, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

/** Fail fast on an index a binding cannot address. */
export function checkIndex(dimensions: number, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= dimensions) {
    throw new ComponentIndexError(index, dimensions);
  }
}
