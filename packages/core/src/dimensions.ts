/**
 * Dimensional markers.
 *
 * Some structures only make sense for planar input, some algorithms only for
 * space. The `dimensions` literal on a descriptor carries that fact in the
 * type: a `VectorN<V, S, 3>` is not assignable where a `TwoDimensional` is
 * expected, so the mismatch is rejected at compile time instead of at run time.
 */

import { extend, type VectorNExtensions } from './extensions.js';
import { DimensionMismatchError, type VectorN } from './vector.js';

/** A vector type with exactly two components. Adds no operations. */
export type TwoDimensional<V, S> = VectorNExtensions<V, S, 2>;

/** A vector type with exactly three components. */
export interface ThreeDimensional<V, S> extends VectorNExtensions<V, S, 3> {
  /** Right-handed cross product a × b. */
  cross(a: V, b: V): V;
}

function expectDimensions(actual: number, expected: number, context: string): void {
  if (actual !== expected) {
    throw new DimensionMismatchError(expected, actual, context);
  }
}

export function twoDimensional<V, S>(kind: VectorN<V, S, 2>): TwoDimensional<V, S> {
  expectDimensions(kind.dimensions, 2, 'twoDimensional');
  return extend(kind);
}

export function threeDimensional<V, S>(kind: VectorN<V, S, 3>): ThreeDimensional<V, S> {
  expectDimensions(kind.dimensions, 3, 'threeDimensional');
  const ext = extend(kind);
  const { scalar } = kind;

  // a_i * b_j - a_j * b_i
  const term = (a: V, b: V, i: number, j: number): S =>
    scalar.sub(
      scalar.mul(scalar.clone(kind.nth(a, i)), scalar.clone(kind.nth(b, j))),
      scalar.mul(scalar.clone(kind.nth(a, j)), scalar.clone(kind.nth(b, i))),
    );

  return {
    ...ext,
    cross(a, b) {
      const result = ext.zero();
      kind.setNth(result, 0, term(a, b, 1, 2));
      kind.setNth(result, 1, term(a, b, 2, 0));
      kind.setNth(result, 2, term(a, b, 0, 1));
      return result;
    },
  };
}
