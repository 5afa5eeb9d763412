/**
 * Fixed-length tuples as vectors: `[x, y]`, `[x, y, z]`, `[x, y, z, w]`.
 * Works for any scalar capability — `number`, `bigint`, or your own.
 */

import { threeDimensional, twoDimensional, type ThreeDimensional, type TwoDimensional } from '../dimensions.js';
import type { Scalar } from '../scalar.js';
import { checkIndex, type VectorN } from '../vector.js';

export type Tuple2<S> = [S, S];
export type Tuple3<S> = [S, S, S];
export type Tuple4<S> = [S, S, S, S];

function tupleKind<V extends S[], S, D extends 2 | 3 | 4>(
  dimensions: D,
  scalar: Scalar<S>,
  make: (value: () => S) => V,
): VectorN<V, S, D> {
  return {
    dimensions,
    scalar,
    fromValue: (value) => make(() => scalar.clone(value)),
    nth(v, index) {
      checkIndex(dimensions, index);
      return v[index];
    },
    setNth(v, index, value) {
      checkIndex(dimensions, index);
      const components: S[] = v;
      components[index] = value;
    },
    clone: (v) => {
      let i = 0;
      return make(() => scalar.clone(v[i++]));
    },
    equals(a, b) {
      for (let i = 0; i < dimensions; i++) {
        if (!scalar.equals(a[i], b[i])) return false;
      }
      return true;
    },
    debug: (v) => `[${v.map(String).join(', ')}]`,
  };
}

export function tuple2<S>(scalar: Scalar<S>): VectorN<Tuple2<S>, S, 2> {
  return tupleKind<Tuple2<S>, S, 2>(2, scalar, (c) => [c(), c()]);
}

export function tuple3<S>(scalar: Scalar<S>): VectorN<Tuple3<S>, S, 3> {
  return tupleKind<Tuple3<S>, S, 3>(3, scalar, (c) => [c(), c(), c()]);
}

export function tuple4<S>(scalar: Scalar<S>): VectorN<Tuple4<S>, S, 4> {
  return tupleKind<Tuple4<S>, S, 4>(4, scalar, (c) => [c(), c(), c(), c()]);
}

export function tuple2D<S>(scalar: Scalar<S>): TwoDimensional<Tuple2<S>, S> {
  return twoDimensional(tuple2(scalar));
}

export function tuple3D<S>(scalar: Scalar<S>): ThreeDimensional<Tuple3<S>, S> {
  return threeDimensional(tuple3(scalar));
}
