/**
 * Vector extensions — derived operations written once against VectorN.
 *
 *   const v3 = extend(tuple3(numberScalar));
 *   v3.dot([1, 2, 3], [4, 5, 6]); // 32
 *
 * Nothing here knows about a concrete representation; every operation goes
 * through `nth`, `setNth`, `clone` and `fromValue` of the wrapped descriptor.
 * Results are always fresh vectors; inputs are never mutated.
 */

import { maxScalar, minScalar } from './scalar.js';
import { DimensionMismatchError, type Dimension, type VectorN } from './vector.js';

export interface VectorNExtensions<V, S, D extends Dimension = Dimension> extends VectorN<V, S, D> {
  /** All components zero. */
  zero(): V;

  add(a: V, b: V): V;
  sub(a: V, b: V): V;

  /** Multiply every component by `s`. */
  mul(v: V, s: S): V;

  /** Divide every component by `s`. */
  div(v: V, s: S): V;

  /** result[i] = f(a[i], b[i]). */
  componentWise(a: V, b: V, f: (l: S, r: S) => S): V;

  /** Unary `f` applied per component, same vector type. */
  map(v: V, f: (x: S) => S): V;

  /**
   * Unary `f` applied per component into another vector type.
   * Throws DimensionMismatchError unless `target` has the same dimension.
   */
  mapTo<W, T>(v: V, target: VectorN<W, T>, f: (x: S) => T): W;

  minVec(a: V, b: V): V;
  maxVec(a: V, b: V): V;

  /** Left-to-right reduction over components 0..dimensions-1. */
  fold<T>(v: V, initial: T, f: (acc: T, x: S) => T): T;

  /** True iff `predicate` holds at every index. Stops at the first failure. */
  allCompWise(a: V, b: V, predicate: (l: S, r: S) => boolean): boolean;

  dot(a: V, b: V): S;

  /** Squared Euclidean length. */
  length2(v: V): S;

  /** Components in index order as a plain array. */
  components(v: V): S[];
}

/** Layer the derived operations over a descriptor. */
export function extend<V, S, D extends Dimension>(kind: VectorN<V, S, D>): VectorNExtensions<V, S, D> {
  const { dimensions, scalar } = kind;

  const componentWise = (a: V, b: V, f: (l: S, r: S) => S): V => {
    const result = kind.clone(a);
    for (let i = 0; i < dimensions; i++) {
      kind.setNth(result, i, f(scalar.clone(kind.nth(a, i)), scalar.clone(kind.nth(b, i))));
    }
    return result;
  };

  const map = (v: V, f: (x: S) => S): V => {
    const result = kind.clone(v);
    for (let i = 0; i < dimensions; i++) {
      kind.setNth(result, i, f(scalar.clone(kind.nth(v, i))));
    }
    return result;
  };

  const fold = <T>(v: V, initial: T, f: (acc: T, x: S) => T): T => {
    let acc = initial;
    for (let i = 0; i < dimensions; i++) {
      acc = f(acc, scalar.clone(kind.nth(v, i)));
    }
    return acc;
  };

  const dot = (a: V, b: V): S =>
    fold(componentWise(a, b, (l, r) => scalar.mul(l, r)), scalar.zero(), (acc, x) => scalar.add(acc, x));

  return {
    dimensions,
    scalar,
    fromValue: (value) => kind.fromValue(value),
    nth: (v, index) => kind.nth(v, index),
    setNth: (v, index, value) => kind.setNth(v, index, value),
    clone: (v) => kind.clone(v),
    equals: (a, b) => kind.equals(a, b),
    debug: (v) => kind.debug(v),

    zero: () => kind.fromValue(scalar.zero()),
    add: (a, b) => componentWise(a, b, (l, r) => scalar.add(l, r)),
    sub: (a, b) => componentWise(a, b, (l, r) => scalar.sub(l, r)),
    mul: (v, s) => map(v, (x) => scalar.mul(x, scalar.clone(s))),
    div: (v, s) => map(v, (x) => scalar.div(x, scalar.clone(s))),
    componentWise,
    map,

    mapTo<W, T>(v: V, target: VectorN<W, T>, f: (x: S) => T): W {
      if (target.dimensions !== dimensions) {
        throw new DimensionMismatchError(dimensions, target.dimensions, 'mapTo');
      }
      const result = target.fromValue(target.scalar.zero());
      for (let i = 0; i < dimensions; i++) {
        target.setNth(result, i, f(scalar.clone(kind.nth(v, i))));
      }
      return result;
    },

    minVec: (a, b) => componentWise(a, b, (l, r) => minScalar(scalar, l, r)),
    maxVec: (a, b) => componentWise(a, b, (l, r) => maxScalar(scalar, l, r)),
    fold,

    allCompWise(a, b, predicate) {
      for (let i = 0; i < dimensions; i++) {
        if (!predicate(scalar.clone(kind.nth(a, i)), scalar.clone(kind.nth(b, i)))) {
          return false;
        }
      }
      return true;
    },

    dot,
    length2: (v) => dot(v, v),
    components: (v) => fold<S[]>(v, [], (acc, x) => {
      acc.push(x);
      return acc;
    }),
  };
}
