/**
 * Scalar capability — the arithmetic a vector's components must support.
 *
 * JavaScript has no operator overloading, so the four operations, the
 * ordering and the zero value travel as a dictionary next to the vector
 * descriptor instead of living on the scalar type itself.
 */
export interface Scalar<S> {
  /** Additive identity. */
  zero(): S;
  add(a: S, b: S): S;
  sub(a: S, b: S): S;
  mul(a: S, b: S): S;
  div(a: S, b: S): S;
  /** Negative when a < b, positive when a > b, zero when equal. Must be total. */
  compare(a: S, b: S): number;
  /** Structural equality; NaN is equal to nothing. */
  equals(a: S, b: S): boolean;
  clone(a: S): S;
}

/** IEEE doubles. Division by zero gives Infinity or NaN. */
export const numberScalar: Scalar<number> = {
  zero: () => 0,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  equals: (a, b) => a === b,
  clone: (a) => a,
};

/** Arbitrary-precision integers. Division truncates; dividing by 0n throws. */
export const bigintScalar: Scalar<bigint> = {
  zero: () => 0n,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  equals: (a, b) => a === b,
  clone: (a) => a,
};

/** `a` if strictly smaller, otherwise `b`. */
export function minScalar<S>(scalar: Scalar<S>, a: S, b: S): S {
  return scalar.compare(a, b) < 0 ? a : b;
}

/** `a` if strictly greater, otherwise `b`. */
export function maxScalar<S>(scalar: Scalar<S>, a: S, b: S): S {
  return scalar.compare(a, b) > 0 ? a : b;
}

/** Additive inverse, computed as zero - a. */
export function negate<S>(scalar: Scalar<S>, a: S): S {
  return scalar.sub(scalar.zero(), a);
}
