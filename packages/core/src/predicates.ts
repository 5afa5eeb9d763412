/**
 * Geometric predicates restricted by dimensional markers.
 *
 * `orient2d` only accepts a TwoDimensional descriptor and `triangleNormal`
 * only a ThreeDimensional one — a tuple4 or Vector3 descriptor passed to
 * `orient2d` does not type-check.
 */

import type { ThreeDimensional, TwoDimensional } from './dimensions.js';

export type LineSide = 'left' | 'right' | 'on';

/**
 * z-component of (b - a) × (c - a).
 * Positive when a → b → c turns counter-clockwise, negative when clockwise,
 * zero when collinear.
 */
export function orient2d<V, S>(kind: TwoDimensional<V, S>, a: V, b: V, c: V): S {
  const { scalar } = kind;
  const ab = kind.sub(b, a);
  const ac = kind.sub(c, a);
  return scalar.sub(
    scalar.mul(kind.nth(ab, 0), kind.nth(ac, 1)),
    scalar.mul(kind.nth(ab, 1), kind.nth(ac, 0)),
  );
}

/** Which side of the directed line from → to the point lies on. */
export function sideOfLine<V, S>(kind: TwoDimensional<V, S>, from: V, to: V, p: V): LineSide {
  const o = kind.scalar.compare(orient2d(kind, from, to, p), kind.scalar.zero());
  if (o > 0) return 'left';
  if (o < 0) return 'right';
  return 'on';
}

/** Unnormalized normal (b - a) × (c - a); its length is twice the triangle's area. */
export function triangleNormal<V, S>(kind: ThreeDimensional<V, S>, a: V, b: V, c: V): V {
  return kind.cross(kind.sub(b, a), kind.sub(c, a));
}

/** True when the three points are collinear (or coincide). */
export function isDegenerateTriangle<V, S>(kind: ThreeDimensional<V, S>, a: V, b: V, c: V): boolean {
  const n = triangleNormal(kind, a, b, c);
  return kind.scalar.compare(kind.length2(n), kind.scalar.zero()) === 0;
}
