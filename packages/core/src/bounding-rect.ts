/**
 * BoundingRect — axis-aligned bounding box over any vector type.
 *
 * Works in 2, 3 or 4 dimensions with whatever scalar the descriptor carries;
 * all comparisons go through the scalar's own ordering.
 */

import type { VectorNExtensions } from './extensions.js';

export class BoundingRect<V, S> {
  private constructor(
    private readonly kind: VectorNExtensions<V, S>,
    private readonly lo: V,
    private readonly hi: V,
  ) {}

  /** Degenerate rectangle containing a single point. */
  static fromPoint<V, S>(kind: VectorNExtensions<V, S>, point: V): BoundingRect<V, S> {
    return new BoundingRect(kind, kind.clone(point), kind.clone(point));
  }

  /** Rectangle spanned by two opposite corners, in any order. */
  static fromCorners<V, S>(kind: VectorNExtensions<V, S>, a: V, b: V): BoundingRect<V, S> {
    return new BoundingRect(kind, kind.minVec(a, b), kind.maxVec(a, b));
  }

  static fromPoints<V, S>(kind: VectorNExtensions<V, S>, points: readonly V[]): BoundingRect<V, S> {
    if (points.length === 0) {
      throw new Error('BoundingRect.fromPoints requires at least one point');
    }
    let rect = BoundingRect.fromPoint(kind, points[0]);
    for (let i = 1; i < points.length; i++) {
      rect = rect.add(points[i]);
    }
    return rect;
  }

  lower(): V {
    return this.kind.clone(this.lo);
  }

  upper(): V {
    return this.kind.clone(this.hi);
  }

  /** Extent along each axis (upper - lower). */
  size(): V {
    return this.kind.sub(this.hi, this.lo);
  }

  /** Product of the extents: area in 2D, volume in 3D. */
  area(): S {
    const [first, ...rest] = this.kind.components(this.size());
    return rest.reduce((acc, x) => this.kind.scalar.mul(acc, x), first);
  }

  /** Inclusive on the boundary. */
  containsPoint(p: V): boolean {
    const le = (a: S, b: S) => this.kind.scalar.compare(a, b) <= 0;
    return this.kind.allCompWise(this.lo, p, le) && this.kind.allCompWise(p, this.hi, le);
  }

  containsRect(other: BoundingRect<V, S>): boolean {
    return this.containsPoint(other.lo) && this.containsPoint(other.hi);
  }

  /** True when the rectangles share at least one point (touching counts). */
  intersects(other: BoundingRect<V, S>): boolean {
    const le = (a: S, b: S) => this.kind.scalar.compare(a, b) <= 0;
    return this.kind.allCompWise(this.lo, other.hi, le) && this.kind.allCompWise(other.lo, this.hi, le);
  }

  /** Smallest rectangle containing this one and `p`. */
  add(p: V): BoundingRect<V, S> {
    return new BoundingRect(this.kind, this.kind.minVec(this.lo, p), this.kind.maxVec(this.hi, p));
  }

  addRect(other: BoundingRect<V, S>): BoundingRect<V, S> {
    return new BoundingRect(
      this.kind,
      this.kind.minVec(this.lo, other.lo),
      this.kind.maxVec(this.hi, other.hi),
    );
  }

  /** Squared distance from `p` to the closest point of the rectangle. Zero inside. */
  distance2(p: V): S {
    const clamped = this.kind.maxVec(this.lo, this.kind.minVec(this.hi, p));
    return this.kind.length2(this.kind.sub(p, clamped));
  }
}
