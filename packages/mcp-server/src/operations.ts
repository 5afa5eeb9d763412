/**
 * Vector operations behind the MCP tools.
 *
 * Operands are looked up by ID, dispatched to the descriptor of their
 * dimension, and vector-valued results are stored back in the registry.
 */

import {
  BoundingRect, DimensionMismatchError, orient2d, threeDimensional, twoDimensional,
  type Tuple2, type Tuple3, type Tuple4, type VectorNExtensions,
} from '@vecn/core';
import * as registry from './registry.js';
import { v2, v3, v4, type StoredVector, type VectorResult } from './registry.js';

const p2 = twoDimensional(v2);
const p3 = threeDimensional(v3);

/** Same-dimension operation on two stored vectors. */
type BinaryOp<R> = <V>(kind: VectorNExtensions<V, number>, a: V, b: V) => R;

function binary<R>(a: StoredVector, b: StoredVector, op: BinaryOp<R>, context: string): R {
  if (a.dimensions === 2 && b.dimensions === 2) return op(v2, a.components, b.components);
  if (a.dimensions === 3 && b.dimensions === 3) return op(v3, a.components, b.components);
  if (a.dimensions === 4 && b.dimensions === 4) return op(v4, a.components, b.components);
  throw new DimensionMismatchError(a.dimensions, b.dimensions, context);
}

type UnaryOp<R> = <V>(kind: VectorNExtensions<V, number>, v: V) => R;

function unary<R>(v: StoredVector, op: UnaryOp<R>): R {
  switch (v.dimensions) {
    case 2: return op(v2, v.components);
    case 3: return op(v3, v.components);
    case 4: return op(v4, v.components);
  }
}

function storeBinary(
  aId: string,
  bId: string,
  context: string,
  f: <V>(kind: VectorNExtensions<V, number>, a: V, b: V) => V,
  name?: string,
): VectorResult {
  const a = registry.get(aId).vector;
  const b = registry.get(bId).vector;
  const components = binary<number[]>(a, b, (kind, x, y) => kind.components(f(kind, x, y)), context);
  return registry.create(components, name);
}

function storeUnary(
  id: string,
  f: <V>(kind: VectorNExtensions<V, number>, v: V) => V,
  name?: string,
): VectorResult {
  const v = registry.get(id).vector;
  return registry.create(unary<number[]>(v, (kind, x) => kind.components(f(kind, x))), name);
}

export function add(aId: string, bId: string, name?: string): VectorResult {
  return storeBinary(aId, bId, 'vector_add', (kind, a, b) => kind.add(a, b), name);
}

export function sub(aId: string, bId: string, name?: string): VectorResult {
  return storeBinary(aId, bId, 'vector_sub', (kind, a, b) => kind.sub(a, b), name);
}

export function min(aId: string, bId: string, name?: string): VectorResult {
  return storeBinary(aId, bId, 'vector_min', (kind, a, b) => kind.minVec(a, b), name);
}

export function max(aId: string, bId: string, name?: string): VectorResult {
  return storeBinary(aId, bId, 'vector_max', (kind, a, b) => kind.maxVec(a, b), name);
}

export function scale(id: string, factor: number, name?: string): VectorResult {
  return storeUnary(id, (kind, v) => kind.mul(v, factor), name);
}

export function divide(id: string, divisor: number, name?: string): VectorResult {
  if (divisor === 0) {
    throw new Error(`Cannot divide vector "${id}" by zero.`);
  }
  return storeUnary(id, (kind, v) => kind.div(v, divisor), name);
}

/** JSON has no Infinity or NaN; refuse a result that would serialize as null. */
function finite(value: number, what: string): number {
  if (!Number.isFinite(value)) {
    throw new Error(`${what} is not finite (${value}); the components are too large.`);
  }
  return value;
}

export function dot(aId: string, bId: string): number {
  const a = registry.get(aId).vector;
  const b = registry.get(bId).vector;
  return finite(binary<number>(a, b, (kind, x, y) => kind.dot(x, y), 'vector_dot'), `Dot product of "${aId}" and "${bId}"`);
}

export function length2(id: string): number {
  return finite(unary<number>(registry.get(id).vector, (kind, v) => kind.length2(v)), `Squared length of "${id}"`);
}

export function cross(aId: string, bId: string, name?: string): VectorResult {
  const a = registry.get(aId).vector;
  const b = registry.get(bId).vector;
  if (a.dimensions !== 3) throw new DimensionMismatchError(3, a.dimensions, `vector_cross "${aId}"`);
  if (b.dimensions !== 3) throw new DimensionMismatchError(3, b.dimensions, `vector_cross "${bId}"`);
  return registry.create(p3.cross(a.components, b.components), name);
}

export type Orientation = 'counter_clockwise' | 'clockwise' | 'collinear';

export function orientation(aId: string, bId: string, cId: string): { value: number; orientation: Orientation } {
  const points = [aId, bId, cId].map((id) => {
    const v = registry.get(id).vector;
    if (v.dimensions !== 2) throw new DimensionMismatchError(2, v.dimensions, `orient2d "${id}"`);
    return v.components;
  });
  const value = finite(orient2d(p2, points[0], points[1], points[2]), `Orientation of "${aId}", "${bId}", "${cId}"`);
  const result: Orientation = value > 0 ? 'counter_clockwise' : value < 0 ? 'clockwise' : 'collinear';
  return { value, orientation: result };
}

export interface BoundsResult {
  dimensions: 2 | 3 | 4;
  lower: number[];
  upper: number[];
  size: number[];
  area: number;
}

export function bounds(ids: readonly string[]): BoundsResult {
  if (ids.length === 0) {
    throw new Error('bounding_rect requires at least one vector ID');
  }
  const boundsOf = <V>(kind: VectorNExtensions<V, number>, points: V[]): Omit<BoundsResult, 'dimensions'> => {
    const rect = BoundingRect.fromPoints(kind, points);
    return {
      lower: kind.components(rect.lower()),
      upper: kind.components(rect.upper()),
      size: kind.components(rect.size()),
      area: rect.area(),
    };
  };

  const twos: Tuple2<number>[] = [];
  const threes: Tuple3<number>[] = [];
  const fours: Tuple4<number>[] = [];
  const first = registry.get(ids[0]).vector;
  for (const id of ids) {
    const v = registry.get(id).vector;
    if (v.dimensions !== first.dimensions) {
      throw new DimensionMismatchError(first.dimensions, v.dimensions, `bounding_rect "${id}"`);
    }
    switch (v.dimensions) {
      case 2: twos.push(v.components); break;
      case 3: threes.push(v.components); break;
      case 4: fours.push(v.components); break;
    }
  }

  switch (first.dimensions) {
    case 2: return { dimensions: 2, ...boundsOf(v2, twos) };
    case 3: return { dimensions: 3, ...boundsOf(v3, threes) };
    case 4: return { dimensions: 4, ...boundsOf(v4, fours) };
  }
}
