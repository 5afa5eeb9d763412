/**
 * three.js vectors as VectorN descriptors.
 *
 * `getComponent`/`setComponent` throw a plain Error on a bad index; the
 * shared check runs first so every binding reports ComponentIndexError.
 */

import { Vector2, Vector3, Vector4 } from 'three';
import { threeDimensional, twoDimensional } from '../dimensions.js';
import { numberScalar } from '../scalar.js';
import { checkIndex, type VectorN } from '../vector.js';

/** Common surface of three's Vector2/3/4. */
interface ThreeVector<V> {
  getComponent(index: number): number;
  setComponent(index: number, value: number): unknown;
  setScalar(value: number): unknown;
  equals(v: V): boolean;
  clone(): V;
}

function threeKind<V extends ThreeVector<V>, D extends 2 | 3 | 4>(
  dimensions: D,
  label: string,
  create: () => V,
): VectorN<V, number, D> {
  return {
    dimensions,
    scalar: numberScalar,
    fromValue(value) {
      const v = create();
      v.setScalar(value);
      return v;
    },
    nth(v, index) {
      checkIndex(dimensions, index);
      return v.getComponent(index);
    },
    setNth(v, index, value) {
      checkIndex(dimensions, index);
      v.setComponent(index, value);
    },
    clone: (v) => v.clone(),
    equals: (a, b) => a.equals(b),
    debug(v) {
      const parts: number[] = [];
      for (let i = 0; i < dimensions; i++) parts.push(v.getComponent(i));
      return `${label}(${parts.join(', ')})`;
    },
  };
}

export const threeVector2: VectorN<Vector2, number, 2> = threeKind(2, 'Vector2', () => new Vector2());
export const threeVector3: VectorN<Vector3, number, 3> = threeKind(3, 'Vector3', () => new Vector3());
export const threeVector4: VectorN<Vector4, number, 4> = threeKind(4, 'Vector4', () => new Vector4());

export const threeVector2D = twoDimensional(threeVector2);
export const threeVector3D = threeDimensional(threeVector3);
