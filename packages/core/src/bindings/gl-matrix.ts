/**
 * gl-matrix vectors as VectorN descriptors.
 *
 * gl-matrix stores components in a Float32Array by default, so every value
 * written through these descriptors is rounded to single precision.
 */

import { vec2, vec3, vec4 } from 'gl-matrix';
import { threeDimensional, twoDimensional } from '../dimensions.js';
import { numberScalar } from '../scalar.js';
import { checkIndex, type VectorN } from '../vector.js';

interface GlVectorModule<V> {
  clone(a: V): V;
  exactEquals(a: V, b: V): boolean;
  str(a: V): string;
}

function glKind<V extends { [index: number]: number }, D extends 2 | 3 | 4>(
  dimensions: D,
  mod: GlVectorModule<V>,
  fromValue: (value: number) => V,
): VectorN<V, number, D> {
  return {
    dimensions,
    scalar: numberScalar,
    fromValue,
    nth(v, index) {
      checkIndex(dimensions, index);
      return v[index];
    },
    setNth(v, index, value) {
      checkIndex(dimensions, index);
      const components: { [index: number]: number } = v;
      components[index] = value;
    },
    clone: (v) => mod.clone(v),
    equals: (a, b) => mod.exactEquals(a, b),
    debug: (v) => mod.str(v),
  };
}

export const glVec2: VectorN<vec2, number, 2> = glKind<vec2, 2>(2, vec2, (x) => vec2.fromValues(x, x));
export const glVec3: VectorN<vec3, number, 3> = glKind<vec3, 3>(3, vec3, (x) => vec3.fromValues(x, x, x));
export const glVec4: VectorN<vec4, number, 4> = glKind<vec4, 4>(4, vec4, (x) => vec4.fromValues(x, x, x, x));

export const glVec2D = twoDimensional(glVec2);
export const glVec3D = threeDimensional(glVec3);
