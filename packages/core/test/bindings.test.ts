import { describe, it, expect } from 'vitest';
import { Vector2, Vector3, Vector4 } from 'three';
import { vec3 } from 'gl-matrix';
import {
  extend, tuple2, tuple3, tuple4, numberScalar, bigintScalar,
  threeVector2, threeVector3, threeVector4, threeVector3D,
  glVec2, glVec3, glVec4, glVec3D,
  ComponentIndexError, checkIndex,
  type VectorN, type Tuple3,
} from '../src/index.js';

describe('checkIndex', () => {
  it('accepts 0..dimensions-1', () => {
    expect(() => checkIndex(3, 0)).not.toThrow();
    expect(() => checkIndex(3, 2)).not.toThrow();
  });

  it('rejects everything else', () => {
    expect(() => checkIndex(3, 3)).toThrow(ComponentIndexError);
    expect(() => checkIndex(3, -1)).toThrow(RangeError);
    expect(() => checkIndex(2, 0.5)).toThrow('Component index 0.5 is out of range for a 2-dimensional vector');
    expect(() => checkIndex(4, NaN)).toThrow(ComponentIndexError);
  });
});

/** Shared contract every descriptor must honour. */
function contract<V>(name: string, kind: VectorN<V, number>) {
  describe(`${name} contract`, () => {
    it('broadcasts fromValue to exactly `dimensions` components', () => {
      const v = kind.fromValue(3);
      for (let i = 0; i < kind.dimensions; i++) {
        expect(kind.nth(v, i)).toBe(3);
      }
      expect(() => kind.nth(v, kind.dimensions)).toThrow(ComponentIndexError);
    });

    it('writes a single component in place', () => {
      const v = kind.fromValue(0);
      kind.setNth(v, 1, 5);
      expect(kind.nth(v, 0)).toBe(0);
      expect(kind.nth(v, 1)).toBe(5);
    });

    it('fails fast on an out-of-range write', () => {
      const v = kind.fromValue(1);
      expect(() => kind.setNth(v, -1, 0)).toThrow(ComponentIndexError);
      expect(() => kind.setNth(v, kind.dimensions, 0)).toThrow(ComponentIndexError);
      expect(kind.equals(v, kind.fromValue(1))).toBe(true);
    });

    it('clones without sharing storage', () => {
      const v = kind.fromValue(2);
      const c = kind.clone(v);
      kind.setNth(c, 0, 9);
      expect(kind.nth(v, 0)).toBe(2);
      expect(kind.equals(v, c)).toBe(false);
    });

    it('supports the derived operations', () => {
      const ext = extend(kind);
      const a = ext.fromValue(2);
      const b = ext.fromValue(3);
      expect(ext.dot(a, b)).toBe(6 * kind.dimensions);
      expect(ext.equals(ext.add(a, b), ext.fromValue(5))).toBe(true);
      expect(ext.equals(ext.mul(a, 1.5), b)).toBe(true);
    });
  });
}

contract('tuple2', tuple2(numberScalar));
contract('tuple3', tuple3(numberScalar));
contract('tuple4', tuple4(numberScalar));
contract('three Vector2', threeVector2);
contract('three Vector3', threeVector3);
contract('three Vector4', threeVector4);
contract('gl-matrix vec2', glVec2);
contract('gl-matrix vec3', glVec3);
contract('gl-matrix vec4', glVec4);

describe('Tuple binding', () => {
  it('reports fixed dimensions', () => {
    expect(tuple2(numberScalar).dimensions).toBe(2);
    expect(tuple3(numberScalar).dimensions).toBe(3);
    expect(tuple4(numberScalar).dimensions).toBe(4);
  });

  it('works over bigint', () => {
    const b4 = extend(tuple4(bigintScalar));
    expect(b4.fromValue(5n)).toEqual([5n, 5n, 5n, 5n]);
    expect(b4.dot([1n, 2n, 3n, 4n], [1n, 1n, 1n, 1n])).toBe(10n);
  });

  it('compares component-wise', () => {
    const t = tuple3(numberScalar);
    expect(t.equals([1, 2, 3], [1, 2, 3])).toBe(true);
    expect(t.equals([1, 2, 3], [1, 2, 4])).toBe(false);
  });

  it('never treats NaN as equal', () => {
    const t = tuple3(numberScalar);
    const quotient = extend(t).div([1, -1, 0], 0);
    expect(t.equals(quotient, [Infinity, -Infinity, 42])).toBe(false);
    expect(t.equals(quotient, [Infinity, -Infinity, -42])).toBe(false);
    expect(t.equals(quotient, quotient)).toBe(false);
    expect(t.equals([Infinity, 0, 1], [Infinity, -0, 1])).toBe(true);
  });

  it('prints a debug representation', () => {
    expect(tuple3(numberScalar).debug([1, -2, 0.5])).toBe('[1, -2, 0.5]');
    expect(tuple2(bigintScalar).debug([1n, 2n])).toBe('[1, 2]');
  });

  it('fails fast on a bad read', () => {
    const t = tuple3(numberScalar);
    const v: Tuple3<number> = [1, 2, 3];
    expect(() => t.nth(v, 3)).toThrow('Component index 3 is out of range for a 3-dimensional vector');
  });
});

describe('three.js binding', () => {
  it('constructs native vectors', () => {
    expect(threeVector2.fromValue(1)).toBeInstanceOf(Vector2);
    expect(threeVector3.fromValue(1)).toBeInstanceOf(Vector3);
    expect(threeVector4.fromValue(1)).toBeInstanceOf(Vector4);
  });

  it('maps components to x, y, z, w', () => {
    const v = new Vector4(1, 2, 3, 4);
    expect([0, 1, 2, 3].map((i) => threeVector4.nth(v, i))).toEqual([1, 2, 3, 4]);
    threeVector4.setNth(v, 3, 9);
    expect(v.w).toBe(9);
  });

  it('computes a cross product on Vector3', () => {
    const c = threeVector3D.cross(new Vector3(1, 0, 0), new Vector3(0, 1, 0));
    expect(c.equals(new Vector3(0, 0, 1))).toBe(true);
  });

  it('prints a debug representation', () => {
    expect(threeVector3.debug(new Vector3(1, 2, 3))).toBe('Vector3(1, 2, 3)');
  });
});

describe('gl-matrix binding', () => {
  it('reads and writes typed-array storage', () => {
    const v = vec3.fromValues(1, 2, 3);
    expect(glVec3.nth(v, 2)).toBe(3);
    glVec3.setNth(v, 0, 7);
    expect(v[0]).toBe(7);
  });

  it('rounds to single precision', () => {
    const v = glVec3.fromValue(0.1);
    expect(glVec3.nth(v, 0)).toBe(Math.fround(0.1));
  });

  it('computes a cross product on vec3', () => {
    const c = glVec3D.cross(vec3.fromValues(0, 0, 1), vec3.fromValues(1, 0, 0));
    expect(vec3.exactEquals(c, vec3.fromValues(0, 1, 0))).toBe(true);
  });

  it('prints a debug representation', () => {
    expect(glVec3.debug(vec3.fromValues(1, 2, 3))).toBe('vec3(1, 2, 3)');
  });

  it('maps into a tuple of the same dimension', () => {
    const ext = extend(glVec3);
    expect(ext.mapTo(vec3.fromValues(1, 2, 3), tuple3(numberScalar), (x) => x * 2)).toEqual([2, 4, 6]);
  });
});
