import { describe, it, expect, beforeEach } from 'vitest';
import { DimensionMismatchError } from '@vecn/core';
import * as registry from '../src/registry.js';
import * as ops from '../src/operations.js';

beforeEach(() => {
  registry.clear();
  registry.create([1, 2, 3], 'a');
  registry.create([4, 5, 6], 'b');
  registry.create([1, 0], 'p');
  registry.create([0, 1], 'q');
  registry.create([1, 1, 1, 1], 'w');
});

describe('Arithmetic tools', () => {
  it('adds and stores the result', () => {
    const result = ops.add('a', 'b', 'sum');
    expect(result).toEqual({ vector_id: 'sum', dimensions: 3, components: [5, 7, 9], length2: 155 });
    expect(registry.has('sum')).toBe(true);
  });

  it('subtracts', () => {
    expect(ops.sub('b', 'a').components).toEqual([3, 3, 3]);
  });

  it('takes component-wise min and max', () => {
    registry.create([3, 0, 9], 'c');
    registry.create([1, 5, 2], 'd');
    expect(ops.min('d', 'c').components).toEqual([1, 0, 2]);
    expect(ops.max('d', 'c').components).toEqual([3, 5, 9]);
  });

  it('scales and divides', () => {
    expect(ops.scale('a', 2).components).toEqual([2, 4, 6]);
    registry.create([2, 4, 6], 'even');
    expect(ops.divide('even', 2).components).toEqual([1, 2, 3]);
  });

  it('refuses to divide by zero', () => {
    expect(() => ops.divide('a', 0)).toThrow('Cannot divide vector "a" by zero.');
  });

  it('works on 4D vectors', () => {
    expect(ops.add('w', 'w').components).toEqual([2, 2, 2, 2]);
    expect(ops.dot('w', 'w')).toBe(4);
  });

  it('rejects operands of different dimension', () => {
    expect(() => ops.add('a', 'p')).toThrow(DimensionMismatchError);
    expect(() => ops.dot('p', 'a')).toThrow('vector_dot: expected 2 dimensions, got 3');
  });
});

describe('Products and measures', () => {
  it('computes dot and squared length', () => {
    expect(ops.dot('a', 'b')).toBe(32);
    expect(ops.length2('a')).toBe(14);
  });

  it('refuses products that overflow', () => {
    registry.create([1e200, 1e200], 'huge');
    expect(() => ops.dot('huge', 'huge')).toThrow(
      'Dot product of "huge" and "huge" is not finite (Infinity); the components are too large.'
    );
    expect(() => ops.length2('huge')).toThrow(
      'Squared length of "huge" is not finite (Infinity); the components are too large.'
    );
  });

  it('computes a cross product of 3D vectors', () => {
    registry.create([1, 0, 0], 'x');
    registry.create([0, 1, 0], 'y');
    expect(ops.cross('x', 'y', 'z').components).toEqual([0, 0, 1]);
  });

  it('refuses a cross product outside 3D', () => {
    expect(() => ops.cross('a', 'p')).toThrow('vector_cross "p": expected 3 dimensions, got 2');
  });
});

describe('Geometry tools', () => {
  it('bounds a point set', () => {
    registry.create([-1, 4], 'r');
    expect(ops.bounds(['p', 'q', 'r'])).toEqual({
      dimensions: 2,
      lower: [-1, 0],
      upper: [1, 4],
      size: [2, 4],
      area: 8,
    });
  });

  it('bounds 3D points', () => {
    expect(ops.bounds(['a', 'b'])).toEqual({
      dimensions: 3,
      lower: [1, 2, 3],
      upper: [4, 5, 6],
      size: [3, 3, 3],
      area: 27,
    });
  });

  it('refuses mixed dimensions or an empty list', () => {
    expect(() => ops.bounds(['p', 'a'])).toThrow('bounding_rect "a": expected 2 dimensions, got 3');
    expect(() => ops.bounds([])).toThrow('bounding_rect requires at least one vector ID');
  });

  it('classifies orientation of 2D points', () => {
    registry.create([0, 0], 'o');
    expect(ops.orientation('o', 'p', 'q')).toEqual({ value: 1, orientation: 'counter_clockwise' });
    expect(ops.orientation('o', 'q', 'p')).toEqual({ value: -1, orientation: 'clockwise' });
    registry.create([2, 0], 'p2');
    expect(ops.orientation('o', 'p', 'p2')).toEqual({ value: 0, orientation: 'collinear' });
  });

  it('refuses orientation of 3D points', () => {
    expect(() => ops.orientation('p', 'q', 'a')).toThrow('orient2d "a": expected 2 dimensions, got 3');
  });
});
