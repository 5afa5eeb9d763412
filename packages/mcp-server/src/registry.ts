/**
 * Vector Registry — in-memory named vector store.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the LLM always knows the current state.
 */

import {
  extend, tuple2, tuple3, tuple4, numberScalar,
  type Tuple2, type Tuple3, type Tuple4,
} from '@vecn/core';
import { DEFAULT_MAX_VECTORS, type ServerConfig } from './config.js';

export type StoredVector =
  | { dimensions: 2; components: Tuple2<number> }
  | { dimensions: 3; components: Tuple3<number> }
  | { dimensions: 4; components: Tuple4<number> };

export interface VectorEntry {
  id: string;
  vector: StoredVector;
}

export interface VectorResult {
  vector_id: string;
  dimensions: 2 | 3 | 4;
  components: number[];
  length2: number;
}

export const v2 = extend(tuple2(numberScalar));
export const v3 = extend(tuple3(numberScalar));
export const v4 = extend(tuple4(numberScalar));

/** Validate a component list and tag it with its dimension. */
export function toStored(components: readonly number[]): StoredVector {
  for (const c of components) {
    if (!Number.isFinite(c)) {
      throw new Error(`Vector components must be finite numbers, got ${c}`);
    }
  }
  switch (components.length) {
    case 2: return { dimensions: 2, components: [components[0], components[1]] };
    case 3: return { dimensions: 3, components: [components[0], components[1], components[2]] };
    case 4: return { dimensions: 4, components: [components[0], components[1], components[2], components[3]] };
    default:
      throw new Error(`Vectors must have 2, 3 or 4 components, got ${components.length}`);
  }
}

function length2Of(vector: StoredVector): number {
  switch (vector.dimensions) {
    case 2: return v2.length2(vector.components);
    case 3: return v3.length2(vector.components);
    case 4: return v4.length2(vector.components);
  }
}

function readback(entry: VectorEntry): VectorResult {
  return {
    vector_id: entry.id,
    dimensions: entry.vector.dimensions,
    components: [...entry.vector.components],
    length2: length2Of(entry.vector),
  };
}

let nextId = 1;
let maxVectors = DEFAULT_MAX_VECTORS;

const vectors = new Map<string, VectorEntry>();

export function configure(config: ServerConfig): void {
  maxVectors = config.maxVectors;
}

/** Store a vector and return its ID + readback. */
export function create(components: readonly number[], name?: string): VectorResult {
  if (name !== undefined && !/^[a-zA-Z0-9_-]+$/.test(name)) {
    throw new Error(
      `Invalid vector name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  const vector = toStored(components);
  // Overwriting a named vector never grows the store; anything else must fit
  // before an auto ID is consumed.
  const replaces = name !== undefined && vectors.has(name);
  if (!replaces && vectors.size >= maxVectors) {
    throw new Error(
      `Vector registry is full (${maxVectors} vectors). Delete vectors or raise VECN_MAX_VECTORS.`
    );
  }
  const id = name ?? `vec_${nextId++}`;
  if (vectors.has(id) && !name) {
    // Auto-generated collision — bump
    return create(components);
  }
  const entry = { id, vector };
  vectors.set(id, entry);
  return readback(entry);
}

/** Retrieve a vector or throw a clear error. */
export function get(id: string): VectorEntry {
  const entry = vectors.get(id);
  if (!entry) {
    const available = [...vectors.keys()];
    throw new Error(
      `Vector "${id}" not found. Available vectors: [${available.join(', ')}]`
    );
  }
  return entry;
}

/** Readback for a stored vector. */
export function describe(id: string): VectorResult {
  return readback(get(id));
}

export function remove(id: string): void {
  if (!vectors.has(id)) {
    throw new Error(`Vector "${id}" not found — cannot delete.`);
  }
  vectors.delete(id);
}

export function has(id: string): boolean {
  return vectors.has(id);
}

export function list(): VectorResult[] {
  return [...vectors.values()].map(readback);
}

/** Clear all vectors and reset ID counter (for testing). */
export function clear(): void {
  vectors.clear();
  nextId = 1;
  maxVectors = DEFAULT_MAX_VECTORS;
}
