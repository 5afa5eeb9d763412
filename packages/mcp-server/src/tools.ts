/**
 * MCP Tool Registrations — 15 tools wrapping the vecn core.
 *
 * Every vector-valued tool returns JSON with { vector_id, dimensions,
 * components, length2 } so the LLM always knows the current state.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import * as registry from './registry.js';
import * as ops from './operations.js';

const components = z.array(z.number().finite()).min(2).max(4)
  .describe('Vector components, 2 to 4 numbers, e.g. [1, 2, 3]');
const vectorId = (what: string) => z.string().describe(`ID of the ${what}`);
const resultName = z.string().optional()
  .describe('Optional name for the resulting vector (letters, digits, hyphens, underscores only)');

function json(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}

export function registerTools(server: McpServer): void {

  // ─── Registry (4) ───────────────────────────────────────────

  server.tool(
    'create_vector',
    'Store a 2D, 3D or 4D vector. Dimension is the number of components.',
    {
      components,
      name: resultName,
    },
    async ({ components, name }) => json(registry.create(components, name))
  );

  server.tool(
    'get_vector',
    'Read back a stored vector.',
    { vector: vectorId('vector') },
    async ({ vector }) => json(registry.describe(vector))
  );

  server.tool(
    'list_vectors',
    'List all stored vectors with their readbacks.',
    {},
    async () => json({ vectors: registry.list() })
  );

  server.tool(
    'delete_vector',
    'Delete a stored vector.',
    { vector: vectorId('vector to delete') },
    async ({ vector }) => {
      registry.remove(vector);
      return json({ deleted: vector, remaining: registry.list().map((v) => v.vector_id) });
    }
  );

  // ─── Component-wise arithmetic (6) ──────────────────────────

  server.tool(
    'vector_add',
    'Component-wise a + b. Both vectors must have the same dimension.',
    { a: vectorId('left operand'), b: vectorId('right operand'), name: resultName },
    async ({ a, b, name }) => json(ops.add(a, b, name))
  );

  server.tool(
    'vector_sub',
    'Component-wise a - b. Both vectors must have the same dimension.',
    { a: vectorId('left operand'), b: vectorId('right operand'), name: resultName },
    async ({ a, b, name }) => json(ops.sub(a, b, name))
  );

  server.tool(
    'vector_scale',
    'Multiply every component by a scalar.',
    { vector: vectorId('vector'), factor: z.number().finite().describe('Scalar factor'), name: resultName },
    async ({ vector, factor, name }) => json(ops.scale(vector, factor, name))
  );

  server.tool(
    'vector_divide',
    'Divide every component by a non-zero scalar.',
    { vector: vectorId('vector'), divisor: z.number().finite().describe('Non-zero divisor'), name: resultName },
    async ({ vector, divisor, name }) => json(ops.divide(vector, divisor, name))
  );

  server.tool(
    'vector_min',
    'Component-wise minimum of two vectors of the same dimension.',
    { a: vectorId('first vector'), b: vectorId('second vector'), name: resultName },
    async ({ a, b, name }) => json(ops.min(a, b, name))
  );

  server.tool(
    'vector_max',
    'Component-wise maximum of two vectors of the same dimension.',
    { a: vectorId('first vector'), b: vectorId('second vector'), name: resultName },
    async ({ a, b, name }) => json(ops.max(a, b, name))
  );

  // ─── Products and measures (3) ──────────────────────────────

  server.tool(
    'vector_dot',
    'Dot product of two vectors of the same dimension.',
    { a: vectorId('first vector'), b: vectorId('second vector') },
    async ({ a, b }) => json({ a, b, dot: ops.dot(a, b) })
  );

  server.tool(
    'vector_length2',
    'Squared Euclidean length (no square root, exact for integer components).',
    { vector: vectorId('vector') },
    async ({ vector }) => json({ vector, length2: ops.length2(vector) })
  );

  server.tool(
    'vector_cross',
    'Right-handed cross product a × b. Both vectors must be 3D.',
    { a: vectorId('left 3D operand'), b: vectorId('right 3D operand'), name: resultName },
    async ({ a, b, name }) => json(ops.cross(a, b, name))
  );

  // ─── Geometry (2) ───────────────────────────────────────────

  server.tool(
    'bounding_rect',
    'Axis-aligned bounding box of one or more vectors of the same dimension.',
    { vectors: z.array(z.string()).min(1).describe('IDs of the points to enclose') },
    async ({ vectors }) => json(ops.bounds(vectors))
  );

  server.tool(
    'orient2d',
    'Orientation of three 2D points: positive value = counter-clockwise turn a → b → c.',
    { a: vectorId('first 2D point'), b: vectorId('second 2D point'), c: vectorId('third 2D point') },
    async ({ a, b, c }) => json(ops.orientation(a, b, c))
  );
}
