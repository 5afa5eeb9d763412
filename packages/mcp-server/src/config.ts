/**
 * Server configuration from environment variables.
 *
 *   VECN_MAX_VECTORS — capacity of the vector registry (positive integer, default 1000)
 *
 * Invalid values fall back to the default instead of aborting startup.
 */

import { z } from 'zod';

export const DEFAULT_MAX_VECTORS = 1000;

export interface ServerConfig {
  maxVectors: number;
}

const EnvSchema = z.object({
  VECN_MAX_VECTORS: z.coerce.number().int().positive().catch(DEFAULT_MAX_VECTORS),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = EnvSchema.parse(env);
  return { maxVectors: parsed.VECN_MAX_VECTORS };
}
