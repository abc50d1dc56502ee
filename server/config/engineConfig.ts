/**
 * Engine Configuration
 *
 * Reads process environment once and exposes a typed configuration object.
 * Paths default to the policy packs bundled under server/policy.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const policyRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../policy');

export const DEFAULT_PACK_PATH = path.join(policyRoot, 'packs/tx/w3a/base.yaml');
export const DEFAULT_OVERLAY_DIR = path.join(policyRoot, 'packs/tx/w3a/district_overlays');
export const DEFAULT_CENTROIDS_PATH = path.join(policyRoot, 'county_centroids.json');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  POLICY_PACK_PATH: z.string().min(1).default(DEFAULT_PACK_PATH),
  POLICY_OVERLAY_DIR: z.string().min(1).default(DEFAULT_OVERLAY_DIR),
  COUNTY_CENTROIDS_PATH: z.string().min(1).default(DEFAULT_CENTROIDS_PATH),
  MERGE_ADJACENT_PLUGS: booleanFlag.optional(),
  MERGE_THRESHOLD_FT: z.coerce.number().nonnegative().optional(),
});

export interface PolicySourceConfig {
  packPath: string;
  overlayDir: string;
  centroidsPath: string;
}

export interface EngineConfig {
  port: number;
  logLevel?: string;
  policy: PolicySourceConfig;
  /** Unset defers to the pack's `preferences.merge_adjacent_plugs`. */
  mergeAdjacentPlugs?: boolean;
  mergeThresholdFt?: number;
}

/**
 * Parse engine configuration from an environment map.
 * Throws a ZodError when a variable is present but malformed.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    policy: {
      packPath: parsed.POLICY_PACK_PATH,
      overlayDir: parsed.POLICY_OVERLAY_DIR,
      centroidsPath: parsed.COUNTY_CENTROIDS_PATH,
    },
    mergeAdjacentPlugs: parsed.MERGE_ADJACENT_PLUGS,
    mergeThresholdFt: parsed.MERGE_THRESHOLD_FT,
  };
}
