/**
 * Policy Store
 *
 * Loads a versioned policy pack, its district/county overlay files and the
 * county centroid table. Everything returned is frozen; callers pass the
 * store explicitly into the resolver.
 *
 * A malformed pack or overlay is a deployment error and aborts loading with
 * PolicyPackError. Per-well problems never surface here.
 */

import fs from 'node:fs';
import path from 'node:path';
import { parseDocument } from 'yaml';
import { ZodError } from 'zod';
import {
  countyCentroidTableSchema,
  policyPackSchema,
  policyTreeSchema,
  type CountyCentroid,
  type PolicyPack,
  type PolicyTree,
} from '@shared/schema';
import type { PolicySourceConfig } from '../config/engineConfig';
import { createLogger } from '../lib/logger';
import { buildCentroidIndex, type CentroidIndex } from './geoDistance';

const log = createLogger({ module: 'policy-store' });

export interface PolicyStore {
  readonly pack: PolicyPack;
  /** Overlay trees keyed by lower-cased file stem, e.g. "08a__auto", "08a__andrews". */
  readonly overlays: ReadonlyMap<string, PolicyTree>;
  readonly centroids: CentroidIndex;
  readonly source: string;
}

export class PolicyPackError extends Error {
  readonly code = 'POLICY_PACK_INVALID';

  constructor(
    message: string,
    readonly file: string,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = 'PolicyPackError';
  }
}

// ============================================
// PARSING
// ============================================

/**
 * Parse one YAML policy document into a tree. An empty document is `{}`.
 */
export function parsePolicyYaml(text: string, file: string): PolicyTree {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new PolicyPackError(
      `Malformed policy YAML in ${file}`,
      file,
      doc.errors.map((e) => e.message)
    );
  }

  const raw: unknown = doc.toJS() ?? {};
  const result = policyTreeSchema.safeParse(raw);
  if (!result.success) {
    throw new PolicyPackError(
      `Policy document ${file} must be a mapping of plain values`,
      file,
      describeZodError(result.error)
    );
  }
  return result.data;
}

function describeZodError(error: ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.') || '<root>'}: ${e.message}`);
}

export function parsePolicyPack(tree: PolicyTree, file: string): PolicyPack {
  const result = policyPackSchema.safeParse(tree);
  if (!result.success) {
    throw new PolicyPackError(`Invalid policy pack ${file}`, file, describeZodError(result.error));
  }
  return result.data;
}

function readText(file: string): string {
  try {
    return fs.readFileSync(file, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicyPackError(`Cannot read policy file ${file}`, file, [reason]);
  }
}

// ============================================
// STORE CONSTRUCTION
// ============================================

export interface PolicyStoreInput {
  pack: PolicyPack;
  overlays?: Record<string, PolicyTree>;
  centroids?: readonly CountyCentroid[];
  source?: string;
}

/**
 * Build a store from already-parsed inputs. Used by the loader and by tests
 * that exercise alternate policy sets.
 */
export function createPolicyStore(input: PolicyStoreInput): PolicyStore {
  const overlays = new Map<string, PolicyTree>();
  for (const [stem, tree] of Object.entries(input.overlays ?? {})) {
    overlays.set(stem.toLowerCase(), deepFreeze(tree));
  }

  return Object.freeze({
    pack: deepFreeze(input.pack),
    overlays,
    centroids: buildCentroidIndex(input.centroids ?? []),
    source: input.source ?? '<memory>',
  });
}

/**
 * Load the pack, every *.yml / *.yaml overlay in the overlay directory and the
 * centroid table from disk.
 */
export function loadPolicyStore(config: PolicySourceConfig): PolicyStore {
  const startTime = Date.now();
  const pack = parsePolicyPack(parsePolicyYaml(readText(config.packPath), config.packPath), config.packPath);

  const overlays: Record<string, PolicyTree> = {};
  if (fs.existsSync(config.overlayDir)) {
    const files = fs
      .readdirSync(config.overlayDir)
      .filter((name) => /\.ya?ml$/i.test(name))
      .sort();
    for (const name of files) {
      const file = path.join(config.overlayDir, name);
      overlays[name.replace(/\.ya?ml$/i, '')] = parsePolicyYaml(readText(file), file);
    }
  } else {
    log.warn({ overlayDir: config.overlayDir }, 'Overlay directory not found; base pack only');
  }

  let centroids: CountyCentroid[] = [];
  if (fs.existsSync(config.centroidsPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readText(config.centroidsPath));
    } catch (error) {
      if (error instanceof PolicyPackError) throw error;
      throw new PolicyPackError('Malformed county centroid table', config.centroidsPath, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
    const parsed = countyCentroidTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PolicyPackError(
        'Invalid county centroid table',
        config.centroidsPath,
        describeZodError(parsed.error)
      );
    }
    centroids = parsed.data;
  } else {
    log.warn({ centroidsPath: config.centroidsPath }, 'Centroid table not found; geospatial field fallback disabled');
  }

  const store = createPolicyStore({ pack, overlays, centroids, source: config.packPath });
  log.info(
    {
      policyId: pack.policy_id,
      policyVersion: pack.policy_version,
      overlays: store.overlays.size,
      centroids: centroids.length,
      durationMs: Date.now() - startTime,
    },
    'Policy store loaded'
  );
  return store;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ============================================
// PROCESS-LIFETIME CACHE
// ============================================

const storeCache = new Map<string, PolicyStore>();

function cacheKey(config: PolicySourceConfig): string {
  return [config.packPath, config.overlayDir, config.centroidsPath].join('|');
}

/**
 * Return the cached store for a configuration, loading it on first use.
 */
export function getPolicyStore(config: PolicySourceConfig): PolicyStore {
  const key = cacheKey(config);
  const cached = storeCache.get(key);
  if (cached) {
    return cached;
  }
  const store = loadPolicyStore(config);
  storeCache.set(key, store);
  return store;
}

export interface ReloadResult {
  store: PolicyStore;
  reloaded: boolean;
  previousVersion: string | null;
}

/**
 * Re-read the pack and swap the cached store only when its policy_version
 * changed. A malformed pack leaves the cached store in place and throws.
 */
export function reloadPolicyStore(config: PolicySourceConfig): ReloadResult {
  const key = cacheKey(config);
  const cached = storeCache.get(key) ?? null;
  const fresh = loadPolicyStore(config);

  if (cached && cached.pack.policy_version === fresh.pack.policy_version) {
    return { store: cached, reloaded: false, previousVersion: cached.pack.policy_version };
  }

  storeCache.set(key, fresh);
  return { store: fresh, reloaded: true, previousVersion: cached?.pack.policy_version ?? null };
}

export function clearPolicyStoreCache(): void {
  storeCache.clear();
}
