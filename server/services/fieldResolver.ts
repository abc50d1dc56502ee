/**
 * Field Resolution
 *
 * Matches a requested field name against overlay field blocks, in order:
 * 1. exact/fuzzy match inside the requested county
 * 2. nearest other county with an exact field key
 * 3. nearest other county that mentions the field anywhere in its config
 *
 * Distances are great-circle between county centroids.
 */

import { isPolicyTree, type FieldResolution, type PolicyTree } from '@shared/schema';
import { walkPolicyTree } from './policyMerge';
import { haversineKm, lookupCentroid, normalizeCountyName, type CentroidIndex } from './geoDistance';

// ============================================
// NAME NORMALIZATION
// ============================================

const DASH_VARIANTS = /[\u2010-\u2015\u2212\uFE58\uFE63\uFF0D]/g;

/**
 * Lowercase, strip parentheticals, unify dashes, collapse whitespace.
 * "Spraberry (Trend Area)" -> "spraberry"
 */
export function normalizeFieldName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\([^)]*\)/g, ' ')
    .replace(DASH_VARIANTS, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Letters and digits only. */
export function fieldSkeleton(name: string): string {
  return normalizeFieldName(name).replace(/[^a-z0-9]/g, '');
}

export function fieldNamesEqual(a: string, b: string): boolean {
  const na = normalizeFieldName(a);
  return na.length > 0 && na === normalizeFieldName(b);
}

/**
 * Equality, bidirectional substring, or skeleton equality.
 */
export function fieldNamesMatch(requested: string, candidate: string): boolean {
  const a = normalizeFieldName(requested);
  const b = normalizeFieldName(candidate);
  if (!a || !b) return false;
  if (a === b || a.includes(b) || b.includes(a)) return true;
  const sa = fieldSkeleton(requested);
  return sa.length > 0 && sa === fieldSkeleton(candidate);
}

export interface FieldMatch {
  key: string;
  block: PolicyTree;
}

/**
 * Find a field block in a `fields` map. Exact normalized equality wins over
 * substring, which wins over skeleton equality. Keys are visited in sorted
 * order so the result does not depend on YAML key order.
 */
export function findFieldBlock(
  fields: PolicyTree,
  requested: string,
  mode: 'exact' | 'fuzzy' = 'fuzzy'
): FieldMatch | null {
  const keys = Object.keys(fields).sort();
  const entry = (key: string): FieldMatch => {
    const value = fields[key];
    return { key, block: isPolicyTree(value) ? value : {} };
  };

  const exact = keys.find((key) => fieldNamesEqual(requested, key));
  if (exact !== undefined) return entry(exact);
  if (mode === 'exact') return null;

  const target = normalizeFieldName(requested);
  const substring = keys.find((key) => {
    const candidate = normalizeFieldName(key);
    return candidate.length > 0 && target.length > 0 && (candidate.includes(target) || target.includes(candidate));
  });
  if (substring !== undefined) return entry(substring);

  const skeleton = keys.find((key) => fieldNamesMatch(requested, key));
  return skeleton !== undefined ? entry(skeleton) : null;
}

/**
 * True when the field name appears in any key or string value of the tree.
 */
export function treeMentionsField(tree: PolicyTree, requested: string): boolean {
  const target = normalizeFieldName(requested);
  if (!target) return false;
  return walkPolicyTree(tree, ({ key, value }) => {
    if (key !== null && normalizeFieldName(key).includes(target)) return true;
    return typeof value === 'string' && normalizeFieldName(value).includes(target);
  });
}

// ============================================
// RESOLUTION
// ============================================

export interface CountyCandidate {
  name: string;
  /** County overlay without its `fields` map. */
  config: PolicyTree;
  fields: PolicyTree;
}

export interface FieldResolutionInput {
  field: string;
  county: CountyCandidate | null;
  /** Every county known for the district, the requested one included. */
  districtCounties: readonly CountyCandidate[];
  centroids: CentroidIndex;
}

export interface FieldResolutionResult {
  resolution: FieldResolution;
  /** Layer to merge over the county-level policy, if any. */
  layer: PolicyTree | null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

interface RankedCounty {
  candidate: CountyCandidate;
  distanceKm: number;
}

function rankByDistance(input: FieldResolutionInput, requestedCounty: string): RankedCounty[] {
  const origin = lookupCentroid(input.centroids, requestedCounty);
  if (!origin) return [];

  const self = normalizeCountyName(requestedCounty);
  const ranked: RankedCounty[] = [];
  for (const candidate of input.districtCounties) {
    if (normalizeCountyName(candidate.name) === self) continue;
    const point = lookupCentroid(input.centroids, candidate.name);
    if (!point) continue;
    ranked.push({ candidate, distanceKm: haversineKm(origin, point) });
  }

  return ranked.sort(
    (a, b) => a.distanceKm - b.distanceKm || a.candidate.name.localeCompare(b.candidate.name)
  );
}

/**
 * Resolve the field overlay for a request. `requestedCounty` is the raw
 * county name from the request even when no county overlay exists for it.
 */
export function resolveField(
  input: FieldResolutionInput,
  requestedCounty: string | null
): FieldResolutionResult {
  const none: FieldResolutionResult = {
    resolution: {
      method: 'none',
      requested_field: input.field,
      matched_field: null,
      matched_in_county: null,
      nearest_distance_km: null,
    },
    layer: null,
  };

  if (input.county) {
    const match = findFieldBlock(input.county.fields, input.field, 'fuzzy');
    if (match) {
      return {
        resolution: {
          method: 'exact_in_county',
          requested_field: input.field,
          matched_field: match.key,
          matched_in_county: input.county.name,
          nearest_distance_km: null,
        },
        layer: match.block,
      };
    }
  }

  if (!requestedCounty) return none;
  const ranked = rankByDistance(input, requestedCounty);

  for (const { candidate, distanceKm } of ranked) {
    const match = findFieldBlock(candidate.fields, input.field, 'exact');
    if (match) {
      return {
        resolution: {
          method: 'nearest_county',
          requested_field: input.field,
          matched_field: match.key,
          matched_in_county: candidate.name,
          nearest_distance_km: round2(distanceKm),
        },
        layer: match.block,
      };
    }
  }

  for (const { candidate, distanceKm } of ranked) {
    const mentioned =
      treeMentionsField(candidate.fields, input.field) || treeMentionsField(candidate.config, input.field);
    if (!mentioned) continue;

    const match = findFieldBlock(candidate.fields, input.field, 'fuzzy');
    return {
      resolution: {
        method: 'nearest_county_occurrence',
        requested_field: input.field,
        matched_field: match?.key ?? null,
        matched_in_county: candidate.name,
        nearest_distance_km: round2(distanceKm),
      },
      layer: match ? match.block : candidate.config,
    };
  }

  return none;
}
