/**
 * Effective Policy Resolution Service
 *
 * Resolves base pack + district + county + field overlays into the
 * well-specific Effective Policy. Each layer is a JSON-like patch applied by
 * deepMerge; nothing is typed until policyKnobs.ts materializes the result.
 *
 * Precedence order (lowest to highest):
 * 1. Base pack
 * 2. District: inline pack stub, then {district}__auto.yml
 * 3. County: {district}__{county}.yml, else inline county_overlays,
 *    else counties.{county} inside the district overlay
 * 4. Field: see fieldResolver.ts
 *
 * IMPORTANT:
 * - This service never performs I/O; the store is loaded up front
 * - The result is computed per request and never cached here
 * - Incompleteness is reported, never thrown
 */

import { isPolicyTree, type EffectivePolicy, type PolicyTree } from '@shared/schema';
import { createLogger } from '../lib/logger';
import { deepMerge, getSubtree, omitKeys } from './policyMerge';
import { resolveField, type CountyCandidate } from './fieldResolver';
import { normalizeCountyName } from './geoDistance';
import type { PolicyStore } from './policyStore';
import { validateCompleteness } from './policyValidation';

const log = createLogger({ module: 'effective-policy' });

export interface PolicyRequest {
  district?: string | null;
  county?: string | null;
  field?: string | null;
}

// ============================================
// KEY NORMALIZATION
// ============================================

/**
 * Normalize an RRC district code: numeric part zero-padded to two digits,
 * letter suffix defaulting to "a". "8", "08", "8A" and "08A" all become "08a".
 */
export function normalizeDistrict(district: string | number): string {
  const raw = String(district).trim().toLowerCase();
  const match = /^0*(\d{1,2})\s*([a-z]?)$/.exec(raw);
  if (!match) {
    return raw;
  }
  const [, digits, suffix] = match;
  return `${digits.padStart(2, '0')}${suffix || 'a'}`;
}

/**
 * File-safe county slug: "Andrews County" -> "andrews", "Tom Green" -> "tom_green".
 */
export function countySlug(county: string): string {
  return normalizeCountyName(county).replace(/\s+/g, '_');
}

function overlayStem(district: string, suffix: string): string {
  return `${district}__${suffix}`;
}

// ============================================
// LAYER LOOKUP
// ============================================

/**
 * Inline district stub from the pack. Keys are compared after normalization,
 * so "8", "08", "8A" and "08A" reach the same stub; an exact key wins.
 */
function districtStub(store: PolicyStore, rawDistrict: string, district: string): PolicyTree | null {
  const stubs = store.pack.district_overlays;
  const exact = stubs[rawDistrict] ?? stubs[district];
  if (exact) return exact;
  const key = Object.keys(stubs)
    .sort()
    .find((candidate) => normalizeDistrict(candidate) === district);
  return key === undefined ? null : stubs[key];
}

function districtFile(store: PolicyStore, district: string): PolicyTree | null {
  return store.overlays.get(overlayStem(district, 'auto')) ?? null;
}

/**
 * Find a county block inside a district overlay's `counties` map.
 * Tries exact aliases first, then case-insensitive equality / prefix / contains.
 */
function countySubKey(districtOverlay: PolicyTree | null, county: string): PolicyTree | null {
  const counties = districtOverlay ? getSubtree(districtOverlay, 'counties') : null;
  if (!counties) return null;

  const trimmed = county.trim();
  const aliases = /\s+county$/i.test(trimmed)
    ? [trimmed, trimmed.replace(/\s+county$/i, '')]
    : [trimmed, `${trimmed} County`];
  for (const alias of aliases) {
    const value = counties[alias];
    if (isPolicyTree(value)) return value;
  }

  const target = normalizeCountyName(county);
  for (const key of Object.keys(counties).sort()) {
    const candidate = normalizeCountyName(key);
    const value = counties[key];
    if (!isPolicyTree(value)) continue;
    if (candidate === target || candidate.startsWith(target) || candidate.includes(target)) {
      return value;
    }
  }
  return null;
}

function countyOverlay(
  store: PolicyStore,
  district: string,
  county: string,
  districtOverlay: PolicyTree | null
): PolicyTree | null {
  const stem = overlayStem(district, countySlug(county));
  return (
    store.overlays.get(stem) ??
    store.pack.county_overlays[stem] ??
    countySubKey(districtOverlay, county)
  );
}

function countyCandidate(
  store: PolicyStore,
  district: string,
  county: string,
  overlay: PolicyTree
): CountyCandidate {
  const extraFields = store.pack.field_overlays[overlayStem(district, countySlug(county))] ?? null;
  return {
    name: county,
    config: omitKeys(overlay, ['fields']),
    fields: deepMerge(getSubtree(overlay, 'fields') ?? {}, extraFields),
  };
}

/**
 * Every county with configuration in the district, from county files, inline
 * county overlays and the district overlay's `counties` map.
 */
function listDistrictCounties(
  store: PolicyStore,
  district: string,
  districtOverlay: PolicyTree | null
): CountyCandidate[] {
  const names = new Map<string, string>();
  const prefix = `${district}__`;
  const addName = (name: string) => {
    const key = normalizeCountyName(name);
    if (!names.has(key)) names.set(key, name);
  };

  // Display names from the counties map take precedence over file slugs
  const counties = districtOverlay ? getSubtree(districtOverlay, 'counties') : null;
  for (const name of Object.keys(counties ?? {})) {
    addName(name);
  }
  for (const stem of [...store.overlays.keys(), ...Object.keys(store.pack.county_overlays)]) {
    const lower = stem.toLowerCase();
    if (lower.startsWith(prefix) && lower !== overlayStem(district, 'auto')) {
      addName(lower.slice(prefix.length).replace(/_/g, ' '));
    }
  }

  const candidates: CountyCandidate[] = [];
  for (const name of [...names.values()].sort()) {
    const overlay = countyOverlay(store, district, name, districtOverlay);
    if (overlay) {
      candidates.push(countyCandidate(store, district, name, overlay));
    }
  }
  return candidates;
}

// ============================================
// MAIN API
// ============================================

/**
 * Resolve the effective policy for a district / county / field request.
 */
export function resolveEffectivePolicy(store: PolicyStore, request: PolicyRequest = {}): EffectivePolicy {
  const { pack } = store;
  const base = pack.base;
  let merged: PolicyTree = deepMerge({}, base);

  const rawDistrict = request.district?.trim() || null;
  const district = rawDistrict ? normalizeDistrict(rawDistrict) : null;
  const county = request.county?.trim() || null;
  const field = request.field?.trim() || null;

  let districtOverlay: PolicyTree | null = null;
  let countyLayer: CountyCandidate | null = null;
  let fieldResult: ReturnType<typeof resolveField> = {
    resolution: {
      method: 'none',
      requested_field: field,
      matched_field: null,
      matched_in_county: null,
      nearest_distance_km: null,
    },
    layer: null,
  };

  if (rawDistrict && district) {
    merged = deepMerge(merged, districtStub(store, rawDistrict, district));
    districtOverlay = districtFile(store, district);
    if (districtOverlay) {
      merged = deepMerge(merged, omitKeys(districtOverlay, ['counties']));
    }

    if (county) {
      const overlay = countyOverlay(store, district, county, districtOverlay);
      if (overlay) {
        countyLayer = countyCandidate(store, district, county, overlay);
        merged = deepMerge(merged, countyLayer.config);
      }
    }

    if (field) {
      fieldResult = resolveField(
        {
          field,
          county: countyLayer,
          districtCounties: listDistrictCounties(store, district, districtOverlay),
          centroids: store.centroids,
        },
        county
      );
      merged = deepMerge(merged, fieldResult.layer);
    }
  }

  const completeness = validateCompleteness(base, merged, district);

  log.debug(
    {
      district,
      county,
      field,
      fieldMethod: fieldResult.resolution.method,
      matchedInCounty: fieldResult.resolution.matched_in_county,
      complete: completeness.complete,
    },
    'Effective policy resolved'
  );

  return {
    policy_id: pack.policy_id,
    policy_version: pack.policy_version,
    jurisdiction: pack.jurisdiction ?? null,
    form: pack.form ?? null,
    base,
    effective: merged,
    district,
    county,
    field,
    field_resolution: fieldResult.resolution,
    complete: completeness.complete,
    incomplete_reasons: completeness.incomplete_reasons,
  };
}
