/**
 * Shared policy trees for service tests.
 */

import type { EffectivePolicy, PolicyTree } from '../../../shared/schema';
import { materializePolicy, type ResolvedPolicy } from '../policyKnobs';
import { deepMerge } from '../policyMerge';

export const BASE_TREE: PolicyTree = {
  citations: {
    'tx.tac.16.3.14(e)(2)': 'Surface casing shoe plug',
    'tx.tac.16.3.14(g)(3)': 'Cement above bridge plugs',
  },
  requirements: {
    surface_casing_shoe_plug_min_ft: { value: 100, citation_keys: ['tx.tac.16.3.14(e)(2)'] },
    casing_shoe_coverage_ft: { value: 100, citation_keys: ['tx.tac.16.3.14(e)(2)'] },
    duqw_coverage_ft: { value: 100, citation_keys: ['tx.tac.16.3.14(g)(1)'] },
    cement_above_cibp_min_ft: { value: 20, citation_keys: ['tx.tac.16.3.14(g)(3)'] },
    tag_wait_hours: 4,
  },
  cement_class: {
    cutoff_ft: 4000,
    shallow_class: 'C',
    deep_class: 'H',
  },
  preferences: {
    annular_excess: 0.4,
    recipes: {
      C: { id: 'class_c_neat', yield_ft3_per_sk: 1.32, water_gal_per_sk: 6.3, density_ppg: 14.8 },
      H: { id: 'class_h_neat', yield_ft3_per_sk: 1.06, water_gal_per_sk: 4.3, density_ppg: 16.4 },
    },
    geometry_defaults: {
      stinger_od_in: 2.375,
    },
  },
};

/**
 * Wrap a tree as an already-resolved effective policy for district 08A,
 * Andrews County.
 */
export function effectiveFrom(tree: PolicyTree, overrides: Partial<EffectivePolicy> = {}): EffectivePolicy {
  return {
    policy_id: 'tx.w3a',
    policy_version: 'test-1',
    jurisdiction: 'TX',
    form: 'W-3A',
    base: tree,
    effective: tree,
    district: '08a',
    county: 'Andrews',
    field: null,
    field_resolution: {
      method: 'none',
      requested_field: null,
      matched_field: null,
      matched_in_county: null,
      nearest_distance_km: null,
    },
    complete: true,
    incomplete_reasons: [],
    ...overrides,
  };
}

/**
 * Typed policy with `extra` deep-merged over the base tree.
 */
export function resolvedFrom(extra: PolicyTree = {}): ResolvedPolicy {
  return materializePolicy(effectiveFrom(deepMerge(BASE_TREE, extra)));
}
