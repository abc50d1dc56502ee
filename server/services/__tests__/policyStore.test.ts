/**
 * Policy Store Tests
 *
 * Loads the bundled W-3A pack from disk.
 * Run with: npx vitest run server/services/__tests__/policyStore.test.ts
 */

import { afterEach, describe, it, expect } from 'vitest';
import { loadEngineConfig } from '../../config/engineConfig';
import { resolveEffectivePolicy } from '../effectivePolicyService';
import { materializePolicy } from '../policyKnobs';
import {
  clearPolicyStoreCache,
  getPolicyStore,
  loadPolicyStore,
  parsePolicyPack,
  parsePolicyYaml,
  PolicyPackError,
  reloadPolicyStore,
} from '../policyStore';

const config = loadEngineConfig({});

afterEach(() => {
  clearPolicyStoreCache();
});

describe('loadPolicyStore', () => {
  const store = loadPolicyStore(config.policy);

  it('loads the bundled pack and overlays', () => {
    expect(store.pack.policy_id).toBe('tx.w3a');
    expect(store.pack.policy_version).toBe('2025.1.0');
    expect([...store.overlays.keys()].sort()).toEqual(['07c__auto', '08a__andrews', '08a__auto']);
    expect(store.centroids.get('andrews')).toEqual({ latitude: 32.3, longitude: -102.64 });
  });

  it('produces a complete policy for district 08A', () => {
    const effective = resolveEffectivePolicy(store, { district: '08A', county: 'Andrews' });
    expect(effective.complete).toBe(true);
    expect(effective.incomplete_reasons).toEqual([]);

    const policy = materializePolicy(effective);
    expect(policy.formationTops.map((t) => t.formation)).toEqual(['San Andres', 'Clear Fork']);
    expect(policy.protectIntervals).toBe(true);
    expect(policy.tagging.surfaceShoeInOpenHole).toBe(true);
    expect(policy.requirements.uqwIsolationMinLenFt.value).toBe(150);
    expect(policy.preferences.operational.noticeHoursMin).toBe(48);
  });

  it('applies the district 7C stub and overlay', () => {
    const policy = materializePolicy(resolveEffectivePolicy(store, { district: '7C' }));
    expect(policy.requirements.pumpThroughTubingOnly).toBe(true);
    expect(policy.requirements.tagWaitHours).toBe(4);
    expect(policy.preferences.operational).toEqual({ noticeHoursMin: 24, mudMinWeightPpg: 9.5, funnelMinS: 40 });
  });

  it('resolves the Spraberry field block for Martin County', () => {
    const effective = resolveEffectivePolicy(store, { district: '08A', county: 'Martin', field: 'Spraberry' });
    expect(effective.field_resolution.method).toBe('exact_in_county');
    expect(materializePolicy(effective).formationTops.map((t) => [t.formation, t.fallbackTopFt])).toEqual([
      ['Spraberry', 7600],
      ['Dean', 8500],
    ]);
  });
});

describe('policy parsing', () => {
  it('rejects malformed YAML', () => {
    expect(() => parsePolicyYaml('base: [1, 2', 'broken.yml')).toThrow(PolicyPackError);
  });

  it('rejects a pack without a policy id', () => {
    const tree = parsePolicyYaml('policy_version: 1\nbase: {}\n', 'no-id.yml');
    try {
      parsePolicyPack(tree, 'no-id.yml');
      expect.unreachable('parsePolicyPack should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyPackError);
      if (error instanceof PolicyPackError) {
        expect(error.file).toBe('no-id.yml');
        expect(error.details).toEqual(['policy_id: Required']);
      }
    }
  });

  it('treats an empty document as an empty mapping', () => {
    expect(parsePolicyYaml('', 'empty.yml')).toEqual({});
  });

  it('reports a missing pack file', () => {
    expect(() => loadPolicyStore({ ...config.policy, packPath: '/nonexistent/pack.yaml' })).toThrow(PolicyPackError);
  });
});

describe('policy cache', () => {
  it('returns the same store until reloaded', () => {
    expect(getPolicyStore(config.policy)).toBe(getPolicyStore(config.policy));
  });

  it('keeps the cached store when the version is unchanged', () => {
    const cached = getPolicyStore(config.policy);
    const result = reloadPolicyStore(config.policy);
    expect(result.reloaded).toBe(false);
    expect(result.previousVersion).toBe('2025.1.0');
    expect(result.store).toBe(cached);
  });

  it('installs a store on first reload', () => {
    const result = reloadPolicyStore(config.policy);
    expect(result.reloaded).toBe(true);
    expect(result.previousVersion).toBeNull();
    expect(getPolicyStore(config.policy)).toBe(result.store);
  });
});
