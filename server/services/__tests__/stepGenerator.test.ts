/**
 * Step Generator Tests
 *
 * Unit tests for W-3A step synthesis.
 * Run with: npx vitest run server/services/__tests__/stepGenerator.test.ts
 *
 * These tests verify:
 * 1. Baseline scaffold placement and degradation
 * 2. CIBP detection, KOP placement and sizing
 * 3. Existing-CIBP gating and cap
 * 4. Annular gap squeezes and tool isolation
 * 5. District formation-top plugs and overlap suppression
 * 6. Tagging, operational instructions and cement class
 */

import { describe, it, expect } from 'vitest';
import type { FactsMap, Step } from '../../../shared/schema';
import { generateSteps } from '../stepGenerator';
import { selectCementClass, operationalInstructions } from '../stepGenerator/enrichment';
import { readWellFacts } from '../stepGenerator/facts';
import { makeStep } from '../stepGenerator/types';
import { ViolationCodes } from '../violations';
import { resolvedFrom } from './policyFixtures';

function byType(steps: Step[], type: Step['type']): Step[] {
  return steps.filter((s) => s.type === type);
}

const CIBP_FACTS: FactsMap = {
  api14: { value: '42003012340000', source: 'w2' },
  surface_shoe_ft: { value: 1500, units: 'ft' },
  production_shoe_ft: 6815,
  perf_interval: [6748, 6865],
  casing_id_in: 4.778,
  stinger_od_in: 2.375,
};

// ============================================
// FACT READING
// ============================================

describe('readWellFacts', () => {
  it('unwraps fact envelopes and numeric strings', () => {
    const well = readWellFacts({ surface_shoe_ft: { value: '1,250' }, has_uqw: 'yes', uqw_base_ft: 300 });
    expect(well.surfaceShoeFt).toBe(1250);
    expect(well.hasUqw).toBe(true);
    expect(well.uqwBaseFt).toBe(300);
  });

  it('falls back to casing strings for shoe depths', () => {
    const well = readWellFacts({
      casing_strings: [
        { kind: 'surface', od_in: 8.625, bottom_ft: 1400 },
        { kind: 'production', od_in: 5.5, bottom_ft: 9000 },
      ],
    });
    expect(well.surfaceShoeFt).toBe(1400);
    expect(well.productionShoeFt).toBe(9000);
  });

  it('reads the perf interval as a perforation interval', () => {
    const well = readWellFacts({ perf_interval: [6865, 6748] });
    expect(well.producingIntervals).toEqual([{ top_ft: 6748, bottom_ft: 6865, kind: 'perforation' }]);
  });

  it('sorts formation tops by depth', () => {
    const well = readWellFacts({ formation_tops_map: { Wolfcamp: 8100, 'San Andres': { top_ft: 4200 } } });
    expect(well.formationTops.map((t) => t.name)).toEqual(['San Andres', 'Wolfcamp']);
  });
});

// ============================================
// SCAFFOLD
// ============================================

describe('baseline scaffold', () => {
  it('centers the surface shoe plug on the shoe', () => {
    const { steps } = generateSteps({ surface_shoe_ft: 1500 }, resolvedFrom());
    const [shoe] = byType(steps, 'surface_casing_shoe_plug');
    expect(shoe.top_ft).toBe(1450);
    expect(shoe.bottom_ft).toBe(1550);
    expect(shoe.regulatory_basis).toEqual(['tx.tac.16.3.14(e)(2)']);
  });

  it('clamps a shallow shoe plug at surface', () => {
    const { steps } = generateSteps({ surface_shoe_ft: 30 }, resolvedFrom());
    const [shoe] = byType(steps, 'surface_casing_shoe_plug');
    expect(shoe.top_ft).toBe(0);
    expect(shoe.bottom_ft).toBe(80);
  });

  it('reports an unknown surface shoe and still plans the surface steps', () => {
    const { steps, violations } = generateSteps({}, resolvedFrom());
    expect(byType(steps, 'surface_casing_shoe_plug')).toHaveLength(0);
    expect(violations[0].rule_id).toBe(ViolationCodes.SURFACE_SHOE_DEPTH_UNKNOWN);
    expect(violations[0].severity).toBe('error');
    expect(byType(steps, 'top_plug')[0]).toMatchObject({ top_ft: 0, bottom_ft: 10 });
    expect(byType(steps, 'casing_cut')[0]).toMatchObject({ top_ft: 3, bottom_ft: null });
  });

  it('warns when the shoe plug is shorter than the coverage requirement', () => {
    const policy = resolvedFrom({ requirements: { casing_shoe_coverage_ft: { value: 150 } } });
    const { violations } = generateSteps({ surface_shoe_ft: 1500 }, policy);
    expect(violations.map((v) => v.rule_id)).toEqual([ViolationCodes.INSUFFICIENT_SHOE_COVERAGE]);
  });

  it('extends the UQW plug symmetrically to the minimum length', () => {
    const policy = resolvedFrom({ requirements: { uqw_isolation_min_len_ft: 150 } });
    const { steps } = generateSteps({ surface_shoe_ft: 1500, has_uqw: true, uqw_base_ft: 400 }, policy);
    const [uqw] = byType(steps, 'uqw_isolation_plug');
    expect(uqw.top_ft).toBe(325);
    expect(uqw.bottom_ft).toBe(475);
  });

  it('flags DUQW without a placeable UQW plug', () => {
    const policy = resolvedFrom({ requirements: { duqw_isolation_required: { value: true } } });
    const { violations } = generateSteps({ surface_shoe_ft: 1500, has_uqw: true, has_duqw: true }, policy);
    expect(violations.map((v) => v.rule_id)).toEqual([
      ViolationCodes.UQW_BASE_UNKNOWN,
      ViolationCodes.DUQW_ISOLATION_MISSING,
    ]);
  });

  it('isolates the producing horizon when the shoe is below it', () => {
    const { steps } = generateSteps(
      {
        surface_shoe_ft: 1500,
        production_shoe_ft: 9000,
        producing_intervals: [{ top_ft: 7000, bottom_ft: 7100, formation: 'Wolfcamp' }],
      },
      resolvedFrom()
    );
    const [plug] = byType(steps, 'productive_horizon_isolation_plug');
    expect(plug).toMatchObject({ top_ft: 6950, bottom_ft: 7050, formation: 'Wolfcamp' });
    expect(byType(steps, 'bridge_plug')).toHaveLength(0);
  });
});

// ============================================
// MECHANICAL BARRIERS
// ============================================

describe('CIBP detector', () => {
  it('sets a CIBP above perforations exposed below the production shoe', () => {
    const { steps } = generateSteps(CIBP_FACTS, resolvedFrom());
    const [cibp] = byType(steps, 'bridge_plug');
    const [cap] = byType(steps, 'bridge_plug_cap');

    expect(cibp.top_ft).toBe(6738);
    expect(cibp.bottom_ft).toBeNull();
    expect(cibp.details.placement_basis).toBe('perforation');
    expect(cibp.details.recommended_cibp_size_in).toBe(4.528);
    expect(cap.top_ft).toBe(6738);
    expect(cap.bottom_ft).toBe(6758);
    expect(cap.regulatory_basis).toEqual(['tx.tac.16.3.14(g)(3)']);
  });

  it('moves the CIBP above the kick-off point when that is shallower', () => {
    const { steps } = generateSteps({ ...CIBP_FACTS, kop: { kop_md_ft: 6700 } }, resolvedFrom());
    const [cibp] = byType(steps, 'bridge_plug');
    expect(cibp.top_ft).toBe(6650);
    expect(cibp.details.placement_basis).toBe('kop');
    expect(cibp.details.kop_md_ft).toBe(6700);
  });

  it('keeps perforation placement when the kick-off point is deeper', () => {
    const { steps } = generateSteps({ ...CIBP_FACTS, kop_md_ft: 7000 }, resolvedFrom());
    const [cibp] = byType(steps, 'bridge_plug');
    expect(cibp.top_ft).toBe(6738);
    expect(cibp.details.placement_basis).toBe('perforation');
  });

  it('reports an unknown production shoe instead of guessing', () => {
    const { steps, violations } = generateSteps(
      { surface_shoe_ft: 1500, perf_interval: [6748, 6865] },
      resolvedFrom()
    );
    expect(byType(steps, 'bridge_plug')).toHaveLength(0);
    expect(violations.map((v) => v.rule_id)).toEqual([ViolationCodes.PRODUCTION_SHOE_UNKNOWN]);
  });
});

describe('existing CIBP', () => {
  const facts: FactsMap = {
    surface_shoe_ft: 1500,
    existing_mechanical_barriers: 'cibp',
    existing_cibp_ft: 5000,
    annular_gaps: [{ top_ft: 5200, bottom_ft: 5400, requires_isolation: true }],
  };

  it('caps the existing plug and refuses squeezes below it', () => {
    const { steps, violations, notes } = generateSteps(facts, resolvedFrom());
    const [cap] = byType(steps, 'bridge_plug_cap');

    expect(cap).toMatchObject({ top_ft: 5000, bottom_ft: 5020 });
    expect(cap.details.existing_cibp).toBe(true);
    expect(byType(steps, 'perforate_and_squeeze_plug')).toHaveLength(0);
    expect(violations.map((v) => v.rule_id)).toEqual([ViolationCodes.BELOW_CIBP]);
    expect(notes).toEqual(['Existing CIBP at 5000 ft; cement cap verified']);
  });
});

// ============================================
// ANNULUS AND TOOLS
// ============================================

describe('annular gaps', () => {
  it('squeezes the middle of an uncemented gap with a cap above', () => {
    const { steps } = generateSteps(
      {
        surface_shoe_ft: 1500,
        production_shoe_ft: 6815,
        annular_gaps: [
          { top_ft: 2000, bottom_ft: 2300, requires_isolation: true, cement_present: false },
          { top_ft: 3000, bottom_ft: 3100, requires_isolation: true, cement_present: true },
        ],
      },
      resolvedFrom()
    );
    const squeezes = byType(steps, 'perforate_and_squeeze_plug');
    expect(squeezes).toHaveLength(1);
    expect(squeezes[0].top_ft).toBe(2050);
    expect(squeezes[0].bottom_ft).toBe(2200);
    expect(squeezes[0].details).toMatchObject({
      context: 'cased',
      squeeze_interval: { top_ft: 2100, bottom_ft: 2200 },
      cap_interval: { top_ft: 2050, bottom_ft: 2100 },
      cap_length_ft: 50,
    });
  });
});

describe('tool isolation', () => {
  it('isolates packer and DV tool unless already covered by cement', () => {
    const { steps } = generateSteps({ surface_shoe_ft: 1500, packer_ft: 6000, dv_tool_ft: 1520 }, resolvedFrom());
    const plugs = byType(steps, 'mechanical_isolation_plug');
    expect(plugs).toHaveLength(1);
    expect(plugs[0]).toMatchObject({ top_ft: 5950, bottom_ft: 6050 });
    expect(plugs[0].details.tool).toBe('packer');
  });
});

// ============================================
// FORMATION TOPS
// ============================================

describe('formation-top plugs', () => {
  const policy = resolvedFrom({
    formation_tops: [
      { formation: 'San Andres', plug_required: true, tag_required: true },
      { formation: 'Clear Fork', plug_required: true, fallback_top_ft: 6200 },
      { formation: 'Wolfcamp', plug_required: true },
      { formation: 'Yates', plug_required: false },
    ],
  });
  const facts: FactsMap = { surface_shoe_ft: 1500, production_shoe_ft: 9000, formation_tops_map: { 'san andres': 4200 } };

  it('places plugs from well tops, then district fallbacks', () => {
    const { steps } = generateSteps(facts, policy);
    const plugs = byType(steps, 'formation_top_plug');

    expect(plugs.map((p) => [p.formation, p.top_ft, p.bottom_ft])).toEqual([
      ['San Andres', 4150, 4250],
      ['Clear Fork', 6150, 6250],
    ]);
    expect(plugs[0].regulatory_basis).toEqual(['rrc.district.08a.andrews:formation_top:San Andres']);
    expect(plugs[0].details.top_source).toBe('well');
    expect(plugs[1].details.top_source).toBe('district_fallback');
  });

  it('reports required formations with no known top', () => {
    const { violations } = generateSteps(facts, policy);
    const unknown = violations.filter((v) => v.rule_id === ViolationCodes.FORMATION_TOP_UNKNOWN);
    expect(unknown).toHaveLength(1);
    expect(unknown[0].context).toEqual({ formation: 'Wolfcamp' });
  });

  it('tags formation plugs that require it', () => {
    const { steps } = generateSteps(facts, policy);
    const [sanAndres] = byType(steps, 'formation_top_plug');
    expect(sanAndres.tag_required).toBe(true);
    expect(sanAndres.details.verification).toEqual({ action: 'TAG', required_wait_hr: 4 });
  });

  it('suppresses plugs that lie inside a squeeze interval', () => {
    const withSqueeze = resolvedFrom({
      formation_tops: [{ formation: 'San Andres', plug_required: true }],
      steps_overrides: { squeeze_via_perf: { interval_ft: [4300, 4100], citations: ['tx.tac.16.3.14(g)(2)'] } },
    });
    const { steps, notes } = generateSteps(facts, withSqueeze);

    expect(byType(steps, 'formation_top_plug')).toHaveLength(0);
    expect(byType(steps, 'squeeze')[0]).toMatchObject({ top_ft: 4100, bottom_ft: 4300 });
    expect(notes).toContain('formation_top_plug 4150-4250 ft suppressed; covered by squeeze 4100-4300 ft');
  });
});

// ============================================
// OVERRIDES
// ============================================

describe('steps overrides', () => {
  it('applies a manual sack count to a squeeze', () => {
    const policy = resolvedFrom({
      steps_overrides: { squeeze_via_perf: { interval_ft: [5100, 5200], sacks_override: 40 } },
    });
    const { steps } = generateSteps({ surface_shoe_ft: 1500 }, policy);
    const [squeeze] = byType(steps, 'squeeze');
    expect(squeeze.sacks).toBe(40);
    expect(squeeze.details.materials_override).toBe(true);
  });

  it('overrides CIBP cap length', () => {
    const policy = resolvedFrom({ steps_overrides: { cibp_cap: { cap_length_ft: 100 } } });
    const { steps } = generateSteps(CIBP_FACTS, policy);
    const [cap] = byType(steps, 'bridge_plug_cap');
    expect(cap.bottom_ft).toBe(6838);
    expect(cap.details.cap_length_overridden).toBe(true);
  });

  it('keeps cased dimensions off open-hole cement plugs', () => {
    const policy = resolvedFrom({
      steps_overrides: {
        cement_plugs: [
          { top_ft: 7000, bottom_ft: 7100, geometry_context: 'open_hole', casing_id_in: 4.778, hole_size_in: 7.875 },
        ],
      },
    });
    const { steps } = generateSteps({ surface_shoe_ft: 1500 }, policy);
    const [plug] = byType(steps, 'cement_plug');
    expect(plug.details).toEqual({ geometry_context: 'open_hole', hole_size_in: 7.875 });
  });

  it('carries cement plug segments and takes step dimensions from the deepest ones', () => {
    const policy = resolvedFrom({
      steps_overrides: {
        cement_plugs: [
          {
            top_ft: 5000,
            bottom_ft: 5200,
            segments: [
              { top_ft: 5000, bottom_ft: 5060, casing_id_in: 6.094 },
              { top_ft: 5060, bottom_ft: 5200, hole_size_in: 8.75, annular_excess: 0.5 },
            ],
          },
        ],
      },
    });
    const { steps } = generateSteps({ surface_shoe_ft: 1500, production_shoe_ft: 5060 }, policy);
    const [plug] = byType(steps, 'cement_plug');
    expect(plug.cement_class).toBe('H');
    expect(plug.details).toEqual({
      hole_size_in: 8.75,
      casing_id_in: 6.094,
      segments: [
        { top_ft: 5000, bottom_ft: 5060, casing_id_in: 6.094 },
        { top_ft: 5060, bottom_ft: 5200, hole_size_in: 8.75, annular_excess: 0.5 },
      ],
    });
  });
});

describe('annular gaps below the production shoe', () => {
  it('marks the squeeze as open hole', () => {
    const { steps } = generateSteps(
      {
        surface_shoe_ft: 1500,
        production_shoe_ft: 6000,
        annular_gaps: [{ top_ft: 6200, bottom_ft: 6300, requires_isolation: true }],
      },
      resolvedFrom()
    );
    const [squeeze] = byType(steps, 'perforate_and_squeeze_plug');
    expect(squeeze).toMatchObject({ top_ft: 6150, bottom_ft: 6300 });
    expect(squeeze.details.context).toBe('open_hole');
  });

  it('treats a squeeze inside a liner as cased', () => {
    const { steps } = generateSteps(
      {
        surface_shoe_ft: 1500,
        production_shoe_ft: 6000,
        casing_strings: [{ kind: 'liner', od_in: 4.5, top_ft: 5800, bottom_ft: 7000 }],
        annular_gaps: [{ top_ft: 6200, bottom_ft: 6300, requires_isolation: true }],
      },
      resolvedFrom()
    );
    const [squeeze] = byType(steps, 'perforate_and_squeeze_plug');
    expect(squeeze.details.context).toBe('cased');
  });
});

// ============================================
// ENRICHMENT
// ============================================

describe('tagging', () => {
  it('tags the surface shoe plug for open-hole and protected-interval districts', () => {
    const policy = resolvedFrom({
      tagging: { surface_shoe_in_oh: true },
      protect_intervals: [{ top_ft: 4300, bottom_ft: 4500 }],
    });
    const { steps } = generateSteps({ surface_shoe_ft: 1500 }, policy);
    const [shoe] = byType(steps, 'surface_casing_shoe_plug');

    expect(shoe.tag_required).toBe(true);
    expect(shoe.regulatory_basis).toEqual([
      'tx.tac.16.3.14(e)(2)',
      'rrc.district.08a.andrews:tag.surface_shoe_in_oh',
      'rrc.district.08a.andrews:protect_intervals',
    ]);
  });

  it('tags configured step types with the policy wait time', () => {
    const policy = resolvedFrom({ tagging: { required_step_types: ['top_plug'], wait_hours: 8 } });
    const { steps } = generateSteps({ surface_shoe_ft: 1500 }, policy);
    expect(byType(steps, 'top_plug')[0].details.verification).toEqual({ action: 'TAG', required_wait_hr: 4 });
    expect(byType(steps, 'surface_casing_shoe_plug')[0].tag_required).toBe(false);
  });
});

describe('operational instructions', () => {
  const policy = resolvedFrom({
    requirements: { pump_through_tubing_or_drillpipe_only: { value: true } },
    preferences: { operational: { notice_hours_min: 48, mud_min_weight_ppg: 9.5 } },
  });

  it('renders district requirements as instructions', () => {
    const well = readWellFacts({});
    const instructions = operationalInstructions({ facts: {}, well, policy, violations: [], notes: [] });
    expect(instructions).toEqual([
      'Pump via tubing/drill pipe only',
      'Give district notice >= 48h before plugs',
      'Mud >= 9.5 ppg',
    ]);
  });

  it('attaches instructions to cement-bearing steps only', () => {
    const { steps } = generateSteps({ surface_shoe_ft: 1500 }, policy);
    expect(byType(steps, 'surface_casing_shoe_plug')[0].special_instructions).toBe(
      'Pump via tubing/drill pipe only; Give district notice >= 48h before plugs; Mud >= 9.5 ppg'
    );
    expect(byType(steps, 'casing_cut')[0].special_instructions).toBeUndefined();
  });
});

describe('selectCementClass', () => {
  it('uses the shallow class when the plug midpoint is no deeper than the cutoff', () => {
    expect(selectCementClass(makeStep('cement_plug', 3950, 4050, []), 4000, 'C', 'H')).toBe('C');
    expect(selectCementClass(makeStep('cement_plug', 3960, 4060, []), 4000, 'C', 'H')).toBe('H');
  });

  it('falls back to whichever class is configured without a cutoff', () => {
    expect(selectCementClass(makeStep('cement_plug', 100, 200, []), null, null, 'H')).toBe('H');
  });

  it('assigns classes to cement-bearing steps only', () => {
    const { steps } = generateSteps(CIBP_FACTS, resolvedFrom());
    expect(byType(steps, 'surface_casing_shoe_plug')[0].cement_class).toBe('C');
    expect(byType(steps, 'bridge_plug_cap')[0].cement_class).toBe('H');
    expect(byType(steps, 'bridge_plug')[0].cement_class).toBeNull();
  });
});
