/**
 * Step Merger Tests
 *
 * Run with: npx vitest run server/services/__tests__/stepMerger.test.ts
 */

import { describe, it, expect } from 'vitest';
import type { Step } from '../../../shared/schema';
import { mergeAdjacentSteps } from '../stepMerger';
import { makeStep } from '../stepGenerator/types';

function formationPlug(formation: string, top: number, bottom: number, basis: string[] = []): Step {
  return { ...makeStep('formation_top_plug', top, bottom, basis, { formation }), sacks: 25 };
}

describe('mergeAdjacentSteps', () => {
  it('merges same-type plugs within the threshold', () => {
    const steps = [
      formationPlug('San Andres', 4150, 4250, ['a']),
      formationPlug('Glorieta', 4400, 4500, ['b']),
      formationPlug('Clear Fork', 6150, 6250, ['a']),
    ];
    const merged = mergeAdjacentSteps(steps, { thresholdFt: 200 });

    expect(merged).toHaveLength(2);
    expect(merged[0]).toMatchObject({
      top_ft: 4150,
      bottom_ft: 4500,
      formation: 'San Andres / Glorieta',
      regulatory_basis: ['a', 'b'],
      sacks: null,
    });
    expect(merged[0].details.merged).toBe(true);
    expect(merged[0].details.merged_steps).toEqual([
      { formation: 'San Andres', top_ft: 4150, bottom_ft: 4250 },
      { formation: 'Glorieta', top_ft: 4400, bottom_ft: 4500 },
    ]);
    expect(merged[1]).toBe(steps[2]);
  });

  it('chains merges across several plugs', () => {
    const merged = mergeAdjacentSteps(
      [formationPlug('A', 1000, 1100), formationPlug('B', 1200, 1300), formationPlug('C', 1400, 1500)],
      { thresholdFt: 100 }
    );
    expect(merged).toHaveLength(1);
    expect(merged[0].formation).toBe('A / B / C');
    expect(merged[0].details.merged_steps).toHaveLength(3);
  });

  it('never mixes step types', () => {
    const plug = formationPlug('San Andres', 4150, 4250);
    const cement = makeStep('cement_plug', 4260, 4360, []);
    const merged = mergeAdjacentSteps([plug, cement], { thresholdFt: 200 });
    expect(merged).toEqual([cement, plug]);
  });

  it('recomputes only combined steps and drops stale floor details', () => {
    const recomputed: Step[] = [];
    const first = formationPlug('A', 1000, 1100);
    const withFloor = { ...first, details: { texas_25_sack_minimum_applied: true, original_calculated_sacks: 9 } };
    mergeAdjacentSteps([withFloor, formationPlug('B', 1150, 1250), formationPlug('C', 3000, 3100)], {
      thresholdFt: 100,
      recompute: (step) => {
        recomputed.push(step);
        return step;
      },
    });

    expect(recomputed).toHaveLength(1);
    expect(recomputed[0].details.texas_25_sack_minimum_applied).toBeUndefined();
    expect(recomputed[0].details.original_calculated_sacks).toBeUndefined();
  });

  it('ors tag requirements', () => {
    const tagged = {
      ...formationPlug('A', 1000, 1100),
      tag_required: true,
      details: { verification: { action: 'TAG', required_wait_hr: 4 } },
    };
    const [merged] = mergeAdjacentSteps([formationPlug('B', 1150, 1250), tagged], { thresholdFt: 100 });
    expect(merged.tag_required).toBe(true);
    expect(merged.details.verification).toEqual({ action: 'TAG', required_wait_hr: 4 });
  });
});
