/**
 * Explicit step overrides from `steps_overrides` in the effective policy:
 * CIBP cap length, a squeeze through perforations, perf-and-circulate
 * intervals and extra cement plugs, optionally split into geometry segments.
 */

import type { Step } from '@shared/schema';
import { isOpenHoleAt } from '../wellGeometry';
import { blockedByExistingCibp } from './barriers';
import { CAP_TYPES, makeStep, type StepRule } from './types';

export const stepsOverrideRule: StepRule = (ctx, steps) => {
  const overrides = ctx.policy.stepsOverrides;
  const capLength = overrides.cibpCapLengthFt;

  const out: Step[] = steps.map((step) => {
    if (capLength === null || !CAP_TYPES.has(step.type) || step.top_ft === null) return step;
    return {
      ...step,
      bottom_ft: step.top_ft + capLength,
      details: { ...step.details, cap_length_ft: capLength, cap_length_overridden: true },
    };
  });

  const added: Step[] = [];
  const squeeze = overrides.squeezeViaPerf;
  if (squeeze) {
    const manual = squeeze.sacksOverride !== null;
    added.push(
      makeStep('squeeze', squeeze.top_ft, squeeze.bottom_ft, [...squeeze.citations], {
        ...(manual ? { sacks: squeeze.sacksOverride } : {}),
        details: {
          context: isOpenHoleAt(ctx.well, squeeze.bottom_ft) ? 'open_hole' : 'cased',
          squeeze_interval: { top_ft: squeeze.top_ft, bottom_ft: squeeze.bottom_ft },
          cap_length_ft: 0,
          ...(manual ? { materials_override: true } : {}),
        },
      })
    );
  }

  for (const pc of overrides.perfCirculate) {
    added.push(makeStep('perf_circulate', pc.top_ft, pc.bottom_ft, [...pc.citations]));
  }

  for (const cp of overrides.cementPlugs) {
    const geometry: Record<string, number | string> = {};
    if (cp.geometryContext !== null) geometry.geometry_context = cp.geometryContext;
    if (cp.stingerOdIn !== null) geometry.stinger_od_in = cp.stingerOdIn;
    if (cp.holeSizeIn !== null) geometry.hole_size_in = cp.holeSizeIn;
    if (cp.annularExcess !== null) geometry.annular_excess = cp.annularExcess;
    // Cased dimensions never leak into open-hole plugs
    const openHole = (cp.geometryContext ?? '').toLowerCase().startsWith('open_hole');
    if (cp.casingIdIn !== null && !openHole) {
      geometry.casing_id_in = cp.casingIdIn;
    }

    const details: Record<string, unknown> = { ...geometry };
    if (cp.segments.length > 0) {
      // Step-level dimensions come from the deepest segment that has them
      const byDepth = [...cp.segments].sort((a, b) => b.bottom_ft - a.bottom_ft);
      const hole = byDepth.find((seg) => (seg.hole_size_in ?? seg.hole_d_in) !== undefined);
      const casing = byDepth.find((seg) => seg.casing_id_in !== undefined);
      if (details.hole_size_in === undefined && hole) details.hole_size_in = hole.hole_size_in ?? hole.hole_d_in;
      if (details.casing_id_in === undefined && casing && !openHole) details.casing_id_in = casing.casing_id_in;
      const stinger = cp.segments.find((seg) => seg.stinger_od_in !== undefined)?.stinger_od_in;
      if (details.stinger_od_in === undefined && stinger !== undefined) details.stinger_od_in = stinger;
      details.segments = cp.segments.map((seg) => ({ ...seg }));
    }
    added.push(makeStep('cement_plug', cp.top_ft, cp.bottom_ft, [...cp.citations], { details }));
  }

  return [...out, ...added.filter((step) => !blockedByExistingCibp(ctx, step))];
};
