/**
 * Wellbore geometry for a step.
 *
 * Outer diameter is the casing ID in cased hole and the drilled hole
 * diameter in open hole; inner diameter is the work-string (stinger) OD.
 * Missing dimensions are reported, never guessed, with one exception: an
 * open-hole section with no recorded hole size uses casing OD + 2.0 in and
 * is marked `open_hole_estimated`.
 */

import type { CasingString, Step } from '@shared/schema';
import type { GeometryValues, ResolvedPolicy } from './policyKnobs';
import type { WellFacts } from './stepGenerator/facts';

export const OPEN_HOLE_CLEARANCE_IN = 2.0;

export type GeometryContext = 'cased' | 'open_hole' | 'open_hole_estimated';

export interface StepGeometry {
  context: GeometryContext;
  outerIn: number;
  innerIn: number;
  casingIdIn: number | null;
  holeSizeIn: number | null;
  annularExcess: number;
}

export type GeometryResolution =
  | { ok: true; geometry: StepGeometry }
  | { ok: false; context: GeometryContext; missing: string[] };

// Common API casing sizes at a typical weight (OD -> ID, inches)
const NOMINAL_CASING: ReadonlyArray<{ od: number; id: number }> = [
  { od: 4.5, id: 4.052 },
  { od: 5.5, id: 4.95 },
  { od: 7, id: 6.366 },
  { od: 7.625, id: 6.875 },
  { od: 8.625, id: 8.097 },
  { od: 9.625, id: 8.921 },
  { od: 10.75, id: 10.05 },
  { od: 11.75, id: 11.084 },
  { od: 13.375, id: 12.715 },
  { od: 16, id: 15.124 },
  { od: 20, id: 19.124 },
];

export function nominalCasingId(odIn: number): number | null {
  return NOMINAL_CASING.find((c) => Math.abs(c.od - odIn) < 0.01)?.id ?? null;
}

function stringId(casing: CasingString): number | null {
  return casing.id_in ?? nominalCasingId(casing.od_in);
}

/**
 * Innermost casing string covering a depth.
 */
export function casingAt(well: WellFacts, depthFt: number): CasingString | null {
  const covering = well.casingStrings.filter((c) => c.top_ft <= depthFt && depthFt <= c.bottom_ft);
  if (covering.length === 0) return null;
  return covering.reduce((a, b) => (b.od_in < a.od_in ? b : a));
}

/**
 * Open hole: below the production shoe and not inside a liner.
 */
export function isOpenHoleAt(well: WellFacts, depthFt: number): boolean {
  const shoe = well.productionShoeFt;
  if (shoe === null || depthFt <= shoe) return false;
  return !well.casingStrings.some((c) => c.kind === 'liner' && c.top_ft <= depthFt && depthFt <= c.bottom_ft);
}

/**
 * Casing ID at a depth from facts, casing strings, then policy defaults.
 */
export function casingIdAt(well: WellFacts, depthFt: number, policy: ResolvedPolicy): number | null {
  const casing = casingAt(well, depthFt);
  return (
    well.casingIdIn ??
    (casing ? stringId(casing) : null) ??
    policy.preferences.geometryDefaults.casingIdIn
  );
}

function detailNumber(step: Step, key: string): number | null {
  const value = step.details[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stepContext(step: Step, well: WellFacts, depthFt: number | null): GeometryContext {
  const declared = step.details.geometry_context ?? step.details.context;
  if (typeof declared === 'string') {
    const lower = declared.toLowerCase();
    if (lower.startsWith('open_hole')) return 'open_hole';
    if (lower.startsWith('cased')) return 'cased';
  }
  if (depthFt === null || casingAt(well, depthFt)) return 'cased';
  return isOpenHoleAt(well, depthFt) ? 'open_hole' : 'cased';
}

/** Depth used to pick geometry: the squeeze bottom for squeezes, else the midpoint. */
function geometryDepth(step: Step): number | null {
  const squeeze = step.details.squeeze_interval;
  if (typeof squeeze === 'object' && squeeze !== null && 'bottom_ft' in squeeze && typeof squeeze.bottom_ft === 'number') {
    return squeeze.bottom_ft;
  }
  if (step.top_ft === null) return step.bottom_ft;
  if (step.bottom_ft === null) return step.top_ft;
  return (step.top_ft + step.bottom_ft) / 2;
}

function deepestCasingOd(well: WellFacts): number | null {
  if (well.casingOdIn !== null) return well.casingOdIn;
  const production = well.casingStrings.filter((c) => c.kind === 'production' || c.kind === 'liner');
  const pool = production.length > 0 ? production : well.casingStrings;
  if (pool.length === 0) return null;
  return pool.reduce((a, b) => (b.bottom_ft > a.bottom_ft ? b : a)).od_in;
}

function recordedHoleSize(well: WellFacts): number | null {
  const withHole = well.casingStrings.filter((c) => c.hole_size_in !== undefined);
  if (withHole.length === 0) return null;
  return withHole.reduce((a, b) => (b.bottom_ft > a.bottom_ft ? b : a)).hole_size_in ?? null;
}

/**
 * Resolve the annulus for a step. Precedence for each dimension: explicit
 * step value, well fact, casing strings, step-type defaults, global defaults.
 */
export function resolveStepGeometry(step: Step, well: WellFacts, policy: ResolvedPolicy): GeometryResolution {
  const defaults = policy.preferences.geometryDefaults;
  const typed: GeometryValues | null = defaults.byStepType[step.type] ?? null;
  const depth = geometryDepth(step);
  let context = stepContext(step, well, depth);

  const stinger =
    detailNumber(step, 'stinger_od_in') ?? well.stingerOdIn ?? typed?.stingerOdIn ?? defaults.stingerOdIn;
  const annularExcess =
    detailNumber(step, 'annular_excess') ?? typed?.annularExcess ?? policy.preferences.annularExcess;

  let outer: number | null;
  let casingId: number | null = null;
  let holeSize: number | null = null;

  if (context === 'open_hole') {
    holeSize =
      detailNumber(step, 'hole_size_in') ??
      well.holeSizeIn ??
      typed?.holeSizeIn ??
      recordedHoleSize(well) ??
      defaults.holeSizeIn;
    if (holeSize === null) {
      const od = deepestCasingOd(well);
      if (od !== null) {
        holeSize = od + OPEN_HOLE_CLEARANCE_IN;
        context = 'open_hole_estimated';
      }
    }
    outer = holeSize;
  } else {
    const casing = depth !== null ? casingAt(well, depth) : null;
    casingId =
      detailNumber(step, 'casing_id_in') ??
      well.casingIdIn ??
      (casing ? stringId(casing) : null) ??
      typed?.casingIdIn ??
      defaults.casingIdIn;
    outer = casingId;
  }

  const missing: string[] = [];
  if (outer === null) missing.push(context === 'cased' ? 'casing_id_in' : 'hole_size_in');
  if (stinger === null) missing.push('stinger_od_in');
  if (outer === null || stinger === null) {
    return { ok: false, context, missing };
  }

  return {
    ok: true,
    geometry: { context, outerIn: outer, innerIn: stinger, casingIdIn: casingId, holeSizeIn: holeSize, annularExcess },
  };
}

/**
 * Work-string bore for a step: explicit value, step-type default, then the
 * global default.
 */
export function stingerIdFor(step: Step, policy: ResolvedPolicy): number | null {
  const defaults = policy.preferences.geometryDefaults;
  return detailNumber(step, 'stinger_id_in') ?? defaults.byStepType[step.type]?.stingerIdIn ?? defaults.stingerIdIn;
}
