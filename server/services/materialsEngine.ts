/**
 * Materials Engine
 *
 * Cement volume and sack calculations for plugging steps. All functions are
 * pure; geometry comes from wellGeometry.ts and recipes from policy
 * preferences.
 *
 * FORMULAS:
 * - Annular capacity (bbl/ft) = (D_outer^2 - D_inner^2) / 1029.4
 *   (1029.4 folds in pi/4, 144 in^2/ft^2 and 5.6146 ft^3/bbl)
 * - Squeeze = interval x capacity x factor (2.0 open hole, 1.5 cased)
 * - Squeeze cap = cap length x capacity x (1 + 0.4)
 * - Plug = interval x capacity x (1 + excess), excess scaled +10% per 1000 ft
 * - Segmented plug = sum over segments of length x capacity x (1 + excess)
 * - Displacement behind a balanced plug = interval x stinger bore capacity + margin
 * - Sacks = ceil(bbl x 5.615 / yield); rounding is always up
 */

import {
  plugSegmentSchema,
  type CementRecipe,
  type PlugSegment,
  type RecipeAdditive,
  type SegmentVolume,
  type Step,
  type StepMaterials,
  type StepType,
  type Violation,
} from '@shared/schema';
import type { ResolvedPolicy } from './policyKnobs';
import { isCementBearing, type WellFacts } from './stepGenerator';
import { makeViolation, ViolationCodes } from './violations';
import { resolveStepGeometry, stingerIdFor, type GeometryContext, type StepGeometry } from './wellGeometry';

export const BBL_TO_FT3 = 5.615;
export const ANNULAR_CAPACITY_DIVISOR = 1029.4;
export const CAP_EXCESS = 0.4;
export const OPEN_HOLE_SQUEEZE_FACTOR = 2.0;
export const CASED_SQUEEZE_FACTOR = 1.5;
export const DEPTH_EXCESS_PER_1000_FT = 0.1;
export const GALLONS_PER_BBL = 42;
export const MINIMUM_SACKS = 25;

/** Steps never raised to the minimum sack count. */
export const SACK_FLOOR_EXEMPT: ReadonlySet<StepType> = new Set<StepType>([
  'bridge_plug',
  'cement_retainer',
  'bridge_plug_cap',
  'cibp_cap',
]);

// ============================================
// CORE FORMULAS
// ============================================

export function annularCapacityBblPerFt(outerIn: number, innerIn: number): number {
  const delta = outerIn * outerIn - innerIn * innerIn;
  return delta > 0 ? delta / ANNULAR_CAPACITY_DIVISOR : 0;
}

/** Capacity inside a pipe of the given bore (bbl/ft). */
export function cylinderCapacityBblPerFt(diameterIn: number): number {
  return diameterIn > 0 ? (diameterIn * diameterIn) / ANNULAR_CAPACITY_DIVISOR : 0;
}

export function squeezeFactor(context: GeometryContext): number {
  return context === 'cased' ? CASED_SQUEEZE_FACTOR : OPEN_HOLE_SQUEEZE_FACTOR;
}

export interface SqueezeVolumes {
  squeeze_bbl: number;
  cap_bbl: number;
  total_bbl: number;
}

export function squeezeVolumes(
  intervalFt: number,
  capLengthFt: number,
  annularCapacity: number,
  factor: number
): SqueezeVolumes {
  const squeeze = intervalFt * annularCapacity * factor;
  const cap = capLengthFt * annularCapacity * (1 + CAP_EXCESS);
  return { squeeze_bbl: squeeze, cap_bbl: cap, total_bbl: squeeze + cap };
}

/**
 * Scale an excess fraction by depth: +10% of the fraction per 1000 ft.
 */
export function depthScaledExcess(excess: number, depthFt: number): number {
  return excess * (1 + (DEPTH_EXCESS_PER_1000_FT * Math.max(depthFt, 0)) / 1000);
}

export function plugVolumeBbl(intervalFt: number, annularCapacity: number, excess: number): number {
  return Math.max(intervalFt, 0) * annularCapacity * (1 + excess);
}

export function sacksFromBbl(totalBbl: number, yieldFt3PerSack: number): number {
  if (totalBbl <= 0) return 0;
  if (yieldFt3PerSack <= 0) {
    throw new RangeError('yield_ft3_per_sk must be positive');
  }
  return Math.ceil((totalBbl * BBL_TO_FT3) / yieldFt3PerSack);
}

export function waterBblFromSacks(sacks: number, waterGalPerSack: number): number {
  return (sacks * waterGalPerSack) / GALLONS_PER_BBL;
}

/**
 * Spacer ahead of a squeeze: the larger of the minimum volume and a multiple
 * of the interval's annular volume.
 */
export function spacerBbl(intervalFt: number, annularCapacity: number, minBbl: number, multiple: number): number {
  return Math.max(minBbl, multiple * intervalFt * annularCapacity);
}

/**
 * Fluid pumped behind a balanced plug to bring it level: the stinger's
 * internal volume over the plug interval, plus a margin.
 */
export function balancedDisplacementBbl(intervalFt: number, pipeIdCapacity: number, marginBbl: number = 0): number {
  return Math.max(intervalFt, 0) * pipeIdCapacity + marginBbl;
}

export interface SegmentIntegration {
  totalBbl: number;
  segments: SegmentVolume[];
  /** Segments without an outer diameter. */
  skipped: number;
}

/**
 * Sum annular volumes over segments, each with its own outer diameter
 * (casing ID, else hole size), stinger OD and excess. Missing stinger OD or
 * excess falls back to the step's values.
 */
export function integrateSegments(
  segments: readonly PlugSegment[],
  fallbackInnerIn: number,
  fallbackExcess: number
): SegmentIntegration {
  const rows: SegmentVolume[] = [];
  let total = 0;
  let skipped = 0;

  for (const seg of segments) {
    const outer = seg.casing_id_in ?? seg.hole_size_in ?? seg.hole_d_in ?? null;
    if (outer === null) {
      skipped += 1;
      continue;
    }
    const inner = seg.stinger_od_in ?? fallbackInnerIn;
    const excess = seg.annular_excess ?? fallbackExcess;
    const length = Math.abs(seg.bottom_ft - seg.top_ft);
    const cap = annularCapacityBblPerFt(outer, inner);
    const bbl = length * cap * (1 + excess);
    total += bbl;
    rows.push({
      top_ft: seg.top_ft,
      bottom_ft: seg.bottom_ft,
      length_ft: length,
      outer_in: outer,
      inner_in: inner,
      cap_bbl_per_ft: Math.round(cap * 1e6) / 1e6,
      excess_used: excess,
      bbl: round3(bbl),
    });
  }
  return { totalBbl: total, segments: rows, skipped };
}

/** Per-sack rates by additive name; repeated names add up. */
export function additiveRates(additives: readonly RecipeAdditive[]): Record<string, number> {
  const rates: Record<string, number> = {};
  for (const additive of additives) {
    rates[additive.name] = (rates[additive.name] ?? 0) + additive.rate;
  }
  return rates;
}

export function additiveTotals(sacks: number, rates: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.entries(rates).map(([name, rate]) => [name, round3(sacks * rate)]));
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ============================================
// PER-STEP COMPUTATION
// ============================================

export function selectRecipe(step: Step, policy: ResolvedPolicy): CementRecipe | null {
  const { recipes, defaultRecipe } = policy.preferences;
  const cementClass = step.cement_class?.toUpperCase() ?? null;
  if (cementClass && recipes[cementClass]) return recipes[cementClass];
  return defaultRecipe;
}

interface IntervalPair {
  top_ft: number;
  bottom_ft: number;
}

function readInterval(value: unknown): IntervalPair | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('top_ft' in value) || !('bottom_ft' in value)) return null;
  const { top_ft, bottom_ft } = value;
  return typeof top_ft === 'number' && typeof bottom_ft === 'number' ? { top_ft, bottom_ft } : null;
}

function readSegments(step: Step): PlugSegment[] {
  const raw = step.details.segments;
  if (step.type !== 'cement_plug' || !Array.isArray(raw)) return [];
  const out: PlugSegment[] = [];
  for (const item of raw) {
    const parsed = plugSegmentSchema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

function slurryFromBbl(
  totalBbl: number,
  recipe: CementRecipe,
  explain: Record<string, number | string>
): StepMaterials['slurry'] {
  const sacks = sacksFromBbl(totalBbl, recipe.yield_ft3_per_sk);
  const rates = recipe.additives && recipe.additives.length > 0 ? additiveRates(recipe.additives) : null;
  return {
    ...(rates ? { additive_rates: rates, additives: additiveTotals(sacks, rates) } : {}),
    total_bbl: round3(totalBbl),
    ft3: round3(totalBbl * BBL_TO_FT3),
    sacks,
    water_bbl: round3(waterBblFromSacks(sacks, recipe.water_gal_per_sk)),
    yield_ft3_per_sk: recipe.yield_ft3_per_sk,
    recipe_id: recipe.id,
    explain: {
      ...explain,
      yield_ft3_per_sk: recipe.yield_ft3_per_sk,
      water_gal_per_sk: recipe.water_gal_per_sk,
      rounding_mode: 'ceil',
    },
  };
}

export interface MaterialsOptions {
  spacer?: { minBbl: number; multiple: number } | null;
  /** Balanced plugs only; omitted when the stinger bore is unknown. */
  displacement?: { stingerIdIn: number; marginBbl: number } | null;
}

/**
 * Compute slurry for one cement-bearing step with resolved geometry.
 * Returns a new step; the input is not modified.
 */
export function computeStepMaterials(
  step: Step,
  geometry: StepGeometry,
  recipe: CementRecipe,
  options: MaterialsOptions = {}
): Step {
  const annCap = annularCapacityBblPerFt(geometry.outerIn, geometry.innerIn);
  const geometryDetail = {
    context: geometry.context,
    outer_in: geometry.outerIn,
    inner_in: geometry.innerIn,
    annular_capacity_bbl_per_ft: Math.round(annCap * 1e6) / 1e6,
  };
  const fluids: Record<string, number> = {};
  let slurry: StepMaterials['slurry'];
  let details = { ...step.details };

  const squeezeInterval = readInterval(step.details.squeeze_interval);
  if ((step.type === 'perforate_and_squeeze_plug' || step.type === 'squeeze') && squeezeInterval) {
    const intervalFt = squeezeInterval.bottom_ft - squeezeInterval.top_ft;
    const capLength = typeof step.details.cap_length_ft === 'number' ? step.details.cap_length_ft : 0;
    const factor = squeezeFactor(geometry.context);
    const volumes = squeezeVolumes(intervalFt, capLength, annCap, factor);
    slurry = {
      ...slurryFromBbl(volumes.total_bbl, recipe, {
        interval_ft: intervalFt,
        cap_length_ft: capLength,
        squeeze_factor: factor,
        cap_excess: CAP_EXCESS,
      }),
      squeeze_bbl: round3(volumes.squeeze_bbl),
      cap_bbl: round3(volumes.cap_bbl),
    };
    if (options.spacer) {
      fluids.spacer_bbl = round3(spacerBbl(intervalFt, annCap, options.spacer.minBbl, options.spacer.multiple));
    }
    details = { ...details, geometry_for_squeeze: geometryDetail };
  } else {
    const top = step.top_ft ?? 0;
    const bottom = step.bottom_ft ?? top;
    const intervalFt = Math.abs(bottom - top);
    const segments = readSegments(step);

    if (segments.length > 0) {
      const integrated = integrateSegments(segments, geometry.innerIn, geometry.annularExcess);
      slurry = {
        ...slurryFromBbl(integrated.totalBbl, recipe, {
          interval_ft: intervalFt,
          base_excess: geometry.annularExcess,
          segment_count: integrated.segments.length,
          segments_skipped: integrated.skipped,
        }),
        segments: integrated.segments,
      };
    } else {
      const excess = depthScaledExcess(geometry.annularExcess, (top + bottom) / 2);
      const total = plugVolumeBbl(intervalFt, annCap, excess);
      slurry = slurryFromBbl(total, recipe, {
        interval_ft: intervalFt,
        base_excess: geometry.annularExcess,
        excess_used: round3(excess),
      });
    }

    if (options.displacement) {
      const { stingerIdIn, marginBbl } = options.displacement;
      fluids.displacement_bbl = round3(
        balancedDisplacementBbl(intervalFt, cylinderCapacityBblPerFt(stingerIdIn), marginBbl)
      );
    }
    details = { ...details, geometry: geometryDetail };
  }

  return {
    ...step,
    sacks: slurry.sacks ?? null,
    details,
    materials: { slurry, fluids },
  };
}

// ============================================
// PLAN-LEVEL PASSES
// ============================================

export interface MaterialsPassResult {
  steps: Step[];
  violations: Violation[];
}

/**
 * Compute materials for every cement-bearing step. Steps with a manual
 * sack override keep it; steps missing geometry or a recipe get
 * `sacks = null` and a warning.
 */
export function computePlanMaterials(steps: Step[], well: WellFacts, policy: ResolvedPolicy): MaterialsPassResult {
  const violations: Violation[] = [];

  const out = steps.map((step): Step => {
    if (!isCementBearing(step.type)) return step;

    if (step.details.materials_override === true) {
      return { ...step, materials: { slurry: { sacks: step.sacks }, fluids: {} } };
    }

    const recipe = selectRecipe(step, policy);
    if (!recipe) {
      violations.push(
        makeViolation(ViolationCodes.RECIPE_MISSING, 'warning', `No cement recipe for class ${step.cement_class ?? 'unknown'}`, {
          context: { step_type: step.type, cement_class: step.cement_class },
        })
      );
      return { ...step, sacks: null, materials: { slurry: { sacks: null }, fluids: {} } };
    }

    const resolved = resolveStepGeometry(step, well, policy);
    if (!resolved.ok) {
      violations.push(
        makeViolation(
          ViolationCodes.GEOMETRY_MISSING,
          'warning',
          `${step.type} at ${step.top_ft ?? '?'}ft is missing ${resolved.missing.join(', ')}; sacks not computed`,
          { context: { step_type: step.type, top_ft: step.top_ft, missing: resolved.missing } }
        )
      );
      return {
        ...step,
        sacks: null,
        details: { ...step.details, geometry_missing: resolved.missing },
        materials: { slurry: { sacks: null }, fluids: {} },
      };
    }

    const stingerIdIn = stingerIdFor(step, policy);
    return computeStepMaterials(step, resolved.geometry, recipe, {
      spacer: policy.preferences.spacer,
      displacement:
        stingerIdIn !== null ? { stingerIdIn, marginBbl: policy.preferences.displacementMarginBbl } : null,
    });
  });

  return { steps: out, violations };
}

export function isSackFloorExempt(step: Step): boolean {
  return SACK_FLOOR_EXEMPT.has(step.type) || step.details.materials_override === true;
}

/**
 * Raise computed sack counts below the minimum to exactly the minimum.
 */
export function applyMinimumSackFloor(steps: Step[], minimumSacks: number = MINIMUM_SACKS): Step[] {
  return steps.map((step) => {
    if (!isCementBearing(step.type) || isSackFloorExempt(step)) return step;
    if (step.sacks === null || step.sacks >= minimumSacks) return step;

    const waterGal = step.materials.slurry.explain?.water_gal_per_sk;
    const rates = step.materials.slurry.additive_rates;
    const slurry = {
      ...step.materials.slurry,
      sacks: minimumSacks,
      ...(typeof waterGal === 'number' ? { water_bbl: round3(waterBblFromSacks(minimumSacks, waterGal)) } : {}),
      ...(rates ? { additives: additiveTotals(minimumSacks, rates) } : {}),
    };
    return {
      ...step,
      sacks: minimumSacks,
      details: {
        ...step.details,
        texas_25_sack_minimum_applied: true,
        original_calculated_sacks: step.sacks,
      },
      materials: { ...step.materials, slurry },
    };
  });
}
