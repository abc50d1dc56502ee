/**
 * Typed policy view.
 *
 * The merged effective tree stays JSON-like through resolution; this module
 * turns it into the strict structure the step generator and materials engine
 * read, applying the documented defaults. Malformed entries are dropped
 * rather than thrown, since a per-well plan must always be produced.
 */

import { z } from 'zod';
import {
  cementRecipeSchema,
  isPolicyTree,
  plugSegmentSchema,
  type CementRecipe,
  type EffectivePolicy,
  type JsonValue,
  type PlugSegment,
  type PolicyTree,
} from '@shared/schema';
import { getSubtree } from './policyMerge';

export interface Knob<T> {
  value: T | null;
  citations: string[];
}

export interface FormationTopRule {
  formation: string;
  plugRequired: boolean;
  tagRequired: boolean;
  fallbackTopFt: number | null;
}

export interface IntervalOverride {
  top_ft: number;
  bottom_ft: number;
  citations: string[];
}

export interface SqueezeOverride extends IntervalOverride {
  sacksOverride: number | null;
}

export interface CementPlugOverride extends IntervalOverride {
  geometryContext: string | null;
  casingIdIn: number | null;
  stingerOdIn: number | null;
  holeSizeIn: number | null;
  annularExcess: number | null;
  segments: PlugSegment[];
}

export interface StepsOverrides {
  cibpCapLengthFt: number | null;
  squeezeViaPerf: SqueezeOverride | null;
  perfCirculate: IntervalOverride[];
  cementPlugs: CementPlugOverride[];
}

export interface GeometryValues {
  stingerOdIn: number | null;
  /** Work-string bore, for displacement behind balanced plugs. */
  stingerIdIn: number | null;
  casingIdIn: number | null;
  holeSizeIn: number | null;
  annularExcess: number | null;
}

export interface GeometryDefaults extends GeometryValues {
  /** Per step-type blocks, e.g. `geometry_defaults.squeeze.casing_id_in`. */
  byStepType: Record<string, GeometryValues>;
}

export interface SpacerPreference {
  minBbl: number;
  multiple: number;
}

export interface ResolvedPolicy {
  policyId: string;
  policyVersion: string;
  district: string | null;
  county: string | null;
  complete: boolean;
  requirements: {
    surfaceCasingShoePlugMinFt: Knob<number>;
    casingShoeCoverageFt: Knob<number>;
    duqwCoverageFt: Knob<number>;
    duqwIsolationRequired: Knob<boolean>;
    uqwIsolationMinLenFt: Knob<number>;
    uqwBelowBaseFt: Knob<number>;
    uqwAboveBaseFt: Knob<number>;
    cementAboveCibpMinFt: Knob<number>;
    productiveHorizonPlugLengthFt: Knob<number>;
    topPlugLengthFt: Knob<number>;
    casingCutBelowSurfaceFt: Knob<number>;
    squeezeIntervalMaxFt: number;
    squeezeCapLengthFt: number;
    formationPlugHalfLengthFt: number;
    toolIsolationHalfLengthFt: number;
    tagWaitHours: number;
    minimumSacks: number;
    pumpThroughTubingOnly: boolean;
  };
  cementClass: {
    cutoffFt: number | null;
    shallowClass: string | null;
    deepClass: string | null;
  };
  preferences: {
    annularExcess: number;
    recipes: Record<string, CementRecipe>;
    defaultRecipe: CementRecipe | null;
    geometryDefaults: GeometryDefaults;
    mergeAdjacentPlugs: { enabled: boolean; thresholdFt: number };
    spacer: SpacerPreference | null;
    displacementMarginBbl: number;
    operational: {
      noticeHoursMin: number | null;
      mudMinWeightPpg: number | null;
      funnelMinS: number | null;
    };
  };
  formationTops: FormationTopRule[];
  tagging: {
    requiredStepTypes: string[];
    surfaceShoeInOpenHole: boolean;
  };
  protectIntervals: boolean;
  enhancedRecoveryZone: boolean;
  stepsOverrides: StepsOverrides;
}

// ============================================
// KNOB READERS
// ============================================

function toNumber(value: JsonValue | undefined): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toStringList(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

/**
 * Knobs are either bare scalars or `{ value, citation_keys }`.
 */
export function readKnobRaw(tree: PolicyTree | null, key: string): Knob<JsonValue> {
  const raw = tree?.[key];
  if (isPolicyTree(raw)) {
    const value = raw.value;
    return {
      value: value === undefined || value === '' ? null : value,
      citations: toStringList(raw.citation_keys),
    };
  }
  return { value: raw === undefined || raw === '' ? null : raw, citations: [] };
}

export function readNumberKnob(tree: PolicyTree | null, key: string, fallback: number | null = null): Knob<number> {
  const knob = readKnobRaw(tree, key);
  return { value: toNumber(knob.value ?? undefined) ?? fallback, citations: knob.citations };
}

function readBooleanKnob(tree: PolicyTree | null, key: string): Knob<boolean> {
  const knob = readKnobRaw(tree, key);
  return { value: typeof knob.value === 'boolean' ? knob.value : null, citations: knob.citations };
}

function readNumber(tree: PolicyTree | null, key: string): number | null {
  return toNumber(tree?.[key]);
}

function readString(tree: PolicyTree | null, key: string): string | null {
  const value = tree?.[key];
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number') return String(value);
  return null;
}

// ============================================
// STRUCTURED SECTIONS
// ============================================

const formationTopSchema = z.object({
  formation: z.string().min(1),
  plug_required: z.boolean().default(true),
  tag_required: z.boolean().default(false),
  fallback_top_ft: z.coerce.number().nullable().optional(),
  top_ft: z.coerce.number().nullable().optional(),
});

const intervalOverrideSchema = z.object({
  top_ft: z.coerce.number(),
  bottom_ft: z.coerce.number(),
  citations: z.array(z.string()).default([]),
});

const cementPlugOverrideSchema = intervalOverrideSchema.extend({
  geometry_context: z.string().nullable().optional(),
  casing_id_in: z.coerce.number().nullable().optional(),
  stinger_od_in: z.coerce.number().nullable().optional(),
  hole_size_in: z.coerce.number().nullable().optional(),
  annular_excess: z.coerce.number().nullable().optional(),
  segments: z.array(plugSegmentSchema).default([]),
});

function parseList<T>(value: JsonValue | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  if (!Array.isArray(value)) return [];
  const out: T[] = [];
  for (const item of value) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

function parseRecipe(value: JsonValue | undefined, fallbackClass: string): CementRecipe | null {
  if (!isPolicyTree(value)) return null;
  const parsed = cementRecipeSchema.safeParse({ class: fallbackClass, ...value });
  return parsed.success ? parsed.data : null;
}

function parseRecipes(preferences: PolicyTree | null): Record<string, CementRecipe> {
  const recipes: Record<string, CementRecipe> = {};
  const section = preferences ? getSubtree(preferences, 'recipes') : null;
  for (const key of Object.keys(section ?? {}).sort()) {
    const recipe = parseRecipe(section?.[key], key);
    if (recipe) recipes[key.toUpperCase()] = recipe;
  }
  return recipes;
}

function parseFormationTops(value: JsonValue | undefined): FormationTopRule[] {
  return parseList(value, formationTopSchema).map((entry) => ({
    formation: entry.formation,
    plugRequired: entry.plug_required,
    tagRequired: entry.tag_required,
    fallbackTopFt: entry.fallback_top_ft ?? entry.top_ft ?? null,
  }));
}

function readGeometryValues(tree: PolicyTree | null): GeometryValues {
  return {
    stingerOdIn: readNumber(tree, 'stinger_od_in'),
    stingerIdIn: readNumber(tree, 'stinger_id_in'),
    casingIdIn: readNumber(tree, 'casing_id_in'),
    holeSizeIn: readNumber(tree, 'hole_size_in') ?? readNumber(tree, 'hole_d_in'),
    annularExcess: readNumber(tree, 'annular_excess'),
  };
}

function parseGeometryDefaults(tree: PolicyTree | null): GeometryDefaults {
  const byStepType: Record<string, GeometryValues> = {};
  for (const key of Object.keys(tree ?? {}).sort()) {
    const block = tree?.[key];
    if (isPolicyTree(block)) {
      byStepType[key] = readGeometryValues(block);
    }
  }
  return { ...readGeometryValues(tree), byStepType };
}

function parseSpacer(tree: PolicyTree | null): SpacerPreference | null {
  if (!tree) return null;
  return {
    minBbl: readNumber(tree, 'min_bbl') ?? 5,
    multiple: readNumber(tree, 'spacer_multiple') ?? 1.5,
  };
}

function parseStepsOverrides(tree: PolicyTree | null): StepsOverrides {
  const cibpCap = tree ? getSubtree(tree, 'cibp_cap') : null;
  const squeeze = tree ? getSubtree(tree, 'squeeze_via_perf') : null;

  let squeezeViaPerf: SqueezeOverride | null = null;
  const interval = squeeze?.interval_ft;
  if (Array.isArray(interval) && interval.length === 2) {
    const a = toNumber(interval[0]);
    const b = toNumber(interval[1]);
    if (a !== null && b !== null) {
      squeezeViaPerf = {
        top_ft: Math.min(a, b),
        bottom_ft: Math.max(a, b),
        citations: toStringList(squeeze?.citations),
        sacksOverride: readNumber(squeeze, 'sacks_override'),
      };
    }
  }

  return {
    cibpCapLengthFt: readNumber(cibpCap, 'cap_length_ft'),
    squeezeViaPerf,
    perfCirculate: parseList(tree?.perf_circulate, intervalOverrideSchema),
    cementPlugs: parseList(tree?.cement_plugs, cementPlugOverrideSchema).map((cp) => ({
      top_ft: cp.top_ft,
      bottom_ft: cp.bottom_ft,
      citations: cp.citations,
      geometryContext: cp.geometry_context ?? null,
      casingIdIn: cp.casing_id_in ?? null,
      stingerOdIn: cp.stinger_od_in ?? null,
      holeSizeIn: cp.hole_size_in ?? null,
      annularExcess: cp.annular_excess ?? null,
      segments: cp.segments,
    })),
  };
}

// ============================================
// MAIN API
// ============================================

/**
 * Materialize the typed view of an effective policy.
 */
export function materializePolicy(policy: EffectivePolicy): ResolvedPolicy {
  const tree = policy.effective;
  const req = getSubtree(tree, 'requirements');
  const cement = getSubtree(tree, 'cement_class');
  const prefs = getSubtree(tree, 'preferences');
  const geometry = prefs ? getSubtree(prefs, 'geometry_defaults') : null;
  const merge = prefs ? getSubtree(prefs, 'merge_adjacent_plugs') : null;
  const operational = prefs ? getSubtree(prefs, 'operational') : null;
  const tagging = getSubtree(tree, 'tagging');

  const tagWait = readNumberKnob(req, 'tag_wait_hours').value ?? readNumber(tagging, 'wait_hours') ?? 4;

  return {
    policyId: policy.policy_id,
    policyVersion: policy.policy_version,
    district: policy.district,
    county: policy.county,
    complete: policy.complete,
    requirements: {
      surfaceCasingShoePlugMinFt: readNumberKnob(req, 'surface_casing_shoe_plug_min_ft'),
      casingShoeCoverageFt: readNumberKnob(req, 'casing_shoe_coverage_ft'),
      duqwCoverageFt: readNumberKnob(req, 'duqw_coverage_ft'),
      duqwIsolationRequired: readBooleanKnob(req, 'duqw_isolation_required'),
      uqwIsolationMinLenFt: readNumberKnob(req, 'uqw_isolation_min_len_ft', 100),
      uqwBelowBaseFt: readNumberKnob(req, 'uqw_below_base_ft', 50),
      uqwAboveBaseFt: readNumberKnob(req, 'uqw_above_base_ft', 50),
      cementAboveCibpMinFt: readNumberKnob(req, 'cement_above_cibp_min_ft', 100),
      productiveHorizonPlugLengthFt: readNumberKnob(req, 'productive_horizon_plug_length_ft', 100),
      topPlugLengthFt: readNumberKnob(req, 'top_plug_length_ft', 10),
      casingCutBelowSurfaceFt: readNumberKnob(req, 'casing_cut_below_surface_ft', 3),
      squeezeIntervalMaxFt: readNumberKnob(req, 'squeeze_interval_max_ft').value ?? 100,
      squeezeCapLengthFt: readNumberKnob(req, 'squeeze_cap_length_ft').value ?? 50,
      formationPlugHalfLengthFt: readNumberKnob(req, 'formation_plug_half_length_ft').value ?? 50,
      toolIsolationHalfLengthFt: readNumberKnob(req, 'tool_isolation_half_length_ft').value ?? 50,
      tagWaitHours: tagWait,
      minimumSacks: readNumberKnob(req, 'minimum_sacks').value ?? 25,
      pumpThroughTubingOnly: readBooleanKnob(req, 'pump_through_tubing_or_drillpipe_only').value === true,
    },
    cementClass: {
      cutoffFt: readNumber(cement, 'cutoff_ft'),
      shallowClass: readString(cement, 'shallow_class'),
      deepClass: readString(cement, 'deep_class'),
    },
    preferences: {
      annularExcess: readNumber(prefs, 'annular_excess') ?? 0.4,
      recipes: parseRecipes(prefs),
      defaultRecipe: parseRecipe(prefs?.default_recipe, ''),
      geometryDefaults: parseGeometryDefaults(geometry),
      mergeAdjacentPlugs: {
        enabled: merge?.enabled === true,
        thresholdFt: readNumber(merge, 'threshold_ft') ?? 200,
      },
      spacer: parseSpacer(prefs ? getSubtree(prefs, 'spacer') : null),
      displacementMarginBbl: readNumber(prefs, 'displacement_margin_bbl') ?? 0,
      operational: {
        noticeHoursMin: readNumber(operational, 'notice_hours_min'),
        mudMinWeightPpg: readNumber(operational, 'mud_min_weight_ppg'),
        funnelMinS: readNumber(operational, 'funnel_min_s'),
      },
    },
    formationTops: parseFormationTops(tree.formation_tops),
    tagging: {
      requiredStepTypes: toStringList(tagging?.required_step_types),
      surfaceShoeInOpenHole: tagging?.surface_shoe_in_oh === true,
    },
    protectIntervals: Array.isArray(tree.protect_intervals) && tree.protect_intervals.length > 0,
    enhancedRecoveryZone: tree.enhanced_recovery_zone === true,
    stepsOverrides: parseStepsOverrides(getSubtree(tree, 'steps_overrides')),
  };
}
