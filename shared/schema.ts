import { z } from "zod";

// ============================================
// JSON-LIKE POLICY TREES
// ============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type PolicyTree = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const policyTreeSchema: z.ZodType<PolicyTree> = z.record(jsonValueSchema);

export function isPolicyTree(value: unknown): value is PolicyTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================
// POLICY PACK
// ============================================

export const policyPackSchema = z.object({
  policy_id: z.string(),
  policy_version: z.union([z.string(), z.number()]).transform(String),
  jurisdiction: z.string().optional(),
  form: z.string().optional(),
  effective_from: z.union([z.string(), z.date()]).transform(String).optional(),
  base: policyTreeSchema,
  district_overlays: z.record(policyTreeSchema).default({}),
  county_overlays: z.record(policyTreeSchema).default({}),
  field_overlays: z.record(policyTreeSchema).default({}),
});

export type PolicyPack = z.infer<typeof policyPackSchema>;

export const countyCentroidSchema = z.object({
  county: z.string(),
  latitude: z.number(),
  longitude: z.number(),
});

export type CountyCentroid = z.infer<typeof countyCentroidSchema>;

export const countyCentroidTableSchema = z.array(countyCentroidSchema);

// ============================================
// EFFECTIVE POLICY
// ============================================

export type FieldResolutionMethod =
  | "exact_in_county"
  | "nearest_county"
  | "nearest_county_occurrence"
  | "none";

export interface FieldResolution {
  method: FieldResolutionMethod;
  requested_field: string | null;
  matched_field: string | null;
  matched_in_county: string | null;
  nearest_distance_km: number | null;
}

export interface EffectivePolicy {
  policy_id: string;
  policy_version: string;
  jurisdiction: string | null;
  form: string | null;
  base: PolicyTree;
  effective: PolicyTree;
  district: string | null;
  county: string | null;
  field: string | null;
  field_resolution: FieldResolution;
  complete: boolean;
  incomplete_reasons: string[];
}

// ============================================
// FACTS
// ============================================

/** Facts arrive either wrapped as `{value, units, source, confidence}` or as bare values. */
export const factsMapSchema = z.record(z.unknown());

export type FactsMap = Readonly<Record<string, unknown>>;

const depthIntervalSchema = z.object({
  top_ft: z.coerce.number(),
  bottom_ft: z.coerce.number(),
});

export const producingIntervalSchema = depthIntervalSchema.extend({
  kind: z.enum(["producing", "injection", "disposal", "perforation"]).default("producing"),
  formation: z.string().optional(),
});

export type ProducingInterval = z.infer<typeof producingIntervalSchema>;

export const annularGapSchema = depthIntervalSchema.extend({
  requires_isolation: z.boolean().default(false),
  cement_present: z.boolean().default(false),
  description: z.string().optional(),
  outer_string: z.string().optional(),
  inner_string: z.string().optional(),
});

export type AnnularGap = z.infer<typeof annularGapSchema>;

export const casingStringSchema = z.object({
  kind: z.enum(["surface", "intermediate", "production", "liner"]),
  od_in: z.coerce.number(),
  id_in: z.coerce.number().optional(),
  top_ft: z.coerce.number().default(0),
  bottom_ft: z.coerce.number(),
  hole_size_in: z.coerce.number().optional(),
});

export type CasingString = z.infer<typeof casingStringSchema>;

export const kopSchema = z.object({
  kop_md_ft: z.coerce.number().nullable().optional(),
  kop_tvd_ft: z.coerce.number().nullable().optional(),
});

// ============================================
// CEMENT RECIPES
// ============================================

export const recipeAdditiveSchema = z.object({
  name: z.string().min(1),
  /** Amount per sack, in the additive's own unit. */
  rate: z.coerce.number().nonnegative(),
  unit: z.string().optional(),
});

export type RecipeAdditive = z.infer<typeof recipeAdditiveSchema>;

export const cementRecipeSchema = z.object({
  id: z.string().default("unknown"),
  class: z.string().default(""),
  density_ppg: z.coerce.number().default(0),
  yield_ft3_per_sk: z.coerce.number().positive(),
  water_gal_per_sk: z.coerce.number().default(0),
  additives: z.array(recipeAdditiveSchema).optional(),
});

export type CementRecipe = z.infer<typeof cementRecipeSchema>;

/**
 * One piece of a cement plug whose annulus changes with depth, e.g. a plug
 * spanning a casing shoe into open hole.
 */
export const plugSegmentSchema = z.object({
  top_ft: z.coerce.number(),
  bottom_ft: z.coerce.number(),
  casing_id_in: z.coerce.number().positive().optional(),
  hole_size_in: z.coerce.number().positive().optional(),
  hole_d_in: z.coerce.number().positive().optional(),
  stinger_od_in: z.coerce.number().nonnegative().optional(),
  annular_excess: z.coerce.number().nonnegative().optional(),
});

export type PlugSegment = z.infer<typeof plugSegmentSchema>;

// ============================================
// STEPS & PLAN
// ============================================

export type StepType =
  | "surface_casing_shoe_plug"
  | "intermediate_casing_shoe_plug"
  | "uqw_isolation_plug"
  | "productive_horizon_isolation_plug"
  | "top_plug"
  | "casing_cut"
  | "bridge_plug"
  | "bridge_plug_cap"
  | "cibp_cap"
  | "cement_retainer"
  | "perforate_and_squeeze_plug"
  | "squeeze"
  | "perf_circulate"
  | "mechanical_isolation_plug"
  | "formation_top_plug"
  | "cement_plug";

export interface SlurryMaterials {
  total_bbl?: number;
  squeeze_bbl?: number;
  cap_bbl?: number;
  ft3?: number;
  sacks?: number | null;
  water_bbl?: number;
  yield_ft3_per_sk?: number;
  recipe_id?: string;
  /** Per-sack additive rates and their totals for `sacks`. */
  additive_rates?: Record<string, number>;
  additives?: Record<string, number>;
  segments?: SegmentVolume[];
  explain?: Record<string, number | string>;
}

export interface SegmentVolume {
  top_ft: number;
  bottom_ft: number;
  length_ft: number;
  outer_in: number;
  inner_in: number;
  cap_bbl_per_ft: number;
  excess_used: number;
  bbl: number;
}

export interface StepMaterials {
  slurry: SlurryMaterials;
  fluids: Record<string, number>;
}

export type StepDetails = Record<string, unknown>;

export interface Step {
  type: StepType;
  top_ft: number | null;
  bottom_ft: number | null;
  cement_class: string | null;
  sacks: number | null;
  regulatory_basis: string[];
  tag_required: boolean;
  formation?: string;
  special_instructions?: string;
  details: StepDetails;
  materials: StepMaterials;
}

export interface PlannedStep extends Step {
  step_id: number;
}

export type ViolationSeverity = "error" | "warning" | "info";

export interface Violation {
  severity: ViolationSeverity;
  rule_id: string;
  message: string;
  context: Record<string, unknown>;
  citations: string[];
}

export interface MaterialsTotals {
  total_sacks: number;
  total_bbl: number;
}

export interface RrcExportRow {
  plug_no: number;
  step_id: number;
  type: string;
  regulatory_purpose: StepType;
  from_ft: number | null;
  to_ft: number | null;
  sacks: number | null;
  cement_class: string | null;
  wait_hours: number | null;
  tag_required: boolean;
  toc_ft: number | null;
  additional: string[] | null;
  remarks: string | null;
}

export interface Plan {
  kernel_version: string;
  policy_id: string;
  policy_version: string;
  jurisdiction: string | null;
  form: string | null;
  api14: string | null;
  district: string | null;
  county: string | null;
  field: string | null;
  field_resolution: FieldResolution;
  policy_complete: boolean;
  steps: PlannedStep[];
  violations: Violation[];
  materials_totals: MaterialsTotals;
  rrc_export: RrcExportRow[];
  formations_targeted: string[];
  formation_tops_detected: string[];
  plan_notes: string[];
}

// ============================================
// API INPUT SCHEMAS
// ============================================

export const planPreviewRequestSchema = z.object({
  facts: factsMapSchema,
  district: z.string().min(1).optional(),
  county: z.string().min(1).optional(),
  field: z.string().min(1).optional(),
  options: z
    .object({
      merge_adjacent: z.boolean().optional(),
      merge_threshold_ft: z.number().nonnegative().optional(),
    })
    .optional(),
});

export type PlanPreviewRequest = z.infer<typeof planPreviewRequestSchema>;

export const effectivePolicyQuerySchema = z.object({
  district: z.string().min(1).optional(),
  county: z.string().min(1).optional(),
  field: z.string().min(1).optional(),
});

export type EffectivePolicyQuery = z.infer<typeof effectivePolicyQuerySchema>;
