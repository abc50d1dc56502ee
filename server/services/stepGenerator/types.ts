import type { FactsMap, Step, StepType, Violation } from '@shared/schema';
import type { ResolvedPolicy } from '../policyKnobs';
import type { WellFacts } from './facts';

export interface GeneratorContext {
  facts: FactsMap;
  well: WellFacts;
  policy: ResolvedPolicy;
  violations: Violation[];
  notes: string[];
}

/**
 * One regulatory rule. Receives the steps produced so far and returns the
 * next list; rules may push diagnostics onto the context.
 */
export type StepRule = (ctx: GeneratorContext, steps: Step[]) => Step[];

export interface GeneratedSteps {
  steps: Step[];
  violations: Violation[];
  notes: string[];
}

// ============================================
// STEP HELPERS
// ============================================

const NON_CEMENT_TYPES: ReadonlySet<StepType> = new Set<StepType>([
  'casing_cut',
  'bridge_plug',
  'cement_retainer',
  'perf_circulate',
]);

export function isCementBearing(type: StepType): boolean {
  return !NON_CEMENT_TYPES.has(type);
}

export const SQUEEZE_TYPES: ReadonlySet<StepType> = new Set<StepType>([
  'perforate_and_squeeze_plug',
  'squeeze',
]);

export const CAP_TYPES: ReadonlySet<StepType> = new Set<StepType>(['bridge_plug_cap', 'cibp_cap']);

export function makeStep(
  type: StepType,
  topFt: number | null,
  bottomFt: number | null,
  regulatoryBasis: string[],
  extra: Partial<Pick<Step, 'formation' | 'tag_required' | 'details' | 'sacks' | 'special_instructions'>> = {}
): Step {
  return {
    type,
    top_ft: topFt,
    bottom_ft: bottomFt,
    cement_class: null,
    sacks: extra.sacks ?? null,
    regulatory_basis: regulatoryBasis,
    tag_required: extra.tag_required ?? false,
    ...(extra.formation !== undefined ? { formation: extra.formation } : {}),
    ...(extra.special_instructions !== undefined ? { special_instructions: extra.special_instructions } : {}),
    details: extra.details ?? {},
    materials: { slurry: {}, fluids: {} },
  };
}

/** Fallback citation when a knob carries none. */
export function citationsOr(citations: string[], fallback: string): string[] {
  return citations.length > 0 ? [...citations] : [fallback];
}

export function spans(step: Step, depthFt: number): boolean {
  if (step.top_ft === null) return false;
  const bottom = step.bottom_ft ?? step.top_ft;
  return step.top_ft <= depthFt && depthFt <= bottom;
}

export function containedIn(inner: Step, outer: Step): boolean {
  if (inner.top_ft === null || inner.bottom_ft === null) return false;
  if (outer.top_ft === null || outer.bottom_ft === null) return false;
  return outer.top_ft <= inner.top_ft && inner.bottom_ft <= outer.bottom_ft;
}

export function midpointFt(step: Step): number | null {
  if (step.top_ft === null) return step.bottom_ft;
  if (step.bottom_ft === null) return step.top_ft;
  return (step.top_ft + step.bottom_ft) / 2;
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * District-scoped citation key: `rrc.district.08a.andrews:formation_top:San Andres`.
 */
export function districtCitation(policy: ResolvedPolicy, suffix: string): string {
  const district = policy.district ?? 'unknown';
  const county = policy.county ? policy.county.trim().toLowerCase() : 'unknown';
  return `rrc.district.${district}.${county}:${suffix}`;
}
