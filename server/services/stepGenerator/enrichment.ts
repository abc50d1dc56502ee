/**
 * Late pipeline stages that refine already-planned steps.
 */

import type { Step, StepType } from '@shared/schema';
import {
  CAP_TYPES,
  SQUEEZE_TYPES,
  containedIn,
  districtCitation,
  isCementBearing,
  midpointFt,
  type GeneratorContext,
  type StepRule,
} from './types';

const SUPPRESSIBLE_TYPES: ReadonlySet<StepType> = new Set<StepType>([
  'formation_top_plug',
  'cement_plug',
  'mechanical_isolation_plug',
]);

/**
 * Drop formation/cement plugs lying fully inside a squeeze or cap interval.
 */
export const overlapSuppressionRule: StepRule = (ctx, steps) => {
  const covers = steps.filter((s) => SQUEEZE_TYPES.has(s.type) || CAP_TYPES.has(s.type));
  return steps.filter((step) => {
    if (!SUPPRESSIBLE_TYPES.has(step.type)) return true;
    const cover = covers.find((c) => containedIn(step, c));
    if (!cover) return true;
    ctx.notes.push(
      `${step.type} ${step.top_ft}-${step.bottom_ft} ft suppressed; covered by ${cover.type} ${cover.top_ft}-${cover.bottom_ft} ft`
    );
    return false;
  });
};

export const taggingRule: StepRule = (ctx, steps) => {
  const { policy } = ctx;
  const requiredTypes = new Set(policy.tagging.requiredStepTypes);
  const waitHours = policy.requirements.tagWaitHours;

  return steps.map((step) => {
    const basis = [...step.regulatory_basis];
    let tag = step.tag_required || requiredTypes.has(step.type);

    if (step.type === 'surface_casing_shoe_plug') {
      if (policy.tagging.surfaceShoeInOpenHole) {
        tag = true;
        basis.push(districtCitation(policy, 'tag.surface_shoe_in_oh'));
      }
      if (policy.protectIntervals) {
        tag = true;
        basis.push(districtCitation(policy, 'protect_intervals'));
      }
      if (policy.enhancedRecoveryZone) {
        tag = true;
        basis.push(districtCitation(policy, 'enhanced_recovery_zone'));
      }
    }

    if (!tag) return step;
    return {
      ...step,
      tag_required: true,
      regulatory_basis: basis,
      details: { ...step.details, verification: { action: 'TAG', required_wait_hr: waitHours } },
    };
  });
};

/**
 * District operational requirements rendered as field instructions.
 */
export function operationalInstructions(ctx: GeneratorContext): string[] {
  const { requirements, preferences } = ctx.policy;
  const op = preferences.operational;
  const parts: string[] = [];
  if (requirements.pumpThroughTubingOnly) parts.push('Pump via tubing/drill pipe only');
  if (op.noticeHoursMin !== null) parts.push(`Give district notice >= ${op.noticeHoursMin}h before plugs`);
  if (op.mudMinWeightPpg !== null) parts.push(`Mud >= ${op.mudMinWeightPpg} ppg`);
  if (op.funnelMinS !== null) parts.push(`Funnel >= ${op.funnelMinS} s`);
  return parts;
}

export const operationalRule: StepRule = (ctx, steps) => {
  const parts = operationalInstructions(ctx);
  if (parts.length === 0) return steps;
  const joined = parts.join('; ');

  return steps.map((step) => {
    if (!isCementBearing(step.type)) return step;
    const existing = step.special_instructions;
    return { ...step, special_instructions: existing ? `${existing}; ${joined}` : joined };
  });
};

export function selectCementClass(step: Step, cutoffFt: number | null, shallow: string | null, deep: string | null): string | null {
  const mid = midpointFt(step);
  if (cutoffFt === null || mid === null) return shallow ?? deep;
  return mid <= cutoffFt ? shallow : deep;
}

export const cementClassRule: StepRule = (ctx, steps) => {
  const { cutoffFt, shallowClass, deepClass } = ctx.policy.cementClass;
  return steps.map((step) =>
    isCementBearing(step.type)
      ? { ...step, cement_class: selectCementClass(step, cutoffFt, shallowClass, deepClass) }
      : step
  );
};

export const citationDedupRule: StepRule = (_ctx, steps) =>
  steps.map((step) => ({ ...step, regulatory_basis: [...new Set(step.regulatory_basis)] }));
