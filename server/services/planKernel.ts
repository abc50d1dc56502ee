/**
 * Plan Kernel
 *
 * Entry point that turns well facts and a resolved effective policy into a
 * Plan:
 * 1. Materialize the typed policy view
 * 2. Generate steps
 * 3. Compute materials and apply the minimum-sack floor
 * 4. Optionally merge adjacent plugs (recomputing materials)
 * 5. Assemble
 *
 * Identical inputs always produce identical plans; no clock or random
 * values enter the output.
 */

import type { EffectivePolicy, FactsMap, Plan, Step } from '@shared/schema';
import { createLogger, logTiming } from '../lib/logger';
import { materializePolicy } from './policyKnobs';
import { applyMinimumSackFloor, computePlanMaterials } from './materialsEngine';
import { assemblePlan } from './planAssembler';
import { generateSteps, readWellFacts, selectCementClass } from './stepGenerator';
import { mergeAdjacentSteps } from './stepMerger';

const log = createLogger({ module: 'plan-kernel' });

export const KERNEL_VERSION = '1.0.0';

export interface CompileOptions {
  /** Defaults to `preferences.merge_adjacent_plugs.enabled`. */
  mergeAdjacent?: boolean;
  mergeThresholdFt?: number;
}

export function compilePlan(facts: FactsMap, effective: EffectivePolicy, options: CompileOptions = {}): Plan {
  const startTime = Date.now();
  const policy = materializePolicy(effective);
  const well = readWellFacts(facts);

  const generated = generateSteps(facts, policy, well);
  const materials = computePlanMaterials(generated.steps, well, policy);
  const minimumSacks = policy.requirements.minimumSacks;
  let steps: Step[] = applyMinimumSackFloor(materials.steps, minimumSacks);
  const violations = [...generated.violations, ...materials.violations];

  const mergeEnabled = options.mergeAdjacent ?? policy.preferences.mergeAdjacentPlugs.enabled;
  if (mergeEnabled) {
    const thresholdFt = options.mergeThresholdFt ?? policy.preferences.mergeAdjacentPlugs.thresholdFt;
    steps = mergeAdjacentSteps(steps, {
      thresholdFt,
      recompute: (step) => {
        // the merged interval may straddle the class cutoff
        const { cutoffFt, shallowClass, deepClass } = policy.cementClass;
        const reclassed = { ...step, cement_class: selectCementClass(step, cutoffFt, shallowClass, deepClass) };
        const recomputed = computePlanMaterials([reclassed], well, policy);
        violations.push(...recomputed.violations);
        return applyMinimumSackFloor(recomputed.steps, minimumSacks)[0];
      },
    });
  }

  const plan = assemblePlan({
    kernelVersion: KERNEL_VERSION,
    policy: effective,
    well,
    steps,
    violations,
    notes: generated.notes,
  });

  logTiming(log, 'compilePlan', startTime, {
    api14: plan.api14,
    district: plan.district,
    steps: plan.steps.length,
    violations: plan.violations.length,
  });
  return plan;
}

// ============================================
// HANDLER REGISTRY
// ============================================

export type PlanHandler = (facts: FactsMap, effective: EffectivePolicy, options?: CompileOptions) => Plan;

const handlers = new Map<string, PlanHandler>([['tx.w3a', compilePlan]]);

export function getPlanHandler(policyId: string): PlanHandler {
  return handlers.get(policyId) ?? compilePlan;
}

export function registerPlanHandler(policyId: string, handler: PlanHandler): void {
  handlers.set(policyId, handler);
}
