/**
 * Plan Assembler
 *
 * Orders steps deepest first, numbers them, totals materials, builds the
 * filing-facing export rows and collects diagnostics. The returned plan is
 * deeply frozen.
 */

import type {
  EffectivePolicy,
  MaterialsTotals,
  Plan,
  PlannedStep,
  RrcExportRow,
  Step,
  StepType,
  Violation,
} from '@shared/schema';
import { isCementBearing } from './stepGenerator';
import type { WellFacts } from './stepGenerator';
import { makeViolation, ViolationCodes } from './violations';

export interface AssemblePlanInput {
  kernelVersion: string;
  policy: EffectivePolicy;
  well: WellFacts;
  steps: readonly Step[];
  violations: readonly Violation[];
  notes: readonly string[];
}

const EXPORT_LABELS: Partial<Record<StepType, string>> = {
  bridge_plug: 'CIBP',
  bridge_plug_cap: 'CIBP cap',
  cibp_cap: 'CIBP cap',
  cement_retainer: 'Cement retainer',
  perforate_and_squeeze_plug: 'Perf & squeeze',
  squeeze: 'Squeeze',
  perf_circulate: 'Perf & circulate',
  casing_cut: 'Cut casing',
};

export function exportLabel(type: StepType): string {
  return EXPORT_LABELS[type] ?? 'Cement plug';
}

// ============================================
// ORDERING
// ============================================

function depthKey(step: Step): number {
  return step.bottom_ft ?? step.top_ft ?? -Infinity;
}

/**
 * Deepest first by bottom (or top for point devices); ties by type, then
 * deeper top first.
 */
export function compareStepsByDepth(a: Step, b: Step): number {
  return (
    depthKey(b) - depthKey(a) ||
    a.type.localeCompare(b.type) ||
    (b.top_ft ?? -Infinity) - (a.top_ft ?? -Infinity)
  );
}

// ============================================
// EXPORT ROWS
// ============================================

function waitHours(step: Step): number | null {
  const verification = step.details.verification;
  if (typeof verification === 'object' && verification !== null && 'required_wait_hr' in verification) {
    return typeof verification.required_wait_hr === 'number' ? verification.required_wait_hr : null;
  }
  return null;
}

function additionalOperations(step: Step): string[] | null {
  const ops: string[] = [];
  switch (step.type) {
    case 'perforate_and_squeeze_plug':
      ops.push('perforate', 'squeeze', 'cap');
      break;
    case 'squeeze':
      ops.push('squeeze');
      break;
    case 'perf_circulate':
      ops.push('perforate', 'circulate');
      break;
    default:
      break;
  }
  if (step.tag_required) ops.push('wait_and_tag');
  return ops.length > 0 ? ops : null;
}

function remarks(step: Step): string | null {
  const parts: string[] = [];
  if (step.formation) parts.push(`Formation: ${step.formation}`);
  if (step.details.existing_cibp === true) parts.push('Cap on existing CIBP');
  if (step.details.texas_25_sack_minimum_applied === true) parts.push('25 sack minimum applied');
  if (step.special_instructions) parts.push(step.special_instructions);
  return parts.length > 0 ? parts.join('; ') : null;
}

function exportRow(step: PlannedStep, plugNo: number): RrcExportRow {
  return {
    plug_no: plugNo,
    step_id: step.step_id,
    type: exportLabel(step.type),
    regulatory_purpose: step.type,
    from_ft: step.bottom_ft ?? step.top_ft,
    to_ft: step.top_ft,
    sacks: step.sacks,
    cement_class: step.cement_class,
    wait_hours: waitHours(step),
    tag_required: step.tag_required,
    toc_ft: isCementBearing(step.type) ? step.top_ft : null,
    additional: additionalOperations(step),
    remarks: remarks(step),
  };
}

// ============================================
// DIAGNOSTICS
// ============================================

function overlapViolations(steps: readonly PlannedStep[]): Violation[] {
  const intervals = steps.filter(
    (s) => isCementBearing(s.type) && s.top_ft !== null && s.bottom_ft !== null && s.bottom_ft > s.top_ft
  );
  const out: Violation[] = [];
  for (let i = 0; i < intervals.length; i++) {
    for (let j = i + 1; j < intervals.length; j++) {
      const a = intervals[i];
      const b = intervals[j];
      if (a.top_ft === null || a.bottom_ft === null || b.top_ft === null || b.bottom_ft === null) continue;
      if (a.top_ft < b.bottom_ft && b.top_ft < a.bottom_ft) {
        out.push(
          makeViolation(
            ViolationCodes.STEP_INTERVAL_OVERLAP,
            'warning',
            `Step ${a.step_id} (${a.type}) overlaps step ${b.step_id} (${b.type})`,
            { context: { step_ids: [a.step_id, b.step_id] } }
          )
        );
      }
    }
  }
  return out;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function materialsTotals(steps: readonly PlannedStep[]): MaterialsTotals {
  let sacks = 0;
  let bbl = 0;
  for (const step of steps) {
    sacks += step.sacks ?? 0;
    bbl += step.materials.slurry.total_bbl ?? 0;
  }
  return { total_sacks: sacks, total_bbl: round3(bbl) };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ============================================
// MAIN API
// ============================================

export function assemblePlan(input: AssemblePlanInput): Plan {
  const { policy, well } = input;

  const steps: PlannedStep[] = [...input.steps]
    .sort(compareStepsByDepth)
    .map((step, index) => ({ step_id: index + 1, ...step }));

  const violations: Violation[] = [];
  if (!policy.complete) {
    violations.push(
      makeViolation(
        ViolationCodes.POLICY_INCOMPLETE,
        'error',
        'Effective policy is incomplete; required knobs are missing',
        { context: { missing: [...policy.incomplete_reasons] } }
      )
    );
  }
  violations.push(...input.violations, ...overlapViolations(steps));

  const formationsTargeted = [
    ...new Set(steps.flatMap((s) => (s.type === 'formation_top_plug' && s.formation ? [s.formation] : []))),
  ];

  const notes = [...input.notes];
  if (well.dvToolFt !== null) {
    notes.push(`DV tool at ${well.dvToolFt} ft`);
  }

  return deepFreeze({
    kernel_version: input.kernelVersion,
    policy_id: policy.policy_id,
    policy_version: policy.policy_version,
    jurisdiction: policy.jurisdiction,
    form: policy.form,
    api14: well.api14,
    district: policy.district,
    county: policy.county,
    field: policy.field,
    field_resolution: { ...policy.field_resolution },
    policy_complete: policy.complete,
    steps,
    violations,
    materials_totals: materialsTotals(steps),
    rrc_export: steps.map((step, index) => exportRow(step, index + 1)),
    formations_targeted: formationsTargeted,
    formation_tops_detected: well.formationTops.map((t) => t.name),
    plan_notes: notes,
  });
}
