/**
 * Mechanical barriers: gating around an existing CIBP and the new-CIBP
 * detector for producing intervals exposed below the production shoe.
 */

import type { Step, StepType } from '@shared/schema';
import { makeViolation, ViolationCodes } from '../violations';
import { casingIdAt } from '../wellGeometry';
import { hasExistingCibp } from './facts';
import { producingHorizon } from './scaffold';
import {
  CAP_TYPES,
  citationsOr,
  makeStep,
  round3,
  spans,
  type GeneratorContext,
  type StepRule,
} from './types';

const CIBP_CLEARANCE_FT = 10;
const KOP_CLEARANCE_FT = 50;
const CIBP_SIZE_CLEARANCE_IN = 0.25;

const GATED_TYPES: ReadonlySet<StepType> = new Set<StepType>([
  'perforate_and_squeeze_plug',
  'squeeze',
  'perf_circulate',
]);

function capCitations(ctx: GeneratorContext): string[] {
  return citationsOr(ctx.policy.requirements.cementAboveCibpMinFt.citations, 'tx.tac.16.3.14(g)(3)');
}

function capLengthFt(ctx: GeneratorContext): number {
  return ctx.policy.requirements.cementAboveCibpMinFt.value ?? 100;
}

/**
 * True (and reported) when a perforate/circulate/squeeze step would sit
 * below an existing CIBP. Later rules call this before adding such steps.
 */
export function blockedByExistingCibp(ctx: GeneratorContext, step: Step): boolean {
  if (!GATED_TYPES.has(step.type) || !hasExistingCibp(ctx.well)) return false;
  const cibp = ctx.well.existingCibpFt;
  if (cibp === null || step.top_ft === null || step.top_ft <= cibp) return false;

  ctx.violations.push(
    makeViolation(
      ViolationCodes.BELOW_CIBP,
      'warning',
      `${step.type} at ${step.top_ft}ft is below the existing CIBP at ${cibp}ft and was not planned`,
      { context: { step_type: step.type, top_ft: step.top_ft, bottom_ft: step.bottom_ft, cibp_ft: cibp } }
    )
  );
  return true;
}

export const mechanicalBarrierRule: StepRule = (ctx, steps) => {
  const cibp = ctx.well.existingCibpFt;
  if (!hasExistingCibp(ctx.well) || cibp === null) return steps;

  const out = steps.filter((step) => !blockedByExistingCibp(ctx, step));
  const capped = out.some((s) => CAP_TYPES.has(s.type) && s.top_ft === cibp);
  if (!capped) {
    const length = capLengthFt(ctx);
    out.push(
      makeStep('bridge_plug_cap', cibp, cibp + length, capCitations(ctx), {
        details: { existing_cibp: true, cibp_ft: cibp, cap_length_ft: length },
      })
    );
  }
  ctx.notes.push(`Existing CIBP at ${cibp} ft; cement cap verified`);
  return out;
};

export const cibpDetectorRule: StepRule = (ctx, steps) => {
  const { well } = ctx;
  const shoe = well.productionShoeFt;
  const horizon = producingHorizon(well);
  if (horizon === null) return steps;

  if (shoe === null) {
    ctx.violations.push(
      makeViolation(
        ViolationCodes.PRODUCTION_SHOE_UNKNOWN,
        'warning',
        'production_shoe_ft unknown; CIBP requirement could not be evaluated',
        { context: { producing_top_ft: horizon.topFt } }
      )
    );
    return steps;
  }

  if (horizon.bottomFt < shoe) return steps;

  const producingTop = horizon.topFt;
  const covered = steps.some((s) => GATED_TYPES.has(s.type) && spans(s, producingTop));
  if (covered) return steps;
  if (hasExistingCibp(well) && well.existingCibpFt !== null && well.existingCibpFt <= producingTop) {
    return steps;
  }

  // Shallowest wins between perforation and kick-off point placement
  let depth = producingTop - CIBP_CLEARANCE_FT;
  let placement = 'perforation';
  if (well.kopMdFt !== null && well.kopMdFt - KOP_CLEARANCE_FT < depth) {
    depth = well.kopMdFt - KOP_CLEARANCE_FT;
    placement = 'kop';
  }

  const casingId = casingIdAt(well, depth, ctx.policy);
  const length = capLengthFt(ctx);
  const citations = capCitations(ctx);

  return [
    ...steps,
    makeStep('bridge_plug', depth, null, citations, {
      details: {
        placement_basis: placement,
        producing_top_ft: producingTop,
        production_shoe_ft: shoe,
        ...(well.kopMdFt !== null ? { kop_md_ft: well.kopMdFt } : {}),
        recommended_cibp_size_in: casingId !== null ? round3(casingId - CIBP_SIZE_CLEARANCE_IN) : null,
      },
    }),
    makeStep('bridge_plug_cap', depth, depth + length, citations, {
      details: { cibp_ft: depth, cap_length_ft: length },
    }),
  ];
};
