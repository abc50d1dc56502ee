/**
 * Baseline scaffold: casing-shoe plugs, usable-water isolation, productive
 * horizon isolation, top plug and casing cut. Missing depths degrade to a
 * smaller scaffold plus a violation.
 */

import type { Step } from '@shared/schema';
import { makeViolation, ViolationCodes } from '../violations';
import type { WellFacts } from './facts';
import { citationsOr, makeStep, type GeneratorContext, type StepRule } from './types';

function centeredInterval(centerFt: number, lengthFt: number): [number, number] {
  const half = lengthFt / 2;
  const top = Math.max(0, centerFt - half);
  return [top, centerFt + half];
}

function surfaceShoePlug(ctx: GeneratorContext): Step | null {
  const { requirements } = ctx.policy;
  const shoeKnob = requirements.surfaceCasingShoePlugMinFt;
  const coverage = requirements.casingShoeCoverageFt;

  if (shoeKnob.value === null) {
    ctx.violations.push(
      makeViolation(ViolationCodes.MISSING_CITATION, 'warning', 'surface_casing_shoe_plug_min_ft missing', {
        citations: shoeKnob.citations,
      })
    );
    return null;
  }

  if (coverage.value !== null && shoeKnob.value < coverage.value) {
    ctx.violations.push(
      makeViolation(
        ViolationCodes.INSUFFICIENT_SHOE_COVERAGE,
        'warning',
        `Surface shoe plug ${shoeKnob.value}ft is below required coverage ${coverage.value}ft`,
        {
          context: { min_length_ft: shoeKnob.value, required_ft: coverage.value },
          citations: citationsOr(coverage.citations, 'tx.tac.16.3.14(e)(2)'),
        }
      )
    );
  }

  const shoe = ctx.well.surfaceShoeFt;
  if (shoe === null) {
    ctx.violations.push(
      makeViolation(
        ViolationCodes.SURFACE_SHOE_DEPTH_UNKNOWN,
        'error',
        'surface_shoe_ft is required to place the surface casing shoe plug'
      )
    );
    return null;
  }

  const [top, bottom] = centeredInterval(shoe, shoeKnob.value);
  return makeStep('surface_casing_shoe_plug', top, bottom, citationsOr(shoeKnob.citations, 'tx.tac.16.3.14(e)(2)'), {
    details: { shoe_ft: shoe, min_length_ft: shoeKnob.value },
  });
}

function intermediateShoePlug(ctx: GeneratorContext): Step | null {
  const shoe = ctx.well.intermediateShoeFt;
  if (shoe === null) return null;

  const coverage = ctx.policy.requirements.casingShoeCoverageFt;
  const length = coverage.value ?? 100;
  const [top, bottom] = centeredInterval(shoe, length);
  return makeStep('intermediate_casing_shoe_plug', top, bottom, citationsOr(coverage.citations, 'tx.tac.16.3.14(e)(2)'), {
    details: { shoe_ft: shoe, min_length_ft: length },
  });
}

function uqwIsolationPlug(ctx: GeneratorContext): Step | null {
  const { well } = ctx;
  const req = ctx.policy.requirements;
  if (!well.hasUqw) return null;

  const citations = [
    ...req.uqwIsolationMinLenFt.citations,
    ...req.uqwBelowBaseFt.citations,
    ...req.uqwAboveBaseFt.citations,
  ];
  const basis = citationsOr(citations, 'tx.tac.16.3.14(g)(1)');

  if (well.uqwBaseFt === null) {
    ctx.violations.push(
      makeViolation(ViolationCodes.UQW_BASE_UNKNOWN, 'warning', 'has_uqw is set but uqw_base_ft is unknown', {
        citations: basis,
      })
    );
    return null;
  }

  const above = req.uqwAboveBaseFt.value ?? 50;
  const below = req.uqwBelowBaseFt.value ?? 50;
  let minLength = req.uqwIsolationMinLenFt.value ?? 100;
  if (well.hasDuqw && req.duqwCoverageFt.value !== null) {
    minLength = Math.max(minLength, req.duqwCoverageFt.value);
    basis.push(...req.duqwCoverageFt.citations);
  }

  let top = well.uqwBaseFt - above;
  let bottom = well.uqwBaseFt + below;
  const deficit = minLength - (bottom - top);
  if (deficit > 0) {
    top -= deficit / 2;
    bottom += deficit / 2;
  }
  if (top < 0) {
    bottom -= top;
    top = 0;
  }

  return makeStep('uqw_isolation_plug', top, bottom, basis, {
    details: { uqw_base_ft: well.uqwBaseFt, above_ft: above, below_ft: below, min_length_ft: minLength },
  });
}

/**
 * Deepest-bottom producing/injection/disposal interval; falls back to the
 * deepest formation top.
 */
export function producingHorizon(well: WellFacts): { topFt: number; bottomFt: number; formation: string | null } | null {
  if (well.producingIntervals.length > 0) {
    const deepest = well.producingIntervals.reduce((best, iv) =>
      iv.bottom_ft > best.bottom_ft || (iv.bottom_ft === best.bottom_ft && iv.top_ft < best.top_ft) ? iv : best
    );
    return { topFt: deepest.top_ft, bottomFt: deepest.bottom_ft, formation: deepest.formation ?? null };
  }
  const last = well.formationTops[well.formationTops.length - 1];
  return last ? { topFt: last.topFt, bottomFt: last.topFt, formation: last.name } : null;
}

function productiveHorizonPlug(ctx: GeneratorContext): Step | null {
  const shoe = ctx.well.productionShoeFt;
  const horizon = producingHorizon(ctx.well);
  if (shoe === null || horizon === null || shoe <= horizon.bottomFt) return null;

  const knob = ctx.policy.requirements.productiveHorizonPlugLengthFt;
  const length = knob.value ?? 100;
  const [top, bottom] = centeredInterval(horizon.topFt, length);
  return makeStep(
    'productive_horizon_isolation_plug',
    top,
    bottom,
    citationsOr(knob.citations, 'tx.tac.16.3.14(k)'),
    {
      ...(horizon.formation ? { formation: horizon.formation } : {}),
      details: { producing_top_ft: horizon.topFt, production_shoe_ft: shoe },
    }
  );
}

function surfaceSteps(ctx: GeneratorContext): Step[] {
  const req = ctx.policy.requirements;
  const topLength = req.topPlugLengthFt.value ?? 10;
  const cutDepth = req.casingCutBelowSurfaceFt.value ?? 3;
  return [
    makeStep('top_plug', 0, topLength, citationsOr(req.topPlugLengthFt.citations, 'tx.tac.16.3.14(d)(8)'), {
      details: { min_length_ft: topLength },
    }),
    makeStep('casing_cut', cutDepth, null, citationsOr(req.casingCutBelowSurfaceFt.citations, 'tx.tac.16.3.14(d)(8)'), {
      details: { cut_below_surface_ft: cutDepth },
    }),
  ];
}

export const scaffoldRule: StepRule = (ctx, steps) => {
  const out = [...steps];
  for (const build of [surfaceShoePlug, intermediateShoePlug, uqwIsolationPlug, productiveHorizonPlug]) {
    const step = build(ctx);
    if (step) out.push(step);
  }

  const req = ctx.policy.requirements;
  if (
    req.duqwIsolationRequired.value === true &&
    ctx.well.hasDuqw &&
    !out.some((s) => s.type === 'uqw_isolation_plug')
  ) {
    ctx.violations.push(
      makeViolation(ViolationCodes.DUQW_ISOLATION_MISSING, 'error', 'DUQW present but UQW isolation plug not planned', {
        citations: citationsOr(req.duqwIsolationRequired.citations, 'tx.tac.16.3.14(g)(1)'),
      })
    );
  }

  out.push(...surfaceSteps(ctx));
  return out;
};
