/**
 * Annular-gap perforate-and-squeeze detector.
 *
 * Each uncemented gap that requires isolation gets a squeeze behind pipe,
 * centered in the gap and capped in length, with a cement cap directly
 * above the squeeze.
 */

import type { AnnularGap } from '@shared/schema';
import { isOpenHoleAt } from '../wellGeometry';
import { blockedByExistingCibp } from './barriers';
import { makeStep, type StepRule } from './types';

export const annularGapRule: StepRule = (ctx, steps) => {
  const { requirements } = ctx.policy;
  const maxSqueeze = requirements.squeezeIntervalMaxFt;
  const capLength = requirements.squeezeCapLengthFt;
  const out = [...steps];

  const gaps = ctx.well.annularGaps.filter((g: AnnularGap) => g.requires_isolation && !g.cement_present);
  for (const gap of gaps) {
    const top = Math.min(gap.top_ft, gap.bottom_ft);
    const bottom = Math.max(gap.top_ft, gap.bottom_ft);
    const squeezeLength = Math.min(bottom - top, maxSqueeze);
    const squeezeTop = (top + bottom) / 2 - squeezeLength / 2;
    const squeezeBottom = squeezeTop + squeezeLength;
    const capTop = Math.max(0, squeezeTop - capLength);
    const context = isOpenHoleAt(ctx.well, squeezeBottom) ? 'open_hole' : 'cased';

    const step = makeStep('perforate_and_squeeze_plug', capTop, squeezeBottom, ['tx.tac.16.3.14(g)(2)'], {
      details: {
        context,
        gap_interval: { top_ft: top, bottom_ft: bottom },
        squeeze_interval: { top_ft: squeezeTop, bottom_ft: squeezeBottom },
        cap_interval: { top_ft: capTop, bottom_ft: squeezeTop },
        cap_length_ft: squeezeTop - capTop,
        ...(gap.description ? { gap_description: gap.description } : {}),
      },
    });
    if (!blockedByExistingCibp(ctx, step)) {
      out.push(step);
    }
  }
  return out;
};
