/**
 * Depth-anchored isolation plugs: packer / DV tool isolation and
 * district formation-top plugs.
 */

import type { Step } from '@shared/schema';
import { makeViolation, ViolationCodes } from '../violations';
import { findFormationTop } from './facts';
import { districtCitation, isCementBearing, makeStep, spans, type StepRule } from './types';

export const toolIsolationRule: StepRule = (ctx, steps) => {
  const half = ctx.policy.requirements.toolIsolationHalfLengthFt;
  const tools: Array<{ tool: 'packer' | 'dv_tool'; depth: number | null }> = [
    { tool: 'packer', depth: ctx.well.packerFt },
    { tool: 'dv_tool', depth: ctx.well.dvToolFt },
  ];

  const out = [...steps];
  for (const { tool, depth } of tools) {
    if (depth === null) continue;
    if (out.some((s) => isCementBearing(s.type) && spans(s, depth))) continue;
    out.push(
      makeStep('mechanical_isolation_plug', Math.max(0, depth - half), depth + half, ['tx.tac.16.3.14(g)(2)'], {
        details: { tool, tool_depth_ft: depth },
      })
    );
  }
  return out;
};

export const formationTopRule: StepRule = (ctx, steps) => {
  const half = ctx.policy.requirements.formationPlugHalfLengthFt;
  const added: Step[] = [];

  for (const rule of ctx.policy.formationTops) {
    if (!rule.plugRequired) continue;

    const wellTop = findFormationTop(ctx.well, rule.formation);
    const topFt = wellTop?.topFt ?? rule.fallbackTopFt;
    if (topFt === null) {
      ctx.violations.push(
        makeViolation(
          ViolationCodes.FORMATION_TOP_UNKNOWN,
          'warning',
          `No top known for required formation ${rule.formation}`,
          { context: { formation: rule.formation } }
        )
      );
      continue;
    }

    added.push(
      makeStep(
        'formation_top_plug',
        Math.max(0, topFt - half),
        topFt + half,
        [districtCitation(ctx.policy, `formation_top:${rule.formation}`)],
        {
          formation: rule.formation,
          tag_required: rule.tagRequired,
          details: { formation_top_ft: topFt, top_source: wellTop ? 'well' : 'district_fallback' },
        }
      )
    );
  }
  return [...steps, ...added];
};
