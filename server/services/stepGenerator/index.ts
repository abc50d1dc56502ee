/**
 * Step Generator
 *
 * Deterministic W-3A step synthesis. Each regulatory rule is an independent
 * stage `(ctx, steps) => steps`, composed in a fixed order:
 *
 * 1. Baseline scaffold (shoe plugs, UQW, productive horizon, top plug, cut)
 * 2. Existing-CIBP gating and cap
 * 3. New-CIBP detector
 * 4. Annular-gap perforate and squeeze
 * 5. Packer / DV tool isolation
 * 6. Formation-top plugs
 * 7. Explicit step overrides
 * 8. Overlap suppression
 * 9. Tagging
 * 10. Operational instructions
 * 11. Cement class
 * 12. Citation de-duplication
 *
 * Output is unordered; the plan assembler sorts by depth.
 */

import type { FactsMap, Step } from '@shared/schema';
import { createLogger } from '../../lib/logger';
import type { ResolvedPolicy } from '../policyKnobs';
import { annularGapRule } from './annularGaps';
import { cibpDetectorRule, mechanicalBarrierRule } from './barriers';
import {
  cementClassRule,
  citationDedupRule,
  operationalRule,
  overlapSuppressionRule,
  taggingRule,
} from './enrichment';
import { readWellFacts, type WellFacts } from './facts';
import { formationTopRule, toolIsolationRule } from './isolation';
import { stepsOverrideRule } from './overrides';
import { scaffoldRule } from './scaffold';
import type { GeneratedSteps, GeneratorContext, StepRule } from './types';

const log = createLogger({ module: 'step-generator' });

export const W3A_PIPELINE: ReadonlyArray<readonly [string, StepRule]> = [
  ['scaffold', scaffoldRule],
  ['mechanical_barriers', mechanicalBarrierRule],
  ['cibp_detector', cibpDetectorRule],
  ['annular_gaps', annularGapRule],
  ['tool_isolation', toolIsolationRule],
  ['formation_tops', formationTopRule],
  ['steps_overrides', stepsOverrideRule],
  ['overlap_suppression', overlapSuppressionRule],
  ['tagging', taggingRule],
  ['operational', operationalRule],
  ['cement_class', cementClassRule],
  ['citation_dedup', citationDedupRule],
];

export function generateSteps(
  facts: FactsMap,
  policy: ResolvedPolicy,
  well: WellFacts = readWellFacts(facts)
): GeneratedSteps {
  const ctx: GeneratorContext = { facts, well, policy, violations: [], notes: [] };

  const steps = W3A_PIPELINE.reduce<Step[]>((acc, [name, rule]) => {
    const next = rule(ctx, acc);
    if (next.length !== acc.length) {
      log.debug({ stage: name, before: acc.length, after: next.length }, 'Pipeline stage changed step count');
    }
    return next;
  }, []);

  log.debug(
    { api14: well.api14, steps: steps.length, violations: ctx.violations.length },
    'Steps generated'
  );
  return { steps, violations: ctx.violations, notes: ctx.notes };
}

export { selectCementClass } from './enrichment';
export { readWellFacts } from './facts';
export type { WellFacts } from './facts';
export type { GeneratedSteps, GeneratorContext, StepRule } from './types';
export { isCementBearing } from './types';
