/**
 * Adjacent-plug merging.
 *
 * Optional post-processing that coalesces same-type plugs separated by no
 * more than a threshold into one plug spanning both. Types never mix.
 */

import type { Step, StepType } from '@shared/schema';

export interface MergeOptions {
  thresholdFt: number;
  types?: readonly StepType[];
  /** Recompute materials for a merged step. */
  recompute?: (step: Step) => Step;
}

interface MergedSource {
  formation: string | null;
  top_ft: number | null;
  bottom_ft: number | null;
}

function sourceOf(step: Step): MergedSource {
  return { formation: step.formation ?? null, top_ft: step.top_ft, bottom_ft: step.bottom_ft };
}

function existingSources(step: Step): MergedSource[] {
  const prior = step.details.merged_steps;
  if (Array.isArray(prior) && step.details.merged === true) {
    return prior.filter(
      (p): p is MergedSource => typeof p === 'object' && p !== null && 'top_ft' in p && 'bottom_ft' in p
    );
  }
  return [sourceOf(step)];
}

// Recomputed after merging
const STALE_DETAIL_KEYS = ['texas_25_sack_minimum_applied', 'original_calculated_sacks', 'geometry', 'geometry_missing'];

function freshDetails(step: Step): Step['details'] {
  return Object.fromEntries(Object.entries(step.details).filter(([key]) => !STALE_DETAIL_KEYS.includes(key)));
}

function mergePair(a: Step, b: Step): Step {
  const top = Math.min(a.top_ft ?? Infinity, b.top_ft ?? Infinity);
  const bottom = Math.max(a.bottom_ft ?? -Infinity, b.bottom_ft ?? -Infinity);
  const formations = [...new Set([a.formation, b.formation].flatMap((f) => (f ? f.split(' / ') : [])))];
  const sources = [...existingSources(a), ...existingSources(b)];

  return {
    ...a,
    top_ft: top,
    bottom_ft: bottom,
    ...(formations.length > 0 ? { formation: formations.join(' / ') } : {}),
    regulatory_basis: [...new Set([...a.regulatory_basis, ...b.regulatory_basis])],
    tag_required: a.tag_required || b.tag_required,
    sacks: null,
    details: {
      ...freshDetails(a),
      ...(a.tag_required || b.tag_required
        ? { verification: a.details.verification ?? b.details.verification }
        : {}),
      merged: true,
      merged_steps: sources,
    },
    materials: { slurry: {}, fluids: {} },
  };
}

/**
 * Merge consecutive same-type steps whose gap is at most `thresholdFt`.
 * Steps without a full interval, and types not listed, pass through.
 */
export function mergeAdjacentSteps(steps: readonly Step[], options: MergeOptions): Step[] {
  const types = new Set<StepType>(options.types ?? ['formation_top_plug']);
  const passthrough: Step[] = [];
  const byType = new Map<StepType, Step[]>();

  for (const step of steps) {
    if (!types.has(step.type) || step.top_ft === null || step.bottom_ft === null) {
      passthrough.push(step);
      continue;
    }
    const group = byType.get(step.type) ?? [];
    group.push(step);
    byType.set(step.type, group);
  }

  const merged: Step[] = [];
  for (const group of byType.values()) {
    const sorted = [...group].sort((a, b) => (a.top_ft ?? 0) - (b.top_ft ?? 0));
    let current = sorted[0];
    let combined = false;

    for (const next of sorted.slice(1)) {
      const gap = (next.top_ft ?? 0) - (current.bottom_ft ?? 0);
      if (gap <= options.thresholdFt) {
        current = mergePair(current, next);
        combined = true;
      } else {
        merged.push(combined && options.recompute ? options.recompute(current) : current);
        current = next;
        combined = false;
      }
    }
    merged.push(combined && options.recompute ? options.recompute(current) : current);
  }

  return [...passthrough, ...merged];
}
