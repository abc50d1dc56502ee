/**
 * Policy completeness checks.
 *
 * A policy is complete when every required knob exists after merge. Missing
 * knobs are reported by dotted path; validation never throws.
 */

import { isPolicyTree, type PolicyTree } from '@shared/schema';
import { getPath } from './policyMerge';

export const REQUIRED_TOP_LEVEL_KEYS = ['citations', 'requirements', 'cement_class'] as const;

export const REQUIRED_REQUIREMENT_KEYS = [
  'casing_shoe_coverage_ft',
  'duqw_coverage_ft',
  'tag_wait_hours',
] as const;

export const REQUIRED_CEMENT_CLASS_KEYS = ['cutoff_ft', 'shallow_class', 'deep_class'] as const;

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  // Knobs may be wrapped as { value, citation_keys }
  if (isPolicyTree(value) && 'value' in value) {
    return isBlank(value.value);
  }
  return false;
}

/**
 * Return the missing paths for one scope, e.g. "base.requirements.tag_wait_hours".
 */
export function findMissingKnobs(scope: string, tree: PolicyTree, district?: string | null): string[] {
  const missing: string[] = [];

  for (const key of REQUIRED_TOP_LEVEL_KEYS) {
    if (!(key in tree)) {
      missing.push(`${scope}.${key}`);
    }
  }
  for (const key of REQUIRED_REQUIREMENT_KEYS) {
    if (isBlank(getPath(tree, `requirements.${key}`))) {
      missing.push(`${scope}.requirements.${key}`);
    }
  }
  for (const key of REQUIRED_CEMENT_CLASS_KEYS) {
    if (isBlank(getPath(tree, `cement_class.${key}`))) {
      missing.push(`${scope}.cement_class.${key}`);
    }
  }

  return district ? missing.map((m) => `${m} [district:${district}]`) : missing;
}

export interface CompletenessResult {
  complete: boolean;
  incomplete_reasons: string[];
}

/**
 * Validate the base always, and the merged policy when a district was resolved.
 */
export function validateCompleteness(
  base: PolicyTree,
  effective: PolicyTree,
  district: string | null
): CompletenessResult {
  const reasons = findMissingKnobs('base', base);
  if (district) {
    reasons.push(...findMissingKnobs('effective', effective, district));
  }
  return { complete: reasons.length === 0, incomplete_reasons: reasons };
}
