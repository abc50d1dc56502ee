/**
 * Plan diagnostics.
 *
 * Violations never abort generation; they travel with the plan so the
 * filing layer can decide whether to block.
 */

import type { Violation, ViolationSeverity } from '@shared/schema';

export const ViolationCodes = {
  POLICY_INCOMPLETE: 'POLICY_INCOMPLETE',
  SURFACE_SHOE_DEPTH_UNKNOWN: 'SURFACE_SHOE_DEPTH_UNKNOWN',
  INSUFFICIENT_SHOE_COVERAGE: 'INSUFFICIENT_SHOE_COVERAGE',
  UQW_BASE_UNKNOWN: 'UQW_BASE_UNKNOWN',
  DUQW_ISOLATION_MISSING: 'DUQW_ISOLATION_MISSING',
  MISSING_CITATION: 'MISSING_CITATION',
  BELOW_CIBP: 'BELOW_CIBP',
  PRODUCTION_SHOE_UNKNOWN: 'PRODUCTION_SHOE_UNKNOWN',
  FORMATION_TOP_UNKNOWN: 'FORMATION_TOP_UNKNOWN',
  GEOMETRY_MISSING: 'GEOMETRY_MISSING',
  RECIPE_MISSING: 'RECIPE_MISSING',
  STEP_INTERVAL_OVERLAP: 'STEP_INTERVAL_OVERLAP',
} as const;

export type ViolationCode = (typeof ViolationCodes)[keyof typeof ViolationCodes];

export function makeViolation(
  ruleId: ViolationCode,
  severity: ViolationSeverity,
  message: string,
  options: { context?: Record<string, unknown>; citations?: string[] } = {}
): Violation {
  return {
    severity,
    rule_id: ruleId,
    message,
    context: options.context ?? {},
    citations: options.citations ?? [],
  };
}
