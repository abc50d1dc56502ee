/**
 * Plan Routes
 *
 * Compiles W-3A plugging plans from well facts.
 */

import { Router, type Request, type Response } from 'express';
import { planPreviewRequestSchema, type PlanPreviewRequest } from '@shared/schema';
import type { EngineConfig } from '../config/engineConfig';
import { asyncHandler } from '../middleware/errorHandler';
import { sendSuccess } from '../middleware/responseHelpers';
import { validateBody } from '../middleware/validation';
import { resolveEffectivePolicy } from '../services/effectivePolicyService';
import { getPlanHandler, type CompileOptions } from '../services/planKernel';
import { getPolicyStore } from '../services/policyStore';
import { factString } from '../services/stepGenerator/facts';

export function createPlanRouter(config: EngineConfig): Router {
  const router = Router();

  /**
   * POST /api/plans/preview
   * Resolve the effective policy for the well's location and compile a plan.
   * Location fields in the body override the ones in facts.
   */
  router.post(
    '/preview',
    validateBody(planPreviewRequestSchema),
    asyncHandler((req: Request, res: Response) => {
      const body: PlanPreviewRequest = req.body;
      const { facts } = body;

      const store = getPolicyStore(config.policy);
      const effective = resolveEffectivePolicy(store, {
        district: body.district ?? factString(facts, 'district'),
        county: body.county ?? factString(facts, 'county'),
        field: body.field ?? factString(facts, 'field'),
      });

      const options: CompileOptions = {
        mergeAdjacent: body.options?.merge_adjacent ?? config.mergeAdjacentPlugs,
        mergeThresholdFt: body.options?.merge_threshold_ft ?? config.mergeThresholdFt,
      };

      req.logger?.info(
        { district: effective.district, county: effective.county, policyId: effective.policy_id },
        'Compiling plan'
      );
      const plan = getPlanHandler(effective.policy_id)(facts, effective, options);
      sendSuccess(res, plan);
    })
  );

  return router;
}
