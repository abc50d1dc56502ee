/**
 * Policy Routes
 *
 * Effective policy lookup and pack hot-reload.
 */

import { Router, type Request, type Response } from 'express';
import { effectivePolicyQuerySchema, type EffectivePolicyQuery } from '@shared/schema';
import type { EngineConfig } from '../config/engineConfig';
import { createLogger } from '../lib/logger';
import { asyncHandler } from '../middleware/errorHandler';
import { sendSuccess } from '../middleware/responseHelpers';
import { validateQuery } from '../middleware/validation';
import { resolveEffectivePolicy } from '../services/effectivePolicyService';
import { getPolicyStore, reloadPolicyStore } from '../services/policyStore';

const log = createLogger({ module: 'policy-routes' });

export function createPolicyRouter(config: EngineConfig): Router {
  const router = Router();

  /**
   * GET /api/policy/effective?district=08A&county=Andrews&field=Spraberry
   */
  router.get(
    '/effective',
    validateQuery(effectivePolicyQuerySchema),
    asyncHandler((_req: Request, res: Response) => {
      const query: EffectivePolicyQuery = res.locals.query;
      const effective = resolveEffectivePolicy(getPolicyStore(config.policy), query);
      sendSuccess(res, effective);
    })
  );

  /**
   * POST /api/policy/reload
   * Re-read the pack; the cached store is replaced only on a version change.
   */
  router.post(
    '/reload',
    asyncHandler((_req: Request, res: Response) => {
      const result = reloadPolicyStore(config.policy);
      log.info(
        { policyVersion: result.store.pack.policy_version, previousVersion: result.previousVersion, reloaded: result.reloaded },
        'Policy reload requested'
      );
      sendSuccess(res, {
        policy_version: result.store.pack.policy_version,
        previous_version: result.previousVersion,
        reloaded: result.reloaded,
      });
    })
  );

  return router;
}
