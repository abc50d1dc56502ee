/**
 * Routes Index
 *
 * Mounts all route modules under /api.
 */

import type { Express, Request, Response } from 'express';
import type { EngineConfig } from '../config/engineConfig';
import { KERNEL_VERSION } from '../services/planKernel';
import { createPlanRouter } from './plans';
import { createPolicyRouter } from './policy';

export function registerRoutes(app: Express, config: EngineConfig): void {
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', kernel_version: KERNEL_VERSION });
  });

  app.use('/api/plans', createPlanRouter(config));
  app.use('/api/policy', createPolicyRouter(config));
}
