import express, { type Express } from 'express';
import type { EngineConfig } from './config/engineConfig';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestIdMiddleware } from './middleware/requestId';
import { registerRoutes } from './routes';

export function createApp(config: EngineConfig): Express {
  const app = express();

  app.use(express.json({ limit: '2mb' }));
  app.use(requestIdMiddleware);

  registerRoutes(app, config);

  app.use('/api', notFoundHandler);
  app.use(errorHandler);

  return app;
}
