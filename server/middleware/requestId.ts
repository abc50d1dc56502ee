/**
 * Request ID Middleware
 *
 * Generates or extracts request ID and adds it to request/response context.
 * Request ID is used for tracing requests across the system.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { createRequestLogger } from '../lib/logger';

/**
 * Extract or generate request ID from headers
 */
function getRequestId(req: Request): string {
  return req.get('x-request-id') || req.get('x-correlation-id') || randomUUID();
}

/**
 * Middleware to add request ID to all requests
 *
 * Adds request ID to:
 * - req.id (for use in route handlers)
 * - res.locals.requestId (for use in response helpers)
 * - Response header X-Request-ID
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = getRequestId(req);

  req.id = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  req.logger = createRequestLogger({ requestId, path: req.path, method: req.method });

  next();
}

// Extend Express types
declare global {
  namespace Express {
    interface Request {
      id?: string;
      logger?: ReturnType<typeof createRequestLogger>;
    }
  }
}
