/**
 * Centralized Error Handling Middleware
 *
 * Provides consistent error responses across all API routes.
 * Includes structured logging and environment-aware error details.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger, logError } from '../lib/logger';
import { PolicyPackError } from '../services/policyStore';

const log = createLogger({ module: 'error-handler' });

/**
 * Extended Error interface for API errors
 */
export interface ApiError extends Error {
  /** HTTP status code */
  statusCode?: number;
  /** Error code for client-side handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Whether the error is operational (expected) vs programming error */
  isOperational?: boolean;
}

/**
 * Create an API error with proper typing
 */
export function createApiError(
  message: string,
  statusCode: number = 500,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  error.isOperational = true;
  return error;
}

/** Error factories for the failures this API reports. */
export const errors = {
  validation: (message: string, details?: Record<string, unknown>) =>
    createApiError(message, 400, 'VALIDATION_ERROR', details),

  internal: (message: string = 'Internal server error') =>
    createApiError(message, 500, 'INTERNAL_ERROR'),

  policyUnavailable: (message: string, details?: Record<string, unknown>) =>
    createApiError(message, 503, 'POLICY_UNAVAILABLE', details),
};

/**
 * Standard API response format
 */
interface ErrorResponse {
  success: false;
  message: string;
  code: string;
  details?: Record<string, unknown>;
  stack?: string;
  requestId?: string;
}

/**
 * Request ID set by requestIdMiddleware, else from headers
 */
function getRequestId(req: Request, res: Response): string | undefined {
  const fromLocals: unknown = res.locals.requestId;
  if (typeof fromLocals === 'string') return fromLocals;
  return req.get('x-request-id') ?? req.get('x-correlation-id');
}

/**
 * Map library errors onto API errors. Policy pack failures are a deployment
 * problem, so they surface as 503 rather than 500.
 */
export function toApiError(err: unknown): ApiError {
  if (err instanceof PolicyPackError) {
    return errors.policyUnavailable(err.message, { file: err.file, problems: err.details });
  }
  if (err instanceof ZodError) {
    return errors.validation('Validation failed', {
      errors: err.errors.map((e) => ({ path: e.path.join('.'), message: e.message })),
    });
  }
  if (err instanceof Error) {
    return err;
  }
  return errors.internal(String(err));
}

/**
 * Centralized error handling middleware
 *
 * Must be registered AFTER all route handlers.
 * Catches all errors and returns consistent JSON responses.
 */
export function errorHandler(
  rawError: unknown,
  req: Request,
  res: Response,
  // Express identifies error middleware by arity
  _next: NextFunction
): void {
  const err = toApiError(rawError);
  const requestId = getRequestId(req, res);
  const statusCode = err.statusCode || 500;

  logError(log, err, 'Request error', {
    requestId,
    path: req.path,
    method: req.method,
    statusCode,
    isOperational: err.isOperational,
  });

  const isProduction = process.env.NODE_ENV === 'production';

  const response: ErrorResponse = {
    success: false,
    message: isProduction && statusCode === 500 ? 'An unexpected error occurred' : err.message,
    code: err.code || 'INTERNAL_ERROR',
    requestId,
  };

  // Include details in non-production or for operational errors
  if (!isProduction || err.isOperational) {
    response.details = err.details;
  }

  // Include stack trace in development only
  if (process.env.NODE_ENV === 'development') {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Not found handler for undefined routes
 * Register after all route definitions but before the error handler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: 'Route not found',
    code: 'NOT_FOUND',
    path: req.path,
    method: req.method,
  });
}

/**
 * Wrap a route handler so thrown errors and rejected promises reach the
 * error handler.
 *
 * @example
 * router.post('/plans/preview', asyncHandler(async (req, res) => {
 *   sendSuccess(res, compilePlan(req.body.facts, policy));
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => unknown
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
}
