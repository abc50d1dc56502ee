/**
 * Request Validation Middleware
 *
 * Zod-based validation for Express routes. Parsed bodies replace `req.body`;
 * parsed query strings are stored on `res.locals.query` since Express owns
 * the type of `req.query`.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodSchema } from 'zod';

function validationFailure(res: Response, message: string, error: ZodError) {
  return res.status(400).json({
    success: false,
    message,
    code: 'VALIDATION_ERROR',
    errors: error.errors.map((err) => ({
      path: err.path.join('.'),
      message: err.message,
    })),
    requestId: res.locals.requestId,
  });
}

/**
 * Validate request body against a Zod schema
 */
export function validateBody<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      validationFailure(res, 'Validation failed', result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validate query parameters against a Zod schema
 */
export function validateQuery<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      validationFailure(res, 'Query parameter validation failed', result.error);
      return;
    }
    res.locals.query = result.data;
    next();
  };
}
