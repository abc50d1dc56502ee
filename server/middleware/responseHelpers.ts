/**
 * Standardized API Response Helpers
 *
 * Provides consistent response envelope format across all endpoints.
 * All successful responses follow: { success: true, data?: T, message?: string }
 * All error responses follow: { success: false, message: string, code: string, ... }
 */

import type { Response } from 'express';

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data?: T;
  message?: string;
  requestId?: string;
}

/**
 * Send a successful response with data
 */
export function sendSuccess<T>(res: Response, data: T, message?: string, statusCode: number = 200): void {
  const response: SuccessResponse<T> = {
    success: true,
    data,
  };

  if (message) {
    response.message = message;
  }

  // Add request ID if available
  const requestId: unknown = res.locals.requestId;
  if (typeof requestId === 'string') {
    response.requestId = requestId;
  }

  res.status(statusCode).json(response);
}
