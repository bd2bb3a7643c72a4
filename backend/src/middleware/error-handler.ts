/**
 * Error Handler Middleware
 *
 * Every error reaching Express is rendered through the response envelope.
 * Typed errors keep their status and code; anything else is a 500.
 */

import type { ErrorRequestHandler, Request, Response } from 'express';
import { ZodError } from 'zod';
import { ApiError, ValidationError } from '../models/errors/api-error';
import { errorBody, errorResponse } from '../utils/response';
import { logger } from '../utils/logger';

// body-parser rejects unparsable JSON with a SyntaxError carrying status 400
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/**
 * Maps a thrown value onto the error hierarchy; null when it is not one we
 * expect.
 */
export function toApiError(err: unknown): ApiError | null {
  if (err instanceof ApiError) {
    return err;
  }

  if (err instanceof ZodError) {
    return new ValidationError(
      'Request validation failed',
      err.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message, code: issue.code }))
    );
  }

  if (isMalformedBody(err)) {
    return new ValidationError('Malformed JSON body');
  }

  return null;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const route = { method: req.method, path: req.path };
  const apiError = toApiError(err);

  if (apiError) {
    logger.log(apiError.statusCode >= 500 ? 'error' : 'warn', 'Request failed', {
      ...route,
      statusCode: apiError.statusCode,
      code: apiError.code,
      message: apiError.message,
    });
    errorResponse(res, apiError);
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('Unexpected error', { ...route, message: error.message, stack: error.stack });

  // Internal messages stay out of production responses
  const message = process.env.NODE_ENV === 'production' ? 'Internal server error' : error.message;
  res.status(500).json(errorBody('INTERNAL_SERVER_ERROR', message));
};

export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { method: req.method, path: req.path });
  res.status(404).json(errorBody('NOT_FOUND', 'Route not found', { path: req.path }));
}
