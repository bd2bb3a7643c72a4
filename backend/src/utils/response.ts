/**
 * Response envelopes shared by controllers and middleware:
 *
 *   { success: true,  data, meta? }
 *   { success: false, error: { code, message, details? } }
 */

import type { Response } from 'express';
import type { ApiErrorResponse, ApiResponse } from '../models/dtos/common.dto';
import type { ApiError } from '../models/errors/api-error';

export function errorBody(code: string, message: string, details?: unknown): ApiErrorResponse {
  return {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
  };
}

export function successResponse<T>(
  res: Response,
  data: T,
  meta?: Record<string, unknown>,
  statusCode = 200
): Response<ApiResponse<T>> {
  const body: ApiResponse<T> = meta ? { success: true, data, meta } : { success: true, data };
  return res.status(statusCode).json(body);
}

// Work handed to the worker
export function acceptedResponse<T>(
  res: Response,
  data: T,
  meta?: Record<string, unknown>
): Response<ApiResponse<T>> {
  return successResponse(res, data, meta, 202);
}

export function errorResponse(res: Response, error: ApiError): Response<ApiErrorResponse> {
  return res.status(error.statusCode).json(errorBody(error.code, error.message, error.details));
}
