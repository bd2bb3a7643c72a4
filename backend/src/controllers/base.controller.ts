/**
 * Base Controller
 *
 * Standardized response formatting shared by all controllers.
 */

import type { Response } from 'express';
import { successResponse, acceptedResponse } from '../utils/response';

export class BaseController {
  /**
   * Send successful response with data
   */
  protected success<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return successResponse(res, data, meta);
  }

  /**
   * Send accepted response (202) for work handed to the worker
   */
  protected accepted<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return acceptedResponse(res, data, meta);
  }
}
