/**
 * Adapts an async controller method to an Express handler. A rejection is
 * passed to next() and rendered by the global error handler.
 */

import type { Request, Response, RequestHandler } from 'express';

export type ControllerMethod = (req: Request, res: Response) => Promise<unknown>;

export function asyncHandler(method: ControllerMethod): RequestHandler {
  return (req, res, next) => {
    method(req, res).catch(next);
  };
}
