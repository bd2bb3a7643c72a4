/**
 * Correlation ID Middleware
 *
 * Takes X-Correlation-Id from the caller or mints one, echoes it back and
 * runs the rest of the request inside that log context. The same context
 * shape is used by the worker for jobs (see runWithLogContext).
 */

import type { RequestHandler } from 'express';
import { randomUUID } from 'crypto';
import { logHelpers, runWithLogContext } from '../utils/logger';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

function incomingCorrelationId(header: string | string[] | undefined): string | undefined {
  return typeof header === 'string' && header.length > 0 ? header : undefined;
}

export const correlationMiddleware: RequestHandler = (req, res, next) => {
  const correlationId = incomingCorrelationId(req.headers[CORRELATION_ID_HEADER]) ?? randomUUID();
  res.setHeader(CORRELATION_ID_HEADER, correlationId);

  runWithLogContext({ correlationId }, () => {
    const startedAt = Date.now();
    logHelpers.apiRequest(req.method, req.path, { ip: req.ip });

    res.on('finish', () => {
      logHelpers.apiResponse(req.method, req.path, res.statusCode, Date.now() - startedAt);
    });

    next();
  });
};
