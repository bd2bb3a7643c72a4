/**
 * Checks request parts against zod schemas before the controller runs. A
 * failure is handed to next() as the ZodError; the error handler renders it
 * as VALIDATION_ERROR. Only the body is replaced by its parsed value.
 */

import type { RequestHandler } from 'express';
import type { ZodTypeAny } from 'zod';

interface RequestSchemas {
  params?: ZodTypeAny;
  query?: ZodTypeAny;
  body?: ZodTypeAny;
}

export function validateRequest(schemas: RequestSchemas): RequestHandler {
  return (req, _res, next) => {
    const checks: Array<[ZodTypeAny | undefined, unknown]> = [
      [schemas.params, req.params],
      [schemas.query, req.query],
    ];

    for (const [schema, value] of checks) {
      const result = schema?.safeParse(value);
      if (result && !result.success) {
        next(result.error);
        return;
      }
    }

    if (schemas.body) {
      const body = schemas.body.safeParse(req.body);
      if (!body.success) {
        next(body.error);
        return;
      }
      req.body = body.data;
    }

    next();
  };
}
