/**
 * Rate Limiting Middleware
 *
 * Per-IP limits for the trip execution endpoints:
 * - Execute: 20 req/min (each accepted request may queue a job)
 * - Status polling: 120 req/min
 *
 * Returns 429 Too Many Requests with the standard RateLimit headers.
 */

import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger } from '../utils/logger';
import { errorBody } from '../utils/response';

export interface RateLimitSettings {
  executePerMinute: number;
  statusPerMinute: number;
}

export const DEFAULT_RATE_LIMITS: RateLimitSettings = {
  executePerMinute: parseInt(process.env.RATE_LIMIT_EXECUTE || '20', 10),
  statusPerMinute: parseInt(process.env.RATE_LIMIT_STATUS || '120', 10),
};

function rateLimitExceededHandler(req: Request, res: Response): void {
  logger.warn('Rate limit exceeded', {
    path: req.path,
    method: req.method,
    ip: req.ip,
  });

  res.status(429).json(errorBody('RATE_LIMITED', 'Rate limit exceeded. Please try again later.'));
}

function skipRateLimit(): boolean {
  return process.env.RATE_LIMIT_ENABLED === 'false';
}

function createRateLimiter(limit: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    skip: skipRateLimit,
    handler: rateLimitExceededHandler,
  });
}

export interface TripRateLimiters {
  execute: RateLimitRequestHandler;
  status: RateLimitRequestHandler;
}

export function createTripRateLimiters(settings: RateLimitSettings = DEFAULT_RATE_LIMITS): TripRateLimiters {
  return {
    execute: createRateLimiter(settings.executePerMinute),
    status: createRateLimiter(settings.statusPerMinute),
  };
}
