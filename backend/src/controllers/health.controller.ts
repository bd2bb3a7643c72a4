/**
 * Health Controller
 *
 * Handles health check endpoint with database and queue status.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { HealthCheckResponse, ServiceHealth } from '../models/dtos/common.dto';
import { successResponse } from '../utils/response';
import { logger } from '../utils/logger';

/**
 * A check resolves when its dependency answers and rejects otherwise.
 */
export type HealthCheck = () => Promise<unknown>;

export interface HealthChecks {
  database: HealthCheck;
  redis: HealthCheck;
}

export class HealthController extends BaseController {
  constructor(
    private readonly checks: HealthChecks,
    private readonly version: string = 'v1'
  ) {
    super();
  }

  /**
   * GET /health
   * Database down is unhealthy (503); Redis down is degraded.
   */
  async checkHealth(_req: Request, res: Response): Promise<Response> {
    const [database, redis] = await Promise.all([
      this.runCheck('database', this.checks.database),
      this.runCheck('redis', this.checks.redis),
    ]);

    const health: HealthCheckResponse = {
      status: database.status === 'down' ? 'unhealthy' : redis.status === 'down' ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      version: this.version,
      uptime: process.uptime(),
      services: { database, redis },
      memory: process.memoryUsage(),
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check failed', { status: health.status, services: health.services });
    }

    if (health.status === 'unhealthy') {
      return successResponse(res, health, undefined, 503);
    }
    return this.success(res, health);
  }

  private async runCheck(name: string, check: HealthCheck): Promise<ServiceHealth> {
    const startTime = Date.now();

    try {
      await check();
      return { status: 'up', latency: Date.now() - startTime };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`${name} health check failed`, { error: message });
      return { status: 'down', error: message };
    }
  }
}
