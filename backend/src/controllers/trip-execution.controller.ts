/**
 * Trip Execution Controller
 *
 * Queues trip executions and reports their progress.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import { TripIdParamsSchema } from '../models/dtos/trip-execution.dto';
import type { ExecuteTripResponse } from '../models/dtos/trip-execution.dto';
import type { TripExecutionService } from '../services/trip-execution.service';
import { logger } from '../utils/logger';

export class TripExecutionController extends BaseController {
  constructor(private readonly service: TripExecutionService) {
    super();
  }

  /**
   * POST /api/v1/trips/:tripId/execute
   * Queue an execution (or join the active one). Always 202.
   */
  async execute(req: Request, res: Response): Promise<Response> {
    const { tripId } = TripIdParamsSchema.parse(req.params);

    logger.info('Trip execution requested', { tripId });

    const result = await this.service.enqueueExecution(tripId);

    const body: ExecuteTripResponse = {
      tripId,
      jobId: result.jobId,
      executionId: result.executionId,
      status: result.status,
      attached: result.attached,
      message: result.attached
        ? 'Trip execution already in progress'
        : 'Trip execution queued',
    };

    return this.accepted(res, body);
  }

  /**
   * GET /api/v1/trips/:tripId/execution-status
   */
  async getStatus(req: Request, res: Response): Promise<Response> {
    const { tripId } = TripIdParamsSchema.parse(req.params);

    const status = await this.service.getExecutionStatus(tripId);

    return this.success(res, status);
  }
}
