/**
 * Trip Execution Routes
 */

import { Router } from 'express';
import { TripExecutionController } from '../controllers/trip-execution.controller';
import { validateRequest } from '../middleware/validation';
import type { TripRateLimiters } from '../middleware/rate-limit';
import { TripIdParamsSchema } from '../models/dtos/trip-execution.dto';
import type { TripExecutionService } from '../services/trip-execution.service';
import { asyncHandler } from '../utils/async-handler';

export function createTripExecutionRouter(
  service: TripExecutionService,
  limiters: TripRateLimiters
): Router {
  const router = Router();
  const controller = new TripExecutionController(service);

  /**
   * @openapi
   * /api/v1/trips/{tripId}/execute:
   *   post:
   *     tags: [Trip Execution]
   *     summary: Queue a trip execution
   *     description: |
   *       Creates an execution record and queues a worker job. When the trip
   *       already has a queued or processing execution the request joins it
   *       and returns its job id; no second job is queued.
   *     parameters:
   *       - name: tripId
   *         in: path
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       202:
   *         description: Execution queued or joined
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 success:
   *                   type: boolean
   *                 data:
   *                   $ref: '#/components/schemas/ExecuteTripResponse'
   *       400:
   *         description: Trip has no orders, drivers or vehicle
   *       404:
   *         description: Trip not found
   *       429:
   *         description: Rate limit exceeded
   */
  router.post(
    '/:tripId/execute',
    limiters.execute,
    validateRequest({ params: TripIdParamsSchema }),
    asyncHandler(controller.execute.bind(controller))
  );

  /**
   * @openapi
   * /api/v1/trips/{tripId}/execution-status:
   *   get:
   *     tags: [Trip Execution]
   *     summary: Poll trip execution progress
   *     parameters:
   *       - name: tripId
   *         in: path
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Latest execution and per-order status
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 success:
   *                   type: boolean
   *                 data:
   *                   $ref: '#/components/schemas/ExecutionStatus'
   *       404:
   *         description: Trip not found
   */
  router.get(
    '/:tripId/execution-status',
    limiters.status,
    validateRequest({ params: TripIdParamsSchema }),
    asyncHandler(controller.getStatus.bind(controller))
  );

  return router;
}
