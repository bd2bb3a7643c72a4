/**
 * Trip Execution Service
 *
 * Boundary used by the HTTP layer: queue an execution, poll its status.
 */

import { isSettledOrderStatus, toIsoOrNull } from '@trip-execution/shared';
import type { ExecutionRecordStatus, ExecutionStatusView, TripOrder } from '@trip-execution/shared';
import { NotFoundError } from '../models/errors/api-error';
import type { JobQueue } from '../queue/job-queue';
import { logger, logHelpers } from '../utils/logger';
import type { ExecutionStateStore } from './execution-state.service';
import { assertExecutable } from './trip-orchestrator.service';

export interface EnqueueResult {
  jobId: string;
  executionId: number;
  /** true when the request joined an execution that was already active */
  attached: boolean;
  status: ExecutionRecordStatus;
}

export const NOT_STARTED_MESSAGE = 'Trip execution not started';

/** Matches the worker's default job timeout */
export const DEFAULT_STALE_AFTER_MS = 10 * 60 * 1000;

export function progressPercentage(status: ExecutionRecordStatus, orders: TripOrder[]): number {
  if (status === 'completed') {
    return 100;
  }
  if (orders.length === 0) {
    return 0;
  }
  const settled = orders.filter((order) => isSettledOrderStatus(order.status)).length;
  return Math.round((settled / orders.length) * 100);
}

export class TripExecutionService {
  constructor(
    private readonly store: ExecutionStateStore,
    private readonly queue: JobQueue,
    private readonly now: () => Date = () => new Date(),
    /** An active execution not written for this long belongs to a dead worker */
    private readonly staleAfterMs: number = DEFAULT_STALE_AFTER_MS
  ) {}

  /**
   * Creates (or joins) the trip's active execution and queues a job for a
   * newly created one. A stale active execution is failed and replaced
   * rather than joined.
   *
   * @throws NotFoundError when the trip does not exist
   * @throws ValidationError when the trip has no orders, drivers or vehicle
   */
  async enqueueExecution(tripId: number): Promise<EnqueueResult> {
    assertExecutable(await this.store.loadTrip(tripId), tripId);

    const staleBefore = new Date(this.now().getTime() - this.staleAfterMs);
    const { handle, created, status } = await this.store.upsertExecution(tripId, staleBefore);

    if (!created) {
      logger.info('Execute request joined active execution', { tripId, jobId: handle.jobId, status });
      return { jobId: handle.jobId, executionId: handle.executionId, attached: true, status };
    }

    try {
      await this.queue.enqueue({
        jobId: handle.jobId,
        tripId,
        executionId: handle.executionId,
        enqueuedAt: this.now().toISOString(),
      });
    } catch (error) {
      const message = `Failed to enqueue execution job: ${error instanceof Error ? error.message : String(error)}`;
      await this.store.finalize(handle, 'failed', { progressMessage: message, generalError: message });
      throw error;
    }

    logHelpers.business('trip_execution_queued', { tripId, jobId: handle.jobId });
    return { jobId: handle.jobId, executionId: handle.executionId, attached: false, status };
  }

  async getExecutionStatus(tripId: number): Promise<ExecutionStatusView> {
    const snapshot = await this.store.getSnapshot(tripId);
    if (!snapshot) {
      throw new NotFoundError(`Trip ${tripId}`);
    }

    const { trip, execution, orders } = snapshot;

    return {
      tripId,
      status: execution ? execution.status : 'not_started',
      tripStatus: trip.executionStatus,
      progressMessage: execution ? execution.progressMessage : NOT_STARTED_MESSAGE,
      generalError: execution ? execution.generalError : null,
      progressPercentage: execution ? progressPercentage(execution.status, orders) : 0,
      jobId: execution ? execution.jobId : null,
      startedAt: toIsoOrNull(execution ? execution.startedAt : null),
      completedAt: toIsoOrNull(execution ? execution.completedAt : null),
      orders: orders.map((order) => ({
        orderId: order.id,
        orderRef: order.orderRef,
        sequenceOrder: order.sequenceOrder,
        status: order.status,
        errorMessage: order.errorMessage,
        manifestId: order.manifestId,
      })),
    };
  }
}
