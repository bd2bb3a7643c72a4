/**
 * Trip execution service tests
 *
 * Coverage:
 *   1. Queueing a new execution
 *   2. Duplicate requests join the active execution, stale ones are replaced
 *   3. Rejected requests
 *   4. Status view
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryJobQueue, JobQueue } from '../../src/queue/job-queue';
import { NotFoundError, ValidationError } from '../../src/models/errors/api-error';
import { INTERRUPTED_MESSAGE } from '../../src/services/execution-state.service';
import {
  NOT_STARTED_MESSAGE,
  TripExecutionService,
  progressPercentage,
} from '../../src/services/trip-execution.service';
import { InMemoryExecutionStateStore } from '../helpers/in-memory-state-store';
import { buildOrder, buildTripWithOrders } from '../helpers/fixtures';

const NOW = new Date('2026-03-02T07:00:00Z');

describe('TripExecutionService', () => {
  let store: InMemoryExecutionStateStore;
  let queue: InMemoryJobQueue;
  let service: TripExecutionService;

  beforeEach(() => {
    store = new InMemoryExecutionStateStore();
    queue = new InMemoryJobQueue();
    service = new TripExecutionService(store, queue, () => NOW);
    store.seed(buildTripWithOrders({}, [{}, { status: 'manifested' }]));
  });

  // ==========================================================================
  // 1. Queueing
  // ==========================================================================

  describe('enqueueExecution()', () => {
    it('creates a queued execution and pushes one job', async () => {
      const result = await service.enqueueExecution(1);

      expect(result).toEqual({ jobId: 'job-1', executionId: 1, attached: false, status: 'queued' });
      await expect(queue.dequeue(0)).resolves.toEqual({
        jobId: 'job-1',
        tripId: 1,
        executionId: 1,
        enqueuedAt: '2026-03-02T07:00:00.000Z',
      });
    });

    // ========================================================================
    // 2. Duplicate requests
    // ========================================================================

    it('returns the active job id for a repeated request without queueing again', async () => {
      const first = await service.enqueueExecution(1);
      const second = await service.enqueueExecution(1);

      expect(second).toEqual({ jobId: first.jobId, executionId: first.executionId, attached: true, status: 'queued' });
      expect(queue.size).toBe(1);
      expect(store.executions).toHaveLength(1);
    });

    it('reports the processing status of the execution it joins', async () => {
      const { executionId } = await service.enqueueExecution(1);
      const execution = store.execution(executionId);
      if (execution) execution.status = 'processing';

      await expect(service.enqueueExecution(1)).resolves.toMatchObject({ attached: true, status: 'processing' });
    });

    it('replaces an active execution that stopped updating', async () => {
      store.seedExecution({
        tripId: 1,
        status: 'processing',
        updatedAt: new Date('2026-03-02T06:40:00Z'),
      });

      const result = await service.enqueueExecution(1);

      expect(result).toEqual({ jobId: 'job-2', executionId: 2, attached: false, status: 'queued' });
      expect(queue.size).toBe(1);
      expect(store.execution(1)).toMatchObject({
        status: 'failed',
        progressMessage: INTERRUPTED_MESSAGE,
        generalError: INTERRUPTED_MESSAGE,
      });
    });

    it('joins an active execution updated within the stale window', async () => {
      store.seedExecution({
        tripId: 1,
        status: 'processing',
        updatedAt: new Date('2026-03-02T06:55:00Z'),
      });

      await expect(service.enqueueExecution(1)).resolves.toEqual({
        jobId: 'job-1',
        executionId: 1,
        attached: true,
        status: 'processing',
      });
      expect(queue.size).toBe(0);
    });

    it('starts a new execution once the previous one is terminal', async () => {
      const first = await service.enqueueExecution(1);
      await store.finalize(
        { executionId: first.executionId, tripId: 1, jobId: first.jobId },
        'completed',
        { progressMessage: 'done' }
      );

      const second = await service.enqueueExecution(1);

      expect(second).toMatchObject({ executionId: 2, jobId: 'job-2', attached: false });
      expect(queue.size).toBe(2);
    });

    // ========================================================================
    // 3. Rejected requests
    // ========================================================================

    it('rejects an unknown trip', async () => {
      const error = await service.enqueueExecution(42).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Trip 42 not found' });
    });

    it('rejects a trip without a vehicle and creates no execution', async () => {
      store.seed(buildTripWithOrders({ id: 2, vehicleId: null }));

      await expect(service.enqueueExecution(2)).rejects.toBeInstanceOf(ValidationError);
      expect(store.executions).toHaveLength(0);
    });

    it('fails the execution when the job cannot be queued', async () => {
      const broken: JobQueue = {
        enqueue: async () => {
          throw new Error('redis down');
        },
        dequeue: async () => null,
        close: async () => undefined,
      };
      service = new TripExecutionService(store, broken, () => NOW);

      await expect(service.enqueueExecution(1)).rejects.toThrow('redis down');
      expect(store.execution(1)).toMatchObject({
        status: 'failed',
        progressMessage: 'Failed to enqueue execution job: redis down',
        generalError: 'Failed to enqueue execution job: redis down',
      });
    });
  });

  // ==========================================================================
  // 4. Status view
  // ==========================================================================

  describe('getExecutionStatus()', () => {
    it('reports not_started before any execution', async () => {
      const view = await service.getExecutionStatus(1);

      expect(view).toEqual({
        tripId: 1,
        status: 'not_started',
        tripStatus: 'not_started',
        progressMessage: NOT_STARTED_MESSAGE,
        generalError: null,
        progressPercentage: 0,
        jobId: null,
        startedAt: null,
        completedAt: null,
        orders: [
          { orderId: 10, orderRef: 'ORD-10', sequenceOrder: 1, status: 'pending', errorMessage: null, manifestId: null },
          { orderId: 11, orderRef: 'ORD-11', sequenceOrder: 2, status: 'manifested', errorMessage: null, manifestId: null },
        ],
      });
    });

    it('reports the latest execution with its progress', async () => {
      const { executionId, jobId } = await service.enqueueExecution(1);
      await store.setStatus({ executionId, tripId: 1, jobId }, 'processing', 'Processing order 2 of 2: ORD-11');

      const view = await service.getExecutionStatus(1);

      expect(view).toMatchObject({
        status: 'processing',
        progressMessage: 'Processing order 2 of 2: ORD-11',
        progressPercentage: 50,
        jobId: 'job-1',
        startedAt: '2026-03-02T07:00:00.000Z',
        completedAt: null,
      });
    });

    it('rejects an unknown trip', async () => {
      await expect(service.getExecutionStatus(42)).rejects.toThrow('Trip 42 not found');
    });
  });
});

describe('progressPercentage()', () => {
  it('counts settled orders', () => {
    const orders = [
      buildOrder({ status: 'manifested' }),
      buildOrder({ status: 'inventory_moved' }),
      buildOrder({ status: 'skipped' }),
    ];

    expect(progressPercentage('processing', orders)).toBe(67);
  });

  it('is 100 once completed and 0 without orders', () => {
    expect(progressPercentage('completed', [])).toBe(100);
    expect(progressPercentage('processing', [])).toBe(0);
  });
});
