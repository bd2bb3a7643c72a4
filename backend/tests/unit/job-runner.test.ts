/**
 * Job runner and in-memory queue tests
 *
 * Coverage:
 *   1. Queue dedupe and waiting consumers
 *   2. runJob(): completion and job-level timeout
 *   3. Stale execution recovery
 *   4. Consumer loop
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { InMemoryJobQueue, JobQueue, TripExecutionJob } from '../../src/queue/job-queue';
import { JobRunner, JobRunnerOptions, TripExecutor, timeoutMessage } from '../../src/queue/job-runner';
import { INTERRUPTED_MESSAGE } from '../../src/services/execution-state.service';
import type { TripExecutionResult } from '../../src/services/trip-orchestrator.service';
import { InMemoryExecutionStateStore } from '../helpers/in-memory-state-store';
import { buildTripWithOrders } from '../helpers/fixtures';

const COMPLETED: TripExecutionResult = {
  status: 'completed',
  succeeded: 1,
  failed: 0,
  skipped: 0,
  manifestIds: ['MANIFEST-1'],
  generalError: null,
  applied: true,
};

function jobFor(executionId: number, jobId = `job-${executionId}`): TripExecutionJob {
  return { jobId, tripId: 1, executionId, enqueuedAt: '2026-03-02T07:00:00.000Z' };
}

// ============================================================================
// 1. Queue
// ============================================================================

describe('InMemoryJobQueue', () => {
  it('drops a job id it has already seen', async () => {
    const queue = new InMemoryJobQueue();

    await expect(queue.enqueue(jobFor(1))).resolves.toBe(true);
    await expect(queue.enqueue(jobFor(1))).resolves.toBe(false);
    expect(queue.size).toBe(1);
  });

  it('hands a job straight to a waiting consumer', async () => {
    const queue = new InMemoryJobQueue();
    const waiting = queue.dequeue(5);

    await queue.enqueue(jobFor(2));

    await expect(waiting).resolves.toEqual(jobFor(2));
    expect(queue.size).toBe(0);
  });

  it('returns null after the poll timeout or once closed', async () => {
    const queue = new InMemoryJobQueue();

    await expect(queue.dequeue(0.01)).resolves.toBeNull();

    const waiting = queue.dequeue(5);
    await queue.close();
    await expect(waiting).resolves.toBeNull();
  });
});

// ============================================================================
// 2–4. Runner
// ============================================================================

describe('JobRunner', () => {
  let store: InMemoryExecutionStateStore;
  let queue: InMemoryJobQueue;
  let execute: jest.Mock<TripExecutor['execute']>;

  beforeEach(() => {
    store = new InMemoryExecutionStateStore();
    store.seed(buildTripWithOrders());
    queue = new InMemoryJobQueue();
    execute = jest.fn<TripExecutor['execute']>();
  });

  function runner(jobTimeoutMs = 1000, jobQueue: JobQueue = queue, extra: Partial<JobRunnerOptions> = {}): JobRunner {
    return new JobRunner(jobQueue, { execute }, store, {
      concurrency: 1,
      jobTimeoutMs,
      pollTimeoutSeconds: 0.01,
      errorBackoffMs: 1,
      ...extra,
    });
  }

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  describe('runJob()', () => {
    it('returns the executor result for the job', async () => {
      const execution = store.seedExecution({ tripId: 1 });
      execute.mockResolvedValue(COMPLETED);

      const result = await runner().runJob(jobFor(execution.id, execution.jobId));

      expect(result).toEqual(COMPLETED);
      expect(execute.mock.calls[0][0]).toEqual({
        executionId: execution.id,
        tripId: 1,
        jobId: execution.jobId,
      });
    });

    it('finalizes a job that outlives the timeout and signals the executor', async () => {
      const execution = store.seedExecution({ tripId: 1, status: 'processing' });
      const seen: { signal?: AbortSignal } = {};
      execute.mockImplementation(
        (_handle, signal) =>
          new Promise<TripExecutionResult>((_resolve, reject) => {
            seen.signal = signal;
            signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
          })
      );

      const result = await runner(20).runJob(jobFor(execution.id, execution.jobId));

      expect(result).toBeNull();
      expect(seen.signal?.aborted).toBe(true);
      expect(store.execution(execution.id)).toMatchObject({
        status: 'failed',
        progressMessage: timeoutMessage(20),
        generalError: 'Execution timed out after 20ms',
      });
      expect(store.trips.get(1)?.executionStatus).toBe('failed');
    });

    it('propagates an executor crash', async () => {
      const execution = store.seedExecution({ tripId: 1 });
      execute.mockRejectedValue(new Error('executor crashed'));

      await expect(runner().runJob(jobFor(execution.id))).rejects.toThrow('executor crashed');
    });
  });

  describe('recoverStale()', () => {
    it('fails active executions that have not been written within the job timeout', async () => {
      const stale = store.seedExecution({
        tripId: 1,
        status: 'processing',
        updatedAt: new Date('2026-03-02T06:00:00Z'),
      });
      const fresh = store.seedExecution({
        tripId: 2,
        status: 'processing',
        updatedAt: new Date('2026-03-02T06:55:00Z'),
      });
      const done = store.seedExecution({
        tripId: 3,
        status: 'completed',
        updatedAt: new Date('2026-03-02T05:00:00Z'),
      });

      const recovered = await runner(10 * 60 * 1000).recoverStale(new Date('2026-03-02T07:00:00Z'));

      expect(recovered).toBe(1);
      expect(store.execution(stale.id)).toMatchObject({
        status: 'failed',
        progressMessage: INTERRUPTED_MESSAGE,
        generalError: INTERRUPTED_MESSAGE,
      });
      expect(store.execution(fresh.id)?.status).toBe('processing');
      expect(store.execution(done.id)?.status).toBe('completed');
    });

    it('sweeps on an interval while running and not after stop', async () => {
      const stale = store.seedExecution({
        tripId: 1,
        status: 'processing',
        updatedAt: new Date('2026-03-02T06:00:00Z'),
      });
      const jobRunner = runner(10 * 60 * 1000, queue, {
        recoveryIntervalMs: 5,
        now: () => new Date('2026-03-02T07:00:00Z'),
      });

      jobRunner.start();
      for (let attempt = 0; attempt < 100 && store.execution(stale.id)?.status !== 'failed'; attempt++) {
        await sleep(5);
      }
      await jobRunner.stop();

      expect(store.execution(stale.id)).toMatchObject({ status: 'failed', generalError: INTERRUPTED_MESSAGE });

      const later = store.seedExecution({
        tripId: 2,
        status: 'processing',
        updatedAt: new Date('2026-03-02T06:00:00Z'),
      });
      await sleep(30);

      expect(store.execution(later.id)?.status).toBe('processing');
    });
  });

  describe('start() / stop()', () => {
    it('consumes queued jobs until stopped', async () => {
      const execution = store.seedExecution({ tripId: 1 });
      let ran: () => void = () => undefined;
      const executed = new Promise<void>((resolve) => {
        ran = resolve;
      });
      execute.mockImplementation(async () => {
        ran();
        return COMPLETED;
      });

      const jobRunner = runner();
      jobRunner.start();
      await queue.enqueue(jobFor(execution.id, execution.jobId));
      await executed;
      await jobRunner.stop();

      expect(execute).toHaveBeenCalledTimes(1);
    });

    it('keeps polling after a failed dequeue', async () => {
      const execution = store.seedExecution({ tripId: 1 });
      let ran: () => void = () => undefined;
      const executed = new Promise<void>((resolve) => {
        ran = resolve;
      });
      execute.mockImplementation(async () => {
        ran();
        return COMPLETED;
      });

      const flaky: JobQueue = {
        enqueue: async () => true,
        dequeue: jest
          .fn<JobQueue['dequeue']>()
          .mockRejectedValueOnce(new Error('connection reset'))
          .mockResolvedValueOnce(jobFor(execution.id, execution.jobId))
          .mockImplementation(() => new Promise((resolve) => setTimeout(() => resolve(null), 5))),
        close: async () => undefined,
      };

      const jobRunner = runner(1000, flaky);
      jobRunner.start();
      await executed;
      await jobRunner.stop();

      expect(execute).toHaveBeenCalledTimes(1);
    });
  });
});
