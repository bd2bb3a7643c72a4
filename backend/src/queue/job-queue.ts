/**
 * Trip execution job queue
 *
 * The API pushes one job per created execution record; the worker pops
 * them. RedisJobQueue is used in deployment, InMemoryJobQueue by tests and
 * single-process runs.
 */

import { z } from 'zod';

export const TRIP_EXECUTION_QUEUE = 'trip_execution';

export const tripExecutionJobSchema = z.object({
  jobId: z.string().min(1),
  tripId: z.number().int().positive(),
  executionId: z.number().int().positive(),
  enqueuedAt: z.string(),
});

export type TripExecutionJob = z.infer<typeof tripExecutionJobSchema>;

export interface JobQueue {
  /** Returns false when a job with the same id was already queued. */
  enqueue(job: TripExecutionJob): Promise<boolean>;
  /** Waits up to `timeoutSeconds` for a job. */
  dequeue(timeoutSeconds: number): Promise<TripExecutionJob | null>;
  close(): Promise<void>;
}

type Waiter = (job: TripExecutionJob | null) => void;

export class InMemoryJobQueue implements JobQueue {
  private readonly jobs: TripExecutionJob[] = [];
  private readonly seen = new Set<string>();
  private readonly waiters: Waiter[] = [];
  private closed = false;

  async enqueue(job: TripExecutionJob): Promise<boolean> {
    if (this.seen.has(job.jobId)) {
      return false;
    }
    this.seen.add(job.jobId);

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(job);
    } else {
      this.jobs.push(job);
    }
    return true;
  }

  dequeue(timeoutSeconds: number): Promise<TripExecutionJob | null> {
    const next = this.jobs.shift();
    if (next || this.closed) {
      return Promise.resolve(next ?? null);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = (job) => {
        clearTimeout(timer);
        resolve(job);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(null);
      }, timeoutSeconds * 1000);
      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  get size(): number {
    return this.jobs.length;
  }
}
