/**
 * Redis-backed job queue: LPUSH to enqueue, BRPOP on a dedicated
 * connection to consume, SET NX to drop duplicate job ids.
 */

import type { RedisConnection } from '../config/redis';
import { logger } from '../utils/logger';
import { JobQueue, TRIP_EXECUTION_QUEUE, TripExecutionJob, tripExecutionJobSchema } from './job-queue';

export interface RedisJobQueueOptions {
  queueName?: string;
  /** How long a job id is remembered for dedupe. Default: 1 day */
  dedupeTtlSeconds?: number;
}

export class RedisJobQueue implements JobQueue {
  private readonly queueName: string;
  private readonly dedupeTtlSeconds: number;
  private blocking: RedisConnection | null = null;

  constructor(
    private readonly client: RedisConnection,
    options: RedisJobQueueOptions = {}
  ) {
    this.queueName = options.queueName ?? TRIP_EXECUTION_QUEUE;
    this.dedupeTtlSeconds = options.dedupeTtlSeconds ?? 24 * 60 * 60;
  }

  async enqueue(job: TripExecutionJob): Promise<boolean> {
    const marker = await this.client.set(`${this.queueName}:job:${job.jobId}`, job.enqueuedAt, {
      NX: true,
      EX: this.dedupeTtlSeconds,
    });

    if (marker === null) {
      logger.info('Job already queued', { jobId: job.jobId, tripId: job.tripId });
      return false;
    }

    await this.client.lPush(this.queueName, JSON.stringify(job));
    logger.info('Job enqueued', { queue: this.queueName, jobId: job.jobId, tripId: job.tripId });
    return true;
  }

  async dequeue(timeoutSeconds: number): Promise<TripExecutionJob | null> {
    const connection = await this.blockingConnection();
    const popped = await connection.brPop(this.queueName, timeoutSeconds);

    if (!popped) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(popped.element);
    } catch (error) {
      logger.error('Dropping unreadable job', {
        queue: this.queueName,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = tripExecutionJobSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Dropping malformed job', { queue: this.queueName, issues: parsed.error.errors });
      return null;
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    if (this.blocking?.isOpen) {
      await this.blocking.quit();
    }
    this.blocking = null;
  }

  // BRPOP blocks its connection, so it gets one of its own
  private async blockingConnection(): Promise<RedisConnection> {
    if (!this.blocking) {
      this.blocking = this.client.duplicate();
      this.blocking.on('error', (error: Error) => {
        logger.error('Redis blocking connection error', { error: error.message });
      });
    }
    if (!this.blocking.isOpen) {
      await this.blocking.connect();
    }
    return this.blocking;
  }
}
