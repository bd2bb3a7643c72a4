/**
 * Job Runner
 *
 * Pulls trip execution jobs off the queue with a fixed number of slots and
 * runs each under a job-level timeout. A timed-out execution is finalized
 * failed and the orchestrator is signalled to stop before its next step;
 * an in-flight remote call is not cancelled. While running, executions
 * orphaned by a dead worker are swept on an interval.
 */

import { INTERRUPTED_MESSAGE } from '../services/execution-state.service';
import type { ExecutionHandle, ExecutionStateStore } from '../services/execution-state.service';
import type { TripExecutionResult } from '../services/trip-orchestrator.service';
import { logger, runWithLogContext } from '../utils/logger';
import type { JobQueue, TripExecutionJob } from './job-queue';

export interface TripExecutor {
  execute(handle: ExecutionHandle, signal?: AbortSignal): Promise<TripExecutionResult>;
}

export interface JobRunnerOptions {
  concurrency: number;
  jobTimeoutMs: number;
  /** BRPOP wait per poll. Default: 5 seconds */
  pollTimeoutSeconds?: number;
  /** Pause after a failed dequeue. Default: 1 second */
  errorBackoffMs?: number;
  /** Period of the stale-execution sweep. Default: 1 minute */
  recoveryIntervalMs?: number;
  now?: () => Date;
}

export function timeoutMessage(jobTimeoutMs: number): string {
  return `Execution timed out after ${jobTimeoutMs}ms`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JobRunner {
  private running = false;
  private loops: Promise<void>[] = [];
  private recoveryTimer: NodeJS.Timeout | undefined;
  private readonly pollTimeoutSeconds: number;
  private readonly errorBackoffMs: number;
  private readonly recoveryIntervalMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly queue: JobQueue,
    private readonly executor: TripExecutor,
    private readonly store: ExecutionStateStore,
    private readonly options: JobRunnerOptions
  ) {
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 5;
    this.errorBackoffMs = options.errorBackoffMs ?? 1000;
    this.recoveryIntervalMs = options.recoveryIntervalMs ?? 60_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs one job to completion or timeout. Returns null on timeout.
   */
  async runJob(job: TripExecutionJob): Promise<TripExecutionResult | null> {
    const handle: ExecutionHandle = { executionId: job.executionId, tripId: job.tripId, jobId: job.jobId };

    return runWithLogContext({ correlationId: job.jobId, jobId: job.jobId, tripId: job.tripId }, async () => {
      const controller = new AbortController();
      let timer: NodeJS.Timeout | undefined;

      const timedOut = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), this.options.jobTimeoutMs);
      });

      logger.info('Job started', { executionId: job.executionId });
      const execution = this.executor.execute(handle, controller.signal);

      try {
        const outcome = await Promise.race([execution, timedOut]);

        if (outcome !== 'timeout') {
          logger.info('Job finished', { status: outcome.status, applied: outcome.applied });
          return outcome;
        }

        const message = timeoutMessage(this.options.jobTimeoutMs);
        controller.abort(new Error(message));

        // The orchestrator keeps running until its next checkpoint
        execution.catch((error: unknown) => {
          logger.error('Timed-out execution failed after abort', { error: describe(error) });
        });

        logger.error('Job timed out', { timeoutMs: this.options.jobTimeoutMs });
        await this.store.finalize(handle, 'failed', { progressMessage: message, generalError: message });
        return null;
      } finally {
        clearTimeout(timer);
      }
    });
  }

  /**
   * Starts `concurrency` consumer loops and the stale-execution sweep.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;

    for (let slot = 0; slot < this.options.concurrency; slot++) {
      this.loops.push(this.consume(slot));
    }

    this.recoveryTimer = setInterval(() => {
      this.recoverStale().catch((error: unknown) => {
        logger.error('Stale execution sweep failed', { error: describe(error) });
      });
    }, this.recoveryIntervalMs);

    logger.info('Job runner started', { concurrency: this.options.concurrency });
  }

  /**
   * Stops polling and waits for in-flight jobs.
   */
  async stop(): Promise<void> {
    this.running = false;
    clearInterval(this.recoveryTimer);
    this.recoveryTimer = undefined;
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('Job runner stopped');
  }

  /**
   * Finalizes active executions not written for longer than the job timeout;
   * their worker is gone.
   */
  async recoverStale(now: Date = this.now()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.options.jobTimeoutMs);
    const stale = await this.store.findStaleExecutions(cutoff);

    let recovered = 0;
    for (const handle of stale) {
      const applied = await this.store.finalize(handle, 'failed', {
        progressMessage: INTERRUPTED_MESSAGE,
        generalError: INTERRUPTED_MESSAGE,
      });
      if (applied) recovered++;
    }

    if (stale.length > 0) {
      logger.warn('Recovered stale executions', { found: stale.length, recovered });
    }
    return recovered;
  }

  private async consume(slot: number): Promise<void> {
    while (this.running) {
      let job: TripExecutionJob | null;

      try {
        job = await this.queue.dequeue(this.pollTimeoutSeconds);
      } catch (error) {
        logger.error('Failed to dequeue job', { slot, error: describe(error) });
        await new Promise((resolve) => setTimeout(resolve, this.errorBackoffMs));
        continue;
      }

      if (!job) {
        continue;
      }

      try {
        await this.runJob(job);
      } catch (error) {
        logger.error('Job crashed', { slot, jobId: job.jobId, tripId: job.tripId, error: describe(error) });
      }
    }
  }
}
