/**
 * Trip Execution Worker
 *
 * Consumes trip execution jobs from Redis. On start, executions left active
 * by a dead worker are finalized as failed.
 */

import { InventoryClient } from './clients/inventory.client';
import { loadConfig } from './config/env';
import { connectRedis, disconnectRedis } from './config/redis';
import { createContainer } from './container';
import { JobRunner } from './queue/job-runner';
import { RetryPolicy } from './services/retry.service';
import { TripOrchestrator } from './services/trip-orchestrator.service';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  const container = createContainer(config);

  await connectRedis(container.redis, config.redisUrl);

  const inventory = new InventoryClient(
    config.inventory,
    new RetryPolicy({
      maxAttempts: config.inventory.maxAttempts,
      baseDelayMs: config.inventory.retryBaseDelayMs,
    })
  );

  const runner = new JobRunner(
    container.queue,
    new TripOrchestrator(container.store, inventory),
    container.store,
    {
      concurrency: config.worker.concurrency,
      jobTimeoutMs: config.worker.jobTimeoutMs,
    }
  );

  await runner.recoverStale();
  runner.start();

  logger.info('Trip execution worker started', {
    environment: config.inventory.environment,
    concurrency: config.worker.concurrency,
    jobTimeoutMs: config.worker.jobTimeoutMs,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, draining worker`);
    await runner.stop();
    await container.queue.close();
    await disconnectRedis(container.redis);
    await container.db.end();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Worker failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
