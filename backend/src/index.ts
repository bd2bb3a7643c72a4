/**
 * Trip Execution API Server
 *
 * Express server with:
 * - Structured logging (Winston)
 * - Security middleware (Helmet)
 * - Request validation (Zod)
 * - Error handling
 * - Health checks
 */

import { createApp } from './app';
import { loadConfig } from './config/env';
import { connectRedis, disconnectRedis } from './config/redis';
import { createContainer } from './container';
import { TripExecutionService } from './services/trip-execution.service';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  const container = createContainer(config);

  await connectRedis(container.redis, config.redisUrl);

  const app = createApp({
    tripExecutionService: new TripExecutionService(
      container.store,
      container.queue,
      () => new Date(),
      config.worker.jobTimeoutMs
    ),
    health: {
      database: () => container.db.query('SELECT 1'),
      redis: () => container.redis.ping(),
    },
    apiVersion: config.apiVersion,
    allowedOrigins: config.allowedOrigins,
  });

  const server = app.listen(config.port, () => {
    logger.info('Trip Execution API started', {
      port: config.port,
      apiVersion: config.apiVersion,
      environment: config.nodeEnv,
      healthCheck: `http://localhost:${config.port}/health`,
      apiDocs: `http://localhost:${config.port}/api-docs`,
    });
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down gracefully`);
    await new Promise<void>((resolve) => server.close(() => resolve()));
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
  logger.error('API failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
