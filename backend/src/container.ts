/**
 * Wiring shared by the API and worker processes.
 */

import type { Pool } from 'pg';
import { AppConfig } from './config/env';
import { DatabasePool, createDatabase, createPool } from './config/database';
import { RedisConnection, createRedisConnection } from './config/redis';
import { RedisJobQueue } from './queue/redis-job-queue';
import { createRepositories } from './repositories';
import { PgExecutionStateStore } from './services/execution-state.service';

export interface Container {
  pool: Pool;
  db: DatabasePool;
  redis: RedisConnection;
  queue: RedisJobQueue;
  store: PgExecutionStateStore;
}

export function createContainer(config: AppConfig): Container {
  const pool = createPool(config.databaseUrl, config.databasePoolMax);
  const db = createDatabase(pool);
  const redis = createRedisConnection(config.redisUrl);

  return {
    pool,
    db,
    redis,
    queue: new RedisJobQueue(redis),
    store: new PgExecutionStateStore(createRepositories(db)),
  };
}
