/**
 * Redis Configuration
 *
 * Redis client backing the trip execution job queue.
 */

import { createClient } from 'redis';
import { logger } from '../utils/logger';

export type RedisConnection = ReturnType<typeof createClient>;

function maskUrl(url: string): string {
  return url.replace(/:[^:]*@/, ':***@'); // Hide password
}

/**
 * Creates (but does not connect) a Redis client with logging and a bounded
 * reconnect strategy.
 */
export function createRedisConnection(url: string): RedisConnection {
  const client = createClient({
    url,
    socket: {
      reconnectStrategy: (retries) => {
        if (retries > 10) {
          logger.error('Redis reconnection attempts exceeded', { retries });
          return new Error('Redis reconnection failed');
        }
        // Exponential backoff
        const delay = Math.min(retries * 100, 3000);
        logger.warn('Redis reconnecting', { retries, delay });
        return delay;
      },
    },
  });

  client.on('error', (error: Error) => {
    logger.error('Redis client error', { error: error.message });
  });

  client.on('ready', () => {
    logger.info('Redis client ready');
  });

  return client;
}

/**
 * Connects and pings. Throws when Redis is unreachable.
 */
export async function connectRedis(client: RedisConnection, url: string): Promise<void> {
  if (client.isOpen) {
    return;
  }

  try {
    await client.connect();
    await client.ping();
    logger.info('Redis connected successfully', { url: maskUrl(url) });
  } catch (error) {
    logger.error('Redis connection failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      url: maskUrl(url),
    });
    throw error;
  }
}

/**
 * Close Redis connection gracefully
 */
export async function disconnectRedis(client: RedisConnection): Promise<void> {
  if (!client.isOpen) {
    return;
  }

  try {
    await client.quit();
    logger.info('Redis connection closed');
  } catch (error) {
    logger.error('Error closing Redis connection', {
      error: error instanceof Error ? error.message : 'Unknown',
    });
  }
}
