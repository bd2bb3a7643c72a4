/**
 * Environment Configuration
 *
 * Loads `.env` through dotenv and parses process.env into a typed config.
 * Invalid or missing required settings fail fast at startup.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromEnv(3000),
  API_VERSION: z.string().default('v1'),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_MAX: intFromEnv(10),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  INVENTORY_API_URL: z.string().url('INVENTORY_API_URL must be a URL'),
  INVENTORY_USERNAME: z.string().min(1, 'INVENTORY_USERNAME is required'),
  INVENTORY_PASSWORD: z.string().min(1, 'INVENTORY_PASSWORD is required'),
  INVENTORY_LICENSE: z.string().min(1, 'INVENTORY_LICENSE is required'),
  INVENTORY_LOCATION: z.string().min(1, 'INVENTORY_LOCATION is required'),
  INVENTORY_ENVIRONMENT: z.enum(['production', 'training']).default('training'),
  INVENTORY_TIMEOUT_MS: intFromEnv(30_000),
  INVENTORY_MAX_ATTEMPTS: intFromEnv(3),
  INVENTORY_RETRY_BASE_MS: intFromEnv(1_000),

  JOB_TIMEOUT_MS: intFromEnv(600_000),
  WORKER_CONCURRENCY: intFromEnv(1),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  apiVersion: string;
  allowedOrigins: string[];
  databaseUrl: string;
  databasePoolMax: number;
  redisUrl: string;
  inventory: {
    apiUrl: string;
    username: string;
    password: string;
    license: string;
    location: string;
    environment: Env['INVENTORY_ENVIRONMENT'];
    timeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
  };
  worker: {
    jobTimeoutMs: number;
    concurrency: number;
  };
}

/**
 * Parses the given environment (process.env by default).
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    apiVersion: env.API_VERSION,
    allowedOrigins: env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()),
    databaseUrl: env.DATABASE_URL,
    databasePoolMax: env.DATABASE_POOL_MAX,
    redisUrl: env.REDIS_URL,
    inventory: {
      apiUrl: env.INVENTORY_API_URL,
      username: env.INVENTORY_USERNAME,
      password: env.INVENTORY_PASSWORD,
      license: env.INVENTORY_LICENSE,
      location: env.INVENTORY_LOCATION,
      environment: env.INVENTORY_ENVIRONMENT,
      timeoutMs: env.INVENTORY_TIMEOUT_MS,
      maxAttempts: env.INVENTORY_MAX_ATTEMPTS,
      retryBaseDelayMs: env.INVENTORY_RETRY_BASE_MS,
    },
    worker: {
      jobTimeoutMs: env.JOB_TIMEOUT_MS,
      concurrency: env.WORKER_CONCURRENCY,
    },
  };
}
