/**
 * Structured Logger
 *
 * Winston-based logger with:
 * - JSON format for production, colorized console for development
 * - Correlation IDs for request and job tracing
 * - Log rotation with daily rotation and size limits
 * - Sensitive data filtering (credentials, session ids)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { AsyncLocalStorage } from 'async_hooks';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

export interface LogContext {
  correlationId: string;
  jobId?: string;
  tripId?: number;
}

// Async local storage for correlation IDs (HTTP requests and worker jobs)
export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Sensitive field patterns to redact from logs
 */
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'secret',
  'authorization',
  'cookie',
  'session',
  'sessionid',
  'license_number',
  'DATABASE_URL',
];

/**
 * Sanitize sensitive data from log metadata
 */
export function sanitizeData(data: unknown): unknown {
  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    // Don't log long strings that might contain sensitive data
    if (data.length > 500) {
      return `[String of length ${data.length}]`;
    }
    return data;
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (Array.isArray(data)) {
    return data.map(sanitizeData);
  }

  if (typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      const isSensitive = SENSITIVE_FIELDS.some((field) =>
        lowerKey.includes(field.toLowerCase())
      );

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeData(value);
      }
    }

    return sanitized;
  }

  return data;
}

function sanitizeRecord(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized = sanitizeData(data);
  return typeof sanitized === 'object' && sanitized !== null && !Array.isArray(sanitized)
    ? { ...sanitized }
    : {};
}

/**
 * Adds correlation/job IDs and sanitizes metadata
 */
const correlationFormat = winston.format((info) => {
  const store = asyncLocalStorage.getStore();

  if (store) {
    info.correlationId = store.correlationId;
    if (store.jobId) info.jobId = store.jobId;
    if (store.tripId !== undefined) info.tripId = store.tripId;
  }

  const { level, message, timestamp, correlationId, jobId, tripId, service, environment, stack, ...metadata } = info;

  return {
    level,
    message,
    timestamp,
    correlationId,
    jobId,
    tripId,
    service,
    environment,
    stack,
    ...sanitizeRecord(metadata),
  };
});

/**
 * Readable console output for development
 */
const devFormat = printf(({ level, message, timestamp, correlationId, ...metadata }) => {
  let msg = `${timestamp}`;

  if (correlationId) {
    msg += ` [${correlationId}]`;
  }

  msg += ` [${level}]: ${message}`;

  const { service, environment, ...rest } = metadata;
  const populated = Object.entries(rest).filter(([, value]) => value !== undefined);

  if (populated.length > 0) {
    msg += ` ${JSON.stringify(Object.fromEntries(populated))}`;
  }

  return msg;
});

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const baseFormat = combine(
  errors({ stack: true }),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  correlationFormat()
);

const transports: winston.transport[] = [];

transports.push(
  new winston.transports.Console({
    format: isDevelopment ? combine(colorize(), devFormat) : combine(json()),
    silent: isTest,
  })
);

if (!isDevelopment && !isTest) {
  // Error log - keep for 30 days, max 20MB per file
  transports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: json(),
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    })
  );

  // Combined log - keep for 14 days
  transports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      format: json(),
      maxSize: '20m',
      maxFiles: '14d',
      zippedArchive: true,
    })
  );
}

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: baseFormat,
  defaultMeta: {
    service: process.env.SERVICE_NAME || 'trip-execution',
    environment: process.env.NODE_ENV || 'development',
  },
  transports,
  exitOnError: false,
});

/**
 * Runs `fn` with the given job context attached to every log line.
 */
export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

// Stream for Morgan HTTP logging
export const stream = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

/**
 * Helper functions for common log scenarios
 */
export const logHelpers = {
  apiRequest: (method: string, path: string, meta?: Record<string, unknown>) => {
    logger.info(`API Request: ${method} ${path}`, meta);
  },

  apiResponse: (method: string, path: string, statusCode: number, duration: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logger.log(level, `API Response: ${method} ${path}`, {
      statusCode,
      duration: `${duration}ms`,
    });
  },

  remoteCall: (action: string, attempt: number, meta?: Record<string, unknown>) => {
    logger.debug(`Inventory API: ${action}`, { attempt, ...meta });
  },

  business: (event: string, meta?: Record<string, unknown>) => {
    logger.info(`Business Event: ${event}`, meta);
  },
};
