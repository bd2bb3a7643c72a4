/**
 * Retry Policy
 *
 * Bounded exponential backoff applied by the inventory client around every
 * remote call.
 *
 * Defaults:
 *   max attempts : 3 (including the first)
 *   base delay   : 1 second
 *   multiplier   : 2
 *   max delay    : 30 seconds
 *
 * Delay before attempt n+1 (n = attempt that just failed, 1-indexed):
 *   delay = min(base * multiplier^(n-1), maxDelay)
 *
 *   1 → 1 s    2 → 2 s
 *
 * Only transient failures are retried. Semantic rejections, protocol errors,
 * auth failures and local validation errors surface on the first attempt.
 */

import {
  ApiError,
  TransientRemoteError,
} from '../models/errors/api-error';
import { logger } from '../utils/logger';

// ============================================================================
// Configuration
// ============================================================================

export interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 3 */
  maxAttempts?: number;
  /** Delay in ms before the second attempt. Default: 1000 */
  baseDelayMs?: number;
  /** Factor applied to the delay after every failed attempt. Default: 2 */
  backoffMultiplier?: number;
  /** Hard cap on delay in ms. Default: 30_000 */
  maxDelayMs?: number;
  /** Override the transient-error classifier. */
  isRetryable?: (error: unknown) => boolean;
  /** Injected for tests; defaults to a setTimeout-based sleep. */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
};

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
]);

// ============================================================================
// Transient error classification
// ============================================================================

/**
 * Returns true if the error represents a transient condition that is safe to
 * retry. Typed pipeline errors decide by class; a raw error is transient only
 * when it carries a network error code.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientRemoteError) return true;
  if (error instanceof ApiError) return false;
  if (!(error instanceof Error)) return false;

  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code);
}

// ============================================================================
// Policy
// ============================================================================

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    this.backoffMultiplier = options.backoffMultiplier ?? DEFAULTS.backoffMultiplier;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    this.isRetryable = options.isRetryable ?? isTransientError;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delay to wait after `attempt` (1-indexed) has failed.
   */
  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * Math.pow(this.backoffMultiplier, attempt - 1);
    return Math.round(Math.min(exponential, this.maxDelayMs));
  }

  /**
   * Executes `operation`, retrying transient failures with backoff.
   *
   * Non-retryable errors are thrown immediately. If all attempts are
   * exhausted the last error is re-thrown.
   *
   * @example
   * const ids = await policy.execute(() => client.post(body), 'inventory_split');
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, context = 'operation'): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const result = await operation(attempt);

        if (attempt > 1) {
          logger.info('Retry succeeded', { context, attempt, maxAttempts: this.maxAttempts });
        }

        return result;
      } catch (error) {
        lastError = error;

        if (!this.isRetryable(error)) {
          throw error;
        }

        if (attempt === this.maxAttempts) {
          logger.error('All retry attempts exhausted', {
            context,
            attempts: attempt,
            finalError: error instanceof Error ? error.message : String(error),
          });
          break;
        }

        const delayMs = this.delayFor(attempt);

        logger.warn('Transient error, retrying with backoff', {
          context,
          attempt,
          maxAttempts: this.maxAttempts,
          delayMs,
          reason: error instanceof Error ? error.message : String(error),
        });

        await this.sleep(delayMs);
      }
    }

    throw lastError;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
