/**
 * Rate Limit and Retry Utilities
 *
 * Retry policy for private exchange calls:
 * - Up to 3 attempts
 * - Linear backoff: attempt × 500ms between attempts
 * - Only transport failures are retried; exchange rejections are terminal
 */

import { TransportError, toError } from "../../errors/app.errors";
import { sleep as defaultSleep } from "../../utils/clock";

// ============================================================================
// Configuration
// ============================================================================

export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay unit; the wait after attempt n is n × backoffStepMs */
  backoffStepMs: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  backoffStepMs: 500,
};

export interface RateLimitConfig {
  /** Maximum requests per window */
  maxRequests: number;
  /** Window duration in ms */
  windowMs: number;
}

/** Conservative default for the private endpoints */
export const DEFAULT_RATE_LIMIT_CONFIG: Readonly<RateLimitConfig> = {
  maxRequests: 15,
  windowMs: 3000,
};

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Transport/HTTP failures are retryable; everything else is terminal
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError;
}

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Linear backoff: the wait after attempt `attempt` (1-based)
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
): number {
  return attempt * config.backoffStepMs;
}

/**
 * Execute a function with retry logic.
 * Resolves with the first successful value; rejects with the last error.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  options: {
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
  } = {},
): Promise<T> {
  const fullConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const wait = options.sleep ?? defaultSleep;

  let lastError: Error = new Error("withRetry: no attempts made");

  for (let attempt = 1; attempt <= fullConfig.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = toError(err);

      if (!isRetryableError(err) || attempt >= fullConfig.maxAttempts) {
        throw lastError;
      }

      const delayMs = calculateBackoff(attempt, fullConfig);
      options.onRetry?.(attempt, lastError, delayMs);
      await wait(delayMs);
    }
  }

  throw lastError;
}

// ============================================================================
// Rate Limiter
// ============================================================================

/**
 * Simple sliding window rate limiter with concurrency-safe waitAndRecord
 */
export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private timestamps: number[] = [];
  private waitQueue: Promise<void> = Promise.resolve();

  constructor(
    config: Partial<RateLimitConfig> = {},
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<void> = defaultSleep,
  ) {
    const fullConfig = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
    this.maxRequests = fullConfig.maxRequests;
    this.windowMs = fullConfig.windowMs;
  }

  recordRequest(): void {
    this.pruneOldTimestamps();
    this.timestamps.push(this.now());
  }

  /**
   * Wait until a request can be made, then record it.
   * Serialized so concurrent callers cannot exceed the limit.
   */
  async waitAndRecord(): Promise<void> {
    const run = async (): Promise<void> => {
      const waitTime = this.getWaitTime();
      if (waitTime > 0) {
        await this.wait(waitTime);
      }
      this.recordRequest();
    };

    const next = this.waitQueue.then(run, run);
    // Keep the queue usable after a rejected waiter.
    this.waitQueue = next.catch(() => undefined);
    return next;
  }

  /**
   * Time until next request can be made (0 if it can be made now)
   */
  getWaitTime(): number {
    this.pruneOldTimestamps();
    if (this.timestamps.length < this.maxRequests) {
      return 0;
    }
    return Math.max(0, this.timestamps[0] + this.windowMs - this.now());
  }

  private pruneOldTimestamps(): void {
    const cutoff = this.now() - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }
}

/**
 * Execute a function with both rate limiting and retry logic.
 * Every attempt, retries included, takes a rate limiter slot.
 */
export async function withRateLimitAndRetry<T>(
  fn: () => Promise<T>,
  limiter: RateLimiter,
  retryConfig: Partial<RetryConfig> = {},
  options: {
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
  } = {},
): Promise<T> {
  const wrappedFn = async (): Promise<T> => {
    await limiter.waitAndRecord();
    return fn();
  };

  return withRetry(wrappedFn, retryConfig, options);
}
