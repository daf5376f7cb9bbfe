/**
 * Retry Service
 * Exponential backoff with jitter around transient request failures
 */

import { isTransientError } from '../lib/errors.js';

export interface RetryConfig {
  /** Maximum number of retry attempts after the first one (default: 4, i.e. 5 attempts) */
  maxRetries: number;
  /** Base delay in milliseconds, doubled on every attempt (default: 2000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (error: unknown) => boolean;
  /** Callback called before each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_CONFIG: Omit<RetryConfig, 'shouldRetry' | 'onRetry'> = {
  maxRetries: 4,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
};

/**
 * Error thrown when all retry attempts are exhausted
 */
export class RetryError extends Error {
  public readonly code = 'RETRY_EXHAUSTED';
  public readonly originalError: unknown;
  public readonly attempts: number;

  constructor(message: string, originalError: unknown, attempts: number) {
    super(message, { cause: originalError });
    this.name = 'RetryError';
    this.originalError = originalError;
    this.attempts = attempts;
  }
}

/**
 * Calculate backoff delay with jitter
 * @param attempt The attempt that just failed (1-based)
 * @returns Delay in milliseconds
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>
): number {
  if (config.baseDelayMs === 0) {
    return 0;
  }

  const normalizedAttempt = Math.max(1, attempt);

  // baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, normalizedAttempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // 0-10% of base delay
  const jitter = Math.random() * config.baseDelayMs * 0.1;

  return cappedDelay + jitter;
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

/**
 * Execute a function with retry logic
 * @throws RetryError if all retries are exhausted on a retryable error
 */
export async function retry<T>(
  fn: RetryableFunction<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const fullConfig = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };
  const shouldRetry = config.shouldRetry ?? isTransientError;
  const maxAttempts = fullConfig.maxRetries + 1;

  let attempt = 0;

  for (;;) {
    attempt++;

    try {
      return await fn({ attempt });
    } catch (error) {
      const retryable = shouldRetry(error);

      if (!retryable) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        // Only wrap when at least one retry actually happened
        if (fullConfig.maxRetries > 0) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new RetryError(`Failed after ${attempt} attempts: ${reason}`, error, attempt);
        }
        throw error;
      }

      const delay = calculateBackoff(attempt, fullConfig);
      fullConfig.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
