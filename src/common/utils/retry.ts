import { Logger } from '@nestjs/common';
import { AppError, describeError } from '@common/utils/error-handler';

/**
 * Configuration options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts, the first one included (default: 3)
   */
  maxAttempts?: number;

  /**
   * Delay before the first retry in milliseconds (default: 1000ms)
   */
  retryDelayMs?: number;

  /**
   * Whether to use exponential backoff for retries (default: true)
   */
  useExponentialBackoff?: boolean;

  /**
   * Factor for exponential backoff calculation (default: 2)
   */
  backoffFactor?: number;

  /**
   * Upper bound for a single delay in milliseconds (default: 30000ms)
   */
  maxDelayMs?: number;

  /**
   * Decides whether a failed attempt may be repeated (default: AppError.retryable)
   */
  isRetryable?: (error: unknown) => boolean;

  /**
   * Label used in log lines
   */
  operation?: string;
}

const logger = new Logger('Retry');

export function isRetryableError(error: unknown): boolean {
  return error instanceof AppError && error.retryable;
}

/**
 * Delay before retry number `attempt` (1-based)
 */
export function computeBackoffDelay(attempt: number, options: RetryOptions = {}): number {
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const delay =
    options.useExponentialBackoff === false
      ? retryDelayMs
      : retryDelayMs * Math.pow(options.backoffFactor ?? 2, attempt - 1);
  return Math.min(delay, options.maxDelayMs ?? 30000);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or the attempts run out.
 * `fn` receives the 1-based attempt number.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const isRetryable = options.isRetryable ?? isRetryableError;
  const operation = options.operation ?? 'operation';

  let attempt = 0;
  while (true) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      // If this is our last attempt or the error is final, don't delay, just throw
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, options);
      logger.debug(`Retry attempt ${attempt}/${maxAttempts} for ${operation} after ${delay}ms: ${describeError(error)}`);
      await sleep(delay);
    }
  }
}
