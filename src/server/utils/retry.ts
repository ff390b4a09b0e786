/**
 * Retry Utility with Exponential Backoff
 *
 * Shared retry loop for page fetches and storage writes. Cancellation is
 * checked before every retry so a cancelled job stops waiting on a dead URL.
 */

import { FetchError, getErrorMessage } from '../types/errors.js';
import { logger } from './logger.js';

export interface RetryConfig {
  /** Number of retries after the first attempt (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  isRetryable?: (error: unknown) => boolean;
  /** Checked before each retry; returning true stops retrying and rethrows the last error */
  shouldAbort?: () => boolean;
  onRetry?: (attempt: number, error: unknown, delay: number) => void;
}

const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
} as const;

/**
 * Retries on retryable FetchErrors, 429/5xx status codes and common network error codes.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof FetchError) {
    return error.retryable;
  }

  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    const status = error.statusCode;
    return status === 429 || (status >= 500 && status < 600);
  }

  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED') {
      return true;
    }
  }

  const message = getErrorMessage(error).toLowerCase();
  return message.includes('timeout') || message.includes('network') || message.includes('connection');
}

export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry an operation with exponential backoff
 *
 * @param context - Label used in log lines (operation name, URL)
 * @throws The last error if all retries are exhausted, the error is not retryable, or the caller aborted
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = isRetryableError,
    shouldAbort,
    onRetry,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info({ attempt: attempt + 1, context }, `Operation succeeded after ${attempt} retry attempts${contextStr}`);
      }
      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        logger.debug(
          { attempt: attempt + 1, error: getErrorMessage(error), context },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.warn(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, error: getErrorMessage(error), context },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      if (shouldAbort?.()) {
        logger.debug({ attempt: attempt + 1, context }, `Retry aborted${contextStr}`);
        throw error;
      }

      const delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);
      logger.warn(
        { attempt: attempt + 1, maxAttempts: maxAttempts + 1, delay, error: getErrorMessage(error), context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );
      onRetry?.(attempt + 1, error, delay);

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
