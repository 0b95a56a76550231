/**
 * Reusable retry logic utility
 */

import { NavigationTimeoutError } from "../errors";
import { systemClock } from "./clock";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  jitterMs?: number;
  retryCondition?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message, { cause: originalError });
    this.name = "RetryError";
  }
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws RetryError if all retries are exhausted
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    backoffMultiplier = 2,
    jitterMs = 250,
    retryCondition = () => true,
    onRetry,
    sleep = systemClock.sleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      // Check if we should retry this error
      if (!retryCondition(lastError)) {
        throw lastError;
      }

      if (attempt >= maxRetries) {
        throw new RetryError(
          `Operation failed after ${maxRetries + 1} attempts`,
          lastError,
          attempt + 1,
        );
      }

      // Calculate delay with exponential backoff and jitter
      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delay = baseDelayMs * Math.pow(backoffMultiplier, attempt) + jitter;

      onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

/**
 * Default retry options for page navigation and waits
 */
export const NAVIGATION_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 1000,
  backoffMultiplier: 1.5,
  jitterMs: 500,
  retryCondition: (error) => error instanceof NavigationTimeoutError,
};

/**
 * Default retry options for checkpoint writes
 */
export const PERSIST_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 100,
  backoffMultiplier: 2,
  jitterMs: 50,
  retryCondition: (error) => {
    // Retry on transient file system failures
    const message = error.message.toLowerCase();
    return (
      message.includes("ebusy") ||
      message.includes("eagain") ||
      message.includes("emfile")
    );
  },
};
