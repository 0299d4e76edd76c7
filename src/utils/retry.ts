/**
 * Retry with exponential backoff
 *
 * Only errors classified as transient are retried; anything else
 * propagates on the first attempt.
 */

import { ModelInvocationError, RetryError, TimeoutError, TurnCancelledError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { sleep } from './timeout.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  jitter: boolean;
}

export const NETWORK_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  exponentialBase: 2,
  jitter: true,
};

export const RATE_LIMITED_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 2000,
  maxDelayMs: 120_000,
  exponentialBase: 2,
  jitter: true,
};

export interface RetryOptions {
  policy?: RetryPolicy;
  label?: string;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Transient: timeouts, network failures, 408/429/5xx responses.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TurnCancelledError) {
    return false;
  }
  if (error instanceof ModelInvocationError) {
    return error.retryable;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return false;
  }
  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('fetch failed') ||
    message.includes('connection') ||
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('econnrefused')
  );
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  let delay = policy.baseDelayMs * Math.pow(policy.exponentialBase, attempt);
  delay = Math.min(delay, policy.maxDelayMs);

  if (policy.jitter) {
    const jitterRange = delay * 0.1;
    delay += (Math.random() * 2 - 1) * jitterRange;
  }

  return Math.max(0, delay);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy = options.policy ?? NETWORK_RETRY_POLICY;
  const label = options.label ?? 'operation';
  const isRetryable = options.isRetryable ?? isRetryableError;
  let lastError: unknown;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new TurnCancelledError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        logger.debug(`Non-retryable error in ${label}: ${errorMessage(error)}`);
        throw error;
      }

      if (attempt === policy.maxAttempts - 1) {
        logger.error(`All retry attempts exhausted for ${label}: ${errorMessage(error)}`);
        break;
      }

      const delay = calculateDelay(attempt, policy);
      logger.warn(
        `Attempt ${attempt + 1}/${policy.maxAttempts} failed for ${label}: ${errorMessage(error)}. Retrying in ${Math.round(delay)}ms`
      );
      await sleep(delay, options.signal);
    }
  }

  throw new RetryError(lastError, policy.maxAttempts);
}
