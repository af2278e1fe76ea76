import { VenueError, errorMessage } from '../core/errors.js';
import type { Logger } from './logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface RetryOptions<T> extends Partial<RetryPolicy> {
  label: string;
  logger?: Logger;
  /** Value returned once attempts are exhausted instead of throwing. */
  fallback?: () => T;
  /** Throw the last error even when a fallback is present. */
  rethrow?: boolean;
  isRetryable?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 250,
  maxDelayMs: 5_000,
  backoffMultiplier: 2
};

const RETRYABLE_PATTERNS = [
  'timeout',
  'timed out',
  'etimedout',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'rate limit',
  '429',
  '502',
  '503',
  '504',
  'network',
  'fetch failed'
];

export const isTransientError = (error: unknown): boolean => {
  if (error instanceof VenueError) {
    return error.kind === 'transient';
  }
  const msg = errorMessage(error).toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => msg.includes(pattern));
};

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1)
  );

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    backoffMultiplier:
      options.backoffMultiplier ?? DEFAULT_RETRY_POLICY.backoffMultiplier
  };
  const retryable = options.isRetryable ?? isTransientError;

  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!retryable(error)) {
        throw error;
      }

      options.logger?.debug('Retry attempt failed', {
        label: options.label,
        attempt,
        maxAttempts: policy.maxAttempts,
        error: errorMessage(error)
      });

      if (attempt < policy.maxAttempts) {
        await sleep(backoffDelay(policy, attempt));
      }
    }
  }

  options.logger?.warn('Retries exhausted', {
    label: options.label,
    attempts: policy.maxAttempts,
    error: errorMessage(lastError)
  });

  if (options.fallback && !options.rethrow) {
    return options.fallback();
  }
  throw lastError;
}
