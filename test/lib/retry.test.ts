import { describe, it, expect } from 'vitest';
import { VenueError } from '../../src/core/errors.js';
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  isTransientError,
  withRetry
} from '../../src/lib/retry.js';
import { createMockLogger } from '../helpers.js';

const fast = { baseDelayMs: 1, maxDelayMs: 2 };

describe('withRetry', () => {
  it('returns the result on success', async () => {
    expect(await withRetry(async () => 42, { ...fast, label: 'ok' })).toBe(42);
  });

  it('retries transient errors until one succeeds', async () => {
    let attempts = 0;
    const result = await withRetry(
      async () => {
        attempts++;
        if (attempts < 3) throw new VenueError('transient', 'busy', 'maker');
        return 'done';
      },
      { ...fast, label: 'transient' }
    );
    expect(result).toBe('done');
    expect(attempts).toBe(3);
  });

  it('throws non-retryable errors immediately', async () => {
    let attempts = 0;
    await expect(
      withRetry(
        async () => {
          attempts++;
          throw new VenueError('rejected', 'post-only', 'maker');
        },
        { ...fast, label: 'rejected' }
      )
    ).rejects.toThrow('post-only');
    expect(attempts).toBe(1);
  });

  it('falls back once attempts are exhausted', async () => {
    const logger = createMockLogger();
    let attempts = 0;
    const result = await withRetry(
      async (): Promise<number> => {
        attempts++;
        throw new Error('ECONNRESET');
      },
      { ...fast, maxAttempts: 2, label: 'fallback', logger, fallback: () => -1 }
    );
    expect(result).toBe(-1);
    expect(attempts).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith('Retries exhausted', {
      label: 'fallback',
      attempts: 2,
      error: 'ECONNRESET'
    });
  });

  it('rethrows despite a fallback when asked to', async () => {
    await expect(
      withRetry(
        async (): Promise<number> => {
          throw new Error('503 Service Unavailable');
        },
        { ...fast, maxAttempts: 2, label: 'rethrow', fallback: () => -1, rethrow: true }
      )
    ).rejects.toThrow('503 Service Unavailable');
  });
});

describe('backoffDelay', () => {
  it('grows geometrically up to the cap', () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(250);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(1_000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 10)).toBe(5_000);
  });
});

describe('isTransientError', () => {
  it('recognises network failures and transient venue errors', () => {
    for (const message of ['ETIMEDOUT', 'socket hang up', '429 Too Many Requests', 'fetch failed']) {
      expect(isTransientError(new Error(message))).toBe(true);
    }
    expect(isTransientError(new VenueError('transient', 'anything', 'maker'))).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isTransientError(new Error('invalid signature'))).toBe(false);
    expect(isTransientError(new VenueError('rejected', 'timeout in text', 'maker'))).toBe(false);
  });
});
