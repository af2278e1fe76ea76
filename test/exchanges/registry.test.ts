import { describe, it, expect } from 'vitest';
import type { RetryConfig, VenueConfig } from '../../src/config.js';
import { ConfigValidationError } from '../../src/core/errors.js';
import { VenueRegistry, createDefaultRegistry, createVenuePair } from '../../src/exchanges/registry.js';
import { createMockLogger } from '../helpers.js';

const venue = (id: string, name: string): VenueConfig => ({ id, name, takerFeeBps: 0, options: {} });

const retry: RetryConfig = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 1 };

describe('VenueRegistry', () => {
  it('ships the paper binding', () => {
    expect(createDefaultRegistry().ids()).toEqual(['paper']);
  });

  it('rejects unknown ids and double registration', () => {
    const registry = createDefaultRegistry();
    expect(() => registry.create(venue('live', 'maker'), { logger: createMockLogger() })).toThrow(
      ConfigValidationError
    );
    expect(() => registry.register('paper', () => {
      throw new Error('unused');
    })).toThrow('Venue paper registered twice');
  });

  it('builds both legs with their configured names', () => {
    const pair = createVenuePair(
      { venues: { maker: venue('paper', 'maker-paper'), hedge: venue('paper', 'hedge-paper') }, retry, dryRun: false },
      createDefaultRegistry(),
      createMockLogger()
    );
    expect(pair.maker.name).toBe('maker-paper');
    expect(pair.hedge.name).toBe('hedge-paper');
  });

  it('swaps live bindings for paper on a dry run', () => {
    const logger = createMockLogger();
    const config = { venues: { maker: venue('live', 'maker-live'), hedge: venue('paper', 'hedge-paper') }, retry };

    const pair = createVenuePair({ ...config, dryRun: true }, createDefaultRegistry(), logger);
    expect(pair.maker.name).toBe('maker-live');
    expect(logger.warn).toHaveBeenCalledWith('Dry run, using paper venue', { role: 'maker', configured: 'live' });

    expect(() => createVenuePair({ ...config, dryRun: false }, new VenueRegistry(), logger)).toThrow(
      ConfigValidationError
    );
  });
});
