import { describe, it, expect, vi } from 'vitest';
import { VenueError } from '../../src/core/errors.js';
import { SnapshotAggregator, equitySessionOpen } from '../../src/feeds/snapshotAggregator.js';
import { FakeVenue, createClock, createMockLogger } from '../helpers.js';

// Monday 8 January 2024
const MONDAY = Date.UTC(2024, 0, 8);
const HOUR = 3_600_000;

describe('SnapshotAggregator', () => {
  const setup = (minDepthNotional = 0, start = MONDAY + 15 * HOUR) => {
    const clock = createClock(start);
    const logger = createMockLogger();
    const maker = new FakeVenue('maker');
    const hedge = new FakeVenue('hedge');
    maker.setQuote('BTC', 100, 100.02);
    hedge.setQuote('BTC', 100.2, 100.22);
    const aggregator = new SnapshotAggregator(
      maker,
      hedge,
      { minDepthNotional, fundingCacheTtlMs: 60_000, clock: clock.now },
      logger
    );
    return { aggregator, maker, hedge, clock, logger };
  };

  it('freezes both quotes into one snapshot', async () => {
    const { aggregator, clock } = setup();
    const snapshot = await aggregator.capture('BTC', 'crypto');

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.maker)).toBe(true);
    expect(snapshot.capturedAt).toBe(clock.now());
    expect(snapshot.maker).toMatchObject({ venue: 'maker', bid: 100, ask: 100.02 });
    expect(snapshot.maker.mid).toBeCloseTo(100.01, 9);
    expect(snapshot.maker.spreadBps).toBeCloseTo(2, 9);
    expect(snapshot.hedge.session).toEqual({ marketOpen: true, dayTradingClosed: false });
  });

  it('asks both venues for depth-weighted prices', async () => {
    const { aggregator, maker, hedge } = setup(5_000);
    const makerSpy = vi.spyOn(maker, 'fetchBestBidOffer');
    const hedgeSpy = vi.spyOn(hedge, 'fetchBestBidOffer');

    await aggregator.capture('BTC', 'crypto');

    expect(makerSpy).toHaveBeenCalledWith('BTC', 5_000);
    expect(hedgeSpy).toHaveBeenCalledWith('BTC', 5_000);
  });

  it('rejects an empty side', async () => {
    const { aggregator, hedge } = setup();
    hedge.setQuote('BTC', 0, 100.22);
    await expect(aggregator.capture('BTC', 'crypto')).rejects.toBeInstanceOf(VenueError);
  });

  it('caches the funding rate', async () => {
    const { aggregator, maker, clock } = setup();
    maker.fundingRate = 0.3;

    expect((await aggregator.capture('BTC', 'crypto')).fundingRateBpsPerHour).toBe(0.3);
    await aggregator.capture('BTC', 'crypto');
    expect(maker.fundingCalls).toBe(1);

    clock.advance(60_000);
    maker.fundingRate = 0.1;
    expect((await aggregator.capture('BTC', 'crypto')).fundingRateBpsPerHour).toBe(0.1);
    expect(maker.fundingCalls).toBe(2);
  });

  it('keeps the last known funding rate when the venue fails', async () => {
    const { aggregator, maker, clock, logger } = setup();
    maker.fundingRate = 0.3;
    await aggregator.fundingRate('BTC');

    clock.advance(60_000);
    maker.fundingError = new Error('503 Service Unavailable');

    expect(await aggregator.fundingRate('BTC')).toBe(0.3);
    expect(logger.warn).toHaveBeenCalledWith(
      'Funding rate unavailable, using last known value',
      expect.objectContaining({ instrument: 'BTC', lastKnown: 0.3 })
    );
  });

  it('prefers session flags published by the venue', async () => {
    const { aggregator, maker } = setup();
    maker.setQuote('BTC', 100, 100.02, { session: { dayTradingClosed: true } });

    const snapshot = await aggregator.capture('BTC', 'crypto');
    expect(snapshot.maker.session).toEqual({ marketOpen: true, dayTradingClosed: true });
  });

  it('falls back to the cash session for equities', async () => {
    const open = await setup(0, MONDAY + 15 * HOUR).aggregator.capture('BTC', 'equity');
    const closed = await setup(0, MONDAY + 22 * HOUR).aggregator.capture('BTC', 'equity');

    expect(open.maker.session.marketOpen).toBe(true);
    expect(closed.maker.session.marketOpen).toBe(false);
  });
});

describe('equitySessionOpen', () => {
  it('is closed on weekends and outside the cash session', () => {
    expect(equitySessionOpen(MONDAY + 14 * HOUR)).toBe(true);
    expect(equitySessionOpen(MONDAY + 21 * HOUR)).toBe(false);
    expect(equitySessionOpen(MONDAY + 13 * HOUR)).toBe(false);
    // Saturday
    expect(equitySessionOpen(MONDAY - 2 * 24 * HOUR + 15 * HOUR)).toBe(false);
  });
});
