import { VenueError, errorMessage } from '../core/errors.js';
import { midPrice, spreadBps } from '../core/math.js';
import {
  AssetClass,
  BestBidOffer,
  MarketSnapshot,
  SessionFlags,
  VenueQuote
} from '../core/types.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';
import type { Logger } from '../lib/logger.js';

const FUNDING_CACHE_TTL_MS = 300_000;

// regular US cash session in UTC, used when a venue publishes no session flags
const EQUITY_SESSION_OPEN_MINUTE = 14 * 60;
const EQUITY_SESSION_CLOSE_MINUTE = 21 * 60;

export interface SnapshotAggregatorOptions {
  /** Quote notional the VWAP is taken over; 0 quotes the touch. */
  minDepthNotional: number;
  fundingCacheTtlMs?: number;
  clock?: () => number;
}

export interface SnapshotSource {
  capture(instrument: string, assetClass: AssetClass): Promise<MarketSnapshot>;
}

interface CachedFunding {
  rate: number;
  fetchedAt: number;
}

export const equitySessionOpen = (timestamp: number): boolean => {
  const date = new Date(timestamp);
  const day = date.getUTCDay();
  if (day === 0 || day === 6) {
    return false;
  }
  const minute = date.getUTCHours() * 60 + date.getUTCMinutes();
  return minute >= EQUITY_SESSION_OPEN_MINUTE && minute < EQUITY_SESSION_CLOSE_MINUTE;
};

/**
 * Reads both venues for one instrument and freezes the result into a
 * MarketSnapshot. Funding rates move slowly, so they are cached per instrument.
 */
export class SnapshotAggregator implements SnapshotSource {
  private readonly funding = new Map<string, CachedFunding>();
  private readonly clock: () => number;

  constructor(
    private readonly maker: ExchangeAdapter,
    private readonly hedge: ExchangeAdapter,
    private readonly options: SnapshotAggregatorOptions,
    private readonly logger: Logger
  ) {
    this.clock = options.clock ?? Date.now;
  }

  async capture(instrument: string, assetClass: AssetClass): Promise<MarketSnapshot> {
    const depth = this.options.minDepthNotional > 0 ? this.options.minDepthNotional : undefined;
    const [makerBbo, hedgeBbo, fundingRateBpsPerHour] = await Promise.all([
      this.maker.fetchBestBidOffer(instrument, depth),
      this.hedge.fetchBestBidOffer(instrument, depth),
      this.fundingRate(instrument)
    ]);

    const capturedAt = this.clock();
    const snapshot: MarketSnapshot = {
      instrument,
      maker: Object.freeze(this.toQuote(this.maker.name, makerBbo, assetClass, capturedAt)),
      hedge: Object.freeze(this.toQuote(this.hedge.name, hedgeBbo, assetClass, capturedAt)),
      fundingRateBpsPerHour,
      capturedAt
    };

    return Object.freeze(snapshot);
  }

  /** Maker-venue funding in bps per hour; 0 for venues without funding. */
  async fundingRate(instrument: string): Promise<number> {
    const fetchFunding = this.maker.fetchFundingRate?.bind(this.maker);
    if (!fetchFunding) {
      return 0;
    }

    const now = this.clock();
    const cached = this.funding.get(instrument);
    const ttl = this.options.fundingCacheTtlMs ?? FUNDING_CACHE_TTL_MS;
    if (cached && now - cached.fetchedAt < ttl) {
      return cached.rate;
    }

    try {
      const rate = await fetchFunding(instrument);
      this.funding.set(instrument, { rate, fetchedAt: now });
      return rate;
    } catch (error) {
      this.logger.warn('Funding rate unavailable, using last known value', {
        instrument,
        error: errorMessage(error),
        lastKnown: cached?.rate ?? 0
      });
      return cached?.rate ?? 0;
    }
  }

  private toQuote(
    venue: string,
    bbo: BestBidOffer,
    assetClass: AssetClass,
    capturedAt: number
  ): VenueQuote {
    if (!(bbo.bid > 0) || !(bbo.ask > 0)) {
      throw new VenueError('transient', 'empty or invalid book', venue, {
        bid: bbo.bid,
        ask: bbo.ask
      });
    }

    return {
      venue,
      bid: bbo.bid,
      ask: bbo.ask,
      mid: midPrice(bbo.bid, bbo.ask),
      spreadBps: spreadBps(bbo.bid, bbo.ask),
      bidDepthNotional: bbo.bidDepthNotional,
      askDepthNotional: bbo.askDepthNotional,
      vwap: bbo.vwap,
      session: this.resolveSession(bbo.session, assetClass, capturedAt)
    };
  }

  private resolveSession(
    flags: SessionFlags | undefined,
    assetClass: AssetClass,
    timestamp: number
  ): Required<SessionFlags> {
    const fallbackOpen = assetClass === 'equity' ? equitySessionOpen(timestamp) : true;
    return {
      marketOpen: flags?.marketOpen ?? fallbackOpen,
      dayTradingClosed: flags?.dayTradingClosed ?? false
    };
  }
}
