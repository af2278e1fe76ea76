/**
 * Shared test helpers: mock logger, scripted venue, config and snapshot builders.
 */

import { vi, type Mock } from 'vitest';
import type { GateConfig, InstrumentConfig, LifecycleConfig } from '../src/config.js';
import { VenueError } from '../src/core/errors.js';
import { midPrice, spreadBps } from '../src/core/math.js';
import type {
  Alert,
  BestBidOffer,
  CostEstimate,
  ExchangeSide,
  MarketSnapshot,
  OrderInfo,
  OrderRecord,
  OrderRole,
  OrderUpdateEvent,
  VenueQuote
} from '../src/core/types.js';
import { CostModel, type CostModelOptions } from '../src/cost/costModel.js';
import type { ExchangeAdapter, OrderResult, OrderUpdateHandler } from '../src/exchanges/adapter.js';
import type { Logger } from '../src/lib/logger.js';
import type { Notifier } from '../src/monitoring/notifier.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface MockLogger extends Logger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
}

export const createMockLogger = (): MockLogger => {
  const logger: MockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger
  };
  return logger;
};

// ── Mock Notifier ───────────────────────────────────────────────────

export const createRecordingNotifier = (): Notifier & { alerts: Alert[] } => {
  const alerts: Alert[] = [];
  return {
    alerts,
    async notify(alert: Alert) {
      alerts.push(alert);
    }
  };
};

// ── Clock ───────────────────────────────────────────────────────────

export const createClock = (start = 1_700_000_000_000) => {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    }
  };
};

// ── Scripted Venue ──────────────────────────────────────────────────

export interface PlacedOrder {
  kind: 'open' | 'close' | 'market';
  instrument: string;
  quantity: number;
  side: ExchangeSide;
  price?: number;
  orderId?: string;
  success: boolean;
}

/**
 * Venue whose answers are scripted by the test. Queued results are consumed
 * first; without one, limit orders rest and market orders fill in full.
 * Order updates are only pushed when the test calls `fill` or `emit`.
 * Positions follow market fills and `fill` until `setPosition` overrides them.
 */
export class FakeVenue implements ExchangeAdapter {
  readonly placed: PlacedOrder[] = [];
  readonly cancels: string[] = [];
  readonly openResults: OrderResult[] = [];
  readonly closeResults: OrderResult[] = [];
  readonly marketResults: OrderResult[] = [];
  /** Returned for every market order while set. */
  failMarketOrders?: OrderResult;
  fundingRate = 0;
  fundingError?: Error;
  fundingCalls = 0;
  /** Thrown by `getOrderInfo` while set. */
  orderInfoError?: Error;
  /** Each entry makes one placement go through on the venue and then throw. */
  readonly lostResponses: Error[] = [];

  private readonly orders = new Map<string, OrderInfo>();
  private readonly quotes = new Map<string, BestBidOffer>();
  private readonly positions = new Map<string, number>();
  private readonly handlers = new Set<OrderUpdateHandler>();
  private seq = 0;

  constructor(readonly name: string) {}

  setQuote(instrument: string, bid: number, ask: number, extra: Partial<BestBidOffer> = {}): void {
    this.quotes.set(instrument, {
      bid,
      ask,
      bidDepthNotional: 1_000_000,
      askDepthNotional: 1_000_000,
      vwap: false,
      ...extra
    });
  }

  setPosition(instrument: string, quantity: number): void {
    this.positions.set(instrument, quantity);
  }

  order(orderId: string): OrderInfo {
    const info = this.orders.get(orderId);
    if (!info) {
      throw new Error(`unknown order ${orderId}`);
    }
    return { ...info };
  }

  /** Changes the venue's view of an order without telling subscribers. */
  setOrder(orderId: string, patch: Partial<OrderInfo>): OrderInfo {
    const info = { ...this.order(orderId), ...patch };
    this.orders.set(orderId, info);
    return { ...info };
  }

  /** Fills a resting order up to `filledQuantity` and pushes the update. */
  fill(orderId: string, filledQuantity: number): void {
    const current = this.order(orderId);
    this.move(current.instrument, current.side, filledQuantity - current.filledQuantity);
    const info = this.setOrder(orderId, {
      filledQuantity,
      status: filledQuantity >= current.totalQuantity ? 'filled' : 'partially-filled',
      avgFillPrice: current.price
    });
    this.emit(info);
  }

  emit(event: OrderUpdateEvent): void {
    this.handlers.forEach((handler) => handler({ ...event }));
  }

  async placeOpenOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide,
    price: number
  ): Promise<OrderResult> {
    return this.placeLimit('open', this.openResults, instrument, quantity, side, price);
  }

  async placeCloseOrder(
    instrument: string,
    quantity: number,
    price: number,
    side: ExchangeSide
  ): Promise<OrderResult> {
    return this.placeLimit('close', this.closeResults, instrument, quantity, side, price);
  }

  async placeMarketOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide
  ): Promise<OrderResult> {
    const quote = this.quotes.get(instrument);
    const result = this.failMarketOrders ??
      this.marketResults.shift() ?? {
        success: true,
        orderId: this.nextId(),
        filledQuantity: quantity,
        avgPrice: quote ? (side === 'buy' ? quote.ask : quote.bid) : undefined
      };

    this.placed.push({
      kind: 'market',
      instrument,
      quantity,
      side,
      orderId: result.orderId,
      success: result.success
    });
    if (result.success && result.orderId) {
      this.orders.set(result.orderId, {
        instrument,
        orderId: result.orderId,
        status: 'filled',
        side,
        filledQuantity: result.filledQuantity ?? quantity,
        totalQuantity: quantity,
        avgFillPrice: result.avgPrice
      });
    }
    if (result.success) {
      this.move(instrument, side, result.filledQuantity ?? quantity);
    }
    return this.answer(result);
  }

  async cancelOrder(orderId: string): Promise<OrderResult> {
    this.cancels.push(orderId);
    const info = this.orders.get(orderId);
    if (!info) {
      return { success: false, errorKind: 'validation', message: 'unknown order' };
    }
    if (info.status !== 'open' && info.status !== 'partially-filled') {
      return { success: false, errorKind: 'rejected', message: `order is ${info.status}` };
    }
    this.orders.set(orderId, { ...info, status: 'canceled' });
    return { success: true, orderId };
  }

  async getOrderInfo(orderId: string): Promise<OrderInfo | undefined> {
    if (this.orderInfoError) {
      throw this.orderInfoError;
    }
    const info = this.orders.get(orderId);
    return info ? { ...info } : undefined;
  }

  async getActiveOrders(instrument: string): Promise<OrderInfo[]> {
    return [...this.orders.values()].filter(
      (info) =>
        info.instrument === instrument &&
        (info.status === 'open' || info.status === 'partially-filled')
    );
  }

  async getAccountPosition(instrument: string): Promise<number> {
    return this.positions.get(instrument) ?? 0;
  }

  async fetchBestBidOffer(instrument: string): Promise<BestBidOffer> {
    const quote = this.quotes.get(instrument);
    if (!quote) {
      throw new VenueError('transient', `no quote for ${instrument}`, this.name);
    }
    return { ...quote };
  }

  async fetchFundingRate(): Promise<number> {
    this.fundingCalls += 1;
    if (this.fundingError) {
      throw this.fundingError;
    }
    return this.fundingRate;
  }

  subscribeOrderUpdates(handler: OrderUpdateHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private placeLimit(
    kind: 'open' | 'close',
    queue: OrderResult[],
    instrument: string,
    quantity: number,
    side: ExchangeSide,
    price: number
  ): OrderResult {
    const result = queue.shift() ?? { success: true, orderId: this.nextId() };
    this.placed.push({
      kind,
      instrument,
      quantity,
      side,
      price,
      orderId: result.orderId,
      success: result.success
    });
    if (result.success && result.orderId) {
      const role: OrderRole = kind;
      this.orders.set(result.orderId, {
        instrument,
        orderId: result.orderId,
        status: 'open',
        side,
        role,
        filledQuantity: 0,
        totalQuantity: quantity,
        price
      });
    }
    return this.answer(result);
  }

  private answer(result: OrderResult): OrderResult {
    const lost = this.lostResponses.shift();
    if (lost) {
      throw lost;
    }
    return result;
  }

  private move(instrument: string, side: ExchangeSide, quantity: number): void {
    const current = this.positions.get(instrument) ?? 0;
    this.positions.set(instrument, current + (side === 'buy' ? quantity : -quantity));
  }

  private nextId(): string {
    this.seq += 1;
    return `${this.name}-${this.seq}`;
  }
}

// ── Config Builders ─────────────────────────────────────────────────

export function makeInstrument(overrides: Partial<InstrumentConfig> = {}): InstrumentConfig {
  return {
    ticker: 'BTC',
    assetClass: 'crypto',
    quantity: 10,
    tickSize: 0.01,
    leverage: 5,
    priceOffsetBps: 5,
    maxOrders: 1,
    waitTimeMs: 0,
    gridStepBps: 0,
    direction: 'long',
    boost: false,
    ...overrides
  };
}

export function makeGate(overrides: Partial<GateConfig> = {}): GateConfig {
  return {
    minNetBps: 0,
    maxSpreadBps: 50,
    spreadWeight: 0,
    maxDislocationBps: 500,
    minDepthNotional: 0,
    riskBufferBps: 1,
    holdingHorizonHours: 24,
    ...overrides
  };
}

export const LIFECYCLE: LifecycleConfig = {
  tickIntervalMs: 1_000,
  pollIntervalMs: 2_000,
  fillTimeoutMs: 10_000,
  closeMaxAttempts: 3,
  hedgeMaxAttempts: 3,
  maxCloseSlippageBps: 50
};

export function makeCostModel(overrides: Partial<CostModelOptions> = {}): CostModel {
  return new CostModel({
    schedule: {
      crypto: { makerBps: 3, takerBps: 10 },
      forex: { makerBps: 0, takerBps: 3 },
      equity: { makerBps: 0, takerBps: 5 },
      index: { makerBps: 0, takerBps: 5 },
      commodity: { makerBps: 0, takerBps: 5 }
    },
    maxMakerLeverage: 20,
    ancillaryFeeUsd: 0.05,
    ancillaryRefundRatio: 0.5,
    riskBufferBps: 1,
    ...overrides
  });
}

// ── Market Data Factories ───────────────────────────────────────────

export function makeQuote(
  venue: string,
  bid: number,
  ask: number,
  overrides: Partial<VenueQuote> = {}
): VenueQuote {
  return {
    venue,
    bid,
    ask,
    mid: midPrice(bid, ask),
    spreadBps: spreadBps(bid, ask),
    bidDepthNotional: 1_000_000,
    askDepthNotional: 1_000_000,
    vwap: false,
    session: { marketOpen: true, dayTradingClosed: false },
    ...overrides
  };
}

export function makeSnapshot(
  maker: [number, number],
  hedge: [number, number],
  overrides: Partial<MarketSnapshot> = {}
): MarketSnapshot {
  return {
    instrument: 'BTC',
    maker: makeQuote('maker', maker[0], maker[1]),
    hedge: makeQuote('hedge', hedge[0], hedge[1]),
    fundingRateBpsPerHour: 0,
    capturedAt: 1_700_000_000_000,
    ...overrides
  };
}

export function makeCost(overrides: Partial<CostEstimate> = {}): CostEstimate {
  return {
    instrument: 'BTC',
    assetClass: 'crypto',
    direction: 'long',
    feeTier: 'maker',
    notional: 1_000,
    openingFeeBps: 3,
    hedgeFeeBps: 0,
    ancillaryFeeBps: 0.5,
    ancillaryFeeBpsAfterRefund: 0.25,
    fundingBps: 0,
    riskBufferBps: 1,
    pessimisticBps: 4.5,
    optimisticBps: 4.25,
    ...overrides
  };
}

let orderSeq = 0;

export function makeOrder(overrides: Partial<OrderRecord> = {}): OrderRecord {
  orderSeq += 1;
  return {
    id: `order-${orderSeq}`,
    cycleId: 'cycle-1',
    instrument: 'BTC',
    venue: 'maker',
    side: 'sell',
    role: 'close',
    liquidity: 'maker',
    requestedQuantity: 1,
    requestedPrice: 100,
    status: 'open',
    filledQuantity: 0,
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_000_000,
    ...overrides
  };
}
