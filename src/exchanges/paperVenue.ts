import { EventEmitter } from 'eventemitter3';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { VenueConfig } from '../config.js';
import { VenueError } from '../core/errors.js';
import { QTY_EPSILON, bpsToDecimal, effectivePrice, signedQuantity, vwapByNotional } from '../core/math.js';
import {
  BestBidOffer,
  ExchangeSide,
  OrderBookLevel,
  OrderBookSnapshot,
  OrderInfo,
  OrderRole,
  OrderUpdateEvent
} from '../core/types.js';
import type { Logger } from '../lib/logger.js';
import type { ExchangeAdapter, OrderResult, OrderUpdateHandler } from './adapter.js';
import { BinanceBookFeed } from './binanceBookFeed.js';

export const paperVenueOptionsSchema = z.object({
  bookSource: z.enum(['simulated', 'binance', 'manual']).default('simulated'),
  wsUrl: z.string().url().default('wss://stream.binance.com:9443/stream'),
  symbolMap: z.record(z.string()).optional(),
  basePrices: z.record(z.number().positive()).default({}),
  halfSpreadBps: z.number().nonnegative().default(2),
  levelSize: z.number().positive().default(5),
  /** Constant mid offset, lets two simulated venues disagree. */
  skewBps: z.number().default(0),
  tickIntervalMs: z.number().int().positive().default(500),
  fundingRateBpsPerHour: z.number().optional(),
  marketOpen: z.boolean().optional(),
  dayTradingClosed: z.boolean().optional()
});

export type PaperVenueOptions = z.infer<typeof paperVenueOptionsSchema>;

export type PaperVenueEvents = {
  orderUpdate: (event: OrderUpdateEvent) => void;
  orderBook: (snapshot: OrderBookSnapshot) => void;
  error: (error: Error) => void;
};

interface PaperOrder {
  info: OrderInfo;
  type: 'limit' | 'market';
  createdAt: number;
}

const DEFAULT_BASE_PRICES: Record<string, number> = {
  BTC: 60_000,
  ETH: 3_000
};

/**
 * In-process venue used for dry runs. Limit orders are post-only and fill when
 * the opposite side of the book trades through them; market orders sweep the
 * current book. Books come from a random walk, a public feed, or `setBook`.
 */
export class PaperVenue
  extends EventEmitter<PaperVenueEvents>
  implements ExchangeAdapter
{
  private readonly books = new Map<string, OrderBookSnapshot>();
  private readonly orders = new Map<string, PaperOrder>();
  private readonly positions = new Map<string, number>();
  private readonly basePrices: Record<string, number>;
  private readonly options: PaperVenueOptions;
  private simTimer?: NodeJS.Timeout;
  private feed?: BinanceBookFeed;
  private instruments: string[] = [];

  constructor(
    private readonly cfg: Pick<VenueConfig, 'name' | 'options'>,
    private readonly logger: Logger,
    private readonly random: () => number = Math.random
  ) {
    super();
    this.options = paperVenueOptionsSchema.parse(cfg.options);
    this.basePrices = { ...DEFAULT_BASE_PRICES, ...this.options.basePrices };
  }

  get name(): string {
    return this.cfg.name;
  }

  async start(instruments: string[]): Promise<void> {
    this.instruments = instruments;

    if (this.options.bookSource === 'simulated') {
      instruments.forEach((instrument) => this.setBook(this.generateOrderBook(instrument)));
      this.simTimer = setInterval(() => {
        for (const instrument of this.instruments) {
          this.setBook(this.generateOrderBook(instrument));
        }
      }, this.options.tickIntervalMs);
    } else if (this.options.bookSource === 'binance') {
      this.feed = new BinanceBookFeed(
        {
          wsUrl: this.options.wsUrl,
          exchange: this.name,
          symbolMap: this.options.symbolMap
        },
        this.logger
      );
      this.feed.on('orderBook', (snapshot) => this.setBook(snapshot));
      this.feed.on('error', (error) => this.emit('error', error));
      this.feed.start(instruments);
    }

    this.logger.info('Paper venue started', {
      venue: this.name,
      bookSource: this.options.bookSource,
      instruments
    });
  }

  async stop(): Promise<void> {
    if (this.simTimer) {
      clearInterval(this.simTimer);
      this.simTimer = undefined;
    }
    this.feed?.removeAllListeners();
    this.feed?.stop();
    this.feed = undefined;
    this.logger.info('Paper venue stopped', { venue: this.name });
  }

  /** Replaces the instrument's book and matches resting orders against it. */
  setBook(snapshot: OrderBookSnapshot): void {
    this.books.set(snapshot.symbol, snapshot);
    this.emit('orderBook', snapshot);
    this.matchResting(snapshot);
  }

  setPosition(instrument: string, quantity: number): void {
    this.positions.set(instrument, quantity);
  }

  async placeOpenOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide,
    price: number
  ): Promise<OrderResult> {
    return this.placeLimit(instrument, quantity, side, price, 'open');
  }

  async placeCloseOrder(
    instrument: string,
    quantity: number,
    price: number,
    side: ExchangeSide
  ): Promise<OrderResult> {
    return this.placeLimit(instrument, quantity, side, price, 'close');
  }

  async placeMarketOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide
  ): Promise<OrderResult> {
    const book = this.books.get(instrument);
    if (!book) {
      return { success: false, errorKind: 'transient', message: 'no book' };
    }

    const levels = side === 'buy' ? book.asks : book.bids;
    const avgPrice = effectivePrice(levels, quantity);
    if (avgPrice === null) {
      return { success: false, errorKind: 'rejected', message: 'insufficient liquidity' };
    }

    const orderId = uuid();
    const info: OrderInfo = {
      instrument,
      orderId,
      status: 'filled',
      side,
      filledQuantity: quantity,
      totalQuantity: quantity,
      avgFillPrice: avgPrice
    };
    this.orders.set(orderId, { info, type: 'market', createdAt: Date.now() });
    this.applyPosition(instrument, side, quantity);
    this.publish(info);

    return { success: true, orderId, filledQuantity: quantity, avgPrice };
  }

  async cancelOrder(orderId: string): Promise<OrderResult> {
    const order = this.orders.get(orderId);
    if (!order) {
      return { success: false, errorKind: 'validation', message: 'unknown order' };
    }
    if (order.info.status !== 'open' && order.info.status !== 'partially-filled') {
      return { success: false, errorKind: 'rejected', message: `order is ${order.info.status}` };
    }

    order.info = { ...order.info, status: 'canceled' };
    this.publish(order.info);
    return { success: true, orderId };
  }

  async getOrderInfo(orderId: string): Promise<OrderInfo | undefined> {
    const order = this.orders.get(orderId);
    return order ? { ...order.info } : undefined;
  }

  async getActiveOrders(instrument: string): Promise<OrderInfo[]> {
    return [...this.orders.values()]
      .map((order) => order.info)
      .filter(
        (info) =>
          info.instrument === instrument &&
          (info.status === 'open' || info.status === 'partially-filled')
      )
      .map((info) => ({ ...info }));
  }

  async getAccountPosition(instrument: string): Promise<number> {
    return this.positions.get(instrument) ?? 0;
  }

  async fetchBestBidOffer(instrument: string, depthNotional?: number): Promise<BestBidOffer> {
    const book = this.books.get(instrument);
    if (!book || !book.bids.length || !book.asks.length) {
      throw new VenueError('transient', `no book for ${instrument}`, this.name);
    }

    const session = {
      marketOpen: this.options.marketOpen,
      dayTradingClosed: this.options.dayTradingClosed
    };

    if (depthNotional && depthNotional > 0) {
      const bid = vwapByNotional(book.bids, depthNotional);
      const ask = vwapByNotional(book.asks, depthNotional);
      return {
        bid: bid.price,
        ask: ask.price,
        bidDepthNotional: bid.notional,
        askDepthNotional: ask.notional,
        vwap: true,
        session
      };
    }

    const notional = (levels: OrderBookLevel[]) =>
      levels.reduce((sum, level) => sum + level.price * level.size, 0);

    return {
      bid: book.bids[0].price,
      ask: book.asks[0].price,
      bidDepthNotional: notional(book.bids),
      askDepthNotional: notional(book.asks),
      vwap: false,
      session
    };
  }

  async fetchFundingRate(): Promise<number> {
    return this.options.fundingRateBpsPerHour ?? 0;
  }

  subscribeOrderUpdates(handler: OrderUpdateHandler): () => void {
    this.on('orderUpdate', handler);
    return () => {
      this.off('orderUpdate', handler);
    };
  }

  private placeLimit(
    instrument: string,
    quantity: number,
    side: ExchangeSide,
    price: number,
    role: OrderRole
  ): OrderResult {
    if (quantity <= 0 || price <= 0) {
      return { success: false, errorKind: 'validation', message: 'quantity and price must be positive' };
    }

    const book = this.books.get(instrument);
    if (book) {
      const crosses =
        side === 'buy'
          ? book.asks.length > 0 && book.asks[0].price <= price
          : book.bids.length > 0 && book.bids[0].price >= price;
      if (crosses) {
        return { success: false, errorKind: 'rejected', message: 'post-only order would cross' };
      }
    }

    const orderId = uuid();
    const info: OrderInfo = {
      instrument,
      orderId,
      status: 'open',
      side,
      role,
      filledQuantity: 0,
      totalQuantity: quantity,
      price
    };
    this.orders.set(orderId, { info, type: 'limit', createdAt: Date.now() });
    this.logger.debug('Paper order placed', { venue: this.name, orderId, side, quantity, price });
    this.publish(info);
    return { success: true, orderId };
  }

  private matchResting(book: OrderBookSnapshot): void {
    for (const order of this.orders.values()) {
      const { info } = order;
      if (
        info.instrument !== book.symbol ||
        order.type !== 'limit' ||
        (info.status !== 'open' && info.status !== 'partially-filled') ||
        info.price === undefined
      ) {
        continue;
      }

      const limit = info.price;
      const crossing =
        info.side === 'buy'
          ? book.asks.filter((level) => level.price <= limit)
          : book.bids.filter((level) => level.price >= limit);
      const available = crossing.reduce((sum, level) => sum + level.size, 0);
      const remaining = info.totalQuantity - info.filledQuantity;
      const fill = Math.min(available, remaining);
      if (fill <= QTY_EPSILON) {
        continue;
      }

      const filledQuantity = info.filledQuantity + fill;
      const done = info.totalQuantity - filledQuantity <= QTY_EPSILON;
      order.info = {
        ...info,
        filledQuantity: done ? info.totalQuantity : filledQuantity,
        status: done ? 'filled' : 'partially-filled',
        avgFillPrice: limit
      };
      this.applyPosition(info.instrument, info.side, fill);
      this.publish(order.info);
    }
  }

  private applyPosition(instrument: string, side: ExchangeSide, quantity: number): void {
    const current = this.positions.get(instrument) ?? 0;
    this.positions.set(instrument, current + signedQuantity(side, quantity));
  }

  private publish(info: OrderInfo): void {
    this.emit('orderUpdate', { ...info });
  }

  private generateOrderBook(symbol: string): OrderBookSnapshot {
    const mid = this.sampleMidPrice(symbol) * (1 + bpsToDecimal(this.options.skewBps));
    const half = mid * bpsToDecimal(this.options.halfSpreadBps);
    const size = this.options.levelSize;

    const bids: OrderBookLevel[] = [0, 1, 2].map((level) => ({
      price: Number((mid - half * (1 + level)).toFixed(6)),
      size: size * (0.5 + this.random())
    }));
    const asks: OrderBookLevel[] = [0, 1, 2].map((level) => ({
      price: Number((mid + half * (1 + level)).toFixed(6)),
      size: size * (0.5 + this.random())
    }));

    return {
      exchange: this.name,
      symbol,
      bids,
      asks,
      lastUpdateId: Date.now(),
      receivedAt: Date.now()
    };
  }

  private sampleMidPrice(symbol: string): number {
    if (!this.basePrices[symbol]) {
      this.basePrices[symbol] = 100;
    }

    const noise = 1 + (this.random() - 0.5) * 0.001;
    this.basePrices[symbol] *= noise;

    return this.basePrices[symbol];
  }
}

export const createPaperVenue = (
  config: Pick<VenueConfig, 'name' | 'options'>,
  context: { logger: Logger }
): PaperVenue => new PaperVenue(config, context.logger);
