import { VenueError, errorMessage } from '../core/errors.js';
import { BestBidOffer, ExchangeSide, OrderInfo } from '../core/types.js';
import type { Logger } from '../lib/logger.js';
import { RetryPolicy, withRetry } from '../lib/retry.js';
import type { ExchangeAdapter, OrderResult, OrderUpdateHandler } from './adapter.js';

/**
 * Applies the retry policy to every call of a venue adapter.
 *
 * Reads retry any transient error. Placements only retry when the venue
 * answered with `errorKind: 'transient'` (the order was not accepted). A thrown
 * error on a placement leaves the outcome unknown: it comes back as
 * `errorKind: 'ambiguous'` and the caller checks the venue before resending.
 */
export class RetryingAdapter implements ExchangeAdapter {
  readonly fetchFundingRate?: (instrument: string) => Promise<number>;

  constructor(
    private readonly inner: ExchangeAdapter,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger
  ) {
    const funding = inner.fetchFundingRate?.bind(inner);
    if (funding) {
      this.fetchFundingRate = (instrument) =>
        this.read(`${this.name}.fetchFundingRate`, () => funding(instrument));
    }
  }

  get name(): string {
    return this.inner.name;
  }

  placeOpenOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide,
    price: number
  ): Promise<OrderResult> {
    return this.place(`${this.name}.placeOpenOrder`, () =>
      this.inner.placeOpenOrder(instrument, quantity, side, price)
    );
  }

  placeCloseOrder(
    instrument: string,
    quantity: number,
    price: number,
    side: ExchangeSide
  ): Promise<OrderResult> {
    return this.place(`${this.name}.placeCloseOrder`, () =>
      this.inner.placeCloseOrder(instrument, quantity, price, side)
    );
  }

  placeMarketOrder(instrument: string, quantity: number, side: ExchangeSide): Promise<OrderResult> {
    return this.place(`${this.name}.placeMarketOrder`, () =>
      this.inner.placeMarketOrder(instrument, quantity, side)
    );
  }

  cancelOrder(orderId: string): Promise<OrderResult> {
    return this.place(`${this.name}.cancelOrder`, () => this.inner.cancelOrder(orderId));
  }

  getOrderInfo(orderId: string): Promise<OrderInfo | undefined> {
    return this.read(`${this.name}.getOrderInfo`, () => this.inner.getOrderInfo(orderId));
  }

  getActiveOrders(instrument: string): Promise<OrderInfo[]> {
    return this.read(`${this.name}.getActiveOrders`, () =>
      this.inner.getActiveOrders(instrument)
    );
  }

  getAccountPosition(instrument: string): Promise<number> {
    return this.read(`${this.name}.getAccountPosition`, () =>
      this.inner.getAccountPosition(instrument)
    );
  }

  fetchBestBidOffer(instrument: string, depthNotional?: number): Promise<BestBidOffer> {
    return this.read(`${this.name}.fetchBestBidOffer`, () =>
      this.inner.fetchBestBidOffer(instrument, depthNotional)
    );
  }

  subscribeOrderUpdates(handler: OrderUpdateHandler): () => void {
    return this.inner.subscribeOrderUpdates(handler);
  }

  async start(instruments: string[]): Promise<void> {
    await this.inner.start?.(instruments);
  }

  async stop(): Promise<void> {
    await this.inner.stop?.();
  }

  private read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, { ...this.policy, label, logger: this.logger });
  }

  private async place(label: string, fn: () => Promise<OrderResult>): Promise<OrderResult> {
    try {
      return await withRetry(
        async () => {
          const result = await this.submit(label, fn);
          if (!result.success && result.errorKind === 'transient') {
            throw new VenueError('transient', result.message ?? 'transient rejection', this.name);
          }
          return result;
        },
        {
          ...this.policy,
          label,
          logger: this.logger,
          isRetryable: (error) => error instanceof VenueError && error.kind === 'transient'
        }
      );
    } catch (error) {
      if (error instanceof VenueError) {
        return { success: false, errorKind: error.kind, message: error.message };
      }
      throw error;
    }
  }

  /** One submission; a throw is reported as ambiguous and never retried. */
  private async submit(label: string, fn: () => Promise<OrderResult>): Promise<OrderResult> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof VenueError && error.kind !== 'transient') {
        return { success: false, errorKind: error.kind, message: error.message };
      }
      this.logger.warn('Venue call failed without an answer', { label, error: errorMessage(error) });
      return { success: false, errorKind: 'ambiguous', message: errorMessage(error) };
    }
  }
}
