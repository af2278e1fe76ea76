import type { VenueErrorKind } from '../core/errors.js';
import {
  BestBidOffer,
  ExchangeSide,
  OrderInfo,
  OrderUpdateEvent
} from '../core/types.js';

export interface OrderResult {
  success: boolean;
  orderId?: string;
  errorKind?: VenueErrorKind;
  message?: string;
  /** Immediate fill information, when the venue reports it synchronously (market orders). */
  filledQuantity?: number;
  avgPrice?: number;
}

export type OrderUpdateHandler = (event: OrderUpdateEvent) => void;

/**
 * Uniform surface every venue binding implements. Prices and quantities are in
 * the instrument's native units; positions are signed (long positive).
 */
export interface ExchangeAdapter {
  readonly name: string;

  placeOpenOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide,
    price: number
  ): Promise<OrderResult>;

  placeCloseOrder(
    instrument: string,
    quantity: number,
    price: number,
    side: ExchangeSide
  ): Promise<OrderResult>;

  /** Required for the hedge leg and boost closes; may answer `errorKind: 'unsupported'`. */
  placeMarketOrder(
    instrument: string,
    quantity: number,
    side: ExchangeSide
  ): Promise<OrderResult>;

  cancelOrder(orderId: string): Promise<OrderResult>;

  getOrderInfo(orderId: string): Promise<OrderInfo | undefined>;

  getActiveOrders(instrument: string): Promise<OrderInfo[]>;

  getAccountPosition(instrument: string): Promise<number>;

  /** With `depthNotional`, bid/ask are VWAP over that much quote notional. */
  fetchBestBidOffer(instrument: string, depthNotional?: number): Promise<BestBidOffer>;

  /** Funding/rollover rate in bps per hour; venues without one omit the method. */
  fetchFundingRate?(instrument: string): Promise<number>;

  subscribeOrderUpdates(handler: OrderUpdateHandler): () => void;

  start?(instruments: string[]): Promise<void>;

  stop?(): Promise<void>;
}
