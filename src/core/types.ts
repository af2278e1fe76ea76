export type ExchangeSide = 'buy' | 'sell';

export type Direction = 'long' | 'short';

export type AssetClass = 'crypto' | 'forex' | 'equity' | 'index' | 'commodity';

export type OrderRole = 'open' | 'close';

export type Liquidity = 'maker' | 'taker';

export type VenueRole = 'maker' | 'hedge';

export interface OrderBookLevel {
  price: number;
  size: number;
}

export interface OrderBookSnapshot {
  exchange: string;
  symbol: string;
  bids: OrderBookLevel[];
  asks: OrderBookLevel[];
  lastUpdateId: number;
  receivedAt: number;
}

export interface SessionFlags {
  marketOpen?: boolean;
  dayTradingClosed?: boolean;
}

export interface BestBidOffer {
  bid: number;
  ask: number;
  bidDepthNotional: number;
  askDepthNotional: number;
  /** True when bid/ask are VWAP over the requested depth rather than the touch. */
  vwap: boolean;
  session?: SessionFlags;
}

export interface VenueQuote {
  venue: string;
  bid: number;
  ask: number;
  mid: number;
  spreadBps: number;
  bidDepthNotional: number;
  askDepthNotional: number;
  vwap: boolean;
  session: Required<SessionFlags>;
}

export interface MarketSnapshot {
  instrument: string;
  maker: VenueQuote;
  hedge: VenueQuote;
  fundingRateBpsPerHour: number;
  capturedAt: number;
}

export interface CostEstimate {
  instrument: string;
  assetClass: AssetClass;
  direction: Direction;
  feeTier: Liquidity;
  notional: number;
  openingFeeBps: number;
  hedgeFeeBps: number;
  ancillaryFeeBps: number;
  ancillaryFeeBpsAfterRefund: number;
  fundingBps: number;
  riskBufferBps: number;
  pessimisticBps: number;
  optimisticBps: number;
}

export type OrderStatus =
  | 'pending'
  | 'open'
  | 'partially-filled'
  | 'filled'
  | 'canceled'
  | 'rejected';

export type CancelReason =
  | 'timeout'
  | 'adverse-move'
  | 'shutdown'
  | 'rejected'
  | 'venue';

export interface OrderRecord {
  id: string;
  cycleId: string;
  instrument: string;
  venue: string;
  side: ExchangeSide;
  role: OrderRole;
  liquidity: Liquidity;
  requestedQuantity: number;
  requestedPrice?: number;
  status: OrderStatus;
  filledQuantity: number;
  avgFillPrice?: number;
  createdAt: number;
  updatedAt: number;
  cancelReason?: CancelReason;
}

export type LifecycleState =
  | 'Idle'
  | 'OpenPlaced'
  | 'OpenPartiallyFilled'
  | 'OpenFilled'
  | 'OpenCancelled'
  | 'ClosePlaced'
  | 'CloseFilled'
  | 'CloseFailed';

export type OpenOutcome = 'filled' | 'hedged-partial' | 'cancelled' | 'rejected';

export type AncillaryFeeStatus = 'charged' | 'forfeited' | 'refunded';

export interface TradeCycle {
  id: string;
  instrument: string;
  direction: Direction;
  state: LifecycleState;
  open: OrderRecord;
  hedges: OrderRecord[];
  closes: OrderRecord[];
  unwinds: OrderRecord[];
  hedgedQuantity: number;
  closedQuantity: number;
  unwoundQuantity: number;
  closeAttempts: number;
  partialClose: boolean;
  openOutcome?: OpenOutcome;
  ancillaryFee: AncillaryFeeStatus;
  thresholdBps: number;
  cancelRequested: boolean;
}

export interface OrderUpdateEvent {
  instrument: string;
  orderId: string;
  status: OrderStatus;
  side: ExchangeSide;
  role?: OrderRole;
  filledQuantity: number;
  totalQuantity: number;
  price?: number;
  avgFillPrice?: number;
}

export type OrderInfo = OrderUpdateEvent;

export type UpdateSource = 'push' | 'poll' | 'cancel' | 'placement' | 'sync';

export interface FeeEvent {
  cycleId: string;
  orderId: string;
  instrument: string;
  status: AncillaryFeeStatus;
  amount: number;
  reason: string;
  timestamp: number;
}

export interface DecisionEvent {
  instrument: string;
  kind: 'skip' | 'placeMaker';
  reason?: string;
  direction?: Direction;
  price?: number;
  edgeBps?: number;
  thresholdBps?: number;
  timestamp: number;
}

export interface TransitionEvent {
  instrument: string;
  cycleId: string;
  from: LifecycleState;
  to: LifecycleState;
  reason?: string;
  timestamp: number;
}

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface Alert {
  severity: AlertSeverity;
  title: string;
  message: string;
  instrument?: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export interface MetricsSnapshot {
  decisions: number;
  skips: number;
  opensPlaced: number;
  opensCancelled: number;
  cyclesClosed: number;
  feesForfeited: number;
  feesRefunded: number;
  alerts: number;
  timestamp: number;
}
