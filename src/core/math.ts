import { ExchangeSide, OrderBookLevel } from './types.js';

export const bpsToDecimal = (bps: number): number => bps / 10_000;

export const decimalToBps = (decimal: number): number => decimal * 10_000;

/** Float noise floor for quantity comparisons. */
export const QTY_EPSILON = 1e-12;

export const midPrice = (bid: number, ask: number): number => (bid + ask) / 2;

export const spreadBps = (bid: number, ask: number): number => {
  if (bid <= 0 || ask <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return decimalToBps((ask - bid) / bid);
};

export const relativeBps = (delta: number, reference: number): number =>
  reference > 0 ? decimalToBps(delta / reference) : 0;

export const effectivePrice = (
  levels: OrderBookLevel[],
  desiredSize: number
): number | null => {
  let remaining = desiredSize;
  let notional = 0;

  for (const level of levels) {
    const size = Math.min(remaining, level.size);
    notional += size * level.price;
    remaining -= size;

    if (remaining <= 0) {
      break;
    }
  }

  if (remaining > 0) {
    return null;
  }

  return notional / desiredSize;
};

export interface DepthVwap {
  price: number;
  quantity: number;
  notional: number;
}

/**
 * Walks whole levels until the accumulated quote notional reaches the target.
 * The last level is taken in full, so `notional` may overshoot the target; when
 * the book is too thin it stays below it.
 */
export const vwapByNotional = (
  levels: OrderBookLevel[],
  targetNotional: number
): DepthVwap => {
  let quantity = 0;
  let notional = 0;

  for (const level of levels) {
    if (level.price <= 0 || level.size <= 0) {
      continue;
    }
    quantity += level.size;
    notional += level.price * level.size;
    if (notional >= targetNotional) {
      break;
    }
  }

  if (quantity <= 0) {
    return { price: 0, quantity: 0, notional: 0 };
  }

  return { price: notional / quantity, quantity, notional };
};

const roundScaled = (value: number, tickSize: number, mode: 'floor' | 'ceil'): number => {
  const ticks = value / tickSize;
  // absorb representation error before rounding (100.05 / 0.01 = 10004.999...)
  const nudged = Math.round(ticks * 1e9) / 1e9;
  const rounded = mode === 'floor' ? Math.floor(nudged) : Math.ceil(nudged);
  const decimals = Math.max(0, Math.ceil(-Math.log10(tickSize)));
  return Number((rounded * tickSize).toFixed(decimals));
};

/** Rounds a price to the tick in the direction that makes a resting order more passive. */
export const roundToTick = (
  price: number,
  tickSize: number,
  side: ExchangeSide
): number => {
  if (tickSize <= 0) {
    return price;
  }
  return roundScaled(price, tickSize, side === 'buy' ? 'floor' : 'ceil');
};

export const oppositeSide = (side: ExchangeSide): ExchangeSide =>
  side === 'buy' ? 'sell' : 'buy';

export const signedQuantity = (side: ExchangeSide, quantity: number): number =>
  side === 'buy' ? quantity : -quantity;
