import { describe, it, expect } from 'vitest';
import {
  effectivePrice,
  relativeBps,
  roundToTick,
  signedQuantity,
  spreadBps,
  vwapByNotional
} from '../../src/core/math.js';

describe('roundToTick', () => {
  it('floors buys and ceils sells', () => {
    expect(roundToTick(100.057, 0.01, 'buy')).toBe(100.05);
    expect(roundToTick(100.057, 0.01, 'sell')).toBe(100.06);
  });

  it('keeps prices already on the tick', () => {
    expect(roundToTick(100.05, 0.01, 'buy')).toBe(100.05);
    expect(roundToTick(100.05, 0.01, 'sell')).toBe(100.05);
  });

  it('leaves the price alone without a tick size', () => {
    expect(roundToTick(100.057, 0, 'buy')).toBe(100.057);
  });
});

describe('spreadBps', () => {
  it('measures the spread against the bid', () => {
    expect(spreadBps(100, 100.5)).toBeCloseTo(50, 9);
  });

  it('is infinite for an empty side', () => {
    expect(spreadBps(0, 100)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('relativeBps', () => {
  it('returns 0 without a reference', () => {
    expect(relativeBps(1, 0)).toBe(0);
  });
});

describe('vwapByNotional', () => {
  const levels = [
    { price: 100, size: 1 },
    { price: 99, size: 2 }
  ];

  it('stops at the level that reaches the target', () => {
    expect(vwapByNotional(levels, 50)).toEqual({ price: 100, quantity: 1, notional: 100 });
  });

  it('takes whole levels past the first', () => {
    const vwap = vwapByNotional(levels, 150);
    expect(vwap.quantity).toBe(3);
    expect(vwap.notional).toBe(298);
    expect(vwap.price).toBeCloseTo(298 / 3, 9);
  });

  it('reports a thin book with notional below the target', () => {
    expect(vwapByNotional(levels, 1_000).notional).toBe(298);
  });

  it('returns zeros for an empty book', () => {
    expect(vwapByNotional([], 100)).toEqual({ price: 0, quantity: 0, notional: 0 });
  });
});

describe('effectivePrice', () => {
  it('averages across levels', () => {
    expect(effectivePrice([{ price: 100, size: 1 }, { price: 102, size: 1 }], 2)).toBe(101);
  });

  it('returns null when the book is too thin', () => {
    expect(effectivePrice([{ price: 100, size: 1 }], 2)).toBeNull();
  });
});

describe('signedQuantity', () => {
  it('is negative for sells', () => {
    expect(signedQuantity('buy', 2)).toBe(2);
    expect(signedQuantity('sell', 2)).toBe(-2);
  });
});
