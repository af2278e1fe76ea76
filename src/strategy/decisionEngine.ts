import { bpsToDecimal, relativeBps, roundToTick } from '../core/math.js';
import {
  CostEstimate,
  Direction,
  ExchangeSide,
  MarketSnapshot
} from '../core/types.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';

export interface GateParams {
  minNetBps: number;
  maxSpreadBps: number;
  spreadWeight: number;
  maxDislocationBps: number;
  minDepthNotional: number;
  priceOffsetBps: number;
  tickSize: number;
  quantity: number;
  minOrderNotional?: number;
  maxOrderNotional?: number;
}

/** Cost estimates for the directions the caller is willing to trade. */
export type DirectionCosts = Partial<Record<Direction, CostEstimate>>;

export type SkipReason =
  | 'spread-too-wide'
  | 'insufficient-depth'
  | 'dislocation'
  | 'market-closed'
  | 'below-threshold'
  | 'no-direction'
  | 'invalid-size';

export interface SkipDecision {
  kind: 'skip';
  reason: SkipReason;
  detail?: Record<string, number | string>;
}

export interface PlaceMakerDecision {
  kind: 'placeMaker';
  direction: Direction;
  side: ExchangeSide;
  price: number;
  size: number;
  edgeBps: number;
  thresholdBps: number;
  cost: CostEstimate;
}

export type Decision = SkipDecision | PlaceMakerDecision;

export interface DirectionEvaluation {
  direction: Direction;
  price: number;
  edgeBps: number;
  thresholdBps: number;
  passes: boolean;
}

export const sideForDirection = (direction: Direction): ExchangeSide =>
  direction === 'long' ? 'buy' : 'sell';

/**
 * Maker limit price strictly behind both touches: buys below the lower bid,
 * sells above the higher ask, rounded away from the market.
 */
export const quoteMakerPrice = (
  snapshot: MarketSnapshot,
  side: ExchangeSide,
  offsetBps: number,
  tickSize: number
): number => {
  const offset = bpsToDecimal(offsetBps);
  if (side === 'buy') {
    const reference = Math.min(snapshot.maker.bid, snapshot.hedge.bid);
    return roundToTick(reference * (1 - offset), tickSize, 'buy');
  }
  const reference = Math.max(snapshot.maker.ask, snapshot.hedge.ask);
  return roundToTick(reference * (1 + offset), tickSize, 'sell');
};

/** Edge of a maker price against the hedge touch it would be hedged on, in bps of the hedge mid. */
export const edgeBps = (snapshot: MarketSnapshot, side: ExchangeSide, price: number): number => {
  const delta = side === 'buy' ? snapshot.hedge.bid - price : price - snapshot.hedge.ask;
  return relativeBps(delta, snapshot.hedge.mid);
};

export const dynamicThresholdBps = (
  snapshot: MarketSnapshot,
  cost: CostEstimate,
  gate: Pick<GateParams, 'minNetBps' | 'spreadWeight'>
): number => gate.minNetBps + snapshot.hedge.spreadBps * gate.spreadWeight + cost.pessimisticBps;

export const clampQuantity = (
  quantity: number,
  price: number,
  minNotional?: number,
  maxNotional?: number
): number => {
  if (price <= 0) {
    return quantity;
  }
  const notional = quantity * price;
  if (minNotional !== undefined && notional < minNotional) {
    return minNotional / price;
  }
  if (maxNotional !== undefined && notional > maxNotional) {
    return maxNotional / price;
  }
  return quantity;
};

/** Data-quality and venue checks that veto a cycle before any pricing. */
export const screenSnapshot = (
  snapshot: MarketSnapshot,
  gate: Pick<GateParams, 'maxSpreadBps' | 'minDepthNotional' | 'maxDislocationBps'>
): SkipDecision | undefined => {
  const { maker, hedge } = snapshot;

  if (maker.spreadBps > gate.maxSpreadBps || hedge.spreadBps > gate.maxSpreadBps) {
    return {
      kind: 'skip',
      reason: 'spread-too-wide',
      detail: { makerSpreadBps: maker.spreadBps, hedgeSpreadBps: hedge.spreadBps }
    };
  }

  if (
    gate.minDepthNotional > 0 &&
    (hedge.bidDepthNotional < gate.minDepthNotional ||
      hedge.askDepthNotional < gate.minDepthNotional)
  ) {
    return {
      kind: 'skip',
      reason: 'insufficient-depth',
      detail: { bidDepth: hedge.bidDepthNotional, askDepth: hedge.askDepthNotional }
    };
  }

  const dislocationBps = Math.abs(relativeBps(maker.mid - hedge.mid, hedge.mid));
  if (dislocationBps > gate.maxDislocationBps) {
    return { kind: 'skip', reason: 'dislocation', detail: { dislocationBps } };
  }

  const closed = [maker, hedge].find(
    (quote) => !quote.session.marketOpen || quote.session.dayTradingClosed
  );
  if (closed) {
    return { kind: 'skip', reason: 'market-closed', detail: { venue: closed.venue } };
  }

  return undefined;
};

export const evaluateDirection = (
  snapshot: MarketSnapshot,
  direction: Direction,
  cost: CostEstimate,
  gate: GateParams
): DirectionEvaluation => {
  const side = sideForDirection(direction);
  const price = quoteMakerPrice(snapshot, side, gate.priceOffsetBps, gate.tickSize);
  const edge = edgeBps(snapshot, side, price);
  const thresholdBps = dynamicThresholdBps(snapshot, cost, gate);
  return { direction, price, edgeBps: edge, thresholdBps, passes: edge >= thresholdBps };
};

/**
 * Stateless gate: given a snapshot and the pessimistic cost of each candidate
 * direction, decides whether to rest a maker order and where.
 */
export class DecisionEngine {
  constructor(
    private readonly logger: Logger,
    private readonly bus: EventBus = eventBus
  ) {}

  evaluate(snapshot: MarketSnapshot, costs: DirectionCosts, gate: GateParams): Decision {
    const decision = this.decide(snapshot, costs, gate);
    this.publish(snapshot, decision);
    return decision;
  }

  private decide(snapshot: MarketSnapshot, costs: DirectionCosts, gate: GateParams): Decision {
    const screened = screenSnapshot(snapshot, gate);
    if (screened) {
      return screened;
    }

    const candidates: DirectionEvaluation[] = [];
    for (const direction of ['long', 'short'] as const) {
      const cost = costs[direction];
      if (cost) {
        candidates.push(evaluateDirection(snapshot, direction, cost, gate));
      }
    }

    if (!candidates.length) {
      return { kind: 'skip', reason: 'no-direction' };
    }

    const passing = candidates.filter((candidate) => candidate.passes);
    if (!passing.length) {
      const margin = (candidate: DirectionEvaluation) => candidate.edgeBps - candidate.thresholdBps;
      const best = candidates.reduce((a, b) => (margin(b) > margin(a) ? b : a));
      return {
        kind: 'skip',
        reason: 'below-threshold',
        detail: {
          direction: best.direction,
          edgeBps: best.edgeBps,
          thresholdBps: best.thresholdBps
        }
      };
    }

    if (passing.length > 1) {
      this.logger.warn('Both directions cleared the gate', {
        instrument: snapshot.instrument,
        edges: passing.map((candidate) => ({
          direction: candidate.direction,
          edgeBps: candidate.edgeBps,
          thresholdBps: candidate.thresholdBps
        }))
      });
    }

    // candidates are ordered long first, so an exact tie keeps long
    const chosen = passing.reduce((a, b) => (b.edgeBps > a.edgeBps ? b : a));
    const cost = costs[chosen.direction];
    if (!cost) {
      return { kind: 'skip', reason: 'no-direction' };
    }

    const size = clampQuantity(
      gate.quantity,
      chosen.price,
      gate.minOrderNotional,
      gate.maxOrderNotional
    );
    if (!(size > 0)) {
      return { kind: 'skip', reason: 'invalid-size', detail: { size } };
    }

    return {
      kind: 'placeMaker',
      direction: chosen.direction,
      side: sideForDirection(chosen.direction),
      price: chosen.price,
      size,
      edgeBps: chosen.edgeBps,
      thresholdBps: chosen.thresholdBps,
      cost
    };
  }

  private publish(snapshot: MarketSnapshot, decision: Decision): void {
    const timestamp = snapshot.capturedAt;
    if (decision.kind === 'skip') {
      this.logger.debug('Skip', {
        instrument: snapshot.instrument,
        reason: decision.reason,
        ...decision.detail
      });
      this.bus.emit('decision', {
        instrument: snapshot.instrument,
        kind: 'skip',
        reason: decision.reason,
        timestamp
      });
      return;
    }

    this.logger.info('Gate passed', {
      instrument: snapshot.instrument,
      direction: decision.direction,
      price: decision.price,
      size: decision.size,
      edgeBps: decision.edgeBps.toFixed(3),
      thresholdBps: decision.thresholdBps.toFixed(3)
    });
    this.bus.emit('decision', {
      instrument: snapshot.instrument,
      kind: 'placeMaker',
      direction: decision.direction,
      price: decision.price,
      edgeBps: decision.edgeBps,
      thresholdBps: decision.thresholdBps,
      timestamp
    });
  }
}
