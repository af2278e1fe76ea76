import type { FeeSchedule, InstrumentConfig } from '../config.js';
import { ConfigValidationError } from '../core/errors.js';
import { decimalToBps } from '../core/math.js';
import { AssetClass, CostEstimate, Direction, Liquidity } from '../core/types.js';
import {
  ASSET_CLASSES,
  AssetClassTable,
  loadAssetClassTable,
  symbolFeeOverride
} from './assetClasses.js';

export interface CostModelOptions {
  schedule: FeeSchedule;
  maxMakerLeverage: number;
  /** Fixed fee charged per maker-venue order regardless of notional. */
  ancillaryFeeUsd: number;
  /** Share of the ancillary fee returned after a complete single-order close. */
  ancillaryRefundRatio: number;
  riskBufferBps: number;
  table?: AssetClassTable;
}

export interface CostInput {
  instrument: Pick<InstrumentConfig, 'ticker' | 'assetClass' | 'leverage' | 'quantity'>;
  direction: Direction;
  /** How the maker leg is expected to fill. */
  role: Liquidity;
  holdingHorizonHours: number;
  referencePrice: number;
  quantity?: number;
  fundingRateBpsPerHour?: number;
  hedgeTakerFeeBps?: number;
}

export interface OpeningFee {
  bps: number;
  tier: Liquidity;
}

export class CostModel {
  private readonly table: AssetClassTable;

  constructor(private readonly options: CostModelOptions) {
    const missing = ASSET_CLASSES.filter((assetClass) => !options.schedule[assetClass]);
    if (missing.length) {
      throw new ConfigValidationError(
        'Fee schedule is missing asset classes',
        missing.map((assetClass) => `fees.schedule.${assetClass}: missing`)
      );
    }
    this.table = options.table ?? loadAssetClassTable();
  }

  openingFee(
    assetClass: AssetClass,
    ticker: string,
    role: Liquidity,
    leverage: number
  ): OpeningFee {
    const tier = this.options.schedule[assetClass];
    if (!tier) {
      throw new ConfigValidationError(`Unknown asset class ${String(assetClass)}`, [
        `assetClass: ${String(assetClass)}`
      ]);
    }

    if (assetClass === 'crypto') {
      const makerEligible = role === 'maker' && leverage <= this.options.maxMakerLeverage;
      return makerEligible
        ? { bps: tier.makerBps, tier: 'maker' }
        : { bps: tier.takerBps, tier: 'taker' };
    }

    if (role === 'maker') {
      return { bps: tier.makerBps, tier: 'maker' };
    }
    return {
      bps: symbolFeeOverride(ticker, this.table) ?? tier.takerBps,
      tier: 'taker'
    };
  }

  ancillaryFeeBps(notional: number): number {
    if (notional <= 0) {
      return 0;
    }
    return decimalToBps(this.options.ancillaryFeeUsd / notional);
  }

  estimate(input: CostInput): CostEstimate {
    const { instrument, direction } = input;
    const quantity = input.quantity ?? instrument.quantity;
    const notional = quantity * input.referencePrice;

    const opening = this.openingFee(
      instrument.assetClass,
      instrument.ticker,
      input.role,
      instrument.leverage
    );
    const ancillaryFeeBps = this.ancillaryFeeBps(notional);
    const ancillaryFeeBpsAfterRefund =
      ancillaryFeeBps * (1 - this.options.ancillaryRefundRatio);
    const fundingRate = input.fundingRateBpsPerHour ?? 0;
    const fundingBps =
      fundingRate * input.holdingHorizonHours * (direction === 'long' ? 1 : -1);
    const hedgeFeeBps = input.hedgeTakerFeeBps ?? 0;
    const riskBufferBps = this.options.riskBufferBps;

    const shared = opening.bps + hedgeFeeBps + fundingBps + riskBufferBps;

    return {
      instrument: instrument.ticker,
      assetClass: instrument.assetClass,
      direction,
      feeTier: opening.tier,
      notional,
      openingFeeBps: opening.bps,
      hedgeFeeBps,
      ancillaryFeeBps,
      ancillaryFeeBpsAfterRefund,
      fundingBps,
      riskBufferBps,
      pessimisticBps: shared + ancillaryFeeBps,
      optimisticBps: shared + ancillaryFeeBpsAfterRefund
    };
  }
}
