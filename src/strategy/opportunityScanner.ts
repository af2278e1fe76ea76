import type { GateConfig, InstrumentConfig } from '../config.js';
import { errorMessage } from '../core/errors.js';
import { Direction, MarketSnapshot } from '../core/types.js';
import type { CostModel } from '../cost/costModel.js';
import type { SnapshotSource } from '../feeds/snapshotAggregator.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';
import { Notifier, raiseAlert } from '../monitoring/notifier.js';
import { SkipReason, evaluateDirection, screenSnapshot } from './decisionEngine.js';

const ALERT_COOLDOWN_MS = 300_000;

export interface ScanCandidate {
  instrument: string;
  direction: Direction;
  price: number;
  edgeBps: number;
  thresholdBps: number;
  /** edge minus threshold */
  netBps: number;
  hedgeMid: number;
}

export interface ScanResult {
  candidates: ScanCandidate[];
  skipped: Array<{ instrument: string; reason: SkipReason | 'no-data' }>;
}

export interface OpportunityScannerOptions {
  gate: GateConfig;
  hedgeTakerFeeBps: number;
  /** Candidates at or above this net bps raise an alert. */
  alertThresholdBps: number;
  alertCooldownMs?: number;
  clock?: () => number;
}

/**
 * Read-only sweep over many instruments: ranks both directions of each by how
 * far the edge clears the threshold, without placing anything.
 */
export class OpportunityScanner {
  private readonly lastAlert = new Map<string, number>();
  private readonly clock: () => number;

  constructor(
    private readonly snapshots: SnapshotSource,
    private readonly costModel: CostModel,
    private readonly notifier: Notifier,
    private readonly options: OpportunityScannerOptions,
    private readonly logger: Logger,
    private readonly bus: EventBus = eventBus
  ) {
    this.clock = options.clock ?? Date.now;
  }

  async scan(instruments: readonly InstrumentConfig[]): Promise<ScanResult> {
    const result: ScanResult = { candidates: [], skipped: [] };
    const { gate, hedgeTakerFeeBps } = this.options;

    for (const instrument of instruments) {
      let snapshot: MarketSnapshot;
      try {
        snapshot = await this.snapshots.capture(instrument.ticker, instrument.assetClass);
      } catch (error) {
        this.logger.warn('Scan snapshot failed', {
          instrument: instrument.ticker,
          error: errorMessage(error)
        });
        result.skipped.push({ instrument: instrument.ticker, reason: 'no-data' });
        continue;
      }

      const screened = screenSnapshot(snapshot, gate);
      if (screened) {
        result.skipped.push({ instrument: instrument.ticker, reason: screened.reason });
        continue;
      }

      for (const direction of ['long', 'short'] as const) {
        const cost = this.costModel.estimate({
          instrument,
          direction,
          role: 'maker',
          holdingHorizonHours: gate.holdingHorizonHours,
          referencePrice: snapshot.hedge.mid,
          fundingRateBpsPerHour: snapshot.fundingRateBpsPerHour,
          hedgeTakerFeeBps
        });
        const evaluation = evaluateDirection(snapshot, direction, cost, {
          ...gate,
          priceOffsetBps: instrument.priceOffsetBps,
          tickSize: instrument.tickSize,
          quantity: instrument.quantity
        });
        result.candidates.push({
          instrument: instrument.ticker,
          direction,
          price: evaluation.price,
          edgeBps: evaluation.edgeBps,
          thresholdBps: evaluation.thresholdBps,
          netBps: evaluation.edgeBps - evaluation.thresholdBps,
          hedgeMid: snapshot.hedge.mid
        });
      }
    }

    result.candidates.sort((a, b) => b.netBps - a.netBps);
    return result;
  }

  /** Alerts on qualifying candidates, at most once per instrument and direction per cooldown. */
  async alert(candidates: readonly ScanCandidate[]): Promise<ScanCandidate[]> {
    const now = this.clock();
    const cooldown = this.options.alertCooldownMs ?? ALERT_COOLDOWN_MS;
    const alerted: ScanCandidate[] = [];

    for (const candidate of candidates) {
      if (candidate.netBps < this.options.alertThresholdBps) {
        continue;
      }
      const key = `${candidate.instrument}:${candidate.direction}`;
      const last = this.lastAlert.get(key);
      if (last !== undefined && now - last < cooldown) {
        continue;
      }
      this.lastAlert.set(key, now);
      alerted.push(candidate);

      await raiseAlert(this.notifier, this.bus, this.logger, {
        severity: 'info',
        title: 'Opportunity',
        message: `${candidate.instrument} ${candidate.direction} clears threshold by ${candidate.netBps.toFixed(2)}bps`,
        instrument: candidate.instrument,
        timestamp: now,
        metadata: {
          price: candidate.price,
          edgeBps: candidate.edgeBps,
          thresholdBps: candidate.thresholdBps
        }
      });
    }

    return alerted;
  }
}
