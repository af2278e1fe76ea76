import type { ReconcileConfig } from '../config.js';
import { PositionMismatchError, errorMessage } from '../core/errors.js';
import { VenueRole } from '../core/types.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';
import { Notifier, raiseAlert } from '../monitoring/notifier.js';
import type { LifecycleManager, RecordedPositions } from './lifecycleManager.js';

export interface PositionView {
  instrument: string;
  venue: VenueRole;
  baseline: number;
  recorded: number;
  reported: number;
  /** reported - (baseline + recorded) */
  drift: number;
}

export interface ReconcileReport {
  instrument: string;
  views: PositionView[];
  netExposure: number;
  mismatch?: string;
}

export type ReconciledManager = Pick<
  LifecycleManager,
  'ticker' | 'quantity' | 'inspect' | 'requestShutdown'
>;

/**
 * Compares the fills each manager has recorded against what the venues report.
 * A confirmed mismatch halts every manager; nothing is corrected automatically.
 */
export class PositionReconciler {
  private readonly baselines = new Map<string, RecordedPositions>();
  private readonly strikes = new Map<string, number>();
  private timer?: NodeJS.Timeout;
  private running = false;
  private tripped = false;

  constructor(
    private readonly managers: ReconciledManager[],
    private readonly maker: ExchangeAdapter,
    private readonly hedge: ExchangeAdapter,
    private readonly options: ReconcileConfig,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
    private readonly bus: EventBus = eventBus,
    private readonly clock: () => number = Date.now
  ) {}

  get isTripped(): boolean {
    return this.tripped;
  }

  /** Venue positions at startup; later drift is measured against them. */
  async captureBaseline(): Promise<void> {
    for (const manager of this.managers) {
      const [maker, hedge] = await Promise.all([
        this.maker.getAccountPosition(manager.ticker),
        this.hedge.getAccountPosition(manager.ticker)
      ]);
      this.baselines.set(manager.ticker, { maker, hedge });
      this.logger.info('Position baseline', { instrument: manager.ticker, maker, hedge });
    }
  }

  start(): void {
    this.timer = setInterval(() => {
      if (this.running) {
        return;
      }
      this.running = true;
      this.reconcile()
        .catch((error: unknown) => {
          this.logger.error('Reconciliation failed', { error: errorMessage(error) });
        })
        .finally(() => {
          this.running = false;
        });
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  async reconcile(): Promise<ReconcileReport[]> {
    const reports: ReconcileReport[] = [];
    for (const manager of this.managers) {
      if (this.tripped) {
        break;
      }
      const report = await manager.inspect((recorded) => this.check(manager, recorded));
      reports.push(report);
      if (report.mismatch) {
        await this.trip(report);
      }
    }
    return reports;
  }

  private async check(
    manager: ReconciledManager,
    recorded: RecordedPositions
  ): Promise<ReconcileReport> {
    const instrument = manager.ticker;
    const baseline = this.baselines.get(instrument) ?? { maker: 0, hedge: 0 };
    const [makerReported, hedgeReported] = await Promise.all([
      this.maker.getAccountPosition(instrument),
      this.hedge.getAccountPosition(instrument)
    ]);

    const view = (venue: VenueRole, reported: number): PositionView => ({
      instrument,
      venue,
      baseline: baseline[venue],
      recorded: recorded[venue],
      reported,
      drift: reported - (baseline[venue] + recorded[venue])
    });
    const views = [view('maker', makerReported), view('hedge', hedgeReported)];
    const netExposure = makerReported + hedgeReported;

    const drifted = views.filter((entry) => Math.abs(entry.drift) > this.options.tolerance);
    if (drifted.length) {
      const strikes = (this.strikes.get(instrument) ?? 0) + 1;
      this.strikes.set(instrument, strikes);
      this.logger.warn('Position drift', {
        instrument,
        strikes,
        drift: drifted.map((entry) => ({ venue: entry.venue, drift: entry.drift }))
      });
      if (strikes >= this.options.mismatchConfirmations) {
        return {
          instrument,
          views,
          netExposure,
          mismatch: `recorded fills disagree with ${drifted
            .map((entry) => entry.venue)
            .join(' and ')} position`
        };
      }
    } else {
      this.strikes.delete(instrument);
    }

    const exposureLimit = this.options.maxNetExposureMultiple * manager.quantity;
    if (Math.abs(netExposure) > exposureLimit + this.options.tolerance) {
      return {
        instrument,
        views,
        netExposure,
        mismatch: `net exposure ${netExposure} exceeds ${exposureLimit}`
      };
    }

    this.logger.debug('Positions reconciled', { instrument, netExposure });
    return { instrument, views, netExposure };
  }

  private async trip(report: ReconcileReport): Promise<void> {
    if (this.tripped) {
      return;
    }
    this.tripped = true;

    const error = new PositionMismatchError(report.mismatch ?? 'position mismatch', {
      instrument: report.instrument,
      netExposure: report.netExposure,
      views: report.views
    });

    await raiseAlert(this.notifier, this.bus, this.logger, {
      severity: 'critical',
      title: error.name,
      message: `${report.instrument}: ${error.message}`,
      instrument: report.instrument,
      timestamp: this.clock(),
      metadata: { code: error.code, ...error.metadata }
    });

    this.stop();
    await Promise.all(
      this.managers.map((manager) =>
        manager.requestShutdown(`position mismatch on ${report.instrument}`)
      )
    );
  }
}
