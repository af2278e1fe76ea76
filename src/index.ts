import { AppConfig, loadConfig } from './config.js';
import { ConfigValidationError, errorMessage } from './core/errors.js';
import { CostModel } from './cost/costModel.js';
import { VenuePair, createDefaultRegistry, createVenuePair } from './exchanges/registry.js';
import { FeeLedger } from './execution/feeLedger.js';
import { LifecycleManager } from './execution/lifecycleManager.js';
import { PositionReconciler } from './execution/positionReconciler.js';
import { TradeStore } from './execution/tradeStore.js';
import { SnapshotAggregator } from './feeds/snapshotAggregator.js';
import { logger, setLogLevel } from './lib/logger.js';
import { MetricsTracker } from './monitoring/metrics.js';
import { LogNotifier } from './monitoring/notifier.js';
import { DecisionEngine } from './strategy/decisionEngine.js';

interface Runtime {
  venues: VenuePair;
  managers: LifecycleManager[];
  reconciler: PositionReconciler;
  metrics: MetricsTracker;
  journal: TradeStore;
}

let runtime: Runtime | undefined;

const build = (config: AppConfig): Runtime => {
  const venues = createVenuePair(config, createDefaultRegistry(), logger);
  const journal = new TradeStore(config.journalPath);
  const notifier = new LogNotifier(logger.child({ component: 'alerts' }));

  const costModel = new CostModel({
    schedule: config.fees.schedule,
    maxMakerLeverage: config.fees.maxMakerLeverage,
    ancillaryFeeUsd: config.fees.ancillaryFeeUsd,
    ancillaryRefundRatio: config.fees.ancillaryRefundRatio,
    riskBufferBps: config.gate.riskBufferBps
  });
  const ledger = new FeeLedger(
    {
      feeUsd: config.fees.ancillaryFeeUsd,
      refundRatio: config.fees.ancillaryRefundRatio,
      journal
    },
    logger.child({ component: 'fees' })
  );
  const snapshots = new SnapshotAggregator(
    venues.maker,
    venues.hedge,
    { minDepthNotional: config.gate.minDepthNotional },
    logger.child({ component: 'snapshots' })
  );
  const engine = new DecisionEngine(logger.child({ component: 'gate' }));

  const managers = config.instruments.map(
    (instrument) =>
      new LifecycleManager({
        instrument,
        maker: venues.maker,
        hedge: venues.hedge,
        snapshots,
        engine,
        costModel,
        ledger,
        notifier,
        gate: config.gate,
        lifecycle: config.lifecycle,
        hedgeTakerFeeBps: config.venues.hedge.takerFeeBps,
        logger,
        journal
      })
  );

  const reconciler = new PositionReconciler(
    managers,
    venues.maker,
    venues.hedge,
    config.reconcile,
    notifier,
    logger.child({ component: 'reconciler' })
  );

  return {
    venues,
    managers,
    reconciler,
    metrics: new MetricsTracker(logger.child({ component: 'metrics' })),
    journal
  };
};

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = build(config);
  runtime = app;

  const tickers = config.instruments.map((instrument) => instrument.ticker);
  await Promise.all([app.venues.maker.start?.(tickers), app.venues.hedge.start?.(tickers)]);
  await app.reconciler.captureBaseline();

  app.managers.forEach((manager) => manager.start());
  app.reconciler.start();
  app.metrics.start();

  logger.info('Maker/hedge engine running', {
    dryRun: config.dryRun,
    instruments: tickers,
    maker: app.venues.maker.name,
    hedge: app.venues.hedge.name
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down...', { signal });
  const app = runtime;
  if (app) {
    app.reconciler.stop();
    await Promise.all(app.managers.map((manager) => manager.requestShutdown(signal)));
    await Promise.all(app.managers.map((manager) => manager.stop()));
    app.metrics.stop();
    await Promise.all([app.venues.maker.stop?.(), app.venues.hedge.stop?.()]);
    app.journal.close();
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  });
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  });
});

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    logger.error(error.message, { code: error.code, validationErrors: error.validationErrors });
  } else {
    logger.error('Fatal error', { error: errorMessage(error) });
  }
  process.exit(1);
});
