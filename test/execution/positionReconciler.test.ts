import { describe, it, expect, vi } from 'vitest';
import type { ReconcileConfig } from '../../src/config.js';
import { FeeLedger } from '../../src/execution/feeLedger.js';
import { LifecycleManager, type RecordedPositions } from '../../src/execution/lifecycleManager.js';
import { PositionReconciler } from '../../src/execution/positionReconciler.js';
import { SnapshotAggregator } from '../../src/feeds/snapshotAggregator.js';
import { EventBus } from '../../src/lib/eventBus.js';
import { DecisionEngine } from '../../src/strategy/decisionEngine.js';
import {
  FakeVenue,
  LIFECYCLE,
  createClock,
  createMockLogger,
  createRecordingNotifier,
  makeCostModel,
  makeGate,
  makeInstrument
} from '../helpers.js';

const OPTIONS: ReconcileConfig = {
  intervalMs: 1_000,
  tolerance: 1e-8,
  mismatchConfirmations: 1,
  maxNetExposureMultiple: 2
};

const stubManager = (ticker: string, recorded: RecordedPositions, quantity = 10) => ({
  ticker,
  quantity,
  inspect: <T>(fn: (positions: RecordedPositions) => Promise<T>): Promise<T> => fn({ ...recorded }),
  requestShutdown: vi.fn(async (_reason: string) => undefined)
});

const venues = () => {
  const maker = new FakeVenue('maker');
  const hedge = new FakeVenue('hedge');
  return { maker, hedge };
};

const liveSetup = () => {
  const clock = createClock();
  const logger = createMockLogger();
  const bus = new EventBus();
  const { maker, hedge } = venues();
  maker.setQuote('BTC', 100, 100.02);
  hedge.setQuote('BTC', 100.2, 100.22);
  const notifier = createRecordingNotifier();
  const manager = new LifecycleManager({
    instrument: makeInstrument(),
    maker,
    hedge,
    snapshots: new SnapshotAggregator(maker, hedge, { minDepthNotional: 0, clock: clock.now }, logger),
    engine: new DecisionEngine(logger, bus),
    costModel: makeCostModel(),
    ledger: new FeeLedger({ feeUsd: 0.05, refundRatio: 0.5, bus, clock: clock.now }, logger),
    notifier,
    gate: makeGate(),
    lifecycle: LIFECYCLE,
    hedgeTakerFeeBps: 0,
    logger,
    bus,
    clock: clock.now
  });
  manager.subscribe();
  const reconciler = new PositionReconciler([manager], maker, hedge, OPTIONS, notifier, logger, bus, clock.now);
  return { manager, maker, hedge, notifier, reconciler };
};

describe('PositionReconciler', () => {
  it('measures drift from the startup baseline', async () => {
    const { maker, hedge } = venues();
    maker.setPosition('BTC', 5);
    hedge.setPosition('BTC', -5);
    const manager = stubManager('BTC', { maker: 10, hedge: -10 });
    const reconciler = new PositionReconciler(
      [manager], maker, hedge, OPTIONS, createRecordingNotifier(), createMockLogger(), new EventBus()
    );

    await reconciler.captureBaseline();
    maker.setPosition('BTC', 15);
    hedge.setPosition('BTC', -15);
    const [report] = await reconciler.reconcile();

    expect(report.mismatch).toBeUndefined();
    expect(report.netExposure).toBe(0);
    expect(report.views[0]).toEqual({
      instrument: 'BTC',
      venue: 'maker',
      baseline: 5,
      recorded: 10,
      reported: 15,
      drift: 0
    });
    expect(reconciler.isTripped).toBe(false);
  });

  it('trips on net exposure beyond the allowed multiple', async () => {
    const { maker, hedge } = venues();
    const manager = stubManager('BTC', { maker: 30, hedge: 0 });
    const notifier = createRecordingNotifier();
    const reconciler = new PositionReconciler(
      [manager], maker, hedge, OPTIONS, notifier, createMockLogger(), new EventBus()
    );

    await reconciler.captureBaseline();
    maker.setPosition('BTC', 30);
    const [report] = await reconciler.reconcile();

    expect(report.mismatch).toBe('net exposure 30 exceeds 20');
    expect(reconciler.isTripped).toBe(true);
    expect(manager.requestShutdown).toHaveBeenCalledWith('position mismatch on BTC');
    expect(notifier.alerts).toHaveLength(1);
    expect(notifier.alerts[0]).toMatchObject({ severity: 'critical', title: 'PositionMismatchError' });
    expect(notifier.alerts[0].metadata?.code).toBe(3001);
  });

  it('waits for the configured number of confirmations', async () => {
    const { maker, hedge } = venues();
    hedge.setPosition('BTC', -3);
    const manager = stubManager('BTC', { maker: 0, hedge: 0 });
    const reconciler = new PositionReconciler(
      [manager],
      maker,
      hedge,
      { ...OPTIONS, mismatchConfirmations: 2 },
      createRecordingNotifier(),
      createMockLogger(),
      new EventBus()
    );

    const [first] = await reconciler.reconcile();
    expect(first.mismatch).toBeUndefined();
    expect(reconciler.isTripped).toBe(false);

    const [second] = await reconciler.reconcile();
    expect(second.mismatch).toBe('recorded fills disagree with hedge position');
    expect(reconciler.isTripped).toBe(true);
  });

  it('resets the confirmation count after a clean pass', async () => {
    const { maker, hedge } = venues();
    const manager = stubManager('BTC', { maker: 0, hedge: 0 });
    const reconciler = new PositionReconciler(
      [manager],
      maker,
      hedge,
      { ...OPTIONS, mismatchConfirmations: 2 },
      createRecordingNotifier(),
      createMockLogger(),
      new EventBus()
    );

    hedge.setPosition('BTC', -3);
    await reconciler.reconcile();
    hedge.setPosition('BTC', 0);
    await reconciler.reconcile();
    hedge.setPosition('BTC', -3);
    const [report] = await reconciler.reconcile();

    expect(report.mismatch).toBeUndefined();
    expect(manager.requestShutdown).not.toHaveBeenCalled();
  });

  it('halts every instrument when one mismatches', async () => {
    const { maker, hedge } = venues();
    maker.setPosition('BTC', 4);
    const btc = stubManager('BTC', { maker: 0, hedge: 0 });
    const eth = stubManager('ETH', { maker: 0, hedge: 0 });
    const reconciler = new PositionReconciler(
      [btc, eth], maker, hedge, OPTIONS, createRecordingNotifier(), createMockLogger(), new EventBus()
    );

    const reports = await reconciler.reconcile();

    expect(reports).toHaveLength(1);
    expect(reports[0].mismatch).toBe('recorded fills disagree with maker position');
    expect(btc.requestShutdown).toHaveBeenCalledWith('position mismatch on BTC');
    expect(eth.requestShutdown).toHaveBeenCalledWith('position mismatch on BTC');
  });

  it('picks up a fill the venue applied before its push arrived', async () => {
    const { manager, maker, hedge, notifier, reconciler } = liveSetup();

    await reconciler.captureBaseline();
    await manager.tick();
    await manager.settle();
    maker.setOrder('maker-1', { filledQuantity: 10, status: 'filled', avgFillPrice: 99.95 });
    maker.setPosition('BTC', 10);

    const [report] = await reconciler.reconcile();

    expect(report.mismatch).toBeUndefined();
    expect(report.netExposure).toBe(0);
    expect(manager.positions()).toEqual({ maker: 10, hedge: -10 });
    expect(hedge.placed).toMatchObject([{ kind: 'market', quantity: 10, side: 'sell' }]);
    expect(reconciler.isTripped).toBe(false);
    expect(manager.isHalted).toBe(false);
    expect(notifier.alerts).toHaveLength(0);
  });

  it('halts a live manager whose hedge position drifted from its fills', async () => {
    const { manager, maker, hedge, notifier, reconciler } = liveSetup();

    await reconciler.captureBaseline();
    await manager.tick();
    maker.fill('maker-1', 10);
    await manager.settle();
    expect(manager.positions()).toEqual({ maker: 10, hedge: -10 });

    maker.setPosition('BTC', 10);
    hedge.setPosition('BTC', -7);
    const [report] = await reconciler.reconcile();
    await manager.settle();

    expect(report.mismatch).toBe('recorded fills disagree with hedge position');
    expect(report.views[1]).toMatchObject({ recorded: -10, reported: -7, drift: 3 });
    expect(reconciler.isTripped).toBe(true);
    expect(manager.isHalted).toBe(true);
    expect(notifier.alerts).toMatchObject([{ severity: 'critical', title: 'PositionMismatchError' }]);

    maker.setQuote('BTC', 99.9, 99.92);
    await manager.tick();
    expect(maker.placed.filter((order) => order.kind === 'open')).toHaveLength(1);
  });
});
