import { v4 as uuid } from 'uuid';
import type { GateConfig, InstrumentConfig, LifecycleConfig } from '../config.js';
import { EXECUTION_ERROR_CODES, ExecutionError, errorMessage } from '../core/errors.js';
import { QTY_EPSILON, oppositeSide, relativeBps, signedQuantity } from '../core/math.js';
import {
  CancelReason,
  Direction,
  ExchangeSide,
  LifecycleState,
  Liquidity,
  MarketSnapshot,
  OrderInfo,
  OrderRecord,
  OrderRole,
  OrderStatus,
  OrderUpdateEvent,
  TradeCycle,
  UpdateSource
} from '../core/types.js';
import type { CostModel } from '../cost/costModel.js';
import type { ExchangeAdapter, OrderResult } from '../exchanges/adapter.js';
import type { SnapshotSource } from '../feeds/snapshotAggregator.js';
import { SerialChannel } from '../lib/channel.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';
import { Notifier, raiseAlert } from '../monitoring/notifier.js';
import {
  DecisionEngine,
  DirectionCosts,
  GateParams,
  PlaceMakerDecision,
  edgeBps,
  quoteMakerPrice
} from '../strategy/decisionEngine.js';
import { ActiveCloseOrderSet } from './closeOrderSet.js';
import { FeeLedger } from './feeLedger.js';
import { Journal, nullJournal } from './tradeStore.js';

export interface LifecycleManagerDeps {
  instrument: InstrumentConfig;
  maker: ExchangeAdapter;
  hedge: ExchangeAdapter;
  snapshots: SnapshotSource;
  engine: DecisionEngine;
  costModel: CostModel;
  ledger: FeeLedger;
  notifier: Notifier;
  gate: GateConfig;
  lifecycle: LifecycleConfig;
  /** Taker fee of the hedge venue, added to every cost estimate. */
  hedgeTakerFeeBps: number;
  logger: Logger;
  journal?: Journal;
  bus?: EventBus;
  clock?: () => number;
}

/** Signed positions implied by the fills this manager has seen. */
export interface RecordedPositions {
  maker: number;
  hedge: number;
}

type Message =
  | { type: 'tick'; snapshot: MarketSnapshot }
  | { type: 'update'; event: OrderUpdateEvent; source: UpdateSource }
  | { type: 'shutdown'; reason: string }
  | { type: 'inspect'; run: () => Promise<void> };

type TakerLeg = 'hedge' | 'unwind';

interface IndexedOrder {
  cycle: TradeCycle;
  order: OrderRecord;
}

const STATUS_RANK: Record<OrderStatus, number> = {
  pending: 0,
  open: 1,
  'partially-filled': 2,
  filled: 3,
  canceled: 3,
  rejected: 3
};

const HISTORY_LIMIT = 200;

const isFinal = (status: OrderStatus): boolean => STATUS_RANK[status] === 3;

const isResting = (status: OrderStatus): boolean =>
  status === 'open' || status === 'partially-filled';

const CLOSABLE_STATES: ReadonlySet<LifecycleState> = new Set<LifecycleState>([
  'OpenFilled',
  'OpenCancelled',
  'CloseFailed'
]);

/**
 * Owns one instrument. Every mutation arrives as a message on a serial
 * channel: ticks, venue order updates (push and poll), shutdown and position
 * inspection. Fills on the open leg are hedged on the hedge venue before the
 * handler returns, so no other transition for the instrument can interleave.
 */
export class LifecycleManager {
  private readonly channel: SerialChannel<Message>;
  private readonly cycles = new Map<string, TradeCycle>();
  private readonly orders = new Map<string, IndexedOrder>();
  private readonly lastSeen = new Map<string, number>();
  private readonly closeSet: ActiveCloseOrderSet;
  private readonly history: TradeCycle[] = [];
  private readonly recorded: RecordedPositions = { maker: 0, hedge: 0 };
  private readonly journal: Journal;
  private readonly bus: EventBus;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly busy = new Set<string>();
  /** Placements that failed without an answer, held until the venue shows them or the fill timeout passes. */
  private readonly unconfirmed = new Set<IndexedOrder>();
  private readonly orphans = new Map<string, OrderUpdateEvent>();

  private inFlight?: TradeCycle;
  private lastOpenPlacedAt?: number;
  private opensPlaced = 0;
  private halted = false;
  private paused = false;
  private fatalRaised = false;
  private unsubscribe?: () => void;
  private tickTimer?: NodeJS.Timeout;
  private pollTimer?: NodeJS.Timeout;

  constructor(private readonly deps: LifecycleManagerDeps) {
    this.logger = deps.logger.child({ instrument: deps.instrument.ticker });
    this.journal = deps.journal ?? nullJournal;
    this.bus = deps.bus ?? eventBus;
    this.clock = deps.clock ?? Date.now;
    this.closeSet = new ActiveCloseOrderSet(deps.instrument.gridStepBps);
    this.channel = new SerialChannel<Message>((message) => this.handle(message), this.logger);
  }

  get ticker(): string {
    return this.deps.instrument.ticker;
  }

  get quantity(): number {
    return this.deps.instrument.quantity;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get openOrder(): OrderRecord | undefined {
    return this.inFlight?.open;
  }

  activeCycles(): readonly TradeCycle[] {
    return [...this.cycles.values()];
  }

  completedCycles(): readonly TradeCycle[] {
    return this.history;
  }

  restingCloses(): readonly OrderRecord[] {
    return this.closeSet.list();
  }

  positions(): RecordedPositions {
    return { ...this.recorded };
  }

  /** Cycles holding filled open quantity that is not yet closed. */
  closesInProgress(): number {
    let count = 0;
    for (const cycle of this.cycles.values()) {
      if (cycle !== this.inFlight && cycle.open.filledQuantity > QTY_EPSILON) {
        count += 1;
      }
    }
    return count;
  }

  cooldownMs(): number {
    const { waitTimeMs, maxOrders } = this.deps.instrument;
    return (waitTimeMs * this.closesInProgress()) / maxOrders;
  }

  /** Subscribes to maker-venue pushes; timers are left to `start`. */
  subscribe(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.deps.maker.subscribeOrderUpdates((event) => {
      if (event.instrument !== this.ticker) {
        return;
      }
      this.post({ type: 'update', event, source: 'push' });
    });
  }

  start(): void {
    this.subscribe();
    const { tickIntervalMs, pollIntervalMs } = this.deps.lifecycle;
    this.tickTimer = setInterval(() => this.guarded('tick', () => this.tick()), tickIntervalMs);
    this.pollTimer = setInterval(() => this.guarded('poll', () => this.poll()), pollIntervalMs);
    this.logger.info('Lifecycle manager started', {
      direction: this.deps.instrument.direction,
      quantity: this.deps.instrument.quantity,
      boost: this.deps.instrument.boost
    });
  }

  async stop(): Promise<void> {
    this.stopTimers();
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await this.settle();
  }

  /** Captures a snapshot outside the channel, then hands it to the consumer. */
  async tick(): Promise<void> {
    if (this.halted) {
      return;
    }
    let snapshot: MarketSnapshot;
    try {
      snapshot = await this.deps.snapshots.capture(this.ticker, this.deps.instrument.assetClass);
    } catch (error) {
      this.logger.warn('Snapshot unavailable', { error: errorMessage(error) });
      return;
    }
    await this.channel.post({ type: 'tick', snapshot });
  }

  /** Fetches resting maker orders that have been quiet for a poll interval. */
  async poll(): Promise<void> {
    const now = this.clock();
    const due = [...this.orders.values()]
      .map((entry) => entry.order)
      .filter(
        (order) =>
          isResting(order.status) &&
          now - (this.lastSeen.get(order.id) ?? order.createdAt) >=
            this.deps.lifecycle.pollIntervalMs
      );

    for (const order of due) {
      const info = await this.fetchOrder(order.id);
      if (info) {
        await this.channel.post({ type: 'update', event: info, source: 'poll' });
      }
    }
  }

  requestShutdown(reason: string): Promise<void> {
    if (this.halted) {
      return this.settle();
    }
    this.halted = true;
    this.logger.warn('Shutdown requested', { reason });
    return this.channel.post({ type: 'shutdown', reason });
  }

  /** Runs `fn` between two messages, with no mutation in flight. */
  inspect<T>(fn: (recorded: RecordedPositions) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.channel
        .post({
          type: 'inspect',
          run: async () => {
            try {
              resolve(await fn(this.positions()));
            } catch (error) {
              reject(error);
            }
          }
        })
        .catch(reject);
    });
  }

  /** Resolves once every message posted so far, and any they posted, is handled. */
  async settle(): Promise<void> {
    while (this.channel.pending > 0) {
      await this.channel.drain();
    }
  }

  private post(message: Message): void {
    this.channel.post(message).catch((error: unknown) => {
      this.logger.error('Message handling failed', {
        type: message.type,
        error: errorMessage(error)
      });
    });
  }

  private guarded(label: string, task: () => Promise<void>): void {
    if (this.busy.has(label)) {
      return;
    }
    this.busy.add(label);
    task()
      .catch((error: unknown) => {
        this.logger.error('Lifecycle task failed', { task: label, error: errorMessage(error) });
      })
      .finally(() => {
        this.busy.delete(label);
      });
  }

  private async handle(message: Message): Promise<void> {
    switch (message.type) {
      case 'tick':
        await this.onTick(message.snapshot);
        return;
      case 'update':
        await this.applyGuarded(message.event, message.source);
        return;
      case 'shutdown':
        await this.onShutdown(message.reason);
        return;
      case 'inspect':
        await this.syncResting();
        await message.run();
        return;
    }
  }

  private async applyGuarded(event: OrderUpdateEvent, source: UpdateSource): Promise<void> {
    try {
      await this.applyUpdate(event, source);
    } catch (error) {
      // a failure mid-update can leave a fill unhedged
      await this.fatal(EXECUTION_ERROR_CODES.LIFECYCLE_FAILURE, 'Order update handling failed', {
        orderId: event.orderId,
        error: errorMessage(error)
      });
    }
  }

  /** Brings every resting order up to the venue's view, so positions read next include its fills. */
  private async syncResting(): Promise<void> {
    await this.resolvePlacements();
    for (const { order } of [...this.orders.values()]) {
      if (!isResting(order.status)) {
        continue;
      }
      const info = await this.fetchOrder(order.id);
      if (info) {
        await this.applyGuarded(info, 'sync');
      }
    }
  }

  private async onTick(snapshot: MarketSnapshot): Promise<void> {
    if (this.halted) {
      return;
    }
    await this.resolvePlacements();
    if (await this.checkPriceConditions(snapshot)) {
      return;
    }
    await this.superviseOpen(snapshot);
    await this.advanceCloses(snapshot);
    await this.maybeOpen(snapshot);
  }

  private async checkPriceConditions(snapshot: MarketSnapshot): Promise<boolean> {
    const { stopPrice, pausePrice, direction } = this.deps.instrument;
    const mid = snapshot.maker.mid;
    const reached = (threshold?: number) =>
      threshold !== undefined && (direction === 'short' ? mid <= threshold : mid >= threshold);

    if (reached(stopPrice)) {
      await raiseAlert(this.deps.notifier, this.bus, this.logger, {
        severity: 'warning',
        title: 'Stop price reached',
        message: `${this.ticker} mid ${mid} crossed stop ${stopPrice}`,
        instrument: this.ticker,
        timestamp: this.clock(),
        metadata: { code: EXECUTION_ERROR_CODES.STOP_PRICE_REACHED, mid, stopPrice }
      });
      this.halt('stop price reached');
      return true;
    }

    const pause = reached(pausePrice);
    if (pause !== this.paused) {
      this.paused = pause;
      this.logger.info(pause ? 'Pause price reached, new opens suspended' : 'Pause lifted', {
        mid,
        pausePrice
      });
    }
    return false;
  }

  private async superviseOpen(snapshot: MarketSnapshot): Promise<void> {
    const cycle = this.inFlight;
    if (!cycle || !isResting(cycle.open.status)) {
      return;
    }
    if (cycle.cancelRequested) {
      await this.confirmCancel(cycle);
      return;
    }

    const { open } = cycle;
    if (this.clock() - open.createdAt >= this.fillTimeoutMs()) {
      await this.cancelOpen(cycle, 'timeout');
      return;
    }

    if (open.requestedPrice !== undefined) {
      const edge = edgeBps(snapshot, open.side, open.requestedPrice);
      if (edge < cycle.thresholdBps) {
        this.logger.info('Resting open no longer favorable', {
          price: open.requestedPrice,
          edgeBps: edge,
          thresholdBps: cycle.thresholdBps
        });
        await this.cancelOpen(cycle, 'adverse-move');
      }
    }
  }

  private async maybeOpen(snapshot: MarketSnapshot): Promise<void> {
    if (this.halted || this.paused || this.inFlight) {
      return;
    }

    const { instrument } = this.deps;
    if (instrument.maxCycles !== undefined && this.opensPlaced >= instrument.maxCycles) {
      this.logger.debug('Cycle limit reached', {
        opensPlaced: this.opensPlaced,
        maxCycles: instrument.maxCycles
      });
      return;
    }

    const closes = this.closesInProgress();
    if (closes >= instrument.maxOrders) {
      this.logger.debug('Close capacity reached', { closes, maxOrders: instrument.maxOrders });
      return;
    }

    const cooldown = this.cooldownMs();
    if (this.lastOpenPlacedAt !== undefined && this.clock() - this.lastOpenPlacedAt < cooldown) {
      this.logger.debug('Cooling down', { cooldownMs: cooldown });
      return;
    }

    const decision = this.deps.engine.evaluate(snapshot, this.costsFor(snapshot), this.gateParams());
    if (decision.kind === 'skip') {
      return;
    }

    if (instrument.maxPosition !== undefined) {
      const projected = this.recorded.maker + signedQuantity(decision.side, decision.size);
      if (Math.abs(projected) > instrument.maxPosition + QTY_EPSILON) {
        this.logger.debug('Position cap reached', {
          position: this.recorded.maker,
          size: decision.size,
          maxPosition: instrument.maxPosition
        });
        return;
      }
    }
    await this.placeOpen(decision);
  }

  private costsFor(snapshot: MarketSnapshot): DirectionCosts {
    const { instrument, gate, costModel, hedgeTakerFeeBps } = this.deps;
    const directions: Direction[] =
      instrument.direction === 'both' ? ['long', 'short'] : [instrument.direction];

    const costs: DirectionCosts = {};
    for (const direction of directions) {
      costs[direction] = costModel.estimate({
        instrument,
        direction,
        role: 'maker',
        holdingHorizonHours: gate.holdingHorizonHours,
        referencePrice: snapshot.hedge.mid,
        fundingRateBpsPerHour: snapshot.fundingRateBpsPerHour,
        hedgeTakerFeeBps
      });
    }
    return costs;
  }

  private gateParams(): GateParams {
    const { gate, instrument } = this.deps;
    return {
      minNetBps: gate.minNetBps,
      maxSpreadBps: gate.maxSpreadBps,
      spreadWeight: gate.spreadWeight,
      maxDislocationBps: gate.maxDislocationBps,
      minDepthNotional: gate.minDepthNotional,
      priceOffsetBps: instrument.priceOffsetBps,
      tickSize: instrument.tickSize,
      quantity: instrument.quantity,
      minOrderNotional: instrument.minOrderNotional,
      maxOrderNotional: instrument.maxOrderNotional
    };
  }

  private async placeOpen(decision: PlaceMakerDecision): Promise<void> {
    const cycleId = uuid();
    const open = this.newOrder(
      cycleId,
      this.deps.maker.name,
      decision.side,
      'open',
      'maker',
      decision.size,
      decision.price
    );
    const cycle: TradeCycle = {
      id: cycleId,
      instrument: this.ticker,
      direction: decision.direction,
      state: 'Idle',
      open,
      hedges: [],
      closes: [],
      unwinds: [],
      hedgedQuantity: 0,
      closedQuantity: 0,
      unwoundQuantity: 0,
      closeAttempts: 0,
      partialClose: false,
      ancillaryFee: 'charged',
      thresholdBps: decision.thresholdBps,
      cancelRequested: false
    };
    this.cycles.set(cycleId, cycle);
    this.inFlight = cycle;

    const result = await this.deps.maker.placeOpenOrder(
      this.ticker,
      decision.size,
      decision.side,
      decision.price
    );
    const now = this.clock();
    this.lastOpenPlacedAt = now;

    if (result.success && result.orderId) {
      open.id = result.orderId;
    }
    this.deps.ledger.charge(cycle.id, open.id, this.ticker);

    if (result.errorKind === 'ambiguous') {
      // the slot stays taken until the venue shows the order or the fill timeout passes
      this.logger.warn('Open placement unanswered, checking the venue', { message: result.message });
      await this.trackUnconfirmed(cycle, open);
      return;
    }

    if (!result.success || !result.orderId) {
      this.logger.warn('Open order rejected', {
        errorKind: result.errorKind,
        message: result.message
      });
      this.markRejected(open);
      this.finishCancelledOpen(cycle);
      if (result.errorKind === 'auth') {
        await this.fatal(EXECUTION_ERROR_CODES.LIFECYCLE_FAILURE, 'Maker venue refused credentials', {
          message: result.message
        });
      }
      return;
    }

    this.accept(cycle, open, `edge ${decision.edgeBps.toFixed(3)}bps`);

    if (this.halted) {
      await this.cancelOpen(cycle, 'shutdown');
      return;
    }

    if (result.filledQuantity && result.filledQuantity > QTY_EPSILON) {
      await this.applyUpdate(
        this.placementUpdate(open, result.filledQuantity, result.avgPrice),
        'placement'
      );
    }
  }

  private async cancelOpen(cycle: TradeCycle, reason: CancelReason): Promise<void> {
    const { open } = cycle;
    cycle.cancelRequested = true;
    open.cancelReason = reason;
    this.logger.info('Cancelling open order', { orderId: open.id, reason });

    const acknowledged = await this.cancelAndSync(open);

    if (isResting(open.status) && !acknowledged) {
      // still live on the venue; the next tick tries again
      cycle.cancelRequested = false;
    }
  }

  /**
   * Cancels and reads the order back. The final fill only ever comes from the
   * venue; without a readback the order stays tracked until a later lookup or
   * push settles it. Resolves to whether the venue acknowledged the cancel.
   */
  private async cancelAndSync(order: OrderRecord): Promise<boolean> {
    const result = await this.deps.maker.cancelOrder(order.id);
    if (!result.success) {
      this.logger.warn('Cancel not acknowledged', {
        orderId: order.id,
        errorKind: result.errorKind,
        message: result.message
      });
    }

    const info = await this.fetchOrder(order.id);
    if (info) {
      await this.applyUpdate(info, 'cancel');
    } else {
      this.logger.warn('Cancel outcome unconfirmed, waiting for the venue', {
        orderId: order.id,
        acknowledged: result.success
      });
    }
    return result.success;
  }

  /** Reads back an open whose cancel was acknowledged but not yet seen final. */
  private async confirmCancel(cycle: TradeCycle): Promise<void> {
    const info = await this.fetchOrder(cycle.open.id);
    if (!info) {
      return;
    }
    await this.applyUpdate(info, 'cancel');
    if (isResting(cycle.open.status)) {
      cycle.cancelRequested = false;
    }
  }

  private async resolvePlacements(): Promise<void> {
    for (const entry of [...this.unconfirmed]) {
      await this.resolveUnconfirmed(entry);
    }
  }

  private async trackUnconfirmed(cycle: TradeCycle, order: OrderRecord): Promise<void> {
    const entry: IndexedOrder = { cycle, order };
    this.unconfirmed.add(entry);
    await this.resolveUnconfirmed(entry);
  }

  /**
   * Looks for an unanswered placement among the venue's active orders and the
   * untracked pushes seen since. Adopts a match; gives the placement up as
   * rejected once the fill timeout passes with the venue showing nothing.
   */
  private async resolveUnconfirmed(entry: IndexedOrder): Promise<void> {
    const { cycle, order } = entry;
    let active: OrderInfo[];
    try {
      active = await this.deps.maker.getActiveOrders(this.ticker);
    } catch (error) {
      this.logger.warn('Active order lookup failed', { orderId: order.id, error: errorMessage(error) });
      return;
    }

    const match = [...active, ...this.orphans.values()].find((info) =>
      this.matchesPlacement(order, info)
    );
    if (match) {
      this.forgetUnconfirmed(entry, match.orderId);
      this.logger.info('Unanswered placement found on the venue', {
        orderId: match.orderId,
        role: order.role
      });
      order.id = match.orderId;
      this.accept(cycle, order, 'found after an unanswered placement');
      await this.applyUpdate(match, 'poll');
      return;
    }

    if (this.clock() - order.createdAt < this.fillTimeoutMs()) {
      return;
    }

    this.forgetUnconfirmed(entry);
    this.logger.warn('Unanswered placement not on the venue, treating it as rejected', {
      role: order.role,
      side: order.side,
      quantity: order.requestedQuantity,
      price: order.requestedPrice
    });
    this.markRejected(order);
    if (order === cycle.open) {
      this.finishCancelledOpen(cycle);
      return;
    }
    await this.closeFailed(cycle, 'placement unconfirmed');
  }

  private matchesPlacement(order: OrderRecord, info: OrderInfo): boolean {
    return (
      !this.orders.has(info.orderId) &&
      info.instrument === this.ticker &&
      info.side === order.side &&
      (info.role === undefined || info.role === order.role) &&
      Math.abs(info.totalQuantity - order.requestedQuantity) <= QTY_EPSILON &&
      (order.requestedPrice === undefined ||
        info.price === undefined ||
        Math.abs(info.price - order.requestedPrice) < this.deps.instrument.tickSize / 2)
    );
  }

  private forgetUnconfirmed(entry: IndexedOrder, orderId?: string): void {
    this.unconfirmed.delete(entry);
    if (orderId) {
      this.orphans.delete(orderId);
    }
    if (!this.unconfirmed.size) {
      this.orphans.clear();
    }
  }

  private async applyUpdate(event: OrderUpdateEvent, source: UpdateSource): Promise<void> {
    const entry = this.orders.get(event.orderId);
    if (!entry || event.instrument !== this.ticker) {
      if (this.unconfirmed.size && event.instrument === this.ticker) {
        // may belong to a placement that went unanswered
        this.orphans.set(event.orderId, event);
      }
      this.logger.debug('Update for untracked order', { orderId: event.orderId, source });
      return;
    }

    const { cycle, order } = entry;
    const now = this.clock();
    this.lastSeen.set(order.id, now);

    if (event.filledQuantity < order.filledQuantity - QTY_EPSILON) {
      this.logger.debug('Ignoring regressed fill', {
        orderId: order.id,
        source,
        known: order.filledQuantity,
        reported: event.filledQuantity
      });
      return;
    }

    const delta = Math.max(0, event.filledQuantity - order.filledQuantity);
    const status =
      STATUS_RANK[event.status] >= STATUS_RANK[order.status] ? event.status : order.status;
    if (delta <= QTY_EPSILON && status === order.status) {
      return;
    }

    if (delta > QTY_EPSILON) {
      order.filledQuantity = event.filledQuantity;
      order.avgFillPrice = event.avgFillPrice ?? event.price ?? order.requestedPrice;
      this.recorded.maker += signedQuantity(order.side, delta);
    }
    order.status = status;
    order.updatedAt = now;
    this.journal.recordOrder(order);

    this.logger.debug('Order update applied', {
      orderId: order.id,
      source,
      status,
      filled: order.filledQuantity,
      delta
    });

    if (order === cycle.open) {
      await this.onOpenUpdate(cycle, delta);
    } else {
      await this.onCloseUpdate(cycle, order, delta);
    }
  }

  private async onOpenUpdate(cycle: TradeCycle, delta: number): Promise<void> {
    if (delta > QTY_EPSILON) {
      // hedge before anything else happens to this cycle
      await this.takerLeg(cycle, delta, oppositeSide(cycle.open.side), 'hedge');
    }

    switch (cycle.open.status) {
      case 'partially-filled':
        this.transition(cycle, 'OpenPartiallyFilled');
        return;
      case 'filled':
        cycle.openOutcome = 'filled';
        this.releaseOpen(cycle);
        this.transition(cycle, 'OpenFilled');
        return;
      case 'canceled':
      case 'rejected':
        this.finishCancelledOpen(cycle);
        return;
      default:
        return;
    }
  }

  private finishCancelledOpen(cycle: TradeCycle): void {
    const { open } = cycle;
    this.releaseOpen(cycle);

    if (open.filledQuantity > QTY_EPSILON) {
      cycle.openOutcome = 'hedged-partial';
      this.transition(cycle, 'OpenCancelled', 'hedged-partial');
      return;
    }

    cycle.openOutcome = open.status === 'rejected' ? 'rejected' : 'cancelled';
    this.forfeitFee(cycle, `open ${cycle.openOutcome}`);
    this.transition(cycle, 'OpenCancelled', open.cancelReason ?? cycle.openOutcome);
    this.retire(cycle);
  }

  private async onCloseUpdate(cycle: TradeCycle, order: OrderRecord, delta: number): Promise<void> {
    if (delta > QTY_EPSILON) {
      cycle.closedQuantity += delta;
      await this.takerLeg(cycle, delta, cycle.open.side, 'unwind');
    }

    const partial =
      order.filledQuantity > QTY_EPSILON &&
      order.filledQuantity < order.requestedQuantity - QTY_EPSILON;
    if (partial && (order.status === 'partially-filled' || isFinal(order.status))) {
      cycle.partialClose = true;
      this.forfeitFee(cycle, 'partial close');
    }

    if (!isFinal(order.status)) {
      return;
    }

    this.closeSet.remove(order.id);

    if (cycle.closedQuantity >= cycle.open.filledQuantity - QTY_EPSILON) {
      this.completeCycle(cycle);
      return;
    }

    if (order.status !== 'filled') {
      await this.closeFailed(cycle, `close ${order.status}`);
    }
  }

  private completeCycle(cycle: TradeCycle): void {
    const filledCloses = cycle.closes.filter((close) => close.filledQuantity > QTY_EPSILON);
    if (!cycle.partialClose && filledCloses.length === 1) {
      this.refundFee(cycle, 'full close');
    } else {
      this.forfeitFee(cycle, 'closed in parts');
    }
    this.transition(cycle, 'CloseFilled');
    this.retire(cycle);
  }

  private readyToClose(cycle: TradeCycle): boolean {
    const { open } = cycle;
    return (
      CLOSABLE_STATES.has(cycle.state) &&
      isFinal(open.status) &&
      open.filledQuantity > QTY_EPSILON &&
      cycle.hedgedQuantity >= open.filledQuantity - QTY_EPSILON &&
      !cycle.closes.some((close) => !isFinal(close.status))
    );
  }

  private async advanceCloses(snapshot: MarketSnapshot): Promise<void> {
    for (const cycle of [...this.cycles.values()]) {
      if (this.halted) {
        return;
      }
      if (this.readyToClose(cycle)) {
        await this.placeClose(cycle, snapshot);
      }
    }
  }

  private async placeClose(cycle: TradeCycle, snapshot: MarketSnapshot): Promise<void> {
    const remaining = cycle.open.filledQuantity - cycle.closedQuantity;
    if (remaining <= QTY_EPSILON) {
      this.completeCycle(cycle);
      return;
    }

    const { instrument, lifecycle } = this.deps;
    const side = oppositeSide(cycle.open.side);
    const limitPrice = instrument.boost
      ? undefined
      : quoteMakerPrice(snapshot, side, instrument.priceOffsetBps, instrument.tickSize);

    if (limitPrice !== undefined && !this.closeSet.canPlace(limitPrice)) {
      this.logger.debug('Close deferred by grid step', {
        price: limitPrice,
        conflict: this.closeSet.conflictFor(limitPrice)?.id
      });
      return;
    }

    cycle.closeAttempts += 1;

    const reference = limitPrice ?? (side === 'sell' ? snapshot.maker.bid : snapshot.maker.ask);
    const slippageBps = Math.abs(relativeBps(reference - snapshot.hedge.mid, snapshot.hedge.mid));
    if (slippageBps > lifecycle.maxCloseSlippageBps) {
      this.logger.warn('Close slippage beyond limit', {
        reference,
        hedgeMid: snapshot.hedge.mid,
        slippageBps,
        maxCloseSlippageBps: lifecycle.maxCloseSlippageBps
      });
      await this.closeFailed(cycle, 'slippage');
      return;
    }

    const order = this.newOrder(
      cycle.id,
      this.deps.maker.name,
      side,
      'close',
      instrument.boost ? 'taker' : 'maker',
      remaining,
      limitPrice
    );
    cycle.closes.push(order);

    const result =
      limitPrice === undefined
        ? await this.submitMarket(this.deps.maker, remaining, side)
        : await this.deps.maker.placeCloseOrder(this.ticker, remaining, limitPrice, side);

    order.updatedAt = this.clock();
    if (result.errorKind === 'ambiguous') {
      if (limitPrice !== undefined) {
        this.logger.warn('Close placement unanswered, checking the venue', { message: result.message });
        await this.trackUnconfirmed(cycle, order);
        return;
      }
      this.journal.recordOrder(order);
      await this.fatal(
        EXECUTION_ERROR_CODES.LIFECYCLE_FAILURE,
        'Market close outcome unknown, position needs manual resolution',
        { cycleId: cycle.id, quantity: remaining, message: result.message }
      );
      return;
    }

    // a market close settled from the position change carries no order id
    if (!result.success || (limitPrice !== undefined && !result.orderId)) {
      this.markRejected(order);
      this.logger.warn('Close order rejected', {
        errorKind: result.errorKind,
        message: result.message
      });
      await this.closeFailed(cycle, result.message ?? 'close rejected');
      return;
    }

    if (result.orderId) {
      order.id = result.orderId;
    }
    this.accept(cycle, order, instrument.boost ? 'market' : `limit ${limitPrice}`);

    // market closes fill on submission even when the venue does not say how much
    const immediate =
      limitPrice === undefined ? result.filledQuantity ?? remaining : result.filledQuantity;
    if (immediate && immediate > QTY_EPSILON) {
      await this.applyUpdate(this.placementUpdate(order, immediate, result.avgPrice), 'placement');
    }
  }

  private async closeFailed(cycle: TradeCycle, reason: string): Promise<void> {
    this.transition(cycle, 'CloseFailed', reason);
    if (this.halted || cycle.closeAttempts < this.deps.lifecycle.closeMaxAttempts) {
      return;
    }
    this.forfeitFee(cycle, 'close failed');
    await this.fatal(
      EXECUTION_ERROR_CODES.CLOSE_ATTEMPTS_EXHAUSTED,
      `Close failed ${cycle.closeAttempts} times, position needs manual resolution`,
      {
        cycleId: cycle.id,
        openQuantity: cycle.open.filledQuantity,
        closedQuantity: cycle.closedQuantity,
        reason
      }
    );
  }

  /** Market orders on the hedge venue; exhausting the attempts is fatal. */
  private async takerLeg(
    cycle: TradeCycle,
    quantity: number,
    side: ExchangeSide,
    leg: TakerLeg
  ): Promise<boolean> {
    const { hedge, lifecycle } = this.deps;
    let remaining = quantity;
    let lastError = '';

    for (
      let attempt = 1;
      attempt <= lifecycle.hedgeMaxAttempts && remaining > QTY_EPSILON;
      attempt += 1
    ) {
      const result = await this.submitMarket(hedge, remaining, side);
      const filled = result.success ? Math.min(remaining, result.filledQuantity ?? remaining) : 0;

      if (filled <= QTY_EPSILON) {
        lastError = result.message ?? result.errorKind ?? 'no fill';
        this.logger.warn(`${leg} attempt failed`, {
          attempt,
          quantity: remaining,
          errorKind: result.errorKind,
          message: result.message
        });
        if (
          result.errorKind === 'unsupported' ||
          result.errorKind === 'auth' ||
          result.errorKind === 'ambiguous'
        ) {
          break;
        }
        continue;
      }

      const record = this.newOrder(
        cycle.id,
        hedge.name,
        side,
        leg === 'hedge' ? 'open' : 'close',
        'taker',
        remaining,
        undefined,
        result.orderId
      );
      record.status = filled >= remaining - QTY_EPSILON ? 'filled' : 'partially-filled';
      record.filledQuantity = filled;
      record.avgFillPrice = result.avgPrice;
      this.journal.recordOrder(record);

      this.recorded.hedge += signedQuantity(side, filled);
      if (leg === 'hedge') {
        cycle.hedges.push(record);
        cycle.hedgedQuantity += filled;
      } else {
        cycle.unwinds.push(record);
        cycle.unwoundQuantity += filled;
      }
      remaining -= filled;

      this.logger.info(leg === 'hedge' ? 'Hedge filled' : 'Unwind filled', {
        cycleId: cycle.id,
        side,
        quantity: filled,
        avgPrice: result.avgPrice
      });
    }

    if (remaining > QTY_EPSILON) {
      await this.fatal(EXECUTION_ERROR_CODES.HEDGE_FAILED, `${leg} could not be completed`, {
        cycleId: cycle.id,
        side,
        requested: quantity,
        unfilled: remaining,
        lastError
      });
      return false;
    }
    return true;
  }

  private async onShutdown(reason: string): Promise<void> {
    this.logger.warn('Cancelling resting orders', { reason });
    await this.resolvePlacements();

    const cycle = this.inFlight;
    if (cycle && isResting(cycle.open.status)) {
      await this.cancelOpen(cycle, 'shutdown');
    }

    for (const order of [...this.closeSet.list()]) {
      order.cancelReason = 'shutdown';
      await this.cancelAndSync(order);
    }

    this.stopTimers();
    this.logger.warn('Instrument halted', {
      reason,
      activeCycles: this.cycles.size,
      unconfirmedPlacements: this.unconfirmed.size,
      positions: this.positions()
    });
  }

  private async fatal(code: number, message: string, metadata: Record<string, unknown>): Promise<void> {
    if (!this.fatalRaised) {
      this.fatalRaised = true;
      const error = new ExecutionError(code, message, 'critical', {
        instrument: this.ticker,
        ...metadata
      });
      await raiseAlert(this.deps.notifier, this.bus, this.logger, {
        severity: 'critical',
        title: error.name,
        message,
        instrument: this.ticker,
        timestamp: this.clock(),
        metadata: { code: error.code, ...error.metadata }
      });
    }
    this.halt(message);
  }

  /** Sets the halt flag immediately; resting orders are cancelled by the queued shutdown. */
  private halt(reason: string): void {
    if (this.halted) {
      return;
    }
    this.halted = true;
    this.post({ type: 'shutdown', reason });
  }

  private stopTimers(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
  }

  /**
   * Market order whose unanswered outcome is settled from the change in the
   * venue position, so a resend never doubles a fill that went through.
   */
  private async submitMarket(
    venue: ExchangeAdapter,
    quantity: number,
    side: ExchangeSide
  ): Promise<OrderResult> {
    const before = await this.readPosition(venue);
    const result = await venue.placeMarketOrder(this.ticker, quantity, side);
    if (result.errorKind !== 'ambiguous') {
      return result;
    }

    const after = before === undefined ? undefined : await this.readPosition(venue);
    if (before === undefined || after === undefined) {
      this.logger.error('Market order outcome unknown', { venue: venue.name, quantity, side });
      return result;
    }

    const moved = Math.min(quantity, Math.max(0, signedQuantity(side, after - before)));
    this.logger.warn('Market order unanswered, settled from the position change', {
      venue: venue.name,
      quantity,
      side,
      moved
    });
    if (moved <= QTY_EPSILON) {
      return {
        success: false,
        errorKind: 'rejected',
        message: 'position unchanged after an unanswered order'
      };
    }
    return { success: true, filledQuantity: moved };
  }

  private async readPosition(venue: ExchangeAdapter): Promise<number | undefined> {
    try {
      return await venue.getAccountPosition(this.ticker);
    } catch (error) {
      this.logger.warn('Position lookup failed', { venue: venue.name, error: errorMessage(error) });
      return undefined;
    }
  }

  private async fetchOrder(orderId: string): Promise<OrderInfo | undefined> {
    try {
      return await this.deps.maker.getOrderInfo(orderId);
    } catch (error) {
      this.logger.warn('Order lookup failed', { orderId, error: errorMessage(error) });
      return undefined;
    }
  }

  private newOrder(
    cycleId: string,
    venue: string,
    side: ExchangeSide,
    role: OrderRole,
    liquidity: Liquidity,
    quantity: number,
    price?: number,
    id?: string
  ): OrderRecord {
    const now = this.clock();
    return {
      id: id ?? `pending-${uuid()}`,
      cycleId,
      instrument: this.ticker,
      venue,
      side,
      role,
      liquidity,
      requestedQuantity: quantity,
      requestedPrice: price,
      status: 'pending',
      filledQuantity: 0,
      createdAt: now,
      updatedAt: now
    };
  }

  private placementUpdate(order: OrderRecord, filled: number, avgPrice?: number): OrderUpdateEvent {
    return {
      instrument: order.instrument,
      orderId: order.id,
      status: filled >= order.requestedQuantity - QTY_EPSILON ? 'filled' : 'partially-filled',
      side: order.side,
      role: order.role,
      filledQuantity: filled,
      totalQuantity: order.requestedQuantity,
      price: order.requestedPrice,
      avgFillPrice: avgPrice
    };
  }

  /** Marks a maker order live on the venue and moves its cycle on. */
  private accept(cycle: TradeCycle, order: OrderRecord, reason: string): void {
    order.status = 'open';
    order.updatedAt = this.clock();
    this.index(cycle, order);
    this.journal.recordOrder(order);
    if (order === cycle.open) {
      this.opensPlaced += 1;
      this.transition(cycle, 'OpenPlaced', reason);
      return;
    }
    if (order.requestedPrice !== undefined) {
      this.closeSet.add(order);
    }
    this.transition(cycle, 'ClosePlaced', reason);
  }

  private markRejected(order: OrderRecord): void {
    order.status = 'rejected';
    order.cancelReason = 'rejected';
    order.updatedAt = this.clock();
    this.journal.recordOrder(order);
  }

  private fillTimeoutMs(): number {
    return this.deps.instrument.fillTimeoutMs ?? this.deps.lifecycle.fillTimeoutMs;
  }

  private index(cycle: TradeCycle, order: OrderRecord): void {
    this.orders.set(order.id, { cycle, order });
    this.lastSeen.set(order.id, this.clock());
  }

  private releaseOpen(cycle: TradeCycle): void {
    if (this.inFlight === cycle) {
      this.inFlight = undefined;
    }
  }

  private retire(cycle: TradeCycle): void {
    this.cycles.delete(cycle.id);
    for (const order of [cycle.open, ...cycle.closes]) {
      this.orders.delete(order.id);
      this.lastSeen.delete(order.id);
    }
    this.history.push(cycle);
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }
  }

  private forfeitFee(cycle: TradeCycle, reason: string): void {
    cycle.ancillaryFee = this.deps.ledger.forfeit(cycle.id, reason) ?? cycle.ancillaryFee;
  }

  private refundFee(cycle: TradeCycle, reason: string): void {
    cycle.ancillaryFee = this.deps.ledger.refund(cycle.id, reason) ?? cycle.ancillaryFee;
  }

  private transition(cycle: TradeCycle, to: LifecycleState, reason?: string): void {
    const from = cycle.state;
    if (from === to) {
      return;
    }
    cycle.state = to;
    this.logger.info('Transition', { cycleId: cycle.id, from, to, reason });
    this.bus.emit('transition', {
      instrument: this.ticker,
      cycleId: cycle.id,
      from,
      to,
      reason,
      timestamp: this.clock()
    });
  }
}
