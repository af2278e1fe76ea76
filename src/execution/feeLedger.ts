import { AncillaryFeeStatus, FeeEvent } from '../core/types.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';
import { Journal, nullJournal } from './tradeStore.js';

export interface FeeLedgerOptions {
  feeUsd: number;
  refundRatio: number;
  /** Resolved cycles remembered for idempotent resolution and status lookups. */
  resolvedHistory?: number;
  journal?: Journal;
  bus?: EventBus;
  clock?: () => number;
}

export interface FeeTotals {
  charged: number;
  forfeited: number;
  refunded: number;
  /** Paid minus refunded. */
  realizedCost: number;
}

interface Entry {
  orderId: string;
  instrument: string;
}

const DEFAULT_RESOLVED_HISTORY = 1_000;

/**
 * Per-cycle ancillary fee accounting. Each cycle is charged once and resolved
 * at most once; later resolutions of the same cycle are no-ops. Resolved
 * cycles leave the open set and only the most recent ones are remembered.
 */
export class FeeLedger {
  private readonly open = new Map<string, Entry>();
  private readonly resolved = new Map<string, AncillaryFeeStatus>();
  private readonly totals: FeeTotals = { charged: 0, forfeited: 0, refunded: 0, realizedCost: 0 };
  private readonly journal: Journal;
  private readonly bus: EventBus;
  private readonly clock: () => number;
  private readonly resolvedHistory: number;

  constructor(
    private readonly options: FeeLedgerOptions,
    private readonly logger: Logger
  ) {
    this.journal = options.journal ?? nullJournal;
    this.bus = options.bus ?? eventBus;
    this.clock = options.clock ?? Date.now;
    this.resolvedHistory = options.resolvedHistory ?? DEFAULT_RESOLVED_HISTORY;
  }

  status(cycleId: string): AncillaryFeeStatus | undefined {
    return this.open.has(cycleId) ? 'charged' : this.resolved.get(cycleId);
  }

  /** Cycles charged and not yet resolved. */
  get outstanding(): number {
    return this.open.size;
  }

  charge(cycleId: string, orderId: string, instrument: string): AncillaryFeeStatus {
    const existing = this.status(cycleId);
    if (existing) {
      return existing;
    }
    const entry = { orderId, instrument };
    this.open.set(cycleId, entry);
    this.totals.charged += this.options.feeUsd;
    this.totals.realizedCost += this.options.feeUsd;
    this.record(cycleId, entry, 'charged', this.options.feeUsd, 'order submitted');
    return 'charged';
  }

  forfeit(cycleId: string, reason: string): AncillaryFeeStatus | undefined {
    return this.resolve(cycleId, 'forfeited', reason);
  }

  refund(cycleId: string, reason: string): AncillaryFeeStatus | undefined {
    return this.resolve(cycleId, 'refunded', reason);
  }

  summary(): FeeTotals {
    return { ...this.totals };
  }

  private resolve(
    cycleId: string,
    status: 'forfeited' | 'refunded',
    reason: string
  ): AncillaryFeeStatus | undefined {
    const entry = this.open.get(cycleId);
    if (!entry) {
      const previous = this.resolved.get(cycleId);
      if (!previous) {
        this.logger.warn('Fee resolution for unknown cycle', { cycleId, status, reason });
      }
      return previous;
    }

    if (status === 'forfeited') {
      this.totals.forfeited += this.options.feeUsd;
      this.record(cycleId, entry, status, this.options.feeUsd, reason);
    } else {
      const refund = this.options.feeUsd * this.options.refundRatio;
      this.totals.refunded += refund;
      this.totals.realizedCost -= refund;
      this.record(cycleId, entry, status, refund, reason);
    }

    this.open.delete(cycleId);
    this.resolved.set(cycleId, status);
    while (this.resolved.size > this.resolvedHistory) {
      const oldest = this.resolved.keys().next();
      if (oldest.done) {
        break;
      }
      this.resolved.delete(oldest.value);
    }
    return status;
  }

  private record(
    cycleId: string,
    entry: Entry,
    status: AncillaryFeeStatus,
    amount: number,
    reason: string
  ): void {
    const event: FeeEvent = {
      cycleId,
      orderId: entry.orderId,
      instrument: entry.instrument,
      status,
      amount,
      reason,
      timestamp: this.clock()
    };
    this.journal.recordFee(event);
    this.bus.emit('fee', event);
    this.logger.info('Ancillary fee', { ...event });
  }
}
