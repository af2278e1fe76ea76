import { MetricsSnapshot } from '../core/types.js';
import { EventBus, eventBus } from '../lib/eventBus.js';
import type { Logger } from '../lib/logger.js';

type Counters = Omit<MetricsSnapshot, 'timestamp'>;

export class MetricsTracker {
  private readonly counters: Counters = {
    decisions: 0,
    skips: 0,
    opensPlaced: 0,
    opensCancelled: 0,
    cyclesClosed: 0,
    feesForfeited: 0,
    feesRefunded: 0,
    alerts: 0
  };

  private timer?: NodeJS.Timeout;
  private readonly detach: Array<() => void> = [];

  constructor(
    private readonly logger: Logger,
    private readonly bus: EventBus = eventBus,
    private readonly intervalMs = 10_000
  ) {}

  start(): void {
    const onDecision = (event: { kind: string }) => {
      this.counters.decisions += 1;
      if (event.kind === 'skip') {
        this.counters.skips += 1;
      }
    };
    const onTransition = (event: { to: string }) => {
      if (event.to === 'OpenPlaced') {
        this.counters.opensPlaced += 1;
      } else if (event.to === 'OpenCancelled') {
        this.counters.opensCancelled += 1;
      } else if (event.to === 'CloseFilled') {
        this.counters.cyclesClosed += 1;
      }
    };
    const onFee = (event: { status: string }) => {
      if (event.status === 'forfeited') {
        this.counters.feesForfeited += 1;
      } else if (event.status === 'refunded') {
        this.counters.feesRefunded += 1;
      }
    };
    const onAlert = () => {
      this.counters.alerts += 1;
    };

    this.bus.on('decision', onDecision);
    this.bus.on('transition', onTransition);
    this.bus.on('fee', onFee);
    this.bus.on('alert', onAlert);
    this.detach.push(
      () => this.bus.off('decision', onDecision),
      () => this.bus.off('transition', onTransition),
      () => this.bus.off('fee', onFee),
      () => this.bus.off('alert', onAlert)
    );

    this.timer = setInterval(() => this.flush(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.detach.splice(0).forEach((off) => off());
  }

  snapshot(): MetricsSnapshot {
    return { ...this.counters, timestamp: Date.now() };
  }

  flush(): MetricsSnapshot {
    const snapshot = this.snapshot();
    this.logger.info('Metrics snapshot', { ...snapshot });
    this.bus.emit('metrics', snapshot);
    return snapshot;
  }
}
