import { EventEmitter } from 'eventemitter3';
import WebSocket from 'ws';
import { errorMessage } from '../core/errors.js';
import { OrderBookSnapshot } from '../core/types.js';
import type { Logger } from '../lib/logger.js';

type BinanceDepthMessage = {
  stream?: string;
  data?: {
    lastUpdateId?: number;
    bids?: [string, string][];
    asks?: [string, string][];
  };
};

export type BookFeedEvents = {
  orderBook: (snapshot: OrderBookSnapshot) => void;
  error: (error: Error) => void;
};

export interface BinanceBookFeedOptions {
  wsUrl: string;
  /** Source name stamped on emitted snapshots. */
  exchange: string;
  /** Instrument -> stream symbol; defaults to `<instrument>usdt`. */
  symbolMap?: Record<string, string>;
  reconnectDelayMs?: number;
}

const toLevels = (levels: [string, string][] = []) =>
  levels.map(([price, size]) => ({ price: Number(price), size: Number(size) }));

/**
 * Public partial-depth stream. Feeds real books into paper venues so dry runs
 * quote against live markets without touching any account.
 */
export class BinanceBookFeed extends EventEmitter<BookFeedEvents> {
  private ws?: WebSocket;
  private reconnectTimer?: NodeJS.Timeout;
  private readonly streamToInstrument = new Map<string, string>();
  private running = false;

  constructor(
    private readonly options: BinanceBookFeedOptions,
    private readonly logger: Logger
  ) {
    super();
  }

  streamSymbol(instrument: string): string {
    return (this.options.symbolMap?.[instrument] ?? `${instrument}usdt`).toLowerCase();
  }

  /** Registers the instruments whose frames `parse` accepts. */
  track(instruments: string[]): void {
    this.streamToInstrument.clear();
    for (const instrument of instruments) {
      this.streamToInstrument.set(`${this.streamSymbol(instrument)}@depth20`, instrument);
    }
  }

  start(instruments: string[]): void {
    this.track(instruments);
    this.running = true;
    this.connect();
  }

  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.close();
      this.ws = undefined;
    }
  }

  /** Parses one combined-stream frame; returns undefined for frames that are not ours. */
  parse(raw: string, receivedAt = Date.now()): OrderBookSnapshot | undefined {
    const payload = JSON.parse(raw) as BinanceDepthMessage;
    const instrument = payload.stream ? this.streamToInstrument.get(payload.stream) : undefined;
    if (!instrument || !payload.data) {
      return undefined;
    }

    return {
      exchange: this.options.exchange,
      symbol: instrument,
      bids: toLevels(payload.data.bids),
      asks: toLevels(payload.data.asks),
      lastUpdateId: payload.data.lastUpdateId ?? 0,
      receivedAt
    };
  }

  private connect(): void {
    if (!this.running || !this.streamToInstrument.size) {
      return;
    }

    const parsed = new URL(this.options.wsUrl);
    const streams = [...this.streamToInstrument.keys()].join('/');
    const url = `${parsed.protocol}//${parsed.host}/stream?streams=${streams}`;

    this.logger.info('Book feed opening', { url });
    this.ws = new WebSocket(url);

    this.ws.on('open', () => {
      this.logger.info('Book feed connected', { streams });
    });

    this.ws.on('message', (raw) => {
      try {
        const snapshot = this.parse(raw.toString());
        if (snapshot) {
          this.emit('orderBook', snapshot);
        }
      } catch (error) {
        this.logger.warn('Book feed parse error', { error: errorMessage(error) });
      }
    });

    this.ws.on('error', (error) => {
      this.logger.error('Book feed error', { error: error.message });
      this.emit('error', error);
      this.ws?.terminate();
    });

    this.ws.on('close', (code, reason) => {
      this.logger.warn('Book feed closed, scheduling reconnect', {
        code,
        reason: reason.toString()
      });
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (!this.running) {
      return;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }
    this.reconnectTimer = setTimeout(() => {
      this.connect();
    }, this.options.reconnectDelayMs ?? 2_000);
  }
}
