import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { FeeEvent, OrderRecord } from '../core/types.js';

/** Append/upsert sink for everything the lifecycle managers do. */
export interface Journal {
  recordOrder(order: OrderRecord): void;
  recordFee(event: FeeEvent): void;
}

export const nullJournal: Journal = {
  recordOrder: () => undefined,
  recordFee: () => undefined
};

export interface OrderRow {
  id: string;
  cycleId: string;
  instrument: string;
  venue: string;
  side: string;
  role: string;
  liquidity: string;
  requestedQuantity: number;
  requestedPrice: number | null;
  status: string;
  filledQuantity: number;
  avgFillPrice: number | null;
  cancelReason: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface FeeRow {
  cycleId: string;
  orderId: string;
  instrument: string;
  status: string;
  amount: number;
  reason: string;
  timestamp: number;
}

export interface JournalSummary {
  cycles: number;
  orders: number;
  filledQuantity: number;
  feesCharged: number;
  feesForfeited: number;
  feesRefunded: number;
  /** Ancillary fees paid minus refunds received. */
  realizedFeeCost: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS orders (
    id TEXT PRIMARY KEY,
    cycle_id TEXT NOT NULL,
    instrument TEXT NOT NULL,
    venue TEXT NOT NULL,
    side TEXT NOT NULL,
    role TEXT NOT NULL,
    liquidity TEXT NOT NULL,
    requested_quantity REAL NOT NULL,
    requested_price REAL,
    status TEXT NOT NULL,
    filled_quantity REAL NOT NULL,
    avg_fill_price REAL,
    cancel_reason TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS fee_events (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    cycle_id TEXT NOT NULL,
    order_id TEXT NOT NULL,
    instrument TEXT NOT NULL,
    status TEXT NOT NULL,
    amount REAL NOT NULL,
    reason TEXT NOT NULL,
    timestamp INTEGER NOT NULL
  );
`;

/** SQLite journal; pass `:memory:` for a throwaway store. */
export class TradeStore implements Journal {
  private readonly db: Database.Database;
  private readonly upsertOrder: Database.Statement;
  private readonly insertFee: Database.Statement;

  constructor(dbPath: string, options: { readonly?: boolean } = {}) {
    if (dbPath !== ':memory:' && !options.readonly) {
      const dir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath, { readonly: options.readonly ?? false });
    if (!options.readonly) {
      this.db.exec(SCHEMA);
    }

    this.upsertOrder = this.db.prepare(`
      INSERT OR REPLACE INTO orders (
        id, cycle_id, instrument, venue, side, role, liquidity,
        requested_quantity, requested_price, status, filled_quantity,
        avg_fill_price, cancel_reason, created_at, updated_at
      ) VALUES (
        @id, @cycleId, @instrument, @venue, @side, @role, @liquidity,
        @requestedQuantity, @requestedPrice, @status, @filledQuantity,
        @avgFillPrice, @cancelReason, @createdAt, @updatedAt
      )
    `);

    this.insertFee = this.db.prepare(`
      INSERT INTO fee_events (cycle_id, order_id, instrument, status, amount, reason, timestamp)
      VALUES (@cycleId, @orderId, @instrument, @status, @amount, @reason, @timestamp)
    `);
  }

  recordOrder(order: OrderRecord): void {
    this.upsertOrder.run({
      id: order.id,
      cycleId: order.cycleId,
      instrument: order.instrument,
      venue: order.venue,
      side: order.side,
      role: order.role,
      liquidity: order.liquidity,
      requestedQuantity: order.requestedQuantity,
      requestedPrice: order.requestedPrice ?? null,
      status: order.status,
      filledQuantity: order.filledQuantity,
      avgFillPrice: order.avgFillPrice ?? null,
      cancelReason: order.cancelReason ?? null,
      createdAt: order.createdAt,
      updatedAt: order.updatedAt
    });
  }

  recordFee(event: FeeEvent): void {
    this.insertFee.run({ ...event });
  }

  orders(instrument?: string): OrderRow[] {
    const select = `
      SELECT id, cycle_id AS cycleId, instrument, venue, side, role, liquidity,
             requested_quantity AS requestedQuantity, requested_price AS requestedPrice,
             status, filled_quantity AS filledQuantity, avg_fill_price AS avgFillPrice,
             cancel_reason AS cancelReason, created_at AS createdAt, updated_at AS updatedAt
      FROM orders`;
    return (
      instrument
        ? this.db.prepare(`${select} WHERE instrument = ? ORDER BY created_at ASC`).all(instrument)
        : this.db.prepare(`${select} ORDER BY created_at ASC`).all()
    ) as OrderRow[];
  }

  fees(): FeeRow[] {
    return this.db
      .prepare(
        `SELECT cycle_id AS cycleId, order_id AS orderId, instrument, status, amount, reason, timestamp
         FROM fee_events
         ORDER BY seq ASC`
      )
      .all() as FeeRow[];
  }

  summary(): JournalSummary {
    const orders = this.orders();
    const fees = this.fees();
    const sumOf = (status: string) =>
      fees.filter((fee) => fee.status === status).reduce((sum, fee) => sum + fee.amount, 0);

    const feesCharged = sumOf('charged');
    const feesRefunded = sumOf('refunded');

    return {
      cycles: new Set(orders.map((order) => order.cycleId)).size,
      orders: orders.length,
      filledQuantity: orders
        .filter((order) => order.role === 'open' && order.liquidity === 'maker')
        .reduce((sum, order) => sum + order.filledQuantity, 0),
      feesCharged,
      feesForfeited: sumOf('forfeited'),
      feesRefunded,
      realizedFeeCost: feesCharged - feesRefunded
    };
  }

  close(): void {
    this.db.close();
  }
}
