import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { TradeStore } from '../execution/tradeStore.js';

dotenv.config();

const DB_PATH = path.resolve(process.env.JOURNAL_PATH ?? path.join('data', 'journal.sqlite'));

if (!fs.existsSync(DB_PATH)) {
  console.error('No journal found at', DB_PATH);
  process.exit(1);
}

const store = new TradeStore(DB_PATH, { readonly: true });
const orders = store.orders();

if (!orders.length) {
  console.info('No orders recorded yet.');
  process.exit(0);
}

const summary = store.summary();

type CycleStats = {
  instrument: string;
  opened: number;
  hedged: number;
  closed: number;
  unwound: number;
  fee?: string;
};

const makerVenue = new Map(
  orders
    .filter((order) => order.role === 'open' && order.liquidity === 'maker')
    .map((order): [string, string] => [order.cycleId, order.venue])
);

const cycles = new Map<string, CycleStats>();
orders.forEach((order) => {
  const stats = cycles.get(order.cycleId) ?? {
    instrument: order.instrument,
    opened: 0,
    hedged: 0,
    closed: 0,
    unwound: 0
  };
  if (order.role === 'open') {
    if (order.liquidity === 'maker') {
      stats.opened += order.filledQuantity;
    } else {
      stats.hedged += order.filledQuantity;
    }
  } else if (order.venue === makerVenue.get(order.cycleId)) {
    stats.closed += order.filledQuantity;
  } else {
    stats.unwound += order.filledQuantity;
  }
  cycles.set(order.cycleId, stats);
});

store.fees().forEach((fee) => {
  const stats = cycles.get(fee.cycleId);
  if (stats && fee.status !== 'charged') {
    stats.fee = fee.status;
  }
});

console.log('=== Journal Summary ===');
console.log(`Cycles: ${summary.cycles}, orders: ${summary.orders}`);
console.log(`Maker open quantity filled: ${summary.filledQuantity.toFixed(6)}`);
console.log(
  `Ancillary fees: charged $${summary.feesCharged.toFixed(2)}, forfeited $${summary.feesForfeited.toFixed(
    2
  )}, refunded $${summary.feesRefunded.toFixed(2)}`
);
console.log(`Realized ancillary fee cost: $${summary.realizedFeeCost.toFixed(2)}`);
console.log('');
console.log('Cycles:');
cycles.forEach((stats, cycleId) => {
  const flat =
    Math.abs(stats.opened - stats.closed) < 1e-9 && Math.abs(stats.hedged - stats.unwound) < 1e-9;
  console.log(
    `- ${cycleId.slice(0, 8)} ${stats.instrument}: opened ${stats.opened} hedged ${stats.hedged} closed ${
      stats.closed
    } unwound ${stats.unwound} fee ${stats.fee ?? 'open'}${flat ? '' : ' (not flat)'}`
  );
});

store.close();
