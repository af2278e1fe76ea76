import { loadConfig } from '../config.js';
import { ConfigValidationError, errorMessage } from '../core/errors.js';
import { CostModel } from '../cost/costModel.js';
import { createDefaultRegistry, createVenuePair } from '../exchanges/registry.js';
import { SnapshotAggregator } from '../feeds/snapshotAggregator.js';
import { logger, setLogLevel } from '../lib/logger.js';
import { sleep } from '../lib/retry.js';
import { LogNotifier } from '../monitoring/notifier.js';
import { OpportunityScanner } from '../strategy/opportunityScanner.js';

const warmupMs = Number(process.env.SCAN_WARMUP_MS ?? 2_000);
const alertThresholdBps = Number(process.env.SCAN_ALERT_BPS ?? 0);

async function run(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const venues = createVenuePair({ ...config, dryRun: true }, createDefaultRegistry(), logger);
  const tickers = config.instruments.map((instrument) => instrument.ticker);
  await Promise.all([venues.maker.start?.(tickers), venues.hedge.start?.(tickers)]);
  await sleep(warmupMs);

  const scanner = new OpportunityScanner(
    new SnapshotAggregator(
      venues.maker,
      venues.hedge,
      { minDepthNotional: config.gate.minDepthNotional },
      logger
    ),
    new CostModel({
      schedule: config.fees.schedule,
      maxMakerLeverage: config.fees.maxMakerLeverage,
      ancillaryFeeUsd: config.fees.ancillaryFeeUsd,
      ancillaryRefundRatio: config.fees.ancillaryRefundRatio,
      riskBufferBps: config.gate.riskBufferBps
    }),
    new LogNotifier(logger),
    {
      gate: config.gate,
      hedgeTakerFeeBps: config.venues.hedge.takerFeeBps,
      alertThresholdBps
    },
    logger
  );

  const { candidates, skipped } = await scanner.scan(config.instruments);

  console.log('=== Opportunity Scan ===');
  candidates.forEach((candidate) => {
    console.log(
      `${candidate.instrument.padEnd(8)} ${candidate.direction.padEnd(5)} price ${candidate.price
        .toFixed(4)
        .padStart(12)} edge ${candidate.edgeBps.toFixed(2).padStart(7)}bps threshold ${candidate.thresholdBps
        .toFixed(2)
        .padStart(7)}bps net ${candidate.netBps >= 0 ? '+' : ''}${candidate.netBps.toFixed(2)}bps`
    );
  });
  skipped.forEach((entry) => {
    console.log(`${entry.instrument.padEnd(8)} skipped (${entry.reason})`);
  });

  await scanner.alert(candidates);
  await Promise.all([venues.maker.stop?.(), venues.hedge.stop?.()]);
}

run()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof ConfigValidationError) {
      console.error(error.message, error.validationErrors);
    } else {
      console.error('Scan failed:', errorMessage(error));
    }
    process.exit(1);
  });
