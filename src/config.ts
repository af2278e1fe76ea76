import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { assetClassSchema, inferAssetClass } from './cost/assetClasses.js';
import { ConfigValidationError } from './core/errors.js';
import { AssetClass } from './core/types.js';

const venueSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  takerFeeBps: z.number().nonnegative().default(0),
  options: z.record(z.unknown()).default({})
});

const feeTierSchema = z.object({
  makerBps: z.number().nonnegative(),
  takerBps: z.number().nonnegative()
});

const feeScheduleSchema = z.object({
  crypto: feeTierSchema.default({ makerBps: 3, takerBps: 10 }),
  // non-crypto maker fills are assumed free; override per class if a venue publishes a rate
  forex: feeTierSchema.default({ makerBps: 0, takerBps: 3 }),
  equity: feeTierSchema.default({ makerBps: 0, takerBps: 5 }),
  index: feeTierSchema.default({ makerBps: 0, takerBps: 5 }),
  commodity: feeTierSchema.default({ makerBps: 0, takerBps: 5 })
});

const feesSchema = z.object({
  schedule: feeScheduleSchema.default({}),
  maxMakerLeverage: z.number().positive().default(20),
  ancillaryFeeUsd: z.number().nonnegative().default(0.1),
  ancillaryRefundRatio: z.number().min(0).max(1).default(0.5)
});

const gateSchema = z.object({
  minNetBps: z.number().default(1),
  maxSpreadBps: z.number().positive().default(50),
  spreadWeight: z.number().nonnegative().default(0.2),
  maxDislocationBps: z.number().positive().default(500),
  minDepthNotional: z.number().nonnegative().default(10_000),
  riskBufferBps: z.number().nonnegative().default(0),
  holdingHorizonHours: z.number().nonnegative().default(24)
});

const lifecycleSchema = z.object({
  tickIntervalMs: z.number().int().positive().default(1_000),
  pollIntervalMs: z.number().int().positive().default(2_000),
  fillTimeoutMs: z.number().int().positive().default(10_000),
  closeMaxAttempts: z.number().int().positive().default(3),
  hedgeMaxAttempts: z.number().int().positive().default(3),
  maxCloseSlippageBps: z.number().positive().default(50)
});

const retrySchema = z.object({
  maxAttempts: z.number().int().positive().default(4),
  baseDelayMs: z.number().int().nonnegative().default(250),
  maxDelayMs: z.number().int().nonnegative().default(5_000),
  backoffMultiplier: z.number().min(1).default(2)
});

const reconcileSchema = z.object({
  intervalMs: z.number().int().positive().default(30_000),
  tolerance: z.number().nonnegative().default(1e-8),
  mismatchConfirmations: z.number().int().positive().default(2),
  maxNetExposureMultiple: z.number().positive().default(2)
});

const instrumentSchema = z
  .object({
    ticker: z.string().min(1),
    assetClass: assetClassSchema.optional(),
    quantity: z.number().positive(),
    tickSize: z.number().positive(),
    leverage: z.number().positive().default(5),
    priceOffsetBps: z.number().positive().default(5),
    maxOrders: z.number().int().positive().default(1),
    waitTimeMs: z.number().int().nonnegative().default(0),
    gridStepBps: z.number().nonnegative().default(0),
    stopPrice: z.number().positive().optional(),
    pausePrice: z.number().positive().optional(),
    direction: z.enum(['long', 'short', 'both']).default('both'),
    boost: z.boolean().default(false),
    fillTimeoutMs: z.number().int().positive().optional(),
    minOrderNotional: z.number().positive().optional(),
    maxOrderNotional: z.number().positive().optional(),
    /** Opens placed before the instrument stops opening; unset runs until stopped. */
    maxCycles: z.number().int().positive().optional(),
    /** Cap on the absolute maker position an open may lead to. */
    maxPosition: z.number().positive().optional()
  })
  .superRefine((instrument, ctx) => {
    const { direction, stopPrice, pausePrice } = instrument;
    if (direction === 'both' && (stopPrice !== undefined || pausePrice !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'stop/pause prices need a single direction',
        path: ['direction']
      });
    }
    if (stopPrice !== undefined && pausePrice !== undefined) {
      const ordered = direction === 'long' ? pausePrice <= stopPrice : pausePrice >= stopPrice;
      if (!ordered) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'pause price must be reached before stop price',
          path: ['pausePrice']
        });
      }
    }
    if (
      instrument.minOrderNotional !== undefined &&
      instrument.maxOrderNotional !== undefined &&
      instrument.minOrderNotional > instrument.maxOrderNotional
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'minOrderNotional exceeds maxOrderNotional',
        path: ['minOrderNotional']
      });
    }
  });

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  dryRun: z.boolean().default(true),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  journalPath: z.string().default(path.join('data', 'journal.sqlite')),
  venues: z.object({
    maker: venueSchema,
    hedge: venueSchema
  }),
  fees: feesSchema.default({}),
  gate: gateSchema.default({}),
  lifecycle: lifecycleSchema.default({}),
  retry: retrySchema.default({}),
  reconcile: reconcileSchema.default({}),
  instruments: z.array(instrumentSchema).min(1)
});

type ParsedConfig = z.infer<typeof configSchema>;

export type InstrumentConfig = Readonly<
  Omit<ParsedConfig['instruments'][number], 'assetClass'> & { assetClass: AssetClass }
>;
export type VenueConfig = ParsedConfig['venues']['maker'];
export type FeeConfig = ParsedConfig['fees'];
export type FeeSchedule = FeeConfig['schedule'];
export type GateConfig = ParsedConfig['gate'];
export type LifecycleConfig = ParsedConfig['lifecycle'];
export type RetryConfig = ParsedConfig['retry'];
export type ReconcileConfig = ParsedConfig['reconcile'];
export type AppConfig = Omit<ParsedConfig, 'instruments'> & {
  instruments: InstrumentConfig[];
};

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);

export const parseConfig = (raw: unknown): AppConfig => {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError('Configuration validation failed', formatIssues(parsed.error));
  }

  const unresolved: string[] = [];
  const instruments: InstrumentConfig[] = [];
  for (const instrument of parsed.data.instruments) {
    const assetClass = instrument.assetClass ?? inferAssetClass(instrument.ticker);
    if (!assetClass) {
      unresolved.push(`instruments.${instrument.ticker}: unknown asset class`);
      continue;
    }
    const resolved: InstrumentConfig = { ...instrument, assetClass };
    instruments.push(Object.freeze(resolved));
  }

  const tickers = instruments.map((instrument) => instrument.ticker);
  const duplicate = tickers.find((ticker, index) => tickers.indexOf(ticker) !== index);
  if (duplicate) {
    unresolved.push(`instruments.${duplicate}: configured more than once`);
  }

  if (unresolved.length) {
    throw new ConfigValidationError('Configuration validation failed', unresolved);
  }

  return { ...parsed.data, instruments };
};

type Env = Record<string, string | undefined>;

const asRecord = (value: unknown): Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};

const num = (env: Env, key: string): number | undefined => {
  const value = env[key];
  return value === undefined || value === '' ? undefined : Number(value);
};

const bool = (env: Env, key: string): boolean | undefined => {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value.toLowerCase() === 'true';
};

const defined = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

const instrumentFromEnv = (env: Env): Record<string, unknown> =>
  defined({
    ticker: env.TICKER ?? 'BTC',
    assetClass: env.ASSET_CLASS,
    quantity: num(env, 'SIZE'),
    tickSize: num(env, 'TICK_SIZE'),
    leverage: num(env, 'LEVERAGE'),
    priceOffsetBps: num(env, 'PRICE_OFFSET_BPS'),
    maxOrders: num(env, 'MAX_ORDERS'),
    waitTimeMs: num(env, 'WAIT_TIME_MS'),
    gridStepBps: num(env, 'GRID_STEP_BPS'),
    stopPrice: num(env, 'STOP_PRICE'),
    pausePrice: num(env, 'PAUSE_PRICE'),
    direction: env.DIRECTION,
    boost: bool(env, 'BOOST'),
    fillTimeoutMs: num(env, 'FILL_TIMEOUT_MS'),
    maxCycles: num(env, 'MAX_CYCLES'),
    maxPosition: num(env, 'MAX_POSITION')
  });

/** Builds the raw (unvalidated) config from an optional JSON file plus env overrides. */
export const buildRawConfig = (env: Env, file?: unknown): Record<string, unknown> => {
  const base = asRecord(file);
  const venues = asRecord(base.venues);

  return {
    ...base,
    ...defined({
      env: env.NODE_ENV,
      dryRun: bool(env, 'DRY_RUN'),
      logLevel: env.LOG_LEVEL,
      journalPath: env.JOURNAL_PATH
    }),
    venues: {
      maker: {
        id: 'paper',
        name: 'maker-paper',
        ...asRecord(venues.maker),
        ...defined({ id: env.MAKER_VENUE, name: env.MAKER_VENUE_NAME })
      },
      hedge: {
        id: 'paper',
        name: 'hedge-paper',
        ...asRecord(venues.hedge),
        ...defined({
          id: env.HEDGE_VENUE,
          name: env.HEDGE_VENUE_NAME,
          takerFeeBps: num(env, 'HEDGE_TAKER_FEE_BPS')
        })
      }
    },
    gate: {
      ...asRecord(base.gate),
      ...defined({
        minNetBps: num(env, 'MIN_NET_BPS'),
        maxSpreadBps: num(env, 'MAX_SPREAD_BPS'),
        spreadWeight: num(env, 'SPREAD_WEIGHT'),
        maxDislocationBps: num(env, 'MAX_DISLOCATION_BPS'),
        minDepthNotional: num(env, 'MIN_DEPTH_NOTIONAL'),
        riskBufferBps: num(env, 'RISK_BUFFER_BPS')
      })
    },
    instruments: Array.isArray(base.instruments) ? base.instruments : [instrumentFromEnv(env)]
  };
};

const DEFAULT_CONFIG_FILE = path.join('config', 'hedge.json');

export const loadConfig = (env: Env = process.env): AppConfig => {
  if (env === process.env) {
    dotenv.config();
  }

  const filePath =
    env.HEDGE_CONFIG ?? (fs.existsSync(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined);

  let file: unknown;
  if (filePath) {
    try {
      file = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigValidationError(`Unable to read config file ${filePath}`, [
        error instanceof Error ? error.message : String(error)
      ]);
    }
  }

  return parseConfig(buildRawConfig(env, file));
};
