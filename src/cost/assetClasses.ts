import fs from 'node:fs';
import { z } from 'zod';
import { AssetClass } from '../core/types.js';

export const ASSET_CLASSES = [
  'crypto',
  'forex',
  'equity',
  'index',
  'commodity'
] as const satisfies readonly AssetClass[];

export const assetClassSchema = z.enum(ASSET_CLASSES);

const tableSchema = z.object({
  crypto: z.array(z.string()),
  forex: z.array(z.string()),
  commodity: z.array(z.string()),
  index: z.array(z.string()),
  equity: z.array(z.string()),
  feeOverrides: z.record(z.number().nonnegative()).default({})
});

export type AssetClassTable = z.infer<typeof tableSchema>;

const TABLE_URL = new URL('../../data/asset-classes.json', import.meta.url);

let cached: AssetClassTable | undefined;

export const loadAssetClassTable = (): AssetClassTable => {
  if (!cached) {
    cached = tableSchema.parse(JSON.parse(fs.readFileSync(TABLE_URL, 'utf-8')));
  }
  return cached;
};

const QUOTE_SUFFIXES = ['USDT', 'USDC', 'USD'];

const symbolCandidates = (ticker: string): string[] => {
  const compact = ticker.trim().toUpperCase().replace(/[-_/]/g, '');
  const candidates = [compact];
  for (const quote of QUOTE_SUFFIXES) {
    if (compact.length > quote.length && compact.endsWith(quote)) {
      candidates.push(compact.slice(0, -quote.length));
    }
  }
  return candidates;
};

const isListed = (symbol: string, table: AssetClassTable): boolean =>
  ASSET_CLASSES.some((assetClass) => table[assetClass].includes(symbol));

/** `btc-usd` -> `BTC`, `EUR/USD` -> `EURUSD`; unknown symbols come back compacted. */
export const normalizeSymbol = (
  ticker: string,
  table: AssetClassTable = loadAssetClassTable()
): string => {
  const candidates = symbolCandidates(ticker);
  return candidates.find((symbol) => isListed(symbol, table)) ?? candidates[0];
};

export const inferAssetClass = (
  ticker: string,
  table: AssetClassTable = loadAssetClassTable()
): AssetClass | undefined => {
  const symbol = normalizeSymbol(ticker, table);
  return ASSET_CLASSES.find((assetClass) => table[assetClass].includes(symbol));
};

export const symbolFeeOverride = (
  ticker: string,
  table: AssetClassTable = loadAssetClassTable()
): number | undefined => table.feeOverrides[normalizeSymbol(ticker, table)];
