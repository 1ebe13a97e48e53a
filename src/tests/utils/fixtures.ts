/**
 * Test data builders
 */

import { ASSET_CLASSES, AssetClass } from '@/constants/analysis';
import { Asset, FxRateSeries, PricePoint } from '@/models';
import { createDefaultAnalysisConfig, AnalysisConfig } from '@/validators/analysisConfig.validator';

/**
 * Midnight UTC, `offset` days after 2024-01-01
 */
export function day(offset: number): Date {
  return new Date(Date.UTC(2024, 0, 1 + offset));
}

/**
 * The 15th of each month from January 2024
 */
export function monthly(index: number): Date {
  return new Date(Date.UTC(2024, index, 15));
}

export function dailyPrices(prices: readonly number[], start = 0): PricePoint[] {
  return prices.map((price, i) => ({ timestamp: day(start + i), price }));
}

export function monthlyPrices(prices: readonly number[]): PricePoint[] {
  return prices.map((price, i) => ({ timestamp: monthly(i), price }));
}

/**
 * 100, 110, ... 210 on the 15th of each month of 2024
 */
export const LINEAR_MONTHLY = Array.from({ length: 12 }, (_, i) => 100 + 10 * i);

export function makeAsset(
  ticker: string,
  observations: PricePoint[],
  options: { currency?: string; assetClass?: AssetClass } = {}
): Asset {
  return {
    ticker,
    currency: options.currency ?? 'USD',
    assetClass: options.assetClass ?? ASSET_CLASSES.STOCK,
    observations,
  };
}

export function dailyRates(
  base: string,
  quote: string,
  rates: readonly number[],
  start = 0
): FxRateSeries {
  return {
    base,
    quote,
    observations: rates.map((rate, i) => ({ timestamp: day(start + i), rate })),
  };
}

export function defaultConfig(): AnalysisConfig {
  return createDefaultAnalysisConfig({ reportingCurrency: 'USD', topN: 3 });
}
