import { query } from '@/config/database';
import { AssetDescriptor, FxRateSeries, PricePoint } from '@/models';
import { detectCurrency, inferAssetClass, isAssetClass } from '@/utils/assetClassification';
import { IPriceHistoryRepository } from './interfaces/IPriceHistoryRepository';

interface AssetRowRecord {
  ticker: string;
  assetClass: string | null;
  currency: string | null;
}

interface PriceRowRecord {
  ticker: string;
  timestamp: Date;
  close: string;
}

interface FxRowRecord {
  base: string;
  quote: string;
  timestamp: Date;
  rate: string;
}

/**
 * Price History Repository
 * Handles all database reads for prices and FX rates
 *
 * Prices and rates are NUMERIC columns, returned by pg as strings;
 * they are parsed here so the analysis works on plain numbers.
 */
export class PriceHistoryRepository implements IPriceHistoryRepository {
  async getAssetUniverse(): Promise<AssetDescriptor[]> {
    const result = await query<AssetRowRecord>(
      `
      SELECT
        ticker,
        asset_class AS "assetClass",
        currency
      FROM assets
      WHERE active = TRUE
      ORDER BY ticker
      `
    );

    // Missing class or currency falls back to ticker conventions
    return result.rows.map((row) => ({
      ticker: row.ticker,
      assetClass: isAssetClass(row.assetClass) ? row.assetClass : inferAssetClass(row.ticker),
      currency: row.currency ? row.currency.toUpperCase() : detectCurrency(row.ticker),
    }));
  }

  async getPriceHistories(tickers: string[], since: Date): Promise<Map<string, PricePoint[]>> {
    const histories = new Map<string, PricePoint[]>();
    if (tickers.length === 0) {
      return histories;
    }

    const result = await query<PriceRowRecord>(
      `
      SELECT
        ticker,
        ts AS "timestamp",
        close
      FROM prices
      WHERE ticker = ANY($1)
        AND ts >= $2
      ORDER BY ticker, ts
      `,
      [tickers, since]
    );

    for (const row of result.rows) {
      const points = histories.get(row.ticker) ?? [];
      points.push({ timestamp: new Date(row.timestamp), price: Number(row.close) });
      histories.set(row.ticker, points);
    }

    return histories;
  }

  async getFxHistories(pairs: string[], since: Date): Promise<FxRateSeries[]> {
    if (pairs.length === 0) {
      return [];
    }

    const result = await query<FxRowRecord>(
      `
      SELECT
        base,
        quote,
        ts AS "timestamp",
        rate
      FROM fx_rates
      WHERE base || '/' || quote = ANY($1)
        AND ts >= $2
      ORDER BY base, quote, ts
      `,
      [pairs, since]
    );

    const series = new Map<string, FxRateSeries>();
    for (const row of result.rows) {
      const key = `${row.base}/${row.quote}`;
      const entry = series.get(key) ?? { base: row.base, quote: row.quote, observations: [] };
      entry.observations.push({ timestamp: new Date(row.timestamp), rate: Number(row.rate) });
      series.set(key, entry);
    }

    return [...series.values()];
  }
}
