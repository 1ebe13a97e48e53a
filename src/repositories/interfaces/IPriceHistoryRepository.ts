import { AssetDescriptor, FxRateSeries, PricePoint } from '@/models';

/**
 * Price History Repository Interface
 * Read-only access to the asset universe and its market data
 */
export interface IPriceHistoryRepository {
  /**
   * Active assets, ordered by ticker
   */
  getAssetUniverse(): Promise<AssetDescriptor[]>;

  /**
   * Closing prices since `since` (inclusive), oldest first
   * @returns Map of ticker -> observations; tickers without data are absent
   */
  getPriceHistories(tickers: string[], since: Date): Promise<Map<string, PricePoint[]>>;

  /**
   * FX rates since `since` for the requested pairs ('EUR/USD'), oldest first
   * Pairs without data are absent from the result
   */
  getFxHistories(pairs: string[], since: Date): Promise<FxRateSeries[]>;
}
