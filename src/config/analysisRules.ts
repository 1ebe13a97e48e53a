/**
 * Analysis Rules Configuration
 *
 * Default parameters for every analysis run plus the API and database limits.
 * Per-run values can be overridden through POST /api/v1/analysis/runs; the merged
 * result is validated (see validators/analysisConfig.validator.ts) before any
 * data is processed.
 */

import { ASSET_CLASSES, FX_FAILURE_POLICIES, PERIOD_UNITS } from '@/constants/analysis';

/**
 * Performance lookbacks
 *
 * Calendar equivalents of 1 / 5 / 21 / 63 / 252 trading days.
 * The start price is the latest close at or before the boundary, so a
 * Monday "24h" return compares against Friday's close.
 */
export const DEFAULT_PERIODS = [
  { label: '24h', unit: PERIOD_UNITS.DAY, count: 1 },
  { label: '7d', unit: PERIOD_UNITS.DAY, count: 7 },
  { label: '1m', unit: PERIOD_UNITS.MONTH, count: 1 },
  { label: '3m', unit: PERIOD_UNITS.MONTH, count: 3 },
  { label: '1y', unit: PERIOD_UNITS.YEAR, count: 1 },
] as const;

/**
 * Z-score window
 *
 * - WINDOW: observations in the rolling window (~1 trading year)
 * - MIN_SAMPLES: below this the asset reports no-signal
 */
export const ZSCORE_DEFAULTS = {
  WINDOW: 252,
  MIN_SAMPLES: 20,
  INVERT_FX: true,
} as const;

/**
 * Alert thresholds in standard deviations
 * Must satisfy strongSell >= weakSell >= 0 >= weakBuy >= strongBuy
 */
export const ALERT_THRESHOLDS = {
  STRONG_SELL: 2.0,
  WEAK_SELL: 1.5,
  WEAK_BUY: -1.5,
  STRONG_BUY: -2.0,
} as const;

/**
 * FX sanity band
 *
 * - SANITY_WINDOW: number of preceding rates in the trailing median
 * - MAX_DEVIATION: relative distance from that median before a rate is rejected
 * - MAX_STALENESS_DAYS: oldest rate accepted for an observation (covers weekends/holidays)
 */
export const FX_SANITY = {
  SANITY_WINDOW: 20,
  MAX_DEVIATION: 0.5,
  MAX_STALENESS_DAYS: 5,
  FAILURE_POLICY: FX_FAILURE_POLICIES.DROP_OBSERVATION,
} as const;

/**
 * Expected absolute ranges for well-known pairs
 * A rate outside its range is rejected even when the trailing median agrees with it
 */
export const FX_EXPECTED_RANGES: Record<string, { min: number; max: number }> = {
  'EUR/USD': { min: 0.8, max: 1.6 },
  'GBP/USD': { min: 1.0, max: 1.8 },
  'USD/HUF': { min: 250, max: 500 },
};

/**
 * Rebalancing
 *
 * - WEIGHTS: composite = zScore * z + relativePerformance * relativeReturn(PERFORMANCE_PERIOD)
 * - WEIGHT_STEP: target weight change per recommended trade (fraction of portfolio)
 * - EXCLUDED_ASSET_CLASSES: never ranked (cash and FX pairs are not positions)
 */
export const REBALANCE_DEFAULTS = {
  WEIGHTS: { zScore: 1, relativePerformance: 0 },
  PERFORMANCE_PERIOD: '1m',
  WEIGHT_STEP: 0.02,
  EXCLUDED_ASSET_CLASSES: [ASSET_CLASSES.CURRENCY, ASSET_CLASSES.FX],
} as const;

/**
 * Assets with fewer observations than this are skipped entirely
 */
export const MIN_OBSERVATIONS = 10;

/**
 * Rate Limiting Configuration
 *
 * - GLOBAL: all endpoints except /health
 * - ANALYSIS_RUNS: triggering a run loads the whole universe from the database
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 100,
  },
  ANALYSIS_RUNS: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 6,
  },
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Global statement timeout (30 seconds)
   * History queries scan ~15 months of closes for the whole universe
   */
  STATEMENT_TIMEOUT_MS: 30_000,

  /**
   * Slow query threshold for logging (1 second)
   */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;

export type RateLimits = typeof RATE_LIMITS;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
