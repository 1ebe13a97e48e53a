/**
 * Alert tiers produced by the classifier
 * NONE covers both "inside the thresholds" and no-signal Z-scores
 */
export const ALERT_TIERS = {
  STRONG_SELL: 'STRONG_SELL',
  STRONG_BUY: 'STRONG_BUY',
  WEAK_SELL: 'WEAK_SELL',
  WEAK_BUY: 'WEAK_BUY',
  NONE: 'NONE',
} as const;

/**
 * Rebalancing actions
 */
export const REBALANCE_ACTIONS = {
  INCREASE: 'INCREASE',
  DECREASE: 'DECREASE',
  HOLD: 'HOLD',
} as const;

/**
 * Asset classes inferred from ticker conventions
 */
export const ASSET_CLASSES = {
  CURRENCY: 'Currency',
  FX: 'FX',
  EQUITY_INDEX: 'Equity Index',
  CRYPTO: 'Crypto',
  COMMODITY: 'Commodity',
  STOCK: 'Stock',
} as const;

/**
 * Z-score outcome
 */
export const ZSCORE_STATUS = {
  SIGNAL: 'SIGNAL',
  NO_SIGNAL: 'NO_SIGNAL',
} as const;

export const NO_SIGNAL_REASONS = {
  INSUFFICIENT_SAMPLES: 'INSUFFICIENT_SAMPLES',
  ZERO_VARIANCE: 'ZERO_VARIANCE',
} as const;

/**
 * What to do with an asset when one of its observations cannot be converted
 * - DROP_OBSERVATION: drop only the affected days
 * - SKIP_ASSET: skip the asset for the whole run
 */
export const FX_FAILURE_POLICIES = {
  DROP_OBSERVATION: 'DROP_OBSERVATION',
  SKIP_ASSET: 'SKIP_ASSET',
} as const;

/**
 * Granularity of a skip manifest entry
 */
export const SKIP_SCOPES = {
  ASSET: 'ASSET',
  OBSERVATION: 'OBSERVATION',
  PERIOD: 'PERIOD',
  BENCHMARK: 'BENCHMARK',
} as const;

export const PERIOD_UNITS = {
  DAY: 'day',
  WEEK: 'week',
  MONTH: 'month',
  YEAR: 'year',
} as const;

// Type exports
export type AlertTier = (typeof ALERT_TIERS)[keyof typeof ALERT_TIERS];
export type RebalanceAction = (typeof REBALANCE_ACTIONS)[keyof typeof REBALANCE_ACTIONS];
export type AssetClass = (typeof ASSET_CLASSES)[keyof typeof ASSET_CLASSES];
export type ZScoreStatus = (typeof ZSCORE_STATUS)[keyof typeof ZSCORE_STATUS];
export type NoSignalReason = (typeof NO_SIGNAL_REASONS)[keyof typeof NO_SIGNAL_REASONS];
export type FxFailurePolicy = (typeof FX_FAILURE_POLICIES)[keyof typeof FX_FAILURE_POLICIES];
export type SkipScope = (typeof SKIP_SCOPES)[keyof typeof SKIP_SCOPES];
export type PeriodUnit = (typeof PERIOD_UNITS)[keyof typeof PERIOD_UNITS];
