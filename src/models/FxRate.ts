/**
 * FX quote: one unit of `base` costs `rate` units of `quote`
 */
export interface FxRatePoint {
  timestamp: Date;
  rate: number;
}

export interface FxRateSeries {
  base: string;
  quote: string;
  observations: FxRatePoint[];
}

/**
 * Why a rate was flagged invalid by the sanity check
 */
export type RateRejectionReason = 'NON_POSITIVE' | 'OUT_OF_EXPECTED_RANGE' | 'MEDIAN_DEVIATION';

/**
 * FX rate after sanity validation
 * `trailingMedian` is null for the first rate of a series (nothing to compare against)
 */
export interface ValidatedRatePoint {
  timestamp: Date;
  rate: number;
  trailingMedian: number | null;
  valid: boolean;
  rejectionReason: RateRejectionReason | null;
}

export interface FxSanityOptions {
  sanityWindow: number;
  maxDeviation: number;
  maxStalenessDays: number;
  expectedRanges: Readonly<Record<string, { min: number; max: number }>>;
}

/**
 * Validated FX series indexed by pair key ("EUR/USD")
 * Built once per run and read by every conversion
 */
export interface FxRateBook {
  readonly pairs: ReadonlyMap<string, readonly ValidatedRatePoint[]>;
  readonly maxStalenessMs: number;
}

/**
 * Price converted to the reporting currency
 */
export interface NormalizedObservation {
  readonly ticker: string;
  readonly timestamp: Date;
  readonly price: number;
  readonly nativePrice: number;
  readonly rate: number;
}
