import Decimal from 'decimal.js';
import {
  Asset,
  FxRateBook,
  FxRateSeries,
  FxSanityOptions,
  NormalizedObservation,
  RateRejectionReason,
  ValidatedRatePoint,
} from '@/models';
import { FXValidationError, InvalidRateError, MissingRateError } from '@/errors';
import { median } from '@/utils/statistics';
import { daysToMs, pointAtOrBefore } from '@/utils/timeSeries';
import { pairKey } from '@/utils/assetClassification';

/**
 * Outcome of converting one asset
 * Every input observation ends up in exactly one of the two lists
 */
export interface ConversionResult {
  observations: NormalizedObservation[];
  rejections: FXValidationError[];
}

/**
 * How an asset's currency reaches the reporting currency
 */
type RateRoute =
  | { kind: 'identity' }
  | { kind: 'direct' | 'inverse'; pair: string; points: readonly ValidatedRatePoint[] };

/**
 * Currency Converter
 * Validates FX series against a sanity band and normalizes prices into the reporting currency
 */
export class CurrencyConverter {
  /**
   * Validate every FX series once and index it by pair
   *
   * Checks per rate, in order:
   * 1. rate is a positive finite number
   * 2. rate is inside the pair's expected range (when one is configured)
   * 3. rate is within maxDeviation of the median of the preceding sanityWindow accepted rates
   */
  buildRateBook(series: readonly FxRateSeries[], options: FxSanityOptions): FxRateBook {
    const pairs = new Map<string, readonly ValidatedRatePoint[]>();

    for (const fx of series) {
      const key = pairKey(fx.base, fx.quote);
      const sorted = [...fx.observations].sort(
        (a, b) => a.timestamp.getTime() - b.timestamp.getTime()
      );
      pairs.set(key, this.validateSeries(sorted, options, options.expectedRanges[key]));
    }

    return {
      pairs,
      maxStalenessMs: daysToMs(options.maxStalenessDays),
    };
  }

  /**
   * Convert an asset's observations into the target currency
   *
   * Uses the rate at or most recently before each observation. Rates older than the
   * staleness window count as missing; rates flagged by the sanity check are never applied.
   */
  convert(asset: Asset, book: FxRateBook, targetCurrency: string): ConversionResult {
    const observations: NormalizedObservation[] = [];
    const rejections: FXValidationError[] = [];
    const route = this.findRoute(asset.currency, targetCurrency, book);

    for (const observation of asset.observations) {
      if (route === null) {
        rejections.push(
          new MissingRateError(
            pairKey(asset.currency, targetCurrency),
            observation.timestamp,
            'pair not available'
          )
        );
        continue;
      }

      if (route.kind === 'identity') {
        observations.push({
          ticker: asset.ticker,
          timestamp: observation.timestamp,
          price: observation.price,
          nativePrice: observation.price,
          rate: 1,
        });
        continue;
      }

      const ratePoint = pointAtOrBefore(route.points, observation.timestamp);
      if (
        ratePoint === null ||
        observation.timestamp.getTime() - ratePoint.timestamp.getTime() > book.maxStalenessMs
      ) {
        rejections.push(
          new MissingRateError(
            route.pair,
            observation.timestamp,
            ratePoint ? `latest rate from ${ratePoint.timestamp.toISOString()} is stale` : undefined
          )
        );
        continue;
      }

      if (!ratePoint.valid) {
        rejections.push(
          new InvalidRateError(
            route.pair,
            observation.timestamp,
            ratePoint.rate,
            ratePoint.rejectionReason ?? 'MEDIAN_DEVIATION'
          )
        );
        continue;
      }

      const converted =
        route.kind === 'direct'
          ? new Decimal(observation.price).times(ratePoint.rate)
          : new Decimal(observation.price).dividedBy(ratePoint.rate);
      const effectiveRate =
        route.kind === 'direct' ? ratePoint.rate : new Decimal(1).dividedBy(ratePoint.rate).toNumber();

      observations.push({
        ticker: asset.ticker,
        timestamp: observation.timestamp,
        price: converted.toNumber(),
        nativePrice: observation.price,
        rate: effectiveRate,
      });
    }

    return { observations, rejections };
  }

  private findRoute(currency: string, target: string, book: FxRateBook): RateRoute | null {
    if (currency === target) {
      return { kind: 'identity' };
    }

    const directKey = pairKey(currency, target);
    const direct = book.pairs.get(directKey);
    if (direct) {
      return { kind: 'direct', pair: directKey, points: direct };
    }

    const inverseKey = pairKey(target, currency);
    const inverse = book.pairs.get(inverseKey);
    if (inverse) {
      return { kind: 'inverse', pair: inverseKey, points: inverse };
    }

    return null;
  }

  private validateSeries(
    points: readonly { timestamp: Date; rate: number }[],
    options: FxSanityOptions,
    expectedRange: { min: number; max: number } | undefined
  ): ValidatedRatePoint[] {
    const validated: ValidatedRatePoint[] = [];
    // Accepted rates only; the band compares against the tail of this list
    const history: number[] = [];

    for (const point of points) {
      const trailingMedian = median(history.slice(-options.sanityWindow));
      const reason = this.rejectionReason(point.rate, trailingMedian, options, expectedRange);

      validated.push({
        timestamp: point.timestamp,
        rate: point.rate,
        trailingMedian,
        valid: reason === null,
        rejectionReason: reason,
      });

      if (reason === null) {
        history.push(point.rate);
      }
    }

    return validated;
  }

  private rejectionReason(
    rate: number,
    trailingMedian: number | null,
    options: FxSanityOptions,
    expectedRange: { min: number; max: number } | undefined
  ): RateRejectionReason | null {
    if (!Number.isFinite(rate) || rate <= 0) {
      return 'NON_POSITIVE';
    }
    if (expectedRange && (rate < expectedRange.min || rate > expectedRange.max)) {
      return 'OUT_OF_EXPECTED_RANGE';
    }
    if (trailingMedian !== null && Math.abs(rate - trailingMedian) / trailingMedian > options.maxDeviation) {
      return 'MEDIAN_DEVIATION';
    }
    return null;
  }
}
