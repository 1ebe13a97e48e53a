import Decimal from 'decimal.js';
import { PerformanceRecord, PeriodDefinition } from '@/models';
import { InsufficientHistoryError } from '@/errors';
import { periodStart, pointAtOrBefore } from '@/utils/timeSeries';

/**
 * Any series of prices in the reporting currency
 */
export interface PriceSeriesPoint {
  timestamp: Date;
  price: number;
}

export interface PerformanceResult {
  records: PerformanceRecord[];
  failures: InsufficientHistoryError[];
}

/**
 * Performance Calculator
 * Simple and benchmark-relative returns over calendar lookbacks
 */
export class PerformanceCalculator {
  /**
   * Compute one record per period
   *
   * The end point is the latest asset observation. Both the asset and the benchmark
   * are measured from their latest close at or before the same boundary to their
   * latest close at or before the same end date.
   *
   * @param series - Asset prices, ascending, reporting currency
   * @param benchmark - Benchmark prices, ascending, same currency (empty when unavailable)
   */
  compute(
    ticker: string,
    series: readonly PriceSeriesPoint[],
    benchmark: readonly PriceSeriesPoint[],
    periods: readonly PeriodDefinition[]
  ): PerformanceResult {
    const records: PerformanceRecord[] = [];
    const failures: InsufficientHistoryError[] = [];
    const end = series[series.length - 1];

    if (!end) {
      for (const period of periods) {
        failures.push(
          new InsufficientHistoryError(ticker, period.label, `${ticker} has no observations`)
        );
      }
      return { records, failures };
    }

    for (const period of periods) {
      const boundary = periodStart(end.timestamp, period);
      const start = pointAtOrBefore(series, boundary);

      const assetReturn = start ? this.simpleReturn(start.price, end.price) : null;
      if (!start) {
        failures.push(
          new InsufficientHistoryError(
            ticker,
            period.label,
            `${ticker} history does not reach back to ${boundary.toISOString()} for ${period.label}`
          )
        );
      }

      const benchmarkReturn = this.benchmarkReturn(benchmark, boundary, end.timestamp);

      records.push({
        ticker,
        period: period.label,
        assetReturn,
        benchmarkReturn,
        relativeReturn:
          assetReturn !== null && benchmarkReturn !== null
            ? new Decimal(assetReturn).minus(benchmarkReturn).toNumber()
            : null,
        startDate: start ? start.timestamp : null,
        endDate: end.timestamp,
      });
    }

    return { records, failures };
  }

  private benchmarkReturn(
    benchmark: readonly PriceSeriesPoint[],
    boundary: Date,
    endDate: Date
  ): number | null {
    const start = pointAtOrBefore(benchmark, boundary);
    const end = pointAtOrBefore(benchmark, endDate);
    if (!start || !end) return null;
    return this.simpleReturn(start.price, end.price);
  }

  /**
   * (end / start) - 1, null for a non-positive start price
   */
  private simpleReturn(startPrice: number, endPrice: number): number | null {
    if (startPrice <= 0) return null;
    return new Decimal(endPrice).dividedBy(startPrice).minus(1).toNumber();
  }
}
