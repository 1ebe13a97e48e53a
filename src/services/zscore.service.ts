import { NO_SIGNAL_REASONS, ZSCORE_STATUS } from '@/constants/analysis';
import { ZScoreRecord } from '@/models';
import { mean, sampleStandardDeviation } from '@/utils/statistics';

/**
 * Standard deviations at or below this fraction of |mean| are treated as zero,
 * so a constant series does not turn floating-point residue into a huge z
 */
const ZERO_VARIANCE_TOLERANCE = 1e-12;

/**
 * Fixed-capacity window keeping the most recent values
 */
export class RollingWindow {
  private readonly values: number[] = [];

  constructor(private readonly capacity: number) {}

  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  get size(): number {
    return this.values.length;
  }

  /**
   * Most recent value, null when empty
   */
  get latest(): number | null {
    return this.values[this.values.length - 1] ?? null;
  }

  snapshot(): readonly number[] {
    return [...this.values];
  }
}

export interface MetricPoint {
  timestamp: Date;
  value: number;
}

/**
 * Z-Score Engine
 * Rolling statistical over/undervaluation of the latest metric value
 */
export class ZScoreEngine {
  /**
   * Score the latest value of a metric series against its rolling window
   *
   * The window holds the last `window` values including the current one.
   * z = (current - mean) / sample standard deviation.
   * Fewer than `minSamples` values, or a zero standard deviation, yield no-signal.
   */
  score(
    ticker: string,
    series: readonly MetricPoint[],
    window: number,
    minSamples: number
  ): ZScoreRecord {
    const rolling = new RollingWindow(window);
    for (const point of series) {
      rolling.push(point.value);
    }

    const last = series[series.length - 1];
    const asOf = last ? last.timestamp : new Date(0);
    const values = rolling.snapshot();
    const current = rolling.latest;
    const avg = mean(values);
    const deviation = sampleStandardDeviation(values);

    if (current === null || avg === null || values.length < minSamples) {
      return {
        ticker,
        asOf,
        sampleSize: values.length,
        status: ZSCORE_STATUS.NO_SIGNAL,
        z: null,
        mean: avg,
        standardDeviation: deviation,
        reason: NO_SIGNAL_REASONS.INSUFFICIENT_SAMPLES,
      };
    }

    if (deviation === null || deviation <= ZERO_VARIANCE_TOLERANCE * Math.max(1, Math.abs(avg))) {
      return {
        ticker,
        asOf,
        sampleSize: values.length,
        status: ZSCORE_STATUS.NO_SIGNAL,
        z: null,
        mean: avg,
        standardDeviation: 0,
        reason: NO_SIGNAL_REASONS.ZERO_VARIANCE,
      };
    }

    return {
      ticker,
      asOf,
      sampleSize: values.length,
      status: ZSCORE_STATUS.SIGNAL,
      z: (current - avg) / deviation,
      mean: avg,
      standardDeviation: deviation,
    };
  }

  /**
   * Score of the negated series (FX pairs: a rising quote means a weakening quote currency)
   * The mean flips with z, so z = (current - mean) / standardDeviation still holds
   * for current = -value.
   */
  invert(record: ZScoreRecord): ZScoreRecord {
    if (record.status === ZSCORE_STATUS.NO_SIGNAL) {
      return record;
    }
    return { ...record, z: -record.z, mean: -record.mean };
  }
}
