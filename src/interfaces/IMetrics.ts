/**
 * Metrics Interface
 *
 * Abstraction for application and analysis metrics.
 * Application code depends on this interface; adapters implement it for
 * in-process collection (Prometheus scrape), CloudWatch, or nothing at all.
 */

/**
 * Metric metadata - dimensions/tags for metric filtering and grouping
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * Use for: Counting events (runs completed, assets skipped, API calls)
   *
   * @example
   * metrics.incrementCounter("analysis.alerts", 2, {tier: "STRONG_SELL"});
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a gauge metric (point-in-time value)
   *
   * @example
   * metrics.recordGauge("analysis.assets_analyzed", 42);
   */
  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Record a timing metric, value in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer for automatic duration tracking
   *
   * @example
   * const endTimer = metrics.startTimer("analysis.run_duration");
   * await runAnalysis();
   * endTimer();
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Flush buffered metrics to the backend (called on shutdown)
   */
  flush(): Promise<void>;
}

/**
 * Metrics Factory Interface
 */
export interface IMetricsFactory {
  createMetrics(namespace?: string): IMetrics;
}
