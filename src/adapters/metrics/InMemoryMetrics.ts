/**
 * In-Memory Metrics Adapter
 *
 * Keeps counters, gauges and recent timings in process memory.
 * GET /api/metrics renders a snapshot in Prometheus text format.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

/**
 * Samples kept per timing series
 */
const MAX_SAMPLES = 1000;

export interface MetricSample {
  name: string;
  dimensions: Record<string, string>;
  value: number;
}

export interface TimingSummary {
  name: string;
  dimensions: Record<string, string>;
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface MetricsSnapshot {
  counters: MetricSample[];
  gauges: MetricSample[];
  timings: TimingSummary[];
}

interface Series<T> {
  name: string;
  dimensions: Record<string, string>;
  data: T;
}

function normalizeDimensions(dimensions?: MetricDimensions): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (!dimensions) return normalized;

  for (const key of Object.keys(dimensions).sort()) {
    normalized[key] = String(dimensions[key]);
  }
  return normalized;
}

function seriesKey(name: string, dimensions: Record<string, string>): string {
  return `${name}|${JSON.stringify(dimensions)}`;
}

function percentile(sorted: readonly number[], fraction: number): number {
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))] ?? 0;
}

export class InMemoryMetrics implements IMetrics {
  private readonly counters = new Map<string, Series<number>>();
  private readonly gauges = new Map<string, Series<number>>();
  private readonly timings = new Map<string, Series<number[]>>();

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    const series = this.series(this.counters, name, dimensions, () => 0);
    series.data += value;
  }

  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void {
    const series = this.series(this.gauges, name, dimensions, () => value);
    series.data = value;
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    const series = this.series(this.timings, name, dimensions, () => []);
    series.data.push(value);
    if (series.data.length > MAX_SAMPLES) {
      series.data.shift();
    }
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => {
      this.recordHistogram(name, Date.now() - start, dimensions);
    };
  }

  async flush(): Promise<void> {
    // Nothing buffered for an external backend
  }

  snapshot(): MetricsSnapshot {
    const samples = (map: Map<string, Series<number>>): MetricSample[] =>
      [...map.values()].map((s) => ({ name: s.name, dimensions: { ...s.dimensions }, value: s.data }));

    return {
      counters: samples(this.counters),
      gauges: samples(this.gauges),
      timings: [...this.timings.values()].map((s) => {
        const sorted = [...s.data].sort((a, b) => a - b);
        return {
          name: s.name,
          dimensions: { ...s.dimensions },
          count: sorted.length,
          sum: sorted.reduce((total, v) => total + v, 0),
          p50: percentile(sorted, 0.5),
          p95: percentile(sorted, 0.95),
          p99: percentile(sorted, 0.99),
        };
      }),
    };
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.timings.clear();
  }

  private series<T>(
    map: Map<string, Series<T>>,
    name: string,
    dimensions: MetricDimensions | undefined,
    initial: () => T
  ): Series<T> {
    const normalized = normalizeDimensions(dimensions);
    const key = seriesKey(name, normalized);
    let series = map.get(key);
    if (!series) {
      series = { name, dimensions: normalized, data: initial() };
      map.set(key, series);
    }
    return series;
  }
}
