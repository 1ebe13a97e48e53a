/**
 * No-Op Metrics Adapter
 *
 * Used when metrics collection isn't wanted (METRICS_TYPE=noop).
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => {};
  }

  async flush(): Promise<void> {
    // No-op
  }
}
