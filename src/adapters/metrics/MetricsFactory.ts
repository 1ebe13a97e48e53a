/**
 * Metrics Factory
 *
 * Selection Logic:
 * - METRICS_TYPE=memory or unset → InMemoryMetrics (scraped through GET /api/metrics)
 * - METRICS_TYPE=cloudwatch → CloudWatchMetrics (for AWS deployments)
 * - METRICS_TYPE=noop → NoOpMetrics
 */

import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { env } from '@/config/env';
import { NoOpMetrics } from './NoOpMetrics';
import { CloudWatchMetrics } from './CloudWatchMetrics';
import { InMemoryMetrics } from './InMemoryMetrics';

export class MetricsFactory implements IMetricsFactory {
  constructor(private readonly metricsType: string) {}

  createMetrics(namespace?: string): IMetrics {
    switch (this.metricsType) {
      case 'cloudwatch':
        return new CloudWatchMetrics(namespace);

      case 'noop':
        return new NoOpMetrics();

      case 'memory':
      default:
        return new InMemoryMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
export const metrics: IMetrics = new MetricsFactory(env.METRICS_TYPE).createMetrics(
  env.CLOUDWATCH_METRICS_NAMESPACE
);
