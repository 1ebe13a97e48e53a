/**
 * AWS CloudWatch Metrics Adapter
 *
 * Sends custom metrics to AWS CloudWatch (METRICS_TYPE=cloudwatch).
 * Metrics are buffered and sent in batches of at most 20 per PutMetricData call.
 *
 * The instance role needs cloudwatch:PutMetricData on the configured namespace.
 */

import {
  CloudWatchClient,
  MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

const logger = createLogger('CloudWatchMetrics');

const FLUSH_INTERVAL_MS = 60_000;
const MAX_DATUMS_PER_REQUEST = 20;

export class CloudWatchMetrics implements IMetrics {
  private buffer: MetricDatum[] = [];
  private readonly flushInterval: NodeJS.Timeout;
  private readonly client: CloudWatchClient;

  constructor(
    private readonly namespace: string = env.CLOUDWATCH_METRICS_NAMESPACE,
    client?: CloudWatchClient
  ) {
    this.client = client ?? new CloudWatchClient({ region: env.AWS_REGION });

    this.flushInterval = setInterval(() => {
      this.flush().catch((err) => {
        logger.error({ err }, 'Failed to flush CloudWatch metrics');
      });
    }, FLUSH_INTERVAL_MS);
    // The buffer timer alone must not keep the process alive
    this.flushInterval.unref();
  }

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Count, dimensions);
  }

  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.None, dimensions);
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Milliseconds, dimensions);
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => {
      this.recordHistogram(name, Date.now() - start, dimensions);
    };
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const metricsToSend = this.buffer.splice(0);

    try {
      for (let i = 0; i < metricsToSend.length; i += MAX_DATUMS_PER_REQUEST) {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: metricsToSend.slice(i, i + MAX_DATUMS_PER_REQUEST),
          })
        );
      }

      logger.debug({ count: metricsToSend.length, namespace: this.namespace }, 'Flushed metrics to CloudWatch');
    } catch (error) {
      // CloudWatch being unavailable must not fail analysis runs
      logger.error({ error, count: metricsToSend.length }, 'Failed to send metrics to CloudWatch');
    }
  }

  /**
   * Cleanup on shutdown
   */
  async destroy(): Promise<void> {
    clearInterval(this.flushInterval);
    await this.flush();
  }

  private push(name: string, value: number, unit: StandardUnit, dimensions?: MetricDimensions): void {
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
      Dimensions: Object.entries(dimensions ?? {}).map(([key, dimension]) => ({
        Name: key,
        Value: String(dimension),
      })),
    });
  }
}
