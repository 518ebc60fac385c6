/**
 * Custom CloudWatch metrics for the runner
 *
 * Emits operational metrics under the 'Shiftclock' namespace. Metrics are
 * buffered and flushed in batched PutMetricData calls. Disabled emitters
 * drop every data point.
 *
 * Tracked metrics:
 * - ActionRunCount: runs attempted, by action
 * - ActionFailureCount: runs that ended in failure
 * - RetryAttemptCount: failed attempts that a retry policy absorbed
 * - CircuitOpenCount: runs skipped because the breaker was open
 * - NotificationFailureCount: provider deliveries that failed
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  type MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { errorMessage, logger as rootLogger, type Logger } from '@shiftclock/core';

const METRIC_NAMESPACE = 'Shiftclock';

/** CloudWatch accepts at most this many data points per call */
const MAX_BATCH_SIZE = 1000;

export type MetricName =
  | 'ActionRunCount'
  | 'ActionFailureCount'
  | 'RetryAttemptCount'
  | 'CircuitOpenCount'
  | 'NotificationFailureCount';

export interface MetricsEmitterOptions {
  client?: Pick<CloudWatchClient, 'send'>;
  environment?: string;
  enabled?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export class MetricsEmitter {
  private buffer: MetricDatum[] = [];
  private client: Pick<CloudWatchClient, 'send'>;
  private environment: string;
  private enabled: boolean;
  private logger: Logger;
  private now: () => Date;

  constructor(options?: MetricsEmitterOptions) {
    this.client = options?.client ?? new CloudWatchClient({});
    this.environment = options?.environment ?? 'dev';
    this.enabled = options?.enabled ?? true;
    this.logger = (options?.logger ?? rootLogger).child('metrics');
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Record a count data point into the buffer.
   *
   * @param dimensions - Extra dimensions beside Environment
   */
  record(name: MetricName, value: number, dimensions: Record<string, string> = {}): void {
    if (!this.enabled) {
      return;
    }
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: StandardUnit.Count,
      Timestamp: this.now(),
      Dimensions: [
        { Name: 'Environment', Value: this.environment },
        ...Object.entries(dimensions).map(([Name, Value]) => ({ Name, Value })),
      ],
    });
  }

  increment(name: MetricName, dimensions?: Record<string, string>): void {
    this.record(name, 1, dimensions);
  }

  /**
   * Flush all buffered metrics to CloudWatch.
   *
   * Errors are logged but not re-thrown; metric emission never fails a run.
   */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }

    const batches: MetricDatum[][] = [];
    for (let i = 0; i < this.buffer.length; i += MAX_BATCH_SIZE) {
      batches.push(this.buffer.slice(i, i + MAX_BATCH_SIZE));
    }

    // Clear the buffer before sending to avoid double-flush
    this.buffer = [];

    for (const batch of batches) {
      try {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: METRIC_NAMESPACE,
            MetricData: batch,
          })
        );
      } catch (error) {
        this.logger.warn('Failed to flush CloudWatch metrics', {
          error: errorMessage(error),
          metricCount: batch.length,
        });
      }
    }
  }

  getBufferSize(): number {
    return this.buffer.length;
  }
}
