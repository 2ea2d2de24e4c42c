// DR Metrics Reporter
// Fire-and-forget publication of validation and health signals to CloudWatch

import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import type { Logger } from 'winston';
import { describeError } from '../errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES AND INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export type MetricUnit = 'Percent' | 'Count' | 'Seconds' | 'None';

export interface MetricDatum {
  namespace: string;
  metricName: string;
  value: number;
  unit: MetricUnit;
  timestamp: Date;
}

export interface MetricsCollector {
  put(datum: MetricDatum): Promise<void>;
}

export interface MetricSample {
  name: string;
  value: number;
  unit: MetricUnit;
}

export interface MetricsReporterOptions {
  namespace: string;
  enabled?: boolean;
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLOUDWATCH COLLECTOR
// ═══════════════════════════════════════════════════════════════════════════════

export class CloudWatchMetricsCollector implements MetricsCollector {
  constructor(private readonly client: CloudWatchClient) {}

  async put(datum: MetricDatum): Promise<void> {
    await this.client.send(
      new PutMetricDataCommand({
        Namespace: datum.namespace,
        MetricData: [
          {
            MetricName: datum.metricName,
            Value: datum.value,
            Unit: datum.unit,
            Timestamp: datum.timestamp,
          },
        ],
      })
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPORTER
// ═══════════════════════════════════════════════════════════════════════════════

export class MetricsReporter {
  private readonly namespace: string;
  private readonly enabled: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly collector: MetricsCollector,
    private readonly logger: Logger,
    options: MetricsReporterOptions
  ) {
    this.namespace = options.namespace;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Publish one datum. Resolves to false when the collector rejected it;
   * never throws.
   */
  async publish(name: string, value: number, unit: MetricUnit): Promise<boolean> {
    if (!this.enabled) {
      this.logger.debug('Metrics publishing disabled, skipping datum', { component: 'MetricsReporter', metric: name });
      return false;
    }

    try {
      await this.collector.put({
        namespace: this.namespace,
        metricName: name,
        value,
        unit,
        timestamp: this.now(),
      });
      return true;
    } catch (error) {
      this.logger.error(`Failed to publish metric ${name}`, {
        component: 'MetricsReporter',
        namespace: this.namespace,
        error: describeError(error),
      });
      return false;
    }
  }

  /**
   * Publish each sample independently; returns how many were accepted.
   */
  async publishAll(samples: MetricSample[]): Promise<number> {
    const outcomes = await Promise.all(samples.map((sample) => this.publish(sample.name, sample.value, sample.unit)));
    return outcomes.filter(Boolean).length;
  }
}
