import {
  ListMetricsCommand,
  type CloudWatchClient,
  type DimensionFilter,
  type Metric,
} from '@aws-sdk/client-cloudwatch';
import type { MetricDimension } from '../../../domain/entities/widget.js';
import type { Logger } from '../../../ports/outbound/logger-port.js';
import type {
  DiscoveredMetric,
  MetricsCatalogPort,
} from '../../../ports/outbound/metrics-catalog-port.js';

export class CloudWatchMetricsAdapter implements MetricsCatalogPort {
  constructor(
    private client: CloudWatchClient,
    private logger: Logger
  ) {}

  async metricExists(
    namespace: string,
    metricName: string,
    dimensionKey: string,
    dimensionValue: string
  ): Promise<boolean> {
    try {
      const response = await this.client.send(
        new ListMetricsCommand({
          Namespace: namespace,
          MetricName: metricName,
          Dimensions: [{ Name: dimensionKey, Value: dimensionValue }],
        })
      );
      return (response.Metrics ?? []).length > 0;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Error checking for metric '${metricName}' in ${namespace}: ${errorMessage}`);
      return false;
    }
  }

  async listMetrics(
    namespace: string,
    dimensions: readonly MetricDimension[]
  ): Promise<readonly DiscoveredMetric[]> {
    const metrics: DiscoveredMetric[] = [];
    const filters: DimensionFilter[] = dimensions.map(d => ({ Name: d.name, Value: d.value }));
    let nextToken: string | undefined;

    do {
      const command = new ListMetricsCommand({
        Namespace: namespace,
        Dimensions: filters,
        NextToken: nextToken,
      });

      const response = await this.client.send(command);
      nextToken = response.NextToken;

      for (const metric of response.Metrics ?? []) {
        const mapped = this.mapMetric(namespace, metric);
        if (mapped) {
          metrics.push(mapped);
        }
      }
    } while (nextToken);

    return metrics;
  }

  private mapMetric(namespace: string, metric: Metric): DiscoveredMetric | null {
    if (!metric.MetricName) {
      return null;
    }

    return {
      namespace: metric.Namespace ?? namespace,
      metricName: metric.MetricName,
      dimensions: (metric.Dimensions ?? []).flatMap(d =>
        d.Name && d.Value !== undefined ? [{ name: d.Name, value: d.Value }] : []
      ),
    };
  }
}
