import type { MetricDimension } from '../../domain/entities/widget.js';

export interface DiscoveredMetric {
  readonly namespace: string;
  readonly metricName: string;
  readonly dimensions: readonly MetricDimension[];
}

export interface MetricsCatalogPort {
  /**
   * Whether any metric matches. Returns false when the lookup fails.
   */
  metricExists(
    namespace: string,
    metricName: string,
    dimensionKey: string,
    dimensionValue: string
  ): Promise<boolean>;

  /**
   * Every metric in `namespace` carrying all of `dimensions`.
   * Errors propagate; callers decide how to degrade.
   */
  listMetrics(
    namespace: string,
    dimensions: readonly MetricDimension[]
  ): Promise<readonly DiscoveredMetric[]>;
}
