import type { TaggedResource } from '../domain/entities/tagged-resource.js';
import type { DashboardWidget, MetricDimension } from '../domain/entities/widget.js';
import type {
  DashboardStorePort,
  DashboardWriteResult,
} from '../ports/outbound/dashboard-store-port.js';
import type { Logger } from '../ports/outbound/logger-port.js';
import type {
  DiscoveredMetric,
  MetricsCatalogPort,
} from '../ports/outbound/metrics-catalog-port.js';
import type { TagDiscoveryPort } from '../ports/outbound/tag-discovery-port.js';

export type LogLevel = 'info' | 'success' | 'warn' | 'error';

export class RecordingLogger implements Logger {
  readonly entries: { level: LogLevel; message: string }[] = [];

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  success(message: string): void {
    this.entries.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}

export function taggedResource(arn: string): TaggedResource {
  return { arn, tags: [{ key: 'Environment', value: 'test' }] };
}

export class InMemoryTagDiscovery implements TagDiscoveryPort {
  readonly calls: { tagKey: string; tagValue: string; filters: readonly string[] }[] = [];

  constructor(private resources: readonly TaggedResource[] = []) {}

  async findResources(
    tagKey: string,
    tagValue: string,
    resourceTypeFilters: readonly string[]
  ): Promise<readonly TaggedResource[]> {
    this.calls.push({ tagKey, tagValue, filters: resourceTypeFilters });
    return this.resources;
  }
}

/**
 * Metrics keyed by `namespace|metricName|dimensionKey|dimensionValue`.
 */
export class InMemoryMetricsCatalog implements MetricsCatalogPort {
  private existing = new Set<string>();
  private listed = new Map<string, readonly DiscoveredMetric[]>();
  private listFailures = new Map<string, Error>();

  withMetric(namespace: string, metricName: string, dimensionKey: string, dimensionValue: string): this {
    this.existing.add([namespace, metricName, dimensionKey, dimensionValue].join('|'));
    return this;
  }

  withListing(namespace: string, dimensionValue: string, metrics: readonly DiscoveredMetric[]): this {
    this.listed.set(`${namespace}|${dimensionValue}`, metrics);
    return this;
  }

  withListFailure(namespace: string, dimensionValue: string, error: Error): this {
    this.listFailures.set(`${namespace}|${dimensionValue}`, error);
    return this;
  }

  async metricExists(
    namespace: string,
    metricName: string,
    dimensionKey: string,
    dimensionValue: string
  ): Promise<boolean> {
    return this.existing.has([namespace, metricName, dimensionKey, dimensionValue].join('|'));
  }

  async listMetrics(
    namespace: string,
    dimensions: readonly MetricDimension[]
  ): Promise<readonly DiscoveredMetric[]> {
    const key = `${namespace}|${dimensions[0]?.value ?? ''}`;
    const failure = this.listFailures.get(key);
    if (failure) {
      throw failure;
    }
    return this.listed.get(key) ?? [];
  }
}

export class InMemoryDashboardStore implements DashboardStorePort {
  readonly writes: { name: string; widgets: readonly DashboardWidget[] }[] = [];

  constructor(private failWith?: string) {}

  async putDashboard(
    name: string,
    widgets: readonly DashboardWidget[]
  ): Promise<DashboardWriteResult> {
    this.writes.push({ name, widgets });
    if (this.failWith) {
      return { success: false, error: this.failWith };
    }
    return { success: true, location: `memory://${name}` };
  }
}
