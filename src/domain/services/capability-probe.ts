/**
 * Capability Probe
 *
 * Some resources may or may not run an agent that publishes extra metrics.
 * For those, the widget shape is decided per resource at build time:
 * probe the agent namespace, then render every discovered agent metric, or
 * fall back to the provider's baseline metrics when the probe finds nothing
 * or fails.
 */

import type { WidgetBuilderInput } from '../entities/catalog-entry.js';
import type { MetricEntry, MetricRow, MetricWidget } from '../entities/widget.js';
import type { DiscoveredMetric, MetricsCatalogPort } from '../../ports/outbound/metrics-catalog-port.js';
import type { Logger } from '../../ports/outbound/logger-port.js';
import { resourceWidget } from './widget-builders.js';
import { resourceId } from '../value-objects/arn.js';

export interface AgentCapability {
  /** Namespace the agent publishes into */
  readonly agentNamespace: string;
  /** Dimension that ties agent metrics to the resource */
  readonly dimensionKey: string;
  dimensionValue(arn: string): string;
  /** Provider-reported health row appended to the detailed widget */
  baselineRow(id: string): MetricRow;
  detailedTitle(id: string): string;
  /** Widget used when no agent metrics are found */
  buildStandard(id: string, input: WidgetBuilderInput): MetricWidget;
}

export const EC2_AGENT_CAPABILITY: AgentCapability = {
  agentNamespace: 'CWAgent',
  dimensionKey: 'InstanceId',
  dimensionValue: arn => resourceId(arn),
  baselineRow: id => ['AWS/EC2', 'StatusCheckFailed', 'InstanceId', id, { stat: 'Maximum' }],
  detailedTitle: id => `EC2 Detailed (Auto-Discovered): ${id}`,
  buildStandard: (id, input) =>
    resourceWidget(input, `EC2 Standard: ${id}`, [
      ['AWS/EC2', 'CPUUtilization', 'InstanceId', id],
      ['...', 'StatusCheckFailed', 'InstanceId', id, { stat: 'Maximum' }],
    ]),
};

/**
 * One row per discovered metric with its dimensions copied verbatim.
 */
export function agentMetricRows(
  namespace: string,
  metrics: readonly DiscoveredMetric[]
): MetricEntry[] {
  return metrics.map(metric => [
    namespace,
    metric.metricName,
    ...metric.dimensions.flatMap(d => [d.name, d.value]),
  ]);
}

/**
 * Never rejects: a failed probe is treated the same as an empty one.
 */
export async function renderProbedWidget(
  capability: AgentCapability,
  input: WidgetBuilderInput,
  metrics: MetricsCatalogPort,
  logger: Logger
): Promise<MetricWidget> {
  const id = capability.dimensionValue(input.arn);
  let discovered: readonly DiscoveredMetric[] = [];

  try {
    discovered = await metrics.listMetrics(capability.agentNamespace, [
      { name: capability.dimensionKey, value: id },
    ]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not list ${capability.agentNamespace} metrics for ${id}: ${message}`);
  }

  if (discovered.length === 0) {
    logger.info(`${capability.agentNamespace} not detected for ${id}. Building standard widget.`);
    return capability.buildStandard(id, input);
  }

  logger.info(
    `${capability.agentNamespace} metrics found for ${id} (${discovered.length}). Building detailed widget.`
  );
  return resourceWidget(input, capability.detailedTitle(id), [
    ...agentMetricRows(capability.agentNamespace, discovered),
    capability.baselineRow(id),
  ]);
}
