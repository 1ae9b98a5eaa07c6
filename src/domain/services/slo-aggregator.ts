/**
 * SLO Aggregator
 *
 * Builds one dashboard row per SLO family: an 18-wide graph and a 6-wide
 * single-value readout that combine every member resource into one signal
 * using CloudWatch metric math.
 *
 * Ratio families (ALB, Lambda, CloudFront) chart
 *   100 * (1 - errors / (requests + epsilon))
 * so a window with no traffic reads 100 instead of dividing by zero.
 * Threshold families (EC2, RDS) chart 100 when every signal is below its
 * target and 0 otherwise, and are only emitted when the provider metric
 * they depend on exists for at least one member.
 */

import type { CatalogEntry } from '../entities/catalog-entry.js';
import type { SloFamily } from '../entities/service-family.js';
import { SLO_FAMILY_ORDER } from '../entities/service-family.js';
import type { TaggedResource } from '../entities/tagged-resource.js';
import { sortByArn } from '../entities/tagged-resource.js';
import type {
  HorizontalAnnotation,
  MetricExpression,
  MetricStat,
  MetricWidget,
  MetricWidgetProperties,
} from '../entities/widget.js';
import type { MetricsCatalogPort } from '../../ports/outbound/metrics-catalog-port.js';
import type { Logger } from '../../ports/outbound/logger-port.js';
import type { SloTargets } from '../value-objects/slo-targets.js';
import { latencyTargetSeconds, sloTargetLabel } from '../value-objects/slo-targets.js';
import {
  colonSegment,
  lastColonSegment,
  lastPathSegment,
  resourceId,
  trailingPath,
} from '../value-objects/arn.js';
import { classify } from './resource-classifier.js';
import { GLOBAL_METRICS_REGION } from '../../config/service-catalog.js';

/** Added to every ratio denominator */
export const RATIO_EPSILON = 0.000001;
export const SLO_ROW_HEIGHT = 6;
export const SLO_GRAPH_WIDTH = 18;
export const SLO_VALUE_WIDTH = 6;

const SEARCH_PERIOD_SECONDS = 300;
const TARGET_ANNOTATION_COLOR = '#ff0000';
const RATIO_Y_AXIS = { left: { min: 95, max: 100 } } as const;
const GATE_Y_AXIS = { left: { min: 0, max: 105 } } as const;

export type SloMembers = ReadonlyMap<SloFamily, readonly TaggedResource[]>;

/**
 * Groups resources by the SLO family they classify into. Families with no
 * members are absent from the map; members are sorted by ARN.
 */
export function partitionSloFamilies(
  resources: readonly TaggedResource[],
  catalog: readonly CatalogEntry[]
): SloMembers {
  const members = new Map<SloFamily, TaggedResource[]>();

  for (const resource of sortByArn(resources)) {
    const result = classify(resource.arn, catalog);
    if (result.kind !== 'matched') continue;

    const family = SLO_FAMILY_ORDER.find(f => f === result.entry.family);
    if (!family) continue;

    const list = members.get(family) ?? [];
    list.push(resource);
    members.set(family, list);
  }

  return members;
}

export function searchExpression(
  schema: string,
  metricName: string,
  filter: string,
  stat: MetricStat
): string {
  return `SEARCH('{${schema}} MetricName="${metricName}" ${filter}', '${stat}', ${SEARCH_PERIOD_SECONDS})`;
}

function anyOf(values: readonly string[]): string {
  return `(${values.map(v => `"${v}"`).join(' OR ')})`;
}

function hidden(id: string, expression: string): MetricExpression {
  return { id, expression, visible: false };
}

/**
 * `100*(1-(SUM([e0,e1]))/(SUM([r0,r1])+0.000001))`
 */
export function ratioExpression(count: number): string {
  const ids = (prefix: string) => Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(',');
  return `100*(1-(SUM([${ids('e')}]))/(SUM([${ids('r')}])+${RATIO_EPSILON}))`;
}

interface SloRowSpec {
  title: string;
  valueTitle: string;
  region: string;
  expressions: readonly MetricExpression[];
  yAxis: MetricWidgetProperties['yAxis'];
  annotation?: HorizontalAnnotation;
}

export class SloAggregator {
  constructor(
    private readonly metrics: MetricsCatalogPort,
    private readonly logger: Logger,
    private readonly targets: SloTargets,
    private readonly region: string
  ) {}

  /**
   * Returns the graph and readout for the family at row `y`, or null when
   * the family has no members or its existence gate fails.
   */
  async buildFamily(
    family: SloFamily,
    members: readonly TaggedResource[],
    y: number
  ): Promise<readonly MetricWidget[] | null> {
    if (members.length === 0) return null;

    const spec = await this.rowSpec(family, members);
    if (!spec) return null;

    return toRow(spec, y);
  }

  private async rowSpec(
    family: SloFamily,
    members: readonly TaggedResource[]
  ): Promise<SloRowSpec | null> {
    switch (family) {
      case 'alb':
        return this.albSpec(members);
      case 'lambda_function':
        return this.lambdaSpec(members);
      case 'cloudfront_distribution':
        return this.cloudFrontSpec(members);
      case 'ec2_instance':
        return this.ec2Spec(members);
      case 'rds_instance':
        return this.rdsSpec(members);
    }
  }

  private availabilityAnnotation(): HorizontalAnnotation {
    const target = this.targets.availabilityPercent;
    return { color: TARGET_ANNOTATION_COLOR, label: sloTargetLabel(target), value: target };
  }

  private albSpec(members: readonly TaggedResource[]): SloRowSpec {
    const schema = 'AWS/ApplicationELB,LoadBalancer';
    const expressions = members.flatMap((member, i) => {
      const filter = `LoadBalancer="${trailingPath(member.arn, 3)}"`;
      return [
        hidden(`r${i}`, searchExpression(schema, 'RequestCount', filter, 'Sum')),
        hidden(`e${i}`, searchExpression(schema, 'HTTPCode_Target_5XX_Count', filter, 'Sum')),
      ];
    });

    return {
      title: 'ALB Availability SLO',
      valueTitle: 'Current Availability',
      region: this.region,
      expressions: [
        ...expressions,
        { id: 'slo', expression: ratioExpression(members.length), label: 'Availability %' },
      ],
      yAxis: RATIO_Y_AXIS,
      annotation: this.availabilityAnnotation(),
    };
  }

  private lambdaSpec(members: readonly TaggedResource[]): SloRowSpec {
    const schema = 'AWS/Lambda,FunctionName';
    const expressions = members.flatMap((member, i) => {
      const filter = `FunctionName="${colonSegment(member.arn, 6)}"`;
      return [
        hidden(`r${i}`, searchExpression(schema, 'Invocations', filter, 'Sum')),
        hidden(`e${i}`, searchExpression(schema, 'Errors', filter, 'Sum')),
      ];
    });

    return {
      title: 'Lambda Success Rate SLO',
      valueTitle: 'Current Success Rate',
      region: this.region,
      expressions: [
        ...expressions,
        { id: 'slo', expression: ratioExpression(members.length), label: 'Success Rate %' },
      ],
      yAxis: RATIO_Y_AXIS,
      annotation: this.availabilityAnnotation(),
    };
  }

  /**
   * CloudFront publishes an error rate rather than an error count, so the
   * count is rebuilt per distribution as requests * rate / 100.
   */
  private cloudFrontSpec(members: readonly TaggedResource[]): SloRowSpec {
    const schema = 'AWS/CloudFront,DistributionId,Region';
    const expressions = members.flatMap((member, i) => {
      const filter = `Region="Global" DistributionId="${lastPathSegment(member.arn)}"`;
      return [
        hidden(`r${i}`, searchExpression(schema, 'Requests', filter, 'Sum')),
        hidden(`x${i}`, searchExpression(schema, '5xxErrorRate', filter, 'Average')),
        hidden(`e${i}`, `r${i}*x${i}/100`),
      ];
    });

    return {
      title: 'CloudFront Success Rate SLO',
      valueTitle: 'Current Success Rate',
      region: GLOBAL_METRICS_REGION,
      expressions: [
        ...expressions,
        { id: 'slo', expression: ratioExpression(members.length), label: 'Success Rate %' },
      ],
      yAxis: RATIO_Y_AXIS,
      annotation: this.availabilityAnnotation(),
    };
  }

  private async ec2Spec(members: readonly TaggedResource[]): Promise<SloRowSpec | null> {
    const ids = members.map(m => resourceId(m.arn));
    const found = await this.anyMetricExists('AWS/EC2', 'CPUUtilization', 'InstanceId', ids);
    if (!found) return null;

    const target = this.targets.cpuPercent;
    const filter = anyOf(ids);

    return {
      title: `EC2 Perf. SLO (CPU & Mem < ${target}%)`,
      valueTitle: 'Current Performance',
      region: this.region,
      expressions: [
        hidden('avg_cpu', searchExpression('AWS/EC2,InstanceId', 'CPUUtilization', filter, 'Average')),
        // Instances without the agent publish no memory series at all
        hidden(
          'avg_mem',
          `FILL(${searchExpression('CWAgent,InstanceId', 'mem_used_percent', filter, 'Average')}, 0)`
        ),
        {
          id: 'slo',
          expression: `IF(avg_cpu < ${target} AND avg_mem < ${target}, 100, 0)`,
          label: 'Performance SLO Met %',
        },
      ],
      yAxis: GATE_Y_AXIS,
    };
  }

  private async rdsSpec(members: readonly TaggedResource[]): Promise<SloRowSpec | null> {
    const ids = members.map(m => lastColonSegment(m.arn));
    const found = await this.anyMetricExists('AWS/RDS', 'ReadLatency', 'DBInstanceIdentifier', ids);
    if (!found) return null;

    const schema = 'AWS/RDS,DBInstanceIdentifier';
    const filter = anyOf(ids);
    const latencySeconds = latencyTargetSeconds(this.targets);
    const cpuTarget = this.targets.rdsCpuPercent;
    const read = searchExpression(schema, 'ReadLatency', filter, 'Average');
    const write = searchExpression(schema, 'WriteLatency', filter, 'Average');

    return {
      title: `RDS Perf. SLO (Latency < ${this.targets.latencyMs}ms & CPU < ${cpuTarget}%)`,
      valueTitle: 'Current Performance',
      region: this.region,
      expressions: [
        hidden('avg_latency', `(${read} + ${write}) / 2`),
        hidden('avg_cpu', searchExpression(schema, 'CPUUtilization', filter, 'Average')),
        {
          id: 'slo',
          expression: `IF(avg_latency < ${latencySeconds} AND avg_cpu < ${cpuTarget}, 100, 0)`,
          label: 'Performance SLO Met %',
        },
      ],
      yAxis: GATE_Y_AXIS,
    };
  }

  private async anyMetricExists(
    namespace: string,
    metricName: string,
    dimensionKey: string,
    ids: readonly string[]
  ): Promise<boolean> {
    for (const id of ids) {
      if (await this.metrics.metricExists(namespace, metricName, dimensionKey, id)) {
        this.logger.info(`Found ${metricName} in ${namespace} for SLO widget`);
        return true;
      }
    }
    this.logger.info(`No ${metricName} metrics in ${namespace} for the tagged resources, skipping SLO widget`);
    return false;
  }
}

function toRow(spec: SloRowSpec, y: number): readonly MetricWidget[] {
  const metrics = spec.expressions.map(expression => [expression] as const);

  const graph: MetricWidget = {
    type: 'metric',
    x: 0,
    y,
    width: SLO_GRAPH_WIDTH,
    height: SLO_ROW_HEIGHT,
    properties: {
      metrics,
      view: 'timeSeries',
      region: spec.region,
      title: spec.title,
      yAxis: spec.yAxis,
      ...(spec.annotation ? { annotations: { horizontal: [spec.annotation] } } : {}),
    },
  };

  const value: MetricWidget = {
    type: 'metric',
    x: SLO_GRAPH_WIDTH,
    y,
    width: SLO_VALUE_WIDTH,
    height: SLO_ROW_HEIGHT,
    properties: {
      metrics,
      view: 'singleValue',
      region: spec.region,
      title: spec.valueTitle,
    },
  };

  return [graph, value];
}
