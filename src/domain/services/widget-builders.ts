/**
 * Widget Builders
 *
 * One builder per service family. Each takes the resource ARN and the
 * already-resolved region and vertical offset, extracts the fragment the
 * family's CloudWatch dimensions key on, and returns a full-width widget.
 */

import type { StaticWidgetBuilder, WidgetBuilderInput } from '../entities/catalog-entry.js';
import {
  DASHBOARD_WIDTH,
  DEFAULT_WIDGET_HEIGHT,
  type MetricDimension,
  type MetricEntry,
  type MetricView,
  type MetricWidget,
} from '../entities/widget.js';
import {
  colonSegment,
  lastColonSegment,
  lastPathSegment,
  resourceId,
  trailingPath,
} from '../value-objects/arn.js';

/** Characters of a certificate ARN shown in titles */
const CERTIFICATE_SUFFIX_LENGTH = 12;

export function resourceWidget(
  input: WidgetBuilderInput,
  title: string,
  metrics: readonly MetricEntry[],
  view: MetricView = 'timeSeries'
): MetricWidget {
  return {
    type: 'metric',
    x: 0,
    y: input.y,
    width: DASHBOARD_WIDTH,
    height: DEFAULT_WIDGET_HEIGHT,
    properties: {
      metrics,
      view,
      region: input.region,
      title,
    },
  };
}

export const buildRdsWidget: StaticWidgetBuilder = input => {
  const db = lastColonSegment(input.arn);
  if (!db) return null;
  return resourceWidget(input, `RDS Detailed: ${db}`, [
    ['AWS/RDS', 'CPUUtilization', 'DBInstanceIdentifier', db],
    ['...', 'DatabaseConnections'],
    ['...', 'FreeableMemory'],
    ['...', 'ReadLatency'],
    ['...', 'WriteLatency'],
  ]);
};

/**
 * Function name sits after the `function` segment; a trailing version or
 * alias qualifier is ignored.
 */
export const buildLambdaWidget: StaticWidgetBuilder = input => {
  const fn = colonSegment(input.arn, 6);
  if (!fn) return null;
  return resourceWidget(input, `Lambda: ${fn}`, [
    ['AWS/Lambda', 'Errors', 'FunctionName', fn, { stat: 'Sum' }],
    ['...', 'Throttles', { stat: 'Sum' }],
  ]);
};

function loadBalancerName(dimension: string): string {
  // app/<name>/<id> or net/<name>/<id>
  return dimension.split('/')[1] ?? dimension;
}

export const buildAlbWidget: StaticWidgetBuilder = input => {
  const lb = trailingPath(input.arn, 3);
  return resourceWidget(input, `ALB: ${loadBalancerName(lb)}`, [
    ['AWS/ApplicationELB', 'HTTPCode_Target_5XX_Count', 'LoadBalancer', lb, { stat: 'Sum' }],
    ['...', 'TargetResponseTime', { stat: 'Average' }],
  ]);
};

export const buildNlbWidget: StaticWidgetBuilder = input => {
  const lb = trailingPath(input.arn, 3);
  return resourceWidget(input, `NLB: ${loadBalancerName(lb)}`, [
    ['AWS/NetworkELB', 'UnHealthyHostCount', 'LoadBalancer', lb],
    ['...', 'TCP_Target_Reset_Count', { stat: 'Sum' }],
  ]);
};

export const buildClassicElbWidget: StaticWidgetBuilder = input => {
  const lb = resourceId(input.arn);
  if (!lb) return null;
  return resourceWidget(input, `Classic ELB: ${lb}`, [
    ['AWS/ELB', 'HTTPCode_Backend_5XX', 'LoadBalancerName', lb, { stat: 'Sum' }],
    ['...', 'UnHealthyHostCount'],
  ]);
};

export const buildEcsWidget: StaticWidgetBuilder = input => {
  // service/<cluster>/<service>
  const parts = input.arn.split('/');
  const cluster = parts[parts.length - 2];
  const service = parts[parts.length - 1];
  if (!cluster || !service) return null;
  return resourceWidget(input, `ECS: ${cluster}/${service}`, [
    ['AWS/ECS', 'CPUUtilization', 'ClusterName', cluster, 'ServiceName', service],
    ['...', 'MemoryUtilization'],
  ]);
};

export const buildEksWidget: StaticWidgetBuilder = input => {
  const cluster = lastPathSegment(input.arn);
  if (!cluster) return null;
  return resourceWidget(input, `EKS Cluster: ${cluster}`, [
    ['ContainerInsights', 'node_cpu_utilization', 'ClusterName', cluster],
    ['...', 'node_memory_utilization'],
  ]);
};

export const buildDynamoDbWidget: StaticWidgetBuilder = input => {
  const table = lastPathSegment(input.arn);
  if (!table) return null;
  return resourceWidget(input, `DynamoDB: ${table}`, [
    ['AWS/DynamoDB', 'ThrottledRequests', 'TableName', table, { stat: 'Sum' }],
    ['...', 'SuccessfulRequestLatency', 'TableName', table],
  ]);
};

export const buildRedshiftWidget: StaticWidgetBuilder = input => {
  const cluster = lastColonSegment(input.arn);
  if (!cluster) return null;
  return resourceWidget(input, `Redshift: ${cluster}`, [
    ['AWS/Redshift', 'CPUUtilization', 'ClusterIdentifier', cluster],
    ['...', 'PercentageDiskSpaceUsed'],
  ]);
};

export const buildSqsWidget: StaticWidgetBuilder = input => {
  const queue = lastColonSegment(input.arn);
  if (!queue) return null;
  return resourceWidget(input, `SQS Queue: ${queue}`, [
    ['AWS/SQS', 'ApproximateAgeOfOldestMessage', 'QueueName', queue],
    ['...', 'ApproximateNumberOfMessagesVisible'],
  ]);
};

export const buildSnsWidget: StaticWidgetBuilder = input => {
  const topic = lastColonSegment(input.arn);
  if (!topic) return null;
  return resourceWidget(input, `SNS Topic: ${topic}`, [
    ['AWS/SNS', 'NumberOfNotificationsFailed', 'TopicName', topic, { stat: 'Sum' }],
  ]);
};

export const buildCloudFrontWidget: StaticWidgetBuilder = input => {
  const distributionId = lastPathSegment(input.arn);
  if (!distributionId) return null;
  return resourceWidget(input, `CloudFront 5xx: ${distributionId}`, [
    ['AWS/CloudFront', '5xxErrorRate', 'Region', 'Global', 'DistributionId', distributionId],
  ]);
};

export const buildRoute53Widget: StaticWidgetBuilder = input => {
  const healthCheckId = lastPathSegment(input.arn);
  if (!healthCheckId) return null;
  return resourceWidget(input, `Route53 Health Check: ${healthCheckId}`, [
    ['AWS/Route53', 'HealthCheckStatus', 'HealthCheckId', healthCheckId, { stat: 'Minimum' }],
  ]);
};

/**
 * The metric dimension needs the full ARN, but the title only shows its tail.
 */
export const buildAcmWidget: StaticWidgetBuilder = input =>
  resourceWidget(
    input,
    `ACM Cert Expiry: ...${input.arn.slice(-CERTIFICATE_SUFFIX_LENGTH)}`,
    [['AWS/CertificateManager', 'DaysToExpiry', 'CertificateArn', input.arn, { stat: 'Minimum' }]],
    'singleValue'
  );

export const buildElastiCacheWidget: StaticWidgetBuilder = input => {
  const cluster = lastColonSegment(input.arn);
  if (!cluster) return null;
  return resourceWidget(input, `ElastiCache: ${cluster}`, [
    ['AWS/ElastiCache', 'CPUUtilization', 'CacheClusterId', cluster],
    ['...', 'FreeableMemory'],
    ['...', 'NetworkBytesIn'],
  ]);
};

export const buildFsxWidget: StaticWidgetBuilder = input => {
  const fileSystemId = lastPathSegment(input.arn);
  if (!fileSystemId) return null;
  return resourceWidget(input, `FSx Free Storage: ${fileSystemId}`, [
    ['AWS/FSx', 'FreeStorageCapacity', 'FileSystemId', fileSystemId, { stat: 'Minimum' }],
  ]);
};

export const buildStorageGatewayWidget: StaticWidgetBuilder = input => {
  const gatewayId = lastPathSegment(input.arn);
  if (!gatewayId) return null;
  return resourceWidget(input, `Storage Gateway: ${gatewayId}`, [
    ['AWS/StorageGateway', 'CachePercentDirty', 'GatewayId', gatewayId, { stat: 'Maximum' }],
  ]);
};

export const buildDirectConnectWidget: StaticWidgetBuilder = input => {
  const connectionId = lastPathSegment(input.arn);
  if (!connectionId) return null;
  return resourceWidget(input, `Direct Connect: ${connectionId}`, [
    ['AWS/DX', 'ConnectionState', 'ConnectionId', connectionId, { stat: 'Minimum' }],
  ]);
};

/**
 * One series per tunnel, found by SEARCH since tunnel IPs are not known here.
 */
export const buildVpnWidget: StaticWidgetBuilder = input => {
  const vpnId = lastPathSegment(input.arn);
  if (!vpnId) return null;
  return resourceWidget(input, `VPN Tunnels: ${vpnId}`, [
    [
      {
        expression: `SEARCH('{AWS/VPN,VpnId} MetricName="TunnelState" VpnId="${vpnId}"', 'Minimum', 300)`,
      },
    ],
  ]);
};

function apiGatewayDefaultDimensions(arn: string): readonly MetricDimension[] | null {
  // arn:aws:apigateway:<region>::/restapis/<apiId>/stages/<stage>
  const path = colonSegment(arn, 5).split('/');
  const apiId = path[2];
  const stage = path[4];
  if (!apiId || !stage) return null;
  return [{ name: 'ApiName', value: `${apiId}/${stage}` }];
}

/**
 * Uses the `AWS/ApiGateway` dimension override when one is configured, so
 * stages can be charted under their real API name.
 */
export const buildApiGatewayWidget: StaticWidgetBuilder = input => {
  const dimensions =
    input.dimensionOverrides['AWS/ApiGateway'] ?? apiGatewayDefaultDimensions(input.arn);
  if (!dimensions || dimensions.length === 0) return null;

  const metrics = dimensions.flatMap((dimension): MetricEntry[] => [
    ['AWS/ApiGateway', '5XXError', dimension.name, dimension.value, { stat: 'Sum' }],
    ['...', '4XXError', { stat: 'Sum' }],
    ['...', 'Latency', { stat: 'Average' }],
    ['...', 'Count', { stat: 'Sum' }],
  ]);
  return resourceWidget(input, 'API Gateway Performance', metrics);
};

export const buildStepFunctionsWidget: StaticWidgetBuilder = input => {
  const stateMachine = lastColonSegment(input.arn);
  if (!stateMachine) return null;
  return resourceWidget(input, `Step Functions: ${stateMachine}`, [
    ['AWS/States', 'ExecutionsFailed', 'StateMachineArn', input.arn, { stat: 'Sum' }],
    ['...', 'ExecutionTime', { stat: 'Average' }],
  ]);
};

/**
 * arn:aws:mq:<region>:<account>:broker:<name>:<broker-id>
 */
export const buildMqWidget: StaticWidgetBuilder = input => {
  const broker = colonSegment(input.arn, 6) || lastColonSegment(input.arn);
  if (!broker) return null;
  return resourceWidget(input, `Amazon MQ: ${broker}`, [
    ['AWS/AmazonMQ', 'CpuUtilization', 'Broker', broker],
    ['...', 'TotalMessageCount'],
  ]);
};
