/**
 * Service Catalog
 *
 * Maps each service family to the tagging API resource type used for
 * discovery, the ARN substring that identifies it, and the builder that
 * renders its widget.
 */

import type { CatalogEntry } from '../domain/entities/catalog-entry.js';
import type { ServiceFamily } from '../domain/entities/service-family.js';
import type { Logger } from '../ports/outbound/logger-port.js';
import { EC2_AGENT_CAPABILITY } from '../domain/services/capability-probe.js';
import {
  buildAcmWidget,
  buildAlbWidget,
  buildApiGatewayWidget,
  buildClassicElbWidget,
  buildCloudFrontWidget,
  buildDirectConnectWidget,
  buildDynamoDbWidget,
  buildEcsWidget,
  buildEksWidget,
  buildElastiCacheWidget,
  buildFsxWidget,
  buildLambdaWidget,
  buildMqWidget,
  buildNlbWidget,
  buildRdsWidget,
  buildRedshiftWidget,
  buildRoute53Widget,
  buildSnsWidget,
  buildSqsWidget,
  buildStepFunctionsWidget,
  buildStorageGatewayWidget,
  buildVpnWidget,
} from '../domain/services/widget-builders.js';
import { arnRegion } from '../domain/value-objects/arn.js';

/**
 * CloudFront, Route 53 and ACM (for CloudFront certificates) only publish
 * metrics here, wherever the dashboard lives.
 */
export const GLOBAL_METRICS_REGION = 'us-east-1';

export const DEFAULT_ENABLED_WIDGETS: readonly ServiceFamily[] = [
  'alb',
  'nlb',
  'ec2_instance',
  'ecs_service',
  'eks_cluster',
  'lambda_function',
  'rds_instance',
  'dynamodb_table',
  'elasticache_cluster',
  'apigateway_stage',
];

export const SERVICE_CATALOG: Readonly<Record<ServiceFamily, CatalogEntry>> = {
  ec2_instance: {
    family: 'ec2_instance',
    tagFilter: 'ec2:instance',
    idToken: 'instance/',
    isGlobal: false,
    renderer: { kind: 'probed', builderName: 'ec2Hybrid', capability: EC2_AGENT_CAPABILITY },
  },
  rds_instance: {
    family: 'rds_instance',
    tagFilter: 'rds:db',
    idToken: ':db:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'rdsDetailed', build: buildRdsWidget },
  },
  lambda_function: {
    family: 'lambda_function',
    tagFilter: 'lambda:function',
    idToken: ':function:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'lambda', build: buildLambdaWidget },
  },
  // The three load balancer kinds share one tag filter; classification picks
  // the longest token and excludes v2 ARNs from the classic builder.
  alb: {
    family: 'alb',
    tagFilter: 'elasticloadbalancing:loadbalancer',
    idToken: 'loadbalancer/app',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'alb', build: buildAlbWidget },
  },
  nlb: {
    family: 'nlb',
    tagFilter: 'elasticloadbalancing:loadbalancer',
    idToken: 'loadbalancer/net',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'nlb', build: buildNlbWidget },
  },
  classic_elb: {
    family: 'classic_elb',
    tagFilter: 'elasticloadbalancing:loadbalancer',
    idToken: 'loadbalancer',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'classicElb', build: buildClassicElbWidget },
  },
  ecs_service: {
    family: 'ecs_service',
    tagFilter: 'ecs:service',
    idToken: ':service/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'ecs', build: buildEcsWidget },
  },
  eks_cluster: {
    family: 'eks_cluster',
    tagFilter: 'eks:cluster',
    idToken: ':cluster/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'eks', build: buildEksWidget },
  },
  dynamodb_table: {
    family: 'dynamodb_table',
    tagFilter: 'dynamodb:table',
    idToken: 'table/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'dynamodb', build: buildDynamoDbWidget },
  },
  redshift_cluster: {
    family: 'redshift_cluster',
    tagFilter: 'redshift:cluster',
    idToken: ':redshift:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'redshift', build: buildRedshiftWidget },
  },
  sqs_queue: {
    family: 'sqs_queue',
    tagFilter: 'sqs',
    idToken: 'arn:aws:sqs:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'sqs', build: buildSqsWidget },
  },
  sns_topic: {
    family: 'sns_topic',
    tagFilter: 'sns',
    idToken: 'arn:aws:sns:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'sns', build: buildSnsWidget },
  },
  cloudfront_distribution: {
    family: 'cloudfront_distribution',
    tagFilter: 'cloudfront:distribution',
    idToken: 'distribution/',
    isGlobal: true,
    renderer: { kind: 'static', builderName: 'cloudfront', build: buildCloudFrontWidget },
  },
  route53_healthcheck: {
    family: 'route53_healthcheck',
    tagFilter: 'route53:healthcheck',
    idToken: 'healthcheck/',
    isGlobal: true,
    renderer: { kind: 'static', builderName: 'route53', build: buildRoute53Widget },
  },
  acm_certificate: {
    family: 'acm_certificate',
    tagFilter: 'acm:certificate',
    idToken: 'certificate/',
    isGlobal: true,
    renderer: { kind: 'static', builderName: 'acm', build: buildAcmWidget },
  },
  elasticache_cluster: {
    family: 'elasticache_cluster',
    tagFilter: 'elasticache:cluster',
    idToken: ':elasticache:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'elasticache', build: buildElastiCacheWidget },
  },
  fsx_filesystem: {
    family: 'fsx_filesystem',
    tagFilter: 'fsx:file-system',
    idToken: 'file-system/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'fsx', build: buildFsxWidget },
  },
  storage_gateway: {
    family: 'storage_gateway',
    tagFilter: 'storagegateway:gateway',
    idToken: 'gateway/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'storageGateway', build: buildStorageGatewayWidget },
  },
  dx_connection: {
    family: 'dx_connection',
    tagFilter: 'directconnect:dxcon',
    idToken: 'dxcon/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'directConnect', build: buildDirectConnectWidget },
  },
  vpn_connection: {
    family: 'vpn_connection',
    tagFilter: 'ec2:vpn-connection',
    idToken: 'vpn-',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'vpn', build: buildVpnWidget },
  },
  apigateway_stage: {
    family: 'apigateway_stage',
    tagFilter: 'apigateway:stages',
    idToken: 'apis/',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'apiGateway', build: buildApiGatewayWidget },
  },
  stepfunctions_statemachine: {
    family: 'stepfunctions_statemachine',
    tagFilter: 'states',
    idToken: 'stateMachine:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'stepFunctions', build: buildStepFunctionsWidget },
  },
  mq_broker: {
    family: 'mq_broker',
    tagFilter: 'mq:broker',
    idToken: 'broker:',
    isGlobal: false,
    renderer: { kind: 'static', builderName: 'mq', build: buildMqWidget },
  },
};

export function isServiceFamily(key: string): key is ServiceFamily {
  return Object.prototype.hasOwnProperty.call(SERVICE_CATALOG, key);
}

export function getCatalogEntry(family: ServiceFamily): CatalogEntry {
  return SERVICE_CATALOG[family];
}

export function getAllCatalogEntries(): readonly CatalogEntry[] {
  return Object.values(SERVICE_CATALOG);
}

/**
 * Entries for the allow-list, in allow-list order. Unknown keys are logged
 * and skipped; duplicates are ignored.
 */
export function resolveEnabledCatalog(
  keys: readonly string[],
  logger: Logger
): readonly CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  const seen = new Set<ServiceFamily>();

  for (const rawKey of keys) {
    const key = rawKey.trim();
    if (!key) continue;

    if (!isServiceFamily(key)) {
      logger.warn(`Unknown widget key "${key}" in enabled widgets, skipping`);
      continue;
    }
    if (seen.has(key)) continue;

    seen.add(key);
    entries.push(SERVICE_CATALOG[key]);
  }

  return entries;
}

/**
 * Distinct tagging API resource type filters, sorted.
 */
export function resourceTypeFilters(entries: readonly CatalogEntry[]): string[] {
  return [...new Set(entries.map(e => e.tagFilter))].sort();
}

/**
 * Region the entry's widget should query for a given resource.
 */
export function effectiveRegion(entry: CatalogEntry, arn: string, fallbackRegion: string): string {
  if (entry.isGlobal) {
    return GLOBAL_METRICS_REGION;
  }
  return arnRegion(arn) ?? fallbackRegion;
}
