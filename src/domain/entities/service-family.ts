export type ServiceFamily =
  | 'ec2_instance'
  | 'rds_instance'
  | 'lambda_function'
  | 'alb'
  | 'nlb'
  | 'classic_elb'
  | 'ecs_service'
  | 'eks_cluster'
  | 'dynamodb_table'
  | 'redshift_cluster'
  | 'sqs_queue'
  | 'sns_topic'
  | 'cloudfront_distribution'
  | 'route53_healthcheck'
  | 'acm_certificate'
  | 'elasticache_cluster'
  | 'fsx_filesystem'
  | 'storage_gateway'
  | 'dx_connection'
  | 'vpn_connection'
  | 'apigateway_stage'
  | 'stepfunctions_statemachine'
  | 'mq_broker';

/**
 * Families that get a synthesized SLO row, in the order the rows are stacked.
 */
export type SloFamily =
  | 'alb'
  | 'lambda_function'
  | 'cloudfront_distribution'
  | 'ec2_instance'
  | 'rds_instance';

export const SLO_FAMILY_ORDER: readonly SloFamily[] = [
  'alb',
  'lambda_function',
  'cloudfront_distribution',
  'ec2_instance',
  'rds_instance',
];
