import type { ServiceFamily } from '../domain/entities/service-family.js';

/** One realistic ARN per family, all in account 123456789012 */
export const SAMPLE_ARNS: Readonly<Record<ServiceFamily, string>> = {
  ec2_instance: 'arn:aws:ec2:us-east-1:123456789012:instance/i-0abc123',
  rds_instance: 'arn:aws:rds:us-east-1:123456789012:db:orders-db',
  lambda_function: 'arn:aws:lambda:us-east-1:123456789012:function:checkout',
  alb: 'arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/web-alb/50dc6c495c0c9188',
  nlb: 'arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/net/edge-nlb/73e2d6bc24d8a067',
  classic_elb: 'arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/legacy-elb',
  ecs_service: 'arn:aws:ecs:us-east-1:123456789012:service/prod-cluster/api',
  eks_cluster: 'arn:aws:eks:us-east-1:123456789012:cluster/platform',
  dynamodb_table: 'arn:aws:dynamodb:us-east-1:123456789012:table/Orders',
  redshift_cluster: 'arn:aws:redshift:us-east-1:123456789012:cluster:analytics',
  sqs_queue: 'arn:aws:sqs:us-east-1:123456789012:jobs-queue',
  sns_topic: 'arn:aws:sns:us-east-1:123456789012:alerts-topic',
  cloudfront_distribution: 'arn:aws:cloudfront::123456789012:distribution/E2QWRUHAPOMQZL',
  route53_healthcheck: 'arn:aws:route53:::healthcheck/abcdef11-2222-3333-4444-555555fedcba',
  acm_certificate:
    'arn:aws:acm:us-east-1:123456789012:certificate/12345678-abcd-1234-abcd-123456789012',
  elasticache_cluster: 'arn:aws:elasticache:us-east-1:123456789012:cluster:session-cache',
  fsx_filesystem: 'arn:aws:fsx:us-east-1:123456789012:file-system/fs-0123456789abcdef0',
  storage_gateway: 'arn:aws:storagegateway:us-east-1:123456789012:gateway/sgw-12A3456B',
  dx_connection: 'arn:aws:directconnect:us-east-1:123456789012:dxcon/dxcon-fgabc123',
  vpn_connection: 'arn:aws:ec2:us-east-1:123456789012:vpn-connection/vpn-0abc1234',
  apigateway_stage: 'arn:aws:apigateway:us-east-1::/restapis/a1b2c3d4e5/stages/prod',
  stepfunctions_statemachine: 'arn:aws:states:us-east-1:123456789012:stateMachine:order-flow',
  mq_broker: 'arn:aws:mq:us-east-1:123456789012:broker:events:b-1234a5b6-78cd-901e-2fgh-3i45j6k178l9',
};
