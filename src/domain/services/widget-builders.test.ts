/**
 * Widget Builder Tests
 */

import { describe, test, expect } from 'vitest';
import {
  buildAcmWidget,
  buildAlbWidget,
  buildApiGatewayWidget,
  buildClassicElbWidget,
  buildCloudFrontWidget,
  buildEcsWidget,
  buildLambdaWidget,
  buildMqWidget,
  buildRdsWidget,
  buildStepFunctionsWidget,
  buildVpnWidget,
} from './widget-builders.js';
import type { WidgetBuilderInput } from '../entities/catalog-entry.js';
import type { DimensionOverrides } from '../entities/widget.js';
import { getAllCatalogEntries } from '../../config/service-catalog.js';
import { SAMPLE_ARNS } from '../../test-support/sample-arns.js';

function input(arn: string, dimensionOverrides: DimensionOverrides = {}): WidgetBuilderInput {
  return { arn, region: 'us-east-1', y: 14, dimensionOverrides };
}

describe('widget builders', () => {
  test('every static builder renders a full-width row at the cursor', () => {
    for (const entry of getAllCatalogEntries()) {
      if (entry.renderer.kind !== 'static') continue;

      const widget = entry.renderer.build(input(SAMPLE_ARNS[entry.family]));

      expect(widget, entry.family).not.toBeNull();
      expect(widget?.x).toBe(0);
      expect(widget?.y).toBe(14);
      expect(widget?.width).toBe(24);
      expect(widget?.height).toBe(7);
      expect(widget?.properties.region).toBe('us-east-1');
    }
  });

  test('RDS widget charts the instance identifier', () => {
    expect(buildRdsWidget(input(SAMPLE_ARNS.rds_instance))).toEqual({
      type: 'metric',
      x: 0,
      y: 14,
      width: 24,
      height: 7,
      properties: {
        metrics: [
          ['AWS/RDS', 'CPUUtilization', 'DBInstanceIdentifier', 'orders-db'],
          ['...', 'DatabaseConnections'],
          ['...', 'FreeableMemory'],
          ['...', 'ReadLatency'],
          ['...', 'WriteLatency'],
        ],
        view: 'timeSeries',
        region: 'us-east-1',
        title: 'RDS Detailed: orders-db',
      },
    });
  });

  test('Lambda widget ignores a version qualifier', () => {
    const widget = buildLambdaWidget(
      input('arn:aws:lambda:us-east-1:123456789012:function:checkout:live')
    );

    expect(widget?.properties.title).toBe('Lambda: checkout');
    expect(widget?.properties.metrics[0]).toEqual([
      'AWS/Lambda',
      'Errors',
      'FunctionName',
      'checkout',
      { stat: 'Sum' },
    ]);
  });

  test('ALB widget keys on the app/<name>/<id> dimension', () => {
    const widget = buildAlbWidget(input(SAMPLE_ARNS.alb));

    expect(widget?.properties.title).toBe('ALB: web-alb');
    expect(widget?.properties.metrics).toEqual([
      [
        'AWS/ApplicationELB',
        'HTTPCode_Target_5XX_Count',
        'LoadBalancer',
        'app/web-alb/50dc6c495c0c9188',
        { stat: 'Sum' },
      ],
      ['...', 'TargetResponseTime', { stat: 'Average' }],
    ]);
  });

  test('classic ELB widget uses the load balancer name', () => {
    const widget = buildClassicElbWidget(input(SAMPLE_ARNS.classic_elb));

    expect(widget?.properties.title).toBe('Classic ELB: legacy-elb');
    expect(widget?.properties.metrics[0]).toEqual([
      'AWS/ELB',
      'HTTPCode_Backend_5XX',
      'LoadBalancerName',
      'legacy-elb',
      { stat: 'Sum' },
    ]);
  });

  test('ECS widget uses both cluster and service dimensions', () => {
    const widget = buildEcsWidget(input(SAMPLE_ARNS.ecs_service));

    expect(widget?.properties.title).toBe('ECS: prod-cluster/api');
    expect(widget?.properties.metrics[0]).toEqual([
      'AWS/ECS',
      'CPUUtilization',
      'ClusterName',
      'prod-cluster',
      'ServiceName',
      'api',
    ]);
  });

  test('CloudFront widget queries the Global region dimension', () => {
    const widget = buildCloudFrontWidget(input(SAMPLE_ARNS.cloudfront_distribution));

    expect(widget?.properties.metrics).toEqual([
      ['AWS/CloudFront', '5xxErrorRate', 'Region', 'Global', 'DistributionId', 'E2QWRUHAPOMQZL'],
    ]);
  });

  test('ACM widget shows only the tail of the certificate ARN', () => {
    const widget = buildAcmWidget(input(SAMPLE_ARNS.acm_certificate));

    expect(widget?.properties.title).toBe('ACM Cert Expiry: ...123456789012');
    expect(widget?.properties.view).toBe('singleValue');
    expect(widget?.properties.metrics[0]).toEqual([
      'AWS/CertificateManager',
      'DaysToExpiry',
      'CertificateArn',
      SAMPLE_ARNS.acm_certificate,
      { stat: 'Minimum' },
    ]);
  });

  test('VPN widget searches tunnel state by VPN id', () => {
    const widget = buildVpnWidget(input(SAMPLE_ARNS.vpn_connection));

    expect(widget?.properties.title).toBe('VPN Tunnels: vpn-0abc1234');
    expect(widget?.properties.metrics).toEqual([
      [
        {
          expression:
            'SEARCH(\'{AWS/VPN,VpnId} MetricName="TunnelState" VpnId="vpn-0abc1234"\', \'Minimum\', 300)',
        },
      ],
    ]);
  });

  test('Step Functions widget keys on the full state machine ARN', () => {
    const widget = buildStepFunctionsWidget(input(SAMPLE_ARNS.stepfunctions_statemachine));

    expect(widget?.properties.title).toBe('Step Functions: order-flow');
    expect(widget?.properties.metrics[0]).toEqual([
      'AWS/States',
      'ExecutionsFailed',
      'StateMachineArn',
      SAMPLE_ARNS.stepfunctions_statemachine,
      { stat: 'Sum' },
    ]);
  });

  test('MQ widget uses the broker name', () => {
    expect(buildMqWidget(input(SAMPLE_ARNS.mq_broker))?.properties.title).toBe('Amazon MQ: events');
  });

  test('returns null when the ARN lacks the identifier', () => {
    expect(buildRdsWidget(input('arn:aws:rds:us-east-1:123456789012:db:'))).toBeNull();
    expect(buildLambdaWidget(input('arn:aws:lambda:us-east-1:123456789012:function'))).toBeNull();
  });

  describe('API Gateway', () => {
    test('defaults to ApiName <apiId>/<stage>', () => {
      const widget = buildApiGatewayWidget(input(SAMPLE_ARNS.apigateway_stage));

      expect(widget?.properties.title).toBe('API Gateway Performance');
      expect(widget?.properties.metrics).toEqual([
        ['AWS/ApiGateway', '5XXError', 'ApiName', 'a1b2c3d4e5/prod', { stat: 'Sum' }],
        ['...', '4XXError', { stat: 'Sum' }],
        ['...', 'Latency', { stat: 'Average' }],
        ['...', 'Count', { stat: 'Sum' }],
      ]);
    });

    test('emits one block of four rows per override dimension set', () => {
      const widget = buildApiGatewayWidget(
        input(SAMPLE_ARNS.apigateway_stage, {
          'AWS/ApiGateway': [
            { name: 'ApiName', value: 'payments-api' },
            { name: 'ApiId', value: 'a1b2c3d4e5' },
          ],
        })
      );

      const metrics = widget?.properties.metrics ?? [];
      expect(metrics).toHaveLength(8);
      expect(metrics[0]).toEqual(['AWS/ApiGateway', '5XXError', 'ApiName', 'payments-api', { stat: 'Sum' }]);
      expect(metrics[4]).toEqual(['AWS/ApiGateway', '5XXError', 'ApiId', 'a1b2c3d4e5', { stat: 'Sum' }]);
    });

    test('ignores overrides for other namespaces', () => {
      const widget = buildApiGatewayWidget(
        input(SAMPLE_ARNS.apigateway_stage, {
          'AWS/Lambda': [{ name: 'FunctionName', value: 'checkout' }],
        })
      );

      expect(widget?.properties.metrics[0]).toEqual([
        'AWS/ApiGateway',
        '5XXError',
        'ApiName',
        'a1b2c3d4e5/prod',
        { stat: 'Sum' },
      ]);
    });

    test('returns null for a stage ARN without api id and stage', () => {
      expect(buildApiGatewayWidget(input('arn:aws:apigateway:us-east-1::/restapis'))).toBeNull();
    });
  });
});
