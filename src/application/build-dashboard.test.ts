/**
 * Build Dashboard Use Case Tests
 *
 * Runs whole builds against in-memory ports.
 */

import { describe, test, expect } from 'vitest';
import { createBuildDashboardUseCase } from './build-dashboard.js';
import type { DashboardRequest } from '../domain/entities/dashboard.js';
import type { DimensionOverrides } from '../domain/entities/widget.js';
import { DEFAULT_SLO_TARGETS } from '../domain/value-objects/slo-targets.js';
import { DEFAULT_ENABLED_WIDGETS } from '../config/service-catalog.js';
import {
  InMemoryDashboardStore,
  InMemoryMetricsCatalog,
  InMemoryTagDiscovery,
  RecordingLogger,
  taggedResource,
} from '../test-support/in-memory-ports.js';
import { SAMPLE_ARNS } from '../test-support/sample-arns.js';

function request(overrides: Partial<DashboardRequest> = {}): DashboardRequest {
  return {
    dashboardName: 'ops-dashboard',
    region: 'us-east-1',
    tagKey: 'Environment',
    tagValue: 'test',
    enabledWidgets: [...DEFAULT_ENABLED_WIDGETS],
    targets: DEFAULT_SLO_TARGETS,
    dimensionOverrides: {},
    customWidgets: [],
    ...overrides,
  };
}

function setup(
  arns: readonly string[],
  options: { metrics?: InMemoryMetricsCatalog; storeError?: string } = {}
) {
  const tagDiscovery = new InMemoryTagDiscovery(arns.map(taggedResource));
  const dashboardStore = new InMemoryDashboardStore(options.storeError);
  const logger = new RecordingLogger();
  const useCase = createBuildDashboardUseCase({
    tagDiscovery,
    metricsCatalog: options.metrics ?? new InMemoryMetricsCatalog(),
    dashboardStore,
    logger,
  });
  return { useCase, tagDiscovery, dashboardStore, logger };
}

const S3_BUCKET = 'arn:aws:s3:::static-assets';

describe('BuildDashboardUseCase', () => {
  describe('when no resources carry the tag', () => {
    test('writes a single placeholder and reports success', async () => {
      const { useCase, dashboardStore, tagDiscovery } = setup([]);

      const result = await useCase.execute(request());

      expect(result.statusCode).toBe(200);
      expect(result.body).toBe('No tagged resources found.');
      expect(result.discoveredCount).toBe(0);
      expect(dashboardStore.writes).toEqual([
        {
          name: 'ops-dashboard',
          widgets: [
            {
              type: 'text',
              x: 0,
              y: 0,
              width: 24,
              height: 2,
              properties: { markdown: '# No resources found with tag: `Environment:test`' },
            },
          ],
        },
      ]);
      expect(tagDiscovery.calls).toEqual([
        {
          tagKey: 'Environment',
          tagValue: 'test',
          filters: [
            'apigateway:stages',
            'dynamodb:table',
            'ec2:instance',
            'ecs:service',
            'eks:cluster',
            'elasticache:cluster',
            'elasticloadbalancing:loadbalancer',
            'lambda:function',
            'rds:db',
          ],
        },
      ]);
    });

    test('still fails when the placeholder cannot be written', async () => {
      const { useCase } = setup([], { storeError: 'AccessDenied' });

      const result = await useCase.execute(request());

      expect(result.statusCode).toBe(500);
      expect(result.body).toBe("Failed to update dashboard 'ops-dashboard': AccessDenied");
    });
  });

  describe('with tagged resources', () => {
    const arns = [
      SAMPLE_ARNS.lambda_function,
      SAMPLE_ARNS.sqs_queue,
      SAMPLE_ARNS.alb,
      SAMPLE_ARNS.ec2_instance,
      SAMPLE_ARNS.nlb,
      S3_BUCKET,
    ];
    const enabledWidgets = ['alb', 'lambda_function', 'ec2_instance', 'classic_elb', 'sqs_queue'];
    const customWidgets = [
      { type: 'text', x: 0, width: 24, height: 2, properties: { markdown: '# Runbook' } },
    ];

    test('stacks SLO rows, divider, resources by ARN and custom widgets', async () => {
      const { useCase, dashboardStore } = setup(arns);

      const result = await useCase.execute(request({ enabledWidgets, customWidgets }));
      const widgets = result.dashboard.widgets;

      expect(result.statusCode).toBe(200);
      expect(result.body).toBe('Dashboard updated successfully with 10 widgets.');
      expect(result.discoveredCount).toBe(6);
      expect(result.sloFamilies).toEqual(['alb', 'lambda_function']);
      expect(widgets.map(w => w['y'])).toEqual([0, 0, 6, 6, 12, 13, 20, 27, 34, 41]);
      expect(widgets.map(w => w['x'])).toEqual([0, 18, 0, 18, 0, 0, 0, 0, 0, 0]);
      expect(widgets[9]).toEqual({
        type: 'text',
        x: 0,
        y: 41,
        width: 24,
        height: 2,
        properties: { markdown: '# Runbook', region: 'us-east-1' },
      });
      expect(dashboardStore.writes).toHaveLength(1);
      expect(dashboardStore.writes[0]?.widgets).toEqual(widgets);
    });

    test('records an outcome for every resource in ARN order', async () => {
      const { useCase } = setup(arns);

      const result = await useCase.execute(request({ enabledWidgets }));

      expect(result.outcomes).toEqual([
        {
          arn: SAMPLE_ARNS.ec2_instance,
          status: 'rendered',
          family: 'ec2_instance',
          builderName: 'ec2Hybrid',
          title: 'EC2 Standard: i-0abc123',
        },
        {
          arn: SAMPLE_ARNS.alb,
          status: 'rendered',
          family: 'alb',
          builderName: 'alb',
          title: 'ALB: web-alb',
        },
        {
          arn: SAMPLE_ARNS.nlb,
          status: 'excluded',
          family: 'classic_elb',
          builderName: 'classicElb',
        },
        {
          arn: SAMPLE_ARNS.lambda_function,
          status: 'rendered',
          family: 'lambda_function',
          builderName: 'lambda',
          title: 'Lambda: checkout',
        },
        { arn: S3_BUCKET, status: 'unmatched' },
        {
          arn: SAMPLE_ARNS.sqs_queue,
          status: 'rendered',
          family: 'sqs_queue',
          builderName: 'sqs',
          title: 'SQS Queue: jobs-queue',
        },
      ]);
    });

    test('produces identical output whatever the discovery order', async () => {
      const first = await setup(arns).useCase.execute(request({ enabledWidgets, customWidgets }));
      const second = await setup([...arns].reverse()).useCase.execute(
        request({ enabledWidgets, customWidgets })
      );

      expect(JSON.stringify(second.dashboard.widgets)).toBe(JSON.stringify(first.dashboard.widgets));
    });

    test('adds the EC2 SLO row when CPU metrics exist', async () => {
      const metrics = new InMemoryMetricsCatalog().withMetric(
        'AWS/EC2',
        'CPUUtilization',
        'InstanceId',
        'i-0abc123'
      );
      const { useCase } = setup(arns, { metrics });

      const result = await useCase.execute(request({ enabledWidgets }));

      expect(result.sloFamilies).toEqual(['alb', 'lambda_function', 'ec2_instance']);
      expect(result.dashboard.widgets[4]?.['y']).toBe(12);
      expect(result.dashboard.widgets[6]).toMatchObject({
        type: 'text',
        y: 18,
        properties: { markdown: '--- \n ### **Individual Resource Metrics**' },
      });
    });

    test('returns 500 when the store rejects the dashboard', async () => {
      const { useCase, logger } = setup(arns, { storeError: 'Rate exceeded' });

      const result = await useCase.execute(request({ enabledWidgets }));

      expect(result.statusCode).toBe(500);
      expect(result.body).toBe("Failed to update dashboard 'ops-dashboard': Rate exceeded");
      expect(logger.messages('error')).toEqual([
        "Failed to update dashboard 'ops-dashboard': Rate exceeded",
      ]);
    });
  });

  test('skips a resource whose builder throws and keeps the rest', async () => {
    const throwing = new Proxy<DimensionOverrides>(
      {},
      {
        get() {
          throw new Error('bad dimensions');
        },
      }
    );
    const { useCase, logger } = setup([SAMPLE_ARNS.lambda_function, SAMPLE_ARNS.apigateway_stage]);

    const result = await useCase.execute(
      request({ enabledWidgets: ['apigateway_stage', 'lambda_function'], dimensionOverrides: throwing })
    );

    expect(result.statusCode).toBe(200);
    expect(result.outcomes.map(o => o.status)).toEqual(['failed', 'rendered']);
    expect(result.outcomes[0]?.error).toBe('bad dimensions');
    expect(logger.messages('error')).toEqual([
      `Could not create widget for ARN ${SAMPLE_ARNS.apigateway_stage}. Builder: apiGateway. Details: bad dimensions`,
    ]);
    // Lambda SLO row, divider, Lambda widget
    expect(result.dashboard.widgets.map(w => w['y'])).toEqual([0, 0, 6, 7]);
  });

  test('omits the divider when no SLO row is emitted', async () => {
    const { useCase } = setup([SAMPLE_ARNS.dynamodb_table]);

    const result = await useCase.execute(request());

    expect(result.sloFamilies).toEqual([]);
    expect(result.dashboard.widgets).toHaveLength(1);
    expect(result.dashboard.widgets[0]?.['y']).toBe(0);
  });

  test('records a skipped resource when its builder returns no widget', async () => {
    const { useCase, logger } = setup(['arn:aws:rds:us-east-1:123456789012:db:']);

    const result = await useCase.execute(request());

    expect(result.outcomes).toEqual([
      {
        arn: 'arn:aws:rds:us-east-1:123456789012:db:',
        status: 'skipped',
        family: 'rds_instance',
        builderName: 'rdsDetailed',
      },
    ]);
    expect(result.body).toBe('Dashboard updated successfully with 0 widgets.');
    expect(logger.messages('warn')).toEqual([
      'No widget built for ARN arn:aws:rds:us-east-1:123456789012:db:. Builder: rdsDetailed',
    ]);
  });

  test('renders global families in us-east-1', async () => {
    const { useCase } = setup([SAMPLE_ARNS.route53_healthcheck]);

    const result = await useCase.execute(
      request({ region: 'eu-west-1', enabledWidgets: ['route53_healthcheck'] })
    );

    expect(result.dashboard.widgets[0]).toMatchObject({ properties: { region: 'us-east-1' } });
  });

  test('warns about unknown widget keys and builds the rest', async () => {
    const { useCase, logger } = setup([SAMPLE_ARNS.sqs_queue]);

    const result = await useCase.execute(request({ enabledWidgets: ['sqs_queue', 'kinesis_stream'] }));

    expect(result.outcomes.map(o => o.status)).toEqual(['rendered']);
    expect(logger.messages('warn')).toEqual([
      'Unknown widget key "kinesis_stream" in enabled widgets, skipping',
    ]);
  });
});
