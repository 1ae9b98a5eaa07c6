import { describe, test, expect } from 'vitest';
import {
  parseCustomWidgets,
  parseDimensionOverrides,
  toDashboardRequest,
} from './dashboard-inputs.js';
import { loadConfig } from './index.js';
import { RecordingLogger } from '../test-support/in-memory-ports.js';

describe('parseCustomWidgets', () => {
  test('keeps object definitions in order', () => {
    const logger = new RecordingLogger();

    const widgets = parseCustomWidgets('[{"type":"text","height":2},{"type":"metric"}]', logger);

    expect(widgets).toEqual([{ type: 'text', height: 2 }, { type: 'metric' }]);
    expect(logger.entries).toEqual([]);
  });

  test('skips entries that are not objects', () => {
    const logger = new RecordingLogger();

    const widgets = parseCustomWidgets('[{"type":"text"}, 3, "x"]', logger);

    expect(widgets).toEqual([{ type: 'text' }]);
    expect(logger.messages('warn')).toEqual([
      'Custom widget at index 1 is not an object, skipping',
      'Custom widget at index 2 is not an object, skipping',
    ]);
  });

  test('ignores a value that is not an array', () => {
    const logger = new RecordingLogger();

    expect(parseCustomWidgets('{"type":"text"}', logger)).toEqual([]);
    expect(logger.messages('warn')).toEqual([
      'CUSTOM_WIDGETS_CONFIG must be a JSON array of widget definitions, ignoring it',
    ]);
  });

  test('treats malformed JSON as empty', () => {
    const logger = new RecordingLogger();

    expect(parseCustomWidgets('[{', logger)).toEqual([]);
    expect(logger.messages('warn')).toHaveLength(1);
    expect(logger.messages('warn')[0]).toMatch(/^Could not parse CUSTOM_WIDGETS_CONFIG\. Invalid JSON \(.+\): \[\{$/);
  });
});

describe('parseDimensionOverrides', () => {
  test('accepts both key casings', () => {
    const logger = new RecordingLogger();

    const overrides = parseDimensionOverrides(
      '{"AWS/ApiGateway":[{"Name":"ApiName","Value":"payments"},{"name":"Stage","value":"prod"}]}',
      logger
    );

    expect(overrides).toEqual({
      'AWS/ApiGateway': [
        { name: 'ApiName', value: 'payments' },
        { name: 'Stage', value: 'prod' },
      ],
    });
  });

  test('drops malformed entries with a warning', () => {
    const logger = new RecordingLogger();

    const overrides = parseDimensionOverrides(
      '{"AWS/ApiGateway":[{"Name":"ApiName"}],"AWS/SQS":"QueueName"}',
      logger
    );

    expect(overrides).toEqual({ 'AWS/ApiGateway': [] });
    expect(logger.messages('warn')).toEqual([
      'Ignoring malformed dimension for AWS/ApiGateway: {"Name":"ApiName"}',
      'DIMENSION_CONFIG entry for AWS/SQS is not a list, skipping',
    ]);
  });

  test('ignores a value that is not an object', () => {
    const logger = new RecordingLogger();

    expect(parseDimensionOverrides('[]', logger)).toEqual({});
    expect(logger.messages('warn')).toEqual([
      'DIMENSION_CONFIG must be a JSON object keyed by namespace, ignoring it',
    ]);
  });
});

describe('toDashboardRequest', () => {
  test('maps configuration onto a request', () => {
    const config = loadConfig({
      AWS_REGION: 'eu-west-1',
      DASHBOARD_NAME: 'ops-dashboard',
      TAG_KEY: 'Environment',
      TAG_VALUE: 'test',
      ENABLED_WIDGETS: 'alb',
      SLO_TARGET: '99.5',
      LATENCY_SLO_TARGET: '20',
      CUSTOM_WIDGETS_CONFIG: '[{"type":"text"}]',
    });

    const request = toDashboardRequest(config, new RecordingLogger());

    expect(request).toEqual({
      dashboardName: 'ops-dashboard',
      region: 'eu-west-1',
      tagKey: 'Environment',
      tagValue: 'test',
      enabledWidgets: ['alb'],
      targets: { availabilityPercent: 99.5, cpuPercent: 80, rdsCpuPercent: 80, latencyMs: 20 },
      dimensionOverrides: {},
      customWidgets: [{ type: 'text' }],
    });
  });
});
