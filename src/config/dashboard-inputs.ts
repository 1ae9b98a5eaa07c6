/**
 * Turns the raw configuration values into a DashboardRequest.
 *
 * Malformed JSON never stops a build: it is logged and treated as empty.
 */

import type { AppConfig } from './index.js';
import type { DashboardRequest } from '../domain/entities/dashboard.js';
import type { CustomWidget, DimensionOverrides, MetricDimension } from '../domain/entities/widget.js';
import type { JsonValue } from '../domain/value-objects/json.js';
import { isJsonObject } from '../domain/value-objects/json.js';
import { createSloTargets } from '../domain/value-objects/slo-targets.js';
import type { Logger } from '../ports/outbound/logger-port.js';

function parseJson(raw: string, name: string, logger: Logger): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not parse ${name}. Invalid JSON (${message}): ${raw}`);
    return undefined;
  }
}

export function parseCustomWidgets(raw: string, logger: Logger): CustomWidget[] {
  const parsed = parseJson(raw, 'CUSTOM_WIDGETS_CONFIG', logger);
  if (parsed === undefined) return [];

  if (!Array.isArray(parsed)) {
    logger.warn('CUSTOM_WIDGETS_CONFIG must be a JSON array of widget definitions, ignoring it');
    return [];
  }

  const widgets: CustomWidget[] = [];
  parsed.forEach((item: JsonValue, index: number) => {
    if (isJsonObject(item)) {
      widgets.push(item);
    } else {
      logger.warn(`Custom widget at index ${index} is not an object, skipping`);
    }
  });
  return widgets;
}

/**
 * Accepts `{ "Name": ..., "Value": ... }` as well as `{ "name": ..., "value": ... }`.
 */
function toDimension(item: JsonValue): MetricDimension | null {
  if (!isJsonObject(item)) return null;
  const name = item['Name'] ?? item['name'];
  const value = item['Value'] ?? item['value'];
  if (typeof name !== 'string' || typeof value !== 'string') return null;
  return { name, value };
}

export function parseDimensionOverrides(raw: string, logger: Logger): DimensionOverrides {
  const parsed = parseJson(raw, 'DIMENSION_CONFIG', logger);
  if (parsed === undefined) return {};

  if (!isJsonObject(parsed)) {
    logger.warn('DIMENSION_CONFIG must be a JSON object keyed by namespace, ignoring it');
    return {};
  }

  const overrides: Record<string, MetricDimension[]> = {};
  for (const [namespace, sets] of Object.entries(parsed)) {
    if (!Array.isArray(sets)) {
      logger.warn(`DIMENSION_CONFIG entry for ${namespace} is not a list, skipping`);
      continue;
    }
    const dimensions: MetricDimension[] = [];
    for (const item of sets) {
      const dimension = toDimension(item);
      if (dimension) {
        dimensions.push(dimension);
      } else {
        logger.warn(`Ignoring malformed dimension for ${namespace}: ${JSON.stringify(item)}`);
      }
    }
    overrides[namespace] = dimensions;
  }
  return overrides;
}

export function toDashboardRequest(config: AppConfig, logger: Logger): DashboardRequest {
  return {
    dashboardName: config.dashboardName,
    region: config.region,
    tagKey: config.tagKey,
    tagValue: config.tagValue,
    enabledWidgets: config.enabledWidgets,
    targets: createSloTargets({
      availabilityPercent: config.sloTarget,
      cpuPercent: config.cpuSloTarget,
      rdsCpuPercent: config.rdsCpuSloTarget,
      latencyMs: config.latencySloTarget,
    }),
    dimensionOverrides: parseDimensionOverrides(config.dimensionConfig, logger),
    customWidgets: parseCustomWidgets(config.customWidgetsConfig, logger),
  };
}
