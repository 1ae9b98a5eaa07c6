import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { AppConfig } from '../../../config/index.js';
import { parseWidgetList } from '../../../config/index.js';

/**
 * CLI configuration file. Every key is optional and overrides the matching
 * environment variable.
 *
 * ```yaml
 * dashboardName: payments-prod
 * region: eu-west-1
 * tag: { key: Environment, value: prod }
 * enabledWidgets: [alb, lambda_function, rds_instance]
 * slo: { availability: 99.5, cpu: 75, rdsCpu: 70, latencyMs: 20 }
 * dimensions:
 *   AWS/ApiGateway:
 *     - { name: ApiName, value: payments-api }
 * customWidgets:
 *   - { type: text, width: 24, height: 2, properties: { markdown: "# Runbook" } }
 * ```
 */
export interface DashboardConfigFile {
  dashboardName?: string;
  region?: string;
  tag?: { key?: string; value?: string };
  enabledWidgets?: string[];
  slo?: {
    availability?: number;
    cpu?: number;
    rdsCpu?: number;
    latencyMs?: number;
  };
  /** Same shape as DIMENSION_CONFIG */
  dimensions?: unknown;
  /** Same shape as CUSTOM_WIDGETS_CONFIG */
  customWidgets?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ConfigFileReader {
  constructor(private source: string) {}

  fail(field: string, expected: string): never {
    throw new Error(`Invalid config file ${this.source}: "${field}" must be ${expected}`);
  }

  string(record: Record<string, unknown>, key: string, field: string = key): string | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return this.fail(field, 'a string');
  }

  number(record: Record<string, unknown>, key: string, field: string): number | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number') return value;
    return this.fail(field, 'a number');
  }

  section(record: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (isRecord(value)) return value;
    return this.fail(key, 'a mapping');
  }

  widgetList(record: Record<string, unknown>, key: string): string[] | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return parseWidgetList(value);
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value.map(item => item.trim()).filter(item => item.length > 0);
    }
    return this.fail(key, 'a list of widget keys');
  }
}

export function parseDashboardConfig(content: string, source: string): DashboardConfigFile {
  const raw: unknown = parseYaml(content);
  const reader = new ConfigFileReader(source);

  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    return reader.fail('(root)', 'a mapping');
  }

  const tag = reader.section(raw, 'tag');
  const slo = reader.section(raw, 'slo');

  return {
    dashboardName: reader.string(raw, 'dashboardName'),
    region: reader.string(raw, 'region'),
    tag: tag && {
      key: reader.string(tag, 'key', 'tag.key'),
      value: reader.string(tag, 'value', 'tag.value'),
    },
    enabledWidgets: reader.widgetList(raw, 'enabledWidgets'),
    slo: slo && {
      availability: reader.number(slo, 'availability', 'slo.availability'),
      cpu: reader.number(slo, 'cpu', 'slo.cpu'),
      rdsCpu: reader.number(slo, 'rdsCpu', 'slo.rdsCpu'),
      latencyMs: reader.number(slo, 'latencyMs', 'slo.latencyMs'),
    },
    dimensions: raw['dimensions'] ?? undefined,
    customWidgets: raw['customWidgets'] ?? undefined,
  };
}

export async function loadDashboardConfigFile(path: string): Promise<DashboardConfigFile> {
  const content = await readFile(path, 'utf-8');
  return parseDashboardConfig(content, path);
}

export function applyConfigFile(config: AppConfig, file: DashboardConfigFile): AppConfig {
  return {
    ...config,
    dashboardName: file.dashboardName ?? config.dashboardName,
    region: file.region ?? config.region,
    tagKey: file.tag?.key ?? config.tagKey,
    tagValue: file.tag?.value ?? config.tagValue,
    enabledWidgets: file.enabledWidgets ?? config.enabledWidgets,
    sloTarget: file.slo?.availability ?? config.sloTarget,
    cpuSloTarget: file.slo?.cpu ?? config.cpuSloTarget,
    rdsCpuSloTarget: file.slo?.rdsCpu ?? config.rdsCpuSloTarget,
    latencySloTarget: file.slo?.latencyMs ?? config.latencySloTarget,
    dimensionConfig:
      file.dimensions === undefined ? config.dimensionConfig : JSON.stringify(file.dimensions),
    customWidgetsConfig:
      file.customWidgets === undefined
        ? config.customWidgetsConfig
        : JSON.stringify(file.customWidgets),
  };
}
