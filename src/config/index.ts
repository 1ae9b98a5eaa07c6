import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync, existsSync } from 'node:fs';

import { DEFAULT_ENABLED_WIDGETS } from './service-catalog.js';
import { DEFAULT_SLO_TARGETS } from '../domain/value-objects/slo-targets.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Load variables from the project root .env file into `env`.
 * Variables that are already set win.
 */
export function loadEnvFile(
  env: Record<string, string | undefined> = process.env,
  envPath: string = join(__dirname, '..', '..', '.env')
): void {
  if (!existsSync(envPath)) {
    return;
  }

  const content = readFileSync(envPath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith('#') && trimmed.includes('=')) {
      const [key, ...valueParts] = trimmed.split('=');
      const value = valueParts.join('=');
      if (key && !env[key]) {
        env[key] = value;
      }
    }
  }
}

export interface AppConfig {
  region: string;
  dashboardName: string;
  tagKey: string;
  tagValue: string;
  enabledWidgets: string[];
  sloTarget: number;
  cpuSloTarget: number;
  rdsCpuSloTarget: number;
  /** Milliseconds */
  latencySloTarget: number;
  /** Raw JSON: namespace to list of dimension sets */
  dimensionConfig: string;
  /** Raw JSON: list of widget definitions */
  customWidgetsConfig: string;
  /** Where dry runs and reports are written */
  outputPath: string;
}

function readNumber(env: Environment, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  return raw ? Number(raw) : fallback;
}

export function parseWidgetList(value: string): string[] {
  return value
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0);
}

export function loadConfig(env: Environment = process.env): AppConfig {
  const enabled = env['ENABLED_WIDGETS']?.trim();

  return {
    region: env['AWS_REGION'] || env['AWS_DEFAULT_REGION'] || 'us-east-1',
    dashboardName: env['DASHBOARD_NAME']?.trim() ?? '',
    tagKey: env['TAG_KEY']?.trim() ?? '',
    tagValue: env['TAG_VALUE']?.trim() ?? '',
    enabledWidgets: enabled ? parseWidgetList(enabled) : [...DEFAULT_ENABLED_WIDGETS],
    sloTarget: readNumber(env, 'SLO_TARGET', DEFAULT_SLO_TARGETS.availabilityPercent),
    cpuSloTarget: readNumber(env, 'CPU_SLO_TARGET', DEFAULT_SLO_TARGETS.cpuPercent),
    rdsCpuSloTarget: readNumber(env, 'RDS_CPU_SLO_TARGET', DEFAULT_SLO_TARGETS.rdsCpuPercent),
    latencySloTarget: readNumber(env, 'LATENCY_SLO_TARGET', DEFAULT_SLO_TARGETS.latencyMs),
    dimensionConfig: env['DIMENSION_CONFIG'] || '{}',
    customWidgetsConfig: env['CUSTOM_WIDGETS_CONFIG'] || '[]',
    outputPath: env['OUTPUT_PATH'] || './output',
  };
}

function checkPercent(errors: string[], name: string, value: number): void {
  if (!Number.isFinite(value)) {
    errors.push(`${name} must be a number`);
  } else if (value <= 0 || value > 100) {
    errors.push(`${name} must be between 0 and 100, got ${value}`);
  }
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.dashboardName) {
    errors.push('DASHBOARD_NAME is required');
  }
  if (!config.tagKey) {
    errors.push('TAG_KEY is required');
  }
  if (!config.tagValue) {
    errors.push('TAG_VALUE is required');
  }
  if (config.enabledWidgets.length === 0) {
    errors.push('ENABLED_WIDGETS must list at least one widget key');
  }

  checkPercent(errors, 'SLO_TARGET', config.sloTarget);
  checkPercent(errors, 'CPU_SLO_TARGET', config.cpuSloTarget);
  checkPercent(errors, 'RDS_CPU_SLO_TARGET', config.rdsCpuSloTarget);

  if (!Number.isFinite(config.latencySloTarget)) {
    errors.push('LATENCY_SLO_TARGET must be a number');
  } else if (config.latencySloTarget <= 0) {
    errors.push(`LATENCY_SLO_TARGET must be positive, got ${config.latencySloTarget}`);
  }

  return errors;
}
