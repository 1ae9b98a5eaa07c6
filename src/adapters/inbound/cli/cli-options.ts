import { parseArgs } from 'node:util';
import type { AppConfig } from '../../../config/index.js';

export interface CliOptions {
  configFile?: string;
  dashboardName?: string;
  tag?: { key: string; value: string };
  region?: string;
  dryRun: boolean;
  report: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: tag-dashboard [options]',
  '',
  '  --config <file>        YAML config file (overrides environment variables)',
  '  --dashboard <name>     Dashboard name',
  '  --tag <key=value>      Tag shared by the resources to chart',
  '  --region <region>      Dashboard region',
  '  --dry-run              Write the dashboard body to OUTPUT_PATH instead of CloudWatch',
  '  --report               Write a Markdown run report to OUTPUT_PATH',
  '  -h, --help             Show this help',
].join('\n');

/**
 * Splits `key=value` at the first '='; the value may itself contain '='.
 */
export function parseTagArgument(raw: string): { key: string; value: string } {
  const eqIndex = raw.indexOf('=');
  const key = eqIndex === -1 ? '' : raw.slice(0, eqIndex).trim();
  const value = eqIndex === -1 ? '' : raw.slice(eqIndex + 1).trim();

  if (!key || !value) {
    throw new Error(`Invalid --tag "${raw}": expected key=value`);
  }
  return { key, value };
}

export function parseCliOptions(argv: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string' },
      dashboard: { type: 'string' },
      tag: { type: 'string' },
      region: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      report: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    configFile: values.config,
    dashboardName: values.dashboard,
    tag: values.tag === undefined ? undefined : parseTagArgument(values.tag),
    region: values.region,
    dryRun: values['dry-run'] ?? false,
    report: values.report ?? false,
    help: values.help ?? false,
  };
}

/**
 * Flags win over both the config file and the environment.
 */
export function applyCliOptions(config: AppConfig, options: CliOptions): AppConfig {
  return {
    ...config,
    dashboardName: options.dashboardName ?? config.dashboardName,
    tagKey: options.tag?.key ?? config.tagKey,
    tagValue: options.tag?.value ?? config.tagValue,
    region: options.region ?? config.region,
  };
}
