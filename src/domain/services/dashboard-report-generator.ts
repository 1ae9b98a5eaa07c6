/**
 * Dashboard Run Report Generator
 *
 * Generates a markdown report documenting what a dashboard build rendered,
 * skipped and why.
 */

import type {
  BuildDashboardResult,
  DashboardRequest,
  ResourceOutcome,
} from '../entities/dashboard.js';
import { countOutcomes } from '../entities/dashboard.js';

export interface DashboardReportData {
  request: DashboardRequest;
  result: BuildDashboardResult;
  /** Defaults to now */
  generatedAt?: Date;
}

const NOT_RENDERED_REASONS: Readonly<Record<Exclude<ResourceOutcome['status'], 'rendered'>, string>> = {
  unmatched: 'No enabled widget type matches the ARN',
  excluded: 'Load balancer type not enabled',
  skipped: 'ARN lacks the identifier the widget needs',
  failed: 'Widget builder failed',
};

function describeOutcome(outcome: ResourceOutcome): string {
  if (outcome.status === 'rendered') return '';
  const reason = NOT_RENDERED_REASONS[outcome.status];
  return outcome.error ? `${reason}: ${outcome.error}` : reason;
}

/**
 * Generate a markdown report for a dashboard build.
 */
export function generateDashboardReport(data: DashboardReportData): string {
  const { request, result } = data;
  const generatedAt = data.generatedAt ?? new Date();
  const { outcomes } = result;

  const rendered = outcomes.filter(o => o.status === 'rendered');
  const notRendered = outcomes.filter(o => o.status !== 'rendered');
  const targets = request.targets;

  const lines: string[] = [
    '# Dashboard Build Report',
    '',
    `**Dashboard:** ${request.dashboardName}`,
    `**Generated:** ${generatedAt.toISOString()}`,
    `**Status:** ${result.statusCode === 200 ? 'Written' : 'Failed'} (${result.statusCode})`,
    '',
    '---',
    '',
    '## Configuration',
    '',
    `| Setting | Value |`,
    `|---------|-------|`,
    `| Region | ${request.region} |`,
    `| Tag | \`${request.tagKey}:${request.tagValue}\` |`,
    `| Enabled Widgets | ${request.enabledWidgets.join(', ')} |`,
    `| Availability Target | ${targets.availabilityPercent}% |`,
    `| EC2 CPU/Memory Target | ${targets.cpuPercent}% |`,
    `| RDS CPU Target | ${targets.rdsCpuPercent}% |`,
    `| RDS Latency Target | ${targets.latencyMs}ms |`,
    `| Custom Widgets | ${request.customWidgets.length} |`,
    '',
    '---',
    '',
    '## Summary',
    '',
    `- **Resources Discovered:** ${result.discoveredCount}`,
    `- **Widgets Written:** ${result.dashboard.widgets.length}`,
    `- **SLO Rows:** ${result.sloFamilies.length}`,
    `- **Resources Rendered:** ${rendered.length}`,
    `- **Unmatched:** ${countOutcomes(outcomes, 'unmatched')}`,
    `- **Excluded:** ${countOutcomes(outcomes, 'excluded')}`,
    `- **Skipped:** ${countOutcomes(outcomes, 'skipped')}`,
    `- **Failed:** ${countOutcomes(outcomes, 'failed')}`,
    '',
    `> ${result.body}`,
    '',
  ];

  if (result.sloFamilies.length > 0) {
    lines.push('---', '', '## SLO Rows', '');
    for (const family of result.sloFamilies) {
      lines.push(`- ${family}`);
    }
    lines.push('');
  }

  if (rendered.length > 0) {
    lines.push('---', '', '## Rendered Resources', '');
    lines.push('| Widget | Type | ARN |');
    lines.push('|--------|------|-----|');

    for (const outcome of rendered) {
      lines.push(`| ${outcome.title ?? ''} | ${outcome.family ?? ''} | ${outcome.arn} |`);
    }
    lines.push('');
  }

  if (notRendered.length > 0) {
    lines.push('---', '', '## Resources Not Rendered', '');
    lines.push('| ARN | Status | Reason |');
    lines.push('|-----|--------|--------|');

    for (const outcome of notRendered) {
      lines.push(`| ${outcome.arn} | ${outcome.status} | ${describeOutcome(outcome)} |`);
    }
    lines.push('');
  }

  lines.push('---', '');
  lines.push('*Report generated by tag-dashboard*');

  return lines.join('\n');
}
