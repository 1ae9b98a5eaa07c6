/**
 * Dashboard Domain Entities
 *
 * Types for a single dashboard build: the request, the per-resource
 * outcomes and the result handed back to the entry points.
 */

import type { ServiceFamily, SloFamily } from './service-family.js';
import type { CustomWidget, DashboardWidget, DimensionOverrides } from './widget.js';
import type { SloTargets } from '../value-objects/slo-targets.js';

/**
 * Everything a build needs, already parsed from configuration.
 */
export interface DashboardRequest {
  /** Dashboard name; an existing dashboard with this name is replaced */
  dashboardName: string;
  /** Region the dashboard lives in and the default widget region */
  region: string;
  tagKey: string;
  tagValue: string;
  /** Allow-list of catalog keys; unknown keys are skipped with a warning */
  enabledWidgets: readonly string[];
  targets: SloTargets;
  dimensionOverrides: DimensionOverrides;
  /** Appended after the resource widgets in the given order */
  customWidgets: readonly CustomWidget[];
}

/**
 * Full dashboard contents. Built fresh every run and never read back.
 */
export interface DashboardState {
  name: string;
  widgets: readonly DashboardWidget[];
}

export type ResourceOutcomeStatus =
  /** Widget placed on the dashboard */
  | 'rendered'
  /** No enabled family matched the ARN */
  | 'unmatched'
  /** Classic load balancer entry selected for an ALB/NLB ARN */
  | 'excluded'
  /** Builder returned no widget */
  | 'skipped'
  /** Builder threw; the error is recorded */
  | 'failed';

export interface ResourceOutcome {
  arn: string;
  status: ResourceOutcomeStatus;
  family?: ServiceFamily;
  builderName?: string;
  title?: string;
  error?: string;
}

export interface BuildDashboardResult {
  /** 200 when the dashboard was written, 500 when the store rejected it */
  statusCode: number;
  /** Human-readable summary */
  body: string;
  dashboard: DashboardState;
  /** Number of tagged resources discovery returned */
  discoveredCount: number;
  outcomes: readonly ResourceOutcome[];
  /** SLO rows emitted, in stacking order */
  sloFamilies: readonly SloFamily[];
}

export function toDashboardBody(widgets: readonly DashboardWidget[]): string {
  return JSON.stringify({ widgets });
}

export function countOutcomes(
  outcomes: readonly ResourceOutcome[],
  status: ResourceOutcomeStatus
): number {
  return outcomes.filter(o => o.status === status).length;
}
