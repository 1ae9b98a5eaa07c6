/**
 * CloudWatch dashboard widget shapes.
 *
 * Mirrors the dashboard body JSON structure: metric rows are positional
 * arrays where "..." repeats the previous row's namespace and dimensions.
 */

import type { JsonObject } from '../value-objects/json.js';

export type MetricStat = 'Sum' | 'Average' | 'Minimum' | 'Maximum' | 'SampleCount';

export interface MetricRenderOptions {
  readonly stat?: MetricStat;
  readonly label?: string;
}

/**
 * A metric math or SEARCH expression. Hidden expressions feed other
 * expressions in the same widget by id.
 */
export interface MetricExpression {
  readonly expression: string;
  readonly id?: string;
  readonly label?: string;
  readonly visible?: boolean;
}

export type MetricRow = readonly (string | MetricRenderOptions)[];

export type ExpressionRow = readonly [MetricExpression];

export type MetricEntry = MetricRow | ExpressionRow;

export interface MetricDimension {
  readonly name: string;
  readonly value: string;
}

/**
 * Dimension sets keyed by CloudWatch namespace, e.g. `AWS/ApiGateway`.
 */
export type DimensionOverrides = Readonly<Record<string, readonly MetricDimension[]>>;

export interface HorizontalAnnotation {
  readonly color: string;
  readonly label: string;
  readonly value: number;
}

export type MetricView = 'timeSeries' | 'singleValue';

export interface MetricWidgetProperties {
  readonly metrics: readonly MetricEntry[];
  readonly view: MetricView;
  readonly region: string;
  readonly title: string;
  readonly yAxis?: { readonly left: { readonly min: number; readonly max: number } };
  readonly annotations?: { readonly horizontal: readonly HorizontalAnnotation[] };
}

export interface WidgetPlacement {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface MetricWidget extends WidgetPlacement {
  readonly type: 'metric';
  readonly properties: MetricWidgetProperties;
}

export interface TextWidget extends WidgetPlacement {
  readonly type: 'text';
  readonly properties: { readonly markdown: string };
}

/** Widget definitions passed through from configuration untouched, apart from position and region. */
export type CustomWidget = JsonObject;

export type DashboardWidget = MetricWidget | TextWidget | CustomWidget;

export const DASHBOARD_WIDTH = 24;
export const DEFAULT_WIDGET_HEIGHT = 7;
