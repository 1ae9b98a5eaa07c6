import type { ServiceFamily } from './service-family.js';
import type { DimensionOverrides, MetricWidget } from './widget.js';
import type { AgentCapability } from '../services/capability-probe.js';

export interface WidgetBuilderInput {
  readonly arn: string;
  /** Region the widget queries; already forced to the global region where needed */
  readonly region: string;
  readonly y: number;
  readonly dimensionOverrides: DimensionOverrides;
}

/**
 * Returns null when the ARN lacks the fragment the family's metrics key on.
 */
export type StaticWidgetBuilder = (input: WidgetBuilderInput) => MetricWidget | null;

export type WidgetRenderer =
  | { readonly kind: 'static'; readonly builderName: string; readonly build: StaticWidgetBuilder }
  | { readonly kind: 'probed'; readonly builderName: string; readonly capability: AgentCapability };

export interface CatalogEntry {
  readonly family: ServiceFamily;
  /** Resource type filter for the tagging API, e.g. `ec2:instance` */
  readonly tagFilter: string;
  /** Substring that identifies this family inside an ARN */
  readonly idToken: string;
  /** Metrics for the family are only published in the global region */
  readonly isGlobal: boolean;
  readonly renderer: WidgetRenderer;
}
