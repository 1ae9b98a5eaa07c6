import type { DashboardWidget } from '../../domain/entities/widget.js';

export type DashboardWriteResult =
  | { readonly success: true; readonly location: string }
  | { readonly success: false; readonly error: string };

export interface DashboardStorePort {
  /**
   * Replaces the dashboard named `name` with exactly `widgets`.
   */
  putDashboard(name: string, widgets: readonly DashboardWidget[]): Promise<DashboardWriteResult>;
}
